#!/usr/bin/env node
/**
 * Application Root
 *
 * Builds the task execution core and the components that use it, and owns
 * all of them. Nothing here is a process-wide singleton: every component
 * receives the objects it needs.
 */

import path from 'path';

import { DeliveryQueue } from './core/delivery-queue';
import { TaskDispatcher } from './core/task-dispatcher';
import { SingleFlightExecutor } from './core/single-flight';
import { ForegroundPump } from './core/foreground-pump';
import { ConnectionController } from './connectionController';
import type { DatabaseConnectionBundle } from './connectionTypes';
import { LoggingDatabaseOperations } from './loggingDatabaseOperations';
import { Disposable, toDisposable } from './lifecycle';
import { TaskLog, createConsoleChannel } from './outputChannel';
import type { OutputChannel } from './outputChannel';
import { QueryConsole } from './queryConsole';
import { RenderLoop } from './renderLoop';
import { StatusReporter } from './statusReporter';
import { TableBrowser } from './tableBrowser';
import { createDatabaseConnection } from './workerFactory';
import { AppId, FrameIntervalMs, MemoryDatabase, QueryTaskLabel, Title } from './config';

export * from './core';

export interface ApplicationOptions {
  /** Log sink (defaults to the console) */
  channel?: OutputChannel;
  /** Database connection (defaults to a new worker thread) */
  connection?: DatabaseConnectionBundle;
  frameIntervalMs?: number;
}

export class Application extends Disposable {
  readonly channel: OutputChannel;
  readonly status: StatusReporter;
  readonly queue = new DeliveryQueue();
  readonly dispatcher: TaskDispatcher;
  readonly executor: SingleFlightExecutor;
  readonly pump: ForegroundPump;
  readonly loop: RenderLoop;
  readonly connection: ConnectionController;
  readonly tables: TableBrowser;
  readonly queries: QueryConsole;

  constructor(options: ApplicationOptions = {}) {
    super();
    this.channel = options.channel ?? createConsoleChannel(Title);
    const log = (tag: string) => new TaskLog(this.channel, tag);

    this.status = new StatusReporter(this.channel);
    this.dispatcher = new TaskDispatcher(this.queue, log('dispatcher'));
    this.executor = new SingleFlightExecutor(this.queue, QueryTaskLabel, log('executor'));
    this.pump = new ForegroundPump(this.queue, log('pump'));
    this.loop = this._register(
      new RenderLoop(this.pump, log('loop'), options.frameIntervalMs ?? FrameIntervalMs)
    );

    const bundle = this._register(options.connection ?? createDatabaseConnection(log('worker')));
    const databaseOps = new LoggingDatabaseOperations(
      bundle.databaseOps,
      () => {
        const active = this.connection.activeDatabase;
        return active ? path.basename(active) : 'no database';
      },
      this.channel
    );

    this.connection = new ConnectionController(bundle, this.dispatcher, this.status, log('connection'));
    this.tables = new TableBrowser(databaseOps, this.connection, this.dispatcher, this.status);
    this.queries = new QueryConsole(databaseOps, this.executor, this.connection, this.status);

    // A new connection invalidates the old table list and loads the new one
    this._register(
      this.connection.onConnected(() => {
        this.tables.clear();
        this.tables.filterTables(this.tables.filter);
      })
    );
    this._register(toDisposable(() => this.executor.cancelCurrent()));

    this.status.show('Not connected', { error: true });
  }

  start(): void {
    this.loop.start();
  }
}

/**
 * Command-line entry: open the database named on the command line (or a
 * scratch database) and keep the render loop running until interrupted.
 */
export function main(argv: string[] = process.argv.slice(2)): Application {
  process.title = AppId;
  const app = new Application();
  app.start();
  app.connection.connect({ filename: argv[0] ?? MemoryDatabase });

  process.once('SIGINT', () => {
    app.dispose();
  });
  return app;
}

if (require.main === module) {
  main();
}
