/**
 * Worker Thread Factory Module
 *
 * Creates the database worker thread and the connection bundle that
 * forwards calls to it.
 */

import path from 'path';

import { connectWorkerPort } from './core/rpc';
import type { DatabaseEndpoint } from './core/sqlite-db';
import type { DatabaseOperations } from './core/types';
import type { DatabaseConnectionBundle } from './connectionTypes';
import { InvocationTimeoutMs } from './config';
import { spawnWorker } from './platform/threadPool';
import type { WorkerPort } from './core/rpc';
import type { TaskLog } from './outputChannel';

const EndpointMethods = [
  'openDatabase',
  'testDatabase',
  'runQuery',
  'listTables',
  'ping',
  'closeDatabase'
] as const satisfies readonly (keyof DatabaseEndpoint)[];

/**
 * Build a connection bundle over any port that serves the database
 * endpoint.
 *
 * @param port - Port whose other end runs createWorkerEndpoint()
 * @param terminate - Releases the port's thread
 */
export function createPortConnection(
  port: WorkerPort,
  terminate: () => void,
  timeoutMs: number = InvocationTimeoutMs
): DatabaseConnectionBundle & { rejectPending(reason: string): void } {
  const { proxy, tracker } = connectWorkerPort<DatabaseEndpoint>(port, EndpointMethods, timeoutMs);

  const databaseOps: DatabaseOperations = {
    executeQuery: (sql, params) => proxy.runQuery(sql, params),
    listTables: filter => proxy.listTables(filter),
    ping: () => proxy.ping()
  };

  return {
    databaseOps,
    async open(params) {
      const { tableCount } = await proxy.openDatabase(params);
      return tableCount;
    },
    test: params => proxy.testDatabase(params),
    close: () => proxy.closeDatabase(),
    rejectPending(reason) {
      tracker.rejectAll(reason);
    },
    dispose() {
      tracker.rejectAll('Database connection disposed');
      terminate();
    }
  };
}

/**
 * Spawn the database worker and connect to it.
 *
 * From compiled output the worker runs databaseWorker.js; when the
 * sources run through tsx the worker registers tsx before loading the
 * TypeScript entry.
 */
export function createDatabaseConnection(log: TaskLog): DatabaseConnectionBundle {
  const runningFromSource = __filename.endsWith('.ts');
  const workerScript = path.resolve(__dirname, runningFromSource ? 'databaseWorker.ts' : 'databaseWorker.js');

  const worker = runningFromSource
    ? spawnWorker(`require('tsx/cjs');require(${JSON.stringify(workerScript)});`, { eval: true })
    : spawnWorker(workerScript);

  log.info(`Database worker started: ${workerScript}`);

  const bundle = createPortConnection(worker, () => {
    worker.terminate().catch((err: unknown) => {
      log.error(`Worker termination failed: ${String(err)}`);
    });
  });

  worker.onExit(exitCode => {
    log.warn(`Database worker exited with code ${exitCode}`);
    bundle.rejectPending(`Database worker exited with code ${exitCode}`);
  });

  return bundle;
}
