/**
 * Connection Controller
 *
 * Handles the connect and test-connection actions. Parameters are validated
 * on the foreground; opening the database runs through the task dispatcher
 * and its outcome is reported on the status line.
 */

import path from 'path';

import type { ConnectionParams } from './core/types';
import type { TaskDispatcher } from './core/task-dispatcher';
import type { DatabaseConnectionBundle } from './connectionTypes';
import type { StatusReporter } from './statusReporter';
import type { TaskLog } from './outputChannel';
import { toDisposable } from './lifecycle';
import type { IDisposable } from './lifecycle';
import { DatabaseExtensions, MemoryDatabase } from './config';

/**
 * Read-only view of the connection for components that need one.
 */
export interface ConnectionState {
  readonly isConnected: boolean;
}

/**
 * Check connection parameters before any I/O happens.
 *
 * @returns Error description, or null if the parameters are usable
 */
export function validateConnectionParams(params: ConnectionParams): string | null {
  const filename = params.filename.trim();
  if (!filename) {
    return 'Database file is required';
  }
  if (filename === MemoryDatabase) {
    return null;
  }
  const extension = path.extname(filename).toLowerCase();
  if (!DatabaseExtensions.includes(extension)) {
    return `Unsupported database file extension: ${extension || '(none)'}`;
  }
  return null;
}

function displayName(filename: string): string {
  return filename === MemoryDatabase ? 'in-memory database' : path.basename(filename);
}

export class ConnectionController implements ConnectionState {
  private connecting = false;
  private connected = false;
  private database: string | null = null;
  private readonly connectedListeners = new Set<(filename: string) => void>();

  constructor(
    private readonly connection: DatabaseConnectionBundle,
    private readonly dispatcher: TaskDispatcher,
    private readonly status: StatusReporter,
    private readonly log?: TaskLog
  ) {}

  get isConnecting(): boolean {
    return this.connecting;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * File name of the open database, or null.
   */
  get activeDatabase(): string | null {
    return this.database;
  }

  /**
   * Subscribe to successful connections.
   */
  onConnected(listener: (filename: string) => void): IDisposable {
    this.connectedListeners.add(listener);
    return toDisposable(() => this.connectedListeners.delete(listener));
  }

  /**
   * Open a database in the background.
   *
   * @returns false if nothing was started (invalid parameters, or an
   *   attempt is already pending)
   */
  connect(params: ConnectionParams): boolean {
    if (!this.begin(params, 'Connection failed')) {
      return false;
    }
    const filename = params.filename.trim();
    this.status.show(`Connecting to ${displayName(filename)}... Please wait`);

    this.dispatcher.submit(
      () => this.connection.open({ ...params, filename }),
      tableCount => {
        this.connecting = false;
        this.connected = true;
        this.database = filename;
        this.status.show(`Connected to ${displayName(filename)} (${tableCount} tables)`);
        for (const listener of [...this.connectedListeners]) {
          listener(filename);
        }
      },
      error => {
        // The worker replaces its database only after a successful open,
        // so a previously open database stays active
        this.connecting = false;
        this.status.show(`Connection failed:\n${error.message}`, { error: true });
      }
    );
    return true;
  }

  /**
   * Check that a database opens and answers, without keeping it open.
   *
   * @returns false if nothing was started
   */
  testConnection(params: ConnectionParams): boolean {
    if (!this.begin(params, 'Connection test failed')) {
      return false;
    }
    const filename = params.filename.trim();
    this.status.show('Testing connection... Please wait');

    this.dispatcher.submit(
      () => this.connection.test({ ...params, filename }),
      responded => {
        this.connecting = false;
        if (responded) {
          this.status.show(`Connection test succeeded for ${displayName(filename)}`);
        } else {
          this.status.show('Connection test failed:\nDatabase did not respond', { error: true });
        }
      },
      error => {
        this.connecting = false;
        this.status.show(`Connection test failed:\n${error.message}`, { error: true });
      }
    );
    return true;
  }

  private begin(params: ConnectionParams, failurePrefix: string): boolean {
    if (this.connecting) {
      this.log?.info('Ignoring request: a connection attempt is already pending');
      return false;
    }
    const problem = validateConnectionParams(params);
    if (problem) {
      this.status.show(`${failurePrefix}:\n${problem}`, { error: true });
      return false;
    }
    this.connecting = true;
    return true;
  }
}
