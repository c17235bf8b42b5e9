/**
 * Database Connection Bundle Types
 *
 * Abstracts over where the database engine runs (worker thread or the
 * current thread) behind one connection interface.
 */

import type { IDisposable } from './lifecycle';
import type { ConnectionParams, DatabaseOperations } from './core/types';

/**
 * Database connection bundle.
 *
 * Every method may block on I/O and is meant to be called from background
 * work, never from a continuation.
 */
export interface DatabaseConnectionBundle extends IDisposable {
  /**
   * Operations on the currently open database.
   */
  readonly databaseOps: DatabaseOperations;

  /**
   * Open a database, replacing the current one.
   *
   * @returns Number of tables found
   */
  open(params: ConnectionParams): Promise<number>;

  /**
   * Open and probe a database without keeping it open.
   */
  test(params: ConnectionParams): Promise<boolean>;

  /**
   * Close the current database, if any.
   */
  close(): Promise<void>;
}
