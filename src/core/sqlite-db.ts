/**
 * SQLite Database Engine Module
 *
 * Database operations on the sql.js WebAssembly engine. sql.js runs
 * synchronously, so the application hosts this module in a worker thread
 * (see databaseWorker.ts) and reaches it through the RPC layer.
 */

import { promises as fs } from 'fs';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';

import type { CellValue, ConnectionParams, DatabaseOperations, QueryResultSet } from './types';
import { containsPattern } from './sql-utils';
import { MaxListedTables, MemoryDatabase } from '../config';

// ============================================================================
// Engine Loading
// ============================================================================

let enginePromise: Promise<SqlJsStatic> | null = null;

/**
 * Load the sql.js module once per thread.
 */
function loadEngine(): Promise<SqlJsStatic> {
  if (!enginePromise) {
    enginePromise = initSqlJs();
  }
  return enginePromise;
}

// ============================================================================
// Database Engine Implementation
// ============================================================================

/**
 * sql.js-backed database. All changes stay in memory.
 */
export class WasmDatabaseEngine implements DatabaseOperations {
  constructor(private readonly instance: Database) {}

  /**
   * Execute SQL and return one result set per statement that produced rows.
   */
  async executeQuery(sql: string, params?: CellValue[]): Promise<QueryResultSet[]> {
    try {
      return this.instance.exec(sql, params).map(resultSet => ({
        headers: resultSet.columns,
        rows: resultSet.values
      }));
    } catch (err) {
      const errorDetail = err instanceof Error ? err.message : String(err);
      throw new Error(`Query failed: ${errorDetail}`);
    }
  }

  /**
   * Names of user tables and views, optionally filtered by substring.
   */
  async listTables(filter?: string): Promise<string[]> {
    const trimmed = filter?.trim() ?? '';
    const [resultSet] = this.instance.exec(
      `SELECT name FROM sqlite_master
       WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\'
         AND name LIKE ? ESCAPE '\\'
       ORDER BY name LIMIT ${MaxListedTables}`,
      [containsPattern(trimmed)]
    );
    if (!resultSet) return [];
    return resultSet.values.map(row => String(row[0]));
  }

  async ping(): Promise<boolean> {
    try {
      this.instance.exec('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  close(): void {
    this.instance.close();
  }
}

// ============================================================================
// Database Factory
// ============================================================================

/**
 * Open a database file, or a scratch database for ':memory:'.
 *
 * A read-only database is opened with `query_only` set, so SQLite refuses
 * every statement that would change it.
 */
export async function openDatabase(params: ConnectionParams): Promise<WasmDatabaseEngine> {
  const engine = await loadEngine();

  const instance = params.filename === MemoryDatabase
    ? new engine.Database()
    : new engine.Database(await fs.readFile(params.filename));

  if (params.readOnly) {
    instance.run('PRAGMA query_only = ON');
  }
  return new WasmDatabaseEngine(instance);
}

// ============================================================================
// Worker Entry Point
// ============================================================================

/**
 * Create the method table served by the database worker.
 *
 * Holds at most one open database; opening another closes the first.
 */
export function createWorkerEndpoint() {
  let activeEngine: WasmDatabaseEngine | null = null;

  const requireEngine = (): WasmDatabaseEngine => {
    if (!activeEngine) throw new Error('No database open');
    return activeEngine;
  };

  return {
    async openDatabase(params: ConnectionParams): Promise<{ tableCount: number }> {
      const engine = await openDatabase(params);
      activeEngine?.close();
      activeEngine = engine;
      const tables = await engine.listTables();
      return { tableCount: tables.length };
    },

    /**
     * Open and probe a database without replacing the active one.
     */
    async testDatabase(params: ConnectionParams): Promise<boolean> {
      const engine = await openDatabase(params);
      try {
        return await engine.ping();
      } finally {
        engine.close();
      }
    },

    async runQuery(sql: string, params?: CellValue[]): Promise<QueryResultSet[]> {
      return requireEngine().executeQuery(sql, params);
    },

    async listTables(filter?: string): Promise<string[]> {
      return requireEngine().listTables(filter);
    },

    async ping(): Promise<boolean> {
      if (!activeEngine) return false;
      return activeEngine.ping();
    },

    async closeDatabase(): Promise<void> {
      activeEngine?.close();
      activeEngine = null;
    }
  };
}

export type DatabaseEndpoint = ReturnType<typeof createWorkerEndpoint>;
