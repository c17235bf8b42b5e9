/**
 * Core Type Definitions for DB Desk
 *
 * Shared types for the task execution core and the database layer.
 */

// ============================================================================
// Utility Types
// ============================================================================

/**
 * Type that may be a value or a promise.
 */
export type MaybeAsync<T> = T | PromiseLike<T>;

// ============================================================================
// Task Execution Types
// ============================================================================

/**
 * Deferred zero-argument callback run on the foreground loop once
 * background work has finished.
 */
export type Continuation = () => void;

/**
 * Unit of work for the general dispatcher. Must not touch UI state.
 */
export type BackgroundWork<T> = () => MaybeAsync<T>;

/**
 * Unit of work for the single-flight executor. The signal is aborted when
 * the caller requests cancellation; polling it is up to the work itself.
 */
export type CancellableWork<T> = (signal: AbortSignal) => MaybeAsync<T>;

/**
 * Lifecycle of a single-flight task.
 * `pending` and `running` are transient, the other three are terminal.
 */
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

/**
 * Statuses a task can no longer leave.
 */
export type TerminalTaskStatus = Extract<TaskStatus, 'completed' | 'failed' | 'cancelled'>;

/**
 * Record of one single-flight task.
 */
export interface TaskRecord<T> {
  /** Sequence number assigned at submission */
  readonly id: number;
  status: TaskStatus;
  /** Value returned by the work (completed tasks only) */
  result?: T;
  /** Error description (failed tasks only) */
  error?: string;
  /** Wall time from start of the background run to its end */
  elapsedMs: number;
}

/**
 * Completion callback of the single-flight executor.
 */
export type CompletionHandler<T> = (task: Readonly<TaskRecord<T>>) => void;

/**
 * Advisory progress callback carrying human-readable status text.
 */
export type ProgressHandler = (message: string) => void;

// ============================================================================
// Database Types
// ============================================================================

/**
 * Represents any value that can be stored in a SQLite cell.
 */
export type CellValue = string | number | null | Uint8Array;

/**
 * Result set from a database query execution.
 */
export interface QueryResultSet {
  /** Column names in order */
  headers: string[];
  /** Row data as 2D array */
  rows: CellValue[][];
}

/**
 * Parameters needed to open a database session.
 */
export interface ConnectionParams {
  /** Database file path, or ':memory:' for a scratch database */
  filename: string;
  /** Reject statements that write */
  readOnly?: boolean;
}

/**
 * Operations available on an open database.
 */
export interface DatabaseOperations {
  executeQuery(sql: string, params?: CellValue[]): Promise<QueryResultSet[]>;
  listTables(filter?: string): Promise<string[]>;
  ping(): Promise<boolean>;
}
