/**
 * Query Console
 *
 * Runs the SQL typed by the user through the single-flight executor. A
 * second run while one is executing is refused; the running query can be
 * cancelled, in which case its result is discarded when it finishes.
 */

import type { DatabaseOperations, QueryResultSet, TaskRecord } from './core/types';
import type { SingleFlightExecutor } from './core/single-flight';
import type { ConnectionState } from './connectionController';
import type { StatusReporter } from './statusReporter';

const EmptyResult: QueryResultSet = { headers: [], rows: [] };

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

export class QueryConsole {
  private result: QueryResultSet | null = null;
  private progressText = '';

  constructor(
    private readonly databaseOps: DatabaseOperations,
    private readonly executor: SingleFlightExecutor,
    private readonly connection: ConnectionState,
    private readonly status: StatusReporter
  ) {}

  /**
   * Result of the last completed query.
   */
  get lastResult(): QueryResultSet | null {
    return this.result;
  }

  /**
   * Latest progress text of the running or last query.
   */
  get progress(): string {
    return this.progressText;
  }

  get isRunning(): boolean {
    return this.executor.isRunning();
  }

  /**
   * Execute `sql` in the background.
   *
   * @returns true if the query was started
   */
  run(sql: string): boolean {
    const query = sql.trim();
    if (!query) {
      this.status.show('Query is empty', { error: true });
      return false;
    }
    if (!this.connection.isConnected) {
      this.status.show('Not connected to database', { error: true });
      return false;
    }

    const started = this.executor.executeAsync(
      signal => this.execute(query, signal),
      task => this.onComplete(task),
      message => {
        this.progressText = message;
      }
    );

    if (!started) {
      this.status.show('A query is already running', { error: true });
    }
    return started;
  }

  /**
   * Request cancellation of the running query.
   */
  cancel(): boolean {
    const requested = this.executor.cancelCurrent();
    if (requested) {
      this.status.show('Cancelling query...');
    }
    return requested;
  }

  /**
   * Background part: run the statement and keep the last result set.
   */
  private async execute(query: string, signal: AbortSignal): Promise<QueryResultSet> {
    const resultSets = await this.databaseOps.executeQuery(query);
    if (signal.aborted) {
      return EmptyResult;
    }
    return resultSets[resultSets.length - 1] ?? EmptyResult;
  }

  private onComplete(task: Readonly<TaskRecord<QueryResultSet>>): void {
    switch (task.status) {
      case 'completed': {
        const result = task.result ?? EmptyResult;
        this.result = result;
        const count = result.rows.length;
        this.status.show(`${count} row${count === 1 ? '' : 's'} returned in ${formatSeconds(task.elapsedMs)}`);
        break;
      }
      case 'failed':
        this.status.show(`Query failed:\n${task.error ?? 'Unknown error'}`, { error: true });
        break;
      case 'cancelled':
        this.status.show('Query cancelled');
        break;
      default:
        break;
    }
  }
}
