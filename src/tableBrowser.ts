/**
 * Table Browser
 *
 * Keeps the table list of the open database. Each filter change starts a
 * new lookup; only the newest lookup's result is applied.
 */

import type { DatabaseOperations } from './core/types';
import type { TaskDispatcher } from './core/task-dispatcher';
import { LatestOnly } from './core/latest-only';
import type { ConnectionState } from './connectionController';
import type { StatusReporter } from './statusReporter';

export class TableBrowser {
  private tableNames: readonly string[] = [];
  private loading = false;
  private currentFilter = '';
  private readonly latest = new LatestOnly();

  constructor(
    private readonly databaseOps: DatabaseOperations,
    private readonly connection: ConnectionState,
    private readonly dispatcher: TaskDispatcher,
    private readonly status: StatusReporter
  ) {}

  get tables(): readonly string[] {
    return this.tableNames;
  }

  get filter(): string {
    return this.currentFilter;
  }

  get isLoading(): boolean {
    return this.loading;
  }

  /**
   * Look up tables whose name contains `text`.
   */
  filterTables(text: string): void {
    this.currentFilter = text;

    if (!this.connection.isConnected) {
      this.status.show('Not connected to database', { error: true });
      return;
    }

    const guard = this.latest.next();
    this.loading = true;

    this.dispatcher.submit(
      () => this.databaseOps.listTables(text),
      guard((names: string[]) => {
        this.loading = false;
        this.tableNames = names;
        if (names.length === 0 && text.trim()) {
          this.status.show(`No tables match "${text.trim()}"`);
        }
      }),
      guard((error: Error) => {
        this.loading = false;
        this.status.show(`Failed to list tables:\n${error.message}`, { error: true });
      })
    );
  }

  /**
   * Forget the table list and ignore lookups still in flight.
   */
  clear(): void {
    this.latest.invalidate();
    this.tableNames = [];
    this.loading = false;
  }
}
