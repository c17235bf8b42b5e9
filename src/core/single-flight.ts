/**
 * Single-Flight Executor
 *
 * Runs at most one cancellable task at a time. A submission made while the
 * previous run is alive is rejected, not queued.
 *
 * Cancellation is cooperative: cancelCurrent() aborts the task's signal
 * but never interrupts the work. The executor checks the signal before
 * the work starts and again after it settles; a long-running work that
 * wants to stop early should poll `signal.aborted` itself.
 */

import { performance } from 'node:perf_hooks';

import type { DeliveryQueue } from './delivery-queue';
import type {
  CancellableWork,
  CompletionHandler,
  ProgressHandler,
  TaskRecord,
  TaskStatus,
  TerminalTaskStatus
} from './types';
import { describeError } from './errors';
import type { TaskLog } from '../outputChannel';

// ============================================================================
// State Machine
// ============================================================================

const AllowedTransitions: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: []
};

/**
 * Move a task to its next status.
 *
 * @throws Error if the transition is not part of the state machine
 */
export function transitionTask<T>(task: TaskRecord<T>, next: TaskStatus): void {
  if (!AllowedTransitions[task.status].includes(next)) {
    throw new Error(`Illegal task transition: ${task.status} -> ${next}`);
  }
  task.status = next;
}

export function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
  return AllowedTransitions[status].length === 0;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

// ============================================================================
// Executor
// ============================================================================

export class SingleFlightExecutor {
  private sequence = 0;
  private alive = false;
  private controller: AbortController | null = null;
  private current: TaskRecord<unknown> | null = null;

  /**
   * @param queue - Queue used for progress and completion delivery
   * @param label - Noun used in progress text ("Executing query...")
   */
  constructor(
    private readonly queue: DeliveryQueue,
    private readonly label: string,
    private readonly log?: TaskLog
  ) {}

  /**
   * Snapshot of the most recent task, or null before the first submission.
   */
  get currentTask(): Readonly<TaskRecord<unknown>> | null {
    return this.current ? { ...this.current } : null;
  }

  /**
   * True while the current task's background run has not exited.
   */
  isRunning(): boolean {
    return this.alive;
  }

  /**
   * Start a task unless one is already running.
   *
   * Progress messages and the completion record are both delivered through
   * the queue, so `onComplete` always runs after every progress message of
   * the same task.
   *
   * @returns false if the submission was rejected
   */
  executeAsync<T>(
    work: CancellableWork<T>,
    onComplete: CompletionHandler<T>,
    onProgress?: ProgressHandler
  ): boolean {
    if (this.alive) {
      this.log?.info(`Rejected ${this.label}: task #${this.current?.id} still running`);
      return false;
    }

    const controller = new AbortController();
    const task: TaskRecord<T> = { id: ++this.sequence, status: 'pending', elapsedMs: 0 };
    transitionTask(task, 'running');

    this.controller = controller;
    this.current = task;
    this.alive = true;

    setImmediate(() => {
      this.runInBackground(task, controller.signal, work, onComplete, onProgress)
        .catch((err: unknown) => {
          this.log?.error(`Task #${task.id} crashed: ${describeError(err)}`);
        });
    });

    return true;
  }

  /**
   * Request cancellation of the running task.
   *
   * @returns true if a live task was flagged
   */
  cancelCurrent(): boolean {
    if (!this.alive || !this.controller) {
      return false;
    }
    this.controller.abort();
    this.log?.info(`Cancellation requested for task #${this.current?.id}`);
    return true;
  }

  private async runInBackground<T>(
    task: TaskRecord<T>,
    signal: AbortSignal,
    work: CancellableWork<T>,
    onComplete: CompletionHandler<T>,
    onProgress?: ProgressHandler
  ): Promise<void> {
    const startedAt = performance.now();
    const report = (message: string) => {
      if (onProgress) {
        this.queue.push(() => onProgress(message));
      }
    };

    try {
      report(`Executing ${this.label}...`);

      if (signal.aborted) {
        transitionTask(task, 'cancelled');
        return;
      }

      const result = await work(signal);

      if (signal.aborted) {
        transitionTask(task, 'cancelled');
        return;
      }

      task.result = result;
      transitionTask(task, 'completed');
      task.elapsedMs = performance.now() - startedAt;
      report(`${capitalize(this.label)} completed in ${(task.elapsedMs / 1000).toFixed(2)}s`);
    } catch (err) {
      // Work that noticed the signal and threw has been cancelled, not failed
      if (signal.aborted) {
        transitionTask(task, 'cancelled');
        return;
      }
      task.error = describeError(err);
      transitionTask(task, 'failed');
      report(`${capitalize(this.label)} failed: ${task.error}`);
    } finally {
      task.elapsedMs = performance.now() - startedAt;
      const record: Readonly<TaskRecord<T>> = { ...task };
      this.queue.push(() => onComplete(record));
      this.log?.info(`Task #${task.id} ${task.status} after ${task.elapsedMs.toFixed(1)}ms`);
      this.alive = false;
    }
  }
}
