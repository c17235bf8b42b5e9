/**
 * Task Dispatcher
 *
 * Runs units of work off the current call stack and delivers exactly one
 * continuation per task (success or error) through the Delivery Queue.
 *
 * Concurrency is unbounded: every submission starts immediately and there
 * is no admission control or backpressure. Dispatched tasks cannot be
 * cancelled; callers that need to ignore late results wrap their
 * continuations (see latest-only.ts).
 */

import type { DeliveryQueue } from './delivery-queue';
import type { BackgroundWork } from './types';
import { toError } from './errors';
import type { TaskLog } from '../outputChannel';

export class TaskDispatcher {
  private inFlightCount = 0;
  private sequence = 0;

  constructor(
    private readonly queue: DeliveryQueue,
    private readonly log?: TaskLog
  ) {}

  /**
   * Number of submitted tasks whose continuation has not been delivered.
   */
  get inFlight(): number {
    return this.inFlightCount;
  }

  /**
   * True while any submitted task is running or awaiting delivery.
   */
  isBusy(): boolean {
    return this.inFlightCount > 0;
  }

  /**
   * Submit a unit of work.
   *
   * `work` starts on a later macrotask, so this call returns before any of
   * it runs. When it settles, either `onSuccess(result)` or `onError(error)`
   * is queued for the foreground pump, never both.
   *
   * @returns Task sequence number, for logging
   */
  submit<T>(
    work: BackgroundWork<T>,
    onSuccess: (result: T) => void,
    onError: (error: Error) => void
  ): number {
    const taskId = ++this.sequence;
    this.inFlightCount++;

    setImmediate(() => {
      Promise.resolve()
        .then(() => work())
        .then(result => {
          this.deliver(() => onSuccess(result));
        })
        .catch((err: unknown) => {
          const error = toError(err);
          this.log?.warn(`Task #${taskId} failed: ${error.message}`);
          this.deliver(() => onError(error));
        });
    });

    return taskId;
  }

  /**
   * Queue the task's single continuation. The in-flight count drops once it
   * has run, whether or not it threw.
   */
  private deliver(continuation: () => void): void {
    this.queue.push(() => {
      try {
        continuation();
      } finally {
        this.inFlightCount--;
      }
    });
  }
}
