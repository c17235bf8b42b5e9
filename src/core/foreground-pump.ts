/**
 * Foreground Pump
 *
 * Called once per iteration of the host loop. Drains the Delivery Queue
 * and runs every continuation on the calling (foreground) thread.
 */

import type { DeliveryQueue } from './delivery-queue';
import { describeError } from './errors';
import type { TaskLog } from '../outputChannel';

export class ForegroundPump {
  constructor(
    private readonly queue: DeliveryQueue,
    private readonly log: TaskLog
  ) {}

  /**
   * Run all pending continuations. Continuation failures are logged and
   * never escape to the host loop.
   */
  tick(): void {
    if (this.queue.isEmpty) {
      return;
    }

    try {
      this.queue.drainAndRun();
    } catch (err) {
      const failures = err instanceof AggregateError ? err.errors : [err];
      for (const failure of failures) {
        this.log.error(`Continuation failed: ${describeError(failure)}`);
      }
    }
  }
}
