/**
 * Delivery Queue
 *
 * FIFO of continuations pushed by background runs and drained only by the
 * foreground pump. Producers never run a continuation themselves.
 *
 * All producers and the single consumer share the main event loop, so a
 * push can never interleave with a pop; results computed on worker threads
 * reach this queue as messages on that same loop.
 */

import type { Continuation } from './types';

export class DeliveryQueue {
  private pending: Continuation[] = [];
  private head = 0;

  /**
   * Number of continuations waiting to run.
   */
  get size(): number {
    return this.pending.length - this.head;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Enqueue a continuation. Never blocks, never throws.
   */
  push(continuation: Continuation): void {
    this.pending.push(continuation);
  }

  /**
   * Run continuations in push order until the queue is empty.
   *
   * Continuations pushed while draining are run in the same call. Each
   * continuation runs in isolation: a failure does not stop the drain.
   * Once the queue is empty, a single failure is rethrown as is and
   * several are rethrown together as an AggregateError.
   *
   * @returns Number of continuations run
   */
  drainAndRun(): number {
    const failures: unknown[] = [];
    let ran = 0;

    let next = this.shift();
    while (next) {
      ran++;
      try {
        next();
      } catch (err) {
        failures.push(err);
      }
      next = this.shift();
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} continuations failed`);
    }
    return ran;
  }

  private shift(): Continuation | undefined {
    if (this.head >= this.pending.length) {
      if (this.head > 0) {
        this.pending = [];
        this.head = 0;
      }
      return undefined;
    }
    const continuation = this.pending[this.head];
    this.head++;
    return continuation;
  }
}
