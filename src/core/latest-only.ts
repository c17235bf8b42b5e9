/**
 * Latest-Only Continuations
 *
 * Guards continuations of repeated requests (a table filter retyped while
 * the previous lookup is still running) so only the newest request's
 * result is applied. Older results are dropped when they are delivered.
 */

export class LatestOnly {
  private generation = 0;

  /**
   * Start a new request, superseding every earlier one.
   *
   * @returns Wrapper for the new request's continuations
   */
  next(): <A extends unknown[]>(callback: (...args: A) => void) => (...args: A) => void {
    const issued = ++this.generation;
    return callback => (...args) => {
      if (issued === this.generation) {
        callback(...args);
      }
    };
  }

  /**
   * Drop the results of all outstanding requests.
   */
  invalidate(): void {
    this.generation++;
  }
}
