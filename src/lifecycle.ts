/**
 * Resource Lifecycle Management
 *
 * Utilities for releasing timers, worker threads, listeners and other
 * resources held by long-lived application objects.
 */

/**
 * Anything that holds a resource released by `dispose()`.
 */
export interface IDisposable {
  dispose(): void;
}

/**
 * Wrap a cleanup function as a disposable.
 */
export function toDisposable(cleanup: () => void): IDisposable {
  let done = false;
  return {
    dispose() {
      if (done) return;
      done = true;
      cleanup();
    }
  };
}

// ============================================================================
// Batch Disposal
// ============================================================================

/**
 * Dispose all items in an array, collecting any errors.
 *
 * Items are disposed in reverse order (LIFO). Failures are collected and
 * rethrown as an AggregateError once every item has been processed.
 *
 * @param items - Disposables to clean up (the array is emptied)
 * @throws AggregateError if any disposal failed
 */
export function disposeAll(items: IDisposable[]): void {
  const failures: unknown[] = [];

  while (items.length > 0) {
    const item = items.pop();
    if (item) {
      try {
        item.dispose();
      } catch (err) {
        failures.push(err);
      }
    }
  }

  if (failures.length > 0) {
    throw new AggregateError(failures, 'One or more disposal operations failed');
  }
}

// ============================================================================
// Disposable Base Class
// ============================================================================

/**
 * Base class for objects that own child resources.
 *
 * Children registered via _register() are disposed together with the
 * parent, in reverse order of registration.
 *
 * @example
 * ```typescript
 * class Ticker extends Disposable {
 *   constructor() {
 *     super();
 *     const timer = setInterval(tick, 16);
 *     this._register(toDisposable(() => clearInterval(timer)));
 *   }
 * }
 * ```
 */
export abstract class Disposable implements IDisposable {
  private _disposed = false;

  private readonly children: IDisposable[] = [];

  /**
   * Release all resources held by this object.
   *
   * Safe to call multiple times; later calls are no-ops.
   */
  dispose(): void {
    if (this._disposed) {
      return;
    }

    this._disposed = true;
    disposeAll(this.children);
  }

  /**
   * Register a child resource. If this object is already disposed the
   * child is disposed immediately instead.
   */
  protected _register<T extends IDisposable>(child: T): T {
    if (this._disposed) {
      child.dispose();
    } else {
      this.children.push(child);
    }
    return child;
  }

  protected get isDisposed(): boolean {
    return this._disposed;
  }
}
