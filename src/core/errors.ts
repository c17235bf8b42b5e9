/**
 * Error normalization for values thrown by background work.
 */

/**
 * Convert any thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Human-readable description of a thrown value.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
