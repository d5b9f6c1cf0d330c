/**
 * Shared utility functions for pipeline stages.
 */

/**
 * Coerces a thrown value into an Error. Non-Error values are boxed with the
 * original value kept as the cause.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value), { cause: value });
}
