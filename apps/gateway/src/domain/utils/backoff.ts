/**
 * Exponential backoff delay: base × 2^attempt.
 *
 * @param attempt - 0-indexed, so the first retry is attempt 0
 *
 * @example
 * calculateBackoff(0) // 1000
 * calculateBackoff(3, 250) // 2000
 */
export function calculateBackoff(attempt: number, baseDelayMs = 1000): number {
  return baseDelayMs * Math.pow(2, attempt);
}
