/**
 * Bound a promise by wall-clock time.
 */

export class DeadlineExceededError extends Error {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
  }
}

/**
 * Resolve or reject with `promise`, or reject with DeadlineExceededError
 * once `timeoutMs` passes. The underlying work is not cancelled.
 */
export async function withDeadline<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceededError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
