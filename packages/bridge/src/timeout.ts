/**
 * @callbridge/bridge - Timeout
 * Timeout wrapper for async operations
 */

/**
 * Error thrown when an operation exceeds its timeout.
 */
export class TimeoutExceededError extends Error {
  /** The timeout value in milliseconds that was exceeded */
  readonly timeout: number;

  constructor(timeout: number) {
    super(`Operation timed out after ${timeout}ms`);
    this.name = "TimeoutExceededError";
    this.timeout = timeout;
  }
}

/**
 * Execute a function with a timeout.
 * A timeout of 0 or less runs the function without one.
 *
 * @param fn - The function to execute
 * @param timeoutMs - Timeout in milliseconds
 * @param onTimeout - Called when the timeout fires; an error it throws replaces TimeoutExceededError
 */
export async function executeWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  onTimeout?: () => void | never
): Promise<T> {
  if (timeoutMs <= 0) {
    return fn();
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      if (onTimeout) {
        try {
          onTimeout();
        } catch (error) {
          reject(error);
          return;
        }
      }
      reject(new TimeoutExceededError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}
