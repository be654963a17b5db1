/**
 * Timeout Utility
 * 
 * Provides timeout functionality for async operations.
 * 
 * Usage:
 *   import { withTimeout } from './utils/timeout';
 *   
 *   const result = await withTimeout(asyncOperation(), 5000, 'Reverse geocode');
 */

import logger from './logger';

/**
 * Timeout error with additional metadata
 */
export class TimeoutError extends Error {
  code: string;
  timeout: number;

  constructor(message: string, timeout: number) {
    super(message);
    this.name = 'TimeoutError';
    this.code = 'TIMEOUT';
    this.timeout = timeout;
  }
}

/**
 * Wrap async operation with timeout.
 * The timer is cleared once the race settles, or as soon as `signal` aborts.
 * @param promise - Promise to wrap
 * @param timeoutMs - Timeout in milliseconds (default: 30000)
 * @param operationName - Operation name for logging (optional)
 * @param signal - Stops the timer; pair with withAbort to reject on abort
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number = 30000,
  operationName: string | null = null,
  signal?: AbortSignal
): Promise<T> {
  const operationLabel = operationName || 'Operation';
  let timer: NodeJS.Timeout | undefined;
  const stopTimer = (): void => clearTimeout(timer);

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`${operationLabel} timed out (${timeoutMs}ms)`, timeoutMs));
    }, timeoutMs);
  });
  signal?.addEventListener('abort', stopTimer, { once: true });
  if (signal?.aborted) stopTimer();

  try {
    return await Promise.race([promise, timeoutPromise]);
  } catch (error: unknown) {
    if (error instanceof TimeoutError) {
      logger.warn('⏱️ Timeout occurred', {
        operation: operationLabel,
        timeout: timeoutMs,
        error: error.message
      });
    }
    throw error;
  } finally {
    stopTimer();
    signal?.removeEventListener('abort', stopTimer);
  }
}


/**
 * Reject as soon as `signal` aborts, without waiting for `promise`.
 * A late settlement of `promise` is observed and dropped.
 * @param createError - Builds the rejection reason on abort
 */
export function withAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  createError: () => Error
): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(createError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
