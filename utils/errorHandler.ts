/**
 * Error helpers shared by routes and services, so every log line
 * carries errors in the same shape.
 */

const MESSAGE_FIELDS = ['message', 'error', 'detail', 'statusMessage'] as const;

export interface ErrorDetails {
  message: string;
  stack?: string;
  name?: string;
}

/**
 * Best-effort message from whatever was thrown: an Error, a string,
 * or an error body such as `{ error: 'Unable to geocode' }`.
 */
export function extractErrorMessage(error: unknown, fallback: string = 'Unknown error occurred'): string {
  if (!error) return fallback;
  if (typeof error === 'string') return error;
  if (error instanceof Error) return error.message;
  if (typeof error !== 'object') return String(error);

  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(error));
  for (const field of MESSAGE_FIELDS) {
    const value = fields[field];
    if (value) {
      return typeof value === 'string' ? value : JSON.stringify(value);
    }
  }

  const summary = Object.entries(fields)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([key, value]) => `${key}: ${String(value)}`)
    .join(', ');
  return summary || fallback;
}

export function getErrorDetails(error: unknown): ErrorDetails {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack, name: error.name };
  }
  return { message: extractErrorMessage(error) };
}

/**
 * Meta object for `logger.error(message, meta)`
 */
export function formatErrorForLogging(error: unknown): { error: string | ErrorDetails; stack?: string } {
  if (error instanceof Error) {
    return { error: getErrorDetails(error), stack: error.stack };
  }
  return { error: extractErrorMessage(error) };
}
