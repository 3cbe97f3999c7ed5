/**
 * Error handling utilities
 *
 * Consistent error message extraction and logging for the CLI and the
 * game runner.
 */

/**
 * Extract a readable message from an unknown error value.
 * Handles Error objects, strings, and objects with a message property.
 *
 * @param fallback - Returned when no message can be extracted
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    return err.message
  }

  return fallback
}

/**
 * Log an error with context for debugging.
 *
 * @param context - Where the error occurred, printed as a [context] prefix
 */
export function logError(context: string, err: unknown): void {
  const message = getErrorMessage(err)
  console.error(`[${context}]`, message, err)
}
