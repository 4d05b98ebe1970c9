/**
 * Error handling utilities
 *
 * Provides consistent error message extraction for callers that turn
 * engine errors into recoverable results.
 */

/**
 * Extract a user-friendly error message from an unknown error value.
 * Handles Error objects, strings, and objects with a message property.
 *
 * @param err - The error to extract a message from
 * @param fallback - Fallback message if no message can be extracted (default: 'An error occurred')
 *
 * @example
 * try {
 *   game.applyMove(move)
 * } catch (err) {
 *   console.error(getErrorMessage(err))
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof Error) {
    return err.message || fallback
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
 * Create a standardized failure object.
 *
 * @param err - The error to convert
 * @param defaultMessage - Default message if error cannot be extracted
 */
export function toErrorResponse(
  err: unknown,
  defaultMessage = 'An error occurred'
): { success: false; error: string } {
  return {
    success: false,
    error: getErrorMessage(err, defaultMessage),
  }
}
