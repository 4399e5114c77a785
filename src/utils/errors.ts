/**
 * @fileoverview Error Utilities
 */

/**
 * Message of anything thrown: Error instances, strings and objects carrying
 * a `message` field.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}
