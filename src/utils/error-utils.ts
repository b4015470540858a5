/**
 * Helpers for turning arbitrary thrown values into messages.
 */

/**
 * Extracts a string message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Reads the `code` of a Node.js system error (ENOENT, EACCES, ...), if any.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
