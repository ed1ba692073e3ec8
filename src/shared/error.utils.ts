/**
 * Extracts a string message from an unknown error value.
 * Handles both Error instances and arbitrary thrown values.
 *
 * @param error - The caught error value (Error instance or any thrown value)
 * @returns The error message string
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Returns the Node.js system error code (ENOENT, EEXIST, ...) of a thrown value, if it has one.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
