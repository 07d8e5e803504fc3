/**
 * Type-safe error inspection helpers
 */

/**
 * Error raised by Node.js system calls (ENOENT, EEXIST, EACCES, etc.)
 */
export interface NodeSystemError extends Error {
  code: string;
  errno?: number;
  syscall?: string;
  path?: string;
}

/**
 * Type guard to check if error carries a Node.js system error code
 */
export function isNodeError(error: unknown): error is NodeSystemError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Type guard to check if error is standard Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Safe error message extraction with fallback
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'Unknown error occurred';
}
