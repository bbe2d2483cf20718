/**
 * Recovery error types
 * Fatal conditions carry a RecoveryError; per-entry failures become RecoveryEvents
 */

import type { ErrorCategory, RecoveryEvent } from '../types/recovery.js';

export type RecoveryErrorCode =
  | 'ROOT_INACCESSIBLE'
  | 'OUTPUT_ROOT_UNAVAILABLE'
  | 'PATH_OUTSIDE_SCAN_ROOT';

export class RecoveryError extends Error {
  readonly code: RecoveryErrorCode;
  readonly path?: string;

  constructor(message: string, code: RecoveryErrorCode, options: { path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'RecoveryError';
    this.code = code;
    this.path = options.path;
  }
}

/**
 * Extract the Node error code (EACCES, ENOENT, ...) from an unknown error
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof RecoveryError) {
    return error.code;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert a caught error into an event attributed to one path
 */
export function toRecoveryEvent(category: ErrorCategory, path: string, error: unknown): RecoveryEvent {
  const code = errorCode(error);
  return {
    category,
    path,
    message: errorMessage(error),
    ...(code ? { code } : {}),
  };
}
