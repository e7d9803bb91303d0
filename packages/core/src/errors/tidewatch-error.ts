import type { ErrorCode, ErrorContext } from './codes.js';

/**
 * Base error for configuration and lifecycle problems
 */
export class TidewatchError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TidewatchError';
    this.code = code;
    this.context = context;

    // Maintains proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export function isTidewatchError(error: unknown): error is TidewatchError {
  return error instanceof TidewatchError;
}
