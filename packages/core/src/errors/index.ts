/**
 * Error system exports
 */

export { ErrorCode, type ErrorContext } from './codes.js';
export { isTidewatchError, TidewatchError } from './tidewatch-error.js';
