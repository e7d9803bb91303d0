/**
 * Error codes for configuration and programming errors
 *
 * Operational failures of a polled job never use these; they travel as
 * ClassifiedFailure records instead.
 */

export const ErrorCode = {
  // Configuration
  E_CONFIG_INVALID: 'E_CONFIG_INVALID',
  E_CONFIG_NOT_FOUND: 'E_CONFIG_NOT_FOUND',
  E_CONFIG_PARSE: 'E_CONFIG_PARSE',
  E_CONFIG_ENV_MISSING: 'E_CONFIG_ENV_MISSING',
  E_PROFILE_UNKNOWN: 'E_PROFILE_UNKNOWN',

  // Lifecycle
  E_ENGINE_DISPOSED: 'E_ENGINE_DISPOSED'
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Error context information
 */
export type ErrorContext = {
  configPath?: string;
  jobId?: string;
  profile?: string;
  [key: string]: unknown;
};
