/**
 * Failure taxonomy shared by the classifier, the retry executor and every consumer
 */

/**
 * Classification of a raw failure. Produced by the classifier only.
 */
export const ErrorKind = {
  NETWORK: 'network',
  TIMEOUT: 'timeout',
  SERVER_UNAVAILABLE: 'serverUnavailable',
  CLIENT_REJECTED: 'clientRejected',
  DOMAIN_FAILURE: 'domainFailure',
  INVALID_DATA: 'invalidData',
  UNKNOWN: 'unknown'
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/**
 * Synthetic kind generated locally when a circuit breaker rejects an attempt
 */
export const CIRCUIT_OPEN = 'circuitOpen' as const;

export type FailureKind = ErrorKind | typeof CIRCUIT_OPEN;

/**
 * The only failure shape ever delivered to a consumer
 */
export type ClassifiedFailure = {
  readonly kind: FailureKind;
  readonly retryable: boolean;
  readonly statusCode?: number;
  /** Server-requested wait before the next attempt (ms), from Retry-After */
  readonly retryAfter?: number;
  readonly occurredAt: number;
  readonly message: string;
  readonly cause: unknown;
};

const FAILURE_KINDS: ReadonlySet<string> = new Set<string>([
  ...Object.values(ErrorKind),
  CIRCUIT_OPEN
]);

export function isFailureKind(value: unknown): value is FailureKind {
  return typeof value === 'string' && FAILURE_KINDS.has(value);
}

export function isClassifiedFailure(value: unknown): value is ClassifiedFailure {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'kind' in value &&
    isFailureKind(value.kind) &&
    'retryable' in value &&
    typeof value.retryable === 'boolean' &&
    'occurredAt' in value &&
    typeof value.occurredAt === 'number' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

/**
 * Build a frozen failure record
 */
export function createFailure(
  kind: FailureKind,
  options: {
    retryable: boolean;
    message: string;
    cause?: unknown;
    statusCode?: number;
    retryAfter?: number;
    occurredAt?: number;
  }
): ClassifiedFailure {
  const failure: ClassifiedFailure = {
    kind,
    retryable: options.retryable,
    message: options.message,
    cause: options.cause,
    occurredAt: options.occurredAt ?? Date.now(),
    ...(options.statusCode !== undefined ? { statusCode: options.statusCode } : {}),
    ...(options.retryAfter !== undefined ? { retryAfter: options.retryAfter } : {})
  };
  return Object.freeze(failure);
}
