export {
  CircuitBreaker,
  type CircuitBreakerConfig,
  CircuitBreakerRegistry,
  type CircuitBreakerRegistryConfig,
  type CircuitBreakerState
} from './circuit-breaker.js';
export {
  classify,
  type ClassifyOptions,
  DomainFailureError,
  InvalidDataError,
  isRetryableKind
} from './error-classifier.js';
export {
  type ExecuteOptions,
  RetryExecutor,
  type RetryExecutorOptions,
  type RetryOperation,
  type RetryState,
  type RetryStats
} from './retry.js';
export { backoffSchedule, type BackoffPolicy, calculateDelay, JITTER_RATIO } from './strategies.js';
