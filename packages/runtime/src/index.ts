/**
 * @tidewatch/runtime - retry, polling and recovery for remote job status
 *
 * Dependency direction: core → runtime
 */

// Composition root
export { createEngine, type Engine, type EngineOptions } from './engine.js';

// Retry executor, circuit breaker, classifier and backoff
export * from './error-recovery/index.js';

// Adaptive polling
export * from './polling/index.js';

// Recovery wrapper and source adapters
export * from './recovery/index.js';

// Logging
export { createPinoLogger, type PinoLoggerOptions } from './logger/pino-logger.js';

// Primitives
export { createKeyedMutex, createMutex } from './mutex.js';
export type { KeyedMutex, Mutex } from './mutex.js';
export { createEventEmitter, type EngineEventEmitter, type EventEmitter } from './utils/events.js';
export { createScope, type DisposableScope } from './utils/scope.js';
export { DeadlineExceededError, linkSignals, runWithTimeout, sleep } from './utils/timers.js';
