/**
 * Retry executor with exponential backoff and per-key circuit breaking
 */

import {
  CIRCUIT_OPEN,
  type ClassifiedFailure,
  createFailure,
  createSilentLogger,
  err,
  ErrorCode,
  ErrorKind,
  type Logger,
  ok,
  parseConfig,
  type Result,
  type RetryPolicy,
  type RetryPolicyInput,
  RetryPolicySchema,
  TidewatchError,
  tryCatchAsync
} from '@tidewatch/core';
import { createKeyedMutex, type KeyedMutex } from '../mutex.js';
import type { EngineEventEmitter } from '../utils/events.js';
import { DeadlineExceededError, runWithTimeout, sleep } from '../utils/timers.js';
import {
  type CircuitBreaker,
  type CircuitBreakerState,
  CircuitBreakerRegistry
} from './circuit-breaker.js';
import { classify, type ClassifyOptions } from './error-classifier.js';
import { calculateDelay } from './strategies.js';

/**
 * Shared retry bookkeeping for one key
 */
export type RetryState = {
  attempt: number;
  nextDelay: number;
  lastFailure?: ClassifiedFailure;
};

export type RetryStats = RetryState & {
  totalAttempts: number;
  totalSuccesses: number;
  totalFailures: number;
  circuit: CircuitBreakerState;
};

export type RetryOperation<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Per-call options
 */
export type ExecuteOptions = {
  /** Cancels the current attempt and any backoff wait */
  signal?: AbortSignal;

  /** Deadline for each attempt, overriding the policy's */
  attemptTimeout?: number;
};

export type RetryExecutorOptions = {
  logger?: Logger;
  events?: EngineEventEmitter;
  /** Random source for jitter, in [0, 1) */
  random?: () => number;
  now?: () => number;
};

type KeyRecord = RetryState & {
  totalAttempts: number;
  totalSuccesses: number;
  totalFailures: number;
};

type FailureVerdict = { retry: false } | { retry: true; delay: number };

/**
 * Runs operations under a retry policy. State is kept per operation key; access to a
 * key's state is serialized while the operations themselves run outside the lock.
 */
export class RetryExecutor {
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly events?: EngineEventEmitter;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly breakers: CircuitBreakerRegistry;
  private readonly locks: KeyedMutex<string> = createKeyedMutex<string>();
  private readonly states = new Map<string, KeyRecord>();
  private disposed = false;

  constructor(policy: RetryPolicyInput, options: RetryExecutorOptions = {}) {
    this.policy = parseConfig(RetryPolicySchema, policy, 'retry');
    this.logger = options.logger ?? createSilentLogger();
    this.events = options.events;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => Date.now());
    this.breakers = new CircuitBreakerRegistry({
      failureThreshold: this.policy.failureThreshold,
      resetTimeout: this.policy.resetTimeout,
      now: this.now,
      onStateChange: (key, from, to, at) => {
        if (to === 'open') {
          this.logger.warn({ key, from, to }, 'Circuit opened');
        } else {
          this.logger.info({ key, from, to }, 'Circuit state changed');
        }
        this.events?.emit('circuit:state-changed', { key, from, to, at });
      }
    });
  }

  get classifyOptions(): ClassifyOptions {
    return {
      retryDomainFailures: this.policy.retryDomainFailures,
      retryUnknown: this.policy.retryUnknown,
      now: this.now
    };
  }

  /**
   * Run `operation` under the retry policy for `key`.
   *
   * At most `maxRetries + 1` invocations. Circuit-open rejections and
   * non-retryable failures return at once without consuming a retry.
   */
  async executeWithRetry<T>(
    operation: RetryOperation<T>,
    key: string,
    options: ExecuteOptions = {}
  ): Promise<Result<T, ClassifiedFailure>> {
    this.assertActive();
    const { signal } = options;
    const attemptTimeout = options.attemptTimeout ?? this.policy.attemptTimeout;

    for (let attempt = 0; ; attempt++) {
      const gate = await this.locks.runExclusive(key, () => this.admit(key));
      if (!gate.ok) {
        return gate;
      }

      if (signal?.aborted) {
        const reason: unknown = signal.reason;
        return err(await this.locks.runExclusive(key, () => this.onCancelled(key, reason)));
      }

      const outcome = await tryCatchAsync(
        () => runWithTimeout(operation, attemptTimeout, signal),
        (error) => error
      );

      if (outcome.ok) {
        await this.locks.runExclusive(key, () => this.onSuccess(key));
        return ok(outcome.value);
      }

      if (signal?.aborted) {
        const reason: unknown = signal.reason;
        return err(await this.locks.runExclusive(key, () => this.onCancelled(key, reason)));
      }

      const failure = classify(outcome.error, this.classifyOptions);
      const verdict = await this.locks.runExclusive(key, () =>
        this.onFailure(key, failure, attempt)
      );
      if (!verdict.retry) {
        return err(failure);
      }

      const elapsed = await sleep(verdict.delay, signal);
      if (!elapsed) {
        return err(this.cancelled(signal?.reason));
      }
    }
  }

  /**
   * Discard the retry bookkeeping of `key`
   */
  resetRetryState(key: string): boolean {
    return this.states.delete(key);
  }

  /**
   * Force the breaker of `key` closed
   */
  resetCircuitBreaker(key: string): boolean {
    return this.breakers.reset(key);
  }

  getRetryStats(): Record<string, RetryStats>;
  getRetryStats(key: string): RetryStats | undefined;
  getRetryStats(key?: string): Record<string, RetryStats> | RetryStats | undefined {
    if (key !== undefined) {
      return this.statsFor(key);
    }
    const keys = new Set([...this.states.keys(), ...Object.keys(this.breakers.snapshot())]);
    const result: Record<string, RetryStats> = {};
    for (const k of keys) {
      const stats = this.statsFor(k);
      if (stats) result[k] = stats;
    }
    return result;
  }

  /**
   * Milliseconds until the breaker of `key` admits a trial; 0 unless open
   */
  remainingOpenTime(key: string): number {
    return this.breakers.peek(key)?.remainingOpenTime() ?? 0;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.states.clear();
    this.breakers.resetAll();
  }

  private statsFor(key: string): RetryStats | undefined {
    const record = this.states.get(key);
    const breaker = this.breakers.peek(key);
    if (!record && !breaker) {
      return undefined;
    }
    return {
      attempt: record?.attempt ?? 0,
      nextDelay: record?.nextDelay ?? 0,
      ...(record?.lastFailure ? { lastFailure: record.lastFailure } : {}),
      totalAttempts: record?.totalAttempts ?? 0,
      totalSuccesses: record?.totalSuccesses ?? 0,
      totalFailures: record?.totalFailures ?? 0,
      circuit: breaker?.getState() ?? { phase: 'closed', consecutiveFailures: 0 }
    };
  }

  private record(key: string): KeyRecord {
    let record = this.states.get(key);
    if (!record) {
      record = { attempt: 0, nextDelay: 0, totalAttempts: 0, totalSuccesses: 0, totalFailures: 0 };
      this.states.set(key, record);
    }
    return record;
  }

  /**
   * Breaker of `key`, or undefined when circuit breaking is disabled
   */
  private breaker(key: string): CircuitBreaker | undefined {
    return this.policy.enableCircuitBreaker ? this.breakers.get(key) : undefined;
  }

  private admit(key: string): Result<true, ClassifiedFailure> {
    const record = this.record(key);
    const breaker = this.breaker(key);

    if (breaker && !breaker.tryAcquire()) {
      const remaining = breaker.remainingOpenTime();
      const failure = createFailure(CIRCUIT_OPEN, {
        retryable: false,
        message: `Circuit open for "${key}", next trial in ${remaining}ms`,
        occurredAt: this.now()
      });
      record.lastFailure = failure;
      this.logger.debug({ key, remaining }, 'Attempt rejected by open circuit');
      return err(failure);
    }

    record.totalAttempts += 1;
    return ok(true);
  }

  private onSuccess(key: string): void {
    this.breaker(key)?.recordSuccess();
    const record = this.record(key);
    record.attempt = 0;
    record.nextDelay = 0;
    record.lastFailure = undefined;
    record.totalSuccesses += 1;
  }

  private onFailure(key: string, failure: ClassifiedFailure, attempt: number): FailureVerdict {
    this.breaker(key)?.recordFailure();
    const record = this.record(key);
    record.totalFailures += 1;
    record.lastFailure = failure;
    record.attempt = attempt;

    if (!failure.retryable) {
      this.logger.debug({ key, kind: failure.kind }, 'Failure is not retryable');
      return { retry: false };
    }

    if (failure.retryAfter !== undefined && failure.retryAfter > this.policy.maxDelay) {
      this.logger.warn(
        { key, retryAfter: failure.retryAfter, maxDelay: this.policy.maxDelay },
        'Retry-After exceeds maxDelay, not retrying'
      );
      return { retry: false };
    }

    if (attempt >= this.policy.maxRetries) {
      this.logger.warn(
        { key, attempts: attempt + 1, kind: failure.kind, message: failure.message },
        'Retries exhausted'
      );
      this.events?.emit('retry:exhausted', { key, attempts: attempt + 1, failure });
      return { retry: false };
    }

    const backoff = calculateDelay(attempt, this.policy, this.random);
    const delay =
      failure.retryAfter === undefined ? backoff : Math.max(backoff, failure.retryAfter);
    record.attempt = attempt + 1;
    record.nextDelay = delay;
    this.logger.debug({ key, attempt: attempt + 1, delay, kind: failure.kind }, 'Retry scheduled');
    this.events?.emit('retry:scheduled', { key, attempt: attempt + 1, delay, failure });
    return { retry: true, delay };
  }

  /**
   * A cancelled attempt. A session deadline counts as a timeout failure of the
   * attempt; any other cancellation only hands back a half-open trial.
   */
  private onCancelled(key: string, reason: unknown): ClassifiedFailure {
    const failure = this.cancelled(reason);
    if (!(reason instanceof DeadlineExceededError)) {
      this.breaker(key)?.releaseTrial();
      return failure;
    }

    this.breaker(key)?.recordFailure();
    const record = this.record(key);
    record.totalFailures += 1;
    record.lastFailure = failure;
    this.logger.debug({ key, kind: failure.kind }, 'Attempt cut short by deadline');
    return failure;
  }

  private cancelled(reason: unknown): ClassifiedFailure {
    if (reason instanceof DeadlineExceededError) {
      return classify(reason, this.classifyOptions);
    }
    return createFailure(ErrorKind.UNKNOWN, {
      retryable: false,
      message: 'Operation cancelled',
      cause: reason,
      occurredAt: this.now()
    });
  }

  private assertActive(): void {
    if (this.disposed) {
      throw new TidewatchError(ErrorCode.E_ENGINE_DISPOSED, 'Retry executor has been disposed');
    }
  }
}
