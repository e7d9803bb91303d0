/**
 * Adaptive polling scheduler
 *
 * One cooperative loop per job id. Each tick goes through the retry executor;
 * the observed activity tunes the cadence, and an open circuit for the job
 * stretches the wait until the breaker admits a trial.
 */

import {
  type ActivityClassifier,
  ActivityKind,
  type ActivityRecord,
  type ClassifiedFailure,
  createSilentLogger,
  ErrorCode,
  type Logger,
  parseConfig,
  type PollingPolicy,
  type PollingPolicyInput,
  PollingPolicySchema,
  TidewatchError
} from '@tidewatch/core';
import type { RetryExecutor } from '../error-recovery/retry.js';
import type { EngineEventEmitter } from '../utils/events.js';
import { createScope, type DisposableScope } from '../utils/scope.js';
import { DeadlineExceededError, linkSignals, sleep } from '../utils/timers.js';
import { adjustInterval, equalityClassifier } from './activity.js';
import { PollingMetricsTracker } from './metrics.js';
import {
  type FetchOperation,
  type OverallPollingStats,
  type PollingExit,
  PollingExitReason,
  type PollingHandle,
  type PollingMetrics,
  type PollingOptions,
  type PollingValue
} from './types.js';

export type PollingSchedulerOptions = {
  logger?: Logger;
  events?: EngineEventEmitter;
  now?: () => number;
};

/**
 * Live state of one job's polling loop
 */
type PollingSession = {
  readonly jobId: string;
  currentInterval: number;
  consecutiveNoChange: number;
  lastActivity?: ActivityKind;
  cancelled: boolean;
  readonly scope: DisposableScope;
  /** Aborted with a DeadlineExceededError once the session timeout elapses */
  readonly deadline: AbortController;
  /** Scope and deadline combined; handed to every tick and wait */
  readonly signal: AbortSignal;
  /** Cuts the current inter-tick wait short */
  wake?: () => void;
  readonly finish: (exit: PollingExit) => void;
};

type SessionCallbacks<T> = {
  fetch: FetchOperation<T>;
  onValue: (value: PollingValue<T>) => void;
  onTerminal?: (value: T) => void;
  classifyActivity: ActivityClassifier<T>;
  isTerminal?: (value: T) => boolean;
  attemptTimeout?: number;
};

export class PollingScheduler {
  private readonly policy: PollingPolicy;
  private readonly retry: RetryExecutor;
  private readonly logger: Logger;
  private readonly events?: EngineEventEmitter;
  private readonly now: () => number;
  private readonly sessions = new Map<string, PollingSession>();
  private readonly metrics = new PollingMetricsTracker();
  private disposed = false;

  constructor(
    policy: PollingPolicyInput,
    retry: RetryExecutor,
    options: PollingSchedulerOptions = {}
  ) {
    this.policy = parseConfig(PollingPolicySchema, policy, 'polling');
    this.retry = retry;
    this.logger = options.logger ?? createSilentLogger();
    this.events = options.events;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Start polling `jobId`. The first tick runs immediately. An existing session for
   * the same job is stopped first.
   */
  startPolling<T>(
    jobId: string,
    fetch: FetchOperation<T>,
    onValue: (value: PollingValue<T>) => void,
    onTerminal?: (value: T) => void,
    options: PollingOptions<T> = {}
  ): PollingHandle {
    if (this.disposed) {
      throw new TidewatchError(ErrorCode.E_ENGINE_DISPOSED, 'Polling scheduler has been disposed', {
        jobId
      });
    }

    const existing = this.sessions.get(jobId);
    if (existing) {
      this.end(existing, PollingExitReason.REPLACED);
    }

    let finish: (exit: PollingExit) => void = () => {};
    const done = new Promise<PollingExit>((resolve) => {
      finish = resolve;
    });

    const startedAt = this.now();
    const scope = createScope(this.logger);
    const deadline = new AbortController();
    const linked = linkSignals([scope.signal, deadline.signal]);
    scope.defer(linked.release);
    const session: PollingSession = {
      jobId,
      currentInterval: this.policy.minInterval,
      consecutiveNoChange: 0,
      cancelled: false,
      scope,
      deadline,
      signal: linked.signal,
      finish
    };
    this.sessions.set(jobId, session);
    this.metrics.begin(jobId, session.currentInterval, startedAt);

    const sessionTimeout = options.sessionTimeout ?? this.policy.sessionTimeout;
    if (sessionTimeout !== undefined) {
      const timer = setTimeout(() => this.expire(session, sessionTimeout), sessionTimeout);
      session.scope.defer(() => clearTimeout(timer));
    }

    this.logger.debug({ jobId, interval: session.currentInterval }, 'Polling started');
    this.events?.emit('polling:started', {
      jobId,
      interval: session.currentInterval,
      at: startedAt
    });

    this.run(session, {
      fetch,
      onValue,
      onTerminal,
      classifyActivity: options.classifyActivity ?? equalityClassifier<T>(),
      isTerminal: options.isTerminal,
      attemptTimeout: options.attemptTimeout
    }).catch((error: unknown) => {
      this.logger.error(
        { jobId, error: error instanceof Error ? error.message : String(error) },
        'Polling loop failed'
      );
      this.end(session, PollingExitReason.STOPPED);
    });

    return {
      jobId,
      stop: () => this.end(session, PollingExitReason.STOPPED),
      done
    };
  }

  /**
   * Stop the session for `jobId`. In-flight results are discarded.
   */
  stopPolling(jobId: string): boolean {
    const session = this.sessions.get(jobId);
    if (!session) return false;
    this.end(session, PollingExitReason.STOPPED);
    return true;
  }

  /**
   * External activity hint. Applies the interval policy and wakes the waiting tick
   * when the interval got shorter.
   */
  recordActivity(jobId: string, kind: ActivityKind): boolean {
    const session = this.sessions.get(jobId);
    if (!session) return false;

    const before = session.currentInterval;
    this.applyActivity(session, kind);
    this.metrics.recordActivity(jobId, kind, session.currentInterval, this.now());

    if (session.currentInterval < before) {
      session.wake?.();
    }
    return true;
  }

  getMetrics(jobId: string): PollingMetrics | undefined {
    return this.metrics.get(jobId);
  }

  getOverallStats(): OverallPollingStats {
    return this.metrics.overall(this.sessions.size);
  }

  getActiveJobs(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Activity records for `jobId` from the bounded history, optionally only the last `windowMs`
   */
  getRecentActivity(jobId: string, windowMs?: number): ActivityRecord[] {
    return this.metrics.recent(jobId, windowMs === undefined ? undefined : this.now() - windowMs);
  }

  isPolling(jobId: string): boolean {
    return this.sessions.has(jobId);
  }

  /**
   * Stop every session and clear metrics. Idempotent.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const session of [...this.sessions.values()]) {
      this.end(session, PollingExitReason.DISPOSED);
    }
    this.metrics.clear();
  }

  private async run<T>(session: PollingSession, callbacks: SessionCallbacks<T>): Promise<void> {
    const { jobId } = session;
    let previous: T | undefined;

    while (!session.cancelled) {
      const result = await this.retry.executeWithRetry(callbacks.fetch, jobId, {
        signal: session.signal,
        attemptTimeout: callbacks.attemptTimeout
      });
      if (session.cancelled) {
        return;
      }

      if (result.ok) {
        const activity = callbacks.classifyActivity(previous, result.value);
        previous = result.value;
        this.applyActivity(session, activity);
        this.recordOutcome(session, activity);
        this.deliver(session, callbacks.onValue, { ok: true, value: result.value, activity });

        if (!session.cancelled && callbacks.isTerminal?.(result.value)) {
          this.invoke(session, 'onTerminal', () => callbacks.onTerminal?.(result.value));
          this.end(session, PollingExitReason.TERMINAL);
          return;
        }
      } else {
        this.applyActivity(session, ActivityKind.ERRORED);
        this.recordOutcome(session, ActivityKind.ERRORED, result.error);
        this.deliver(session, callbacks.onValue, { ok: false, error: result.error });
      }

      if (session.deadline.signal.aborted) {
        this.end(session, PollingExitReason.TIMEOUT);
        return;
      }

      await this.waitForNextTick(session);
    }
  }

  private applyActivity(session: PollingSession, kind: ActivityKind): void {
    const next = adjustInterval(session, kind, this.policy);
    session.currentInterval = next.currentInterval;
    session.consecutiveNoChange = next.consecutiveNoChange;
    session.lastActivity = kind;
  }

  private recordOutcome(
    session: PollingSession,
    activity: ActivityKind,
    failure?: ClassifiedFailure
  ): void {
    const at = this.now();
    const { jobId, currentInterval: interval } = session;
    this.metrics.recordOutcome(jobId, activity, interval, at);

    if (failure) {
      this.logger.debug({ jobId, kind: failure.kind, interval }, 'Polling tick failed');
      this.events?.emit('polling:error', { jobId, failure, interval, at });
    } else {
      this.events?.emit('polling:value', { jobId, activity, interval, at });
    }
  }

  private deliver<T>(
    session: PollingSession,
    onValue: (value: PollingValue<T>) => void,
    value: PollingValue<T>
  ): void {
    if (session.cancelled) return;
    this.invoke(session, 'onValue', () => onValue(value));
  }

  /**
   * Run a caller callback; a throw is logged and does not end the session
   */
  private invoke(session: PollingSession, name: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.error(
        { jobId: session.jobId, error: error instanceof Error ? error.message : String(error) },
        `${name} callback threw`
      );
    }
  }

  /**
   * Wait `currentInterval` from now, or longer while the job's circuit is open.
   * A wake re-evaluates the deadline against the (shorter) current interval.
   */
  private async waitForNextTick(session: PollingSession): Promise<void> {
    const waitStartedAt = this.now();

    while (!session.signal.aborted) {
      const now = this.now();
      const dueAt = Math.max(
        waitStartedAt + session.currentInterval,
        now + this.retry.remainingOpenTime(session.jobId)
      );
      const wait = dueAt - now;
      if (wait <= 0) return;

      const wake = new AbortController();
      session.wake = () => wake.abort();
      const linked = linkSignals([session.signal, wake.signal]);
      const elapsed = await sleep(wait, linked.signal);
      linked.release();
      session.wake = undefined;

      if (elapsed) return;
    }
  }

  /**
   * Session deadline: cancels the tick in flight or the wait. The loop then takes
   * one more pass through the executor, which reports the timeout to the breaker.
   */
  private expire(session: PollingSession, sessionTimeout: number): void {
    if (session.cancelled) return;
    this.logger.debug({ jobId: session.jobId, sessionTimeout }, 'Polling session deadline reached');
    session.deadline.abort(
      new DeadlineExceededError(sessionTimeout, `Polling session exceeded ${sessionTimeout}ms`)
    );
  }

  /**
   * Single exit path for a session: idempotent, reached from stop, terminal,
   * timeout, replacement and dispose
   */
  private end(session: PollingSession, reason: PollingExitReason): void {
    if (session.cancelled) return;
    session.cancelled = true;
    session.scope.dispose(reason);

    if (this.sessions.get(session.jobId) === session) {
      this.sessions.delete(session.jobId);
    }
    const at = this.now();
    this.metrics.end(session.jobId, at);

    this.logger.info({ jobId: session.jobId, reason }, 'Polling stopped');
    this.events?.emit('polling:stopped', { jobId: session.jobId, reason, at });
    session.finish({ jobId: session.jobId, reason });
  }
}
