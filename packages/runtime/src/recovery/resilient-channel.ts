/**
 * Resilient channel
 *
 * Wraps one push source and keeps two independently observable channels: values
 * and health. Source errors never reach value observers; each one is mapped onto
 * the active recovery strategy. Health observers hear about an upstream event
 * before value observers do.
 */

import {
  type ClassifiedFailure,
  createSilentLogger,
  type EscalationStrategy,
  type HealthState,
  type Logger,
  type RecoveryPolicy,
  type RecoveryStrategy
} from '@tidewatch/core';
import { classify } from '../error-recovery/error-classifier.js';
import { calculateDelay } from '../error-recovery/strategies.js';
import type { EngineEventEmitter } from '../utils/events.js';
import { createScope, type DisposableScope } from '../utils/scope.js';
import { linkSignals, sleep } from '../utils/timers.js';
import { healthAfterError, healthAfterValue, initialHealth } from './health.js';
import type {
  ChannelObserver,
  HealthListener,
  RecoveryStats,
  Source,
  Unsubscribe,
  WrapOptions
} from './types.js';

export type ResilientChannelContext = {
  logger?: Logger;
  events?: EngineEventEmitter;
  now?: () => number;
  random?: () => number;
  /** Called once, when the channel is disposed or its source completes */
  onDispose?: () => void;
};

type Counters = Pick<
  RecoveryStats,
  | 'values'
  | 'errors'
  | 'reestablishments'
  | 'fallbacks'
  | 'heartbeats'
  | 'dropped'
  | 'replayed'
  | 'escalations'
>;

const emptyCounters = (): Counters => ({
  values: 0,
  errors: 0,
  reestablishments: 0,
  fallbacks: 0,
  heartbeats: 0,
  dropped: 0,
  replayed: 0,
  escalations: 0
});

export class ResilientChannel<T> {
  readonly id: string;

  private readonly source: Source<T>;
  private readonly policy: RecoveryPolicy;
  private readonly options: WrapOptions<T>;
  private readonly logger: Logger;
  private readonly events?: EngineEventEmitter;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly scope: DisposableScope;
  private readonly onDispose?: () => void;
  private released = false;

  private readonly observers = new Set<ChannelObserver<T>>();
  private readonly healthListeners = new Set<HealthListener>();
  private readonly buffer: T[] = [];

  private strategy: RecoveryStrategy;
  private state: HealthState;
  private lastGood?: { value: T };
  private generation = 0;
  private unsubscribeSource?: Unsubscribe;
  private lastEventWasError = false;
  private reestablishAttempts = 0;
  private recovering = false;
  private coolingDown = false;
  private cancelWait?: () => void;
  private completed = false;
  private readonly counters: Counters = emptyCounters();

  constructor(
    id: string,
    source: Source<T>,
    policy: RecoveryPolicy,
    options: WrapOptions<T> = {},
    context: ResilientChannelContext = {}
  ) {
    this.id = id;
    this.source = source;
    this.policy = policy;
    this.options = options;
    const logger = context.logger ?? createSilentLogger();
    this.logger = logger.child?.({ sourceId: id }) ?? logger;
    this.events = context.events;
    this.now = context.now ?? (() => Date.now());
    this.random = context.random ?? Math.random;
    this.onDispose = context.onDispose;
    this.scope = createScope(this.logger);
    this.strategy = this.configuredStrategy;
    this.state = initialHealth(this.now());

    this.scope.defer(() => this.teardown());
    this.scope.defer(() => this.cancelWait?.());
    this.connect();
  }

  private get configuredStrategy(): RecoveryStrategy {
    return this.options.strategy ?? this.policy.recoveryStrategy;
  }

  /**
   * Current health
   */
  health(): HealthState {
    return this.state;
  }

  /**
   * Observe health. The listener receives the current state at once.
   */
  onHealth(listener: HealthListener): Unsubscribe {
    this.healthListeners.add(listener);
    this.notifyHealthListener(listener, this.state);
    return () => this.healthListeners.delete(listener);
  }

  /**
   * Observe values. Buffered values are replayed to the first observer.
   */
  subscribe(observer: ChannelObserver<T> | ((value: T) => void)): Unsubscribe {
    const entry: ChannelObserver<T> = typeof observer === 'function' ? { next: observer } : observer;
    if (this.completed) {
      entry.complete?.();
      return () => {};
    }
    this.observers.add(entry);
    this.flushBuffer();
    return () => this.observers.delete(entry);
  }

  getRecoveryStats(): RecoveryStats {
    return {
      sourceId: this.id,
      strategy: this.strategy,
      configuredStrategy: this.configuredStrategy,
      health: this.state,
      reestablishAttempts: this.reestablishAttempts,
      recovering: this.recovering,
      coolingDown: this.coolingDown,
      completed: this.completed,
      buffered: this.buffer.length,
      ...this.counters
    };
  }

  /**
   * Operator reset: back to the configured strategy, healthy, and reconnected
   * at once if a re-establishment or cool-down was pending
   */
  resetRecoveryState(): void {
    if (this.scope.disposed || this.completed) return;

    const pending = this.recovering || this.coolingDown;
    this.cancelWait?.();
    this.reestablishAttempts = 0;
    this.strategy = this.configuredStrategy;
    this.recovering = false;
    this.coolingDown = false;
    this.lastEventWasError = false;
    this.setHealth(initialHealth(this.now()));

    if (pending) {
      this.connect();
    }
  }

  /**
   * Stop the source and drop every observer. Idempotent.
   */
  dispose(): void {
    if (this.scope.disposed) return;
    this.scope.dispose('disposed');
    this.observers.clear();
    this.healthListeners.clear();
    this.buffer.length = 0;
    this.release();
  }

  get disposed(): boolean {
    return this.scope.disposed;
  }

  private connect(): void {
    if (this.scope.disposed || this.completed) return;

    const generation = ++this.generation;
    const current = () => generation === this.generation && !this.scope.disposed;

    try {
      const unsubscribe = this.source({
        next: (value) => {
          if (current()) this.handleValue(value);
        },
        error: (error) => {
          if (current()) this.handleError(error);
        },
        end: () => {
          if (current()) this.handleEnd();
        }
      });

      if (current()) {
        this.unsubscribeSource = unsubscribe;
      } else {
        // Torn down while subscribing
        unsubscribe();
      }
    } catch (error) {
      if (current()) {
        this.handleError(error);
        this.handleEnd();
      }
    }
  }

  private teardown(): void {
    this.generation++;
    const unsubscribe = this.unsubscribeSource;
    this.unsubscribeSource = undefined;
    unsubscribe?.();
  }

  private handleValue(value: T): void {
    this.lastEventWasError = false;
    this.counters.values += 1;
    this.reestablishAttempts = 0;
    if (this.strategy !== this.configuredStrategy) {
      this.logger.info({ from: this.strategy, to: this.configuredStrategy }, 'Source recovered');
      this.strategy = this.configuredStrategy;
    }
    this.lastGood = { value };

    this.setHealth(healthAfterValue(this.state, this.now()));
    if (this.flushBuffer()) {
      this.deliver(value);
    } else {
      // Older values are still queued
      this.enqueue(value);
    }
  }

  private handleError(raw: unknown): void {
    this.lastEventWasError = true;
    this.counters.errors += 1;
    const failure = classify(raw, { now: this.now });

    this.setHealth(
      healthAfterError(this.state, failure, this.policy.unhealthyThreshold, this.now())
    );
    this.logger.debug(
      { kind: failure.kind, strategy: this.strategy, consecutive: this.state.consecutiveFailures },
      'Source error'
    );
    this.applyStrategy(this.strategyFor(failure), failure);
  }

  /**
   * Per-kind override from `errorStrategies`, unless the channel has escalated
   */
  private strategyFor(failure: ClassifiedFailure): RecoveryStrategy {
    if (this.strategy !== this.configuredStrategy) return this.strategy;
    return this.policy.errorStrategies[failure.kind] ?? this.strategy;
  }

  private handleEnd(): void {
    if (this.lastEventWasError) {
      // A source that dies on an error is brought back whatever the strategy
      this.teardown();
      this.scheduleReestablish();
      return;
    }

    this.completed = true;
    this.teardown();
    this.logger.debug('Source completed');
    for (const observer of [...this.observers]) {
      this.call(() => observer.complete?.());
    }
    this.observers.clear();
    this.release();
  }

  private release(): void {
    if (this.released) return;
    this.released = true;
    this.onDispose?.();
  }

  private applyStrategy(strategy: RecoveryStrategy, failure: ClassifiedFailure): void {
    switch (strategy) {
      case 'retry':
        if (this.reestablishAttempts >= this.policy.maxReestablishAttempts) {
          this.escalate(this.policy.escalationStrategy, failure);
          return;
        }
        this.scheduleReestablish();
        return;

      case 'fallback':
        this.emitFallback();
        return;

      case 'buffer':
        // Source stays attached; undeliverable values queue up
        return;

      case 'circuitBreak':
        if (this.state.consecutiveFailures > this.policy.failureThreshold) {
          this.startCoolDown();
        }
        return;

      case 'degraded':
        this.emitHeartbeat();
        return;
    }
  }

  private escalate(to: EscalationStrategy, failure: ClassifiedFailure): void {
    const from = this.strategy;
    this.strategy = to;
    this.counters.escalations += 1;
    this.logger.warn(
      { from, to, attempts: this.reestablishAttempts },
      'Re-establishment exhausted, escalating'
    );
    this.events?.emit('recovery:escalated', { sourceId: this.id, from, to });
    this.applyStrategy(to, failure);
  }

  private emitFallback(): void {
    const fallback =
      this.options.fallbackValue !== undefined
        ? { value: this.options.fallbackValue }
        : this.lastGood;
    if (!fallback) return;
    this.counters.fallbacks += 1;
    this.deliver(fallback.value);
  }

  private emitHeartbeat(): void {
    this.counters.heartbeats += 1;
    const { status } = this.state;
    for (const observer of [...this.observers]) {
      this.call(() => observer.heartbeat?.(status));
    }
  }

  /**
   * Tear the source down and bring it back after a backoff. Past
   * `maxReestablishAttempts` the wait becomes the breaker's reset timeout.
   */
  private scheduleReestablish(): void {
    if (this.recovering || this.coolingDown) return;

    const attempt = this.reestablishAttempts;
    const delay =
      attempt < this.policy.maxReestablishAttempts
        ? calculateDelay(attempt, this.policy, this.random)
        : this.policy.resetTimeout;
    this.reestablishAttempts += 1;
    this.recovering = true;
    this.teardown();

    this.logger.debug({ attempt: attempt + 1, delay }, 'Re-establishing source');
    this.events?.emit('recovery:reestablishing', {
      sourceId: this.id,
      attempt: attempt + 1,
      delay
    });

    this.waitThen(delay, () => {
      this.recovering = false;
      this.counters.reestablishments += 1;
      this.connect();
    });
  }

  private startCoolDown(): void {
    if (this.coolingDown) return;
    this.coolingDown = true;
    this.recovering = false;
    this.cancelWait?.();
    this.teardown();
    this.logger.warn(
      { consecutive: this.state.consecutiveFailures, resetTimeout: this.policy.resetTimeout },
      'Source circuit opened'
    );

    this.waitThen(this.policy.resetTimeout, () => {
      this.coolingDown = false;
      this.counters.reestablishments += 1;
      this.connect();
    });
  }

  /**
   * Cancellable wait; `then` runs only if the full delay elapsed
   */
  private waitThen(delay: number, then: () => void): void {
    const wait = new AbortController();
    const cancel = () => wait.abort();
    this.cancelWait = cancel;
    const linked = linkSignals([this.scope.signal, wait.signal]);

    sleep(delay, linked.signal)
      .then((elapsed) => {
        linked.release();
        if (this.cancelWait === cancel) {
          this.cancelWait = undefined;
        }
        if (elapsed && !this.scope.disposed) {
          then();
        }
      })
      .catch((error: unknown) => {
        this.logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Recovery wait failed'
        );
      });
  }

  private setHealth(next: HealthState): void {
    this.state = next;
    this.events?.emit('recovery:health', { sourceId: this.id, health: next });
    for (const listener of [...this.healthListeners]) {
      this.notifyHealthListener(listener, next);
    }
  }

  private notifyHealthListener(listener: HealthListener, health: HealthState): void {
    this.call(() => listener(health));
  }

  /**
   * Deliver to every observer. With the buffer strategy a value nobody accepted
   * is queued instead.
   */
  private deliver(value: T): void {
    if (!this.tryDeliver(value) && this.strategy === 'buffer') {
      this.enqueue(value);
    }
  }

  private tryDeliver(value: T): boolean {
    let accepted = false;
    for (const observer of [...this.observers]) {
      if (!observer.next) continue;
      const next = observer.next;
      if (this.call(() => next(value))) {
        accepted = true;
      }
    }
    return accepted;
  }

  private enqueue(value: T): void {
    this.buffer.push(value);
    if (this.buffer.length > this.policy.bufferCapacity) {
      this.buffer.shift();
      this.counters.dropped += 1;
    }
  }

  /**
   * Replay queued values in order. Returns false while a value is still queued.
   */
  private flushBuffer(): boolean {
    while (this.buffer.length > 0) {
      const head = this.buffer[0];
      if (!this.tryDeliver(head)) return false;
      this.buffer.shift();
      this.counters.replayed += 1;
    }
    return true;
  }

  /**
   * Run an observer callback; a throwing observer is logged and reported as not accepting
   */
  private call(fn: () => void): boolean {
    try {
      fn();
      return true;
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Channel observer threw'
      );
      return false;
    }
  }
}
