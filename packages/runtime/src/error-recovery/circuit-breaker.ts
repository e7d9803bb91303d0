/**
 * Circuit breaker pattern implementation
 */

import type { CircuitPhase } from '@tidewatch/core';

/**
 * Circuit breaker configuration
 */
export type CircuitBreakerConfig = {
  /** Consecutive failures that open the circuit */
  failureThreshold: number;

  /** Time the circuit stays open before a trial is let through (ms) */
  resetTimeout: number;

  /** Clock, epoch ms */
  now?: () => number;

  /** Optional callback when state changes */
  onStateChange?: (from: CircuitPhase, to: CircuitPhase, at: number) => void;
};

export type CircuitBreakerState = {
  phase: CircuitPhase;
  consecutiveFailures: number;
  openedAt?: number;
};

/**
 * Three-state breaker for one operation key.
 *
 * closed: everything passes. open: everything is rejected until `resetTimeout`
 * has passed since `openedAt`. halfOpen: exactly one trial is in flight.
 */
export class CircuitBreaker {
  private phase: CircuitPhase = 'closed';
  private consecutiveFailures = 0;
  private openedAt?: number;
  private trialInFlight = false;
  private readonly config: CircuitBreakerConfig;
  private readonly now: () => number;

  constructor(config: CircuitBreakerConfig) {
    this.config = config;
    this.now = config.now ?? (() => Date.now());
  }

  /**
   * Ask to run an attempt. Moves open → halfOpen once the reset timeout has elapsed
   * and hands the single trial slot to the caller.
   */
  tryAcquire(): boolean {
    switch (this.phase) {
      case 'closed':
        return true;

      case 'open':
        if (this.remainingOpenTime() > 0) {
          return false;
        }
        this.changeState('halfOpen');
        this.trialInFlight = true;
        return true;

      case 'halfOpen':
        if (this.trialInFlight) {
          return false;
        }
        this.trialInFlight = true;
        return true;
    }
  }

  /**
   * Record successful operation
   */
  recordSuccess(): void {
    switch (this.phase) {
      case 'closed':
        this.consecutiveFailures = 0;
        return;

      case 'halfOpen':
        this.trialInFlight = false;
        this.consecutiveFailures = 0;
        this.openedAt = undefined;
        this.changeState('closed');
        return;

      case 'open':
        // Late result of an attempt started before the circuit opened
        return;
    }
  }

  /**
   * Record failed operation
   */
  recordFailure(): void {
    this.consecutiveFailures += 1;

    switch (this.phase) {
      case 'closed':
        if (this.consecutiveFailures >= this.config.failureThreshold) {
          this.open();
        }
        return;

      case 'halfOpen':
        this.trialInFlight = false;
        this.open();
        return;

      case 'open':
        return;
    }
  }

  /**
   * Give the trial slot back without a verdict (the attempt was cancelled)
   */
  releaseTrial(): void {
    if (this.phase === 'halfOpen') {
      this.trialInFlight = false;
    }
  }

  /**
   * Milliseconds until an open circuit admits a trial; 0 unless open
   */
  remainingOpenTime(): number {
    if (this.phase !== 'open' || this.openedAt === undefined) {
      return 0;
    }
    return Math.max(0, this.openedAt + this.config.resetTimeout - this.now());
  }

  /**
   * Get current state
   */
  getState(): CircuitBreakerState {
    return {
      phase: this.phase,
      consecutiveFailures: this.consecutiveFailures,
      ...(this.openedAt !== undefined ? { openedAt: this.openedAt } : {})
    };
  }

  /**
   * Force the circuit closed and clear counters
   */
  reset(): void {
    this.consecutiveFailures = 0;
    this.openedAt = undefined;
    this.trialInFlight = false;
    this.changeState('closed');
  }

  private open(): void {
    this.openedAt = this.now();
    this.changeState('open');
  }

  /**
   * Change state with callback
   */
  private changeState(newState: CircuitPhase): void {
    const oldState = this.phase;
    this.phase = newState;

    if (this.config.onStateChange && oldState !== newState) {
      this.config.onStateChange(oldState, newState, this.now());
    }
  }
}

export type CircuitBreakerRegistryConfig = Omit<CircuitBreakerConfig, 'onStateChange'> & {
  onStateChange?: (key: string, from: CircuitPhase, to: CircuitPhase, at: number) => void;
};

/**
 * Indexed table of breakers, one per operation key
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly config: CircuitBreakerRegistryConfig;

  constructor(config: CircuitBreakerRegistryConfig) {
    this.config = config;
  }

  /**
   * Breaker for `key`, created closed on first use
   */
  get(key: string): CircuitBreaker {
    let breaker = this.breakers.get(key);
    if (!breaker) {
      const { onStateChange } = this.config;
      breaker = new CircuitBreaker({
        failureThreshold: this.config.failureThreshold,
        resetTimeout: this.config.resetTimeout,
        now: this.config.now,
        onStateChange: onStateChange
          ? (from, to, at) => onStateChange(key, from, to, at)
          : undefined
      });
      this.breakers.set(key, breaker);
    }
    return breaker;
  }

  peek(key: string): CircuitBreaker | undefined {
    return this.breakers.get(key);
  }

  reset(key: string): boolean {
    const breaker = this.breakers.get(key);
    breaker?.reset();
    return breaker !== undefined;
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }

  delete(key: string): boolean {
    return this.breakers.delete(key);
  }

  snapshot(): Record<string, CircuitBreakerState> {
    const result: Record<string, CircuitBreakerState> = {};
    for (const [key, breaker] of this.breakers) {
      result[key] = breaker.getState();
    }
    return result;
  }

  get size(): number {
    return this.breakers.size;
  }
}
