import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type EngineEvents, TidewatchError } from '@tidewatch/core';
import { createEventEmitter } from '../utils/events.js';
import { DeadlineExceededError } from '../utils/timers.js';
import { RetryExecutor } from './retry.js';

const policy = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 10_000,
  backoffMultiplier: 2,
  jitter: false,
  failureThreshold: 5,
  resetTimeout: 60_000
};

function timeoutError(): Error {
  return Object.assign(new Error('socket timed out'), { code: 'ETIMEDOUT' });
}

function httpError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe('RetryExecutor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should back off 1s, 2s, 4s across three timeouts then return the value', async () => {
    const events = createEventEmitter<EngineEvents>();
    const delays: number[] = [];
    events.on('retry:scheduled', ({ delay }) => delays.push(delay));
    const executor = new RetryExecutor(policy, { events });

    const calledAt: number[] = [];
    let calls = 0;
    const pending = executor.executeWithRetry(async () => {
      calledAt.push(Date.now());
      calls++;
      if (calls <= 3) throw timeoutError();
      return 'finished';
    }, 'job-1');

    await vi.advanceTimersByTimeAsync(7000);
    const result = await pending;

    expect(result).toEqual({ ok: true, value: 'finished' });
    expect(delays).toEqual([1000, 2000, 4000]);
    expect(calledAt).toEqual([0, 1000, 3000, 7000]);
    expect(executor.getRetryStats('job-1')).toEqual({
      attempt: 0,
      nextDelay: 0,
      totalAttempts: 4,
      totalSuccesses: 1,
      totalFailures: 3,
      circuit: { phase: 'closed', consecutiveFailures: 0 }
    });
  });

  it('should surface a non-retryable failure without retrying', async () => {
    const scheduled = vi.fn();
    const events = createEventEmitter<EngineEvents>();
    events.on('retry:scheduled', scheduled);
    const executor = new RetryExecutor(policy, { events });
    const operation = vi.fn(async () => {
      throw httpError(404);
    });

    const result = await executor.executeWithRetry(operation, 'job-1');

    expect(operation).toHaveBeenCalledTimes(1);
    expect(scheduled).not.toHaveBeenCalled();
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('clientRejected');
      expect(result.error.statusCode).toBe(404);
    }
  });

  it('should stop after maxRetries + 1 invocations', async () => {
    const exhausted = vi.fn();
    const events = createEventEmitter<EngineEvents>();
    events.on('retry:exhausted', exhausted);
    const executor = new RetryExecutor({ ...policy, maxRetries: 2 }, { events });
    const operation = vi.fn(async () => {
      throw httpError(503);
    });

    const pending = executor.executeWithRetry(operation, 'job-1');
    await vi.advanceTimersByTimeAsync(3000);
    const result = await pending;

    expect(operation).toHaveBeenCalledTimes(3);
    expect(result.ok).toBe(false);
    expect(exhausted).toHaveBeenCalledWith(
      expect.objectContaining({ key: 'job-1', attempts: 3 })
    );
    expect(executor.getRetryStats('job-1')?.attempt).toBe(2);
  });

  it('should reject while the circuit is open without invoking the operation', async () => {
    const executor = new RetryExecutor({ ...policy, maxRetries: 0, failureThreshold: 2 });
    const failing = vi.fn(async () => {
      throw httpError(500);
    });

    await executor.executeWithRetry(failing, 'job-1');
    await executor.executeWithRetry(failing, 'job-1');

    const trial = vi.fn(async () => 'value');
    const rejected = await executor.executeWithRetry(trial, 'job-1');

    expect(trial).not.toHaveBeenCalled();
    expect(rejected.ok).toBe(false);
    if (!rejected.ok) {
      expect(rejected.error.kind).toBe('circuitOpen');
      expect(rejected.error.retryable).toBe(false);
      expect(rejected.error.message).toBe('Circuit open for "job-1", next trial in 60000ms');
    }
    expect(executor.remainingOpenTime('job-1')).toBe(60_000);
  });

  it('should let one trial through after resetTimeout and close on success', async () => {
    const transitions: string[] = [];
    const events = createEventEmitter<EngineEvents>();
    events.on('circuit:state-changed', ({ from, to }) => transitions.push(`${from}->${to}`));
    const executor = new RetryExecutor(
      { ...policy, maxRetries: 0, failureThreshold: 2 },
      { events }
    );
    const failing = async () => {
      throw httpError(500);
    };
    await executor.executeWithRetry(failing, 'job-1');
    await executor.executeWithRetry(failing, 'job-1');

    vi.advanceTimersByTime(60_000);
    const trial = await executor.executeWithRetry(async () => 'ok', 'job-1');

    expect(trial).toEqual({ ok: true, value: 'ok' });
    expect(transitions).toEqual(['closed->open', 'open->halfOpen', 'halfOpen->closed']);
    expect(executor.getRetryStats('job-1')?.circuit).toEqual({
      phase: 'closed',
      consecutiveFailures: 0
    });
  });

  it('should keep separate attempt counters for concurrent callers of one key', async () => {
    const executor = new RetryExecutor({ ...policy, failureThreshold: 10 });
    let aCalls = 0;
    let bCalls = 0;

    const a = executor.executeWithRetry(async () => {
      aCalls++;
      if (aCalls <= 2) throw timeoutError();
      return 'a';
    }, 'shared');
    const b = executor.executeWithRetry(async () => {
      bCalls++;
      if (bCalls <= 1) throw timeoutError();
      return 'b';
    }, 'shared');

    await vi.advanceTimersByTimeAsync(3000);

    await expect(a).resolves.toEqual({ ok: true, value: 'a' });
    await expect(b).resolves.toEqual({ ok: true, value: 'b' });
    expect(aCalls).toBe(3);
    expect(bCalls).toBe(2);
    expect(executor.getRetryStats('shared')?.totalAttempts).toBe(5);
  });

  it('should give each attempt its own deadline', async () => {
    const executor = new RetryExecutor({ ...policy, maxRetries: 1, attemptTimeout: 100 });
    const operation = vi.fn((signal: AbortSignal) => {
      return new Promise<string>((_, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason));
      });
    });

    const pending = executor.executeWithRetry(operation, 'job-1');
    await vi.advanceTimersByTimeAsync(1200);
    const result = await pending;

    expect(operation).toHaveBeenCalledTimes(2);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('timeout');
      expect(result.error.message).toBe('Deadline of 100ms exceeded');
    }
  });

  it('should return a cancellation failure when aborted during backoff', async () => {
    const executor = new RetryExecutor(policy);
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      throw timeoutError();
    });

    const pending = executor.executeWithRetry(operation, 'job-1', { signal: controller.signal });
    await vi.advanceTimersByTimeAsync(500);
    controller.abort();
    const result = await pending;

    expect(operation).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('unknown');
      expect(result.error.retryable).toBe(false);
      expect(result.error.message).toBe('Operation cancelled');
    }
    expect(executor.getRetryStats('job-1')?.circuit.consecutiveFailures).toBe(1);
  });

  it('should forget retry state and force the breaker closed on reset', async () => {
    const executor = new RetryExecutor({ ...policy, maxRetries: 0, failureThreshold: 1 });
    await executor.executeWithRetry(async () => {
      throw httpError(500);
    }, 'job-1');

    expect(executor.getRetryStats('job-1')?.circuit.phase).toBe('open');
    expect(executor.resetCircuitBreaker('job-1')).toBe(true);
    expect(executor.resetRetryState('job-1')).toBe(true);
    expect(executor.getRetryStats('job-1')).toEqual({
      attempt: 0,
      nextDelay: 0,
      totalAttempts: 0,
      totalSuccesses: 0,
      totalFailures: 0,
      circuit: { phase: 'closed', consecutiveFailures: 0 }
    });
    expect(executor.getRetryStats('other')).toBeUndefined();
    expect(Object.keys(executor.getRetryStats())).toEqual(['job-1']);
  });

  it('should reject an invalid policy at construction', () => {
    expect(() => new RetryExecutor({ ...policy, initialDelay: 20_000 })).toThrow(TidewatchError);
  });

  it('should refuse work after dispose', async () => {
    const executor = new RetryExecutor(policy);
    executor.dispose();

    await expect(executor.executeWithRetry(async () => 1, 'job-1')).rejects.toThrow(
      'Retry executor has been disposed'
    );
  });

  it('should not jitter unless asked to', async () => {
    const events = createEventEmitter<EngineEvents>();
    const delays: number[] = [];
    events.on('retry:scheduled', ({ delay }) => delays.push(delay));
    const executor = new RetryExecutor(
      {
        maxRetries: 3,
        initialDelay: 1000,
        backoffMultiplier: 2,
        maxDelay: 10_000,
        failureThreshold: 10,
        resetTimeout: 60_000
      },
      { events, random: () => 0.9 }
    );

    let calls = 0;
    const pending = executor.executeWithRetry(async () => {
      calls++;
      if (calls <= 3) throw timeoutError();
      return 'finished';
    }, 'job-1');
    await vi.advanceTimersByTimeAsync(7000);

    await expect(pending).resolves.toEqual({ ok: true, value: 'finished' });
    expect(delays).toEqual([1000, 2000, 4000]);
  });

  it('should never gate attempts when circuit breaking is disabled', async () => {
    const executor = new RetryExecutor({
      ...policy,
      maxRetries: 0,
      failureThreshold: 1,
      enableCircuitBreaker: false
    });
    const operation = vi.fn(async () => {
      throw httpError(500);
    });

    for (let i = 0; i < 3; i++) {
      await executor.executeWithRetry(operation, 'job-1');
    }

    expect(operation).toHaveBeenCalledTimes(3);
    expect(executor.remainingOpenTime('job-1')).toBe(0);
    expect(executor.getRetryStats('job-1')).toMatchObject({
      totalFailures: 3,
      circuit: { phase: 'closed', consecutiveFailures: 0 }
    });
  });

  it('should not retry when Retry-After exceeds maxDelay', async () => {
    const executor = new RetryExecutor(policy);
    const operation = vi.fn(async () => {
      throw Object.assign(httpError(429), { retryAfter: 30 });
    });

    const result = await executor.executeWithRetry(operation, 'job-1');

    expect(operation).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('serverUnavailable');
      expect(result.error.retryAfter).toBe(30_000);
    }
  });

  it('should wait as long as Retry-After asks when it is within maxDelay', async () => {
    const events = createEventEmitter<EngineEvents>();
    const delays: number[] = [];
    events.on('retry:scheduled', ({ delay }) => delays.push(delay));
    const executor = new RetryExecutor(policy, { events });
    const calledAt: number[] = [];

    const pending = executor.executeWithRetry(async () => {
      calledAt.push(Date.now());
      if (calledAt.length === 1) throw Object.assign(httpError(503), { retryAfter: 3 });
      return 'ready';
    }, 'job-1');
    await vi.advanceTimersByTimeAsync(3000);

    await expect(pending).resolves.toEqual({ ok: true, value: 'ready' });
    expect(delays).toEqual([3000]);
    expect(calledAt).toEqual([0, 3000]);
  });

  it('should report an attempt cut short by a deadline to the breaker', async () => {
    const executor = new RetryExecutor(policy);
    const controller = new AbortController();

    const pending = executor.executeWithRetry(() => new Promise<string>(() => {}), 'job-1', {
      signal: controller.signal
    });
    await vi.advanceTimersByTimeAsync(500);
    controller.abort(new DeadlineExceededError(500, 'Polling session exceeded 500ms'));
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('timeout');
      expect(result.error.message).toBe('Polling session exceeded 500ms');
    }
    expect(executor.getRetryStats('job-1')).toMatchObject({
      totalAttempts: 1,
      totalFailures: 1,
      circuit: { phase: 'closed', consecutiveFailures: 1 }
    });
  });

  it('should not report a plain stop to the breaker', async () => {
    const executor = new RetryExecutor(policy);
    const controller = new AbortController();

    const pending = executor.executeWithRetry(() => new Promise<string>(() => {}), 'job-1', {
      signal: controller.signal
    });
    await vi.advanceTimersByTimeAsync(500);
    controller.abort();
    await pending;

    expect(executor.getRetryStats('job-1')).toMatchObject({
      totalAttempts: 1,
      totalFailures: 0,
      circuit: { phase: 'closed', consecutiveFailures: 0 }
    });
  });
});
