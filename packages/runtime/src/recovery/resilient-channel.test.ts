import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type EngineEvents, type RecoveryPolicyInput } from '@tidewatch/core';
import { createEventEmitter } from '../utils/events.js';
import type { Source, SourceSink } from './types.js';
import { RecoveryWrapper } from './wrapper.js';

const base: RecoveryPolicyInput = {
  recoveryStrategy: 'fallback',
  escalationStrategy: 'degraded',
  maxReestablishAttempts: 2,
  bufferCapacity: 3,
  unhealthyThreshold: 2,
  initialDelay: 100,
  maxDelay: 1000,
  backoffMultiplier: 2,
  jitter: false,
  failureThreshold: 2,
  resetTimeout: 5000
};

function manualSource<T>() {
  let sink: SourceSink<T> | undefined;
  const stats = { subscriptions: 0, unsubscriptions: 0 };
  const source: Source<T> = (next) => {
    sink = next;
    stats.subscriptions++;
    return () => {
      stats.unsubscriptions++;
    };
  };
  return {
    source,
    stats,
    emit: (value: T) => sink?.next(value),
    fail: (error: unknown) => sink?.error(error),
    end: () => sink?.end()
  };
}

describe('ResilientChannel', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('fallback', () => {
    it('should emit the fallback value in place of an error and report health first', () => {
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper(base).wrap(manual.source, { fallbackValue: 'F' });
      const log: string[] = [];
      channel.onHealth((health) => log.push(`health:${health.status}`));
      channel.subscribe((value) => log.push(`value:${value}`));

      manual.emit('A');
      manual.fail(new Error('boom'));
      manual.emit('B');

      expect(log).toEqual([
        'health:healthy',
        'health:healthy',
        'value:A',
        'health:degraded',
        'value:F',
        'health:healthy',
        'value:B'
      ]);
      expect(channel.health()).toEqual({ status: 'healthy', consecutiveFailures: 0, since: 0 });
      expect(manual.stats.unsubscriptions).toBe(0);
    });

    it('should fall back to the last known-good value', () => {
      const manual = manualSource<number>();
      const channel = new RecoveryWrapper(base).wrap(manual.source);
      const values: number[] = [];
      channel.subscribe((value) => values.push(value));

      manual.fail(new Error('before any value'));
      manual.emit(1);
      manual.fail(new Error('boom'));

      expect(values).toEqual([1, 1]);
      expect(channel.getRecoveryStats().fallbacks).toBe(1);
    });
  });

  describe('retry', () => {
    it('should re-subscribe with backoff and escalate once attempts run out', async () => {
      const events = createEventEmitter<EngineEvents>();
      const reestablishing: Array<EngineEvents['recovery:reestablishing']> = [];
      const escalated = vi.fn();
      events.on('recovery:reestablishing', (event) => reestablishing.push(event));
      events.on('recovery:escalated', escalated);
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper({ ...base, recoveryStrategy: 'retry' }, { events }).wrap(
        manual.source
      );
      const heartbeats: string[] = [];
      channel.subscribe({ heartbeat: (status) => heartbeats.push(status) });

      manual.fail(new Error('first'));
      expect(manual.stats.unsubscriptions).toBe(1);
      await vi.advanceTimersByTimeAsync(100);
      expect(manual.stats.subscriptions).toBe(2);

      manual.fail(new Error('second'));
      await vi.advanceTimersByTimeAsync(199);
      expect(manual.stats.subscriptions).toBe(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(manual.stats.subscriptions).toBe(3);

      manual.fail(new Error('third'));

      expect(reestablishing).toEqual([
        { sourceId: 'source-1', attempt: 1, delay: 100 },
        { sourceId: 'source-1', attempt: 2, delay: 200 }
      ]);
      expect(escalated).toHaveBeenCalledWith({ sourceId: 'source-1', from: 'retry', to: 'degraded' });
      expect(heartbeats).toEqual(['unhealthy']);
      expect(manual.stats.subscriptions).toBe(3);
      expect(channel.getRecoveryStats().strategy).toBe('degraded');
    });

    it('should return to the configured strategy after a value', async () => {
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper({
        ...base,
        recoveryStrategy: 'retry',
        maxReestablishAttempts: 0
      }).wrap(manual.source);

      manual.fail(new Error('boom'));
      expect(channel.getRecoveryStats().strategy).toBe('degraded');

      manual.emit('ok');
      expect(channel.getRecoveryStats()).toMatchObject({
        strategy: 'retry',
        reestablishAttempts: 0,
        escalations: 1
      });
    });

    it('should ignore events from a torn-down subscription', () => {
      const sinks: Array<SourceSink<string>> = [];
      const source: Source<string> = (sink) => {
        sinks.push(sink);
        return () => {};
      };
      const events = createEventEmitter<EngineEvents>();
      const reestablishing = vi.fn();
      events.on('recovery:reestablishing', reestablishing);
      const channel = new RecoveryWrapper({ ...base, recoveryStrategy: 'retry' }, { events }).wrap(
        source
      );

      sinks[0]?.error(new Error('boom'));
      sinks[0]?.error(new Error('again'));
      sinks[0]?.next('stale');

      expect(reestablishing).toHaveBeenCalledTimes(1);
      expect(channel.health().consecutiveFailures).toBe(1);
    });

    it('should keep at most one re-establishment in flight', async () => {
      const events = createEventEmitter<EngineEvents>();
      const reestablishing = vi.fn();
      events.on('recovery:reestablishing', reestablishing);
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper({ ...base, recoveryStrategy: 'retry' }, { events }).wrap(
        manual.source
      );

      manual.fail(new Error('first'));
      manual.fail(new Error('second'));
      manual.end();
      expect(channel.getRecoveryStats().recovering).toBe(true);

      await vi.advanceTimersByTimeAsync(100);

      expect(reestablishing).toHaveBeenCalledTimes(1);
      expect(manual.stats.subscriptions).toBe(2);
      expect(channel.getRecoveryStats()).toMatchObject({ recovering: false, reestablishments: 1 });
    });
  });

  describe('errorStrategies', () => {
    it('should apply the strategy configured for the failure kind', () => {
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper({
        ...base,
        errorStrategies: { clientRejected: 'degraded' }
      }).wrap(manual.source, { fallbackValue: 'F' });
      const values: string[] = [];
      const heartbeats: string[] = [];
      channel.subscribe({
        next: (value) => values.push(value),
        heartbeat: (status) => heartbeats.push(status)
      });

      manual.fail(Object.assign(new Error('HTTP 404'), { status: 404 }));
      expect(heartbeats).toEqual(['degraded']);
      expect(values).toEqual([]);

      manual.fail(new Error('boom'));
      expect(values).toEqual(['F']);
      expect(heartbeats).toEqual(['degraded']);
      expect(channel.getRecoveryStats()).toMatchObject({
        strategy: 'fallback',
        heartbeats: 1,
        fallbacks: 1
      });
    });

    it('should keep an escalated strategy over the per-kind one', () => {
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper({
        ...base,
        recoveryStrategy: 'retry',
        maxReestablishAttempts: 0,
        errorStrategies: { clientRejected: 'fallback' }
      }).wrap(manual.source, { fallbackValue: 'F' });
      const values: string[] = [];
      channel.subscribe((value) => values.push(value));

      manual.fail(new Error('boom'));
      expect(channel.getRecoveryStats().strategy).toBe('degraded');

      manual.fail(Object.assign(new Error('HTTP 404'), { status: 404 }));
      expect(values).toEqual([]);
      expect(channel.getRecoveryStats().heartbeats).toBe(2);
    });
  });

  describe('buffer', () => {
    it('should hold undeliverable values, dropping the oldest, and replay on subscribe', () => {
      const manual = manualSource<number>();
      const channel = new RecoveryWrapper({ ...base, recoveryStrategy: 'buffer' }).wrap(
        manual.source
      );

      for (let i = 1; i <= 5; i++) manual.emit(i);
      expect(channel.getRecoveryStats()).toMatchObject({ buffered: 3, dropped: 2 });

      const received: number[] = [];
      channel.subscribe((value) => received.push(value));

      expect(received).toEqual([3, 4, 5]);
      expect(channel.getRecoveryStats()).toMatchObject({ buffered: 0, replayed: 3 });
    });

    it('should queue a value the observer rejected and deliver it first next time', () => {
      const manual = manualSource<number>();
      const channel = new RecoveryWrapper({ ...base, recoveryStrategy: 'buffer' }).wrap(
        manual.source
      );
      const received: number[] = [];
      let rejectNext = true;
      channel.subscribe((value) => {
        if (value === 6 && rejectNext) {
          rejectNext = false;
          throw new Error('busy');
        }
        received.push(value);
      });

      manual.emit(6);
      expect(channel.getRecoveryStats().buffered).toBe(1);

      manual.emit(7);
      expect(received).toEqual([6, 7]);
    });

    it('should queue a new value behind older ones that are still waiting', () => {
      const manual = manualSource<number>();
      const channel = new RecoveryWrapper({ ...base, recoveryStrategy: 'buffer' }).wrap(
        manual.source
      );
      const received: number[] = [];
      let rejections = 0;
      channel.subscribe((value) => {
        if (value === 1 && rejections < 2) {
          rejections++;
          throw new Error('busy');
        }
        received.push(value);
      });

      manual.emit(1);
      manual.emit(2);
      expect(received).toEqual([]);
      expect(channel.getRecoveryStats().buffered).toBe(2);

      manual.emit(3);
      expect(received).toEqual([1, 2, 3]);
      expect(channel.getRecoveryStats()).toMatchObject({ buffered: 0, replayed: 2 });
    });
  });

  describe('circuitBreak', () => {
    it('should stop re-establishing for resetTimeout once errors exceed the threshold', async () => {
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper({ ...base, recoveryStrategy: 'circuitBreak' }).wrap(
        manual.source
      );
      const statuses: string[] = [];
      channel.onHealth((health) => statuses.push(health.status));

      manual.fail(new Error('1'));
      manual.fail(new Error('2'));
      expect(manual.stats.unsubscriptions).toBe(0);

      manual.fail(new Error('3'));
      expect(manual.stats.unsubscriptions).toBe(1);
      expect(channel.getRecoveryStats().coolingDown).toBe(true);
      expect(statuses).toEqual(['healthy', 'degraded', 'degraded', 'unhealthy']);

      await vi.advanceTimersByTimeAsync(4999);
      expect(manual.stats.subscriptions).toBe(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(manual.stats.subscriptions).toBe(2);

      manual.emit('back');
      expect(channel.health().status).toBe('healthy');
      expect(channel.getRecoveryStats().coolingDown).toBe(false);
    });

    it('should reconnect at once on resetRecoveryState', () => {
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper({ ...base, recoveryStrategy: 'circuitBreak' }).wrap(
        manual.source
      );
      for (let i = 0; i < 3; i++) manual.fail(new Error(String(i)));

      channel.resetRecoveryState();

      expect(manual.stats.subscriptions).toBe(2);
      expect(channel.health()).toEqual({ status: 'healthy', consecutiveFailures: 0, since: 0 });
      expect(channel.getRecoveryStats()).toMatchObject({ coolingDown: false, recovering: false });
    });

    it('should wait out the cool-down when the source ends after an error', async () => {
      const events = createEventEmitter<EngineEvents>();
      const reestablishing = vi.fn();
      events.on('recovery:reestablishing', reestablishing);
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper(
        { ...base, recoveryStrategy: 'circuitBreak' },
        { events }
      ).wrap(manual.source);

      for (let i = 0; i < 3; i++) manual.fail(new Error(String(i)));
      manual.end();

      await vi.advanceTimersByTimeAsync(4999);
      expect(manual.stats.subscriptions).toBe(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(manual.stats.subscriptions).toBe(2);
      expect(reestablishing).not.toHaveBeenCalled();
      expect(channel.getRecoveryStats()).toMatchObject({
        coolingDown: false,
        completed: false,
        reestablishments: 1
      });
    });
  });

  describe('degraded', () => {
    it('should emit a heartbeat with the health status only', () => {
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper({ ...base, recoveryStrategy: 'degraded' }).wrap(
        manual.source
      );
      const next = vi.fn();
      const heartbeat = vi.fn();
      channel.subscribe({ next, heartbeat });

      manual.fail(new Error('boom'));

      expect(heartbeat).toHaveBeenCalledWith('degraded');
      expect(next).not.toHaveBeenCalled();
    });
  });

  describe('source lifecycle', () => {
    it('should re-establish a source that ends right after an error', async () => {
      const manual = manualSource<string>();
      new RecoveryWrapper(base).wrap(manual.source);

      manual.fail(new Error('crash'));
      manual.end();
      await vi.advanceTimersByTimeAsync(100);

      expect(manual.stats.subscriptions).toBe(2);
    });

    it('should complete the channel when the source ends cleanly', () => {
      const manual = manualSource<string>();
      const channel = new RecoveryWrapper(base).wrap(manual.source);
      const complete = vi.fn();
      channel.subscribe({ complete });

      manual.emit('done');
      manual.end();

      expect(complete).toHaveBeenCalledTimes(1);
      expect(channel.getRecoveryStats().completed).toBe(true);
      const late = vi.fn();
      channel.subscribe({ complete: late });
      expect(late).toHaveBeenCalledTimes(1);
    });

    it('should treat a source that throws on subscribe as an error followed by end', async () => {
      let calls = 0;
      const channel = new RecoveryWrapper(base).wrap<string>(() => {
        calls++;
        throw new Error('cannot start');
      });

      expect(channel.health().status).toBe('degraded');
      await vi.advanceTimersByTimeAsync(100);
      expect(calls).toBe(2);
      channel.dispose();
    });

    it('should stop the source once on dispose and ignore later events', () => {
      const manual = manualSource<string>();
      const wrapper = new RecoveryWrapper(base);
      const channel = wrapper.wrap(manual.source);
      const next = vi.fn();
      channel.subscribe(next);

      wrapper.dispose();
      channel.dispose();
      manual.emit('late');

      expect(manual.stats.unsubscriptions).toBe(1);
      expect(next).not.toHaveBeenCalled();
      expect(channel.disposed).toBe(true);
      expect(wrapper.size).toBe(0);
    });
  });
});
