import { describe, expect, it } from 'vitest';
import { createFailure } from '@tidewatch/core';
import { healthAfterError, healthAfterValue, initialHealth } from './health.js';

const failure = createFailure('network', { retryable: true, message: 'refused', occurredAt: 5 });

describe('health transitions', () => {
  it('should degrade on the first error since success', () => {
    expect(healthAfterError(initialHealth(0), failure, 2, 10)).toEqual({
      status: 'degraded',
      consecutiveFailures: 1,
      lastError: failure,
      since: 10
    });
  });

  it('should turn unhealthy once the run exceeds the threshold', () => {
    let health = initialHealth(0);
    const statuses: string[] = [];
    for (let at = 1; at <= 4; at++) {
      health = healthAfterError(health, failure, 2, at);
      statuses.push(health.status);
    }

    expect(statuses).toEqual(['degraded', 'degraded', 'unhealthy', 'unhealthy']);
    expect(health.since).toBe(3);
  });

  it('should return to healthy on any value', () => {
    const degraded = healthAfterError(initialHealth(0), failure, 2, 10);
    expect(healthAfterValue(degraded, 20)).toEqual({
      status: 'healthy',
      consecutiveFailures: 0,
      since: 20
    });
  });

  it('should keep since while staying healthy', () => {
    expect(healthAfterValue(initialHealth(7), 20).since).toBe(7);
  });
});
