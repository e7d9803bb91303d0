import type { ClassifiedFailure } from './failure.js';

export const HealthStatus = {
  HEALTHY: 'healthy',
  DEGRADED: 'degraded',
  UNHEALTHY: 'unhealthy'
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

/**
 * Health of one wrapped sequence, recomputed on every upstream event
 */
export type HealthState = {
  readonly status: HealthStatus;
  readonly consecutiveFailures: number;
  readonly lastError?: ClassifiedFailure;
  /** Epoch ms of the last status change */
  readonly since: number;
};

export function initialHealth(now: number = Date.now()): HealthState {
  return { status: HealthStatus.HEALTHY, consecutiveFailures: 0, since: now };
}
