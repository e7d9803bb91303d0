import {
  type ClassifiedFailure,
  type HealthState,
  HealthStatus,
  initialHealth
} from '@tidewatch/core';

export { initialHealth };

/**
 * Any value means the channel is healthy again
 */
export function healthAfterValue(current: HealthState, now: number): HealthState {
  return {
    status: HealthStatus.HEALTHY,
    consecutiveFailures: 0,
    since: current.status === HealthStatus.HEALTHY ? current.since : now
  };
}

/**
 * First error since success degrades; a run longer than `unhealthyThreshold` is unhealthy
 */
export function healthAfterError(
  current: HealthState,
  failure: ClassifiedFailure,
  unhealthyThreshold: number,
  now: number
): HealthState {
  const consecutiveFailures = current.consecutiveFailures + 1;
  const status =
    consecutiveFailures > unhealthyThreshold ? HealthStatus.UNHEALTHY : HealthStatus.DEGRADED;
  return {
    status,
    consecutiveFailures,
    lastError: failure,
    since: status === current.status ? current.since : now
  };
}
