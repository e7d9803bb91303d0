/**
 * Named configuration profiles
 *
 * Profiles are plain value bundles. Nothing in the engine falls back to one on its
 * own; callers pick a profile explicitly or pass a complete configuration.
 */

import { ErrorCode } from './errors/codes.js';
import { TidewatchError } from './errors/tidewatch-error.js';
import { type EngineConfig, type EngineConfigInput, validateEngineConfig } from './schemas.js';

export const EngineProfiles = {
  /** Fixed 30s cadence, single retry, no breaker, fallback on error */
  minimal: {
    minInterval: 30_000,
    maxInterval: 30_000,
    inactivityThreshold: 0,
    growthFactor: 1,
    maxRetries: 1,
    initialDelay: 100,
    maxDelay: 30_000,
    backoffMultiplier: 2,
    failureThreshold: 5,
    resetTimeout: 60_000,
    enableCircuitBreaker: false,
    recoveryStrategy: 'fallback',
    bufferCapacity: 10
  },

  /** General purpose */
  balanced: {
    minInterval: 2_000,
    maxInterval: 120_000,
    inactivityThreshold: 2,
    growthFactor: 1.3,
    maxRetries: 3,
    initialDelay: 500,
    maxDelay: 30_000,
    backoffMultiplier: 2,
    failureThreshold: 5,
    resetTimeout: 60_000,
    recoveryStrategy: 'retry',
    bufferCapacity: 50
  },

  /** Tight cadence for interactive flows */
  highFrequency: {
    minInterval: 500,
    maxInterval: 30_000,
    inactivityThreshold: 3,
    growthFactor: 1.5,
    maxRetries: 2,
    initialDelay: 100,
    maxDelay: 5_000,
    backoffMultiplier: 2,
    failureThreshold: 3,
    resetTimeout: 30_000,
    recoveryStrategy: 'degraded',
    bufferCapacity: 100
  },

  /** Loose cadence for constrained devices */
  batteryOptimized: {
    minInterval: 10_000,
    maxInterval: 600_000,
    inactivityThreshold: 1,
    growthFactor: 2,
    maxRetries: 2,
    initialDelay: 1_000,
    maxDelay: 10_000,
    backoffMultiplier: 1.2,
    jitter: true,
    failureThreshold: 3,
    resetTimeout: 60_000,
    recoveryStrategy: 'fallback',
    bufferCapacity: 20
  },

  /** Many retries, long cool-downs */
  resilient: {
    minInterval: 1_000,
    maxInterval: 300_000,
    inactivityThreshold: 3,
    growthFactor: 1.5,
    maxRetries: 5,
    initialDelay: 200,
    maxDelay: 120_000,
    backoffMultiplier: 1.5,
    failureThreshold: 10,
    resetTimeout: 300_000,
    recoveryStrategy: 'retry',
    maxReestablishAttempts: 5,
    bufferCapacity: 100,
    unhealthyThreshold: 10
  }
} as const satisfies Record<string, EngineConfigInput>;

export type EngineProfileName = keyof typeof EngineProfiles;

export function isEngineProfileName(name: string): name is EngineProfileName {
  return Object.prototype.hasOwnProperty.call(EngineProfiles, name);
}

export type ResolveEngineConfigOptions = {
  profile?: string;
  overrides?: Partial<EngineConfigInput>;
};

/**
 * Merge a profile with overrides and validate the result
 */
export function resolveEngineConfig(options: ResolveEngineConfigOptions = {}): EngineConfig {
  return mergeWithProfile(options.profile, options.overrides ?? {});
}

/**
 * Same as resolveEngineConfig for documents whose shape is not yet known
 */
export function mergeWithProfile(profile: string | undefined, overrides: object): EngineConfig {
  if (profile === undefined) {
    return validateEngineConfig(overrides);
  }

  if (!isEngineProfileName(profile)) {
    throw new TidewatchError(ErrorCode.E_PROFILE_UNKNOWN, `Unknown profile "${profile}"`, {
      profile
    });
  }

  return validateEngineConfig({ ...EngineProfiles[profile], ...overrides });
}
