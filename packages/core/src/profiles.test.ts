import { describe, expect, it } from 'vitest';
import { EngineProfiles, resolveEngineConfig } from './profiles.js';
import { EngineConfigSchema } from './schemas.js';

describe('EngineProfiles', () => {
  it('should all be valid configurations', () => {
    for (const [name, profile] of Object.entries(EngineProfiles)) {
      const parsed = EngineConfigSchema.safeParse(profile);
      expect(parsed.success, name).toBe(true);
    }
  });

  it('should disable the breaker only in the minimal profile', () => {
    expect(resolveEngineConfig({ profile: 'minimal' }).enableCircuitBreaker).toBe(false);
    expect(resolveEngineConfig({ profile: 'balanced' }).enableCircuitBreaker).toBe(true);
    expect(resolveEngineConfig({ profile: 'balanced' }).jitter).toBe(false);
    expect(resolveEngineConfig({ profile: 'batteryOptimized' }).jitter).toBe(true);
  });
});

describe('resolveEngineConfig', () => {
  it('should layer overrides on top of a profile', () => {
    const config = resolveEngineConfig({ profile: 'balanced', overrides: { maxRetries: 7 } });

    expect(config.maxRetries).toBe(7);
    expect(config.minInterval).toBe(2_000);
    expect(config.recoveryStrategy).toBe('retry');
  });

  it('should throw for an unknown profile', () => {
    expect(() => resolveEngineConfig({ profile: 'turbo' })).toThrow('Unknown profile "turbo"');
  });

  it('should require a complete bundle without a profile', () => {
    expect(() => resolveEngineConfig({ overrides: { maxRetries: 1 } })).toThrow(
      /Invalid engine configuration/
    );
  });
});
