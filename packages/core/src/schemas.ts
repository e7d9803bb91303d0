/**
 * Configuration schema for the resilience engine
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';
import { ErrorCode } from './errors/codes.js';
import { TidewatchError } from './errors/tidewatch-error.js';
import { CIRCUIT_OPEN, ErrorKind } from './types/failure.js';

const durationMs = z.number().int().nonnegative();

export const RecoveryStrategySchema = z
  .enum(['retry', 'fallback', 'buffer', 'circuitBreak', 'degraded'])
  .describe('How the recovery wrapper reacts to a source error');

export type RecoveryStrategy = z.infer<typeof RecoveryStrategySchema>;

/**
 * Strategies a retry strategy may escalate to once re-establishment is exhausted
 */
export const EscalationStrategySchema = z.enum(['fallback', 'buffer', 'circuitBreak', 'degraded']);

export type EscalationStrategy = z.infer<typeof EscalationStrategySchema>;

export const FailureKindSchema = z.enum([
  ErrorKind.NETWORK,
  ErrorKind.TIMEOUT,
  ErrorKind.SERVER_UNAVAILABLE,
  ErrorKind.CLIENT_REJECTED,
  ErrorKind.DOMAIN_FAILURE,
  ErrorKind.INVALID_DATA,
  ErrorKind.UNKNOWN,
  CIRCUIT_OPEN
]);

/**
 * Polling cadence
 */
export const PollingConfigSchema = z.object({
  minInterval: z.number().int().positive().describe('Tightest polling interval (ms)'),
  maxInterval: z.number().int().positive().describe('Loosest polling interval (ms)'),
  inactivityThreshold: z
    .number()
    .int()
    .nonnegative()
    .describe('Unchanged ticks tolerated before the interval starts growing'),
  growthFactor: z.number().min(1).describe('Interval multiplier applied per inactive tick'),
  sessionTimeout: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Overall deadline for one polling session (ms)')
});

/**
 * Retry and circuit breaker policy
 */
export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().nonnegative().describe('Retries after the first attempt'),
  initialDelay: durationMs.describe('First backoff delay (ms)'),
  maxDelay: durationMs.describe('Backoff delay cap (ms)'),
  backoffMultiplier: z.number().min(1).describe('Growth factor between backoff delays'),
  jitter: z.boolean().default(false).describe('Spread delays by up to ±20%'),
  attemptTimeout: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Deadline for a single attempt (ms)'),
  retryDomainFailures: z.boolean().default(false),
  retryUnknown: z.boolean().default(false),
  failureThreshold: z
    .number()
    .int()
    .positive()
    .describe('Consecutive failures that open the circuit'),
  resetTimeout: durationMs.describe('Time the circuit stays open before a trial (ms)'),
  enableCircuitBreaker: z
    .boolean()
    .default(true)
    .describe('Gate attempts through a per-key circuit breaker')
});

/**
 * Recovery wrapper policy
 */
export const RecoveryConfigSchema = z.object({
  recoveryStrategy: RecoveryStrategySchema,
  escalationStrategy: EscalationStrategySchema.default('degraded'),
  maxReestablishAttempts: z.number().int().nonnegative().default(3),
  bufferCapacity: z.number().int().positive().describe('Maximum queued values'),
  unhealthyThreshold: z
    .number()
    .int()
    .nonnegative()
    .default(3)
    .describe('Consecutive errors beyond which health becomes unhealthy'),
  errorStrategies: z
    .record(FailureKindSchema, RecoveryStrategySchema)
    .default({})
    .describe('Strategy per failure kind, overriding recoveryStrategy')
});

type Refinable = {
  minInterval?: number;
  maxInterval?: number;
  initialDelay?: number;
  maxDelay?: number;
};

function checkOrdering(config: Refinable, ctx: z.RefinementCtx): void {
  if (
    config.minInterval !== undefined &&
    config.maxInterval !== undefined &&
    config.minInterval > config.maxInterval
  ) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['minInterval'],
      message: 'minInterval must not exceed maxInterval'
    });
  }
  if (
    config.initialDelay !== undefined &&
    config.maxDelay !== undefined &&
    config.initialDelay > config.maxDelay
  ) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['initialDelay'],
      message: 'initialDelay must not exceed maxDelay'
    });
  }
}

/**
 * Sections with their cross-field rules, for components constructed on their own
 */
export const PollingPolicySchema = PollingConfigSchema.superRefine(checkOrdering);
export const RetryPolicySchema = RetryConfigSchema.superRefine(checkOrdering);

export type PollingPolicy = z.infer<typeof PollingPolicySchema>;
export type PollingPolicyInput = z.input<typeof PollingPolicySchema>;
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type RetryPolicyInput = z.input<typeof RetryPolicySchema>;

/**
 * Recovery section plus the backoff and breaker fields the wrapper reuses
 */
export const RecoveryPolicySchema = RecoveryConfigSchema.merge(
  RetryConfigSchema.pick({
    initialDelay: true,
    maxDelay: true,
    backoffMultiplier: true,
    jitter: true,
    failureThreshold: true,
    resetTimeout: true
  })
).superRefine(checkOrdering);

export type RecoveryPolicy = z.infer<typeof RecoveryPolicySchema>;
export type RecoveryPolicyInput = z.input<typeof RecoveryPolicySchema>;

/**
 * Full engine configuration bundle
 */
export const EngineConfigSchema = PollingConfigSchema.merge(RetryConfigSchema)
  .merge(RecoveryConfigSchema)
  .strict()
  .superRefine(checkOrdering);

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parse `input` with `schema`, throwing a TidewatchError that lists every issue
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label = 'engine'
): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new TidewatchError(
      ErrorCode.E_CONFIG_INVALID,
      `Invalid ${label} configuration: ${issues.join('; ')}`,
      { issues },
      parsed.error
    );
  }
  return parsed.data;
}

/**
 * Validate a configuration bundle, throwing a TidewatchError on the first problem set
 */
export function validateEngineConfig(input: unknown): EngineConfig {
  return parseConfig(EngineConfigSchema, input);
}
