/**
 * Event type definitions for the resilience engine
 * Pure types with no side effects
 */

import type { ActivityKind } from '../types/activity.js';
import type { ClassifiedFailure } from '../types/failure.js';
import type { HealthState } from '../types/health.js';

export type CircuitPhase = 'closed' | 'open' | 'halfOpen';

/**
 * Retry executor and circuit breaker events
 */
export type RetryEvents = {
  'retry:scheduled': { key: string; attempt: number; delay: number; failure: ClassifiedFailure };
  'retry:exhausted': { key: string; attempts: number; failure: ClassifiedFailure };
  'circuit:state-changed': { key: string; from: CircuitPhase; to: CircuitPhase; at: number };
};

/**
 * Polling session lifecycle events
 */
export type PollingEvents = {
  'polling:started': { jobId: string; interval: number; at: number };
  'polling:value': { jobId: string; activity: ActivityKind; interval: number; at: number };
  'polling:error': { jobId: string; failure: ClassifiedFailure; interval: number; at: number };
  'polling:stopped': { jobId: string; reason: string; at: number };
};

/**
 * Recovery wrapper events
 */
export type RecoveryEvents = {
  'recovery:health': { sourceId: string; health: HealthState };
  'recovery:reestablishing': { sourceId: string; attempt: number; delay: number };
  'recovery:escalated': { sourceId: string; from: string; to: string };
};

/**
 * All engine events
 */
export type EngineEvents = RetryEvents & PollingEvents & RecoveryEvents;

export type EngineEventName = keyof EngineEvents;

export type EngineEventPayload<T extends EngineEventName> = EngineEvents[T];
