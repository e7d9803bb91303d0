/**
 * Event contracts
 */

export type {
  CircuitPhase,
  EngineEventName,
  EngineEventPayload,
  EngineEvents,
  PollingEvents,
  RecoveryEvents,
  RetryEvents
} from './types.js';
