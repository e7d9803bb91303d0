import type { HealthState, HealthStatus, RecoveryStrategy } from '@tidewatch/core';

/**
 * Receiver handed to a source. Errors do not end a source; only `end` does.
 */
export type SourceSink<T> = {
  next(value: T): void;
  error(error: unknown): void;
  end(): void;
};

export type Unsubscribe = () => void;

/**
 * Push subscription. Calling it starts the source, calling the returned
 * function stops it.
 */
export type Source<T> = (sink: SourceSink<T>) => Unsubscribe;

/**
 * Consumer side of the value channel
 */
export type ChannelObserver<T> = {
  next?: (value: T) => void;
  /** Coarse liveness signal of the degraded strategy; carries no error detail */
  heartbeat?: (status: HealthStatus) => void;
  complete?: () => void;
};

export type HealthListener = (health: HealthState) => void;

export type WrapOptions<T> = {
  /** Identifier used in events and logs */
  id?: string;
  /** Emitted by the fallback strategy in place of an error */
  fallbackValue?: T;
  /** Overrides the configured strategy for this source */
  strategy?: RecoveryStrategy;
};

export type RecoveryStats = {
  sourceId: string;
  strategy: RecoveryStrategy;
  configuredStrategy: RecoveryStrategy;
  health: HealthState;
  reestablishAttempts: number;
  recovering: boolean;
  coolingDown: boolean;
  completed: boolean;
  buffered: number;
  values: number;
  errors: number;
  reestablishments: number;
  fallbacks: number;
  heartbeats: number;
  dropped: number;
  replayed: number;
  escalations: number;
};
