/**
 * Engine composition root
 *
 * Builds the retry executor, polling scheduler and recovery wrapper from one
 * validated configuration so they share a logger and an event emitter.
 */

import {
  type EngineConfig,
  type EngineConfigInput,
  type EngineEvents,
  ErrorCode,
  type Logger,
  createSilentLogger,
  TidewatchError,
  validateEngineConfig
} from '@tidewatch/core';
import { RetryExecutor } from './error-recovery/retry.js';
import { PollingScheduler } from './polling/scheduler.js';
import type { ResilientChannel } from './recovery/resilient-channel.js';
import type { Source, WrapOptions } from './recovery/types.js';
import { RecoveryWrapper } from './recovery/wrapper.js';
import { createEventEmitter, type EngineEventEmitter } from './utils/events.js';

export type EngineOptions = {
  logger?: Logger;
  events?: EngineEventEmitter;
  now?: () => number;
  random?: () => number;
};

export type Engine = {
  readonly config: EngineConfig;
  readonly events: EngineEventEmitter;
  readonly retry: RetryExecutor;
  readonly scheduler: PollingScheduler;
  readonly recovery: RecoveryWrapper;
  wrap<T>(source: Source<T>, options?: WrapOptions<T>): ResilientChannel<T>;
  /** Stops every channel and session. Idempotent. */
  dispose(): void;
  readonly disposed: boolean;
};

/**
 * Create an engine. Throws TidewatchError(E_CONFIG_INVALID) on a bad configuration.
 */
export function createEngine(config: EngineConfigInput, options: EngineOptions = {}): Engine {
  const validated = validateEngineConfig(config);
  const logger = options.logger ?? createSilentLogger();
  const events = options.events ?? createEventEmitter<EngineEvents>(logger);
  const component = (name: string) => logger.child?.({ component: name }) ?? logger;
  const shared = { events, now: options.now, random: options.random };

  const retry = new RetryExecutor(validated, { ...shared, logger: component('retry') });
  const scheduler = new PollingScheduler(validated, retry, {
    events,
    now: options.now,
    logger: component('polling')
  });
  const recovery = new RecoveryWrapper(validated, { ...shared, logger: component('recovery') });

  let disposed = false;

  return {
    config: validated,
    events,
    retry,
    scheduler,
    recovery,
    wrap<T>(source: Source<T>, wrapOptions?: WrapOptions<T>): ResilientChannel<T> {
      if (disposed) {
        throw new TidewatchError(ErrorCode.E_ENGINE_DISPOSED, 'Engine has been disposed');
      }
      return recovery.wrap(source, wrapOptions);
    },
    dispose: () => {
      if (disposed) return;
      disposed = true;
      recovery.dispose();
      scheduler.dispose();
      retry.dispose();
      logger.debug('Engine disposed');
    },
    get disposed() {
      return disposed;
    }
  };
}
