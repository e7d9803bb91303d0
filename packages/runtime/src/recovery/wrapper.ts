import {
  createSilentLogger,
  ErrorCode,
  type Logger,
  parseConfig,
  type RecoveryPolicy,
  type RecoveryPolicyInput,
  RecoveryPolicySchema,
  TidewatchError
} from '@tidewatch/core';
import type { EngineEventEmitter } from '../utils/events.js';
import { ResilientChannel } from './resilient-channel.js';
import type { Source, WrapOptions } from './types.js';

export type RecoveryWrapperOptions = {
  logger?: Logger;
  events?: EngineEventEmitter;
  now?: () => number;
  random?: () => number;
};

/**
 * Creates resilient channels under one recovery policy and disposes them together
 */
export class RecoveryWrapper {
  private readonly policy: RecoveryPolicy;
  private readonly context: RecoveryWrapperOptions;
  private readonly logger: Logger;
  private readonly channels = new Set<{ dispose(): void }>();
  private sequence = 0;
  private disposed = false;

  constructor(policy: RecoveryPolicyInput, options: RecoveryWrapperOptions = {}) {
    this.policy = parseConfig(RecoveryPolicySchema, policy, 'recovery');
    this.logger = options.logger ?? createSilentLogger();
    this.context = { ...options, logger: this.logger };
  }

  /**
   * A channel leaves the wrapper once it is disposed or its source completes
   */
  wrap<T>(source: Source<T>, options: WrapOptions<T> = {}): ResilientChannel<T> {
    if (this.disposed) {
      throw new TidewatchError(ErrorCode.E_ENGINE_DISPOSED, 'Recovery wrapper has been disposed');
    }
    const id = options.id ?? `source-${++this.sequence}`;
    const entry = { dispose: () => channel.dispose() };
    this.channels.add(entry);
    const channel = new ResilientChannel(id, source, this.policy, options, {
      ...this.context,
      onDispose: () => this.channels.delete(entry)
    });
    return channel;
  }

  get size(): number {
    return this.channels.size;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const channel of [...this.channels]) {
      channel.dispose();
    }
    this.channels.clear();
  }
}
