export { healthAfterError, healthAfterValue, initialHealth } from './health.js';
export { ResilientChannel, type ResilientChannelContext } from './resilient-channel.js';
export { fromAsyncIterable, fromPolling } from './sources.js';
export type {
  ChannelObserver,
  HealthListener,
  RecoveryStats,
  Source,
  SourceSink,
  Unsubscribe,
  WrapOptions
} from './types.js';
export { RecoveryWrapper, type RecoveryWrapperOptions } from './wrapper.js';
