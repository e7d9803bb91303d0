export { adjustInterval, equalityClassifier, type IntervalPolicy, type IntervalState } from './activity.js';
export { fromResultFetch } from './fetch.js';
export { ACTIVITY_HISTORY_LIMIT, PollingMetricsTracker } from './metrics.js';
export { PollingScheduler, type PollingSchedulerOptions } from './scheduler.js';
export {
  type FetchOperation,
  type OverallPollingStats,
  type PollingExit,
  PollingExitReason,
  type PollingHandle,
  type PollingMetrics,
  type PollingOptions,
  type PollingValue
} from './types.js';
