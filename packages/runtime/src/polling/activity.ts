import { isDeepStrictEqual } from 'node:util';
import { type ActivityClassifier, ActivityKind, isFreshActivity } from '@tidewatch/core';

/**
 * Equality-based classification: first observation and any difference count as
 * a status change, an identical value as no change
 */
export function equalityClassifier<T>(): ActivityClassifier<T> {
  let observed = false;
  return (previous, next) => {
    if (!observed) {
      observed = true;
      return ActivityKind.STATUS_CHANGED;
    }
    return isDeepStrictEqual(previous, next) ? ActivityKind.NO_CHANGE : ActivityKind.STATUS_CHANGED;
  };
}

export type IntervalPolicy = {
  minInterval: number;
  maxInterval: number;
  inactivityThreshold: number;
  growthFactor: number;
};

export type IntervalState = {
  currentInterval: number;
  consecutiveNoChange: number;
};

function grow(interval: number, policy: IntervalPolicy): number {
  return Math.min(policy.maxInterval, Math.ceil(interval * policy.growthFactor));
}

/**
 * Next cadence after observing `kind`.
 *
 * Fresh activity snaps back to `minInterval`. `noChange` grows the interval only
 * once the run of unchanged ticks exceeds `inactivityThreshold`. `errored`
 * always grows it.
 */
export function adjustInterval(
  state: IntervalState,
  kind: ActivityKind,
  policy: IntervalPolicy
): IntervalState {
  if (isFreshActivity(kind)) {
    return { currentInterval: policy.minInterval, consecutiveNoChange: 0 };
  }

  if (kind === ActivityKind.NO_CHANGE) {
    const consecutiveNoChange = state.consecutiveNoChange + 1;
    return {
      consecutiveNoChange,
      currentInterval:
        consecutiveNoChange > policy.inactivityThreshold
          ? grow(state.currentInterval, policy)
          : state.currentInterval
    };
  }

  return {
    consecutiveNoChange: state.consecutiveNoChange,
    currentInterval: grow(state.currentInterval, policy)
  };
}
