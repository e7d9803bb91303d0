import type { ActivityClassifier, ActivityKind, ClassifiedFailure } from '@tidewatch/core';

/**
 * Status fetch supplied by the caller. Throws (or rejects) on failure; the
 * signal aborts when the attempt is cancelled or times out.
 */
export type FetchOperation<T> = (signal: AbortSignal) => Promise<T>;

/**
 * What `onValue` receives on each tick
 */
export type PollingValue<T> =
  | { ok: true; value: T; activity: ActivityKind }
  | { ok: false; error: ClassifiedFailure };

export type PollingOptions<T> = {
  /** Derives the activity between two observations; deep equality by default */
  classifyActivity?: ActivityClassifier<T>;

  /** A value for which this returns true ends the session after `onTerminal` */
  isTerminal?: (value: T) => boolean;

  /** Overall deadline for the session (ms), overriding the policy's */
  sessionTimeout?: number;

  /** Deadline for each fetch attempt (ms), overriding the retry policy's */
  attemptTimeout?: number;
};

export const PollingExitReason = {
  STOPPED: 'stopped',
  TERMINAL: 'terminal',
  TIMEOUT: 'timeout',
  DISPOSED: 'disposed',
  REPLACED: 'replaced'
} as const;

export type PollingExitReason = (typeof PollingExitReason)[keyof typeof PollingExitReason];

export type PollingExit = {
  jobId: string;
  reason: PollingExitReason;
};

export type PollingHandle = {
  readonly jobId: string;
  stop(): void;
  /** Settles once the session has ended, whatever the reason */
  readonly done: Promise<PollingExit>;
};

export type PollingMetrics = {
  jobId: string;
  attempts: number;
  successes: number;
  errors: number;
  currentInterval: number;
  /** Mean of the last 20 intervals scheduled */
  averageInterval: number;
  lastActivity?: ActivityKind;
  lastActivityAt?: number;
  startedAt: number;
  endedAt?: number;
  activityCounts: Partial<Record<ActivityKind, number>>;
};

export type OverallPollingStats = {
  totalSessions: number;
  activeSessions: number;
  totalAttempts: number;
  totalSuccesses: number;
  totalErrors: number;
  successRate: number;
  errorRate: number;
};
