/**
 * Activity observed between two successive status snapshots of a job
 */
export const ActivityKind = {
  STATUS_CHANGED: 'statusChanged',
  DATA_UPDATED: 'dataUpdated',
  WAIT_TRIGGERED: 'waitTriggered',
  NO_CHANGE: 'noChange',
  ERRORED: 'errored'
} as const;

export type ActivityKind = (typeof ActivityKind)[keyof typeof ActivityKind];

/**
 * Kinds that count as fresh activity and pull the polling interval back to its minimum
 */
export function isFreshActivity(kind: ActivityKind): boolean {
  return (
    kind === ActivityKind.STATUS_CHANGED ||
    kind === ActivityKind.DATA_UPDATED ||
    kind === ActivityKind.WAIT_TRIGGERED
  );
}

/**
 * Caller hook deciding what changed between two observations.
 * `previous` is undefined for the first observation of a session.
 */
export type ActivityClassifier<T> = (previous: T | undefined, next: T) => ActivityKind;

export type ActivityRecord = {
  jobId: string;
  kind: ActivityKind;
  at: number;
};
