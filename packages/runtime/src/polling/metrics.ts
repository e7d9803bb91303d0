/**
 * Polling metrics: per-session counters, a bounded activity history and
 * totals across every session run since the last clear
 */

import type { ActivityKind, ActivityRecord } from '@tidewatch/core';
import type { OverallPollingStats, PollingMetrics } from './types.js';

export const ACTIVITY_HISTORY_LIMIT = 100;
export const ENDED_SESSIONS_LIMIT = 100;
const RECENT_INTERVALS_LIMIT = 20;

type SessionMetrics = PollingMetrics & { recentIntervals: number[] };

type Totals = {
  sessions: number;
  attempts: number;
  successes: number;
  errors: number;
};

export class PollingMetricsTracker {
  private readonly sessions = new Map<string, SessionMetrics>();
  // Most recently ended last; counters already folded into `retired`
  private readonly ended = new Map<string, SessionMetrics>();
  private readonly history: ActivityRecord[] = [];
  private retired: Totals = { sessions: 0, attempts: 0, successes: 0, errors: 0 };

  /**
   * Start counting a new session for `jobId`. The previous session's counters for
   * the same job move into the retired totals.
   */
  begin(jobId: string, interval: number, at: number): void {
    const previous = this.sessions.get(jobId);
    if (previous) {
      this.retire(previous);
    }
    this.ended.delete(jobId);
    this.sessions.set(jobId, {
      jobId,
      attempts: 0,
      successes: 0,
      errors: 0,
      currentInterval: interval,
      averageInterval: interval,
      startedAt: at,
      activityCounts: {},
      recentIntervals: [interval]
    });
  }

  recordOutcome(jobId: string, kind: ActivityKind, interval: number, at: number): void {
    const metrics = this.sessions.get(jobId);
    if (!metrics) return;

    metrics.attempts += 1;
    if (kind === 'errored') {
      metrics.errors += 1;
    } else {
      metrics.successes += 1;
    }
    this.recordActivity(jobId, kind, interval, at);
  }

  /**
   * Activity without a tick (an external hint)
   */
  recordActivity(jobId: string, kind: ActivityKind, interval: number, at: number): void {
    const metrics = this.sessions.get(jobId);
    if (!metrics) return;

    metrics.lastActivity = kind;
    metrics.lastActivityAt = at;
    metrics.activityCounts[kind] = (metrics.activityCounts[kind] ?? 0) + 1;
    metrics.currentInterval = interval;
    metrics.recentIntervals.push(interval);
    if (metrics.recentIntervals.length > RECENT_INTERVALS_LIMIT) {
      metrics.recentIntervals.shift();
    }
    metrics.averageInterval = Math.round(
      metrics.recentIntervals.reduce((sum, value) => sum + value, 0) /
        metrics.recentIntervals.length
    );

    this.history.push({ jobId, kind, at });
    if (this.history.length > ACTIVITY_HISTORY_LIMIT) {
      this.history.shift();
    }
  }

  /**
   * Close the live session of `jobId`. Its counters join the retired totals and
   * its metrics stay readable among the last `ENDED_SESSIONS_LIMIT` ended sessions.
   */
  end(jobId: string, at: number): void {
    const metrics = this.sessions.get(jobId);
    if (!metrics) return;

    metrics.endedAt = at;
    this.sessions.delete(jobId);
    this.retire(metrics);
    this.ended.set(jobId, metrics);
    if (this.ended.size > ENDED_SESSIONS_LIMIT) {
      const [oldest] = this.ended.keys();
      if (oldest !== undefined) this.ended.delete(oldest);
    }
  }

  /**
   * Sessions currently held, live and recently ended
   */
  get size(): number {
    return this.sessions.size + this.ended.size;
  }

  get(jobId: string): PollingMetrics | undefined {
    const metrics = this.sessions.get(jobId) ?? this.ended.get(jobId);
    if (!metrics) return undefined;
    const { recentIntervals: _recent, ...snapshot } = metrics;
    return { ...snapshot, activityCounts: { ...snapshot.activityCounts } };
  }

  recent(jobId: string, since?: number): ActivityRecord[] {
    return this.history.filter(
      (record) => record.jobId === jobId && (since === undefined || record.at >= since)
    );
  }

  overall(activeSessions: number): OverallPollingStats {
    const totals = { ...this.retired };
    for (const metrics of this.sessions.values()) {
      totals.sessions += 1;
      totals.attempts += metrics.attempts;
      totals.successes += metrics.successes;
      totals.errors += metrics.errors;
    }

    return {
      totalSessions: totals.sessions,
      activeSessions,
      totalAttempts: totals.attempts,
      totalSuccesses: totals.successes,
      totalErrors: totals.errors,
      successRate: totals.attempts > 0 ? totals.successes / totals.attempts : 0,
      errorRate: totals.attempts > 0 ? totals.errors / totals.attempts : 0
    };
  }

  clear(): void {
    this.sessions.clear();
    this.ended.clear();
    this.history.length = 0;
    this.retired = { sessions: 0, attempts: 0, successes: 0, errors: 0 };
  }

  private retire(metrics: SessionMetrics): void {
    this.retired.sessions += 1;
    this.retired.attempts += metrics.attempts;
    this.retired.successes += metrics.successes;
    this.retired.errors += metrics.errors;
  }
}
