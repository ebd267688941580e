/**
 * Failure Classifier
 *
 * Decides whether a failing task is reported in this run or suppressed as a
 * repeat of an occurrence already notified within the reminder window.
 * Every decision carries the reason it was taken so suppressions can be
 * explained from the log.
 *
 * @module monitor/failureClassifier
 */

import type { HistorySnapshot } from '../history/historySnapshot.js';
import { OccurrenceKey } from '../history/occurrenceKey.js';
import {
  formatWallClockMinute,
  MS_PER_HOUR,
  truncateToMinute,
  type WallClock,
} from '../time/wallClock.js';
import {
  FIRST_TIME_LABEL,
  NOT_AVAILABLE,
  type DecisionAction,
  type FailureObservation,
} from '../types/index.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type DecisionReason =
  | { type: 'reminder_disabled' }
  | { type: 'missing_timestamp' }
  | { type: 'first_failure' }
  | { type: 'reminder_due'; lastNotifiedAt: WallClock; elapsedMs: number }
  | {
      type: 'within_reminder_window';
      lastNotifiedAt: WallClock;
      elapsedMs: number;
      remainingMs: number;
    };

export interface FailureDecision {
  action: DecisionAction;
  reason: DecisionReason;
  /** Null when the observation has no failure timestamp to key on. */
  key: OccurrenceKey | null;
  /** `FIRST TIME`, the minute the occurrence was last notified, or `N/A`. */
  lastFailureLabel: string;
}

export interface ClassifierOptions {
  /** Hours before a still-failing occurrence is reported again; 0 reports every run. */
  reminderHours: number;
  /** Wall-clock moment of the current run. */
  now: WallClock;
}

// ─── Classification ──────────────────────────────────────────────────────────

function labelFor(lastNotifiedAt: WallClock | undefined): string {
  return lastNotifiedAt === undefined ? FIRST_TIME_LABEL : formatWallClockMinute(lastNotifiedAt);
}

export function classifyFailure(
  observation: Readonly<FailureObservation>,
  snapshot: HistorySnapshot,
  options: ClassifierOptions,
): FailureDecision {
  if (observation.failureTimestamp === null) {
    return {
      action: 'NOTIFY',
      reason: options.reminderHours === 0 ? { type: 'reminder_disabled' } : { type: 'missing_timestamp' },
      key: null,
      lastFailureLabel: NOT_AVAILABLE,
    };
  }

  const key = OccurrenceKey.of(observation.taskId, observation.failureTimestamp);
  const lastNotifiedAt = snapshot.lastNotifiedAt(key);
  const lastFailureLabel = labelFor(lastNotifiedAt);

  if (options.reminderHours === 0) {
    return { action: 'NOTIFY', reason: { type: 'reminder_disabled' }, key, lastFailureLabel };
  }

  if (lastNotifiedAt === undefined) {
    return { action: 'NOTIFY', reason: { type: 'first_failure' }, key, lastFailureLabel };
  }

  // Whole minutes on both sides: a run stamped 08:00:30 is due again at 10:00:00 for a 2 h window
  const elapsedMs = truncateToMinute(options.now) - truncateToMinute(lastNotifiedAt);
  const reminderMs = options.reminderHours * MS_PER_HOUR;

  if (elapsedMs >= reminderMs) {
    return {
      action: 'NOTIFY',
      reason: { type: 'reminder_due', lastNotifiedAt, elapsedMs },
      key,
      lastFailureLabel,
    };
  }

  return {
    action: 'SUPPRESS',
    reason: {
      type: 'within_reminder_window',
      lastNotifiedAt,
      elapsedMs,
      remainingMs: reminderMs - elapsedMs,
    },
    key,
    lastFailureLabel,
  };
}

/**
 * Classify a batch. Observations of the same occurrence fanned out to
 * several recipients share one decision object; the recipient is not part
 * of the key.
 */
export function classifyFailures(
  observations: readonly Readonly<FailureObservation>[],
  snapshot: HistorySnapshot,
  options: ClassifierOptions,
): FailureDecision[] {
  const byKey = new Map<string, FailureDecision>();
  return observations.map((observation) => {
    if (observation.failureTimestamp === null) {
      return classifyFailure(observation, snapshot, options);
    }
    const hash = OccurrenceKey.of(observation.taskId, observation.failureTimestamp).hash;
    const cached = byKey.get(hash);
    if (cached) return cached;
    const decision = classifyFailure(observation, snapshot, options);
    byKey.set(hash, decision);
    return decision;
  });
}

/** One-line explanation of a decision, for the run log. */
export function describeDecision(decision: FailureDecision): string {
  const { reason } = decision;
  switch (reason.type) {
    case 'reminder_disabled':
      return 'reminders disabled; every failing run is reported';
    case 'missing_timestamp':
      return 'no failure timestamp; reported without deduplication';
    case 'first_failure':
      return 'first notification for this failure';
    case 'reminder_due':
      return (
        `reminder due: last notified ${formatWallClockMinute(reason.lastNotifiedAt)}, ` +
        `${(reason.elapsedMs / MS_PER_HOUR).toFixed(2)} h ago`
      );
    case 'within_reminder_window':
      return (
        `already notified at ${formatWallClockMinute(reason.lastNotifiedAt)}; ` +
        `next reminder in ${(reason.remainingMs / MS_PER_HOUR).toFixed(2)} h`
      );
  }
}
