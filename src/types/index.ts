/**
 * Core type definitions for the task failure monitor.
 */

import type { WallClock } from '../time/wallClock.js';

// ─── Enums ───────────────────────────────────────────────────────────────────

/** Last-execution results of a reload task that count as a failure. */
export type TaskFailureStatus = 'AbortInitiated' | 'Aborting' | 'FinishedFail' | 'Error';

export type DecisionAction = 'NOTIFY' | 'SUPPRESS';

/** Label shown for an occurrence that has never been notified. */
export const FIRST_TIME_LABEL = 'FIRST TIME';

/** Placeholder for values the repository service did not supply. */
export const NOT_AVAILABLE = 'N/A';

/** Recovery-report name for a task whose name never reached the history. */
export const UNKNOWN_TASK_NAME = 'Unknown Task Name';

// ─── Data Models ─────────────────────────────────────────────────────────────

/** One task's failing state at poll time, fanned out per recipient. */
export interface FailureObservation {
  taskId: string;
  taskName: string;
  /** Reported stop time as `YYYY-MM-DD HH:MM`, or null when unparsable. */
  failureTimestamp: string | null;
  status: TaskFailureStatus;
  appName: string;
  stream: string;
  executionInterval: string;
  logUrl: string;
  /** Absolute path of the script log, or empty when the task has none. */
  logFilePath: string;
  recipient: string;
}

/** An observation together with the classifier's display label. */
export interface LabelledObservation {
  observation: Readonly<FailureObservation>;
  /** `FIRST TIME`, or the minute the occurrence was last notified. */
  lastFailureLabel: string;
}

/** Durable record that an occurrence was observed and notified. */
export interface NotifiedOccurrence {
  taskId: string;
  failureTimestampMinute: string;
  taskName: string;
  notifiedAt: WallClock;
  /** Pass-through columns kept in the history for operators; never read back. */
  appName?: string;
  stream?: string;
  status?: string;
  executionInterval?: string;
}
