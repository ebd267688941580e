/**
 * Fast-check arbitraries for property-based testing.
 *
 * Reusable generators for task ids, wall-clock moments, failure observations
 * and history records, shared by the history and monitor property tests.
 *
 * @module test/arbitraries
 */

import fc from 'fast-check';
import { formatWallClockMinute, MS_PER_MINUTE } from '../time/wallClock.js';
import type {
  FailureObservation,
  NotifiedOccurrence,
  TaskFailureStatus,
} from '../types/index.js';

// ─── Identifiers ────────────────────────────────────────────────────────────

/** Arbitrary that generates a UUID string, as the repository service uses for task ids. */
export const taskIdArb: fc.Arbitrary<string> = fc.uuid();

/** A small pool of task ids, so generated histories share keys. */
export const pooledTaskIdArb: fc.Arbitrary<string> = fc.constantFrom(
  'task-a',
  'task-b',
  'task-c',
  'task-d',
);

export const taskNameArb: fc.Arbitrary<string> = fc.stringMatching(/^[A-Za-z][A-Za-z0-9 _-]{0,23}$/);

export const recipientArb: fc.Arbitrary<string> = fc.constantFrom(
  'ops@example.com',
  'bi-team@example.com',
  'owner@example.com',
);

export const statusArb: fc.Arbitrary<TaskFailureStatus> = fc.constantFrom<TaskFailureStatus>(
  'AbortInitiated',
  'Aborting',
  'FinishedFail',
  'Error',
);

// ─── Time ───────────────────────────────────────────────────────────────────

const RANGE_START = Date.UTC(2025, 0, 1);
const RANGE_END = Date.UTC(2027, 0, 1);

/** Whole-second wall-clock values within 2025–2026. */
export const wallClockArb: fc.Arbitrary<number> = fc
  .integer({ min: RANGE_START / 1000, max: RANGE_END / 1000 })
  .map((seconds) => seconds * 1000);

/** `YYYY-MM-DD HH:MM` strings from a narrow pool of minutes. */
export const failureMinuteArb: fc.Arbitrary<string> = fc
  .integer({ min: 0, max: 5 })
  .map((offset) => formatWallClockMinute(Date.UTC(2026, 2, 1, 8, 0) + offset * MS_PER_MINUTE));

// ─── Records ────────────────────────────────────────────────────────────────

export const notifiedOccurrenceArb: fc.Arbitrary<NotifiedOccurrence> = fc.record({
  taskId: pooledTaskIdArb,
  failureTimestampMinute: failureMinuteArb,
  taskName: taskNameArb,
  notifiedAt: wallClockArb,
});

export const failureObservationArb: fc.Arbitrary<FailureObservation> = fc.record({
  taskId: pooledTaskIdArb,
  taskName: taskNameArb,
  failureTimestamp: failureMinuteArb,
  status: statusArb,
  appName: fc.constantFrom('Sales', 'Finance'),
  stream: fc.constantFrom('Everyone', 'Monitoring'),
  executionInterval: fc.constantFrom('1 hour', '1 day'),
  logUrl: fc.constant('N/A'),
  logFilePath: fc.constant(''),
  recipient: recipientArb,
});
