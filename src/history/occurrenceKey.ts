/**
 * Occurrence Key
 *
 * Identifies one failure occurrence: a task id plus the minute the task
 * reported it stopped. The repository service's stop times are not stable
 * below the minute across re-reads, so the key never carries seconds.
 *
 * @module history/occurrenceKey
 */

import { MINUTE_STRING_LENGTH } from '../time/wallClock.js';

/**
 * Reduce a reported failure timestamp to its `YYYY-MM-DD HH:MM` prefix.
 * An ISO `T` separator is normalised to a space first; values that are not
 * date-times (such as `N/A`) are trimmed and kept as they are.
 */
export function truncateTimestampToMinute(timestamp: string): string {
  const trimmed = timestamp.trim();
  const normalized = /^\d{4}-\d{2}-\d{2}T/.test(trimmed)
    ? `${trimmed.slice(0, 10)} ${trimmed.slice(11)}`
    : trimmed;
  return normalized.slice(0, MINUTE_STRING_LENGTH);
}

export class OccurrenceKey {
  /** Stable string form, used as the `Map` key. */
  readonly hash: string;

  private constructor(
    readonly taskId: string,
    readonly failureMinute: string,
  ) {
    this.hash = JSON.stringify([taskId, failureMinute]);
  }

  /** Build a key, truncating the failure timestamp to the minute. */
  static of(taskId: string, failureTimestamp: string): OccurrenceKey {
    return new OccurrenceKey(taskId, truncateTimestampToMinute(failureTimestamp));
  }

  equals(other: OccurrenceKey): boolean {
    return this.taskId === other.taskId && this.failureMinute === other.failureMinute;
  }

  toString(): string {
    return `${this.taskId}@${this.failureMinute}`;
  }
}
