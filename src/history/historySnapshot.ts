/**
 * History Snapshot
 *
 * Per-run, read-only view of the notification history: the latest
 * notification moment of every occurrence key, and the last task name seen
 * for every task id. Built once from the full log and discarded at the end of
 * the run.
 *
 * @module history/historySnapshot
 */

import type { NotifiedOccurrence } from '../types/index.js';
import type { WallClock } from '../time/wallClock.js';
import { OccurrenceKey } from './occurrenceKey.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SnapshotEntry {
  key: OccurrenceKey;
  notifiedAt: WallClock;
}

export interface HistorySnapshot {
  /** Number of distinct occurrence keys. */
  readonly size: number;
  /** Latest notification moment for the key, if it was ever notified. */
  lastNotifiedAt(key: OccurrenceKey): WallClock | undefined;
  /** Last task name recorded for the id. */
  taskName(taskId: string): string | undefined;
  /** Most recent notification moment anywhere in the history. */
  latestNotifiedAt(): WallClock | undefined;
  entries(): readonly SnapshotEntry[];
}

// ─── Implementation ──────────────────────────────────────────────────────────

/**
 * Compact a sequence of records into a snapshot. Records sharing a key keep
 * the later `notifiedAt`; task names follow record order, so the last name
 * written wins.
 */
export function buildHistorySnapshot(records: Iterable<NotifiedOccurrence>): HistorySnapshot {
  const latest = new Map<string, SnapshotEntry>();
  const names = new Map<string, string>();

  for (const record of records) {
    const key = OccurrenceKey.of(record.taskId, record.failureTimestampMinute);
    const existing = latest.get(key.hash);
    if (!existing || record.notifiedAt > existing.notifiedAt) {
      latest.set(key.hash, { key, notifiedAt: record.notifiedAt });
    }
    if (record.taskName) {
      names.set(record.taskId, record.taskName);
    }
  }

  const entries = Object.freeze([...latest.values()].map((e) => Object.freeze({ ...e })));
  let newest: WallClock | undefined;
  for (const entry of entries) {
    if (newest === undefined || entry.notifiedAt > newest) newest = entry.notifiedAt;
  }

  return {
    size: entries.length,
    lastNotifiedAt: (key) => latest.get(key.hash)?.notifiedAt,
    taskName: (taskId) => names.get(taskId),
    latestNotifiedAt: () => newest,
    entries: () => entries,
  };
}

/** Snapshot of a store that has never recorded anything. */
export function emptyHistorySnapshot(): HistorySnapshot {
  return buildHistorySnapshot([]);
}
