/**
 * History Store
 *
 * Durable owner of notified occurrences across runs. A run calls `load()`
 * once at the start and `append()` at most once at the end; no two runs may
 * share a store concurrently.
 *
 * @module history/historyStore
 */

import type { Logger } from '../logging/logger.js';
import { parseWallClock } from '../time/wallClock.js';
import type { NotifiedOccurrence } from '../types/index.js';
import { buildHistorySnapshot, type HistorySnapshot } from './historySnapshot.js';
import { truncateTimestampToMinute } from './occurrenceKey.js';

export interface HistoryStore {
  /**
   * Read every stored record and compact it into a snapshot. Missing storage
   * yields an empty snapshot; malformed records are skipped.
   */
  load(): Promise<HistorySnapshot>;
  /** Add one record per occurrence without touching earlier records. */
  append(occurrences: readonly NotifiedOccurrence[]): Promise<void>;
}

/**
 * Raw, not yet validated record as read from storage. Field names follow the
 * domain model; adapters translate their own column names into this shape.
 */
export interface RawHistoryRecord {
  taskId?: string | null;
  taskName?: string | null;
  failureTimestampMinute?: string | null;
  notifiedAt?: string | null;
}

export type HistoryRecordParseResult =
  | { ok: true; record: NotifiedOccurrence }
  | { ok: false; reason: string };

/** Thrown by a store whose `append()` could not persist the batch. */
export class HistoryStoreError extends Error {
  public readonly code = 'HISTORY_STORE_ERROR';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'HistoryStoreError';
  }
}

// ─── Record Validation ───────────────────────────────────────────────────────

/**
 * Validate one raw record. The notification time must be
 * `YYYY-MM-DD HH:MM:SS`; the failure timestamp is only truncated, never
 * parsed, so placeholder values such as `N/A` are kept as keys. A missing
 * task name becomes `''`, which the snapshot treats as unnamed, so recovery
 * reports fall back to `Unknown Task Name`.
 */
export function parseHistoryRecord(raw: RawHistoryRecord): HistoryRecordParseResult {
  const taskId = raw.taskId?.trim();
  const failureTimestamp = raw.failureTimestampMinute?.trim();
  const notifiedAtText = raw.notifiedAt?.trim();

  if (!taskId) return { ok: false, reason: 'missing task id' };
  if (!failureTimestamp) return { ok: false, reason: 'missing failure timestamp' };
  if (!notifiedAtText) return { ok: false, reason: 'missing notification time' };

  const notifiedAt = parseWallClock(notifiedAtText);
  if (notifiedAt === null) {
    return { ok: false, reason: `unparsable notification time "${notifiedAtText}"` };
  }

  return {
    ok: true,
    record: {
      taskId,
      failureTimestampMinute: truncateTimestampToMinute(failureTimestamp),
      taskName: raw.taskName?.trim() ?? '',
      notifiedAt,
    },
  };
}

/**
 * Validate raw records and compact the valid ones into a snapshot.
 * Invalid records are skipped with a warning naming their position.
 */
export function snapshotFromRawRecords(
  rows: Iterable<RawHistoryRecord>,
  logger: Logger,
): HistorySnapshot {
  const records: NotifiedOccurrence[] = [];
  let index = 0;
  let skipped = 0;

  for (const row of rows) {
    index++;
    const result = parseHistoryRecord(row);
    if (result.ok) {
      records.push(result.record);
    } else {
      skipped++;
      logger.warn('Skipping malformed history record', { record: index, reason: result.reason });
    }
  }

  const snapshot = buildHistorySnapshot(records);
  logger.info('Loaded notification history', {
    records: records.length,
    skipped,
    occurrences: snapshot.size,
  });
  return snapshot;
}

// ─── In-Memory Store (for tests and dry runs) ───────────────────────────────

/** A store that keeps records in an array, exposed for inspection. */
export function createInMemoryHistoryStore(
  initial: readonly NotifiedOccurrence[] = [],
): HistoryStore & { records: NotifiedOccurrence[] } {
  const records: NotifiedOccurrence[] = initial.map((r) => ({ ...r }));
  return {
    records,
    async load(): Promise<HistorySnapshot> {
      return buildHistorySnapshot(records);
    },
    async append(occurrences: readonly NotifiedOccurrence[]): Promise<void> {
      for (const occurrence of occurrences) {
        records.push({ ...occurrence });
      }
    },
  };
}
