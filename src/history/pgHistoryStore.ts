/**
 * PostgreSQL History Store
 *
 * Keeps the notification history in the `task_failure_notifications` table.
 * `notified_at` is a `TIMESTAMP WITHOUT TIME ZONE` holding the monitor's
 * wall-clock value; it is read back through `to_char` so the driver never
 * applies the host time zone to it.
 *
 * @module history/pgHistoryStore
 */

import { query } from '../utils/db.js';
import { createSilentLogger, toError, type Logger } from '../logging/logger.js';
import { formatWallClockSeconds } from '../time/wallClock.js';
import type { NotifiedOccurrence } from '../types/index.js';
import { emptyHistorySnapshot, type HistorySnapshot } from './historySnapshot.js';
import {
  HistoryStoreError,
  snapshotFromRawRecords,
  type HistoryStore,
  type RawHistoryRecord,
} from './historyStore.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

/** Raw row shape returned by the history query. */
interface NotificationRow {
  task_id: string | null;
  task_name: string | null;
  failure_timestamp: string | null;
  notified_at: string | null;
}

function mapRowToRawRecord(row: NotificationRow): RawHistoryRecord {
  return {
    taskId: row.task_id,
    taskName: row.task_name,
    failureTimestampMinute: row.failure_timestamp,
    notifiedAt: row.notified_at,
  };
}

const COLUMNS_PER_ROW = 8;

// ─── Factory ─────────────────────────────────────────────────────────────────

export interface PgHistoryStoreOptions {
  logger?: Logger;
}

export function createPgHistoryStore(options: PgHistoryStoreOptions = {}): HistoryStore {
  const logger = (options.logger ?? createSilentLogger()).child({ operation: 'history.pg' });

  return {
    async load(): Promise<HistorySnapshot> {
      try {
        const result = await query<NotificationRow>(
          `SELECT task_id, task_name, failure_timestamp,
                  to_char(notified_at, 'YYYY-MM-DD HH24:MI:SS') AS notified_at
           FROM task_failure_notifications
           ORDER BY id`,
        );
        return snapshotFromRawRecords(result.rows.map(mapRowToRawRecord), logger);
      } catch (err) {
        logger.error('Could not read notification history; treating as empty', toError(err));
        return emptyHistorySnapshot();
      }
    },

    async append(occurrences: readonly NotifiedOccurrence[]): Promise<void> {
      if (occurrences.length === 0) return;

      const values: unknown[] = [];
      const placeholders = occurrences.map((occurrence, i) => {
        const base = i * COLUMNS_PER_ROW;
        values.push(
          formatWallClockSeconds(occurrence.notifiedAt),
          occurrence.taskId,
          occurrence.taskName,
          occurrence.appName ?? '',
          occurrence.stream ?? '',
          occurrence.failureTimestampMinute,
          occurrence.status ?? '',
          occurrence.executionInterval ?? '',
        );
        const slots = Array.from({ length: COLUMNS_PER_ROW }, (_, j) => `$${base + j + 1}`);
        return `(${slots.join(', ')})`;
      });

      try {
        await query(
          `INSERT INTO task_failure_notifications
             (notified_at, task_id, task_name, app_name, stream, failure_timestamp, status, execution_interval)
           VALUES ${placeholders.join(', ')}`,
          values,
        );
      } catch (err) {
        throw new HistoryStoreError('Failed to insert notification history rows', err);
      }

      logger.info('Recorded notified task failures', { count: occurrences.length });
    },
  };
}
