/**
 * CSV History Store
 *
 * Keeps the notification history in an append-only CSV file, one row per
 * notified observation. Columns are read by header name, so files with extra
 * or reordered columns load unchanged.
 *
 * @module history/csvHistoryStore
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
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

// ─── File Layout ─────────────────────────────────────────────────────────────

export const CSV_HISTORY_COLUMNS = [
  'Run Time',
  'Task ID',
  'Task Name',
  'App Name',
  'Stream',
  'Timestamp',
  'Status',
  'Execution Interval',
] as const;

export interface CsvHistoryStoreOptions {
  filePath: string;
  logger?: Logger;
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function cell(row: Record<string, unknown>, column: string): string | undefined {
  const value = row[column];
  return typeof value === 'string' ? value : undefined;
}

function toRawRecord(row: Record<string, unknown>): RawHistoryRecord {
  return {
    notifiedAt: cell(row, 'Run Time'),
    taskId: cell(row, 'Task ID'),
    taskName: cell(row, 'Task Name'),
    failureTimestampMinute: cell(row, 'Timestamp'),
  };
}

function toCsvRow(occurrence: NotifiedOccurrence): string[] {
  return [
    formatWallClockSeconds(occurrence.notifiedAt),
    occurrence.taskId,
    occurrence.taskName,
    occurrence.appName ?? '',
    occurrence.stream ?? '',
    occurrence.failureTimestampMinute,
    occurrence.status ?? '',
    occurrence.executionInterval ?? '',
  ];
}

/** Parse CSV text into header-keyed rows. */
export function parseHistoryCsv(content: string): Record<string, unknown>[] {
  const rows: unknown = parse(content, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(rows)) return [];
  return rows.filter(
    (row): row is Record<string, unknown> => typeof row === 'object' && row !== null,
  );
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createCsvHistoryStore(options: CsvHistoryStoreOptions): HistoryStore {
  const { filePath } = options;
  const logger = (options.logger ?? createSilentLogger()).child({ operation: 'history.csv' });

  async function needsHeader(): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.size === 0;
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return true;
      throw err;
    }
  }

  return {
    async load(): Promise<HistorySnapshot> {
      let content: string;
      try {
        content = await fs.readFile(filePath, 'utf-8');
      } catch (err) {
        if (isErrnoCode(err, 'ENOENT')) {
          logger.info('No notification history file found', { filePath });
        } else {
          logger.error('Could not read notification history; treating as empty', toError(err), {
            filePath,
          });
        }
        return emptyHistorySnapshot();
      }

      let rows: Record<string, unknown>[];
      try {
        rows = parseHistoryCsv(content);
      } catch (err) {
        logger.error('Notification history is not valid CSV; treating as empty', toError(err), {
          filePath,
        });
        return emptyHistorySnapshot();
      }

      return snapshotFromRawRecords(rows.map(toRawRecord), logger);
    },

    async append(occurrences: readonly NotifiedOccurrence[]): Promise<void> {
      if (occurrences.length === 0) return;

      try {
        const header = await needsHeader();
        const rows: string[][] = occurrences.map(toCsvRow);
        if (header) rows.unshift([...CSV_HISTORY_COLUMNS]);

        await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
        await fs.appendFile(filePath, stringify(rows), 'utf-8');
      } catch (err) {
        throw new HistoryStoreError(`Failed to append to history file ${filePath}`, err);
      }

      logger.info('Recorded notified task failures', { filePath, count: occurrences.length });
    },
  };
}
