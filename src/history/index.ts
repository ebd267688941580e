/**
 * History Module
 *
 * Durable notification history and the per-run snapshot built from it.
 */

export { OccurrenceKey, truncateTimestampToMinute } from './occurrenceKey.js';

export {
  buildHistorySnapshot,
  emptyHistorySnapshot,
  type HistorySnapshot,
  type SnapshotEntry,
} from './historySnapshot.js';

export {
  createInMemoryHistoryStore,
  parseHistoryRecord,
  snapshotFromRawRecords,
  HistoryStoreError,
  type HistoryStore,
  type HistoryRecordParseResult,
  type RawHistoryRecord,
} from './historyStore.js';

export {
  createCsvHistoryStore,
  parseHistoryCsv,
  CSV_HISTORY_COLUMNS,
  type CsvHistoryStoreOptions,
} from './csvHistoryStore.js';

export { createPgHistoryStore, type PgHistoryStoreOptions } from './pgHistoryStore.js';
