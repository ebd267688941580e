/**
 * Property-based tests for the run orchestrator.
 *
 * Exercises classification and recording over generated failing sets and
 * histories.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { createInMemoryHistoryStore } from '../history/historyStore.js';
import { failureObservationArb, notifiedOccurrenceArb } from '../test/arbitraries.js';
import { createRunOrchestrator } from './runOrchestrator.js';

const RUN_AT = Date.UTC(2027, 0, 1, 12, 0, 0);

describe('Run orchestration properties', () => {
  it('a repeated run within the window notifies nothing new', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(notifiedOccurrenceArb, { maxLength: 10 }),
        fc.array(failureObservationArb, { minLength: 1, maxLength: 10 }),
        fc.integer({ min: 1, max: 72 }),
        async (history, observations, reminderHours) => {
          const store = createInMemoryHistoryStore(history);
          const orchestrator = createRunOrchestrator({
            store,
            reminderHours,
            timeBasis: 'utc',
            now: () => RUN_AT,
          });

          await orchestrator.run(observations);
          const again = await orchestrator.run(observations);

          expect(again.notifyBatch).toEqual([]);
          expect(again.suppressed).toHaveLength(observations.length);
        },
      ),
      { numRuns: 100 },
    );
  });

  it('appends exactly one record per notify-batch member', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(notifiedOccurrenceArb, { maxLength: 10 }),
        fc.array(failureObservationArb, { maxLength: 10 }),
        async (history, observations) => {
          const store = createInMemoryHistoryStore(history);
          const result = await createRunOrchestrator({
            store,
            reminderHours: 24,
            timeBasis: 'utc',
            now: () => RUN_AT,
          }).run(observations);

          expect(store.records).toHaveLength(history.length + result.notifyBatch.length);
          expect(result.notifyBatch.length + result.suppressed.length).toBe(observations.length);
          for (const record of store.records.slice(history.length)) {
            expect(record.notifiedAt).toBe(RUN_AT);
          }
        },
      ),
      { numRuns: 100 },
    );
  });

  it('notifies everything once the whole history is older than the window', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(notifiedOccurrenceArb, { maxLength: 10 }),
        fc.array(failureObservationArb, { maxLength: 10 }),
        async (history, observations) => {
          // Generated history ends on 2027-01-01 00:00, twelve hours before the run.
          const result = await createRunOrchestrator({
            store: createInMemoryHistoryStore(history),
            reminderHours: 12,
            timeBasis: 'utc',
            now: () => RUN_AT,
          }).run(observations);

          expect(result.notifyBatch).toHaveLength(observations.length);
        },
      ),
      { numRuns: 100 },
    );
  });
});
