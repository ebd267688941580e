/**
 * Smoke tests for the fast-check arbitraries.
 *
 * Verifies that the test data generators produce values matching the
 * formats the monitor expects.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { parseWallClock } from '../time/wallClock.js';
import {
  failureMinuteArb,
  failureObservationArb,
  notifiedOccurrenceArb,
  wallClockArb,
} from './arbitraries.js';

describe('test arbitraries', () => {
  it('failureMinuteArb generates parsable minute strings', () => {
    fc.assert(
      fc.property(failureMinuteArb, (minute) => {
        expect(minute).toHaveLength(16);
        expect(parseWallClock(minute)).not.toBeNull();
      }),
      { numRuns: 50 },
    );
  });

  it('wallClockArb generates whole seconds', () => {
    fc.assert(
      fc.property(wallClockArb, (value) => {
        expect(value % 1000).toBe(0);
      }),
      { numRuns: 50 },
    );
  });

  it('record arbitraries carry the required fields', () => {
    fc.assert(
      fc.property(notifiedOccurrenceArb, failureObservationArb, (occurrence, observation) => {
        expect(occurrence.taskId).not.toBe('');
        expect(observation.failureTimestamp).not.toBeNull();
        expect(observation.recipient).toContain('@');
      }),
      { numRuns: 50 },
    );
  });
});
