import { describe, it, expect, vi } from 'vitest';
import { createInMemoryHistoryStore, HistoryStoreError, type HistoryStore } from '../history/historyStore.js';
import { createLogger, type LogEntry } from '../logging/logger.js';
import { MS_PER_HOUR } from '../time/wallClock.js';
import type { FailureObservation, NotifiedOccurrence } from '../types/index.js';
import { createRunOrchestrator } from './runOrchestrator.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

const RUN_AT = Date.UTC(2026, 2, 1, 9, 0, 30);

function makeObservation(overrides: Partial<FailureObservation> = {}): FailureObservation {
  return {
    taskId: 'task-1',
    taskName: 'Reload Sales',
    failureTimestamp: '2026-03-01 08:55',
    status: 'FinishedFail',
    appName: 'Sales',
    stream: 'Everyone',
    executionInterval: '1 hour',
    logUrl: 'N/A',
    logFilePath: '',
    recipient: 'ops@example.com',
    ...overrides,
  };
}

function makeRecord(overrides: Partial<NotifiedOccurrence> = {}): NotifiedOccurrence {
  return {
    taskId: 'task-1',
    failureTimestampMinute: '2026-03-01 08:55',
    taskName: 'Reload Sales',
    notifiedAt: Date.UTC(2026, 2, 1, 8, 0, 0),
    ...overrides,
  };
}

function orchestrator(store: HistoryStore, reminderHours = 24, now = RUN_AT) {
  const entries: LogEntry[] = [];
  const logger = createLogger({ output: (e) => entries.push(e), now: () => now });
  return {
    entries,
    run: createRunOrchestrator({ store, reminderHours, timeBasis: 'utc', now: () => now, logger }).run,
  };
}

// ─── Construction ────────────────────────────────────────────────────────────

describe('createRunOrchestrator', () => {
  it('rejects a negative reminder window', () => {
    expect(() =>
      createRunOrchestrator({ store: createInMemoryHistoryStore(), reminderHours: -1, timeBasis: 'utc' }),
    ).toThrow('reminderHours must be a non-negative number, got -1');
  });

  it('rejects a non-finite reminder window', () => {
    expect(() =>
      createRunOrchestrator({
        store: createInMemoryHistoryStore(),
        reminderHours: Number.NaN,
        timeBasis: 'utc',
      }),
    ).toThrow('reminderHours must be a non-negative number');
  });
});

// ─── Run ─────────────────────────────────────────────────────────────────────

describe('run', () => {
  it('notifies a first failure and records it with the run time', async () => {
    const store = createInMemoryHistoryStore();
    const { run } = orchestrator(store);

    const result = await run([makeObservation()]);

    expect(result.notifyBatch).toEqual([
      { observation: makeObservation(), lastFailureLabel: 'FIRST TIME' },
    ]);
    expect(result.notifiedAt).toBe(RUN_AT);
    expect(result.historyWritten).toBe(true);
    expect(store.records).toEqual([
      {
        taskId: 'task-1',
        failureTimestampMinute: '2026-03-01 08:55',
        taskName: 'Reload Sales',
        notifiedAt: RUN_AT,
        appName: 'Sales',
        stream: 'Everyone',
        status: 'FinishedFail',
        executionInterval: '1 hour',
      },
    ]);
  });

  it('suppresses the occurrence on the next run and writes nothing', async () => {
    const store = createInMemoryHistoryStore();
    await orchestrator(store).run([makeObservation()]);
    const append = vi.spyOn(store, 'append');

    const second = await orchestrator(store, 24, RUN_AT + 5 * 60_000).run([makeObservation()]);

    expect(second.notifyBatch).toEqual([]);
    expect(second.suppressed).toHaveLength(1);
    expect(second.suppressed[0]?.decision.reason.type).toBe('within_reminder_window');
    expect(append).not.toHaveBeenCalled();
    expect(store.records).toHaveLength(1);
  });

  it('sends a reminder once the window has elapsed, labelled with the last send time', async () => {
    const store = createInMemoryHistoryStore([makeRecord()]);

    const result = await orchestrator(store, 1).run([makeObservation()]);

    expect(result.notifyBatch[0]?.lastFailureLabel).toBe('2026-03-01 08:00');
    expect(result.decisions[0]?.reason.type).toBe('reminder_due');
    expect(store.records).toHaveLength(2);
  });

  it('notifies every run when reminders are disabled', async () => {
    const store = createInMemoryHistoryStore([makeRecord({ notifiedAt: RUN_AT - 60_000 })]);

    const result = await orchestrator(store, 0).run([makeObservation()]);

    expect(result.notifyBatch).toHaveLength(1);
    expect(result.decisions[0]?.reason).toEqual({ type: 'reminder_disabled' });
  });

  it('records one row per recipient of a fanned-out failure', async () => {
    const store = createInMemoryHistoryStore();

    const result = await orchestrator(store).run([
      makeObservation({ recipient: 'ops@example.com' }),
      makeObservation({ recipient: 'owner@example.com' }),
    ]);

    expect(result.notifyBatch.map((n) => n.observation.recipient)).toEqual([
      'ops@example.com',
      'owner@example.com',
    ]);
    expect(store.records).toHaveLength(2);
  });

  it('records a failure without a timestamp under N/A and notifies it again next run', async () => {
    const store = createInMemoryHistoryStore();
    const observation = makeObservation({ failureTimestamp: null });

    await orchestrator(store).run([observation]);
    const second = await orchestrator(store, 24, RUN_AT + 60_000).run([observation]);

    expect(store.records[0]?.failureTimestampMinute).toBe('N/A');
    expect(second.notifyBatch).toEqual([{ observation, lastFailureLabel: 'N/A' }]);
  });

  it('detects recoveries against the history as it was before this run', async () => {
    const lastRun = Date.UTC(2026, 2, 1, 8, 0, 0);
    const store = createInMemoryHistoryStore([
      makeRecord({ taskId: 'task-1', notifiedAt: lastRun }),
      makeRecord({ taskId: 'task-2', taskName: 'Reload Finance', notifiedAt: lastRun }),
    ]);

    const result = await orchestrator(store).run([
      makeObservation({ taskId: 'task-3', taskName: 'Reload HR' }),
    ]);

    expect(result.recovered).toEqual(['Reload Finance (task-2)', 'Reload Sales (task-1)']);
    expect(store.records.map((r) => r.taskId)).toEqual(['task-1', 'task-2', 'task-3']);
  });

  it('still returns the notify batch when the history cannot be written', async () => {
    const base = createInMemoryHistoryStore();
    const store: HistoryStore = {
      load: () => base.load(),
      append: () => Promise.reject(new HistoryStoreError('disk full')),
    };
    const { run, entries } = orchestrator(store);

    const result = await run([makeObservation()]);

    expect(result.notifyBatch).toHaveLength(1);
    expect(result.historyWritten).toBe(false);
    const failure = entries.find((e) => e.level === 'error');
    expect(failure?.message).toBe('Could not record notified failures; they will be reported again');
    expect(failure?.error?.message).toBe('disk full');
  });

  it('reminds exactly one window after a run that started mid-minute', async () => {
    const store = createInMemoryHistoryStore();
    const firstRun = Date.UTC(2026, 2, 1, 8, 0, 30);

    await orchestrator(store, 2, firstRun).run([makeObservation()]);
    const second = await orchestrator(store, 2, firstRun + 2 * MS_PER_HOUR).run([makeObservation()]);

    expect(store.records.map((r) => r.notifiedAt)).toEqual([firstRun, firstRun + 2 * MS_PER_HOUR]);
    expect(second.notifyBatch).toEqual([
      { observation: makeObservation(), lastFailureLabel: '2026-03-01 08:00' },
    ]);
  });

  it('logs each decision with its explanation', async () => {
    const store = createInMemoryHistoryStore([makeRecord()]);
    const { run, entries } = orchestrator(store, 24 + 1 / 60);

    await run([makeObservation()]);

    expect(entries.map((e) => e.message)).toContain(
      "Suppressing 'Reload Sales': already notified at 2026-03-01 08:00; next reminder in 23.02 h",
    );
  });

  it('propagates a failure to load the history', async () => {
    const store: HistoryStore = {
      load: () => Promise.reject(new Error('unreachable')),
      append: () => Promise.resolve(),
    };

    await expect(orchestrator(store).run([makeObservation()])).rejects.toThrow('unreachable');
  });

  it('keeps decisions in input order', async () => {
    const store = createInMemoryHistoryStore([makeRecord({ notifiedAt: RUN_AT - MS_PER_HOUR })]);

    const result = await orchestrator(store).run([
      makeObservation({ taskId: 'task-9' }),
      makeObservation(),
    ]);

    expect(result.decisions.map((d) => d.action)).toEqual(['NOTIFY', 'SUPPRESS']);
  });
});
