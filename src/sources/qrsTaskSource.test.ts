import { describe, it, expect, vi } from 'vitest';
import { createLogger, type LogEntry } from '../logging/logger.js';
import { createQrsTaskSource, generateXrfKey, type QrsTaskSourceConfig } from './qrsTaskSource.js';
import { TaskSourceError } from './taskSource.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

const config: QrsTaskSourceConfig = {
  server: 'qlik.example.com:4242',
  customPropertyName: 'CS_Tasks',
  defaultRecipient: 'ops@example.com',
  logArchivePath: '',
  timeBasis: 'utc',
  retryDelayMs: 100,
  warmUp: false,
};

const failedTask = {
  id: 'task-1',
  name: 'Reload Sales',
  operational: {
    lastExecutionResult: { status: 8, stopTime: '2026-03-01T07:55:00.000Z' },
  },
};

const okTask = {
  id: 'task-2',
  name: 'Reload Finance',
  operational: { lastExecutionResult: { status: 7 } },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function setup(overrides: Partial<QrsTaskSourceConfig> = {}) {
  const fetchFn = vi.fn<typeof fetch>();
  const sleep = vi.fn((_ms: number) => Promise.resolve());
  const entries: LogEntry[] = [];
  const source = createQrsTaskSource(
    { ...config, ...overrides },
    {
      fetchFn,
      sleep,
      randomFn: () => 0,
      logger: createLogger({ output: (e) => entries.push(e), level: 'debug' }),
    },
  );
  return { fetchFn, sleep, entries, source };
}

// ─── Xrfkey ──────────────────────────────────────────────────────────────────

describe('generateXrfKey', () => {
  it('builds a 16-character alphanumeric key', () => {
    expect(generateXrfKey(() => 0)).toBe('AAAAAAAAAAAAAAAA');
    expect(generateXrfKey(() => 0.999)).toBe('9999999999999999');
    expect(generateXrfKey()).toMatch(/^[A-Za-z0-9]{16}$/);
  });
});

// ─── Requests ────────────────────────────────────────────────────────────────

describe('createQrsTaskSource', () => {
  it('requests the full task list with the xrfkey in query and header', async () => {
    const { fetchFn, source } = setup({
      authHeader: { name: 'X-Monitor-User', value: 'svc_monitor' },
    });
    fetchFn.mockResolvedValueOnce(jsonResponse([failedTask, okTask]));

    const observations = await source.getFailedTasks();

    expect(observations.map((o) => [o.taskId, o.failureTimestamp])).toEqual([
      ['task-1', '2026-03-01 07:55'],
    ]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    const call = fetchFn.mock.calls[0];
    expect(call?.[0]).toBe('https://qlik.example.com:4242/qrs/task/full?Xrfkey=AAAAAAAAAAAAAAAA');
    expect(call?.[1]?.headers).toEqual({
      'X-Qlik-Xrfkey': 'AAAAAAAAAAAAAAAA',
      Accept: 'application/json',
      'X-Monitor-User': 'svc_monitor',
    });
  });

  it('warms the session up first when enabled', async () => {
    const { fetchFn, source } = setup({ warmUp: true });
    fetchFn
      .mockResolvedValueOnce(jsonResponse({ buildVersion: '1.0' }))
      .mockResolvedValueOnce(jsonResponse([]));

    await source.getFailedTasks();

    expect(fetchFn.mock.calls.map(([url]) => String(url))).toEqual([
      'https://qlik.example.com:4242/qrs/about?Xrfkey=AAAAAAAAAAAAAAAA',
      'https://qlik.example.com:4242/qrs/task/full?Xrfkey=AAAAAAAAAAAAAAAA',
    ]);
  });

  it('carries on when the warm-up fails', async () => {
    const { fetchFn, source, entries } = setup({ warmUp: true });
    fetchFn
      .mockRejectedValueOnce(new Error('connection reset'))
      .mockResolvedValueOnce(jsonResponse([failedTask]));

    await expect(source.getFailedTasks()).resolves.toHaveLength(1);
    expect(entries.find((e) => e.message === 'Repository service warm-up failed')?.metadata).toEqual({
      error: 'connection reset',
    });
  });

  it('retries with a back-off that grows with the attempt number', async () => {
    const { fetchFn, sleep, source } = setup({ maxRetries: 3 });
    fetchFn
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockResolvedValueOnce(jsonResponse({ message: 'busy' }, 503))
      .mockResolvedValueOnce(jsonResponse([failedTask]));

    const observations = await source.getFailedTasks();

    expect(observations).toHaveLength(1);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('retries a response that is not JSON', async () => {
    const { fetchFn, source } = setup({ maxRetries: 2 });
    fetchFn
      .mockResolvedValueOnce(new Response('<html>login</html>', { status: 200 }))
      .mockResolvedValueOnce(jsonResponse([]));

    await expect(source.getFailedTasks()).resolves.toEqual([]);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('throws TaskSourceError after the last attempt', async () => {
    const { fetchFn, sleep, source } = setup({ maxRetries: 2 });
    fetchFn.mockImplementation(() => Promise.resolve(jsonResponse({}, 401)));

    const error = await source.getFailedTasks().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TaskSourceError);
    expect(error).toMatchObject({
      code: 'TASK_SOURCE_ERROR',
      attempts: 2,
      message: 'Task list unavailable after 2 attempts: GET /qrs/task/full returned 401',
    });
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('rejects a payload that is not a list', async () => {
    const { fetchFn, source } = setup({ maxRetries: 1 });
    fetchFn.mockResolvedValueOnce(jsonResponse({ tasks: [] }));

    await expect(source.getFailedTasks()).rejects.toThrow(
      'Task list unavailable after 1 attempts: GET /qrs/task/full did not return a list',
    );
  });
});
