/**
 * Repository Service Task Source
 *
 * Fetches `/qrs/task/full` from the repository service and maps the failing
 * tasks to observations. Every request carries a fresh cross-site request
 * forgery key, sent both as the `Xrfkey` query parameter and the
 * `X-Qlik-Xrfkey` header. Authentication goes through an optional fixed
 * header, as a header-authenticated virtual proxy expects.
 *
 * Features:
 * - Optional warm-up call to `/qrs/about`, whose failure is only logged
 * - Per-request timeout
 * - Retry with linearly growing back-off
 * - `TaskSourceError` once every attempt has failed
 *
 * @module sources/qrsTaskSource
 */

import { z } from 'zod';
import { createSilentLogger, toError, type Logger } from '../logging/logger.js';
import type { FailureObservation } from '../types/index.js';
import { mapFailedTasks, type TaskMappingOptions } from './taskMapping.js';
import { TaskSourceError, type TaskSource } from './taskSource.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface QrsTaskSourceConfig extends TaskMappingOptions {
  /** `host[:port]` of the repository service. */
  server: string;
  authHeader?: { name: string; value: string };
  /** Per-request timeout (default: 30000). */
  timeoutMs?: number;
  /** Attempts for the task list request (default: 3). */
  maxRetries?: number;
  /** Base back-off, multiplied by the attempt number (default: 5000). */
  retryDelayMs?: number;
  /** Call `/qrs/about` before the task list (default: true). */
  warmUp?: boolean;
}

export interface QrsTaskSourceDeps {
  fetchFn?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  /** Returns a value in [0, 1). Defaults to Math.random. */
  randomFn?: () => number;
  logger?: Logger;
}

// ─── Request Helpers ─────────────────────────────────────────────────────────

const XRFKEY_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const XRFKEY_LENGTH = 16;

export function generateXrfKey(randomFn: () => number = Math.random): string {
  let key = '';
  for (let i = 0; i < XRFKEY_LENGTH; i++) {
    key += XRFKEY_ALPHABET.charAt(Math.floor(randomFn() * XRFKEY_ALPHABET.length));
  }
  return key;
}

export class QrsHttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'QrsHttpError';
  }
}

const taskListSchema = z.array(z.unknown());

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createQrsTaskSource(
  config: QrsTaskSourceConfig,
  deps: QrsTaskSourceDeps = {},
): TaskSource {
  const timeoutMs = config.timeoutMs ?? 30000;
  const maxRetries = Math.max(1, config.maxRetries ?? 3);
  const retryDelayMs = config.retryDelayMs ?? 5000;
  const warmUp = config.warmUp ?? true;
  const fetchFn = deps.fetchFn ?? fetch;
  const sleep = deps.sleep ?? defaultSleep;
  const randomFn = deps.randomFn ?? Math.random;
  const logger = (deps.logger ?? createSilentLogger()).child({ operation: 'fetch-tasks' });

  async function getJson(endpoint: string): Promise<unknown> {
    const xrfkey = generateXrfKey(randomFn);
    const url = `https://${config.server}${endpoint}?Xrfkey=${xrfkey}`;
    const headers: Record<string, string> = {
      'X-Qlik-Xrfkey': xrfkey,
      Accept: 'application/json',
    };
    if (config.authHeader) headers[config.authHeader.name] = config.authHeader.value;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetchFn(url, { method: 'GET', headers, signal: controller.signal });
      const text = await response.text();
      logger.debug('Repository service response', {
        endpoint,
        status: response.status,
        bytes: text.length,
      });
      if (!response.ok) {
        const status = [response.status, response.statusText].filter(Boolean).join(' ');
        throw new QrsHttpError(`GET ${endpoint} returned ${status}`, response.status);
      }
      try {
        const body: unknown = JSON.parse(text);
        return body;
      } catch (err) {
        throw new Error(`GET ${endpoint} returned invalid JSON`, { cause: err });
      }
    } finally {
      clearTimeout(timer);
    }
  }

  async function warmUpSession(): Promise<void> {
    try {
      await getJson('/qrs/about');
      logger.info('Repository service warm-up succeeded');
    } catch (err) {
      logger.warn('Repository service warm-up failed', { error: toError(err).message });
    }
  }

  async function fetchTaskList(): Promise<unknown[]> {
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        logger.info('Requesting task list', { server: config.server, attempt, maxRetries });
        const parsed = taskListSchema.safeParse(await getJson('/qrs/task/full'));
        if (!parsed.success) {
          throw new Error('GET /qrs/task/full did not return a list');
        }
        logger.info('Fetched task list', { tasks: parsed.data.length });
        return parsed.data;
      } catch (err) {
        lastError = toError(err);
        logger.warn(`Attempt ${attempt} failed`, { error: lastError.message });
        if (attempt < maxRetries) {
          const waitMs = retryDelayMs * attempt;
          logger.warn('Retrying task list request', { waitMs });
          await sleep(waitMs);
        }
      }
    }

    throw new TaskSourceError(
      `Task list unavailable after ${maxRetries} attempts: ${lastError?.message ?? 'unknown error'}`,
      maxRetries,
      lastError,
    );
  }

  return {
    async getFailedTasks(): Promise<FailureObservation[]> {
      if (warmUp) await warmUpSession();
      const rawTasks = await fetchTaskList();
      const observations = mapFailedTasks(rawTasks, config, logger);
      logger.info('Mapped failing tasks', { observations: observations.length });
      return observations;
    },
  };
}
