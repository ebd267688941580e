/**
 * Task Mapping
 *
 * Turns the repository service's `/qrs/task/full` payload into failure
 * observations: keeps tasks whose last execution ended in a failure state,
 * formats their stop time and schedule, resolves log locations and fans
 * each task out to its recipients.
 *
 * Pure; the HTTP side lives in `qrsTaskSource.ts`.
 *
 * @module sources/taskMapping
 */

import path from 'node:path';
import { z } from 'zod';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { isoToWallClockMinute, MS_PER_MINUTE, type TimeBasis } from '../time/wallClock.js';
import { NOT_AVAILABLE, type FailureObservation, type TaskFailureStatus } from '../types/index.js';

// ─── Status Codes ────────────────────────────────────────────────────────────

/** Execution result codes that count as a failure. */
export const FAILURE_STATUS_NAMES: ReadonlyMap<number, TaskFailureStatus> = new Map<
  number,
  TaskFailureStatus
>([
  [4, 'AbortInitiated'],
  [5, 'Aborting'],
  [8, 'FinishedFail'],
  [11, 'Error'],
]);

const UNKNOWN_TASK = 'Unknown Task';
const UNKNOWN_TASK_ID = 'Unknown ID';
const UNKNOWN_APP = 'Unknown';

// ─── Payload Schema ──────────────────────────────────────────────────────────

const namedSchema = z.object({ name: z.string().nullish() }).passthrough();

const executionResultSchema = z
  .object({
    status: z.number().int().nullish(),
    startTime: z.string().nullish(),
    stopTime: z.string().nullish(),
    scriptLogLocation: z.string().nullish(),
  })
  .passthrough();

const customPropertySchema = z
  .object({
    value: z.string().nullish(),
    definition: namedSchema.nullish(),
  })
  .passthrough();

export const rawTaskSchema = z
  .object({
    id: z.string().nullish(),
    name: z.string().nullish(),
    app: z
      .object({
        name: z.string().nullish(),
        stream: namedSchema.nullish(),
      })
      .passthrough()
      .nullish(),
    operational: z
      .object({
        lastExecutionResult: executionResultSchema.nullish(),
        nextExecution: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    customProperties: z.array(customPropertySchema).nullish(),
  })
  .passthrough();

export type RawTask = z.infer<typeof rawTaskSchema>;

// ─── Options ─────────────────────────────────────────────────────────────────

export interface TaskMappingOptions {
  /** Custom property whose values are recipient addresses. */
  customPropertyName: string;
  /** Used when a task carries no recipient of its own. */
  defaultRecipient: string;
  /** Directory prefixed to each task's script log location; may be empty. */
  logArchivePath: string;
  timeBasis: TimeBasis;
}

// ─── Execution Interval ──────────────────────────────────────────────────────

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/** `"1 day, 2 hours, 5 minutes"`; zero components are left out except a lone `"0 minutes"`. */
export function formatExecutionInterval(totalMinutes: number): string {
  const days = Math.floor(totalMinutes / 1440);
  const hours = Math.floor((totalMinutes % 1440) / 60);
  const minutes = totalMinutes % 60;

  const parts: string[] = [];
  if (days) parts.push(plural(days, 'day'));
  if (hours) parts.push(plural(hours, 'hour'));
  if (minutes || parts.length === 0) parts.push(plural(minutes, 'minute'));
  return parts.join(', ');
}

/**
 * Time from the last start to the next scheduled execution, rounded to the
 * minute. `N/A` when either end is missing or unparsable, or when the next
 * execution lies before the start (the service reports "never" as a date in
 * the distant past).
 */
export function computeExecutionInterval(
  startTime: string | null | undefined,
  nextExecution: string | null | undefined,
): string {
  if (!startTime || !nextExecution) return NOT_AVAILABLE;
  const start = Date.parse(startTime);
  const next = Date.parse(nextExecution);
  if (Number.isNaN(start) || Number.isNaN(next)) return NOT_AVAILABLE;

  const diff = next - start;
  if (diff < 0) return NOT_AVAILABLE;
  return formatExecutionInterval(Math.round(diff / MS_PER_MINUTE));
}

// ─── Log Location ────────────────────────────────────────────────────────────

export function resolveLogFilePath(
  logArchivePath: string,
  scriptLogLocation: string | null | undefined,
): string {
  if (!scriptLogLocation) return '';
  if (!logArchivePath || path.isAbsolute(scriptLogLocation)) return scriptLogLocation;
  return path.join(logArchivePath, scriptLogLocation);
}

export function toLogUrl(logFilePath: string): string {
  return logFilePath ? `file://${logFilePath}` : NOT_AVAILABLE;
}

// ─── Recipients ──────────────────────────────────────────────────────────────

export function resolveRecipients(task: RawTask, options: TaskMappingOptions): string[] {
  const addresses = new Set<string>();
  for (const property of task.customProperties ?? []) {
    if (property.definition?.name !== options.customPropertyName) continue;
    const value = property.value?.trim();
    if (value) addresses.add(value);
  }
  return addresses.size > 0 ? [...addresses] : [options.defaultRecipient];
}

// ─── Mapping ─────────────────────────────────────────────────────────────────

/** The failure status of a task, or null when its last execution did not fail. */
export function failureStatusOf(task: RawTask): TaskFailureStatus | null {
  const code = task.operational?.lastExecutionResult?.status;
  if (code === null || code === undefined) return null;
  return FAILURE_STATUS_NAMES.get(code) ?? null;
}

/**
 * Map the raw task list to failure observations.
 * Entries that do not match the payload schema are skipped with a warning.
 */
export function mapFailedTasks(
  rawTasks: readonly unknown[],
  options: TaskMappingOptions,
  logger: Logger = createSilentLogger(),
): FailureObservation[] {
  const observations: FailureObservation[] = [];

  rawTasks.forEach((raw, index) => {
    const parsed = rawTaskSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Skipping task with an unexpected shape', {
        index,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return;
    }

    const task = parsed.data;
    const taskName = task.name ?? UNKNOWN_TASK;
    const status = failureStatusOf(task);
    if (status === null) {
      logger.debug(`Task '${taskName}' skipped`, {
        status: task.operational?.lastExecutionResult?.status ?? null,
      });
      return;
    }

    const result = task.operational?.lastExecutionResult;
    const logFilePath = resolveLogFilePath(options.logArchivePath, result?.scriptLogLocation);

    const base = {
      taskId: task.id ?? UNKNOWN_TASK_ID,
      taskName,
      failureTimestamp: isoToWallClockMinute(result?.stopTime, options.timeBasis),
      status,
      appName: task.app?.name ?? UNKNOWN_APP,
      stream: task.app?.stream?.name ?? NOT_AVAILABLE,
      executionInterval: computeExecutionInterval(
        result?.startTime,
        task.operational?.nextExecution,
      ),
      logUrl: toLogUrl(logFilePath),
      logFilePath,
    };

    for (const recipient of resolveRecipients(task, options)) {
      observations.push({ ...base, recipient });
    }
  });

  return observations;
}
