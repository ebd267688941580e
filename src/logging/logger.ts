/**
 * Structured Logger
 *
 * JSON-structured logging with level filtering, context enrichment and child
 * loggers. Every monitor run logs under its own correlation id so a single
 * cycle can be picked out of a shared log file.
 *
 * @module logging/logger
 */

import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  service?: string;
  operation?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  operation?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

// ─── Log Level Ordering ──────────────────────────────────────────────────────

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

// ─── Outputs ─────────────────────────────────────────────────────────────────

/**
 * Output sink for log entries. Defaults to stdout JSON.
 * Can be replaced for testing or custom transports.
 */
export type LogOutput = (entry: LogEntry) => void;

/** JSON lines on stdout. */
export const stdoutLogOutput: LogOutput = (entry: LogEntry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

/**
 * Append entries as JSON lines to a file, creating its directory on first
 * use. Writes are synchronous so nothing is lost when the process exits right
 * after a fatal entry.
 */
export function createFileLogOutput(filePath: string): LogOutput {
  let directoryReady = false;
  return (entry: LogEntry) => {
    if (!directoryReady) {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
      directoryReady = true;
    }
    fs.appendFileSync(filePath, JSON.stringify(entry) + '\n', 'utf-8');
  };
}

/** Fan one entry out to several sinks. */
export function combineLogOutputs(...outputs: LogOutput[]): LogOutput {
  return (entry: LogEntry) => {
    for (const output of outputs) output(entry);
  };
}

// ─── Logger Options ──────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Service name included in every log entry. Defaults to 'task-failure-monitor'. */
  service?: string;
  /** Minimum log level to emit. Defaults to 'info'. */
  level?: LogLevel;
  /** Base context merged into every log entry. */
  context?: LogContext;
  /** Custom output sink. Defaults to JSON on stdout. */
  output?: LogOutput;
  /**
   * Sampling rate for debug-level logs (0.0–1.0). Defaults to 1.0.
   * Only affects debug level.
   */
  debugSampleRate?: number;
  /** Returns a value in [0, 1). Defaults to Math.random. */
  randomFn?: () => number;
  /** Clock for entry timestamps. Defaults to Date.now. */
  now?: () => number;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? 'task-failure-monitor';
  const minLevel = options.level ?? 'info';
  const baseContext: LogContext = {
    ...options.context,
  };
  if (!baseContext.correlationId) {
    baseContext.correlationId = randomUUID();
  }
  if (!baseContext.service) {
    baseContext.service = service;
  }
  const output = options.output ?? stdoutLogOutput;
  const debugSampleRate = Math.max(0, Math.min(1, options.debugSampleRate ?? 1));
  const randomFn = options.randomFn ?? Math.random;
  const now = options.now ?? Date.now;

  function shouldLog(level: LogLevel): boolean {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return false;

    if (level === 'debug' && debugSampleRate < 1) {
      if (debugSampleRate <= 0) return false;
      return randomFn() < debugSampleRate;
    }

    return true;
  }

  function buildEntry(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata?: LogMetadata,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date(now()).toISOString(),
      level,
      message,
      service: baseContext.service ?? service,
      correlationId: baseContext.correlationId ?? '',
    };

    if (baseContext.operation) entry.operation = baseContext.operation;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  function log(level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (!shouldLog(level)) return;
    output(buildEntry(level, message, error, metadata));
  }

  return {
    debug(message: string, metadata?: LogMetadata): void {
      log('debug', message, undefined, metadata);
    },
    info(message: string, metadata?: LogMetadata): void {
      log('info', message, undefined, metadata);
    },
    warn(message: string, metadata?: LogMetadata): void {
      log('warn', message, undefined, metadata);
    },
    error(message: string, error?: Error, metadata?: LogMetadata): void {
      log('error', message, error, metadata);
    },
    fatal(message: string, error?: Error, metadata?: LogMetadata): void {
      log('fatal', message, error, metadata);
    },
    child(context: LogContext): Logger {
      return createLogger({
        service,
        level: minLevel,
        context: { ...baseContext, ...context },
        output,
        debugSampleRate,
        randomFn,
        now,
      });
    },
  };
}

/** A logger that drops everything. */
export function createSilentLogger(): Logger {
  return createLogger({ output: () => undefined });
}

/** Normalise an unknown thrown value into an Error for logging. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
