#!/usr/bin/env node
/**
 * Command-line entry point: runs one monitor cycle and exits.
 *
 * Exit code 0 when the cycle completed (individual delivery failures are
 * logged, not fatal), 1 on invalid configuration or when the cycle could not
 * complete. Meant to be started by an external scheduler.
 *
 * @module cli
 */

import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  loadDotEnv,
  loadMonitorConfig,
  type MonitorConfig,
} from './config/monitorConfig.js';
import { createCsvHistoryStore } from './history/csvHistoryStore.js';
import type { HistoryStore } from './history/historyStore.js';
import { createPgHistoryStore } from './history/pgHistoryStore.js';
import {
  combineLogOutputs,
  createFileLogOutput,
  createLogger,
  stdoutLogOutput,
  toError,
  type Logger,
  type LogOutput,
} from './logging/logger.js';
import { runMonitorCycle } from './monitor/monitorCycle.js';
import { createRunOrchestrator } from './monitor/runOrchestrator.js';
import {
  createInMemoryEmailTransport,
  createSmtpTransport,
  type EmailTransport,
} from './notifications/emailTransport.js';
import { createFailureNotifier } from './notifications/failureNotifier.js';
import { createQrsTaskSource } from './sources/qrsTaskSource.js';
import { closePool, getPool } from './utils/db.js';

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Log sink; defaults to stdout plus `LOG_FILE` when set. */
  logOutput?: LogOutput;
  fetchFn?: typeof fetch;
  /** Replaces the SMTP transport. */
  transport?: EmailTransport;
  /** Replaces the store chosen by `HISTORY_MODE`. */
  store?: HistoryStore;
  now?: () => number;
}

function createHistoryStore(config: MonitorConfig, logger: Logger): HistoryStore {
  if (config.history.mode === 'postgres') {
    getPool(config.history.db);
    return createPgHistoryStore({ logger });
  }
  return createCsvHistoryStore({ filePath: config.history.path, logger });
}

export async function main(deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;

  let config: MonitorConfig;
  try {
    config = loadMonitorConfig(env);
  } catch (err) {
    const logger = createLogger({ output: deps.logOutput ?? stdoutLogOutput });
    if (err instanceof ConfigError) {
      logger.fatal('Invalid configuration', err, { issues: err.issues });
      return 1;
    }
    throw err;
  }

  const output =
    deps.logOutput ??
    (config.logging.file
      ? combineLogOutputs(stdoutLogOutput, createFileLogOutput(config.logging.file))
      : stdoutLogOutput);
  const logger = createLogger({
    level: config.logging.level,
    context: { correlationId: randomUUID() },
    output,
  });

  const smtpTransport =
    deps.transport || !config.email.smtp ? null : createSmtpTransport(config.email.smtp);
  const transport = deps.transport ?? smtpTransport ?? createInMemoryEmailTransport();
  const usesPool = !deps.store && config.history.mode === 'postgres';

  logger.info('Task failure monitor started', {
    server: config.taskSource.server,
    reminderHours: config.reminderHours,
    timeBasis: config.timeBasis,
    history: config.history.mode,
    dryRun: config.dryRun,
  });

  try {
    const report = await runMonitorCycle({
      source: createQrsTaskSource(config.taskSource, { fetchFn: deps.fetchFn, logger }),
      orchestrator: createRunOrchestrator({
        store: deps.store ?? createHistoryStore(config, logger),
        reminderHours: config.reminderHours,
        timeBasis: config.timeBasis,
        now: deps.now,
        logger,
      }),
      notifier: createFailureNotifier({
        transport,
        from: config.email.from,
        dryRun: config.dryRun,
        logger,
      }),
      logger,
    });
    if (report.notified === 0) logger.info('No new task failures to notify');
    logger.info('Task failure monitor finished');
    return 0;
  } catch (err) {
    logger.fatal('Monitor run failed', toError(err));
    return 1;
  } finally {
    smtpTransport?.close();
    if (usesPool) await closePool();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(path.resolve(entry)) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run directly if executed as a script or through the bin link
if (isEntryPoint()) {
  loadDotEnv();
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      process.stderr.write(`Unexpected failure: ${toError(err).stack ?? String(err)}\n`);
      process.exitCode = 1;
    });
}
