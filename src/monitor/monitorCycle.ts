/**
 * Monitor Cycle
 *
 * One complete run: fetch the failing set, classify and record it, then
 * send the notify batch. A task source failure aborts the cycle before any
 * history is written or mail sent.
 *
 * @module monitor/monitorCycle
 */

import { createSilentLogger, type Logger } from '../logging/logger.js';
import type { DeliveryReport, FailureNotifier } from '../notifications/failureNotifier.js';
import type { TaskSource } from '../sources/taskSource.js';
import type { RunOrchestrator } from './runOrchestrator.js';

export interface MonitorCycleDeps {
  source: TaskSource;
  orchestrator: RunOrchestrator;
  notifier: FailureNotifier;
  logger?: Logger;
}

export interface CycleReport {
  /** Failure observations returned by the source, counting each recipient. */
  fetched: number;
  notified: number;
  suppressed: number;
  recovered: string[];
  historyWritten: boolean;
  delivery: DeliveryReport;
}

export async function runMonitorCycle(deps: MonitorCycleDeps): Promise<CycleReport> {
  const logger = deps.logger ?? createSilentLogger();

  const observations = await deps.source.getFailedTasks();
  logger.info('Failing tasks observed', { observations: observations.length });

  const result = await deps.orchestrator.run(observations);
  const delivery = await deps.notifier.notify(result.notifyBatch, result.recovered);

  const report: CycleReport = {
    fetched: observations.length,
    notified: result.notifyBatch.length,
    suppressed: result.suppressed.length,
    recovered: result.recovered,
    historyWritten: result.historyWritten,
    delivery,
  };
  logger.info('Monitor cycle finished', {
    fetched: report.fetched,
    notified: report.notified,
    suppressed: report.suppressed,
    recovered: report.recovered.length,
    sent: delivery.sent,
    failed: delivery.failed,
    skipped: delivery.skipped,
  });
  return report;
}
