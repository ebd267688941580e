/**
 * Run Orchestrator
 *
 * Drives one poll-decide-record cycle over an already fetched failing set:
 *
 * 1. Load the history snapshot
 * 2. Classify every observation and attach its display label
 * 3. Detect recovered tasks against the snapshot, before anything is appended
 * 4. Split observations into the notify batch and the suppressed rest
 * 5. Append one history record per notify-batch member, stamped with the run time
 *
 * Records mean "decided to notify", not "delivered": they are written before
 * the notifier runs and are never rolled back.
 *
 * @module monitor/runOrchestrator
 */

import type { HistoryStore } from '../history/historyStore.js';
import { createSilentLogger, toError, type Logger } from '../logging/logger.js';
import { toWallClock, type TimeBasis, type WallClock } from '../time/wallClock.js';
import {
  NOT_AVAILABLE,
  type FailureObservation,
  type LabelledObservation,
  type NotifiedOccurrence,
} from '../types/index.js';
import { classifyFailures, describeDecision, type FailureDecision } from './failureClassifier.js';
import { detectRecoveredTasks } from './recoveryDetector.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SuppressedObservation {
  observation: Readonly<FailureObservation>;
  decision: FailureDecision;
}

export interface RunResult {
  notifyBatch: LabelledObservation[];
  /** `"{task name} ({task id})"` for every task that recovered since the last run. */
  recovered: string[];
  suppressed: SuppressedObservation[];
  /** One decision per input observation, in input order. */
  decisions: FailureDecision[];
  /** Wall-clock moment stamped on this run's history records. */
  notifiedAt: WallClock;
  /** False when the history store rejected this run's records. */
  historyWritten: boolean;
}

export interface RunOrchestratorOptions {
  store: HistoryStore;
  reminderHours: number;
  timeBasis: TimeBasis;
  /** Epoch milliseconds. Defaults to Date.now. */
  now?: () => number;
  logger?: Logger;
}

export interface RunOrchestrator {
  run(observations: readonly Readonly<FailureObservation>[]): Promise<RunResult>;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function toNotifiedOccurrence(
  observation: Readonly<FailureObservation>,
  notifiedAt: WallClock,
): NotifiedOccurrence {
  return {
    taskId: observation.taskId,
    failureTimestampMinute: observation.failureTimestamp ?? NOT_AVAILABLE,
    taskName: observation.taskName,
    notifiedAt,
    appName: observation.appName,
    stream: observation.stream,
    status: observation.status,
    executionInterval: observation.executionInterval,
  };
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createRunOrchestrator(options: RunOrchestratorOptions): RunOrchestrator {
  const { store, reminderHours, timeBasis } = options;
  if (!Number.isFinite(reminderHours) || reminderHours < 0) {
    throw new Error(`reminderHours must be a non-negative number, got ${reminderHours}`);
  }
  const now = options.now ?? Date.now;
  const logger = (options.logger ?? createSilentLogger()).child({ operation: 'run' });

  return {
    async run(observations: readonly Readonly<FailureObservation>[]): Promise<RunResult> {
      const notifiedAt = toWallClock(now(), timeBasis);
      const snapshot = await store.load();

      const decisions = classifyFailures(observations, snapshot, { reminderHours, now: notifiedAt });

      const recovered = detectRecoveredTasks(
        snapshot,
        observations.map((o) => o.taskId),
      );

      const notifyBatch: LabelledObservation[] = [];
      const suppressed: SuppressedObservation[] = [];

      observations.forEach((observation, i) => {
        const decision = decisions[i];
        if (!decision) return;
        const meta = {
          taskId: observation.taskId,
          recipient: observation.recipient,
          reason: decision.reason.type,
        };
        if (decision.action === 'NOTIFY') {
          notifyBatch.push({ observation, lastFailureLabel: decision.lastFailureLabel });
          logger.info(`Notifying '${observation.taskName}': ${describeDecision(decision)}`, meta);
        } else {
          suppressed.push({ observation, decision });
          logger.info(`Suppressing '${observation.taskName}': ${describeDecision(decision)}`, meta);
        }
      });

      for (const task of recovered) {
        logger.info(`Recovered since last run: ${task}`);
      }

      let historyWritten = true;
      if (notifyBatch.length > 0) {
        try {
          await store.append(notifyBatch.map((n) => toNotifiedOccurrence(n.observation, notifiedAt)));
        } catch (err) {
          historyWritten = false;
          logger.error('Could not record notified failures; they will be reported again', toError(err), {
            count: notifyBatch.length,
          });
        }
      }

      logger.info('Classified failing tasks', {
        observed: observations.length,
        notify: notifyBatch.length,
        suppressed: suppressed.length,
        recovered: recovered.length,
      });

      return { notifyBatch, recovered, suppressed, decisions, notifiedAt, historyWritten };
    },
  };
}
