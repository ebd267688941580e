/**
 * Failure Notifier
 *
 * Sends one alert email per recipient covering every notify-batch entry
 * addressed to them, with the recovered-task list appended. Each task's
 * script log is attached when the file exists. A failed delivery to one
 * recipient is logged and does not stop the others.
 *
 * The notifier never touches the history: records are written before it
 * runs and stay written whatever the delivery outcome.
 *
 * @module notifications/failureNotifier
 */

import fs from 'node:fs/promises';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import type { LabelledObservation } from '../types/index.js';
import { buildFailureEmailHtml, buildFailureSubject } from './emailTemplates.js';
import {
  EmailDeliveryError,
  type EmailAttachment,
  type EmailTransport,
} from './emailTransport.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface DeliveryReport {
  /** Recipients whose message was accepted by the transport. */
  sent: number;
  /** Recipients whose message the transport rejected. */
  failed: number;
  /** Recipients left out by a dry run. */
  skipped: number;
  failures: EmailDeliveryError[];
}

export interface FailureNotifierOptions {
  transport: EmailTransport;
  from: string;
  /** Log what would be sent instead of sending. */
  dryRun?: boolean;
  logger?: Logger;
  /** Defaults to a filesystem check for a regular file. */
  fileExists?: (filePath: string) => Promise<boolean>;
}

export interface FailureNotifier {
  notify(
    notifyBatch: readonly LabelledObservation[],
    recovered: readonly string[],
  ): Promise<DeliveryReport>;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/** Group by recipient, keeping first-seen recipient order. */
export function groupByRecipient(
  notifyBatch: readonly LabelledObservation[],
): Map<string, LabelledObservation[]> {
  const groups = new Map<string, LabelledObservation[]>();
  for (const entry of notifyBatch) {
    const group = groups.get(entry.observation.recipient);
    if (group) group.push(entry);
    else groups.set(entry.observation.recipient, [entry]);
  }
  return groups;
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createFailureNotifier(options: FailureNotifierOptions): FailureNotifier {
  const { transport, from } = options;
  const dryRun = options.dryRun ?? false;
  const fileExists = options.fileExists ?? isRegularFile;
  const logger = (options.logger ?? createSilentLogger()).child({ operation: 'notify' });

  async function collectAttachments(tasks: readonly LabelledObservation[]): Promise<EmailAttachment[]> {
    const attachments: EmailAttachment[] = [];
    const seen = new Set<string>();
    for (const { observation } of tasks) {
      const filePath = observation.logFilePath;
      if (!filePath || seen.has(filePath)) continue;
      seen.add(filePath);
      if (await fileExists(filePath)) {
        attachments.push({ filename: `${observation.taskName}.log`, path: filePath });
      } else {
        logger.warn('Log file not found', { path: filePath, taskId: observation.taskId });
      }
    }
    return attachments;
  }

  return {
    async notify(
      notifyBatch: readonly LabelledObservation[],
      recovered: readonly string[],
    ): Promise<DeliveryReport> {
      const report: DeliveryReport = { sent: 0, failed: 0, skipped: 0, failures: [] };
      if (notifyBatch.length === 0) {
        logger.info('No failures to report; no email sent', { recovered: recovered.length });
        return report;
      }

      for (const [recipient, tasks] of groupByRecipient(notifyBatch)) {
        const attachments = await collectAttachments(tasks);
        const subject = buildFailureSubject(tasks.length);
        const html = buildFailureEmailHtml(recipient, tasks, recovered);
        logger.debug('Built alert email', {
          recipient,
          tasks: tasks.length,
          attachments: attachments.map((a) => a.path),
        });

        if (dryRun) {
          logger.info('Dry run: email not sent', {
            recipient,
            subject,
            tasks: tasks.length,
            attachments: attachments.length,
          });
          report.skipped++;
          continue;
        }

        try {
          await transport.sendMail({ from, to: recipient, subject, html, attachments });
          report.sent++;
          logger.info('Email sent', { recipient, tasks: tasks.length });
        } catch (err) {
          const error = new EmailDeliveryError(`Failed to send email to ${recipient}`, recipient, err);
          report.failed++;
          report.failures.push(error);
          logger.error(error.message, error, {
            recipient,
            reason: err instanceof Error ? err.message : String(err),
          });
        }
      }

      return report;
    },
  };
}
