/**
 * HTML and subject lines for failure alert emails.
 *
 * @module notifications/emailTemplates
 */

import { NOT_AVAILABLE, type LabelledObservation } from '../types/index.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function buildFailureSubject(taskCount: number): string {
  return `Scheduled Task Failure Alert (${taskCount} ${taskCount === 1 ? 'Task' : 'Tasks'})`;
}

const TABLE_HEADINGS = [
  'Task Name',
  'Application',
  'Stream',
  'Status',
  'Failure Time',
  'Last Notified',
  'Execution Interval',
  'Log Link',
];

function buildLogCell(observation: LabelledObservation['observation']): string {
  if (observation.logUrl === NOT_AVAILABLE) return NOT_AVAILABLE;
  return `<a href="${escapeHtml(observation.logUrl)}">${escapeHtml(observation.taskName)}.log</a>`;
}

function buildRow({ observation, lastFailureLabel }: LabelledObservation): string {
  const cells = [
    escapeHtml(observation.taskName),
    escapeHtml(observation.appName),
    escapeHtml(observation.stream),
    escapeHtml(observation.status),
    escapeHtml(observation.failureTimestamp ?? NOT_AVAILABLE),
    escapeHtml(lastFailureLabel),
    escapeHtml(observation.executionInterval),
    buildLogCell(observation),
  ];
  return `<tr>${cells.map((c) => `<td>${c}</td>`).join('')}</tr>`;
}

function buildRecoveredSection(recovered: readonly string[]): string[] {
  if (recovered.length === 0) return [];
  return [
    '<h3>Recovered since the last check</h3>',
    '<ul>',
    ...recovered.map((task) => `<li>${escapeHtml(task)}</li>`),
    '</ul>',
  ];
}

/**
 * Build the HTML body sent to one recipient.
 */
export function buildFailureEmailHtml(
  recipient: string,
  tasks: readonly LabelledObservation[],
  recovered: readonly string[],
): string {
  return [
    '<html><head><style>',
    'table { border-collapse: collapse; width: 100%; }',
    'th, td { border: 1px solid #ddd; padding: 8px; }',
    'th { background-color: #f2f2f2; }',
    '</style></head><body>',
    `<p>Hello ${escapeHtml(recipient)},</p>`,
    '<p>This is an automated alert for failed scheduled task(s):</p>',
    '<table>',
    `<tr>${TABLE_HEADINGS.map((h) => `<th>${h}</th>`).join('')}</tr>`,
    ...tasks.map(buildRow),
    '</table>',
    ...buildRecoveredSection(recovered),
    '<p>Regards,<br>Task Failure Monitor</p>',
    '</body></html>',
  ].join('\n');
}
