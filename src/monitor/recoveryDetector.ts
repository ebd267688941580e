/**
 * Recovery Detector
 *
 * Reports tasks that were failing at the last run's notification moment and
 * are no longer failing. Only the most recent moment in the history counts
 * as the baseline; an empty history has no baseline and reports nothing.
 *
 * @module monitor/recoveryDetector
 */

import type { HistorySnapshot } from '../history/historySnapshot.js';
import { UNKNOWN_TASK_NAME } from '../types/index.js';

/** Task ids whose latest history entries carry the most recent notification moment. */
export function lastRunFailingTaskIds(snapshot: HistorySnapshot): Set<string> {
  const latest = snapshot.latestNotifiedAt();
  const ids = new Set<string>();
  if (latest === undefined) return ids;

  for (const entry of snapshot.entries()) {
    if (entry.notifiedAt === latest) ids.add(entry.key.taskId);
  }
  return ids;
}

/**
 * @returns `"{task name} ({task id})"` for every recovered task, sorted.
 */
export function detectRecoveredTasks(
  snapshot: HistorySnapshot,
  currentFailingIds: Iterable<string>,
): string[] {
  const failingNow = new Set(currentFailingIds);
  const recovered: string[] = [];

  for (const taskId of lastRunFailingTaskIds(snapshot)) {
    if (failingNow.has(taskId)) continue;
    recovered.push(`${snapshot.taskName(taskId) ?? UNKNOWN_TASK_NAME} (${taskId})`);
  }

  return recovered.sort();
}
