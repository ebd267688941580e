/**
 * Task Source contract
 *
 * A task source reports the currently failing tasks, one observation per
 * recipient. A source that cannot produce the list throws `TaskSourceError`
 * rather than returning an empty list, which would read as "everything
 * recovered".
 *
 * @module sources/taskSource
 */

import type { FailureObservation } from '../types/index.js';

export interface TaskSource {
  getFailedTasks(): Promise<FailureObservation[]>;
}

export class TaskSourceError extends Error {
  readonly code = 'TASK_SOURCE_ERROR';

  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'TaskSourceError';
  }
}

/** A source that returns a fixed list, for tests and local runs. */
export function createStaticTaskSource(observations: readonly FailureObservation[]): TaskSource {
  return {
    async getFailedTasks(): Promise<FailureObservation[]> {
      return observations.map((o) => ({ ...o }));
    },
  };
}
