/**
 * Sprint resolution against the team's iteration list
 */

import { AzureIteration } from '../client/schemas.js';
import { SprintNotFoundError } from '../errors/index.js';
import { Sprint } from '../types/index.js';

const TIME_FRAME_ORDER: Record<string, number> = {
  current: 0,
  future: 1,
  past: 2,
};

/**
 * Find the iteration whose display name equals `name` exactly (case-sensitive, untrimmed).
 */
export function resolveSprint(name: string, iterations: AzureIteration[]): AzureIteration {
  const iteration = iterations.find((candidate) => candidate.name === name);
  if (!iteration) {
    throw new SprintNotFoundError(name);
  }
  return iteration;
}

export function toSprint(iteration: AzureIteration): Sprint {
  const attributes = iteration.attributes;
  return {
    name: iteration.name,
    path: iteration.path,
    start_date: attributes?.startDate ?? null,
    finish_date: attributes?.finishDate ?? null,
    time_frame: attributes?.timeFrame ?? null,
  };
}

/**
 * Order sprints current, future, past; missing or unknown time frames go last.
 * Array.prototype.sort is stable, so upstream order is kept within a group.
 */
export function sortSprints(sprints: Sprint[]): Sprint[] {
  const rank = (sprint: Sprint): number =>
    (sprint.time_frame !== null ? TIME_FRAME_ORDER[sprint.time_frame] : undefined) ?? 3;
  return [...sprints].sort((a, b) => rank(a) - rank(b));
}
