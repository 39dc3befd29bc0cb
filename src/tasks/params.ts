/**
 * Query parameters for the task endpoints.
 */

import type { QueryParams } from '../transport/types.js';
import type { TaskStatus, TaskType } from '../types/task.js';

/**
 * Selects tasks for listing, cancellation or deletion
 */
export interface TaskFilter {
  uids?: number[];
  batchUids?: number[];
  indexUids?: string[];
  statuses?: TaskStatus[];
  types?: TaskType[];
  canceledBy?: number[];
  beforeEnqueuedAt?: Date;
  afterEnqueuedAt?: Date;
  beforeStartedAt?: Date;
  afterStartedAt?: Date;
  beforeFinishedAt?: Date;
  afterFinishedAt?: Date;
}

/**
 * Filter plus pagination for `GET /tasks`
 */
export interface TaskQuery extends TaskFilter {
  limit?: number;
  /** Uid of the first task returned */
  from?: number;
  /** Oldest first */
  reverse?: boolean;
}

function list<T extends string | number>(values: readonly T[] | undefined): T[] | undefined {
  return values && values.length > 0 ? [...values] : undefined;
}

/**
 * Convert a filter to query parameters. Empty lists are omitted.
 */
export function buildTaskFilterParams(filter: TaskFilter): QueryParams {
  return {
    uids: list(filter.uids),
    batchUids: list(filter.batchUids),
    indexUids: list(filter.indexUids),
    statuses: list(filter.statuses),
    types: list(filter.types),
    canceledBy: list(filter.canceledBy),
    beforeEnqueuedAt: filter.beforeEnqueuedAt,
    afterEnqueuedAt: filter.afterEnqueuedAt,
    beforeStartedAt: filter.beforeStartedAt,
    afterStartedAt: filter.afterStartedAt,
    beforeFinishedAt: filter.beforeFinishedAt,
    afterFinishedAt: filter.afterFinishedAt,
  };
}

/**
 * Convert a task query to query parameters.
 */
export function buildTaskQueryParams(query: TaskQuery): QueryParams {
  return {
    ...buildTaskFilterParams(query),
    limit: query.limit,
    from: query.from,
    reverse: query.reverse,
  };
}

/**
 * Whether a filter selects anything at all
 */
export function isEmptyFilter(filter: TaskFilter): boolean {
  return Object.values(buildTaskFilterParams(filter)).every((value) => value === undefined);
}
