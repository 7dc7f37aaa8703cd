import { type Task, type TaskStatus } from './task';

export const DEFAULT_TASK_PAGE_SIZE = 100;
export const MAX_TASK_PAGE_SIZE = 1000;
export const DEFAULT_TOP_PRIORITY_COUNT = 5;
export const MAX_TOP_PRIORITY_COUNT = 100;

export type TaskSortKey = 'id' | 'title' | 'priority' | 'status' | 'createdAt' | 'updatedAt';
export type SortOrder = 'asc' | 'desc';

const SORT_KEYS = new Map<string, TaskSortKey>([
  ['id', 'id'],
  ['title', 'title'],
  ['priority', 'priority'],
  ['status', 'status'],
  ['created_at', 'createdAt'],
  ['createdAt', 'createdAt'],
  ['updated_at', 'updatedAt'],
  ['updatedAt', 'updatedAt'],
]);

/** Raw listing parameters as they arrive from a caller. */
export interface TaskListParams {
  skip?: number;
  limit?: number;
  sortBy?: string | null;
  sortOrder?: string | null;
  search?: string | null;
  status?: TaskStatus | null;
}

export interface TaskListQuery {
  skip: number;
  limit: number;
  sortBy: TaskSortKey;
  sortOrder: SortOrder;
  /** Case-insensitive substring matched against title and description. */
  search: string | null;
  status: TaskStatus | null;
}

export function resolveSortKey(sortBy: string | null | undefined): TaskSortKey | null {
  if (!sortBy) return null;
  return SORT_KEYS.get(sortBy.trim()) ?? null;
}

export function resolveSortOrder(sortOrder: string | null | undefined): SortOrder {
  return sortOrder?.trim().toLowerCase() === 'desc' ? 'desc' : 'asc';
}

function clampCount(value: number | undefined, fallback: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(Math.max(Math.floor(value), 0), max);
}

/**
 * Resolves caller parameters into a fully specified query. An unknown sort key
 * falls back to `id` ascending, whatever order was requested.
 */
export function normalizeTaskQuery(params: TaskListParams = {}): TaskListQuery {
  const sortBy = resolveSortKey(params.sortBy);
  const search = params.search?.trim() ?? '';

  return {
    skip: clampCount(params.skip, 0, Number.MAX_SAFE_INTEGER),
    limit: clampCount(params.limit, DEFAULT_TASK_PAGE_SIZE, MAX_TASK_PAGE_SIZE),
    sortBy: sortBy ?? 'id',
    sortOrder: sortBy ? resolveSortOrder(params.sortOrder) : 'asc',
    search: search.length > 0 ? search : null,
    status: params.status ?? null,
  };
}

export function normalizeTopPriorityCount(n: number | undefined): number {
  return clampCount(n, DEFAULT_TOP_PRIORITY_COUNT, MAX_TOP_PRIORITY_COUNT);
}

// Strings compare by locale, close to a database's default collation; exact
// collation-dependent order is left to the store.
function compareValues(a: string | number, b: string | number): number {
  if (typeof a === 'string' && typeof b === 'string') return a.localeCompare(b);
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sortValue(task: Task, key: TaskSortKey): string | number {
  switch (key) {
    case 'createdAt':
      return task.createdAt.getTime();
    case 'updatedAt':
      return task.updatedAt.getTime();
    default:
      return task[key];
  }
}

export function compareTasks(a: Task, b: Task, sortBy: TaskSortKey, sortOrder: SortOrder): number {
  const primary = compareValues(sortValue(a, sortBy), sortValue(b, sortBy));
  if (primary !== 0) return sortOrder === 'desc' ? -primary : primary;
  return a.id - b.id;
}

export function matchesTaskQuery(task: Task, ownerId: number, query: TaskListQuery): boolean {
  if (task.ownerId !== ownerId) return false;
  if (query.status && task.status !== query.status) return false;
  if (query.search) {
    const needle = query.search.toLowerCase();
    const inTitle = task.title.toLowerCase().includes(needle);
    const inDescription = task.description?.toLowerCase().includes(needle) ?? false;
    if (!inTitle && !inDescription) return false;
  }
  return true;
}

/** Evaluates a query over an in-memory task collection. */
export function applyTaskQuery(tasks: Iterable<Task>, ownerId: number, query: TaskListQuery): Task[] {
  return Array.from(tasks)
    .filter((task) => matchesTaskQuery(task, ownerId, query))
    .sort((a, b) => compareTasks(a, b, query.sortBy, query.sortOrder))
    .slice(query.skip, query.skip + query.limit);
}

/** Highest priority first; equal priorities keep creation order, then id. */
export function compareByPriority(a: Task, b: Task): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  const created = a.createdAt.getTime() - b.createdAt.getTime();
  if (created !== 0) return created;
  return a.id - b.id;
}

export function rankTopPriority(tasks: Iterable<Task>, ownerId: number, limit: number): Task[] {
  return Array.from(tasks)
    .filter((task) => task.ownerId === ownerId)
    .sort(compareByPriority)
    .slice(0, limit);
}
