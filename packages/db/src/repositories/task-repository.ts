import { type PoolClient } from 'pg';
import {
  type Task,
  type NewTask,
  type TaskPatch,
  type TaskStatus,
  type TaskRepository,
  type TaskListQuery,
  type TaskSortKey,
} from '@tasknest/domain';

type TaskRow = {
  id: number;
  owner_id: number;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: number;
  created_at: Date;
  updated_at: Date;
};

export interface SqlQuery {
  text: string;
  values: unknown[];
}

export const TASK_COLUMNS =
  'id, owner_id, title, description, status, priority, created_at, updated_at';

const SORT_COLUMNS: Record<TaskSortKey, string> = {
  id: 'id',
  title: 'title',
  priority: 'priority',
  status: 'status',
  createdAt: 'created_at',
  updatedAt: 'updated_at',
};

// Patch fields share their column names.
const PATCH_FIELDS = ['title', 'description', 'status', 'priority'] as const satisfies ReadonlyArray<
  keyof TaskPatch
>;

/** Escapes LIKE metacharacters so search text matches literally. */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function buildTaskListQuery(ownerId: number, query: TaskListQuery): SqlQuery {
  const values: unknown[] = [ownerId];
  const conditions = ['owner_id = $1'];

  if (query.status) {
    values.push(query.status);
    conditions.push(`status = $${values.length}`);
  }
  if (query.search) {
    values.push(`%${escapeLikePattern(query.search)}%`);
    conditions.push(`(title ILIKE $${values.length} OR description ILIKE $${values.length})`);
  }

  const direction = query.sortOrder === 'desc' ? 'DESC' : 'ASC';
  const orderBy =
    query.sortBy === 'id'
      ? `id ${direction}`
      : `${SORT_COLUMNS[query.sortBy]} ${direction}, id ASC`;

  values.push(query.limit, query.skip);
  const text =
    `SELECT ${TASK_COLUMNS} FROM tasks` +
    ` WHERE ${conditions.join(' AND ')}` +
    ` ORDER BY ${orderBy}` +
    ` LIMIT $${values.length - 1} OFFSET $${values.length}`;

  return { text, values };
}

export function buildTaskUpdateQuery(id: number, patch: TaskPatch): SqlQuery {
  const values: unknown[] = [id];
  const assignments: string[] = [];

  for (const field of PATCH_FIELDS) {
    const value = patch[field];
    if (value === undefined) continue;
    values.push(value);
    assignments.push(`${field} = $${values.length}`);
  }
  assignments.push('updated_at = NOW()');

  return {
    text: `UPDATE tasks SET ${assignments.join(', ')} WHERE id = $1 RETURNING ${TASK_COLUMNS}`,
    values,
  };
}

export class PgTaskRepository implements TaskRepository<PoolClient> {
  async create(client: PoolClient, task: NewTask): Promise<Task> {
    const result = await client.query<TaskRow>(
      `INSERT INTO tasks (owner_id, title, description, status, priority)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${TASK_COLUMNS}`,
      [task.ownerId, task.title, task.description, task.status, task.priority],
    );
    return mapTaskRow(result.rows[0]);
  }

  async findById(client: PoolClient, id: number): Promise<Task | null> {
    const result = await client.query<TaskRow>(
      `SELECT ${TASK_COLUMNS} FROM tasks WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? mapTaskRow(row) : null;
  }

  async update(client: PoolClient, id: number, patch: TaskPatch): Promise<Task | null> {
    const { text, values } = buildTaskUpdateQuery(id, patch);
    const result = await client.query<TaskRow>(text, values);
    const row = result.rows[0];
    return row ? mapTaskRow(row) : null;
  }

  async delete(client: PoolClient, id: number): Promise<Task | null> {
    const result = await client.query<TaskRow>(
      `DELETE FROM tasks WHERE id = $1 RETURNING ${TASK_COLUMNS}`,
      [id],
    );
    const row = result.rows[0];
    return row ? mapTaskRow(row) : null;
  }

  async list(client: PoolClient, ownerId: number, query: TaskListQuery): Promise<Task[]> {
    const { text, values } = buildTaskListQuery(ownerId, query);
    const result = await client.query<TaskRow>(text, values);
    return result.rows.map(mapTaskRow);
  }

  async listTopPriority(client: PoolClient, ownerId: number, limit: number): Promise<Task[]> {
    const result = await client.query<TaskRow>(
      `SELECT ${TASK_COLUMNS}
       FROM tasks
       WHERE owner_id = $1
       ORDER BY priority DESC, created_at ASC, id ASC
       LIMIT $2`,
      [ownerId, limit],
    );
    return result.rows.map(mapTaskRow);
  }
}

function mapTaskRow(row: TaskRow): Task {
  return {
    id: row.id,
    ownerId: row.owner_id,
    title: row.title,
    description: row.description,
    status: row.status,
    priority: row.priority,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
