import { describe, it, expect } from 'vitest';
import { normalizeTaskQuery } from '@tasknest/domain';
import {
  buildTaskListQuery,
  buildTaskUpdateQuery,
  escapeLikePattern,
  TASK_COLUMNS,
} from '../repositories/task-repository';

describe('buildTaskListQuery', () => {
  it('scopes the default listing to the owner in id order', () => {
    expect(buildTaskListQuery(7, normalizeTaskQuery())).toEqual({
      text: `SELECT ${TASK_COLUMNS} FROM tasks WHERE owner_id = $1 ORDER BY id ASC LIMIT $2 OFFSET $3`,
      values: [7, 100, 0],
    });
  });

  it('adds status and search filters with numbered placeholders', () => {
    const query = normalizeTaskQuery({ status: 'done', search: 'Report', skip: 20, limit: 10 });

    expect(buildTaskListQuery(7, query)).toEqual({
      text:
        `SELECT ${TASK_COLUMNS} FROM tasks` +
        ' WHERE owner_id = $1 AND status = $2 AND (title ILIKE $3 OR description ILIKE $3)' +
        ' ORDER BY id ASC LIMIT $4 OFFSET $5',
      values: [7, 'done', '%Report%', 10, 20],
    });
  });

  it('orders by an allow-listed column with id as tie-break', () => {
    const { text } = buildTaskListQuery(7, normalizeTaskQuery({ sortBy: 'created_at', sortOrder: 'desc' }));
    expect(text).toContain(' ORDER BY created_at DESC, id ASC ');
  });

  it('never interpolates an unknown sort key', () => {
    const { text } = buildTaskListQuery(7, normalizeTaskQuery({ sortBy: 'id; DROP TABLE tasks', sortOrder: 'desc' }));
    expect(text).toContain(' ORDER BY id ASC ');
    expect(text).not.toContain('DROP');
  });

  it('passes search text as a bound value', () => {
    const { values } = buildTaskListQuery(7, normalizeTaskQuery({ search: "50%_off' OR 1=1" }));
    expect(values[1]).toBe("%50\\%\\_off' OR 1=1%");
  });
});

describe('escapeLikePattern', () => {
  it('escapes wildcards and the escape character', () => {
    expect(escapeLikePattern('a%b_c\\d')).toBe('a\\%b\\_c\\\\d');
  });
});

describe('buildTaskUpdateQuery', () => {
  it('sets only the provided fields and bumps updated_at', () => {
    expect(buildTaskUpdateQuery(3, { priority: 4, description: null })).toEqual({
      text: `UPDATE tasks SET description = $2, priority = $3, updated_at = NOW() WHERE id = $1 RETURNING ${TASK_COLUMNS}`,
      values: [3, null, 4],
    });
  });

  it('still returns the row for an empty patch', () => {
    expect(buildTaskUpdateQuery(3, {}).text).toBe(
      `UPDATE tasks SET updated_at = NOW() WHERE id = $1 RETURNING ${TASK_COLUMNS}`,
    );
  });
});
