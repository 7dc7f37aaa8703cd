import { describe, it, expect, beforeEach } from 'vitest';
import { normalizeTaskQuery } from '@tasknest/domain';
import { InMemoryTaskRepository, InMemoryUserRepository } from '../memory/memory-repositories';

describe('InMemoryUserRepository', () => {
  let repo: InMemoryUserRepository;

  beforeEach(() => {
    repo = new InMemoryUserRepository();
  });

  it('assigns ids and finds users by exact email', async () => {
    const alice = await repo.create(undefined, { email: 'alice@example.com', passwordHash: 'h1' });

    expect(alice?.id).toBe(1);
    await expect(repo.findByEmail(undefined, 'alice@example.com')).resolves.toMatchObject({ id: 1 });
    await expect(repo.findByEmail(undefined, 'ALICE@example.com')).resolves.toBeNull();
  });

  it('refuses a duplicate email', async () => {
    await repo.create(undefined, { email: 'alice@example.com', passwordHash: 'h1' });
    await expect(repo.create(undefined, { email: 'alice@example.com', passwordHash: 'h2' })).resolves.toBeNull();
  });
});

describe('InMemoryTaskRepository', () => {
  let clock: number;
  let repo: InMemoryTaskRepository;

  beforeEach(() => {
    clock = Date.parse('2026-02-01T00:00:00Z');
    repo = new InMemoryTaskRepository(() => new Date(clock));
  });

  async function add(ownerId: number, title: string, priority: number) {
    clock += 1000;
    return repo.create(undefined, { ownerId, title, description: null, status: 'pending', priority });
  }

  it('stamps creation and update times', async () => {
    const task = await add(1, 'a', 1);
    clock += 5000;
    const updated = await repo.update(undefined, task.id, { title: 'b' });

    expect(updated?.createdAt.toISOString()).toBe('2026-02-01T00:00:01.000Z');
    expect(updated?.updatedAt.toISOString()).toBe('2026-02-01T00:00:06.000Z');
    expect(updated?.title).toBe('b');
  });

  it('clears a description set to null but keeps it when omitted', async () => {
    const task = await repo.create(undefined, {
      ownerId: 1, title: 'a', description: 'notes', status: 'pending', priority: 1,
    });

    await expect(repo.update(undefined, task.id, { priority: 2 })).resolves.toMatchObject({ description: 'notes' });
    await expect(repo.update(undefined, task.id, { description: null })).resolves.toMatchObject({ description: null });
  });

  it('lists only the owner tasks', async () => {
    await add(1, 'mine', 1);
    await add(2, 'theirs', 1);

    const tasks = await repo.list(undefined, 1, normalizeTaskQuery());
    expect(tasks.map((t) => t.title)).toEqual(['mine']);
  });

  it('ranks by priority and then creation time', async () => {
    await add(1, 'low', 1);
    await add(1, 'high-early', 3);
    await add(1, 'high-late', 3);

    const top = await repo.listTopPriority(undefined, 1, 2);
    expect(top.map((t) => t.title)).toEqual(['high-early', 'high-late']);
  });

  it('returns the deleted task once', async () => {
    const task = await add(1, 'gone', 1);

    await expect(repo.delete(undefined, task.id)).resolves.toMatchObject({ title: 'gone' });
    await expect(repo.delete(undefined, task.id)).resolves.toBeNull();
    await expect(repo.findById(undefined, task.id)).resolves.toBeNull();
  });

  it('hands out copies', async () => {
    const task = await add(1, 'original', 1);
    task.title = 'mutated';

    await expect(repo.findById(undefined, task.id)).resolves.toMatchObject({ title: 'original' });
  });
});
