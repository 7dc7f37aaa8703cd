import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TaskService, type TaskServiceDeps } from '../task-service';
import { type Task, type NewTask, type TaskPatch } from '../task';

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 1,
    ownerId: 10,
    title: 'Write report',
    description: null,
    status: 'pending',
    priority: 1,
    createdAt: new Date('2026-03-01T00:00:00Z'),
    updatedAt: new Date('2026-03-01T00:00:00Z'),
    ...overrides,
  };
}

function createMockDeps(overrides: Partial<TaskServiceDeps> = {}): TaskServiceDeps {
  return {
    taskRepo: {
      create: vi.fn(async (_tx: unknown, t: NewTask) => makeTask({ id: 7, ...t })),
      findById: vi.fn(async (): Promise<Task | null> => makeTask()),
      update: vi.fn(async (_tx: unknown, id: number, patch: TaskPatch): Promise<Task | null> =>
        makeTask({ id, ...patch }),
      ),
      delete: vi.fn(async (_tx: unknown, id: number): Promise<Task | null> => makeTask({ id })),
      list: vi.fn(async (): Promise<Task[]> => []),
      listTopPriority: vi.fn(async (): Promise<Task[]> => []),
    },
    withTransaction: async <T>(fn: (tx: unknown) => Promise<T>): Promise<T> => fn({}),
    ...overrides,
  };
}

describe('TaskService', () => {
  let deps: TaskServiceDeps;
  let service: TaskService;

  beforeEach(() => {
    deps = createMockDeps();
    service = new TaskService(deps);
  });

  describe('createTask', () => {
    it('defaults priority to 1 and status to pending', async () => {
      const task = await service.createTask(10, { title: 'Plan sprint' });

      expect(deps.taskRepo.create).toHaveBeenCalledWith({}, {
        ownerId: 10,
        title: 'Plan sprint',
        description: null,
        status: 'pending',
        priority: 1,
      });
      expect(task.priority).toBe(1);
    });

    it('keeps an explicit priority and treats null as unset', async () => {
      await service.createTask(10, { title: 'A', priority: 4, status: 'done', description: 'notes' });
      await service.createTask(10, { title: 'B', priority: null });

      expect(vi.mocked(deps.taskRepo.create).mock.calls[0][1]).toMatchObject({ priority: 4, status: 'done', description: 'notes' });
      expect(vi.mocked(deps.taskRepo.create).mock.calls[1][1]).toMatchObject({ priority: 1 });
    });
  });

  describe('listTasks', () => {
    it('passes a normalized query scoped to the caller', async () => {
      await service.listTasks(10, { sortBy: 'priority', sortOrder: 'DESC', search: '  report ', limit: 5000 });

      expect(deps.taskRepo.list).toHaveBeenCalledWith({}, 10, {
        skip: 0,
        limit: 1000,
        sortBy: 'priority',
        sortOrder: 'desc',
        search: 'report',
        status: null,
      });
    });

    it('returns an empty list as a normal result', async () => {
      await expect(service.listTasks(10)).resolves.toEqual([]);
    });
  });

  describe('topPriorityTasks', () => {
    it('defaults to five tasks', async () => {
      await service.topPriorityTasks(10);
      expect(deps.taskRepo.listTopPriority).toHaveBeenCalledWith({}, 10, 5);
    });

    it('skips storage when zero tasks are requested', async () => {
      await expect(service.topPriorityTasks(10, 0)).resolves.toEqual([]);
      expect(deps.taskRepo.listTopPriority).not.toHaveBeenCalled();
    });
  });

  describe('ownership gate', () => {
    it('returns a task owned by the caller', async () => {
      const task = await service.getTask(10, 1);
      expect(task.id).toBe(1);
    });

    it('signals NOT_FOUND for a missing task', async () => {
      vi.mocked(deps.taskRepo.findById).mockResolvedValueOnce(null);
      await expect(service.getTask(10, 99)).rejects.toMatchObject({ kind: 'NOT_FOUND', message: 'Task not found' });
    });

    it('signals FORBIDDEN for a task owned by someone else', async () => {
      vi.mocked(deps.taskRepo.findById).mockResolvedValueOnce(makeTask({ ownerId: 20 }));
      await expect(service.getTask(10, 1)).rejects.toMatchObject({ kind: 'FORBIDDEN', message: 'Not enough permissions' });
    });

    it('does not update a foreign task', async () => {
      vi.mocked(deps.taskRepo.findById).mockResolvedValueOnce(makeTask({ ownerId: 20 }));
      await expect(service.updateTask(10, 1, { title: 'hijacked' })).rejects.toMatchObject({ kind: 'FORBIDDEN' });
      expect(deps.taskRepo.update).not.toHaveBeenCalled();
    });

    it('does not delete a foreign task', async () => {
      vi.mocked(deps.taskRepo.findById).mockResolvedValueOnce(makeTask({ ownerId: 20 }));
      await expect(service.deleteTask(10, 1)).rejects.toMatchObject({ kind: 'FORBIDDEN' });
      expect(deps.taskRepo.delete).not.toHaveBeenCalled();
    });
  });

  describe('updateTask', () => {
    it('applies the patch and returns the updated task', async () => {
      const task = await service.updateTask(10, 1, { status: 'done' });
      expect(deps.taskRepo.update).toHaveBeenCalledWith({}, 1, { status: 'done' });
      expect(task.status).toBe('done');
    });

    it('signals NOT_FOUND when the task vanishes before the write', async () => {
      vi.mocked(deps.taskRepo.update).mockResolvedValueOnce(null);
      await expect(service.updateTask(10, 1, { priority: 3 })).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });
  });

  describe('deleteTask', () => {
    it('returns the deleted task', async () => {
      const task = await service.deleteTask(10, 1);
      expect(task.id).toBe(1);
      expect(deps.taskRepo.delete).toHaveBeenCalledWith({}, 1);
    });
  });
});
