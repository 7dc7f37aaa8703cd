import {
  type Task,
  type TaskPatch,
  type TaskStatus,
  DEFAULT_TASK_PRIORITY,
  DEFAULT_TASK_STATUS,
} from './task';
import { type TaskRepository, type WithTransaction } from './ports';
import { normalizeTaskQuery, normalizeTopPriorityCount, type TaskListParams } from './task-query';

export interface TaskServiceDeps<Tx = unknown> {
  taskRepo: TaskRepository<Tx>;
  withTransaction: WithTransaction<Tx>;
}

export interface CreateTaskInput {
  title: string;
  description?: string | null;
  status?: TaskStatus;
  priority?: number | null;
}

export class TaskService<Tx = unknown> {
  constructor(private readonly deps: TaskServiceDeps<Tx>) {}

  async createTask(userId: number, input: CreateTaskInput): Promise<Task> {
    return this.deps.withTransaction((tx) =>
      this.deps.taskRepo.create(tx, {
        ownerId: userId,
        title: input.title,
        description: input.description ?? null,
        status: input.status ?? DEFAULT_TASK_STATUS,
        priority: input.priority ?? DEFAULT_TASK_PRIORITY,
      }),
    );
  }

  async listTasks(userId: number, params: TaskListParams = {}): Promise<Task[]> {
    const query = normalizeTaskQuery(params);
    return this.deps.withTransaction((tx) => this.deps.taskRepo.list(tx, userId, query));
  }

  async topPriorityTasks(userId: number, n?: number): Promise<Task[]> {
    const limit = normalizeTopPriorityCount(n);
    if (limit === 0) return [];
    return this.deps.withTransaction((tx) =>
      this.deps.taskRepo.listTopPriority(tx, userId, limit),
    );
  }

  async getTask(userId: number, taskId: number): Promise<Task> {
    return this.deps.withTransaction((tx) => this.getOwnedTask(tx, userId, taskId));
  }

  async updateTask(userId: number, taskId: number, patch: TaskPatch): Promise<Task> {
    return this.deps.withTransaction(async (tx) => {
      await this.getOwnedTask(tx, userId, taskId);

      const updated = await this.deps.taskRepo.update(tx, taskId, patch);
      if (!updated) {
        throw new TaskError('NOT_FOUND', 'Task not found');
      }
      return updated;
    });
  }

  async deleteTask(userId: number, taskId: number): Promise<Task> {
    return this.deps.withTransaction(async (tx) => {
      await this.getOwnedTask(tx, userId, taskId);

      const deleted = await this.deps.taskRepo.delete(tx, taskId);
      if (!deleted) {
        throw new TaskError('NOT_FOUND', 'Task not found');
      }
      return deleted;
    });
  }

  /** A missing task and a task owned by someone else fail differently. */
  private async getOwnedTask(tx: Tx, userId: number, taskId: number): Promise<Task> {
    const task = await this.deps.taskRepo.findById(tx, taskId);
    if (!task) {
      throw new TaskError('NOT_FOUND', 'Task not found');
    }
    if (task.ownerId !== userId) {
      throw new TaskError('FORBIDDEN', 'Not enough permissions');
    }
    return task;
  }
}

export class TaskError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND' | 'FORBIDDEN',
    message: string,
  ) {
    super(message);
    this.name = 'TaskError';
  }
}
