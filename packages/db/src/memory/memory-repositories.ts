import {
  type User,
  type Task,
  type NewTask,
  type TaskPatch,
  type TaskListQuery,
  type UserRepository,
  type TaskRepository,
  applyTaskQuery,
  rankTopPriority,
} from '@tasknest/domain';

/**
 * In-process stand-ins for the pg repositories. Each call completes without
 * yielding mid-way, so there is nothing to isolate and the transaction handle
 * is ignored.
 */
export async function withMemoryTransaction<T>(fn: (tx: unknown) => Promise<T>): Promise<T> {
  return fn(undefined);
}

export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<number, User>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(_tx: unknown, user: { email: string; passwordHash: string }): Promise<User | null> {
    for (const existing of this.users.values()) {
      if (existing.email === user.email) return null;
    }
    const created: User = {
      id: this.nextId++,
      email: user.email,
      passwordHash: user.passwordHash,
      createdAt: this.now(),
    };
    this.users.set(created.id, created);
    return { ...created };
  }

  async findByEmail(_tx: unknown, email: string): Promise<User | null> {
    for (const user of this.users.values()) {
      if (user.email === email) return { ...user };
    }
    return null;
  }

  /** Drops a user row without touching their tasks. */
  remove(id: number): void {
    this.users.delete(id);
  }
}

export class InMemoryTaskRepository implements TaskRepository {
  private readonly tasks = new Map<number, Task>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(_tx: unknown, task: NewTask): Promise<Task> {
    const timestamp = this.now();
    const created: Task = { id: this.nextId++, ...task, createdAt: timestamp, updatedAt: timestamp };
    this.tasks.set(created.id, created);
    return { ...created };
  }

  async findById(_tx: unknown, id: number): Promise<Task | null> {
    const task = this.tasks.get(id);
    return task ? { ...task } : null;
  }

  async update(_tx: unknown, id: number, patch: TaskPatch): Promise<Task | null> {
    const task = this.tasks.get(id);
    if (!task) return null;

    const updated: Task = {
      ...task,
      title: patch.title ?? task.title,
      description: patch.description === undefined ? task.description : patch.description,
      status: patch.status ?? task.status,
      priority: patch.priority ?? task.priority,
      updatedAt: this.now(),
    };
    this.tasks.set(id, updated);
    return { ...updated };
  }

  async delete(_tx: unknown, id: number): Promise<Task | null> {
    const task = this.tasks.get(id);
    if (!task) return null;
    this.tasks.delete(id);
    return task;
  }

  async list(_tx: unknown, ownerId: number, query: TaskListQuery): Promise<Task[]> {
    return applyTaskQuery(this.tasks.values(), ownerId, query).map((task) => ({ ...task }));
  }

  async listTopPriority(_tx: unknown, ownerId: number, limit: number): Promise<Task[]> {
    return rankTopPriority(this.tasks.values(), ownerId, limit).map((task) => ({ ...task }));
  }
}
