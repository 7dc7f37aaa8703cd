export type TaskStatus = 'pending' | 'in_progress' | 'done';

export interface Task {
  id: number;
  ownerId: number;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewTask {
  ownerId: number;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: number;
}

/** Fields left undefined are not touched by an update. */
export interface TaskPatch {
  title?: string;
  description?: string | null;
  status?: TaskStatus;
  priority?: number;
}

export const DEFAULT_TASK_PRIORITY = 1;
export const DEFAULT_TASK_STATUS: TaskStatus = 'pending';
