export type { User } from './user';
export {
  type Task,
  type TaskStatus,
  type NewTask,
  type TaskPatch,
  DEFAULT_TASK_PRIORITY,
  DEFAULT_TASK_STATUS,
} from './task';
export type {
  WithTransaction,
  UserRepository,
  TaskRepository,
  PasswordHasher,
  TokenService,
  AccessTokenClaims,
} from './ports';
export {
  DEFAULT_TASK_PAGE_SIZE,
  MAX_TASK_PAGE_SIZE,
  DEFAULT_TOP_PRIORITY_COUNT,
  MAX_TOP_PRIORITY_COUNT,
  normalizeTaskQuery,
  normalizeTopPriorityCount,
  resolveSortKey,
  resolveSortOrder,
  compareTasks,
  compareByPriority,
  matchesTaskQuery,
  applyTaskQuery,
  rankTopPriority,
  type TaskSortKey,
  type SortOrder,
  type TaskListParams,
  type TaskListQuery,
} from './task-query';
export { AuthService, AuthError, type AuthServiceDeps, type AuthResult } from './auth-service';
export { TaskService, TaskError, type TaskServiceDeps, type CreateTaskInput } from './task-service';
