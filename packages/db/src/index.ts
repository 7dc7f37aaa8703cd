export { initPool, closePool, getPool, withTransaction } from './client';
export { PgUserRepository } from './repositories/user-repository';
export {
  PgTaskRepository,
  buildTaskListQuery,
  buildTaskUpdateQuery,
  escapeLikePattern,
  type SqlQuery,
} from './repositories/task-repository';
export {
  InMemoryUserRepository,
  InMemoryTaskRepository,
  withMemoryTransaction,
} from './memory/memory-repositories';
