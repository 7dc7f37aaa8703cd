import { type User } from './user';
import { type NewTask, type Task, type TaskPatch } from './task';
import { type TaskListQuery } from './task-query';

/**
 * Storage ports take the caller's transaction handle as their first argument.
 * `Tx` is whatever the adapter's `withTransaction` hands out (a pg `PoolClient`
 * in production).
 */
export type WithTransaction<Tx> = <T>(fn: (tx: Tx) => Promise<T>) => Promise<T>;

export interface UserRepository<Tx = unknown> {
  /** Resolves to null when the email is already taken. */
  create(tx: Tx, user: { email: string; passwordHash: string }): Promise<User | null>;
  findByEmail(tx: Tx, email: string): Promise<User | null>;
}

export interface TaskRepository<Tx = unknown> {
  create(tx: Tx, task: NewTask): Promise<Task>;
  findById(tx: Tx, id: number): Promise<Task | null>;
  update(tx: Tx, id: number, patch: TaskPatch): Promise<Task | null>;
  delete(tx: Tx, id: number): Promise<Task | null>;
  list(tx: Tx, ownerId: number, query: TaskListQuery): Promise<Task[]>;
  listTopPriority(tx: Tx, ownerId: number, limit: number): Promise<Task[]>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface AccessTokenClaims {
  subject: string;
}

export interface TokenService {
  signAccessToken(subject: string, ttlSeconds?: number): Promise<string>;
  /** Resolves to null for any token that is not fully valid. */
  verifyAccessToken(token: string): Promise<AccessTokenClaims | null>;
}
