export * from './api/auth';
export * from './api/task';
