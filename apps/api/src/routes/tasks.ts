import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, buildCacheKey, type ResponseCache } from '@tasknest/shared';
import { TaskError, type Task, type TaskService } from '@tasknest/domain';
import {
  CreateTaskRequestSchema,
  UpdateTaskRequestSchema,
  ListTasksQuerySchema,
  TopPriorityQuerySchema,
  TaskIdParamsSchema,
  TaskListResponseSchema,
  type TaskResponse,
} from '@tasknest/proto';
import { currentUser, type createAuthMiddleware } from '../plugins/auth';
import { parseRequest } from '../plugins/validation';

interface TaskRouteDeps<Tx> {
  taskService: TaskService<Tx>;
  authenticate: ReturnType<typeof createAuthMiddleware>;
  responseCache: ResponseCache;
  cacheTtlSeconds: number;
}

function mapTaskError(err: unknown): never {
  if (err instanceof TaskError) {
    const codeMap: Record<TaskError['kind'], ErrorCode> = {
      NOT_FOUND: ErrorCode.NOT_FOUND,
      FORBIDDEN: ErrorCode.FORBIDDEN,
    };
    throw new AppError(codeMap[err.kind], err.message);
  }
  throw err;
}

// Key order follows TaskResponseSchema so cached and fresh bodies serialize identically.
export function toTaskResponse(task: Task): TaskResponse {
  return {
    id: task.id,
    owner_id: task.ownerId,
    title: task.title,
    description: task.description,
    status: task.status,
    priority: task.priority,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString(),
  };
}

export function registerTaskRoutes<Tx>(app: FastifyInstance, deps: TaskRouteDeps<Tx>): void {
  const { taskService, authenticate, responseCache, cacheTtlSeconds } = deps;

  app.post('/tasks', { preHandler: [authenticate] }, async (request, reply) => {
    const user = currentUser(request);
    const input = parseRequest(CreateTaskRequestSchema, request.body, 'Invalid task data');

    const task = await taskService.createTask(user.id, input);
    return reply.status(200).send(toTaskResponse(task));
  });

  // Cached for cacheTtlSeconds; writes show up here once the entry expires.
  app.get('/tasks', { preHandler: [authenticate] }, async (request, reply) => {
    const user = currentUser(request);
    const query = parseRequest(ListTasksQuerySchema, request.query, 'Invalid task query');

    const key = buildCacheKey('tasks:list', user.id, query);
    const tasks = await responseCache.getOrCompute(key, cacheTtlSeconds, TaskListResponseSchema, async () => {
      const found = await taskService.listTasks(user.id, {
        skip: query.skip,
        limit: query.limit,
        sortBy: query.sort_by,
        sortOrder: query.sort_order,
        search: query.search,
        status: query.status,
      });
      return found.map(toTaskResponse);
    });
    return reply.status(200).send(tasks);
  });

  app.get('/tasks/top_priority', { preHandler: [authenticate] }, async (request, reply) => {
    const user = currentUser(request);
    const { n } = parseRequest(TopPriorityQuerySchema, request.query, 'Invalid top priority query');

    const key = buildCacheKey('tasks:top_priority', user.id, { n });
    const tasks = await responseCache.getOrCompute(key, cacheTtlSeconds, TaskListResponseSchema, async () => {
      const found = await taskService.topPriorityTasks(user.id, n);
      return found.map(toTaskResponse);
    });
    return reply.status(200).send(tasks);
  });

  app.get('/tasks/:id', { preHandler: [authenticate] }, async (request, reply) => {
    const user = currentUser(request);
    const { id } = parseRequest(TaskIdParamsSchema, request.params, 'Invalid task id');

    try {
      const task = await taskService.getTask(user.id, id);
      return reply.status(200).send(toTaskResponse(task));
    } catch (err) {
      return mapTaskError(err);
    }
  });

  app.put('/tasks/:id', { preHandler: [authenticate] }, async (request, reply) => {
    const user = currentUser(request);
    const { id } = parseRequest(TaskIdParamsSchema, request.params, 'Invalid task id');
    const patch = parseRequest(UpdateTaskRequestSchema, request.body, 'Invalid task data');

    try {
      const task = await taskService.updateTask(user.id, id, patch);
      return reply.status(200).send(toTaskResponse(task));
    } catch (err) {
      return mapTaskError(err);
    }
  });

  app.delete('/tasks/:id', { preHandler: [authenticate] }, async (request, reply) => {
    const user = currentUser(request);
    const { id } = parseRequest(TaskIdParamsSchema, request.params, 'Invalid task id');

    try {
      const task = await taskService.deleteTask(user.id, id);
      return reply.status(200).send(toTaskResponse(task));
    } catch (err) {
      return mapTaskError(err);
    }
  });
}
