import Fastify from 'fastify';
import {
  createLogger,
  JoseTokenService,
  Argon2PasswordHasher,
  type ResponseCache,
} from '@tasknest/shared';
import {
  AuthService,
  TaskService,
  type UserRepository,
  type TaskRepository,
  type WithTransaction,
  type PasswordHasher,
} from '@tasknest/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { createRateLimiter, loginAttemptKey } from './plugins/rate-limit';
import { registerAuthRoutes } from './routes/auth';
import { registerTaskRoutes } from './routes/tasks';
import { registerUserRoutes } from './routes/users';

const logger = createLogger({ name: 'api' });

export interface ServerConfig {
  jwtActiveKid: string;
  jwtKeys: Array<{ kid: string; secret: string }>;
  accessTokenTtlSeconds: number;
  responseCacheTtlSeconds: number;
  authRateLimitPerMinute: number;
}

export interface ServerDeps<Tx> {
  userRepo: UserRepository<Tx>;
  taskRepo: TaskRepository<Tx>;
  withTransaction: WithTransaction<Tx>;
  responseCache: ResponseCache;
  passwordHasher?: PasswordHasher;
}

export async function buildServer<Tx>(config: ServerConfig, deps: ServerDeps<Tx>) {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
    ignoreTrailingSlash: true,
  });

  registerErrorHandler(app);

  // OAuth2 password-grant clients post the token form url-encoded.
  app.addContentTypeParser(
    'application/x-www-form-urlencoded',
    { parseAs: 'string' },
    (_request, body, done) => {
      done(null, Object.fromEntries(new URLSearchParams(body.toString())));
    },
  );

  const tokenService = new JoseTokenService({
    activeKid: config.jwtActiveKid,
    keys: config.jwtKeys,
    accessTokenTtlSeconds: config.accessTokenTtlSeconds,
  });

  const authService = new AuthService({
    userRepo: deps.userRepo,
    passwordHasher: deps.passwordHasher ?? new Argon2PasswordHasher(),
    tokenService,
    withTransaction: deps.withTransaction,
    accessTokenTtlSeconds: config.accessTokenTtlSeconds,
  });

  const taskService = new TaskService({
    taskRepo: deps.taskRepo,
    withTransaction: deps.withTransaction,
  });

  const authenticate = createAuthMiddleware(authService);
  const registerRateLimit = createRateLimiter({ windowMs: 60_000, maxRequests: config.authRateLimitPerMinute });
  const tokenRateLimit = createRateLimiter({
    windowMs: 60_000,
    maxRequests: config.authRateLimitPerMinute,
    keyFor: loginAttemptKey,
  });

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerAuthRoutes(app, { authService, registerRateLimit, tokenRateLimit });
  registerUserRoutes(app, { authenticate });
  registerTaskRoutes(app, {
    taskService,
    authenticate,
    responseCache: deps.responseCache,
    cacheTtlSeconds: config.responseCacheTtlSeconds,
  });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info(
      { method: request.method, url: request.url, requestId: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  return app;
}
