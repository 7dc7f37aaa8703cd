import { buildServer } from './server';
import {
  loadConfig,
  ApiConfigSchema,
  createLogger,
  RedisConnection,
  RedisResponseCache,
  InMemoryResponseCache,
  type ResponseCache,
} from '@tasknest/shared';
import { initPool, closePool, withTransaction, PgUserRepository, PgTaskRepository } from '@tasknest/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({ connectionString: config.DATABASE_URL });

  const redis = config.CACHE_DRIVER === 'redis' ? new RedisConnection(config.REDIS_URL) : null;

  let responseCache: ResponseCache;
  if (redis) {
    responseCache = new RedisResponseCache(redis.open());
  } else {
    responseCache = new InMemoryResponseCache();
  }

  const app = await buildServer(
    {
      jwtActiveKid: config.JWT_ACTIVE_KID,
      jwtKeys: config.JWT_KEYS,
      accessTokenTtlSeconds: config.ACCESS_TOKEN_TTL_SECONDS,
      responseCacheTtlSeconds: config.RESPONSE_CACHE_TTL_SECONDS,
      authRateLimitPerMinute: config.AUTH_RATE_LIMIT_PER_MINUTE,
    },
    {
      userRepo: new PgUserRepository(),
      taskRepo: new PgTaskRepository(),
      withTransaction,
      responseCache,
    },
  );

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT, cacheDriver: config.CACHE_DRIVER }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await redis?.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
