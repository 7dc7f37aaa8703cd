export { createLogger, sanitize, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type ApiConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  RedisConfigSchema,
  JwtConfigSchema,
  CacheConfigSchema,
  ApiConfigSchema,
} from './config';
export { Argon2PasswordHasher } from './auth/password-hasher';
export { JoseTokenService, type TokenServiceConfig } from './auth/token-service';
export { type TokenService, type PasswordHasher } from '@tasknest/domain';
export { RedisConnection, type RedisClientFactory } from './redis';
export {
  RedisResponseCache,
  InMemoryResponseCache,
  buildCacheKey,
  type ResponseCache,
  type RedisCacheClient,
  type CacheParamValue,
} from './response-cache';
