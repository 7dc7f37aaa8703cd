import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

export const RedisConfigSchema = z.object({
  REDIS_URL: z.string().default('redis://localhost:6379'),
});

const JwtKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32, 'JWT secrets must be at least 32 characters'),
});

const JwtKeysSchema = z
  .string()
  .transform((raw, ctx): unknown => {
    try {
      return JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be a JSON array' });
      return z.NEVER;
    }
  })
  .pipe(z.array(JwtKeySchema).min(1, 'JWT_KEYS must contain at least one key'));

export const JwtConfigSchema = z.object({
  JWT_ACTIVE_KID: z.string().min(1),
  JWT_KEYS: JwtKeysSchema,
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
});

export const CacheConfigSchema = z.object({
  CACHE_DRIVER: z.enum(['redis', 'memory']).default('redis'),
  RESPONSE_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(30),
});

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(RedisConfigSchema)
  .merge(JwtConfigSchema)
  .merge(CacheConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(3000),
    AUTH_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(20),
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export function loadConfig<T extends z.ZodTypeAny>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
