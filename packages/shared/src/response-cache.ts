import { type z } from 'zod';
import { createLogger } from './logger';

const logger = createLogger({ name: 'response-cache' });

export type CacheParamValue = string | number | boolean | null | undefined;

/**
 * Memoizes read results for a fixed TTL. Writes to the underlying data do not
 * invalidate entries: a cached read may lag a write by up to the TTL.
 * Concurrent misses on one key may each compute; the last store wins.
 */
export interface ResponseCache {
  getOrCompute<T>(
    key: string,
    ttlSeconds: number,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    compute: () => Promise<T>,
  ): Promise<T>;
}

/**
 * Builds a key from every input that shapes a result. Parameter order does not
 * matter and undefined parameters are dropped, so `?skip=0&limit=5` and
 * `?limit=5&skip=0` share a slot; two users never do.
 */
export function buildCacheKey(
  namespace: string,
  userId: number | string,
  params: Record<string, CacheParamValue> = {},
): string {
  const entries = Object.keys(params)
    .sort()
    .flatMap((name) => {
      const value = params[name];
      return value === undefined ? [] : [[name, value] as const];
    });
  return `${namespace}:user=${userId}:${JSON.stringify(entries)}`;
}

function decode<T>(payload: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return undefined;
  }
  const result = schema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

function assertTtl(ttlSeconds: number): void {
  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new Error(`Cache TTL must be a positive integer, got ${ttlSeconds}`);
  }
}

/** The slice of an ioredis client the cache uses. */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
}

export class RedisResponseCache implements ResponseCache {
  constructor(
    private readonly redis: RedisCacheClient,
    private readonly keyPrefix: string = 'response-cache:',
  ) {}

  async getOrCompute<T>(
    key: string,
    ttlSeconds: number,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    compute: () => Promise<T>,
  ): Promise<T> {
    assertTtl(ttlSeconds);
    const redisKey = this.keyPrefix + key;

    let raw: string | null = null;
    try {
      raw = await this.redis.get(redisKey);
    } catch (err) {
      logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Cache read failed');
    }

    if (raw !== null) {
      const hit = decode(raw, schema);
      if (hit !== undefined) {
        logger.debug({ key }, 'Cache hit');
        return hit;
      }
    }

    logger.debug({ key }, 'Cache miss');
    const value = await compute();
    try {
      await this.redis.set(redisKey, JSON.stringify(value), 'EX', ttlSeconds);
    } catch (err) {
      logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Cache write failed');
    }
    return value;
  }
}

export class InMemoryResponseCache implements ResponseCache {
  private readonly entries = new Map<string, { payload: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async getOrCompute<T>(
    key: string,
    ttlSeconds: number,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    compute: () => Promise<T>,
  ): Promise<T> {
    assertTtl(ttlSeconds);
    this.sweepExpired();

    const entry = this.entries.get(key);
    if (entry) {
      const hit = decode(entry.payload, schema);
      if (hit !== undefined) {
        logger.debug({ key }, 'Cache hit');
        return hit;
      }
      this.entries.delete(key);
    }

    logger.debug({ key }, 'Cache miss');
    const value = await compute();
    this.entries.set(key, {
      payload: JSON.stringify(value),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
    return value;
  }

  private sweepExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
