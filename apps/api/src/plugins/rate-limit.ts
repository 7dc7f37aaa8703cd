import { type FastifyRequest, type FastifyReply } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@tasknest/shared';

const logger = createLogger({ name: 'api:rate-limit' });

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}

/**
 * Fixed-window counters per key. Counters live in this process only, and a
 * window opens on the first hit for its key.
 */
export class FixedWindowCounter {
  private readonly windows = new Map<string, { count: number; resetAt: number }>();
  private readonly now: () => number;

  constructor(private readonly opts: RateLimitOptions) {
    this.now = opts.now ?? Date.now;
  }

  /** Records a hit and reports whether the key is still within its limit. */
  hit(key: string): boolean {
    const now = this.now();
    let window = this.windows.get(key);
    if (!window || window.resetAt <= now) {
      window = { count: 0, resetAt: now + this.opts.windowMs };
      this.windows.set(key, window);
    }
    window.count++;
    return window.count <= this.opts.maxRequests;
  }

  sweep(): void {
    const now = this.now();
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) {
        this.windows.delete(key);
      }
    }
  }

  get size(): number {
    return this.windows.size;
  }
}

/** Client IP plus the submitted username, so one caller cannot lock out another account. */
export function loginAttemptKey(request: FastifyRequest): string {
  const body = request.body;
  const username =
    typeof body === 'object' && body !== null && 'username' in body && typeof body.username === 'string'
      ? body.username.trim()
      : '';
  return `${request.ip}:${username}`;
}

export function createRateLimiter(
  opts: RateLimitOptions & { keyFor?: (request: FastifyRequest) => string },
) {
  const counter = new FixedWindowCounter(opts);
  const keyFor = opts.keyFor ?? ((request: FastifyRequest) => request.ip);

  setInterval(() => counter.sweep(), opts.windowMs).unref();

  return async function rateLimit(request: FastifyRequest, _reply: FastifyReply) {
    if (!counter.hit(keyFor(request))) {
      logger.warn({ requestId: request.id, url: request.url }, 'Rate limit exceeded');
      throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later');
    }
  };
}
