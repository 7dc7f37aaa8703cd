import Redis from 'ioredis';
import { createLogger } from './logger';

const logger = createLogger({ name: 'redis' });

export type RedisClientFactory = (url: string) => Redis;

const defaultFactory: RedisClientFactory = (url) => new Redis(url, { maxRetriesPerRequest: 3 });

/**
 * Owns one Redis client from `open()` to `close()`. The process entry point
 * holds the connection and hands `open()`'s client to whatever needs it.
 */
export class RedisConnection {
  private client: Redis | null = null;

  constructor(
    private readonly url: string,
    private readonly createClient: RedisClientFactory = defaultFactory,
  ) {}

  open(): Redis {
    if (this.client) return this.client;

    const client = this.createClient(this.url);
    client.on('error', (err: Error) => {
      logger.error({ err: err.message }, 'Redis connection error');
    });
    this.client = client;
    logger.info({}, 'Redis client initialized');
    return client;
  }

  get isOpen(): boolean {
    return this.client !== null;
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;

    // A lazy client that never connected has nothing to QUIT.
    if (client.status === 'wait') {
      client.disconnect();
    } else {
      await client.quit();
    }
    logger.info({}, 'Redis client closed');
  }
}
