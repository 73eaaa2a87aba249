import Redis from 'ioredis';
import { type SafeLogger } from './logger';

/**
 * Opens the process-wide Redis connection. The entry point owns the returned
 * client and passes it to whatever needs it.
 */
export function createRedis(url: string, logger: SafeLogger): Redis {
  const client = new Redis(url, { lazyConnect: false, maxRetriesPerRequest: 3 });
  client.on('error', (err: Error) => {
    logger.error({ err: err.message }, 'Redis connection error');
  });
  logger.info({}, 'Redis client initialized');
  return client;
}

export async function closeRedis(client: Redis, logger: SafeLogger): Promise<void> {
  await client.quit();
  logger.info({}, 'Redis client closed');
}
