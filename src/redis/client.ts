import Redis from 'ioredis';
import { log } from '../log';

export type RedisClient = Redis;

let singleton: Redis | null = null;

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: false,
  });

  client.on('ready', () => {
    log.info({ event: 'redis_ready' }, 'redis ready');
  });

  client.on('error', (error) => {
    log.error({ event: 'redis_error', err: error }, 'redis error');
  });

  client.on('end', () => {
    log.warn({ event: 'redis_end' }, 'redis connection ended');
  });

  return client;
}

/** Shared connection; configureRedis must run first (see runtime). */
export function getRedisClient(): Redis {
  if (!singleton) {
    throw new Error('redis client not configured');
  }
  return singleton;
}

export function configureRedis(url: string): Redis {
  if (!singleton) {
    singleton = createRedisClient(url);
  }
  return singleton;
}

export async function closeRedis(): Promise<void> {
  const client = singleton;
  singleton = null;
  if (client) {
    await client.quit();
  }
}
