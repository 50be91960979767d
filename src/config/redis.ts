import { Redis } from 'ioredis';
import { env } from '@/config/env';

let _redis: Redis | null = null;

// Shared client for the stores. Commands that outlive the timeout reject and
// surface as TransientStoreError.
export function getRedisClient(): Redis {
  if (!_redis) {
    _redis = new Redis(env.REDIS_URL, {
      commandTimeout: env.STORE_COMMAND_TIMEOUT_MS,
      maxRetriesPerRequest: 2,
    });
  }
  return _redis;
}

export async function closeRedisClient(): Promise<void> {
  if (_redis) {
    await _redis.quit();
    _redis = null;
  }
}

// Plain options for BullMQ, which opens its own blocking connections (avoids ioredis version conflicts)
export function getRedisConnectionConfig(): {
  host: string;
  port: number;
  username?: string;
  password?: string;
  maxRetriesPerRequest: null;
} {
  const url = new URL(env.REDIS_URL);
  return {
    host: url.hostname,
    port: parseInt(url.port || '6379', 10),
    ...(url.username ? { username: decodeURIComponent(url.username) } : {}),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
    maxRetriesPerRequest: null,
  };
}
