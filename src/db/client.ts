import { Redis } from 'ioredis';
import { Stores } from '@/contracts';
import { getRedisClient } from '@/config/redis';
import { RedisCatalogStore } from './redis/catalogStore';
import { RedisCartStore } from './redis/cartStore';
import { RedisOrderStore } from './redis/orderStore';
import { RedisIdempotencyStore } from './redis/idempotencyStore';

export function createRedisStores(redis: Redis): Stores {
  return {
    catalog: new RedisCatalogStore(redis),
    carts: new RedisCartStore(redis),
    orders: new RedisOrderStore(redis),
    idempotency: new RedisIdempotencyStore(redis),
  };
}

let _stores: Stores | null = null;

export function getStores(): Stores {
  if (!_stores) {
    _stores = createRedisStores(getRedisClient());
  }
  return _stores;
}
