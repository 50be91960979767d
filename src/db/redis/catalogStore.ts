import { Redis } from 'ioredis';
import { z } from 'zod';
import { ICatalogStore, ProductData } from '@/contracts';
import { keys } from './keys';
import { storeCall } from './storeCall';

const storedProductSchema = z.object({
  name: z.string(),
  price: z.number().int().nonnegative(),
  description: z.string().default(''),
  imageUrl: z.string().default(''),
});

function decode(productId: string, raw: string): ProductData {
  return { productId, ...storedProductSchema.parse(JSON.parse(raw)) };
}

export class RedisCatalogStore implements ICatalogStore {
  constructor(private readonly redis: Redis) {}

  async getProduct(productId: string): Promise<ProductData | null> {
    const raw = await storeCall('catalog.getProduct', () => this.redis.hget(keys.catalog(), productId));
    return raw === null ? null : decode(productId, raw);
  }

  async listProducts(): Promise<ProductData[]> {
    const all = await storeCall('catalog.listProducts', () => this.redis.hgetall(keys.catalog()));
    return Object.entries(all)
      .map(([productId, raw]) => decode(productId, raw))
      .sort((a, b) => a.productId.localeCompare(b.productId));
  }

  async putProduct(product: ProductData): Promise<void> {
    const { productId, ...rest } = product;
    await storeCall('catalog.putProduct', () => this.redis.hset(keys.catalog(), productId, JSON.stringify(rest)));
  }
}
