import { Redis } from 'ioredis';
import { z } from 'zod';
import { CartLineData, DeleteLineOptions, ICartStore } from '@/contracts';
import { assertValidQuantity } from '@/cart/cartService';
import { keys } from './keys';
import { storeCall } from './storeCall';

const storedLineSchema = z.object({
  quantity: z.number().int().positive(),
  updatedAt: z.number().int(),
});

// KEYS[1] cart hash, ARGV[1] productId, ARGV[2] unmodifiedSince millis or ''
const DELETE_LINE_SCRIPT = `
local raw = redis.call('HGET', KEYS[1], ARGV[1])
if not raw then return 0 end
if ARGV[2] ~= '' then
  local line = cjson.decode(raw)
  if tonumber(line.updatedAt) > tonumber(ARGV[2]) then return 0 end
end
redis.call('HDEL', KEYS[1], ARGV[1])
return 1
`;

export class RedisCartStore implements ICartStore {
  constructor(
    private readonly redis: Redis,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async getLines(userId: string): Promise<CartLineData[]> {
    const all = await storeCall('cart.getLines', () => this.redis.hgetall(keys.cart(userId)));
    return Object.entries(all)
      .map(([productId, raw]) => {
        const stored = storedLineSchema.parse(JSON.parse(raw));
        return { userId, productId, quantity: stored.quantity, updatedAt: new Date(stored.updatedAt) };
      })
      .sort((a, b) => a.productId.localeCompare(b.productId));
  }

  async putLine(userId: string, productId: string, quantity: number): Promise<CartLineData> {
    assertValidQuantity(quantity);
    const updatedAt = this.now();
    const value = JSON.stringify({ quantity, updatedAt: updatedAt.getTime() });
    await storeCall('cart.putLine', () => this.redis.hset(keys.cart(userId), productId, value));
    await storeCall('cart.indexUser', () => this.redis.sadd(keys.cartUsers(), userId));
    return { userId, productId, quantity, updatedAt };
  }

  async deleteLine(userId: string, productId: string, options: DeleteLineOptions = {}): Promise<boolean> {
    const since = options.unmodifiedSince ? String(options.unmodifiedSince.getTime()) : '';
    const removed = await storeCall('cart.deleteLine', () =>
      this.redis.eval(DELETE_LINE_SCRIPT, 1, keys.cart(userId), productId, since),
    );
    return removed === 1;
  }

  async listUsers(): Promise<string[]> {
    return storeCall('cart.listUsers', () => this.redis.smembers(keys.cartUsers()));
  }

  async forgetUser(userId: string): Promise<void> {
    await storeCall('cart.forgetUser', () => this.redis.srem(keys.cartUsers(), userId));
  }
}
