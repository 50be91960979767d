import { Redis } from 'ioredis';
import { z } from 'zod';
import { IOrderStore, OrderData, OrderStatus } from '@/contracts';
import { keys } from './keys';
import { storeCall } from './storeCall';

// The snapshot is written once; status and updatedAt live beside it so a
// transition never rewrites the priced line items.
const snapshotSchema = z.object({
  userId: z.string(),
  lineItems: z.array(z.object({
    productId: z.string(),
    quantity: z.number().int().positive(),
    unitPriceSnapshot: z.number().int().nonnegative(),
  })),
  total: z.number().int().nonnegative(),
  idempotencyToken: z.string().nullable(),
  createdAt: z.number().int(),
});

const orderHashSchema = z.object({
  data: z.string(),
  status: z.nativeEnum(OrderStatus),
  updatedAt: z.coerce.number().int(),
});

const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('HSET', KEYS[1], 'data', ARGV[1], 'status', ARGV[2], 'updatedAt', ARGV[3])
return 1
`;

const TRANSITION_SCRIPT = `
if redis.call('HGET', KEYS[1], 'status') ~= ARGV[1] then return 0 end
redis.call('HSET', KEYS[1], 'status', ARGV[2], 'updatedAt', ARGV[3])
return 1
`;

export class RedisOrderStore implements IOrderStore {
  constructor(private readonly redis: Redis) {}

  async createOrder(order: OrderData): Promise<boolean> {
    const snapshot = JSON.stringify({
      userId: order.userId,
      lineItems: order.lineItems,
      total: order.total,
      idempotencyToken: order.idempotencyToken,
      createdAt: order.createdAt.getTime(),
    });
    const createdAtMs = order.createdAt.getTime();

    // Index first: a dangling entry is harmless (getOrder returns null), an unindexed order would escape the sweep
    if (order.status === OrderStatus.PENDING) {
      await storeCall('orders.indexPending', () => this.redis.zadd(keys.ordersPending(), createdAtMs, order.orderId));
    }
    await storeCall('orders.indexUser', () => this.redis.zadd(keys.ordersByUser(order.userId), createdAtMs, order.orderId));

    const created = await storeCall('orders.create', () =>
      this.redis.eval(CREATE_SCRIPT, 1, keys.order(order.orderId), snapshot, order.status, String(order.updatedAt.getTime())),
    );
    if (created === 1) return true;

    // Lost to an existing order; if that one has already settled, take back the pending entry just added
    if (order.status === OrderStatus.PENDING) {
      const status = await storeCall('orders.getStatus', () => this.redis.hget(keys.order(order.orderId), 'status'));
      if (status !== OrderStatus.PENDING) await this.unindexPending(order.orderId);
    }
    return false;
  }

  async getOrder(orderId: string): Promise<OrderData | null> {
    const hash = await storeCall('orders.get', () => this.redis.hgetall(keys.order(orderId)));
    if (Object.keys(hash).length === 0) return null;

    const stored = orderHashSchema.parse(hash);
    const snapshot = snapshotSchema.parse(JSON.parse(stored.data));
    return {
      orderId,
      userId: snapshot.userId,
      lineItems: snapshot.lineItems,
      total: snapshot.total,
      status: stored.status,
      idempotencyToken: snapshot.idempotencyToken,
      createdAt: new Date(snapshot.createdAt),
      updatedAt: new Date(stored.updatedAt),
    };
  }

  async transitionStatus(orderId: string, from: OrderStatus, to: OrderStatus, at: Date): Promise<boolean> {
    const applied = await storeCall('orders.transition', () =>
      this.redis.eval(TRANSITION_SCRIPT, 1, keys.order(orderId), from, to, String(at.getTime())),
    );
    if (applied !== 1) return false;

    if (from === OrderStatus.PENDING) await this.unindexPending(orderId);
    return true;
  }

  async unindexPending(orderId: string): Promise<void> {
    await storeCall('orders.unindexPending', () => this.redis.zrem(keys.ordersPending(), orderId));
  }

  async listPendingBefore(before: Date): Promise<string[]> {
    return storeCall('orders.listPending', () =>
      this.redis.zrangebyscore(keys.ordersPending(), '-inf', before.getTime()),
    );
  }

  async listCompletedSince(userId: string, since: Date): Promise<OrderData[]> {
    const ids = await storeCall('orders.listByUser', () =>
      this.redis.zrangebyscore(keys.ordersByUser(userId), since.getTime(), '+inf'),
    );
    const orders = await Promise.all(ids.map((id) => this.getOrder(id)));
    return orders.filter((order): order is OrderData => order !== null && order.status === OrderStatus.COMPLETED);
  }
}
