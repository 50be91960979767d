import { Redis } from 'ioredis';
import { z } from 'zod';
import { ClaimResult, IdempotencyRecordData, IIdempotencyStore } from '@/contracts';
import { keys } from './keys';
import { storeCall } from './storeCall';

const storedRecordSchema = z.object({
  orderId: z.string().min(1),
  createdAt: z.number().int(),
});

export class RedisIdempotencyStore implements IIdempotencyStore {
  constructor(private readonly redis: Redis) {}

  async getRecord(userId: string, token: string): Promise<IdempotencyRecordData | null> {
    const raw = await storeCall('idempotency.getRecord', () => this.redis.get(keys.idempotency(userId, token)));
    if (raw === null) return null;
    const stored = storedRecordSchema.parse(JSON.parse(raw));
    return { userId, token, orderId: stored.orderId, createdAt: new Date(stored.createdAt) };
  }

  async claim(userId: string, token: string, orderId: string, at: Date): Promise<ClaimResult> {
    const value = JSON.stringify({ orderId, createdAt: at.getTime() });
    const result = await storeCall('idempotency.claim', () =>
      this.redis.set(keys.idempotency(userId, token), value, 'NX'),
    );
    if (result === 'OK') {
      return { claimed: true, record: { userId, token, orderId, createdAt: at } };
    }

    const existing = await this.getRecord(userId, token);
    if (!existing) {
      // Records are never deleted, so a lost SET NX with no record behind it means the store is misbehaving
      throw new Error(`Idempotency claim lost for token ${token} but no record was found`);
    }
    return { claimed: false, record: existing };
  }
}
