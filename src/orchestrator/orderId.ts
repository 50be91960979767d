import { v4 as uuidv4, v5 as uuidv5 } from 'uuid';

const ORDER_ID_NAMESPACE = '6f1c2a7e-3b4d-4f8a-9c2e-5d7b1a0e4c93';

export function generateOrderId(): string {
  return uuidv4();
}

/** Same (userId, token) always yields the same id, so a retried checkout finds its own order. */
export function deriveOrderId(userId: string, idempotencyToken: string): string {
  return uuidv5(JSON.stringify([userId, idempotencyToken]), ORDER_ID_NAMESPACE);
}
