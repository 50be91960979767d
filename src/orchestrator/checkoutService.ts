import {
  CheckoutResult,
  EmptyCartError,
  ICartStore,
  OrderData,
  OrderFailedError,
  OrderStatus,
  Stores,
} from '@/contracts';
import { priceCart } from './pricing';
import { deriveOrderId, generateOrderId } from './orderId';
import { transitionOrder } from './transitions';

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

function toResult(order: OrderData): CheckoutResult {
  return { orderId: order.orderId, total: order.total };
}

/**
 * Converts the user's cart into a completed order.
 *
 * Order of writes: pending order, idempotency record, status flip, cart
 * deletes. A crash between any two leaves state that a retry with the same
 * token (or the reconciliation sweep) can finish without pricing the cart
 * a second time.
 *
 * Token-less checkouts racing for the same user may each consume a line.
 */
export async function checkout(
  stores: Stores,
  userId: string,
  idempotencyToken?: string,
  clock: Clock = systemClock,
): Promise<CheckoutResult> {
  if (idempotencyToken !== undefined) {
    const prior = await findPriorAttempt(stores, userId, idempotencyToken);
    if (prior) return resumeOrder(stores, prior, clock);
  }

  // Stamped before the cart read: a line edited after this instant is never treated as consumed
  const createdAt = clock();
  const lines = await stores.carts.getLines(userId);
  if (lines.length === 0) throw new EmptyCartError(userId);

  const priced = await priceCart(stores.catalog, lines);
  if (priced.dropped.length > 0) {
    console.warn(JSON.stringify({
      level: 'warn',
      message: 'Dropped cart lines whose products are no longer in the catalog',
      userId,
      productIds: priced.dropped,
    }));
  }
  if (priced.lineItems.length === 0) throw new EmptyCartError(userId);

  const order: OrderData = {
    orderId: idempotencyToken === undefined ? generateOrderId() : deriveOrderId(userId, idempotencyToken),
    userId,
    lineItems: priced.lineItems,
    total: priced.total,
    status: OrderStatus.PENDING,
    idempotencyToken: idempotencyToken ?? null,
    createdAt,
    updatedAt: createdAt,
  };

  const created = await stores.orders.createOrder(order);
  if (!created) {
    if (idempotencyToken === undefined) {
      throw new Error(`Order id collision on ${order.orderId}`);
    }
    // A concurrent request with the same token wrote the order first
    const existing = await stores.orders.getOrder(order.orderId);
    if (!existing) throw new Error(`Order ${order.orderId} reported as existing but could not be read`);
    return resumeOrder(stores, existing, clock);
  }

  console.log(JSON.stringify({
    level: 'info',
    message: 'Order written',
    orderId: order.orderId,
    userId,
    lineCount: order.lineItems.length,
    total: order.total,
  }));

  return finalizeOrder(stores, order, clock);
}

async function findPriorAttempt(stores: Stores, userId: string, token: string): Promise<OrderData | null> {
  const record = await stores.idempotency.getRecord(userId, token);
  // No record yet may still mean a crash right after the pending write; the id is re-derivable
  const orderId = record?.orderId ?? deriveOrderId(userId, token);
  return stores.orders.getOrder(orderId);
}

async function resumeOrder(stores: Stores, order: OrderData, clock: Clock): Promise<CheckoutResult> {
  switch (order.status) {
    case OrderStatus.COMPLETED:
      console.log(JSON.stringify({ level: 'info', message: 'Replayed completed checkout', orderId: order.orderId }));
      return toResult(order);
    case OrderStatus.FAILED:
      throw new OrderFailedError(order.orderId);
    case OrderStatus.PENDING:
      console.log(JSON.stringify({ level: 'info', message: 'Resuming pending order', orderId: order.orderId }));
      return finalizeOrder(stores, order, clock);
  }
}

/**
 * For an order already written as pending: claim the token, flip to
 * completed, clear the consumed lines. Safe to run more than once.
 */
export async function finalizeOrder(
  stores: Stores,
  order: OrderData,
  clock: Clock = systemClock,
): Promise<CheckoutResult> {
  if (order.idempotencyToken !== null) {
    const claim = await stores.idempotency.claim(order.userId, order.idempotencyToken, order.orderId, clock());
    if (!claim.claimed && claim.record.orderId !== order.orderId) {
      // The token belongs to another order; this one must never complete
      await transitionOrder(stores.orders, order.orderId, OrderStatus.PENDING, OrderStatus.FAILED, clock());
      const winner = await stores.orders.getOrder(claim.record.orderId);
      if (!winner) throw new Error(`Idempotency record points at missing order ${claim.record.orderId}`);
      return resumeOrder(stores, winner, clock);
    }
  }

  const flipped = await transitionOrder(stores.orders, order.orderId, OrderStatus.PENDING, OrderStatus.COMPLETED, clock());
  if (!flipped) {
    const current = await stores.orders.getOrder(order.orderId);
    if (current?.status === OrderStatus.FAILED) throw new OrderFailedError(order.orderId);
    if (current?.status !== OrderStatus.COMPLETED) {
      throw new Error(`Order ${order.orderId} could not be completed (status ${current?.status ?? 'missing'})`);
    }
    // Another attempt completed it first; clearing below is idempotent
  } else {
    console.log(JSON.stringify({ level: 'info', message: 'Order completed', orderId: order.orderId, userId: order.userId }));
  }

  await clearConsumedLines(stores.carts, order);
  return toResult(order);
}

/**
 * Deletes each consumed line on its own: a line counts as consumed when it
 * was last edited at or before the order's createdAt, the same rule the
 * reconciliation sweep applies. A failed delete is logged and left for
 * reconciliation; the completed order stands regardless.
 */
export async function clearConsumedLines(carts: ICartStore, order: OrderData): Promise<number> {
  const results = await Promise.allSettled(
    order.lineItems.map((item) =>
      carts.deleteLine(order.userId, item.productId, { unmodifiedSince: order.createdAt }),
    ),
  );

  let removed = 0;
  results.forEach((result, i) => {
    if (result.status === 'fulfilled') {
      if (result.value) removed += 1;
      return;
    }
    console.error(JSON.stringify({
      level: 'error',
      message: 'Failed to clear cart line after checkout; left for reconciliation',
      orderId: order.orderId,
      userId: order.userId,
      productId: order.lineItems[i].productId,
      error: String(result.reason),
    }));
  });
  return removed;
}
