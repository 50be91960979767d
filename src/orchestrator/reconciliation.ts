import { CartLineData, OrderData, OrderStatus, ReconcileReport, Stores } from '@/contracts';
import { Clock, finalizeOrder } from './checkoutService';
import { transitionOrder } from './transitions';

export interface ReconcileOptions {
  now: Date;
  // Pending orders younger than this may still belong to an in-flight checkout
  pendingGraceMs: number;
  // How far back completed orders are searched for lines they consumed
  lookbackMs: number;
}

/** Cart lines that a completed order created at or after the line's last edit already consumed. */
export function linesCoveredBy(lines: readonly CartLineData[], orders: readonly OrderData[]): CartLineData[] {
  return lines.filter((line) =>
    orders.some(
      (order) =>
        order.createdAt.getTime() >= line.updatedAt.getTime() &&
        order.lineItems.some((item) => item.productId === line.productId),
    ),
  );
}

/**
 * Repairs what a crashed checkout left behind:
 *  - stale pending orders with a token are rolled forward (the client could resume them anyway),
 *    token-less ones are marked failed since their cart lines were never cleared;
 *  - cart lines consumed by a completed order are deleted.
 *
 * One bad order or user does not stop the sweep; all errors are rethrown together at the end.
 */
export async function reconcile(stores: Stores, options: ReconcileOptions): Promise<ReconcileReport> {
  const report: ReconcileReport = { rolledForward: 0, failed: 0, linesRemoved: 0, usersForgotten: 0 };
  const errors: unknown[] = [];
  const clock: Clock = () => options.now;

  const staleBefore = new Date(options.now.getTime() - options.pendingGraceMs);
  const pendingIds = await stores.orders.listPendingBefore(staleBefore);
  for (const orderId of pendingIds) {
    try {
      await settleStalePendingOrder(stores, orderId, clock, report);
    } catch (err) {
      console.error(JSON.stringify({ level: 'error', message: 'Reconcile: pending order not settled', orderId, error: String(err) }));
      errors.push(err);
    }
  }

  const since = new Date(options.now.getTime() - options.lookbackMs);
  const userIds = await stores.carts.listUsers();
  for (const userId of userIds) {
    try {
      await sweepCart(stores, userId, since, report);
    } catch (err) {
      console.error(JSON.stringify({ level: 'error', message: 'Reconcile: cart sweep failed', userId, error: String(err) }));
      errors.push(err);
    }
  }

  console.log(JSON.stringify({ level: 'info', message: 'Reconcile finished', ...report, errors: errors.length }));
  if (errors.length > 0) {
    throw new AggregateError(errors, `Reconcile finished with ${errors.length} error(s)`);
  }
  return report;
}

async function settleStalePendingOrder(
  stores: Stores,
  orderId: string,
  clock: Clock,
  report: ReconcileReport,
): Promise<void> {
  const order = await stores.orders.getOrder(orderId);
  // Index entries can outlive their order's pending state (lost create, failed zrem after a transition)
  if (!order || order.status !== OrderStatus.PENDING) {
    await stores.orders.unindexPending(orderId);
    return;
  }

  if (order.idempotencyToken === null) {
    const failed = await transitionOrder(stores.orders, orderId, OrderStatus.PENDING, OrderStatus.FAILED, clock());
    if (failed) {
      report.failed += 1;
      console.warn(JSON.stringify({ level: 'warn', message: 'Reconcile: abandoned pending order marked failed', orderId, userId: order.userId }));
    }
    return;
  }

  const result = await finalizeOrder(stores, order, clock);
  if (result.orderId === order.orderId) {
    report.rolledForward += 1;
    console.log(JSON.stringify({ level: 'info', message: 'Reconcile: pending order rolled forward', orderId, userId: order.userId }));
  } else {
    report.failed += 1;
  }
}

async function sweepCart(stores: Stores, userId: string, since: Date, report: ReconcileReport): Promise<void> {
  const lines = await stores.carts.getLines(userId);
  if (lines.length === 0) {
    await stores.carts.forgetUser(userId);
    report.usersForgotten += 1;
    return;
  }

  const orders = await stores.orders.listCompletedSince(userId, since);
  for (const line of linesCoveredBy(lines, orders)) {
    const removed = await stores.carts.deleteLine(userId, line.productId, { unmodifiedSince: line.updatedAt });
    if (removed) {
      report.linesRemoved += 1;
      console.log(JSON.stringify({ level: 'info', message: 'Reconcile: removed consumed cart line', userId, productId: line.productId }));
    }
  }
}
