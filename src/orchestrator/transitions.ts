import { IllegalTransitionError, IOrderStore, OrderStatus } from '@/contracts';

// Allowed moves per status. Completed and failed orders never change again.
export const TRANSITION_TABLE: ReadonlyMap<OrderStatus, ReadonlySet<OrderStatus>> = new Map([
  [OrderStatus.PENDING, new Set([OrderStatus.COMPLETED, OrderStatus.FAILED])],
  [OrderStatus.COMPLETED, new Set<OrderStatus>()],
  [OrderStatus.FAILED, new Set<OrderStatus>()],
]);

export function assertTransition(from: OrderStatus, to: OrderStatus): void {
  if (!TRANSITION_TABLE.get(from)?.has(to)) {
    throw new IllegalTransitionError(from, to);
  }
}

/**
 * Validates the move against the table, then applies it as a compare-and-set.
 * Resolves false when the stored status was no longer `from`.
 */
export async function transitionOrder(
  orders: IOrderStore,
  orderId: string,
  from: OrderStatus,
  to: OrderStatus,
  at: Date,
): Promise<boolean> {
  assertTransition(from, to);
  return orders.transitionStatus(orderId, from, to, at);
}
