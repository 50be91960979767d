import { assertTransition, transitionOrder, TRANSITION_TABLE } from '@/orchestrator/transitions';
import { IllegalTransitionError, OrderStatus } from '@/contracts';
import { MemoryOrderStore } from '../../helpers/memoryStores';

describe('assertTransition - legal transitions', () => {
  const legalCases: [OrderStatus, OrderStatus][] = [
    [OrderStatus.PENDING, OrderStatus.COMPLETED],
    [OrderStatus.PENDING, OrderStatus.FAILED],
  ];

  legalCases.forEach(([from, to]) => {
    it(`${from} -> ${to}`, () => {
      expect(() => assertTransition(from, to)).not.toThrow();
    });
  });
});

describe('assertTransition - illegal transitions', () => {
  it('throws IllegalTransitionError for completed -> failed', () => {
    expect(() => assertTransition(OrderStatus.COMPLETED, OrderStatus.FAILED)).toThrow(IllegalTransitionError);
  });

  it('throws IllegalTransitionError for completed -> pending', () => {
    expect(() => assertTransition(OrderStatus.COMPLETED, OrderStatus.PENDING)).toThrow(IllegalTransitionError);
  });

  it('throws IllegalTransitionError for failed -> completed', () => {
    expect(() => assertTransition(OrderStatus.FAILED, OrderStatus.COMPLETED)).toThrow(IllegalTransitionError);
  });
});

describe('Transition table completeness', () => {
  it('has an entry for every status', () => {
    expect([...TRANSITION_TABLE.keys()].sort()).toEqual(Object.values(OrderStatus).sort());
  });
});

describe('transitionOrder', () => {
  it('rejects an illegal move before touching the store', async () => {
    const orders = new MemoryOrderStore();
    const spy = jest.spyOn(orders, 'transitionStatus');

    await expect(
      transitionOrder(orders, 'o-1', OrderStatus.COMPLETED, OrderStatus.PENDING, new Date()),
    ).rejects.toThrow(IllegalTransitionError);
    expect(spy).not.toHaveBeenCalled();
  });

  it('resolves false when the stored status moved on', async () => {
    const orders = new MemoryOrderStore();
    const at = new Date('2026-03-01T10:00:00.000Z');
    await orders.createOrder({
      orderId: 'o-1', userId: 'user-1', lineItems: [], total: 0,
      status: OrderStatus.FAILED, idempotencyToken: null, createdAt: at, updatedAt: at,
    });

    await expect(transitionOrder(orders, 'o-1', OrderStatus.PENDING, OrderStatus.COMPLETED, at)).resolves.toBe(false);
  });
});
