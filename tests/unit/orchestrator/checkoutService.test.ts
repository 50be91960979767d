import { checkout, clearConsumedLines, finalizeOrder } from '@/orchestrator/checkoutService';
import { deriveOrderId } from '@/orchestrator/orderId';
import { reconcile } from '@/orchestrator/reconciliation';
import { EmptyCartError, OrderData, OrderFailedError, OrderStatus } from '@/contracts';
import { formatMoney } from '@/lib/money';
import { createMemoryStores, MemoryStores, product, silenceServiceLogs } from '../../helpers/memoryStores';

const USER = 'user-1';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

let stores: MemoryStores;
let now: Date;
const clock = () => now;

beforeEach(async () => {
  silenceServiceLogs();
  now = new Date('2026-03-01T10:00:00.000Z');
  stores = createMemoryStores(clock);
  await stores.catalog.putProduct(product('p1', 1000)); // $10.00
  await stores.catalog.putProduct(product('p2', 500)); // $5.00
});

afterEach(() => jest.restoreAllMocks());

function pendingOrder(overrides: Partial<OrderData>): OrderData {
  const createdAt = new Date('2026-03-01T10:01:00.000Z');
  return {
    orderId: 'o-pending',
    userId: USER,
    lineItems: [{ productId: 'p1', quantity: 2, unitPriceSnapshot: 1000 }],
    total: 2000,
    status: OrderStatus.PENDING,
    idempotencyToken: null,
    createdAt,
    updatedAt: createdAt,
    ...overrides,
  };
}

// ─── Happy path ───────────────────────────────────────────────────────────────

describe('checkout: happy path', () => {
  it('prices p1 x2 @ $10.00 + p2 x1 @ $5.00 at $25.00 and empties the cart', async () => {
    await stores.carts.putLine(USER, 'p1', 2);
    await stores.carts.putLine(USER, 'p2', 1);

    const result = await checkout(stores, USER, undefined, clock);

    expect(result.total).toBe(2500);
    expect(formatMoney(result.total)).toBe('25.00');
    expect(stores.orders.orders.size).toBe(1);

    const order = stores.orders.orders.get(result.orderId);
    expect(order?.status).toBe(OrderStatus.COMPLETED);
    expect(order?.lineItems).toEqual([
      { productId: 'p1', quantity: 2, unitPriceSnapshot: 1000 },
      { productId: 'p2', quantity: 1, unitPriceSnapshot: 500 },
    ]);
    expect(await stores.carts.getLines(USER)).toEqual([]);
  });

  it('sums exactly in cents where floats would drift', async () => {
    await stores.catalog.putProduct(product('dime', 10)); // 0.1 + 0.1 + 0.1 !== 0.3 in floats
    await stores.catalog.putProduct(product('odd', 1999));
    await stores.carts.putLine(USER, 'dime', 3);
    await stores.carts.putLine(USER, 'odd', 3);

    const result = await checkout(stores, USER, undefined, clock);

    expect(result.total).toBe(6027);
    expect(formatMoney(result.total)).toBe('60.27');
  });

  it('snapshots prices so later catalog changes leave the order alone', async () => {
    await stores.carts.putLine(USER, 'p1', 1);
    const result = await checkout(stores, USER, undefined, clock);

    await stores.catalog.putProduct(product('p1', 9999));

    expect(stores.orders.orders.get(result.orderId)?.lineItems[0].unitPriceSnapshot).toBe(1000);
  });

  it('gives token-less checkouts distinct order ids', async () => {
    await stores.carts.putLine(USER, 'p1', 1);
    const first = await checkout(stores, USER, undefined, clock);
    await stores.carts.putLine(USER, 'p1', 1);
    const second = await checkout(stores, USER, undefined, clock);

    expect(first.orderId).not.toBe(second.orderId);
    expect(stores.orders.orders.size).toBe(2);
  });
});

// ─── Empty cart ───────────────────────────────────────────────────────────────

describe('checkout: empty cart', () => {
  it('rejects with EmptyCartError and writes nothing', async () => {
    await expect(checkout(stores, USER, 'tok-1', clock)).rejects.toThrow(EmptyCartError);

    expect(stores.orders.orders.size).toBe(0);
    expect(stores.idempotency.records.size).toBe(0);
  });

  it('does not memoize the failure: the same token succeeds once the cart has items', async () => {
    await expect(checkout(stores, USER, 'tok-1', clock)).rejects.toThrow(EmptyCartError);
    await stores.carts.putLine(USER, 'p2', 2);

    const result = await checkout(stores, USER, 'tok-1', clock);

    expect(result).toEqual({ orderId: deriveOrderId(USER, 'tok-1'), total: 1000 });
  });

  it('treats a cart whose every product left the catalog as empty', async () => {
    await stores.carts.putLine(USER, 'gone', 1);

    await expect(checkout(stores, USER, undefined, clock)).rejects.toThrow(EmptyCartError);
    expect(stores.orders.orders.size).toBe(0);
  });
});

// ─── Catalog drift ────────────────────────────────────────────────────────────

describe('checkout: catalog drift', () => {
  it('drops lines for deleted products, logs them, and totals the rest', async () => {
    await stores.catalog.putProduct(product('p3', 700));
    await stores.carts.putLine(USER, 'p1', 1);
    await stores.carts.putLine(USER, 'p3', 4);
    stores.catalog.products.delete('p3');

    const result = await checkout(stores, USER, undefined, clock);

    expect(result.total).toBe(1000);
    expect(stores.orders.orders.get(result.orderId)?.lineItems.map((i) => i.productId)).toEqual(['p1']);

    const warn = jest.mocked(console.warn);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({ level: 'warn', userId: USER, productIds: ['p3'] });

    // The dropped line was not consumed
    expect((await stores.carts.getLines(USER)).map((l) => l.productId)).toEqual(['p3']);
  });
});

// ─── Idempotency ──────────────────────────────────────────────────────────────

describe('checkout: idempotency token', () => {
  it('replays the first result without a second order or a second cart read', async () => {
    await stores.carts.putLine(USER, 'p1', 2);
    await stores.carts.putLine(USER, 'p2', 1);
    const getLines = jest.spyOn(stores.carts, 'getLines');

    const first = await checkout(stores, USER, 'tok-1', clock);
    const second = await checkout(stores, USER, 'tok-1', clock);

    expect(second).toEqual(first);
    expect(first.total).toBe(2500);
    expect(stores.orders.orders.size).toBe(1);
    expect(stores.orders.byStatus(OrderStatus.COMPLETED)).toHaveLength(1);
    expect(getLines).toHaveBeenCalledTimes(1);
  });

  it('does not consume items added after the first call', async () => {
    await stores.carts.putLine(USER, 'p1', 1);
    const first = await checkout(stores, USER, 'tok-1', clock);
    await stores.carts.putLine(USER, 'p2', 1);

    const replay = await checkout(stores, USER, 'tok-1', clock);

    expect(replay).toEqual(first);
    expect((await stores.carts.getLines(USER)).map((l) => l.productId)).toEqual(['p2']);
  });

  it('scopes tokens per user', async () => {
    await stores.carts.putLine(USER, 'p1', 1);
    await stores.carts.putLine('user-2', 'p2', 1);

    const a = await checkout(stores, USER, 'shared', clock);
    const b = await checkout(stores, 'user-2', 'shared', clock);

    expect(a.orderId).not.toBe(b.orderId);
    expect(b.total).toBe(500);
  });

  it('produces one completed order when the same token races itself', async () => {
    await stores.carts.putLine(USER, 'p1', 2);

    const [a, b] = await Promise.all([
      checkout(stores, USER, 'tok-race', clock),
      checkout(stores, USER, 'tok-race', clock),
    ]);

    expect(a).toEqual(b);
    expect(stores.orders.orders.size).toBe(1);
    expect(stores.orders.byStatus(OrderStatus.COMPLETED)).toHaveLength(1);
    // The losing create must not leave the settled order behind in the pending index
    expect(stores.orders.pendingIndex.size).toBe(0);
  });

  it('resumes an order left pending before the idempotency record was written', async () => {
    await stores.carts.putLine(USER, 'p1', 2);
    const orderId = deriveOrderId(USER, 'tok-crash');
    // Snapshot price differs from the catalog: the resume must not re-price
    await stores.orders.createOrder(pendingOrder({
      orderId,
      idempotencyToken: 'tok-crash',
      lineItems: [{ productId: 'p1', quantity: 2, unitPriceSnapshot: 900 }],
      total: 1800,
    }));

    const result = await checkout(stores, USER, 'tok-crash', clock);

    expect(result).toEqual({ orderId, total: 1800 });
    expect(stores.orders.orders.size).toBe(1);
    expect(stores.orders.orders.get(orderId)?.status).toBe(OrderStatus.COMPLETED);
    expect((await stores.idempotency.getRecord(USER, 'tok-crash'))?.orderId).toBe(orderId);
    expect(await stores.carts.getLines(USER)).toEqual([]);
  });

  it('resumes an order left pending after the idempotency record was written', async () => {
    await stores.carts.putLine(USER, 'p1', 2);
    const orderId = deriveOrderId(USER, 'tok-crash');
    await stores.orders.createOrder(pendingOrder({ orderId, idempotencyToken: 'tok-crash' }));
    await stores.idempotency.claim(USER, 'tok-crash', orderId, now);

    const result = await checkout(stores, USER, 'tok-crash', clock);

    expect(result).toEqual({ orderId, total: 2000 });
    expect(stores.orders.orders.get(orderId)?.status).toBe(OrderStatus.COMPLETED);
  });

  it('rejects a token whose order was marked failed', async () => {
    const orderId = deriveOrderId(USER, 'tok-dead');
    await stores.orders.createOrder(pendingOrder({ orderId, idempotencyToken: 'tok-dead', status: OrderStatus.FAILED }));

    await expect(checkout(stores, USER, 'tok-dead', clock)).rejects.toThrow(OrderFailedError);
  });
});

// ─── finalizeOrder ────────────────────────────────────────────────────────────

describe('finalizeOrder', () => {
  it('fails its own order and returns the winner when the token is already claimed elsewhere', async () => {
    await stores.orders.createOrder(pendingOrder({ orderId: 'o-winner', status: OrderStatus.COMPLETED, total: 700 }));
    await stores.idempotency.claim(USER, 'tok-1', 'o-winner', now);
    const loser = pendingOrder({ orderId: 'o-loser', idempotencyToken: 'tok-1' });
    await stores.orders.createOrder(loser);

    const result = await finalizeOrder(stores, loser, clock);

    expect(result).toEqual({ orderId: 'o-winner', total: 700 });
    expect(stores.orders.orders.get('o-loser')?.status).toBe(OrderStatus.FAILED);
  });

  it('is a no-op flip when another attempt already completed the order', async () => {
    const order = pendingOrder({});
    await stores.orders.createOrder(order);
    await stores.orders.transitionStatus(order.orderId, OrderStatus.PENDING, OrderStatus.COMPLETED, now);

    await expect(finalizeOrder(stores, order, clock)).resolves.toEqual({ orderId: 'o-pending', total: 2000 });
  });
});

// ─── Cart clearing ────────────────────────────────────────────────────────────

describe('cart clearing', () => {
  it('keeps the order when one line fails to delete and still deletes the others', async () => {
    await stores.carts.putLine(USER, 'p1', 2);
    await stores.carts.putLine(USER, 'p2', 1);
    stores.carts.failDeletesFor.add('p1');

    const result = await checkout(stores, USER, undefined, clock);

    expect(result.total).toBe(2500);
    expect(stores.orders.orders.get(result.orderId)?.status).toBe(OrderStatus.COMPLETED);
    expect((await stores.carts.getLines(USER)).map((l) => l.productId)).toEqual(['p1']);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('leaves a line the user edited after the order was stamped', async () => {
    await stores.carts.putLine(USER, 'p1', 2);
    now = new Date('2026-03-01T10:05:00.000Z');
    await stores.carts.putLine(USER, 'p1', 5);

    const removed = await clearConsumedLines(stores.carts, pendingOrder({})); // createdAt 10:01

    expect(removed).toBe(0);
    expect((await stores.carts.getLines(USER))[0].quantity).toBe(5);
  });

  it('stamps the order before reading the cart, so clearing and the sweep agree on a concurrent edit', async () => {
    await stores.carts.putLine(USER, 'p1', 2);
    const readLines = stores.carts.getLines.bind(stores.carts);
    jest.spyOn(stores.carts, 'getLines').mockImplementationOnce(async (userId) => {
      // The edit lands after the order's createdAt but before the cart is read
      now = new Date('2026-03-01T10:00:30.000Z');
      await stores.carts.putLine(USER, 'p1', 3);
      return readLines(userId);
    });

    const result = await checkout(stores, USER, undefined, clock);

    const order = stores.orders.orders.get(result.orderId);
    expect(order?.createdAt).toEqual(new Date('2026-03-01T10:00:00.000Z'));
    expect(order?.lineItems).toEqual([{ productId: 'p1', quantity: 3, unitPriceSnapshot: 1000 }]);
    expect((await stores.carts.getLines(USER))[0].quantity).toBe(3);

    const report = await reconcile(stores, {
      now: new Date('2026-03-01T11:00:00.000Z'),
      pendingGraceMs: 5 * 60_000,
      lookbackMs: 24 * 60 * 60_000,
    });

    expect(report.linesRemoved).toBe(0);
    expect((await stores.carts.getLines(USER))[0].quantity).toBe(3);
  });
});
