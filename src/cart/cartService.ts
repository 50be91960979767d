import { CartLineData, InvalidQuantityError, Stores } from '@/contracts';

export function assertValidQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new InvalidQuantityError(quantity);
  }
}

export async function listLines(stores: Pick<Stores, 'carts'>, userId: string): Promise<CartLineData[]> {
  return stores.carts.getLines(userId);
}

export async function addLine(stores: Pick<Stores, 'carts'>, userId: string, productId: string, quantity: number): Promise<CartLineData> {
  assertValidQuantity(quantity);
  const line = await stores.carts.putLine(userId, productId, quantity);
  console.log(JSON.stringify({ level: 'info', message: 'Cart line upserted', userId, productId, quantity }));
  return line;
}

/** Zero removes the line; anything else must be a valid quantity. */
export async function setQuantity(
  stores: Pick<Stores, 'carts'>,
  userId: string,
  productId: string,
  quantity: number,
): Promise<CartLineData | null> {
  if (quantity === 0) {
    await removeLine(stores, userId, productId);
    return null;
  }
  return addLine(stores, userId, productId, quantity);
}

export async function removeLine(stores: Pick<Stores, 'carts'>, userId: string, productId: string): Promise<void> {
  const removed = await stores.carts.deleteLine(userId, productId);
  if (removed) {
    console.log(JSON.stringify({ level: 'info', message: 'Cart line removed', userId, productId }));
  }
}
