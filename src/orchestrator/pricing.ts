import { CartLineData, Cents, ICatalogStore, OrderLineItem } from '@/contracts';
import { multiplyMoney, sumMoney } from '@/lib/money';

export interface PricedCart {
  lineItems: OrderLineItem[];
  total: Cents;
  // productIds of lines whose product is no longer in the catalog
  dropped: string[];
}

export async function priceCart(catalog: ICatalogStore, lines: readonly CartLineData[]): Promise<PricedCart> {
  const products = await Promise.all(lines.map((line) => catalog.getProduct(line.productId)));

  const lineItems: OrderLineItem[] = [];
  const dropped: string[] = [];
  lines.forEach((line, i) => {
    const product = products[i];
    if (!product) {
      dropped.push(line.productId);
      return;
    }
    lineItems.push({ productId: line.productId, quantity: line.quantity, unitPriceSnapshot: product.price });
  });

  return { lineItems, total: orderTotal(lineItems), dropped };
}

export function orderTotal(lineItems: readonly OrderLineItem[]): Cents {
  return sumMoney(lineItems.map((item) => multiplyMoney(item.unitPriceSnapshot, item.quantity)));
}
