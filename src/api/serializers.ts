import { CartLineData, CheckoutResult, OrderData, ProductData } from '@/contracts';
import { formatMoney } from '@/lib/money';

// Money leaves the service as a decimal string ("25.00"), never as a JSON float.

export function serializeProduct(product: ProductData) {
  return { ...product, price: formatMoney(product.price) };
}

export function serializeCartLine(line: CartLineData) {
  return { productId: line.productId, quantity: line.quantity, updatedAt: line.updatedAt.toISOString() };
}

export function serializeOrder(order: OrderData) {
  return {
    orderId: order.orderId,
    userId: order.userId,
    status: order.status,
    lineItems: order.lineItems.map((item) => ({
      productId: item.productId,
      quantity: item.quantity,
      unitPriceSnapshot: formatMoney(item.unitPriceSnapshot),
    })),
    total: formatMoney(order.total),
    createdAt: order.createdAt.toISOString(),
    updatedAt: order.updatedAt.toISOString(),
  };
}

export function serializeCheckoutResult(result: CheckoutResult) {
  return { orderId: result.orderId, total: formatMoney(result.total) };
}
