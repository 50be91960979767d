export const keys = {
  catalog: () => 'catalog:products',
  cart: (userId: string) => `cart:${userId}`,
  cartUsers: () => 'carts:users',
  order: (orderId: string) => `order:${orderId}`,
  ordersPending: () => 'orders:pending',
  ordersByUser: (userId: string) => `orders:user:${userId}`,
  idempotency: (userId: string, token: string) => `idempotency:${userId}:${token}`,
};
