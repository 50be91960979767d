import { ProductData } from './catalog';
import { CartLineData, DeleteLineOptions } from './cart';
import { OrderData, OrderStatus } from './order';
import { ClaimResult, IdempotencyRecordData } from './idempotency';

export interface ICatalogStore {
  getProduct(productId: string): Promise<ProductData | null>;
  listProducts(): Promise<ProductData[]>;
  putProduct(product: ProductData): Promise<void>;
}

export interface ICartStore {
  getLines(userId: string): Promise<CartLineData[]>;
  putLine(userId: string, productId: string, quantity: number): Promise<CartLineData>;
  deleteLine(userId: string, productId: string, options?: DeleteLineOptions): Promise<boolean>;
  listUsers(): Promise<string[]>;
  forgetUser(userId: string): Promise<void>;
}

export interface IOrderStore {
  /** Writes the order only if no order with the same id exists. */
  createOrder(order: OrderData): Promise<boolean>;
  getOrder(orderId: string): Promise<OrderData | null>;
  /** Compare-and-set on status. Resolves false when the stored status is not `from`. */
  transitionStatus(orderId: string, from: OrderStatus, to: OrderStatus, at: Date): Promise<boolean>;
  listPendingBefore(before: Date): Promise<string[]>;
  /** Drops an id from the pending index; a no-op when it is not there. */
  unindexPending(orderId: string): Promise<void>;
  listCompletedSince(userId: string, since: Date): Promise<OrderData[]>;
}

export interface IIdempotencyStore {
  getRecord(userId: string, token: string): Promise<IdempotencyRecordData | null>;
  /** First writer wins; later claimants get the existing record back. */
  claim(userId: string, token: string, orderId: string, at: Date): Promise<ClaimResult>;
}

export interface Stores {
  catalog: ICatalogStore;
  carts: ICartStore;
  orders: IOrderStore;
  idempotency: IIdempotencyStore;
}
