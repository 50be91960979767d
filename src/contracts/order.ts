import { Cents } from './money';

export enum OrderStatus {
  PENDING = 'pending',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export interface OrderLineItem {
  productId: string;
  quantity: number;
  unitPriceSnapshot: Cents;
}

export interface OrderData {
  orderId: string;
  userId: string;
  lineItems: OrderLineItem[];
  total: Cents;
  status: OrderStatus;
  idempotencyToken: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CheckoutResult {
  orderId: string;
  total: Cents;
}
