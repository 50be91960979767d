export class ValidationError extends Error {
  constructor(message: string, public readonly details: unknown[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class InvalidQuantityError extends ValidationError {
  constructor(public readonly quantity: number) {
    super(`Invalid quantity: ${quantity} (must be an integer >= 1)`);
    this.name = 'InvalidQuantityError';
  }
}

export class NotFoundError extends Error {
  constructor(entity: 'product' | 'order', id: string) {
    super(`${entity === 'product' ? 'Product' : 'Order'} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export class EmptyCartError extends Error {
  constructor(userId: string) {
    super(`Cart is empty for user ${userId}`);
    this.name = 'EmptyCartError';
  }
}

export class OrderFailedError extends Error {
  constructor(public readonly orderId: string) {
    super(`Order ${orderId} was marked failed and cannot be completed; retry with a new idempotency token`);
    this.name = 'OrderFailedError';
  }
}

export class IllegalTransitionError extends Error {
  constructor(fromStatus: string, toStatus: string) {
    super(`Illegal transition: order cannot move from ${fromStatus} to ${toStatus}`);
    this.name = 'IllegalTransitionError';
  }
}

/** A backing store timed out, throttled, or dropped the connection. Safe to retry with the same token. */
export class TransientStoreError extends Error {
  constructor(public readonly operation: string, public readonly original: unknown) {
    super(`Store operation ${operation} failed: ${original instanceof Error ? original.message : String(original)}`);
    this.name = 'TransientStoreError';
  }
}
