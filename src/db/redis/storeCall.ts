import { TransientStoreError } from '@/contracts';

// Anything the client throws (timeout, reset, READONLY replica, ...) is transient from the caller's view
export async function storeCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new TransientStoreError(operation, err);
  }
}
