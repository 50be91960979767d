export * from './money';
export * from './catalog';
export * from './cart';
export * from './order';
export * from './idempotency';
export * from './jobs';
export * from './stores';
export * from './errors';
