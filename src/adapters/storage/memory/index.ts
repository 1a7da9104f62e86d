export * from './in-memory-order-store';
