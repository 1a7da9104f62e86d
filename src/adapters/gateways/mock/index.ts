export * from './mock-gateway.adapter';
