export * from './flow-gateway.adapter';
