export * from './order.service';
export * from './payment-trigger.service';
