export * from './order-status.enum';
export * from './service-type.enum';
export * from './payment-outcome.enum';
export * from './trigger-type.enum';
export * from './audit-action.enum';
export * from './order-event-type.enum';
export * from './dispatch-outcome.enum';
