export * from './dispatch-router';
export * from './delivery.service';
export * from './delivery-email';
