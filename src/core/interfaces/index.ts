// Interface and type exports
export * from './common.types';
export * from './order-store';
export * from './payment-gateway.adapter';
export * from './pipeline.interface';
export * from './mailer.interface';
export * from './task-runner.interface';
export * from './event-dispatcher.interface';
