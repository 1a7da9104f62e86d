export * from './order.model';
export * from './artifact.model';
export * from './pipeline-input';
export * from './audit-log.model';
export * from './discount-code.model';
