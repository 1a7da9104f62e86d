export * from './types';
export * from './transition-rules';
export { OrderStateMachine } from './order-state-machine';
