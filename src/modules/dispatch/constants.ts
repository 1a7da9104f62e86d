/**
 * Injection tokens for the dispatch module
 */

export const DISPATCH_CONFIG = Symbol('DISPATCH_CONFIG');
export const ORDER_STORE = Symbol('ORDER_STORE');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
export const GATEWAY_REGISTRY = Symbol('GATEWAY_REGISTRY');
export const PIPELINE_REGISTRY = Symbol('PIPELINE_REGISTRY');
export const TASK_RUNNER = Symbol('TASK_RUNNER');
export const MAILER = Symbol('MAILER');
export const DELIVERY_SERVICE = Symbol('DELIVERY_SERVICE');
export const DISPATCH_ROUTER = Symbol('DISPATCH_ROUTER');
export const ORDER_SERVICE = Symbol('ORDER_SERVICE');
export const PAYMENT_TRIGGER_SERVICE = Symbol('PAYMENT_TRIGGER_SERVICE');
export const ORDER_STATE_MACHINE = Symbol('ORDER_STATE_MACHINE');
