/**
 * Lifecycle events emitted after a won transition
 */
export enum OrderEventType {
  ORDER_PAID = 'order.paid',
  ORDER_PROCESSING = 'order.processing',
  ORDER_COMPLETED = 'order.completed',
  ORDER_ERROR = 'order.error',
  ORDER_FAILED = 'order.failed',
  ORDER_CANCELLED = 'order.cancelled',
}
