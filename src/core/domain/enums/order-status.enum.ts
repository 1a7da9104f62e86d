/**
 * Order lifecycle states
 * Transitions are enforced by compare-and-set writes in the order store
 */
export enum OrderStatus {
  /**
   * Initial state - order submitted, waiting for payment confirmation
   */
  PENDING = 'pending',

  /**
   * Payment accepted by exactly one trigger
   */
  PAID = 'paid',

  /**
   * Pipeline scheduled or running
   */
  PROCESSING = 'processing',

  /**
   * Pipeline finished and artifacts stored (terminal state)
   */
  COMPLETED = 'completed',

  /**
   * Pipeline failed - retryable
   */
  ERROR = 'error',

  /**
   * Payment rejected by the gateway (terminal state)
   */
  FAILED = 'failed',

  /**
   * Payment cancelled or annulled (terminal state)
   */
  CANCELLED = 'cancelled',
}

/**
 * Legal successors of every status.
 * `compareAndSetStatus` is typed against this map, so an illegal
 * transition does not compile.
 */
export type OrderTransitions = {
  [OrderStatus.PENDING]: OrderStatus.PAID | OrderStatus.FAILED | OrderStatus.CANCELLED;
  [OrderStatus.PAID]: OrderStatus.PROCESSING;
  [OrderStatus.PROCESSING]: OrderStatus.COMPLETED | OrderStatus.ERROR;
  [OrderStatus.ERROR]: OrderStatus.PROCESSING;
  [OrderStatus.COMPLETED]: never;
  [OrderStatus.FAILED]: never;
  [OrderStatus.CANCELLED]: never;
};

export type NextStatus<S extends OrderStatus> = OrderTransitions[S];

const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set([
  OrderStatus.COMPLETED,
  OrderStatus.FAILED,
  OrderStatus.CANCELLED,
]);

/**
 * Helper to determine if a status is terminal (no further transitions possible)
 */
export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

const ORDER_STATUS_VALUES: readonly string[] = Object.values(OrderStatus);

export function isOrderStatus(value: unknown): value is OrderStatus {
  return typeof value === 'string' && ORDER_STATUS_VALUES.includes(value);
}
