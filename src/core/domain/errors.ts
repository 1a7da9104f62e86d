import { OrderStatus } from './enums';
import { DiscountRejection } from './models';

export class OrderNotFoundError extends Error {
  constructor(public readonly orderId: string) {
    super(`Order not found: ${orderId}`);
    this.name = 'OrderNotFoundError';
  }
}

export class DuplicateOrderError extends Error {
  constructor(public readonly orderId: string) {
    super(`Order already exists: ${orderId}`);
    this.name = 'DuplicateOrderError';
  }
}

/**
 * Transient failure talking to a gateway (network, 5xx, malformed reply).
 * The order stays pending and the customer may retry checkout.
 */
export class GatewayUnavailableError extends Error {
  constructor(
    message: string,
    public readonly gateway: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GatewayUnavailableError';
  }
}

export class UnknownGatewayError extends Error {
  constructor(public readonly gateway: string) {
    super(`No adapter registered for gateway: ${gateway}`);
    this.name = 'UnknownGatewayError';
  }
}

export class InvalidDiscountCodeError extends Error {
  constructor(
    public readonly code: string,
    public readonly reason: DiscountRejection,
  ) {
    super(`Discount code ${code} cannot be used: ${reason}`);
    this.name = 'InvalidDiscountCodeError';
  }
}

/**
 * Checkout can only be (re)opened while the order is pending
 */
export class CheckoutNotAllowedError extends Error {
  constructor(
    public readonly orderId: string,
    public readonly status: OrderStatus,
  ) {
    super(`Cannot open checkout for order ${orderId} in status ${status}`);
    this.name = 'CheckoutNotAllowedError';
  }
}

export class DuplicateDiscountCodeError extends Error {
  constructor(public readonly code: string) {
    super(`Discount code already exists: ${code}`);
    this.name = 'DuplicateDiscountCodeError';
  }
}
