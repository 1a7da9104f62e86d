import {
  AuditAction,
  OrderStatus,
  PaymentOutcome,
  ServiceType,
  TriggerType,
} from '../domain/enums';
import { Artifact, Customer, PipelineInput } from '../domain/models';
import { Money } from '../domain/value-objects/money.vo';

/**
 * Canonical payment notification - every gateway is translated into this
 * before it reaches the dispatch router
 */
export interface PaymentEvent {
  /**
   * Null when the notification could not be tied to an order
   */
  orderId: string | null;
  outcome: PaymentOutcome;
  /**
   * Status exactly as the gateway reported it, for logs and audit
   */
  rawProviderStatus: string;
  gateway: string;
  /**
   * Parse, verification or network failure absorbed by the adapter
   */
  error?: string;
}

/**
 * Outcome of one pipeline run
 */
export interface PipelineResult {
  success: boolean;
  artifacts: Artifact[];
  error?: string;
}

/**
 * HTTP request as seen by a gateway adapter
 */
export interface InboundNotification {
  query: Record<string, string | undefined>;
  body: Record<string, unknown>;
  headers: Record<string, string | undefined>;
  rawBody?: Buffer;
}

export interface CheckoutRequest {
  orderId: string;
  amount: Money;
  description: string;
  customerEmail: string;
  /**
   * Where the customer lands after paying
   */
  returnUrl: string;
  /**
   * Where the gateway posts its asynchronous notification
   */
  callbackUrl: string;
}

export interface CheckoutSession {
  checkoutUrl: string;
  /**
   * Gateway-side reference used for later status queries (null if none)
   */
  token: string | null;
}

// ==================== Store DTOs ====================

export interface CreateOrderDto {
  id: string;
  serviceType: ServiceType;
  pipelineInput: PipelineInput;
  customer: Customer;
  money: Money;
  gateway: string;
  discountCode?: string | null;
}

export interface CreateAuditLogDto {
  orderId: string;
  action: AuditAction;
  fromStatus: OrderStatus | null;
  toStatus: OrderStatus | null;
  trigger: TriggerType;
  actor?: string;
  reason?: string | null;
  metadata?: Record<string, unknown>;
}

export interface CreateDiscountCodeDto {
  code: string;
  percent: number;
  maxUses?: number | null;
  expiresAt?: Date | null;
}

export interface OrderFilter {
  status?: OrderStatus;
  serviceType?: ServiceType;
  gateway?: string;
  email?: string;
  fromDate?: Date;
  toDate?: Date;
}

export interface Pagination {
  page: number;
  limit: number;
}

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}
