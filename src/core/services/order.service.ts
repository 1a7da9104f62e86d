import { v4 as uuidv4 } from 'uuid';
import {
  AuditAction,
  OrderStatus,
  ServiceType,
  TriggerType,
} from '../domain/enums';
import {
  CheckoutNotAllowedError,
  DuplicateDiscountCodeError,
  InvalidDiscountCodeError,
} from '../domain/errors';
import {
  Artifact,
  AuditLog,
  Customer,
  DiscountCode,
  DiscountRejection,
  Order,
  PipelineInput,
} from '../domain/models';
import { Money } from '../domain/value-objects/money.vo';
import { GatewayRegistry } from '../gateways';
import {
  CheckoutSession,
  CreateDiscountCodeDto,
  OrderFilter,
  OrderStore,
  PaginatedResult,
  Pagination,
} from '../interfaces';
import { OrderStateMachine } from '../state-machine';

export interface OrderServiceOptions {
  /**
   * Price per service type in minor units of `currency`
   */
  pricing: Record<ServiceType, number>;
  currency: string;
  defaultGateway: string;
  /**
   * Externally reachable base URL used to build return and webhook URLs
   */
  publicBaseUrl: string;
}

export interface SubmitJobRequest {
  pipelineInput: PipelineInput;
  customer: Customer;
  gateway?: string;
  discountCode?: string;
}

export interface SubmitJobResult {
  order: Order;
  checkoutUrl: string;
}

/**
 * What a customer sees when polling an order. Pipeline errors stay internal.
 */
export interface OrderStatusView {
  orderId: string;
  status: string;
  serviceType: ServiceType;
  amount: number;
  currency: string;
  artifacts: Artifact[];
  emailSent: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface DiscountValidation {
  code: string;
  valid: boolean;
  percent?: number;
  reason?: DiscountRejection;
}

const CUSTOMER_STATUS_LABELS: Partial<Record<OrderStatus, string>> = {
  [OrderStatus.ERROR]: 'processing_failed',
};

const SERVICE_DESCRIPTIONS: Record<ServiceType, string> = {
  [ServiceType.TRANSCRIPTION]: 'Audio transcription',
  [ServiceType.EXAM]: 'Exam generation',
  [ServiceType.MEETING]: 'Meeting minutes',
};

/**
 * Order service - everything around an order that is not a payment trigger:
 * submission, pricing, checkout, queries and operator actions.
 */
export class OrderService {
  constructor(
    private readonly store: OrderStore,
    private readonly gateways: GatewayRegistry,
    private readonly options: OrderServiceOptions,
    private readonly stateMachine: OrderStateMachine = new OrderStateMachine(),
  ) {}

  // ==================== Submission ====================

  /**
   * Create a pending order and open its checkout
   * @throws InvalidDiscountCodeError, UnknownGatewayError, GatewayUnavailableError
   */
  async submitJob(request: SubmitJobRequest): Promise<SubmitJobResult> {
    const gateway = request.gateway ?? this.options.defaultGateway;
    // Fail before anything is written
    this.gateways.get(gateway);

    let discount: DiscountCode | null = null;
    if (request.discountCode !== undefined) {
      discount = await this.requireDiscount(request.discountCode);
    }

    const serviceType = request.pipelineInput.serviceType;
    const basePrice = new Money(this.options.pricing[serviceType], this.options.currency);
    const money = discount ? basePrice.discount(discount.percent) : basePrice;

    const order = await this.store.create({
      id: uuidv4(),
      serviceType,
      pipelineInput: request.pipelineInput,
      customer: {
        name: request.customer.name.trim(),
        email: request.customer.email.trim().toLowerCase(),
      },
      money,
      gateway,
      discountCode: discount?.code ?? null,
    });

    if (discount) {
      await this.store.incrementDiscountUsage(discount.code);
    }

    await this.store.appendAudit({
      orderId: order.id,
      action: AuditAction.ORDER_CREATED,
      fromStatus: null,
      toStatus: OrderStatus.PENDING,
      trigger: TriggerType.SUBMISSION,
      metadata: {
        serviceType,
        amount: money.amount,
        currency: money.currency,
        discountCode: discount?.code ?? null,
      },
    });

    const session = await this.openCheckout(order.id);
    return { order: await this.store.get(order.id), checkoutUrl: session.checkoutUrl };
  }

  /**
   * (Re)open the hosted checkout of a pending order
   * @throws CheckoutNotAllowedError, GatewayUnavailableError
   */
  async openCheckout(orderId: string): Promise<CheckoutSession> {
    const order = await this.store.get(orderId);
    if (order.status !== OrderStatus.PENDING) {
      throw new CheckoutNotAllowedError(orderId, order.status);
    }

    const gateway = order.gateway ?? this.options.defaultGateway;
    const session = await this.gateways.get(gateway).createCheckout({
      orderId,
      amount: order.money,
      description: `${SERVICE_DESCRIPTIONS[order.serviceType]} - order ${orderId}`,
      customerEmail: order.customer.email,
      returnUrl: `${this.options.publicBaseUrl}/payments/return/${gateway}`,
      callbackUrl: `${this.options.publicBaseUrl}/webhooks/${gateway}`,
    });

    const attached = await this.store.attachCheckout(orderId, gateway, session.token);
    if (!attached) {
      const current = await this.store.get(orderId);
      throw new CheckoutNotAllowedError(orderId, current.status);
    }

    await this.store.appendAudit({
      orderId,
      action: AuditAction.CHECKOUT_OPENED,
      fromStatus: OrderStatus.PENDING,
      toStatus: OrderStatus.PENDING,
      trigger: TriggerType.SUBMISSION,
      metadata: { gateway, token: session.token },
    });

    return session;
  }

  // ==================== Queries ====================

  async getOrder(orderId: string): Promise<Order> {
    return this.store.get(orderId);
  }

  async getStatusView(orderId: string): Promise<OrderStatusView> {
    return this.toStatusView(await this.store.get(orderId));
  }

  toStatusView(order: Order): OrderStatusView {
    return {
      orderId: order.id,
      status: CUSTOMER_STATUS_LABELS[order.status] ?? order.status,
      serviceType: order.serviceType,
      amount: order.amount,
      currency: order.currency,
      artifacts: order.status === OrderStatus.COMPLETED ? order.artifacts : [],
      emailSent: order.emailSent,
      createdAt: order.createdAt,
      updatedAt: order.updatedAt,
    };
  }

  async listByEmail(email: string): Promise<OrderStatusView[]> {
    const orders = await this.store.listByEmail(email.trim().toLowerCase());
    return orders.map((order) => this.toStatusView(order));
  }

  async list(filter: OrderFilter, pagination: Pagination): Promise<PaginatedResult<Order>> {
    return this.store.list(filter, pagination);
  }

  async getAuditTrail(orderId: string): Promise<AuditLog[]> {
    await this.store.get(orderId);
    return this.store.getAuditTrail(orderId);
  }

  // ==================== Operator Actions ====================

  /**
   * Write a status without compare-and-set. Illegal transitions are allowed
   * but flagged in the audit entry.
   */
  async overrideStatus(
    orderId: string,
    status: OrderStatus,
    actor: string,
    reason: string,
  ): Promise<Order> {
    const before = await this.store.get(orderId);
    const validation = this.stateMachine.validateTransition(
      before.status,
      status,
      TriggerType.ADMIN,
    );

    const updated = await this.store.overrideStatus(orderId, status);

    await this.store.appendAudit({
      orderId,
      action: AuditAction.ADMIN_OVERRIDE,
      fromStatus: before.status,
      toStatus: status,
      trigger: TriggerType.ADMIN,
      actor,
      reason,
      metadata: {
        bypassedRules: !validation.allowed,
        ruleViolation: validation.reason ?? null,
        before: before.toAuditSnapshot(),
      },
    });

    return updated;
  }

  // ==================== Discount Codes ====================

  async validateDiscountCode(rawCode: string): Promise<DiscountValidation> {
    const { validation } = await this.lookupDiscount(rawCode);
    return validation;
  }

  async createDiscountCode(dto: CreateDiscountCodeDto): Promise<DiscountCode> {
    const code = DiscountCode.normalize(dto.code);
    if (!Number.isInteger(dto.percent) || dto.percent < 1 || dto.percent > 99) {
      throw new RangeError('Discount percent must be an integer between 1 and 99');
    }

    const created = await this.store.createDiscountCode({ ...dto, code });
    if (!created) {
      throw new DuplicateDiscountCodeError(code);
    }
    return created;
  }

  async deactivateDiscountCode(code: string): Promise<boolean> {
    return this.store.deactivateDiscountCode(DiscountCode.normalize(code));
  }

  async listDiscountCodes(): Promise<DiscountCode[]> {
    return this.store.listDiscountCodes();
  }

  private async requireDiscount(rawCode: string): Promise<DiscountCode> {
    const { validation, discount } = await this.lookupDiscount(rawCode);
    if (!discount || !validation.valid) {
      throw new InvalidDiscountCodeError(validation.code, validation.reason ?? 'not_found');
    }
    return discount;
  }

  private async lookupDiscount(
    rawCode: string,
  ): Promise<{ validation: DiscountValidation; discount: DiscountCode | null }> {
    const code = DiscountCode.normalize(rawCode);
    if (!code) {
      return { validation: { code, valid: false, reason: 'empty' }, discount: null };
    }

    const discount = await this.store.findDiscountCode(code);
    if (!discount) {
      return { validation: { code, valid: false, reason: 'not_found' }, discount: null };
    }

    const reason = discount.unusableReason();
    return {
      validation: reason
        ? { code, valid: false, reason }
        : { code, valid: true, percent: discount.percent },
      discount,
    };
  }
}
