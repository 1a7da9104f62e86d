import { v4 as uuidv4 } from 'uuid';
import {
  Artifact,
  AuditLog,
  CreateAuditLogDto,
  CreateDiscountCodeDto,
  CreateOrderDto,
  DiscountCode,
  DuplicateOrderError,
  NextStatus,
  Order,
  OrderFilter,
  OrderNotFoundError,
  OrderStatus,
  OrderStore,
  PaginatedResult,
  Pagination,
} from '../../../core';

/**
 * In-memory store configuration options
 */
export interface InMemoryOrderStoreOptions {
  /**
   * Yield before each operation so concurrent callers interleave
   */
  simulateLatency?: boolean;
  latencyMs?: number;
}

/**
 * In-memory order store for tests and local development
 *
 * Conditional writes check and set without awaiting in between, which makes
 * them atomic on the single event loop.
 */
export class InMemoryOrderStore implements OrderStore {
  private orders: Map<string, Order> = new Map();
  private auditLogs: AuditLog[] = [];
  private discountCodes: Map<string, DiscountCode> = new Map();

  constructor(private readonly options: InMemoryOrderStoreOptions = {}) {}

  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency) {
      await new Promise((resolve) => setTimeout(resolve, this.options.latencyMs ?? 1));
    }
  }

  private require(id: string): Order {
    const order = this.orders.get(id);
    if (!order) {
      throw new OrderNotFoundError(id);
    }
    return order;
  }

  // ==================== Order Operations ====================

  async create(dto: CreateOrderDto): Promise<Order> {
    await this.simulateLatency();

    if (this.orders.has(dto.id)) {
      throw new DuplicateOrderError(dto.id);
    }

    const order = new Order({
      id: dto.id,
      status: OrderStatus.PENDING,
      serviceType: dto.serviceType,
      pipelineInput: dto.pipelineInput,
      customer: { ...dto.customer },
      money: dto.money,
      gateway: dto.gateway,
      discountCode: dto.discountCode ?? null,
    });

    this.orders.set(order.id, order);
    return order.clone();
  }

  async get(id: string): Promise<Order> {
    await this.simulateLatency();
    return this.require(id).clone();
  }

  async find(id: string): Promise<Order | null> {
    await this.simulateLatency();
    return this.orders.get(id)?.clone() ?? null;
  }

  async compareAndSetStatus<S extends OrderStatus>(
    id: string,
    expected: S,
    next: NextStatus<S>,
  ): Promise<boolean> {
    await this.simulateLatency();

    const order = this.orders.get(id);
    if (!order || order.status !== expected) {
      return false;
    }
    order.status = next;
    order.updatedAt = new Date();
    return true;
  }

  async setArtifactsAndComplete(id: string, artifacts: Artifact[]): Promise<boolean> {
    await this.simulateLatency();

    const order = this.orders.get(id);
    if (!order || order.status !== OrderStatus.PROCESSING) {
      return false;
    }
    order.status = OrderStatus.COMPLETED;
    order.artifacts = artifacts.map((artifact) => ({ ...artifact }));
    order.updatedAt = new Date();
    return true;
  }

  async markEmailSent(id: string): Promise<void> {
    await this.simulateLatency();
    const order = this.require(id);
    order.emailSent = true;
    order.updatedAt = new Date();
  }

  async recordPipelineStart(id: string): Promise<void> {
    await this.simulateLatency();
    const order = this.require(id);
    order.attempts += 1;
    order.lastError = null;
    order.updatedAt = new Date();
  }

  async setErrorAndFail(id: string, message: string): Promise<boolean> {
    await this.simulateLatency();

    const order = this.orders.get(id);
    if (!order || order.status !== OrderStatus.PROCESSING) {
      return false;
    }
    order.status = OrderStatus.ERROR;
    order.lastError = message;
    order.updatedAt = new Date();
    return true;
  }

  async attachCheckout(id: string, gateway: string, token: string | null): Promise<boolean> {
    await this.simulateLatency();

    const order = this.orders.get(id);
    if (!order || order.status !== OrderStatus.PENDING) {
      return false;
    }
    order.gateway = gateway;
    order.checkoutToken = token;
    order.updatedAt = new Date();
    return true;
  }

  async overrideStatus(id: string, status: OrderStatus): Promise<Order> {
    await this.simulateLatency();
    const order = this.require(id);
    order.status = status;
    order.updatedAt = new Date();
    return order.clone();
  }

  async listByEmail(email: string): Promise<Order[]> {
    await this.simulateLatency();
    return this.sortNewestFirst(
      Array.from(this.orders.values()).filter((order) => order.customer.email === email),
    );
  }

  async list(filter: OrderFilter, pagination: Pagination): Promise<PaginatedResult<Order>> {
    await this.simulateLatency();

    const matching = this.sortNewestFirst(
      Array.from(this.orders.values()).filter((order) => {
        if (filter.status && order.status !== filter.status) return false;
        if (filter.serviceType && order.serviceType !== filter.serviceType) return false;
        if (filter.gateway && order.gateway !== filter.gateway) return false;
        if (filter.email && order.customer.email !== filter.email) return false;
        if (filter.fromDate && order.createdAt < filter.fromDate) return false;
        if (filter.toDate && order.createdAt > filter.toDate) return false;
        return true;
      }),
    );

    const start = (pagination.page - 1) * pagination.limit;
    return {
      items: matching.slice(start, start + pagination.limit),
      total: matching.length,
      page: pagination.page,
      limit: pagination.limit,
      totalPages: Math.ceil(matching.length / pagination.limit),
    };
  }

  // ==================== Audit Log Operations ====================

  async appendAudit(dto: CreateAuditLogDto): Promise<AuditLog> {
    await this.simulateLatency();

    const entry = new AuditLog(
      uuidv4(),
      dto.orderId,
      dto.action,
      dto.fromStatus,
      dto.toStatus,
      dto.trigger,
      dto.actor ?? 'system',
      dto.reason ?? null,
      dto.metadata ?? {},
    );
    this.auditLogs.push(entry);
    return entry;
  }

  async getAuditTrail(orderId: string): Promise<AuditLog[]> {
    await this.simulateLatency();
    return this.auditLogs.filter((entry) => entry.orderId === orderId);
  }

  // ==================== Discount Codes ====================

  async createDiscountCode(dto: CreateDiscountCodeDto): Promise<DiscountCode | null> {
    await this.simulateLatency();

    if (this.discountCodes.has(dto.code)) {
      return null;
    }
    const discount = new DiscountCode(
      dto.code,
      dto.percent,
      true,
      dto.maxUses ?? null,
      0,
      dto.expiresAt ?? null,
    );
    this.discountCodes.set(discount.code, discount);
    return this.copyDiscount(discount);
  }

  async findDiscountCode(code: string): Promise<DiscountCode | null> {
    await this.simulateLatency();
    const discount = this.discountCodes.get(code);
    return discount ? this.copyDiscount(discount) : null;
  }

  async incrementDiscountUsage(code: string): Promise<void> {
    await this.simulateLatency();
    const discount = this.discountCodes.get(code);
    if (discount) {
      discount.usesCount += 1;
    }
  }

  async deactivateDiscountCode(code: string): Promise<boolean> {
    await this.simulateLatency();
    const discount = this.discountCodes.get(code);
    if (!discount) {
      return false;
    }
    discount.active = false;
    return true;
  }

  async listDiscountCodes(): Promise<DiscountCode[]> {
    await this.simulateLatency();
    return Array.from(this.discountCodes.values()).map((discount) => this.copyDiscount(discount));
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  // ==================== Test Helpers ====================

  /**
   * Clear all data
   */
  clear(): void {
    this.orders.clear();
    this.auditLogs = [];
    this.discountCodes.clear();
  }

  /**
   * Inject orders as stored, bypassing creation checks
   */
  injectTestData(data: { orders?: Order[]; discountCodes?: DiscountCode[] }): void {
    for (const order of data.orders ?? []) {
      this.orders.set(order.id, order.clone());
    }
    for (const discount of data.discountCodes ?? []) {
      this.discountCodes.set(discount.code, this.copyDiscount(discount));
    }
  }

  private sortNewestFirst(orders: Order[]): Order[] {
    return orders
      .slice()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((order) => order.clone());
  }

  private copyDiscount(discount: DiscountCode): DiscountCode {
    return new DiscountCode(
      discount.code,
      discount.percent,
      discount.active,
      discount.maxUses,
      discount.usesCount,
      discount.expiresAt,
      discount.createdAt,
    );
  }
}
