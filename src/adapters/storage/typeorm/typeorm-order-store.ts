import { Logger } from '@nestjs/common';
import { DataSource, Repository, SelectQueryBuilder } from 'typeorm';
import {
  Artifact,
  AuditLog,
  CreateAuditLogDto,
  CreateDiscountCodeDto,
  CreateOrderDto,
  DiscountCode,
  DuplicateOrderError,
  Money,
  NextStatus,
  Order,
  OrderFilter,
  OrderNotFoundError,
  OrderStatus,
  OrderStore,
  PaginatedResult,
  Pagination,
  parsePipelineInput,
} from '../../../core';
import { AuditLogEntity, DiscountCodeEntity, OrderEntity } from './entities';

/**
 * TypeORM implementation of OrderStore
 *
 * Every conditional transition is a single `UPDATE ... WHERE id = ? AND status = ?`;
 * the affected row count says whether this writer won.
 */
export class TypeORMOrderStore implements OrderStore {
  private readonly logger = new Logger(TypeORMOrderStore.name);
  private orderRepo: Repository<OrderEntity>;
  private auditLogRepo: Repository<AuditLogEntity>;
  private discountRepo: Repository<DiscountCodeEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.orderRepo = dataSource.getRepository(OrderEntity);
    this.auditLogRepo = dataSource.getRepository(AuditLogEntity);
    this.discountRepo = dataSource.getRepository(DiscountCodeEntity);
  }

  // ==================== Order Operations ====================

  async create(dto: CreateOrderDto): Promise<Order> {
    if (await this.orderRepo.exists({ where: { id: dto.id } })) {
      throw new DuplicateOrderError(dto.id);
    }

    const now = new Date();
    const entity = this.orderRepo.create({
      id: dto.id,
      status: OrderStatus.PENDING,
      serviceType: dto.serviceType,
      pipelineInput: { ...dto.pipelineInput },
      customerName: dto.customer.name,
      customerEmail: dto.customer.email,
      amount: dto.money.amount,
      currency: dto.money.currency,
      gateway: dto.gateway,
      checkoutToken: null,
      discountCode: dto.discountCode ?? null,
      artifacts: [],
      emailSent: false,
      attempts: 0,
      lastError: null,
      createdAt: now,
      updatedAt: now,
    });

    const saved = await this.orderRepo.save(entity);
    return this.mapOrderEntityToDomain(saved);
  }

  async get(id: string): Promise<Order> {
    const order = await this.find(id);
    if (!order) {
      throw new OrderNotFoundError(id);
    }
    return order;
  }

  async find(id: string): Promise<Order | null> {
    const entity = await this.orderRepo.findOne({ where: { id } });
    return entity ? this.mapOrderEntityToDomain(entity) : null;
  }

  async compareAndSetStatus<S extends OrderStatus>(
    id: string,
    expected: S,
    next: NextStatus<S>,
  ): Promise<boolean> {
    const result = await this.orderRepo
      .createQueryBuilder()
      .update(OrderEntity)
      .set({ status: next, updatedAt: new Date() })
      .where('id = :id AND status = :expected', { id, expected })
      .execute();

    return result.affected === 1;
  }

  async setArtifactsAndComplete(id: string, artifacts: Artifact[]): Promise<boolean> {
    const result = await this.orderRepo
      .createQueryBuilder()
      .update(OrderEntity)
      .set({ status: OrderStatus.COMPLETED, artifacts, updatedAt: new Date() })
      .where('id = :id AND status = :expected', {
        id,
        expected: OrderStatus.PROCESSING,
      })
      .execute();

    return result.affected === 1;
  }

  async markEmailSent(id: string): Promise<void> {
    await this.orderRepo.update(id, { emailSent: true, updatedAt: new Date() });
  }

  async recordPipelineStart(id: string): Promise<void> {
    await this.orderRepo
      .createQueryBuilder()
      .update(OrderEntity)
      .set({
        attempts: () => 'attempts + 1',
        lastError: null,
        updatedAt: new Date(),
      })
      .where('id = :id', { id })
      .execute();
  }

  async setErrorAndFail(id: string, message: string): Promise<boolean> {
    const result = await this.orderRepo
      .createQueryBuilder()
      .update(OrderEntity)
      .set({ status: OrderStatus.ERROR, lastError: message, updatedAt: new Date() })
      .where('id = :id AND status = :expected', {
        id,
        expected: OrderStatus.PROCESSING,
      })
      .execute();

    return result.affected === 1;
  }

  async attachCheckout(id: string, gateway: string, token: string | null): Promise<boolean> {
    const result = await this.orderRepo
      .createQueryBuilder()
      .update(OrderEntity)
      .set({ gateway, checkoutToken: token, updatedAt: new Date() })
      .where('id = :id AND status = :expected', { id, expected: OrderStatus.PENDING })
      .execute();

    return result.affected === 1;
  }

  async overrideStatus(id: string, status: OrderStatus): Promise<Order> {
    const result = await this.orderRepo.update(id, { status, updatedAt: new Date() });
    if (result.affected === 0) {
      throw new OrderNotFoundError(id);
    }
    return this.get(id);
  }

  async listByEmail(email: string): Promise<Order[]> {
    const entities = await this.orderRepo.find({
      where: { customerEmail: email },
      order: { createdAt: 'DESC' },
    });
    return entities.map((entity) => this.mapOrderEntityToDomain(entity));
  }

  async list(filter: OrderFilter, pagination: Pagination): Promise<PaginatedResult<Order>> {
    const qb = this.orderRepo.createQueryBuilder('o');
    this.applyOrderFilter(qb, filter);

    const total = await qb.getCount();

    qb.orderBy('o.createdAt', 'DESC');
    qb.skip((pagination.page - 1) * pagination.limit);
    qb.take(pagination.limit);

    const entities = await qb.getMany();

    return {
      items: entities.map((entity) => this.mapOrderEntityToDomain(entity)),
      total,
      page: pagination.page,
      limit: pagination.limit,
      totalPages: Math.ceil(total / pagination.limit),
    };
  }

  // ==================== Audit Log Operations ====================

  async appendAudit(dto: CreateAuditLogDto): Promise<AuditLog> {
    const entity = this.auditLogRepo.create({
      orderId: dto.orderId,
      action: dto.action,
      fromStatus: dto.fromStatus,
      toStatus: dto.toStatus,
      trigger: dto.trigger,
      actor: dto.actor ?? 'system',
      reason: dto.reason ?? null,
      metadata: dto.metadata ?? {},
      createdAt: new Date(),
    });

    const saved = await this.auditLogRepo.save(entity);
    return this.mapAuditLogEntityToDomain(saved);
  }

  async getAuditTrail(orderId: string): Promise<AuditLog[]> {
    const entities = await this.auditLogRepo.find({
      where: { orderId },
      order: { createdAt: 'ASC' },
    });
    return entities.map((entity) => this.mapAuditLogEntityToDomain(entity));
  }

  // ==================== Discount Codes ====================

  async createDiscountCode(dto: CreateDiscountCodeDto): Promise<DiscountCode | null> {
    if (await this.discountRepo.exists({ where: { code: dto.code } })) {
      return null;
    }

    const saved = await this.discountRepo.save(
      this.discountRepo.create({
        code: dto.code,
        percent: dto.percent,
        active: true,
        maxUses: dto.maxUses ?? null,
        usesCount: 0,
        expiresAt: dto.expiresAt ?? null,
        createdAt: new Date(),
      }),
    );
    return this.mapDiscountEntityToDomain(saved);
  }

  async findDiscountCode(code: string): Promise<DiscountCode | null> {
    const entity = await this.discountRepo.findOne({ where: { code } });
    return entity ? this.mapDiscountEntityToDomain(entity) : null;
  }

  async incrementDiscountUsage(code: string): Promise<void> {
    await this.discountRepo.increment({ code }, 'usesCount', 1);
  }

  async deactivateDiscountCode(code: string): Promise<boolean> {
    const result = await this.discountRepo.update({ code }, { active: false });
    return result.affected === 1;
  }

  async listDiscountCodes(): Promise<DiscountCode[]> {
    const entities = await this.discountRepo.find({ order: { createdAt: 'DESC' } });
    return entities.map((entity) => this.mapDiscountEntityToDomain(entity));
  }

  // ==================== Health ====================

  async isHealthy(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(
        `Database health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  // ==================== Mapping ====================

  private mapOrderEntityToDomain(entity: OrderEntity): Order {
    return new Order({
      id: entity.id,
      status: entity.status,
      serviceType: entity.serviceType,
      pipelineInput: parsePipelineInput(entity.pipelineInput),
      customer: { name: entity.customerName, email: entity.customerEmail },
      money: new Money(Number(entity.amount), entity.currency),
      gateway: entity.gateway,
      checkoutToken: entity.checkoutToken,
      discountCode: entity.discountCode,
      artifacts: entity.artifacts ?? [],
      emailSent: Boolean(entity.emailSent),
      attempts: Number(entity.attempts),
      lastError: entity.lastError,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    });
  }

  private mapAuditLogEntityToDomain(entity: AuditLogEntity): AuditLog {
    return new AuditLog(
      entity.id,
      entity.orderId,
      entity.action,
      entity.fromStatus,
      entity.toStatus,
      entity.trigger,
      entity.actor,
      entity.reason,
      entity.metadata,
      entity.createdAt,
    );
  }

  private mapDiscountEntityToDomain(entity: DiscountCodeEntity): DiscountCode {
    return new DiscountCode(
      entity.code,
      entity.percent,
      Boolean(entity.active),
      entity.maxUses,
      entity.usesCount,
      entity.expiresAt,
      entity.createdAt,
    );
  }

  private applyOrderFilter(qb: SelectQueryBuilder<OrderEntity>, filter: OrderFilter): void {
    if (filter.status) {
      qb.andWhere('o.status = :status', { status: filter.status });
    }
    if (filter.serviceType) {
      qb.andWhere('o.serviceType = :serviceType', { serviceType: filter.serviceType });
    }
    if (filter.gateway) {
      qb.andWhere('o.gateway = :gateway', { gateway: filter.gateway });
    }
    if (filter.email) {
      qb.andWhere('o.customerEmail = :email', { email: filter.email });
    }
    if (filter.fromDate) {
      qb.andWhere('o.createdAt >= :fromDate', { fromDate: filter.fromDate });
    }
    if (filter.toDate) {
      qb.andWhere('o.createdAt <= :toDate', { toDate: filter.toDate });
    }
  }

  /**
   * Close the underlying connection
   */
  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }
}
