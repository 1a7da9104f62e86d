import { OrderStatus, NextStatus } from '../domain/enums';
import { Artifact, AuditLog, DiscountCode, Order } from '../domain/models';
import {
  CreateAuditLogDto,
  CreateDiscountCodeDto,
  CreateOrderDto,
  OrderFilter,
  PaginatedResult,
  Pagination,
} from './common.types';

/**
 * Order store interface - abstracts all persistence
 *
 * The status column is the only coordination point between the
 * concurrently running trigger handlers. Implementations must make
 * `compareAndSetStatus` a single conditional write.
 */
export interface OrderStore {
  // ==================== Order Operations ====================

  /**
   * Create a new order in pending state
   * @throws DuplicateOrderError if the id already exists
   */
  create(dto: CreateOrderDto): Promise<Order>;

  /**
   * @throws OrderNotFoundError
   */
  get(id: string): Promise<Order>;

  find(id: string): Promise<Order | null>;

  /**
   * Atomically write `next` only if the stored status still equals `expected`.
   * Returns false when another writer got there first.
   */
  compareAndSetStatus<S extends OrderStatus>(
    id: string,
    expected: S,
    next: NextStatus<S>,
  ): Promise<boolean>;

  /**
   * Replace the artifact list and move processing -> completed in one write.
   * Returns false when the order is no longer processing.
   */
  setArtifactsAndComplete(id: string, artifacts: Artifact[]): Promise<boolean>;

  /**
   * Unconditional - only called by the single delivery step that owns the order
   */
  markEmailSent(id: string): Promise<void>;

  /**
   * Count a scheduled pipeline run and clear the previous error
   */
  recordPipelineStart(id: string): Promise<void>;

  /**
   * Record the error and move processing -> error in one write.
   * Returns false when the order is no longer processing.
   */
  setErrorAndFail(id: string, message: string): Promise<boolean>;

  /**
   * Store the gateway used and its checkout token while the order is pending
   */
  attachCheckout(id: string, gateway: string, token: string | null): Promise<boolean>;

  /**
   * Unconditional status write for operator overrides
   */
  overrideStatus(id: string, status: OrderStatus): Promise<Order>;

  listByEmail(email: string): Promise<Order[]>;

  list(filter: OrderFilter, pagination: Pagination): Promise<PaginatedResult<Order>>;

  // ==================== Audit Log Operations ====================

  appendAudit(dto: CreateAuditLogDto): Promise<AuditLog>;

  getAuditTrail(orderId: string): Promise<AuditLog[]>;

  // ==================== Discount Codes ====================

  createDiscountCode(dto: CreateDiscountCodeDto): Promise<DiscountCode | null>;

  findDiscountCode(code: string): Promise<DiscountCode | null>;

  incrementDiscountUsage(code: string): Promise<void>;

  deactivateDiscountCode(code: string): Promise<boolean>;

  listDiscountCodes(): Promise<DiscountCode[]>;

  // ==================== Health ====================

  isHealthy(): Promise<boolean>;
}
