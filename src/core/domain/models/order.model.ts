import { OrderStatus, ServiceType } from '../enums';
import { Money } from '../value-objects/money.vo';
import { Artifact } from './artifact.model';
import { PipelineInput } from './pipeline-input';

export interface Customer {
  name: string;
  email: string;
}

export interface OrderProps {
  id: string;
  status: OrderStatus;
  serviceType: ServiceType;
  /**
   * Null when the stored record lacks usable pipeline parameters
   */
  pipelineInput: PipelineInput | null;
  customer: Customer;
  money: Money;
  gateway: string | null;
  checkoutToken?: string | null;
  discountCode?: string | null;
  artifacts?: Artifact[];
  emailSent?: boolean;
  attempts?: number;
  lastError?: string | null;
  createdAt?: Date;
  updatedAt?: Date;
}

/**
 * Order domain model - one unit of paid work
 * Pure TypeScript class with no framework dependencies
 */
export class Order {
  readonly id: string;
  status: OrderStatus;
  readonly serviceType: ServiceType;
  readonly pipelineInput: PipelineInput | null;
  readonly customer: Customer;
  readonly money: Money;
  gateway: string | null;
  checkoutToken: string | null;
  readonly discountCode: string | null;
  artifacts: Artifact[];
  emailSent: boolean;
  attempts: number;
  lastError: string | null;
  readonly createdAt: Date;
  updatedAt: Date;

  constructor(props: OrderProps) {
    this.id = props.id;
    this.status = props.status;
    this.serviceType = props.serviceType;
    this.pipelineInput = props.pipelineInput;
    this.customer = props.customer;
    this.money = props.money;
    this.gateway = props.gateway;
    this.checkoutToken = props.checkoutToken ?? null;
    this.discountCode = props.discountCode ?? null;
    this.artifacts = props.artifacts ?? [];
    this.emailSent = props.emailSent ?? false;
    this.attempts = props.attempts ?? 0;
    this.lastError = props.lastError ?? null;
    this.createdAt = props.createdAt ?? new Date();
    this.updatedAt = props.updatedAt ?? new Date();
  }

  get amount(): number {
    return this.money.amount;
  }

  get currency(): string {
    return this.money.currency;
  }

  /**
   * Copy used by the in-memory store so callers never hold live references
   */
  clone(): Order {
    return new Order({
      ...this.toProps(),
      artifacts: this.artifacts.map((artifact) => ({ ...artifact })),
    });
  }

  toProps(): OrderProps {
    return {
      id: this.id,
      status: this.status,
      serviceType: this.serviceType,
      pipelineInput: this.pipelineInput,
      customer: this.customer,
      money: this.money,
      gateway: this.gateway,
      checkoutToken: this.checkoutToken,
      discountCode: this.discountCode,
      artifacts: this.artifacts,
      emailSent: this.emailSent,
      attempts: this.attempts,
      lastError: this.lastError,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  /**
   * Snapshot stored alongside audit entries
   */
  toAuditSnapshot(): Record<string, unknown> {
    return {
      id: this.id,
      status: this.status,
      serviceType: this.serviceType,
      gateway: this.gateway,
      amount: this.amount,
      currency: this.currency,
      attempts: this.attempts,
      emailSent: this.emailSent,
      updatedAt: this.updatedAt,
    };
  }
}
