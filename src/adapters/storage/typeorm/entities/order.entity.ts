import {
  Entity,
  PrimaryColumn,
  Column,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { Artifact, OrderStatus, ServiceType } from '../../../../core';
import { AuditLogEntity } from './audit-log.entity';

/**
 * TypeORM entity for Order
 * Column types are portable between PostgreSQL and SQLite
 */
@Entity('orders')
@Index(['status'])
@Index(['customerEmail'])
@Index(['createdAt'])
export class OrderEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({
    type: 'simple-enum',
    enum: OrderStatus,
    default: OrderStatus.PENDING,
  })
  status!: OrderStatus;

  @Column({ name: 'service_type', type: 'simple-enum', enum: ServiceType })
  serviceType!: ServiceType;

  /**
   * Validated on read; null or malformed input fails the pipeline run
   */
  @Column({ name: 'pipeline_input', type: 'simple-json', nullable: true })
  pipelineInput!: Record<string, unknown> | null;

  @Column({ name: 'customer_name', type: 'varchar' })
  customerName!: string;

  @Column({ name: 'customer_email', type: 'varchar' })
  customerEmail!: string;

  @Column({ type: 'integer' })
  amount!: number;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  @Column({ type: 'varchar', nullable: true })
  gateway!: string | null;

  @Column({ name: 'checkout_token', type: 'varchar', nullable: true })
  checkoutToken!: string | null;

  @Column({ name: 'discount_code', type: 'varchar', nullable: true })
  discountCode!: string | null;

  @Column({ type: 'simple-json' })
  artifacts!: Artifact[];

  @Column({ name: 'email_sent', type: 'boolean', default: false })
  emailSent!: boolean;

  @Column({ type: 'integer', default: 0 })
  attempts!: number;

  @Column({ name: 'last_error', type: 'text', nullable: true })
  lastError!: string | null;

  @Column({ name: 'created_at', type: Date })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  // Relations
  @OneToMany(() => AuditLogEntity, (audit) => audit.order)
  auditLogs!: AuditLogEntity[];
}
