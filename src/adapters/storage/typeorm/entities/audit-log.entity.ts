import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { AuditAction, OrderStatus, TriggerType } from '../../../../core';
import { OrderEntity } from './order.entity';

/**
 * TypeORM entity for AuditLog
 */
@Entity('audit_logs')
@Index(['orderId'])
@Index(['action'])
export class AuditLogEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'order_id', type: 'varchar', length: 36 })
  orderId!: string;

  @Column({ type: 'simple-enum', enum: AuditAction })
  action!: AuditAction;

  @Column({
    name: 'from_status',
    type: 'simple-enum',
    enum: OrderStatus,
    nullable: true,
  })
  fromStatus!: OrderStatus | null;

  @Column({
    name: 'to_status',
    type: 'simple-enum',
    enum: OrderStatus,
    nullable: true,
  })
  toStatus!: OrderStatus | null;

  @Column({ type: 'simple-enum', enum: TriggerType })
  trigger!: TriggerType;

  @Column({ type: 'varchar', default: 'system' })
  actor!: string;

  @Column({ type: 'text', nullable: true })
  reason!: string | null;

  @Column({ type: 'simple-json' })
  metadata!: Record<string, unknown>;

  @Column({ name: 'created_at', type: Date })
  createdAt!: Date;

  // Relations
  @ManyToOne(() => OrderEntity, (order) => order.auditLogs)
  @JoinColumn({ name: 'order_id' })
  order!: OrderEntity;
}
