import { Entity, PrimaryColumn, Column } from 'typeorm';

/**
 * TypeORM entity for DiscountCode
 */
@Entity('discount_codes')
export class DiscountCodeEntity {
  @PrimaryColumn({ type: 'varchar', length: 64 })
  code!: string;

  @Column({ type: 'integer' })
  percent!: number;

  @Column({ type: 'boolean', default: true })
  active!: boolean;

  @Column({ name: 'max_uses', type: 'integer', nullable: true })
  maxUses!: number | null;

  @Column({ name: 'uses_count', type: 'integer', default: 0 })
  usesCount!: number;

  @Column({ name: 'expires_at', type: Date, nullable: true })
  expiresAt!: Date | null;

  @Column({ name: 'created_at', type: Date })
  createdAt!: Date;
}
