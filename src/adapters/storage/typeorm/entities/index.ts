import { OrderEntity } from './order.entity';
import { AuditLogEntity } from './audit-log.entity';
import { DiscountCodeEntity } from './discount-code.entity';

export { OrderEntity, AuditLogEntity, DiscountCodeEntity };

export const ORDER_ENTITIES = [OrderEntity, AuditLogEntity, DiscountCodeEntity];
