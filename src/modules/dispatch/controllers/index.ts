export { WebhookController } from './webhook.controller';
export { PaymentReturnController } from './payment-return.controller';
export { OrderController } from './order.controller';
export { DiscountController } from './discount.controller';
export { AdminController } from './admin.controller';
export { HealthController } from './health.controller';
