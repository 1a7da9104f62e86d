/**
 * Swagger decorators shared by the controllers
 */

export * from './webhook.decorators';
export * from './order.decorators';
export * from './admin.decorators';
export * from './health.decorators';
