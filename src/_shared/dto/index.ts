/**
 * DTOs for request validation and Swagger documentation
 */

export * from './order.dto';
export * from './admin.dto';
export * from './webhook.dto';
