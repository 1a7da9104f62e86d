/**
 * Shared HTTP resources
 */

// DTOs for validation and type safety
export * from './dto';

// Swagger decorators for clean controllers
export * from './swagger/decorators';

// Signature helpers shared by gateways and guards
export * from './utils';
