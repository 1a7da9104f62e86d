/**
 * Order dispatch core - framework-agnostic business logic
 * Storage, gateway, pipeline and mail agnostic
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';
export * from './domain/errors';
export * from './domain/value-objects/money.vo';

// Interfaces and contracts
export * from './interfaces';

// State machine
export * from './state-machine';

// Pipelines and background execution
export * from './pipelines';
export * from './runner';

// Payment routing and delivery
export * from './gateways';
export * from './dispatch';

// Core services
export * from './services';

// Event system
export * from './events';
