/**
 * Order Dispatch
 *
 * Exactly-once fulfillment of paid content-generation orders whose payment
 * is confirmed by several racing entry points.
 */

// Core: domain, interfaces, router and services
export * from './core';

// Adapters
export * from './adapters/storage/memory';
export * from './adapters/storage/typeorm';
export * from './adapters/gateways';
export * from './adapters/pipelines';
export * from './adapters/email';

// NestJS module
export * from './modules/dispatch';

// Environment mapping
export { dispatchConfigFromEnv } from './config/env.config';
export type { EnvReader } from './config/env.config';
