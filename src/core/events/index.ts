/**
 * Order lifecycle events
 */

export { EventDispatcherImpl } from './event-dispatcher.impl';

export * from './handlers/logging.handler';
