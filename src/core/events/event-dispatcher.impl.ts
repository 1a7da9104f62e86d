import { Logger } from '@nestjs/common';
import { OrderEventType } from '../domain/enums';
import {
  EventDispatcher,
  EventHandler,
  EventSubscription,
  OrderEventPayload,
} from '../interfaces';

/**
 * Default implementation of the EventDispatcher
 *
 * Supports multiple handlers per event type with error isolation.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private readonly logger = new Logger(EventDispatcherImpl.name);
  private handlers: Map<OrderEventType, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private subscriptionIdCounter = 0;

  /**
   * Register an event handler for a specific event type
   */
  on(eventType: OrderEventType, handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    const handlers = this.handlers.get(eventType) ?? new Set<EventHandler>();
    handlers.add(handler);
    this.handlers.set(eventType, handlers);

    return {
      id: subscriptionId,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  /**
   * Register a handler for all event types
   */
  onAll(handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;
    this.globalHandlers.add(handler);

    return {
      id: subscriptionId,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  off(eventType: OrderEventType, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  /**
   * Dispatch an event to all registered handlers.
   * Handler failures are logged, never rethrown.
   */
  async dispatch(
    eventType: OrderEventType,
    payload: OrderEventPayload,
  ): Promise<void> {
    const results = await Promise.allSettled(
      this.getHandlers(eventType).map(async (handler) =>
        handler(eventType, payload),
      ),
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        const error =
          result.reason instanceof Error
            ? result.reason
            : new Error(String(result.reason));
        this.logger.error(
          `Event handler failed for ${eventType} (order ${payload.orderId}): ${error.message}`,
          error.stack,
        );
      }
    }
  }

  getHandlers(eventType: OrderEventType): EventHandler[] {
    const specificHandlers = Array.from(this.handlers.get(eventType) ?? []);
    return [...specificHandlers, ...this.globalHandlers];
  }
}
