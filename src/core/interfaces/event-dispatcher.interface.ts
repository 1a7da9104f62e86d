import { OrderEventType, OrderStatus, TriggerType } from '../domain/enums';

/**
 * Payload delivered to event handlers
 */
export interface OrderEventPayload {
  orderId: string;
  status: OrderStatus;
  trigger: TriggerType;
  gateway: string | null;
  attempts: number;
  error?: string;
  occurredAt: Date;
}

/**
 * Event handler function signature
 */
export type EventHandler = (
  eventType: OrderEventType,
  payload: OrderEventPayload,
) => Promise<void> | void;

export interface EventSubscription {
  id: string;
  unsubscribe: () => void;
}

/**
 * Event dispatcher interface - fans lifecycle events out to handlers.
 * A failing handler never fails the transition that emitted the event.
 */
export interface EventDispatcher {
  /**
   * Register an event handler for a specific event type
   */
  on(eventType: OrderEventType, handler: EventHandler): EventSubscription;

  /**
   * Register a handler for all event types
   */
  onAll(handler: EventHandler): EventSubscription;

  off(eventType: OrderEventType, handler: EventHandler): void;

  /**
   * Dispatch an event to all registered handlers
   */
  dispatch(eventType: OrderEventType, payload: OrderEventPayload): Promise<void>;

  getHandlers(eventType: OrderEventType): EventHandler[];
}
