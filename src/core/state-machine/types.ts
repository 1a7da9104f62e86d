import { OrderStatus, TriggerType } from '../domain/enums';

/**
 * State transition definition
 */
export interface StateTransition {
  from: OrderStatus;
  to: OrderStatus;
  triggers: TriggerType[];
  metadata: {
    description: string;
    terminal: boolean;
  };
}

/**
 * Transition result
 */
export interface TransitionResult {
  allowed: boolean;
  fromStatus: OrderStatus;
  toStatus: OrderStatus;
  reason?: string;
  rule?: StateTransition;
}
