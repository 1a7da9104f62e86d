import { OrderStatus, TriggerType, isTerminalStatus } from '../domain/enums';
import { StateTransition } from './types';

const PAYMENT_TRIGGERS = [
  TriggerType.WEBHOOK,
  TriggerType.RETURN_REDIRECT,
  TriggerType.POLL,
];

/**
 * Order state machine transition rules
 *
 * Key principles:
 * - Pending -> Paid is the single acceptance point for a payment
 * - Completed, Failed and Cancelled are terminal
 * - Error is the only state with a way back (manual retry)
 */
export const TRANSITION_RULES: StateTransition[] = [
  // ============ Payment Outcomes ============

  {
    from: OrderStatus.PENDING,
    to: OrderStatus.PAID,
    triggers: PAYMENT_TRIGGERS,
    metadata: { description: 'Payment approved', terminal: false },
  },
  {
    from: OrderStatus.PENDING,
    to: OrderStatus.FAILED,
    triggers: PAYMENT_TRIGGERS,
    metadata: { description: 'Payment rejected', terminal: true },
  },
  {
    from: OrderStatus.PENDING,
    to: OrderStatus.CANCELLED,
    triggers: PAYMENT_TRIGGERS,
    metadata: { description: 'Payment cancelled', terminal: true },
  },

  // ============ Pipeline ============

  /**
   * Paid -> Processing
   * Taken immediately by whichever trigger won the payment CAS
   */
  {
    from: OrderStatus.PAID,
    to: OrderStatus.PROCESSING,
    triggers: PAYMENT_TRIGGERS,
    metadata: { description: 'Pipeline scheduled', terminal: false },
  },
  {
    from: OrderStatus.PROCESSING,
    to: OrderStatus.COMPLETED,
    triggers: [TriggerType.PIPELINE],
    metadata: { description: 'Artifacts ready', terminal: true },
  },
  {
    from: OrderStatus.PROCESSING,
    to: OrderStatus.ERROR,
    triggers: [TriggerType.PIPELINE],
    metadata: { description: 'Pipeline failed', terminal: false },
  },

  // ============ Recovery ============

  /**
   * Error -> Processing
   * Any trigger observing an errored order may request a retry
   */
  {
    from: OrderStatus.ERROR,
    to: OrderStatus.PROCESSING,
    triggers: [...PAYMENT_TRIGGERS, TriggerType.ADMIN],
    metadata: { description: 'Pipeline retried', terminal: false },
  },
];

/**
 * Find a specific transition rule
 */
export function findTransitionRule(
  from: OrderStatus,
  to: OrderStatus,
): StateTransition | undefined {
  return TRANSITION_RULES.find((rule) => rule.from === from && rule.to === to);
}

/**
 * Get all valid target states from a given status
 */
export function getValidTargetStates(status: OrderStatus): OrderStatus[] {
  return TRANSITION_RULES.filter((rule) => rule.from === status).map(
    (rule) => rule.to,
  );
}

export function isTerminalState(status: OrderStatus): boolean {
  return isTerminalStatus(status);
}
