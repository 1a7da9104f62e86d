import { OrderStatus, TriggerType } from '../domain/enums';
import { StateTransition, TransitionResult } from './types';
import {
  TRANSITION_RULES,
  getValidTargetStates,
  isTerminalState,
} from './transition-rules';

/**
 * Order state machine - answers which transitions are legal.
 * Writes go through the store's compare-and-set; this class never mutates an order.
 */
export class OrderStateMachine {
  private readonly transitions: Map<string, StateTransition>;

  constructor(rules: StateTransition[] = TRANSITION_RULES) {
    this.transitions = new Map(
      rules.map((rule) => [this.getTransitionKey(rule.from, rule.to), rule]),
    );
  }

  /**
   * Validate a state transition for a given trigger
   */
  validateTransition(
    from: OrderStatus,
    to: OrderStatus,
    trigger?: TriggerType,
  ): TransitionResult {
    if (isTerminalState(from)) {
      return {
        allowed: false,
        fromStatus: from,
        toStatus: to,
        reason: `Cannot transition from terminal state: ${from}`,
      };
    }

    const rule = this.transitions.get(this.getTransitionKey(from, to));
    if (!rule) {
      return {
        allowed: false,
        fromStatus: from,
        toStatus: to,
        reason: `Transition from ${from} to ${to} is not defined`,
      };
    }

    if (trigger && !rule.triggers.includes(trigger)) {
      return {
        allowed: false,
        fromStatus: from,
        toStatus: to,
        reason: `Trigger ${trigger} is not valid for transition from ${from} to ${to}`,
        rule,
      };
    }

    return { allowed: true, fromStatus: from, toStatus: to, rule };
  }

  canTransition(from: OrderStatus, to: OrderStatus, trigger?: TriggerType): boolean {
    return this.validateTransition(from, to, trigger).allowed;
  }

  getNextStates(status: OrderStatus): OrderStatus[] {
    return isTerminalState(status) ? [] : getValidTargetStates(status);
  }

  isTerminal(status: OrderStatus): boolean {
    return isTerminalState(status);
  }

  /**
   * Description of a transition for logs and audit entries
   */
  describe(from: OrderStatus, to: OrderStatus): string {
    return (
      this.transitions.get(this.getTransitionKey(from, to))?.metadata
        .description ?? `${from} -> ${to}`
    );
  }

  private getTransitionKey(from: OrderStatus, to: OrderStatus): string {
    return `${from}->${to}`;
  }
}
