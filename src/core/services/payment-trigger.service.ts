import { Logger } from '@nestjs/common';
import { DispatchOutcome, OrderStatus, TriggerType } from '../domain/enums';
import { DispatchRouter } from '../dispatch';
import { GatewayRegistry } from '../gateways';
import {
  InboundNotification,
  OrderStore,
  PaymentEvent,
  PaymentGatewayAdapter,
} from '../interfaces';

export interface TriggerResult {
  orderId: string | null;
  outcome: DispatchOutcome;
  event?: PaymentEvent;
}

/**
 * The payment trigger entry points: gateway webhooks, the return redirect
 * and the dashboard poll. Each turns its input into a PaymentEvent and
 * hands it to the router; none of them coordinates with the others.
 */
export class PaymentTriggerService {
  private readonly logger = new Logger(PaymentTriggerService.name);

  constructor(
    private readonly store: OrderStore,
    private readonly router: DispatchRouter,
    private readonly gateways: GatewayRegistry,
  ) {}

  /**
   * @throws UnknownGatewayError
   */
  async handleWebhook(gateway: string, inbound: InboundNotification): Promise<TriggerResult> {
    const adapter = this.gateways.get(gateway);
    const event = await adapter.parseNotification(inbound);
    if (event.error) {
      this.logger.warn(`Unusable ${gateway} webhook: ${event.error}`);
    }

    const outcome = await this.router.handle(event.orderId, event, TriggerType.WEBHOOK);
    return { orderId: event.orderId, outcome, event };
  }

  /**
   * @throws UnknownGatewayError
   */
  async handleReturn(gateway: string, inbound: InboundNotification): Promise<TriggerResult> {
    const adapter = this.gateways.get(gateway);
    const token = adapter.extractReturnToken(inbound);
    if (!token) {
      this.logger.debug(`${gateway} return redirect without token`);
      return { orderId: null, outcome: DispatchOutcome.IGNORED };
    }

    const event = await adapter.queryStatus(token);
    const outcome = await this.router.handle(event.orderId, event, TriggerType.RETURN_REDIRECT);
    return { orderId: event.orderId, outcome, event };
  }

  /**
   * Side effects of a dashboard poll: an errored order is retried and a
   * pending one is checked against its gateway.
   * @throws OrderNotFoundError
   */
  async handlePoll(orderId: string, token?: string): Promise<TriggerResult> {
    const order = await this.store.get(orderId);

    if (order.status === OrderStatus.ERROR) {
      const outcome = await this.router.retry(orderId, TriggerType.POLL);
      return { orderId, outcome };
    }

    if (order.status !== OrderStatus.PENDING || !order.gateway) {
      return { orderId, outcome: DispatchOutcome.IGNORED };
    }

    const event = await this.queryGateway(
      this.gateways.get(order.gateway),
      orderId,
      token ?? null,
      order.checkoutToken,
    );
    if (!event) {
      return { orderId, outcome: DispatchOutcome.IGNORED };
    }

    // The payment must name this order; a missing reference is not a match
    if (event.orderId !== orderId) {
      this.logger.warn(
        `Poll token for order ${orderId} resolved to ${event.orderId === null ? 'no order' : `order ${event.orderId}`}; ignoring`,
      );
      return { orderId, outcome: DispatchOutcome.IGNORED, event };
    }

    const outcome = await this.router.handle(orderId, event, TriggerType.POLL);
    return { orderId, outcome, event };
  }

  /**
   * An explicit token wins, then a lookup by order id, then the checkout token
   */
  private async queryGateway(
    adapter: PaymentGatewayAdapter,
    orderId: string,
    token: string | null,
    storedToken: string | null,
  ): Promise<PaymentEvent | null> {
    if (token) {
      return adapter.queryStatus(token);
    }
    if (adapter.queryOrder) {
      return adapter.queryOrder(orderId);
    }
    if (storedToken) {
      return adapter.queryStatus(storedToken);
    }
    return null;
  }
}
