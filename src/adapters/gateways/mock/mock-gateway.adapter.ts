import {
  CheckoutRequest,
  CheckoutSession,
  GatewayUnavailableError,
  InboundNotification,
  PaymentEvent,
  PaymentGatewayAdapter,
  PaymentOutcome,
} from '../../../core';
import {
  describeError,
  isRecord,
  pendingEvent,
  readString,
} from '../gateway-http';
import { hmacSha256, safeEqual } from '../../../_shared/utils';

export interface MockGatewayConfig {
  /**
   * Secret for `x-mock-signature` (HMAC-SHA256 of the raw body, hex)
   */
  secret: string;
  checkoutBaseUrl?: string;
}

interface MockSession {
  orderId: string;
  outcome: PaymentOutcome;
}

const EVENT_OUTCOMES = new Map<string, PaymentOutcome>([
  ['payment.approved', PaymentOutcome.APPROVED],
  ['payment.rejected', PaymentOutcome.REJECTED],
  ['payment.cancelled', PaymentOutcome.CANCELLED],
  ['payment.pending', PaymentOutcome.PENDING],
]);

/**
 * Mock payment gateway for development and tests
 * Provides deterministic checkout sessions and signed notifications
 */
export class MockGatewayAdapter implements PaymentGatewayAdapter {
  readonly gatewayName = 'mock';
  private readonly checkoutBaseUrl: string;

  // Checkout sessions by token, for status queries
  private sessions: Map<string, MockSession> = new Map();
  private unavailable = false;

  constructor(private readonly config: MockGatewayConfig) {
    this.checkoutBaseUrl = config.checkoutBaseUrl ?? 'https://checkout.mock.local';
  }

  async createCheckout(request: CheckoutRequest): Promise<CheckoutSession> {
    if (this.unavailable) {
      throw new GatewayUnavailableError('Mock gateway is unavailable', this.gatewayName);
    }

    const token = this.tokenFor(request.orderId);
    this.sessions.set(token, { orderId: request.orderId, outcome: PaymentOutcome.PENDING });

    return { checkoutUrl: `${this.checkoutBaseUrl}/pay/${token}`, token };
  }

  async parseNotification(inbound: InboundNotification): Promise<PaymentEvent> {
    const rawBody = inbound.rawBody ?? Buffer.from(JSON.stringify(inbound.body));
    const signature = inbound.headers['x-mock-signature'];
    if (!signature || !safeEqual(hmacSha256(this.config.secret, rawBody), signature)) {
      return pendingEvent(this.gatewayName, 'Invalid webhook signature');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody.toString('utf8'));
    } catch (error) {
      return pendingEvent(this.gatewayName, `Invalid JSON payload: ${describeError(error)}`);
    }

    if (!isRecord(payload) || !isRecord(payload.data)) {
      return pendingEvent(this.gatewayName, 'Missing data field');
    }

    const event = readString(payload, 'event') ?? 'unknown';
    const outcome = EVENT_OUTCOMES.get(event);
    if (!outcome) {
      return pendingEvent(this.gatewayName, `Unknown event type: ${event}`);
    }

    return {
      orderId: readString(payload.data, 'order_id'),
      outcome,
      rawProviderStatus: event,
      gateway: this.gatewayName,
    };
  }

  async queryStatus(token: string): Promise<PaymentEvent> {
    const session = this.sessions.get(token);
    if (!session) {
      return pendingEvent(this.gatewayName, `Unknown token: ${token}`);
    }
    return {
      orderId: session.orderId,
      outcome: session.outcome,
      rawProviderStatus: session.outcome,
      gateway: this.gatewayName,
    };
  }

  extractReturnToken(inbound: InboundNotification): string | null {
    return inbound.query.token ?? readString(inbound.body, 'token');
  }

  // ==================== Mock-Specific Methods ====================

  /**
   * Simulate the customer finishing the hosted checkout
   */
  settlePayment(orderId: string, outcome: PaymentOutcome): string {
    const token = this.tokenFor(orderId);
    this.sessions.set(token, { orderId, outcome });
    return token;
  }

  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  /**
   * Generate a notification signed the way `parseNotification` expects
   */
  generateSignedNotification(
    event: 'payment.approved' | 'payment.rejected' | 'payment.cancelled' | 'payment.pending',
    orderId: string,
    secret: string = this.config.secret,
  ): InboundNotification {
    const body = {
      id: `evt_${orderId}_${event}`,
      event,
      created_at: new Date().toISOString(),
      data: { order_id: orderId },
    };
    const rawBody = Buffer.from(JSON.stringify(body));

    return {
      query: {},
      body,
      headers: {
        'content-type': 'application/json',
        'x-mock-signature': hmacSha256(secret, rawBody),
      },
      rawBody,
    };
  }

  clearMockData(): void {
    this.sessions.clear();
    this.unavailable = false;
  }

  private tokenFor(orderId: string): string {
    return `mock_${orderId}`;
  }
}
