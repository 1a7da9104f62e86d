import {
  CheckoutRequest,
  CheckoutSession,
  GatewayUnavailableError,
  HttpClient,
  InboundNotification,
  PaymentEvent,
  PaymentGatewayAdapter,
  PaymentOutcome,
} from '../../../core';
import {
  callGateway,
  defaultHttpClient,
  describeError,
  isRecord,
  pendingEvent,
  readString,
} from '../gateway-http';
import { hmacSha256, safeEqual } from '../../../_shared/utils';

export interface MercadoPagoGatewayConfig {
  accessToken: string;
  /**
   * Enables `x-signature` verification of webhooks when set
   */
  webhookSecret?: string;
  /**
   * Prefer `sandbox_init_point` for checkout URLs
   */
  sandbox?: boolean;
  apiBaseUrl?: string;
  timeoutMs?: number;
  httpClient?: HttpClient;
}

const STATUS_MAP = new Map<string, PaymentOutcome>([
  ['approved', PaymentOutcome.APPROVED],
  ['rejected', PaymentOutcome.REJECTED],
  ['cancelled', PaymentOutcome.CANCELLED],
  ['refunded', PaymentOutcome.CANCELLED],
  ['charged_back', PaymentOutcome.CANCELLED],
]);

/**
 * MercadoPago Gateway Adapter
 *
 * Checkout is a preference carrying our order id as `external_reference`.
 * Webhooks only carry a payment id, so every notification is confirmed by
 * fetching the payment, whose `external_reference` maps back to the order.
 *
 * Authentication:
 * - API Calls: Bearer access token
 * - Webhook Signature: HMAC-SHA256 over `id:<data.id>;request-id:<x-request-id>;ts:<ts>;`
 *
 * @see https://www.mercadopago.com/developers/en/docs/your-integrations/notifications/webhooks
 */
export class MercadoPagoGatewayAdapter implements PaymentGatewayAdapter {
  readonly gatewayName = 'mercadopago';
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly httpClient: HttpClient;

  constructor(private readonly config: MercadoPagoGatewayConfig) {
    this.apiBaseUrl = config.apiBaseUrl ?? 'https://api.mercadopago.com';
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.httpClient = config.httpClient ?? defaultHttpClient;
  }

  async createCheckout(request: CheckoutRequest): Promise<CheckoutSession> {
    const preference = await callGateway(
      this.httpClient,
      this.gatewayName,
      `${this.apiBaseUrl}/checkout/preferences`,
      {
        method: 'POST',
        headers: this.getApiHeaders(),
        body: JSON.stringify({
          items: [
            {
              id: request.orderId,
              title: request.description,
              quantity: 1,
              unit_price: request.amount.toMajorUnits(),
              currency_id: request.amount.currency,
            },
          ],
          payer: { email: request.customerEmail },
          external_reference: request.orderId,
          metadata: { order_id: request.orderId },
          back_urls: {
            success: request.returnUrl,
            failure: request.returnUrl,
            pending: request.returnUrl,
          },
          auto_return: 'approved',
          notification_url: request.callbackUrl,
        }),
      },
      this.timeoutMs,
    );

    if (!isRecord(preference)) {
      throw new GatewayUnavailableError('Unexpected preference response', this.gatewayName);
    }

    const initPoint = readString(preference, 'init_point');
    const sandboxInitPoint = readString(preference, 'sandbox_init_point');
    const checkoutUrl = this.config.sandbox
      ? sandboxInitPoint ?? initPoint
      : initPoint ?? sandboxInitPoint;

    if (!checkoutUrl) {
      throw new GatewayUnavailableError('Preference has no checkout URL', this.gatewayName, {
        preferenceId: readString(preference, 'id'),
      });
    }

    return { checkoutUrl, token: readString(preference, 'id') };
  }

  async parseNotification(inbound: InboundNotification): Promise<PaymentEvent> {
    const data = isRecord(inbound.body.data) ? inbound.body.data : {};
    const topic =
      inbound.query.topic ??
      inbound.query.type ??
      readString(inbound.body, 'type') ??
      readString(inbound.body, 'topic');
    const paymentId =
      inbound.query['data.id'] ?? inbound.query.id ?? readString(data, 'id');

    if (topic !== 'payment') {
      return pendingEvent(this.gatewayName, `Unsupported topic: ${topic ?? 'none'}`);
    }
    if (!paymentId) {
      return pendingEvent(this.gatewayName, 'Notification has no payment id');
    }
    if (this.config.webhookSecret && !this.verifySignature(inbound, paymentId)) {
      return pendingEvent(this.gatewayName, 'Invalid webhook signature');
    }

    return this.queryStatus(paymentId);
  }

  async queryStatus(paymentId: string): Promise<PaymentEvent> {
    try {
      const payment = await callGateway(
        this.httpClient,
        this.gatewayName,
        `${this.apiBaseUrl}/v1/payments/${encodeURIComponent(paymentId)}`,
        { method: 'GET', headers: this.getApiHeaders() },
        this.timeoutMs,
      );
      if (!isRecord(payment)) {
        return pendingEvent(this.gatewayName, 'Unexpected payment response');
      }
      return this.toPaymentEvent(payment);
    } catch (error) {
      return pendingEvent(this.gatewayName, describeError(error));
    }
  }

  /**
   * Most relevant payment for an order: an approved one if any, else the latest
   */
  async queryOrder(orderId: string): Promise<PaymentEvent> {
    try {
      const params = new URLSearchParams({
        external_reference: orderId,
        sort: 'date_created',
        criteria: 'desc',
      });
      const search = await callGateway(
        this.httpClient,
        this.gatewayName,
        `${this.apiBaseUrl}/v1/payments/search?${params.toString()}`,
        { method: 'GET', headers: this.getApiHeaders() },
        this.timeoutMs,
      );

      const results =
        isRecord(search) && Array.isArray(search.results)
          ? search.results.filter(isRecord)
          : [];
      const payment =
        results.find((result) => readString(result, 'status') === 'approved') ?? results[0];

      if (!payment) {
        return {
          orderId,
          outcome: PaymentOutcome.PENDING,
          rawProviderStatus: 'no_payment',
          gateway: this.gatewayName,
        };
      }
      return this.toPaymentEvent(payment);
    } catch (error) {
      return pendingEvent(this.gatewayName, describeError(error), orderId);
    }
  }

  extractReturnToken(inbound: InboundNotification): string | null {
    const token = inbound.query.payment_id ?? inbound.query.collection_id;
    // Abandoned checkouts come back with the literal string "null"
    return token && token !== 'null' ? token : null;
  }

  /**
   * Verify the `x-signature` header (`ts=<ts>,v1=<hex>`)
   */
  verifySignature(inbound: InboundNotification, dataId: string): boolean {
    const secret = this.config.webhookSecret;
    const header = inbound.headers['x-signature'];
    const requestId = inbound.headers['x-request-id'];
    if (!secret || !header || !requestId) {
      return false;
    }

    const parts = new Map<string, string>();
    for (const part of header.split(',')) {
      const [key, ...rest] = part.split('=');
      parts.set(key.trim(), rest.join('=').trim());
    }

    const ts = parts.get('ts');
    const v1 = parts.get('v1');
    if (!ts || !v1) {
      return false;
    }

    const manifest = `id:${dataId.toLowerCase()};request-id:${requestId};ts:${ts};`;
    return safeEqual(hmacSha256(secret, manifest), v1);
  }

  private toPaymentEvent(payment: Record<string, unknown>): PaymentEvent {
    const metadata = isRecord(payment.metadata) ? payment.metadata : {};
    const status = readString(payment, 'status') ?? 'unknown';

    return {
      orderId: readString(payment, 'external_reference') ?? readString(metadata, 'order_id'),
      outcome: STATUS_MAP.get(status) ?? PaymentOutcome.PENDING,
      rawProviderStatus: status,
      gateway: this.gatewayName,
    };
  }

  private getApiHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.accessToken}`,
      'Content-Type': 'application/json',
    };
  }
}
