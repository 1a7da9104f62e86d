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
import { hmacSha256 } from '../../../_shared/utils';

export interface FlowGatewayConfig {
  apiKey: string;
  secretKey: string;
  sandbox?: boolean;
  apiBaseUrl?: string;
  timeoutMs?: number;
  httpClient?: HttpClient;
}

/**
 * Flow payment status codes
 */
export enum FlowPaymentStatus {
  PENDING = 1,
  PAID = 2,
  REJECTED = 3,
  ANNULLED = 4,
}

const STATUS_MAP = new Map<number, PaymentOutcome>([
  [FlowPaymentStatus.PENDING, PaymentOutcome.PENDING],
  [FlowPaymentStatus.PAID, PaymentOutcome.APPROVED],
  [FlowPaymentStatus.REJECTED, PaymentOutcome.REJECTED],
  [FlowPaymentStatus.ANNULLED, PaymentOutcome.CANCELLED],
]);

const SUBJECT_MAX_LENGTH = 100;

/**
 * Flow rejects subjects with line breaks or over 100 characters
 */
export function sanitizeFlowSubject(subject: string): string {
  return subject
    .replace(/\n/g, ' ')
    .replace(/\r/g, '')
    .trim()
    .slice(0, SUBJECT_MAX_LENGTH);
}

/**
 * Sign Flow API parameters: keys sorted, concatenated as key + value,
 * HMAC-SHA256 with the API secret
 */
export function signFlowParams(params: Record<string, string>, secretKey: string): string {
  const toSign = Object.keys(params)
    .sort()
    .map((key) => `${key}${params[key]}`)
    .join('');
  return hmacSha256(secretKey, toSign);
}

/**
 * Flow Gateway Adapter
 *
 * Checkout returns a token; webhooks and return redirects only carry that
 * token, so the payment status is always fetched server-side with a signed
 * `payment/getStatus` call. The order id travels as `commerceOrder`.
 *
 * @see https://www.flow.cl/docs/api.html
 */
export class FlowGatewayAdapter implements PaymentGatewayAdapter {
  readonly gatewayName = 'flow';
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly httpClient: HttpClient;

  constructor(private readonly config: FlowGatewayConfig) {
    this.apiBaseUrl =
      config.apiBaseUrl ??
      (config.sandbox ? 'https://sandbox.flow.cl/api' : 'https://www.flow.cl/api');
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.httpClient = config.httpClient ?? defaultHttpClient;
  }

  async createCheckout(request: CheckoutRequest): Promise<CheckoutSession> {
    const body = this.signedParams({
      commerceOrder: request.orderId,
      subject: sanitizeFlowSubject(request.description),
      currency: request.amount.currency,
      amount: String(request.amount.toMajorUnits()),
      email: request.customerEmail,
      urlConfirmation: request.callbackUrl,
      urlReturn: request.returnUrl,
      optional: JSON.stringify({ order_id: request.orderId }),
    });

    const payment = await callGateway(
      this.httpClient,
      this.gatewayName,
      `${this.apiBaseUrl}/payment/create`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
      },
      this.timeoutMs,
    );

    const url = isRecord(payment) ? readString(payment, 'url') : null;
    const token = isRecord(payment) ? readString(payment, 'token') : null;
    if (!url || !token) {
      throw new GatewayUnavailableError('Flow payment/create returned no url or token', this.gatewayName);
    }

    return { checkoutUrl: `${url}?token=${token}`, token };
  }

  async parseNotification(inbound: InboundNotification): Promise<PaymentEvent> {
    const token = this.extractReturnToken(inbound);
    if (!token) {
      return pendingEvent(this.gatewayName, 'Notification has no token');
    }
    return this.queryStatus(token);
  }

  async queryStatus(token: string): Promise<PaymentEvent> {
    try {
      const params = this.signedParams({ token: token.trim() });
      const status = await callGateway(
        this.httpClient,
        this.gatewayName,
        `${this.apiBaseUrl}/payment/getStatus?${params.toString()}`,
        { method: 'GET' },
        this.timeoutMs,
      );
      if (!isRecord(status)) {
        return pendingEvent(this.gatewayName, 'Unexpected getStatus response');
      }
      return this.toPaymentEvent(status);
    } catch (error) {
      return pendingEvent(this.gatewayName, describeError(error));
    }
  }

  extractReturnToken(inbound: InboundNotification): string | null {
    return readString(inbound.body, 'token') ?? inbound.query.token ?? null;
  }

  private toPaymentEvent(status: Record<string, unknown>): PaymentEvent {
    const rawStatus = readString(status, 'status') ?? 'unknown';
    const code = Number(rawStatus);

    return {
      orderId: readString(status, 'commerceOrder'),
      outcome: STATUS_MAP.get(code) ?? PaymentOutcome.PENDING,
      rawProviderStatus: rawStatus,
      gateway: this.gatewayName,
    };
  }

  private signedParams(params: Record<string, string>): URLSearchParams {
    const withKey = { apiKey: this.config.apiKey, ...params };
    return new URLSearchParams({ ...withKey, s: signFlowParams(withKey, this.config.secretKey) });
  }
}
