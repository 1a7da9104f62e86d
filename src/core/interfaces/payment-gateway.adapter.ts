import {
  CheckoutRequest,
  CheckoutSession,
  InboundNotification,
  PaymentEvent,
} from './common.types';

/**
 * Payment gateway adapter interface - abstracts gateway-specific logic
 * Each gateway translates its native notifications into a canonical PaymentEvent
 */
export interface PaymentGatewayAdapter {
  /**
   * Unique identifier, also the route segment (e.g., 'mercadopago', 'flow')
   */
  readonly gatewayName: string;

  /**
   * Open a hosted checkout session for an order
   * @throws GatewayUnavailableError on network failure or an unusable reply
   */
  createCheckout(request: CheckoutRequest): Promise<CheckoutSession>;

  /**
   * Translate a webhook into a PaymentEvent.
   * Never throws: any parse, verification or network failure yields
   * outcome `pending` with `error` set.
   */
  parseNotification(inbound: InboundNotification): Promise<PaymentEvent>;

  /**
   * Ask the gateway for the current status behind a token or payment id.
   * Same never-throw contract as parseNotification.
   */
  queryStatus(token: string): Promise<PaymentEvent>;

  /**
   * Look a payment up by our order id, for gateways whose checkout token
   * is not a payment reference. Same never-throw contract.
   */
  queryOrder?(orderId: string): Promise<PaymentEvent>;

  /**
   * Token the gateway appends to the customer's return redirect
   */
  extractReturnToken(inbound: InboundNotification): string | null;
}

/**
 * Minimal fetch signature adapters depend on, so tests can stub the network
 */
export type HttpClient = (
  url: string,
  init?: {
    method?: string;
    headers?: Record<string, string>;
    body?: string;
    signal?: AbortSignal;
  },
) => Promise<HttpResponse>;

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}
