import * as crypto from 'crypto';
import {
  GatewayUnavailableError,
  MercadoPagoGatewayAdapter,
  Money,
  PaymentOutcome,
} from '../../src';
import { createHttpClient, jsonResponse } from '../helpers/http';

describe('MercadoPagoGatewayAdapter', () => {
  const webhookSecret = 'test-webhook-secret';
  let httpClient: ReturnType<typeof createHttpClient>;
  let adapter: MercadoPagoGatewayAdapter;

  const checkoutRequest = {
    orderId: 'order-1',
    amount: new Money(3000, 'CLP'),
    description: 'Audio transcription - order order-1',
    customerEmail: 'ana@example.com',
    returnUrl: 'https://api.example.com/payments/return/mercadopago',
    callbackUrl: 'https://api.example.com/webhooks/mercadopago',
  };

  beforeEach(() => {
    httpClient = createHttpClient();
    adapter = new MercadoPagoGatewayAdapter({ accessToken: 'test-token', httpClient });
  });

  describe('createCheckout', () => {
    it('should create a preference referencing the order', async () => {
      httpClient.mockResolvedValueOnce(
        jsonResponse(201, {
          id: 'pref-123',
          init_point: 'https://www.mercadopago.cl/checkout/v1/redirect?pref_id=pref-123',
          sandbox_init_point: 'https://sandbox.mercadopago.cl/checkout/v1/redirect?pref_id=pref-123',
        }),
      );

      const session = await adapter.createCheckout(checkoutRequest);

      expect(session).toEqual({
        checkoutUrl: 'https://www.mercadopago.cl/checkout/v1/redirect?pref_id=pref-123',
        token: 'pref-123',
      });

      const [url, init] = httpClient.mock.calls[0];
      expect(url).toBe('https://api.mercadopago.com/checkout/preferences');
      expect(init?.method).toBe('POST');
      expect(init?.headers?.Authorization).toBe('Bearer test-token');

      const body = JSON.parse(init?.body ?? '{}');
      expect(body.external_reference).toBe('order-1');
      expect(body.notification_url).toBe('https://api.example.com/webhooks/mercadopago');
      expect(body.back_urls.success).toBe('https://api.example.com/payments/return/mercadopago');
      expect(body.items[0]).toEqual({
        id: 'order-1',
        title: 'Audio transcription - order order-1',
        quantity: 1,
        unit_price: 3000,
        currency_id: 'CLP',
      });
    });

    it('should prefer the sandbox checkout URL in sandbox mode', async () => {
      adapter = new MercadoPagoGatewayAdapter({ accessToken: 'test-token', sandbox: true, httpClient });
      httpClient.mockResolvedValueOnce(
        jsonResponse(201, {
          id: 'pref-123',
          init_point: 'https://live.example/pay',
          sandbox_init_point: 'https://sandbox.example/pay',
        }),
      );

      const session = await adapter.createCheckout(checkoutRequest);
      expect(session.checkoutUrl).toBe('https://sandbox.example/pay');
    });

    it('should throw GatewayUnavailableError on a server error', async () => {
      httpClient.mockResolvedValueOnce(jsonResponse(500, { message: 'internal' }));

      await expect(adapter.createCheckout(checkoutRequest)).rejects.toBeInstanceOf(
        GatewayUnavailableError,
      );
    });

    it('should throw GatewayUnavailableError when the network fails', async () => {
      httpClient.mockRejectedValueOnce(new Error('connection refused'));

      await expect(adapter.createCheckout(checkoutRequest)).rejects.toThrow(
        'mercadopago request failed: connection refused',
      );
    });
  });

  describe('parseNotification', () => {
    it('should confirm a payment notification by fetching the payment', async () => {
      httpClient.mockResolvedValueOnce(
        jsonResponse(200, { id: 123, status: 'approved', external_reference: 'order-1' }),
      );

      const event = await adapter.parseNotification({
        query: { topic: 'payment', id: '123' },
        body: {},
        headers: {},
      });

      expect(event).toEqual({
        orderId: 'order-1',
        outcome: PaymentOutcome.APPROVED,
        rawProviderStatus: 'approved',
        gateway: 'mercadopago',
      });
      expect(httpClient.mock.calls[0][0]).toBe('https://api.mercadopago.com/v1/payments/123');
    });

    it('should read the payment id from the JSON body', async () => {
      httpClient.mockResolvedValueOnce(
        jsonResponse(200, { id: 456, status: 'rejected', external_reference: 'order-2' }),
      );

      const event = await adapter.parseNotification({
        query: {},
        body: { type: 'payment', data: { id: '456' } },
        headers: {},
      });

      expect(event.orderId).toBe('order-2');
      expect(event.outcome).toBe(PaymentOutcome.REJECTED);
    });

    it('should ignore unsupported topics without calling the API', async () => {
      const event = await adapter.parseNotification({
        query: { topic: 'merchant_order', id: '1' },
        body: {},
        headers: {},
      });

      expect(event.outcome).toBe(PaymentOutcome.PENDING);
      expect(event.orderId).toBeNull();
      expect(event.error).toBe('Unsupported topic: merchant_order');
      expect(httpClient).not.toHaveBeenCalled();
    });

    it('should return a pending event when the payment lookup fails', async () => {
      httpClient.mockRejectedValueOnce(new Error('timeout'));

      const event = await adapter.parseNotification({
        query: { topic: 'payment', id: '123' },
        body: {},
        headers: {},
      });

      expect(event.outcome).toBe(PaymentOutcome.PENDING);
      expect(event.error).toBe('mercadopago request failed: timeout');
    });

    describe('with signature verification', () => {
      const sign = (dataId: string, requestId: string, ts: string) =>
        crypto
          .createHmac('sha256', webhookSecret)
          .update(`id:${dataId};request-id:${requestId};ts:${ts};`)
          .digest('hex');

      beforeEach(() => {
        adapter = new MercadoPagoGatewayAdapter({ accessToken: 'test-token', webhookSecret, httpClient });
      });

      it('should accept a valid x-signature', async () => {
        httpClient.mockResolvedValueOnce(
          jsonResponse(200, { status: 'approved', external_reference: 'order-1' }),
        );

        const event = await adapter.parseNotification({
          query: { type: 'payment', 'data.id': 'ABC123' },
          body: {},
          headers: {
            'x-signature': `ts=1700000000,v1=${sign('abc123', 'req-1', '1700000000')}`,
            'x-request-id': 'req-1',
          },
        });

        expect(event.outcome).toBe(PaymentOutcome.APPROVED);
        expect(httpClient.mock.calls[0][0]).toBe('https://api.mercadopago.com/v1/payments/ABC123');
      });

      it('should reject a tampered signature', async () => {
        const event = await adapter.parseNotification({
          query: { type: 'payment', 'data.id': 'ABC123' },
          body: {},
          headers: {
            'x-signature': `ts=1700000000,v1=${sign('abc123', 'req-2', '1700000000')}`,
            'x-request-id': 'req-1',
          },
        });

        expect(event.outcome).toBe(PaymentOutcome.PENDING);
        expect(event.error).toBe('Invalid webhook signature');
        expect(httpClient).not.toHaveBeenCalled();
      });

      it('should reject a notification without signature headers', async () => {
        const event = await adapter.parseNotification({
          query: { type: 'payment', 'data.id': '123' },
          body: {},
          headers: {},
        });

        expect(event.error).toBe('Invalid webhook signature');
      });
    });
  });

  describe('queryStatus', () => {
    it.each([
      ['approved', PaymentOutcome.APPROVED],
      ['rejected', PaymentOutcome.REJECTED],
      ['cancelled', PaymentOutcome.CANCELLED],
      ['refunded', PaymentOutcome.CANCELLED],
      ['charged_back', PaymentOutcome.CANCELLED],
      ['in_process', PaymentOutcome.PENDING],
    ])('should map %s to %s', async (status, outcome) => {
      httpClient.mockResolvedValueOnce(jsonResponse(200, { status, external_reference: 'order-1' }));

      const event = await adapter.queryStatus('123');
      expect(event.outcome).toBe(outcome);
      expect(event.rawProviderStatus).toBe(status);
    });

    it('should fall back to the order id in metadata', async () => {
      httpClient.mockResolvedValueOnce(
        jsonResponse(200, { status: 'approved', metadata: { order_id: 'order-9' } }),
      );

      const event = await adapter.queryStatus('123');
      expect(event.orderId).toBe('order-9');
    });
  });

  describe('queryOrder', () => {
    it('should prefer an approved payment among the results', async () => {
      httpClient.mockResolvedValueOnce(
        jsonResponse(200, {
          results: [
            { status: 'rejected', external_reference: 'order-1' },
            { status: 'approved', external_reference: 'order-1' },
          ],
        }),
      );

      const event = await adapter.queryOrder('order-1');

      expect(event.outcome).toBe(PaymentOutcome.APPROVED);
      expect(httpClient.mock.calls[0][0]).toBe(
        'https://api.mercadopago.com/v1/payments/search?external_reference=order-1&sort=date_created&criteria=desc',
      );
    });

    it('should report pending when no payment exists yet', async () => {
      httpClient.mockResolvedValueOnce(jsonResponse(200, { results: [] }));

      const event = await adapter.queryOrder('order-1');
      expect(event).toEqual({
        orderId: 'order-1',
        outcome: PaymentOutcome.PENDING,
        rawProviderStatus: 'no_payment',
        gateway: 'mercadopago',
      });
    });

    it('should keep the order id when the search fails', async () => {
      httpClient.mockResolvedValueOnce(jsonResponse(503, 'unavailable'));

      const event = await adapter.queryOrder('order-1');
      expect(event.orderId).toBe('order-1');
      expect(event.outcome).toBe(PaymentOutcome.PENDING);
      expect(event.error).toBe('mercadopago responded with HTTP 503');
    });
  });

  describe('extractReturnToken', () => {
    it('should read payment_id or collection_id', () => {
      expect(adapter.extractReturnToken({ query: { payment_id: '999' }, body: {}, headers: {} })).toBe('999');
      expect(adapter.extractReturnToken({ query: { collection_id: '888' }, body: {}, headers: {} })).toBe('888');
    });

    it('should treat the literal "null" as no token', () => {
      expect(adapter.extractReturnToken({ query: { payment_id: 'null' }, body: {}, headers: {} })).toBeNull();
      expect(adapter.extractReturnToken({ query: {}, body: {}, headers: {} })).toBeNull();
    });
  });
});
