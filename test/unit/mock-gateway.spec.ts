import * as crypto from 'crypto';
import {
  GatewayUnavailableError,
  MockGatewayAdapter,
  Money,
  PaymentOutcome,
} from '../../src';

describe('MockGatewayAdapter', () => {
  const secret = 'test-secret';
  let adapter: MockGatewayAdapter;

  const checkoutRequest = {
    orderId: 'order-1',
    amount: new Money(3000, 'CLP'),
    description: 'Meeting minutes - order order-1',
    customerEmail: 'ana@example.com',
    returnUrl: 'http://localhost/payments/return/mock',
    callbackUrl: 'http://localhost/webhooks/mock',
  };

  beforeEach(() => {
    adapter = new MockGatewayAdapter({ secret });
  });

  it('should open a deterministic checkout session', async () => {
    const session = await adapter.createCheckout(checkoutRequest);

    expect(session).toEqual({
      checkoutUrl: 'https://checkout.mock.local/pay/mock_order-1',
      token: 'mock_order-1',
    });

    const event = await adapter.queryStatus('mock_order-1');
    expect(event.outcome).toBe(PaymentOutcome.PENDING);
    expect(event.orderId).toBe('order-1');
  });

  it('should report the settled outcome', async () => {
    await adapter.createCheckout(checkoutRequest);
    const token = adapter.settlePayment('order-1', PaymentOutcome.APPROVED);

    const event = await adapter.queryStatus(token);
    expect(event).toEqual({
      orderId: 'order-1',
      outcome: PaymentOutcome.APPROVED,
      rawProviderStatus: 'approved',
      gateway: 'mock',
    });
  });

  it('should return a pending event for an unknown token', async () => {
    const event = await adapter.queryStatus('nope');
    expect(event.error).toBe('Unknown token: nope');
  });

  it('should fail checkout while unavailable', async () => {
    adapter.setUnavailable(true);
    await expect(adapter.createCheckout(checkoutRequest)).rejects.toBeInstanceOf(GatewayUnavailableError);

    adapter.clearMockData();
    await expect(adapter.createCheckout(checkoutRequest)).resolves.toBeDefined();
  });

  describe('parseNotification', () => {
    it('should accept its own signed notifications', async () => {
      const event = await adapter.parseNotification(
        adapter.generateSignedNotification('payment.approved', 'order-1'),
      );

      expect(event).toEqual({
        orderId: 'order-1',
        outcome: PaymentOutcome.APPROVED,
        rawProviderStatus: 'payment.approved',
        gateway: 'mock',
      });
    });

    it('should reject a notification signed with another secret', async () => {
      const event = await adapter.parseNotification(
        adapter.generateSignedNotification('payment.approved', 'order-1', 'other-secret'),
      );

      expect(event.outcome).toBe(PaymentOutcome.PENDING);
      expect(event.orderId).toBeNull();
      expect(event.error).toBe('Invalid webhook signature');
    });

    it('should reject unknown event types', async () => {
      const rawBody = Buffer.from(JSON.stringify({ event: 'payment.refunded', data: { order_id: 'order-1' } }));
      const signature = crypto.createHmac('sha256', secret).update(rawBody).digest('hex');

      const event = await adapter.parseNotification({
        query: {},
        body: {},
        headers: { 'x-mock-signature': signature },
        rawBody,
      });

      expect(event.error).toBe('Unknown event type: payment.refunded');
    });

    it('should reject a signed body that is not JSON', async () => {
      const rawBody = Buffer.from('not-json');
      const signature = crypto.createHmac('sha256', secret).update(rawBody).digest('hex');

      const event = await adapter.parseNotification({
        query: {},
        body: {},
        headers: { 'x-mock-signature': signature },
        rawBody,
      });

      expect(event.outcome).toBe(PaymentOutcome.PENDING);
      expect(event.error).toMatch(/^Invalid JSON payload: /);
    });
  });
});
