import {
  AuditAction,
  DispatchOutcome,
  Order,
  OrderEventType,
  OrderStatus,
  PaymentOutcome,
  TriggerType,
} from '../../src';
import { DispatchHarness, createDispatchHarness } from '../helpers/dispatch-harness';
import { TRANSCRIPTION_INPUT, artifactsFor, buildOrder } from '../helpers/fixtures';

async function submit(harness: DispatchHarness): Promise<Order> {
  const { order } = await harness.orders.submitJob({
    pipelineInput: TRANSCRIPTION_INPUT,
    customer: { name: 'Ana Rojas', email: 'ana@example.com' },
  });
  return order;
}

describe('DispatchRouter', () => {
  describe('webhook approval', () => {
    it('should run the pipeline and deliver the results once', async () => {
      const harness = createDispatchHarness();
      const order = await submit(harness);

      const result = await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', order.id),
      );
      await harness.runner.onIdle();

      expect(result.outcome).toBe(DispatchOutcome.SCHEDULED);
      const stored = await harness.store.get(order.id);
      expect(stored.status).toBe(OrderStatus.COMPLETED);
      expect(stored.artifacts).toEqual(artifactsFor(order.id, 3));
      expect(stored.emailSent).toBe(true);
      expect(stored.attempts).toBe(1);
      expect(harness.run).toHaveBeenCalledTimes(1);
      expect(harness.mailer.sentTo('ana@example.com')).toHaveLength(1);
    });

    it('should record every transition in the audit trail', async () => {
      const harness = createDispatchHarness();
      const order = await submit(harness);

      await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', order.id),
      );
      await harness.runner.onIdle();

      const actions = (await harness.store.getAuditTrail(order.id)).map((entry) => entry.action);
      expect(actions).toHaveLength(6);
      expect(actions).toEqual(
        expect.arrayContaining([
          AuditAction.ORDER_CREATED,
          AuditAction.CHECKOUT_OPENED,
          AuditAction.PAYMENT_ACCEPTED,
          AuditAction.PIPELINE_STARTED,
          AuditAction.PIPELINE_COMPLETED,
          AuditAction.EMAIL_SENT,
        ]),
      );
    });

    it('should emit paid, processing and completed events', async () => {
      const harness = createDispatchHarness();
      const seen: OrderEventType[] = [];
      harness.events.onAll(async (eventType) => {
        seen.push(eventType);
      });
      const order = await submit(harness);

      await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', order.id),
      );
      await harness.runner.onIdle();

      expect(seen[0]).toBe(OrderEventType.ORDER_PAID);
      expect([...seen].sort()).toEqual(
        [
          OrderEventType.ORDER_PAID,
          OrderEventType.ORDER_PROCESSING,
          OrderEventType.ORDER_COMPLETED,
        ].sort(),
      );
    });
  });

  describe('racing triggers', () => {
    it('should run the pipeline once when webhook, return and poll all confirm', async () => {
      const harness = createDispatchHarness({ simulateLatency: true });
      const order = await submit(harness);
      const token = harness.gateway.settlePayment(order.id, PaymentOutcome.APPROVED);

      const results = await Promise.all([
        harness.triggers.handleWebhook(
          'mock',
          harness.gateway.generateSignedNotification('payment.approved', order.id),
        ),
        harness.triggers.handleReturn('mock', { query: { token }, body: {}, headers: {} }),
        harness.triggers.handlePoll(order.id),
      ]);
      await harness.runner.onIdle();

      const scheduled = results.filter((result) => result.outcome === DispatchOutcome.SCHEDULED);
      expect(scheduled).toHaveLength(1);
      expect(harness.run).toHaveBeenCalledTimes(1);
      expect(harness.mailer.sent).toHaveLength(1);
      expect((await harness.store.get(order.id)).status).toBe(OrderStatus.COMPLETED);
    });

    it('should let exactly one of many duplicate webhooks win', async () => {
      const harness = createDispatchHarness({ simulateLatency: true });
      const order = await submit(harness);

      const outcomes = await Promise.all(
        Array.from({ length: 5 }, () =>
          harness.router.handle(
            order.id,
            { orderId: order.id, outcome: PaymentOutcome.APPROVED, rawProviderStatus: 'approved', gateway: 'mock' },
            TriggerType.WEBHOOK,
          ),
        ),
      );
      await harness.runner.onIdle();

      expect(outcomes.filter((outcome) => outcome === DispatchOutcome.SCHEDULED)).toHaveLength(1);
      expect(outcomes.filter((outcome) => outcome === DispatchOutcome.ALREADY_ACCEPTED)).toHaveLength(4);
      expect(harness.run).toHaveBeenCalledTimes(1);
    });

    it('should answer a late duplicate without sending a second email', async () => {
      const harness = createDispatchHarness();
      const order = await submit(harness);
      const approved = harness.gateway.generateSignedNotification('payment.approved', order.id);

      await harness.triggers.handleWebhook('mock', approved);
      await harness.runner.onIdle();
      const late = await harness.triggers.handleWebhook('mock', approved);

      expect(late.outcome).toBe(DispatchOutcome.ALREADY_ACCEPTED);
      expect(harness.mailer.sent).toHaveLength(1);
    });
  });

  describe('pipeline failure and retry', () => {
    it('should park a failed run in error and complete on operator retry', async () => {
      const harness = createDispatchHarness();
      harness.run.mockResolvedValueOnce({
        success: false,
        artifacts: [],
        error: 'transcription service timed out',
      });
      const order = await submit(harness);

      await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', order.id),
      );
      await harness.runner.onIdle();

      const failed = await harness.store.get(order.id);
      expect(failed.status).toBe(OrderStatus.ERROR);
      expect(failed.lastError).toBe('transcription service timed out');
      expect(harness.mailer.sent).toHaveLength(0);
      expect(harness.mailer.alerts).toEqual([
        { orderId: order.id, error: 'transcription service timed out' },
      ]);

      const outcome = await harness.router.retry(order.id, TriggerType.ADMIN, { actor: 'ops' });
      await harness.runner.onIdle();

      expect(outcome).toBe(DispatchOutcome.SCHEDULED);
      const completed = await harness.store.get(order.id);
      expect(completed.status).toBe(OrderStatus.COMPLETED);
      expect(completed.attempts).toBe(2);
      expect(completed.lastError).toBeNull();
      expect(harness.mailer.sent).toHaveLength(1);

      const retryEntry = (await harness.store.getAuditTrail(order.id)).find(
        (entry) => entry.action === AuditAction.RETRY_REQUESTED,
      );
      expect(retryEntry?.actor).toBe('ops');
      expect(retryEntry?.trigger).toBe(TriggerType.ADMIN);
    });

    it('should treat a thrown pipeline error like a reported failure', async () => {
      const harness = createDispatchHarness();
      harness.run.mockRejectedValueOnce(new Error('out of quota'));
      const order = await submit(harness);

      await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', order.id),
      );
      await harness.runner.onIdle();

      const stored = await harness.store.get(order.id);
      expect(stored.status).toBe(OrderStatus.ERROR);
      expect(stored.lastError).toBe('out of quota');
    });

    it('should not record a late failure on an order that moved on', async () => {
      const harness = createDispatchHarness();
      harness.store.injectTestData({
        orders: [buildOrder({ status: OrderStatus.ERROR, attempts: 1, lastError: 'quota exceeded' })],
      });

      const outcome = await harness.router.complete('order-1', {
        success: false,
        artifacts: [],
        error: 'stale worker timeout',
      });

      expect(outcome).toBe(DispatchOutcome.IGNORED);
      const stored = await harness.store.get('order-1');
      expect(stored.status).toBe(OrderStatus.ERROR);
      expect(stored.lastError).toBe('quota exceeded');
      expect(harness.mailer.alerts).toHaveLength(0);
    });

    it('should refuse retries past the attempt limit unless forced', async () => {
      const harness = createDispatchHarness({ maxAttempts: 2 });
      harness.store.injectTestData({
        orders: [buildOrder({ status: OrderStatus.ERROR, attempts: 2, lastError: 'boom' })],
      });

      expect(await harness.router.retry('order-1', TriggerType.POLL)).toBe(
        DispatchOutcome.RETRY_LIMIT_REACHED,
      );
      expect(await harness.router.retry('order-1', TriggerType.ADMIN, { force: true })).toBe(
        DispatchOutcome.SCHEDULED,
      );
      await harness.runner.onIdle();
      expect((await harness.store.get('order-1')).attempts).toBe(3);
    });

    it('should not retry orders outside error', async () => {
      const harness = createDispatchHarness();
      harness.store.injectTestData({ orders: [buildOrder({ status: OrderStatus.COMPLETED })] });

      expect(await harness.router.retry('order-1', TriggerType.ADMIN)).toBe(
        DispatchOutcome.NOT_RETRYABLE,
      );
      expect(await harness.router.retry('missing', TriggerType.ADMIN)).toBe(
        DispatchOutcome.UNKNOWN_ORDER,
      );
    });

    it('should fail an order whose pipeline input is missing', async () => {
      const harness = createDispatchHarness();
      harness.store.injectTestData({ orders: [buildOrder({ pipelineInput: null })] });

      await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', 'order-1'),
      );
      await harness.runner.onIdle();

      const stored = await harness.store.get('order-1');
      expect(stored.status).toBe(OrderStatus.ERROR);
      expect(stored.lastError).toBe('missing pipeline input');
      expect(harness.run).not.toHaveBeenCalled();
    });
  });

  describe('unusable notifications', () => {
    it('should leave the order untouched on a bad signature', async () => {
      const harness = createDispatchHarness();
      const order = await submit(harness);

      const result = await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', order.id, 'wrong-secret'),
      );

      expect(result.event?.outcome).toBe(PaymentOutcome.PENDING);
      expect(result.event?.error).toBe('Invalid webhook signature');
      expect(result.outcome).toBe(DispatchOutcome.UNKNOWN_ORDER);
      expect((await harness.store.get(order.id)).status).toBe(OrderStatus.PENDING);
      expect(harness.run).not.toHaveBeenCalled();
    });

    it('should ignore a pending notification', async () => {
      const harness = createDispatchHarness();
      const order = await submit(harness);

      const result = await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.pending', order.id),
      );

      expect(result.outcome).toBe(DispatchOutcome.IGNORED);
      expect((await harness.store.get(order.id)).status).toBe(OrderStatus.PENDING);
    });
  });

  describe('negative outcomes', () => {
    it('should mark a pending order failed or cancelled', async () => {
      const harness = createDispatchHarness();
      const rejected = await submit(harness);
      const cancelled = await submit(harness);

      const first = await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.rejected', rejected.id),
      );
      const second = await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.cancelled', cancelled.id),
      );

      expect(first.outcome).toBe(DispatchOutcome.MARKED_FAILED);
      expect(second.outcome).toBe(DispatchOutcome.MARKED_CANCELLED);
      expect((await harness.store.get(rejected.id)).status).toBe(OrderStatus.FAILED);
      expect((await harness.store.get(cancelled.id)).status).toBe(OrderStatus.CANCELLED);
    });

    it('should not schedule a pipeline for a closed order', async () => {
      const harness = createDispatchHarness();
      harness.store.injectTestData({ orders: [buildOrder({ status: OrderStatus.CANCELLED })] });

      const result = await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', 'order-1'),
      );

      expect(result.outcome).toBe(DispatchOutcome.ALREADY_ACCEPTED);
      expect((await harness.store.get('order-1')).status).toBe(OrderStatus.CANCELLED);
      expect(harness.run).not.toHaveBeenCalled();
    });

    it('should not let a rejection undo an accepted payment', async () => {
      const harness = createDispatchHarness();
      const order = await submit(harness);

      await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', order.id),
      );
      await harness.runner.onIdle();
      const result = await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.rejected', order.id),
      );

      expect(result.outcome).toBe(DispatchOutcome.IGNORED);
      expect((await harness.store.get(order.id)).status).toBe(OrderStatus.COMPLETED);
    });
  });

  describe('gateway mismatch', () => {
    it('should ignore an approval from a gateway the order did not check out with', async () => {
      const harness = createDispatchHarness();
      harness.store.injectTestData({ orders: [buildOrder({ gateway: 'flow' })] });

      const result = await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', 'order-1'),
      );
      await harness.runner.onIdle();

      expect(result.outcome).toBe(DispatchOutcome.IGNORED);
      const stored = await harness.store.get('order-1');
      expect(stored.status).toBe(OrderStatus.PENDING);
      expect(stored.emailSent).toBe(false);
      expect(harness.run).not.toHaveBeenCalled();
      expect(harness.mailer.sent).toHaveLength(0);
    });

    it('should ignore a rejection from another gateway', async () => {
      const harness = createDispatchHarness();
      harness.store.injectTestData({ orders: [buildOrder({ gateway: 'mercadopago' })] });

      const outcome = await harness.router.handle(
        'order-1',
        {
          orderId: 'order-1',
          outcome: PaymentOutcome.REJECTED,
          rawProviderStatus: 'payment.rejected',
          gateway: 'mock',
        },
        TriggerType.WEBHOOK,
      );

      expect(outcome).toBe(DispatchOutcome.IGNORED);
      expect((await harness.store.get('order-1')).status).toBe(OrderStatus.PENDING);
    });
  });

  describe('dashboard poll', () => {
    it('should retry an errored order and replace its artifacts', async () => {
      const harness = createDispatchHarness();
      harness.store.injectTestData({
        orders: [
          buildOrder({
            status: OrderStatus.ERROR,
            attempts: 1,
            lastError: 'timeout',
            artifacts: artifactsFor('order-1', 1, 'Draft'),
          }),
        ],
      });

      const result = await harness.triggers.handlePoll('order-1');
      await harness.runner.onIdle();

      expect(result.outcome).toBe(DispatchOutcome.SCHEDULED);
      const stored = await harness.store.get('order-1');
      expect(stored.status).toBe(OrderStatus.COMPLETED);
      expect(stored.artifacts).toEqual(artifactsFor('order-1', 3));
    });

    it('should confirm a pending order through its checkout token', async () => {
      const harness = createDispatchHarness();
      const order = await submit(harness);
      harness.gateway.settlePayment(order.id, PaymentOutcome.APPROVED);

      const result = await harness.triggers.handlePoll(order.id);
      await harness.runner.onIdle();

      expect(result.outcome).toBe(DispatchOutcome.SCHEDULED);
      expect((await harness.store.get(order.id)).status).toBe(OrderStatus.COMPLETED);
    });

    it('should do nothing for a completed order', async () => {
      const harness = createDispatchHarness();
      harness.store.injectTestData({ orders: [buildOrder({ status: OrderStatus.COMPLETED })] });

      expect((await harness.triggers.handlePoll('order-1')).outcome).toBe(DispatchOutcome.IGNORED);
    });
  });

  describe('email delivery', () => {
    it('should keep the order completed when sending fails and deliver on a later completion', async () => {
      const harness = createDispatchHarness();
      harness.mailer.setFailing(true);
      const order = await submit(harness);

      await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', order.id),
      );
      await harness.runner.onIdle();

      const undelivered = await harness.store.get(order.id);
      expect(undelivered.status).toBe(OrderStatus.COMPLETED);
      expect(undelivered.emailSent).toBe(false);

      harness.mailer.setFailing(false);
      const outcome = await harness.router.complete(order.id, {
        success: true,
        artifacts: artifactsFor(order.id, 3),
      });

      expect(outcome).toBe(DispatchOutcome.IGNORED);
      expect((await harness.store.get(order.id)).emailSent).toBe(true);
      expect(harness.mailer.sent).toHaveLength(1);
    });

    it('should send once when completion runs twice', async () => {
      const harness = createDispatchHarness();
      const order = await submit(harness);

      await harness.triggers.handleWebhook(
        'mock',
        harness.gateway.generateSignedNotification('payment.approved', order.id),
      );
      await harness.runner.onIdle();
      await harness.router.complete(order.id, { success: true, artifacts: artifactsFor(order.id, 3) });

      expect(harness.mailer.sent).toHaveLength(1);
    });

    it('should resend on operator request without touching the marker', async () => {
      const harness = createDispatchHarness();
      harness.store.injectTestData({
        orders: [
          buildOrder({
            status: OrderStatus.COMPLETED,
            emailSent: true,
            artifacts: artifactsFor('order-1', 2),
          }),
        ],
      });

      expect(await harness.delivery.resend('order-1', 'ops')).toBe('sent');
      expect(await harness.delivery.deliver('order-1')).toBe('already_sent');
      expect(harness.mailer.sent).toHaveLength(1);
    });
  });
});
