import { INestApplication, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import request from 'supertest';
import {
  BackgroundTaskRunner,
  DispatchModule,
  InMemoryOrderStore,
  MockGatewayAdapter,
  OrderStatus,
  RecordingMailer,
  ServiceType,
  TASK_RUNNER,
} from '../../src';
import { buildOrder } from '../helpers/fixtures';

const ADMIN_TOKEN = 'test-secret';
const UNKNOWN_ID = '3f1c9a52-8a61-4b8e-9f0e-1d2c3b4a5f60';

describe('HTTP API', () => {
  let app: INestApplication;
  let store: InMemoryOrderStore;
  let mailer: RecordingMailer;
  // Same secret as the module's adapter, used to sign notifications
  const signer = new MockGatewayAdapter({ secret: 'test-secret' });

  beforeAll(async () => {
    store = new InMemoryOrderStore();
    mailer = new RecordingMailer();

    app = await NestFactory.create(
      DispatchModule.forRoot({
        storage: { type: 'custom', store },
        gateways: { defaultGateway: 'mock', mock: { secret: 'test-secret' } },
        pipelines: { artifactBaseUrl: 'https://files.example.com' },
        mail: { transport: 'custom', mailer },
        pricing: {
          [ServiceType.TRANSCRIPTION]: 3000,
          [ServiceType.EXAM]: 4500,
          [ServiceType.MEETING]: 2000,
        },
        currency: 'CLP',
        urls: {
          dashboardUrl: 'https://app.example.com/dashboard',
          publicBaseUrl: 'https://orders.example.com',
        },
        admin: { token: ADMIN_TOKEN },
        events: { enableLogging: false },
      }),
      { rawBody: true, logger: false },
    );
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    store.clear();
    mailer.clear();
  });

  async function submitTranscription(): Promise<string> {
    const response = await request(app.getHttpServer())
      .post('/orders')
      .send({
        serviceType: 'transcription',
        parameters: { audioUrl: 'https://files.example.com/lecture-01.mp3' },
        customerName: 'Ana Rojas',
        customerEmail: 'ana@example.com',
      })
      .expect(201);
    return response.body.orderId;
  }

  async function idle(): Promise<void> {
    await app.get<BackgroundTaskRunner>(TASK_RUNNER).onIdle();
  }

  it('should take an order from submission to delivered results', async () => {
    const orderId = await submitTranscription();
    const notification = signer.generateSignedNotification('payment.approved', orderId);

    const webhook = await request(app.getHttpServer())
      .post('/webhooks/mock')
      .set('content-type', 'application/json')
      .set('x-mock-signature', notification.headers['x-mock-signature'] ?? '')
      .send(notification.rawBody?.toString('utf8'))
      .expect(200);
    await idle();

    expect(webhook.body).toEqual({ received: true, outcome: 'scheduled' });

    const status = await request(app.getHttpServer()).get(`/orders/${orderId}/status`).expect(200);
    expect(status.body.status).toBe('completed');
    expect(status.body.artifacts).toHaveLength(4);
    expect(status.body.emailSent).toBe(true);
    expect(mailer.sentTo('ana@example.com')).toHaveLength(1);
  });

  it('should answer 200 to notifications it cannot use', async () => {
    const orderId = await submitTranscription();
    const forged = signer.generateSignedNotification('payment.approved', orderId, 'wrong-secret');

    const badSignature = await request(app.getHttpServer())
      .post('/webhooks/mock')
      .set('content-type', 'application/json')
      .set('x-mock-signature', forged.headers['x-mock-signature'] ?? '')
      .send(forged.rawBody?.toString('utf8'))
      .expect(200);
    const unknownGateway = await request(app.getHttpServer())
      .post('/webhooks/paypal')
      .send({ id: 'evt_1' })
      .expect(200);

    expect(badSignature.body).toEqual({ received: true, outcome: 'unknown_order' });
    expect(unknownGateway.body).toEqual({ received: true, outcome: 'ignored' });
    expect((await store.get(orderId)).status).toBe(OrderStatus.PENDING);
  });

  it('should redirect the customer to the dashboard after checkout', async () => {
    const orderId = await submitTranscription();

    const response = await request(app.getHttpServer())
      .get('/payments/return/mock')
      .query({ token: `mock_${orderId}` })
      .expect(302);

    expect(response.headers.location).toBe(`https://app.example.com/dashboard?order=${orderId}`);
  });

  it('should validate submissions', async () => {
    const badParameters = await request(app.getHttpServer())
      .post('/orders')
      .send({
        serviceType: 'exam',
        parameters: { topic: 'Fractions' },
        customerName: 'Ana Rojas',
        customerEmail: 'ana@example.com',
      })
      .expect(400);

    expect(badParameters.body.message).toBe('Invalid parameters for service type exam');

    await request(app.getHttpServer())
      .post('/orders')
      .send({
        serviceType: 'transcription',
        parameters: { audioUrl: 'https://files.example.com/a.mp3' },
        customerName: 'Ana Rojas',
        customerEmail: 'not-an-email',
      })
      .expect(400);
  });

  it('should map unknown discount codes to 400', async () => {
    const response = await request(app.getHttpServer())
      .post('/orders')
      .send({
        serviceType: 'transcription',
        parameters: { audioUrl: 'https://files.example.com/a.mp3' },
        customerName: 'Ana Rojas',
        customerEmail: 'ana@example.com',
        discountCode: 'nope',
      })
      .expect(400);

    expect(response.body.reason).toBe('not_found');
  });

  it('should answer 404 for unknown orders and 400 for malformed ids', async () => {
    await request(app.getHttpServer()).get(`/orders/${UNKNOWN_ID}/status`).expect(404);
    await request(app.getHttpServer()).get('/orders/not-a-uuid/status').expect(400);
  });

  describe('admin', () => {
    it('should require the admin token', async () => {
      await request(app.getHttpServer()).get('/admin/orders').expect(401);
      await request(app.getHttpServer())
        .get('/admin/orders')
        .set('x-admin-token', 'wrong')
        .expect(401);
    });

    it('should retry an errored order', async () => {
      store.injectTestData({
        orders: [buildOrder({ id: UNKNOWN_ID, status: OrderStatus.ERROR, attempts: 1 })],
      });

      const response = await request(app.getHttpServer())
        .post(`/admin/orders/${UNKNOWN_ID}/retry`)
        .set('x-admin-token', ADMIN_TOKEN)
        .send({ actor: 'ops' })
        .expect(200);
      await idle();

      expect(response.body).toEqual({ orderId: UNKNOWN_ID, outcome: 'scheduled' });
      expect((await store.get(UNKNOWN_ID)).status).toBe(OrderStatus.COMPLETED);
    });

    it('should manage discount codes', async () => {
      const created = await request(app.getHttpServer())
        .post('/admin/discounts')
        .set('x-admin-token', ADMIN_TOKEN)
        .send({ code: 'spring20', percent: 20 })
        .expect(201);
      expect(created.body.code).toBe('SPRING20');

      const validated = await request(app.getHttpServer()).get('/discounts/spring20').expect(200);
      expect(validated.body).toEqual({ code: 'SPRING20', valid: true, percent: 20 });

      await request(app.getHttpServer())
        .delete('/admin/discounts/spring20')
        .set('x-admin-token', ADMIN_TOKEN)
        .expect(200, { code: 'SPRING20', active: false });
      await request(app.getHttpServer())
        .delete('/admin/discounts/missing')
        .set('x-admin-token', ADMIN_TOKEN)
        .expect(404);
    });
  });

  it('should report health and readiness', async () => {
    const health = await request(app.getHttpServer()).get('/health').expect(200);
    const ready = await request(app.getHttpServer()).get('/health/ready').expect(200);

    expect(health.body.status).toBe('healthy');
    expect(ready.body.status).toBe('ready');
    expect(ready.body.checks).toEqual({ database: true, gateways: true });
  });
});
