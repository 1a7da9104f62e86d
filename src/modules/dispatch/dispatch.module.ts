import {
  DynamicModule,
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
  Provider,
} from '@nestjs/common';
import {
  DispatchModuleAsyncConfig,
  DispatchModuleConfig,
  resolveDispatchConfig,
} from './dispatch.config';
import {
  DISPATCH_CONFIG,
  ORDER_STORE,
  EVENT_DISPATCHER,
  GATEWAY_REGISTRY,
  PIPELINE_REGISTRY,
  TASK_RUNNER,
  MAILER,
  DELIVERY_SERVICE,
  DISPATCH_ROUTER,
  ORDER_SERVICE,
  PAYMENT_TRIGGER_SERVICE,
  ORDER_STATE_MACHINE,
} from './constants';
import {
  BackgroundTaskRunner,
  DeliveryService,
  DispatchRouter,
  EventDispatcher,
  EventDispatcherImpl,
  GatewayRegistry,
  LoggingEventHandler,
  Mailer,
  OperatorNotifier,
  OrderService,
  OrderStateMachine,
  OrderStore,
  PaymentGatewayAdapter,
  PaymentTriggerService,
  PipelineRegistry,
} from '../../core';
import {
  FlowGatewayAdapter,
  MercadoPagoGatewayAdapter,
  MockGatewayAdapter,
} from '../../adapters/gateways';
import { InMemoryOrderStore } from '../../adapters/storage/memory';
import {
  TypeORMOrderStore,
  createDataSource,
  createTypeORMConfig,
} from '../../adapters/storage/typeorm';
import { RecordingMailer, SmtpMailer } from '../../adapters/email';
import { createStubPipelines } from '../../adapters/pipelines';
import {
  AdminController,
  DiscountController,
  HealthController,
  OrderController,
  PaymentReturnController,
  WebhookController,
} from './controllers';
import { ConfigurationService } from './services/configuration.service';
import { AdminTokenGuard } from './guards/admin-token.guard';

const CONTROLLERS = [
  WebhookController,
  PaymentReturnController,
  OrderController,
  DiscountController,
  AdminController,
  HealthController,
];

const EXPORTS = [
  DISPATCH_CONFIG,
  ORDER_STORE,
  EVENT_DISPATCHER,
  TASK_RUNNER,
  DISPATCH_ROUTER,
  ORDER_SERVICE,
  PAYMENT_TRIGGER_SERVICE,
  ConfigurationService,
];

/**
 * Dispatch Module - Main NestJS Module
 *
 * Wires the order store, gateways, pipelines, runner and mailer into the
 * router and services, and exposes them over HTTP
 */
@Global()
@Module({})
export class DispatchModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DispatchModule.name);

  constructor(
    @Inject(TASK_RUNNER)
    private readonly runner: BackgroundTaskRunner,
    @Inject(ORDER_STORE)
    private readonly store: OrderStore,
  ) {}

  /**
   * Configure the module synchronously
   */
  static forRoot(config: DispatchModuleConfig): DynamicModule {
    return {
      module: DispatchModule,
      providers: [
        {
          provide: DISPATCH_CONFIG,
          useValue: resolveDispatchConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTS,
    };
  }

  /**
   * Configure the module asynchronously
   */
  static forRootAsync(options: DispatchModuleAsyncConfig): DynamicModule {
    return {
      module: DispatchModule,
      imports: options.imports || [],
      providers: [
        {
          provide: DISPATCH_CONFIG,
          useFactory: async (...args: unknown[]) =>
            resolveDispatchConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTS,
    };
  }

  /**
   * Let scheduled pipeline runs finish before the process exits
   */
  async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(`Shutting down${signal ? ` on ${signal}` : ''}, draining pipeline runs`);
    await this.runner.onIdle();
    if (this.store instanceof TypeORMOrderStore) {
      await this.store.close();
    }
  }

  /**
   * Providers built from the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: ORDER_STORE,
        useFactory: async (config: DispatchModuleConfig): Promise<OrderStore> => {
          switch (config.storage.type) {
            case 'memory':
              return new InMemoryOrderStore();

            case 'typeorm': {
              if (!config.storage.options) {
                throw new Error('TypeORM storage requires connection options');
              }
              const dataSource = await createDataSource(
                createTypeORMConfig(config.storage.options),
              );
              return new TypeORMOrderStore(dataSource);
            }

            case 'custom':
              if (!config.storage.store) {
                throw new Error('Custom order store not provided');
              }
              return config.storage.store;
          }
        },
        inject: [DISPATCH_CONFIG],
      },
      {
        provide: GATEWAY_REGISTRY,
        useFactory: (config: DispatchModuleConfig) => {
          const adapters: PaymentGatewayAdapter[] = [];
          const { mercadopago, flow, mock } = config.gateways;

          if (mercadopago) {
            adapters.push(new MercadoPagoGatewayAdapter(mercadopago));
          }
          if (flow) {
            adapters.push(new FlowGatewayAdapter(flow));
          }
          if (mock) {
            adapters.push(new MockGatewayAdapter(mock));
          }

          const registry = new GatewayRegistry(adapters);
          if (!registry.has(config.gateways.defaultGateway)) {
            throw new Error(
              `Default gateway ${config.gateways.defaultGateway} is not configured`,
            );
          }
          return registry;
        },
        inject: [DISPATCH_CONFIG],
      },
      {
        provide: PIPELINE_REGISTRY,
        useFactory: (config: DispatchModuleConfig) =>
          new PipelineRegistry(
            config.pipelines?.custom ??
              createStubPipelines({
                artifactBaseUrl:
                  config.pipelines?.artifactBaseUrl ?? `${config.urls.publicBaseUrl}/files`,
              }),
          ),
        inject: [DISPATCH_CONFIG],
      },
      {
        provide: MAILER,
        useFactory: (config: DispatchModuleConfig): Mailer & OperatorNotifier => {
          const mail = config.mail ?? { transport: 'recording' };
          switch (mail.transport) {
            case 'recording':
              return new RecordingMailer();

            case 'smtp':
              if (!mail.smtp) {
                throw new Error('SMTP transport requires smtp settings');
              }
              return new SmtpMailer(mail.smtp);

            case 'custom':
              if (!mail.mailer) {
                throw new Error('Custom mailer not provided');
              }
              return mail.mailer;
          }
        },
        inject: [DISPATCH_CONFIG],
      },
      {
        provide: EVENT_DISPATCHER,
        useFactory: (config: DispatchModuleConfig): EventDispatcher => {
          const dispatcher = config.events?.dispatcher ?? new EventDispatcherImpl();

          if (config.events?.enableLogging) {
            const loggingHandler = new LoggingEventHandler(undefined, config.events.logLevel);
            dispatcher.onAll(loggingHandler.getHandler());
          }

          for (const { eventType, handler } of config.events?.handlers ?? []) {
            dispatcher.on(eventType, handler);
          }

          return dispatcher;
        },
        inject: [DISPATCH_CONFIG],
      },
      {
        provide: TASK_RUNNER,
        useFactory: (config: DispatchModuleConfig) =>
          new BackgroundTaskRunner({ concurrency: config.runner?.concurrency ?? 4 }),
        inject: [DISPATCH_CONFIG],
      },
      {
        provide: ORDER_STATE_MACHINE,
        useFactory: () => new OrderStateMachine(),
      },
      {
        provide: DELIVERY_SERVICE,
        useFactory: (
          config: DispatchModuleConfig,
          store: OrderStore,
          mailer: Mailer,
        ) => new DeliveryService(store, mailer, { dashboardUrl: config.urls.dashboardUrl }),
        inject: [DISPATCH_CONFIG, ORDER_STORE, MAILER],
      },
      {
        provide: DISPATCH_ROUTER,
        useFactory: (
          config: DispatchModuleConfig,
          store: OrderStore,
          pipelines: PipelineRegistry,
          runner: BackgroundTaskRunner,
          delivery: DeliveryService,
          events: EventDispatcher,
          notifier: OperatorNotifier,
          stateMachine: OrderStateMachine,
        ) =>
          new DispatchRouter(
            store,
            pipelines,
            runner,
            delivery,
            events,
            { maxAttempts: config.dispatch?.maxAttempts ?? 3 },
            notifier,
            stateMachine,
          ),
        inject: [
          DISPATCH_CONFIG,
          ORDER_STORE,
          PIPELINE_REGISTRY,
          TASK_RUNNER,
          DELIVERY_SERVICE,
          EVENT_DISPATCHER,
          MAILER,
          ORDER_STATE_MACHINE,
        ],
      },
      {
        provide: ORDER_SERVICE,
        useFactory: (
          config: DispatchModuleConfig,
          store: OrderStore,
          gateways: GatewayRegistry,
          stateMachine: OrderStateMachine,
        ) =>
          new OrderService(
            store,
            gateways,
            {
              pricing: config.pricing,
              currency: config.currency,
              defaultGateway: config.gateways.defaultGateway,
              publicBaseUrl: config.urls.publicBaseUrl,
            },
            stateMachine,
          ),
        inject: [DISPATCH_CONFIG, ORDER_STORE, GATEWAY_REGISTRY, ORDER_STATE_MACHINE],
      },
      {
        provide: PAYMENT_TRIGGER_SERVICE,
        useFactory: (store: OrderStore, router: DispatchRouter, gateways: GatewayRegistry) =>
          new PaymentTriggerService(store, router, gateways),
        inject: [ORDER_STORE, DISPATCH_ROUTER, GATEWAY_REGISTRY],
      },
      ConfigurationService,
      AdminTokenGuard,
    ];
  }
}
