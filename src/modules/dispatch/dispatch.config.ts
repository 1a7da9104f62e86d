import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import {
  EventDispatcher,
  EventHandler,
  EventLogLevel,
  Mailer,
  OperatorNotifier,
  OrderEventType,
  OrderStore,
  PipelineMap,
  ServiceType,
} from '../../core';
import {
  FlowGatewayConfig,
  MercadoPagoGatewayConfig,
  MockGatewayConfig,
} from '../../adapters/gateways';
import { PostgresConnectionSettings } from '../../adapters/storage/typeorm';
import { SmtpMailerConfig } from '../../adapters/email';

/**
 * Dispatch Module Configuration
 */
export interface DispatchModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'memory' | 'typeorm' | 'custom';
    options?: PostgresConnectionSettings;
    store?: OrderStore;
  };

  /**
   * Gateway configurations. A gateway is registered only when configured.
   */
  gateways: {
    /**
     * Used when a submission names no gateway
     */
    defaultGateway: string;
    mercadopago?: MercadoPagoGatewayConfig;
    flow?: FlowGatewayConfig;
    mock?: MockGatewayConfig;
  };

  /**
   * Pipelines per service type. Stub pipelines are used when omitted.
   */
  pipelines?: {
    custom?: PipelineMap;
    artifactBaseUrl?: string;
  };

  /**
   * Outbound email
   */
  mail?: {
    transport: 'smtp' | 'recording' | 'custom';
    smtp?: SmtpMailerConfig;
    mailer?: Mailer & OperatorNotifier;
  };

  /**
   * Price per service type in minor units of `currency`
   */
  pricing: Record<ServiceType, number>;
  currency: string;

  urls: {
    /**
     * Customer dashboard; return redirects and delivery emails link here
     */
    dashboardUrl: string;
    /**
     * Externally reachable base of this service, for gateway callbacks
     */
    publicBaseUrl: string;
  };

  admin: {
    token: string;
  };

  dispatch?: {
    /**
     * Pipeline runs allowed before a non-forced retry is refused
     */
    maxAttempts?: number;
  };

  runner?: {
    concurrency?: number;
  };

  /**
   * Event configuration
   */
  events?: {
    dispatcher?: EventDispatcher;
    enableLogging?: boolean;
    logLevel?: EventLogLevel;
    handlers?: Array<{
      eventType: OrderEventType;
      handler: EventHandler;
    }>;
  };
}

/**
 * Async configuration factory
 */
export interface DispatchModuleAsyncConfig extends Pick<ModuleMetadata, 'imports'> {
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<
    Promise<DispatchModuleConfig> | DispatchModuleConfig
  >['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultDispatchConfig = {
  dispatch: {
    maxAttempts: 3,
  },
  runner: {
    concurrency: 4,
  },
  events: {
    enableLogging: true,
    logLevel: 'normal',
  },
  pipelines: {
    artifactBaseUrl: 'http://localhost:4010/files',
  },
  mail: {
    transport: 'recording',
  },
} satisfies Partial<DispatchModuleConfig>;

/**
 * Fill unset sections from the defaults
 */
export function resolveDispatchConfig(config: DispatchModuleConfig): DispatchModuleConfig {
  return {
    ...config,
    dispatch: { ...defaultDispatchConfig.dispatch, ...config.dispatch },
    runner: { ...defaultDispatchConfig.runner, ...config.runner },
    events: { ...defaultDispatchConfig.events, ...config.events },
    pipelines: { ...defaultDispatchConfig.pipelines, ...config.pipelines },
    mail: config.mail ?? defaultDispatchConfig.mail,
  };
}
