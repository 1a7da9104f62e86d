import { ServiceType } from '../core';
import { DispatchModuleConfig } from '../modules/dispatch/dispatch.config';

/**
 * Reads one environment variable (ConfigService.get, or a plain record in tests)
 */
export type EnvReader = (key: string) => string | undefined;

const DEFAULT_PRICE = 3000;

function intOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

function required(env: EnvReader, key: string): string {
  const value = env(key);
  if (!value) {
    throw new Error(`Missing required environment variable ${key}`);
  }
  return value;
}

function defaultGatewayFor(
  mercadopagoToken: string | undefined,
  flowApiKey: string | undefined,
  mockSecret: string | undefined,
): string {
  if (mercadopagoToken) {
    return 'mercadopago';
  }
  if (flowApiKey) {
    return 'flow';
  }
  return mockSecret ? 'mock' : 'mercadopago';
}

/**
 * Map environment variables onto the module configuration.
 *
 * A gateway is enabled by its credentials: MERCADOPAGO_ACCESS_TOKEN,
 * FLOW_API_KEY + FLOW_SECRET_KEY, MOCK_GATEWAY_SECRET. The mock gateway accepts
 * anyone holding its secret, so it is never enabled without one. Storage is PostgreSQL
 * when DATABASE_HOST is set, in-memory otherwise.
 */
export function dispatchConfigFromEnv(env: EnvReader): DispatchModuleConfig {
  const publicBaseUrl = (env('PUBLIC_BASE_URL') ?? 'http://localhost:4010').replace(/\/+$/, '');
  const sandbox = env('PAYMENTS_SANDBOX') !== 'false';

  const mercadopagoToken = env('MERCADOPAGO_ACCESS_TOKEN');
  const flowApiKey = env('FLOW_API_KEY');
  const flowSecretKey = env('FLOW_SECRET_KEY');
  const mockSecret = env('MOCK_GATEWAY_SECRET');

  const gateways: DispatchModuleConfig['gateways'] = {
    defaultGateway: env('DEFAULT_GATEWAY') ?? defaultGatewayFor(mercadopagoToken, flowApiKey, mockSecret),
    mercadopago: mercadopagoToken
      ? {
          accessToken: mercadopagoToken,
          webhookSecret: env('MERCADOPAGO_WEBHOOK_SECRET'),
          sandbox,
        }
      : undefined,
    flow:
      flowApiKey && flowSecretKey
        ? { apiKey: flowApiKey, secretKey: flowSecretKey, sandbox }
        : undefined,
    mock: mockSecret ? { secret: mockSecret } : undefined,
  };

  const databaseHost = env('DATABASE_HOST');
  const storage: DispatchModuleConfig['storage'] = databaseHost
    ? {
        type: 'typeorm',
        options: {
          host: databaseHost,
          port: intOr(env('DATABASE_PORT'), 5432),
          username: required(env, 'DATABASE_USER'),
          password: env('DATABASE_PASSWORD') ?? '',
          database: env('DATABASE_NAME') ?? 'orders',
          synchronize: env('DATABASE_SYNCHRONIZE') === 'true',
          logging: env('DATABASE_LOGGING') === 'true',
        },
      }
    : { type: 'memory' };

  const smtpHost = env('SMTP_HOST');
  const mail: DispatchModuleConfig['mail'] = smtpHost
    ? {
        transport: 'smtp',
        smtp: {
          host: smtpHost,
          port: intOr(env('SMTP_PORT'), 587),
          user: env('SMTP_USER'),
          password: env('SMTP_PASSWORD'),
          from: required(env, 'SMTP_FROM'),
          operatorEmail: env('OPERATOR_EMAIL'),
        },
      }
    : { transport: 'recording' };

  return {
    storage,
    gateways,
    mail,
    pricing: {
      [ServiceType.TRANSCRIPTION]: intOr(env('PRICE_TRANSCRIPTION'), DEFAULT_PRICE),
      [ServiceType.EXAM]: intOr(env('PRICE_EXAM'), DEFAULT_PRICE),
      [ServiceType.MEETING]: intOr(env('PRICE_MEETING'), DEFAULT_PRICE),
    },
    currency: env('PRICE_CURRENCY') ?? 'CLP',
    urls: {
      dashboardUrl: env('DASHBOARD_URL') ?? `${publicBaseUrl}/dashboard`,
      publicBaseUrl,
    },
    admin: {
      token: required(env, 'ADMIN_TOKEN'),
    },
    pipelines: {
      artifactBaseUrl: env('ARTIFACT_BASE_URL') ?? `${publicBaseUrl}/files`,
    },
    dispatch: {
      maxAttempts: intOr(env('MAX_PIPELINE_ATTEMPTS'), 3),
    },
    runner: {
      concurrency: intOr(env('RUNNER_CONCURRENCY'), 4),
    },
    events: {
      enableLogging: env('EVENT_LOGGING') !== 'false',
    },
  };
}
