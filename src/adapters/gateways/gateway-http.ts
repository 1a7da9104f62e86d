import {
  GatewayUnavailableError,
  HttpClient,
  HttpResponse,
  PaymentEvent,
  PaymentOutcome,
} from '../../core';

export const defaultHttpClient: HttpClient = (url, init) => fetch(url, init);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a string-ish field; numbers are stringified, empty values are null
 */
export function readString(
  record: Record<string, unknown>,
  key: string,
): string | null {
  const value = record[key];
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Event for anything that could not be turned into a decision
 */
export function pendingEvent(
  gateway: string,
  error: string,
  orderId: string | null = null,
): PaymentEvent {
  return {
    orderId,
    outcome: PaymentOutcome.PENDING,
    rawProviderStatus: 'unknown',
    gateway,
    error,
  };
}

/**
 * Perform a gateway API call and return the decoded JSON body
 * @throws GatewayUnavailableError on network failure, timeout, non-2xx or non-JSON reply
 */
export async function callGateway(
  httpClient: HttpClient,
  gateway: string,
  url: string,
  init: { method: string; headers?: Record<string, string>; body?: string },
  timeoutMs: number,
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    let response: HttpResponse;
    try {
      response = await httpClient(url, { ...init, signal: controller.signal });
    } catch (error) {
      throw new GatewayUnavailableError(
        `${gateway} request failed: ${describeError(error)}`,
        gateway,
      );
    }

    if (!response.ok) {
      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        body = `<unreadable body: ${describeError(error)}>`;
      }
      throw new GatewayUnavailableError(
        `${gateway} responded with HTTP ${response.status}`,
        gateway,
        { status: response.status, body: body.slice(0, 500) },
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new GatewayUnavailableError(
        `${gateway} returned a non-JSON body: ${describeError(error)}`,
        gateway,
      );
    }
  } finally {
    clearTimeout(timeoutId);
  }
}
