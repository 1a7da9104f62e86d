import { RawBodyRequest } from '@nestjs/common';
import type { Request } from 'express';
import { InboundNotification } from '../../core';

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    const [first] = value;
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

/**
 * Express request -> the flat shape gateway adapters read
 */
export function toInboundNotification(request: RawBodyRequest<Request>): InboundNotification {
  const query: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(request.query)) {
    query[key] = firstString(value);
  }

  const headers: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(request.headers)) {
    headers[key.toLowerCase()] = firstString(value);
  }

  const body: unknown = request.body;
  return {
    query,
    headers,
    body: isRecord(body) ? body : {},
    rawBody: request.rawBody,
  };
}
