import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOkResponse, ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import { WebhookResponseDto } from '../../dto';

const GATEWAY_PARAM = ApiParam({
  name: 'gateway',
  description: 'Payment gateway name',
  required: true,
  schema: {
    type: 'string',
    enum: ['mercadopago', 'flow', 'mock'],
  },
});

/**
 * Swagger decorator for webhook endpoints
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive payment notification',
      description:
        'Receives asynchronous notifications from payment gateways. Invalid or unverifiable notifications are absorbed; the response is always 200 so the gateway does not retry.',
    }),
    GATEWAY_PARAM,
    ApiHeader({
      name: 'x-signature',
      description: 'MercadoPago signature (`ts=...,v1=...`)',
      required: false,
    }),
    ApiHeader({
      name: 'x-request-id',
      description: 'MercadoPago request id, part of the signed manifest',
      required: false,
    }),
    ApiHeader({
      name: 'x-mock-signature',
      description: 'HMAC-SHA256 of the raw body for the mock gateway',
      required: false,
    }),
    ApiBody({
      description: 'Gateway-specific payload (JSON or form-encoded)',
      required: false,
      schema: {
        type: 'object',
        additionalProperties: true,
        example: { type: 'payment', data: { id: '1234567890' } },
      },
    }),
    ApiOkResponse({
      description: 'Notification received',
      type: WebhookResponseDto,
    }),
  );
};

/**
 * Swagger decorator for the post-payment return redirect
 */
export const ApiPaymentReturn = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Customer return from hosted checkout',
      description:
        'Confirms the payment with the gateway, routes the result, then redirects to the dashboard.',
    }),
    GATEWAY_PARAM,
    ApiResponse({
      status: 302,
      description: 'Redirect to the dashboard, with `?order=<id>` when the order is known',
    }),
  );
};
