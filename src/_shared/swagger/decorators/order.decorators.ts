import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import { SubmitOrderResponseDto } from '../../dto';

const ORDER_VIEW_SCHEMA = {
  type: 'object',
  properties: {
    orderId: { type: 'string', format: 'uuid' },
    status: {
      type: 'string',
      enum: ['pending', 'paid', 'processing', 'completed', 'processing_failed', 'failed', 'cancelled'],
    },
    serviceType: { type: 'string', enum: ['transcription', 'exam', 'meeting'] },
    amount: { type: 'number', example: 4990 },
    currency: { type: 'string', example: 'CLP' },
    artifacts: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          url: { type: 'string' },
          contentType: { type: 'string' },
        },
      },
    },
    emailSent: { type: 'boolean' },
    createdAt: { type: 'string', format: 'date-time' },
    updatedAt: { type: 'string', format: 'date-time' },
  },
};

const ORDER_ID_PARAM = ApiParam({ name: 'id', description: 'Order id', format: 'uuid' });

/**
 * Swagger decorator for job submission
 */
export const ApiSubmitOrder = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Submit a job',
      description: 'Creates a pending order priced for its service type and opens a checkout.',
    }),
    ApiResponse({ status: 201, description: 'Order created', type: SubmitOrderResponseDto }),
    ApiResponse({ status: 400, description: 'Invalid parameters, gateway or discount code' }),
    ApiResponse({ status: 503, description: 'Payment gateway unavailable, order stays pending' }),
  );
};

export const ApiReopenCheckout = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Reopen checkout for a pending order' }),
    ORDER_ID_PARAM,
    ApiResponse({ status: 201, description: 'Checkout opened', type: SubmitOrderResponseDto }),
    ApiResponse({ status: 404, description: 'Order not found' }),
    ApiResponse({ status: 409, description: 'Order is no longer pending' }),
    ApiResponse({ status: 503, description: 'Payment gateway unavailable' }),
  );
};

/**
 * Swagger decorator for the dashboard poll
 */
export const ApiOrderStatus = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Poll order status',
      description:
        'Returns the order as the customer sees it. A pending order is confirmed against its gateway; an order in error is retried.',
    }),
    ORDER_ID_PARAM,
    ApiResponse({ status: 200, description: 'Order status', schema: ORDER_VIEW_SCHEMA }),
    ApiResponse({ status: 404, description: 'Order not found' }),
  );
};

export const ApiListCustomerOrders = () => {
  return applyDecorators(
    ApiOperation({ summary: 'List orders of a customer, newest first' }),
    ApiResponse({
      status: 200,
      description: 'Orders',
      schema: { type: 'array', items: ORDER_VIEW_SCHEMA },
    }),
  );
};

export const ApiValidateDiscount = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Check whether a discount code can be used' }),
    ApiParam({ name: 'code', example: 'WELCOME10' }),
    ApiResponse({
      status: 200,
      description: 'Validation result',
      schema: {
        type: 'object',
        properties: {
          code: { type: 'string' },
          valid: { type: 'boolean' },
          percent: { type: 'number' },
          reason: {
            type: 'string',
            enum: ['empty', 'not_found', 'inactive', 'exhausted', 'expired'],
          },
        },
      },
    }),
  );
};
