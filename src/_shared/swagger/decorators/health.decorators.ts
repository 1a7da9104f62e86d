import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Returns service health status and uptime',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is healthy',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'healthy' },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Uptime in seconds' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check with dependency status',
      description:
        'Checks if service and all dependencies are ready to handle requests',
    }),
    ApiResponse({
      status: 200,
      description: 'Service readiness status',
      schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['ready', 'not_ready'],
            example: 'ready',
          },
          checks: {
            type: 'object',
            properties: {
              database: { type: 'boolean', example: true },
              gateways: { type: 'boolean', example: true },
            },
          },
          details: {
            type: 'object',
            properties: {
              database: { type: 'string', example: 'connected' },
              gateways: { type: 'array', items: { type: 'string' }, example: ['mercadopago', 'flow'] },
              runner: {
                type: 'object',
                properties: {
                  submitted: { type: 'number' },
                  succeeded: { type: 'number' },
                  failed: { type: 'number' },
                  running: { type: 'number' },
                  queued: { type: 'number' },
                  concurrency: { type: 'number' },
                },
              },
            },
          },
        },
      },
    }),
  );
};
