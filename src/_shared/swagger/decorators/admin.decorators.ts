import { applyDecorators } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Common documentation for operator endpoints
 */
export const ApiAdminEndpoint = (summary: string, description?: string) => {
  return applyDecorators(
    ApiOperation({ summary, description }),
    ApiHeader({
      name: 'x-admin-token',
      description: 'Operator token',
      required: true,
    }),
    ApiResponse({ status: 401, description: 'Missing or invalid admin token' }),
  );
};
