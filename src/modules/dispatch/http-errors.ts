import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  CheckoutNotAllowedError,
  DuplicateDiscountCodeError,
  GatewayUnavailableError,
  InvalidDiscountCodeError,
  OrderNotFoundError,
  UnknownGatewayError,
} from '../../core';

/**
 * Map a domain error to its HTTP exception; anything else is returned as is
 */
export function toHttpException(error: unknown): unknown {
  if (error instanceof OrderNotFoundError) {
    return new NotFoundException(error.message);
  }
  if (error instanceof InvalidDiscountCodeError) {
    return new BadRequestException({ message: error.message, code: error.code, reason: error.reason });
  }
  if (error instanceof UnknownGatewayError || error instanceof RangeError) {
    return new BadRequestException(error.message);
  }
  if (error instanceof CheckoutNotAllowedError || error instanceof DuplicateDiscountCodeError) {
    return new ConflictException(error.message);
  }
  if (error instanceof GatewayUnavailableError) {
    return new ServiceUnavailableException(`Payment gateway ${error.gateway} is unavailable, please retry`);
  }
  return error;
}
