import { Controller, Get, Param, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { DiscountValidation, OrderService } from '../../../core';
import { ApiValidateDiscount } from '../../../_shared/swagger/decorators';
import { ORDER_SERVICE } from '../constants';

@ApiTags('Orders')
@Controller('discounts')
export class DiscountController {
  constructor(
    @Inject(ORDER_SERVICE)
    private readonly orderService: OrderService,
  ) {}

  @Get(':code')
  @ApiValidateDiscount()
  async validate(@Param('code') code: string): Promise<DiscountValidation> {
    return this.orderService.validateDiscountCode(code);
  }
}
