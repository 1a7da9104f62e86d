import {
  Controller,
  Get,
  Post,
  Param,
  Query,
  Body,
  HttpCode,
  HttpStatus,
  BadRequestException,
  Inject,
  Logger,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  OrderService,
  OrderStatusView,
  PaymentTriggerService,
  parsePipelineInput,
} from '../../../core';
import {
  ApiListCustomerOrders,
  ApiOrderStatus,
  ApiReopenCheckout,
  ApiSubmitOrder,
} from '../../../_shared/swagger/decorators';
import {
  ListOrdersByEmailDto,
  OrderStatusQueryDto,
  SubmitOrderDto,
  SubmitOrderResponseDto,
} from '../../../_shared/dto';
import { ORDER_SERVICE, PAYMENT_TRIGGER_SERVICE } from '../constants';
import { toHttpException } from '../http-errors';

/**
 * Order Controller
 * Customer-facing submission, checkout and dashboard endpoints
 */
@ApiTags('Orders')
@Controller('orders')
export class OrderController {
  private readonly logger = new Logger(OrderController.name);

  constructor(
    @Inject(ORDER_SERVICE)
    private readonly orderService: OrderService,
    @Inject(PAYMENT_TRIGGER_SERVICE)
    private readonly triggers: PaymentTriggerService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiSubmitOrder()
  async submit(@Body() dto: SubmitOrderDto): Promise<SubmitOrderResponseDto> {
    const pipelineInput = parsePipelineInput({ ...dto.parameters, serviceType: dto.serviceType });
    if (!pipelineInput) {
      throw new BadRequestException(`Invalid parameters for service type ${dto.serviceType}`);
    }

    try {
      const { order, checkoutUrl } = await this.orderService.submitJob({
        pipelineInput,
        customer: { name: dto.customerName, email: dto.customerEmail },
        gateway: dto.gateway?.toLowerCase(),
        discountCode: dto.discountCode,
      });
      this.logger.log(`Order submitted: ${order.id} (${order.serviceType}, ${order.money})`);
      return { orderId: order.id, checkoutUrl };
    } catch (error) {
      this.logger.warn(`Order submission failed: ${error instanceof Error ? error.message : String(error)}`);
      throw toHttpException(error);
    }
  }

  @Post(':id/checkout')
  @HttpCode(HttpStatus.CREATED)
  @ApiReopenCheckout()
  async reopenCheckout(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<SubmitOrderResponseDto> {
    try {
      const session = await this.orderService.openCheckout(id);
      return { orderId: id, checkoutUrl: session.checkoutUrl };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get(':id/status')
  @ApiOrderStatus()
  async status(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: OrderStatusQueryDto,
  ): Promise<OrderStatusView> {
    try {
      const result = await this.triggers.handlePoll(id, query.token);
      this.logger.debug(`Poll for order ${id}: ${result.outcome}`);
      return await this.orderService.getStatusView(id);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get()
  @ApiListCustomerOrders()
  async listByEmail(@Query() query: ListOrdersByEmailDto): Promise<OrderStatusView[]> {
    return this.orderService.listByEmail(query.email);
  }
}
