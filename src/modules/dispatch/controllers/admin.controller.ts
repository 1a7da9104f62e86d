import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Param,
  Query,
  Body,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  NotFoundException,
  ParseUUIDPipe,
  UseGuards,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  AuditLog,
  DeliveryOutcome,
  DeliveryService,
  DiscountCode,
  DispatchOutcome,
  DispatchRouter,
  Order,
  OrderFilter,
  OrderService,
  PaginatedResult,
  TriggerType,
} from '../../../core';
import { ApiAdminEndpoint } from '../../../_shared/swagger/decorators';
import {
  CreateDiscountCodeRequestDto,
  ListOrdersDto,
  OverrideStatusDto,
  ResendEmailDto,
  RetryOrderDto,
} from '../../../_shared/dto';
import { DELIVERY_SERVICE, DISPATCH_ROUTER, ORDER_SERVICE } from '../constants';
import { AdminTokenGuard } from '../guards/admin-token.guard';
import { toHttpException } from '../http-errors';

const DEFAULT_ACTOR = 'admin';

/**
 * Admin Controller
 * Operator actions: retries, status overrides, email re-sends, audit and discount codes
 */
@ApiTags('Admin')
@UseGuards(AdminTokenGuard)
@Controller('admin')
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(
    @Inject(ORDER_SERVICE)
    private readonly orderService: OrderService,
    @Inject(DISPATCH_ROUTER)
    private readonly router: DispatchRouter,
    @Inject(DELIVERY_SERVICE)
    private readonly delivery: DeliveryService,
  ) {}

  @Post('orders/:id/retry')
  @HttpCode(HttpStatus.OK)
  @ApiAdminEndpoint('Retry the pipeline of an order in error')
  async retry(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RetryOrderDto,
  ): Promise<{ orderId: string; outcome: DispatchOutcome }> {
    const actor = dto.actor ?? DEFAULT_ACTOR;
    const outcome = await this.router.retry(id, TriggerType.ADMIN, { force: dto.force, actor });
    if (outcome === DispatchOutcome.UNKNOWN_ORDER) {
      throw new NotFoundException(`Order not found: ${id}`);
    }

    this.logger.log(`Retry of ${id} requested by ${actor}: ${outcome}`);
    return { orderId: id, outcome };
  }

  @Put('orders/:id/status')
  @ApiAdminEndpoint(
    'Force an order status',
    'Writes the status without compare-and-set. Transitions outside the normal rules are allowed and flagged in the audit log.',
  )
  async overrideStatus(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: OverrideStatusDto,
  ): Promise<Order> {
    const actor = dto.actor ?? DEFAULT_ACTOR;
    try {
      const order = await this.orderService.overrideStatus(id, dto.status, actor, dto.reason);
      this.logger.warn(`Status of ${id} forced to ${dto.status} by ${actor}: ${dto.reason}`);
      return order;
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('orders/:id/resend-email')
  @HttpCode(HttpStatus.OK)
  @ApiAdminEndpoint('Send the delivery email again')
  async resendEmail(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ResendEmailDto,
  ): Promise<{ orderId: string; outcome: DeliveryOutcome }> {
    try {
      const outcome = await this.delivery.resend(id, dto.actor ?? DEFAULT_ACTOR);
      return { orderId: id, outcome };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get('orders/:id/audit')
  @ApiAdminEndpoint('Audit trail of an order, oldest first')
  async auditTrail(@Param('id', ParseUUIDPipe) id: string): Promise<AuditLog[]> {
    try {
      return await this.orderService.getAuditTrail(id);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get('orders')
  @ApiAdminEndpoint('List orders with filters')
  async listOrders(@Query() query: ListOrdersDto): Promise<PaginatedResult<Order>> {
    const filter: OrderFilter = {
      status: query.status,
      serviceType: query.serviceType,
      gateway: query.gateway,
      email: query.email?.trim().toLowerCase(),
      fromDate: query.fromDate ? new Date(query.fromDate) : undefined,
      toDate: query.toDate ? new Date(query.toDate) : undefined,
    };
    return this.orderService.list(filter, { page: query.page ?? 1, limit: query.limit ?? 50 });
  }

  @Post('discounts')
  @HttpCode(HttpStatus.CREATED)
  @ApiAdminEndpoint('Create a discount code')
  async createDiscount(@Body() dto: CreateDiscountCodeRequestDto): Promise<DiscountCode> {
    try {
      return await this.orderService.createDiscountCode({
        code: dto.code,
        percent: dto.percent,
        maxUses: dto.maxUses ?? null,
        expiresAt: dto.expiresAt ? new Date(dto.expiresAt) : null,
      });
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get('discounts')
  @ApiAdminEndpoint('List discount codes')
  async listDiscounts(): Promise<DiscountCode[]> {
    return this.orderService.listDiscountCodes();
  }

  @Delete('discounts/:code')
  @ApiAdminEndpoint('Deactivate a discount code')
  async deactivateDiscount(@Param('code') code: string): Promise<{ code: string; active: false }> {
    const found = await this.orderService.deactivateDiscountCode(code);
    if (!found) {
      throw new NotFoundException(`Discount code not found: ${code}`);
    }
    return { code: DiscountCode.normalize(code), active: false };
  }
}
