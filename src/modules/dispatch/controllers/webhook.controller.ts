import {
  Controller,
  Post,
  Param,
  Req,
  HttpCode,
  HttpStatus,
  UseInterceptors,
  Inject,
  Logger,
  RawBodyRequest,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Request } from 'express';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import { DispatchOutcome, PaymentTriggerService, UnknownGatewayError } from '../../../core';
import { ApiWebhookEndpoint, WebhookResponseDto } from '../../../_shared';
import { PAYMENT_TRIGGER_SERVICE } from '../constants';
import { toInboundNotification } from '../inbound-notification';

/**
 * Webhook Controller
 *
 * Receives gateway notifications. Every failure is logged and answered
 * with 200; the poll and return paths recover the payment if this
 * notification is lost.
 */
@ApiTags('Ingest')
@Controller('webhooks')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(PAYMENT_TRIGGER_SERVICE)
    private readonly triggers: PaymentTriggerService,
  ) {}

  @Post(':gateway')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(RawBodyInterceptor)
  @ApiWebhookEndpoint()
  async handleWebhook(
    @Param('gateway') gateway: string,
    @Req() request: RawBodyRequest<Request>,
  ): Promise<WebhookResponseDto> {
    const name = gateway.toLowerCase();
    this.logger.log(`Received webhook from gateway: ${name}`);

    try {
      const result = await this.triggers.handleWebhook(name, toInboundNotification(request));
      this.logger.log(`Webhook for order ${result.orderId ?? 'unknown'}: ${result.outcome}`);
      return { received: true, outcome: result.outcome };
    } catch (error) {
      if (error instanceof UnknownGatewayError) {
        this.logger.warn(error.message);
        return { received: true, outcome: DispatchOutcome.IGNORED };
      }

      this.logger.error(
        `Webhook processing error for ${name}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return { received: true, outcome: DispatchOutcome.IGNORED };
    }
  }
}
