import { All, Controller, Param, Req, Res, Inject, Logger, HttpStatus } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { PaymentTriggerService } from '../../../core';
import { ApiPaymentReturn } from '../../../_shared';
import { PAYMENT_TRIGGER_SERVICE } from '../constants';
import { ConfigurationService } from '../services/configuration.service';
import { toInboundNotification } from '../inbound-notification';

/**
 * Payment Return Controller
 *
 * Where the hosted checkout sends the customer back. The redirect to the
 * dashboard happens whatever the confirmation outcome.
 */
@ApiTags('Ingest')
@Controller('payments/return')
export class PaymentReturnController {
  private readonly logger = new Logger(PaymentReturnController.name);

  constructor(
    @Inject(PAYMENT_TRIGGER_SERVICE)
    private readonly triggers: PaymentTriggerService,
    private readonly configuration: ConfigurationService,
  ) {}

  // Flow posts the token back, MercadoPago appends it to a GET
  @All(':gateway')
  @ApiPaymentReturn()
  async handleReturn(
    @Param('gateway') gateway: string,
    @Req() request: Request,
    @Res() response: Response,
  ): Promise<void> {
    let orderId: string | null = null;

    try {
      const result = await this.triggers.handleReturn(
        gateway.toLowerCase(),
        toInboundNotification(request),
      );
      orderId = result.orderId;
      this.logger.log(`Return from ${gateway} for order ${orderId ?? 'unknown'}: ${result.outcome}`);
    } catch (error) {
      this.logger.error(
        `Return handling failed for ${gateway}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    response.redirect(HttpStatus.FOUND, this.configuration.getDashboardRedirect(orderId));
  }
}
