import { Logger } from '@nestjs/common';
import { AuditAction, OrderStatus, TriggerType } from '../domain/enums';
import { Mailer, OrderStore } from '../interfaces';
import { renderDeliveryEmail } from './delivery-email';

export type DeliveryOutcome =
  | 'sent'
  | 'not_found'
  | 'not_completed'
  | 'already_sent'
  | 'send_failed';

export interface DeliveryServiceOptions {
  dashboardUrl: string;
}

/**
 * Delivery service - results email, at most once per order.
 *
 * The `emailSent` marker is read immediately before sending and written
 * immediately after. Only the completion step of a single pipeline run
 * calls `deliver`, so no second writer races on the marker.
 */
export class DeliveryService {
  private readonly logger = new Logger(DeliveryService.name);

  constructor(
    private readonly store: OrderStore,
    private readonly mailer: Mailer,
    private readonly options: DeliveryServiceOptions,
  ) {}

  async deliver(orderId: string): Promise<DeliveryOutcome> {
    const order = await this.store.find(orderId);
    if (!order) {
      return 'not_found';
    }
    if (order.status !== OrderStatus.COMPLETED) {
      this.logger.debug(`Order ${orderId} is ${order.status}, nothing to deliver`);
      return 'not_completed';
    }
    if (order.emailSent) {
      this.logger.debug(`Results for order ${orderId} already delivered`);
      return 'already_sent';
    }

    try {
      await this.mailer.send(renderDeliveryEmail(order, this.options.dashboardUrl));
    } catch (error) {
      // Status stays completed; an operator can resend
      this.logger.error(
        `Failed to deliver results for order ${orderId}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return 'send_failed';
    }

    await this.store.markEmailSent(orderId);
    await this.store.appendAudit({
      orderId,
      action: AuditAction.EMAIL_SENT,
      fromStatus: OrderStatus.COMPLETED,
      toStatus: OrderStatus.COMPLETED,
      trigger: TriggerType.PIPELINE,
      metadata: { to: order.customer.email, artifactCount: order.artifacts.length },
    });

    this.logger.log(`Delivered results for order ${orderId}`);
    return 'sent';
  }

  /**
   * Operator re-send. Ignores the marker and leaves it as it is.
   */
  async resend(orderId: string, actor: string): Promise<DeliveryOutcome> {
    const order = await this.store.get(orderId);
    if (order.status !== OrderStatus.COMPLETED) {
      return 'not_completed';
    }

    try {
      await this.mailer.send(renderDeliveryEmail(order, this.options.dashboardUrl));
    } catch (error) {
      this.logger.error(
        `Resend for order ${orderId} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return 'send_failed';
    }

    await this.store.appendAudit({
      orderId,
      action: AuditAction.EMAIL_RESENT,
      fromStatus: OrderStatus.COMPLETED,
      toStatus: OrderStatus.COMPLETED,
      trigger: TriggerType.ADMIN,
      actor,
      metadata: { to: order.customer.email },
    });

    return 'sent';
  }
}
