import { Logger } from '@nestjs/common';
import {
  AuditAction,
  DispatchOutcome,
  OrderEventType,
  OrderStatus,
  PaymentOutcome,
  TriggerType,
} from '../domain/enums';
import { Order } from '../domain/models';
import {
  CreateAuditLogDto,
  EventDispatcher,
  OperatorNotifier,
  OrderStore,
  PaymentEvent,
  PipelineResult,
  TaskRunner,
} from '../interfaces';
import { PipelineRegistry } from '../pipelines';
import { executePipeline } from '../runner';
import { OrderStateMachine } from '../state-machine';
import { DeliveryService } from './delivery.service';

export interface DispatchRouterOptions {
  /**
   * Pipeline runs allowed before a non-forced retry is refused
   */
  maxAttempts: number;
}

export interface RetryOptions {
  /**
   * Bypass the attempt limit (operators only)
   */
  force?: boolean;
  actor?: string;
}

/**
 * Dispatch router - turns canonical payment events into state transitions.
 *
 * Every entry point (webhooks, return redirect, dashboard poll, admin) goes
 * through here. The only coordination is the store's compare-and-set on the
 * status column: the call that wins `pending -> paid` (or `error -> processing`)
 * is the only one that submits a pipeline run.
 */
export class DispatchRouter {
  private readonly logger = new Logger(DispatchRouter.name);

  constructor(
    private readonly store: OrderStore,
    private readonly registry: PipelineRegistry,
    private readonly runner: TaskRunner,
    private readonly delivery: DeliveryService,
    private readonly events: EventDispatcher,
    private readonly options: DispatchRouterOptions,
    private readonly notifier: OperatorNotifier | null = null,
    private readonly stateMachine: OrderStateMachine = new OrderStateMachine(),
  ) {}

  /**
   * Route one payment event for one order
   */
  async handle(
    orderId: string | null,
    event: PaymentEvent,
    trigger: TriggerType,
  ): Promise<DispatchOutcome> {
    if (!orderId) {
      this.logger.warn(
        `Discarding ${event.gateway} ${trigger} event without order reference (${event.error ?? event.rawProviderStatus})`,
      );
      return DispatchOutcome.UNKNOWN_ORDER;
    }

    const order = await this.store.find(orderId);
    if (!order) {
      this.logger.warn(`Discarding ${event.gateway} ${trigger} event for unknown order ${orderId}`);
      return DispatchOutcome.UNKNOWN_ORDER;
    }

    if (order.gateway && order.gateway !== event.gateway) {
      this.logger.warn(
        `Discarding ${event.gateway} ${trigger} event for order ${orderId} checked out with ${order.gateway}`,
      );
      return DispatchOutcome.IGNORED;
    }

    switch (event.outcome) {
      case PaymentOutcome.APPROVED:
        return this.accept(order, event, trigger);

      case PaymentOutcome.REJECTED:
        return this.close(order, OrderStatus.FAILED, event, trigger);

      case PaymentOutcome.CANCELLED:
        return this.close(order, OrderStatus.CANCELLED, event, trigger);

      case PaymentOutcome.PENDING:
      default:
        if (event.error) {
          this.logger.debug(`Unusable ${event.gateway} event for order ${orderId}: ${event.error}`);
        }
        return DispatchOutcome.IGNORED;
    }
  }

  /**
   * Schedule another run for an order in error
   */
  async retry(
    orderId: string,
    trigger: TriggerType,
    options: RetryOptions = {},
  ): Promise<DispatchOutcome> {
    const order = await this.store.find(orderId);
    if (!order) {
      return DispatchOutcome.UNKNOWN_ORDER;
    }
    if (order.status !== OrderStatus.ERROR) {
      return DispatchOutcome.NOT_RETRYABLE;
    }
    if (!options.force && order.attempts >= this.options.maxAttempts) {
      this.logger.warn(
        `Order ${orderId} reached ${order.attempts} pipeline attempts; retry via ${trigger} refused`,
      );
      return DispatchOutcome.RETRY_LIMIT_REACHED;
    }

    return this.startPipeline(order.id, OrderStatus.ERROR, trigger, options.actor);
  }

  /**
   * Completion callback of a pipeline run
   */
  async complete(orderId: string, result: PipelineResult): Promise<DispatchOutcome> {
    if (!result.success) {
      return this.fail(orderId, result.error ?? 'pipeline failed');
    }

    const won = await this.store.setArtifactsAndComplete(orderId, result.artifacts);
    if (won) {
      const order = await this.store.get(orderId);
      this.logger.log(
        `Order ${orderId} completed with ${result.artifacts.length} artifacts`,
      );
      await this.audit({
        orderId,
        action: AuditAction.PIPELINE_COMPLETED,
        fromStatus: OrderStatus.PROCESSING,
        toStatus: OrderStatus.COMPLETED,
        trigger: TriggerType.PIPELINE,
        metadata: { artifacts: result.artifacts.map((artifact) => artifact.name) },
      });
      await this.emit(OrderEventType.ORDER_COMPLETED, order, TriggerType.PIPELINE);
    } else {
      this.logger.debug(`Completion for order ${orderId} found it no longer processing`);
    }

    // Covers a completion that won earlier but never got its email out
    await this.delivery.deliver(orderId);

    return won ? DispatchOutcome.COMPLETED : DispatchOutcome.IGNORED;
  }

  // ==================== Transitions ====================

  private async accept(
    order: Order,
    event: PaymentEvent,
    trigger: TriggerType,
  ): Promise<DispatchOutcome> {
    if (order.status === OrderStatus.ERROR) {
      return this.retry(order.id, trigger);
    }

    const won =
      order.status === OrderStatus.PENDING &&
      (await this.store.compareAndSetStatus(order.id, OrderStatus.PENDING, OrderStatus.PAID));

    if (!won) {
      this.logger.debug(
        `Race loss: ${trigger} (${event.gateway}) found order ${order.id} already accepted`,
      );
      return DispatchOutcome.ALREADY_ACCEPTED;
    }

    this.logger.log(`Payment for order ${order.id} accepted via ${trigger} (${event.gateway})`);
    await this.audit({
      orderId: order.id,
      action: AuditAction.PAYMENT_ACCEPTED,
      fromStatus: OrderStatus.PENDING,
      toStatus: OrderStatus.PAID,
      trigger,
      metadata: { gateway: event.gateway, providerStatus: event.rawProviderStatus },
    });
    await this.emit(OrderEventType.ORDER_PAID, order, trigger, OrderStatus.PAID);

    return this.startPipeline(order.id, OrderStatus.PAID, trigger);
  }

  private async close(
    order: Order,
    next: OrderStatus.FAILED | OrderStatus.CANCELLED,
    event: PaymentEvent,
    trigger: TriggerType,
  ): Promise<DispatchOutcome> {
    const won =
      order.status === OrderStatus.PENDING &&
      (await this.store.compareAndSetStatus(order.id, OrderStatus.PENDING, next));

    if (!won) {
      this.logger.debug(
        `Ignoring ${event.outcome} from ${event.gateway} for order ${order.id} (${order.status})`,
      );
      return DispatchOutcome.IGNORED;
    }

    const failed = next === OrderStatus.FAILED;
    this.logger.log(`Order ${order.id} ${next} via ${trigger}: ${event.rawProviderStatus}`);
    await this.audit({
      orderId: order.id,
      action: failed ? AuditAction.PAYMENT_REJECTED : AuditAction.PAYMENT_CANCELLED,
      fromStatus: OrderStatus.PENDING,
      toStatus: next,
      trigger,
      metadata: { gateway: event.gateway, providerStatus: event.rawProviderStatus },
    });
    await this.emit(
      failed ? OrderEventType.ORDER_FAILED : OrderEventType.ORDER_CANCELLED,
      order,
      trigger,
      next,
    );

    return failed ? DispatchOutcome.MARKED_FAILED : DispatchOutcome.MARKED_CANCELLED;
  }

  private async startPipeline(
    orderId: string,
    from: OrderStatus.PAID | OrderStatus.ERROR,
    trigger: TriggerType,
    actor?: string,
  ): Promise<DispatchOutcome> {
    const won =
      from === OrderStatus.PAID
        ? await this.store.compareAndSetStatus(orderId, OrderStatus.PAID, OrderStatus.PROCESSING)
        : await this.store.compareAndSetStatus(orderId, OrderStatus.ERROR, OrderStatus.PROCESSING);

    if (!won) {
      this.logger.debug(`Race loss: ${trigger} could not move order ${orderId} from ${from}`);
      return DispatchOutcome.ALREADY_ACCEPTED;
    }

    await this.store.recordPipelineStart(orderId);
    const order = await this.store.get(orderId);
    this.schedule(order);

    await this.audit({
      orderId,
      action: from === OrderStatus.ERROR ? AuditAction.RETRY_REQUESTED : AuditAction.PIPELINE_STARTED,
      fromStatus: from,
      toStatus: OrderStatus.PROCESSING,
      trigger,
      actor,
      reason: this.stateMachine.describe(from, OrderStatus.PROCESSING),
      metadata: { attempt: order.attempts },
    });
    await this.emit(OrderEventType.ORDER_PROCESSING, order, trigger);

    return DispatchOutcome.SCHEDULED;
  }

  private async fail(orderId: string, error: string): Promise<DispatchOutcome> {
    const won = await this.store.setErrorAndFail(orderId, error);
    if (!won) {
      this.logger.debug(`Failure for order ${orderId} found it no longer processing`);
      return DispatchOutcome.IGNORED;
    }

    this.logger.error(`Pipeline failed for order ${orderId}: ${error}`);
    const order = await this.store.get(orderId);
    await this.audit({
      orderId,
      action: AuditAction.PIPELINE_FAILED,
      fromStatus: OrderStatus.PROCESSING,
      toStatus: OrderStatus.ERROR,
      trigger: TriggerType.PIPELINE,
      metadata: { error, attempt: order.attempts },
    });
    await this.emit(OrderEventType.ORDER_ERROR, order, TriggerType.PIPELINE, OrderStatus.ERROR, error);

    if (this.notifier) {
      try {
        await this.notifier.notifyPipelineFailure(orderId, error);
      } catch (notifyError) {
        this.logger.warn(
          `Operator notification for order ${orderId} failed: ${notifyError instanceof Error ? notifyError.message : String(notifyError)}`,
        );
      }
    }

    return DispatchOutcome.PIPELINE_FAILED;
  }

  // ==================== Helpers ====================

  private schedule(order: Order): void {
    const pipeline = this.registry.resolve(order.serviceType);
    this.runner.submit(`pipeline:${order.serviceType}:${order.id}`, async () => {
      const result = await executePipeline(pipeline, order);
      await this.complete(order.id, result);
    });
  }

  /**
   * The transition already happened; a failed audit write is logged, not rethrown
   */
  private async audit(dto: CreateAuditLogDto): Promise<void> {
    try {
      await this.store.appendAudit(dto);
    } catch (error) {
      this.logger.error(
        `Failed to write ${dto.action} audit entry for order ${dto.orderId}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async emit(
    eventType: OrderEventType,
    order: Order,
    trigger: TriggerType,
    status: OrderStatus = order.status,
    error?: string,
  ): Promise<void> {
    await this.events.dispatch(eventType, {
      orderId: order.id,
      status,
      trigger,
      gateway: order.gateway,
      attempts: order.attempts,
      error,
      occurredAt: new Date(),
    });
  }
}
