import { Logger } from '@nestjs/common';
import { OrderEventType } from '../../domain/enums';
import { EventHandler, OrderEventPayload } from '../../interfaces';

export type EventLogLevel = 'verbose' | 'normal' | 'minimal';

/**
 * Logging event handler
 * Logs every lifecycle event for debugging and monitoring
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: Pick<Logger, 'log'> = new Logger('OrderEvents'),
    private readonly logLevel: EventLogLevel = 'normal',
  ) {}

  /**
   * Create the event handler function
   */
  getHandler(): EventHandler {
    return (eventType: OrderEventType, payload: OrderEventPayload) => {
      this.logger.log(
        `${eventType} ${JSON.stringify(this.prepareLogData(payload))}`,
      );
    };
  }

  /**
   * Prepare log data based on log level
   */
  private prepareLogData(payload: OrderEventPayload): Record<string, unknown> {
    switch (this.logLevel) {
      case 'verbose':
        return { ...payload, occurredAt: payload.occurredAt.toISOString() };

      case 'minimal':
        return { orderId: payload.orderId };

      case 'normal':
      default:
        return {
          orderId: payload.orderId,
          status: payload.status,
          trigger: payload.trigger,
          attempts: payload.attempts,
        };
    }
  }
}
