import { Logger } from '@nestjs/common';
import { MailMessage, Mailer, OperatorNotifier } from '../../core';

export interface OperatorAlert {
  orderId: string;
  error: string;
}

/**
 * Mailer that keeps messages in memory instead of sending them
 */
export class RecordingMailer implements Mailer, OperatorNotifier {
  private readonly logger = new Logger(RecordingMailer.name);
  readonly sent: MailMessage[] = [];
  readonly alerts: OperatorAlert[] = [];
  private failing = false;

  async send(message: MailMessage): Promise<void> {
    if (this.failing) {
      throw new Error(`Simulated delivery failure to ${message.to}`);
    }
    this.sent.push({ ...message });
    this.logger.debug(`Recorded email to ${message.to}: ${message.subject}`);
  }

  async notifyPipelineFailure(orderId: string, error: string): Promise<void> {
    if (this.failing) {
      throw new Error(`Simulated alert failure for ${orderId}`);
    }
    this.alerts.push({ orderId, error });
  }

  /**
   * Make every following send reject
   */
  setFailing(failing: boolean): void {
    this.failing = failing;
  }

  sentTo(email: string): MailMessage[] {
    return this.sent.filter((message) => message.to === email);
  }

  clear(): void {
    this.sent.length = 0;
    this.alerts.length = 0;
    this.failing = false;
  }
}
