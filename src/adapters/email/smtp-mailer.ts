import { Logger } from '@nestjs/common';
import nodemailer, { Transporter } from 'nodemailer';
import { MailMessage, Mailer, OperatorNotifier } from '../../core';

export interface SmtpMailerConfig {
  host: string;
  port: number;
  secure?: boolean;
  user?: string;
  password?: string;
  /**
   * Sender address, e.g. "Orders <orders@example.com>"
   */
  from: string;
  /**
   * Receives pipeline failure alerts; alerts are skipped when unset
   */
  operatorEmail?: string;
}

/**
 * SMTP mailer backed by nodemailer
 */
export class SmtpMailer implements Mailer, OperatorNotifier {
  private readonly logger = new Logger(SmtpMailer.name);
  private readonly transporter: Transporter;

  constructor(
    private readonly config: SmtpMailerConfig,
    transporter?: Transporter,
  ) {
    this.transporter =
      transporter ??
      nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure ?? config.port === 465,
        auth: config.user ? { user: config.user, pass: config.password } : undefined,
      });
  }

  async send(message: MailMessage): Promise<void> {
    await this.transporter.sendMail({
      from: this.config.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
      html: message.html,
    });
    this.logger.log(`Email sent to ${message.to}: ${message.subject}`);
  }

  async notifyPipelineFailure(orderId: string, error: string): Promise<void> {
    if (!this.config.operatorEmail) {
      this.logger.warn(`No operator email configured, skipping alert for order ${orderId}`);
      return;
    }

    await this.send({
      to: this.config.operatorEmail,
      subject: `Pipeline failed for order ${orderId}`,
      text: `Order ${orderId} moved to error.\n\n${error}`,
    });
  }
}
