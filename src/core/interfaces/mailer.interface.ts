export interface MailMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

/**
 * Outbound email
 * Rejects when the message could not be handed to the transport
 */
export interface Mailer {
  send(message: MailMessage): Promise<void>;
}

/**
 * Best-effort operator alert on pipeline failure
 */
export interface OperatorNotifier {
  notifyPipelineFailure(orderId: string, error: string): Promise<void>;
}
