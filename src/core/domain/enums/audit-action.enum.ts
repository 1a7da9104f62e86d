/**
 * Audit action types
 * Describes what action caused an audit log entry
 */
export enum AuditAction {
  ORDER_CREATED = 'order_created',

  CHECKOUT_OPENED = 'checkout_opened',

  /**
   * Won the pending -> paid compare-and-set
   */
  PAYMENT_ACCEPTED = 'payment_accepted',

  PAYMENT_REJECTED = 'payment_rejected',

  PAYMENT_CANCELLED = 'payment_cancelled',

  PIPELINE_STARTED = 'pipeline_started',

  PIPELINE_COMPLETED = 'pipeline_completed',

  PIPELINE_FAILED = 'pipeline_failed',

  RETRY_REQUESTED = 'retry_requested',

  /**
   * Status written by an operator, bypassing compare-and-set
   */
  ADMIN_OVERRIDE = 'admin_override',

  EMAIL_SENT = 'email_sent',

  EMAIL_RESENT = 'email_resent',
}
