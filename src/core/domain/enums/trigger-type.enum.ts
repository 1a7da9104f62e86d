/**
 * Where a state transition came from
 * Recorded in audit logs to trace which entry point won
 */
export enum TriggerType {
  /**
   * Asynchronous notification posted by a payment gateway
   */
  WEBHOOK = 'webhook',

  /**
   * Customer redirected back from the hosted checkout
   */
  RETURN_REDIRECT = 'return_redirect',

  /**
   * Dashboard status poll
   */
  POLL = 'poll',

  /**
   * Operator action through the admin API
   */
  ADMIN = 'admin',

  /**
   * Background pipeline completion
   */
  PIPELINE = 'pipeline',

  /**
   * Order submission
   */
  SUBMISSION = 'submission',
}
