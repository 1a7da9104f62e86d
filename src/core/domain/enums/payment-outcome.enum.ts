/**
 * Gateway-agnostic outcome of a payment notification
 */
export enum PaymentOutcome {
  APPROVED = 'approved',
  REJECTED = 'rejected',
  CANCELLED = 'cancelled',

  /**
   * Not yet decided, or the notification could not be read.
   * Never causes a state transition.
   */
  PENDING = 'pending',
}
