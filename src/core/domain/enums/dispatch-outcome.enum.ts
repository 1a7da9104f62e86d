/**
 * What the dispatch router did with a trigger
 */
export enum DispatchOutcome {
  /**
   * This call won the transition and handed the pipeline to the runner
   */
  SCHEDULED = 'scheduled',

  /**
   * Another trigger already accepted the payment (race loss)
   */
  ALREADY_ACCEPTED = 'already_accepted',

  MARKED_FAILED = 'marked_failed',

  MARKED_CANCELLED = 'marked_cancelled',

  /**
   * Pending outcome, or a negative outcome after the order left pending
   */
  IGNORED = 'ignored',

  /**
   * Retry requested for an order that is not in error
   */
  NOT_RETRYABLE = 'not_retryable',

  RETRY_LIMIT_REACHED = 'retry_limit_reached',

  UNKNOWN_ORDER = 'unknown_order',

  COMPLETED = 'completed',

  PIPELINE_FAILED = 'pipeline_failed',
}
