/**
 * SQS Queue Parameters
 */
export interface QueueParams {
  /**
   * Visibility timeout of the main, high-priority and FIFO queues
   */
  readonly visibilityTimeoutSeconds: number;

  /**
   * Visibility timeout of the batch queue, sized for long-running consumers
   */
  readonly batchVisibilityTimeoutSeconds: number;

  /**
   * Message retention of every queue (60 to 1209600 seconds)
   */
  readonly messageRetentionSeconds: number;

  /**
   * Receives before a message moves to its dead-letter queue
   */
  readonly maxReceiveCount: number;

  /**
   * Age of the oldest dead-letter message that raises the age alarm
   */
  readonly dlqAgeAlarmThresholdSeconds: number;
}
