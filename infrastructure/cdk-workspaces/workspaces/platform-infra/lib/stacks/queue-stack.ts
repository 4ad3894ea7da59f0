import * as cdk from 'aws-cdk-lib';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as kms from 'aws-cdk-lib/aws-kms';
import * as sqs from 'aws-cdk-lib/aws-sqs';
import { Construct } from 'constructs';
import { ParameterStoreOutputs } from '@common/constructs/parameter-store/parameter-store-outputs';
import { PublishedParameter } from '@common/parameter-store/publish';
import { StackName } from 'lib/types';
import { resourceName } from 'lib/helpers/naming';
import { PlatformStackProps, removalPolicyFor } from './platform-stack-props';

export type QueueStackProps = PlatformStackProps;

export type QueueOutputs = {
  readonly 'main-queue-url': string;
  readonly 'main-queue-arn': string;
  readonly 'high-priority-queue-url': string;
  readonly 'high-priority-queue-arn': string;
  readonly 'fifo-queue-url': string;
  readonly 'fifo-queue-arn': string;
  readonly 'batch-queue-url': string;
  readonly 'batch-queue-arn': string;
  readonly 'dlq-url': string;
  readonly 'dlq-arn': string;
  readonly 'fifo-dlq-url': string;
  readonly 'fifo-dlq-arn': string;
  readonly 'kms-key-arn': string;
  readonly 'dlq-alarm-arn': string;
  readonly 'dlq-age-alarm-arn': string;
};

/**
 * Message queues with dead-letter handling
 *
 * Standard queues share one dead-letter queue. SQS requires the dead-letter
 * queue of a FIFO queue to be FIFO as well, so the FIFO queue has its own.
 */
export class QueueStack extends cdk.Stack {
  public readonly encryptionKey: kms.Key;
  public readonly deadLetterQueue: sqs.Queue;
  public readonly fifoDeadLetterQueue: sqs.Queue;
  public readonly mainQueue: sqs.Queue;
  public readonly highPriorityQueue: sqs.Queue;
  public readonly fifoQueue: sqs.Queue;
  public readonly batchQueue: sqs.Queue;
  public readonly deadLetterAlarm: cloudwatch.Alarm;
  public readonly deadLetterAgeAlarm: cloudwatch.Alarm;
  public readonly outputs: QueueOutputs;
  public readonly parameters: PublishedParameter[];

  constructor(scope: Construct, id: string, props: QueueStackProps) {
    super(scope, id, props);

    const params = props.params;
    const queue = params.queue;
    const removalPolicy = removalPolicyFor(params);

    this.encryptionKey = new kms.Key(this, 'QueueKey', {
      alias: `alias/${resourceName(params, 'sqs')}`,
      description: `Encryption key for ${params.namingPrefix} queues (${params.environment})`,
      enableKeyRotation: true,
      removalPolicy,
    });

    const common: sqs.QueueProps = {
      encryption: sqs.QueueEncryption.KMS,
      encryptionMasterKey: this.encryptionKey,
      enforceSSL: true,
      retentionPeriod: cdk.Duration.seconds(queue.messageRetentionSeconds),
      removalPolicy,
    };
    const visibilityTimeout = cdk.Duration.seconds(queue.visibilityTimeoutSeconds);

    this.deadLetterQueue = new sqs.Queue(this, 'DeadLetterQueue', {
      ...common,
      queueName: resourceName(params, 'dlq'),
    });
    this.fifoDeadLetterQueue = new sqs.Queue(this, 'FifoDeadLetterQueue', {
      ...common,
      queueName: `${resourceName(params, 'fifo-dlq')}.fifo`,
      fifo: true,
    });

    const deadLetterQueue: sqs.DeadLetterQueue = {
      queue: this.deadLetterQueue,
      maxReceiveCount: queue.maxReceiveCount,
    };

    this.mainQueue = new sqs.Queue(this, 'MainQueue', {
      ...common,
      queueName: resourceName(params, 'main-queue'),
      visibilityTimeout,
      deadLetterQueue,
    });
    this.highPriorityQueue = new sqs.Queue(this, 'HighPriorityQueue', {
      ...common,
      queueName: resourceName(params, 'high-priority-queue'),
      visibilityTimeout,
      deadLetterQueue,
    });
    this.fifoQueue = new sqs.Queue(this, 'FifoQueue', {
      ...common,
      queueName: `${resourceName(params, 'fifo-queue')}.fifo`,
      fifo: true,
      contentBasedDeduplication: true,
      visibilityTimeout,
      deadLetterQueue: {
        queue: this.fifoDeadLetterQueue,
        maxReceiveCount: queue.maxReceiveCount,
      },
    });
    this.batchQueue = new sqs.Queue(this, 'BatchQueue', {
      ...common,
      queueName: resourceName(params, 'batch-queue'),
      visibilityTimeout: cdk.Duration.seconds(queue.batchVisibilityTimeoutSeconds),
      deadLetterQueue,
    });

    this.deadLetterAlarm = new cloudwatch.Alarm(this, 'DeadLetterQueueAlarm', {
      alarmName: resourceName(params, 'dlq-messages'),
      alarmDescription: 'Messages are waiting in the dead-letter queue',
      metric: this.deadLetterQueue.metricApproximateNumberOfMessagesVisible({
        period: cdk.Duration.minutes(5),
        statistic: cloudwatch.Stats.MAXIMUM,
      }),
      threshold: 1,
      evaluationPeriods: 1,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });
    this.deadLetterAgeAlarm = new cloudwatch.Alarm(this, 'DeadLetterQueueAgeAlarm', {
      alarmName: resourceName(params, 'dlq-message-age'),
      alarmDescription: `A dead-letter message is older than ${queue.dlqAgeAlarmThresholdSeconds} seconds`,
      metric: this.deadLetterQueue.metricApproximateAgeOfOldestMessage({
        period: cdk.Duration.minutes(5),
        statistic: cloudwatch.Stats.MAXIMUM,
      }),
      threshold: queue.dlqAgeAlarmThresholdSeconds,
      evaluationPeriods: 1,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    this.outputs = {
      'main-queue-url': this.mainQueue.queueUrl,
      'main-queue-arn': this.mainQueue.queueArn,
      'high-priority-queue-url': this.highPriorityQueue.queueUrl,
      'high-priority-queue-arn': this.highPriorityQueue.queueArn,
      'fifo-queue-url': this.fifoQueue.queueUrl,
      'fifo-queue-arn': this.fifoQueue.queueArn,
      'batch-queue-url': this.batchQueue.queueUrl,
      'batch-queue-arn': this.batchQueue.queueArn,
      'dlq-url': this.deadLetterQueue.queueUrl,
      'dlq-arn': this.deadLetterQueue.queueArn,
      'fifo-dlq-url': this.fifoDeadLetterQueue.queueUrl,
      'fifo-dlq-arn': this.fifoDeadLetterQueue.queueArn,
      'kms-key-arn': this.encryptionKey.keyArn,
      'dlq-alarm-arn': this.deadLetterAlarm.alarmArn,
      'dlq-age-alarm-arn': this.deadLetterAgeAlarm.alarmArn,
    };

    const store = new ParameterStoreOutputs(this, 'ParameterStoreOutputs', {
      root: params.parameterRoot,
      environment: params.environment,
      stack: StackName.QUEUE,
      outputs: this.outputs,
      registry: props.registry,
    });
    this.parameters = store.published;
  }
}
