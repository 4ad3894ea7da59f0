import { Match, Template } from 'aws-cdk-lib/assertions';
import { ParameterPathRegistry } from '@common/parameter-store/parameter-registry';
import { QueueStack } from 'lib/stacks/queue-stack';
import { resolveEnvironment } from 'parameters/environments';
import { createTestApp, defaultEnv } from 'test/helpers/fixtures';

/**
 * AWS CDK Unit Tests - Fine-grained Assertions
 */

describe('QueueStack Fine-grained Assertions', () => {
  let stack: QueueStack;
  let template: Template;

  beforeAll(() => {
    const app = createTestApp();
    stack = new QueueStack(app, 'PlatformSqs', {
      env: defaultEnv,
      params: resolveEnvironment('dev'),
      registry: new ParameterPathRegistry(),
    });
    template = Template.fromStack(stack);
  });

  describe('Queues', () => {
    test('should create 4 work queues and 2 dead-letter queues', () => {
      template.resourceCountIs('AWS::SQS::Queue', 6);
    });

    test('every queue is encrypted with the stack key and keeps messages for 14 days', () => {
      const queues = template.findResources('AWS::SQS::Queue');
      const keyArn = stack.resolve(stack.encryptionKey.keyArn);
      for (const queue of Object.values(queues)) {
        expect(queue.Properties.KmsMasterKeyId).toEqual(keyArn);
        expect(queue.Properties.MessageRetentionPeriod).toBe(1209600);
      }
    });

    test('main queue redrives to the shared dead-letter queue after 3 receives', () => {
      template.hasResourceProperties('AWS::SQS::Queue', {
        QueueName: 'platform-main-queue-dev',
        VisibilityTimeout: 30,
        RedrivePolicy: {
          deadLetterTargetArn: { 'Fn::GetAtt': [Match.stringLikeRegexp('^DeadLetterQueue'), 'Arn'] },
          maxReceiveCount: 3,
        },
      });
    });

    test('batch queue has a longer visibility timeout', () => {
      template.hasResourceProperties('AWS::SQS::Queue', {
        QueueName: 'platform-batch-queue-dev',
        VisibilityTimeout: 300,
      });
    });

    test('FIFO queue deduplicates by content and redrives to the FIFO dead-letter queue', () => {
      template.hasResourceProperties('AWS::SQS::Queue', {
        QueueName: 'platform-fifo-queue-dev.fifo',
        FifoQueue: true,
        ContentBasedDeduplication: true,
        RedrivePolicy: {
          deadLetterTargetArn: { 'Fn::GetAtt': [Match.stringLikeRegexp('^FifoDeadLetterQueue'), 'Arn'] },
          maxReceiveCount: 3,
        },
      });
      template.hasResourceProperties('AWS::SQS::Queue', {
        QueueName: 'platform-fifo-dlq-dev.fifo',
        FifoQueue: true,
      });
    });

    test('dead-letter queues have no redrive policy of their own', () => {
      template.hasResourceProperties('AWS::SQS::Queue', {
        QueueName: 'platform-dlq-dev',
        RedrivePolicy: Match.absent(),
      });
    });

    test('every queue rejects requests without TLS', () => {
      template.resourceCountIs('AWS::SQS::QueuePolicy', 6);
      template.hasResourceProperties('AWS::SQS::QueuePolicy', {
        PolicyDocument: {
          Statement: Match.arrayWith([
            Match.objectLike({
              Effect: 'Deny',
              Action: 'sqs:*',
              Condition: { Bool: { 'aws:SecureTransport': 'false' } },
            }),
          ]),
        },
      });
    });

    test('queues are deleted with the dev stack', () => {
      const queues = template.findResources('AWS::SQS::Queue');
      for (const queue of Object.values(queues)) {
        expect(queue.DeletionPolicy).toBe('Delete');
      }
    });
  });

  describe('Alarms', () => {
    test('should create 2 alarms on the dead-letter queue', () => {
      template.resourceCountIs('AWS::CloudWatch::Alarm', 2);
    });

    test('alarms as soon as one message is dead-lettered', () => {
      template.hasResourceProperties('AWS::CloudWatch::Alarm', {
        AlarmName: 'platform-dlq-messages-dev',
        Namespace: 'AWS/SQS',
        MetricName: 'ApproximateNumberOfMessagesVisible',
        Statistic: 'Maximum',
        Period: 300,
        Threshold: 1,
        EvaluationPeriods: 1,
        ComparisonOperator: 'GreaterThanOrEqualToThreshold',
        TreatMissingData: 'notBreaching',
      });
    });

    test('alarms when a dead-lettered message is older than an hour', () => {
      template.hasResourceProperties('AWS::CloudWatch::Alarm', {
        AlarmName: 'platform-dlq-message-age-dev',
        MetricName: 'ApproximateAgeOfOldestMessage',
        Threshold: 3600,
      });
    });
  });

  describe('Published Parameters', () => {
    test('should publish 15 parameters', () => {
      template.resourceCountIs('AWS::SSM::Parameter', 15);
      expect(stack.parameters.every((parameter) => parameter.path.startsWith('/infra/dev/sqs/'))).toBe(true);
    });

    test('queue URLs resolve to the queue references', () => {
      template.hasResourceProperties('AWS::SSM::Parameter', {
        Name: '/infra/dev/sqs/main-queue-url',
        Type: 'String',
        Value: { Ref: Match.stringLikeRegexp('^MainQueue') },
      });
    });

    test('alarm ARNs are published', () => {
      template.hasResourceProperties('AWS::SSM::Parameter', {
        Name: '/infra/dev/sqs/dlq-age-alarm-arn',
        Value: { 'Fn::GetAtt': [Match.stringLikeRegexp('^DeadLetterQueueAgeAlarm'), 'Arn'] },
      });
    });
  });
});
