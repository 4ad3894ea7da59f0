import * as cdk from 'aws-cdk-lib';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';
import { ParameterStoreOutputs } from '@common/constructs/parameter-store/parameter-store-outputs';
import { PublishedParameter } from '@common/parameter-store/publish';
import { DependencyResolver } from '@common/helpers/dependency-resolver';
import { DependencySet } from '@common/types/outputs';
import { StackName } from 'lib/types';
import { resourceName } from 'lib/helpers/naming';
import { PlatformStackProps } from './platform-stack-props';

export const ACCESS_DATABASE_KEYS = ['cluster-arn', 'secret-arn', 'kms-key-arn'] as const;
export const ACCESS_SECRETS_KEYS = [
  'rds-credentials-arn',
  'api-keys-arn',
  'app-config-arn',
  'db-connection-strings-arn',
  'secrets-kms-key-arn',
] as const;
export const ACCESS_QUEUE_KEYS = [
  'main-queue-arn',
  'high-priority-queue-arn',
  'fifo-queue-arn',
  'batch-queue-arn',
  'dlq-arn',
  'fifo-dlq-arn',
  'kms-key-arn',
] as const;
export const ACCESS_SEARCH_KEYS = ['domain-arn'] as const;

export interface AccessControlStackProps extends PlatformStackProps {
  readonly dependencies: {
    readonly rds?: DependencySet<(typeof ACCESS_DATABASE_KEYS)[number]>;
    readonly secrets?: DependencySet<(typeof ACCESS_SECRETS_KEYS)[number]>;
    readonly sqs?: DependencySet<(typeof ACCESS_QUEUE_KEYS)[number]>;
    readonly opensearch?: DependencySet<(typeof ACCESS_SEARCH_KEYS)[number]>;
  };
}

export type AccessControlOutputs = {
  readonly 'lambda-execution-role-arn': string;
  readonly 'application-role-arn': string;
  readonly 'rds-access-policy-name': string;
  readonly 'sqs-access-policy-name': string;
  readonly 'opensearch-access-policy-name': string;
  readonly 'secrets-access-policy-name': string;
  readonly 'cloudwatch-logs-policy-name': string;
  readonly 'lambda-execution-role-name': string;
  readonly 'application-role-name': string;
};

export const SQS_CONSUMER_ACTIONS = [
  'sqs:SendMessage',
  'sqs:SendMessageBatch',
  'sqs:ReceiveMessage',
  'sqs:DeleteMessage',
  'sqs:DeleteMessageBatch',
  'sqs:GetQueueAttributes',
  'sqs:GetQueueUrl',
];

export const OPENSEARCH_HTTP_ACTIONS = [
  'es:ESHttpGet',
  'es:ESHttpHead',
  'es:ESHttpPost',
  'es:ESHttpPut',
  'es:ESHttpDelete',
];

const SECRET_READ_ACTIONS = ['secretsmanager:GetSecretValue', 'secretsmanager:DescribeSecret'];

/**
 * Roles of the application workloads and the least-privilege policies they share
 */
export class AccessControlStack extends cdk.Stack {
  public readonly lambdaExecutionRole: iam.Role;
  public readonly applicationRole: iam.Role;
  public readonly policies: iam.Policy[];
  public readonly outputs: AccessControlOutputs;
  public readonly parameters: PublishedParameter[];

  constructor(scope: Construct, id: string, props: AccessControlStackProps) {
    const stack = StackName.ACCESS_CONTROL;
    const database = DependencyResolver.resolve(stack, StackName.DATABASE, props.dependencies.rds, ACCESS_DATABASE_KEYS);
    const secrets = DependencyResolver.resolve(stack, StackName.SECRETS, props.dependencies.secrets, ACCESS_SECRETS_KEYS);
    const queues = DependencyResolver.resolve(stack, StackName.QUEUE, props.dependencies.sqs, ACCESS_QUEUE_KEYS);
    const search = DependencyResolver.resolve(stack, StackName.SEARCH, props.dependencies.opensearch, ACCESS_SEARCH_KEYS);
    super(scope, id, props);

    const params = props.params;

    this.lambdaExecutionRole = new iam.Role(this, 'LambdaExecutionRole', {
      roleName: resourceName(params, 'lambda-execution-role'),
      description: 'Execution role of the application Lambda functions',
      assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AWSLambdaBasicExecutionRole'),
        iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AWSLambdaVPCAccessExecutionRole'),
      ],
    });

    this.applicationRole = new iam.Role(this, 'ApplicationRole', {
      roleName: resourceName(params, 'application-role'),
      description: 'Role of the application running on EC2 or ECS',
      assumedBy: new iam.CompositePrincipal(
        new iam.ServicePrincipal('ec2.amazonaws.com'),
        new iam.ServicePrincipal('ecs-tasks.amazonaws.com'),
      ),
    });

    const roles = [this.lambdaExecutionRole, this.applicationRole];

    const rdsPolicy = new iam.Policy(this, 'RdsAccessPolicy', {
      policyName: resourceName(params, 'rds-access-policy'),
      roles,
      statements: [
        new iam.PolicyStatement({
          actions: ['rds:DescribeDBClusters'],
          resources: [database.string('cluster-arn')],
        }),
        new iam.PolicyStatement({
          actions: SECRET_READ_ACTIONS,
          resources: [database.string('secret-arn')],
        }),
        new iam.PolicyStatement({
          actions: ['kms:Decrypt'],
          resources: [database.string('kms-key-arn')],
        }),
      ],
    });

    const sqsPolicy = new iam.Policy(this, 'SqsAccessPolicy', {
      policyName: resourceName(params, 'sqs-access-policy'),
      roles,
      statements: [
        new iam.PolicyStatement({
          actions: SQS_CONSUMER_ACTIONS,
          resources: [
            queues.string('main-queue-arn'),
            queues.string('high-priority-queue-arn'),
            queues.string('fifo-queue-arn'),
            queues.string('batch-queue-arn'),
            queues.string('dlq-arn'),
            queues.string('fifo-dlq-arn'),
          ],
        }),
        new iam.PolicyStatement({
          actions: ['kms:Decrypt', 'kms:GenerateDataKey'],
          resources: [queues.string('kms-key-arn')],
        }),
      ],
    });

    const domainArn = search.string('domain-arn');
    const searchPolicy = new iam.Policy(this, 'OpenSearchAccessPolicy', {
      policyName: resourceName(params, 'opensearch-access-policy'),
      roles,
      statements: [
        new iam.PolicyStatement({
          actions: OPENSEARCH_HTTP_ACTIONS,
          resources: [`${domainArn}/*`],
        }),
        new iam.PolicyStatement({
          actions: ['es:DescribeDomain'],
          resources: [domainArn],
        }),
      ],
    });

    const secretsPolicy = new iam.Policy(this, 'SecretsAccessPolicy', {
      policyName: resourceName(params, 'secrets-access-policy'),
      roles,
      statements: [
        new iam.PolicyStatement({
          actions: SECRET_READ_ACTIONS,
          resources: [
            secrets.string('rds-credentials-arn'),
            secrets.string('api-keys-arn'),
            secrets.string('app-config-arn'),
            secrets.string('db-connection-strings-arn'),
          ],
        }),
        new iam.PolicyStatement({
          actions: ['kms:Decrypt'],
          resources: [secrets.string('secrets-kms-key-arn')],
        }),
      ],
    });

    const logsPolicy = new iam.Policy(this, 'CloudWatchLogsPolicy', {
      policyName: resourceName(params, 'cloudwatch-logs-policy'),
      roles,
      statements: [
        new iam.PolicyStatement({
          actions: ['logs:CreateLogGroup', 'logs:CreateLogStream', 'logs:PutLogEvents'],
          resources: [
            this.formatArn({
              service: 'logs',
              resource: 'log-group',
              resourceName: `/${params.namingPrefix}/${params.environment}/*`,
              arnFormat: cdk.ArnFormat.COLON_RESOURCE_NAME,
            }),
          ],
        }),
      ],
    });

    this.policies = [rdsPolicy, sqsPolicy, searchPolicy, secretsPolicy, logsPolicy];

    this.outputs = {
      'lambda-execution-role-arn': this.lambdaExecutionRole.roleArn,
      'application-role-arn': this.applicationRole.roleArn,
      'rds-access-policy-name': rdsPolicy.policyName,
      'sqs-access-policy-name': sqsPolicy.policyName,
      'opensearch-access-policy-name': searchPolicy.policyName,
      'secrets-access-policy-name': secretsPolicy.policyName,
      'cloudwatch-logs-policy-name': logsPolicy.policyName,
      'lambda-execution-role-name': this.lambdaExecutionRole.roleName,
      'application-role-name': this.applicationRole.roleName,
    };

    const store = new ParameterStoreOutputs(this, 'ParameterStoreOutputs', {
      root: params.parameterRoot,
      environment: params.environment,
      stack,
      outputs: this.outputs,
      registry: props.registry,
    });
    this.parameters = store.published;
  }
}
