import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import { loadCdkContext } from '@common/test-helpers/test-context';

export const defaultEnv = {
  account: '123456789012',
  region: 'ap-southeast-2',
};

const baseContext = loadCdkContext(path.resolve(__dirname, '../../cdk.json'));

export function createTestApp(): cdk.App {
  return new cdk.App({ context: { ...baseContext } });
}

export const vpcDependencies = {
  'vpc-id': 'vpc-0test',
  'availability-zones': ['ap-southeast-2a', 'ap-southeast-2b', 'ap-southeast-2c'],
  'isolated-subnet-ids': ['subnet-isolated-a', 'subnet-isolated-b', 'subnet-isolated-c'],
  'private-subnet-ids': ['subnet-private-a', 'subnet-private-b', 'subnet-private-c'],
  'db-security-group-id': 'sg-database',
  'opensearch-security-group-id': 'sg-search',
};

export const databaseDependencies = {
  'cluster-arn': 'arn:aws:rds:ap-southeast-2:123456789012:cluster:platform-aurora-dev',
  'secret-arn': 'arn:aws:secretsmanager:ap-southeast-2:123456789012:secret:platform-aurora-master-dev',
  'kms-key-arn': 'arn:aws:kms:ap-southeast-2:123456789012:key/database-key',
};

export const secretsDependencies = {
  'rds-credentials-arn': 'arn:aws:secretsmanager:ap-southeast-2:123456789012:secret:platform-rds-credentials-dev',
  'api-keys-arn': 'arn:aws:secretsmanager:ap-southeast-2:123456789012:secret:platform-api-keys-dev',
  'app-config-arn': 'arn:aws:secretsmanager:ap-southeast-2:123456789012:secret:platform-app-config-dev',
  'db-connection-strings-arn':
    'arn:aws:secretsmanager:ap-southeast-2:123456789012:secret:platform-db-connection-strings-dev',
  'secrets-kms-key-arn': 'arn:aws:kms:ap-southeast-2:123456789012:key/secrets-key',
};

export const queueDependencies = {
  'main-queue-arn': 'arn:aws:sqs:ap-southeast-2:123456789012:platform-main-queue-dev',
  'high-priority-queue-arn': 'arn:aws:sqs:ap-southeast-2:123456789012:platform-high-priority-queue-dev',
  'fifo-queue-arn': 'arn:aws:sqs:ap-southeast-2:123456789012:platform-fifo-queue-dev.fifo',
  'batch-queue-arn': 'arn:aws:sqs:ap-southeast-2:123456789012:platform-batch-queue-dev',
  'dlq-arn': 'arn:aws:sqs:ap-southeast-2:123456789012:platform-dlq-dev',
  'fifo-dlq-arn': 'arn:aws:sqs:ap-southeast-2:123456789012:platform-fifo-dlq-dev.fifo',
  'kms-key-arn': 'arn:aws:kms:ap-southeast-2:123456789012:key/queue-key',
};

export const searchDependencies = {
  'domain-arn': 'arn:aws:es:ap-southeast-2:123456789012:domain/platform-opensearch-dev',
};
