import * as logs from 'aws-cdk-lib/aws-logs';
import { Environment } from '@common/parameters/environments';
import { NatStrategy } from '@common/types/vpc';
import { EnvParams } from 'lib/types';

export const prodParams: EnvParams = {
  environment: Environment.PRODUCTION,
  namingPrefix: 'platform',
  parameterRoot: 'infra',
  region: 'ap-southeast-2',
  retainData: true,
  terminationProtection: true,
  tags: {
    Environment: Environment.PRODUCTION,
    Project: 'platform-infra',
    ManagedBy: 'CDK',
  },
  network: {
    cidr: '10.2.0.0/16',
    maxAzs: 3,
    natStrategy: NatStrategy.PER_AZ,
    subnetCidrMask: 24,
    enableFlowLogs: true,
    flowLogRetention: logs.RetentionDays.THREE_MONTHS,
  },
  database: {
    minCapacity: 2,
    maxCapacity: 16,
    readerCount: 2,
    backupRetentionDays: 30,
    preferredBackupWindow: '03:00-04:00',
    deletionProtection: true,
    multiAz: true,
    enablePerformanceInsights: true,
  },
  search: {
    engineVersion: 'OpenSearch_2.11',
    instanceType: 'r6g.large.search',
    instanceCount: 3,
    ebsVolumeSize: 200,
    dedicatedMasterCount: 3,
    multiAzWithStandby: true,
    logRetention: logs.RetentionDays.THREE_MONTHS,
  },
  queue: {
    visibilityTimeoutSeconds: 30,
    batchVisibilityTimeoutSeconds: 300,
    messageRetentionSeconds: 1209600,
    maxReceiveCount: 3,
    dlqAgeAlarmThresholdSeconds: 3600,
  },
  secrets: {
    enableRotation: true,
    rotationDays: 30,
  },
};
