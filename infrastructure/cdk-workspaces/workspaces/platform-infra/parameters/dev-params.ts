import * as logs from 'aws-cdk-lib/aws-logs';
import { Environment } from '@common/parameters/environments';
import { NatStrategy } from '@common/types/vpc';
import { EnvParams } from 'lib/types';

export const devParams: EnvParams = {
  environment: Environment.DEVELOPMENT,
  namingPrefix: 'platform',
  parameterRoot: 'infra',
  region: 'ap-southeast-2',
  retainData: false,
  terminationProtection: false,
  tags: {
    Environment: Environment.DEVELOPMENT,
    Project: 'platform-infra',
    ManagedBy: 'CDK',
  },
  network: {
    cidr: '10.0.0.0/16',
    maxAzs: 2,
    natStrategy: NatStrategy.SINGLE,
    subnetCidrMask: 24,
    enableFlowLogs: true,
    flowLogRetention: logs.RetentionDays.ONE_MONTH,
  },
  database: {
    minCapacity: 0.5,
    maxCapacity: 2,
    readerCount: 0,
    backupRetentionDays: 7,
    preferredBackupWindow: '03:00-04:00',
    deletionProtection: false,
    multiAz: false,
    enablePerformanceInsights: false,
  },
  search: {
    engineVersion: 'OpenSearch_2.11',
    instanceType: 't3.small.search',
    instanceCount: 1,
    ebsVolumeSize: 20,
    dedicatedMasterCount: 0,
    multiAzWithStandby: false,
    logRetention: logs.RetentionDays.ONE_MONTH,
  },
  queue: {
    visibilityTimeoutSeconds: 30,
    batchVisibilityTimeoutSeconds: 300,
    messageRetentionSeconds: 1209600,
    maxReceiveCount: 3,
    dlqAgeAlarmThresholdSeconds: 3600,
  },
  secrets: {
    enableRotation: false,
    rotationDays: 30,
  },
};
