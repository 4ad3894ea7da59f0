import * as logs from 'aws-cdk-lib/aws-logs';
import { Environment } from '@common/parameters/environments';
import { NatStrategy } from '@common/types/vpc';
import { EnvParams } from 'lib/types';

export const stagingParams: EnvParams = {
  environment: Environment.STAGING,
  namingPrefix: 'platform',
  parameterRoot: 'infra',
  region: 'ap-southeast-2',
  retainData: true,
  terminationProtection: false,
  tags: {
    Environment: Environment.STAGING,
    Project: 'platform-infra',
    ManagedBy: 'CDK',
  },
  network: {
    cidr: '10.1.0.0/16',
    maxAzs: 3,
    natStrategy: NatStrategy.PER_AZ,
    subnetCidrMask: 24,
    enableFlowLogs: true,
    flowLogRetention: logs.RetentionDays.THREE_MONTHS,
  },
  database: {
    minCapacity: 1,
    maxCapacity: 8,
    readerCount: 1,
    backupRetentionDays: 14,
    preferredBackupWindow: '03:00-04:00',
    deletionProtection: false,
    multiAz: true,
    enablePerformanceInsights: true,
  },
  search: {
    engineVersion: 'OpenSearch_2.11',
    instanceType: 'r6g.large.search',
    instanceCount: 2,
    ebsVolumeSize: 100,
    dedicatedMasterCount: 0,
    multiAzWithStandby: false,
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
