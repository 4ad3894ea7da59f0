import { z } from 'zod';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Environment } from '@common/parameters/environments';
import { NatStrategy } from '@common/types/vpc';
import { isValidSegment } from '@common/parameter-store/parameter-path';

// OpenSearch rejects longer domain names
export const DOMAIN_NAME_MAX_LENGTH = 28;

const segment = z.string().refine(isValidSegment, {
  message: 'must be lowercase alphanumerics separated by single hyphens',
});

const capacityUnits = z
  .number()
  .min(0.5)
  .max(256)
  .refine((value) => Number.isInteger(value * 2), { message: 'must be a multiple of 0.5' });

const retention = z.nativeEnum(logs.RetentionDays);

const networkSchema = z.object({
  cidr: z
    .string()
    .regex(/^(25[0-5]|2[0-4]\d|1?\d?\d)(\.(25[0-5]|2[0-4]\d|1?\d?\d)){3}\/(1[6-9]|2[0-8])$/, {
      message: 'must be an IPv4 CIDR block between /16 and /28',
    }),
  maxAzs: z.number().int().min(2).max(3),
  natStrategy: z.nativeEnum(NatStrategy),
  subnetCidrMask: z.number().int().min(16).max(28),
  enableFlowLogs: z.boolean(),
  flowLogRetention: retention,
});

const databaseSchema = z
  .object({
    minCapacity: capacityUnits,
    maxCapacity: capacityUnits,
    readerCount: z.number().int().min(0).max(15),
    backupRetentionDays: z.number().int().min(1).max(35),
    preferredBackupWindow: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d-([01]\d|2[0-3]):[0-5]\d$/, {
      message: 'must be hh24:mi-hh24:mi',
    }),
    deletionProtection: z.boolean(),
    multiAz: z.boolean(),
    enablePerformanceInsights: z.boolean(),
  })
  .refine((database) => database.minCapacity <= database.maxCapacity, {
    message: 'must not be lower than minCapacity',
    path: ['maxCapacity'],
  })
  .refine((database) => (database.multiAz ? database.readerCount >= 1 : database.readerCount === 0), {
    message: 'must be at least 1 when multiAz is enabled and 0 otherwise',
    path: ['readerCount'],
  });

const searchSchema = z
  .object({
    engineVersion: z.string().regex(/^(OpenSearch|Elasticsearch)_\d+\.\d+$/, {
      message: 'must look like OpenSearch_2.11',
    }),
    instanceType: z.string().regex(/^[a-z0-9]+\.[a-z0-9]+\.search$/, {
      message: 'must be an OpenSearch instance type such as r6g.large.search',
    }),
    instanceCount: z.number().int().min(1),
    ebsVolumeSize: z.number().int().min(10),
    dedicatedMasterCount: z.union([z.literal(0), z.literal(3), z.literal(5)]),
    multiAzWithStandby: z.boolean(),
    logRetention: retention,
  })
  .refine((search) => !search.multiAzWithStandby || search.instanceCount % 3 === 0, {
    message: 'must be a multiple of 3 when multiAzWithStandby is enabled',
    path: ['instanceCount'],
  })
  .refine((search) => !search.multiAzWithStandby || search.dedicatedMasterCount === 3, {
    message: 'must be 3 when multiAzWithStandby is enabled',
    path: ['dedicatedMasterCount'],
  });

const queueSchema = z.object({
  visibilityTimeoutSeconds: z.number().int().min(0).max(43200),
  batchVisibilityTimeoutSeconds: z.number().int().min(0).max(43200),
  messageRetentionSeconds: z.number().int().min(60).max(1209600),
  maxReceiveCount: z.number().int().min(1).max(1000),
  dlqAgeAlarmThresholdSeconds: z.number().int().min(60),
});

const secretsSchema = z.object({
  enableRotation: z.boolean(),
  rotationDays: z.number().int().min(1).max(1000),
});

export const envParamsSchema = z
  .object({
    environment: z.nativeEnum(Environment),
    namingPrefix: segment,
    parameterRoot: segment,
    region: z.string().regex(/^[a-z]{2}(-[a-z]+)+-\d$/, { message: 'must be an AWS region name' }),
    accountId: z.string().regex(/^\d{12}$/, { message: 'must be a 12-digit account id' }).optional(),
    retainData: z.boolean(),
    terminationProtection: z.boolean(),
    tags: z
      .object({
        Environment: z.string().min(1),
        Project: z.string().min(1),
        ManagedBy: z.string().min(1),
      })
      .catchall(z.string()),
    network: networkSchema,
    database: databaseSchema,
    search: searchSchema,
    queue: queueSchema,
    secrets: secretsSchema,
  })
  .strict()
  .refine((params) => `${params.namingPrefix}-opensearch-${params.environment}`.length <= DOMAIN_NAME_MAX_LENGTH, {
    message: `gives an OpenSearch domain name longer than ${DOMAIN_NAME_MAX_LENGTH} characters`,
    path: ['namingPrefix'],
  })
  .refine((params) => params.tags.Environment === params.environment, {
    message: 'must match environment',
    path: ['tags', 'Environment'],
  });
