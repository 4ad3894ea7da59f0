import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as kms from 'aws-cdk-lib/aws-kms';
import * as rds from 'aws-cdk-lib/aws-rds';
import { Construct } from 'constructs';
import { ParameterStoreOutputs } from '@common/constructs/parameter-store/parameter-store-outputs';
import { PublishedParameter } from '@common/parameter-store/publish';
import { DependencyResolver } from '@common/helpers/dependency-resolver';
import { DependencySet } from '@common/types/outputs';
import { StackName } from 'lib/types';
import {
  AURORA_PARAMETERS,
  DATABASE_MASTER_USERNAME,
  DATABASE_NAME,
  EXCLUDED_PASSWORD_CHARS,
} from 'lib/constants';
import { resourceName } from 'lib/helpers/naming';
import { PlatformStackProps, removalPolicyFor } from './platform-stack-props';

export const DATABASE_VPC_KEYS = [
  'vpc-id',
  'availability-zones',
  'isolated-subnet-ids',
  'db-security-group-id',
] as const;

export interface DatabaseStackProps extends PlatformStackProps {
  readonly dependencies: {
    readonly vpc?: DependencySet<(typeof DATABASE_VPC_KEYS)[number]>;
  };
}

export type DatabaseOutputs = {
  readonly 'cluster-endpoint': string;
  readonly 'cluster-port': string;
  readonly 'cluster-reader-endpoint': string;
  readonly 'cluster-arn': string;
  readonly 'database-name': string;
  readonly 'secret-arn': string;
  readonly 'kms-key-arn': string;
  readonly 'subnet-group-name': string;
  readonly 'parameter-group-name': string;
};

/**
 * Aurora MySQL Serverless v2 cluster in the isolated subnets
 */
export class DatabaseStack extends cdk.Stack {
  public readonly encryptionKey: kms.Key;
  public readonly cluster: rds.DatabaseCluster;
  public readonly outputs: DatabaseOutputs;
  public readonly parameters: PublishedParameter[];

  constructor(scope: Construct, id: string, props: DatabaseStackProps) {
    const vpcOutputs = DependencyResolver.resolve(
      StackName.DATABASE,
      StackName.VPC,
      props.dependencies.vpc,
      DATABASE_VPC_KEYS,
    );
    super(scope, id, props);

    const params = props.params;
    const database = params.database;

    const vpc = ec2.Vpc.fromVpcAttributes(this, 'Vpc', {
      vpcId: vpcOutputs.string('vpc-id'),
      availabilityZones: vpcOutputs.list('availability-zones'),
      isolatedSubnetIds: vpcOutputs.list('isolated-subnet-ids'),
    });
    const securityGroup = ec2.SecurityGroup.fromSecurityGroupId(
      this,
      'DbSecurityGroup',
      vpcOutputs.string('db-security-group-id'),
      { mutable: false },
    );

    this.encryptionKey = new kms.Key(this, 'DatabaseKey', {
      alias: `alias/${resourceName(params, 'rds')}`,
      description: `Encryption key for the ${params.namingPrefix} database (${params.environment})`,
      enableKeyRotation: true,
      removalPolicy: removalPolicyFor(params),
    });

    const subnetGroup = new rds.SubnetGroup(this, 'SubnetGroup', {
      vpc,
      subnetGroupName: resourceName(params, 'db-subnet-group'),
      description: 'Isolated subnets of the Aurora cluster',
      vpcSubnets: { subnetType: ec2.SubnetType.PRIVATE_ISOLATED },
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    const engine = rds.DatabaseClusterEngine.auroraMysql({
      version: rds.AuroraMysqlEngineVersion.VER_3_04_0,
    });

    const parameterGroup = new rds.ParameterGroup(this, 'ParameterGroup', {
      engine,
      description: `Cluster parameters of ${resourceName(params, 'aurora')}`,
      parameters: { ...AURORA_PARAMETERS },
    });

    // Readers exist only to take over from the writer in another zone
    const readers = database.multiAz
      ? Array.from({ length: database.readerCount }, (_, index) =>
          rds.ClusterInstance.serverlessV2(`Reader${index + 1}`, {
            scaleWithWriter: index === 0,
            enablePerformanceInsights: database.enablePerformanceInsights,
            publiclyAccessible: false,
          }),
        )
      : [];

    this.cluster = new rds.DatabaseCluster(this, 'Cluster', {
      engine,
      clusterIdentifier: resourceName(params, 'aurora'),
      credentials: rds.Credentials.fromGeneratedSecret(DATABASE_MASTER_USERNAME, {
        secretName: resourceName(params, 'aurora-master'),
        encryptionKey: this.encryptionKey,
        excludeCharacters: EXCLUDED_PASSWORD_CHARS,
      }),
      defaultDatabaseName: DATABASE_NAME,
      writer: rds.ClusterInstance.serverlessV2('Writer', {
        enablePerformanceInsights: database.enablePerformanceInsights,
        publiclyAccessible: false,
      }),
      readers,
      serverlessV2MinCapacity: database.minCapacity,
      serverlessV2MaxCapacity: database.maxCapacity,
      vpc,
      vpcSubnets: { subnetType: ec2.SubnetType.PRIVATE_ISOLATED },
      subnetGroup,
      securityGroups: [securityGroup],
      parameterGroup,
      storageEncrypted: true,
      storageEncryptionKey: this.encryptionKey,
      backup: {
        retention: cdk.Duration.days(database.backupRetentionDays),
        preferredWindow: database.preferredBackupWindow,
      },
      cloudwatchLogsExports: ['error', 'slowquery'],
      deletionProtection: database.deletionProtection,
      removalPolicy: params.retainData ? cdk.RemovalPolicy.SNAPSHOT : cdk.RemovalPolicy.DESTROY,
    });

    const secret = this.cluster.secret;
    if (!secret) {
      throw new Error(`Cluster ${resourceName(params, 'aurora')} has no generated master secret`);
    }

    this.outputs = {
      'cluster-endpoint': this.cluster.clusterEndpoint.hostname,
      'cluster-port': cdk.Tokenization.stringifyNumber(this.cluster.clusterEndpoint.port),
      'cluster-reader-endpoint': this.cluster.clusterReadEndpoint.hostname,
      'cluster-arn': this.cluster.clusterArn,
      'database-name': DATABASE_NAME,
      'secret-arn': secret.secretArn,
      'kms-key-arn': this.encryptionKey.keyArn,
      'subnet-group-name': subnetGroup.subnetGroupName,
      'parameter-group-name': parameterGroup.bindToCluster({}).parameterGroupName,
    };

    const store = new ParameterStoreOutputs(this, 'ParameterStoreOutputs', {
      root: params.parameterRoot,
      environment: params.environment,
      stack: StackName.DATABASE,
      outputs: this.outputs,
      registry: props.registry,
    });
    this.parameters = store.published;
  }
}
