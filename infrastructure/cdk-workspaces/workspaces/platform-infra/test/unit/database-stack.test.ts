import { Match, Template } from 'aws-cdk-lib/assertions';
import { ParameterPathRegistry } from '@common/parameter-store/parameter-registry';
import { DatabaseStack } from 'lib/stacks/database-stack';
import { resolveEnvironment } from 'parameters/environments';
import { createTestApp, defaultEnv, vpcDependencies } from 'test/helpers/fixtures';

/**
 * AWS CDK Unit Tests - Fine-grained Assertions
 *
 * The VPC is imported from literal identifiers, so the stack is exercised
 * without a VpcStack in the same app.
 */

function synthDatabaseStack(environment: string): { stack: DatabaseStack; template: Template } {
  const app = createTestApp();
  const stack = new DatabaseStack(app, 'PlatformRds', {
    env: defaultEnv,
    params: resolveEnvironment(environment),
    registry: new ParameterPathRegistry(),
    dependencies: { vpc: vpcDependencies },
  });
  return { stack, template: Template.fromStack(stack) };
}

describe('DatabaseStack Fine-grained Assertions', () => {
  describe('dev', () => {
    let stack: DatabaseStack;
    let template: Template;

    beforeAll(() => {
      ({ stack, template } = synthDatabaseStack('dev'));
    });

    describe('Aurora Cluster', () => {
      test('should create 1 Aurora MySQL cluster', () => {
        template.resourceCountIs('AWS::RDS::DBCluster', 1);
        template.hasResourceProperties('AWS::RDS::DBCluster', {
          Engine: 'aurora-mysql',
          EngineVersion: '8.0.mysql_aurora.3.04.0',
          DBClusterIdentifier: 'platform-aurora-dev',
          DatabaseName: 'appdb',
        });
      });

      test('capacity follows the dev table', () => {
        template.hasResourceProperties('AWS::RDS::DBCluster', {
          ServerlessV2ScalingConfiguration: {
            MinCapacity: 0.5,
            MaxCapacity: 2,
          },
        });
      });

      test('storage is encrypted with the stack key', () => {
        template.hasResourceProperties('AWS::RDS::DBCluster', {
          StorageEncrypted: true,
          KmsKeyId: { 'Fn::GetAtt': [Match.stringLikeRegexp('^DatabaseKey'), 'Arn'] },
        });
      });

      test('backups are kept for 7 days in the nightly window', () => {
        template.hasResourceProperties('AWS::RDS::DBCluster', {
          BackupRetentionPeriod: 7,
          PreferredBackupWindow: '03:00-04:00',
        });
      });

      test('error and slow query logs are exported', () => {
        template.hasResourceProperties('AWS::RDS::DBCluster', {
          EnableCloudwatchLogsExports: ['error', 'slowquery'],
        });
      });

      test('deletion protection is off and the cluster is removed with the stack', () => {
        template.hasResource('AWS::RDS::DBCluster', {
          DeletionPolicy: 'Delete',
          Properties: { DeletionProtection: false },
        });
      });

      test('uses the imported database security group', () => {
        template.hasResourceProperties('AWS::RDS::DBCluster', {
          VpcSecurityGroupIds: ['sg-database'],
        });
      });
    });

    describe('Instances', () => {
      test('a single-zone cluster has only the writer', () => {
        template.resourceCountIs('AWS::RDS::DBInstance', 1);
        template.hasResourceProperties('AWS::RDS::DBInstance', {
          DBInstanceClass: 'db.serverless',
          PubliclyAccessible: false,
        });
      });
    });

    describe('Networking and Parameters', () => {
      test('subnet group spans the isolated subnets', () => {
        template.hasResourceProperties('AWS::RDS::DBSubnetGroup', {
          DBSubnetGroupName: 'platform-db-subnet-group-dev',
          SubnetIds: ['subnet-isolated-a', 'subnet-isolated-b', 'subnet-isolated-c'],
        });
      });

      test('cluster parameter group tunes the MySQL engine', () => {
        template.resourceCountIs('AWS::RDS::DBClusterParameterGroup', 1);
        template.hasResourceProperties('AWS::RDS::DBClusterParameterGroup', {
          Family: 'aurora-mysql8.0',
          Parameters: {
            innodb_buffer_pool_size: '{DBInstanceClassMemory*3/4}',
            max_connections: '1000',
            slow_query_log: '1',
            long_query_time: '2',
          },
        });
      });

      test('master credentials are generated into an encrypted secret', () => {
        template.hasResourceProperties('AWS::SecretsManager::Secret', {
          Name: 'platform-aurora-master-dev',
          KmsKeyId: { 'Fn::GetAtt': [Match.stringLikeRegexp('^DatabaseKey'), 'Arn'] },
          GenerateSecretString: Match.objectLike({
            SecretStringTemplate: '{"username":"admin"}',
            GenerateStringKey: 'password',
          }),
        });
      });
    });

    describe('Published Parameters', () => {
      test('should publish 9 parameters', () => {
        template.resourceCountIs('AWS::SSM::Parameter', 9);
        expect(stack.parameters.map((parameter) => parameter.path)).toEqual([
          '/infra/dev/rds/cluster-endpoint',
          '/infra/dev/rds/cluster-port',
          '/infra/dev/rds/cluster-reader-endpoint',
          '/infra/dev/rds/cluster-arn',
          '/infra/dev/rds/database-name',
          '/infra/dev/rds/secret-arn',
          '/infra/dev/rds/kms-key-arn',
          '/infra/dev/rds/subnet-group-name',
          '/infra/dev/rds/parameter-group-name',
        ]);
      });

      test('database name is published as a literal value', () => {
        template.hasResourceProperties('AWS::SSM::Parameter', {
          Name: '/infra/dev/rds/database-name',
          Type: 'String',
          Value: 'appdb',
        });
      });

      test('cluster endpoint resolves from the cluster attributes', () => {
        template.hasResourceProperties('AWS::SSM::Parameter', {
          Name: '/infra/dev/rds/cluster-endpoint',
          Value: { 'Fn::GetAtt': [Match.stringLikeRegexp('^Cluster'), 'Endpoint.Address'] },
        });
      });
    });
  });

  describe('prod', () => {
    let template: Template;

    beforeAll(() => {
      ({ template } = synthDatabaseStack('prod'));
    });

    test('writer and 2 readers spread the cluster over zones', () => {
      template.resourceCountIs('AWS::RDS::DBInstance', 3);
    });

    test('performance insights are enabled on every instance', () => {
      const instances = template.findResources('AWS::RDS::DBInstance');
      for (const instance of Object.values(instances)) {
        expect(instance.Properties.EnablePerformanceInsights).toBe(true);
      }
    });

    test('capacity follows the prod table', () => {
      template.hasResourceProperties('AWS::RDS::DBCluster', {
        ServerlessV2ScalingConfiguration: {
          MinCapacity: 2,
          MaxCapacity: 16,
        },
        BackupRetentionPeriod: 30,
        DeletionProtection: true,
      });
    });

    test('the cluster is snapshotted on removal', () => {
      template.hasResource('AWS::RDS::DBCluster', {
        DeletionPolicy: 'Snapshot',
        UpdateReplacePolicy: 'Snapshot',
      });
    });
  });
});
