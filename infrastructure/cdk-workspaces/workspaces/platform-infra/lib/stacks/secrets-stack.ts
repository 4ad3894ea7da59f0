import * as cdk from 'aws-cdk-lib';
import * as kms from 'aws-cdk-lib/aws-kms';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { ParameterStoreOutputs } from '@common/constructs/parameter-store/parameter-store-outputs';
import { PublishedParameter } from '@common/parameter-store/publish';
import { StackName } from 'lib/types';
import {
  DATABASE_MASTER_USERNAME,
  DATABASE_NAME,
  EXCLUDED_PASSWORD_CHARS,
  PASSWORD_LENGTH,
  PORTS,
} from 'lib/constants';
import { resourceName } from 'lib/helpers/naming';
import { PlatformStackProps, removalPolicyFor } from './platform-stack-props';

export type SecretsStackProps = PlatformStackProps;

export type SecretsOutputs = {
  readonly 'rds-credentials-arn': string;
  readonly 'api-keys-arn': string;
  readonly 'app-config-arn': string;
  readonly 'db-connection-strings-arn': string;
  readonly 'secrets-kms-key-arn': string;
  readonly 'rds-credentials-name': string;
  readonly 'api-keys-name': string;
  readonly 'app-config-name': string;
  readonly 'db-connection-strings-name': string;
};

/**
 * Application secrets, encrypted with a dedicated customer managed key
 */
export class SecretsStack extends cdk.Stack {
  public readonly encryptionKey: kms.Key;
  public readonly rdsCredentials: secretsmanager.Secret;
  public readonly apiKeys: secretsmanager.Secret;
  public readonly appConfig: secretsmanager.Secret;
  public readonly dbConnectionStrings: secretsmanager.Secret;
  public readonly outputs: SecretsOutputs;
  public readonly parameters: PublishedParameter[];

  constructor(scope: Construct, id: string, props: SecretsStackProps) {
    super(scope, id, props);

    const params = props.params;
    const removalPolicy = removalPolicyFor(params);

    this.encryptionKey = new kms.Key(this, 'SecretsKey', {
      alias: `alias/${resourceName(params, 'secrets')}`,
      description: `Encryption key for ${params.namingPrefix} secrets (${params.environment})`,
      enableKeyRotation: true,
      removalPolicy,
    });

    this.rdsCredentials = this.createSecret('RdsCredentials', 'rds-credentials', props, {
      description: 'Master credentials of the application database',
      template: { username: DATABASE_MASTER_USERNAME },
      generateStringKey: 'password',
    });

    this.apiKeys = this.createSecret('ApiKeys', 'api-keys', props, {
      description: 'Keys of the external APIs called by the application',
      template: {},
      generateStringKey: 'api_key',
    });

    this.appConfig = this.createSecret('AppConfig', 'app-config', props, {
      description: 'Sensitive application settings',
      template: { environment: params.environment },
      generateStringKey: 'secret_key',
    });

    this.dbConnectionStrings = this.createSecret('DbConnectionStrings', 'db-connection-strings', props, {
      description: 'Connection settings of the application database',
      template: {
        engine: 'mysql',
        username: DATABASE_MASTER_USERNAME,
        port: String(PORTS.MYSQL),
        dbname: DATABASE_NAME,
      },
      generateStringKey: 'password',
    });

    if (params.secrets.enableRotation) {
      this.rdsCredentials.addRotationSchedule('RdsCredentialsRotation', {
        hostedRotation: secretsmanager.HostedRotation.mysqlSingleUser(),
        automaticallyAfter: cdk.Duration.days(params.secrets.rotationDays),
      });
    }

    this.outputs = {
      'rds-credentials-arn': this.rdsCredentials.secretArn,
      'api-keys-arn': this.apiKeys.secretArn,
      'app-config-arn': this.appConfig.secretArn,
      'db-connection-strings-arn': this.dbConnectionStrings.secretArn,
      'secrets-kms-key-arn': this.encryptionKey.keyArn,
      'rds-credentials-name': this.rdsCredentials.secretName,
      'api-keys-name': this.apiKeys.secretName,
      'app-config-name': this.appConfig.secretName,
      'db-connection-strings-name': this.dbConnectionStrings.secretName,
    };

    const store = new ParameterStoreOutputs(this, 'ParameterStoreOutputs', {
      root: params.parameterRoot,
      environment: params.environment,
      stack: StackName.SECRETS,
      outputs: this.outputs,
      registry: props.registry,
    });
    this.parameters = store.published;
  }

  private createSecret(
    id: string,
    name: string,
    props: SecretsStackProps,
    options: { description: string; template: Record<string, string>; generateStringKey: string },
  ): secretsmanager.Secret {
    return new secretsmanager.Secret(this, id, {
      secretName: resourceName(props.params, name),
      description: options.description,
      encryptionKey: this.encryptionKey,
      generateSecretString: {
        secretStringTemplate: JSON.stringify(options.template),
        generateStringKey: options.generateStringKey,
        passwordLength: PASSWORD_LENGTH,
        excludeCharacters: EXCLUDED_PASSWORD_CHARS,
      },
      removalPolicy: removalPolicyFor(props.params),
    });
  }
}
