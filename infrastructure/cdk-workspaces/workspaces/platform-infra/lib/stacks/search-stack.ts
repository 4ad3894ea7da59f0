import * as cdk from 'aws-cdk-lib';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as kms from 'aws-cdk-lib/aws-kms';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as opensearch from 'aws-cdk-lib/aws-opensearchservice';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { ParameterStoreOutputs } from '@common/constructs/parameter-store/parameter-store-outputs';
import { PublishedParameter } from '@common/parameter-store/publish';
import { DependencyResolver } from '@common/helpers/dependency-resolver';
import { InsufficientSubnetsError } from '@common/errors';
import { DependencySet } from '@common/types/outputs';
import { SearchParams, StackName } from 'lib/types';
import {
  EXCLUDED_PASSWORD_CHARS,
  OPENSEARCH_ADVANCED_OPTIONS,
  PASSWORD_LENGTH,
  SEARCH_MASTER_USERNAME,
  SEARCH_MAX_AVAILABILITY_ZONES,
} from 'lib/constants';
import { resourceName } from 'lib/helpers/naming';
import { PlatformStackProps, removalPolicyFor } from './platform-stack-props';

export const SEARCH_VPC_KEYS = ['private-subnet-ids', 'opensearch-security-group-id'] as const;

export interface SearchStackProps extends PlatformStackProps {
  readonly dependencies: {
    readonly vpc?: DependencySet<(typeof SEARCH_VPC_KEYS)[number]>;
  };
}

export type SearchOutputs = {
  readonly 'domain-endpoint': string;
  readonly 'domain-arn': string;
  readonly 'domain-name': string;
  readonly 'kms-key-arn': string;
  readonly 'log-group-arn': string;
  readonly 'master-username': string;
  readonly 'security-group-id': string;
  readonly 'master-password-secret-arn': string;
};

/**
 * Number of availability zones the data nodes are spread over
 */
export function searchZoneCount(search: Pick<SearchParams, 'instanceCount'>): number {
  return Math.min(search.instanceCount, SEARCH_MAX_AVAILABILITY_ZONES);
}

/**
 * OpenSearch domain inside the private subnets, with fine-grained access control
 */
export class SearchStack extends cdk.Stack {
  public readonly encryptionKey: kms.Key;
  public readonly logGroup: logs.LogGroup;
  public readonly masterUserSecret: secretsmanager.Secret;
  public readonly domain: opensearch.CfnDomain;
  public readonly outputs: SearchOutputs;
  public readonly parameters: PublishedParameter[];

  constructor(scope: Construct, id: string, props: SearchStackProps) {
    const vpcOutputs = DependencyResolver.resolve(StackName.SEARCH, StackName.VPC, props.dependencies.vpc, SEARCH_VPC_KEYS);
    const zoneCount = searchZoneCount(props.params.search);
    const subnetIds = vpcOutputs.list('private-subnet-ids');
    if (subnetIds.length < zoneCount) {
      throw new InsufficientSubnetsError(StackName.SEARCH, StackName.VPC, zoneCount, subnetIds.length);
    }
    super(scope, id, props);

    const params = props.params;
    const search = params.search;
    const removalPolicy = removalPolicyFor(params);
    const domainName = resourceName(params, 'opensearch');
    const securityGroupId = vpcOutputs.string('opensearch-security-group-id');

    this.encryptionKey = new kms.Key(this, 'SearchKey', {
      alias: `alias/${domainName}`,
      description: `Encryption key for the ${domainName} domain`,
      enableKeyRotation: true,
      removalPolicy,
    });

    this.logGroup = new logs.LogGroup(this, 'ApplicationLogGroup', {
      logGroupName: `/aws/opensearch/${domainName}/application`,
      retention: search.logRetention,
      removalPolicy,
    });
    const logGroupPolicy = new logs.ResourcePolicy(this, 'ApplicationLogGroupPolicy', {
      resourcePolicyName: resourceName(params, 'opensearch-logs'),
      policyStatements: [
        new iam.PolicyStatement({
          principals: [new iam.ServicePrincipal('es.amazonaws.com')],
          actions: ['logs:PutLogEvents', 'logs:CreateLogStream'],
          resources: [this.logGroup.logGroupArn],
        }),
      ],
    });

    this.masterUserSecret = new secretsmanager.Secret(this, 'MasterUserSecret', {
      secretName: resourceName(params, 'opensearch-master'),
      description: `Master user of the ${domainName} domain`,
      encryptionKey: this.encryptionKey,
      generateSecretString: {
        secretStringTemplate: JSON.stringify({ username: SEARCH_MASTER_USERNAME }),
        generateStringKey: 'password',
        passwordLength: PASSWORD_LENGTH,
        excludeCharacters: EXCLUDED_PASSWORD_CHARS,
        requireEachIncludedType: true,
      },
      removalPolicy,
    });

    const zoneAwarenessEnabled = zoneCount > 1;
    const dedicatedMasterEnabled = search.dedicatedMasterCount > 0;

    this.domain = new opensearch.CfnDomain(this, 'Domain', {
      domainName,
      engineVersion: search.engineVersion,
      clusterConfig: {
        instanceType: search.instanceType,
        instanceCount: search.instanceCount,
        zoneAwarenessEnabled,
        zoneAwarenessConfig: zoneAwarenessEnabled ? { availabilityZoneCount: zoneCount } : undefined,
        multiAzWithStandbyEnabled: search.multiAzWithStandby,
        dedicatedMasterEnabled,
        dedicatedMasterCount: dedicatedMasterEnabled ? search.dedicatedMasterCount : undefined,
        dedicatedMasterType: dedicatedMasterEnabled ? search.instanceType : undefined,
      },
      ebsOptions: {
        ebsEnabled: true,
        volumeSize: search.ebsVolumeSize,
        volumeType: 'gp3',
      },
      encryptionAtRestOptions: {
        enabled: true,
        kmsKeyId: this.encryptionKey.keyId,
      },
      nodeToNodeEncryptionOptions: { enabled: true },
      domainEndpointOptions: {
        enforceHttps: true,
        tlsSecurityPolicy: 'Policy-Min-TLS-1-2-2019-07',
      },
      advancedSecurityOptions: {
        enabled: true,
        internalUserDatabaseEnabled: true,
        masterUserOptions: {
          masterUserName: SEARCH_MASTER_USERNAME,
          masterUserPassword: this.masterUserSecret.secretValueFromJson('password').unsafeUnwrap(),
        },
      },
      vpcOptions: {
        subnetIds: subnetIds.slice(0, zoneCount),
        securityGroupIds: [securityGroupId],
      },
      logPublishingOptions: {
        ES_APPLICATION_LOGS: {
          cloudWatchLogsLogGroupArn: this.logGroup.logGroupArn,
          enabled: true,
        },
      },
      advancedOptions: { ...OPENSEARCH_ADVANCED_OPTIONS },
    });
    this.domain.applyRemovalPolicy(removalPolicy);
    this.domain.node.addDependency(logGroupPolicy);

    this.outputs = {
      'domain-endpoint': this.domain.attrDomainEndpoint,
      'domain-arn': this.domain.attrArn,
      'domain-name': domainName,
      'kms-key-arn': this.encryptionKey.keyArn,
      'log-group-arn': this.logGroup.logGroupArn,
      'master-username': SEARCH_MASTER_USERNAME,
      'security-group-id': securityGroupId,
      'master-password-secret-arn': this.masterUserSecret.secretArn,
    };

    const store = new ParameterStoreOutputs(this, 'ParameterStoreOutputs', {
      root: params.parameterRoot,
      environment: params.environment,
      stack: StackName.SEARCH,
      outputs: this.outputs,
      registry: props.registry,
    });
    this.parameters = store.published;
  }
}
