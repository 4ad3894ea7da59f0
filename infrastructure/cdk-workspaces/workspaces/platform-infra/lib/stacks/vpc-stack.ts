import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';
import { VpcConstruct } from '@common/constructs/vpc/vpc';
import { ParameterStoreOutputs } from '@common/constructs/parameter-store/parameter-store-outputs';
import { PublishedParameter } from '@common/parameter-store/publish';
import { EnvParams, StackName } from 'lib/types';
import { PORTS } from 'lib/constants';
import { resourceName } from 'lib/helpers/naming';
import { PlatformStackProps } from './platform-stack-props';

export type VpcStackProps = PlatformStackProps;

export type VpcOutputs = {
  readonly 'vpc-id': string;
  readonly 'public-subnet-ids': string[];
  readonly 'private-subnet-ids': string[];
  readonly 'isolated-subnet-ids': string[];
  readonly 'web-security-group-id': string;
  readonly 'app-security-group-id': string;
  readonly 'db-security-group-id': string;
  readonly 'opensearch-security-group-id': string;
  readonly 'lambda-security-group-id': string;
  readonly 'availability-zones': string[];
};

/**
 * Network foundation: the VPC and the security groups of every tier
 *
 * web     - HTTP/HTTPS from anywhere
 * app     - all TCP from web
 * db      - MySQL from app and lambda, no egress
 * search  - HTTPS from app and lambda
 * lambda  - egress only
 */
export class VpcStack extends cdk.Stack {
  public readonly vpc: ec2.Vpc;
  public readonly webSecurityGroup: ec2.SecurityGroup;
  public readonly appSecurityGroup: ec2.SecurityGroup;
  public readonly dbSecurityGroup: ec2.SecurityGroup;
  public readonly searchSecurityGroup: ec2.SecurityGroup;
  public readonly lambdaSecurityGroup: ec2.SecurityGroup;
  public readonly outputs: VpcOutputs;
  public readonly parameters: PublishedParameter[];

  constructor(scope: Construct, id: string, props: VpcStackProps) {
    super(scope, id, props);

    const params = props.params;

    const network = new VpcConstruct(this, 'Vpc', {
      project: params.namingPrefix,
      environment: params.environment,
      config: params.network,
      retainData: params.retainData,
    });
    this.vpc = network.vpc;

    this.webSecurityGroup = this.createSecurityGroup('WebSecurityGroup', params, 'web', true);
    this.webSecurityGroup.addIngressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(PORTS.HTTP), 'HTTP from the internet');
    this.webSecurityGroup.addIngressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(PORTS.HTTPS), 'HTTPS from the internet');

    this.appSecurityGroup = this.createSecurityGroup('AppSecurityGroup', params, 'app', true);
    this.appSecurityGroup.addIngressRule(this.webSecurityGroup, ec2.Port.allTcp(), 'All TCP from the web tier');

    this.lambdaSecurityGroup = this.createSecurityGroup('LambdaSecurityGroup', params, 'lambda', true);

    this.dbSecurityGroup = this.createSecurityGroup('DbSecurityGroup', params, 'db', false);
    this.dbSecurityGroup.addIngressRule(this.appSecurityGroup, ec2.Port.tcp(PORTS.MYSQL), 'MySQL from the app tier');
    this.dbSecurityGroup.addIngressRule(this.lambdaSecurityGroup, ec2.Port.tcp(PORTS.MYSQL), 'MySQL from Lambda functions');

    this.searchSecurityGroup = this.createSecurityGroup('SearchSecurityGroup', params, 'opensearch', true);
    this.searchSecurityGroup.addIngressRule(this.appSecurityGroup, ec2.Port.tcp(PORTS.HTTPS), 'HTTPS from the app tier');
    this.searchSecurityGroup.addIngressRule(this.lambdaSecurityGroup, ec2.Port.tcp(PORTS.HTTPS), 'HTTPS from Lambda functions');

    this.outputs = {
      'vpc-id': this.vpc.vpcId,
      'public-subnet-ids': this.vpc.publicSubnets.map((subnet) => subnet.subnetId),
      'private-subnet-ids': this.vpc.privateSubnets.map((subnet) => subnet.subnetId),
      'isolated-subnet-ids': this.vpc.isolatedSubnets.map((subnet) => subnet.subnetId),
      'web-security-group-id': this.webSecurityGroup.securityGroupId,
      'app-security-group-id': this.appSecurityGroup.securityGroupId,
      'db-security-group-id': this.dbSecurityGroup.securityGroupId,
      'opensearch-security-group-id': this.searchSecurityGroup.securityGroupId,
      'lambda-security-group-id': this.lambdaSecurityGroup.securityGroupId,
      'availability-zones': this.vpc.availabilityZones,
    };

    const store = new ParameterStoreOutputs(this, 'ParameterStoreOutputs', {
      root: params.parameterRoot,
      environment: params.environment,
      stack: StackName.VPC,
      outputs: this.outputs,
      registry: props.registry,
    });
    this.parameters = store.published;
  }

  private createSecurityGroup(id: string, params: EnvParams, tier: string, allowAllOutbound: boolean): ec2.SecurityGroup {
    return new ec2.SecurityGroup(this, id, {
      vpc: this.vpc,
      securityGroupName: resourceName(params, `${tier}-sg`),
      description: `Security group for the ${tier} tier`,
      allowAllOutbound,
    });
  }
}
