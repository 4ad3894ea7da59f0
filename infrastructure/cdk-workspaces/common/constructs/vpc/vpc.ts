import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';
import { NetworkConfig, natGatewayCount } from '../../types/vpc';
import { C_RESOURCE } from '../../types/common';

/**
 * VPC Construct Properties
 */
export interface VpcConstructProps {
  readonly project: string;
  readonly environment: string;
  readonly config: NetworkConfig;
  /**
   * Keep the NAT EIPs and the flow log group when the stack is deleted
   */
  readonly retainData: boolean;
}

/**
 * Three-tier VPC Construct
 *
 * - Public subnets holding NAT gateways on explicitly allocated EIPs
 * - Private subnets routed through the NAT gateways
 * - Isolated subnets with no route to the internet
 * - Optional flow logs delivered to a dedicated CloudWatch log group
 *
 * @example
 * new VpcConstruct(this, 'Vpc', {
 *   project: 'platform',
 *   environment: 'dev',
 *   retainData: false,
 *   config: {
 *     cidr: '10.0.0.0/16',
 *     maxAzs: 2,
 *     natStrategy: NatStrategy.SINGLE,
 *     subnetCidrMask: 24,
 *     enableFlowLogs: true,
 *     flowLogRetention: logs.RetentionDays.ONE_MONTH,
 *   },
 * });
 */
export class VpcConstruct extends Construct {
  public readonly vpc: ec2.Vpc;
  public readonly outboundEips: ec2.CfnEIP[];
  public readonly flowLogGroup?: logs.LogGroup;

  constructor(scope: Construct, id: string, props: VpcConstructProps) {
    super(scope, id);

    const config = props.config;
    const vpcName = `${props.project}-vpc-${props.environment}`;
    const removalPolicy = props.retainData ? cdk.RemovalPolicy.RETAIN : cdk.RemovalPolicy.DESTROY;
    const natCount = natGatewayCount(config);

    // Allocate the NAT EIPs up front so their addresses survive a VPC replacement
    this.outboundEips = Array.from({ length: natCount }, (_, index) => {
      const eip = new ec2.CfnEIP(this, `NatGatewayEip${index + 1}`, {
        domain: 'vpc',
        tags: [{ key: 'Name', value: `${props.project}-nat-eip-${props.environment}-${index + 1}` }],
      });
      eip.applyRemovalPolicy(removalPolicy);
      return eip;
    });

    this.vpc = new ec2.Vpc(this, C_RESOURCE, {
      vpcName,
      ipAddresses: ec2.IpAddresses.cidr(config.cidr),
      maxAzs: config.maxAzs,
      natGateways: natCount,
      natGatewayProvider: ec2.NatProvider.gateway({
        eipAllocationIds: this.outboundEips.map((eip) => eip.attrAllocationId),
      }),
      enableDnsHostnames: true,
      enableDnsSupport: true,
      subnetConfiguration: [
        {
          name: 'Public',
          subnetType: ec2.SubnetType.PUBLIC,
          cidrMask: config.subnetCidrMask,
        },
        {
          name: 'Private',
          subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
          cidrMask: config.subnetCidrMask,
        },
        {
          name: 'Isolated',
          subnetType: ec2.SubnetType.PRIVATE_ISOLATED,
          cidrMask: config.subnetCidrMask,
        },
      ],
    });

    if (config.enableFlowLogs) {
      this.flowLogGroup = new logs.LogGroup(this, 'FlowLogGroup', {
        logGroupName: `/aws/vpc/flowlogs/${vpcName}`,
        retention: config.flowLogRetention,
        removalPolicy,
      });
      this.vpc.addFlowLog('FlowLog', {
        destination: ec2.FlowLogDestination.toCloudWatchLogs(this.flowLogGroup),
        trafficType: ec2.FlowLogTrafficType.ALL,
      });
    }
  }
}
