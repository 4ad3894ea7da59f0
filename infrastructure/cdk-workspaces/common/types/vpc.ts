import * as logs from 'aws-cdk-lib/aws-logs';

export enum NatStrategy {
  /** One NAT gateway shared by every availability zone */
  SINGLE = 'single',
  /** One NAT gateway per availability zone */
  PER_AZ = 'per-az',
}

export interface NetworkConfig {
  /** IPv4 CIDR of the VPC, e.g. 10.0.0.0/16 */
  readonly cidr: string;
  readonly maxAzs: number;
  readonly natStrategy: NatStrategy;
  /** Prefix length of every public, private and isolated subnet */
  readonly subnetCidrMask: number;
  readonly enableFlowLogs: boolean;
  readonly flowLogRetention: logs.RetentionDays;
}

/**
 * Number of NAT gateways a network configuration asks for
 */
export function natGatewayCount(config: Pick<NetworkConfig, 'natStrategy' | 'maxAzs'>): number {
  return config.natStrategy === NatStrategy.PER_AZ ? config.maxAzs : 1;
}
