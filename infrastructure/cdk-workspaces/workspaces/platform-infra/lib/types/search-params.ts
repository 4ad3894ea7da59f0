import * as logs from 'aws-cdk-lib/aws-logs';

/**
 * OpenSearch Domain Parameters
 */
export interface SearchParams {
  /**
   * Engine version string as accepted by the service, e.g. OpenSearch_2.11
   */
  readonly engineVersion: string;

  /**
   * Data node instance type, e.g. r6g.large.search
   */
  readonly instanceType: string;

  /**
   * Number of data nodes. Zone awareness is enabled when greater than 1,
   * spreading the nodes over at most 3 availability zones.
   */
  readonly instanceCount: number;

  /**
   * gp3 volume size per data node (GiB)
   */
  readonly ebsVolumeSize: number;

  /**
   * Dedicated master nodes of the same instance type as the data nodes: 0, 3 or 5
   */
  readonly dedicatedMasterCount: number;

  /**
   * Multi-AZ with standby. Requires a node count that is a multiple of 3
   * and three dedicated master nodes.
   */
  readonly multiAzWithStandby: boolean;

  readonly logRetention: logs.RetentionDays;
}
