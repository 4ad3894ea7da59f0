/**
 * Stack segments, used in stack names and in published parameter paths
 */
export enum StackName {
  VPC = 'vpc',
  SECRETS = 'secrets',
  DATABASE = 'rds',
  QUEUE = 'sqs',
  SEARCH = 'opensearch',
  ACCESS_CONTROL = 'iam',
}
