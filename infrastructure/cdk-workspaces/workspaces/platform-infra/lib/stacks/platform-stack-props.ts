import * as cdk from 'aws-cdk-lib';
import { ParameterPathRegistry } from '@common/parameter-store/parameter-registry';
import { EnvParams } from 'lib/types';

export interface PlatformStackProps extends cdk.StackProps {
  readonly params: EnvParams;
  /**
   * Registry shared by every stack of the stage
   */
  readonly registry: ParameterPathRegistry;
}

export function removalPolicyFor(params: EnvParams): cdk.RemovalPolicy {
  return params.retainData ? cdk.RemovalPolicy.RETAIN : cdk.RemovalPolicy.DESTROY;
}
