import * as cdk from 'aws-cdk-lib';
import * as ssm from 'aws-cdk-lib/aws-ssm';
import { Construct } from 'constructs';
import { pascalCase } from 'change-case-commonjs';
import { OutputSet } from '../../types/outputs';
import { ParameterPathRegistry } from '../../parameter-store/parameter-registry';
import { ParameterType, PublishedParameter, publish } from '../../parameter-store/publish';

export interface ParameterStoreOutputsProps {
  /**
   * First path segment shared by every stack, e.g. 'infra'
   */
  readonly root: string;
  readonly environment: string;
  /**
   * Stack segment of the path, e.g. 'rds'
   */
  readonly stack: string;
  readonly outputs: OutputSet;
  /**
   * Registry of the enclosing stage; rejects paths already published in this pass
   */
  readonly registry: ParameterPathRegistry;
  /**
   * Optional: Parameter tier (defaults to STANDARD)
   */
  readonly tier?: ssm.ParameterTier;
}

/**
 * Publishes the outputs of a stack to SSM Parameter Store
 *
 * Every output becomes a parameter at `/{root}/{environment}/{stack}/{key}`:
 * scalars as `String`, lists as `StringList`. Scalars are also exported as
 * CloudFormation outputs.
 *
 * @example
 * new ParameterStoreOutputs(this, 'ParameterStoreOutputs', {
 *   root: 'infra',
 *   environment: 'staging',
 *   stack: 'rds',
 *   outputs: { 'cluster-endpoint': cluster.clusterEndpoint.hostname },
 *   registry,
 * });
 * // creates /infra/staging/rds/cluster-endpoint
 */
export class ParameterStoreOutputs extends Construct {
  public readonly published: PublishedParameter[];
  public readonly parameters: ssm.IParameter[];

  constructor(scope: Construct, id: string, props: ParameterStoreOutputsProps) {
    super(scope, id);

    this.published = publish(props.root, props.environment, props.stack, props.outputs);
    props.registry.claim(cdk.Stack.of(this).node.path, this.published);

    const tier = props.tier ?? ssm.ParameterTier.STANDARD;
    this.parameters = this.published.map((parameter) => {
      const suffix = pascalCase(parameter.key);
      const description = `${parameter.key} of the ${props.stack} stack (${props.environment})`;

      if (parameter.type === ParameterType.STRING_LIST) {
        return new ssm.StringListParameter(this, `Parameter${suffix}`, {
          parameterName: parameter.path,
          stringListValue: [...parameter.value],
          description,
          tier,
        });
      }

      new cdk.CfnOutput(this, `${suffix}Output`, {
        value: parameter.value,
        description,
      });
      return new ssm.StringParameter(this, `Parameter${suffix}`, {
        parameterName: parameter.path,
        stringValue: parameter.value,
        description,
        tier,
      });
    });
  }
}
