import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import { pascalCase } from 'change-case-commonjs';
import { UnresolvedEnvironmentError } from '@common/errors';
import { ParameterPathRegistry } from '@common/parameter-store/parameter-registry';
import { PublishedParameter } from '@common/parameter-store/publish';
import { EnvParams, StackName } from 'lib/types';
import { ENV_AGNOSTIC_AVAILABILITY_ZONES } from 'lib/constants';
import { resourceName } from 'lib/helpers/naming';
import { VpcStack } from 'lib/stacks/vpc-stack';
import { SecretsStack } from 'lib/stacks/secrets-stack';
import { DatabaseStack } from 'lib/stacks/database-stack';
import { QueueStack } from 'lib/stacks/queue-stack';
import { SearchStack } from 'lib/stacks/search-stack';
import { AccessControlStack } from 'lib/stacks/access-control-stack';

export interface StageProps extends cdk.StageProps {
  readonly params: EnvParams;
}

/**
 * Platform Infrastructure Stage
 *
 * Declares the stacks of one environment in dependency order:
 *
 *   vpc ──┬── rds ────────┐
 *         └── opensearch ─┤
 *   secrets ──────────────┼── iam
 *   sqs ──────────────────┘
 *
 * Each dependent stack receives the outputs of its upstream stacks explicitly.
 */
export class PlatformInfraStage extends cdk.Stage {
  public readonly registry: ParameterPathRegistry;
  public readonly vpcStack: VpcStack;
  public readonly secretsStack: SecretsStack;
  public readonly databaseStack: DatabaseStack;
  public readonly queueStack: QueueStack;
  public readonly searchStack: SearchStack;
  public readonly accessControlStack: AccessControlStack;

  constructor(scope: Construct, id: string, props: StageProps) {
    const params = props.params;
    // Without a concrete account and region the VPC cannot look up the region's zones
    const account = props.env?.account;
    const region = props.env?.region;
    const agnostic =
      account === undefined || region === undefined || cdk.Token.isUnresolved(account) || cdk.Token.isUnresolved(region);
    if (agnostic && params.network.maxAzs > ENV_AGNOSTIC_AVAILABILITY_ZONES) {
      throw new UnresolvedEnvironmentError(params.environment, params.network.maxAzs, ENV_AGNOSTIC_AVAILABILITY_ZONES);
    }
    super(scope, id, props);

    this.registry = new ParameterPathRegistry();

    const common = {
      env: props.env,
      params,
      registry: this.registry,
      terminationProtection: params.terminationProtection,
    };
    const stackId = (name: StackName): string => `${pascalCase(params.namingPrefix)}${pascalCase(name)}`;

    this.vpcStack = new VpcStack(this, stackId(StackName.VPC), {
      ...common,
      stackName: resourceName(params, StackName.VPC),
      description: 'VPC, subnets and security groups',
    });

    this.secretsStack = new SecretsStack(this, stackId(StackName.SECRETS), {
      ...common,
      stackName: resourceName(params, StackName.SECRETS),
      description: 'Application secrets and their encryption key',
    });

    this.databaseStack = new DatabaseStack(this, stackId(StackName.DATABASE), {
      ...common,
      stackName: resourceName(params, StackName.DATABASE),
      description: 'Aurora MySQL Serverless v2 cluster',
      dependencies: { vpc: this.vpcStack.outputs },
    });
    this.databaseStack.addDependency(this.vpcStack);

    this.queueStack = new QueueStack(this, stackId(StackName.QUEUE), {
      ...common,
      stackName: resourceName(params, StackName.QUEUE),
      description: 'SQS queues, dead-letter queues and alarms',
    });

    this.searchStack = new SearchStack(this, stackId(StackName.SEARCH), {
      ...common,
      stackName: resourceName(params, StackName.SEARCH),
      description: 'OpenSearch domain',
      dependencies: { vpc: this.vpcStack.outputs },
    });
    this.searchStack.addDependency(this.vpcStack);

    this.accessControlStack = new AccessControlStack(this, stackId(StackName.ACCESS_CONTROL), {
      ...common,
      stackName: resourceName(params, StackName.ACCESS_CONTROL),
      description: 'IAM roles and policies of the application workloads',
      dependencies: {
        rds: this.databaseStack.outputs,
        secrets: this.secretsStack.outputs,
        sqs: this.queueStack.outputs,
        opensearch: this.searchStack.outputs,
      },
    });
    this.accessControlStack.addDependency(this.databaseStack);
    this.accessControlStack.addDependency(this.secretsStack);
    this.accessControlStack.addDependency(this.queueStack);
    this.accessControlStack.addDependency(this.searchStack);

    // --------------------------------- Tagging  -------------------------------------
    for (const [key, value] of Object.entries(params.tags)) {
      cdk.Tags.of(this).add(key, value);
    }
  }

  /**
   * Every parameter published by the stacks of this stage
   */
  get publishedParameters(): PublishedParameter[] {
    return [
      this.vpcStack,
      this.secretsStack,
      this.databaseStack,
      this.queueStack,
      this.searchStack,
      this.accessControlStack,
    ].flatMap((stack) => stack.parameters);
  }
}
