import { Environment, EnvironmentConfig } from '@common/parameters/environments';
import { NetworkConfig } from '@common/types/vpc';
import { CommonTags } from '@common/types/common';
import { DatabaseParams } from './database-params';
import { SearchParams } from './search-params';
import { QueueParams } from './queue-params';
import { SecretsParams } from './secrets-params';

/**
 * Complete settings of one deployment environment.
 * Every numeric and boolean setting is spelled out; nothing falls back to a default.
 */
export interface EnvParams extends EnvironmentConfig {
  readonly environment: Environment;

  /**
   * First segment of every resource name: `{namingPrefix}-{resource}-{environment}`
   */
  readonly namingPrefix: string;

  /**
   * First segment of every published parameter path: `/{parameterRoot}/{environment}/{stack}/{key}`
   */
  readonly parameterRoot: string;

  /**
   * Keep stateful resources (key material, log groups, EIPs, domain, database snapshot) on stack deletion
   */
  readonly retainData: boolean;

  readonly terminationProtection: boolean;
  readonly tags: CommonTags;
  readonly network: NetworkConfig;
  readonly database: DatabaseParams;
  readonly search: SearchParams;
  readonly queue: QueueParams;
  readonly secrets: SecretsParams;
}
