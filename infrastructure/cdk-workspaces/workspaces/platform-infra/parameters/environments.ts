import { Environment } from '@common/parameters/environments';
import { EnvParams } from 'lib/types';
import { EnvironmentTable, defineEnvironmentTable, lookupEnvironment } from 'lib/config/environment-table';
import { devParams } from './dev-params';
import { stagingParams } from './staging-params';
import { prodParams } from './prod-params';

export const params: EnvironmentTable = defineEnvironmentTable({
  [Environment.DEVELOPMENT]: devParams,
  [Environment.STAGING]: stagingParams,
  [Environment.PRODUCTION]: prodParams,
});

/**
 * Settings of the named environment
 *
 * @throws UnknownEnvironmentError for any name outside dev, staging and prod
 */
export function resolveEnvironment(name: string, table: EnvironmentTable = params): EnvParams {
  return lookupEnvironment(table, name);
}
