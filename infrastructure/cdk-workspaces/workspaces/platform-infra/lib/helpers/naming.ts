import { EnvParams } from 'lib/types';

/**
 * `{prefix}-{resource}-{environment}`, e.g. `platform-main-queue-dev`
 */
export function resourceName(params: Pick<EnvParams, 'namingPrefix' | 'environment'>, resource: string): string {
  return `${params.namingPrefix}-${resource}-${params.environment}`;
}
