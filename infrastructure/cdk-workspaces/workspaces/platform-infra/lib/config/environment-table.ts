import { ENVIRONMENTS, Environment, isEnvironment } from '@common/parameters/environments';
import { InvalidEnvironmentConfigError, UnknownEnvironmentError } from '@common/errors';
import { EnvParams } from 'lib/types';
import { envParamsSchema } from './env-params-schema';

export type EnvironmentTable = Readonly<Record<Environment, EnvParams>>;

/**
 * Validates one entry of the environment table.
 *
 * @throws InvalidEnvironmentConfigError listing every offending field
 */
export function validateEnvParams(environment: Environment, params: EnvParams): void {
  const issues: string[] = [];
  if (params.environment !== environment) {
    issues.push(`environment: expected "${environment}", got "${params.environment}"`);
  }
  const result = envParamsSchema.safeParse(params);
  if (!result.success) {
    issues.push(...result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }
  if (issues.length > 0) {
    throw new InvalidEnvironmentConfigError(environment, issues);
  }
}

/**
 * Validates every entry and returns the table deep-frozen, so the records
 * handed to stacks can no longer change.
 */
export function defineEnvironmentTable(entries: Record<Environment, EnvParams>): EnvironmentTable {
  for (const environment of ENVIRONMENTS) {
    validateEnvParams(environment, entries[environment]);
  }
  return deepFreeze({ ...entries });
}

/**
 * Looks up the settings of a named environment. Names are case-sensitive.
 *
 * @throws UnknownEnvironmentError when `name` is not a deployment environment
 */
export function lookupEnvironment(table: EnvironmentTable, name: string): EnvParams {
  if (!isEnvironment(name)) {
    throw new UnknownEnvironmentError(name, ENVIRONMENTS);
  }
  return table[name];
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  Object.freeze(value);
  return value;
}
