/**
 * Deployment environments. The set is closed: anything else is rejected
 * before a single construct is declared.
 */
export enum Environment {
  DEVELOPMENT = 'dev',
  STAGING = 'staging',
  PRODUCTION = 'prod',
}

export const ENVIRONMENTS: readonly Environment[] = [
  Environment.DEVELOPMENT,
  Environment.STAGING,
  Environment.PRODUCTION,
];

export function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((environment) => environment === value);
}

export interface EnvironmentConfig {
  readonly region: string;
  /**
   * Expected AWS account. When set, deployments from any other account are aborted.
   */
  readonly accountId?: string;
  readonly tags: Readonly<Record<string, string>>;
}
