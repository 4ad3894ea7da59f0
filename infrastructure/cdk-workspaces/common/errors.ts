/**
 * Base class for every error raised while building or reading the infrastructure definition.
 * All of them are fatal to a synthesis pass except ParameterNotFoundError,
 * which is returned to the caller of a runtime lookup.
 */
export class InfraError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InfraError';
  }
}

export class UnknownEnvironmentError extends InfraError {
  constructor(
    public readonly environment: string,
    public readonly available: readonly string[],
  ) {
    super(`Unknown environment: "${environment}". Available environments: ${available.join(', ')}`);
    this.name = 'UnknownEnvironmentError';
  }
}

export class InvalidEnvironmentConfigError extends InfraError {
  constructor(
    public readonly environment: string,
    public readonly issues: readonly string[],
  ) {
    super(`Invalid configuration for environment "${environment}": ${issues.join('; ')}`);
    this.name = 'InvalidEnvironmentConfigError';
  }
}

export class MissingDependencyError extends InfraError {
  constructor(
    public readonly stack: string,
    public readonly upstream: string,
    public readonly missingKeys: readonly string[],
  ) {
    super(`Stack "${stack}" is missing outputs from "${upstream}": ${missingKeys.join(', ')}`);
    this.name = 'MissingDependencyError';
  }
}

export class InsufficientSubnetsError extends InfraError {
  constructor(
    public readonly stack: string,
    public readonly upstream: string,
    public readonly required: number,
    public readonly available: number,
  ) {
    super(`Stack "${stack}" needs ${required} subnets in distinct availability zones but "${upstream}" provides ${available}`);
    this.name = 'InsufficientSubnetsError';
  }
}

export class UnresolvedEnvironmentError extends InfraError {
  constructor(
    public readonly environment: string,
    public readonly requiredZones: number,
    public readonly agnosticZones: number,
  ) {
    super(
      `Environment "${environment}" needs ${requiredZones} availability zones but its account is not resolved, ` +
        `so the VPC would only span ${agnosticZones}. Set CDK_DEFAULT_ACCOUNT or accountId for this environment`,
    );
    this.name = 'UnresolvedEnvironmentError';
  }
}

export class InvalidParameterPathError extends InfraError {
  constructor(
    public readonly segment: string,
    public readonly role: string,
  ) {
    super(`Invalid ${role} segment "${segment}": expected lowercase alphanumerics separated by single hyphens`);
    this.name = 'InvalidParameterPathError';
  }
}

export class InvalidParameterValueError extends InfraError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Invalid value for parameter ${path}: ${reason}`);
    this.name = 'InvalidParameterValueError';
  }
}

export class PathCollisionError extends InfraError {
  constructor(
    public readonly path: string,
    public readonly owner: string,
    public readonly claimant: string,
  ) {
    super(`Parameter path ${path} is already published by ${owner} (claimed again by ${claimant})`);
    this.name = 'PathCollisionError';
  }
}

export class ParameterNotFoundError extends InfraError {
  constructor(public readonly path: string) {
    super(`Parameter not found: ${path}`);
    this.name = 'ParameterNotFoundError';
  }
}

export class DeploymentAbortedError extends InfraError {
  constructor(message: string) {
    super(message);
    this.name = 'DeploymentAbortedError';
  }
}
