import { Environment } from '@common/parameters/environments';
import { InvalidEnvironmentConfigError, UnknownEnvironmentError } from '@common/errors';
import { NatStrategy } from '@common/types/vpc';
import { params, resolveEnvironment } from 'parameters/environments';
import { devParams } from 'parameters/dev-params';
import { stagingParams } from 'parameters/staging-params';
import { prodParams } from 'parameters/prod-params';
import { defineEnvironmentTable, validateEnvParams } from 'lib/config/environment-table';
import { EnvParams } from 'lib/types';

function leafValues(value: unknown, path = ''): Array<[string, unknown]> {
  if (typeof value === 'object' && value !== null) {
    return Object.entries(value).flatMap(([key, nested]) => leafValues(nested, path ? `${path}.${key}` : key));
  }
  return [[path, value]];
}

describe('Environment configuration', () => {
  describe('resolveEnvironment', () => {
    test('dev database settings match the environment table', () => {
      const database = resolveEnvironment('dev').database;
      expect(database.minCapacity).toBe(0.5);
      expect(database.maxCapacity).toBe(2);
      expect(database.backupRetentionDays).toBe(7);
      expect(database.deletionProtection).toBe(false);
    });

    test('prod database settings match the environment table', () => {
      const database = resolveEnvironment('prod').database;
      expect(database.minCapacity).toBe(2);
      expect(database.maxCapacity).toBe(16);
      expect(database.backupRetentionDays).toBe(30);
      expect(database.deletionProtection).toBe(true);
    });

    test('staging sits between dev and prod', () => {
      const staging = resolveEnvironment('staging');
      expect(staging.database.minCapacity).toBe(1);
      expect(staging.database.maxCapacity).toBe(8);
      expect(staging.network.natStrategy).toBe(NatStrategy.PER_AZ);
      expect(staging.search.instanceCount).toBe(2);
    });

    test('rejects an unknown environment name', () => {
      expect(() => resolveEnvironment('qa')).toThrow(UnknownEnvironmentError);
      expect(() => resolveEnvironment('qa')).toThrow(
        'Unknown environment: "qa". Available environments: dev, staging, prod',
      );
    });

    test('environment names are case-sensitive', () => {
      expect(() => resolveEnvironment('DEV')).toThrow(UnknownEnvironmentError);
    });

    test('returns the same record for the same name', () => {
      expect(resolveEnvironment('staging')).toBe(resolveEnvironment('staging'));
      expect(resolveEnvironment('staging')).toBe(params[Environment.STAGING]);
    });

    test('resolved records cannot be modified', () => {
      const dev = resolveEnvironment('dev');
      expect(Object.isFrozen(dev)).toBe(true);
      expect(Object.isFrozen(dev.database)).toBe(true);
      expect(Object.isFrozen(dev.tags)).toBe(true);
    });
  });

  describe('environment table', () => {
    test.each([Environment.DEVELOPMENT, Environment.STAGING, Environment.PRODUCTION])(
      '%s defines every setting explicitly',
      (environment) => {
        const undefinedSettings = leafValues(params[environment]).filter(
          ([, value]) => value === undefined || value === null,
        );
        expect(undefinedSettings).toEqual([]);
      },
    );

    test('every entry is keyed by its own environment', () => {
      expect(params[Environment.DEVELOPMENT].environment).toBe('dev');
      expect(params[Environment.STAGING].environment).toBe('staging');
      expect(params[Environment.PRODUCTION].environment).toBe('prod');
    });

    test('only production is termination-protected', () => {
      expect(params[Environment.DEVELOPMENT].terminationProtection).toBe(false);
      expect(params[Environment.STAGING].terminationProtection).toBe(false);
      expect(params[Environment.PRODUCTION].terminationProtection).toBe(true);
    });
  });

  describe('validation', () => {
    const withDatabase = (database: Partial<EnvParams['database']>): EnvParams => ({
      ...devParams,
      database: { ...devParams.database, ...database },
    });

    test('accepts the shipped environments', () => {
      expect(() => validateEnvParams(Environment.DEVELOPMENT, devParams)).not.toThrow();
      expect(() => validateEnvParams(Environment.STAGING, stagingParams)).not.toThrow();
      expect(() => validateEnvParams(Environment.PRODUCTION, prodParams)).not.toThrow();
    });

    test('rejects a capacity range whose minimum exceeds its maximum', () => {
      expect(() => validateEnvParams(Environment.DEVELOPMENT, withDatabase({ minCapacity: 4, maxCapacity: 2 }))).toThrow(
        'Invalid configuration for environment "dev": database.maxCapacity: must not be lower than minCapacity',
      );
    });

    test('rejects capacities that are not multiples of 0.5', () => {
      expect(() => validateEnvParams(Environment.DEVELOPMENT, withDatabase({ minCapacity: 0.75 }))).toThrow(
        InvalidEnvironmentConfigError,
      );
    });

    test('rejects multi-AZ without readers', () => {
      expect(() => validateEnvParams(Environment.DEVELOPMENT, withDatabase({ multiAz: true, readerCount: 0 }))).toThrow(
        'database.readerCount: must be at least 1 when multiAz is enabled and 0 otherwise',
      );
    });

    test('rejects an entry stored under another environment', () => {
      expect(() => validateEnvParams(Environment.PRODUCTION, devParams)).toThrow(
        'Invalid configuration for environment "prod": environment: expected "prod", got "dev"',
      );
    });

    test('rejects a naming prefix that makes the search domain name too long', () => {
      const candidate: EnvParams = { ...devParams, namingPrefix: 'enterprise-platform' };
      expect(() => validateEnvParams(Environment.DEVELOPMENT, candidate)).toThrow(
        'namingPrefix: gives an OpenSearch domain name longer than 28 characters',
      );
    });

    test('rejects a parameter root that is not a valid path segment', () => {
      const candidate: EnvParams = { ...devParams, parameterRoot: 'Infra/Shared' };
      expect(() => validateEnvParams(Environment.DEVELOPMENT, candidate)).toThrow(
        'parameterRoot: must be lowercase alphanumerics separated by single hyphens',
      );
    });

    test('rejects multi-AZ with standby on a node count that is not a multiple of 3', () => {
      const candidate: EnvParams = { ...prodParams, search: { ...prodParams.search, instanceCount: 4 } };
      expect(() => validateEnvParams(Environment.PRODUCTION, candidate)).toThrow(
        'search.instanceCount: must be a multiple of 3 when multiAzWithStandby is enabled',
      );
    });

    test('rejects an Environment tag that names another environment', () => {
      const candidate: EnvParams = { ...prodParams, tags: { ...prodParams.tags, Environment: 'staging' } };
      expect(() => validateEnvParams(Environment.PRODUCTION, candidate)).toThrow(
        'Invalid configuration for environment "prod": tags.Environment: must match environment',
      );
    });

    test('defineEnvironmentTable reports the failing environment', () => {
      expect(() =>
        defineEnvironmentTable({
          [Environment.DEVELOPMENT]: devParams,
          [Environment.STAGING]: { ...stagingParams, queue: { ...stagingParams.queue, maxReceiveCount: 0 } },
          [Environment.PRODUCTION]: prodParams,
        }),
      ).toThrow('Invalid configuration for environment "staging": queue.maxReceiveCount:');
    });
  });
});
