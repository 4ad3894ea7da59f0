export const PORTS = {
  HTTP: 80,
  HTTPS: 443,
  MYSQL: 3306,
} as const;

export const DATABASE_NAME = 'appdb';
export const DATABASE_MASTER_USERNAME = 'admin';
export const SEARCH_MASTER_USERNAME = 'admin';

export const PASSWORD_LENGTH = 32;

// Characters that break connection strings or shell quoting
export const EXCLUDED_PASSWORD_CHARS = " %+~`#$&*()|[]{}:;<>?!'/\\\"@";

/**
 * Cluster parameter group settings of the Aurora MySQL cluster
 */
export const AURORA_PARAMETERS: Readonly<Record<string, string>> = {
  innodb_buffer_pool_size: '{DBInstanceClassMemory*3/4}',
  max_connections: '1000',
  slow_query_log: '1',
  long_query_time: '2',
};

export const OPENSEARCH_ADVANCED_OPTIONS: Readonly<Record<string, string>> = {
  'rest.action.multi.allow_explicit_index': 'true',
  'indices.fielddata.cache.size': '20',
  'indices.query.bool.max_clause_count': '1024',
};

// Zone awareness spreads data nodes over at most this many zones
export const SEARCH_MAX_AVAILABILITY_ZONES = 3;

// Availability zones CDK assumes for a stack whose account or region is unresolved
export const ENV_AGNOSTIC_AVAILABILITY_ZONES = 2;
