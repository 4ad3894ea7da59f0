export * from './env-params';
export * from './database-params';
export * from './search-params';
export * from './queue-params';
export * from './secrets-params';
export * from './stack-names';
