/**
 * Configuration module for the mapper client.
 * @module config
 */

export { MapperConfigBuilder } from './config.js';
export type { MapperConfig, CredentialsConfig } from './config.js';
export {
  DEFAULT_REGION,
  DEFAULT_TIMEOUT,
  DEFAULT_LOCAL_ENDPOINT,
  DEFAULT_LOG_LEVEL,
  createDefaultBatchRetryConfig,
} from './defaults.js';
export { loadConfigFromEnv, getEnvNumber, getEnvBoolean } from './environment.js';
export type { Environment } from './environment.js';
export { validateConfig } from './validation.js';
