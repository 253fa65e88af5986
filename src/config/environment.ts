/**
 * Environment variable loading for mapper configuration.
 * @module config/environment
 */

import { ConfigurationError } from '../error/index.js';
import { isLogLevel } from '../observability/index.js';
import type { CredentialsConfig, MapperConfig } from './config.js';
import { DEFAULT_LOCAL_ENDPOINT, DEFAULT_REGION } from './defaults.js';

export type Environment = Record<string, string | undefined>;

/**
 * Loads mapper configuration from environment variables.
 *
 * Supported environment variables:
 * - AWS_REGION / AWS_DEFAULT_REGION: AWS region
 * - AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_SESSION_TOKEN: static credentials
 * - AWS_PROFILE: profile-based credentials
 * - AWS_ROLE_ARN, AWS_EXTERNAL_ID: role assumption
 * - AWS_WEB_IDENTITY_TOKEN_FILE: web identity token file (with AWS_ROLE_ARN)
 * - DYNAMODB_ENDPOINT: custom endpoint
 * - DYNAMODB_LOCAL: 'true' to use http://localhost:8000
 * - DYNAMODB_TIMEOUT_MS: request timeout
 * - DYNAMODB_BATCH_MAX_RETRIES: resubmissions of unprocessed batch entries
 * - DYNAMODB_LOG_LEVEL: trace, debug, info, warn or error
 *
 * @throws {ConfigurationError} When a numeric or enumerated variable is malformed
 */
export function loadConfigFromEnv(env: Environment = process.env): MapperConfig {
  const config: MapperConfig = {
    region: env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_REGION,
    credentials: loadCredentialsFromEnv(env),
  };

  if (env.DYNAMODB_ENDPOINT) {
    config.endpoint = env.DYNAMODB_ENDPOINT;
  } else if (getEnvBoolean(env, 'DYNAMODB_LOCAL')) {
    config.endpoint = DEFAULT_LOCAL_ENDPOINT;
  }

  const timeout = getEnvNumber(env, 'DYNAMODB_TIMEOUT_MS');
  if (timeout !== undefined) {
    config.timeout = timeout;
  }

  const maxRetries = getEnvNumber(env, 'DYNAMODB_BATCH_MAX_RETRIES');
  if (maxRetries !== undefined) {
    config.batchRetry = { maxRetries };
  }

  const logLevel = env.DYNAMODB_LOG_LEVEL?.toLowerCase();
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(`Invalid DYNAMODB_LOG_LEVEL: ${logLevel}`);
    }
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Loads credentials configuration from environment variables.
 *
 * Priority order:
 * 1. Web Identity (AWS_WEB_IDENTITY_TOKEN_FILE and AWS_ROLE_ARN)
 * 2. Role (AWS_ROLE_ARN)
 * 3. Static credentials (AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY)
 * 4. Profile (AWS_PROFILE)
 * 5. The SDK's default provider chain
 */
function loadCredentialsFromEnv(env: Environment): CredentialsConfig {
  const webIdentityTokenFile = env.AWS_WEB_IDENTITY_TOKEN_FILE;
  const roleArn = env.AWS_ROLE_ARN;

  if (webIdentityTokenFile && roleArn) {
    return { type: 'webIdentity', roleArn, tokenFile: webIdentityTokenFile };
  }

  if (roleArn) {
    return { type: 'role', roleArn, externalId: env.AWS_EXTERNAL_ID };
  }

  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;
  if (accessKeyId && secretAccessKey) {
    return { type: 'static', accessKeyId, secretAccessKey, sessionToken: env.AWS_SESSION_TOKEN };
  }

  if (env.AWS_PROFILE) {
    return { type: 'profile', profileName: env.AWS_PROFILE };
  }

  return { type: 'environment' };
}

/**
 * Gets an environment variable as a non-negative integer.
 *
 * @throws {ConfigurationError} When the variable is set but not an integer
 */
export function getEnvNumber(env: Environment, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError(`${key} must be a non-negative integer, got '${value}'`);
  }

  return parsed;
}

/**
 * Gets an environment variable as a boolean ('true' or '1').
 */
export function getEnvBoolean(env: Environment, key: string, defaultValue = false): boolean {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }

  return value.toLowerCase() === 'true' || value === '1';
}
