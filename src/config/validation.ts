/**
 * Configuration validation for the mapper client.
 * @module config/validation
 */

import type { BatchRetryConfig } from '../batch/index.js';
import { ConfigurationError } from '../error/index.js';
import type { CredentialsConfig, MapperConfig } from './config.js';

/**
 * Validates mapper configuration.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: MapperConfig): void {
  if (config.region !== undefined) {
    validateRegion(config.region);
  }

  if (config.endpoint !== undefined) {
    validateEndpoint(config.endpoint);
  }

  if (config.credentials !== undefined) {
    validateCredentials(config.credentials);
  }

  if (config.timeout !== undefined) {
    validateTimeout(config.timeout);
  }

  if (config.batchRetry !== undefined) {
    validateBatchRetry(config.batchRetry);
  }
}

function validateRegion(region: string): void {
  if (region.trim().length === 0) {
    throw new ConfigurationError('Region must be a non-empty string');
  }

  // e.g. us-east-1, eu-west-2, us-gov-west-1
  const regionPattern = /^[a-z]{2}(-[a-z]+)+-\d+$/;
  if (!regionPattern.test(region)) {
    throw new ConfigurationError(
      `Invalid region format: ${region}. Expected format like 'us-east-1' or 'eu-west-2'`,
      { region }
    );
  }
}

function validateEndpoint(endpoint: string): void {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ConfigurationError(`Invalid endpoint URL: ${endpoint}`, { endpoint });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError('Endpoint URL must use http: or https: protocol', { endpoint });
  }
}

function requireNonEmpty(value: string, message: string): void {
  if (value.trim().length === 0) {
    throw new ConfigurationError(message);
  }
}

function validateRoleArn(roleArn: string): void {
  if (!roleArn.startsWith('arn:aws:iam::')) {
    throw new ConfigurationError(`Invalid role ARN format: ${roleArn}`);
  }
}

function validateCredentials(credentials: CredentialsConfig): void {
  switch (credentials.type) {
    case 'static':
      requireNonEmpty(credentials.accessKeyId, 'Static credentials require non-empty accessKeyId');
      requireNonEmpty(credentials.secretAccessKey, 'Static credentials require non-empty secretAccessKey');
      break;
    case 'profile':
      requireNonEmpty(credentials.profileName, 'Profile credentials require non-empty profileName');
      break;
    case 'role':
      requireNonEmpty(credentials.roleArn, 'Role credentials require non-empty roleArn');
      validateRoleArn(credentials.roleArn);
      break;
    case 'webIdentity':
      requireNonEmpty(credentials.roleArn, 'Web identity credentials require non-empty roleArn');
      validateRoleArn(credentials.roleArn);
      requireNonEmpty(credentials.tokenFile, 'Web identity credentials require non-empty tokenFile');
      break;
    case 'environment':
      break;
  }
}

function validateTimeout(timeout: number): void {
  if (!Number.isFinite(timeout) || timeout < 0) {
    throw new ConfigurationError('Timeout must be non-negative');
  }
  if (timeout > 300000) {
    throw new ConfigurationError('Timeout must not exceed 300000ms (5 minutes)');
  }
}

function validateBatchRetry(config: Partial<BatchRetryConfig>): void {
  const { maxRetries, baseDelayMs, maxDelayMs } = config;
  if (maxRetries !== undefined && (!Number.isInteger(maxRetries) || maxRetries < 0)) {
    throw new ConfigurationError('Batch maxRetries must be a non-negative integer');
  }
  if (maxRetries !== undefined && maxRetries > 100) {
    throw new ConfigurationError('Batch maxRetries must not exceed 100');
  }
  if (baseDelayMs !== undefined && baseDelayMs < 0) {
    throw new ConfigurationError('Batch baseDelayMs must be non-negative');
  }
  if (maxDelayMs !== undefined && maxDelayMs < 0) {
    throw new ConfigurationError('Batch maxDelayMs must be non-negative');
  }
  if (baseDelayMs !== undefined && maxDelayMs !== undefined && baseDelayMs > maxDelayMs) {
    throw new ConfigurationError('Batch baseDelayMs must not exceed maxDelayMs');
  }
}
