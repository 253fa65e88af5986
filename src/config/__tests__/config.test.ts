/**
 * Tests for configuration building, environment loading and validation
 */

import { ConfigurationError } from '../../error/index.js';
import { NoopLogger } from '../../observability/index.js';
import {
  createDefaultBatchRetryConfig,
  getEnvBoolean,
  getEnvNumber,
  loadConfigFromEnv,
  MapperConfigBuilder,
  validateConfig,
} from '../index.js';

describe('MapperConfigBuilder', () => {
  it('should build a config from chained settings', () => {
    const logger = new NoopLogger();
    const config = new MapperConfigBuilder()
      .withRegion('eu-west-1')
      .withEndpoint('http://localhost:8000')
      .withStaticCredentials('test-key', 'test-secret')
      .withTimeout(2000)
      .withLogLevel('debug')
      .withLogger(logger)
      .build();

    expect(config).toEqual({
      region: 'eu-west-1',
      endpoint: 'http://localhost:8000',
      credentials: { type: 'static', accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
      timeout: 2000,
      logLevel: 'debug',
      logger,
    });
  });

  it('should merge batch retry settings', () => {
    const config = new MapperConfigBuilder()
      .withBatchRetry({ maxRetries: 5 })
      .withBatchRetry({ baseDelayMs: 50 })
      .build();

    expect(config.batchRetry).toEqual({ maxRetries: 5, baseDelayMs: 50 });
  });

  it('should start from an existing config without changing it', () => {
    const original = { region: 'us-east-1' };
    const config = MapperConfigBuilder.from(original).withRegion('ap-southeast-2').build();

    expect(config.region).toBe('ap-southeast-2');
    expect(original.region).toBe('us-east-1');
  });

  it('should return a fresh object from each build', () => {
    const builder = new MapperConfigBuilder().withRegion('us-west-2');
    expect(builder.build()).not.toBe(builder.build());
  });
});

describe('loadConfigFromEnv', () => {
  it('should fall back to the default region and environment credentials', () => {
    expect(loadConfigFromEnv({})).toEqual({ region: 'us-east-1', credentials: { type: 'environment' } });
  });

  it('should prefer AWS_REGION over AWS_DEFAULT_REGION', () => {
    expect(loadConfigFromEnv({ AWS_REGION: 'eu-west-2', AWS_DEFAULT_REGION: 'us-west-1' }).region).toBe('eu-west-2');
    expect(loadConfigFromEnv({ AWS_DEFAULT_REGION: 'us-west-1' }).region).toBe('us-west-1');
  });

  it('should pick credentials by priority', () => {
    const roleArn = 'arn:aws:iam::123456789012:role/test';

    expect(
      loadConfigFromEnv({
        AWS_ROLE_ARN: roleArn,
        AWS_WEB_IDENTITY_TOKEN_FILE: '/tmp/token',
        AWS_ACCESS_KEY_ID: 'test-key',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
      }).credentials
    ).toEqual({ type: 'webIdentity', roleArn, tokenFile: '/tmp/token' });

    expect(loadConfigFromEnv({ AWS_ROLE_ARN: roleArn, AWS_EXTERNAL_ID: 'ext' }).credentials).toEqual({
      type: 'role',
      roleArn,
      externalId: 'ext',
    });

    expect(
      loadConfigFromEnv({ AWS_ACCESS_KEY_ID: 'test-key', AWS_SECRET_ACCESS_KEY: 'test-secret', AWS_PROFILE: 'dev' })
        .credentials
    ).toEqual({ type: 'static', accessKeyId: 'test-key', secretAccessKey: 'test-secret' });

    expect(loadConfigFromEnv({ AWS_PROFILE: 'dev' }).credentials).toEqual({ type: 'profile', profileName: 'dev' });
  });

  it('should read endpoint, timeout, retries and log level', () => {
    const config = loadConfigFromEnv({
      DYNAMODB_LOCAL: 'true',
      DYNAMODB_TIMEOUT_MS: '1500',
      DYNAMODB_BATCH_MAX_RETRIES: '0',
      DYNAMODB_LOG_LEVEL: 'WARN',
    });

    expect(config.endpoint).toBe('http://localhost:8000');
    expect(config.timeout).toBe(1500);
    expect(config.batchRetry).toEqual({ maxRetries: 0 });
    expect(config.logLevel).toBe('warn');
  });

  it('should prefer an explicit endpoint over the local flag', () => {
    expect(loadConfigFromEnv({ DYNAMODB_ENDPOINT: 'http://dynamo:8000', DYNAMODB_LOCAL: '1' }).endpoint).toBe(
      'http://dynamo:8000'
    );
  });

  it('should reject malformed values', () => {
    expect(() => loadConfigFromEnv({ DYNAMODB_TIMEOUT_MS: 'soon' })).toThrow(
      "DYNAMODB_TIMEOUT_MS must be a non-negative integer, got 'soon'"
    );
    expect(() => loadConfigFromEnv({ DYNAMODB_LOG_LEVEL: 'loud' })).toThrow('Invalid DYNAMODB_LOG_LEVEL: loud');
  });
});

describe('environment helpers', () => {
  it('should parse numbers', () => {
    expect(getEnvNumber({}, 'N')).toBeUndefined();
    expect(getEnvNumber({ N: '' }, 'N')).toBeUndefined();
    expect(getEnvNumber({ N: '42' }, 'N')).toBe(42);
    expect(() => getEnvNumber({ N: '-1' }, 'N')).toThrow(ConfigurationError);
    expect(() => getEnvNumber({ N: '1.5' }, 'N')).toThrow(ConfigurationError);
  });

  it('should parse booleans', () => {
    expect(getEnvBoolean({}, 'B')).toBe(false);
    expect(getEnvBoolean({}, 'B', true)).toBe(true);
    expect(getEnvBoolean({ B: 'TRUE' }, 'B')).toBe(true);
    expect(getEnvBoolean({ B: '1' }, 'B')).toBe(true);
    expect(getEnvBoolean({ B: 'yes' }, 'B')).toBe(false);
  });
});

describe('validateConfig', () => {
  it('should accept a complete config', () => {
    expect(() =>
      validateConfig({
        region: 'us-gov-west-1',
        endpoint: 'https://dynamodb.us-gov-west-1.amazonaws.com',
        credentials: { type: 'role', roleArn: 'arn:aws:iam::123456789012:role/test' },
        timeout: 300000,
        batchRetry: createDefaultBatchRetryConfig(),
      })
    ).not.toThrow();
  });

  it('should reject a malformed region', () => {
    expect(() => validateConfig({ region: 'useast1' })).toThrow(
      "Invalid region format: useast1. Expected format like 'us-east-1' or 'eu-west-2'"
    );
    expect(() => validateConfig({ region: ' ' })).toThrow('Region must be a non-empty string');
  });

  it('should reject endpoints that are not http URLs', () => {
    expect(() => validateConfig({ endpoint: 'localhost' })).toThrow('Invalid endpoint URL: localhost');
    expect(() => validateConfig({ endpoint: 'ftp://localhost' })).toThrow(
      'Endpoint URL must use http: or https: protocol'
    );
  });

  it('should reject incomplete credentials', () => {
    expect(() =>
      validateConfig({ credentials: { type: 'static', accessKeyId: '', secretAccessKey: 'test-secret' } })
    ).toThrow('Static credentials require non-empty accessKeyId');
    expect(() => validateConfig({ credentials: { type: 'role', roleArn: 'role/test' } })).toThrow(
      'Invalid role ARN format: role/test'
    );
    expect(() =>
      validateConfig({
        credentials: { type: 'webIdentity', roleArn: 'arn:aws:iam::123456789012:role/test', tokenFile: '' },
      })
    ).toThrow('Web identity credentials require non-empty tokenFile');
  });

  it('should bound the timeout', () => {
    expect(() => validateConfig({ timeout: -1 })).toThrow('Timeout must be non-negative');
    expect(() => validateConfig({ timeout: 300001 })).toThrow('Timeout must not exceed 300000ms (5 minutes)');
  });

  it('should reject inconsistent batch retry settings', () => {
    expect(() => validateConfig({ batchRetry: { maxRetries: 2.5 } })).toThrow(
      'Batch maxRetries must be a non-negative integer'
    );
    expect(() => validateConfig({ batchRetry: { maxRetries: 101 } })).toThrow('Batch maxRetries must not exceed 100');
    expect(() => validateConfig({ batchRetry: { baseDelayMs: 500, maxDelayMs: 100 } })).toThrow(
      'Batch baseDelayMs must not exceed maxDelayMs'
    );
  });
});
