/**
 * Configuration types and interfaces for the mapper client.
 * @module config
 */

import type { BatchRetryConfig } from '../batch/index.js';
import type { Logger, LogLevel, MetricsCollector } from '../observability/index.js';
import type { DynamoDBTransport } from '../transport/index.js';

/**
 * Credentials configuration with support for multiple authentication methods.
 */
export type CredentialsConfig =
  | { type: 'static'; accessKeyId: string; secretAccessKey: string; sessionToken?: string }
  | { type: 'profile'; profileName: string }
  | { type: 'role'; roleArn: string; externalId?: string }
  | { type: 'webIdentity'; roleArn: string; tokenFile: string }
  | { type: 'environment' };

/**
 * Main configuration interface for the mapper client.
 */
export interface MapperConfig {
  /**
   * AWS region where DynamoDB is located.
   * @example 'us-east-1', 'eu-west-1'
   */
  region?: string;

  /**
   * Custom endpoint URL.
   * @example 'http://localhost:8000' for DynamoDB Local
   */
  endpoint?: string;

  credentials?: CredentialsConfig;

  /**
   * Request timeout in milliseconds.
   * @default 5000
   */
  timeout?: number;

  /**
   * Resubmission of store-reported unprocessed batch entries. Requests that
   * fail outright are not retried.
   */
  batchRetry?: Partial<BatchRetryConfig>;

  /**
   * Minimum level of the default console logger.
   * @default 'info'
   */
  logLevel?: LogLevel;

  /** Replaces the SDK transport (e.g., MockTransport in tests) */
  transport?: DynamoDBTransport;

  /** Replaces the default console logger */
  logger?: Logger;

  /** Replaces the default in-memory metrics collector */
  metrics?: MetricsCollector;
}

/**
 * Fluent builder for creating MapperConfig objects.
 *
 * @example
 * ```typescript
 * const config = new MapperConfigBuilder()
 *   .withRegion('eu-west-1')
 *   .withEndpoint('http://localhost:8000')
 *   .withBatchRetry({ maxRetries: 5 })
 *   .build();
 * ```
 */
export class MapperConfigBuilder {
  private config: MapperConfig = {};

  withRegion(region: string): this {
    this.config.region = region;
    return this;
  }

  withEndpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  withStaticCredentials(accessKeyId: string, secretAccessKey: string, sessionToken?: string): this {
    this.config.credentials = { type: 'static', accessKeyId, secretAccessKey, sessionToken };
    return this;
  }

  withProfileCredentials(profileName: string): this {
    this.config.credentials = { type: 'profile', profileName };
    return this;
  }

  withRoleCredentials(roleArn: string, externalId?: string): this {
    this.config.credentials = { type: 'role', roleArn, externalId };
    return this;
  }

  withWebIdentityCredentials(roleArn: string, tokenFile: string): this {
    this.config.credentials = { type: 'webIdentity', roleArn, tokenFile };
    return this;
  }

  withEnvironmentCredentials(): this {
    this.config.credentials = { type: 'environment' };
    return this;
  }

  withTimeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  /**
   * Merges into the current batch retry settings.
   */
  withBatchRetry(batchRetry: Partial<BatchRetryConfig>): this {
    this.config.batchRetry = { ...this.config.batchRetry, ...batchRetry };
    return this;
  }

  withLogLevel(logLevel: LogLevel): this {
    this.config.logLevel = logLevel;
    return this;
  }

  withTransport(transport: DynamoDBTransport): this {
    this.config.transport = transport;
    return this;
  }

  withLogger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  withMetrics(metrics: MetricsCollector): this {
    this.config.metrics = metrics;
    return this;
  }

  build(): MapperConfig {
    return { ...this.config };
  }

  /**
   * Creates a builder from an existing config.
   */
  static from(config: MapperConfig): MapperConfigBuilder {
    const builder = new MapperConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}
