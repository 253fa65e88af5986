/**
 * DynamoDB Mapper Client
 *
 * Owns the transport, logger, metrics and batch executor shared by the
 * models it binds.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import type { DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { fromIni, fromTemporaryCredentials, fromTokenFile } from '@aws-sdk/credential-providers';

import type { AttributeMap } from '../attributes/index.js';
import { BatchExecutor } from '../batch/index.js';
import type { CredentialsConfig, MapperConfig } from '../config/index.js';
import { DEFAULT_LOG_LEVEL, DEFAULT_REGION, DEFAULT_TIMEOUT, validateConfig } from '../config/index.js';
import { Model } from '../model/index.js';
import type { ModelDefinition } from '../model/index.js';
import { ConsoleLogger, InMemoryMetricsCollector } from '../observability/index.js';
import type { Logger, MetricsCollector } from '../observability/index.js';
import { SdkTransport } from '../transport/index.js';
import type { DynamoDBTransport } from '../transport/index.js';

/**
 * Credential provider for the SDK client; undefined defers to the SDK's
 * default provider chain.
 */
function resolveCredentials(credentials: CredentialsConfig | undefined): DynamoDBClientConfig['credentials'] {
  if (!credentials) {
    return undefined;
  }

  switch (credentials.type) {
    case 'static':
      return {
        accessKeyId: credentials.accessKeyId,
        secretAccessKey: credentials.secretAccessKey,
        sessionToken: credentials.sessionToken,
      };
    case 'profile':
      return fromIni({ profile: credentials.profileName });
    case 'role':
      return fromTemporaryCredentials({
        params: {
          RoleArn: credentials.roleArn,
          ExternalId: credentials.externalId,
          RoleSessionName: 'dynamodb-model-mapper',
        },
      });
    case 'webIdentity':
      return fromTokenFile({
        roleArn: credentials.roleArn,
        webIdentityTokenFile: credentials.tokenFile,
      });
    case 'environment':
      return undefined;
  }
}

/**
 * Builds the SDK-backed transport for a configuration
 */
export function createSdkTransport(config: MapperConfig): SdkTransport {
  const client = new DynamoDBClient({
    region: config.region ?? DEFAULT_REGION,
    endpoint: config.endpoint,
    credentials: resolveCredentials(config.credentials),
    requestHandler: { requestTimeout: config.timeout ?? DEFAULT_TIMEOUT },
  });
  return new SdkTransport(client);
}

/**
 * Entry point of the mapper: binds model definitions to a DynamoDB transport.
 *
 * @example
 * ```typescript
 * const mapper = new DynamoDBMapper({ region: 'us-east-1' });
 * const threads = mapper.model(Thread);
 * const thread = await threads.get('forum-1', 'Welcome');
 * ```
 */
export class DynamoDBMapper {
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
  private readonly transport: DynamoDBTransport;
  private readonly executor: BatchExecutor;

  /**
   * @throws {ConfigurationError} When the configuration is invalid
   */
  constructor(config: MapperConfig = {}) {
    validateConfig(config);

    this.logger = config.logger ?? new ConsoleLogger(config.logLevel ?? DEFAULT_LOG_LEVEL);
    this.metrics = config.metrics ?? new InMemoryMetricsCollector();
    this.transport = config.transport ?? createSdkTransport(config);
    this.executor = new BatchExecutor(this.transport, {
      retry: config.batchRetry,
      logger: this.logger,
      metrics: this.metrics,
    });

    this.logger.debug('DynamoDB mapper initialized', {
      region: config.region ?? DEFAULT_REGION,
      endpoint: config.endpoint,
      transport: config.transport ? 'custom' : 'sdk',
    });
  }

  /**
   * Binds a model definition to this mapper
   */
  model<A extends AttributeMap>(definition: ModelDefinition<A>): Model<A> {
    return new Model(definition.schema, {
      transport: this.transport,
      executor: this.executor,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  /**
   * Releases the transport's connections
   */
  close(): void {
    this.transport.close();
    this.logger.debug('DynamoDB mapper closed');
  }
}
