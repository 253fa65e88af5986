/**
 * Default configuration values for the mapper client.
 * @module config/defaults
 */

import type { BatchRetryConfig } from '../batch/index.js';
import { DEFAULT_BATCH_RETRY_CONFIG } from '../batch/index.js';
import type { LogLevel } from '../observability/index.js';

/**
 * Default AWS region.
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 5000;

/**
 * Endpoint used when DYNAMODB_LOCAL is set.
 */
export const DEFAULT_LOCAL_ENDPOINT = 'http://localhost:8000';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Creates default batch retry configuration:
 * 3 resubmissions, 100ms first delay, 5s maximum delay.
 */
export function createDefaultBatchRetryConfig(): BatchRetryConfig {
  return { ...DEFAULT_BATCH_RETRY_CONFIG };
}
