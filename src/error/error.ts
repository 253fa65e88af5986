/**
 * Codes carried by mapper errors, one per failure category
 */
export type MapperErrorCode =
  | 'SchemaError'
  | 'ConfigurationError'
  | 'MarshalError'
  | 'UnmarshalError'
  | 'DecodeError'
  | 'BuildError'
  | 'ConditionalCheckFailed'
  | 'VersionConflict'
  | 'BatchIncomplete'
  | 'BatchWriterClosed'
  | 'ItemNotFound'
  | 'IteratorConsumed';

export interface MapperErrorOptions {
  code: MapperErrorCode;
  message: string;
  /** Whether repeating the same call can succeed; false for every category the mapper raises itself */
  isRetryable?: boolean;
  /** Store or SDK error this one was mapped from; also set as `cause` */
  originalError?: Error;
  details?: Record<string, unknown>;
}

/**
 * Base class of every error raised by the mapper. Store errors that are not
 * mapped (throttling, validation, network) reach the caller unwrapped.
 *
 * @example
 * ```typescript
 * try {
 *   await threads.get('forum-1', 'missing');
 * } catch (error) {
 *   if (error instanceof MapperError && error.code === 'ItemNotFound') {
 *     // ...
 *   }
 * }
 * ```
 */
export class MapperError extends Error {
  public readonly code: MapperErrorCode;

  public readonly isRetryable: boolean;

  public readonly originalError?: Error;

  /** Structured context: table, attribute or index names */
  public readonly details?: Record<string, unknown>;

  constructor(options: MapperErrorOptions) {
    super(options.message, options.originalError ? { cause: options.originalError } : undefined);
    this.name = 'MapperError';
    this.code = options.code;
    this.isRetryable = options.isRetryable ?? false;
    this.originalError = options.originalError;
    this.details = options.details;
  }

  /**
   * `[code] message`, flagged when retryable
   */
  toString(): string {
    const flag = this.isRetryable ? ' [retryable]' : '';
    return `[${this.code}] ${this.message}${flag}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      isRetryable: this.isRetryable,
      details: this.details,
      cause: this.originalError?.message,
    };
  }
}
