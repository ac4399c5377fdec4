export class SearchBridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SearchBridgeError';
  }
}

export class InvalidQueryError extends SearchBridgeError {
  constructor(message: string) {
    super(message, 'INVALID_QUERY');
    this.name = 'InvalidQueryError';
  }
}

/**
 * Raised when the search provider cannot produce a result set: retries were
 * exhausted or the upstream failure was not retryable.
 */
export class ProviderUnavailableError extends SearchBridgeError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: Error,
    code = 'PROVIDER_UNAVAILABLE',
  ) {
    super(message, code, cause);
    this.name = 'ProviderUnavailableError';
  }
}

/** Malformed provider response. Callers see it as a {@link ProviderUnavailableError}. */
export class ParseError extends ProviderUnavailableError {
  constructor(message: string, attempts: number, cause?: Error) {
    super(message, attempts, cause, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class CacheError extends SearchBridgeError {
  constructor(message: string, cause?: Error) {
    super(message, 'CACHE_ERROR', cause);
    this.name = 'CacheError';
  }
}

export class SchemaValidationError extends SearchBridgeError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends SearchBridgeError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Error code shown to callers. Parse failures are reported as an unavailable provider. */
export function publicErrorCode(error: unknown): string {
  if (error instanceof ProviderUnavailableError) return 'PROVIDER_UNAVAILABLE';
  if (error instanceof SearchBridgeError) return error.code;
  return 'INTERNAL_ERROR';
}
