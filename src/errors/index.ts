// Base error class for all evidence-engine errors
export class EvidenceEngineError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'EvidenceEngineError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends EvidenceEngineError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for missing credentials or unusable settings
export class ConfigError extends EvidenceEngineError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Non-2xx answer from the search API
export class SearchRequestError extends EvidenceEngineError {
  constructor(message: string, public readonly status: number) {
    super(message, 'SEARCH_REQUEST_ERROR');
    this.name = 'SearchRequestError';
  }

  /** 429 and 5xx are worth one more attempt. */
  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export function isRetryableSearchError(e: unknown): boolean {
  return e instanceof SearchRequestError && e.retryable;
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
