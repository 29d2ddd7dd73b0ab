/**
 * Custom Error Classes for the enrichment engine
 * Provides structured error handling with context
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Input errors
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

export class InvalidCsvError extends ValidationError {
  constructor(reason: string) {
    super(`Invalid company CSV: ${reason}`, { reason });
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
  }
}

// Network errors
export class FetchError extends AppError {
  constructor(url: string, originalError?: Error) {
    super(
      `Failed to fetch ${url}: ${originalError?.message || 'Unknown error'}`,
      'FETCH_ERROR',
      { url, originalError: originalError?.message }
    );
  }
}

export class FetchTimeoutError extends AppError {
  constructor(url: string, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms: ${url}`, 'FETCH_TIMEOUT', { url, timeoutMs });
  }
}

// External collaborator errors
export class SearchProviderError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SEARCH_PROVIDER_ERROR', context);
  }
}

export class VerificationError extends AppError {
  constructor(candidateUrl: string, originalError?: Error) {
    super(
      `Verification failed for ${candidateUrl}: ${originalError?.message || 'Unknown error'}`,
      'VERIFICATION_ERROR',
      { candidateUrl, originalError: originalError?.message }
    );
  }
}

/**
 * Utility: Safe error message extraction
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Utility: Check if error came from the network layer
 */
export function isNetworkError(error: unknown): boolean {
  if (error instanceof FetchError || error instanceof FetchTimeoutError) return true;

  if (error instanceof Error) {
    const networkPatterns = [
      'ECONNRESET',
      'ETIMEDOUT',
      'ECONNREFUSED',
      'ENOTFOUND',
      'socket hang up',
      'fetch failed',
    ];
    return networkPatterns.some(pattern =>
      error.message.toLowerCase().includes(pattern.toLowerCase())
    );
  }

  return false;
}
