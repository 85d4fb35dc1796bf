/**
 * Custom error types for the application
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    // Only capture stack trace if Error.captureStackTrace is available (Node.js)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error related to configuration
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

/**
 * Error related to API calls
 */
export class ApiError extends AppError {
  public status?: number;
  public service: string;
  public endpoint: string;
  public responseData?: unknown;
  public code?: string;     // network error code (ECONNRESET, ...) when no response arrived

  constructor(
    message: string,
    service: string,
    endpoint: string,
    status?: number,
    responseData?: unknown
  ) {
    super(`API Error (${service}/${endpoint}): ${message}`);
    this.status = status;
    this.service = service;
    this.endpoint = endpoint;
    this.responseData = responseData;
  }
}

/**
 * Error returned by the classification oracle
 */
export class OracleApiError extends ApiError {
  constructor(message: string, endpoint: string, status?: number, responseData?: unknown) {
    super(message, 'oracle', endpoint, status, responseData);
  }
}

/**
 * The oracle did not answer within the configured timeout
 */
export class OracleTimeoutError extends OracleApiError {
  constructor(endpoint: string, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, endpoint);
  }
}

/**
 * The oracle rejected our credentials. Fatal: the run aborts.
 */
export class OracleAuthError extends OracleApiError {
  constructor(endpoint: string, status: number) {
    super('Authentication rejected', endpoint, status);
  }
}

/**
 * The oracle reply could not be read. Recovered locally by the parser.
 */
export class OracleMalformedReplyError extends AppError {
  public raw: string;

  constructor(message: string, raw: string) {
    super(`Malformed Oracle Reply: ${message}`);
    this.raw = raw;
  }
}

/**
 * A derived structure broke one of its invariants (overlap, gap, UNKNOWN leak)
 */
export class InvariantViolationError extends AppError {
  public details?: unknown;

  constructor(message: string, details?: unknown) {
    super(`Invariant Violation: ${message}`);
    this.details = details;
  }
}

/**
 * Error related to file operations
 */
export class FileError extends AppError {
  public filePath: string;
  public operation: string;

  constructor(message: string, operation: string, filePath: string) {
    super(`File Error (${operation}): ${message}`);
    this.operation = operation;
    this.filePath = filePath;
  }
}

/**
 * Error related to validation
 */
export class ValidationError extends AppError {
  public data?: unknown;

  constructor(message: string, data?: unknown) {
    super(`Validation Error: ${message}`);
    this.data = data;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Determines if an error is retryable
 * @param error The error to check
 * @returns True if the error is retryable, false otherwise
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof OracleAuthError) {
    return false;
  }

  if (error instanceof OracleTimeoutError) {
    return true;
  }

  // Network errors are generally retryable
  const code = errorCode(error);
  if (code === 'ECONNRESET' ||
      code === 'ETIMEDOUT' ||
      code === 'ECONNABORTED' ||
      code === 'ENETUNREACH' ||
      code === 'ECONNREFUSED') {
    return true;
  }

  // Retry on API rate limit errors
  if (error instanceof ApiError && error.status === 429) {
    return true;
  }

  if (error instanceof ApiError && error.status !== undefined) {
    // 5xx server errors are generally retryable
    if (error.status >= 500 && error.status < 600) {
      return true;
    }

    // Don't retry 4xx client errors (except those above)
    if (error.status >= 400 && error.status < 500) {
      return false;
    }
  }

  // Default to not retrying for other errors
  return false;
}

/**
 * Implements exponential backoff for retrying operations
 * @param attempt Current attempt number (0-indexed)
 * @param baseDelayMs Base delay in milliseconds
 * @param maxDelayMs Maximum delay in milliseconds
 * @returns Delay time in milliseconds
 */
export function getRetryDelayMs(
  attempt: number,
  baseDelayMs = 500,
  maxDelayMs = 30000
): number {
  if (baseDelayMs <= 0) {
    return 0;
  }

  // Exponential backoff with jitter
  const exponentialDelay = Math.min(
    maxDelayMs,
    baseDelayMs * Math.pow(2, attempt)
  );

  // Add jitter (±25%)
  const jitter = exponentialDelay * 0.25 * (Math.random() - 0.5);

  return Math.min(maxDelayMs, Math.max(baseDelayMs, Math.floor(exponentialDelay + jitter)));
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Utility to retry a function with exponential backoff
 * @param fn Function to retry
 * @returns Promise with the function result
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 500,
    maxDelayMs = 30000,
    isRetryable = isRetryableError,
    onRetry,
  } = options;
  let lastError: Error = new Error('withRetry made no attempt');

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < maxRetries && isRetryable(error)) {
        const delay = getRetryDelayMs(attempt, baseDelayMs, maxDelayMs);
        onRetry?.(attempt + 1, lastError, delay);
        if (delay > 0) {
          await new Promise(resolve => setTimeout(resolve, delay));
        }
      } else {
        break;
      }
    }
  }

  throw lastError;
}
