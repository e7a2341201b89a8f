/**
 * Unified error handling for the SDK and the services built on it
 */

export enum ErrorCode {
  // Transport errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',

  // Upstream errors
  AUTH_FAILED = 'AUTH_FAILED',
  API_ERROR = 'API_ERROR',
  INVALID_RESPONSE = 'INVALID_RESPONSE',

  // Configuration errors (never retried)
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class SdkError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public retryable: boolean = false,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'SdkError';
  }

  /**
   * Create error from HTTP response status.
   * Every non-2xx status that reaches here is a transport failure the caller may retry.
   */
  static fromHttpError(status: number, body?: unknown): SdkError {
    const bodyMessage =
      body && typeof body === 'object' && 'message' in body
        ? String(body.message)
        : typeof body === 'string'
          ? body
          : '';

    switch (status) {
      case 429:
        return new SdkError(ErrorCode.RATE_LIMITED, bodyMessage || 'Rate limited', true);
      case 401:
        return new SdkError(ErrorCode.AUTH_FAILED, bodyMessage || 'Authentication failed', true);
      case 403:
        return new SdkError(ErrorCode.AUTH_FAILED, bodyMessage || 'Forbidden', true);
      default:
        return new SdkError(
          status >= 500 ? ErrorCode.NETWORK_ERROR : ErrorCode.API_ERROR,
          bodyMessage || `HTTP ${status}`,
          true
        );
    }
  }

  static config(message: string): SdkError {
    return new SdkError(ErrorCode.INVALID_CONFIG, message, false);
  }
}

/**
 * Retry helper for async functions.
 * The SDK never retries on its own; callers wrap the calls they want retried.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: { maxRetries?: number; delay?: number } = {}
): Promise<T> {
  const { maxRetries = 3, delay = 1000 } = options;

  let lastError: unknown;

  for (let i = 0; i < maxRetries; i++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (error instanceof SdkError && !error.retryable) {
        throw error;
      }
      if (i < maxRetries - 1) {
        await new Promise((r) => setTimeout(r, delay * Math.pow(2, i)));
      }
    }
  }

  throw lastError;
}
