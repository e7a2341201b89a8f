/**
 * GET-only JSON client shared by the API clients
 *
 * - 400 and 404 are an empty result (`null`), not an error
 * - any other non-2xx raises a retryable SdkError
 * - every call is bounded by a fixed timeout and scheduled on the API's limiter
 */

import { ErrorCode, SdkError } from './errors.js';
import { ApiType, RateLimiter } from './rate-limiter.js';

export const DEFAULT_TIMEOUT_MS = 20_000;

export type QueryScalar = string | number | boolean | null | undefined;
export type QueryValue = QueryScalar | readonly (string | number)[];
export type QueryParams = Record<string, QueryValue>;

export interface GetOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
}

export interface HttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Serialize query params, omitting null/undefined values and empty arrays.
 * Arrays repeat the key.
 */
export function buildQuery(params: QueryParams = {}): URLSearchParams {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    if (Array.isArray(value)) {
      value.forEach((item) => query.append(key, String(item)));
    } else {
      query.set(key, String(value));
    }
  }
  return query;
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export class HttpClient {
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(
    private rateLimiter: RateLimiter,
    options: HttpClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? 'polymarket-insider-scan/1.0';
  }

  /**
   * GET `base/path` and decode the JSON body.
   * Resolves to `null` for 400/404.
   */
  async getJson(api: ApiType, base: string, path: string, options: GetOptions = {}): Promise<unknown> {
    const query = buildQuery(options.params).toString();
    const url = `${joinUrl(base, path)}${query ? `?${query}` : ''}`;

    return this.rateLimiter.execute(api, async () => {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers: {
            Accept: 'application/json',
            'User-Agent': this.userAgent,
            ...options.headers,
          },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (error) {
        throw toTransportError(error, path, this.timeoutMs);
      }

      if (response.status === 400 || response.status === 404) {
        return null;
      }
      if (!response.ok) {
        throw SdkError.fromHttpError(
          response.status,
          await response.json().catch(() => null)
        );
      }

      try {
        const data: unknown = await response.json();
        return data;
      } catch (error) {
        throw new SdkError(
          ErrorCode.INVALID_RESPONSE,
          `Invalid JSON from ${path}`,
          false,
          error instanceof Error ? error : undefined
        );
      }
    });
  }
}

function toTransportError(error: unknown, path: string, timeoutMs: number): SdkError {
  const cause = error instanceof Error ? error : undefined;
  if (cause && (cause.name === 'TimeoutError' || cause.name === 'AbortError')) {
    return new SdkError(ErrorCode.TIMEOUT, `Request to ${path} timed out after ${timeoutMs}ms`, true, cause);
  }
  return new SdkError(
    ErrorCode.NETWORK_ERROR,
    `Request to ${path} failed: ${cause?.message ?? String(error)}`,
    true,
    cause
  );
}
