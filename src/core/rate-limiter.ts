/**
 * Rate Limiter for upstream APIs
 * - Gamma API: 10 req/s
 * - CLOB API: 10 req/s
 * - Data API: 100ms minimum interval
 * - OpenRouter: 16 concurrent requests
 */

import Bottleneck from 'bottleneck';

export enum ApiType {
  GAMMA_API = 'gamma-api',
  CLOB_API = 'clob-api',
  DATA_API = 'data-api',
  OPENROUTER = 'openrouter',
}

const API_LIMITS: Record<ApiType, Bottleneck.ConstructorOptions> = {
  [ApiType.GAMMA_API]: {
    reservoir: 10,
    reservoirRefreshAmount: 10,
    reservoirRefreshInterval: 1000,
  },
  [ApiType.CLOB_API]: {
    reservoir: 10,
    reservoirRefreshAmount: 10,
    reservoirRefreshInterval: 1000,
  },
  [ApiType.DATA_API]: {
    minTime: 100,
    maxConcurrent: 5,
  },
  [ApiType.OPENROUTER]: {
    maxConcurrent: 16,
  },
};

export class RateLimiter {
  private limiters: Map<ApiType, Bottleneck> = new Map();

  /**
   * @param overrides - Per-API options; an entry replaces that API's defaults entirely
   *   (`{}` means unthrottled)
   */
  constructor(overrides: Partial<Record<ApiType, Bottleneck.ConstructorOptions>> = {}) {
    for (const type of Object.values(ApiType)) {
      this.limiters.set(type, new Bottleneck(overrides[type] ?? API_LIMITS[type]));
    }
  }

  /**
   * Execute a function with rate limiting
   */
  async execute<T>(api: ApiType, fn: () => Promise<T>): Promise<T> {
    const limiter = this.limiters.get(api);
    if (!limiter) throw new Error(`Unknown API type: ${api}`);
    return limiter.schedule(fn);
  }
}

/**
 * Limiter without throttling, for tests and offline replays.
 */
export function createUnthrottledRateLimiter(): RateLimiter {
  return new RateLimiter({
    [ApiType.GAMMA_API]: {},
    [ApiType.CLOB_API]: {},
    [ApiType.DATA_API]: {},
    [ApiType.OPENROUTER]: {},
  });
}
