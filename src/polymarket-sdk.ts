/**
 * PolymarketSDK
 *
 * Read-only facade over the Gamma (metadata), CLOB (prices, order-book
 * trades) and Data (public trades) APIs.
 *
 * With an as-of instant set, the SDK only returns what was knowable at that
 * instant: records created later are hidden, prices come from history
 * bounded by the instant, and fields without a history source are null.
 * Each call reads the instant once and hands it to every nested fetch, so
 * calling `setAsOf` never changes a call already in flight or a record
 * already returned.
 *
 * @example
 * ```typescript
 * const sdk = new PolymarketSDK({ asOf: '2024-06-01' });
 * const events = await sdk.listEvents({ limit: 50, closed: true });
 * const tokens = await sdk.getMarketTokens(events[0].markets?.[0] ?? '');
 * ```
 */

import {
  ClobApiClient,
  type ClobTradesParams,
  type PriceHistoryInterval,
  type PriceHistoryParams,
} from './clients/clob-api.js';
import { DataApiClient, type TradesParams } from './clients/data-api.js';
import { GammaApiClient, type ListEventsParams, type ListMarketsParams } from './clients/gamma-api.js';
import { parseAsOf } from './core/as-of.js';
import { buildL2Headers, loadL2CredentialsFromEnv } from './core/auth.js';
import { getConfig } from './core/config.js';
import { SdkError } from './core/errors.js';
import { HttpClient } from './core/http-client.js';
import { RateLimiter } from './core/rate-limiter.js';
import { toUnixSeconds } from './core/normalize.js';
import type { OffsetPage } from './core/pagination.js';
import type {
  Event,
  L2Credentials,
  Market,
  PricePoint,
  PublicTrade,
  Token,
  Trade,
  TradeSide,
} from './core/types.js';

export interface PolymarketSDKOptions {
  /** Reference instant; anything `parseDateTime` accepts */
  asOf?: unknown;
  l2Credentials?: L2Credentials | null;
  /** Per-request timeout (default: REQUEST_TIMEOUT_MS) */
  timeoutMs?: number;
  rateLimiter?: RateLimiter;
}

export interface GetClobTradesOptions extends ClobTradesParams {
  /** Pre-built headers; skips signing */
  l2Headers?: Record<string, string>;
  /** Overrides the SDK's and the environment's credentials for this call */
  l2Credentials?: L2Credentials;
}

export interface MarketTokensOptions {
  /** Quote one side via /price instead of the midpoint */
  priceSide?: TradeSide;
  priceHistoryStartTs?: number;
  priceHistoryEndTs?: number;
  priceHistoryInterval?: PriceHistoryInterval;
  priceHistoryFidelity?: number;
  /** Fall back to the market's outcomePrices when no price was found (live only, default: true) */
  fallbackToOutcomePrices?: boolean;
}

const CLOB_TRADES_PATH = '/data/trades';

export class PolymarketSDK {
  readonly rateLimiter: RateLimiter;
  readonly gammaApi: GammaApiClient;
  readonly clobApi: ClobApiClient;
  readonly dataApi: DataApiClient;

  private asOf: Date | null;
  private l2Credentials: L2Credentials | null;

  constructor(options: PolymarketSDKOptions = {}) {
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    const http = new HttpClient(this.rateLimiter, {
      timeoutMs: options.timeoutMs ?? getConfig().polymarket.requestTimeoutMs,
    });
    this.clobApi = new ClobApiClient(http);
    this.gammaApi = new GammaApiClient(http, this.clobApi);
    this.dataApi = new DataApiClient(http);

    this.asOf = parseAsOf(options.asOf);
    this.l2Credentials = options.l2Credentials ?? null;
  }

  // ===== Settings =====

  /**
   * Set (or clear, with null) the reference instant. A value that does not
   * parse throws and leaves the current instant in place.
   */
  setAsOf(asOf: unknown): this {
    this.asOf = parseAsOf(asOf);
    return this;
  }

  getAsOf(): Date | null {
    return this.asOf === null ? null : new Date(this.asOf.getTime());
  }

  setL2Credentials(credentials: L2Credentials | null): this {
    this.l2Credentials = credentials;
    return this;
  }

  // ===== Events =====

  async listEvents(params: ListEventsParams = {}): Promise<Event[]> {
    return this.gammaApi.listEvents(params, this.snapshot());
  }

  /**
   * Like listEvents, plus the row count the server sent before as-of
   * filtering, for offset paging.
   */
  async listEventsPage(params: ListEventsParams = {}): Promise<OffsetPage<Event>> {
    return this.gammaApi.listEventsPage(params, this.snapshot());
  }

  async getEventById(id: string, includeMarkets = true): Promise<Event | null> {
    return this.gammaApi.getEventById(id, includeMarkets, this.snapshot());
  }

  /**
   * Alias for getEventById
   */
  async getEvent(id: string, includeMarkets = true): Promise<Event | null> {
    return this.getEventById(id, includeMarkets);
  }

  async getEventBySlug(slug: string, includeMarkets = true): Promise<Event | null> {
    return this.gammaApi.getEventBySlug(slug, includeMarkets, this.snapshot());
  }

  /**
   * Markets of an event; re-fetches the event when its markets were not loaded.
   */
  async getEventMarkets(event: Event | string): Promise<readonly Market[]> {
    if (typeof event !== 'string' && event.markets !== null) {
      return event.markets;
    }
    const id = typeof event === 'string' ? event : event.id;
    const fetched = await this.getEventById(id, true);
    return fetched?.markets ?? [];
  }

  // ===== Markets =====

  async listMarkets(params: ListMarketsParams = {}): Promise<Market[]> {
    return this.gammaApi.listMarkets(params, this.snapshot());
  }

  async getMarketById(id: string): Promise<Market | null> {
    return this.gammaApi.getMarketById(id, this.snapshot());
  }

  /**
   * Alias for getMarketById
   */
  async getMarket(id: string): Promise<Market | null> {
    return this.getMarketById(id);
  }

  async getMarketBySlug(slug: string): Promise<Market | null> {
    return this.gammaApi.getMarketBySlug(slug, this.snapshot());
  }

  // ===== Prices =====

  async getTokenMidpoint(tokenId: string): Promise<number | null> {
    return this.clobApi.getMidpoint(tokenId, this.snapshot());
  }

  async getTokenPrice(tokenId: string, side: TradeSide): Promise<number | null> {
    return this.clobApi.getPrice(tokenId, side, this.snapshot());
  }

  async getPriceHistory(tokenId: string, params: PriceHistoryParams = {}): Promise<PricePoint[]> {
    return this.clobApi.getPriceHistory(tokenId, params, this.snapshot());
  }

  /**
   * Tokens of a market with a price for each.
   *
   * - With as-of set, or any history option given, the price is the last
   *   history point at or before the window end.
   * - Otherwise the side price (with `priceSide`) or the midpoint.
   * - outcomePrices only fill gaps when no as-of instant is set.
   */
  async getMarketTokens(market: Market | string, options: MarketTokensOptions = {}): Promise<Token[]> {
    const asOf = this.snapshot();
    const resolved = typeof market === 'string' ? await this.gammaApi.getMarketById(market, asOf) : market;
    if (resolved === null) return [];

    const useHistory =
      asOf !== null ||
      options.priceHistoryStartTs !== undefined ||
      options.priceHistoryEndTs !== undefined ||
      options.priceHistoryInterval !== undefined ||
      options.priceHistoryFidelity !== undefined;

    let historyEndTs = options.priceHistoryEndTs;
    if (useHistory && historyEndTs === undefined && options.priceHistoryInterval === undefined && asOf !== null) {
      historyEndTs = toUnixSeconds(asOf);
    }
    const historyParams: PriceHistoryParams = {
      startTs: options.priceHistoryStartTs,
      endTs: historyEndTs,
      interval: options.priceHistoryInterval,
      fidelity: options.priceHistoryFidelity,
    };
    const allowFallback = (options.fallbackToOutcomePrices ?? true) && asOf === null;

    return Promise.all(
      resolved.clobTokenIds.map(async (tokenId, idx): Promise<Token> => {
        let price: number | null;
        if (useHistory) {
          const history = await this.clobApi.getPriceHistory(tokenId, historyParams, asOf);
          price = history.length > 0 ? history[history.length - 1].price : null;
        } else if (options.priceSide !== undefined) {
          price = await this.clobApi.getPrice(tokenId, options.priceSide, asOf);
        } else {
          price = await this.clobApi.getMidpoint(tokenId, asOf);
        }

        if (price === null && allowFallback) {
          price = resolved.outcomePrices[idx] ?? null;
        }

        return Object.freeze({ tokenId, outcome: resolved.outcomes[idx] ?? null, price });
      })
    );
  }

  // ===== Trades =====

  /**
   * Public trade feed (Data API).
   */
  async getTrades(params: TradesParams = {}): Promise<PublicTrade[]> {
    return this.dataApi.getTrades(params, this.snapshot());
  }

  /**
   * Like getTrades, plus the row count the server sent before as-of
   * filtering, for offset paging.
   */
  async getTradesPage(params: TradesParams = {}): Promise<OffsetPage<PublicTrade>> {
    return this.dataApi.getTradesPage(params, this.snapshot());
  }

  /**
   * Authenticated order-book trade history (CLOB, L2 headers required).
   * Headers are taken from `l2Headers`, else signed with the call's, the
   * SDK's or the environment's credentials, in that order.
   */
  async getClobTrades(options: GetClobTradesOptions = {}): Promise<Trade[]> {
    const { l2Headers, l2Credentials, ...params } = options;
    const asOf = this.snapshot();

    let headers: Record<string, string>;
    if (l2Headers !== undefined) {
      headers = l2Headers;
    } else {
      const credentials = l2Credentials ?? this.l2Credentials ?? loadL2CredentialsFromEnv();
      if (credentials === null) {
        throw SdkError.config(
          'Missing L2 headers. Set POLY_API_KEY, POLY_API_SECRET, POLY_API_PASSPHRASE, ' +
            'POLY_ADDRESS in .env or pass l2Headers.'
        );
      }
      headers = buildL2Headers(credentials, CLOB_TRADES_PATH);
    }

    return this.clobApi.getTrades(params, headers, asOf);
  }

  private snapshot(): Date | null {
    return this.getAsOf();
  }
}
