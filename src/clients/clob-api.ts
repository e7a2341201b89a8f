/**
 * CLOB API Client
 * Handles: midpoint, price, price history, authenticated trade history
 *
 * Every method takes the caller's as-of instant; with one set, live prices
 * are replaced by the last history sample at or before it.
 */

import { HttpClient } from '../core/http-client.js';
import { ApiType } from '../core/rate-limiter.js';
import { isAfter } from '../core/as-of.js';
import { isRecord, parseInteger, parseNumber, toUnixSeconds } from '../core/normalize.js';
import { paginateCursor, type CursorPage } from '../core/pagination.js';
import { buildPricePoints, buildTrade } from '../core/records.js';
import type { PricePoint, Trade, TradeSide } from '../core/types.js';

export const CLOB_API_BASE = 'https://clob.polymarket.com';

// ===== Parameter Types =====

export type PriceHistoryInterval = '1h' | '6h' | '1d' | '1w' | '1m' | 'max';

export interface PriceHistoryParams {
  /** Unix seconds */
  startTs?: number;
  /** Unix seconds */
  endTs?: number;
  interval?: PriceHistoryInterval;
  /** Resolution in minutes */
  fidelity?: number;
}

/**
 * Authenticated trade history query.
 *
 * The docs call the maker filter "maker"; official clients send it as
 * "maker_address", so that is the name used here.
 */
export interface ClobTradesParams {
  id?: string;
  makerAddress?: string;
  market?: string;
  assetId?: string;
  /** Unix seconds */
  before?: number | string;
  /** Unix seconds */
  after?: number | string;
  nextCursor?: string;
  onlyFirstPage?: boolean;
  maxPages?: number;
}

const INTERVAL_SECONDS: Partial<Record<PriceHistoryInterval, number>> = {
  '1h': 60 * 60,
  '6h': 6 * 60 * 60,
  '1d': 24 * 60 * 60,
  '1w': 7 * 24 * 60 * 60,
  '1m': 30 * 24 * 60 * 60,
};

/**
 * Clamp a history query to the as-of instant: `endTs` never passes it, and a
 * relative `interval` becomes an absolute window ending at it.
 */
export function clampPriceHistoryParams(
  params: PriceHistoryParams,
  asOf: Date | null
): PriceHistoryParams {
  if (asOf === null) return { ...params };

  const asOfTs = toUnixSeconds(asOf);
  let { startTs, endTs, interval } = params;
  if (endTs === undefined || endTs > asOfTs) {
    endTs = asOfTs;
  }
  if (interval !== undefined) {
    const seconds = INTERVAL_SECONDS[interval];
    interval = undefined;
    if (seconds !== undefined && startTs === undefined) {
      startTs = Math.max(asOfTs - seconds, 0);
    }
  }
  return { startTs, endTs, interval, fidelity: params.fidelity };
}

// ===== Client =====

export class ClobApiClient {
  constructor(private http: HttpClient) {}

  /**
   * GET /prices-history for a token id, clamped to `asOf`, ascending.
   */
  async getPriceHistory(
    tokenId: string,
    params: PriceHistoryParams = {},
    asOf: Date | null = null
  ): Promise<PricePoint[]> {
    const clamped = clampPriceHistoryParams(params, asOf);
    const data = await this.http.getJson(ApiType.CLOB_API, CLOB_API_BASE, '/prices-history', {
      params: {
        market: tokenId,
        startTs: clamped.startTs,
        endTs: clamped.endTs,
        interval: clamped.interval,
        fidelity: clamped.fidelity,
      },
    });
    const history = isRecord(data) ? data.history : null;
    if (!Array.isArray(history) || history.length === 0) return [];
    return buildPricePoints(history, asOf);
  }

  /**
   * Last traded price at or before `asOf`, or null without history.
   */
  async getPriceAsOf(tokenId: string, asOf: Date, params: PriceHistoryParams = {}): Promise<number | null> {
    const history = await this.getPriceHistory(tokenId, params, asOf);
    return history.length > 0 ? history[history.length - 1].price : null;
  }

  /**
   * GET /midpoint. Under as-of, the last history price instead.
   */
  async getMidpoint(tokenId: string, asOf: Date | null = null): Promise<number | null> {
    if (asOf !== null) return this.getPriceAsOf(tokenId, asOf);
    const data = await this.http.getJson(ApiType.CLOB_API, CLOB_API_BASE, '/midpoint', {
      params: { token_id: tokenId },
    });
    return isRecord(data) ? parseNumber(data.mid) : null;
  }

  /**
   * GET /price for one side. Under as-of, the last history price instead.
   */
  async getPrice(tokenId: string, side: TradeSide, asOf: Date | null = null): Promise<number | null> {
    if (asOf !== null) return this.getPriceAsOf(tokenId, asOf);
    const data = await this.http.getJson(ApiType.CLOB_API, CLOB_API_BASE, '/price', {
      params: { token_id: tokenId, side },
    });
    return isRecord(data) ? parseNumber(data.price) : null;
  }

  /**
   * GET /data/trades (L2 auth), following cursors.
   *
   * Under as-of, `before` is clamped to the instant, an `after` beyond it
   * returns nothing, and trades matched (or, lacking a match time, updated)
   * after it are dropped.
   */
  async getTrades(
    params: ClobTradesParams,
    headers: Record<string, string>,
    asOf: Date | null = null
  ): Promise<Trade[]> {
    let before = parseInteger(params.before);
    const after = parseInteger(params.after);
    if (asOf !== null) {
      const asOfTs = toUnixSeconds(asOf);
      if (after !== null && after > asOfTs) return [];
      if (before === null || before > asOfTs) before = asOfTs;
    }

    const query = {
      id: params.id,
      maker_address: params.makerAddress,
      market: params.market,
      asset_id: params.assetId,
      before,
      after,
    };

    const fetchPage = async (cursor: string): Promise<CursorPage<Trade> | null> => {
      const data = await this.http.getJson(ApiType.CLOB_API, CLOB_API_BASE, '/data/trades', {
        params: { ...query, next_cursor: cursor },
        headers,
      });

      let rawTrades: unknown[];
      let nextCursor: string | null;
      if (Array.isArray(data)) {
        rawTrades = data;
        nextCursor = null;
      } else if (isRecord(data)) {
        rawTrades = Array.isArray(data.data) ? data.data : [];
        nextCursor = typeof data.next_cursor === 'string' ? data.next_cursor : null;
      } else {
        return null;
      }

      const items = rawTrades
        .filter(isRecord)
        .map((item) => buildTrade(item, asOf))
        .filter((trade) => !isAfter(asOf, trade.matchTime ?? trade.lastUpdate));
      return { items, nextCursor, received: rawTrades.length };
    };

    return paginateCursor(fetchPage, {
      initialCursor: params.nextCursor,
      maxPages: params.onlyFirstPage ? 1 : params.maxPages,
    });
  }
}
