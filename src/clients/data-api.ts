/**
 * Data API Client for Polymarket
 * Handles: public trade feed
 */

import { HttpClient } from '../core/http-client.js';
import { ApiType } from '../core/rate-limiter.js';
import { isAfter } from '../core/as-of.js';
import { isRecord } from '../core/normalize.js';
import type { OffsetPage } from '../core/pagination.js';
import { buildPublicTrade } from '../core/records.js';
import type { PublicTrade } from '../core/types.js';

export const DATA_API_BASE = 'https://data-api.polymarket.com';

// ===== Types =====

/**
 * Trades query parameters
 */
export interface TradesParams {
  limit?: number;
  offset?: number;
  /** Only trades where the account was the taker */
  takerOnly?: boolean;
  /** 'CASH' filters by USD value, 'TOKENS' by share count */
  filterType?: 'CASH' | 'TOKENS';
  filterAmount?: number;
  /** Condition IDs, sent comma-separated */
  market?: readonly string[];
  /** Event IDs, sent comma-separated */
  eventId?: readonly (string | number)[];
  user?: string;
  side?: 'BUY' | 'SELL';
}

function joinList(values: readonly (string | number)[] | undefined): string | undefined {
  if (!values || values.length === 0) return undefined;
  return values.map(String).join(',');
}

// ===== Client =====

export class DataApiClient {
  constructor(private http: HttpClient) {}

  /**
   * GET /trades
   *
   * Under as-of, trades without a timestamp or stamped after the instant are
   * dropped.
   *
   * @example
   * ```typescript
   * // Cash trades of at least $500 in one market, both sides
   * const trades = await client.getTrades({
   *   market: [conditionId],
   *   filterType: 'CASH',
   *   filterAmount: 500,
   *   takerOnly: false,
   * });
   * ```
   */
  async getTrades(params: TradesParams = {}, asOf: Date | null = null): Promise<PublicTrade[]> {
    const page = await this.getTradesPage(params, asOf);
    return [...page.items];
  }

  /**
   * One page of /trades, with the number of rows the server sent before
   * as-of filtering. Offset paging must advance on `received`.
   */
  async getTradesPage(params: TradesParams = {}, asOf: Date | null = null): Promise<OffsetPage<PublicTrade>> {
    const data = await this.http.getJson(ApiType.DATA_API, DATA_API_BASE, '/trades', {
      params: {
        limit: params.limit,
        offset: params.offset,
        takerOnly: params.takerOnly,
        filterType: params.filterType,
        filterAmount: params.filterAmount,
        market: joinList(params.market),
        eventId: joinList(params.eventId),
        user: params.user,
        side: params.side,
      },
    });
    if (!Array.isArray(data)) return { items: [], received: 0 };

    const trades: PublicTrade[] = [];
    for (const item of data) {
      if (!isRecord(item)) continue;
      const trade = buildPublicTrade(item);
      if (asOf !== null && (trade.timestamp === null || isAfter(asOf, trade.timestamp))) {
        continue;
      }
      trades.push(trade);
    }
    return { items: trades, received: data.length };
  }
}
