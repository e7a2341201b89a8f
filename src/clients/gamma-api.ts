/**
 * Gamma API Client for Polymarket
 * Handles: events and markets metadata
 *
 * Listings drop records created after the caller's as-of instant and single
 * fetches return null for them. Market prices under as-of come from CLOB
 * price history bounded by the same instant.
 */

import { HttpClient, type QueryParams } from '../core/http-client.js';
import { ApiType } from '../core/rate-limiter.js';
import {
  EVENT_VISIBILITY_KEYS,
  MARKET_VISIBILITY_KEYS,
  filterVisible,
  isVisible,
} from '../core/as-of.js';
import { isRecord, parseJsonList } from '../core/normalize.js';
import type { OffsetPage } from '../core/pagination.js';
import { buildEvent, buildMarket } from '../core/records.js';
import type { Event, Market, RawRecord } from '../core/types.js';

export const GAMMA_API_BASE = 'https://gamma-api.polymarket.com';

// ===== Parameter Types =====

/**
 * Event listing parameters
 * @see https://docs.polymarket.com/api-reference/events/list-events
 */
export interface ListEventsParams {
  limit?: number;
  offset?: number;
  order?: string;
  ascending?: boolean;
  id?: readonly string[];
  tagId?: number;
  excludeTagId?: readonly number[];
  slug?: readonly string[];
  tagSlug?: string;
  relatedTags?: boolean;
  active?: boolean;
  archived?: boolean;
  featured?: boolean;
  cyom?: boolean;
  includeChat?: boolean;
  includeTemplate?: boolean;
  recurrence?: string;
  closed?: boolean;
  liquidityMin?: number;
  liquidityMax?: number;
  volumeMin?: number;
  volumeMax?: number;
  startDateMin?: string;
  startDateMax?: string;
  endDateMin?: string;
  endDateMax?: string;
  /** Parse embedded markets (default: true) */
  includeMarkets?: boolean;
}

/**
 * Market listing parameters
 * @see https://docs.polymarket.com/api-reference/markets/list-markets
 */
export interface ListMarketsParams {
  limit?: number;
  offset?: number;
  order?: string;
  ascending?: boolean;
  id?: readonly string[];
  slug?: readonly string[];
  clobTokenIds?: readonly string[];
  conditionIds?: readonly string[];
  marketMakerAddress?: readonly string[];
  liquidityNumMin?: number;
  liquidityNumMax?: number;
  volumeNumMin?: number;
  volumeNumMax?: number;
  startDateMin?: string;
  startDateMax?: string;
  endDateMin?: string;
  endDateMax?: string;
  tagId?: number;
  relatedTags?: boolean;
  cyom?: boolean;
  umaResolutionStatus?: string;
  gameId?: string;
  sportsMarketTypes?: readonly string[];
  rewardsMinSize?: number;
  questionIds?: readonly string[];
  includeTag?: boolean;
  closed?: boolean;
}

/**
 * Source of the last price at or before an instant, per token.
 */
export interface HistoricalPriceSource {
  getPriceAsOf(tokenId: string, asOf: Date): Promise<number | null>;
}

function eventQuery(params: ListEventsParams): QueryParams {
  return {
    limit: params.limit,
    offset: params.offset,
    order: params.order,
    ascending: params.ascending,
    id: params.id,
    tag_id: params.tagId,
    exclude_tag_id: params.excludeTagId,
    slug: params.slug,
    tag_slug: params.tagSlug,
    related_tags: params.relatedTags,
    active: params.active,
    archived: params.archived,
    featured: params.featured,
    cyom: params.cyom,
    include_chat: params.includeChat,
    include_template: params.includeTemplate,
    recurrence: params.recurrence,
    closed: params.closed,
    liquidity_min: params.liquidityMin,
    liquidity_max: params.liquidityMax,
    volume_min: params.volumeMin,
    volume_max: params.volumeMax,
    start_date_min: params.startDateMin,
    start_date_max: params.startDateMax,
    end_date_min: params.endDateMin,
    end_date_max: params.endDateMax,
  };
}

function marketQuery(params: ListMarketsParams): QueryParams {
  return {
    limit: params.limit,
    offset: params.offset,
    order: params.order,
    ascending: params.ascending,
    id: params.id,
    slug: params.slug,
    clob_token_ids: params.clobTokenIds,
    condition_ids: params.conditionIds,
    market_maker_address: params.marketMakerAddress,
    liquidity_num_min: params.liquidityNumMin,
    liquidity_num_max: params.liquidityNumMax,
    volume_num_min: params.volumeNumMin,
    volume_num_max: params.volumeNumMax,
    start_date_min: params.startDateMin,
    start_date_max: params.startDateMax,
    end_date_min: params.endDateMin,
    end_date_max: params.endDateMax,
    tag_id: params.tagId,
    related_tags: params.relatedTags,
    cyom: params.cyom,
    uma_resolution_status: params.umaResolutionStatus,
    game_id: params.gameId,
    sports_market_types: params.sportsMarketTypes,
    rewards_min_size: params.rewardsMinSize,
    question_ids: params.questionIds,
    include_tag: params.includeTag,
    closed: params.closed,
  };
}

// ===== Client =====

export class GammaApiClient {
  constructor(
    private http: HttpClient,
    private prices: HistoricalPriceSource
  ) {}

  // ===== Events =====

  async listEvents(params: ListEventsParams = {}, asOf: Date | null = null): Promise<Event[]> {
    const page = await this.listEventsPage(params, asOf);
    return [...page.items];
  }

  /**
   * One listing page, with the number of rows the server sent before
   * as-of filtering. Offset paging must advance on `received`.
   */
  async listEventsPage(params: ListEventsParams = {}, asOf: Date | null = null): Promise<OffsetPage<Event>> {
    const data = await this.http.getJson(ApiType.GAMMA_API, GAMMA_API_BASE, '/events', {
      params: eventQuery(params),
    });
    if (!Array.isArray(data)) return { items: [], received: 0 };
    const visible = filterVisible(asOf, data.filter(isRecord), EVENT_VISIBILITY_KEYS);
    const items = await Promise.all(
      visible.map((raw) => this.toEvent(raw, params.includeMarkets ?? true, asOf))
    );
    return { items, received: data.length };
  }

  async getEventById(id: string, includeMarkets = true, asOf: Date | null = null): Promise<Event | null> {
    return this.getEventAt(`/events/${encodeURIComponent(id)}`, includeMarkets, asOf);
  }

  async getEventBySlug(slug: string, includeMarkets = true, asOf: Date | null = null): Promise<Event | null> {
    return this.getEventAt(`/events/slug/${encodeURIComponent(slug)}`, includeMarkets, asOf);
  }

  // ===== Markets =====

  async listMarkets(params: ListMarketsParams = {}, asOf: Date | null = null): Promise<Market[]> {
    const data = await this.http.getJson(ApiType.GAMMA_API, GAMMA_API_BASE, '/markets', {
      params: marketQuery(params),
    });
    if (!Array.isArray(data)) return [];
    const visible = filterVisible(asOf, data.filter(isRecord), MARKET_VISIBILITY_KEYS);
    return Promise.all(visible.map((raw) => this.toMarket(raw, asOf)));
  }

  async getMarketById(id: string, asOf: Date | null = null): Promise<Market | null> {
    return this.getMarketAt(`/markets/${encodeURIComponent(id)}`, asOf);
  }

  async getMarketBySlug(slug: string, asOf: Date | null = null): Promise<Market | null> {
    return this.getMarketAt(`/markets/slug/${encodeURIComponent(slug)}`, asOf);
  }

  // ===== Normalization =====

  private async getEventAt(path: string, includeMarkets: boolean, asOf: Date | null): Promise<Event | null> {
    const data = await this.http.getJson(ApiType.GAMMA_API, GAMMA_API_BASE, path);
    if (!isRecord(data) || !isVisible(asOf, data, EVENT_VISIBILITY_KEYS)) return null;
    return this.toEvent(data, includeMarkets, asOf);
  }

  private async getMarketAt(path: string, asOf: Date | null): Promise<Market | null> {
    const data = await this.http.getJson(ApiType.GAMMA_API, GAMMA_API_BASE, path);
    if (!isRecord(data) || !isVisible(asOf, data, MARKET_VISIBILITY_KEYS)) return null;
    return this.toMarket(data, asOf);
  }

  private async toEvent(raw: RawRecord, includeMarkets: boolean, asOf: Date | null): Promise<Event> {
    let markets: Market[] | null = null;
    if (includeMarkets && Array.isArray(raw.markets)) {
      const visible = filterVisible(asOf, raw.markets.filter(isRecord), MARKET_VISIBILITY_KEYS);
      markets = await Promise.all(visible.map((item) => this.toMarket(item, asOf)));
    }
    return buildEvent(raw, { asOf, markets });
  }

  private async toMarket(raw: RawRecord, asOf: Date | null): Promise<Market> {
    if (asOf === null) return buildMarket(raw, { asOf });
    const tokenIds = parseJsonList(raw.clobTokenIds);
    const historicalPrices = await Promise.all(
      tokenIds.map((tokenId) => this.prices.getPriceAsOf(tokenId, asOf))
    );
    return buildMarket(raw, { asOf, historicalPrices });
  }
}
