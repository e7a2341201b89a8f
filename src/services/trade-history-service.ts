/**
 * TradeHistoryService
 *
 * Collects large public trades per market of the stored events:
 * - markets with a valid condition id, sorted by volume (highest first)
 * - trades worth at least `minValueUsd`, both sides, deduplicated
 * - per-event metadata (creation, resolution)
 */

import type { PolymarketSDK } from '../polymarket-sdk.js';
import { paginateSides, type SidePaginationResult } from '../core/pagination.js';
import {
  CREATED_AT_KEYS,
  RESOLVED_AT_KEYS,
  firstPresent,
  optionalString,
  parseNumber,
} from '../core/normalize.js';
import type {
  Event,
  EventMetadata,
  Market,
  MarketTradeSummary,
  PublicTrade,
  TradeSide,
} from '../core/types.js';

// ===== Types =====

export interface MarketRef {
  eventId: string;
  marketId: string;
  conditionId: string;
  volume: number;
}

export type MarketTradesResult = SidePaginationResult<MarketTradeSummary>;

export interface TradeHistoryConfig {
  /** Smallest trade value kept, in USD (default: 500) */
  minValueUsd?: number;
  /** Trades per page (default: 10000) */
  pageSize?: number;
  /** Highest offset requested per side (default: 10000) */
  maxOffset?: number;
}

const TRADE_SIDES: readonly TradeSide[] = ['BUY', 'SELL'];

const CONDITION_ID_PATTERN = /^0x[0-9a-fA-F]{64}$/;

// ===== Helpers =====

/**
 * Condition id of a market, when it is a 0x-prefixed 32-byte hex string
 */
export function marketConditionId(market: Market): string | null {
  const { conditionId } = market;
  return conditionId !== null && CONDITION_ID_PATTERN.test(conditionId) ? conditionId : null;
}

/**
 * First truthy of volume, volumeNum, volumeClob; 0 when none parses
 */
export function marketVolume(market: Market): number {
  for (const key of ['volume', 'volumeNum', 'volumeClob']) {
    const value = parseNumber(market.raw[key]);
    if (value) return value;
  }
  return 0;
}

/**
 * Natural key of a public trade, used to drop repeats across pages and sides
 */
export function publicTradeKey(trade: PublicTrade): string {
  return [
    trade.transactionHash,
    trade.timestamp?.toISOString() ?? null,
    trade.proxyWallet,
    trade.conditionId,
    trade.side,
    trade.size,
    trade.price,
  ].join('-');
}

/**
 * Stored summary of a public trade, or null when it lacks a price, size or
 * account, or is worth less than `minValueUsd`.
 */
export function toTradeSummary(trade: PublicTrade, minValueUsd: number): MarketTradeSummary | null {
  if (trade.price === null || trade.size === null || !trade.proxyWallet) return null;
  const value = trade.price * trade.size;
  if (value < minValueUsd) return null;
  return {
    account: trade.proxyWallet,
    side: trade.outcome ?? trade.side,
    value,
    timestamp: trade.timestamp?.toISOString() ?? null,
  };
}

/**
 * Creation, resolution time and outcome of an event. Raw timestamps are kept
 * as the API sent them.
 */
export function buildEventMetadata(event: Event, generatedAt: Date = new Date()): EventMetadata {
  const createdAt =
    optionalString(firstPresent(event.raw, CREATED_AT_KEYS)) ?? event.createdAt?.toISOString() ?? null;
  const resolvedAt =
    optionalString(firstPresent(event.raw, RESOLVED_AT_KEYS)) ?? event.endDate?.toISOString() ?? null;
  const resolvedFlag = event.raw.resolved ?? event.raw.closed;

  return {
    generatedAt: generatedAt.toISOString(),
    createdAt,
    resolvedAt,
    resolution: resolvedFlag ? 'yes' : 'no',
  };
}

// ===== Service =====

export class TradeHistoryService {
  private minValueUsd: number;
  private pageSize: number;
  private maxOffset: number;

  constructor(
    private sdk: PolymarketSDK,
    config: TradeHistoryConfig = {}
  ) {
    this.minValueUsd = config.minValueUsd ?? 500;
    this.pageSize = config.pageSize ?? 10_000;
    this.maxOffset = config.maxOffset ?? 10_000;
  }

  /**
   * Markets with a valid condition id across the given events, highest
   * volume first.
   */
  listMarkets(events: readonly Event[]): MarketRef[] {
    const refs: MarketRef[] = [];
    for (const event of events) {
      for (const market of event.markets ?? []) {
        const conditionId = marketConditionId(market);
        if (conditionId === null) continue;
        refs.push({
          eventId: event.id,
          marketId: market.id,
          conditionId,
          volume: marketVolume(market),
        });
      }
    }
    return refs.sort((a, b) => b.volume - a.volume);
  }

  /**
   * Both sides of a market's cash trades above the value floor.
   * `truncated` is set when a side ran into the offset ceiling.
   */
  async fetchMarketTrades(conditionId: string): Promise<MarketTradesResult> {
    const result = await paginateSides(
      TRADE_SIDES,
      (side, offset, limit) =>
        this.sdk.getTradesPage({
          market: [conditionId],
          limit,
          offset,
          takerOnly: false,
          filterType: 'CASH',
          filterAmount: this.minValueUsd,
          side,
        }),
      {
        pageSize: this.pageSize,
        maxOffset: this.maxOffset,
        keyOf: publicTradeKey,
        accept: (trade) => toTradeSummary(trade, this.minValueUsd) !== null,
      }
    );

    const items: MarketTradeSummary[] = [];
    for (const trade of result.items) {
      const summary = toTradeSummary(trade, this.minValueUsd);
      if (summary !== null) items.push(summary);
    }
    if (result.truncated) {
      console.warn(`[TradeHistoryService] Offset ceiling reached for ${conditionId}; older fills not fetched`);
    }
    return { items, truncated: result.truncated };
  }
}
