/**
 * Record builders
 *
 * Pure functions from one raw payload (plus the as-of instant and any
 * history-derived values the caller already fetched) to a frozen record.
 * Building the same payload twice yields equal records.
 */

import {
  EVENT_FIELDS,
  MARKET_FIELDS,
  TRADE_FIELDS,
  isAfter,
  redactRaw,
  resolveField,
} from './as-of.js';
import {
  CREATED_AT_KEYS,
  firstDateTime,
  firstPresent,
  isRecord,
  optionalString,
  parseBoolean,
  parseDateTime,
  parseInteger,
  parseJsonList,
  parseNumber,
  parseUnixTimestamp,
} from './normalize.js';
import type {
  Event,
  MakerOrder,
  Market,
  PricePoint,
  PublicTrade,
  RawRecord,
  Token,
  Trade,
} from './types.js';

export interface MarketBuildOptions {
  asOf: Date | null;
  /**
   * Last price per token at or before `asOf`, aligned with `clobTokenIds`.
   * Only read when `asOf` is set.
   */
  historicalPrices?: readonly (number | null)[];
}

export function buildMarket(raw: RawRecord, options: MarketBuildOptions): Market {
  const { asOf } = options;
  const outcomes = parseJsonList(raw.outcomes);
  const clobTokenIds = parseJsonList(raw.clobTokenIds);
  const liveOutcomePrices = parseJsonList(raw.outcomePrices).map((item) => parseNumber(item));

  const historicalPrices: (number | null)[] = [...(options.historicalPrices ?? [])];
  // Pad to the outcome count so every outcome has a (possibly null) slot
  while (historicalPrices.length < outcomes.length) historicalPrices.push(null);

  return Object.freeze({
    id: String(raw.id),
    question: optionalString(raw.question),
    slug: optionalString(raw.slug),
    description: optionalString(raw.description),
    conditionId: optionalString(firstPresent(raw, MARKET_FIELDS.conditionId.rawKeys)),
    outcomes: Object.freeze(outcomes),
    outcomePrices: Object.freeze(
      resolveField(MARKET_FIELDS.outcomePrices, asOf, liveOutcomePrices, historicalPrices) ?? []
    ),
    clobTokenIds: Object.freeze(clobTokenIds),
    startDate: parseDateTime(raw.startDate),
    endDate: parseDateTime(raw.endDate),
    createdAt: parseDateTime(raw.createdAt),
    updatedAt: resolveField(MARKET_FIELDS.updatedAt, asOf, parseDateTime(raw.updatedAt)),
    active: resolveField(MARKET_FIELDS.active, asOf, parseBoolean(raw.active)),
    closed: resolveField(MARKET_FIELDS.closed, asOf, parseBoolean(raw.closed)),
    volume: resolveField(MARKET_FIELDS.volume, asOf, parseNumber(raw.volume)),
    raw: Object.freeze(redactRaw(raw, MARKET_FIELDS, asOf)),
  });
}

export interface EventBuildOptions {
  asOf: Date | null;
  /** Already filtered and built; null when markets were not requested */
  markets: readonly Market[] | null;
}

export function buildEvent(raw: RawRecord, options: EventBuildOptions): Event {
  const { asOf, markets } = options;

  return Object.freeze({
    id: String(raw.id),
    title: optionalString(raw.title),
    slug: optionalString(raw.slug),
    description: optionalString(raw.description),
    startDate: parseDateTime(raw.startDate),
    endDate: parseDateTime(raw.endDate),
    createdAt: firstDateTime(raw, CREATED_AT_KEYS),
    updatedAt: resolveField(EVENT_FIELDS.updatedAt, asOf, parseDateTime(raw.updatedAt)),
    active: resolveField(EVENT_FIELDS.active, asOf, parseBoolean(raw.active)),
    closed: resolveField(EVENT_FIELDS.closed, asOf, parseBoolean(raw.closed)),
    volume: resolveField(EVENT_FIELDS.volume, asOf, parseNumber(raw.volume)),
    liquidity: resolveField(EVENT_FIELDS.liquidity, asOf, parseNumber(raw.liquidity)),
    markets: markets === null ? null : Object.freeze([...markets]),
    raw: Object.freeze(redactRaw(raw, EVENT_FIELDS, asOf)),
  });
}

export function buildMakerOrder(raw: RawRecord): MakerOrder {
  return Object.freeze({
    orderId: optionalString(raw.order_id),
    makerAddress: optionalString(raw.maker_address),
    owner: optionalString(raw.owner),
    matchedAmount: parseNumber(raw.matched_amount),
    feeRateBps: parseNumber(raw.fee_rate_bps),
    price: parseNumber(raw.price),
    assetId: optionalString(raw.asset_id),
    outcome: optionalString(raw.outcome),
    side: optionalString(raw.side),
    raw: Object.freeze({ ...raw }),
  });
}

/**
 * Order-book trade. An update after `asOf` nulls `status` and `last_update`
 * on the record and on its raw copy.
 */
export function buildTrade(raw: RawRecord, asOf: Date | null): Trade {
  const liveLastUpdate = parseDateTime(raw.last_update);
  const leaksUpdate = isAfter(asOf, liveLastUpdate);
  const effectiveAsOf = leaksUpdate ? asOf : null;

  const rawPayload: RawRecord = { ...raw };
  if (leaksUpdate) {
    for (const rule of Object.values(TRADE_FIELDS)) {
      for (const key of rule.rawKeys) rawPayload[key] = null;
    }
  }

  const makerOrders = Array.isArray(raw.maker_orders)
    ? raw.maker_orders.filter(isRecord).map((item) => buildMakerOrder(item))
    : [];

  return Object.freeze({
    id: optionalString(raw.id),
    takerOrderId: optionalString(raw.taker_order_id),
    market: optionalString(raw.market),
    assetId: optionalString(raw.asset_id),
    side: optionalString(raw.side),
    size: parseNumber(raw.size),
    feeRateBps: parseNumber(raw.fee_rate_bps),
    price: parseNumber(raw.price),
    status: resolveField(TRADE_FIELDS.status, effectiveAsOf, optionalString(raw.status)),
    matchTime: parseDateTime(raw.match_time),
    lastUpdate: resolveField(TRADE_FIELDS.lastUpdate, effectiveAsOf, liveLastUpdate),
    outcome: optionalString(raw.outcome),
    bucketIndex: parseInteger(raw.bucket_index),
    owner: optionalString(raw.owner),
    makerAddress: optionalString(raw.maker_address),
    makerOrders: Object.freeze(makerOrders),
    transactionHash: optionalString(raw.transaction_hash),
    traderSide: optionalString(firstPresent(raw, ['trader_side', 'type'])),
    raw: Object.freeze(rawPayload),
  });
}

export function buildPublicTrade(raw: RawRecord): PublicTrade {
  return Object.freeze({
    proxyWallet: optionalString(raw.proxyWallet),
    side: optionalString(raw.side),
    asset: optionalString(raw.asset),
    conditionId: optionalString(raw.conditionId),
    size: parseNumber(raw.size),
    price: parseNumber(raw.price),
    timestamp: parseUnixTimestamp(raw.timestamp),
    title: optionalString(raw.title),
    slug: optionalString(raw.slug),
    icon: optionalString(raw.icon),
    eventSlug: optionalString(raw.eventSlug),
    outcome: optionalString(raw.outcome),
    outcomeIndex: parseInteger(raw.outcomeIndex),
    name: optionalString(raw.name),
    pseudonym: optionalString(raw.pseudonym),
    bio: optionalString(raw.bio),
    profileImage: optionalString(raw.profileImage),
    profileImageOptimized: optionalString(raw.profileImageOptimized),
    transactionHash: optionalString(raw.transactionHash),
    raw: Object.freeze({ ...raw }),
  });
}

/**
 * Price history samples (`{ t, p }`), dropping incomplete samples and any
 * after `asOf`, sorted ascending by timestamp.
 */
export function buildPricePoints(history: readonly unknown[], asOf: Date | null): PricePoint[] {
  const points: PricePoint[] = [];
  for (const item of history) {
    if (!isRecord(item)) continue;
    const timestamp = parseUnixTimestamp(item.t);
    const price = parseNumber(item.p);
    if (timestamp === null || price === null) continue;
    if (isAfter(asOf, timestamp)) continue;
    points.push(Object.freeze({ timestamp, price }));
  }
  return points.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Pairs token ids with outcome labels and the market's prices.
 */
export function marketTokens(market: Market): Token[] {
  return market.clobTokenIds.map((tokenId, idx) =>
    Object.freeze({
      tokenId,
      outcome: market.outcomes[idx] ?? null,
      price: market.outcomePrices[idx] ?? null,
    })
  );
}
