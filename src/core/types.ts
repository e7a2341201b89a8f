/**
 * Normalized record shapes
 *
 * Every record is an immutable snapshot built from one upstream JSON object.
 * `raw` keeps that object (redacted when an as-of instant is set) for fields
 * that are not modeled here.
 */

export type RawRecord = Record<string, unknown>;

/** Anything `parseDateTime` accepts as an instant */
export type DateInput = Date | string | number | null | undefined;

export type TradeSide = 'BUY' | 'SELL';

export interface Token {
  readonly tokenId: string;
  readonly outcome: string | null;
  readonly price: number | null;
}

export interface PricePoint {
  readonly timestamp: Date;
  readonly price: number;
}

export interface Market {
  readonly id: string;
  readonly question: string | null;
  readonly slug: string | null;
  readonly description: string | null;
  readonly conditionId: string | null;
  readonly outcomes: readonly string[];
  readonly outcomePrices: readonly (number | null)[];
  readonly clobTokenIds: readonly string[];
  readonly startDate: Date | null;
  readonly endDate: Date | null;
  readonly createdAt: Date | null;
  readonly updatedAt: Date | null;
  readonly active: boolean | null;
  readonly closed: boolean | null;
  readonly volume: number | null;
  readonly raw: Readonly<RawRecord>;
}

export interface Event {
  readonly id: string;
  readonly title: string | null;
  readonly slug: string | null;
  readonly description: string | null;
  readonly startDate: Date | null;
  readonly endDate: Date | null;
  readonly createdAt: Date | null;
  readonly updatedAt: Date | null;
  readonly active: boolean | null;
  readonly closed: boolean | null;
  readonly volume: number | null;
  readonly liquidity: number | null;
  /** null when markets were not requested */
  readonly markets: readonly Market[] | null;
  readonly raw: Readonly<RawRecord>;
}

/** Maker leg of a taker trade */
export interface MakerOrder {
  readonly orderId: string | null;
  readonly makerAddress: string | null;
  readonly owner: string | null;
  readonly matchedAmount: number | null;
  readonly feeRateBps: number | null;
  readonly price: number | null;
  readonly assetId: string | null;
  readonly outcome: string | null;
  readonly side: string | null;
  readonly raw: Readonly<RawRecord>;
}

/** Trade entry returned by the order-book (CLOB) API */
export interface Trade {
  readonly id: string | null;
  readonly takerOrderId: string | null;
  readonly market: string | null;
  readonly assetId: string | null;
  readonly side: string | null;
  readonly size: number | null;
  readonly feeRateBps: number | null;
  readonly price: number | null;
  readonly status: string | null;
  readonly matchTime: Date | null;
  readonly lastUpdate: Date | null;
  readonly outcome: string | null;
  readonly bucketIndex: number | null;
  readonly owner: string | null;
  readonly makerAddress: string | null;
  readonly makerOrders: readonly MakerOrder[];
  readonly transactionHash: string | null;
  readonly traderSide: string | null;
  readonly raw: Readonly<RawRecord>;
}

/** Trade record from the public Data API */
export interface PublicTrade {
  readonly proxyWallet: string | null;
  readonly side: string | null;
  readonly asset: string | null;
  readonly conditionId: string | null;
  readonly size: number | null;
  readonly price: number | null;
  readonly timestamp: Date | null;
  readonly title: string | null;
  readonly slug: string | null;
  readonly icon: string | null;
  readonly eventSlug: string | null;
  readonly outcome: string | null;
  readonly outcomeIndex: number | null;
  readonly name: string | null;
  readonly pseudonym: string | null;
  readonly bio: string | null;
  readonly profileImage: string | null;
  readonly profileImageOptimized: string | null;
  readonly transactionHash: string | null;
  readonly raw: Readonly<RawRecord>;
}

/** User API credentials for L2-authenticated CLOB calls */
export interface L2Credentials {
  readonly apiKey: string | null;
  readonly apiSecret: string | null;
  readonly apiPassphrase: string | null;
  readonly address: string | null;
}

export type L2Headers = Record<
  'POLY_ADDRESS' | 'POLY_SIGNATURE' | 'POLY_TIMESTAMP' | 'POLY_API_KEY' | 'POLY_PASSPHRASE',
  string
>;

// ===== Pipeline artifacts =====

/** Element of the stored event list */
export interface EventSummary {
  id: string;
  title: string | null;
  slug: string | null;
  volume: number | null;
  /** YYYY-MM-DD */
  createdAt: string | null;
}

/** Element of a stored per-market trade list */
export interface MarketTradeSummary {
  account: string;
  side: string | null;
  value: number;
  timestamp: string | null;
}

export interface EventMetadata {
  generatedAt: string;
  createdAt: string | null;
  resolvedAt: string | null;
  resolution: 'yes' | 'no';
}
