/**
 * Polymarket insider-scan
 *
 * Point-in-time Polymarket SDK plus the event, trade, scoring and embedding
 * pipelines built on it.
 */

// SDK
export { PolymarketSDK } from './polymarket-sdk.js';
export type { PolymarketSDKOptions, GetClobTradesOptions, MarketTokensOptions } from './polymarket-sdk.js';

// Clients
export { GammaApiClient, GAMMA_API_BASE } from './clients/gamma-api.js';
export type { ListEventsParams, ListMarketsParams, HistoricalPriceSource } from './clients/gamma-api.js';
export { ClobApiClient, CLOB_API_BASE, clampPriceHistoryParams } from './clients/clob-api.js';
export type { ClobTradesParams, PriceHistoryParams, PriceHistoryInterval } from './clients/clob-api.js';
export { DataApiClient, DATA_API_BASE } from './clients/data-api.js';
export type { TradesParams } from './clients/data-api.js';
export { OpenRouterClient, OPENROUTER_API_BASE } from './clients/openrouter.js';
export type { ChatMessage, ChatCompletionRequest, OpenRouterClientOptions } from './clients/openrouter.js';

// Core
export * from './core/types.js';
export { SdkError, ErrorCode, withRetry } from './core/errors.js';
export { RateLimiter, ApiType, createUnthrottledRateLimiter } from './core/rate-limiter.js';
export { HttpClient, buildQuery, DEFAULT_TIMEOUT_MS } from './core/http-client.js';
export { buildHmacSignature, buildL2Headers, loadL2CredentialsFromEnv } from './core/auth.js';
export { getConfig, loadConfig, resetConfig, requireEnv } from './core/config.js';
export type { Config } from './core/config.js';
export {
  EVENT_FIELDS,
  MARKET_FIELDS,
  TRADE_FIELDS,
  isVisible,
  filterVisible,
  redactRaw,
  parseAsOf,
} from './core/as-of.js';
export type { FieldPolicy, FieldRule, FieldTable } from './core/as-of.js';
export {
  parseNumber,
  parseInteger,
  parseBoolean,
  parseDateTime,
  parseUnixTimestamp,
  parseJsonList,
} from './core/normalize.js';
export {
  buildEvent,
  buildMarket,
  buildTrade,
  buildMakerOrder,
  buildPublicTrade,
  buildPricePoints,
  marketTokens,
} from './core/records.js';
export {
  paginateOffset,
  paginateCursor,
  paginateSides,
  INITIAL_CURSOR,
  END_CURSOR,
} from './core/pagination.js';
export type { OffsetPage, CursorPage, SidePaginationResult } from './core/pagination.js';
export { runBounded } from './core/worker-pool.js';
export { DataStore, createDataStore } from './core/data-store.js';
export type { EventScores } from './core/data-store.js';
export { EmbeddingCache, embeddingKey } from './core/embedding-cache.js';
export type { Embedding } from './core/embedding-cache.js';

// Services
export {
  EventCatalogService,
  DEFAULT_EXCLUDED_SLUG_KEYWORDS,
  volumeStats,
} from './services/event-catalog-service.js';
export { TradeHistoryService, buildEventMetadata } from './services/trade-history-service.js';
export type { MarketRef, MarketTradesResult } from './services/trade-history-service.js';
export {
  InsiderScoringService,
  DEFAULT_VOLUME_THRESHOLD,
  parseScore,
  selectEventsForScoring,
  mergeScores,
} from './services/insider-scoring-service.js';
export { EmbeddingService } from './services/embedding-service.js';
export type { RelationResult } from './services/embedding-service.js';

// Utils
export { summarize, relationMatrix, flatten } from './utils/stats.js';
export type { SummaryStats } from './utils/stats.js';
