/**
 * PolymarketSDK tests against an in-process fetch stand-in
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { PolymarketSDK } from '../../polymarket-sdk.js';
import { resetConfig } from '../../core/config.js';
import { ErrorCode, SdkError } from '../../core/errors.js';
import { createUnthrottledRateLimiter } from '../../core/rate-limiter.js';
import { jsonResponse, requestedUrls, stubFetch, type RouteHandler } from '../helpers/fetch-stub.js';

const CONDITION_ID = '0x' + '1f'.repeat(32);
const ts = (iso: string) => Math.floor(Date.parse(iso) / 1000);

const marketOld = {
  id: 'm1',
  question: 'Old market?',
  conditionId: CONDITION_ID,
  createdAt: '2023-06-02T00:00:00Z',
  outcomes: '["Yes", "No"]',
  outcomePrices: '["0.9", "0.1"]',
  clobTokenIds: '["t-yes", "t-no"]',
  volume: '5000',
  active: false,
};

const marketNew = {
  id: 'm2',
  question: 'New market?',
  createdAt: '2024-03-01T00:00:00Z',
  outcomes: '["Yes", "No"]',
  outcomePrices: '["0.5", "0.5"]',
  clobTokenIds: '["n-yes", "n-no"]',
};

const eventOld = {
  id: 1,
  title: 'Old event',
  slug: 'old-event',
  createdAt: '2023-06-01T00:00:00Z',
  volume: 1000,
  closed: true,
  markets: [marketOld, marketNew],
};

const eventNew = {
  id: 2,
  title: 'New event',
  slug: 'new-event',
  createdAt: '2024-05-01T00:00:00Z',
  volume: 50,
};

const history: Record<string, { t: number; p: number }[]> = {
  't-yes': [
    { t: ts('2023-12-01T00:00:00Z'), p: 0.4 },
    { t: ts('2024-02-01T00:00:00Z'), p: 0.7 },
  ],
};

const publicTrades = [
  { proxyWallet: '0xa', side: 'BUY', size: 1000, price: 0.6, timestamp: ts('2023-12-15T00:00:00Z') },
  { proxyWallet: '0xb', side: 'SELL', size: 2000, price: 0.4, timestamp: ts('2024-02-01T00:00:00Z') },
  { proxyWallet: '0xc', side: 'BUY', size: 10, price: 0.5 },
];

const routes: Record<string, RouteHandler> = {
  '/events': () => [eventOld, eventNew],
  '/events/1': () => eventOld,
  '/events/slug/old-event': () => eventOld,
  '/markets': () => [marketOld, marketNew],
  '/markets/m1': () => marketOld,
  '/markets/slug/new-market': () => marketNew,
  '/prices-history': (url) => ({ history: history[url.searchParams.get('market') ?? ''] ?? [] }),
  '/midpoint': (url) =>
    url.searchParams.get('token_id') === 't-yes' ? { mid: '0.55' } : jsonResponse({ error: 'no book' }, 404),
  '/price': () => ({ price: '0.6' }),
  '/trades': () => publicTrades,
};

function createSdk(asOf: unknown = null) {
  return new PolymarketSDK({ asOf, timeoutMs: 1000, rateLimiter: createUnthrottledRateLimiter() });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('events', () => {
  it('lists everything with live values when no instant is set', async () => {
    stubFetch(routes);
    const events = await createSdk().listEvents({ limit: 10 });

    expect(events.map((event) => event.id)).toEqual(['1', '2']);
    expect(events[0].volume).toBe(1000);
    expect(events[0].closed).toBe(true);
    expect(events[0].markets?.map((market) => market.id)).toEqual(['m1', 'm2']);
    expect(events[0].markets?.[0].outcomePrices).toEqual([0.9, 0.1]);
  });

  it('hides later events and markets and rebuilds prices under as-of', async () => {
    const fetchMock = stubFetch(routes);
    const events = await createSdk('2024-01-01').listEvents();

    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event.volume).toBeNull();
    expect(event.closed).toBeNull();
    expect(event.markets?.map((market) => market.id)).toEqual(['m1']);

    const market = event.markets?.[0];
    expect(market?.outcomePrices).toEqual([0.4, null]);
    expect(market?.volume).toBeNull();
    expect(market?.active).toBeNull();

    const historyCalls = requestedUrls(fetchMock).filter((url) => url.pathname === '/prices-history');
    expect(historyCalls.map((url) => url.searchParams.get('market')).sort()).toEqual(['t-no', 't-yes']);
    for (const url of historyCalls) {
      expect(url.searchParams.get('endTs')).toBe(String(ts('2024-01-01T00:00:00Z')));
    }
  });

  it('sends listing filters as query params', async () => {
    const fetchMock = stubFetch(routes);
    await createSdk().listEvents({ limit: 500, offset: 1000, closed: false, tagId: 3, includeMarkets: false });

    const url = requestedUrls(fetchMock)[0];
    expect(url.pathname).toBe('/events');
    expect(url.search).toBe('?limit=500&offset=1000&tag_id=3&closed=false');
  });

  it('returns null for single events that are hidden or missing', async () => {
    stubFetch(routes);
    const sdk = createSdk('2023-01-01');
    expect(await sdk.getEventById('1')).toBeNull();
    expect(await sdk.getEventBySlug('old-event')).toBeNull();

    sdk.setAsOf(null);
    expect((await sdk.getEvent('1'))?.title).toBe('Old event');
    expect((await sdk.getEventBySlug('old-event'))?.slug).toBe('old-event');
    expect(await sdk.getEventById('404')).toBeNull();
  });

  it('skips market parsing when not requested and re-fetches them on demand', async () => {
    const fetchMock = stubFetch(routes);
    const sdk = createSdk();
    const event = await sdk.getEventById('1', false);
    expect(event?.markets).toBeNull();

    const markets = event ? await sdk.getEventMarkets(event) : [];
    expect(markets.map((market) => market.id)).toEqual(['m1', 'm2']);
    expect(requestedUrls(fetchMock).map((url) => url.pathname)).toEqual(['/events/1', '/events/1']);
  });

  it('keeps records returned before the instant changes', async () => {
    stubFetch(routes);
    const sdk = createSdk();
    const live = await sdk.getEventById('1');
    sdk.setAsOf('2024-01-01');
    const past = await sdk.getEventById('1');

    expect(live?.volume).toBe(1000);
    expect(past?.volume).toBeNull();
    expect(Object.isFrozen(live)).toBe(true);
  });
});

describe('as-of setting', () => {
  it('rejects an unparsable instant and keeps the current one', () => {
    const sdk = createSdk('2024-01-01');
    expect(() => sdk.setAsOf('not-a-date')).toThrow(SdkError);
    expect(sdk.getAsOf()?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(sdk.setAsOf(null).getAsOf()).toBeNull();
  });

  it('rejects an unparsable instant at construction', () => {
    expect(() => createSdk('sometime')).toThrow(SdkError);
  });
});

describe('markets', () => {
  it('lists and fetches markets with the same visibility rules', async () => {
    stubFetch(routes);
    const sdk = createSdk('2024-01-01');
    expect((await sdk.listMarkets({ closed: true })).map((market) => market.id)).toEqual(['m1']);
    expect((await sdk.getMarket('m1'))?.outcomePrices).toEqual([0.4, null]);
    expect(await sdk.getMarketBySlug('new-market')).toBeNull();

    sdk.setAsOf(null);
    expect((await sdk.getMarketBySlug('new-market'))?.question).toBe('New market?');
  });
});

describe('prices', () => {
  it('reads live midpoint and side price', async () => {
    stubFetch(routes);
    const sdk = createSdk();
    expect(await sdk.getTokenMidpoint('t-yes')).toBe(0.55);
    expect(await sdk.getTokenMidpoint('t-no')).toBeNull();
    expect(await sdk.getTokenPrice('t-yes', 'BUY')).toBe(0.6);
  });

  it('uses the last history point under as-of', async () => {
    stubFetch(routes);
    const sdk = createSdk('2024-01-01');
    expect(await sdk.getTokenMidpoint('t-yes')).toBe(0.4);
    expect(await sdk.getTokenPrice('t-yes', 'SELL')).toBe(0.4);
    expect(await sdk.getTokenMidpoint('t-no')).toBeNull();
  });

  it('turns an interval into a window ending at the instant', async () => {
    const fetchMock = stubFetch(routes);
    const points = await createSdk('2024-01-01').getPriceHistory('t-yes', { interval: '1d', fidelity: 60 });

    expect(points.map((point) => point.price)).toEqual([0.4]);
    const url = requestedUrls(fetchMock)[0];
    const end = ts('2024-01-01T00:00:00Z');
    expect(url.searchParams.get('endTs')).toBe(String(end));
    expect(url.searchParams.get('startTs')).toBe(String(end - 86_400));
    expect(url.searchParams.has('interval')).toBe(false);
    expect(url.searchParams.get('fidelity')).toBe('60');
  });
});

describe('getMarketTokens', () => {
  it('quotes live midpoints and falls back to outcome prices', async () => {
    stubFetch(routes);
    const tokens = await createSdk().getMarketTokens('m1');
    expect(tokens).toEqual([
      { tokenId: 't-yes', outcome: 'Yes', price: 0.55 },
      { tokenId: 't-no', outcome: 'No', price: 0.1 },
    ]);
  });

  it('uses history without fallback under as-of', async () => {
    stubFetch(routes);
    const tokens = await createSdk('2024-01-01').getMarketTokens('m1');
    expect(tokens).toEqual([
      { tokenId: 't-yes', outcome: 'Yes', price: 0.4 },
      { tokenId: 't-no', outcome: 'No', price: null },
    ]);
  });

  it('returns nothing for an unknown market', async () => {
    stubFetch(routes);
    expect(await createSdk().getMarketTokens('nope')).toEqual([]);
  });
});

describe('public trades', () => {
  it('sends list filters comma-separated', async () => {
    const fetchMock = stubFetch(routes);
    const trades = await createSdk().getTrades({
      market: ['0xa', '0xb'],
      filterType: 'CASH',
      filterAmount: 500,
      takerOnly: false,
      side: 'BUY',
    });

    expect(trades).toHaveLength(3);
    const url = requestedUrls(fetchMock)[0];
    expect(url.searchParams.get('market')).toBe('0xa,0xb');
    expect(url.searchParams.get('takerOnly')).toBe('false');
    expect(url.searchParams.get('filterType')).toBe('CASH');
    expect(url.searchParams.get('filterAmount')).toBe('500');
    expect(url.searchParams.has('eventId')).toBe(false);
  });

  it('drops undated and later trades under as-of', async () => {
    stubFetch(routes);
    const trades = await createSdk('2024-01-01').getTrades();
    expect(trades.map((trade) => trade.proxyWallet)).toEqual(['0xa']);
  });
});

describe('getClobTrades', () => {
  const clobPages: Record<string, unknown> = {
    'MA==': {
      data: [
        { id: 'c1', match_time: String(ts('2023-11-01T00:00:00Z')), status: 'CONFIRMED' },
        { id: 'c2', match_time: String(ts('2024-03-01T00:00:00Z')), status: 'CONFIRMED' },
      ],
      next_cursor: 'Mg==',
    },
    'Mg==': {
      data: [{ id: 'c3', match_time: String(ts('2023-12-01T00:00:00Z')), last_update: ts('2024-02-01T00:00:00Z') }],
      next_cursor: 'LTE=',
    },
  };
  const clobRoutes: Record<string, RouteHandler> = {
    '/data/trades': (url) => clobPages[url.searchParams.get('next_cursor') ?? ''] ?? null,
  };

  beforeEach(() => {
    vi.stubEnv('POLY_API_KEY', '');
    vi.stubEnv('POLY_API_SECRET', '');
    vi.stubEnv('POLY_API_PASSPHRASE', '');
    vi.stubEnv('POLY_ADDRESS', '');
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('requires credentials from somewhere', async () => {
    stubFetch(clobRoutes);
    const error = await createSdk()
      .getClobTrades()
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(SdkError);
    expect(error instanceof SdkError && error.code).toBe(ErrorCode.INVALID_CONFIG);
  });

  it('follows cursors with caller-supplied headers', async () => {
    const fetchMock = stubFetch(clobRoutes);
    const trades = await createSdk().getClobTrades({ market: '0xm', l2Headers: { POLY_API_KEY: 'test-key' } });

    expect(trades.map((trade) => trade.id)).toEqual(['c1', 'c2', 'c3']);
    expect(requestedUrls(fetchMock).map((url) => url.searchParams.get('next_cursor'))).toEqual(['MA==', 'Mg==']);
    const headers = fetchMock.mock.calls[0][1]?.headers;
    expect(headers).toMatchObject({ POLY_API_KEY: 'test-key' });
  });

  it('signs with the SDK credentials', async () => {
    const fetchMock = stubFetch(clobRoutes);
    const sdk = createSdk().setL2Credentials({
      apiKey: 'test-key',
      apiSecret: 'dGVzdC1zZWNyZXQ=',
      apiPassphrase: 'test-passphrase',
      address: '0x0000000000000000000000000000000000000001',
    });
    await sdk.getClobTrades({ onlyFirstPage: true });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const headers = fetchMock.mock.calls[0][1]?.headers;
    expect(Object.keys(headers ?? {})).toEqual(
      expect.arrayContaining(['POLY_ADDRESS', 'POLY_SIGNATURE', 'POLY_TIMESTAMP', 'POLY_API_KEY', 'POLY_PASSPHRASE'])
    );
  });

  it('clamps the window and hides later fills under as-of', async () => {
    const fetchMock = stubFetch(clobRoutes);
    const sdk = createSdk('2024-01-01');
    const trades = await sdk.getClobTrades({ l2Headers: { POLY_API_KEY: 'test-key' } });

    expect(trades.map((trade) => trade.id)).toEqual(['c1', 'c3']);
    expect(trades[1].lastUpdate).toBeNull();
    expect(requestedUrls(fetchMock)[0].searchParams.get('before')).toBe(String(ts('2024-01-01T00:00:00Z')));

    const none = await sdk.getClobTrades({
      after: ts('2024-06-01T00:00:00Z'),
      l2Headers: { POLY_API_KEY: 'test-key' },
    });
    expect(none).toEqual([]);
  });
});
