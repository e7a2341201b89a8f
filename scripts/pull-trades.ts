/**
 * Pull large trades for every market of the stored events
 *
 * Reads data/events.json, writes data/trades/<eventId>/<marketId>.json and
 * data/trades/<eventId>/metadata.json (once per event).
 *
 * Usage: tsx scripts/pull-trades.ts
 */

import chalk from 'chalk';
import {
  PolymarketSDK,
  TradeHistoryService,
  buildEventMetadata,
  createDataStore,
  getConfig,
  withRetry,
  type Event,
} from '../src/index.js';

async function main() {
  const config = getConfig();
  const sdk = new PolymarketSDK();
  const store = createDataStore(config.dataDir);
  const history = new TradeHistoryService(sdk);

  const summaries = await store.readEvents();
  console.log(chalk.cyan(`Loading markets for ${summaries.length} events...`));

  const events = new Map<string, Event>();
  for (const summary of summaries) {
    const event = await withRetry(() => sdk.getEventById(summary.id, true));
    if (event?.markets && event.markets.length > 0) {
      events.set(event.id, event);
    }
  }

  const markets = history.listMarkets([...events.values()]);
  console.log(chalk.cyan(`Fetching trades for ${markets.length} markets...`));

  let truncatedCount = 0;
  for (const [idx, market] of markets.entries()) {
    const event = events.get(market.eventId);
    if (!event) continue;

    await store.writeEventMetadataOnce(event.id, buildEventMetadata(event));

    const result = await withRetry(() => history.fetchMarketTrades(market.conditionId));
    if (result.truncated) truncatedCount++;
    await store.writeMarketTrades(event.id, market.marketId, result.items);

    const flag = result.truncated ? chalk.yellow(' (truncated)') : '';
    console.log(
      `[${idx + 1}/${markets.length}] saved ${result.items.length} trades for market ${market.marketId}${flag}`
    );
  }

  console.log(chalk.green(`✓ Done. ${truncatedCount} market(s) hit the offset ceiling.`));
}

main().catch((error) => {
  console.error(chalk.red('✗ pull-trades failed:'), error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
