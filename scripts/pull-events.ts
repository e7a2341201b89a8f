/**
 * Pull the event catalog into data/events.json
 *
 * Usage: tsx scripts/pull-events.ts
 */

import chalk from 'chalk';
import {
  PolymarketSDK,
  EventCatalogService,
  DEFAULT_EXCLUDED_SLUG_KEYWORDS,
  createDataStore,
  getConfig,
} from '../src/index.js';

async function main() {
  const config = getConfig();
  const sdk = new PolymarketSDK();
  const store = createDataStore(config.dataDir);

  console.log(
    chalk.cyan(`Pulling events (excluding slugs with: ${DEFAULT_EXCLUDED_SLUG_KEYWORDS.join(', ')})...`)
  );

  const catalog = new EventCatalogService(sdk, {
    onPage: (offset, count) => console.log(chalk.gray(`  Fetched ${count} events at offset ${offset}`)),
  });
  const events = await catalog.collectEventSummaries();

  await store.writeEvents(events);
  console.log(chalk.green(`✓ Saved ${events.length} events to ${store.getPath('events.json')}`));
}

main().catch((error) => {
  console.error(chalk.red('✗ pull-events failed:'), error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
