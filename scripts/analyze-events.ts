/**
 * Volume statistics of the stored events
 *
 * Usage: tsx scripts/analyze-events.ts
 */

import chalk from 'chalk';
import { createDataStore, getConfig, volumeStats } from '../src/index.js';

const usd = (value: number) =>
  `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;

async function main() {
  const store = createDataStore(getConfig().dataDir);
  const stats = volumeStats(await store.readEvents());

  if (stats === null) {
    console.log(chalk.yellow('No events with volume data. Run pull-events first.'));
    return;
  }

  console.log(`Loaded ${stats.count} events with volume data`);
  console.log(`Volume range: ${usd(stats.min)} - ${usd(stats.max)}`);
  console.log(`Median volume: ${chalk.bold(usd(stats.median))}`);
  console.log(`Mean volume: ${chalk.bold(usd(stats.mean))}`);
}

main().catch((error) => {
  console.error(chalk.red('✗ analyze-events failed:'), error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
