/**
 * Score stored events for insider likelihood
 *
 * Reads data/events.json and merges new scores into data/event_scores.json.
 *
 * Usage: tsx scripts/score-events.ts
 */

import chalk from 'chalk';
import {
  InsiderScoringService,
  OpenRouterClient,
  RateLimiter,
  createDataStore,
  getConfig,
  requireEnv,
  selectEventsForScoring,
  DEFAULT_VOLUME_THRESHOLD,
} from '../src/index.js';

async function main() {
  const config = getConfig();
  const store = createDataStore(config.dataDir);
  const client = new OpenRouterClient(new RateLimiter(), {
    apiKey: requireEnv('OPENROUTER_API_KEY', config.openRouter.apiKey),
    timeoutMs: config.polymarket.requestTimeoutMs,
  });
  const scoring = new InsiderScoringService(client, {
    model: config.openRouter.scoringModel,
    concurrency: config.openRouter.scoringConcurrency,
  });

  const events = await store.readEvents();
  const existing = await store.readEventScores();
  const pending = selectEventsForScoring(events, existing).length;

  console.log(
    chalk.cyan(`Scoring ${pending} events with volume >= $${DEFAULT_VOLUME_THRESHOLD.toLocaleString('en-US')}...`)
  );

  const { scores } = await scoring.scoreNewEvents(events, existing);
  await store.writeEventScores(scores);

  console.log(chalk.green(`✓ Saved ${Object.keys(scores).length} scores to ${store.getPath('event_scores.json')}`));
}

main().catch((error) => {
  console.error(chalk.red('✗ score-events failed:'), error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
