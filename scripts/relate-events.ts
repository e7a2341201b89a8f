/**
 * Relation statistics between stored event titles
 *
 * Embeds every title (cached in data/embeddings_cache.json) and prints
 * summary statistics of the pairwise dot-product matrix.
 *
 * Usage: tsx scripts/relate-events.ts
 */

import chalk from 'chalk';
import {
  EmbeddingCache,
  EmbeddingService,
  OpenRouterClient,
  RateLimiter,
  createDataStore,
  getConfig,
  requireEnv,
  summarize,
  flatten,
} from '../src/index.js';

async function main() {
  const config = getConfig();
  const store = createDataStore(config.dataDir);
  const client = new OpenRouterClient(new RateLimiter(), {
    apiKey: requireEnv('OPENROUTER_API_KEY', config.openRouter.apiKey),
    timeoutMs: config.polymarket.requestTimeoutMs,
  });
  const cache = new EmbeddingCache(store.getPath('embeddings_cache.json'));
  const embeddings = new EmbeddingService(client, cache, { model: config.openRouter.embeddingModel });

  const titles = (await store.readEvents())
    .map((event) => event.title)
    .filter((title): title is string => title !== null);

  await cache.load();
  console.log(chalk.cyan(`Embedding ${titles.length} titles (${cache.size} cached)...`));

  try {
    const { indices, matrix } = await embeddings.relate(titles);
    const stats = summarize(flatten(matrix));
    if (stats === null) {
      console.log(chalk.yellow('No embeddings available.'));
      return;
    }
    console.log(`Embedded ${indices.length}/${titles.length} titles`);
    console.log(
      `Relation matrix stats: mean=${stats.mean}, median=${stats.median}, ` +
        `min=${stats.min}, max=${stats.max}, std=${stats.std}`
    );
  } finally {
    await cache.flush();
  }
}

main().catch((error) => {
  console.error(chalk.red('✗ relate-events failed:'), error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
