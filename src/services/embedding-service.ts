/**
 * EmbeddingService
 *
 * Embeds texts through OpenRouter with a persistent cache in front:
 * - only cache misses are requested, each distinct text once
 * - misses go out in batches, a few batches at a time
 * - a failed batch is logged and leaves null slots; other batches still land
 */

import type { OpenRouterClient } from '../clients/openrouter.js';
import { EmbeddingCache, embeddingKey, type Embedding } from '../core/embedding-cache.js';
import { runBounded } from '../core/worker-pool.js';
import { relationMatrix } from '../utils/stats.js';

// ===== Types =====

export interface EmbeddingServiceConfig {
  model: string;
  /** Texts per request (default: 256) */
  batchSize?: number;
  /** Requests in flight (default: 4) */
  concurrency?: number;
}

export interface RelationResult {
  /** Positions in the input of the texts that could be embedded */
  indices: number[];
  /** Pairwise dot products among those texts */
  matrix: number[][];
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) throw new RangeError('size must be positive');
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ===== Service =====

export class EmbeddingService {
  private model: string;
  private batchSize: number;
  private concurrency: number;

  constructor(
    private client: OpenRouterClient,
    private cache: EmbeddingCache,
    config: EmbeddingServiceConfig
  ) {
    this.model = config.model;
    this.batchSize = config.batchSize ?? 256;
    this.concurrency = config.concurrency ?? 4;
  }

  /**
   * Embeddings aligned with `texts`; null where the batch failed.
   */
  async embedTexts(texts: readonly string[]): Promise<(Embedding | null)[]> {
    const misses = [...new Set(texts.map(embeddingKey))].filter((key) => !this.cache.has(key));

    if (misses.length > 0) {
      const batches = chunk(misses, this.batchSize);
      await runBounded(
        batches,
        async (batch) => {
          const vectors = await this.client.embed(this.model, batch);
          batch.forEach((key, idx) => this.cache.set(key, vectors[idx]));
          return true;
        },
        {
          concurrency: this.concurrency,
          fallback: false,
          onError: (error, batch, index) => {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[EmbeddingService] Batch ${index} (${batch.length} texts) failed: ${message}`);
          },
        }
      );
    }

    return texts.map((text) => this.cache.get(text) ?? null);
  }

  /**
   * Relation matrix of the texts that could be embedded.
   */
  async relate(texts: readonly string[]): Promise<RelationResult> {
    const embeddings = await this.embedTexts(texts);
    const indices: number[] = [];
    const vectors: Embedding[] = [];
    embeddings.forEach((embedding, idx) => {
      if (embedding === null) return;
      indices.push(idx);
      vectors.push(embedding);
    });
    return { indices, matrix: relationMatrix(vectors) };
  }
}
