/**
 * Embedding Cache
 *
 * Text embeddings keyed by normalized text, persisted as one JSON file.
 * The owner calls `load()` before use and `flush()` when done; nothing is
 * written implicitly.
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

const cacheFileSchema = z.record(z.string(), z.array(z.number()));

export type Embedding = readonly number[];

/**
 * Cache key of a text: trimmed and lower-cased.
 */
export function embeddingKey(text: string): string {
  return text.trim().toLowerCase();
}

export class EmbeddingCache {
  private entries = new Map<string, Embedding>();
  private dirty = false;

  constructor(private filePath: string) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * Replace in-memory entries with the file's. A missing file is an empty
   * cache; an unreadable one is reported and treated as empty.
   */
  async load(): Promise<void> {
    this.entries.clear();
    this.dirty = false;

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
      throw error;
    }

    try {
      const parsed = cacheFileSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        console.warn(`[EmbeddingCache] Ignoring malformed cache file ${this.filePath}`);
        return;
      }
      for (const [key, embedding] of Object.entries(parsed.data)) {
        this.entries.set(key, embedding);
      }
    } catch (error) {
      console.warn(`[EmbeddingCache] Could not parse ${this.filePath}:`, error);
    }
  }

  /**
   * Write the cache atomically (temp file + rename). No-op when unchanged.
   */
  async flush(): Promise<void> {
    if (!this.dirty) return;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(Object.fromEntries(this.entries)), 'utf-8');
    await fs.rename(tempPath, this.filePath);
    this.dirty = false;
  }

  get(text: string): Embedding | undefined {
    return this.entries.get(embeddingKey(text));
  }

  has(text: string): boolean {
    return this.entries.has(embeddingKey(text));
  }

  set(text: string, embedding: Embedding): void {
    this.entries.set(embeddingKey(text), Object.freeze([...embedding]));
    this.dirty = true;
  }
}
