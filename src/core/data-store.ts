/**
 * Data Store
 * JSON files under the data directory shared by the pipeline scripts
 *
 *   events.json                         EventSummary[]
 *   event_scores.json                   { [eventId]: score }
 *   trades/<eventId>/metadata.json      EventMetadata (written once)
 *   trades/<eventId>/<marketId>.json    MarketTradeSummary[]
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ErrorCode, SdkError } from './errors.js';
import type { EventMetadata, EventSummary, MarketTradeSummary } from './types.js';

// ===== Schemas =====

export const eventSummarySchema = z.object({
  id: z.coerce.string(),
  title: z.string().nullable(),
  slug: z.string().nullable(),
  volume: z.number().nullable(),
  createdAt: z.string().nullable(),
});

export const eventScoresSchema = z.record(z.string(), z.number());

export const marketTradeSummarySchema = z.object({
  account: z.string(),
  side: z.string().nullable(),
  value: z.number(),
  timestamp: z.string().nullable(),
});

export const eventMetadataSchema = z.object({
  generatedAt: z.string(),
  createdAt: z.string().nullable(),
  resolvedAt: z.string().nullable(),
  resolution: z.enum(['yes', 'no']),
});

export type EventScores = Record<string, number>;

export interface DataStoreOptions {
  basePath: string;
  prettyPrint?: boolean;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class DataStore {
  private readonly basePath: string;
  private readonly prettyPrint: boolean;

  constructor(options: DataStoreOptions) {
    this.basePath = options.basePath;
    this.prettyPrint = options.prettyPrint ?? true;
  }

  /**
   * Full path for a key relative to the data directory
   */
  getPath(...segments: string[]): string {
    return path.join(this.basePath, ...segments);
  }

  // ===== Generic JSON =====

  /**
   * Read and validate a JSON file; null when it does not exist.
   */
  async read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const filePath = this.getPath(key);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new SdkError(
        ErrorCode.INVALID_RESPONSE,
        `Invalid JSON in ${filePath}`,
        false,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new SdkError(
        ErrorCode.INVALID_RESPONSE,
        `Unexpected content in ${filePath}: ${parsed.error.issues[0]?.message ?? 'invalid'}`
      );
    }
    return parsed.data;
  }

  async write(key: string, data: unknown): Promise<void> {
    const filePath = this.getPath(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    const content = this.prettyPrint ? JSON.stringify(data, null, 2) : JSON.stringify(data);
    await fs.writeFile(filePath, content, 'utf-8');
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.getPath(key));
      return true;
    } catch {
      return false;
    }
  }

  // ===== Pipeline artifacts =====

  async readEvents(): Promise<EventSummary[]> {
    return (await this.read('events.json', z.array(eventSummarySchema))) ?? [];
  }

  async writeEvents(events: readonly EventSummary[]): Promise<void> {
    await this.write('events.json', events);
  }

  async readEventScores(): Promise<EventScores> {
    return (await this.read('event_scores.json', eventScoresSchema)) ?? {};
  }

  async writeEventScores(scores: EventScores): Promise<void> {
    await this.write('event_scores.json', scores);
  }

  async readMarketTrades(eventId: string, marketId: string): Promise<MarketTradeSummary[] | null> {
    return this.read(path.join('trades', eventId, `${marketId}.json`), z.array(marketTradeSummarySchema));
  }

  async writeMarketTrades(
    eventId: string,
    marketId: string,
    trades: readonly MarketTradeSummary[]
  ): Promise<void> {
    await this.write(path.join('trades', eventId, `${marketId}.json`), trades);
  }

  async readEventMetadata(eventId: string): Promise<EventMetadata | null> {
    return this.read(path.join('trades', eventId, 'metadata.json'), eventMetadataSchema);
  }

  /**
   * Write an event's metadata unless it already exists.
   * @returns true when the file was written
   */
  async writeEventMetadataOnce(eventId: string, metadata: EventMetadata): Promise<boolean> {
    const key = path.join('trades', eventId, 'metadata.json');
    if (await this.exists(key)) return false;
    await this.write(key, metadata);
    return true;
  }
}

/**
 * Create a data store
 */
export function createDataStore(basePath: string, options?: Partial<DataStoreOptions>): DataStore {
  return new DataStore({
    basePath,
    prettyPrint: options?.prettyPrint ?? true,
  });
}
