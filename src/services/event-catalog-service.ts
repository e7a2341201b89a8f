/**
 * EventCatalogService
 *
 * Builds the stored event list: every listed event (markets excluded) whose
 * slug is not a crypto price ladder, newest first.
 */

import type { PolymarketSDK } from '../polymarket-sdk.js';
import { paginateOffset } from '../core/pagination.js';
import type { Event, EventSummary } from '../core/types.js';
import { summarize, type SummaryStats } from '../utils/stats.js';

// ===== Types =====

export interface EventCatalogConfig {
  /** Events per listing page (default: 500) */
  pageSize?: number;
  /** Lower-case substrings that exclude an event when found in its slug */
  excludeSlugKeywords?: readonly string[];
  /** Called after each page */
  onPage?: (offset: number, count: number) => void;
}

export const DEFAULT_EXCLUDED_SLUG_KEYWORDS = ['btc', 'eth', 'xrp', 'sol'] as const;

/**
 * `YYYY-MM-DD` of an instant, in UTC
 */
export function formatDay(date: Date | null): string | null {
  return date === null ? null : date.toISOString().slice(0, 10);
}

export function toEventSummary(event: Event): EventSummary {
  return {
    id: event.id,
    title: event.title,
    slug: event.slug,
    volume: event.volume,
    createdAt: formatDay(event.createdAt),
  };
}

export function isExcludedSlug(slug: string | null, keywords: readonly string[]): boolean {
  const normalized = (slug ?? '').toLowerCase();
  return keywords.some((keyword) => normalized.includes(keyword));
}

/**
 * Newest first; events without a creation date last.
 */
export function sortByCreatedDesc(summaries: readonly EventSummary[]): EventSummary[] {
  return [...summaries].sort((a, b) => (b.createdAt ?? '').localeCompare(a.createdAt ?? ''));
}

/**
 * Volume statistics of the summaries that carry a volume
 */
export function volumeStats(summaries: readonly EventSummary[]): SummaryStats | null {
  const volumes = summaries
    .map((summary) => summary.volume)
    .filter((volume): volume is number => volume !== null);
  return summarize(volumes);
}

// ===== Service =====

export class EventCatalogService {
  private pageSize: number;
  private excludeSlugKeywords: readonly string[];
  private onPage?: (offset: number, count: number) => void;

  constructor(
    private sdk: PolymarketSDK,
    config: EventCatalogConfig = {}
  ) {
    this.pageSize = config.pageSize ?? 500;
    this.excludeSlugKeywords = config.excludeSlugKeywords ?? DEFAULT_EXCLUDED_SLUG_KEYWORDS;
    this.onPage = config.onPage;
  }

  async collectEventSummaries(): Promise<EventSummary[]> {
    const events = await paginateOffset(
      async (offset, limit) => {
        const page = await this.sdk.listEventsPage({ limit, offset, includeMarkets: false });
        this.onPage?.(offset, page.items.length);
        return page;
      },
      { pageSize: this.pageSize }
    );

    const summaries = events
      .filter((event) => !isExcludedSlug(event.slug, this.excludeSlugKeywords))
      .map(toEventSummary);
    return sortByCreatedDesc(summaries);
  }
}
