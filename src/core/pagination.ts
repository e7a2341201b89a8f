/**
 * Pagination drivers
 *
 * Three upstream conventions, each with a termination condition that does
 * not depend on the server behaving: an empty page always ends the loop and
 * every loop has a page or offset ceiling.
 */

/** First-page cursor of the CLOB API ("0" base64-encoded) */
export const INITIAL_CURSOR = 'MA==';
/** Terminal cursor of the CLOB API ("-1" base64-encoded) */
export const END_CURSOR = 'LTE=';

export const DEFAULT_MAX_PAGES = 1000;

// ===== Offset / limit =====

export interface OffsetPaginationOptions {
  pageSize: number;
  startOffset?: number;
  /** Highest offset that may be requested */
  maxOffset?: number;
  maxPages?: number;
}

/**
 * One offset page. `received` counts the rows the server sent before any
 * client-side filtering; paging decisions use it instead of `items.length`.
 */
export interface OffsetPage<T> {
  items: readonly T[];
  received: number;
}

export type OffsetPageResult<T> = readonly T[] | OffsetPage<T>;

export type OffsetPageFetcher<T> = (offset: number, limit: number) => Promise<OffsetPageResult<T>>;

function toOffsetPage<T>(result: OffsetPageResult<T>): OffsetPage<T> {
  if ('items' in result) return result;
  return { items: result, received: result.length };
}

/**
 * Advance by `pageSize` until the server sends fewer rows than requested.
 */
export async function paginateOffset<T>(
  fetchPage: OffsetPageFetcher<T>,
  options: OffsetPaginationOptions
): Promise<T[]> {
  const { pageSize, maxOffset = Number.POSITIVE_INFINITY, maxPages = DEFAULT_MAX_PAGES } = options;
  if (pageSize <= 0) throw new RangeError('pageSize must be positive');

  const all: T[] = [];
  let offset = options.startOffset ?? 0;
  let pages = 0;

  while (offset <= maxOffset && pages < maxPages) {
    const page = toOffsetPage(await fetchPage(offset, pageSize));
    pages++;
    all.push(...page.items);
    if (page.received < pageSize) break;
    offset += pageSize;
  }

  return all;
}

// ===== Cursor =====

export interface CursorPage<T> {
  items: readonly T[];
  /** null when the response carried no cursor */
  nextCursor: string | null;
  /**
   * Entries the server sent, before any client-side filtering.
   * Defaults to `items.length`; only a page with nothing received ends the loop.
   */
  received?: number;
}

export interface CursorPaginationOptions {
  initialCursor?: string;
  endCursor?: string;
  maxPages?: number;
}

export type CursorPageFetcher<T> = (cursor: string) => Promise<CursorPage<T> | null>;

/**
 * Follow opaque cursors from `initialCursor` until the end sentinel, a
 * missing or repeated cursor, an empty page, or `maxPages`.
 * A null page (empty response) also ends the loop.
 */
export async function paginateCursor<T>(
  fetchPage: CursorPageFetcher<T>,
  options: CursorPaginationOptions = {}
): Promise<T[]> {
  const {
    initialCursor = INITIAL_CURSOR,
    endCursor = END_CURSOR,
    maxPages = DEFAULT_MAX_PAGES,
  } = options;

  const all: T[] = [];
  const visited = new Set<string>();
  let cursor: string | null = initialCursor;
  let pages = 0;

  while (cursor !== null && cursor !== endCursor && !visited.has(cursor) && pages < maxPages) {
    visited.add(cursor);
    const page: CursorPage<T> | null = await fetchPage(cursor);
    pages++;
    if (page === null) break;
    all.push(...page.items);
    if ((page.received ?? page.items.length) === 0) break;
    cursor = page.nextCursor;
  }

  return all;
}

// ===== Dual-side offset =====

export interface SidePaginationOptions<T> {
  pageSize: number;
  /** Highest offset requested per side; fills beyond it are not reachable */
  maxOffset: number;
  /** Natural key used to drop entries seen on an earlier page or side */
  keyOf: (item: T) => string;
  /** Keep-filter applied before deduplication */
  accept?: (item: T) => boolean;
}

export interface SidePaginationResult<T> {
  items: T[];
  /** True when some side stopped at `maxOffset` with a full last page */
  truncated: boolean;
}

export type SidePageFetcher<S, T> = (
  side: S,
  offset: number,
  limit: number
) => Promise<OffsetPageResult<T>>;

/**
 * Enumerate each side with its own offset loop bounded by `maxOffset`,
 * deduplicating across pages and sides.
 */
export async function paginateSides<S, T>(
  sides: readonly S[],
  fetchPage: SidePageFetcher<S, T>,
  options: SidePaginationOptions<T>
): Promise<SidePaginationResult<T>> {
  const { pageSize, maxOffset, keyOf, accept } = options;
  if (pageSize <= 0) throw new RangeError('pageSize must be positive');

  const items: T[] = [];
  const seen = new Set<string>();
  let truncated = false;

  for (const side of sides) {
    let offset = 0;
    while (offset <= maxOffset) {
      const page = toOffsetPage(await fetchPage(side, offset, pageSize));
      if (page.received === 0) break;

      for (const item of page.items) {
        if (accept && !accept(item)) continue;
        const key = keyOf(item);
        if (seen.has(key)) continue;
        seen.add(key);
        items.push(item);
      }

      if (page.received < pageSize) break;
      if (offset + pageSize > maxOffset) {
        truncated = true;
        break;
      }
      offset += pageSize;
    }
  }

  return { items, truncated };
}
