/**
 * Pagination driver unit tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  END_CURSOR,
  INITIAL_CURSOR,
  paginateCursor,
  paginateOffset,
  paginateSides,
  type CursorPage,
  type OffsetPage,
} from '../../core/pagination.js';

const range = (start: number, count: number) => Array.from({ length: count }, (_, i) => start + i);

describe('paginateOffset', () => {
  it('stops after a short page', async () => {
    const sizes = [500, 500, 200];
    const fetchPage = vi.fn(async (offset: number) => range(offset, sizes[offset / 500] ?? 0));

    const rows = await paginateOffset(fetchPage, { pageSize: 500 });

    expect(rows).toHaveLength(1200);
    expect(fetchPage).toHaveBeenCalledTimes(3);
    expect(fetchPage.mock.calls.map((call) => call[0])).toEqual([0, 500, 1000]);
  });

  it('stops on an empty page', async () => {
    const fetchPage = vi.fn(async (offset: number) => (offset === 0 ? range(0, 10) : []));
    const rows = await paginateOffset(fetchPage, { pageSize: 10 });
    expect(rows).toHaveLength(10);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('respects maxOffset and maxPages', async () => {
    const full = vi.fn(async (offset: number, limit: number) => range(offset, limit));
    expect(await paginateOffset(full, { pageSize: 10, maxOffset: 20 })).toHaveLength(30);
    expect(await paginateOffset(full, { pageSize: 10, maxPages: 2 })).toHaveLength(20);
  });

  it('rejects a non-positive page size', async () => {
    await expect(paginateOffset(async () => [], { pageSize: 0 })).rejects.toThrow(RangeError);
  });

  it('advances on rows received, not rows kept', async () => {
    const pages: Record<number, OffsetPage<number>> = {
      0: { items: [], received: 4 },
      4: { items: [5, 6], received: 4 },
      8: { items: [9], received: 1 },
    };
    const fetchPage = vi.fn(
      async (offset: number): Promise<OffsetPage<number>> => pages[offset] ?? { items: [], received: 0 }
    );

    expect(await paginateOffset(fetchPage, { pageSize: 4 })).toEqual([5, 6, 9]);
    expect(fetchPage.mock.calls.map((call) => call[0])).toEqual([0, 4, 8]);
  });
});

describe('paginateCursor', () => {
  it('follows cursors from the initial one to the end sentinel', async () => {
    const pages: Record<string, CursorPage<number>> = {
      [INITIAL_CURSOR]: { items: [1, 2], nextCursor: 'c2' },
      c2: { items: [3], nextCursor: END_CURSOR },
    };
    const fetchPage = vi.fn(async (cursor: string) => pages[cursor] ?? null);

    expect(await paginateCursor(fetchPage)).toEqual([1, 2, 3]);
    expect(fetchPage.mock.calls.map((call) => call[0])).toEqual([INITIAL_CURSOR, 'c2']);
  });

  it('stops on a repeated cursor', async () => {
    const fetchPage = vi.fn(async () => ({ items: [1], nextCursor: 'loop' }));
    expect(await paginateCursor(fetchPage)).toEqual([1, 1]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('stops on a missing cursor, a null page or an empty page', async () => {
    expect(await paginateCursor(async () => ({ items: [1], nextCursor: null }))).toEqual([1]);
    expect(await paginateCursor(async () => null)).toEqual([]);

    const empty = vi.fn(async () => ({ items: [], nextCursor: 'next' }));
    expect(await paginateCursor(empty)).toEqual([]);
    expect(empty).toHaveBeenCalledTimes(1);
  });

  it('keeps going when a filtered page was received in full', async () => {
    const pages: Record<string, CursorPage<number>> = {
      [INITIAL_CURSOR]: { items: [], nextCursor: 'c2', received: 5 },
      c2: { items: [9], nextCursor: END_CURSOR },
    };
    expect(await paginateCursor(async (cursor) => pages[cursor] ?? null)).toEqual([9]);
  });

  it('honors maxPages and a starting cursor', async () => {
    let n = 0;
    const fetchPage = vi.fn(async () => ({ items: [n], nextCursor: `c${++n}` }));
    expect(await paginateCursor(fetchPage, { initialCursor: 'start', maxPages: 3 })).toEqual([0, 1, 2]);
    expect(fetchPage.mock.calls[0]).toEqual(['start']);
  });
});

describe('paginateSides', () => {
  interface Fill {
    id: string;
    value: number;
  }

  it('walks each side and deduplicates across them', async () => {
    const data: Record<string, Fill[]> = {
      BUY: [
        { id: 'a', value: 600 },
        { id: 'b', value: 700 },
      ],
      SELL: [
        { id: 'b', value: 700 },
        { id: 'c', value: 100 },
      ],
    };
    const fetchPage = vi.fn(async (side: string, offset: number, limit: number) =>
      (data[side] ?? []).slice(offset, offset + limit)
    );

    const result = await paginateSides(['BUY', 'SELL'], fetchPage, {
      pageSize: 10,
      maxOffset: 100,
      keyOf: (fill) => fill.id,
      accept: (fill) => fill.value >= 500,
    });

    expect(result.items.map((fill) => fill.id)).toEqual(['a', 'b']);
    expect(result.truncated).toBe(false);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('flags truncation at the offset ceiling', async () => {
    const fetchPage = vi.fn(async (_side: string, offset: number, limit: number) =>
      range(offset, limit).map((n) => ({ id: String(n), value: n }))
    );

    const result = await paginateSides(['BUY'], fetchPage, {
      pageSize: 10,
      maxOffset: 10,
      keyOf: (fill) => fill.id,
    });

    expect(fetchPage.mock.calls.map((call) => call[1])).toEqual([0, 10]);
    expect(result.items).toHaveLength(20);
    expect(result.truncated).toBe(true);
  });

  it('keeps paging past a page that was filtered to nothing', async () => {
    const pages: Record<string, OffsetPage<Fill>> = {
      'BUY:0': { items: [], received: 2 },
      'BUY:2': { items: [{ id: 'x', value: 900 }], received: 2 },
      'BUY:4': { items: [], received: 0 },
    };
    const fetchPage = vi.fn(
      async (side: string, offset: number): Promise<OffsetPage<Fill>> =>
        pages[`${side}:${offset}`] ?? { items: [], received: 0 }
    );

    const result = await paginateSides(['BUY'], fetchPage, {
      pageSize: 2,
      maxOffset: 100,
      keyOf: (fill) => fill.id,
    });

    expect(result).toEqual({ items: [{ id: 'x', value: 900 }], truncated: false });
    expect(fetchPage.mock.calls.map((call) => call[1])).toEqual([0, 2, 4]);
  });
});
