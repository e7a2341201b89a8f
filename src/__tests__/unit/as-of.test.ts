/**
 * As-of filtering unit tests
 */

import { describe, it, expect } from 'vitest';
import {
  EVENT_FIELDS,
  EVENT_VISIBILITY_KEYS,
  MARKET_FIELDS,
  filterVisible,
  isAfter,
  isVisible,
  parseAsOf,
  redactRaw,
  resolveField,
} from '../../core/as-of.js';
import { ErrorCode, SdkError } from '../../core/errors.js';
import { buildEvent } from '../../core/records.js';

const eventRaw = {
  id: 7,
  title: 'Sample event',
  slug: 'sample-event',
  createdAt: '2024-01-01T00:00:00Z',
  volume: '1500',
  active: true,
  closed: false,
  somethingElse: 'x',
};

describe('isVisible', () => {
  it('shows everything when no instant is set', () => {
    expect(isVisible(null, {}, EVENT_VISIBILITY_KEYS)).toBe(true);
  });

  it('hides records created after the instant', () => {
    expect(isVisible(parseAsOf('2023-12-31'), eventRaw, EVENT_VISIBILITY_KEYS)).toBe(false);
  });

  it('shows records created at or before the instant', () => {
    expect(isVisible(parseAsOf('2024-06-01'), eventRaw, EVENT_VISIBILITY_KEYS)).toBe(true);
    expect(isVisible(parseAsOf('2024-01-01T00:00:00Z'), eventRaw, EVENT_VISIBILITY_KEYS)).toBe(true);
  });

  it('falls back to creationDate', () => {
    const raw = { creationDate: '2023-05-01' };
    expect(isVisible(parseAsOf('2023-06-01'), raw, EVENT_VISIBILITY_KEYS)).toBe(true);
  });

  it('hides records without a resolvable creation time', () => {
    expect(isVisible(parseAsOf('2024-06-01'), { createdAt: 'n/a' }, EVENT_VISIBILITY_KEYS)).toBe(false);
  });

  it('filters listings', () => {
    const items = [
      { id: 'a', createdAt: '2023-01-01' },
      { id: 'b', createdAt: '2025-01-01' },
      { id: 'c' },
    ];
    expect(filterVisible(parseAsOf('2024-01-01'), items, EVENT_VISIBILITY_KEYS).map((i) => i.id)).toEqual(['a']);
    expect(filterVisible(null, items, EVENT_VISIBILITY_KEYS)).toHaveLength(3);
  });
});

describe('resolveField', () => {
  const asOf = new Date('2024-01-01T00:00:00Z');

  it('returns live values unchanged without an instant', () => {
    expect(resolveField(EVENT_FIELDS.volume, null, 10)).toBe(10);
    expect(resolveField(MARKET_FIELDS.outcomePrices, null, [0.4], [0.3])).toEqual([0.4]);
  });

  it('applies the field policy under an instant', () => {
    expect(resolveField(EVENT_FIELDS.title, asOf, 'Title')).toBe('Title');
    expect(resolveField(EVENT_FIELDS.volume, asOf, 10)).toBeNull();
    expect(resolveField(MARKET_FIELDS.outcomePrices, asOf, [0.4], [0.3])).toEqual([0.3]);
    expect(resolveField(MARKET_FIELDS.outcomePrices, asOf, [0.4])).toBeNull();
  });
});

describe('redactRaw', () => {
  it('copies the payload when no instant is set', () => {
    const copy = redactRaw(eventRaw, EVENT_FIELDS, null);
    expect(copy).toEqual(eventRaw);
    expect(copy).not.toBe(eventRaw);
  });

  it('keeps live keys, nulls the rest and drops unknown keys', () => {
    const redacted = redactRaw(eventRaw, EVENT_FIELDS, new Date('2024-06-01T00:00:00Z'));
    expect(redacted).toEqual({
      id: '7',
      title: 'Sample event',
      slug: 'sample-event',
      createdAt: '2024-01-01T00:00:00Z',
      updatedAt: null,
      active: null,
      closed: null,
      volume: null,
      liquidity: null,
      markets: null,
    });
  });
});

describe('as-of event example', () => {
  it('is visible with its volume hidden as of mid-2024', () => {
    const asOf = parseAsOf('2024-06-01');
    expect(isVisible(asOf, eventRaw, EVENT_VISIBILITY_KEYS)).toBe(true);

    const event = buildEvent(eventRaw, { asOf, markets: null });
    expect(event.id).toBe('7');
    expect(event.volume).toBeNull();
    expect(event.active).toBeNull();
    expect(event.createdAt?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('keeps live values without an instant', () => {
    const event = buildEvent(eventRaw, { asOf: null, markets: null });
    expect(event.volume).toBe(1500);
    expect(event.active).toBe(true);
    expect(event.raw.somethingElse).toBe('x');
  });
});

describe('isAfter', () => {
  it('is false without an instant or a date', () => {
    expect(isAfter(null, new Date())).toBe(false);
    expect(isAfter(new Date(), null)).toBe(false);
  });

  it('is strict', () => {
    const asOf = new Date('2024-01-01T00:00:00Z');
    expect(isAfter(asOf, new Date('2024-01-01T00:00:00Z'))).toBe(false);
    expect(isAfter(asOf, new Date('2024-01-01T00:00:01Z'))).toBe(true);
  });
});

describe('parseAsOf', () => {
  it('reads bare dates as midnight UTC', () => {
    expect(parseAsOf('2024-06-01')?.toISOString()).toBe('2024-06-01T00:00:00.000Z');
  });

  it('clears the instant for null and undefined', () => {
    expect(parseAsOf(null)).toBeNull();
    expect(parseAsOf(undefined)).toBeNull();
  });

  it('rejects values that are not timestamps', () => {
    for (const value of ['not-a-date', '2024-02-30', '', {}]) {
      const error = (() => {
        try {
          parseAsOf(value);
          return null;
        } catch (caught) {
          return caught;
        }
      })();
      expect(error).toBeInstanceOf(SdkError);
      expect(error).toMatchObject({ code: ErrorCode.INVALID_CONFIG, retryable: false });
    }
  });
});
