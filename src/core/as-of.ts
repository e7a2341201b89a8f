/**
 * As-of (point-in-time) filtering
 *
 * When a reference instant is set, records created after it are hidden and
 * fields that reveal later state are either rebuilt from history bounded by
 * the instant or nulled. Which is which lives in one table per record kind.
 */

import { SdkError } from './errors.js';
import { firstDateTime, parseDateTime } from './normalize.js';
import type { RawRecord } from './types.js';

/**
 * - live: static once the record exists, returned as-is
 * - history: rebuilt from time-bounded history lookups
 * - nulled: no historical source, always null under as-of
 */
export type FieldPolicy = 'live' | 'history' | 'nulled';

export interface FieldRule {
  readonly policy: FieldPolicy;
  /** Raw payload keys backing the field, in priority order */
  readonly rawKeys: readonly string[];
}

export type FieldTable<K extends string> = Readonly<Record<K, FieldRule>>;

const live = (...rawKeys: string[]): FieldRule => ({ policy: 'live', rawKeys });
const history = (...rawKeys: string[]): FieldRule => ({ policy: 'history', rawKeys });
const nulled = (...rawKeys: string[]): FieldRule => ({ policy: 'nulled', rawKeys });

export const EVENT_FIELDS = {
  id: live('id'),
  title: live('title'),
  slug: live('slug'),
  description: live('description'),
  startDate: live('startDate'),
  endDate: live('endDate'),
  createdAt: live('createdAt', 'creationDate'),
  updatedAt: nulled('updatedAt'),
  active: nulled('active'),
  closed: nulled('closed'),
  volume: nulled('volume'),
  liquidity: nulled('liquidity'),
  markets: history('markets'),
} as const satisfies FieldTable<string>;

export const MARKET_FIELDS = {
  id: live('id'),
  question: live('question'),
  slug: live('slug'),
  description: live('description'),
  conditionId: live('conditionId', 'condition_id'),
  outcomes: live('outcomes'),
  clobTokenIds: live('clobTokenIds'),
  startDate: live('startDate'),
  endDate: live('endDate'),
  createdAt: live('createdAt'),
  outcomePrices: history('outcomePrices'),
  updatedAt: nulled('updatedAt'),
  active: nulled('active'),
  closed: nulled('closed'),
  volume: nulled('volume'),
} as const satisfies FieldTable<string>;

export const TRADE_FIELDS = {
  status: nulled('status'),
  lastUpdate: nulled('last_update'),
} as const satisfies FieldTable<string>;

/** Keys tried, in order, to decide when a record became visible */
export const EVENT_VISIBILITY_KEYS = EVENT_FIELDS.createdAt.rawKeys;
export const MARKET_VISIBILITY_KEYS = MARKET_FIELDS.createdAt.rawKeys;

/**
 * A record is visible when its first resolvable creation timestamp is at or
 * before `asOf`. Records without one are not visible. Everything is visible
 * when `asOf` is null.
 */
export function isVisible(asOf: Date | null, raw: RawRecord, keys: readonly string[]): boolean {
  if (asOf === null) return true;
  const seen = firstDateTime(raw, keys);
  return seen !== null && seen.getTime() <= asOf.getTime();
}

export function filterVisible<T extends RawRecord>(
  asOf: Date | null,
  items: readonly T[],
  keys: readonly string[]
): T[] {
  if (asOf === null) return [...items];
  return items.filter((item) => isVisible(asOf, item, keys));
}

/**
 * Resolve one field through its rule.
 * `historical` is only consulted for `history` fields under as-of.
 */
export function resolveField<T>(
  rule: FieldRule,
  asOf: Date | null,
  liveValue: T,
  historical: T | null = null
): T | null {
  if (asOf === null || rule.policy === 'live') return liveValue;
  if (rule.policy === 'history') return historical;
  return null;
}

/**
 * Copy of `raw` safe to hand out under as-of: live keys are kept, history
 * and nulled keys are set to null, unknown keys are dropped.
 */
export function redactRaw(
  raw: RawRecord,
  table: FieldTable<string>,
  asOf: Date | null
): RawRecord {
  if (asOf === null) return { ...raw };
  const redacted: RawRecord = {};
  for (const rule of Object.values(table)) {
    for (const key of rule.rawKeys) {
      if (rule.policy === 'live') {
        if (key in raw) redacted[key] = raw[key];
      } else {
        redacted[key] = null;
      }
    }
  }
  if ('id' in redacted && redacted.id !== null && redacted.id !== undefined) {
    redacted.id = String(redacted.id);
  }
  return redacted;
}

/**
 * Parse a caller-supplied reference instant. Bare dates mean midnight UTC.
 * `null`/`undefined` clear the instant; anything else must parse.
 *
 * @throws SdkError(INVALID_CONFIG) for a value that is not a timestamp
 */
export function parseAsOf(value: unknown): Date | null {
  if (value === null || value === undefined) return null;
  const parsed = parseDateTime(value);
  if (parsed === null) {
    throw SdkError.config(`Invalid as-of instant: ${String(value)}`);
  }
  return parsed;
}

/**
 * Whether `date` lies strictly after the reference instant.
 */
export function isAfter(asOf: Date | null, date: Date | null): boolean {
  return asOf !== null && date !== null && date.getTime() > asOf.getTime();
}
