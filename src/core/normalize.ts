/**
 * Field coercion helpers
 *
 * Upstream payloads are loosely typed: numbers arrive as strings, arrays as
 * JSON-encoded strings, dates in several formats. None of these helpers
 * throws; a value that cannot be coerced becomes `null`.
 */

import type { RawRecord } from './types.js';

/** Epoch values above this are milliseconds, below it seconds */
export const EPOCH_MS_THRESHOLD = 1e12;

const EPOCH_STRING_PATTERN = /^\d+(?:\.\d+)?$/;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (!text) return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseInteger(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : null;
  if (typeof value !== 'string') return null;
  const text = value.trim();
  return /^[+-]?\d+$/.test(text) ? Number.parseInt(text, 10) : null;
}

export function parseBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return null;
}

export function optionalString(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return null;
}

function fromEpoch(value: number): Date | null {
  if (!Number.isFinite(value)) return null;
  const ms = Math.abs(value) > EPOCH_MS_THRESHOLD ? value : value * 1000;
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Rejects dates such as Feb 30 that `Date` would roll over */
function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function fromIsoString(text: string): Date | null {
  const match = ISO_PATTERN.exec(text.trim());
  if (!match) return null;
  const [, year, month, day, hour = '00', minute = '00', second = '00', fraction, zone] = match;
  if (!isCalendarDate(Number(year), Number(month), Number(day))) return null;

  let offset = 'Z';
  if (zone && zone.toUpperCase() !== 'Z') {
    const digits = zone.slice(1).replace(':', '');
    offset = `${zone[0]}${digits.slice(0, 2)}:${digits.slice(2, 4) || '00'}`;
  }
  const millis = fraction ? `.${fraction.padEnd(3, '0').slice(0, 3)}` : '';
  const date = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}${millis}${offset}`);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Normalize a timestamp to a UTC instant.
 *
 * Accepts Date objects, ISO-8601 strings (offset optional, naive values are
 * UTC, bare dates are midnight UTC) and epoch seconds or milliseconds, as
 * numbers or digit strings (the CLOB sends `match_time` that way).
 */
export function parseDateTime(value: unknown): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value === 'number') return fromEpoch(value);
  if (typeof value === 'string') {
    const text = value.trim();
    return EPOCH_STRING_PATTERN.test(text) ? fromEpoch(Number(text)) : fromIsoString(text);
  }
  return null;
}

/**
 * Epoch timestamp that may arrive as a number or a numeric string.
 */
export function parseUnixTimestamp(value: unknown): Date | null {
  const ts = parseNumber(value);
  return ts === null ? null : fromEpoch(ts);
}

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Gamma returns some arrays as JSON strings; normalize them to string[].
 * Falls back to a bracket-stripping comma split when the text is not JSON.
 */
export function parseJsonList(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value.map((item) => String(item));
  if (typeof value !== 'string') return [String(value)];

  const text = value.trim();
  if (!text) return [];

  let parsed: unknown = null;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = null;
  }
  if (Array.isArray(parsed)) return parsed.map((item) => String(item));

  return text
    .replace(/^\[+|\]+$/g, '')
    .split(',')
    .map((part) => part.trim().replace(/^['"]+|['"]+$/g, ''))
    .filter((part) => part.length > 0);
}

/**
 * Return the first candidate key whose value is not null/undefined/empty.
 */
export function firstPresent(raw: RawRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (value !== null && value !== undefined && value !== '') return value;
  }
  return null;
}

/**
 * Return the first candidate key that parses as a timestamp.
 */
export function firstDateTime(raw: RawRecord, keys: readonly string[]): Date | null {
  for (const key of keys) {
    const parsed = parseDateTime(raw[key]);
    if (parsed !== null) return parsed;
  }
  return null;
}

export const CREATED_AT_KEYS = ['createdAt', 'creationDate'] as const;
export const RESOLVED_AT_KEYS = ['resolvedAt', 'resolutionDate', 'endDate'] as const;
