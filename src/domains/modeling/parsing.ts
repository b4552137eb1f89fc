// ──────────────────────────────────────────
// Modeling: Field parsers shared by the platform mappers
// ──────────────────────────────────────────
// Parsers never throw. Absent input yields `missing`, input that is present
// but cannot be read yields `unparsable` with the original value attached.

import { CalendarDate, FieldResult, RawDocument } from '../../shared/types';

export function ok<T>(value: T): FieldResult<T> {
  return { status: 'ok', value };
}

export const MISSING: FieldResult<never> = { status: 'missing' };

export function unparsable<T>(raw: unknown): FieldResult<T> {
  return { status: 'unparsable', raw };
}

export function valueOf<T>(result: FieldResult<T>): T | null {
  return result.status === 'ok' ? result.value : null;
}

export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

export function asRecord(value: unknown): RawDocument | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

export function asRecords(value: unknown): RawDocument[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap((entry) => {
    const record = asRecord(entry);
    return record ? [record] : [];
  });
}

/** Trimmed text for strings and numbers, empty string for anything else. */
export function text(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

/** Identifier text, or null when blank. */
export function identifier(value: unknown): string | null {
  const id = text(value);
  return id === '' ? null : id;
}

/** Decimal in major units. Strings may carry thousands separators. */
export function parseDecimal(value: unknown): FieldResult<number> {
  if (isBlank(value)) return MISSING;
  if (typeof value === 'number') return Number.isFinite(value) ? ok(value) : unparsable(value);
  if (typeof value !== 'string') return unparsable(value);

  const cleaned = value.trim().replace(/,/g, '');
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return unparsable(value);
  return ok(Number(cleaned));
}

/** Integer minor units (cents) converted to major units. */
export function parseMinorUnits(value: unknown): FieldResult<number> {
  const parsed = parseDecimal(value);
  return parsed.status === 'ok' ? ok(parsed.value / 100) : parsed;
}

/** Parsed decimal, or `fallback` when missing or unparsable. */
export function decimalOr(value: unknown, fallback: number): number {
  return valueOf(parseDecimal(value)) ?? fallback;
}

/** Positive whole count, or `fallback`. */
export function countOr(value: unknown, fallback: number): number {
  const parsed = valueOf(parseDecimal(value));
  if (parsed === null || parsed < 0) return fallback;
  return Math.floor(parsed);
}

export function isCalendarDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Calendar date of a timestamp string as written, without timezone
 * conversion: `2025-03-04 22:10:05 +0800` and `2025-03-04T22:10:05Z` both
 * give `2025-03-04`.
 */
export function parseDateString(value: unknown): FieldResult<CalendarDate> {
  if (isBlank(value)) return MISSING;
  if (typeof value !== 'string') return unparsable(value);
  const prefix = value.trim().slice(0, 10);
  return isCalendarDate(prefix) ? ok(prefix) : unparsable(value);
}

/**
 * Calendar date of a Unix epoch (seconds) seen from a fixed UTC offset.
 * Zero is treated as unset.
 */
export function parseEpochDate(value: unknown, utcOffsetMinutes: number): FieldResult<CalendarDate> {
  if (isBlank(value)) return MISSING;
  const seconds = parseDecimal(value);
  if (seconds.status !== 'ok') return unparsable(value);
  if (seconds.value === 0) return MISSING;

  const shifted = new Date((seconds.value + utcOffsetMinutes * 60) * 1000);
  if (Number.isNaN(shifted.getTime())) return unparsable(value);
  return ok(shifted.toISOString().slice(0, 10));
}

/** `20251128` (number or string) as `2025-11-28`. */
export function parseTimeKey(value: unknown): FieldResult<CalendarDate> {
  if (isBlank(value)) return MISSING;
  const digits = typeof value === 'number' || typeof value === 'string' ? String(value).trim() : '';
  if (!/^\d{8}$/.test(digits)) return unparsable(value);
  const date = `${digits.slice(0, 4)}-${digits.slice(4, 6)}-${digits.slice(6, 8)}`;
  return isCalendarDate(date) ? ok(date) : unparsable(value);
}

/**
 * First usable candidate. Unparsable candidates count as absent and are noted
 * as `<field> <raw>`; with no usable candidate the first unparsable one is
 * returned.
 */
export function firstUsable<T>(candidates: Array<[string, FieldResult<T>]>, notes: string[] = []): FieldResult<T> {
  let fallback: FieldResult<T> = MISSING;
  for (const [field, candidate] of candidates) {
    if (candidate.status === 'ok') return candidate;
    if (candidate.status === 'unparsable') {
      notes.push(`${field} ${describeRaw(candidate)}`);
      if (fallback.status === 'missing') fallback = candidate;
    }
  }
  return fallback;
}

/** First candidate that parsed to a strictly positive amount. */
export function firstPositive(candidates: FieldResult<number>[]): number | null {
  for (const candidate of candidates) {
    if (candidate.status === 'ok' && candidate.value > 0) return candidate.value;
  }
  return null;
}

export function describeRaw(result: FieldResult<unknown>): string {
  if (result.status === 'unparsable') return JSON.stringify(result.raw) ?? String(result.raw);
  return result.status;
}
