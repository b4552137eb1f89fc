import { describe, it, expect } from 'vitest';
import {
  countOr,
  firstPositive,
  firstUsable,
  identifier,
  isCalendarDate,
  ok,
  parseDateString,
  parseDecimal,
  parseEpochDate,
  parseMinorUnits,
  parseTimeKey,
  MISSING,
} from './parsing';

describe('parseDecimal', () => {
  it('reads numbers and numeric strings with thousands separators', () => {
    expect(parseDecimal(12.5)).toEqual({ status: 'ok', value: 12.5 });
    expect(parseDecimal('1,299.00')).toEqual({ status: 'ok', value: 1299 });
    expect(parseDecimal(' 42 ')).toEqual({ status: 'ok', value: 42 });
  });

  it('separates missing from unparsable', () => {
    expect(parseDecimal(undefined)).toEqual({ status: 'missing' });
    expect(parseDecimal('  ')).toEqual({ status: 'missing' });
    expect(parseDecimal('abc')).toEqual({ status: 'unparsable', raw: 'abc' });
    expect(parseDecimal({ amount: 1 })).toEqual({ status: 'unparsable', raw: { amount: 1 } });
  });
});

describe('parseMinorUnits', () => {
  it('divides cents by one hundred', () => {
    expect(parseMinorUnits(150000)).toEqual({ status: 'ok', value: 1500 });
    expect(parseMinorUnits('2599')).toEqual({ status: 'ok', value: 25.99 });
  });
});

describe('date parsing', () => {
  it('keeps the calendar date of a timestamp string as written', () => {
    expect(parseDateString('2025-03-04 22:10:05 +0800')).toEqual(ok('2025-03-04'));
    expect(parseDateString('2025-03-04T23:59:59Z')).toEqual(ok('2025-03-04'));
    expect(parseDateString('2025-02-30 10:00:00')).toEqual({ status: 'unparsable', raw: '2025-02-30 10:00:00' });
    expect(parseDateString(null)).toEqual(MISSING);
  });

  it('shifts epoch seconds by the marketplace offset', () => {
    // 2025-03-04T17:00:00Z is 2025-03-05 01:00 at +08:00
    expect(parseEpochDate(1741107600, 480)).toEqual(ok('2025-03-05'));
    expect(parseEpochDate(1741107600, 0)).toEqual(ok('2025-03-04'));
    expect(parseEpochDate(0, 480)).toEqual(MISSING);
    expect(parseEpochDate('soon', 480)).toEqual({ status: 'unparsable', raw: 'soon' });
  });

  it('reads YYYYMMDD time keys', () => {
    expect(parseTimeKey(20251128)).toEqual(ok('2025-11-28'));
    expect(parseTimeKey('20251201')).toEqual(ok('2025-12-01'));
    expect(parseTimeKey(20250230)).toEqual({ status: 'unparsable', raw: 20250230 });
    expect(parseTimeKey('')).toEqual(MISSING);
  });

  it('validates real calendar dates', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('2025-02-29')).toBe(false);
    expect(isCalendarDate('2025-1-01')).toBe(false);
  });
});

describe('helpers', () => {
  it('picks the first strictly positive candidate', () => {
    expect(firstPositive([MISSING, ok(0), ok(12), ok(30)])).toBe(12);
    expect(firstPositive([ok(0), { status: 'unparsable', raw: 'x' }])).toBeNull();
  });

  it('falls back past unparsable candidates and notes them', () => {
    const notes: string[] = [];
    expect(
      firstUsable(
        [
          ['created_at', parseDateString('not a date')],
          ['updated_at', MISSING],
          ['order_items.created_at', parseDateString('2025-11-28 10:00:00 +0800')],
        ],
        notes
      )
    ).toEqual(ok('2025-11-28'));
    expect(notes).toEqual(['created_at "not a date"']);
  });

  it('returns the first unparsable candidate when none is usable', () => {
    expect(firstUsable([['a', MISSING], ['b', parseDecimal('x')], ['c', parseDecimal('y')]])).toEqual({
      status: 'unparsable',
      raw: 'x',
    });
    expect(firstUsable([['a', MISSING]])).toEqual(MISSING);
  });

  it('normalizes identifiers and counts', () => {
    expect(identifier(12345)).toBe('12345');
    expect(identifier('  ')).toBeNull();
    expect(countOr('3', 1)).toBe(3);
    expect(countOr(undefined, 1)).toBe(1);
    expect(countOr(-2, 1)).toBe(1);
  });
});
