// ──────────────────────────────────────────
// Modeling: Time dimension builder
// ──────────────────────────────────────────

import { CalendarDate, DateRange, TimeDayRow } from '../../../shared/types';
import { TimeRangeError } from '../../../shared/errors';
import {
  dayOfWeek,
  dayOfYear,
  eachDay,
  endOfMonth,
  isMegaSaleDay,
  isPayday,
  isWeekend,
  isoWeek,
  startOfMonth,
  timeKey,
  toUtc,
} from './calendar';

export class TimeDimensionBuilder {
  /**
   * Uses the configured range when present, otherwise the observed order
   * dates widened to whole months.
   */
  resolveRange(explicit: DateRange | null, observed: Iterable<CalendarDate>): DateRange {
    if (explicit) return explicit;

    let min: CalendarDate | null = null;
    let max: CalendarDate | null = null;
    for (const date of observed) {
      if (min === null || date < min) min = date;
      if (max === null || date > max) max = date;
    }

    if (min === null || max === null) {
      throw new TimeRangeError('No parseable order dates on either platform and no explicit time range configured');
    }
    return { start: startOfMonth(min), end: endOfMonth(max) };
  }

  build(range: DateRange): TimeDayRow[] {
    const rows = eachDay(range).map((date) => this.describe(date));
    console.log(`[TimeDimension] Generated ${rows.length} days (${range.start} → ${range.end})`);
    return rows;
  }

  describe(date: CalendarDate): TimeDayRow {
    const d = toUtc(date);
    const month = d.getUTCMonth() + 1;
    return {
      time_key: timeKey(date),
      date,
      year: d.getUTCFullYear(),
      quarter: `Q${Math.ceil(month / 3)}`,
      month,
      week: isoWeek(date),
      day_of_week: dayOfWeek(date),
      day_of_year: dayOfYear(date),
      is_weekend: isWeekend(date),
      is_payday: isPayday(date),
      is_mega_sale_day: isMegaSaleDay(date),
    };
  }
}
