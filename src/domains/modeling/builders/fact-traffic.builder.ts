// ──────────────────────────────────────────
// Modeling: Traffic fact builder (one row per day per platform)
// ──────────────────────────────────────────

import { CanonicalTraffic, FactTrafficRow, TimeDayRow } from '../../../shared/types';
import { IssueLog } from '../../../shared/issue-log';
import { KeyedArena, naturalKey } from '../keyed-arena';
import { timeKey } from './calendar';

export class FactTrafficBuilder {
  constructor(private issues: IssueLog) {}

  /** A day reported twice for one platform keeps its first record. */
  build(traffic: CanonicalTraffic[], time: TimeDayRow[]): FactTrafficRow[] {
    const timeKeys = new Set(time.map((day) => day.time_key));
    const days = new KeyedArena<CanonicalTraffic>((t) => naturalKey(t.platformKey, t.date));
    for (const record of traffic) days.add(record);

    let outside = 0;
    const rows = days
      .values()
      .filter((record) => {
        if (timeKeys.has(timeKey(record.date))) return true;
        outside++;
        return false;
      })
      .sort((a, b) => (a.date === b.date ? a.platformKey - b.platformKey : a.date < b.date ? -1 : 1))
      .map(
        (record, i): FactTrafficRow => ({
          traffic_event_key: i + 1,
          time_key: timeKey(record.date),
          platform_key: record.platformKey,
          clicks: record.clicks,
          impressions: record.impressions,
        })
      );

    if (outside > 0) {
      this.issues.warn('FactTraffic', `${outside} traffic days outside the time dimension dropped`);
    }
    console.log(`[FactTraffic] Built ${rows.length} traffic rows`);
    return rows;
  }
}
