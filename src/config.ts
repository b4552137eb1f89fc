// ──────────────────────────────────────────
// Configuration: environment variables
// ──────────────────────────────────────────
// Entry points call dotenv.config() before loadConfig().

import { DateRange } from './shared/types';
import { ConfigError } from './shared/errors';
import { isCalendarDate } from './domains/modeling/parsing';

/** Longest delay setInterval honours; larger values fire immediately. */
const MAX_TIMER_MS = 2_147_483_647;

export interface AppConfig {
  stagingDir: string;
  outputDir: string;
  timeRange: DateRange | null;
  utcOffsetMinutes: number;
  databaseUrl: string | null;
  port: number;
  apiKey: string | null;
  intervalMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    stagingDir: nonEmpty(env.STAGING_DIR) ?? './staging',
    outputDir: nonEmpty(env.OUTPUT_DIR) ?? './transformed',
    timeRange: timeRange(nonEmpty(env.TIME_START_DATE), nonEmpty(env.TIME_END_DATE)),
    utcOffsetMinutes: integer('MARKETPLACE_UTC_OFFSET_MINUTES', env.MARKETPLACE_UTC_OFFSET_MINUTES, 480, -720, 840),
    databaseUrl: nonEmpty(env.DATABASE_URL),
    port: integer('PORT', env.PORT, 3000, 0, 65535),
    apiKey: nonEmpty(env.HARMONIZE_API_KEY),
    intervalMs: integer('HARMONIZE_INTERVAL_MS', env.HARMONIZE_INTERVAL_MS, 0, 0, MAX_TIMER_MS),
  };
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function integer(name: string, raw: string | undefined, fallback: number, min: number, max: number): number {
  const value = nonEmpty(raw);
  if (value === null) return fallback;
  if (!/^-?\d+$/.test(value)) throw new ConfigError(`${name} must be an integer, got "${value}"`);
  const parsed = Number(value);
  if (parsed < min || parsed > max) throw new ConfigError(`${name} must be between ${min} and ${max}, got ${parsed}`);
  return parsed;
}

function timeRange(start: string | null, end: string | null): DateRange | null {
  if (start === null && end === null) return null;
  if (start === null || end === null) {
    throw new ConfigError('TIME_START_DATE and TIME_END_DATE must be set together');
  }
  for (const [name, value] of [
    ['TIME_START_DATE', start],
    ['TIME_END_DATE', end],
  ]) {
    if (!isCalendarDate(value)) throw new ConfigError(`${name} must be YYYY-MM-DD, got "${value}"`);
  }
  if (start > end) throw new ConfigError(`TIME_START_DATE ${start} is after TIME_END_DATE ${end}`);
  return { start, end };
}
