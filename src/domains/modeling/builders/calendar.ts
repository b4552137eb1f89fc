// ──────────────────────────────────────────
// Modeling: Calendar arithmetic on YYYY-MM-DD dates (UTC based)
// ──────────────────────────────────────────

import { CalendarDate, DateRange } from '../../../shared/types';

const DAY_MS = 86_400_000;

/** Fixed (month, day) double-digit and holiday sale dates. */
const MEGA_SALE_DATES: ReadonlyArray<readonly [number, number]> = [
  [1, 1],
  [2, 2],
  [3, 3],
  [4, 4],
  [5, 5],
  [6, 6],
  [7, 7],
  [8, 8],
  [9, 9],
  [10, 10],
  [11, 11],
  [12, 12],
  [2, 14],
  [5, 1],
  [6, 12],
  [8, 21],
  [11, 1],
  [12, 24],
  [12, 25],
  [12, 30],
];

export function toUtc(date: CalendarDate): Date {
  const [year, month, day] = date.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

export function formatDate(date: Date): CalendarDate {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return formatDate(new Date(toUtc(date).getTime() + days * DAY_MS));
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function startOfMonth(date: CalendarDate): CalendarDate {
  return `${date.slice(0, 7)}-01`;
}

export function endOfMonth(date: CalendarDate): CalendarDate {
  const d = toUtc(date);
  const last = daysInMonth(d.getUTCFullYear(), d.getUTCMonth() + 1);
  return `${date.slice(0, 7)}-${String(last).padStart(2, '0')}`;
}

/** 0 = Monday … 6 = Sunday */
export function dayOfWeek(date: CalendarDate): number {
  return (toUtc(date).getUTCDay() + 6) % 7;
}

export function dayOfYear(date: CalendarDate): number {
  const d = toUtc(date);
  return Math.round((d.getTime() - Date.UTC(d.getUTCFullYear(), 0, 1)) / DAY_MS) + 1;
}

export function isoWeek(date: CalendarDate): number {
  const d = toUtc(date);
  const thursday = new Date(d.getTime() + (3 - dayOfWeek(date)) * DAY_MS);
  const yearStart = Date.UTC(thursday.getUTCFullYear(), 0, 1);
  return Math.floor((thursday.getTime() - yearStart) / DAY_MS / 7) + 1;
}

export function eachDay(range: DateRange): CalendarDate[] {
  const days: CalendarDate[] = [];
  for (let day = range.start; day <= range.end; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

export function isWeekend(date: CalendarDate): boolean {
  return dayOfWeek(date) >= 5;
}

/**
 * Paydays fall on the 15th and the last day of the month. When the month
 * ends on a weekend the Friday before it is a payday as well. December's
 * 15th and month-end double as 13th-month pay dates and follow the same rule.
 */
export function isPayday(date: CalendarDate): boolean {
  const d = toUtc(date);
  const day = d.getUTCDate();
  const last = endOfMonth(date);
  if (day === 15 || date === last) return true;
  const lastDow = dayOfWeek(last);
  if (lastDow < 5) return false;
  return date === addDays(last, -(lastDow - 4));
}

/** Last given weekday (0 = Monday) of a month. */
export function lastWeekdayOfMonth(year: number, month: number, weekday: number): CalendarDate {
  const last = `${year}-${String(month).padStart(2, '0')}-${String(daysInMonth(year, month)).padStart(2, '0')}`;
  const back = (dayOfWeek(last) - weekday + 7) % 7;
  return addDays(last, -back);
}

export function blackFriday(year: number): CalendarDate {
  return lastWeekdayOfMonth(year, 11, 4);
}

export function cyberMonday(year: number): CalendarDate {
  return addDays(lastWeekdayOfMonth(year, 11, 3), 4);
}

export function isMegaSaleDay(date: CalendarDate): boolean {
  const d = toUtc(date);
  const month = d.getUTCMonth() + 1;
  const day = d.getUTCDate();
  if (MEGA_SALE_DATES.some(([m, dd]) => m === month && dd === day)) return true;
  const year = d.getUTCFullYear();
  return date === blackFriday(year) || date === cyberMonday(year);
}

export function timeKey(date: CalendarDate): number {
  return Number(date.replace(/-/g, ''));
}
