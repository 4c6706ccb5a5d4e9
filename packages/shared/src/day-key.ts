import { InvalidDayKeyError } from './errors';

/** Canonical `YYYY-MM-DD` form of a calendar date, used as a map key. */
export type DayKey = string;

/** A local calendar date. `month` is 1-based; there is no time of day and no timezone. */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface CalendarMonth {
  year: number;
  month: number;
}

export type Clock = () => number;

const DAY_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function toDayKey(date: CalendarDate): DayKey {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isDayKey(value: string): boolean {
  const match = DAY_KEY_PATTERN.exec(value);
  if (!match) return false;
  const month = Number(match[2]);
  const day = Number(match[3]);
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(Number(match[1]), month);
}

export function parseDayKey(key: DayKey): CalendarDate {
  const match = DAY_KEY_PATTERN.exec(key);
  if (!match || !isDayKey(key)) {
    throw new InvalidDayKeyError(key);
  }

  return {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3])
  };
}

/**
 * Re-hydrates a day key as a `Date` at 12:00 local time, so that rendering the
 * date later never slips across midnight when DST shifts the clock.
 */
export function dayKeyToLocalNoon(key: DayKey): Date {
  const { year, month, day } = parseDayKey(key);
  return new Date(year, month - 1, day, 12);
}

export function calendarDateFromDate(date: Date): CalendarDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate()
  };
}

export function todayCalendarDate(clock: Clock = Date.now): CalendarDate {
  return calendarDateFromDate(new Date(clock()));
}

// Day arithmetic runs on UTC epoch days so that local DST transitions never
// produce 23- or 25-hour steps.
function toEpochDay(date: CalendarDate): number {
  const utc = new Date(0);
  utc.setUTCFullYear(date.year, date.month - 1, date.day);
  return Math.floor(utc.getTime() / MS_PER_DAY);
}

function fromEpochDay(epochDay: number): CalendarDate {
  const utc = new Date(epochDay * MS_PER_DAY);
  return {
    year: utc.getUTCFullYear(),
    month: utc.getUTCMonth() + 1,
    day: utc.getUTCDate()
  };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromEpochDay(toEpochDay(date) + days);
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function isSameDay(a: CalendarDate, b: CalendarDate): boolean {
  return compareCalendarDates(a, b) === 0;
}

export function isNextDay(previous: CalendarDate, next: CalendarDate): boolean {
  return toEpochDay(next) - toEpochDay(previous) === 1;
}

export function daysBetweenInclusive(start: CalendarDate, end: CalendarDate): number {
  return toEpochDay(end) - toEpochDay(start) + 1;
}

export function shiftMonth(month: CalendarMonth, delta: number): CalendarMonth {
  const index = month.year * 12 + (month.month - 1) + delta;
  return {
    year: Math.floor(index / 12),
    month: (index % 12) + 1
  };
}

export function monthOf(date: CalendarDate): CalendarMonth {
  return { year: date.year, month: date.month };
}
