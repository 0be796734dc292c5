import { DateTime } from 'luxon';

/**
 * Calendar helpers. Booking dates are plain calendar days evaluated in UTC.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const WEEKDAYS = ['lun', 'mar', 'mer', 'gio', 'ven', 'sab', 'dom'];
const MONTHS = ['gen', 'feb', 'mar', 'apr', 'mag', 'giu', 'lug', 'ago', 'set', 'ott', 'nov', 'dic'];

/**
 * Start of the current UTC day
 */
export function todayUtc(clock: Clock = systemClock): DateTime {
  return DateTime.fromJSDate(clock(), { zone: 'utc' }).startOf('day');
}

/**
 * ISO date key, "YYYY-MM-DD"
 */
export function toDateKey(day: DateTime): string {
  return day.toFormat('yyyy-MM-dd');
}

/**
 * Parse a strict ISO calendar date ("YYYY-MM-DD"). Returns null for anything else,
 * including impossible dates such as 2025-02-30.
 */
export function parseDateKey(value: string): DateTime | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null;
  }
  const parsed = DateTime.fromISO(value, { zone: 'utc' });
  return parsed.isValid ? parsed : null;
}

/**
 * Short Italian label, e.g. "lun 03 mar"
 */
export function formatDateLabel(day: DateTime): string {
  return `${WEEKDAYS[day.weekday - 1]} ${day.toFormat('dd')} ${MONTHS[day.month - 1]}`;
}

export function nowIso(clock: Clock = systemClock): string {
  return clock().toISOString();
}
