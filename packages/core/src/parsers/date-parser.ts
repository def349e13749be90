/**
 * Calendar-date helpers and the due-date input parser.
 * Accepts: today, tomorrow, yesterday, relative (+3d/+2w/+1m),
 * day-of-week names (mon-sunday) and ISO yyyy-MM-dd.
 */

import type { CalendarDate } from '../types/task.js';

const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const WEEKDAYS: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

/** Format a Date as yyyy-MM-dd using its local calendar fields */
export function formatDate(d: Date): CalendarDate {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

/** Local midnight of the given instant, without touching the argument */
export function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

/** Today's calendar date; `now` overrides the clock */
export function todayString(now?: Date): CalendarDate {
  return formatDate(now ?? new Date());
}

/** True for a well-formed yyyy-MM-dd string naming a real date (rejects 2026-02-30) */
export function isCalendarDate(input: string): input is CalendarDate {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return false;
  const [, y, mo, d] = m;
  const candidate = new Date(Number(y), Number(mo) - 1, Number(d));
  return formatDate(candidate) === input;
}

/** Parse a calendar date into a local-midnight Date */
export function toDate(date: CalendarDate): Date {
  const [y, m, d] = date.split('-').map(Number);
  return new Date(y ?? 0, (m ?? 1) - 1, d ?? 1);
}

/** Whole days from `from` to `to`; negative when `to` is earlier */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((toDate(to).getTime() - toDate(from).getTime()) / 86400000);
}

function tryParseRelative(input: string, today: Date): CalendarDate | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const count = Number(m[1]);
  switch (m[2]) {
    case 'd': return formatDate(addDays(today, count));
    case 'w': return formatDate(addDays(today, count * 7));
    case 'm': return formatDate(addMonths(today, count));
    default: return null;
  }
}

function tryParseWeekday(input: string, today: Date): CalendarDate | null {
  const target = WEEKDAYS[input];
  if (target === undefined) return null;

  let ahead = (target - today.getDay() + 7) % 7;
  if (ahead === 0) ahead = 7;
  return formatDate(addDays(today, ahead));
}

/**
 * Parse a human-friendly date string into yyyy-MM-dd.
 * Returns null if the input can't be parsed.
 *
 * @param input - e.g. "today", "+3d", "friday", "2026-03-01"
 * @param now - Override "today" for testing. Defaults to the current date.
 */
export function parseDate(input: string | null | undefined, now?: Date): CalendarDate | null {
  if (!input?.trim()) return null;

  const today = startOfDay(now ?? new Date());
  const normalized = input.trim().toLowerCase();

  switch (normalized) {
    case 'today': return formatDate(today);
    case 'tomorrow': return formatDate(addDays(today, 1));
    case 'yesterday': return formatDate(addDays(today, -1));
    default:
      return tryParseRelative(normalized, today)
        ?? tryParseWeekday(normalized, today)
        ?? (isCalendarDate(normalized) ? normalized : null);
  }
}
