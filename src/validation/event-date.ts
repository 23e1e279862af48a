/**
 * Event date parsing.
 *
 * The model is asked for YYYY-MM-DD, but BEO sheets print dates as
 * 1/15/2026 or "January 15, 2026" and the model sometimes copies them
 * verbatim. Anything else is rejected so a wrong folder is never built.
 */

import type { CalendarDate } from './types.js';

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (year < 1900 || year > 2999) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

function monthFromName(name: string): number | null {
  const lower = name.toLowerCase().replace(/\.$/, '');
  if (lower.length < 3) return null;
  const index = MONTHS.findIndex((month) => month.startsWith(lower));
  return index === -1 ? null : index + 1;
}

/**
 * Parses an event date string.
 *
 * Accepted: "2026-01-15", "2026-01-15T00:00:00Z", "1/15/2026", "01-15-2026",
 * "January 15, 2026", "Jan 15 2026", "Thursday, January 15, 2026".
 *
 * @returns The calendar date, or null when the string is not a real date
 */
export function parseEventDate(raw: string): CalendarDate | null {
  const value = raw.trim();

  const iso = value.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s].*)?$/);
  if (iso) {
    return toCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const us = value.match(/^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/);
  if (us) {
    return toCalendarDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  const named = value
    .replace(/^[A-Za-z]+day,?\s+/i, '')
    .match(/^([A-Za-z]+\.?)\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/);
  if (named) {
    const month = monthFromName(named[1]);
    if (month === null) return null;
    return toCalendarDate(Number(named[3]), month, Number(named[2]));
  }

  return null;
}
