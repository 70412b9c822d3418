/**
 * Game Catalog — Release Dates
 *
 * Release dates are plain calendar days with no time zone. They are kept as
 * year/month/day triples rather than `Date` objects so that comparisons and
 * year extraction never shift across a UTC boundary.
 *
 * Source text format: dd-MMM-yyyy, e.g. "10-Nov-2014". A day past the end
 * of its month (but no greater than 31) resolves to the month's last day,
 * so "31-Feb-2014" reads as 28 Feb 2014.
 */

import { InvalidArgumentError } from "./errors";

export interface CalendarDate {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
}

export const MONTH_ABBREVIATIONS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
] as const;

const RELEASE_DATE_PATTERN = /^(\d{2})-([A-Za-z]{3})-(\d{4})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isValidDay(year: number, month: number, day: number): boolean {
  return (
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    Number.isInteger(day) &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}

/**
 * Build a calendar date, rejecting days that do not exist.
 */
export function calendarDate(year: number, month: number, day: number): CalendarDate {
  if (!isValidDay(year, month, day)) {
    throw new InvalidArgumentError(`Not a calendar date: ${year}-${month}-${day}`);
  }
  return Object.freeze({ year, month, day });
}

/**
 * Parse "dd-MMM-yyyy". Month abbreviations are English and case-sensitive.
 * Returns null for an unknown month or a day outside 01-31.
 */
export function parseReleaseDate(text: string): CalendarDate | null {
  const match = RELEASE_DATE_PATTERN.exec(text);
  if (!match) return null;

  const day = parseInt(match[1], 10);
  const monthIndex = MONTH_ABBREVIATIONS.findIndex((abbr) => abbr === match[2]);
  const year = parseInt(match[3], 10);

  if (monthIndex < 0 || day < 1 || day > 31) return null;

  const month = monthIndex + 1;
  return Object.freeze({ year, month, day: Math.min(day, daysInMonth(year, month)) });
}

export function formatReleaseDate(date: CalendarDate): string {
  const day = String(date.day).padStart(2, "0");
  const year = String(date.year).padStart(4, "0");
  return `${day}-${MONTH_ABBREVIATIONS[date.month - 1]}-${year}`;
}

/**
 * Negative when a is earlier, positive when later, zero on the same day.
 */
export function compareDates(a: CalendarDate, b: CalendarDate): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.month !== b.month) return a.month - b.month;
  return a.day - b.day;
}

export function isAfter(a: CalendarDate, b: CalendarDate): boolean {
  return compareDates(a, b) > 0;
}
