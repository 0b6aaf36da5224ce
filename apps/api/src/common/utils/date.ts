/**
 * Calendar date helpers
 *
 * Play dates are plain YYYY-MM-DD strings. "Today" is the server's local
 * calendar day; arithmetic on stored dates is done in UTC so it never
 * crosses a DST boundary.
 *
 * @module common/utils/date
 */

import type { IsoDate } from "@tichu/types";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local calendar date of the given instant
 */
export function toIsoDate(instant: Date = new Date()): IsoDate {
  return `${instant.getFullYear()}-${pad(instant.getMonth() + 1)}-${pad(instant.getDate())}`;
}

export function currentYear(instant: Date = new Date()): number {
  return instant.getFullYear();
}

/**
 * The date `days` calendar days before `date`
 */
export function subtractDays(date: IsoDate, days: number): IsoDate {
  const [year, month, day] = date.split("-").map(Number);
  const utc = new Date(Date.UTC(year ?? 1970, (month ?? 1) - 1, day ?? 1));
  utc.setUTCDate(utc.getUTCDate() - days);
  return `${utc.getUTCFullYear()}-${pad(utc.getUTCMonth() + 1)}-${pad(utc.getUTCDate())}`;
}

/**
 * Inclusive first and last day of a year
 */
export function yearRange(year: number): { from: IsoDate; to: IsoDate } {
  return { from: `${year}-01-01`, to: `${year}-12-31` };
}
