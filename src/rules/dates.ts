/**
 * Calendar arithmetic for relative date rules.
 *
 * All arithmetic is done in UTC so that results do not depend on the host
 * time zone.
 */

import type { ValueUnit } from "../types/workflow.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function daysInUtcMonth(year: number, month: number): number {
  // setUTCFullYear, unlike Date.UTC, leaves years 0-99 alone
  const date = new Date(0);
  date.setUTCFullYear(year, month + 1, 0);
  return date.getUTCDate();
}

/**
 * Subtract whole calendar months. The day of month is clamped to the last
 * day of the target month, so March 31 minus one month is February 28 (or 29).
 */
export function subtractCalendarMonths(date: Date, months: number): Date {
  const year = date.getUTCFullYear();
  const targetMonthIndex = year * 12 + date.getUTCMonth() - months;
  const targetYear = Math.floor(targetMonthIndex / 12);
  const targetMonth = targetMonthIndex - targetYear * 12;
  const day = Math.min(date.getUTCDate(), daysInUtcMonth(targetYear, targetMonth));

  const result = new Date(date.getTime());
  result.setUTCFullYear(targetYear, targetMonth, day);
  return result;
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * MS_PER_DAY);
}

/**
 * The instant `amount` units before `reference`.
 */
export function computeCutoff(reference: Date, amount: number, unit: ValueUnit): Date {
  return unit === "months"
    ? subtractCalendarMonths(reference, amount)
    : subtractDays(reference, amount);
}
