/**
 * Date utilities for validating calendar dates and parsing periods.
 */

/**
 * Shape of a stored date: "YYYY-MM-DD".
 */
export const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Check that a string is a real calendar day in "YYYY-MM-DD" form.
 *
 * "2024-02-29" passes, "2023-02-29" and "2024-13-01" do not.
 */
export function isValidDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  return day <= daysInMonth(year, month);
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Month key ("YYYY-MM") of a "YYYY-MM-DD" date.
 */
export function monthOf(date: string): string {
  return date.slice(0, 7);
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}

/**
 * "YYYY-MM-DD" of a Date in local time.
 */
function formatDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;
}

/**
 * First and last day of a month (1-12).
 */
export function getMonthRange(year: number, month: number): [string, string] {
  if (month < 1 || month > 12) {
    throw new Error(`Month must be between 1 and 12, got ${month}`);
  }
  const prefix = `${pad(year, 4)}-${pad(month, 2)}`;
  return [`${prefix}-01`, `${prefix}-${pad(daysInMonth(year, month), 2)}`];
}

function yearRange(year: number): [string, string] {
  return [`${pad(year, 4)}-01-01`, `${pad(year, 4)}-12-31`];
}

/**
 * The given number of days before today, through today.
 */
function trailingDays(today: Date, days: number): [string, string] {
  const start = new Date(today.getFullYear(), today.getMonth(), today.getDate() - days);
  return [formatDate(start), formatDate(today)];
}

/**
 * Period shorthands understood by {@link parsePeriod}.
 */
export const PERIODS = [
  'this_month',
  'last_month',
  'this_year',
  'last_year',
  'last_7_days',
  'last_30_days',
  'last_90_days',
  'ytd',
] as const;

export type Period = (typeof PERIODS)[number];

/**
 * Inclusive [start, end] dates of a period shorthand, relative to the
 * current local date.
 *
 * @throws Error if the period is not one of {@link PERIODS}
 */
export function parsePeriod(period: string): [string, string] {
  const today = new Date();
  const year = today.getFullYear();
  const month = today.getMonth() + 1;

  switch (period) {
    case 'this_month':
      return getMonthRange(year, month);
    case 'last_month':
      return month === 1 ? getMonthRange(year - 1, 12) : getMonthRange(year, month - 1);
    case 'this_year':
      return yearRange(year);
    case 'last_year':
      return yearRange(year - 1);
    case 'last_7_days':
      return trailingDays(today, 7);
    case 'last_30_days':
      return trailingDays(today, 30);
    case 'last_90_days':
      return trailingDays(today, 90);
    case 'ytd':
      return [yearRange(year)[0], formatDate(today)];
    default:
      throw new Error(`Unknown period: ${period}`);
  }
}
