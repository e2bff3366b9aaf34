/**
 * Calendar helpers for YYYY-MM-DD strings. All dates in the task store are
 * normalized to this form, so plain string comparison orders them.
 */

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

/**
 * Splits a YYYY-MM-DD string into its parts without checking the calendar.
 * Returns null when the shape is wrong.
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  return {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
  };
}

export function formatCalendarParts({ year, month, day }: CalendarDate): string {
  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');
}

/**
 * Moves a date by whole calendar years. Feb 29 lands on Feb 28 when the
 * target year is not a leap year.
 *
 * @example
 * shiftYears('2024-02-29', -1) // '2023-02-28'
 */
export function shiftYears(value: string, years: number): string {
  const parts = parseCalendarDate(value);
  if (!parts) {
    throw new Error(`Not a calendar date: ${value}`);
  }

  const year = parts.year + years;
  const day = Math.min(parts.day, daysInMonth(year, parts.month));

  return formatCalendarParts({ year, month: parts.month, day });
}

/**
 * True when the string is a real YYYY-MM-DD calendar date with a year
 * inside [minYear, maxYear].
 */
export function isCalendarDate(value: string, minYear: number, maxYear: number): boolean {
  const parts = parseCalendarDate(value);
  if (!parts) {
    return false;
  }

  const { year, month, day } = parts;
  return (
    year >= minYear &&
    year <= maxYear &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}
