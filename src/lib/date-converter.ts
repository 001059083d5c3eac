/**
 * Date Converter
 *
 * NovaDAX exports timestamps as "DD/MM/YYYY HH:MM:SS"; Koinly expects
 * "YYYY-MM-DD HH:MM UTC". Seconds are dropped, not rounded.
 */

import { INVALID_DATE } from "./constants";

const SOURCE_DATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Parsed timestamp parts, all range checked
 */
export interface TimestampParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parse a "DD/MM/YYYY HH:MM:SS" timestamp
 *
 * @returns The timestamp parts, or null when the text does not match the format
 * or names a day/time that does not exist (e.g. 31/04, 29/02 outside leap years, 24:00)
 */
export function parseSourceTimestamp(text: string): TimestampParts | null {
  const match = SOURCE_DATE_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [day, month, year, hour, minute, second] = match.slice(1).map(Number);

  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  return { year, month, day, hour, minute, second };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Convert a NovaDAX timestamp to Koinly's date format
 *
 * @returns "YYYY-MM-DD HH:MM UTC", or "Invalid Date" when the input cannot be parsed
 *
 * @example
 * convertDate("25/12/2023 14:30:59") // returns "2023-12-25 14:30 UTC"
 * convertDate("2023-12-25 14:30:59") // returns "Invalid Date"
 */
export function convertDate(text: string): string {
  const parts = parseSourceTimestamp(text);
  if (!parts) {
    return INVALID_DATE;
  }

  const { year, month, day, hour, minute } = parts;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)} UTC`;
}
