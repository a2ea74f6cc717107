/**
 * Attribute Set: the event attributes a match key is bound to.
 *
 * Dates and times are plain value types, formatted without any locale:
 *   CalendarDate → YYYY-MM-DD
 *   TimeOfDay    → HH:MM (24-hour, zero-padded)
 */

import { InputValidationError } from './errors.js';

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;   // 1-31
}

export interface TimeOfDay {
  hour: number;   // 0-23
  minute: number; // 0-59
}

export interface AttributeSet {
  participant_a: string;
  participant_b: string;
  event_date: CalendarDate;
  event_time: TimeOfDay;
}

/** Raw caller input, as typed into a form or passed as action inputs. */
export interface RawAttributeInput {
  participant_a: string;
  participant_b: string;
  event_date: string;
  event_time: string;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatCalendarDate(date: CalendarDate): string {
  return `${String(date.year).padStart(4, '0')}-${pad2(date.month)}-${pad2(date.day)}`;
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${pad2(time.hour)}:${pad2(time.minute)}`;
}

function isValidCalendarDate(date: CalendarDate): boolean {
  const { year, month, day } = date;
  if (![year, month, day].every(Number.isInteger)) return false;
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) return false;
  return day <= daysInMonth(year, month);
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isValidTimeOfDay(time: TimeOfDay): boolean {
  return (
    Number.isInteger(time.hour) &&
    Number.isInteger(time.minute) &&
    time.hour >= 0 && time.hour <= 23 &&
    time.minute >= 0 && time.minute <= 59
  );
}

/** Parse YYYY-MM-DD. Rejects impossible days such as 2025-02-30. */
export function parseCalendarDate(text: string): CalendarDate {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) {
    throw new InputValidationError('INVALID_DATE', `Date must be YYYY-MM-DD, got: "${text}"`);
  }
  const date: CalendarDate = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3])
  };
  if (!isValidCalendarDate(date)) {
    throw new InputValidationError('INVALID_DATE', `Not a calendar date: "${text}"`);
  }
  return date;
}

/** Parse HH:MM in 24-hour form. */
export function parseTimeOfDay(text: string): TimeOfDay {
  const match = TIME_PATTERN.exec(text.trim());
  if (!match) {
    throw new InputValidationError('INVALID_TIME', `Time must be HH:MM, got: "${text}"`);
  }
  const time: TimeOfDay = { hour: Number(match[1]), minute: Number(match[2]) };
  if (!isValidTimeOfDay(time)) {
    throw new InputValidationError('INVALID_TIME', `Not a time of day: "${text}"`);
  }
  return time;
}

/** Local calendar date of an instant. */
export function calendarDateOf(instant: Date): CalendarDate {
  return {
    year: instant.getFullYear(),
    month: instant.getMonth() + 1,
    day: instant.getDate()
  };
}

/**
 * ISO-8601 timestamp in local time with its UTC offset,
 * e.g. 2025-06-20T18:30:05.120+02:00.
 * The first 10 characters are the local calendar date of issuance.
 */
export function formatLocalTimestamp(instant: Date): string {
  const offsetMinutes = -instant.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const abs = Math.abs(offsetMinutes);
  const ms = String(instant.getMilliseconds()).padStart(3, '0');
  return (
    `${formatCalendarDate(calendarDateOf(instant))}` +
    `T${pad2(instant.getHours())}:${pad2(instant.getMinutes())}:${pad2(instant.getSeconds())}.${ms}` +
    `${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`
  );
}

/**
 * Validate raw input into an Attribute Set.
 *
 * Participant names are trimmed (display form) but otherwise kept as typed;
 * canonicalization happens only inside the token deriver.
 * @throws InputValidationError on an empty name, bad date or bad time.
 */
export function validateAttributeInput(input: RawAttributeInput): AttributeSet {
  const participant_a = input.participant_a.trim();
  const participant_b = input.participant_b.trim();

  if (!participant_a || !participant_b) {
    throw new InputValidationError(
      'MISSING_ATTRIBUTE',
      'Both participant names are required'
    );
  }

  return {
    participant_a,
    participant_b,
    event_date: parseCalendarDate(input.event_date),
    event_time: parseTimeOfDay(input.event_time)
  };
}
