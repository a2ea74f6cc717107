/**
 * History record codec.
 *
 * On-disk format: one JSON array, oldest first, 2-space indent.
 *   { issued_at, participant_a, participant_b, date, time, token }
 *
 * A document that is not an array, or holds any malformed record,
 * is CORRUPT as a whole. Partial recovery is not attempted.
 */

import {
  parseCalendarDate,
  parseTimeOfDay,
  type AttributeSet
} from './attributes.js';
import { StorageError } from './errors.js';

export interface HistoryEntry {
  /** ISO-8601 with UTC offset; first 10 chars are the local issuance date. */
  issued_at: string;
  /** Display form, trimmed, never canonicalized. */
  participant_a: string;
  participant_b: string;
  /** YYYY-MM-DD */
  date: string;
  /** HH:MM */
  time: string;
  /** Uppercase hex */
  token: string;
}

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;
const TOKEN_PATTERN = /^[0-9A-F]+$/;

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isParseable(parse: (text: string) => unknown, text: string): boolean {
  try {
    parse(text);
    return true;
  } catch {
    return false;
  }
}

/** Returns a clean copy of the record, or null if any field is malformed. */
export function parseHistoryRecord(input: unknown): HistoryEntry | null {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) return null;

  const r = input as Record<string, unknown>;
  const { issued_at, participant_a, participant_b, date, time, token } = r;

  if (typeof issued_at !== 'string' || !ISO_TIMESTAMP.test(issued_at)) return null;
  if (Number.isNaN(Date.parse(issued_at))) return null;
  if (!isNonEmptyString(participant_a) || !isNonEmptyString(participant_b)) return null;
  if (typeof date !== 'string' || !isParseable(parseCalendarDate, date)) return null;
  if (typeof time !== 'string' || !isParseable(parseTimeOfDay, time)) return null;
  if (typeof token !== 'string' || !TOKEN_PATTERN.test(token)) return null;

  return { issued_at, participant_a, participant_b, date, time, token };
}

/** @throws StorageError('CORRUPT') */
export function parseHistoryDocument(document: unknown, path: string): HistoryEntry[] {
  if (!Array.isArray(document)) {
    throw new StorageError('CORRUPT', path, `History at ${path} is not a JSON array`);
  }

  const entries: HistoryEntry[] = [];
  for (let i = 0; i < document.length; i++) {
    const entry = parseHistoryRecord(document[i]);
    if (!entry) {
      throw new StorageError('CORRUPT', path, `History record ${i} at ${path} is malformed`);
    }
    entries.push(entry);
  }
  return entries;
}

export function serializeHistory(entries: readonly HistoryEntry[]): string {
  return JSON.stringify(entries, null, 2) + '\n';
}

/** Attributes an entry was derived from, for re-derivation. */
export function entryAttributes(entry: HistoryEntry): AttributeSet {
  return {
    participant_a: entry.participant_a,
    participant_b: entry.participant_b,
    event_date: parseCalendarDate(entry.date),
    event_time: parseTimeOfDay(entry.time)
  };
}
