/**
 * History Ledger: append-only record of issued match keys.
 *
 * Every append/clear is a full read-modify-write through the store.
 * Entries are never reordered, deduplicated or edited. Reissuing a key for
 * the same match is legitimate and produces a second entry.
 *
 * Fail-open on read: an unreadable or corrupt store loads as empty history
 * (logged as a warning), so issuance is never blocked by a bad file.
 * Fail-loud on write: StorageError propagates to the caller.
 *
 * Audit: every stored token must be reproducible from its own entry.
 */

import * as core from '@actions/core';
import {
  calendarDateOf,
  formatCalendarDate,
  formatLocalTimestamp,
  formatTimeOfDay,
  type AttributeSet,
  type CalendarDate
} from './attributes.js';
import { entryAttributes, parseHistoryRecord, type HistoryEntry } from './history_record.js';
import { InputValidationError, StorageError } from './errors.js';
import type { IHistoryStore } from './interfaces/history_store.js';
import type { TokenDeriver } from './token_deriver.js';
import { maskToken } from './verifier.js';

export type Clock = () => Date;

export interface LedgerStats {
  total: number;
  issued_today: number;
}

/** History row for display. The token is deliberately absent. */
export interface HistoryRow {
  issued_at: string;
  participant_a: string;
  participant_b: string;
  /** "YYYY-MM-DD HH:MM" */
  event: string;
}

export interface AuditMismatch {
  /** Position in insertion order. */
  index: number;
  issued_at: string;
  expected_masked: string;
}

export interface AuditReport {
  checked: number;
  mismatches: AuditMismatch[];
}

export class HistoryLedger {
  private readonly _store: IHistoryStore;
  private readonly _clock: Clock;

  constructor(store: IHistoryStore, clock: Clock = () => new Date()) {
    this._store = store;
    this._clock = clock;
  }

  /** Build an entry for a freshly derived token, stamped with the current time. */
  createEntry(attributes: AttributeSet, token: string): HistoryEntry {
    return {
      issued_at: formatLocalTimestamp(this._clock()),
      participant_a: attributes.participant_a.trim(),
      participant_b: attributes.participant_b.trim(),
      date: formatCalendarDate(attributes.event_date),
      time: formatTimeOfDay(attributes.event_time),
      token
    };
  }

  /**
   * Append one entry and persist before returning.
   * @throws InputValidationError if the entry is malformed
   * @throws StorageError if the store cannot be written
   */
  append(entry: HistoryEntry): void {
    const clean = parseHistoryRecord(entry);
    if (!clean) {
      throw new InputValidationError('MISSING_ATTRIBUTE', 'History entry is malformed');
    }
    const entries = this.load();
    entries.push(clean);
    this._store.writeAll(entries);
    core.debug(`History: appended entry #${entries.length} to ${this._store.location}`);
  }

  /** All entries, oldest first. [] if nothing stored or the store is unreadable. */
  load(): HistoryEntry[] {
    try {
      return this._store.readAll();
    } catch (err) {
      if (err instanceof StorageError) {
        core.warning(`History unavailable [${err.error_type}], treating as empty: ${err.message}`);
        return [];
      }
      throw err;
    }
  }

  /** Remove every entry. Irreversible. */
  clear(): void {
    this._store.writeAll([]);
    core.info(`History cleared: ${this._store.location}`);
  }

  /**
   * Total entries and entries issued on `asOf` (default: today, local).
   * An entry counts by the date written in its own `issued_at`, so a record
   * stamped with a different UTC offset is counted by that offset's date.
   */
  stats(asOf: CalendarDate = calendarDateOf(this._clock())): LedgerStats {
    const entries = this.load();
    const day = formatCalendarDate(asOf);
    return {
      total: entries.length,
      issued_today: entries.filter((e) => e.issued_at.slice(0, 10) === day).length
    };
  }

  /** Display rows, newest first, without tokens. */
  listRecent(): HistoryRow[] {
    return this.load()
      .reverse()
      .map((e) => ({
        issued_at: e.issued_at,
        participant_a: e.participant_a,
        participant_b: e.participant_b,
        event: `${e.date} ${e.time}`
      }));
  }

  /** Re-derive every stored token and report those that do not reproduce. */
  audit(deriver: TokenDeriver): AuditReport {
    const entries = this.load();
    const mismatches: AuditMismatch[] = [];

    entries.forEach((entry, index) => {
      const expected = deriver.deriveFor(entryAttributes(entry));
      if (expected !== entry.token) {
        mismatches.push({ index, issued_at: entry.issued_at, expected_masked: maskToken(expected) });
      }
    });

    return { checked: entries.length, mismatches };
  }
}
