/**
 * MemoryHistoryStore: In-memory IHistoryStore implementation.
 *
 * Entries survive only for the current process lifetime.
 * Entries are copied in and out, so callers cannot mutate stored history.
 */

import type { IHistoryStore } from '../interfaces/history_store.js';
import type { HistoryEntry } from '../history_record.js';

export class MemoryHistoryStore implements IHistoryStore {
  public readonly location = 'memory';
  private _entries: HistoryEntry[] = [];

  constructor(initial: readonly HistoryEntry[] = []) {
    this._entries = initial.map((e) => ({ ...e }));
  }

  readAll(): HistoryEntry[] {
    return this._entries.map((e) => ({ ...e }));
  }

  writeAll(entries: readonly HistoryEntry[]): void {
    this._entries = entries.map((e) => ({ ...e }));
  }
}
