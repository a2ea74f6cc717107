/**
 * IHistoryStore: backing store contract for the History Ledger.
 *
 * Implementations:
 *   - FileHistoryStore (src/stores/file_store.ts): JSON file, atomic replace
 *   - MemoryHistoryStore (src/stores/memory_store.ts): process lifetime only
 *
 * The store holds whole collections only. Ordering, stats and degradation
 * on read failure belong to HistoryLedger, not to the store.
 */

import type { HistoryEntry } from '../history_record.js';

export interface IHistoryStore {
  /** Human-readable location for log lines (file path, 'memory'). */
  readonly location: string;

  /**
   * Read every stored entry, oldest first. Returns [] if nothing was ever written.
   * @throws StorageError if the data is unreadable or corrupt.
   */
  readAll(): HistoryEntry[];

  /**
   * Replace the stored collection. Either fully succeeds or leaves the
   * previous collection in place.
   * @throws StorageError('WRITE_FAILED')
   */
  writeAll(entries: readonly HistoryEntry[]): void;
}
