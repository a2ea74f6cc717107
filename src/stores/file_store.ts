/**
 * FileHistoryStore: JSON file backing store for the History Ledger.
 *
 * Write path: serialize full collection → temp file in the same directory
 * → rename over the target. rename() within one directory replaces atomically,
 * so an interrupted write leaves the previous file intact.
 *
 * Missing file = empty history. Unreadable or unparseable file = StorageError.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import * as core from '@actions/core';
import type { IHistoryStore } from '../interfaces/history_store.js';
import { parseHistoryDocument, serializeHistory, type HistoryEntry } from '../history_record.js';
import { StorageError } from '../errors.js';

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class FileHistoryStore implements IHistoryStore {
  public readonly location: string;

  constructor(private readonly path: string) {
    this.location = path;
  }

  readAll(): HistoryEntry[] {
    if (!existsSync(this.path)) return [];

    let document: unknown;
    try {
      document = JSON.parse(readFileSync(this.path, 'utf8'));
    } catch (err) {
      throw new StorageError('READ_FAILED', this.path, `Could not read history at ${this.path}: ${describe(err)}`);
    }
    return parseHistoryDocument(document, this.path);
  }

  writeAll(entries: readonly HistoryEntry[]): void {
    const dir = dirname(this.path);
    const tempPath = join(dir, `.${basename(this.path)}.${process.pid}.tmp`);

    try {
      mkdirSync(dir, { recursive: true });
      writeFileSync(tempPath, serializeHistory(entries), { encoding: 'utf8', mode: 0o600 });
      renameSync(tempPath, this.path);
    } catch (err) {
      this.removeTemp(tempPath);
      throw new StorageError('WRITE_FAILED', this.path, `Could not write history at ${this.path}: ${describe(err)}`);
    }
  }

  private removeTemp(tempPath: string): void {
    try {
      if (existsSync(tempPath)) unlinkSync(tempPath);
    } catch (err) {
      core.debug(`Could not remove temporary history file ${tempPath}: ${describe(err)}`);
    }
  }
}
