// packages/core/src/storage/store.ts

import type { DebateRecord } from '../types/debate.js';

/**
 * Persistence for finished debates, keyed by `debateId`.
 * Each save adds a row to a listing index as well.
 */
export interface DebateRecordStore {
  /** Persist the record and index it. Returns the record's identifier. */
  save(record: DebateRecord): string;
  /** Throws DebateNotFoundError when no record exists for `debateId`. */
  get(debateId: string): DebateRecord;
  /**
   * Most recently saved first, at most `limit` entries.
   * Index rows whose record is gone are skipped.
   */
  list(limit: number): DebateRecord[];
  /** Remove the record and its index row. Returns whether a record existed. */
  delete(debateId: string): boolean;
}
