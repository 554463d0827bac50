// packages/core/src/storage/sqlite-store.ts -- Debate records in SQLite

import type Database from 'better-sqlite3';
import type { DebateRecord } from '../types/debate.js';
import { DebateNotFoundError, StorageError, errorMessage } from '../utils/errors.js';
import { parseDebateJson, serializeDebate } from './codec.js';
import type { DebateRecordStore } from './store.js';

export class SqliteDebateStore implements DebateRecordStore {
  constructor(private db: Database.Database) {}

  save(record: DebateRecord): string {
    try {
      this.db.transaction(() => {
        this.db
          .prepare('INSERT INTO debates (id, topic_title, document, created_at) VALUES (?, ?, ?, ?)')
          .run(record.debateId, record.topic.title, serializeDebate(record), record.createdAt);
        this.db
          .prepare('INSERT INTO debate_index (debate_id, topic_title, created_at) VALUES (?, ?, ?)')
          .run(record.debateId, record.topic.title, record.createdAt);
      })();
    } catch (err) {
      throw new StorageError(`Failed to save debate ${record.debateId}: ${errorMessage(err)}`, 'save');
    }
    return record.debateId;
  }

  get(debateId: string): DebateRecord {
    const row = this.db.prepare('SELECT document FROM debates WHERE id = ?').get(debateId) as
      | { document: string }
      | undefined;
    if (!row) {
      throw new DebateNotFoundError(debateId);
    }
    return parseDebateJson(row.document);
  }

  list(limit: number): DebateRecord[] {
    // LEFT JOIN keeps index rows whose record is gone; they are skipped below
    const rows = this.db
      .prepare(
        `SELECT i.debate_id AS debateId, d.document AS document
         FROM debate_index i LEFT JOIN debates d ON d.id = i.debate_id
         ORDER BY i.seq DESC LIMIT ?`,
      )
      .all(Math.max(0, limit)) as Array<{ debateId: string; document: string | null }>;

    const debates: DebateRecord[] = [];
    for (const row of rows) {
      if (row.document === null) continue;
      debates.push(parseDebateJson(row.document));
    }
    return debates;
  }

  delete(debateId: string): boolean {
    const removed = this.db.transaction(() => {
      const result = this.db.prepare('DELETE FROM debates WHERE id = ?').run(debateId);
      this.db.prepare('DELETE FROM debate_index WHERE debate_id = ?').run(debateId);
      return result.changes > 0;
    })();
    return removed;
  }
}
