// packages/core/src/storage/json-file-store.ts -- One JSON document per debate plus an index file

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { DebateIndexEntry, DebateRecord } from '../types/debate.js';
import { DebateNotFoundError, StorageError, errorMessage } from '../utils/errors.js';
import {
  debateIndexSchema,
  indexEntryFor,
  indexFromDocument,
  indexToDocument,
  parseDebateJson,
  serializeDebate,
} from './codec.js';
import type { DebateRecordStore } from './store.js';

const INDEX_FILENAME = '_index.json';

// Identifiers become file names; reject anything that could leave the directory.
const SAFE_ID = /^[A-Za-z0-9_-]+$/;

export interface JsonFileDebateStoreOptions {
  /** Directory holding `<id>.json` files and `_index.json`. Created on first save. */
  dir: string;
}

export class JsonFileDebateStore implements DebateRecordStore {
  private readonly dir: string;
  private readonly indexPath: string;

  constructor(options: JsonFileDebateStoreOptions) {
    this.dir = options.dir;
    this.indexPath = join(this.dir, INDEX_FILENAME);
  }

  save(record: DebateRecord): string {
    const path = this.recordPath(record.debateId);
    try {
      mkdirSync(this.dir, { recursive: true });
      writeFileSync(path, serializeDebate(record), 'utf-8');
      try {
        const index = this.loadIndex();
        index.push(indexEntryFor(record));
        this.writeIndex(index);
      } catch (err) {
        // A record missing from the index would never be listed
        rmSync(path, { force: true });
        throw err;
      }
    } catch (err) {
      throw new StorageError(`Failed to save debate ${record.debateId}: ${errorMessage(err)}`, 'save');
    }
    return record.debateId;
  }

  get(debateId: string): DebateRecord {
    if (!SAFE_ID.test(debateId)) {
      throw new DebateNotFoundError(debateId);
    }
    const path = this.recordPath(debateId);
    if (!existsSync(path)) {
      throw new DebateNotFoundError(debateId);
    }
    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new StorageError(`Failed to read debate ${debateId}: ${errorMessage(err)}`, 'get');
    }
    return parseDebateJson(text);
  }

  list(limit: number): DebateRecord[] {
    const recent = [...this.loadIndex()].reverse().slice(0, Math.max(0, limit));
    const debates: DebateRecord[] = [];
    for (const entry of recent) {
      try {
        debates.push(this.get(entry.id));
      } catch (err) {
        if (err instanceof DebateNotFoundError) continue;
        throw err;
      }
    }
    return debates;
  }

  delete(debateId: string): boolean {
    if (!SAFE_ID.test(debateId)) return false;
    const path = this.recordPath(debateId);
    if (!existsSync(path)) return false;
    try {
      rmSync(path);
      this.writeIndex(this.loadIndex().filter((e) => e.id !== debateId));
    } catch (err) {
      throw new StorageError(`Failed to delete debate ${debateId}: ${errorMessage(err)}`, 'delete');
    }
    return true;
  }

  /** Index entries in insertion order. A missing or unreadable index reads as empty. */
  loadIndex(): DebateIndexEntry[] {
    if (!existsSync(this.indexPath)) return [];
    try {
      const parsed = debateIndexSchema.safeParse(JSON.parse(readFileSync(this.indexPath, 'utf-8')));
      return parsed.success ? indexFromDocument(parsed.data) : [];
    } catch {
      return [];
    }
  }

  private writeIndex(index: readonly DebateIndexEntry[]): void {
    mkdirSync(this.dir, { recursive: true });
    writeFileSync(this.indexPath, JSON.stringify(indexToDocument(index), null, 2), 'utf-8');
  }

  private recordPath(debateId: string): string {
    if (!SAFE_ID.test(debateId)) {
      throw new StorageError(`Invalid debate id: ${debateId}`, 'path');
    }
    return join(this.dir, `${debateId}.json`);
  }
}
