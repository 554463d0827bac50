// packages/core/src/storage/factory.ts -- Pick the record store from configuration

import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { StorageConfig } from '../types/config.js';
import { openDatabase } from './database.js';
import { JsonFileDebateStore } from './json-file-store.js';
import { SqliteDebateStore } from './sqlite-store.js';
import type { DebateRecordStore } from './store.js';

export interface OpenedDebateStore {
  store: DebateRecordStore;
  /** Where the data lives, for diagnostics. */
  location: string;
  close(): void;
}

/**
 * Open the configured backend. Relative paths resolve against `baseDir`.
 */
export function openDebateStore(config: StorageConfig, baseDir: string): OpenedDebateStore {
  if (config.backend === 'sqlite') {
    const dbPath = resolve(baseDir, config.dbPath);
    mkdirSync(dirname(dbPath), { recursive: true });
    const db = openDatabase(dbPath);
    return {
      store: new SqliteDebateStore(db),
      location: dbPath,
      close: () => db.close(),
    };
  }

  const dir = resolve(baseDir, config.dir);
  return {
    store: new JsonFileDebateStore({ dir }),
    location: dir,
    close: () => {},
  };
}
