// packages/core/src/storage/index.ts -- barrel re-export

export type { DebateRecordStore } from './store.js';
export {
  debateDocumentSchema,
  fromDocument,
  parseDebateJson,
  serializeDebate,
  toDocument,
} from './codec.js';
export type { DebateDocument } from './codec.js';
export { JsonFileDebateStore } from './json-file-store.js';
export type { JsonFileDebateStoreOptions } from './json-file-store.js';
export { getSchemaVersion, openDatabase, runMigrations } from './database.js';
export { SqliteDebateStore } from './sqlite-store.js';
export { openDebateStore } from './factory.js';
export type { OpenedDebateStore } from './factory.js';
