import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDebateStore } from '../../../src/storage/factory.js';
import { JsonFileDebateStore } from '../../../src/storage/json-file-store.js';
import { SqliteDebateStore } from '../../../src/storage/sqlite-store.js';
import { makeRecord } from '../../helpers/fixtures.js';

let baseDir: string;

beforeEach(() => {
  baseDir = mkdtempSync(join(tmpdir(), 'threefold-factory-'));
});

afterEach(() => {
  rmSync(baseDir, { recursive: true, force: true });
});

describe('openDebateStore', () => {
  it('opens the JSON store relative to the base directory', () => {
    const opened = openDebateStore({ backend: 'json', dir: 'data/debates', dbPath: 'unused.db' }, baseDir);
    expect(opened.store).toBeInstanceOf(JsonFileDebateStore);
    expect(opened.location).toBe(join(baseDir, 'data', 'debates'));

    opened.store.save(makeRecord('deb_a'));
    expect(existsSync(join(baseDir, 'data', 'debates', 'deb_a.json'))).toBe(true);
    opened.close();
  });

  it('opens the SQLite store and creates its directory', () => {
    const opened = openDebateStore({ backend: 'sqlite', dir: 'unused', dbPath: 'db/threefold.db' }, baseDir);
    expect(opened.store).toBeInstanceOf(SqliteDebateStore);
    expect(opened.location).toBe(join(baseDir, 'db', 'threefold.db'));

    opened.store.save(makeRecord('deb_a'));
    expect(opened.store.get('deb_a').debateId).toBe('deb_a');
    opened.close();

    const reopened = openDebateStore({ backend: 'sqlite', dir: 'unused', dbPath: 'db/threefold.db' }, baseDir);
    expect(reopened.store.list(10).map((d) => d.debateId)).toEqual(['deb_a']);
    reopened.close();
  });
});
