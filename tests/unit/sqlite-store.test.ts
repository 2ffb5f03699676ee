/**
 * Unit tests for the SQLite backend
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import Database from 'better-sqlite3';
import * as path from 'path';
import { StorageUnavailable } from '../../src/model/errors';
import { SqliteGenomicStore } from '../../src/storage/sqlite-store';
import { createTempDir, removeTempDir, seedStore } from '../helpers';

describe('SqliteGenomicStore', () => {
  let tempDir: string;
  let filename: string;

  beforeEach(() => {
    tempDir = createTempDir();
    filename = path.join(tempDir, 'db', 'genomics.db');
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('persists records across reopen', () => {
    const store = new SqliteGenomicStore({ filename });
    seedStore(store);
    const exported = store.exportDataset();
    store.close();

    const reopened = new SqliteGenomicStore({ filename });
    expect(reopened.exportDataset()).toEqual(exported);
    reopened.close();
  });

  it('records the schema version on creation', () => {
    new SqliteGenomicStore({ filename }).close();

    const db = new Database(filename, { readonly: true });
    const row = db.prepare<[string], { value: string }>('SELECT value FROM store_meta WHERE key = ?').get('schema_version');
    db.close();

    expect(row).toEqual({ value: '1' });
  });

  it('refuses a database written by a newer version', () => {
    new SqliteGenomicStore({ filename }).close();
    const db = new Database(filename);
    db.prepare("UPDATE store_meta SET value = '2' WHERE key = 'schema_version'").run();
    db.close();

    expect(() => new SqliteGenomicStore({ filename })).toThrow(StorageUnavailable);
  });

  it('enforces cascades in the schema itself', () => {
    const store = new SqliteGenomicStore({ filename });
    seedStore(store);
    store.close();

    const db = new Database(filename);
    db.pragma('foreign_keys = ON');
    db.prepare('DELETE FROM patients WHERE id = ?').run('P1');
    const remaining = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM mutation_records').get();
    db.close();

    expect(remaining).toEqual({ count: 1 });
  });

  it('rejects use after close', () => {
    const store = new SqliteGenomicStore({ filename: ':memory:' });
    store.close();

    expect(() => store.stats()).toThrow(StorageUnavailable);
  });
});
