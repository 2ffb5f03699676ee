/**
 * Unit tests for the reference catalog
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { ReferenceCatalog } from '../../src/catalog/reference-catalog';
import { StorageUnavailable, ValidationError } from '../../src/model/errors';
import { createTempDir, createTestCatalog, removeTempDir, TEST_CATALOG } from '../helpers';

describe('ReferenceCatalog', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = createTempDir();
  });

  afterAll(() => {
    removeTempDir(tempDir);
  });

  it('looks genes up case-insensitively', () => {
    const catalog = createTestCatalog();

    expect(catalog.lookup('tp53')?.expectedExpression).toEqual({ min: 1, max: 5 });
    expect(catalog.has('brca1')).toBe(true);
    expect(catalog.isOncogene('myc')).toBe(true);
    expect(catalog.isOncogene('BRCA1')).toBe(false);
    expect(catalog.lookup('KRAS')).toBeUndefined();
  });

  it('summarises genes and oncogenes in sorted order', () => {
    const summary = createTestCatalog().summary();

    expect(summary).toMatchObject({
      name: 'test-panel',
      geneCount: 4,
      oncogenes: ['MYC', 'TP53'],
      genes: ['BRCA1', 'ESR1', 'MYC', 'TP53'],
    });
  });

  it('derives the version from content, not from gene order', () => {
    const reordered = createTestCatalog({ genes: [...TEST_CATALOG.genes].reverse() });
    const changed = createTestCatalog({ oncogenes: ['TP53'] });

    expect(reordered.version).toBe(createTestCatalog().version);
    expect(changed.version).not.toBe(createTestCatalog().version);
  });

  it('rejects an inverted expression range', () => {
    expect(() => ReferenceCatalog.fromJSON({
      name: 'bad',
      genes: [{ geneId: 'TP53', expectedExpression: [5, 1] }],
    })).toThrow(ValidationError);
  });

  it('rejects a gene listed twice', () => {
    expect(() => ReferenceCatalog.fromJSON({
      name: 'bad',
      genes: [{ geneId: 'TP53' }, { geneId: 'tp53' }],
    })).toThrow(ValidationError);
  });

  it('loads a catalog file', () => {
    const file = path.join(tempDir, 'catalog.json');
    fs.writeFileSync(file, JSON.stringify(TEST_CATALOG));

    expect(ReferenceCatalog.fromFile(file).version).toBe(createTestCatalog().version);
  });

  it('loads the bundled default catalog', () => {
    const catalog = ReferenceCatalog.fromFile(path.join(__dirname, '../../data/reference-catalog.json'));

    expect(catalog.isOncogene('TP53')).toBe(true);
    expect(catalog.lookup('BRCA1')?.expectedExpression).toEqual({ min: 2, max: 10 });
  });

  it('reports an unreadable file as storage unavailable', () => {
    expect(() => ReferenceCatalog.fromFile(path.join(tempDir, 'missing.json'))).toThrow(StorageUnavailable);
  });

  it('reports malformed JSON as a validation error', () => {
    const file = path.join(tempDir, 'broken.json');
    fs.writeFileSync(file, '{ not json');

    expect(() => ReferenceCatalog.fromFile(file)).toThrow(ValidationError);
  });
});
