/**
 * Both backends must hold and report the same data for the same operations
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'path';
import { ConstraintViolation } from '../../src/model/errors';
import { RecordImporter } from '../../src/parser/record-importer';
import { QueryEngine } from '../../src/query/query-engine';
import { Filters } from '../../src/query/record-filter';
import { copyDataset, createStore } from '../../src/storage';
import { GenomicStore } from '../../src/storage/genomic-store';
import { createTempDir, createTestRegistry, removeTempDir, seedStore } from '../helpers';

const COHORT = path.join(__dirname, '../fixtures/cohort.csv');

describe('backend parity', () => {
  let tempDir: string;
  let sqlite: GenomicStore;
  let jsonFile: GenomicStore;

  beforeEach(() => {
    tempDir = createTempDir();
    sqlite = createStore({ backend: 'sqlite', location: path.join(tempDir, 'genomics.db') });
    jsonFile = createStore({ backend: 'json-file', location: path.join(tempDir, 'genomics.json'), lockTimeoutMs: 200 });
  });

  afterEach(() => {
    sqlite.close();
    jsonFile.close();
    removeTempDir(tempDir);
  });

  it('exports identical documents after the same writes', () => {
    seedStore(sqlite);
    seedStore(jsonFile);

    expect(jsonFile.exportDataset()).toEqual(sqlite.exportDataset());
  });

  it('gives identical query results', () => {
    seedStore(sqlite);
    seedStore(jsonFile);
    const filters = [
      Filters.all(),
      Filters.genes('TP53'),
      Filters.and(Filters.sex('female'), Filters.not(Filters.classification('benign'))),
      Filters.or(Filters.age({ min: 60 }), Filters.expression({ max: 1 })),
    ];

    for (const filter of filters) {
      expect(new QueryEngine(jsonFile, { topN: 3 }).query(filter)).toEqual(new QueryEngine(sqlite, { topN: 3 }).query(filter));
    }
  });

  it('matches a repeated id once on both backends', () => {
    seedStore(sqlite);
    seedStore(jsonFile);

    for (const store of [sqlite, jsonFile]) {
      expect(store.query({ kind: 'patient', ids: ['P1', 'P1'] }).map(patient => patient.id)).toEqual(['P1']);
      expect(store.query({ kind: 'geneRecord', ids: ['P1/TP53', 'P1/TP53'] }).map(record => record.id)).toEqual(['P1/TP53']);
    }

    const filter = Filters.patients('P1', 'P1');
    const jsonResult = new QueryEngine(jsonFile).query(filter);
    expect(jsonResult).toEqual(new QueryEngine(sqlite).query(filter));
    expect(jsonResult.totals).toEqual({ patients: 1, geneRecords: 2, mutationRecords: 2 });
    expect(jsonResult.expressionByGene.map(stats => [stats.geneId, stats.samples])).toEqual([['BRCA1', 1], ['TP53', 1]]);
  });

  it('imports a CSV file to the same state on both backends', async () => {
    const sqliteReport = await new RecordImporter(createTestRegistry(sqlite)).importFile(COHORT);
    const jsonReport = await new RecordImporter(createTestRegistry(jsonFile)).importFile(COHORT);

    expect(jsonReport.rows.map(row => row.status)).toEqual(sqliteReport.rows.map(row => row.status));
    // Mutation ids are content-derived; only creation times differ between the two runs.
    const withoutTimes = (store: GenomicStore) =>
      store.exportDataset().mutationRecords.map(({ createdAt: _createdAt, ...rest }) => rest);
    expect(withoutTimes(jsonFile)).toEqual(withoutTimes(sqlite));
    expect(jsonFile.exportDataset().patients).toEqual(sqlite.exportDataset().patients);
    expect(jsonFile.exportDataset().geneRecords).toEqual(sqlite.exportDataset().geneRecords);
  });

  it('copies a dataset between backends', () => {
    seedStore(sqlite);

    const result = copyDataset(sqlite, jsonFile);

    expect(result).toEqual({ status: 'committed', applied: 8 });
    expect(jsonFile.exportDataset()).toEqual(sqlite.exportDataset());
  });

  it('refuses to copy into a store that already holds records', () => {
    seedStore(sqlite);
    seedStore(jsonFile);

    expect(() => copyDataset(sqlite, jsonFile)).toThrow(ConstraintViolation);
  });

  it('round-trips a copy back to an empty store', () => {
    seedStore(jsonFile);
    copyDataset(jsonFile, sqlite);

    const target = createStore({ backend: 'sqlite', location: ':memory:' });
    copyDataset(sqlite, target);
    expect(target.exportDataset()).toEqual(jsonFile.exportDataset());
    target.close();
  });
});
