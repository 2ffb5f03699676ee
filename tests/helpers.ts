/**
 * Shared factories for store, catalog and registry tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CatalogDefinition, ReferenceCatalog } from '../src/catalog/reference-catalog';
import { MutationClassifier } from '../src/classifier/mutation-classifier';
import { createGeneRecord, createPatient } from '../src/model/records';
import { GenomicRegistry } from '../src/registry/genomic-registry';
import { GenomicStore, StoreOperation } from '../src/storage/genomic-store';
import { JsonFileGenomicStore } from '../src/storage/json-file-store';
import { SqliteGenomicStore } from '../src/storage/sqlite-store';

export const TEST_CATALOG: CatalogDefinition = {
  name: 'test-panel',
  oncogenes: ['TP53', 'MYC'],
  genes: [
    {
      geneId: 'BRCA1',
      referenceSequence: 'ATGGATTTAT',
      expectedExpression: [2.0, 10.0],
      pathogenicVariants: ['T10C', 'del5'],
    },
    {
      geneId: 'TP53',
      referenceSequence: 'ATGGAGGAGC',
      expectedExpression: [1.0, 5.0],
      pathogenicVariants: ['G4A'],
    },
    {
      geneId: 'MYC',
      expectedExpression: [3.0, 7.0],
    },
    {
      geneId: 'ESR1',
      referenceSequence: 'ATGACCATGA',
    },
  ],
};

export const createTestCatalog = (overrides: Partial<CatalogDefinition> = {}): ReferenceCatalog =>
  new ReferenceCatalog({ ...TEST_CATALOG, ...overrides });

export const createTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'genomics-test-'));

export const removeTempDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true });
};

export type BackendName = 'sqlite' | 'json-file';

export const BACKENDS: BackendName[] = ['sqlite', 'json-file'];

/** An in-memory SQLite store, or a JSON document store inside `dir`. */
export const openTestStore = (backend: BackendName, dir: string): GenomicStore =>
  backend === 'sqlite'
    ? new SqliteGenomicStore({ filename: ':memory:' })
    : new JsonFileGenomicStore({ filePath: path.join(dir, 'records.json'), lockTimeoutMs: 200 });

export const createTestRegistry = (store: GenomicStore, catalog: ReferenceCatalog = createTestCatalog()): GenomicRegistry =>
  new GenomicRegistry({
    store,
    catalog,
    classifier: new MutationClassifier({ tolerance: 0.1, precedence: 'sequence' }),
  });

export const FIXED_TIME = '2024-01-01T00:00:00.000Z';

/**
 * Two patients and three classified gene records:
 * P1/BRCA1 benign, P1/TP53 likely-pathogenic, P2/TP53 pathogenic substitution.
 */
export const seedStore = (store: GenomicStore, catalog: ReferenceCatalog = createTestCatalog()): void => {
  const classifier = new MutationClassifier({ tolerance: 0.1, precedence: 'sequence' });
  const geneRecords = [
    createGeneRecord({ patientId: 'P1', geneId: 'BRCA1', expression: 8.2 }),
    createGeneRecord({ patientId: 'P1', geneId: 'TP53', expression: 0.1 }),
    createGeneRecord({ patientId: 'P2', geneId: 'TP53', expression: 3, sequence: 'ATGAAGGAGC' }),
  ];
  const operations: StoreOperation[] = [
    { op: 'put', record: createPatient({ id: 'P1', name: 'Test Patient One', age: 54, sex: 'female', stage: 'II', diagnosis: 'Breast Cancer' }) },
    { op: 'put', record: createPatient({ id: 'P2', age: 61, sex: 'male', stage: 'III', diagnosis: 'Prostate Cancer' }) },
    ...geneRecords.map((record): StoreOperation => ({ op: 'put', record })),
    ...geneRecords.map((record): StoreOperation => ({ op: 'put', record: classifier.classify(record, catalog, FIXED_TIME) })),
  ];
  const result = store.transaction(operations);
  if (result.status !== 'committed') {
    throw result.error;
  }
};
