/**
 * Behaviour every storage backend must share
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  ConstraintViolation,
  NotFoundError,
  TransactionAborted,
  ValidationError,
} from '../../src/model/errors';
import { createGeneRecord, createMutationRecord, createPatient, recordsEqual } from '../../src/model/records';
import { GenomicStore } from '../../src/storage/genomic-store';
import { BACKENDS, createTempDir, FIXED_TIME, openTestStore, removeTempDir, seedStore } from '../helpers';

describe.each(BACKENDS)('%s store', (backend) => {
  let tempDir: string;
  let store: GenomicStore;

  beforeEach(() => {
    tempDir = createTempDir();
    store = openTestStore(backend, tempDir);
  });

  afterEach(() => {
    store.close();
    removeTempDir(tempDir);
  });

  describe('put and get', () => {
    it('returns an equal record after a round trip', () => {
      const patient = createPatient({ id: 'P1', name: 'Test Patient', age: 40, sex: 'other', stage: '0', diagnosis: 'Breast Cancer' });
      const geneRecord = createGeneRecord({ patientId: 'P1', geneId: 'TP53', expression: 2.5, sequence: 'ATGGAGGAGC' });
      const mutation = createMutationRecord({
        patientId: 'P1',
        geneId: 'TP53',
        mutationType: 'substitution',
        classification: 'pathogenic',
        evidence: 'sequence',
        position: 4,
        variants: ['G4A'],
        ruleVersion: 'r1',
        catalogVersion: 'test-version',
        createdAt: FIXED_TIME,
      });

      store.put(patient);
      store.put(geneRecord);
      store.put(mutation);

      expect(store.get('geneRecord', geneRecord.id)).toEqual(geneRecord);
      expect(store.get('mutationRecord', mutation.id)).toEqual(mutation);
      expect(recordsEqual(store.get('patient', 'P1'), { ...patient, geneRecordIds: ['P1/TP53'] })).toBe(true);
    });

    it('fills in the gene records a patient owns', () => {
      seedStore(store);
      expect(store.get('patient', 'P1').geneRecordIds).toEqual(['P1/BRCA1', 'P1/TP53']);
    });

    it('throws NotFoundError for a missing record', () => {
      expect(() => store.get('patient', 'NOPE')).toThrow(NotFoundError);
      expect(store.find('geneRecord', 'P1/TP53')).toBeUndefined();
    });

    it('refuses a gene record whose patient does not exist', () => {
      const orphan = createGeneRecord({ patientId: 'P9', geneId: 'TP53', expression: 1 });
      expect(() => store.put(orphan)).toThrow(ConstraintViolation);
      expect(store.stats().geneRecords).toBe(0);
    });

    it('refuses a record whose id does not match its content', () => {
      store.put(createPatient({ id: 'P1' }));
      const record = { ...createGeneRecord({ patientId: 'P1', geneId: 'TP53', expression: 1 }), id: 'P1/MYC' };

      expect(() => store.put(record)).toThrow(ValidationError);
    });

    it('refuses a second mutation for the same gene record', () => {
      seedStore(store);
      const competing = createMutationRecord({
        patientId: 'P1',
        geneId: 'TP53',
        mutationType: 'none',
        classification: 'unknown',
        evidence: 'insufficient',
        ruleVersion: 'r1',
        catalogVersion: 'other-version',
      });

      expect(() => store.put(competing)).toThrow(ConstraintViolation);
      expect(store.stats().mutationRecords).toBe(3);
    });

    it('accepts the same mutation again', () => {
      seedStore(store);
      const [mutation] = store.query({ kind: 'mutationRecord', geneRecordIds: ['P1/TP53'] });

      store.put(mutation);
      expect(store.stats()).toEqual({ patients: 2, geneRecords: 3, mutationRecords: 3 });
    });

    it('updates a patient in place without touching its gene records', () => {
      seedStore(store);
      store.put(createPatient({ id: 'P1', age: 55 }));

      const patient = store.get('patient', 'P1');
      expect(patient.age).toBe(55);
      expect(patient.diagnosis).toBeUndefined();
      expect(patient.geneRecordIds).toEqual(['P1/BRCA1', 'P1/TP53']);
      expect(store.stats()).toEqual({ patients: 2, geneRecords: 3, mutationRecords: 3 });
    });
  });

  describe('delete', () => {
    beforeEach(() => {
      seedStore(store);
    });

    it('cascades from a patient to its gene and mutation records', () => {
      store.delete('patient', 'P1');

      expect(store.stats()).toEqual({ patients: 1, geneRecords: 1, mutationRecords: 1 });
      expect(store.query({ kind: 'geneRecord', patientIds: ['P1'] })).toEqual([]);
      expect(store.query({ kind: 'mutationRecord', patientIds: ['P1'] })).toEqual([]);
    });

    it('cascades from a gene record to its mutation', () => {
      store.delete('geneRecord', 'P2/TP53');

      expect(store.query({ kind: 'mutationRecord', geneRecordIds: ['P2/TP53'] })).toEqual([]);
      expect(store.get('patient', 'P2').geneRecordIds).toEqual([]);
    });

    it('deletes a mutation alone', () => {
      const [mutation] = store.query({ kind: 'mutationRecord', geneRecordIds: ['P1/BRCA1'] });
      store.delete('mutationRecord', mutation.id);

      expect(store.stats()).toEqual({ patients: 2, geneRecords: 3, mutationRecords: 2 });
    });

    it('throws NotFoundError for a missing record', () => {
      expect(() => store.delete('patient', 'P9')).toThrow(NotFoundError);
    });
  });

  describe('transaction', () => {
    it('commits every operation', () => {
      const result = store.transaction([
        { op: 'put', record: createPatient({ id: 'P1' }) },
        { op: 'put', record: createGeneRecord({ patientId: 'P1', geneId: 'MYC', expression: 4 }) },
      ]);

      expect(result).toEqual({ status: 'committed', applied: 2 });
      expect(store.stats()).toEqual({ patients: 1, geneRecords: 1, mutationRecords: 0 });
    });

    it('applies operations in order within one transaction', () => {
      seedStore(store);
      const result = store.transaction([
        { op: 'delete', kind: 'patient', id: 'P2' },
        { op: 'put', record: createPatient({ id: 'P2', diagnosis: 'Prostate Cancer' }) },
      ]);

      expect(result.status).toBe('committed');
      expect(store.get('patient', 'P2').geneRecordIds).toEqual([]);
    });

    it('rolls back every operation when one fails', () => {
      seedStore(store);
      const before = store.exportDataset();

      const result = store.transaction([
        { op: 'put', record: createPatient({ id: 'P3' }) },
        { op: 'delete', kind: 'patient', id: 'P1' },
        { op: 'put', record: createGeneRecord({ patientId: 'P9', geneId: 'TP53', expression: 1 }) },
      ]);

      expect(result.status).toBe('rolled-back');
      if (result.status === 'rolled-back') {
        expect(result.error).toBeInstanceOf(TransactionAborted);
        expect(result.error.failedIndex).toBe(2);
        expect(result.error.cause).toBeInstanceOf(ConstraintViolation);
      }
      expect(store.exportDataset()).toEqual(before);
    });

    it('commits an empty operation list', () => {
      expect(store.transaction([])).toEqual({ status: 'committed', applied: 0 });
    });
  });

  describe('query', () => {
    beforeEach(() => {
      seedStore(store);
    });

    const ids = (records: { id: string }[]): string[] => records.map(record => record.id);

    it('filters patients by demographics', () => {
      expect(ids(store.query({ kind: 'patient', sexes: ['female'] }))).toEqual(['P1']);
      expect(ids(store.query({ kind: 'patient', minAge: 60 }))).toEqual(['P2']);
      expect(ids(store.query({ kind: 'patient', stages: ['II', 'III'] }))).toEqual(['P1', 'P2']);
      expect(ids(store.query({ kind: 'patient', diagnosis: 'breast cancer' }))).toEqual(['P1']);
    });

    it('filters gene records by gene and expression range', () => {
      expect(ids(store.query({ kind: 'geneRecord', geneIds: ['tp53'] }))).toEqual(['P1/TP53', 'P2/TP53']);
      expect(ids(store.query({ kind: 'geneRecord', minExpression: 1, maxExpression: 5 }))).toEqual(['P2/TP53']);
    });

    it('filters mutations by classification and type', () => {
      const pathogenic = store.query({ kind: 'mutationRecord', classifications: ['pathogenic'] });
      const substitutions = store.query({ kind: 'mutationRecord', mutationTypes: ['substitution'] });

      expect(pathogenic.map(mutation => mutation.geneRecordId)).toEqual(['P2/TP53']);
      expect(substitutions.map(mutation => mutation.variants)).toEqual([['G4A']]);
    });

    it('returns nothing for an empty id list', () => {
      expect(store.query({ kind: 'patient', ids: [] })).toEqual([]);
    });
  });

  describe('exportDataset', () => {
    it('lists each collection sorted by id', () => {
      seedStore(store);
      const document = store.exportDataset();

      expect(document.schemaVersion).toBe(1);
      expect(document.patients.map(patient => patient.id)).toEqual(['P1', 'P2']);
      expect(document.geneRecords.map(record => record.id)).toEqual(['P1/BRCA1', 'P1/TP53', 'P2/TP53']);
      expect(document.mutationRecords).toHaveLength(3);
    });
  });
});
