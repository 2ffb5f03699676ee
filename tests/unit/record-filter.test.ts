/**
 * Unit tests for composable record filters
 */

import { describe, it, expect } from '@jest/globals';
import { ValidationError } from '../../src/model/errors';
import { createGeneRecord, createPatient } from '../../src/model/records';
import { Filters, JoinedRow, matchesFilter, parseFilter, requiredKeys } from '../../src/query/record-filter';

const patientOnly: JoinedRow = {
  patient: createPatient({ id: 'P3', age: 45, sex: 'female', diagnosis: 'Breast Cancer' }),
};

const withGene: JoinedRow = {
  patient: createPatient({ id: 'P1', age: 54, sex: 'female', stage: 'II' }),
  geneRecord: createGeneRecord({ patientId: 'P1', geneId: 'TP53', expression: 0.5 }),
};

describe('matchesFilter', () => {
  it('matches everything with an empty conjunction and nothing with an empty disjunction', () => {
    expect(matchesFilter(Filters.all(), patientOnly)).toBe(true);
    expect(matchesFilter(Filters.or(), patientOnly)).toBe(false);
  });

  it('compares diagnoses case-insensitively', () => {
    expect(matchesFilter(Filters.diagnosis('BREAST cancer'), patientOnly)).toBe(true);
    expect(matchesFilter(Filters.diagnosis('Breast Cancer'), withGene)).toBe(false);
  });

  it('treats age bounds as inclusive and a missing age as a non-match', () => {
    expect(matchesFilter(Filters.age({ min: 45, max: 45 }), patientOnly)).toBe(true);
    expect(matchesFilter(Filters.age({ min: 46 }), patientOnly)).toBe(false);
    expect(matchesFilter(Filters.age({ max: 200 }), { patient: createPatient({ id: 'P4' }) })).toBe(false);
  });

  it('does not match gene leaves on a row without a gene record', () => {
    expect(matchesFilter(Filters.genes('TP53'), patientOnly)).toBe(false);
    expect(matchesFilter(Filters.expression({ max: 10 }), patientOnly)).toBe(false);
    expect(matchesFilter(Filters.not(Filters.genes('TP53')), patientOnly)).toBe(true);
  });

  it('normalises gene symbols', () => {
    expect(matchesFilter(Filters.genes('tp53'), withGene)).toBe(true);
  });

  it('does not match mutation leaves on an unclassified gene record', () => {
    expect(matchesFilter(Filters.classification('benign', 'unknown'), withGene)).toBe(false);
  });

  it('combines leaves', () => {
    const filter = Filters.and(
      Filters.sex('female'),
      Filters.or(Filters.stage('II'), Filters.expression({ min: 1 })),
    );

    expect(matchesFilter(filter, withGene)).toBe(true);
    expect(matchesFilter(filter, patientOnly)).toBe(false);
  });
});

describe('parseFilter', () => {
  it('parses JSON text', () => {
    expect(parseFilter('{"op":"and","filters":[{"op":"gene","ids":["TP53"]},{"op":"age","min":40}]}')).toEqual(
      Filters.and(Filters.genes('TP53'), Filters.age({ min: 40 })),
    );
  });

  it('accepts an already decoded value', () => {
    expect(parseFilter({ op: 'not', filter: { op: 'sex', values: ['male'] } })).toEqual(Filters.not(Filters.sex('male')));
  });

  it('rejects malformed JSON', () => {
    expect(() => parseFilter('{"op":')).toThrow(ValidationError);
  });

  it('rejects an unknown operator', () => {
    expect(() => parseFilter({ op: 'xor', filters: [] })).toThrow(ValidationError);
  });

  it('rejects an invalid leaf value with the path of the problem', () => {
    try {
      parseFilter({ op: 'and', filters: [{ op: 'sex', values: ['robot'] }] });
      throw new Error('expected a validation error');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues[0].field).toBe('filter.filters.0.values.0');
      }
    }
  });
});

describe('requiredKeys', () => {
  it('intersects patient and gene ids under conjunctions', () => {
    const filter = Filters.and(
      Filters.patients('P1', 'P2'),
      Filters.and(Filters.patients('P2', 'P3'), Filters.genes('tp53')),
    );

    expect(requiredKeys(filter)).toEqual({ patientIds: ['P2'], geneIds: ['TP53'] });
  });

  it('ignores leaves under disjunctions and negations', () => {
    expect(requiredKeys(Filters.or(Filters.patients('P1')))).toEqual({});
    expect(requiredKeys(Filters.not(Filters.genes('TP53')))).toEqual({});
  });
});
