/**
 * Unit tests for the mutation classifier
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { ReferenceCatalog } from '../../src/catalog/reference-catalog';
import { MutationClassifier, expressionBand } from '../../src/classifier/mutation-classifier';
import { ValidationError } from '../../src/model/errors';
import { createGeneRecord } from '../../src/model/records';
import { createTestCatalog } from '../helpers';

const gene = (geneId: string, expression: number, sequence?: string) =>
  createGeneRecord({ patientId: 'P1', geneId, expression, sequence });

describe('MutationClassifier', () => {
  let catalog: ReferenceCatalog;
  let classifier: MutationClassifier;

  beforeEach(() => {
    catalog = createTestCatalog();
    classifier = new MutationClassifier({ tolerance: 0.1, precedence: 'sequence' });
  });

  describe('expression evidence', () => {
    it('flags an under-expressed oncogene as likely pathogenic', () => {
      const mutation = classifier.classify(gene('TP53', 0.1), catalog);

      expect(mutation.classification).toBe('likely-pathogenic');
      expect(mutation.evidence).toBe('expression');
      expect(mutation.mutationType).toBe('none');
      expect(mutation.geneRecordId).toBe('P1/TP53');
    });

    it('classifies an in-range gene as benign', () => {
      const mutation = classifier.classify(gene('BRCA1', 8.2), catalog);

      expect(mutation.classification).toBe('benign');
      expect(mutation.evidence).toBe('expression');
    });

    it('widens the expected range by the tolerance band', () => {
      // MYC expects [3, 7]; 10% of the width gives [2.6, 7.4]
      expect(classifier.classify(gene('MYC', 7.3), catalog).classification).toBe('benign');
      expect(classifier.classify(gene('MYC', 7.5), catalog).classification).toBe('likely-pathogenic');
      expect(classifier.classify(gene('MYC', 2.5), catalog).classification).toBe('likely-pathogenic');
    });

    it('does not flag out-of-range genes that are not oncogenes', () => {
      expect(classifier.classify(gene('BRCA1', 50), catalog).classification).toBe('benign');
    });
  });

  describe('sequence evidence', () => {
    it('marks a catalogued variant as pathogenic', () => {
      const mutation = classifier.classify(gene('TP53', 3, 'ATGAAGGAGC'), catalog);

      expect(mutation).toMatchObject({
        mutationType: 'substitution',
        classification: 'pathogenic',
        evidence: 'sequence',
        position: 4,
        variants: ['G4A'],
      });
    });

    it('marks an unlisted variant of an oncogene as likely pathogenic', () => {
      const mutation = classifier.classify(gene('TP53', 3, 'ATGGAGGAGT'), catalog);

      expect(mutation.classification).toBe('likely-pathogenic');
      expect(mutation.variants).toEqual(['C10T']);
    });

    it('detects a catalogued deletion', () => {
      const mutation = classifier.classify(gene('BRCA1', 5, 'ATGGTTTAT'), catalog);

      expect(mutation).toMatchObject({ mutationType: 'deletion', classification: 'pathogenic', position: 5, variants: ['del5'] });
    });

    it('leaves an unlisted insertion in a non-oncogene unknown', () => {
      const mutation = classifier.classify(gene('ESR1', 5, 'ATGACCATGAT'), catalog);

      expect(mutation).toMatchObject({ mutationType: 'insertion', classification: 'unknown', variants: ['ins11'] });
    });

    it('classifies a sequence matching the reference as benign', () => {
      const mutation = classifier.classify(gene('BRCA1', 5, 'ATGGATTTAT'), catalog);

      expect(mutation).toMatchObject({ mutationType: 'none', classification: 'benign', evidence: 'sequence' });
      expect(mutation.position).toBeUndefined();
    });
  });

  describe('signal precedence', () => {
    it('lets sequence evidence win by default', () => {
      const mutation = classifier.classify(gene('TP53', 3, 'ATGAAGGAGC'), catalog);
      expect(mutation.classification).toBe('pathogenic');
    });

    it('takes the classification from expression when configured, keeping the mutation type', () => {
      const expressionFirst = new MutationClassifier({ tolerance: 0.1, precedence: 'expression' });
      const mutation = expressionFirst.classify(gene('TP53', 3, 'ATGAAGGAGC'), catalog);

      expect(mutation).toMatchObject({
        mutationType: 'substitution',
        classification: 'benign',
        evidence: 'expression',
        variants: ['G4A'],
      });
    });
  });

  describe('missing evidence', () => {
    it('reports a gene absent from the catalog as unknown', () => {
      const mutation = classifier.classify(gene('KRAS', 4), catalog);

      expect(mutation).toMatchObject({ mutationType: 'none', classification: 'unknown', evidence: 'catalog-miss' });
    });

    it('reports insufficient evidence without a sequence or range', () => {
      const mutation = classifier.classify(gene('ESR1', 4), catalog);

      expect(mutation).toMatchObject({ classification: 'unknown', evidence: 'insufficient' });
    });
  });

  describe('provenance', () => {
    it('stamps the rule set and catalog version', () => {
      const mutation = classifier.classify(gene('BRCA1', 8.2), catalog);

      expect(classifier.ruleVersion).toBe('r1;tolerance=0.1;precedence=sequence');
      expect(mutation.ruleVersion).toBe(classifier.ruleVersion);
      expect(mutation.catalogVersion).toBe(catalog.version);
    });

    it('is idempotent for identical input and catalog', () => {
      const first = classifier.classify(gene('TP53', 0.1), catalog, '2024-01-01T00:00:00.000Z');
      const second = classifier.classify(gene('TP53', 0.1), catalog, '2024-06-01T00:00:00.000Z');

      expect(second.id).toBe(first.id);
    });

    it('needs reclassification after the catalog or the rules change', () => {
      const mutation = classifier.classify(gene('TP53', 0.1), catalog);
      const widerCatalog = createTestCatalog({ oncogenes: ['TP53'] });
      const looser = new MutationClassifier({ tolerance: 0.5, precedence: 'sequence' });

      expect(classifier.needsReclassification(mutation, catalog)).toBe(false);
      expect(classifier.needsReclassification(mutation, widerCatalog)).toBe(true);
      expect(looser.needsReclassification(mutation, catalog)).toBe(true);
    });
  });

  it('rejects a negative tolerance', () => {
    expect(() => new MutationClassifier({ tolerance: -1 })).toThrow(ValidationError);
  });
});

describe('expressionBand', () => {
  it('returns undefined for genes without an expected range', () => {
    const entry = createTestCatalog().lookup('ESR1');
    expect(entry).toBeDefined();
    if (entry) {
      expect(expressionBand(entry, 0.1)).toBeUndefined();
    }
  });

  it('adds the tolerance fraction of the range width on each side', () => {
    const entry = createTestCatalog().lookup('BRCA1');
    expect(entry && expressionBand(entry, 0.25)).toEqual({ lower: 0, upper: 12 });
  });
});
