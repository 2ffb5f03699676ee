/**
 * Deterministic mutation classifier.
 *
 * Derives one MutationRecord from a GeneRecord and the reference catalog.
 * Two kinds of evidence are considered:
 *
 * - sequence: the record's raw sequence compared base by base against the
 *   catalog's reference fragment (yields the mutation type and variants);
 * - expression: the record's expression value compared against the catalog's
 *   expected range widened by a tolerance band.
 *
 * When both are available and disagree, the configured precedence decides the
 * classification (sequence by default). The mutation type always comes from
 * the sequence comparison because expression cannot describe a base change.
 */

import { config, SignalPrecedence } from '../config/index.js';
import { CatalogEntry, ReferenceCatalog } from '../catalog/reference-catalog.js';
import {
    Classification,
    createMutationRecord,
    Evidence,
    GeneRecord,
    MutationRecord,
    MutationType,
} from '../model/records.js';
import { ValidationError } from '../model/errors.js';
import { compareSequences } from './sequence-diff.js';

export const DETECTION_RULES_REVISION = 'r1';

export interface ClassifierOptions {
    /** Fraction of the expected range's width added on each side before flagging. */
    tolerance: number;
    precedence: SignalPrecedence;
}

export interface ExpressionBand {
    lower: number;
    upper: number;
}

interface SignalOutcome {
    mutationType: MutationType;
    classification: Classification;
    evidence: Evidence;
    position?: number;
    variants?: string[];
}

export function expressionBand(entry: CatalogEntry, tolerance: number): ExpressionBand | undefined {
    if (!entry.expectedExpression) {
        return undefined;
    }
    const { min, max } = entry.expectedExpression;
    const margin = tolerance * (max - min);
    return { lower: min - margin, upper: max + margin };
}

export class MutationClassifier {
    readonly options: ClassifierOptions;
    readonly ruleVersion: string;

    constructor(options: Partial<ClassifierOptions> = {}) {
        const tolerance = options.tolerance ?? config.classifier.tolerance;
        const precedence = options.precedence ?? config.classifier.precedence;

        if (!Number.isFinite(tolerance) || tolerance < 0) {
            throw ValidationError.single('tolerance', 'must be a finite number >= 0', tolerance);
        }
        if (precedence !== 'sequence' && precedence !== 'expression') {
            throw ValidationError.single('precedence', "must be 'sequence' or 'expression'", precedence);
        }

        this.options = { tolerance, precedence };
        this.ruleVersion = `${DETECTION_RULES_REVISION};tolerance=${tolerance};precedence=${precedence}`;
    }

    classify(geneRecord: GeneRecord, catalog: ReferenceCatalog, createdAt?: string): MutationRecord {
        const outcome = this.evaluate(geneRecord, catalog);

        return createMutationRecord({
            patientId: geneRecord.patientId,
            geneId: geneRecord.geneId,
            mutationType: outcome.mutationType,
            classification: outcome.classification,
            evidence: outcome.evidence,
            position: outcome.position,
            variants: outcome.variants,
            ruleVersion: this.ruleVersion,
            catalogVersion: catalog.version,
            createdAt,
        });
    }

    /** True when the record was produced by another catalog or another rule set. */
    needsReclassification(mutation: MutationRecord, catalog: ReferenceCatalog): boolean {
        return mutation.catalogVersion !== catalog.version || mutation.ruleVersion !== this.ruleVersion;
    }

    private evaluate(geneRecord: GeneRecord, catalog: ReferenceCatalog): SignalOutcome {
        const entry = catalog.lookup(geneRecord.geneId);
        if (!entry) {
            return { mutationType: 'none', classification: 'unknown', evidence: 'catalog-miss' };
        }

        const oncogene = catalog.isOncogene(entry.geneId);
        const sequence = this.sequenceSignal(geneRecord, entry, oncogene);
        const expression = this.expressionSignal(geneRecord, entry, oncogene);

        if (sequence && expression) {
            return this.options.precedence === 'sequence'
                ? sequence
                : { ...sequence, classification: expression.classification, evidence: 'expression' };
        }
        if (sequence) {
            return sequence;
        }
        if (expression) {
            return expression;
        }
        return { mutationType: 'none', classification: 'unknown', evidence: 'insufficient' };
    }

    private sequenceSignal(geneRecord: GeneRecord, entry: CatalogEntry, oncogene: boolean): SignalOutcome | undefined {
        if (geneRecord.sequence === undefined || entry.referenceSequence === undefined) {
            return undefined;
        }

        const comparison = compareSequences(entry.referenceSequence, geneRecord.sequence);
        if (comparison.mutationType === 'none') {
            return { mutationType: 'none', classification: 'benign', evidence: 'sequence' };
        }

        let classification: Classification;
        if (comparison.variants.some(variant => entry.pathogenicVariants.includes(variant))) {
            classification = 'pathogenic';
        } else if (oncogene) {
            classification = 'likely-pathogenic';
        } else {
            classification = 'unknown';
        }

        return {
            mutationType: comparison.mutationType,
            classification,
            evidence: 'sequence',
            position: comparison.position,
            variants: comparison.variants,
        };
    }

    private expressionSignal(geneRecord: GeneRecord, entry: CatalogEntry, oncogene: boolean): SignalOutcome | undefined {
        const band = expressionBand(entry, this.options.tolerance);
        if (!band) {
            return undefined;
        }

        const outside = geneRecord.expression < band.lower || geneRecord.expression > band.upper;
        return {
            mutationType: 'none',
            classification: outside && oncogene ? 'likely-pathogenic' : 'benign',
            evidence: 'expression',
        };
    }
}

export function classify(
    geneRecord: GeneRecord,
    catalog: ReferenceCatalog,
    options: Partial<ClassifierOptions> = {}
): MutationRecord {
    return new MutationClassifier(options).classify(geneRecord, catalog);
}
