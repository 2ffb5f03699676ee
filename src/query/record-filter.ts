/**
 * Composable record filters.
 *
 * A filter is evaluated against one joined row: a patient, optionally one of
 * its gene records, and that gene record's current mutation. Leaves that
 * need a part the row lacks (a gene leaf on a patient without gene records,
 * a classification leaf on an unclassified gene record) do not match.
 */

import { z } from 'zod';
import {
    CLASSIFICATIONS,
    Classification,
    CLINICAL_STAGES,
    ClinicalStage,
    GeneRecord,
    MUTATION_TYPES,
    MutationRecord,
    MutationType,
    normalizeGeneId,
    Patient,
    SEXES,
    Sex,
} from '../model/records.js';
import { ValidationError } from '../model/errors.js';

export interface NumericRange {
    min?: number;
    max?: number;
}

export type RecordFilter =
    | { op: 'and'; filters: RecordFilter[] }
    | { op: 'or'; filters: RecordFilter[] }
    | { op: 'not'; filter: RecordFilter }
    | { op: 'patient'; ids: string[] }
    | { op: 'sex'; values: Sex[] }
    | { op: 'stage'; values: ClinicalStage[] }
    | ({ op: 'age' } & NumericRange)
    | { op: 'diagnosis'; value: string }
    | { op: 'gene'; ids: string[] }
    | { op: 'classification'; values: Classification[] }
    | { op: 'mutationType'; values: MutationType[] }
    | ({ op: 'expression' } & NumericRange);

export interface JoinedRow {
    patient: Patient;
    geneRecord?: GeneRecord;
    mutation?: MutationRecord;
}

const finite = z.number().finite();

export const RecordFilterSchema: z.ZodType<RecordFilter> = z.lazy(() =>
    z.discriminatedUnion('op', [
        z.object({ op: z.literal('and'), filters: z.array(RecordFilterSchema) }),
        z.object({ op: z.literal('or'), filters: z.array(RecordFilterSchema) }),
        z.object({ op: z.literal('not'), filter: RecordFilterSchema }),
        z.object({ op: z.literal('patient'), ids: z.array(z.string().min(1)) }),
        z.object({ op: z.literal('sex'), values: z.array(z.enum(SEXES)) }),
        z.object({ op: z.literal('stage'), values: z.array(z.enum(CLINICAL_STAGES)) }),
        z.object({ op: z.literal('age'), min: finite.optional(), max: finite.optional() }),
        z.object({ op: z.literal('diagnosis'), value: z.string() }),
        z.object({ op: z.literal('gene'), ids: z.array(z.string().min(1)) }),
        z.object({ op: z.literal('classification'), values: z.array(z.enum(CLASSIFICATIONS)) }),
        z.object({ op: z.literal('mutationType'), values: z.array(z.enum(MUTATION_TYPES)) }),
        z.object({ op: z.literal('expression'), min: finite.optional(), max: finite.optional() }),
    ])
);

/** Parses a filter supplied as JSON text or as an already-decoded value. */
export function parseFilter(input: unknown): RecordFilter {
    let value = input;
    if (typeof input === 'string') {
        try {
            value = JSON.parse(input);
        } catch (error) {
            throw ValidationError.single('filter', `is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    const parsed = RecordFilterSchema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(
            parsed.error.errors.map(issue => ({ field: ['filter', ...issue.path].join('.'), message: issue.message })),
            { kind: 'filter' }
        );
    }
    return parsed.data;
}

export const Filters = {
    all: (): RecordFilter => ({ op: 'and', filters: [] }),
    and: (...filters: RecordFilter[]): RecordFilter => ({ op: 'and', filters }),
    or: (...filters: RecordFilter[]): RecordFilter => ({ op: 'or', filters }),
    not: (filter: RecordFilter): RecordFilter => ({ op: 'not', filter }),
    patients: (...ids: string[]): RecordFilter => ({ op: 'patient', ids }),
    sex: (...values: Sex[]): RecordFilter => ({ op: 'sex', values }),
    stage: (...values: ClinicalStage[]): RecordFilter => ({ op: 'stage', values }),
    age: (range: NumericRange): RecordFilter => ({ op: 'age', ...range }),
    diagnosis: (value: string): RecordFilter => ({ op: 'diagnosis', value }),
    genes: (...ids: string[]): RecordFilter => ({ op: 'gene', ids }),
    classification: (...values: Classification[]): RecordFilter => ({ op: 'classification', values }),
    mutationType: (...values: MutationType[]): RecordFilter => ({ op: 'mutationType', values }),
    expression: (range: NumericRange): RecordFilter => ({ op: 'expression', ...range }),
};

function inRange(value: number | undefined, range: NumericRange): boolean {
    if (value === undefined) {
        return false;
    }
    return (range.min === undefined || value >= range.min) && (range.max === undefined || value <= range.max);
}

export function matchesFilter(filter: RecordFilter, row: JoinedRow): boolean {
    switch (filter.op) {
        case 'and':
            return filter.filters.every(child => matchesFilter(child, row));
        case 'or':
            return filter.filters.some(child => matchesFilter(child, row));
        case 'not':
            return !matchesFilter(filter.filter, row);
        case 'patient':
            return filter.ids.includes(row.patient.id);
        case 'sex':
            return row.patient.sex !== undefined && filter.values.includes(row.patient.sex);
        case 'stage':
            return row.patient.stage !== undefined && filter.values.includes(row.patient.stage);
        case 'age':
            return inRange(row.patient.age, filter);
        case 'diagnosis':
            return row.patient.diagnosis !== undefined
                && row.patient.diagnosis.toLowerCase() === filter.value.toLowerCase();
        case 'gene':
            return row.geneRecord !== undefined && filter.ids.map(normalizeGeneId).includes(row.geneRecord.geneId);
        case 'classification':
            return row.mutation !== undefined && filter.values.includes(row.mutation.classification);
        case 'mutationType':
            return row.mutation !== undefined && filter.values.includes(row.mutation.mutationType);
        case 'expression':
            return inRange(row.geneRecord?.expression, filter);
    }
}

/**
 * Patient and gene ids every matching row must have, taken from leaves
 * directly under top-level conjunctions. Used to narrow store reads.
 */
export function requiredKeys(filter: RecordFilter): { patientIds?: string[]; geneIds?: string[] } {
    const keys: { patientIds?: string[]; geneIds?: string[] } = {};
    const visit = (node: RecordFilter): void => {
        if (node.op === 'and') {
            node.filters.forEach(visit);
        } else if (node.op === 'patient') {
            const ids = node.ids;
            keys.patientIds = keys.patientIds ? keys.patientIds.filter(id => ids.includes(id)) : [...new Set(ids)];
        } else if (node.op === 'gene') {
            const ids = node.ids.map(normalizeGeneId);
            keys.geneIds = keys.geneIds ? keys.geneIds.filter(id => ids.includes(id)) : [...new Set(ids)];
        }
    };
    visit(filter);
    return keys;
}
