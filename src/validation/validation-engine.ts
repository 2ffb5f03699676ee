/**
 * Validation Engine: turns untyped rows into typed records.
 *
 * Pure with respect to storage. Duplicate detection only reads through the
 * `DuplicateLookup` it is given and never writes.
 */

import {
    createGeneRecord,
    createPatient,
    GeneRecord,
    Patient,
} from '../model/records.js';
import { DuplicateError, FieldIssue, ValidationError } from '../model/errors.js';
import {
    coerceNumber,
    coerceSex,
    coerceStage,
    coerceText,
    pickFields,
    RawRow,
} from './field-coercion.js';

export interface DuplicateLookup {
    hasGeneRecord(geneRecordId: string): boolean;
}

export interface ValidationContext {
    lookup?: DuplicateLookup;
    /** Accept rows whose (patient, gene) pair already exists; they supersede the stored record. */
    replace?: boolean;
    rowNumber?: number;
}

export interface ValidatedRow {
    ok: true;
    rowNumber: number;
    patient: Patient;
    geneRecord?: GeneRecord;
    /** The row's gene record supersedes one that already exists. */
    replaces: boolean;
}

export interface ValidationFailure {
    ok: false;
    rowNumber: number;
    row: RawRow;
    error: ValidationError | DuplicateError;
}

export type RowOutcome = ValidatedRow | ValidationFailure;

export interface BatchOptions {
    lookup?: DuplicateLookup;
    replace?: boolean;
    stopOnFirstError?: boolean;
    firstRowNumber?: number;
}

interface TypedRow {
    patient: Patient;
    geneRecord?: GeneRecord;
}

function buildRecords(row: RawRow): TypedRow {
    const issues: FieldIssue[] = [];
    const fields = pickFields(row);

    const patientId = coerceText('patientId', fields.patientId, issues);
    const name = coerceText('name', fields.name, issues);
    const diagnosis = coerceText('diagnosis', fields.diagnosis, issues);
    const age = coerceNumber('age', fields.age, issues);
    const sex = coerceSex('sex', fields.sex, issues);
    const stage = coerceStage('stage', fields.stage, issues);
    const geneId = coerceText('geneId', fields.geneId, issues);
    const expression = coerceNumber('expression', fields.expression, issues);
    const sequence = coerceText('sequence', fields.sequence, issues);

    if (patientId === undefined && !issues.some(issue => issue.field === 'patientId')) {
        issues.push({ field: 'patientId', message: 'is required' });
    }
    if (geneId !== undefined && expression === undefined && !issues.some(issue => issue.field === 'expression')) {
        issues.push({ field: 'expression', message: 'is required when a gene is given' });
    }
    if (geneId === undefined && !issues.some(issue => issue.field === 'geneId')) {
        if (expression !== undefined) {
            issues.push({ field: 'geneId', message: 'is required when an expression value is given' });
        }
        if (sequence !== undefined) {
            issues.push({ field: 'geneId', message: 'is required when a sequence is given' });
        }
    }

    if (issues.length > 0 || patientId === undefined) {
        throw new ValidationError(issues);
    }

    let patient: Patient | undefined;
    let geneRecord: GeneRecord | undefined;
    try {
        patient = createPatient({ id: patientId, name, age, sex, stage, diagnosis });
    } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        issues.push(...error.issues);
    }
    if (geneId !== undefined && expression !== undefined) {
        try {
            geneRecord = createGeneRecord({ patientId, geneId, expression, sequence });
        } catch (error) {
            if (!(error instanceof ValidationError)) throw error;
            issues.push(...error.issues.filter(issue => issue.field !== 'patientId'));
        }
    }

    if (issues.length > 0 || !patient) {
        throw new ValidationError(issues);
    }
    return geneRecord ? { patient, geneRecord } : { patient };
}

/**
 * Validates one raw row. Every problem with the row is reported at once;
 * a duplicate (patient, gene) pair is a `DuplicateError` unless `replace` is set.
 */
export function validate(row: RawRow, context: ValidationContext = {}): RowOutcome {
    const rowNumber = context.rowNumber ?? 1;

    let typed: TypedRow;
    try {
        typed = buildRecords(row);
    } catch (error) {
        if (error instanceof ValidationError) {
            return { ok: false, rowNumber, row, error };
        }
        throw error;
    }

    let replaces = false;
    if (typed.geneRecord && context.lookup?.hasGeneRecord(typed.geneRecord.id)) {
        if (!context.replace) {
            return { ok: false, rowNumber, row, error: new DuplicateError('GeneRecord', typed.geneRecord.id) };
        }
        replaces = true;
    }

    return { ok: true, rowNumber, patient: typed.patient, geneRecord: typed.geneRecord, replaces };
}

/**
 * Lazily validates a sequence of rows. A bad row never aborts the batch
 * unless `stopOnFirstError` is set, in which case the sequence ends right
 * after the first failure. Pairs repeated within the batch count as duplicates.
 */
export function* validateBatch(rows: Iterable<RawRow>, options: BatchOptions = {}): Generator<RowOutcome, void, undefined> {
    const seen = new Set<string>();
    const lookup: DuplicateLookup = {
        hasGeneRecord: (geneRecordId) => seen.has(geneRecordId) || (options.lookup?.hasGeneRecord(geneRecordId) ?? false),
    };

    let rowNumber = options.firstRowNumber ?? 1;
    for (const row of rows) {
        const outcome = validate(row, { lookup, replace: options.replace, rowNumber });
        rowNumber++;

        if (outcome.ok && outcome.geneRecord) {
            seen.add(outcome.geneRecord.id);
        }
        yield outcome;

        if (!outcome.ok && options.stopOnFirstError) {
            return;
        }
    }
}

export function collectFailures(outcomes: Iterable<RowOutcome>): ValidationFailure[] {
    const failures: ValidationFailure[] = [];
    for (const outcome of outcomes) {
        if (!outcome.ok) {
            failures.push(outcome);
        }
    }
    return failures;
}

