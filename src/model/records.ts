/**
 * Genomic record model: patients, the gene records they own, and the mutation
 * records derived from each gene record by the classifier.
 */

import { canonicalJson, compareIds, stableHash } from './canonical.js';
import { FieldIssue, ValidationError } from './errors.js';

export const SEXES = ['female', 'male', 'other', 'unknown'] as const;
export const CLINICAL_STAGES = ['0', 'I', 'II', 'III', 'IV'] as const;
export const MUTATION_TYPES = ['substitution', 'insertion', 'deletion', 'none'] as const;
export const CLASSIFICATIONS = ['benign', 'likely-pathogenic', 'pathogenic', 'unknown'] as const;
export const EVIDENCE_KINDS = ['sequence', 'expression', 'catalog-miss', 'insufficient'] as const;
export const RECORD_KINDS = ['patient', 'geneRecord', 'mutationRecord'] as const;

export type Sex = typeof SEXES[number];
export type ClinicalStage = typeof CLINICAL_STAGES[number];
export type MutationType = typeof MUTATION_TYPES[number];
export type Classification = typeof CLASSIFICATIONS[number];
export type Evidence = typeof EVIDENCE_KINDS[number];
export type RecordKind = typeof RECORD_KINDS[number];

export const MAX_AGE = 150;
export const KEY_SEPARATOR = '/';

export interface Patient {
    kind: 'patient';
    id: string;
    name?: string;
    age?: number;
    sex?: Sex;
    stage?: ClinicalStage;
    diagnosis?: string;
    /** Owned gene record ids. Filled in by the store on read, ignored on write. */
    geneRecordIds: string[];
}

export interface PatientInput {
    id: string;
    name?: string;
    age?: number;
    sex?: Sex;
    stage?: ClinicalStage;
    diagnosis?: string;
    geneRecordIds?: string[];
}

export interface GeneRecord {
    kind: 'geneRecord';
    id: string;
    patientId: string;
    geneId: string;
    expression: number;
    sequence?: string;
}

export interface GeneRecordInput {
    patientId: string;
    geneId: string;
    expression: number;
    sequence?: string;
}

export interface MutationRecord {
    kind: 'mutationRecord';
    id: string;
    geneRecordId: string;
    patientId: string;
    geneId: string;
    mutationType: MutationType;
    classification: Classification;
    evidence: Evidence;
    /** 1-based position of the first base that differs from the reference. */
    position?: number;
    variants?: string[];
    ruleVersion: string;
    catalogVersion: string;
    createdAt: string;
}

export interface MutationRecordInput {
    patientId: string;
    geneId: string;
    mutationType: MutationType;
    classification: Classification;
    evidence: Evidence;
    position?: number;
    variants?: string[];
    ruleVersion: string;
    catalogVersion: string;
    createdAt?: string;
}

export type GenomicRecord = Patient | GeneRecord | MutationRecord;
export type RecordOfKind<K extends RecordKind> = Extract<GenomicRecord, { kind: K }>;

export const RECORD_LABELS: Record<RecordKind, string> = {
    patient: 'Patient',
    geneRecord: 'GeneRecord',
    mutationRecord: 'MutationRecord',
};

function includes<T extends string>(values: readonly T[], value: unknown): value is T {
    return typeof value === 'string' && values.some(candidate => candidate === value);
}

export function isSex(value: unknown): value is Sex {
    return includes(SEXES, value);
}

export function isClinicalStage(value: unknown): value is ClinicalStage {
    return includes(CLINICAL_STAGES, value);
}

export function isMutationType(value: unknown): value is MutationType {
    return includes(MUTATION_TYPES, value);
}

export function isClassification(value: unknown): value is Classification {
    return includes(CLASSIFICATIONS, value);
}

export function isEvidence(value: unknown): value is Evidence {
    return includes(EVIDENCE_KINDS, value);
}

export function isRecordKind(value: unknown): value is RecordKind {
    return includes(RECORD_KINDS, value);
}

export function checkIdentifier(field: string, value: unknown, issues: FieldIssue[]): void {
    if (typeof value !== 'string' || value.length === 0) {
        issues.push({ field, message: 'must be a non-empty string', value });
    } else if (/\s/.test(value)) {
        issues.push({ field, message: 'must not contain whitespace', value });
    } else if (value.includes(KEY_SEPARATOR)) {
        issues.push({ field, message: `must not contain '${KEY_SEPARATOR}'`, value });
    }
}

export function normalizeGeneId(geneId: string): string {
    return geneId.trim().toUpperCase();
}

export function patientKey(patientId: string): string {
    return patientId;
}

export function geneRecordKey(patientId: string, geneId: string): string {
    return `${patientId}${KEY_SEPARATOR}${normalizeGeneId(geneId)}`;
}

export function createPatient(input: PatientInput): Patient {
    const issues: FieldIssue[] = [];
    checkIdentifier('patientId', input.id, issues);

    if (input.age !== undefined && (!Number.isInteger(input.age) || input.age < 0 || input.age > MAX_AGE)) {
        issues.push({ field: 'age', message: `must be a whole number between 0 and ${MAX_AGE}`, value: input.age });
    }
    if (input.sex !== undefined && !isSex(input.sex)) {
        issues.push({ field: 'sex', message: `must be one of ${SEXES.join(', ')}`, value: input.sex });
    }
    if (input.stage !== undefined && !isClinicalStage(input.stage)) {
        issues.push({ field: 'stage', message: `must be one of ${CLINICAL_STAGES.join(', ')}`, value: input.stage });
    }
    if (input.name !== undefined && typeof input.name !== 'string') {
        issues.push({ field: 'name', message: 'must be a string', value: input.name });
    }
    if (input.diagnosis !== undefined && typeof input.diagnosis !== 'string') {
        issues.push({ field: 'diagnosis', message: 'must be a string', value: input.diagnosis });
    }
    if (issues.length > 0) {
        throw new ValidationError(issues, { kind: 'patient' });
    }

    const patient: Patient = {
        kind: 'patient',
        id: input.id,
        geneRecordIds: [...new Set(input.geneRecordIds ?? [])].sort(compareIds),
    };
    if (input.name !== undefined) patient.name = input.name;
    if (input.age !== undefined) patient.age = input.age;
    if (input.sex !== undefined) patient.sex = input.sex;
    if (input.stage !== undefined) patient.stage = input.stage;
    if (input.diagnosis !== undefined) patient.diagnosis = input.diagnosis;
    return patient;
}

export function createGeneRecord(input: GeneRecordInput): GeneRecord {
    const issues: FieldIssue[] = [];
    checkIdentifier('patientId', input.patientId, issues);
    const geneId = typeof input.geneId === 'string' ? normalizeGeneId(input.geneId) : input.geneId;
    checkIdentifier('geneId', geneId, issues);

    if (typeof input.expression !== 'number' || !Number.isFinite(input.expression)) {
        issues.push({ field: 'expression', message: 'must be a finite number', value: input.expression });
    }

    let sequence: string | undefined;
    if (input.sequence !== undefined) {
        if (typeof input.sequence !== 'string') {
            issues.push({ field: 'sequence', message: 'must be a string', value: input.sequence });
        } else {
            sequence = input.sequence.trim().toUpperCase();
            if (!/^[ACGT]+$/.test(sequence)) {
                issues.push({ field: 'sequence', message: 'must contain only A, C, G and T', value: input.sequence });
            }
        }
    }
    if (issues.length > 0) {
        throw new ValidationError(issues, { kind: 'geneRecord' });
    }

    const record: GeneRecord = {
        kind: 'geneRecord',
        id: geneRecordKey(input.patientId, geneId),
        patientId: input.patientId,
        geneId,
        expression: input.expression,
    };
    if (sequence !== undefined) record.sequence = sequence;
    return record;
}

/** The fields that identify a mutation record's content; `createdAt` is not one of them. */
export function mutationContent(record: Omit<MutationRecord, 'kind' | 'id' | 'createdAt'>): Record<string, unknown> {
    return {
        geneRecordId: record.geneRecordId,
        mutationType: record.mutationType,
        classification: record.classification,
        evidence: record.evidence,
        position: record.position,
        variants: record.variants,
        ruleVersion: record.ruleVersion,
        catalogVersion: record.catalogVersion,
    };
}

export function createMutationRecord(input: MutationRecordInput): MutationRecord {
    const issues: FieldIssue[] = [];
    checkIdentifier('patientId', input.patientId, issues);
    const geneId = typeof input.geneId === 'string' ? normalizeGeneId(input.geneId) : input.geneId;
    checkIdentifier('geneId', geneId, issues);

    if (!isMutationType(input.mutationType)) {
        issues.push({ field: 'mutationType', message: `must be one of ${MUTATION_TYPES.join(', ')}`, value: input.mutationType });
    }
    if (!isClassification(input.classification)) {
        issues.push({ field: 'classification', message: `must be one of ${CLASSIFICATIONS.join(', ')}`, value: input.classification });
    }
    if (!isEvidence(input.evidence)) {
        issues.push({ field: 'evidence', message: `must be one of ${EVIDENCE_KINDS.join(', ')}`, value: input.evidence });
    }
    if (input.position !== undefined && (!Number.isInteger(input.position) || input.position < 1)) {
        issues.push({ field: 'position', message: 'must be a positive integer', value: input.position });
    }
    if (input.variants !== undefined && (!Array.isArray(input.variants) || input.variants.some(v => typeof v !== 'string' || v.length === 0))) {
        issues.push({ field: 'variants', message: 'must be a list of non-empty strings', value: input.variants });
    }
    if (typeof input.ruleVersion !== 'string' || input.ruleVersion.length === 0) {
        issues.push({ field: 'ruleVersion', message: 'must be a non-empty string', value: input.ruleVersion });
    }
    if (typeof input.catalogVersion !== 'string' || input.catalogVersion.length === 0) {
        issues.push({ field: 'catalogVersion', message: 'must be a non-empty string', value: input.catalogVersion });
    }
    if (input.createdAt !== undefined && Number.isNaN(Date.parse(input.createdAt))) {
        issues.push({ field: 'createdAt', message: 'must be an ISO timestamp', value: input.createdAt });
    }
    if (issues.length > 0) {
        throw new ValidationError(issues, { kind: 'mutationRecord' });
    }

    const body: Omit<MutationRecord, 'kind' | 'id' | 'createdAt'> = {
        geneRecordId: geneRecordKey(input.patientId, geneId),
        patientId: input.patientId,
        geneId,
        mutationType: input.mutationType,
        classification: input.classification,
        evidence: input.evidence,
        ruleVersion: input.ruleVersion,
        catalogVersion: input.catalogVersion,
    };
    if (input.position !== undefined) body.position = input.position;
    if (input.variants !== undefined) body.variants = [...input.variants];

    return {
        kind: 'mutationRecord',
        id: `mut-${stableHash(mutationContent(body)).slice(0, 24)}`,
        ...body,
        createdAt: input.createdAt ?? new Date().toISOString(),
    };
}

/** Rebuilds a record through its constructor, re-checking every invariant. */
export function reconstruct<K extends RecordKind>(record: RecordOfKind<K>): RecordOfKind<K>;
export function reconstruct(record: GenomicRecord): GenomicRecord {
    switch (record.kind) {
        case 'patient':
            return createPatient(record);
        case 'geneRecord':
            return createGeneRecord(record);
        case 'mutationRecord':
            return createMutationRecord(record);
    }
}

function equalityView(record: GenomicRecord): unknown {
    if (record.kind === 'mutationRecord') {
        const { createdAt: _createdAt, ...rest } = record;
        return rest;
    }
    return record;
}

/** Structural equality; a mutation record's creation timestamp is ignored. */
export function recordsEqual(a: GenomicRecord, b: GenomicRecord): boolean {
    return canonicalJson(equalityView(a)) === canonicalJson(equalityView(b));
}
