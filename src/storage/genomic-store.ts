import { StorageBackend } from '../config/index.js';
import {
    Classification,
    ClinicalStage,
    GeneRecord,
    GenomicRecord,
    MutationRecord,
    MutationType,
    normalizeGeneId,
    Patient,
    RecordKind,
    Sex,
} from '../model/records.js';
import { TransactionAborted } from '../model/errors.js';
import { DatasetDocument } from './dataset-document.js';

export type StoreOperation =
    | { op: 'put'; record: GenomicRecord }
    | { op: 'delete'; kind: RecordKind; id: string };

export type TransactionResult =
    | { status: 'committed'; applied: number }
    | { status: 'rolled-back'; error: TransactionAborted };

export interface PatientQuery {
    kind: 'patient';
    ids?: string[];
    sexes?: Sex[];
    stages?: ClinicalStage[];
    minAge?: number;
    maxAge?: number;
    /** Case-insensitive exact match. */
    diagnosis?: string;
}

export interface GeneRecordQuery {
    kind: 'geneRecord';
    ids?: string[];
    patientIds?: string[];
    geneIds?: string[];
    minExpression?: number;
    maxExpression?: number;
}

export interface MutationRecordQuery {
    kind: 'mutationRecord';
    ids?: string[];
    geneRecordIds?: string[];
    patientIds?: string[];
    geneIds?: string[];
    classifications?: Classification[];
    mutationTypes?: MutationType[];
}

export type RecordQuery = PatientQuery | GeneRecordQuery | MutationRecordQuery;

export interface StoreStats {
    patients: number;
    geneRecords: number;
    mutationRecords: number;
}

/**
 * Backend-agnostic persistence for genomic records.
 *
 * Every mutation of durable state goes through `transaction`; `put` and
 * `delete` are one-operation transactions that rethrow the failing cause.
 */
export interface GenomicStore {
    readonly backend: StorageBackend;

    put(record: GenomicRecord): void;

    get(kind: 'patient', id: string): Patient;
    get(kind: 'geneRecord', id: string): GeneRecord;
    get(kind: 'mutationRecord', id: string): MutationRecord;
    get(kind: RecordKind, id: string): GenomicRecord;

    find(kind: 'patient', id: string): Patient | undefined;
    find(kind: 'geneRecord', id: string): GeneRecord | undefined;
    find(kind: 'mutationRecord', id: string): MutationRecord | undefined;
    find(kind: RecordKind, id: string): GenomicRecord | undefined;

    delete(kind: RecordKind, id: string): void;

    query(query: PatientQuery): Patient[];
    query(query: GeneRecordQuery): GeneRecord[];
    query(query: MutationRecordQuery): MutationRecord[];
    query(query: RecordQuery): GenomicRecord[];

    transaction(operations: StoreOperation[]): TransactionResult;

    exportDataset(): DatasetDocument;
    stats(): StoreStats;
    close(): void;
}

function within(values: readonly string[] | undefined, value: string): boolean {
    return values === undefined || values.includes(value);
}

function inRange(value: number | undefined, min: number | undefined, max: number | undefined): boolean {
    if (min === undefined && max === undefined) {
        return true;
    }
    if (value === undefined) {
        return false;
    }
    return (min === undefined || value >= min) && (max === undefined || value <= max);
}

export function matchesPatientQuery(patient: Patient, query: PatientQuery): boolean {
    if (!within(query.ids, patient.id)) return false;
    if (query.sexes !== undefined && (patient.sex === undefined || !query.sexes.includes(patient.sex))) return false;
    if (query.stages !== undefined && (patient.stage === undefined || !query.stages.includes(patient.stage))) return false;
    if (!inRange(patient.age, query.minAge, query.maxAge)) return false;
    if (query.diagnosis !== undefined) {
        if (patient.diagnosis === undefined || patient.diagnosis.toLowerCase() !== query.diagnosis.toLowerCase()) {
            return false;
        }
    }
    return true;
}

export function matchesGeneRecordQuery(record: GeneRecord, query: GeneRecordQuery): boolean {
    return within(query.ids, record.id)
        && within(query.patientIds, record.patientId)
        && within(query.geneIds?.map(normalizeGeneId), record.geneId)
        && inRange(record.expression, query.minExpression, query.maxExpression);
}

export function matchesMutationRecordQuery(record: MutationRecord, query: MutationRecordQuery): boolean {
    return within(query.ids, record.id)
        && within(query.geneRecordIds, record.geneRecordId)
        && within(query.patientIds, record.patientId)
        && within(query.geneIds?.map(normalizeGeneId), record.geneId)
        && within(query.classifications, record.classification)
        && within(query.mutationTypes, record.mutationType);
}
