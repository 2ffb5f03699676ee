/**
 * The persisted dataset layout shared by both backends: three collections,
 * each sorted by id, plus a schema version for forward migration.
 */

import { z } from 'zod';
import { compareIds } from '../model/canonical.js';
import {
    CLASSIFICATIONS,
    CLINICAL_STAGES,
    createGeneRecord,
    createMutationRecord,
    createPatient,
    EVIDENCE_KINDS,
    GeneRecord,
    MUTATION_TYPES,
    MutationRecord,
    Patient,
    SEXES,
} from '../model/records.js';
import { ValidationError } from '../model/errors.js';

export const CURRENT_SCHEMA_VERSION = 1;

const PatientDocumentSchema = z.object({
    id: z.string(),
    name: z.string().optional(),
    age: z.number().optional(),
    sex: z.enum(SEXES).optional(),
    stage: z.enum(CLINICAL_STAGES).optional(),
    diagnosis: z.string().optional(),
});

const GeneRecordDocumentSchema = z.object({
    id: z.string(),
    patientId: z.string(),
    geneId: z.string(),
    expression: z.number(),
    sequence: z.string().optional(),
});

const MutationRecordDocumentSchema = z.object({
    id: z.string(),
    geneRecordId: z.string(),
    patientId: z.string(),
    geneId: z.string(),
    mutationType: z.enum(MUTATION_TYPES),
    classification: z.enum(CLASSIFICATIONS),
    evidence: z.enum(EVIDENCE_KINDS),
    position: z.number().int().optional(),
    variants: z.array(z.string()).optional(),
    ruleVersion: z.string(),
    catalogVersion: z.string(),
    createdAt: z.string(),
});

export const DatasetDocumentSchema = z.object({
    schemaVersion: z.number().int(),
    patients: z.array(PatientDocumentSchema),
    geneRecords: z.array(GeneRecordDocumentSchema),
    mutationRecords: z.array(MutationRecordDocumentSchema),
});

export type PatientDocument = z.infer<typeof PatientDocumentSchema>;
export type GeneRecordDocument = z.infer<typeof GeneRecordDocumentSchema>;
export type MutationRecordDocument = z.infer<typeof MutationRecordDocumentSchema>;
export type DatasetDocument = z.infer<typeof DatasetDocumentSchema>;

export interface DatasetRecords {
    patients: Patient[];
    geneRecords: GeneRecord[];
    mutationRecords: MutationRecord[];
}

function byId<T extends { id: string }>(a: T, b: T): number {
    return compareIds(a.id, b.id);
}

export function patientDocument(patient: Patient): PatientDocument {
    const { kind: _kind, geneRecordIds: _geneRecordIds, ...fields } = patient;
    return fields;
}

export function geneRecordDocument(record: GeneRecord): GeneRecordDocument {
    const { kind: _kind, ...fields } = record;
    return fields;
}

export function mutationRecordDocument(record: MutationRecord): MutationRecordDocument {
    const { kind: _kind, ...fields } = record;
    return fields;
}

export function toDocument(records: DatasetRecords): DatasetDocument {
    return {
        schemaVersion: CURRENT_SCHEMA_VERSION,
        patients: [...records.patients].sort(byId).map(patientDocument),
        geneRecords: [...records.geneRecords].sort(byId).map(geneRecordDocument),
        mutationRecords: [...records.mutationRecords].sort(byId).map(mutationRecordDocument),
    };
}

/**
 * Parses and checks a stored document. Every record is rebuilt through its
 * constructor, and stored ids must match the ids the constructors derive.
 */
export function parseDocument(raw: unknown): DatasetRecords {
    const parsed = DatasetDocumentSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ValidationError(
            parsed.error.errors.map(issue => ({ field: `document.${issue.path.join('.')}`, message: issue.message })),
            { kind: 'document' }
        );
    }

    const document = parsed.data;
    if (document.schemaVersion > CURRENT_SCHEMA_VERSION) {
        throw ValidationError.single(
            'document.schemaVersion',
            `version ${document.schemaVersion} is newer than the supported version ${CURRENT_SCHEMA_VERSION}`
        );
    }

    const patients = document.patients.map(patient => createPatient(patient));
    const geneRecords = document.geneRecords.map(stored => {
        const record = createGeneRecord(stored);
        if (record.id !== stored.id) {
            throw ValidationError.single('document.geneRecords.id', `stored id '${stored.id}' does not match '${record.id}'`);
        }
        return record;
    });
    const mutationRecords = document.mutationRecords.map(stored => {
        const record = createMutationRecord(stored);
        if (record.id !== stored.id) {
            throw ValidationError.single('document.mutationRecords.id', `stored id '${stored.id}' does not match its content`);
        }
        return record;
    });

    return { patients, geneRecords, mutationRecords };
}
