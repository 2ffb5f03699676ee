import chalk from 'chalk';
import { StorageBackend } from '../config/index.js';
import { compareIds } from '../model/canonical.js';
import {
    ConstraintViolation,
    describeError,
    NotFoundError,
    StorageUnavailable,
    TransactionAborted,
    ValidationError,
} from '../model/errors.js';
import {
    GeneRecord,
    GenomicRecord,
    MutationRecord,
    Patient,
    RECORD_LABELS,
    RecordKind,
    reconstruct,
} from '../model/records.js';
import { DatasetDocument, toDocument } from './dataset-document.js';
import {
    GeneRecordQuery,
    GenomicStore,
    matchesGeneRecordQuery,
    matchesMutationRecordQuery,
    matchesPatientQuery,
    MutationRecordQuery,
    PatientQuery,
    RecordQuery,
    StoreOperation,
    StoreStats,
    TransactionResult,
} from './genomic-store.js';

/**
 * Write primitives a backend exposes inside one of its transactions.
 * Reads through a writer see the transaction's own uncommitted writes.
 */
export interface StoreWriter {
    readPatient(id: string): Patient | undefined;
    readGeneRecord(id: string): GeneRecord | undefined;
    readMutation(id: string): MutationRecord | undefined;
    mutationForGeneRecord(geneRecordId: string): MutationRecord | undefined;

    /** Upserts the patient row only; owned gene records are untouched. */
    writePatient(patient: Patient): void;
    writeGeneRecord(record: GeneRecord): void;
    writeMutation(record: MutationRecord): void;

    /** Removes the patient with its gene records and their mutations. */
    removePatient(id: string): void;
    /** Removes the gene record with its mutation. */
    removeGeneRecord(id: string): void;
    removeMutation(id: string): void;
}

function byId<T extends { id: string }>(a: T, b: T): number {
    return compareIds(a.id, b.id);
}

/** A repeated id matches its record once, as SQL `IN (...)` does. */
function withUniqueIds<Q extends RecordQuery>(query: Q): Q {
    return query.ids ? { ...query, ids: [...new Set(query.ids)] } : query;
}

/**
 * Shared behaviour of every backend: referential checks, operation dispatch
 * and the committed/rolled-back contract of `transaction`. Subclasses supply
 * committed-state reads and an all-or-nothing `atomically`.
 */
export abstract class BaseGenomicStore implements GenomicStore {
    abstract readonly backend: StorageBackend;

    protected abstract loadPatients(query: PatientQuery): Patient[];
    protected abstract loadGeneRecords(query: GeneRecordQuery): GeneRecord[];
    protected abstract loadMutations(query: MutationRecordQuery): MutationRecord[];

    /** Runs `work` so that either all of its writes become durable or none do. */
    protected abstract atomically<T>(work: (writer: StoreWriter) => T): T;

    abstract close(): void;

    put(record: GenomicRecord): void {
        this.runSingle({ op: 'put', record });
    }

    get(kind: 'patient', id: string): Patient;
    get(kind: 'geneRecord', id: string): GeneRecord;
    get(kind: 'mutationRecord', id: string): MutationRecord;
    get(kind: RecordKind, id: string): GenomicRecord;
    get(kind: RecordKind, id: string): GenomicRecord {
        const record = this.find(kind, id);
        if (!record) {
            throw new NotFoundError(RECORD_LABELS[kind], id);
        }
        return record;
    }

    find(kind: 'patient', id: string): Patient | undefined;
    find(kind: 'geneRecord', id: string): GeneRecord | undefined;
    find(kind: 'mutationRecord', id: string): MutationRecord | undefined;
    find(kind: RecordKind, id: string): GenomicRecord | undefined;
    find(kind: RecordKind, id: string): GenomicRecord | undefined {
        switch (kind) {
            case 'patient':
                return this.query({ kind, ids: [id] })[0];
            case 'geneRecord':
                return this.query({ kind, ids: [id] })[0];
            case 'mutationRecord':
                return this.query({ kind, ids: [id] })[0];
        }
    }

    delete(kind: RecordKind, id: string): void {
        this.runSingle({ op: 'delete', kind, id });
    }

    query(query: PatientQuery): Patient[];
    query(query: GeneRecordQuery): GeneRecord[];
    query(query: MutationRecordQuery): MutationRecord[];
    query(query: RecordQuery): GenomicRecord[];
    query(query: RecordQuery): GenomicRecord[] {
        query = withUniqueIds(query);
        switch (query.kind) {
            case 'patient':
                return this.loadPatients(query).filter(patient => matchesPatientQuery(patient, query)).sort(byId);
            case 'geneRecord':
                return this.loadGeneRecords(query).filter(record => matchesGeneRecordQuery(record, query)).sort(byId);
            case 'mutationRecord':
                return this.loadMutations(query).filter(record => matchesMutationRecordQuery(record, query)).sort(byId);
        }
    }

    /**
     * Applies every operation or none of them. Operation failures come back
     * as a rolled-back result; an unreachable backend is thrown.
     */
    transaction(operations: StoreOperation[]): TransactionResult {
        let index = 0;
        try {
            this.atomically(writer => {
                for (index = 0; index < operations.length; index++) {
                    this.apply(writer, operations[index]);
                }
            });
        } catch (error) {
            if (error instanceof StorageUnavailable) {
                throw error;
            }
            console.warn(chalk.yellow(`↩️  ${this.backend} transaction rolled back at operation ${index}: ${describeError(error)}`));
            return { status: 'rolled-back', error: new TransactionAborted(index, error) };
        }
        return { status: 'committed', applied: operations.length };
    }

    exportDataset(): DatasetDocument {
        return toDocument({
            patients: this.query({ kind: 'patient' }),
            geneRecords: this.query({ kind: 'geneRecord' }),
            mutationRecords: this.query({ kind: 'mutationRecord' }),
        });
    }

    stats(): StoreStats {
        return {
            patients: this.loadPatients({ kind: 'patient' }).length,
            geneRecords: this.loadGeneRecords({ kind: 'geneRecord' }).length,
            mutationRecords: this.loadMutations({ kind: 'mutationRecord' }).length,
        };
    }

    private runSingle(operation: StoreOperation): void {
        const result = this.transaction([operation]);
        if (result.status === 'rolled-back') {
            throw result.error.cause;
        }
    }

    private apply(writer: StoreWriter, operation: StoreOperation): void {
        if (operation.op === 'delete') {
            this.applyDelete(writer, operation.kind, operation.id);
            return;
        }

        const record = reconstruct(operation.record);
        if (record.id !== operation.record.id) {
            throw ValidationError.single('id', `does not match the record's content (expected '${record.id}')`, operation.record.id);
        }

        switch (record.kind) {
            case 'patient':
                writer.writePatient(record);
                return;
            case 'geneRecord':
                if (!writer.readPatient(record.patientId)) {
                    throw new ConstraintViolation(
                        `GeneRecord '${record.id}' references missing Patient '${record.patientId}'`,
                        { geneRecordId: record.id, patientId: record.patientId }
                    );
                }
                writer.writeGeneRecord(record);
                return;
            case 'mutationRecord': {
                if (!writer.readGeneRecord(record.geneRecordId)) {
                    throw new ConstraintViolation(
                        `MutationRecord '${record.id}' references missing GeneRecord '${record.geneRecordId}'`,
                        { mutationRecordId: record.id, geneRecordId: record.geneRecordId }
                    );
                }
                const current = writer.mutationForGeneRecord(record.geneRecordId);
                if (current && current.id !== record.id) {
                    throw new ConstraintViolation(
                        `GeneRecord '${record.geneRecordId}' already has MutationRecord '${current.id}'; delete it before adding another`,
                        { geneRecordId: record.geneRecordId, existing: current.id }
                    );
                }
                writer.writeMutation(record);
                return;
            }
        }
    }

    private applyDelete(writer: StoreWriter, kind: RecordKind, id: string): void {
        switch (kind) {
            case 'patient':
                if (!writer.readPatient(id)) throw new NotFoundError(RECORD_LABELS[kind], id);
                writer.removePatient(id);
                return;
            case 'geneRecord':
                if (!writer.readGeneRecord(id)) throw new NotFoundError(RECORD_LABELS[kind], id);
                writer.removeGeneRecord(id);
                return;
            case 'mutationRecord':
                if (!writer.readMutation(id)) throw new NotFoundError(RECORD_LABELS[kind], id);
                writer.removeMutation(id);
                return;
        }
    }
}
