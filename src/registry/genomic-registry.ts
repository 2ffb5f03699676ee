import chalk from 'chalk';
import { ReferenceCatalog } from '../catalog/reference-catalog.js';
import { MutationClassifier } from '../classifier/mutation-classifier.js';
import { DuplicateError, NotFoundError } from '../model/errors.js';
import {
    createGeneRecord,
    createPatient,
    GeneRecord,
    GeneRecordInput,
    MutationRecord,
    Patient,
    PatientInput,
} from '../model/records.js';
import { GenomicStore, StoreOperation } from '../storage/genomic-store.js';
import { DuplicateLookup, ValidatedRow } from '../validation/validation-engine.js';

export interface RegistryOptions {
    store: GenomicStore;
    catalog: ReferenceCatalog;
    classifier?: MutationClassifier;
}

export interface WriteOptions {
    /** Supersede an existing record instead of failing with `DuplicateError`. */
    replace?: boolean;
}

export type PatientChanges = Partial<Omit<PatientInput, 'id' | 'geneRecordIds'>>;

export interface ClassifiedGeneRecord {
    geneRecord: GeneRecord;
    mutation: MutationRecord;
}

export interface IngestResult {
    patient: Patient;
    geneRecord?: GeneRecord;
    mutation?: MutationRecord;
}

export interface ReclassifyReport {
    catalogVersion: string;
    ruleVersion: string;
    examined: number;
    /** Gene record ids whose mutation was re-derived. */
    updated: string[];
}

function patientFields(patient: Patient): PatientInput {
    const { kind: _kind, geneRecordIds: _geneRecordIds, ...fields } = patient;
    return fields;
}

/**
 * Single-record operations over a store: every write that touches a gene
 * record also derives its mutation, and both land in one transaction.
 */
export class GenomicRegistry implements DuplicateLookup {
    readonly store: GenomicStore;
    readonly classifier: MutationClassifier;
    private activeCatalog: ReferenceCatalog;

    constructor(options: RegistryOptions) {
        this.store = options.store;
        this.activeCatalog = options.catalog;
        this.classifier = options.classifier ?? new MutationClassifier();
    }

    get catalog(): ReferenceCatalog {
        return this.activeCatalog;
    }

    hasGeneRecord(geneRecordId: string): boolean {
        return this.store.find('geneRecord', geneRecordId) !== undefined;
    }

    addPatient(input: PatientInput, options: WriteOptions = {}): Patient {
        const patient = createPatient(input);
        if (!options.replace && this.store.find('patient', patient.id)) {
            throw new DuplicateError('Patient', patient.id);
        }
        this.commit([{ op: 'put', record: patient }]);
        return this.store.get('patient', patient.id);
    }

    /** Applies `changes` over the stored patient; a key set to `undefined` clears that field. */
    updatePatient(id: string, changes: PatientChanges): Patient {
        const existing = this.store.get('patient', id);
        const updated = createPatient({ ...patientFields(existing), ...changes, id });
        this.commit([{ op: 'put', record: updated }]);
        return this.store.get('patient', id);
    }

    getPatient(id: string): Patient {
        return this.store.get('patient', id);
    }

    deletePatient(id: string): void {
        this.store.delete('patient', id);
    }

    getGeneRecord(id: string): GeneRecord {
        return this.store.get('geneRecord', id);
    }

    getMutation(geneRecordId: string): MutationRecord | undefined {
        return this.store.query({ kind: 'mutationRecord', geneRecordIds: [geneRecordId] })[0];
    }

    addGeneRecord(input: GeneRecordInput, options: WriteOptions = {}): ClassifiedGeneRecord {
        const geneRecord = createGeneRecord(input);
        if (!this.store.find('patient', geneRecord.patientId)) {
            throw new NotFoundError('Patient', geneRecord.patientId);
        }
        if (!options.replace && this.store.find('geneRecord', geneRecord.id)) {
            throw new DuplicateError('GeneRecord', geneRecord.id);
        }

        const { mutation, operations } = this.classification(geneRecord);
        this.commit([{ op: 'put', record: geneRecord }, ...operations]);
        return { geneRecord, mutation };
    }

    /**
     * Writes one validated import row: the patient (merged over any stored
     * demographics), plus its gene record and mutation when the row has one.
     */
    ingestRow(row: ValidatedRow): IngestResult {
        const stored = this.store.find('patient', row.patient.id);
        const patient = stored
            ? createPatient({ ...patientFields(stored), ...patientFields(row.patient) })
            : row.patient;
        const operations: StoreOperation[] = [{ op: 'put', record: patient }];

        if (!row.geneRecord) {
            this.commit(operations);
            return { patient: this.store.get('patient', patient.id) };
        }

        const geneRecord = row.geneRecord;
        if (!row.replaces && this.store.find('geneRecord', geneRecord.id)) {
            throw new DuplicateError('GeneRecord', geneRecord.id);
        }
        const classified = this.classification(geneRecord);
        this.commit([...operations, { op: 'put', record: geneRecord }, ...classified.operations]);
        return { patient: this.store.get('patient', patient.id), geneRecord, mutation: classified.mutation };
    }

    reclassify(geneRecordId: string): MutationRecord {
        const geneRecord = this.store.get('geneRecord', geneRecordId);
        const { mutation, operations } = this.classification(geneRecord);
        if (operations.length > 0) {
            this.commit(operations);
        }
        return mutation;
    }

    /** Re-derives every mutation produced by another catalog or rule set, in one transaction. */
    reclassifyStale(catalog: ReferenceCatalog = this.activeCatalog): ReclassifyReport {
        const geneRecords = this.store.query({ kind: 'geneRecord' });
        const current = new Map(this.store.query({ kind: 'mutationRecord' }).map(mutation => [mutation.geneRecordId, mutation]));

        const operations: StoreOperation[] = [];
        const updated: string[] = [];
        for (const geneRecord of geneRecords) {
            const mutation = current.get(geneRecord.id);
            if (mutation && !this.classifier.needsReclassification(mutation, catalog)) {
                continue;
            }
            const classified = this.classification(geneRecord, catalog, mutation);
            operations.push(...classified.operations);
            updated.push(geneRecord.id);
        }

        if (operations.length > 0) {
            this.commit(operations);
        }
        return {
            catalogVersion: catalog.version,
            ruleVersion: this.classifier.ruleVersion,
            examined: geneRecords.length,
            updated,
        };
    }

    /** Installs a new catalog once every stale mutation has been re-derived against it. */
    swapCatalog(catalog: ReferenceCatalog): ReclassifyReport {
        const previous = this.activeCatalog;
        const report = this.reclassifyStale(catalog);
        this.activeCatalog = catalog;
        console.log(chalk.blue(
            `🔄 Reference catalog ${previous.name}@${previous.version} → ${catalog.name}@${catalog.version} ` +
            `(${report.updated.length}/${report.examined} mutation records re-derived)`
        ));
        return report;
    }

    /**
     * Classifies `geneRecord` and returns the operations that make the result
     * its only mutation: the superseded record is deleted before the new one
     * is written. Nothing is returned when the stored mutation is already current.
     */
    private classification(
        geneRecord: GeneRecord,
        catalog: ReferenceCatalog = this.activeCatalog,
        existing: MutationRecord | undefined = this.getMutation(geneRecord.id)
    ): { mutation: MutationRecord; operations: StoreOperation[] } {
        const mutation = this.classifier.classify(geneRecord, catalog);
        if (existing && existing.id === mutation.id) {
            return { mutation: existing, operations: [] };
        }

        const operations: StoreOperation[] = [];
        if (existing) {
            operations.push({ op: 'delete', kind: 'mutationRecord', id: existing.id });
        }
        operations.push({ op: 'put', record: mutation });
        return { mutation, operations };
    }

    private commit(operations: StoreOperation[]): void {
        const result = this.store.transaction(operations);
        if (result.status === 'rolled-back') {
            throw result.error;
        }
    }
}
