import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { config } from '../config/index.js';
import { compareIds } from '../model/canonical.js';
import { describeError, errorCode, StorageUnavailable } from '../model/errors.js';
import { GeneRecord, MutationRecord, Patient } from '../model/records.js';
import { BaseGenomicStore, StoreWriter } from './base-store.js';
import { DatasetRecords, parseDocument, toDocument } from './dataset-document.js';
import { FileLock } from './file-lock.js';
import { GeneRecordQuery, MutationRecordQuery, PatientQuery } from './genomic-store.js';

export interface JsonFileStoreOptions {
    filePath: string;
    lockTimeoutMs?: number;
}

interface Dataset {
    patients: Map<string, Patient>;
    geneRecords: Map<string, GeneRecord>;
    mutations: Map<string, MutationRecord>;
    /** geneRecordId → id of its mutation */
    mutationByGeneRecord: Map<string, string>;
}

function emptyDataset(): Dataset {
    return { patients: new Map(), geneRecords: new Map(), mutations: new Map(), mutationByGeneRecord: new Map() };
}

function datasetFrom(records: DatasetRecords): Dataset {
    const dataset = emptyDataset();
    for (const patient of records.patients) dataset.patients.set(patient.id, patient);
    for (const record of records.geneRecords) dataset.geneRecords.set(record.id, record);
    for (const mutation of records.mutationRecords) {
        dataset.mutations.set(mutation.id, mutation);
        dataset.mutationByGeneRecord.set(mutation.geneRecordId, mutation.id);
    }
    return dataset;
}

/** Records are never mutated in place, so copying the maps isolates a draft. */
function cloneDataset(dataset: Dataset): Dataset {
    return {
        patients: new Map(dataset.patients),
        geneRecords: new Map(dataset.geneRecords),
        mutations: new Map(dataset.mutations),
        mutationByGeneRecord: new Map(dataset.mutationByGeneRecord),
    };
}

class DatasetWriter implements StoreWriter {
    constructor(private readonly draft: Dataset) {}

    readPatient(id: string): Patient | undefined {
        return this.draft.patients.get(id);
    }

    readGeneRecord(id: string): GeneRecord | undefined {
        return this.draft.geneRecords.get(id);
    }

    readMutation(id: string): MutationRecord | undefined {
        return this.draft.mutations.get(id);
    }

    mutationForGeneRecord(geneRecordId: string): MutationRecord | undefined {
        const mutationId = this.draft.mutationByGeneRecord.get(geneRecordId);
        return mutationId === undefined ? undefined : this.draft.mutations.get(mutationId);
    }

    writePatient(patient: Patient): void {
        this.draft.patients.set(patient.id, { ...patient, geneRecordIds: [] });
    }

    writeGeneRecord(record: GeneRecord): void {
        this.draft.geneRecords.set(record.id, record);
    }

    writeMutation(record: MutationRecord): void {
        this.draft.mutations.set(record.id, record);
        this.draft.mutationByGeneRecord.set(record.geneRecordId, record.id);
    }

    removePatient(id: string): void {
        for (const record of [...this.draft.geneRecords.values()]) {
            if (record.patientId === id) {
                this.removeGeneRecord(record.id);
            }
        }
        this.draft.patients.delete(id);
    }

    removeGeneRecord(id: string): void {
        const mutation = this.mutationForGeneRecord(id);
        if (mutation) {
            this.removeMutation(mutation.id);
        }
        this.draft.geneRecords.delete(id);
    }

    removeMutation(id: string): void {
        const mutation = this.draft.mutations.get(id);
        if (mutation) {
            this.draft.mutationByGeneRecord.delete(mutation.geneRecordId);
            this.draft.mutations.delete(id);
        }
    }
}

/**
 * File backend: the whole dataset as one JSON document.
 *
 * Writers take `<file>.lock`, re-read the document, apply the transaction to
 * a draft, write `<file>.<pid>.tmp` and rename it over the document. Readers
 * use the in-memory copy, refreshed whenever the file changes on disk.
 */
export class JsonFileGenomicStore extends BaseGenomicStore {
    readonly backend = 'json-file' as const;
    readonly filePath: string;

    private readonly lock: FileLock;
    private state: Dataset = emptyDataset();
    /** Text of the document `state` was parsed from; undefined while no document exists. */
    private snapshot: string | undefined;
    private closed = false;

    constructor(options: JsonFileStoreOptions) {
        super();
        this.filePath = path.resolve(options.filePath);
        this.lock = new FileLock(this.filePath, options.lockTimeoutMs ?? config.storage.lockTimeoutMs);

        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        } catch (error) {
            throw new StorageUnavailable(this.backend, `cannot create ${path.dirname(this.filePath)}: ${describeError(error)}`, { cause: error });
        }
        this.refresh();
    }

    close(): void {
        this.closed = true;
        this.state = emptyDataset();
        this.snapshot = undefined;
    }

    protected loadPatients(query: PatientQuery): Patient[] {
        const state = this.current();
        const owned = new Map<string, string[]>();
        for (const record of state.geneRecords.values()) {
            const ids = owned.get(record.patientId);
            if (ids) {
                ids.push(record.id);
            } else {
                owned.set(record.patientId, [record.id]);
            }
        }

        const candidates = query.ids
            ? query.ids.flatMap(id => state.patients.get(id) ?? [])
            : [...state.patients.values()];
        return candidates.map(patient => ({ ...patient, geneRecordIds: (owned.get(patient.id) ?? []).sort(compareIds) }));
    }

    protected loadGeneRecords(query: GeneRecordQuery): GeneRecord[] {
        const state = this.current();
        return query.ids
            ? query.ids.flatMap(id => state.geneRecords.get(id) ?? [])
            : [...state.geneRecords.values()];
    }

    protected loadMutations(query: MutationRecordQuery): MutationRecord[] {
        const state = this.current();
        return query.ids
            ? query.ids.flatMap(id => state.mutations.get(id) ?? [])
            : [...state.mutations.values()];
    }

    protected atomically<T>(work: (writer: StoreWriter) => T): T {
        this.ensureOpen();
        return this.lock.withLock(() => {
            this.refresh();
            const draft = cloneDataset(this.state);
            const result = work(new DatasetWriter(draft));
            this.writeDocument(draft);
            this.state = draft;
            return result;
        });
    }

    private ensureOpen(): void {
        if (this.closed) {
            throw new StorageUnavailable(this.backend, `store ${this.filePath} is closed`);
        }
    }

    private current(): Dataset {
        this.ensureOpen();
        this.refresh();
        return this.state;
    }

    /**
     * Reloads the dataset when the committed document differs from the one
     * last parsed. Commits within one filesystem clock tick can leave size
     * and timestamps unchanged, so the text itself is compared.
     */
    private refresh(): void {
        const text = this.readDocumentText();
        if (text === this.snapshot) {
            return;
        }
        if (text === undefined) {
            this.state = emptyDataset();
            this.snapshot = undefined;
            return;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (error) {
            throw new StorageUnavailable(this.backend, `${this.filePath} is not valid JSON: ${describeError(error)}`, { cause: error });
        }

        try {
            this.state = datasetFrom(parseDocument(raw));
        } catch (error) {
            throw new StorageUnavailable(this.backend, `refusing to open ${this.filePath}: ${describeError(error)}`, { cause: error });
        }
        this.snapshot = text;
    }

    private readDocumentText(): string | undefined {
        try {
            return fs.readFileSync(this.filePath, 'utf8');
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                return undefined;
            }
            throw new StorageUnavailable(this.backend, `cannot read ${this.filePath}: ${describeError(error)}`, { cause: error });
        }
    }

    private writeDocument(dataset: Dataset): void {
        const document = toDocument({
            patients: [...dataset.patients.values()],
            geneRecords: [...dataset.geneRecords.values()],
            mutationRecords: [...dataset.mutations.values()],
        });
        const text = JSON.stringify(document, null, 2) + '\n';
        const tempPath = `${this.filePath}.${process.pid}.tmp`;

        try {
            const fd = fs.openSync(tempPath, 'w');
            try {
                fs.writeSync(fd, text);
                fs.fsyncSync(fd);
            } finally {
                fs.closeSync(fd);
            }
            fs.renameSync(tempPath, this.filePath);
        } catch (error) {
            fs.rmSync(tempPath, { force: true });
            console.error(chalk.red(`❌ Failed to write ${this.filePath}: ${describeError(error)}`));
            throw new StorageUnavailable(this.backend, `cannot write ${this.filePath}: ${describeError(error)}`, { cause: error });
        }
        this.snapshot = text;
    }
}
