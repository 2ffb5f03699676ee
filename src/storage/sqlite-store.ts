import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { config } from '../config/index.js';
import { compareIds } from '../model/canonical.js';
import {
    ConstraintViolation,
    describeError,
    errorCode,
    GenomicsError,
    StorageUnavailable,
} from '../model/errors.js';
import {
    CLASSIFICATIONS,
    CLINICAL_STAGES,
    createGeneRecord,
    createMutationRecord,
    createPatient,
    EVIDENCE_KINDS,
    GeneRecord,
    isClassification,
    isClinicalStage,
    isEvidence,
    isMutationType,
    isSex,
    MUTATION_TYPES,
    MutationRecord,
    normalizeGeneId,
    Patient,
    SEXES,
} from '../model/records.js';
import { BaseGenomicStore, StoreWriter } from './base-store.js';
import { CURRENT_SCHEMA_VERSION } from './dataset-document.js';
import { GeneRecordQuery, MutationRecordQuery, PatientQuery } from './genomic-store.js';

export interface SqliteStoreOptions {
    /** Database file, or `:memory:` for a private in-memory database. */
    filename: string;
    busyTimeoutMs?: number;
}

interface PatientRow {
    id: string;
    name: string | null;
    age: number | null;
    sex: string | null;
    stage: string | null;
    diagnosis: string | null;
}

interface GeneRecordRow {
    id: string;
    patient_id: string;
    gene_id: string;
    expression: number;
    sequence: string | null;
}

interface MutationRow {
    id: string;
    gene_record_id: string;
    patient_id: string;
    gene_id: string;
    mutation_type: string;
    classification: string;
    evidence: string;
    position: number | null;
    variants: string | null;
    rule_version: string;
    catalog_version: string;
    created_at: string;
}

type PatientParams = [string, string | null, number | null, string | null, string | null, string | null];
type GeneRecordParams = [string, string, string, number, string | null];
type MutationParams = [
    string, string, string, string, string, string, string,
    number | null, string | null, string, string, string,
];

function sqlList(values: readonly string[]): string {
    return values.map(value => `'${value}'`).join(', ');
}

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS store_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS patients (
        id TEXT PRIMARY KEY,
        name TEXT,
        age REAL CHECK (age IS NULL OR (age >= 0 AND age <= 150)),
        sex TEXT CHECK (sex IS NULL OR sex IN (${sqlList(SEXES)})),
        stage TEXT CHECK (stage IS NULL OR stage IN (${sqlList(CLINICAL_STAGES)})),
        diagnosis TEXT
    );

    CREATE TABLE IF NOT EXISTS gene_records (
        id TEXT PRIMARY KEY,
        patient_id TEXT NOT NULL REFERENCES patients(id) ON DELETE CASCADE,
        gene_id TEXT NOT NULL,
        expression REAL NOT NULL,
        sequence TEXT,
        UNIQUE (patient_id, gene_id)
    );

    CREATE TABLE IF NOT EXISTS mutation_records (
        id TEXT PRIMARY KEY,
        gene_record_id TEXT NOT NULL UNIQUE REFERENCES gene_records(id) ON DELETE CASCADE,
        patient_id TEXT NOT NULL,
        gene_id TEXT NOT NULL,
        mutation_type TEXT NOT NULL CHECK (mutation_type IN (${sqlList(MUTATION_TYPES)})),
        classification TEXT NOT NULL CHECK (classification IN (${sqlList(CLASSIFICATIONS)})),
        evidence TEXT NOT NULL CHECK (evidence IN (${sqlList(EVIDENCE_KINDS)})),
        position INTEGER,
        variants TEXT,
        rule_version TEXT NOT NULL,
        catalog_version TEXT NOT NULL,
        created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_gene_records_gene ON gene_records(gene_id);
    CREATE INDEX IF NOT EXISTS idx_mutation_records_patient ON mutation_records(patient_id);
    CREATE INDEX IF NOT EXISTS idx_mutation_records_classification ON mutation_records(classification);
`;

/** Builds a WHERE clause from `column IN (...)` filters; unset filters are skipped. */
function whereIn(filters: Array<[string, readonly string[] | undefined]>): { sql: string; params: string[] } {
    const conditions: string[] = [];
    const params: string[] = [];
    for (const [column, values] of filters) {
        if (values === undefined) continue;
        if (values.length === 0) {
            conditions.push('0 = 1');
            continue;
        }
        conditions.push(`${column} IN (${values.map(() => '?').join(', ')})`);
        params.push(...values);
    }
    return { sql: conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '', params };
}

function storedValue<T extends string>(value: string | null, guard: (candidate: unknown) => candidate is T, column: string): T | undefined {
    if (value === null) {
        return undefined;
    }
    if (!guard(value)) {
        throw new StorageUnavailable('sqlite', `unexpected ${column} value '${value}' in database`);
    }
    return value;
}

function requiredValue<T extends string>(value: string, guard: (candidate: unknown) => candidate is T, column: string): T {
    const checked = storedValue(value, guard, column);
    if (checked === undefined) {
        throw new StorageUnavailable('sqlite', `missing ${column} in database`);
    }
    return checked;
}

function parseVariants(text: string | null): string[] | undefined {
    if (text === null) {
        return undefined;
    }
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
        throw new StorageUnavailable('sqlite', `malformed variants column '${text}'`);
    }
    return parsed;
}

function toPatient(row: PatientRow, geneRecordIds: string[] = []): Patient {
    return createPatient({
        id: row.id,
        name: row.name ?? undefined,
        age: row.age ?? undefined,
        sex: storedValue(row.sex, isSex, 'sex'),
        stage: storedValue(row.stage, isClinicalStage, 'stage'),
        diagnosis: row.diagnosis ?? undefined,
        geneRecordIds,
    });
}

function toGeneRecord(row: GeneRecordRow): GeneRecord {
    return createGeneRecord({
        patientId: row.patient_id,
        geneId: row.gene_id,
        expression: row.expression,
        sequence: row.sequence ?? undefined,
    });
}

function toMutation(row: MutationRow): MutationRecord {
    return createMutationRecord({
        patientId: row.patient_id,
        geneId: row.gene_id,
        mutationType: requiredValue(row.mutation_type, isMutationType, 'mutation_type'),
        classification: requiredValue(row.classification, isClassification, 'classification'),
        evidence: requiredValue(row.evidence, isEvidence, 'evidence'),
        position: row.position ?? undefined,
        variants: parseVariants(row.variants),
        ruleVersion: row.rule_version,
        catalogVersion: row.catalog_version,
        createdAt: row.created_at,
    });
}

/** Maps driver errors onto the store's error taxonomy. */
function translate(error: unknown): Error {
    if (error instanceof GenomicsError) {
        return error;
    }
    const code = errorCode(error);
    if (code?.startsWith('SQLITE_CONSTRAINT')) {
        return new ConstraintViolation(describeError(error), { sqliteCode: code }, { cause: error });
    }
    return new StorageUnavailable('sqlite', describeError(error), { cause: error });
}

function guarded<T>(work: () => T): T {
    try {
        return work();
    } catch (error) {
        throw translate(error);
    }
}

class SqliteWriter implements StoreWriter {
    private readonly selectPatient: Database.Statement<[string], PatientRow>;
    private readonly selectGeneRecord: Database.Statement<[string], GeneRecordRow>;
    private readonly selectMutation: Database.Statement<[string], MutationRow>;
    private readonly selectMutationForGeneRecord: Database.Statement<[string], MutationRow>;
    private readonly upsertPatient: Database.Statement<PatientParams>;
    private readonly upsertGeneRecord: Database.Statement<GeneRecordParams>;
    private readonly upsertMutation: Database.Statement<MutationParams>;
    private readonly deletePatient: Database.Statement<[string]>;
    private readonly deleteGeneRecord: Database.Statement<[string]>;
    private readonly deleteMutation: Database.Statement<[string]>;

    constructor(db: Database.Database) {
        this.selectPatient = db.prepare<[string], PatientRow>('SELECT * FROM patients WHERE id = ?');
        this.selectGeneRecord = db.prepare<[string], GeneRecordRow>('SELECT * FROM gene_records WHERE id = ?');
        this.selectMutation = db.prepare<[string], MutationRow>('SELECT * FROM mutation_records WHERE id = ?');
        this.selectMutationForGeneRecord = db.prepare<[string], MutationRow>(
            'SELECT * FROM mutation_records WHERE gene_record_id = ?'
        );
        this.upsertPatient = db.prepare<PatientParams>(`
            INSERT INTO patients (id, name, age, sex, stage, diagnosis)
            VALUES (?, ?, ?, ?, ?, ?)
            ON CONFLICT(id) DO UPDATE SET
                name = excluded.name,
                age = excluded.age,
                sex = excluded.sex,
                stage = excluded.stage,
                diagnosis = excluded.diagnosis
        `);
        this.upsertGeneRecord = db.prepare<GeneRecordParams>(`
            INSERT INTO gene_records (id, patient_id, gene_id, expression, sequence)
            VALUES (?, ?, ?, ?, ?)
            ON CONFLICT(id) DO UPDATE SET
                expression = excluded.expression,
                sequence = excluded.sequence
        `);
        this.upsertMutation = db.prepare<MutationParams>(`
            INSERT INTO mutation_records (
                id, gene_record_id, patient_id, gene_id, mutation_type, classification, evidence,
                position, variants, rule_version, catalog_version, created_at
            )
            VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
            ON CONFLICT(id) DO UPDATE SET created_at = excluded.created_at
        `);
        this.deletePatient = db.prepare<[string]>('DELETE FROM patients WHERE id = ?');
        this.deleteGeneRecord = db.prepare<[string]>('DELETE FROM gene_records WHERE id = ?');
        this.deleteMutation = db.prepare<[string]>('DELETE FROM mutation_records WHERE id = ?');
    }

    readPatient(id: string): Patient | undefined {
        const row = guarded(() => this.selectPatient.get(id));
        return row ? toPatient(row) : undefined;
    }

    readGeneRecord(id: string): GeneRecord | undefined {
        const row = guarded(() => this.selectGeneRecord.get(id));
        return row ? toGeneRecord(row) : undefined;
    }

    readMutation(id: string): MutationRecord | undefined {
        const row = guarded(() => this.selectMutation.get(id));
        return row ? toMutation(row) : undefined;
    }

    mutationForGeneRecord(geneRecordId: string): MutationRecord | undefined {
        const row = guarded(() => this.selectMutationForGeneRecord.get(geneRecordId));
        return row ? toMutation(row) : undefined;
    }

    writePatient(patient: Patient): void {
        guarded(() => this.upsertPatient.run(
            patient.id,
            patient.name ?? null,
            patient.age ?? null,
            patient.sex ?? null,
            patient.stage ?? null,
            patient.diagnosis ?? null
        ));
    }

    writeGeneRecord(record: GeneRecord): void {
        guarded(() => this.upsertGeneRecord.run(
            record.id,
            record.patientId,
            record.geneId,
            record.expression,
            record.sequence ?? null
        ));
    }

    writeMutation(record: MutationRecord): void {
        guarded(() => this.upsertMutation.run(
            record.id,
            record.geneRecordId,
            record.patientId,
            record.geneId,
            record.mutationType,
            record.classification,
            record.evidence,
            record.position ?? null,
            record.variants === undefined ? null : JSON.stringify(record.variants),
            record.ruleVersion,
            record.catalogVersion,
            record.createdAt
        ));
    }

    removePatient(id: string): void {
        guarded(() => this.deletePatient.run(id));
    }

    removeGeneRecord(id: string): void {
        guarded(() => this.deleteGeneRecord.run(id));
    }

    removeMutation(id: string): void {
        guarded(() => this.deleteMutation.run(id));
    }
}

function checkSchemaVersion(db: Database.Database, filename: string): void {
    const row = db
        .prepare<[string], { value: string }>('SELECT value FROM store_meta WHERE key = ?')
        .get('schema_version');
    if (!row) {
        db.prepare<[string, string]>('INSERT INTO store_meta (key, value) VALUES (?, ?)')
            .run('schema_version', String(CURRENT_SCHEMA_VERSION));
        return;
    }
    const version = parseInt(row.value, 10);
    if (isNaN(version) || version > CURRENT_SCHEMA_VERSION) {
        throw new StorageUnavailable(
            'sqlite',
            `refusing to open ${filename}: schema version ${row.value} is newer than the supported version ${CURRENT_SCHEMA_VERSION}`
        );
    }
}

/**
 * Relational backend on better-sqlite3. Foreign keys cascade deletes from
 * patients to gene records to mutation records; transactions run as
 * `BEGIN IMMEDIATE` so concurrent writers queue on the database lock.
 */
export class SqliteGenomicStore extends BaseGenomicStore {
    readonly backend = 'sqlite' as const;
    readonly filename: string;

    private readonly db: Database.Database;
    private readonly writer: SqliteWriter;

    constructor(options: SqliteStoreOptions) {
        super();
        this.filename = options.filename;
        const inMemory = options.filename === ':memory:';

        let db: Database.Database | undefined;
        try {
            if (!inMemory) {
                fs.mkdirSync(path.dirname(path.resolve(options.filename)), { recursive: true });
            }
            db = new Database(options.filename, { timeout: options.busyTimeoutMs ?? config.storage.lockTimeoutMs });
            db.pragma('foreign_keys = ON');
            if (!inMemory) {
                db.pragma('journal_mode = WAL');
                db.pragma('synchronous = NORMAL');
            }
            db.exec(SCHEMA);
            checkSchemaVersion(db, options.filename);
            this.db = db;
            this.writer = new SqliteWriter(db);
        } catch (error) {
            if (db?.open) {
                db.close();
            }
            throw translate(error);
        }

        if (!inMemory) {
            console.log(chalk.blue(`🗄️  Opened SQLite store ${options.filename}`));
        }
    }

    close(): void {
        if (this.db.open) {
            this.db.close();
        }
    }

    protected loadPatients(query: PatientQuery): Patient[] {
        return guarded(() => {
            const patients = whereIn([['id', query.ids]]);
            const rows = this.db.prepare<string[], PatientRow>(`SELECT * FROM patients${patients.sql}`).all(...patients.params);

            const owned = whereIn([['patient_id', query.ids]]);
            const links = this.db
                .prepare<string[], { id: string; patient_id: string }>(`SELECT id, patient_id FROM gene_records${owned.sql}`)
                .all(...owned.params);
            const byPatient = new Map<string, string[]>();
            for (const link of links) {
                const ids = byPatient.get(link.patient_id);
                if (ids) {
                    ids.push(link.id);
                } else {
                    byPatient.set(link.patient_id, [link.id]);
                }
            }

            return rows.map(row => toPatient(row, (byPatient.get(row.id) ?? []).sort(compareIds)));
        });
    }

    protected loadGeneRecords(query: GeneRecordQuery): GeneRecord[] {
        return guarded(() => {
            const where = whereIn([
                ['id', query.ids],
                ['patient_id', query.patientIds],
                ['gene_id', query.geneIds?.map(normalizeGeneId)],
            ]);
            return this.db
                .prepare<string[], GeneRecordRow>(`SELECT * FROM gene_records${where.sql}`)
                .all(...where.params)
                .map(toGeneRecord);
        });
    }

    protected loadMutations(query: MutationRecordQuery): MutationRecord[] {
        return guarded(() => {
            const where = whereIn([
                ['id', query.ids],
                ['gene_record_id', query.geneRecordIds],
                ['patient_id', query.patientIds],
                ['gene_id', query.geneIds?.map(normalizeGeneId)],
                ['classification', query.classifications],
                ['mutation_type', query.mutationTypes],
            ]);
            return this.db
                .prepare<string[], MutationRow>(`SELECT * FROM mutation_records${where.sql}`)
                .all(...where.params)
                .map(toMutation);
        });
    }

    protected atomically<T>(work: (writer: StoreWriter) => T): T {
        try {
            return this.db.transaction(() => work(this.writer)).immediate();
        } catch (error) {
            throw translate(error);
        }
    }
}
