import { config } from '../config/index.js';
import { compareIds } from '../model/canonical.js';
import { ValidationError } from '../model/errors.js';
import { Classification, CLASSIFICATIONS, MutationRecord, Patient } from '../model/records.js';
import { GenomicStore } from '../storage/genomic-store.js';
import { Filters, JoinedRow, matchesFilter, RecordFilter, requiredKeys } from './record-filter.js';

export interface QueryOptions {
    /** Number of genes in the most-mutated ranking. */
    topN?: number;
}

export interface MatchTotals {
    patients: number;
    geneRecords: number;
    mutationRecords: number;
}

export interface ClassificationCount {
    classification: Classification;
    count: number;
}

export interface GeneExpressionStats {
    geneId: string;
    samples: number;
    mean: number;
    /** Population variance. */
    variance: number;
}

export interface MutatedGeneCount {
    geneId: string;
    count: number;
}

export interface QueryResult {
    totals: MatchTotals;
    classificationCounts: ClassificationCount[];
    expressionByGene: GeneExpressionStats[];
    topMutatedGenes: MutatedGeneCount[];
}

export interface ReportEntry {
    key: string;
    value: number;
}

export type ReportTable = Record<string, ReportEntry[]>;

export interface QueryEngineOptions {
    topN?: number;
}

/**
 * Aggregates over joined (patient, gene record, mutation) rows read from a
 * store. Rows are visited in id order, so results are reproducible and do
 * not depend on the backend.
 */
export class QueryEngine {
    private readonly store: GenomicStore;
    private readonly defaultTopN: number;

    constructor(store: GenomicStore, options: QueryEngineOptions = {}) {
        this.store = store;
        this.defaultTopN = options.topN ?? config.reporting.topN;
    }

    /** The joined rows that satisfy `filter`. */
    rows(filter: RecordFilter = Filters.all()): JoinedRow[] {
        const { patientIds, geneIds } = requiredKeys(filter);

        const patients = this.store.query({ kind: 'patient', ids: patientIds });
        const geneRecords = this.store.query({ kind: 'geneRecord', patientIds, geneIds });
        const mutations = new Map<string, MutationRecord>(
            this.store.query({ kind: 'mutationRecord', patientIds, geneIds }).map(mutation => [mutation.geneRecordId, mutation])
        );

        const genesByPatient = new Map<string, typeof geneRecords>();
        for (const record of geneRecords) {
            const owned = genesByPatient.get(record.patientId);
            if (owned) {
                owned.push(record);
            } else {
                genesByPatient.set(record.patientId, [record]);
            }
        }

        const rows: JoinedRow[] = [];
        for (const patient of patients) {
            const owned = genesByPatient.get(patient.id);
            if (!owned) {
                rows.push({ patient });
                continue;
            }
            for (const geneRecord of owned) {
                const mutation = mutations.get(geneRecord.id);
                rows.push(mutation ? { patient, geneRecord, mutation } : { patient, geneRecord });
            }
        }
        return rows.filter(row => matchesFilter(filter, row));
    }

    query(filter: RecordFilter = Filters.all(), options: QueryOptions = {}): QueryResult {
        const topN = options.topN ?? this.defaultTopN;
        if (!Number.isInteger(topN) || topN < 1) {
            throw ValidationError.single('topN', 'must be a positive integer', topN);
        }

        const rows = this.rows(filter);
        return {
            totals: totals(rows),
            classificationCounts: classificationCounts(rows),
            expressionByGene: expressionByGene(rows),
            topMutatedGenes: topMutatedGenes(rows, topN),
        };
    }

    findPatients(filter: RecordFilter = Filters.all()): Patient[] {
        const seen = new Map<string, Patient>();
        for (const row of this.rows(filter)) {
            seen.set(row.patient.id, row.patient);
        }
        return [...seen.values()].sort((a, b) => compareIds(a.id, b.id));
    }
}

function totals(rows: JoinedRow[]): MatchTotals {
    const patients = new Set<string>();
    let geneRecords = 0;
    let mutationRecords = 0;
    for (const row of rows) {
        patients.add(row.patient.id);
        if (row.geneRecord) geneRecords++;
        if (row.mutation) mutationRecords++;
    }
    return { patients: patients.size, geneRecords, mutationRecords };
}

function classificationCounts(rows: JoinedRow[]): ClassificationCount[] {
    const counts = new Map<Classification, number>(CLASSIFICATIONS.map(label => [label, 0]));
    for (const row of rows) {
        if (row.mutation) {
            counts.set(row.mutation.classification, (counts.get(row.mutation.classification) ?? 0) + 1);
        }
    }
    return [...counts.entries()]
        .map(([classification, count]) => ({ classification, count }))
        .sort((a, b) => b.count - a.count || compareIds(a.classification, b.classification));
}

function expressionByGene(rows: JoinedRow[]): GeneExpressionStats[] {
    const values = new Map<string, number[]>();
    for (const row of rows) {
        if (!row.geneRecord) continue;
        const bucket = values.get(row.geneRecord.geneId);
        if (bucket) {
            bucket.push(row.geneRecord.expression);
        } else {
            values.set(row.geneRecord.geneId, [row.geneRecord.expression]);
        }
    }

    return [...values.entries()]
        .sort(([a], [b]) => compareIds(a, b))
        .map(([geneId, samples]) => {
            const mean = samples.reduce((sum, value) => sum + value, 0) / samples.length;
            const variance = samples.reduce((sum, value) => sum + (value - mean) ** 2, 0) / samples.length;
            return { geneId, samples: samples.length, mean, variance };
        });
}

function topMutatedGenes(rows: JoinedRow[], topN: number): MutatedGeneCount[] {
    const counts = new Map<string, number>();
    for (const row of rows) {
        if (row.mutation && row.mutation.mutationType !== 'none') {
            counts.set(row.mutation.geneId, (counts.get(row.mutation.geneId) ?? 0) + 1);
        }
    }
    return [...counts.entries()]
        .map(([geneId, count]) => ({ geneId, count }))
        .sort((a, b) => b.count - a.count || compareIds(a.geneId, b.geneId))
        .slice(0, topN);
}

/** Flattens a query result into label → sorted `{ key, value }` pairs. */
export function toReportTable(result: QueryResult): ReportTable {
    return {
        totals: [
            { key: 'patients', value: result.totals.patients },
            { key: 'geneRecords', value: result.totals.geneRecords },
            { key: 'mutationRecords', value: result.totals.mutationRecords },
        ],
        classificationCounts: result.classificationCounts.map(({ classification, count }) => ({ key: classification, value: count })),
        expressionMean: result.expressionByGene.map(({ geneId, mean }) => ({ key: geneId, value: mean })),
        expressionVariance: result.expressionByGene.map(({ geneId, variance }) => ({ key: geneId, value: variance })),
        expressionSamples: result.expressionByGene.map(({ geneId, samples }) => ({ key: geneId, value: samples })),
        topMutatedGenes: result.topMutatedGenes.map(({ geneId, count }) => ({ key: geneId, value: count })),
    };
}
