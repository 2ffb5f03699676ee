import { EventEmitter } from 'events';
import { config } from '../config/index.js';
import { GenomicsError, StorageUnavailable, TransactionAborted } from '../model/errors.js';
import { Classification } from '../model/records.js';
import { GenomicRegistry } from '../registry/genomic-registry.js';
import { RawRow } from '../validation/field-coercion.js';
import { validateBatch } from '../validation/validation-engine.js';
import { CsvRowReader, expandWideRow } from './csv-parser.js';

export interface ImportOptions {
    replace?: boolean;
    stopOnFirstError?: boolean;
}

export interface FileImportOptions extends ImportOptions {
    /** One column per gene instead of one row per (patient, gene) pair. */
    wide?: boolean;
    delimiter?: string;
}

export interface RowReport {
    rowNumber: number;
    status: 'imported' | 'failed';
    patientId?: string;
    geneRecordId?: string;
    classification?: Classification;
    error?: { code: string; message: string };
}

export interface ImportReport {
    total: number;
    imported: number;
    failed: number;
    /** The run ended early because `stopOnFirstError` was set. */
    stopped: boolean;
    elapsedMs: number;
    rows: RowReport[];
}

export interface ImportProgress {
    processed: number;
    imported: number;
    failed: number;
    rate: number;
    elapsedTime: number;
}

function describeFailure(error: unknown): { code: string; message: string } {
    if (error instanceof TransactionAborted && error.cause instanceof GenomicsError) {
        return { code: error.cause.code, message: error.cause.message };
    }
    if (error instanceof GenomicsError) {
        return { code: error.code, message: error.message };
    }
    return { code: 'UNEXPECTED', message: error instanceof Error ? error.message : String(error) };
}

/**
 * Validates rows and ingests each valid one in its own transaction. A bad
 * row is recorded in the report and the run continues, unless
 * `stopOnFirstError` is set. An unreachable store ends the run with an error.
 *
 * Events: `start`, `row` (RowReport), `progress` (ImportProgress), `complete` (ImportReport).
 */
export class RecordImporter extends EventEmitter {
    private readonly registry: GenomicRegistry;
    private readonly progressInterval: number;

    constructor(registry: GenomicRegistry, progressInterval: number = config.analysis.progressUpdateInterval) {
        super();
        this.registry = registry;
        this.progressInterval = Math.max(1, progressInterval);
    }

    importRows(rows: Iterable<RawRow>, options: ImportOptions = {}): ImportReport {
        const startTime = Date.now();
        const reports: RowReport[] = [];
        let imported = 0;
        let failed = 0;
        let stopped = false;

        this.emit('start');

        const outcomes = validateBatch(rows, {
            lookup: this.registry,
            replace: options.replace,
            stopOnFirstError: options.stopOnFirstError,
        });

        for (const outcome of outcomes) {
            let report: RowReport;
            if (!outcome.ok) {
                report = { rowNumber: outcome.rowNumber, status: 'failed', error: describeFailure(outcome.error) };
            } else {
                try {
                    const result = this.registry.ingestRow(outcome);
                    report = {
                        rowNumber: outcome.rowNumber,
                        status: 'imported',
                        patientId: result.patient.id,
                        geneRecordId: result.geneRecord?.id,
                        classification: result.mutation?.classification,
                    };
                } catch (error) {
                    if (error instanceof StorageUnavailable || !(error instanceof GenomicsError)) {
                        throw error;
                    }
                    report = {
                        rowNumber: outcome.rowNumber,
                        status: 'failed',
                        patientId: outcome.patient.id,
                        geneRecordId: outcome.geneRecord?.id,
                        error: describeFailure(error),
                    };
                }
            }

            reports.push(report);
            if (report.status === 'imported') {
                imported++;
            } else {
                failed++;
            }
            this.emit('row', report);

            if (reports.length % this.progressInterval === 0) {
                this.emit('progress', this.progress(reports.length, imported, failed, startTime));
            }

            if (report.status === 'failed' && options.stopOnFirstError) {
                stopped = true;
                break;
            }
        }

        const summary: ImportReport = {
            total: reports.length,
            imported,
            failed,
            stopped,
            elapsedMs: Date.now() - startTime,
            rows: reports,
        };
        this.emit('complete', summary);
        return summary;
    }

    async importFile(filePath: string, options: FileImportOptions = {}): Promise<ImportReport> {
        const reader = new CsvRowReader({ delimiter: options.delimiter });
        const rows = await reader.readFile(filePath);
        const longRows = options.wide ? rows.flatMap(row => expandWideRow(row)) : rows;
        return this.importRows(longRows, options);
    }

    private progress(processed: number, imported: number, failed: number, startTime: number): ImportProgress {
        const elapsedTime = (Date.now() - startTime) / 1000;
        return {
            processed,
            imported,
            failed,
            rate: elapsedTime > 0 ? processed / elapsedTime : processed,
            elapsedTime,
        };
    }
}
