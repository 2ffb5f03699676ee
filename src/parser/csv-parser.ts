import { createReadStream } from 'fs';
import { createGunzip } from 'zlib';
import { Readable, Transform, pipeline } from 'stream';
import { StringDecoder } from 'string_decoder';
import { promisify } from 'util';
import { EventEmitter } from 'events';
import { ValidationError } from '../model/errors.js';
import { fieldForColumn, normalizeFieldName, pickFields, RawRow, RowField } from '../validation/field-coercion.js';

const pipelineAsync = promisify(pipeline);

export interface CsvReaderOptions {
    delimiter?: string;
}

export interface WideRowOptions {
    /** Columns holding expression values. Defaults to every column that is not a patient field. */
    geneColumns?: string[];
}

const PATIENT_FIELDS: ReadonlySet<RowField> = new Set<RowField>(['patientId', 'name', 'age', 'sex', 'stage', 'diagnosis']);

/**
 * Incremental CSV tokenizer: quoted fields may contain delimiters, line
 * breaks and `""` escapes. Records come out as soon as their line ends.
 */
export class CsvTokenizer {
    private readonly delimiter: string;
    private field = '';
    private record: string[] = [];
    private quoted = false;
    private quoteClosed = false;
    private pendingCarriageReturn = false;
    line = 1;

    constructor(delimiter = ',') {
        if (delimiter.length !== 1 || delimiter === '"') {
            throw ValidationError.single('delimiter', 'must be a single character other than a double quote', delimiter);
        }
        this.delimiter = delimiter;
    }

    push(chunk: string): string[][] {
        const records: string[][] = [];
        for (const char of chunk) {
            if (this.pendingCarriageReturn) {
                this.pendingCarriageReturn = false;
                if (char === '\n') continue;
            }

            if (this.quoted) {
                if (char === '"') {
                    this.quoted = false;
                    this.quoteClosed = true;
                } else {
                    if (char === '\n') this.line++;
                    this.field += char;
                }
                continue;
            }

            if (char === '"') {
                if (this.quoteClosed) {
                    // Doubled quote inside a quoted field.
                    this.field += '"';
                    this.quoted = true;
                    this.quoteClosed = false;
                } else if (this.field.length === 0) {
                    this.quoted = true;
                } else {
                    this.field += char;
                }
            } else if (char === this.delimiter) {
                this.endField();
            } else if (char === '\n' || char === '\r') {
                this.pendingCarriageReturn = char === '\r';
                this.line++;
                const record = this.endRecord();
                if (record) records.push(record);
            } else {
                this.quoteClosed = false;
                this.field += char;
            }
        }
        return records;
    }

    end(): string[][] {
        if (this.quoted) {
            throw ValidationError.single('csv', `unterminated quoted field at line ${this.line}`);
        }
        const record = this.endRecord();
        return record ? [record] : [];
    }

    private endField(): void {
        this.record.push(this.field);
        this.field = '';
        this.quoteClosed = false;
    }

    private endRecord(): string[] | undefined {
        this.endField();
        const record = this.record;
        this.record = [];
        const blank = record.length === 1 && record[0] === '';
        return blank ? undefined : record;
    }
}

/**
 * Streams a CSV (optionally gzipped) file into raw rows keyed by the header
 * line. Emits `start`, `header`, `row`, `warning` and `complete`.
 */
export class CsvRowReader extends EventEmitter {
    private readonly delimiter: string;

    constructor(options: CsvReaderOptions = {}) {
        super();
        this.delimiter = options.delimiter ?? ',';
    }

    async readFile(filePath: string): Promise<RawRow[]> {
        return filePath.endsWith('.gz')
            ? this.consume(createReadStream(filePath), createGunzip())
            : this.readStream(createReadStream(filePath));
    }

    async readStream(source: Readable): Promise<RawRow[]> {
        return this.consume(source);
    }

    private async consume(source: Readable, decoder?: Transform): Promise<RawRow[]> {
        const tokenizer = new CsvTokenizer(this.delimiter);
        const utf8 = new StringDecoder('utf8');
        const rows: RawRow[] = [];
        let header: string[] | undefined;

        const accept = (record: string[]): void => {
            if (!header) {
                header = record.map(column => column.trim());
                this.emit('header', header);
                return;
            }
            const row = this.toRow(header, record, rows.length + 2);
            rows.push(row);
            this.emit('row', row);
        };

        const rowTransform = new Transform({
            objectMode: true,
            transform(chunk: Buffer | string, _encoding, callback) {
                try {
                    tokenizer.push(typeof chunk === 'string' ? chunk : utf8.write(chunk)).forEach(accept);
                    callback();
                } catch (error) {
                    callback(error instanceof Error ? error : new Error(String(error)));
                }
            },
            flush(callback) {
                try {
                    tokenizer.push(utf8.end()).forEach(accept);
                    tokenizer.end().forEach(accept);
                    callback();
                } catch (error) {
                    callback(error instanceof Error ? error : new Error(String(error)));
                }
            },
        });

        this.emit('start');
        if (decoder) {
            await pipelineAsync(source, decoder, rowTransform);
        } else {
            await pipelineAsync(source, rowTransform);
        }
        this.emit('complete', { totalRows: rows.length });
        return rows;
    }

    /** Synchronous variant for text already in memory. */
    parseText(text: string): RawRow[] {
        const tokenizer = new CsvTokenizer(this.delimiter);
        const records = [...tokenizer.push(text), ...tokenizer.end()];
        const [header, ...data] = records;
        if (!header) {
            return [];
        }
        const columns = header.map(column => column.trim());
        return data.map((record, index) => this.toRow(columns, record, index + 2));
    }

    private toRow(header: string[], record: string[], recordNumber: number): RawRow {
        if (record.length > header.length) {
            this.emit('warning', `record ${recordNumber} has ${record.length} fields but the header has ${header.length}; extra fields ignored`);
        }
        const row: RawRow = {};
        header.forEach((column, index) => {
            row[column] = record[index];
        });
        return row;
    }
}

/**
 * Converts a wide row (one column per gene, expression values in the cells)
 * into one long row per gene. Patient columns are copied onto every long
 * row; empty gene cells are skipped. A row without any gene values yields a
 * single patient-only row.
 */
export function expandWideRow(row: RawRow, options: WideRowOptions = {}): RawRow[] {
    const patient = pickFields(row);
    const base: RawRow = {};
    for (const field of PATIENT_FIELDS) {
        if (patient[field] !== undefined) {
            base[field] = patient[field];
        }
    }

    const explicit = options.geneColumns?.map(normalizeFieldName);
    const long: RawRow[] = [];
    for (const [column, value] of Object.entries(row)) {
        const isGene = explicit
            ? explicit.includes(normalizeFieldName(column))
            : fieldForColumn(column) === undefined;
        if (!isGene) continue;
        if (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')) continue;
        long.push({ ...base, geneId: column.trim(), expression: value });
    }

    return long.length > 0 ? long : [base];
}
