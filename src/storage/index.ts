import chalk from 'chalk';
import { config, StorageBackend } from '../config/index.js';
import { ConstraintViolation } from '../model/errors.js';
import { GenomicStore, StoreOperation, TransactionResult } from './genomic-store.js';
import { JsonFileGenomicStore } from './json-file-store.js';
import { SqliteGenomicStore } from './sqlite-store.js';

export * from './genomic-store.js';
export * from './dataset-document.js';
export { BaseGenomicStore } from './base-store.js';
export type { StoreWriter } from './base-store.js';
export { FileLock, isProcessRunning } from './file-lock.js';
export { JsonFileGenomicStore } from './json-file-store.js';
export type { JsonFileStoreOptions } from './json-file-store.js';
export { SqliteGenomicStore } from './sqlite-store.js';
export type { SqliteStoreOptions } from './sqlite-store.js';

export interface StoreOptions {
    backend?: StorageBackend;
    /** SQLite database file or JSON document path, depending on the backend. */
    location?: string;
    lockTimeoutMs?: number;
}

export function createStore(options: StoreOptions = {}): GenomicStore {
    const backend = options.backend ?? config.storage.backend;
    const lockTimeoutMs = options.lockTimeoutMs ?? config.storage.lockTimeoutMs;

    switch (backend) {
        case 'sqlite':
            return new SqliteGenomicStore({
                filename: options.location ?? config.storage.sqlitePath,
                busyTimeoutMs: lockTimeoutMs,
            });
        case 'json-file':
            return new JsonFileGenomicStore({
                filePath: options.location ?? config.storage.jsonPath,
                lockTimeoutMs,
            });
    }
}

/**
 * Copies every record of `source` into `target` in a single transaction.
 * The target must be empty so that the copy is an exact replica.
 */
export function copyDataset(source: GenomicStore, target: GenomicStore): TransactionResult {
    const existing = target.stats();
    if (existing.patients + existing.geneRecords + existing.mutationRecords > 0) {
        throw new ConstraintViolation(`target ${target.backend} store is not empty`, { ...existing });
    }

    const operations: StoreOperation[] = [
        ...source.query({ kind: 'patient' }),
        ...source.query({ kind: 'geneRecord' }),
        ...source.query({ kind: 'mutationRecord' }),
    ].map((record): StoreOperation => ({ op: 'put', record }));
    const result = target.transaction(operations);
    if (result.status === 'committed') {
        console.log(chalk.green(`✅ Copied ${result.applied} records from ${source.backend} to ${target.backend}`));
    }
    return result;
}
