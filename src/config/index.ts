import dotenv from 'dotenv';

dotenv.config();

export type StorageBackend = 'sqlite' | 'json-file';
export type SignalPrecedence = 'sequence' | 'expression';

interface Config {
    storage: {
        backend: StorageBackend;
        sqlitePath: string;
        jsonPath: string;
        lockTimeoutMs: number;
    };
    catalog: {
        path: string;
    };
    classifier: {
        tolerance: number;
        precedence: SignalPrecedence;
    };
    reporting: {
        topN: number;
    };
    analysis: {
        progressUpdateInterval: number;
    };
}

function parseBackend(value: string | undefined): StorageBackend {
    return value === 'json-file' ? 'json-file' : 'sqlite';
}

function parsePrecedence(value: string | undefined): SignalPrecedence {
    return value === 'expression' ? 'expression' : 'sequence';
}

export const config: Config = {
    storage: {
        backend: parseBackend(process.env.STORAGE_BACKEND),
        sqlitePath: process.env.SQLITE_PATH || './genomics_workspace/genomics.db',
        jsonPath: process.env.JSON_STORE_PATH || './genomics_workspace/genomics.json',
        lockTimeoutMs: parseInt(process.env.STORE_LOCK_TIMEOUT_MS || '5000'),
    },
    catalog: {
        path: process.env.REFERENCE_CATALOG_PATH || './data/reference-catalog.json',
    },
    classifier: {
        tolerance: parseFloat(process.env.EXPRESSION_TOLERANCE || '0.1'),
        precedence: parsePrecedence(process.env.SIGNAL_PRECEDENCE),
    },
    reporting: {
        topN: parseInt(process.env.TOP_N_DEFAULT || '10'),
    },
    analysis: {
        progressUpdateInterval: parseInt(process.env.PROGRESS_UPDATE_INTERVAL || '100'),
    },
};
