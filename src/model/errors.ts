/**
 * Error taxonomy for the genomic record store.
 *
 * Validation and classification errors never touch durable state; storage
 * errors are raised only after the enclosing transaction has been rolled back.
 */

export type GenomicsErrorCode =
    | 'VALIDATION_FAILED'
    | 'DUPLICATE_RECORD'
    | 'NOT_FOUND'
    | 'CONSTRAINT_VIOLATION'
    | 'STORAGE_UNAVAILABLE'
    | 'TRANSACTION_ABORTED';

export interface FieldIssue {
    field: string;
    message: string;
    value?: unknown;
}

export class GenomicsError extends Error {
    readonly code: GenomicsErrorCode;
    readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        code: GenomicsErrorCode,
        context?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'GenomicsError';
        this.code = code;
        this.context = context;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            context: this.context,
        };
    }
}

/**
 * Malformed or out-of-range input. Carries every offending field so a row
 * can be reported once with all of its problems.
 */
export class ValidationError extends GenomicsError {
    readonly issues: FieldIssue[];

    constructor(issues: FieldIssue[], context?: Record<string, unknown>) {
        super(ValidationError.describe(issues), 'VALIDATION_FAILED', context);
        this.name = 'ValidationError';
        this.issues = issues;
    }

    static single(field: string, message: string, value?: unknown): ValidationError {
        return new ValidationError([value === undefined ? { field, message } : { field, message, value }]);
    }

    private static describe(issues: FieldIssue[]): string {
        if (issues.length === 0) {
            return 'Validation failed';
        }
        return issues.map(issue => `${issue.field}: ${issue.message}`).join('; ');
    }
}

export class DuplicateError extends GenomicsError {
    readonly kind: string;
    readonly id: string;

    constructor(kind: string, id: string) {
        super(`${kind} '${id}' already exists (use the replace flag to supersede it)`, 'DUPLICATE_RECORD', { kind, id });
        this.name = 'DuplicateError';
        this.kind = kind;
        this.id = id;
    }
}

export class NotFoundError extends GenomicsError {
    readonly kind: string;
    readonly id: string;

    constructor(kind: string, id: string) {
        super(`${kind} '${id}' not found`, 'NOT_FOUND', { kind, id });
        this.name = 'NotFoundError';
        this.kind = kind;
        this.id = id;
    }
}

export class ConstraintViolation extends GenomicsError {
    constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, 'CONSTRAINT_VIOLATION', context, options);
        this.name = 'ConstraintViolation';
    }
}

export class StorageUnavailable extends GenomicsError {
    readonly backend: string;

    constructor(backend: string, message: string, options?: { cause?: unknown }) {
        super(`${backend} storage unavailable: ${message}`, 'STORAGE_UNAVAILABLE', { backend }, options);
        this.name = 'StorageUnavailable';
        this.backend = backend;
    }
}

export class TransactionAborted extends GenomicsError {
    readonly failedIndex: number;

    constructor(failedIndex: number, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Transaction rolled back at operation ${failedIndex}: ${reason}`, 'TRANSACTION_ABORTED', { failedIndex }, { cause });
        this.name = 'TransactionAborted';
        this.failedIndex = failedIndex;
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** The `code` property Node and native drivers attach to their errors. */
export function errorCode(error: unknown): string | undefined {
    // Node core errors fail `instanceof Error` when raised in another realm (a vm context, a Jest sandbox).
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
