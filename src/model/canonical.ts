import { createHash } from 'crypto';

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (value !== null && typeof value === 'object') {
        const sorted: Record<string, unknown> = {};
        const entries = Object.entries(value).sort(([a], [b]) => compareIds(a, b));
        for (const [key, entry] of entries) {
            if (entry !== undefined) {
                sorted[key] = sortKeys(entry);
            }
        }
        return sorted;
    }
    return value;
}

/**
 * JSON with object keys sorted at every level, so that structurally equal
 * values always serialize to the same string.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

export function stableHash(value: unknown): string {
    return createHash('sha256').update(canonicalJson(value)).digest('hex');
}

/** Code-unit ordering shared by every backend and report. */
export function compareIds(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
