import { FieldIssue } from '../model/errors.js';
import { CLINICAL_STAGES, ClinicalStage, Sex, isClinicalStage } from '../model/records.js';

export type RawRow = Record<string, unknown>;

export type RowField =
    | 'patientId'
    | 'name'
    | 'age'
    | 'sex'
    | 'stage'
    | 'diagnosis'
    | 'geneId'
    | 'expression'
    | 'sequence';

const FIELD_ALIASES: Array<[RowField, string[]]> = [
    ['patientId', ['patientid', 'patient', 'patientidentifier']],
    ['name', ['name', 'patientname']],
    ['age', ['age', 'ageatdiagnosis']],
    ['sex', ['sex', 'gender']],
    ['stage', ['stage', 'tumorstage', 'clinicalstage']],
    ['diagnosis', ['diagnosis', 'cancertype']],
    ['geneId', ['geneid', 'gene', 'genesymbol', 'hugosymbol']],
    ['expression', ['expression', 'expressionvalue', 'expressionlevel']],
    ['sequence', ['sequence', 'rawsequence']],
];

const ALIAS_LOOKUP: Map<string, RowField> = new Map(
    FIELD_ALIASES.flatMap(([field, aliases]) => aliases.map((alias): [string, RowField] => [alias, field]))
);

export function normalizeFieldName(name: string): string {
    return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function fieldForColumn(column: string): RowField | undefined {
    return ALIAS_LOOKUP.get(normalizeFieldName(column));
}

/**
 * Maps a raw row's columns onto the recognised fields. Unknown columns are
 * ignored; when two columns alias the same field the first one wins.
 */
export function pickFields(row: RawRow): Partial<Record<RowField, unknown>> {
    const picked: Partial<Record<RowField, unknown>> = {};
    for (const [column, value] of Object.entries(row)) {
        const field = fieldForColumn(column);
        if (field && !(field in picked)) {
            picked[field] = value;
        }
    }
    return picked;
}

export function coerceText(field: string, value: unknown, issues: FieldIssue[]): string | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return String(value);
    }
    if (typeof value !== 'string') {
        issues.push({ field, message: 'must be text', value });
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
}

export function coerceNumber(field: string, value: unknown, issues: FieldIssue[]): number | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    let parsed: number;
    if (typeof value === 'number') {
        parsed = value;
    } else if (typeof value === 'string') {
        const trimmed = value.trim();
        if (trimmed === '') {
            return undefined;
        }
        parsed = Number(trimmed);
    } else {
        issues.push({ field, message: 'must be a number', value });
        return undefined;
    }

    if (!Number.isFinite(parsed)) {
        issues.push({ field, message: 'must be a finite number', value });
        return undefined;
    }
    return parsed;
}

const SEX_ALIASES: Map<string, Sex> = new Map([
    ['f', 'female'],
    ['female', 'female'],
    ['woman', 'female'],
    ['m', 'male'],
    ['male', 'male'],
    ['man', 'male'],
    ['o', 'other'],
    ['other', 'other'],
    ['u', 'unknown'],
    ['unknown', 'unknown'],
    ['na', 'unknown'],
]);

export function coerceSex(field: string, value: unknown, issues: FieldIssue[]): Sex | undefined {
    const text = coerceText(field, value, issues);
    if (text === undefined) {
        return undefined;
    }
    const sex = SEX_ALIASES.get(text.toLowerCase());
    if (!sex) {
        issues.push({ field, message: 'must be female, male, other or unknown', value });
        return undefined;
    }
    return sex;
}

const NUMERIC_STAGES: ClinicalStage[] = ['0', 'I', 'II', 'III', 'IV'];

export function coerceStage(field: string, value: unknown, issues: FieldIssue[]): ClinicalStage | undefined {
    if (typeof value === 'number') {
        if (Number.isInteger(value) && value >= 0 && value < NUMERIC_STAGES.length) {
            return NUMERIC_STAGES[value];
        }
        issues.push({ field, message: 'numeric stage must be an integer from 0 to 4', value });
        return undefined;
    }

    const text = coerceText(field, value, issues);
    if (text === undefined) {
        return undefined;
    }
    const stripped = text.replace(/^stage\s*/i, '').toUpperCase();
    if (/^[0-4](\.0+)?$/.test(stripped)) {
        return NUMERIC_STAGES[parseInt(stripped, 10)];
    }
    if (isClinicalStage(stripped)) {
        return stripped;
    }
    issues.push({ field, message: `must be one of ${CLINICAL_STAGES.join(', ')} (or 0-4)`, value });
    return undefined;
}
