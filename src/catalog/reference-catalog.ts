/**
 * Reference catalog: the expected sequence, expression range and known
 * pathogenic variants for each gene the classifier knows about.
 *
 * A catalog is immutable once loaded. Its `version` is a digest of its content,
 * so every mutation record can say which catalog produced it.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { stableHash } from '../model/canonical.js';
import { normalizeGeneId } from '../model/records.js';
import { StorageUnavailable, ValidationError } from '../model/errors.js';

const CatalogGeneSchema = z.object({
    geneId: z.string().min(1),
    description: z.string().optional(),
    referenceSequence: z.string().regex(/^[ACGTacgt]+$/, 'reference sequence must contain only A, C, G and T').optional(),
    expectedExpression: z
        .tuple([z.number().finite(), z.number().finite()])
        .refine(([min, max]) => min <= max, 'expected expression range must be [min, max] with min <= max')
        .optional(),
    pathogenicVariants: z.array(z.string().min(1)).optional(),
});

export const CatalogDefinitionSchema = z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    oncogenes: z.array(z.string().min(1)).default([]),
    genes: z.array(CatalogGeneSchema),
});

export type CatalogDefinition = z.input<typeof CatalogDefinitionSchema>;

export interface CatalogEntry {
    geneId: string;
    description?: string;
    referenceSequence?: string;
    expectedExpression?: { min: number; max: number };
    pathogenicVariants: string[];
}

export interface CatalogSummary {
    name: string;
    version: string;
    geneCount: number;
    oncogenes: string[];
    genes: string[];
}

function parseCatalogDefinition(definition: unknown): z.output<typeof CatalogDefinitionSchema> {
    const parsed = CatalogDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
        throw new ValidationError(
            parsed.error.errors.map(issue => ({ field: `catalog.${issue.path.join('.')}`, message: issue.message })),
            { kind: 'catalog' }
        );
    }
    return parsed.data;
}

export class ReferenceCatalog {
    readonly name: string;
    readonly version: string;
    private readonly entries: Map<string, CatalogEntry> = new Map();
    private readonly oncogenes: Set<string>;

    constructor(definition: CatalogDefinition) {
        const parsed = parseCatalogDefinition(definition);
        this.name = parsed.name;
        this.oncogenes = new Set(parsed.oncogenes.map(normalizeGeneId));

        for (const gene of parsed.genes) {
            const geneId = normalizeGeneId(gene.geneId);
            if (this.entries.has(geneId)) {
                throw ValidationError.single(`catalog.genes.${geneId}`, 'gene listed more than once');
            }
            const entry: CatalogEntry = {
                geneId,
                pathogenicVariants: [...new Set(gene.pathogenicVariants ?? [])].sort(),
            };
            if (gene.description !== undefined) entry.description = gene.description;
            if (gene.referenceSequence !== undefined) entry.referenceSequence = gene.referenceSequence.toUpperCase();
            if (gene.expectedExpression !== undefined) {
                entry.expectedExpression = { min: gene.expectedExpression[0], max: gene.expectedExpression[1] };
            }
            this.entries.set(geneId, entry);
        }

        this.version = stableHash({
            oncogenes: [...this.oncogenes].sort(),
            genes: [...this.entries.values()].sort((a, b) => (a.geneId < b.geneId ? -1 : 1)),
        }).slice(0, 16);
    }

    static fromFile(filePath: string): ReferenceCatalog {
        let raw: string;
        try {
            raw = fs.readFileSync(filePath, 'utf-8');
        } catch (error) {
            throw new StorageUnavailable('catalog', `cannot read reference catalog at ${filePath}`, { cause: error });
        }

        let definition: unknown;
        try {
            definition = JSON.parse(raw);
        } catch (error) {
            throw ValidationError.single('catalog', `reference catalog at ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
        }
        return ReferenceCatalog.fromJSON(definition);
    }

    static fromJSON(definition: unknown): ReferenceCatalog {
        return new ReferenceCatalog(parseCatalogDefinition(definition));
    }

    lookup(geneId: string): CatalogEntry | undefined {
        return this.entries.get(normalizeGeneId(geneId));
    }

    has(geneId: string): boolean {
        return this.entries.has(normalizeGeneId(geneId));
    }

    isOncogene(geneId: string): boolean {
        return this.oncogenes.has(normalizeGeneId(geneId));
    }

    geneIds(): string[] {
        return [...this.entries.keys()].sort();
    }

    get size(): number {
        return this.entries.size;
    }

    summary(): CatalogSummary {
        return {
            name: this.name,
            version: this.version,
            geneCount: this.entries.size,
            oncogenes: [...this.oncogenes].sort(),
            genes: this.geneIds(),
        };
    }
}
