import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ErrorCode,
    GetPromptRequestSchema,
    ListPromptsRequestSchema,
    ListResourcesRequestSchema,
    ListToolsRequestSchema,
    McpError,
    ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { expressionBand } from '../classifier/mutation-classifier.js';
import { GenomicsError } from '../model/errors.js';
import { createGeneRecord } from '../model/records.js';
import { QueryEngine, toReportTable } from '../query/query-engine.js';
import { Filters, RecordFilter, RecordFilterSchema } from '../query/record-filter.js';
import { GenomicRegistry } from '../registry/genomic-registry.js';

export type ToolResult = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};

export interface GenomicsMcpServerOptions {
    registry: GenomicRegistry;
    queryEngine?: QueryEngine;
}

const GetPatientArgs = z.object({
    patient_id: z.string().min(1),
    include_mutations: z.boolean().default(true),
});

const FindPatientsArgs = z.object({
    filter: RecordFilterSchema.optional(),
    diagnosis: z.string().min(1).optional(),
    limit: z.number().int().positive().default(50),
});

const MutationReportArgs = z.object({
    filter: RecordFilterSchema.optional(),
    top_n: z.number().int().positive().optional(),
});

const ClassifyGeneArgs = z.object({
    patient_id: z.string().min(1),
    gene_id: z.string().min(1),
    expression: z.number().finite(),
    sequence: z.string().min(1).optional(),
});

const CatalogInfoArgs = z.object({
    gene_id: z.string().min(1).optional(),
});

const FILTER_DESCRIPTION = `Record filter as JSON. Composite nodes: {"op":"and","filters":[...]}, {"op":"or","filters":[...]}, {"op":"not","filter":{...}}.
Leaves: {"op":"patient","ids":[...]}, {"op":"sex","values":["female"]}, {"op":"stage","values":["II"]}, {"op":"age","min":40,"max":60},
{"op":"diagnosis","value":"Breast Cancer"}, {"op":"gene","ids":["TP53"]}, {"op":"classification","values":["pathogenic"]},
{"op":"mutationType","values":["substitution"]}, {"op":"expression","min":0,"max":2}.`;

function text(value: unknown): ToolResult {
    return { content: [{ type: 'text', text: typeof value === 'string' ? value : JSON.stringify(value, null, 2) }] };
}

export class GenomicsMcpServer {
    private server: Server;
    private registry: GenomicRegistry;
    private queryEngine: QueryEngine;

    constructor(options: GenomicsMcpServerOptions) {
        this.registry = options.registry;
        this.queryEngine = options.queryEngine ?? new QueryEngine(options.registry.store);
        this.server = new Server(
            {
                name: 'genomic-records',
                version: '1.0.0',
            },
            {
                capabilities: {
                    resources: {},
                    tools: {},
                    prompts: {},
                },
            }
        );

        this.setupHandlers();
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => {
            return {
                tools: [
                    {
                        name: 'get_patient',
                        description: 'Get a patient with their gene records and the current mutation classification of each gene.',
                        inputSchema: {
                            type: 'object',
                            properties: {
                                patient_id: { type: 'string', description: 'Patient identifier' },
                                include_mutations: { type: 'boolean', description: 'Include gene records and mutations (default: true)' },
                            },
                            required: ['patient_id'],
                        },
                    },
                    {
                        name: 'find_patients',
                        description: `Find patients matching a filter or a diagnosis (case-insensitive).

${FILTER_DESCRIPTION}`,
                        inputSchema: {
                            type: 'object',
                            properties: {
                                filter: { type: 'object', description: 'Record filter' },
                                diagnosis: { type: 'string', description: 'Diagnosis, e.g. "Breast Cancer"' },
                                limit: { type: 'number', description: 'Maximum number of patients (default: 50)' },
                            },
                        },
                    },
                    {
                        name: 'mutation_report',
                        description: `Aggregate report over matching records: classification counts, expression mean and population variance per gene, most frequently mutated genes, and match totals.

${FILTER_DESCRIPTION}`,
                        inputSchema: {
                            type: 'object',
                            properties: {
                                filter: { type: 'object', description: 'Record filter (default: all records)' },
                                top_n: { type: 'number', description: 'Number of genes in the most-mutated ranking' },
                            },
                        },
                    },
                    {
                        name: 'classify_gene',
                        description: 'Classify a gene observation against the reference catalog without storing it.',
                        inputSchema: {
                            type: 'object',
                            properties: {
                                patient_id: { type: 'string', description: 'Patient identifier' },
                                gene_id: { type: 'string', description: 'Gene symbol, e.g. "TP53"' },
                                expression: { type: 'number', description: 'Expression value' },
                                sequence: { type: 'string', description: 'Optional raw sequence (A, C, G, T)' },
                            },
                            required: ['patient_id', 'gene_id', 'expression'],
                        },
                    },
                    {
                        name: 'catalog_info',
                        description: 'Describe the reference catalog, or one gene entry with its tolerance band.',
                        inputSchema: {
                            type: 'object',
                            properties: {
                                gene_id: { type: 'string', description: 'Gene symbol (optional)' },
                            },
                        },
                    },
                ],
            };
        });

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            return this.callTool(name, args ?? {});
        });

        this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
            return {
                resources: [
                    {
                        uri: 'genomics://store/stats',
                        name: 'Store Statistics',
                        description: 'Record counts of the active store',
                        mimeType: 'application/json',
                    },
                    {
                        uri: 'genomics://catalog/summary',
                        name: 'Reference Catalog',
                        description: 'Name, version and genes of the active reference catalog',
                        mimeType: 'application/json',
                    },
                ],
            };
        });

        this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
            const { uri } = request.params;
            switch (uri) {
                case 'genomics://store/stats':
                    return this.resource(uri, { backend: this.registry.store.backend, ...this.registry.store.stats() });
                case 'genomics://catalog/summary':
                    return this.resource(uri, this.registry.catalog.summary());
                default:
                    throw new McpError(ErrorCode.InvalidRequest, `Unknown resource URI: ${uri}`);
            }
        });

        this.server.setRequestHandler(ListPromptsRequestSchema, async () => {
            return {
                prompts: [
                    {
                        name: 'cohort_summary',
                        description: 'Summarise the mutation landscape of a diagnosis cohort',
                        arguments: [
                            {
                                name: 'diagnosis',
                                description: 'Diagnosis to summarise, e.g. "Breast Cancer"',
                                required: true,
                            },
                        ],
                    },
                ],
            };
        });

        this.server.setRequestHandler(GetPromptRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            if (name !== 'cohort_summary') {
                throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${name}`);
            }
            const diagnosis = args?.diagnosis ?? 'all diagnoses';
            return {
                description: 'Summarise the mutation landscape of a cohort',
                messages: [
                    {
                        role: 'user' as const,
                        content: {
                            type: 'text' as const,
                            text: `Summarise the cohort of patients diagnosed with ${diagnosis}. Use find_patients with the diagnosis, then mutation_report with a {"op":"diagnosis"} filter. Report:
1. How many patients and gene records match
2. The classification breakdown
3. The most frequently mutated genes
4. Genes whose mean expression sits outside the catalog band (use catalog_info)

Classifications are derived from a reference catalog and are not a clinical diagnosis.`,
                        },
                    },
                ],
            };
        });
    }

    /**
     * Runs one tool. Malformed arguments raise `McpError(InvalidParams)`;
     * domain failures come back as an error result the model can read.
     */
    async callTool(name: string, args: unknown): Promise<ToolResult> {
        try {
            switch (name) {
                case 'get_patient':
                    return this.getPatient(GetPatientArgs.parse(args));
                case 'find_patients':
                    return this.findPatients(FindPatientsArgs.parse(args));
                case 'mutation_report':
                    return this.mutationReport(MutationReportArgs.parse(args));
                case 'classify_gene':
                    return this.classifyGene(ClassifyGeneArgs.parse(args));
                case 'catalog_info':
                    return this.catalogInfo(CatalogInfoArgs.parse(args));
                default:
                    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
            }
        } catch (error) {
            if (error instanceof McpError) {
                throw error;
            }
            if (error instanceof z.ZodError) {
                throw new McpError(
                    ErrorCode.InvalidParams,
                    `Invalid arguments for ${name}: ${error.errors.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ')}`
                );
            }
            if (error instanceof GenomicsError) {
                return { ...text(`Error executing tool ${name}: ${error.message}`), isError: true };
            }
            throw error;
        }
    }

    private getPatient(args: z.infer<typeof GetPatientArgs>): ToolResult {
        const patient = this.registry.getPatient(args.patient_id);
        if (!args.include_mutations) {
            return text(patient);
        }
        const genes = patient.geneRecordIds.map(id => {
            const geneRecord = this.registry.getGeneRecord(id);
            const mutation = this.registry.getMutation(id);
            return {
                geneId: geneRecord.geneId,
                expression: geneRecord.expression,
                sequence: geneRecord.sequence,
                mutation: mutation && {
                    mutationType: mutation.mutationType,
                    classification: mutation.classification,
                    evidence: mutation.evidence,
                    variants: mutation.variants,
                    catalogVersion: mutation.catalogVersion,
                },
            };
        });
        return text({ ...patient, genes });
    }

    private findPatients(args: z.infer<typeof FindPatientsArgs>): ToolResult {
        const parts: RecordFilter[] = [];
        if (args.filter) parts.push(args.filter);
        if (args.diagnosis) parts.push(Filters.diagnosis(args.diagnosis));

        const patients = this.queryEngine.findPatients(Filters.and(...parts));
        return text({
            total: patients.length,
            patients: patients.slice(0, args.limit),
        });
    }

    private mutationReport(args: z.infer<typeof MutationReportArgs>): ToolResult {
        const result = this.queryEngine.query(args.filter ?? Filters.all(), { topN: args.top_n });
        return text(toReportTable(result));
    }

    private classifyGene(args: z.infer<typeof ClassifyGeneArgs>): ToolResult {
        const geneRecord = createGeneRecord({
            patientId: args.patient_id,
            geneId: args.gene_id,
            expression: args.expression,
            sequence: args.sequence,
        });
        const mutation = this.registry.classifier.classify(geneRecord, this.registry.catalog);
        return text({
            geneRecordId: geneRecord.id,
            mutationType: mutation.mutationType,
            classification: mutation.classification,
            evidence: mutation.evidence,
            position: mutation.position,
            variants: mutation.variants,
            ruleVersion: mutation.ruleVersion,
            catalogVersion: mutation.catalogVersion,
            stored: false,
        });
    }

    private catalogInfo(args: z.infer<typeof CatalogInfoArgs>): ToolResult {
        const catalog = this.registry.catalog;
        if (args.gene_id === undefined) {
            return text(catalog.summary());
        }
        const entry = catalog.lookup(args.gene_id);
        if (!entry) {
            return text(`Gene ${args.gene_id} is not in catalog ${catalog.name}@${catalog.version}`);
        }
        return text({
            ...entry,
            oncogene: catalog.isOncogene(entry.geneId),
            toleranceBand: expressionBand(entry, this.registry.classifier.options.tolerance),
        });
    }

    private resource(uri: string, value: unknown) {
        return {
            contents: [
                {
                    uri,
                    mimeType: 'application/json',
                    text: JSON.stringify(value, null, 2),
                },
            ],
        };
    }

    async start(): Promise<void> {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        console.error('🧬 Genomic records MCP server started');
        console.error(`✅ Serving ${this.registry.store.backend} store with catalog ${this.registry.catalog.name}@${this.registry.catalog.version}`);
    }
}
