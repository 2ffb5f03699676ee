#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import path from 'path';
import { existsSync } from 'fs';
import { config, StorageBackend } from '../config/index.js';
import { ReferenceCatalog } from '../catalog/reference-catalog.js';
import { MutationClassifier } from '../classifier/mutation-classifier.js';
import { GenomicsMcpServer } from '../mcp-server/server.js';
import { describeError, ValidationError } from '../model/errors.js';
import { isClinicalStage, isSex, Patient, PatientInput } from '../model/records.js';
import { CsvRowReader, expandWideRow } from '../parser/csv-parser.js';
import { ImportReport, RecordImporter } from '../parser/record-importer.js';
import { QueryEngine, toReportTable } from '../query/query-engine.js';
import { Filters, parseFilter, RecordFilter } from '../query/record-filter.js';
import { GenomicRegistry } from '../registry/genomic-registry.js';
import { copyDataset, createStore } from '../storage/index.js';
import { ImportProgressDisplay } from '../utils/progress.js';

type GlobalOptions = {
    backend: string;
    store?: string;
    catalog: string;
};

interface Session {
    registry: GenomicRegistry;
    queryEngine: QueryEngine;
    close(): void;
}

const program = new Command();

program
    .name('genomics')
    .description('Cancer genomic record store with mutation classification and LLM query tools')
    .version('1.0.0')
    .option('-b, --backend <backend>', 'Storage backend (sqlite or json-file)', config.storage.backend)
    .option('-s, --store <path>', 'SQLite database or JSON document path (defaults per backend)')
    .option('-c, --catalog <path>', 'Reference catalog JSON', config.catalog.path);

function parseBackend(value: string): StorageBackend {
    if (value === 'sqlite' || value === 'json-file') {
        return value;
    }
    throw ValidationError.single('backend', "must be 'sqlite' or 'json-file'", value);
}

function parsePositiveInt(field: string, value: string): number {
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 1) {
        throw ValidationError.single(field, 'must be a positive integer', value);
    }
    return parsed;
}

function openSession(): Session {
    const options = program.opts<GlobalOptions>();
    const store = createStore({ backend: parseBackend(options.backend), location: options.store });
    const catalog = ReferenceCatalog.fromFile(options.catalog);
    const registry = new GenomicRegistry({ store, catalog, classifier: new MutationClassifier() });
    return {
        registry,
        queryEngine: new QueryEngine(store),
        close: () => store.close(),
    };
}

/** Runs a command body against an open session and turns failures into exit code 1. */
async function withSession(work: (session: Session) => Promise<void> | void): Promise<void> {
    let session: Session | undefined;
    try {
        session = openSession();
        await work(session);
    } catch (error) {
        console.error(chalk.red('❌ Error:'), describeError(error));
        if (error instanceof ValidationError) {
            for (const issue of error.issues) {
                console.error(chalk.red(`   • ${issue.field}: ${issue.message}`));
            }
        }
        process.exitCode = 1;
    } finally {
        session?.close();
    }
}

function printPatient(patient: Patient, registry: GenomicRegistry): void {
    console.log(chalk.green(`👤 ${patient.id}${patient.name ? ` (${patient.name})` : ''}`));
    console.log(chalk.gray(`   Age: ${patient.age ?? 'N/A'} | Sex: ${patient.sex ?? 'N/A'} | Stage: ${patient.stage ?? 'N/A'}`));
    console.log(chalk.gray(`   Diagnosis: ${patient.diagnosis ?? 'N/A'}`));

    for (const geneRecordId of patient.geneRecordIds) {
        const geneRecord = registry.getGeneRecord(geneRecordId);
        const mutation = registry.getMutation(geneRecordId);
        const label = mutation
            ? `${mutation.classification} (${mutation.mutationType}, ${mutation.evidence})`
            : 'unclassified';
        const variants = mutation?.variants?.length ? ` [${mutation.variants.join(', ')}]` : '';
        console.log(chalk.gray(`   🧬 ${geneRecord.geneId.padEnd(8)} expression ${geneRecord.expression} → ${label}${variants}`));
    }
}

// Import command
program
    .command('import')
    .description('Import patient and gene rows from a CSV file (.csv or .csv.gz)')
    .argument('<file>', 'CSV file path')
    .option('--replace', 'Supersede existing (patient, gene) records', false)
    .option('--stop-on-error', 'Stop at the first invalid row', false)
    .option('--wide', 'One column per gene with expression values in the cells', false)
    .option('-d, --delimiter <char>', 'Field delimiter', ',')
    .action(async (file: string, options: { replace: boolean; stopOnError: boolean; wide: boolean; delimiter: string }) => {
        await withSession(async ({ registry }) => {
            console.log(chalk.blue('🧬 Starting import...'));

            if (!existsSync(file)) {
                throw new Error(`File not found: ${file}`);
            }
            console.log(chalk.gray(`📁 File: ${file}`));
            console.log(chalk.gray(`🗄️  Backend: ${registry.store.backend}`));

            const reader = new CsvRowReader({ delimiter: options.delimiter });
            reader.on('warning', (message: string) => console.warn(chalk.yellow(`⚠️  ${message}`)));
            const rows = await reader.readFile(file);
            const longRows = options.wide ? rows.flatMap(row => expandWideRow(row)) : rows;

            const importer = new RecordImporter(registry);
            const progress = new ImportProgressDisplay(path.basename(file), longRows.length);
            progress.attach(importer);

            let report: ImportReport;
            try {
                report = importer.importRows(longRows, { replace: options.replace, stopOnFirstError: options.stopOnError });
            } catch (error) {
                progress.fail(describeError(error));
                progress.stop();
                throw error;
            }
            progress.stop();

            console.log(chalk.green(`✅ Import complete!`));
            console.log(chalk.gray(`📊 Rows: ${report.total} | Imported: ${report.imported} | Failed: ${report.failed}`));
            console.log(chalk.gray(`⏱️  Time: ${(report.elapsedMs / 1000).toFixed(1)}s`));
            if (report.stopped) {
                console.log(chalk.yellow('⚠️  Stopped at the first invalid row'));
            }
            for (const row of report.rows) {
                if (row.status === 'failed' && row.error) {
                    console.log(chalk.red(`   Row ${row.rowNumber}: [${row.error.code}] ${row.error.message}`));
                }
            }
        });
    });

// Patient commands
const patientCommand = program
    .command('patient')
    .description('Patient record commands');

patientCommand
    .command('show')
    .description('Show a patient with gene records and classifications')
    .argument('<id>', 'Patient identifier')
    .action(async (id: string) => {
        await withSession(({ registry }) => {
            printPatient(registry.getPatient(id), registry);
        });
    });

patientCommand
    .command('add')
    .description('Add a patient (or replace demographics with --replace)')
    .argument('<id>', 'Patient identifier')
    .option('--name <name>', 'Patient name')
    .option('--age <age>', 'Age in years')
    .option('--sex <sex>', 'female, male, other or unknown')
    .option('--stage <stage>', 'Clinical stage 0, I, II, III or IV')
    .option('--diagnosis <diagnosis>', 'Diagnosis')
    .option('--replace', 'Replace an existing patient', false)
    .action(async (id: string, options: { name?: string; age?: string; sex?: string; stage?: string; diagnosis?: string; replace: boolean }) => {
        await withSession(({ registry }) => {
            const input: PatientInput = { id, name: options.name, diagnosis: options.diagnosis };
            if (options.age !== undefined) {
                input.age = Number(options.age);
            }
            if (options.sex !== undefined) {
                if (!isSex(options.sex)) throw ValidationError.single('sex', 'must be female, male, other or unknown', options.sex);
                input.sex = options.sex;
            }
            if (options.stage !== undefined) {
                if (!isClinicalStage(options.stage)) throw ValidationError.single('stage', 'must be 0, I, II, III or IV', options.stage);
                input.stage = options.stage;
            }

            const patient = registry.addPatient(input, { replace: options.replace });
            console.log(chalk.green(`✅ Saved patient ${patient.id}`));
        });
    });

patientCommand
    .command('delete')
    .description('Delete a patient with all gene and mutation records')
    .argument('<id>', 'Patient identifier')
    .action(async (id: string) => {
        await withSession(({ registry }) => {
            const patient = registry.getPatient(id);
            registry.deletePatient(id);
            console.log(chalk.green(`🗑️  Deleted patient ${id} and ${patient.geneRecordIds.length} gene records`));
        });
    });

patientCommand
    .command('find')
    .description('List patients matching a diagnosis or filter')
    .option('--diagnosis <diagnosis>', 'Diagnosis (case-insensitive)')
    .option('--filter <json>', 'Record filter as JSON')
    .action(async (options: { diagnosis?: string; filter?: string }) => {
        await withSession(({ queryEngine }) => {
            const parts: RecordFilter[] = [];
            if (options.filter) parts.push(parseFilter(options.filter));
            if (options.diagnosis) parts.push(Filters.diagnosis(options.diagnosis));

            const patients = queryEngine.findPatients(Filters.and(...parts));
            console.log(chalk.blue(`📊 Found ${patients.length} patients`));
            console.log('─'.repeat(60));
            for (const patient of patients) {
                console.log(chalk.green(`${patient.id.padEnd(12)} ${patient.name ?? ''}`));
                console.log(chalk.gray(`  ${patient.diagnosis ?? 'N/A'} | age ${patient.age ?? 'N/A'} | ${patient.geneRecordIds.length} genes`));
            }
        });
    });

// Report command
program
    .command('report')
    .description('Aggregate classification, expression and mutation statistics')
    .option('--filter <json>', 'Record filter as JSON')
    .option('--diagnosis <diagnosis>', 'Restrict to one diagnosis')
    .option('-t, --top <n>', 'Number of most-mutated genes', String(config.reporting.topN))
    .option('--json', 'Print the report table as JSON', false)
    .action(async (options: { filter?: string; diagnosis?: string; top: string; json: boolean }) => {
        await withSession(({ queryEngine }) => {
            const parts: RecordFilter[] = [];
            if (options.filter) parts.push(parseFilter(options.filter));
            if (options.diagnosis) parts.push(Filters.diagnosis(options.diagnosis));

            const result = queryEngine.query(Filters.and(...parts), { topN: parsePositiveInt('top', options.top) });
            const table = toReportTable(result);

            if (options.json) {
                console.log(JSON.stringify(table, null, 2));
                return;
            }

            for (const [label, entries] of Object.entries(table)) {
                console.log(chalk.blue(`📊 ${label}`));
                for (const { key, value } of entries) {
                    const shown = Number.isInteger(value) ? String(value) : value.toFixed(4);
                    console.log(chalk.gray(`   ${key.padEnd(20)} ${shown}`));
                }
            }
        });
    });

// Reclassify command
program
    .command('reclassify')
    .description('Re-derive mutation records produced by another catalog or rule set')
    .option('--catalog <path>', 'Install this reference catalog before re-classifying')
    .action(async (options: { catalog?: string }) => {
        await withSession(({ registry }) => {
            const report = options.catalog
                ? registry.swapCatalog(ReferenceCatalog.fromFile(options.catalog))
                : registry.reclassifyStale();
            console.log(chalk.green(`✅ Re-derived ${report.updated.length} of ${report.examined} mutation records`));
            console.log(chalk.gray(`   Catalog ${report.catalogVersion} | Rules ${report.ruleVersion}`));
        });
    });

// Copy-store command
program
    .command('copy-store')
    .description('Copy every record into an empty store on another backend')
    .requiredOption('--to <backend>', 'Target backend (sqlite or json-file)')
    .option('--location <path>', 'Target database or document path')
    .action(async (options: { to: string; location?: string }) => {
        await withSession(({ registry }) => {
            const target = createStore({ backend: parseBackend(options.to), location: options.location });
            try {
                const result = copyDataset(registry.store, target);
                if (result.status === 'rolled-back') {
                    throw result.error;
                }
            } finally {
                target.close();
            }
        });
    });

// Catalog command
program
    .command('catalog')
    .description('Show the reference catalog or one of its genes')
    .argument('[gene]', 'Gene symbol')
    .action(async (gene: string | undefined) => {
        await withSession(({ registry }) => {
            const catalog = registry.catalog;
            if (gene === undefined) {
                const summary = catalog.summary();
                console.log(chalk.blue(`📚 ${summary.name} (version ${summary.version})`));
                console.log(chalk.gray(`   ${summary.geneCount} genes: ${summary.genes.join(', ')}`));
                console.log(chalk.gray(`   Oncogenes: ${summary.oncogenes.join(', ')}`));
                return;
            }
            const entry = catalog.lookup(gene);
            if (!entry) {
                console.log(chalk.yellow(`⚠️  ${gene} is not in the catalog`));
                return;
            }
            console.log(chalk.green(`🧬 ${entry.geneId}${catalog.isOncogene(entry.geneId) ? ' (oncogene)' : ''}`));
            if (entry.description) console.log(chalk.gray(`   ${entry.description}`));
            if (entry.expectedExpression) {
                console.log(chalk.gray(`   Expected expression: ${entry.expectedExpression.min} - ${entry.expectedExpression.max}`));
            }
            if (entry.referenceSequence) console.log(chalk.gray(`   Reference: ${entry.referenceSequence}`));
            if (entry.pathogenicVariants.length > 0) {
                console.log(chalk.gray(`   Pathogenic variants: ${entry.pathogenicVariants.join(', ')}`));
            }
        });
    });

// Stats command
program
    .command('stats')
    .description('Show record counts of the store')
    .action(async () => {
        await withSession(({ registry }) => {
            const stats = registry.store.stats();
            console.log(chalk.blue(`📊 ${registry.store.backend} store`));
            console.log('─'.repeat(50));
            console.log(chalk.green(`Patients: ${stats.patients.toLocaleString()}`));
            console.log(chalk.green(`Gene records: ${stats.geneRecords.toLocaleString()}`));
            console.log(chalk.green(`Mutation records: ${stats.mutationRecords.toLocaleString()}`));
        });
    });

// MCP Server command
program
    .command('mcp-server')
    .description('Start MCP server for LLM integration')
    .action(async () => {
        try {
            console.error(chalk.blue('🤖 Starting MCP Server...'));
            const { registry, queryEngine } = openSession();
            const server = new GenomicsMcpServer({ registry, queryEngine });
            await server.start();
        } catch (error) {
            console.error(chalk.red('❌ Error starting MCP server:'), describeError(error));
            process.exit(1);
        }
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red('❌ Error:'), describeError(error));
    process.exit(1);
});
