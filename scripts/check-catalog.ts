#!/usr/bin/env npx tsx
import chalk from 'chalk';
import { ReferenceCatalog } from '../src/catalog/reference-catalog.js';
import { config } from '../src/config/index.js';
import { describeError, ValidationError } from '../src/model/errors.js';

function checkCatalog(filePath: string): void {
    try {
        console.log(chalk.blue(`📚 Checking reference catalog ${filePath}...`));

        const catalog = ReferenceCatalog.fromFile(filePath);
        const summary = catalog.summary();
        console.log(chalk.green(`✅ ${summary.name} loaded (version ${summary.version})`));
        console.log(chalk.gray(`  Genes: ${summary.geneCount}`));
        console.log(chalk.gray(`  Oncogenes: ${summary.oncogenes.join(', ') || 'none'}`));

        const withoutSequence = summary.genes.filter(gene => !catalog.lookup(gene)?.referenceSequence);
        const withoutRange = summary.genes.filter(gene => !catalog.lookup(gene)?.expectedExpression);
        const uncatalogedOncogenes = summary.oncogenes.filter(gene => !catalog.has(gene));

        if (withoutSequence.length > 0) {
            console.log(chalk.yellow(`⚠️  No reference sequence (expression-only classification): ${withoutSequence.join(', ')}`));
        }
        if (withoutRange.length > 0) {
            console.log(chalk.yellow(`⚠️  No expected expression range: ${withoutRange.join(', ')}`));
        }
        if (uncatalogedOncogenes.length > 0) {
            console.log(chalk.yellow(`⚠️  Oncogenes without a catalog entry: ${uncatalogedOncogenes.join(', ')}`));
        }
    } catch (error) {
        console.error(chalk.red('❌ Error:'), describeError(error));
        if (error instanceof ValidationError) {
            error.issues.forEach(issue => console.error(chalk.red(`  • ${issue.field}: ${issue.message}`)));
        }
        process.exit(1);
    }
}

checkCatalog(process.argv[2] ?? config.catalog.path);
