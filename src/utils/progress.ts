import cliProgress from 'cli-progress';
import chalk from 'chalk';
import type { ImportProgress, ImportReport, RecordImporter } from '../parser/record-importer.js';

interface RowTally {
    processed: number;
    failed: number;
    rowsPerSecond: number;
}

const BAR_FORMAT = ' {status} {bar} | {percentage}% | {value}/{total} rows | {speed} rows/s | {failed} failed';

/**
 * Console progress for a CSV import: one bar over the row count, with
 * imported/failed tallies, fed by a RecordImporter's events.
 */
export class ImportProgressDisplay {
    private readonly bar: cliProgress.SingleBar;
    private readonly title: string;
    private readonly startedAt = Date.now();
    private tally: RowTally = { processed: 0, failed: 0, rowsPerSecond: 0 };
    private stopped = false;

    constructor(filePath: string, totalRows: number) {
        this.title = chalk.blue(`📥 Importing ${filePath}`);
        this.bar = new cliProgress.SingleBar({
            format: BAR_FORMAT,
            clearOnComplete: false,
            hideCursor: true,
            barCompleteChar: '█',
            barIncompleteChar: '░',
        }, cliProgress.Presets.shades_grey);
        this.bar.start(Math.max(totalRows, 1), 0, this.payload(this.title));
    }

    attach(importer: RecordImporter): void {
        importer.on('progress', (progress: ImportProgress) => {
            this.tally = { processed: progress.processed, failed: progress.failed, rowsPerSecond: progress.rate };
            this.bar.update(progress.processed, this.payload(this.title));
        });
        importer.on('complete', (report: ImportReport) => {
            const seconds = Math.max((Date.now() - this.startedAt) / 1000, 0.001);
            this.tally = { processed: report.total, failed: report.failed, rowsPerSecond: report.total / seconds };
            // A stopOnFirstError run ends short of the row count.
            this.bar.setTotal(Math.max(report.total, 1));
            this.bar.update(report.total, this.payload(
                chalk.green(`✅ Imported ${report.imported} of ${report.total} rows`)
            ));
        });
    }

    fail(error: string): void {
        this.bar.update(this.tally.processed, this.payload(chalk.red(`❌ Import failed: ${error}`)));
    }

    stop(): void {
        if (this.stopped) return;
        this.stopped = true;
        this.bar.stop();
    }

    private payload(status: string): Record<string, string | number> {
        return {
            status,
            speed: Math.round(this.tally.rowsPerSecond),
            failed: this.tally.failed > 0 ? chalk.red(String(this.tally.failed)) : 0,
        };
    }
}
