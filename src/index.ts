export * from './model/errors.js';
export * from './model/records.js';
export { ReferenceCatalog } from './catalog/reference-catalog.js';
export type { CatalogEntry, CatalogSummary, CatalogDefinition } from './catalog/reference-catalog.js';
export { MutationClassifier, classify, expressionBand } from './classifier/mutation-classifier.js';
export type { ClassifierOptions, ExpressionBand } from './classifier/mutation-classifier.js';
export { compareSequences } from './classifier/sequence-diff.js';
export type { SequenceComparison } from './classifier/sequence-diff.js';
export { validate, validateBatch, collectFailures } from './validation/validation-engine.js';
export type { RowOutcome, ValidatedRow, ValidationFailure, DuplicateLookup } from './validation/validation-engine.js';
export type { RawRow } from './validation/field-coercion.js';
export * from './storage/index.js';
export { QueryEngine, toReportTable } from './query/query-engine.js';
export type { QueryResult, ReportTable } from './query/query-engine.js';
export { Filters, parseFilter, matchesFilter } from './query/record-filter.js';
export type { RecordFilter } from './query/record-filter.js';
export { GenomicRegistry } from './registry/genomic-registry.js';
export type { IngestResult, ReclassifyReport } from './registry/genomic-registry.js';
export { CsvRowReader, CsvTokenizer, expandWideRow } from './parser/csv-parser.js';
export { RecordImporter } from './parser/record-importer.js';
export type { ImportReport, RowReport } from './parser/record-importer.js';
export { GenomicsMcpServer } from './mcp-server/server.js';
export { ImportProgressDisplay } from './utils/progress.js';
export { config } from './config/index.js';
