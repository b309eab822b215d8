export * from './types/index.js';
export * from './types/comparison.js';
export * from './core/errors.js';
export { SchemaComparator, diffSchema, sharedColumns } from './core/comparator.js';
export { RowDiffer, diffRows, buildRowKey, keyToken } from './core/row-differ.js';
export type { RowDiffOptions, RowDiffResult, RowSource } from './core/row-differ.js';
export { ComparisonOrchestrator, failedResult } from './core/orchestrator.js';
export { compareTables, DEFAULT_CONCURRENCY } from './core/batch.js';
export type { BatchCompareOptions } from './core/batch.js';
export { toReport, summarize, formatKey } from './core/report.js';
export type { ComparisonReport, ComparisonSummary } from './core/report.js';
export { SchemaInspector } from './inspector/inspector.js';
export { normalizeType, sameType, describeType, isOrderable } from './inspector/type-taxonomy.js';
export { RowExtractor, DEFAULT_BATCH_SIZE } from './extractor/extractor.js';
export type { ExtractOptions } from './extractor/extractor.js';
export { canonicalize, normalizeDecimal, valueToken, valuesEqual } from './extractor/canonical.js';
export { EngineFactory } from './engines/factory.js';
export type { DbRow, FetchRowsOptions, IDbConnection, ITableSource, QueryParam } from './engines/interfaces.js';
export { OracleSource } from './engines/oracle/OracleSource.js';
export { PostgresSource } from './engines/postgres/PostgresSource.js';
export {
  ConfigError,
  getEnvironment,
  listEnvironments,
  loadCategories,
  loadSettings,
  resolveTables,
} from './config/config.js';
export { ComparisonExporter, flattenDifferences } from './utils/exporter.js';
