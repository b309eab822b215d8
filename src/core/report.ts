import { ComparisonErrorKind, ComparisonResult, ComparisonStatus } from '../types/comparison.js';
import { CanonicalValue, RowKey, RowRecord } from '../types/index.js';

/** JSON shape of a single table's comparison, as served to API consumers. */
export interface ComparisonReport {
  table: string;
  category?: string;
  status: ComparisonStatus;
  key_columns: string[];
  row_counts: { source: number; target: number };
  has_differences: boolean;
  schema_differences: { column: string; issue: string; source?: string; target?: string }[];
  missing_rows: { side: string; key: RowKey; row: RowRecord }[];
  value_mismatches: { key: RowKey; column: string; source_value: CanonicalValue; target_value: CanonicalValue }[];
  duplicate_keys: { side: string; key: RowKey; occurrences: number }[];
  matched_rows: number;
  error?: { kind: ComparisonErrorKind; message: string };
  duration_ms: number;
}

export interface ComparisonSummary {
  tables: number;
  completed: number;
  failed: number;
  cancelled: number;
  tablesWithDifferences: number;
  rowCounts: { source: number; target: number };
  schemaDifferences: number;
  missingRows: number;
  valueMismatches: number;
  duplicateKeys: number;
}

export function toReport(result: ComparisonResult): ComparisonReport {
  return {
    table: result.table,
    ...(result.category !== undefined && { category: result.category }),
    status: result.status,
    key_columns: result.keyColumns,
    row_counts: { ...result.rowCounts },
    has_differences: result.hasDifferences,
    schema_differences: result.schemaDifferences.map(d => ({ ...d })),
    missing_rows: result.missingRows.map(m => ({ side: m.side, key: m.key, row: m.row })),
    value_mismatches: result.valueMismatches.map(v => ({
      key: v.key,
      column: v.column,
      source_value: v.sourceValue,
      target_value: v.targetValue,
    })),
    duplicate_keys: result.duplicateKeys.map(d => ({ ...d })),
    matched_rows: result.matchedRows,
    ...(result.error && { error: { ...result.error } }),
    duration_ms: result.durationMs,
  };
}

export function summarize(results: ComparisonResult[]): ComparisonSummary {
  const summary: ComparisonSummary = {
    tables: results.length,
    completed: 0,
    failed: 0,
    cancelled: 0,
    tablesWithDifferences: 0,
    rowCounts: { source: 0, target: 0 },
    schemaDifferences: 0,
    missingRows: 0,
    valueMismatches: 0,
    duplicateKeys: 0,
  };

  for (const result of results) {
    summary[result.status]++;
    if (result.hasDifferences) summary.tablesWithDifferences++;
    summary.rowCounts.source += result.rowCounts.source;
    summary.rowCounts.target += result.rowCounts.target;
    summary.schemaDifferences += result.schemaDifferences.length;
    summary.missingRows += result.missingRows.length;
    summary.valueMismatches += result.valueMismatches.length;
    summary.duplicateKeys += result.duplicateKeys.length;
  }

  return summary;
}

export function formatKey(key: RowKey): string {
  return Array.isArray(key) ? `(${key.map(String).join(', ')})` : String(key);
}
