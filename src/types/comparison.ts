import { CanonicalValue, RowKey, RowRecord, Side } from './index.js';

export type ColumnIssue = 'type_mismatch' | 'nullability_mismatch' | 'missing_on_source' | 'missing_on_target';

export interface ColumnDifference {
  column: string;
  issue: ColumnIssue;
  source?: string;
  target?: string;
}

export interface MissingRow {
  /** The side the row is missing from. */
  side: Side;
  key: RowKey;
  row: RowRecord;
}

export interface ValueMismatch {
  key: RowKey;
  column: string;
  sourceValue: CanonicalValue;
  targetValue: CanonicalValue;
}

export interface DuplicateKeyAnomaly {
  side: Side;
  key: RowKey;
  occurrences: number;
}

export type ComparisonStatus = 'completed' | 'failed' | 'cancelled';

export type ComparisonStage =
  | 'schema-fetch'
  | 'schema-diff'
  | 'row-count-fetch'
  | 'row-stream'
  | 'row-diff'
  | 'assemble'
  | 'done'
  | 'failed'
  | 'cancelled';

export type ComparisonErrorKind =
  | 'SchemaLookupError'
  | 'KeyColumnMissing'
  | 'RowExtractionError'
  | 'ConnectionError'
  | 'Cancelled'
  | 'InternalError';

export interface ComparisonResult {
  table: string;
  category?: string;
  status: ComparisonStatus;
  keyColumns: string[];
  rowCounts: { source: number; target: number };
  hasDifferences: boolean;
  schemaDifferences: ColumnDifference[];
  missingRows: MissingRow[];
  valueMismatches: ValueMismatch[];
  duplicateKeys: DuplicateKeyAnomaly[];
  matchedRows: number;
  error?: { kind: ComparisonErrorKind; message: string };
  durationMs: number;
}

export interface ProgressEvent {
  table: string;
  stage: ComparisonStage;
  batchesCompleted: number;
  totalBatches: number;
}

export type ProgressSink = (event: ProgressEvent) => void;

/**
 * How trailing blanks of fixed-width string columns are handled.
 * `trim` trims both sides, `trim-source` only the source side.
 */
export type PaddingPolicy = 'trim' | 'preserve' | 'trim-source';

export interface CompareOptions {
  batchSize?: number;
  padding?: PaddingPolicy;
  emptyStringAsNull?: boolean;
  onProgress?: ProgressSink;
  signal?: AbortSignal;
}
