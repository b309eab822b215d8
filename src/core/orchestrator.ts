import { ITableSource } from '../engines/interfaces.js';
import { DEFAULT_BATCH_SIZE, RowExtractor } from '../extractor/extractor.js';
import { SchemaInspector } from '../inspector/inspector.js';
import { isOrderable } from '../inspector/type-taxonomy.js';
import {
  CompareOptions,
  ComparisonErrorKind,
  ComparisonResult,
  ComparisonStage,
  PaddingPolicy,
} from '../types/comparison.js';
import { RowRecord, Side, TableSnapshotSchema, TableTarget } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { SchemaComparator, sharedColumns } from './comparator.js';
import {
  ComparisonError,
  KeyColumnMissingError,
  RowExtractionError,
  SchemaLookupError,
  errorMessage,
  throwIfCancelled,
} from './errors.js';
import { RowDiffer } from './row-differ.js';

function trimsFixedWidth(policy: PaddingPolicy, side: Side): boolean {
  return policy === 'trim' || (policy === 'trim-source' && side === 'source');
}

/**
 * Key columns first, then every other orderable column. Offset paging needs
 * a total order, including among rows that share a duplicated key.
 */
export function rowOrder(keyColumns: string[], schema: TableSnapshotSchema): string[] {
  const rest = schema.columns.filter(c => !keyColumns.includes(c.name) && isOrderable(c)).map(c => c.name);
  return [...keyColumns, ...rest];
}

/**
 * Runs one table comparison through
 * schema-fetch -> schema-diff -> row-count-fetch -> row-stream -> row-diff -> assemble -> done.
 * Errors never escape: they end in a failed (or cancelled) result for this table.
 */
export class ComparisonOrchestrator {
  private inspector = new SchemaInspector();
  private comparator = new SchemaComparator();
  private extractor = new RowExtractor();

  async compareTable(
    source: ITableSource,
    target: ITableSource,
    table: TableTarget,
    options: CompareOptions = {}
  ): Promise<ComparisonResult> {
    const started = Date.now();
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const padding = options.padding ?? 'trim';
    const sourceTable = table.sourceTable ?? table.name;
    const targetTable = table.targetTable ?? table.name;

    let batchesCompleted = 0;
    let totalBatches = 0;
    let keyColumns: string[] = table.keyColumns ?? [];
    const rowCounts = { source: 0, target: 0 };

    const enter = (stage: ComparisonStage) => {
      logger.debug({ table: table.name, stage }, 'Comparison stage');
      options.onProgress?.({ table: table.name, stage, batchesCompleted, totalBatches });
    };

    try {
      enter('schema-fetch');
      const [sourceSchema, targetSchema] = await Promise.all([
        this.inspector.inspect(source, sourceTable),
        this.inspector.inspect(target, targetTable),
      ]);
      throwIfCancelled(options.signal, table.name);

      enter('schema-diff');
      const schemaDifferences = this.comparator.compare(sourceSchema, targetSchema);
      if (keyColumns.length === 0) {
        keyColumns = await this.discoverKey(source, sourceTable);
      }
      this.assertKeyColumns(table.name, keyColumns, sourceSchema, targetSchema);

      enter('row-count-fetch');
      [rowCounts.source, rowCounts.target] = await Promise.all([
        this.countRows(source, sourceTable),
        this.countRows(target, targetTable),
      ]);
      totalBatches = Math.ceil(rowCounts.source / batchSize) + Math.ceil(rowCounts.target / batchSize);
      throwIfCancelled(options.signal, table.name);

      enter('row-stream');
      const onBatch = () => {
        batchesCompleted++;
        totalBatches = Math.max(totalBatches, batchesCompleted);
        options.onProgress?.({ table: table.name, stage: 'row-stream', batchesCompleted, totalBatches });
      };
      const stream = (side: Side, conn: ITableSource, name: string, schema: TableSnapshotSchema) =>
        this.streamRows(
          this.extractor.batches(conn, name, schema, {
            batchSize,
            orderBy: rowOrder(keyColumns, schema),
            trimFixedWidth: trimsFixedWidth(padding, side),
            signal: options.signal,
          }),
          onBatch
        );

      const differ = new RowDiffer(keyColumns, {
        indexSide: rowCounts.source < rowCounts.target ? 'source' : 'target',
        columns: sharedColumns(sourceSchema, targetSchema),
        emptyStringAsNull: options.emptyStringAsNull,
      });
      const rowDiff = await differ.diff(
        stream('source', source, sourceTable, sourceSchema),
        stream('target', target, targetTable, targetSchema)
      );

      enter('row-diff');
      enter('assemble');
      const result: ComparisonResult = {
        table: table.name,
        ...(table.category !== undefined && { category: table.category }),
        status: 'completed',
        keyColumns,
        rowCounts,
        hasDifferences:
          schemaDifferences.length > 0 || rowDiff.missingRows.length > 0 || rowDiff.valueMismatches.length > 0,
        schemaDifferences,
        missingRows: rowDiff.missingRows,
        valueMismatches: rowDiff.valueMismatches,
        duplicateKeys: rowDiff.duplicateKeys,
        matchedRows: rowDiff.matchedRows,
        durationMs: Date.now() - started,
      };

      enter('done');
      logger.info(
        {
          table: table.name,
          rowCounts,
          schemaDifferences: schemaDifferences.length,
          missingRows: rowDiff.missingRows.length,
          valueMismatches: rowDiff.valueMismatches.length,
          duplicateKeys: rowDiff.duplicateKeys.length,
        },
        'Table comparison completed'
      );
      return result;
    } catch (error) {
      const kind: ComparisonErrorKind = error instanceof ComparisonError ? error.kind : 'InternalError';
      const cancelled = kind === 'Cancelled';
      enter(cancelled ? 'cancelled' : 'failed');

      if (cancelled) {
        logger.warn({ table: table.name }, 'Table comparison cancelled');
      } else {
        logger.error({ table: table.name, kind, error }, 'Table comparison failed');
      }

      return failedResult(table, cancelled ? 'cancelled' : 'failed', kind, errorMessage(error), {
        keyColumns,
        rowCounts,
        durationMs: Date.now() - started,
      });
    }
  }

  private async discoverKey(source: ITableSource, table: string): Promise<string[]> {
    try {
      const keyColumns = await source.fetchPrimaryKey(table);
      logger.debug({ table, keyColumns }, 'Using primary key as row key');
      return keyColumns;
    } catch (error) {
      throw new SchemaLookupError(table, `Cannot read primary key of "${table}": ${errorMessage(error)}`, { cause: error });
    }
  }

  private async countRows(conn: ITableSource, table: string): Promise<number> {
    try {
      return await conn.fetchRowCount(table);
    } catch (error) {
      throw new RowExtractionError(table, 0, `Counting rows of "${table}" on ${conn.label} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private assertKeyColumns(
    table: string,
    keyColumns: string[],
    sourceSchema: TableSnapshotSchema,
    targetSchema: TableSnapshotSchema
  ) {
    const missing: { side: Side; column: string }[] = [];
    for (const [side, schema] of [['source', sourceSchema], ['target', targetSchema]] as const) {
      const names = new Set(schema.columns.map(c => c.name));
      for (const column of keyColumns) {
        if (!names.has(column)) missing.push({ side, column });
      }
    }
    if (keyColumns.length === 0 || missing.length > 0) {
      throw new KeyColumnMissingError(table, missing);
    }
  }

  private async *streamRows(batches: AsyncIterable<RowRecord[]>, onBatch: () => void): AsyncGenerator<RowRecord> {
    for await (const batch of batches) {
      onBatch();
      yield* batch;
    }
  }
}

export function failedResult(
  table: TableTarget,
  status: 'failed' | 'cancelled',
  kind: ComparisonErrorKind,
  message: string,
  extra: Partial<Pick<ComparisonResult, 'keyColumns' | 'rowCounts' | 'durationMs'>> = {}
): ComparisonResult {
  return {
    table: table.name,
    ...(table.category !== undefined && { category: table.category }),
    status,
    keyColumns: extra.keyColumns ?? table.keyColumns ?? [],
    rowCounts: extra.rowCounts ?? { source: 0, target: 0 },
    hasDifferences: false,
    schemaDifferences: [],
    missingRows: [],
    valueMismatches: [],
    duplicateKeys: [],
    matchedRows: 0,
    error: { kind, message },
    durationMs: extra.durationMs ?? 0,
  };
}
