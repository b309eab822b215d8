import { RowExtractionError, errorMessage, throwIfCancelled } from '../core/errors.js';
import { DbRow, ITableSource } from '../engines/interfaces.js';
import { RowRecord, TableSnapshotSchema } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { canonicalize } from './canonical.js';

export const DEFAULT_BATCH_SIZE = 1000;

export interface ExtractOptions {
  batchSize?: number;
  /** Key columns; rows are fetched in this order so that offset paging is stable. */
  orderBy?: string[];
  trimFixedWidth?: boolean;
  signal?: AbortSignal;
}

export class RowExtractor {
  /**
   * Pulls the table in batches of `batchSize` canonicalized rows.
   * Each call starts again from the first row.
   */
  async *batches(
    source: ITableSource,
    table: string,
    schema: TableSnapshotSchema,
    options: ExtractOptions = {}
  ): AsyncGenerator<RowRecord[]> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    const columns = schema.columns.map(c => c.name);
    const orderBy = options.orderBy ?? [];
    const trimFixedWidth = options.trimFixedWidth ?? true;
    let offset = 0;

    while (true) {
      throwIfCancelled(options.signal, table);

      let raw: DbRow[];
      try {
        raw = await source.fetchRows(table, columns, { offset, limit: batchSize, orderBy });
      } catch (error) {
        throw new RowExtractionError(
          table,
          offset,
          `Fetching rows ${offset}..${offset + batchSize} of "${table}" from ${source.label} failed: ${errorMessage(error)}`,
          { cause: error }
        );
      }

      if (raw.length > 0) {
        logger.debug({ table, source: source.label, offset, rows: raw.length }, 'Fetched batch');
        yield raw.map(row => this.toRecord(row, schema, offset, trimFixedWidth));
      }

      if (raw.length < batchSize) return;
      offset += batchSize;
    }
  }

  async *extract(
    source: ITableSource,
    table: string,
    schema: TableSnapshotSchema,
    options: ExtractOptions = {}
  ): AsyncGenerator<RowRecord> {
    for await (const batch of this.batches(source, table, schema, options)) {
      yield* batch;
    }
  }

  private toRecord(row: DbRow, schema: TableSnapshotSchema, offset: number, trimFixedWidth: boolean): RowRecord {
    const record: RowRecord = {};
    for (const column of schema.columns) {
      if (!(column.name in row)) {
        throw new RowExtractionError(schema.table, offset, `Fetched row of "${schema.table}" has no column "${column.name}"`);
      }
      record[column.name] = canonicalize(row[column.name], column.type, { trimFixedWidth });
    }
    return record;
  }
}
