import { SchemaLookupError, errorMessage } from '../core/errors.js';
import { ITableSource } from '../engines/interfaces.js';
import { ColumnDescriptor, RawColumn, TableSnapshotSchema } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { normalizeType } from './type-taxonomy.js';

export class SchemaInspector {
  /**
   * Reads the column snapshot of `table` in catalog order.
   * Throws SchemaLookupError when the table is not visible or the metadata query fails.
   */
  async inspect(source: ITableSource, table: string): Promise<TableSnapshotSchema> {
    logger.debug(`Inspecting metadata for table: ${table}`);

    let rawColumns: RawColumn[];
    try {
      rawColumns = await source.fetchSchema(table);
    } catch (error) {
      throw new SchemaLookupError(table, `Cannot read metadata of "${table}": ${errorMessage(error)}`, { cause: error });
    }

    if (rawColumns.length === 0) {
      throw new SchemaLookupError(table, `Table "${table}" does not exist or has no visible columns`);
    }

    const seen = new Set<string>();
    const columns: ColumnDescriptor[] = [];

    for (const raw of rawColumns) {
      if (seen.has(raw.name)) {
        throw new SchemaLookupError(table, `Column "${raw.name}" is reported twice for "${table}"`);
      }
      seen.add(raw.name);
      columns.push(Object.freeze(this.toDescriptor(raw)));
    }

    return Object.freeze({ table, columns: Object.freeze(columns) });
  }

  private toDescriptor(raw: RawColumn): ColumnDescriptor {
    return {
      name: raw.name,
      dataType: raw.dataType,
      nullable: raw.nullable,
      ...(raw.length !== null && { length: raw.length }),
      ...(raw.precision !== null && { precision: raw.precision }),
      ...(raw.scale !== null && { scale: raw.scale }),
      type: normalizeType(raw),
    };
  }
}
