import { z } from 'zod';
import { ConnectionConfig, RawColumn } from '../../types/index.js';
import { DbRow, FetchRowsOptions, IDbConnection, ITableSource } from '../interfaces.js';
import { quoteIdentifier } from '../sql.js';

const columnRowSchema = z.object({
  name: z.string(),
  dataType: z.string(),
  isNullable: z.string(),
  characterMaximumLength: z.coerce.number().nullable(),
  numericPrecision: z.coerce.number().nullable(),
  numericScale: z.coerce.number().nullable(),
});

const nameRowSchema = z.object({ name: z.string() });

// COUNT(*) is bigint, which pg returns as a string
const countRowSchema = z.object({ total: z.coerce.number().int().nonnegative() });

export class PostgresSource implements ITableSource {
  readonly label: string;
  private schema: string;

  constructor(
    private db: IDbConnection,
    config: Pick<ConnectionConfig, 'schema' | 'host' | 'database'>
  ) {
    this.schema = config.schema || 'public';
    this.label = `postgres://${config.host}/${config.database ?? ''}`;
  }

  async fetchSchema(table: string): Promise<RawColumn[]> {
    const rows = await this.db.query(`
      SELECT
        column_name as "name",
        data_type as "dataType",
        is_nullable as "isNullable",
        character_maximum_length as "characterMaximumLength",
        numeric_precision as "numericPrecision",
        numeric_scale as "numericScale"
      FROM information_schema.columns
      WHERE table_schema = $1 AND table_name = $2
      ORDER BY ordinal_position
    `, [this.schema, table]);

    return rows.map(row => {
      const r = columnRowSchema.parse(row);
      const isNumeric = r.dataType === 'numeric';
      return {
        name: r.name,
        dataType: r.dataType,
        nullable: r.isNullable === 'YES',
        length: r.characterMaximumLength,
        // integer types report binary precision; only numeric carries a declared one
        precision: isNumeric ? r.numericPrecision : null,
        scale: isNumeric ? r.numericScale : null,
      };
    });
  }

  async fetchPrimaryKey(table: string): Promise<string[]> {
    const rows = await this.db.query(`
      SELECT kcu.column_name as "name"
      FROM information_schema.table_constraints tc
        JOIN information_schema.key_column_usage kcu
          ON tc.constraint_name = kcu.constraint_name
          AND tc.table_schema = kcu.table_schema
      WHERE tc.table_schema = $1 AND tc.table_name = $2 AND tc.constraint_type = 'PRIMARY KEY'
      ORDER BY kcu.ordinal_position
    `, [this.schema, table]);

    return rows.map(row => nameRowSchema.parse(row).name);
  }

  async fetchRowCount(table: string): Promise<number> {
    const rows = await this.db.query(`SELECT COUNT(*) as "total" FROM ${this.qualified(table)}`);
    return countRowSchema.parse(rows[0]).total;
  }

  async fetchRows(table: string, columns: string[], options: FetchRowsOptions): Promise<DbRow[]> {
    const cols = columns.map(quoteIdentifier).join(', ');
    const orderBy = options.orderBy.length > 0 ? ` ORDER BY ${options.orderBy.map(quoteIdentifier).join(', ')}` : '';

    return this.db.query(
      `SELECT ${cols} FROM ${this.qualified(table)}${orderBy} LIMIT $1 OFFSET $2`,
      [options.limit, options.offset]
    );
  }

  async ping(): Promise<void> {
    await this.db.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  private qualified(table: string): string {
    return `${quoteIdentifier(this.schema)}.${quoteIdentifier(table)}`;
  }
}
