import { z } from 'zod';
import { ConnectionConfig, RawColumn } from '../../types/index.js';
import { DbRow, FetchRowsOptions, IDbConnection, ITableSource } from '../interfaces.js';
import { quoteIdentifier } from '../sql.js';

const columnRowSchema = z.object({
  name: z.string(),
  dataType: z.string(),
  nullable: z.string(),
  charLength: z.coerce.number().nullable(),
  precision: z.coerce.number().nullable(),
  scale: z.coerce.number().nullable(),
});

const nameRowSchema = z.object({ name: z.string() });

const countRowSchema = z.object({ total: z.coerce.number().int().nonnegative() });

export class OracleSource implements ITableSource {
  readonly label: string;

  constructor(
    private db: IDbConnection,
    private config: Pick<ConnectionConfig, 'schema' | 'host' | 'database' | 'sid'>
  ) {
    this.label = `oracle://${config.host}/${config.database ?? config.sid ?? ''}`;
  }

  async fetchSchema(table: string): Promise<RawColumn[]> {
    const { owner, name } = this.resolve(table);
    const select = `
      SELECT
        column_name AS "name",
        data_type AS "dataType",
        nullable AS "nullable",
        char_length AS "charLength",
        data_precision AS "precision",
        data_scale AS "scale"`;

    const rows = owner
      ? await this.db.query(`${select}
      FROM all_tab_columns
      WHERE owner = :1 AND table_name = :2
      ORDER BY column_id`, [owner, name])
      : await this.db.query(`${select}
      FROM user_tab_columns
      WHERE table_name = :1
      ORDER BY column_id`, [name]);

    return rows.map(row => {
      const r = columnRowSchema.parse(row);
      return {
        name: r.name,
        dataType: r.dataType,
        nullable: r.nullable === 'Y',
        // char_length is 0 for non-character columns
        length: r.charLength ? r.charLength : null,
        precision: r.precision,
        scale: r.scale,
      };
    });
  }

  async fetchPrimaryKey(table: string): Promise<string[]> {
    const { owner, name } = this.resolve(table);
    const rows = owner
      ? await this.db.query(`
      SELECT cc.column_name AS "name"
      FROM all_constraints c
        JOIN all_cons_columns cc ON c.owner = cc.owner AND c.constraint_name = cc.constraint_name
      WHERE c.owner = :1 AND c.table_name = :2 AND c.constraint_type = 'P'
      ORDER BY cc.position`, [owner, name])
      : await this.db.query(`
      SELECT cc.column_name AS "name"
      FROM user_constraints c
        JOIN user_cons_columns cc ON c.constraint_name = cc.constraint_name
      WHERE c.table_name = :1 AND c.constraint_type = 'P'
      ORDER BY cc.position`, [name]);

    return rows.map(row => nameRowSchema.parse(row).name);
  }

  async fetchRowCount(table: string): Promise<number> {
    const rows = await this.db.query(`SELECT COUNT(*) AS "total" FROM ${this.qualified(table)}`);
    return countRowSchema.parse(rows[0]).total;
  }

  async fetchRows(table: string, columns: string[], options: FetchRowsOptions): Promise<DbRow[]> {
    const cols = columns.map(quoteIdentifier).join(', ');
    const orderBy = options.orderBy.length > 0 ? ` ORDER BY ${options.orderBy.map(quoteIdentifier).join(', ')}` : '';

    return this.db.query(
      `SELECT ${cols} FROM ${this.qualified(table)}${orderBy} OFFSET :1 ROWS FETCH NEXT :2 ROWS ONLY`,
      [options.offset, options.limit]
    );
  }

  async ping(): Promise<void> {
    await this.db.query('SELECT 1 AS "ok" FROM DUAL');
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  // Unquoted Oracle identifiers are stored upper-case in the catalog
  private resolve(table: string): { owner: string | null; name: string } {
    return {
      owner: this.config.schema ? this.config.schema.toUpperCase() : null,
      name: table.toUpperCase(),
    };
  }

  private qualified(table: string): string {
    const { owner, name } = this.resolve(table);
    return owner ? `${quoteIdentifier(owner)}.${quoteIdentifier(name)}` : quoteIdentifier(name);
  }
}
