import { describe, it, expect, vi } from 'vitest';
import { DbRow, IDbConnection, QueryParam } from '../interfaces.js';
import { OracleSource } from './OracleSource.js';

function mockConnection(rows: DbRow[] = []) {
  const query = vi.fn<(text: string, params?: QueryParam[]) => Promise<DbRow[]>>().mockResolvedValue(rows);
  const close = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
  const db: IDbConnection = { query, close };
  return { db, query, close };
}

describe('OracleSource', () => {
  it('should describe itself by host and service', () => {
    const { db } = mockConnection();
    expect(new OracleSource(db, { host: 'legacy-db', database: 'ORCL' }).label).toBe('oracle://legacy-db/ORCL');
    expect(new OracleSource(db, { host: 'legacy-db', sid: 'XE' }).label).toBe('oracle://legacy-db/XE');
  });

  it('should read columns of the current user in column order', async () => {
    const { db, query } = mockConnection([
      { name: 'ID', dataType: 'NUMBER', nullable: 'N', charLength: 0, precision: 10, scale: 0 },
      { name: 'NAME', dataType: 'VARCHAR2', nullable: 'Y', charLength: 50, precision: null, scale: null },
    ]);

    const columns = await new OracleSource(db, { host: 'h', database: 'ORCL' }).fetchSchema('orders');

    expect(query).toHaveBeenCalledWith(expect.stringContaining('FROM user_tab_columns'), ['ORDERS']);
    expect(columns).toEqual([
      { name: 'ID', dataType: 'NUMBER', nullable: false, length: null, precision: 10, scale: 0 },
      { name: 'NAME', dataType: 'VARCHAR2', nullable: true, length: 50, precision: null, scale: null },
    ]);
  });

  it('should read from all_tab_columns when a schema is configured', async () => {
    const { db, query } = mockConnection([]);

    await new OracleSource(db, { host: 'h', database: 'ORCL', schema: 'etl' }).fetchSchema('orders');

    expect(query).toHaveBeenCalledWith(expect.stringContaining('FROM all_tab_columns'), ['ETL', 'ORDERS']);
  });

  it('should read primary key columns in position order', async () => {
    const { db, query } = mockConnection([{ name: 'ORDER_ID' }, { name: 'LINE_NO' }]);

    const key = await new OracleSource(db, { host: 'h', database: 'ORCL' }).fetchPrimaryKey('order_lines');

    expect(key).toEqual(['ORDER_ID', 'LINE_NO']);
    expect(query).toHaveBeenCalledWith(expect.stringContaining("c.constraint_type = 'P'"), ['ORDER_LINES']);
  });

  it('should count rows of the qualified table', async () => {
    const { db, query } = mockConnection([{ total: 42 }]);

    const count = await new OracleSource(db, { host: 'h', database: 'ORCL', schema: 'etl' }).fetchRowCount('orders');

    expect(count).toBe(42);
    expect(query).toHaveBeenCalledWith('SELECT COUNT(*) AS "total" FROM "ETL"."ORDERS"');
  });

  it('should page rows in key order with OFFSET/FETCH', async () => {
    const { db, query } = mockConnection([{ ID: '11', NAME: 'x' }]);

    const rows = await new OracleSource(db, { host: 'h', database: 'ORCL' }).fetchRows('orders', ['ID', 'NAME'], {
      offset: 10,
      limit: 5,
      orderBy: ['ID'],
    });

    expect(rows).toEqual([{ ID: '11', NAME: 'x' }]);
    expect(query).toHaveBeenCalledWith(
      'SELECT "ID", "NAME" FROM "ORDERS" ORDER BY "ID" OFFSET :1 ROWS FETCH NEXT :2 ROWS ONLY',
      [10, 5]
    );
  });

  it('should ping through DUAL and close the connection', async () => {
    const { db, query, close } = mockConnection([{ ok: 1 }]);
    const source = new OracleSource(db, { host: 'h', database: 'ORCL' });

    await source.ping();
    await source.close();

    expect(query).toHaveBeenCalledWith('SELECT 1 AS "ok" FROM DUAL');
    expect(close).toHaveBeenCalledOnce();
  });
});
