import { RawColumn } from '../types/index.js';

export type QueryParam = string | number | null;

export type DbRow = Record<string, unknown>;

export interface IDbConnection {
  query(text: string, params?: QueryParam[]): Promise<DbRow[]>;
  close(): Promise<void>;
}

export interface FetchRowsOptions {
  offset: number;
  limit: number;
  /** Columns to order by, so that offset paging is stable. */
  orderBy: string[];
}

/**
 * The capabilities the comparison engine consumes from one side.
 * Implementations own their connection; `close` releases it.
 */
export interface ITableSource {
  readonly label: string;
  fetchSchema(table: string): Promise<RawColumn[]>;
  fetchPrimaryKey(table: string): Promise<string[]>;
  fetchRowCount(table: string): Promise<number>;
  fetchRows(table: string, columns: string[], options: FetchRowsOptions): Promise<DbRow[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
