export type DbType = 'postgres' | 'oracle';

export type Side = 'source' | 'target';

export interface ConnectionConfig {
  type: DbType;
  host: string;
  port: number;
  /** Service name for Oracle, database name for PostgreSQL. */
  database?: string;
  sid?: string;
  user: string;
  password?: string;
  schema?: string;
  tablePrefix?: string;
}

export interface EnvironmentConfig {
  name: string;
  source: ConnectionConfig;
  target: ConnectionConfig;
}

/** Column metadata as the catalog reports it, before normalization. */
export interface RawColumn {
  name: string;
  dataType: string;
  nullable: boolean;
  length: number | null;
  precision: number | null;
  scale: number | null;
}

export type NormalizedType =
  | { kind: 'integer' }
  | { kind: 'decimal'; precision: number | null; scale: number | null }
  | { kind: 'string'; length: number | null; fixed: boolean }
  | { kind: 'date' }
  | { kind: 'timestamp'; withTimeZone: boolean }
  | { kind: 'boolean' }
  | { kind: 'binary' }
  | { kind: 'other'; name: string };

export interface ColumnDescriptor {
  readonly name: string;
  readonly dataType: string;
  readonly nullable: boolean;
  readonly length?: number;
  readonly precision?: number;
  readonly scale?: number;
  readonly type: NormalizedType;
}

export interface TableSnapshotSchema {
  readonly table: string;
  readonly columns: readonly ColumnDescriptor[];
}

export type CanonicalValue = string | number | boolean | null;

export type RowRecord = Record<string, CanonicalValue>;

export type RowKey = CanonicalValue | CanonicalValue[];

/**
 * A table to compare. `sourceTable`/`targetTable` override the physical name
 * on each side when the pipelines write to differently named tables.
 */
export interface TableTarget {
  name: string;
  category?: string;
  keyColumns?: string[];
  sourceTable?: string;
  targetTable?: string;
}

export interface CategoryTable {
  table: string;
  keyColumns: string[];
}

export type CategoryMap = Record<string, CategoryTable[]>;
