import { ColumnDescriptor, NormalizedType, RawColumn } from '../types/index.js';

type TypeInfo = Pick<RawColumn, 'dataType' | 'length' | 'precision' | 'scale'>;

const STRING_TYPES = new Set(['VARCHAR2', 'NVARCHAR2', 'VARCHAR', 'CHARACTER VARYING', 'TEXT', 'CITEXT']);
const FIXED_STRING_TYPES = new Set(['CHAR', 'NCHAR', 'CHARACTER', 'BPCHAR']);
const LOB_STRING_TYPES = new Set(['CLOB', 'NCLOB', 'LONG']);
const INTEGER_TYPES = new Set(['INTEGER', 'INT', 'SMALLINT', 'BIGINT', 'INT2', 'INT4', 'INT8', 'PLS_INTEGER']);
const FLOAT_TYPES = new Set(['FLOAT', 'BINARY_FLOAT', 'BINARY_DOUBLE', 'REAL', 'DOUBLE PRECISION', 'FLOAT4', 'FLOAT8']);
const BINARY_TYPES = new Set(['RAW', 'LONG RAW', 'BLOB', 'BYTEA']);
const BOOLEAN_TYPES = new Set(['BOOLEAN', 'BOOL']);
const LOB_TYPES = new Set(['CLOB', 'NCLOB', 'LONG', 'BLOB', 'LONG RAW', 'BFILE']);

// Oracle reports parameters inline for some types, e.g. TIMESTAMP(6) WITH TIME ZONE
function baseTypeName(dataType: string): string {
  return dataType.toUpperCase().replace(/\(.*?\)/g, '').replace(/\s+/g, ' ').trim();
}

/**
 * Maps a driver-native column type onto the shared taxonomy, so that
 * `VARCHAR2(50)` and `character varying(50)` land on the same value.
 */
export function normalizeType(column: TypeInfo): NormalizedType {
  const name = baseTypeName(column.dataType);

  if (name === 'NUMBER' || name === 'NUMERIC' || name === 'DECIMAL') {
    if (column.scale === 0) return { kind: 'integer' };
    return { kind: 'decimal', precision: column.precision, scale: column.scale };
  }
  if (INTEGER_TYPES.has(name)) return { kind: 'integer' };
  if (FLOAT_TYPES.has(name)) return { kind: 'decimal', precision: null, scale: null };

  if (STRING_TYPES.has(name)) return { kind: 'string', length: column.length, fixed: false };
  if (FIXED_STRING_TYPES.has(name)) return { kind: 'string', length: column.length, fixed: true };
  if (LOB_STRING_TYPES.has(name)) return { kind: 'string', length: null, fixed: false };

  if (name === 'DATE') return { kind: 'date' };
  if (name.startsWith('TIMESTAMP')) {
    return { kind: 'timestamp', withTimeZone: name.includes('TIME ZONE') && !name.includes('WITHOUT') };
  }

  if (BOOLEAN_TYPES.has(name)) return { kind: 'boolean' };
  if (BINARY_TYPES.has(name)) return { kind: 'binary' };

  return { kind: 'other', name };
}

export function sameType(a: NormalizedType, b: NormalizedType): boolean {
  switch (a.kind) {
    case 'decimal':
      return b.kind === 'decimal' && a.precision === b.precision && a.scale === b.scale;
    case 'string':
      // fixed vs varying is a padding concern, handled at value level
      return b.kind === 'string' && a.length === b.length;
    case 'timestamp':
      return b.kind === 'timestamp' && a.withTimeZone === b.withTimeZone;
    case 'other':
      return b.kind === 'other' && a.name === b.name;
    default:
      return a.kind === b.kind;
  }
}

export function describeType(type: NormalizedType): string {
  switch (type.kind) {
    case 'decimal':
      if (type.precision === null && type.scale === null) return 'decimal';
      return `decimal(${type.precision ?? '*'},${type.scale ?? 0})`;
    case 'string': {
      const base = type.fixed ? 'char' : 'string';
      return type.length === null ? base : `${base}(${type.length})`;
    }
    case 'timestamp':
      return type.withTimeZone ? 'timestamp with time zone' : 'timestamp';
    case 'other':
      return type.name.toLowerCase();
    default:
      return type.kind;
  }
}

/** Whether ORDER BY accepts the column: LOBs and unrecognized types such as XML or JSON are left out. */
export function isOrderable(column: Pick<ColumnDescriptor, 'dataType' | 'type'>): boolean {
  return column.type.kind !== 'other' && !LOB_TYPES.has(baseTypeName(column.dataType));
}
