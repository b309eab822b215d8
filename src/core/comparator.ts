import { describeType, sameType } from '../inspector/type-taxonomy.js';
import { ColumnDifference } from '../types/comparison.js';
import { ColumnDescriptor, TableSnapshotSchema } from '../types/index.js';

const nullability = (col: ColumnDescriptor) => (col.nullable ? 'NULL' : 'NOT NULL');

export class SchemaComparator {
  /**
   * Column-level differences between two snapshots. Source columns are
   * reported in source order, then target-only columns in target order.
   */
  compare(source: TableSnapshotSchema, target: TableSnapshotSchema): ColumnDifference[] {
    const diffs: ColumnDifference[] = [];
    const sourceCols = new Map(source.columns.map(c => [c.name, c]));
    const targetCols = new Map(target.columns.map(c => [c.name, c]));

    for (const sCol of source.columns) {
      const tCol = targetCols.get(sCol.name);

      if (!tCol) {
        diffs.push({
          column: sCol.name,
          issue: 'missing_on_target',
          source: describeType(sCol.type),
        });
        continue;
      }

      if (!sameType(sCol.type, tCol.type)) {
        diffs.push({
          column: sCol.name,
          issue: 'type_mismatch',
          source: describeType(sCol.type),
          target: describeType(tCol.type),
        });
      }

      if (sCol.nullable !== tCol.nullable) {
        diffs.push({
          column: sCol.name,
          issue: 'nullability_mismatch',
          source: nullability(sCol),
          target: nullability(tCol),
        });
      }
    }

    for (const tCol of target.columns) {
      if (!sourceCols.has(tCol.name)) {
        diffs.push({
          column: tCol.name,
          issue: 'missing_on_source',
          target: describeType(tCol.type),
        });
      }
    }

    return diffs;
  }
}

export function sharedColumns(source: TableSnapshotSchema, target: TableSnapshotSchema): string[] {
  const targetNames = new Set(target.columns.map(c => c.name));
  return source.columns.map(c => c.name).filter(name => targetNames.has(name));
}

export function diffSchema(source: TableSnapshotSchema, target: TableSnapshotSchema): ColumnDifference[] {
  return new SchemaComparator().compare(source, target);
}
