import { valueToken, valuesEqual } from '../extractor/canonical.js';
import { DuplicateKeyAnomaly, MissingRow, ValueMismatch } from '../types/comparison.js';
import { RowKey, RowRecord, Side } from '../types/index.js';

export type RowSource = AsyncIterable<RowRecord> | Iterable<RowRecord>;

export interface RowDiffOptions {
  /** Side held in memory; the other side is streamed against it. Defaults to target. */
  indexSide?: Side;
  /** Columns whose values are compared. Defaults to every column of the source row. */
  columns?: string[];
  emptyStringAsNull?: boolean;
}

export interface RowDiffResult {
  missingRows: MissingRow[];
  valueMismatches: ValueMismatch[];
  duplicateKeys: DuplicateKeyAnomaly[];
  matchedRows: number;
}

interface IndexedRow {
  row: RowRecord;
  ordinal: number;
}

interface PendingMissing extends MissingRow {
  ordinal: number;
}

interface PendingMismatch extends ValueMismatch {
  sourceOrdinal: number;
  columnIndex: number;
}

const opposite = (side: Side): Side => (side === 'source' ? 'target' : 'source');

export function buildRowKey(row: RowRecord, keyColumns: readonly string[]): RowKey {
  if (keyColumns.length === 1) return row[keyColumns[0]] ?? null;
  return keyColumns.map(c => row[c] ?? null);
}

export function keyToken(row: RowRecord, keyColumns: readonly string[]): string {
  return keyColumns.map(c => valueToken(row[c] ?? null)).join('\u0000');
}

/**
 * Aligns two row sets by key. One side is indexed, the other streamed
 * through it, so time is linear in both sides. Neither side needs to be
 * sorted. Streamed keys are remembered as tokens only: a key either matched
 * an indexed row or already sits in the missing-row output.
 */
export class RowDiffer {
  private readonly indexSide: Side;
  private readonly emptyStringAsNull: boolean;

  constructor(
    private readonly keyColumns: readonly string[],
    private readonly options: RowDiffOptions = {}
  ) {
    if (keyColumns.length === 0) {
      throw new Error('RowDiffer needs at least one key column');
    }
    this.indexSide = options.indexSide ?? 'target';
    this.emptyStringAsNull = options.emptyStringAsNull ?? false;
  }

  async diff(sourceRows: RowSource, targetRows: RowSource): Promise<RowDiffResult> {
    const indexSide = this.indexSide;
    const streamSide = opposite(indexSide);
    const [indexRows, streamRows] = indexSide === 'target' ? [targetRows, sourceRows] : [sourceRows, targetRows];

    const missing: PendingMissing[] = [];
    const mismatches: PendingMismatch[] = [];
    const duplicates = new Map<string, DuplicateKeyAnomaly>();
    let matchedRows = 0;

    const flagDuplicate = (side: Side, token: string, row: RowRecord, ordinal: number) => {
      const id = `${side}\u0001${token}`;
      const existing = duplicates.get(id);
      if (existing) {
        existing.occurrences++;
      } else {
        duplicates.set(id, { side, key: buildRowKey(row, this.keyColumns), occurrences: 2 });
      }
      // the extra occurrence has no counterpart on the other side
      missing.push({ side: opposite(side), key: buildRowKey(row, this.keyColumns), row, ordinal });
    };

    const index = new Map<string, IndexedRow>();
    let ordinal = 0;
    for await (const row of indexRows) {
      const token = keyToken(row, this.keyColumns);
      if (index.has(token)) {
        flagDuplicate(indexSide, token, row, ordinal++);
        continue;
      }
      index.set(token, { row, ordinal: ordinal++ });
    }

    const streamed = new Set<string>();
    ordinal = 0;
    for await (const row of streamRows) {
      const rowOrdinal = ordinal++;
      const token = keyToken(row, this.keyColumns);

      if (streamed.has(token)) {
        flagDuplicate(streamSide, token, row, rowOrdinal);
        continue;
      }
      streamed.add(token);

      const match = index.get(token);
      if (!match) {
        missing.push({ side: indexSide, key: buildRowKey(row, this.keyColumns), row, ordinal: rowOrdinal });
        continue;
      }

      index.delete(token);
      matchedRows++;

      const [sourceRow, targetRow, sourceOrdinal] =
        streamSide === 'source' ? [row, match.row, rowOrdinal] : [match.row, row, match.ordinal];
      this.compareRow(sourceRow, targetRow, sourceOrdinal, mismatches);
    }

    for (const { row, ordinal: rowOrdinal } of index.values()) {
      missing.push({ side: streamSide, key: buildRowKey(row, this.keyColumns), row, ordinal: rowOrdinal });
    }

    return {
      missingRows: sortMissing(missing),
      valueMismatches: mismatches
        .sort((a, b) => a.sourceOrdinal - b.sourceOrdinal || a.columnIndex - b.columnIndex)
        .map(({ key, column, sourceValue, targetValue }) => ({ key, column, sourceValue, targetValue })),
      duplicateKeys: [...duplicates.values()].sort((a, b) => sideRank(a.side) - sideRank(b.side)),
      matchedRows,
    };
  }

  private compareRow(source: RowRecord, target: RowRecord, sourceOrdinal: number, out: PendingMismatch[]) {
    const columns = this.options.columns ?? Object.keys(source);
    const key = buildRowKey(source, this.keyColumns);

    columns.forEach((column, columnIndex) => {
      if (!(column in source) || !(column in target)) return;
      const sourceValue = source[column];
      const targetValue = target[column];
      if (!valuesEqual(sourceValue, targetValue, this.emptyStringAsNull)) {
        out.push({ key, column, sourceValue, targetValue, sourceOrdinal, columnIndex });
      }
    });
  }
}

// rows present in source (missing from target) come first, each group in its own side's order
function sortMissing(missing: PendingMissing[]): MissingRow[] {
  return missing
    .sort((a, b) => sideRank(opposite(a.side)) - sideRank(opposite(b.side)) || a.ordinal - b.ordinal)
    .map(({ side, key, row }) => ({ side, key, row }));
}

function sideRank(side: Side): number {
  return side === 'source' ? 0 : 1;
}

export async function diffRows(
  sourceRows: RowSource,
  targetRows: RowSource,
  keyColumns: readonly string[],
  options: RowDiffOptions = {}
): Promise<RowDiffResult> {
  return new RowDiffer(keyColumns, options).diff(sourceRows, targetRows);
}
