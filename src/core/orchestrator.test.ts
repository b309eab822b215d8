import { describe, it, expect } from 'vitest';
import { MemorySource, MemoryTable, column } from '../testing/memory-source.js';
import { ComparisonResult, ProgressEvent } from '../types/comparison.js';
import { DbRow } from '../engines/interfaces.js';
import { RawColumn } from '../types/index.js';
import { ComparisonOrchestrator } from './orchestrator.js';

const columns: RawColumn[] = [
  column('ID', 'NUMBER', { nullable: false, precision: 10, scale: 0 }),
  column('NAME', 'VARCHAR2', { length: 20 }),
];

const items = (rows: DbRow[], extra: Partial<MemoryTable> = {}): MemoryTable => ({ columns, rows, ...extra });

const sameRows: DbRow[] = [
  { ID: '1', NAME: 'A' },
  { ID: '2', NAME: 'B' },
  { ID: '3', NAME: 'C' },
];

function withoutTiming({ durationMs: _durationMs, ...rest }: ComparisonResult) {
  return rest;
}

describe('ComparisonOrchestrator', () => {
  const orchestrator = new ComparisonOrchestrator();

  it('should complete without differences for identical tables', async () => {
    const source = new MemorySource('mem://source', { ITEMS: items(sameRows) });
    const target = new MemorySource('mem://target', { ITEMS: items(sameRows) });

    const result = await orchestrator.compareTable(source, target, { name: 'ITEMS', keyColumns: ['ID'] });

    expect(withoutTiming(result)).toEqual({
      table: 'ITEMS',
      status: 'completed',
      keyColumns: ['ID'],
      rowCounts: { source: 3, target: 3 },
      hasDifferences: false,
      schemaDifferences: [],
      missingRows: [],
      valueMismatches: [],
      duplicateKeys: [],
      matchedRows: 3,
    });
  });

  it('should report rows missing on either side', async () => {
    const source = new MemorySource('mem://source', {
      ITEMS: items([{ ID: '1', NAME: 'A' }, { ID: '2', NAME: 'B' }]),
    });
    const target = new MemorySource('mem://target', {
      ITEMS: items([{ ID: '1', NAME: 'A' }, { ID: '3', NAME: 'C' }]),
    });

    const result = await orchestrator.compareTable(source, target, { name: 'ITEMS', keyColumns: ['ID'] });

    expect(result.status).toBe('completed');
    expect(result.missingRows).toEqual([
      { side: 'target', key: 2, row: { ID: 2, NAME: 'B' } },
      { side: 'source', key: 3, row: { ID: 3, NAME: 'C' } },
    ]);
    expect(result.valueMismatches).toEqual([]);
    expect(result.rowCounts).toEqual({ source: 2, target: 2 });
    expect(result.hasDifferences).toBe(true);
  });

  it('should fail with KeyColumnMissing before reading any rows', async () => {
    const source = new MemorySource('mem://source', { ITEMS: items(sameRows) });
    const target = new MemorySource('mem://target', {
      ITEMS: { columns: [column('NAME', 'VARCHAR2', { length: 20 })], rows: [{ NAME: 'A' }] },
    });

    const result = await orchestrator.compareTable(source, target, {
      name: 'ITEMS',
      category: 'reference',
      keyColumns: ['ID'],
    });

    expect(result.status).toBe('failed');
    expect(result.category).toBe('reference');
    expect(result.error).toEqual({ kind: 'KeyColumnMissing', message: 'Key columns missing for "ITEMS": ID (target)' });
    expect(result.schemaDifferences).toEqual([]);
    expect(result.missingRows).toEqual([]);
    expect(result.hasDifferences).toBe(false);
    expect(source.fetches).toHaveLength(0);
    expect(target.fetches).toHaveLength(0);
  });

  it('should fall back to the primary key when no key columns are declared', async () => {
    const source = new MemorySource('mem://source', { ITEMS: items(sameRows, { primaryKey: ['ID'] }) });
    const target = new MemorySource('mem://target', { ITEMS: items(sameRows) });

    const result = await orchestrator.compareTable(source, target, { name: 'ITEMS' });

    expect(result.status).toBe('completed');
    expect(result.keyColumns).toEqual(['ID']);
    expect(source.fetches[0]?.options.orderBy).toEqual(['ID', 'NAME']);
  });

  it('should fail when no key can be found', async () => {
    const source = new MemorySource('mem://source', { ITEMS: items(sameRows) });
    const target = new MemorySource('mem://target', { ITEMS: items(sameRows) });

    const result = await orchestrator.compareTable(source, target, { name: 'ITEMS' });

    expect(result.error).toEqual({ kind: 'KeyColumnMissing', message: 'No key columns declared or discoverable for "ITEMS"' });
  });

  it('should report schema differences next to row differences', async () => {
    const source = new MemorySource('mem://source', {
      ITEMS: { columns: [...columns, column('STATUS', 'VARCHAR2', { length: 10 })], rows: [{ ID: '1', NAME: 'A', STATUS: 'OK' }] },
    });
    const target = new MemorySource('mem://target', {
      ITEMS: {
        columns: [...columns, column('STATUS', 'VARCHAR2', { length: 10, nullable: false })],
        rows: [{ ID: '1', NAME: 'Z', STATUS: 'OK' }],
      },
    });

    const result = await orchestrator.compareTable(source, target, { name: 'ITEMS', keyColumns: ['ID'] });

    expect(result.schemaDifferences).toEqual([
      { column: 'STATUS', issue: 'nullability_mismatch', source: 'NULL', target: 'NOT NULL' },
    ]);
    expect(result.valueMismatches).toEqual([{ key: 1, column: 'NAME', sourceValue: 'A', targetValue: 'Z' }]);
  });

  it('should compare only the columns both sides have', async () => {
    const source = new MemorySource('mem://source', {
      ITEMS: { columns: [...columns, column('LEGACY', 'VARCHAR2', { length: 5 })], rows: [{ ID: '1', NAME: 'A', LEGACY: 'x' }] },
    });
    const target = new MemorySource('mem://target', { ITEMS: items([{ ID: '1', NAME: 'A' }]) });

    const result = await orchestrator.compareTable(source, target, { name: 'ITEMS', keyColumns: ['ID'] });

    expect(result.schemaDifferences).toEqual([{ column: 'LEGACY', issue: 'missing_on_target', source: 'string(5)' }]);
    expect(result.valueMismatches).toEqual([]);
    expect(result.matchedRows).toBe(1);
  });

  it('should apply the padding policy to fixed-width columns', async () => {
    const source = new MemorySource('mem://source', {
      T: { columns: [column('ID', 'INTEGER'), column('CODE', 'CHAR', { length: 4 })], rows: [{ ID: 1, CODE: 'AB  ' }] },
    });
    const target = new MemorySource('mem://target', {
      T: { columns: [column('ID', 'INTEGER'), column('CODE', 'VARCHAR2', { length: 4 })], rows: [{ ID: 1, CODE: 'AB' }] },
    });

    const trimmed = await orchestrator.compareTable(source, target, { name: 'T', keyColumns: ['ID'] }, { padding: 'trim' });
    const preserved = await orchestrator.compareTable(source, target, { name: 'T', keyColumns: ['ID'] }, { padding: 'preserve' });

    expect(trimmed.valueMismatches).toEqual([]);
    expect(preserved.valueMismatches).toEqual([{ key: 1, column: 'CODE', sourceValue: 'AB  ', targetValue: 'AB' }]);
  });

  it('should trim only the source side under trim-source', async () => {
    const source = new MemorySource('mem://source', {
      P: { columns: [column('ID', 'INTEGER'), column('CODE', 'CHAR', { length: 4 })], rows: [{ ID: 1, CODE: 'AB  ' }] },
      Q: { columns: [column('ID', 'INTEGER'), column('CODE', 'VARCHAR2', { length: 4 })], rows: [{ ID: 1, CODE: 'XY' }] },
    });
    const target = new MemorySource('mem://target', {
      P: { columns: [column('ID', 'INTEGER'), column('CODE', 'VARCHAR2', { length: 4 })], rows: [{ ID: 1, CODE: 'AB' }] },
      Q: { columns: [column('ID', 'INTEGER'), column('CODE', 'CHAR', { length: 4 })], rows: [{ ID: 1, CODE: 'XY  ' }] },
    });

    const padded = await orchestrator.compareTable(source, target, { name: 'P', keyColumns: ['ID'] }, { padding: 'trim-source' });
    const targetPadded = await orchestrator.compareTable(source, target, { name: 'Q', keyColumns: ['ID'] }, { padding: 'trim-source' });

    expect(padded.valueMismatches).toEqual([]);
    expect(targetPadded.valueMismatches).toEqual([{ key: 1, column: 'CODE', sourceValue: 'XY', targetValue: 'XY  ' }]);
  });

  it('should read every row of a duplicated key when ties come back in varying order', async () => {
    const tieColumns = [column('ID', 'INTEGER', { nullable: false }), column('V', 'VARCHAR2', { length: 5 })];
    const source = new MemorySource(
      'mem://source',
      { T: { columns: tieColumns, rows: [{ ID: 1, V: 'a' }, { ID: 1, V: 'b' }, { ID: 2, V: 'c' }] } },
      { unstableTies: true }
    );
    const target = new MemorySource(
      'mem://target',
      { T: { columns: tieColumns, rows: [{ ID: 1, V: 'a' }, { ID: 2, V: 'c' }] } },
      { unstableTies: true }
    );

    const result = await orchestrator.compareTable(source, target, { name: 'T', keyColumns: ['ID'] }, { batchSize: 1 });

    expect(source.fetches[0]?.options.orderBy).toEqual(['ID', 'V']);
    expect(result.duplicateKeys).toEqual([{ side: 'source', key: 1, occurrences: 2 }]);
    expect(result.missingRows).toEqual([{ side: 'target', key: 1, row: { ID: 1, V: 'b' } }]);
    expect(result.valueMismatches).toEqual([]);
    expect(result.matchedRows).toBe(2);
  });

  it('should read prefixed physical tables on each side', async () => {
    const source = new MemorySource('mem://source', { INFORMATICA_ITEMS: items(sameRows) });
    const target = new MemorySource('mem://target', { PYTHON_ITEMS: items(sameRows) });

    const result = await orchestrator.compareTable(source, target, {
      name: 'ITEMS',
      keyColumns: ['ID'],
      sourceTable: 'INFORMATICA_ITEMS',
      targetTable: 'PYTHON_ITEMS',
    });

    expect(result.table).toBe('ITEMS');
    expect(result.status).toBe('completed');
    expect(result.matchedRows).toBe(3);
  });

  it('should emit progress for every stage and batch', async () => {
    const source = new MemorySource('mem://source', { ITEMS: items(sameRows) });
    const target = new MemorySource('mem://target', { ITEMS: items(sameRows) });
    const events: ProgressEvent[] = [];

    await orchestrator.compareTable(
      source,
      target,
      { name: 'ITEMS', keyColumns: ['ID'] },
      { batchSize: 2, onProgress: event => events.push(event) }
    );

    expect(events.map(e => e.stage)).toEqual([
      'schema-fetch',
      'schema-diff',
      'row-count-fetch',
      'row-stream',
      'row-stream',
      'row-stream',
      'row-stream',
      'row-stream',
      'row-diff',
      'assemble',
      'done',
    ]);
    expect(events.map(e => e.batchesCompleted)).toEqual([0, 0, 0, 0, 1, 2, 3, 4, 4, 4, 4]);
    expect(events.every(e => e.table === 'ITEMS')).toBe(true);
    expect(events[events.length - 1]).toEqual({ table: 'ITEMS', stage: 'done', batchesCompleted: 4, totalBatches: 4 });
  });

  it('should return a cancelled result when the signal is already aborted', async () => {
    const source = new MemorySource('mem://source', { ITEMS: items(sameRows) });
    const target = new MemorySource('mem://target', { ITEMS: items(sameRows) });
    const controller = new AbortController();
    controller.abort();
    const stages: string[] = [];

    const result = await orchestrator.compareTable(
      source,
      target,
      { name: 'ITEMS', keyColumns: ['ID'] },
      { signal: controller.signal, onProgress: e => stages.push(e.stage) }
    );

    expect(result.status).toBe('cancelled');
    expect(result.error).toEqual({ kind: 'Cancelled', message: 'Comparison of "ITEMS" was cancelled' });
    expect(stages).toEqual(['schema-fetch', 'cancelled']);
    expect(source.fetches).toHaveLength(0);
  });

  it('should stop with a cancelled result when aborted during row streaming', async () => {
    const source = new MemorySource('mem://source', { ITEMS: items(sameRows) });
    const target = new MemorySource('mem://target', { ITEMS: items(sameRows) });
    const controller = new AbortController();
    const stages: string[] = [];

    const result = await orchestrator.compareTable(
      source,
      target,
      { name: 'ITEMS', keyColumns: ['ID'] },
      {
        batchSize: 1,
        signal: controller.signal,
        onProgress: event => {
          stages.push(event.stage);
          if (event.stage === 'row-stream' && event.batchesCompleted === 1) controller.abort();
        },
      }
    );

    expect(result.status).toBe('cancelled');
    expect(result.error?.kind).toBe('Cancelled');
    expect(stages[stages.length - 1]).toBe('cancelled');
    expect(target.fetches).toHaveLength(1);
    expect(source.fetches).toHaveLength(0);
  });

  it('should turn extraction failures into a failed result', async () => {
    const source = new MemorySource('mem://source', { ITEMS: items(sameRows) }, { rowsAfter: { offset: 0, error: new Error('ORA-03113') } });
    const target = new MemorySource('mem://target', { ITEMS: items(sameRows) });

    const result = await orchestrator.compareTable(source, target, { name: 'ITEMS', keyColumns: ['ID'] });

    expect(result.status).toBe('failed');
    expect(result.error?.kind).toBe('RowExtractionError');
    expect(result.rowCounts).toEqual({ source: 3, target: 3 });
  });

  it('should turn schema lookup failures into a failed result', async () => {
    const source = new MemorySource('mem://source', {});
    const target = new MemorySource('mem://target', { ITEMS: items(sameRows) });

    const result = await orchestrator.compareTable(source, target, { name: 'ITEMS', keyColumns: ['ID'] });

    expect(result.error).toEqual({
      kind: 'SchemaLookupError',
      message: 'Table "ITEMS" does not exist or has no visible columns',
    });
  });

  it('should classify primary key and row count failures', async () => {
    const target = new MemorySource('mem://target', { ITEMS: items(sameRows) });
    const noKey = new MemorySource('mem://source', { ITEMS: items(sameRows) }, { primaryKey: new Error('ORA-01031') });
    const noCount = new MemorySource('mem://source', { ITEMS: items(sameRows) }, { rowCount: new Error('ORA-01013') });

    const keyResult = await orchestrator.compareTable(noKey, target, { name: 'ITEMS' });
    const countResult = await orchestrator.compareTable(noCount, target, { name: 'ITEMS', keyColumns: ['ID'] });

    expect(keyResult.error).toEqual({ kind: 'SchemaLookupError', message: 'Cannot read primary key of "ITEMS": ORA-01031' });
    expect(countResult.error).toEqual({
      kind: 'RowExtractionError',
      message: 'Counting rows of "ITEMS" on mem://source failed: ORA-01013',
    });
  });

  it('should produce identical results on unchanged data', async () => {
    const source = new MemorySource('mem://source', {
      ITEMS: items([{ ID: '1', NAME: 'A' }, { ID: '2', NAME: 'B' }, { ID: '4', NAME: 'D' }]),
    });
    const target = new MemorySource('mem://target', {
      ITEMS: items([{ ID: '1', NAME: 'a' }, { ID: '3', NAME: 'C' }, { ID: '4', NAME: 'D' }]),
    });
    const table = { name: 'ITEMS', keyColumns: ['ID'] };

    const first = await orchestrator.compareTable(source, target, table, { batchSize: 1 });
    const second = await orchestrator.compareTable(source, target, table, { batchSize: 1 });

    expect(JSON.stringify(withoutTiming(second))).toBe(JSON.stringify(withoutTiming(first)));
    expect(first.valueMismatches).toEqual([{ key: 1, column: 'NAME', sourceValue: 'A', targetValue: 'a' }]);
  });
});
