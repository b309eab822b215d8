import { ITableSource } from '../engines/interfaces.js';
import { CompareOptions, ComparisonResult } from '../types/comparison.js';
import { TableTarget } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from './errors.js';
import { ComparisonOrchestrator, failedResult } from './orchestrator.js';

export const DEFAULT_CONCURRENCY = 4;

export interface BatchCompareOptions extends CompareOptions {
  /** Opens a fresh source-side connection; one per table. */
  openSource: () => Promise<ITableSource> | ITableSource;
  openTarget: () => Promise<ITableSource> | ITableSource;
  concurrency?: number;
  onTableComplete?: (result: ComparisonResult, completed: number, total: number) => void;
}

/**
 * Compares several tables, `concurrency` at a time. Every table holds its own
 * connection pair for the duration of its comparison, and a failure stays
 * confined to that table's result. Results keep the input order.
 *
 * @example
 * ```typescript
 * const results = await compareTables(tables, {
 *   openSource: () => EngineFactory.createSource(env.source),
 *   openTarget: () => EngineFactory.createSource(env.target),
 *   concurrency: 4,
 *   onTableComplete: (result, done, total) => console.log(`${done}/${total} ${result.table}`),
 * });
 * ```
 */
export async function compareTables(tables: TableTarget[], options: BatchCompareOptions): Promise<ComparisonResult[]> {
  const { openSource, openTarget, onTableComplete, ...compareOptions } = options;
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const orchestrator = new ComparisonOrchestrator();
  const results: ComparisonResult[] = [];
  let completed = 0;

  const runOne = async (table: TableTarget): Promise<ComparisonResult> => {
    if (compareOptions.signal?.aborted) {
      return failedResult(table, 'cancelled', 'Cancelled', `Comparison of "${table.name}" was cancelled`);
    }

    const opened: ITableSource[] = [];
    try {
      let source: ITableSource;
      let target: ITableSource;
      try {
        source = await openSource();
        opened.push(source);
        target = await openTarget();
        opened.push(target);
      } catch (error) {
        logger.error({ table: table.name, error }, 'Could not open connections');
        return failedResult(table, 'failed', 'ConnectionError', `Could not open connections: ${errorMessage(error)}`);
      }

      return await orchestrator.compareTable(source, target, table, compareOptions);
    } finally {
      await Promise.all(opened.map(conn => releaseConnection(conn, table.name)));
    }
  };

  for (let i = 0; i < tables.length; i += concurrency) {
    const batch = tables.slice(i, i + concurrency);

    const batchResults = await Promise.all(
      batch.map(async (table) => {
        const result = await runOne(table);
        completed++;
        onTableComplete?.(result, completed, tables.length);
        return result;
      })
    );

    results.push(...batchResults);
  }

  return results;
}

async function releaseConnection(conn: ITableSource, table: string): Promise<void> {
  try {
    await conn.close();
  } catch (error) {
    logger.warn({ table, source: conn.label, error }, 'Error releasing connection');
  }
}
