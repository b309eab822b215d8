#!/usr/bin/env node
import Table from 'cli-table3';
import { Command } from 'commander';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  ConfigError,
  getEnvironment,
  listEnvironments,
  loadCategories,
  loadDotEnv,
  loadSettings,
  resolveTables,
} from '../config/config.js';
import { compareTables } from '../core/batch.js';
import { errorMessage } from '../core/errors.js';
import { formatKey, summarize } from '../core/report.js';
import { EngineFactory } from '../engines/factory.js';
import { ComparisonResult } from '../types/comparison.js';
import { ComparisonExporter, defaultReportPath } from '../utils/exporter.js';
import { logger } from '../utils/logger.js';

const compareOptionsSchema = z.object({
  env: z.string().min(1),
  category: z.string().optional(),
  tables: z
    .string()
    .optional()
    .transform(t => (t ? t.split(',').map(s => s.trim()).filter(Boolean) : undefined)),
  batchSize: z.coerce.number().int().positive().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  padding: z.enum(['trim', 'preserve', 'trim-source']).default('trim'),
  emptyAsNull: z.boolean().default(false),
  output: z.union([z.string(), z.literal(true)]).optional(),
});

const envOptionSchema = z.object({ env: z.string().min(1) });

function handleError(error: unknown): never {
  if (error instanceof z.ZodError) {
    logger.error({ errors: error.issues }, 'Invalid options');
  } else if (error instanceof ConfigError) {
    logger.error({ missing: error.missing }, error.message);
  } else {
    logger.error(error, 'Error during execution');
  }
  process.exit(1);
}

function resolveOutputPath(output: string | true, environment: string): string {
  if (output === true) return defaultReportPath(environment);
  return path.isAbsolute(output) ? output : path.join(process.cwd(), 'files', 'comparisons', output);
}

function printResults(results: ComparisonResult[]) {
  const table = new Table({
    head: ['Table', 'Status', 'Source', 'Target', 'Schema', 'Missing', 'Mismatches', 'Duplicates'],
    wordWrap: true,
  });

  for (const result of results) {
    table.push([
      result.table,
      result.error ? `${result.status} (${result.error.kind})` : result.status,
      result.rowCounts.source,
      result.rowCounts.target,
      result.schemaDifferences.length,
      result.missingRows.length,
      result.valueMismatches.length,
      result.duplicateKeys.length,
    ]);
  }

  const totals = summarize(results);
  table.push([
    'TOTAL',
    `${totals.completed}/${totals.tables} completed`,
    totals.rowCounts.source,
    totals.rowCounts.target,
    totals.schemaDifferences,
    totals.missingRows,
    totals.valueMismatches,
    totals.duplicateKeys,
  ]);
  console.log(table.toString());

  for (const result of results.filter(r => r.hasDifferences)) {
    const details = new Table({
      head: ['Type', 'Key', 'Column', 'Source (Expected)', 'Target (Actual)'],
      colWidths: [22, 20, 30, 40, 40],
      wordWrap: true,
    });
    result.schemaDifferences.forEach(d => details.push([d.issue.replace(/_/g, ' '), '-', d.column, d.source ?? '-', d.target ?? '-']));
    result.missingRows.forEach(m => details.push([`missing in ${m.side}`, formatKey(m.key), '-', '-', '-']));
    result.valueMismatches.forEach(v => details.push(['value mismatch', formatKey(v.key), v.column, String(v.sourceValue), String(v.targetValue)]));
    console.log(`\n❌ ${result.table}`);
    console.log(details.toString());
  }

  for (const result of results.filter(r => r.error)) {
    console.log(`\n⚠️  ${result.table}: ${result.error?.message}`);
  }
}

export async function runCli() {
  const program = new Command();

  program
    .name('etl-parity')
    .description('Compare tables produced by two ETL pipelines')
    .version('1.0.0');

  program
    .command('environments')
    .description('List configured environments')
    .action(() => {
      loadDotEnv();
      const names = listEnvironments();
      if (names.length === 0) {
        console.log('No environments configured. Check your .env file.');
        return;
      }
      names.forEach(name => console.log(name));
    });

  program
    .command('categories')
    .description('List table categories and their tables')
    .action(async () => {
      try {
        loadDotEnv();
        const categories = await loadCategories(loadSettings().categoriesFile);
        const table = new Table({ head: ['Category', 'Table', 'Key Columns'] });
        for (const [category, tables] of Object.entries(categories)) {
          tables.forEach(t => table.push([category, t.table, t.keyColumns.length > 0 ? t.keyColumns.join(', ') : '(primary key)']));
        }
        console.log(table.toString());
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('check')
    .description('Check connectivity of both sides of an environment')
    .requiredOption('-e, --env <string>', 'Environment (dev, qa, prod)')
    .action(async (options: unknown) => {
      try {
        loadDotEnv();
        const { env } = envOptionSchema.parse(options);
        const environment = getEnvironment(env);

        const table = new Table({ head: ['Side', 'Connection', 'Status'] });
        let healthy = true;
        for (const [side, config] of [['source', environment.source], ['target', environment.target]] as const) {
          const conn = EngineFactory.createSource(config);
          try {
            await conn.ping();
            table.push([side, conn.label, '✅ ok']);
          } catch (error) {
            healthy = false;
            table.push([side, conn.label, `❌ ${errorMessage(error)}`]);
          } finally {
            await conn.close();
          }
        }
        console.log(table.toString());
        if (!healthy) process.exit(1);
      } catch (error) {
        handleError(error);
      }
    });

  program
    .command('compare')
    .description('Compare source and target tables of an environment')
    .requiredOption('-e, --env <string>', 'Environment (dev, qa, prod)')
    .option('-c, --category <string>', 'Compare every table of a category')
    .option('-t, --tables <string>', 'Comma separated list of tables to compare')
    .option('-b, --batch-size <number>', 'Rows fetched per query')
    .option('--concurrency <number>', 'Tables compared at the same time')
    .option('--padding <policy>', 'Fixed-width string padding: trim, preserve or trim-source', 'trim')
    .option('--empty-as-null', 'Treat empty strings as NULL when comparing values', false)
    .option('-o, --output [string]', 'Output file path (e.g. results.xlsx, results.csv or results.json)')
    .action(async (options: unknown) => {
      try {
        loadDotEnv();
        const validated = compareOptionsSchema.parse(options);
        const environment = getEnvironment(validated.env);
        const settings = loadSettings();
        const categories = await loadCategories(settings.categoriesFile);

        const tables = resolveTables(
          categories,
          { category: validated.category, tables: validated.tables },
          { source: environment.source.tablePrefix, target: environment.target.tablePrefix }
        );

        const controller = new AbortController();
        process.once('SIGINT', () => {
          logger.warn('Interrupted, cancelling running comparisons');
          controller.abort();
        });

        logger.info({ environment: environment.name, tables: tables.length }, 'Starting comparison');
        const results = await compareTables(tables, {
          openSource: () => EngineFactory.createSource(environment.source),
          openTarget: () => EngineFactory.createSource(environment.target),
          batchSize: validated.batchSize ?? settings.batchSize,
          concurrency: validated.concurrency ?? settings.concurrency,
          padding: validated.padding,
          emptyStringAsNull: validated.emptyAsNull,
          signal: controller.signal,
          onProgress: event => logger.debug(event, 'Progress'),
          onTableComplete: (result, completed, total) =>
            logger.info(`[${completed}/${total}] ${result.table}: ${result.status}${result.hasDifferences ? ' (differences found)' : ''}`),
        });

        printResults(results);

        if (validated.output !== undefined) {
          await ComparisonExporter.export(results, resolveOutputPath(validated.output, environment.name));
        }

        const totals = summarize(results);
        if (totals.tablesWithDifferences === 0 && totals.failed === 0 && totals.cancelled === 0) {
          console.log('\n✅ No differences found. Tables are identical.');
        }
        if (totals.failed > 0 || totals.cancelled > 0) {
          process.exit(1);
        }
      } catch (error) {
        handleError(error);
      }
    });

  await program.parseAsync();
}

const isMain = process.argv[1] && fileURLToPath(import.meta.url).endsWith(process.argv[1]);

if (isMain) {
  runCli().catch(handleError);
}
