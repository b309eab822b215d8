import dayjs from 'dayjs';
import ExcelJS from 'exceljs';
import fs from 'fs-extra';
import path from 'path';
import { formatKey, summarize, toReport } from '../core/report.js';
import { ComparisonResult } from '../types/comparison.js';
import { CanonicalValue } from '../types/index.js';
import { logger } from './logger.js';

export interface DifferenceRow {
  table: string;
  section: string;
  key: string;
  column: string;
  source: string;
  target: string;
}

const display = (value: CanonicalValue | undefined): string => (value === null ? 'NULL' : value === undefined ? '-' : String(value));

/** One line per difference across all tables, the layout of the CSV export. */
export function flattenDifferences(results: ComparisonResult[]): DifferenceRow[] {
  const rows: DifferenceRow[] = [];

  for (const result of results) {
    if (result.error) {
      rows.push({ table: result.table, section: result.status.toUpperCase(), key: '-', column: '-', source: result.error.kind, target: result.error.message });
      continue;
    }
    for (const diff of result.schemaDifferences) {
      rows.push({ table: result.table, section: diff.issue.toUpperCase(), key: '-', column: diff.column, source: diff.source ?? '-', target: diff.target ?? '-' });
    }
    for (const missing of result.missingRows) {
      rows.push({
        table: result.table,
        section: missing.side === 'target' ? 'MISSING IN TARGET' : 'MISSING IN SOURCE',
        key: formatKey(missing.key),
        column: '-',
        source: missing.side === 'target' ? JSON.stringify(missing.row) : '-',
        target: missing.side === 'source' ? JSON.stringify(missing.row) : '-',
      });
    }
    for (const mismatch of result.valueMismatches) {
      rows.push({
        table: result.table,
        section: 'VALUE MISMATCH',
        key: formatKey(mismatch.key),
        column: mismatch.column,
        source: display(mismatch.sourceValue),
        target: display(mismatch.targetValue),
      });
    }
    for (const dup of result.duplicateKeys) {
      rows.push({ table: result.table, section: 'DUPLICATE KEY', key: formatKey(dup.key), column: '-', source: dup.side === 'source' ? `${dup.occurrences}x` : '-', target: dup.side === 'target' ? `${dup.occurrences}x` : '-' });
    }
  }

  return rows;
}

export function defaultReportPath(environment: string, outputDir = path.join(process.cwd(), 'files', 'comparisons')): string {
  const timestamp = dayjs().format('YYYY_MM_DD_HH_mm');
  return path.join(outputDir, `comparison_${environment}_${timestamp}.xlsx`);
}

export class ComparisonExporter {
  static async export(results: ComparisonResult[], outputPath: string) {
    fs.ensureDirSync(path.dirname(outputPath));
    const ext = path.extname(outputPath).toLowerCase();

    if (ext === '.csv') {
      await this.exportToCSV(results, outputPath);
    } else if (ext === '.json') {
      await this.exportToJSON(results, outputPath);
    } else {
      await this.exportToExcel(results, outputPath);
    }
  }

  private static async exportToExcel(results: ComparisonResult[], outputPath: string) {
    const workbook = new ExcelJS.Workbook();

    const summarySheet = workbook.addWorksheet('Summary');
    summarySheet.columns = [
      { header: 'Table', key: 'table', width: 30 },
      { header: 'Status', key: 'status', width: 12 },
      { header: 'Source Rows', key: 'sourceRows', width: 14 },
      { header: 'Target Rows', key: 'targetRows', width: 14 },
      { header: 'Schema Diffs', key: 'schema', width: 14 },
      { header: 'Missing Rows', key: 'missing', width: 14 },
      { header: 'Value Mismatches', key: 'mismatches', width: 18 },
      { header: 'Duplicate Keys', key: 'duplicates', width: 16 },
      { header: 'Error', key: 'error', width: 50 },
    ];
    this.styleHeader(summarySheet);

    for (const result of results) {
      summarySheet.addRow({
        table: result.table,
        status: result.status,
        sourceRows: result.rowCounts.source,
        targetRows: result.rowCounts.target,
        schema: result.schemaDifferences.length,
        missing: result.missingRows.length,
        mismatches: result.valueMismatches.length,
        duplicates: result.duplicateKeys.length,
        error: result.error ? `${result.error.kind}: ${result.error.message}` : '-',
      });
    }

    const totals = summarize(results);
    summarySheet.addRow({
      table: 'TOTAL',
      status: `${totals.completed}/${totals.tables}`,
      sourceRows: totals.rowCounts.source,
      targetRows: totals.rowCounts.target,
      schema: totals.schemaDifferences,
      missing: totals.missingRows,
      mismatches: totals.valueMismatches,
      duplicates: totals.duplicateKeys,
    }).font = { bold: true };

    const diffSheet = workbook.addWorksheet('Differences');
    diffSheet.columns = [
      { header: 'Table', key: 'table', width: 30 },
      { header: 'Type', key: 'section', width: 25 },
      { header: 'Key', key: 'key', width: 25 },
      { header: 'Column', key: 'column', width: 30 },
      { header: 'Source (Expected)', key: 'source', width: 50 },
      { header: 'Target (Actual)', key: 'target', width: 50 },
    ];
    this.styleHeader(diffSheet);
    flattenDifferences(results).forEach(row => diffSheet.addRow(row));

    await workbook.xlsx.writeFile(outputPath);
    logger.info(`Comparison results exported to Excel: ${outputPath}`);
  }

  private static async exportToCSV(results: ComparisonResult[], outputPath: string) {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Differences');

    sheet.columns = [
      { header: 'Table', key: 'table' },
      { header: 'Type', key: 'section' },
      { header: 'Key', key: 'key' },
      { header: 'Column', key: 'column' },
      { header: 'Source (Expected)', key: 'source' },
      { header: 'Target (Actual)', key: 'target' },
    ];
    flattenDifferences(results).forEach(row => sheet.addRow(row));

    await workbook.csv.writeFile(outputPath);
    logger.info(`Comparison results exported to CSV: ${outputPath}`);
  }

  private static async exportToJSON(results: ComparisonResult[], outputPath: string) {
    await fs.writeJson(
      outputPath,
      { summary: summarize(results), comparisons: results.map(toReport) },
      { spaces: 2 }
    );
    logger.info(`Comparison results exported to JSON: ${outputPath}`);
  }

  private static styleHeader(sheet: ExcelJS.Worksheet) {
    sheet.getRow(1).font = { bold: true };
    sheet.getRow(1).fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE0E0E0' },
    };
  }
}
