import ExcelJS from 'exceljs';
import type { Column, Workbook, Worksheet } from 'exceljs';
import fs from 'fs-extra';
import path from 'path';
import { DIFF_LABELS, type SchemaDiff } from '../types/comparison.js';
import type { ColumnDescriptor, SchemaSnapshot } from '../types/index.js';
import { logger } from './logger.js';

export interface StructureReport {
  master: SchemaSnapshot;
  target: SchemaSnapshot;
  diffs: readonly SchemaDiff[];
}

const STRUCTURE_COLUMNS: Partial<Column>[] = [
  { header: 'Database', key: 'source', width: 12 },
  { header: 'Table', key: 'table', width: 30 },
  { header: 'Column', key: 'column', width: 30 },
  { header: 'Type', key: 'type', width: 25 },
  { header: 'Nullable', key: 'nullable', width: 10 },
  { header: 'Default', key: 'default', width: 40 },
];

const DIFF_COLUMNS: Partial<Column>[] = [
  { header: 'Table', key: 'table', width: 30 },
  { header: 'Column', key: 'column', width: 30 },
  { header: 'Difference Type', key: 'type', width: 25 },
  { header: 'DB1 Value', key: 'expected', width: 30 },
  { header: 'DB2 Value', key: 'actual', width: 30 },
];

export function toDiffRow(diff: SchemaDiff) {
  return {
    table: diff.table,
    column: diff.column,
    type: DIFF_LABELS[diff.type],
    expected: diff.expected,
    actual: diff.actual,
  };
}

function toStructureRow(col: ColumnDescriptor) {
  return { ...col, nullable: String(col.nullable) };
}

export class SchemaExporter {
  static async exportToSheet(report: StructureReport, outputPath: string) {
    fs.ensureDirSync(path.dirname(outputPath));
    const ext = path.extname(outputPath).toLowerCase();

    if (ext === '.csv') {
      await this.exportToCSV(report, outputPath);
    } else {
      await this.exportToExcel(report, outputPath);
    }
  }

  /** One sheet per database, their concatenation, and the differences. */
  private static async exportToExcel(report: StructureReport, outputPath: string) {
    const workbook = new ExcelJS.Workbook();
    const combined = [...report.master.columns, ...report.target.columns];

    this.addStructureSheet(workbook, 'DB1', report.master.columns);
    this.addStructureSheet(workbook, 'DB2', report.target.columns);
    this.addStructureSheet(workbook, 'Combined', combined);
    this.addDiffSheet(workbook, report.diffs);

    await workbook.xlsx.writeFile(outputPath);
    logger.info(`Successfully exported database structure and differences to ${outputPath}`);
  }

  private static async exportToCSV(report: StructureReport, outputPath: string) {
    const workbook = new ExcelJS.Workbook();
    this.addDiffSheet(workbook, report.diffs);

    await workbook.csv.writeFile(outputPath);
    logger.info(`Differences exported to CSV: ${outputPath}`);
  }

  private static addStructureSheet(workbook: Workbook, name: string, columns: readonly ColumnDescriptor[]) {
    if (columns.length === 0) return;

    const sheet = workbook.addWorksheet(name);
    sheet.columns = STRUCTURE_COLUMNS;
    this.styleHeader(sheet);
    columns.forEach(col => sheet.addRow(toStructureRow(col)));
  }

  // Always present, header-only when the schemas match.
  private static addDiffSheet(workbook: Workbook, diffs: readonly SchemaDiff[]) {
    const sheet = workbook.addWorksheet('Differences');
    sheet.columns = DIFF_COLUMNS;
    this.styleHeader(sheet);
    diffs.forEach(diff => sheet.addRow(toDiffRow(diff)));
  }

  private static styleHeader(sheet: Worksheet) {
    sheet.getRow(1).font = { bold: true };
    sheet.getRow(1).fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE0E0E0' }
    };
  }
}
