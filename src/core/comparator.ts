import { ALL_COLUMNS, type ComparisonResult, EXISTS, MISSING, type SchemaDiff } from '../types/comparison.js';
import type { ColumnDescriptor, SchemaSnapshot } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { buildLookup } from './snapshot.js';

/**
 * Lists what DB2 (`target`) lacks or has in excess relative to DB1
 * (`master`). Names are matched case-sensitively. Output follows master
 * table order, then target order for extras.
 */
export function compareSnapshots(master: SchemaSnapshot, target: SchemaSnapshot): SchemaDiff[] {
  if (master.columns.length === 0) return [];

  const diffs: SchemaDiff[] = [];
  const masterTables = buildLookup(master);
  const targetTables = buildLookup(target);

  // 1. Tables
  for (const table of masterTables.keys()) {
    if (!targetTables.has(table)) {
      diffs.push({ type: 'MISSING_TABLE', table, column: ALL_COLUMNS, expected: EXISTS, actual: MISSING });
    }
  }

  for (const table of targetTables.keys()) {
    if (!masterTables.has(table)) {
      diffs.push({ type: 'EXTRA_TABLE', table, column: ALL_COLUMNS, expected: MISSING, actual: EXISTS });
    }
  }

  // 2. Columns of tables present on both sides
  for (const [table, masterCols] of masterTables) {
    const targetCols = targetTables.get(table);
    if (!targetCols) continue;

    for (const column of masterCols.keys()) {
      if (!targetCols.has(column)) {
        diffs.push({ type: 'MISSING_COLUMN', table, column, expected: EXISTS, actual: MISSING });
      }
    }

    for (const column of targetCols.keys()) {
      if (!masterCols.has(column)) {
        diffs.push({ type: 'EXTRA_COLUMN', table, column, expected: MISSING, actual: EXISTS });
      }
    }

    for (const [column, mCol] of masterCols) {
      const tCol = targetCols.get(column);
      if (tCol) diffs.push(...compareColumn(mCol, tCol));
    }
  }

  return diffs.map(d => Object.freeze(d));
}

function compareColumn(mCol: ColumnDescriptor, tCol: ColumnDescriptor): SchemaDiff[] {
  const diffs: SchemaDiff[] = [];

  if (mCol.type !== tCol.type) {
    diffs.push({ type: 'TYPE_MISMATCH', table: mCol.table, column: mCol.column, expected: mCol.type, actual: tCol.type });
  }

  if (mCol.nullable !== tCol.nullable) {
    diffs.push({
      type: 'NULLABILITY_MISMATCH',
      table: mCol.table,
      column: mCol.column,
      expected: String(mCol.nullable),
      actual: String(tCol.nullable),
    });
  }

  return diffs;
}

export class SchemaComparator {
  compare(master: SchemaSnapshot, target: SchemaSnapshot): ComparisonResult {
    logger.info('Comparing databases...');
    const diffs = compareSnapshots(master, target);
    logger.info(`Found ${diffs.length} differences between ${master.source} and ${target.source}`);

    return {
      sourceDb: master.source,
      targetDb: target.source,
      diffs,
    };
  }
}
