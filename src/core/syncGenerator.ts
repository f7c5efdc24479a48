import type { IDDLGenerator, IDefinitionProvider } from '../engines/interfaces.js';
import { ALL_COLUMNS, DIFF_LABELS, type SchemaDiff, type SyncBlock, type SyncScript } from '../types/comparison.js';
import type { ColumnDefinition } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { describeError, LookupMissError } from './errors.js';

/**
 * Turns differences into advisory SQL that brings DB2 in line with DB1.
 * Only additive and modifying statements are produced; extra tables and
 * columns on DB2 are never dropped. Nothing is executed.
 */
export class SyncScriptGenerator {
  constructor(
    private definitions: IDefinitionProvider,
    private ddl: IDDLGenerator,
    private schema: string
  ) {}

  async generate(diffs: readonly SchemaDiff[]): Promise<SyncScript> {
    const blocks: SyncBlock[] = [];

    for (const [table, group] of groupByTable(diffs)) {
      if (group.some(d => d.type === 'MISSING_TABLE')) {
        blocks.push(await this.createTable(table));
        continue;
      }

      for (const diff of group) {
        const block = await this.patchColumn(diff);
        if (block) blocks.push(block);
      }
    }

    const failed = blocks.filter(b => b.status === 'failed').length;
    logger.info(`Generated ${blocks.length - failed} sync statements (${failed} failed)`);
    return { blocks };
  }

  private async createTable(table: string): Promise<SyncBlock> {
    logger.info(`Generating CREATE TABLE for ${table}...`);
    try {
      const createStmt = await this.definitions.getTableDefinition(this.schema, table);
      return generated(table, ALL_COLUMNS, 'MISSING_TABLE', [`-- Missing Table: ${table}`, `${createStmt};`]);
    } catch (error) {
      logger.error({ table, error }, 'CREATE TABLE generation failed');
      return failed(table, ALL_COLUMNS, 'MISSING_TABLE', `-- Error generating CREATE TABLE for ${table}: ${describeError(error)}`);
    }
  }

  private async patchColumn(diff: SchemaDiff): Promise<SyncBlock | null> {
    switch (diff.type) {
      case 'MISSING_COLUMN':
        logger.info(`Generating ADD COLUMN for ${diff.table}.${diff.column}...`);
        return this.columnBlock(diff, `-- Missing Column: ${diff.table}.${diff.column}`, def =>
          this.ddl.generateAddColumn(diff.table, this.schema, def)
        );
      case 'TYPE_MISMATCH':
      case 'NULLABILITY_MISMATCH': {
        const change = diff.type;
        logger.info(`Generating MODIFY COLUMN for ${diff.table}.${diff.column}...`);
        return this.columnBlock(diff, `-- Mismatch: ${diff.table}.${diff.column} (${DIFF_LABELS[change]})`, def =>
          this.ddl.generateModifyColumn(diff.table, this.schema, def, change)
        );
      }
      case 'MISSING_TABLE':
      case 'EXTRA_TABLE':
      case 'EXTRA_COLUMN':
        return null;
    }
  }

  private async columnBlock(
    diff: SchemaDiff,
    comment: string,
    render: (def: ColumnDefinition) => string
  ): Promise<SyncBlock> {
    try {
      const def = await this.definitions.getColumnDefinition(this.schema, diff.table, diff.column);
      if (!def) throw new LookupMissError(`${diff.table}.${diff.column}`);
      return generated(diff.table, diff.column, diff.type, [comment, render(def)]);
    } catch (error) {
      logger.error({ table: diff.table, column: diff.column, error }, 'Column definition lookup failed');
      return failed(
        diff.table,
        diff.column,
        diff.type,
        `-- Error getting definition for ${diff.table}.${diff.column}: ${describeError(error)}`
      );
    }
  }
}

function generated(table: string, column: string, type: SyncBlock['type'], lines: string[]): SyncBlock {
  return { table, column, type, status: 'generated', lines };
}

function failed(table: string, column: string, type: SyncBlock['type'], comment: string): SyncBlock {
  return { table, column, type, status: 'failed', lines: [comment] };
}

/** Tables in ascending name order, records in input order within each table. */
export function groupByTable(diffs: readonly SchemaDiff[]): Map<string, SchemaDiff[]> {
  const groups = new Map<string, SchemaDiff[]>();
  const tables = [...new Set(diffs.map(d => d.table))].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  for (const table of tables) groups.set(table, []);
  for (const diff of diffs) groups.get(diff.table)?.push(diff);

  return groups;
}

export function renderSyncScript(script: SyncScript): string {
  if (script.blocks.length === 0) return '';
  return script.blocks.map(b => b.lines.join('\n')).join('\n\n') + '\n';
}
