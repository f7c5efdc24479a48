import type { ColumnDefinition, TableMetadata } from '../../types/index.js';
import { defaultClause, joinClauses, nullClause } from '../columnClauses.js';
import type { ColumnChange, IDDLGenerator } from '../interfaces.js';

export class PostgresDDLGenerator implements IDDLGenerator {
  /** Stands in for SHOW CREATE TABLE, which PostgreSQL lacks. */
  generateTableCreate(meta: TableMetadata): string {
    const lines = meta.columns.map(col => this.formatColumn(col));

    if (meta.primaryKey) {
      lines.push(`CONSTRAINT "${meta.primaryKey.name}" PRIMARY KEY (${meta.primaryKey.columns.map(c => `"${c}"`).join(', ')})`);
    }

    return `CREATE TABLE ${this.qualify(meta.name, meta.schema)} (\n  ${lines.join(',\n  ')}\n)`;
  }

  generateAddColumn(table: string, schema: string, column: ColumnDefinition): string {
    return `ALTER TABLE ${this.qualify(table, schema)} ADD COLUMN ${this.formatColumn(column)};`;
  }

  generateModifyColumn(table: string, schema: string, column: ColumnDefinition, change: ColumnChange): string {
    const col = `ALTER COLUMN "${column.name}"`;
    const actions: string[] = [];

    if (change === 'TYPE_MISMATCH') {
      actions.push(`${col} TYPE ${column.type}`);
      const def = defaultClause(column);
      if (def) actions.push(`${col} SET ${def}`);
    } else {
      actions.push(`${col} ${column.nullFlag === 'NO' ? 'SET NOT NULL' : 'DROP NOT NULL'}`);
    }

    return `ALTER TABLE ${this.qualify(table, schema)}\n  ${actions.join(',\n  ')};`;
  }

  private qualify(table: string, schema: string): string {
    return `"${schema}"."${table}"`;
  }

  private formatColumn(col: ColumnDefinition): string {
    return joinClauses([`"${col.name}"`, col.type, nullClause(col), defaultClause(col), col.extra]);
  }
}
