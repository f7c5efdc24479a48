import type { ColumnDefinition } from '../../types/index.js';
import { defaultClause, joinClauses, nullClause } from '../columnClauses.js';
import type { ColumnChange, IDDLGenerator } from '../interfaces.js';

export class OracleDDLGenerator implements IDDLGenerator {
  generateAddColumn(table: string, _schema: string, column: ColumnDefinition): string {
    return `ALTER TABLE ${table} ADD (${joinClauses([column.name, column.type, defaultClause(column), column.extra, nullClause(column)])});`;
  }

  // MODIFY rejects a NULL/NOT NULL the column already has (ORA-01442, ORA-01451),
  // so each statement only touches the attribute that differs.
  generateModifyColumn(table: string, _schema: string, column: ColumnDefinition, change: ColumnChange): string {
    const clauses =
      change === 'TYPE_MISMATCH'
        ? [column.name, column.type, defaultClause(column)]
        : [column.name, nullClause(column)];
    return `ALTER TABLE ${table} MODIFY (${joinClauses(clauses)});`;
  }
}
