import type { ColumnDefinition } from '../types/index.js';

export function nullClause(column: ColumnDefinition): string {
  return column.nullFlag === 'NO' ? 'NOT NULL' : 'NULL';
}

/**
 * `DEFAULT <value>` when the column has a default, `DEFAULT NULL` for a
 * nullable column without one, and nothing otherwise.
 */
export function defaultClause(column: ColumnDefinition): string {
  if (column.default !== null) return `DEFAULT ${column.default}`;
  if (column.nullFlag === 'YES') return 'DEFAULT NULL';
  return '';
}

export function joinClauses(parts: string[]): string {
  return parts.filter(p => p.length > 0).join(' ');
}
