import type { DiffType } from '../types/comparison.js';
import type { ColumnDefinition, InspectedColumn } from '../types/index.js';

export type QueryRow = Record<string, unknown>;
export type QueryParam = string | number | null;

export interface IDbConnection {
  query<T extends QueryRow = QueryRow>(text: string, params?: QueryParam[]): Promise<T[]>;
  close(): Promise<void>;
}

export interface ISchemaInspector {
  listTables(schema: string): Promise<string[]>;
  listColumns(schema: string, tableName: string): Promise<InspectedColumn[]>;
}

export interface IDefinitionProvider {
  /** Native CREATE statement for the table, without the trailing semicolon. */
  getTableDefinition(schema: string, tableName: string): Promise<string>;
  getColumnDefinition(schema: string, tableName: string, columnName: string): Promise<ColumnDefinition | null>;
}

/** The column attribute a modify statement realigns. */
export type ColumnChange = Extract<DiffType, 'TYPE_MISMATCH' | 'NULLABILITY_MISMATCH'>;

export interface IDDLGenerator {
  generateAddColumn(table: string, schema: string, column: ColumnDefinition): string;
  generateModifyColumn(table: string, schema: string, column: ColumnDefinition, change: ColumnChange): string;
}
