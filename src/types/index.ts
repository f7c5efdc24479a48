export type DbType = 'postgres' | 'oracle';

export interface ConnectionConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  schema?: string;
}

export interface DatabaseTarget {
  type: DbType;
  connection: ConnectionConfig;
}

export interface RunConfig {
  master?: DatabaseTarget;
  target?: DatabaseTarget;
  outputDir: string;
  reportFile: string;
  sqlFile: string;
  sync: boolean;
}

// Raw column as returned by an introspection provider.
export interface InspectedColumn {
  name: string;
  type: string;
  nullable: boolean;
  default?: string | null;
}

export interface InspectedTable {
  table: string;
  columns: InspectedColumn[];
}

export interface ColumnDescriptor {
  readonly source: string;
  readonly table: string;
  readonly column: string;
  readonly type: string;
  readonly nullable: boolean;
  readonly default: string;
}

export interface SchemaSnapshot {
  readonly source: string;
  readonly columns: readonly ColumnDescriptor[];
}

export type SnapshotLookup = Map<string, Map<string, ColumnDescriptor>>;

export interface SnapshotResult {
  snapshot: SchemaSnapshot;
  ok: boolean;
  tableCount: number;
  error?: string;
}

/**
 * Native description of a single column, shaped after MySQL's SHOW COLUMNS
 * (Field, Type, Null, Key, Default, Extra).
 */
export interface ColumnDefinition {
  name: string;
  type: string;
  nullFlag: 'YES' | 'NO';
  key: string;
  default: string | null;
  extra: string;
}

export interface TableMetadata {
  name: string;
  schema: string;
  columns: ColumnDefinition[];
  primaryKey?: { name: string; columns: string[] };
}
