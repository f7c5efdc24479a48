export type DiffType =
  | 'MISSING_TABLE'
  | 'EXTRA_TABLE'
  | 'MISSING_COLUMN'
  | 'EXTRA_COLUMN'
  | 'TYPE_MISMATCH'
  | 'NULLABILITY_MISMATCH';

export const ALL_COLUMNS = 'ALL';

export const EXISTS = 'Exists';
export const MISSING = 'Missing';

export const DIFF_LABELS: Record<DiffType, string> = {
  MISSING_TABLE: 'Missing Table in DB2',
  EXTRA_TABLE: 'Extra Table in DB2',
  MISSING_COLUMN: 'Missing Column in DB2',
  EXTRA_COLUMN: 'Extra Column in DB2',
  TYPE_MISMATCH: 'Type Mismatch',
  NULLABILITY_MISMATCH: 'Nullable Mismatch',
};

export interface SchemaDiff {
  readonly type: DiffType;
  readonly table: string;
  /** Column name, or ALL_COLUMNS for table-level differences. */
  readonly column: string;
  /** DB1 (master) side. */
  readonly expected: string;
  /** DB2 (target) side. */
  readonly actual: string;
}

export interface ComparisonResult {
  sourceDb: string;
  targetDb: string;
  diffs: SchemaDiff[];
}

export type SyncBlockStatus = 'generated' | 'failed';

export interface SyncBlock {
  table: string;
  column: string;
  type: DiffType;
  status: SyncBlockStatus;
  lines: string[];
}

export interface SyncScript {
  blocks: SyncBlock[];
}
