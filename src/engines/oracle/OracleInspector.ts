import { LookupMissError } from '../../core/errors.js';
import type { ColumnDefinition, InspectedColumn } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { IDbConnection, IDefinitionProvider, ISchemaInspector } from '../interfaces.js';

type ColumnRow = {
  name: string;
  dataType: string;
  dataLength: number | null;
  charLength: number | null;
  dataPrecision: number | null;
  dataScale: number | null;
  nullable: 'Y' | 'N';
  dataDefault: string | null;
  identityColumn: 'YES' | 'NO' | null;
  key: string | null;
};

// Oracle answers for the connected user's own objects.
const COLUMNS_QUERY = `
  SELECT
    c.column_name as "name",
    c.data_type as "dataType",
    c.data_length as "dataLength",
    c.char_length as "charLength",
    c.data_precision as "dataPrecision",
    c.data_scale as "dataScale",
    c.nullable as "nullable",
    c.data_default as "dataDefault",
    c.identity_column as "identityColumn",
    (
      SELECT MIN(CASE uc.constraint_type WHEN 'P' THEN 'PRI' ELSE 'UNI' END)
      FROM user_cons_columns ucc
      JOIN user_constraints uc ON uc.constraint_name = ucc.constraint_name
      WHERE ucc.table_name = c.table_name
        AND ucc.column_name = c.column_name
        AND uc.constraint_type IN ('P', 'U')
    ) as "key"
  FROM user_tab_columns c
  WHERE c.table_name = :1
`;

// node-oracledb hands CLOB columns back as Lob instances.
type ClobValue = string | { getData(): Promise<string | Buffer> } | null;

const CHAR_TYPES = new Set(['VARCHAR2', 'NVARCHAR2', 'CHAR', 'NCHAR']);

/** VARCHAR2(40), NUMBER(10, 2), NUMBER(5), DATE ... */
export function formatOracleType(row: Pick<ColumnRow, 'dataType' | 'dataLength' | 'charLength' | 'dataPrecision' | 'dataScale'>): string {
  if (CHAR_TYPES.has(row.dataType) && row.charLength) {
    return `${row.dataType}(${row.charLength})`;
  }
  if (row.dataType === 'RAW' && row.dataLength) {
    return `RAW(${row.dataLength})`;
  }
  if (row.dataType === 'NUMBER' && row.dataPrecision !== null) {
    return row.dataScale ? `NUMBER(${row.dataPrecision}, ${row.dataScale})` : `NUMBER(${row.dataPrecision})`;
  }
  return row.dataType;
}

// data_default is a LONG that keeps whatever whitespace followed the DEFAULT keyword.
function cleanDefault(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed.toUpperCase() !== 'NULL' ? trimmed : null;
}

export function toColumnDefinition(row: ColumnRow): ColumnDefinition {
  return {
    name: row.name,
    type: formatOracleType(row),
    nullFlag: row.nullable === 'Y' ? 'YES' : 'NO',
    key: row.key ?? '',
    default: row.identityColumn === 'YES' ? null : cleanDefault(row.dataDefault),
    extra: row.identityColumn === 'YES' ? 'GENERATED BY DEFAULT AS IDENTITY' : '',
  };
}

export class OracleInspector implements ISchemaInspector, IDefinitionProvider {
  constructor(private db: IDbConnection) {}

  async listTables(_schema: string = ''): Promise<string[]> {
    const rows = await this.db.query<{ name: string }>(`SELECT table_name as "name" FROM user_tables ORDER BY table_name`);
    return rows.map(r => r.name);
  }

  async listColumns(_schema: string, tableName: string): Promise<InspectedColumn[]> {
    const rows = await this.db.query<ColumnRow>(`${COLUMNS_QUERY} ORDER BY c.column_id`, [tableName]);
    return rows.map(r => ({
      name: r.name,
      type: formatOracleType(r),
      nullable: r.nullable === 'Y',
      default: cleanDefault(r.dataDefault),
    }));
  }

  async getTableDefinition(_schema: string, tableName: string): Promise<string> {
    logger.info(`Reading definition of Oracle table: ${tableName}`);
    const rows = await this.db.query<{ ddl: ClobValue }>(
      `SELECT DBMS_METADATA.GET_DDL('TABLE', :1) as "ddl" FROM DUAL`,
      [tableName]
    );
    const value = rows[0]?.ddl ?? null;
    const ddl = typeof value === 'string' || value === null ? value : (await value.getData()).toString();
    if (!ddl?.trim()) throw new LookupMissError(tableName);
    return ddl.trim();
  }

  async getColumnDefinition(_schema: string, tableName: string, columnName: string): Promise<ColumnDefinition | null> {
    const rows = await this.db.query<ColumnRow>(`${COLUMNS_QUERY} AND c.column_name = :2`, [tableName, columnName]);
    return rows.length > 0 ? toColumnDefinition(rows[0]) : null;
  }
}
