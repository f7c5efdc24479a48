import { LookupMissError } from '../../core/errors.js';
import type { ColumnDefinition, InspectedColumn } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { IDbConnection, IDefinitionProvider, ISchemaInspector } from '../interfaces.js';
import { PostgresDDLGenerator } from './PostgresDDLGenerator.js';

type ColumnRow = {
  name: string;
  type: string;
  isNullable: 'YES' | 'NO';
  columnDefault: string | null;
  isIdentity: 'YES' | 'NO';
  identityGeneration: string | null;
  ownedSequence: string | null;
  key: string;
};

// format_type keeps typmods and array suffixes: timestamp(3) without time zone, integer[].
const COLUMNS_QUERY = `
  SELECT
    c.column_name as "name",
    format_type(a.atttypid, a.atttypmod) as "type",
    c.is_nullable as "isNullable",
    c.column_default as "columnDefault",
    c.is_identity as "isIdentity",
    c.identity_generation as "identityGeneration",
    pg_get_serial_sequence(format('%I.%I', c.table_schema, c.table_name), c.column_name) as "ownedSequence",
    COALESCE((
      SELECT CASE tc.constraint_type WHEN 'PRIMARY KEY' THEN 'PRI' ELSE 'UNI' END
      FROM information_schema.key_column_usage kcu
      JOIN information_schema.table_constraints tc
        ON tc.constraint_name = kcu.constraint_name
        AND tc.table_schema = kcu.table_schema
      WHERE kcu.table_schema = c.table_schema
        AND kcu.table_name = c.table_name
        AND kcu.column_name = c.column_name
        AND tc.constraint_type IN ('PRIMARY KEY', 'UNIQUE')
      ORDER BY tc.constraint_type
      LIMIT 1
    ), '') as "key"
  FROM information_schema.columns c
  JOIN pg_catalog.pg_attribute a
    ON a.attrelid = format('%I.%I', c.table_schema, c.table_name)::regclass
    AND a.attname = c.column_name
  WHERE c.table_schema = $1 AND c.table_name = $2
`;

/** A serial column: its default draws from a sequence the column owns. */
function isSerial(row: Pick<ColumnRow, 'columnDefault' | 'ownedSequence'>): boolean {
  return row.ownedSequence !== null && row.columnDefault !== null && row.columnDefault.startsWith('nextval(');
}

/** Serial columns are described as identity columns, without the nextval() default. */
export function toColumnDefinition(row: ColumnRow): ColumnDefinition {
  const serial = isSerial(row);
  let extra = '';
  if (row.isIdentity === 'YES') {
    extra = `GENERATED ${row.identityGeneration ?? 'BY DEFAULT'} AS IDENTITY`;
  } else if (serial) {
    extra = 'GENERATED BY DEFAULT AS IDENTITY';
  }

  return {
    name: row.name,
    type: row.type,
    nullFlag: row.isNullable,
    key: row.key,
    default: serial ? null : row.columnDefault,
    extra,
  };
}

export class PostgresInspector implements ISchemaInspector, IDefinitionProvider {
  private generator = new PostgresDDLGenerator();

  constructor(private db: IDbConnection) {}

  async listTables(schema: string = 'public'): Promise<string[]> {
    const rows = await this.db.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = $1
      AND table_type = 'BASE TABLE'
      ORDER BY table_name
    `, [schema]);
    return rows.map(r => r.table_name);
  }

  async listColumns(schema: string, tableName: string): Promise<InspectedColumn[]> {
    const rows = await this.getColumnRows(schema, tableName);
    return rows.map(r => ({
      name: r.name,
      type: r.type,
      nullable: r.isNullable === 'YES',
      default: r.columnDefault,
    }));
  }

  async getTableDefinition(schema: string, tableName: string): Promise<string> {
    logger.info(`Reading definition of table: ${schema}.${tableName}`);
    const [rows, primaryKey] = await Promise.all([
      this.getColumnRows(schema, tableName),
      this.getPrimaryKey(schema, tableName),
    ]);
    if (rows.length === 0) throw new LookupMissError(`${schema}.${tableName}`);

    return this.generator.generateTableCreate({
      name: tableName,
      schema,
      columns: rows.map(toColumnDefinition),
      primaryKey,
    });
  }

  async getColumnDefinition(schema: string, tableName: string, columnName: string): Promise<ColumnDefinition | null> {
    const rows = await this.db.query<ColumnRow>(`${COLUMNS_QUERY} AND c.column_name = $3`, [schema, tableName, columnName]);
    return rows.length > 0 ? toColumnDefinition(rows[0]) : null;
  }

  private async getColumnRows(schema: string, tableName: string): Promise<ColumnRow[]> {
    return this.db.query<ColumnRow>(`${COLUMNS_QUERY} ORDER BY c.ordinal_position`, [schema, tableName]);
  }

  private async getPrimaryKey(schema: string, tableName: string): Promise<{ name: string; columns: string[] } | undefined> {
    const rows = await this.db.query<{ name: string; column_name: string }>(`
      SELECT
        tc.constraint_name as "name",
        kcu.column_name
      FROM information_schema.table_constraints AS tc
      JOIN information_schema.key_column_usage AS kcu
        ON tc.constraint_name = kcu.constraint_name
        AND tc.table_schema = kcu.table_schema
      WHERE tc.table_schema = $1 AND tc.table_name = $2
      AND tc.constraint_type = 'PRIMARY KEY'
      ORDER BY kcu.ordinal_position
    `, [schema, tableName]);

    if (rows.length === 0) return undefined;
    return { name: rows[0].name, columns: rows.map(r => r.column_name) };
  }
}
