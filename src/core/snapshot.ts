import type { ISchemaInspector } from '../engines/interfaces.js';
import type { ColumnDescriptor, InspectedTable, SchemaSnapshot, SnapshotLookup, SnapshotResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { ConnectionFailureError } from './errors.js';

export function createSnapshot(source: string, tables: InspectedTable[]): SchemaSnapshot {
  const seen = new Set<string>();
  const columns: ColumnDescriptor[] = [];

  for (const { table, columns: tableColumns } of tables) {
    for (const col of tableColumns) {
      const key = JSON.stringify([table, col.name]);
      if (seen.has(key)) continue;
      seen.add(key);

      columns.push(Object.freeze({
        source,
        table,
        column: col.name,
        type: col.type,
        nullable: col.nullable,
        default: col.default ?? '',
      }));
    }
  }

  return Object.freeze({ source, columns: Object.freeze(columns) });
}

export function emptySnapshot(source: string): SchemaSnapshot {
  return createSnapshot(source, []);
}

/**
 * Reads the structure behind `inspector`. A failure yields an empty snapshot
 * and a diagnostic instead of an exception, so the other side can still be
 * compared.
 */
export async function captureSnapshot(inspector: ISchemaInspector, source: string, schema: string): Promise<SnapshotResult> {
  try {
    const tableNames = await inspector.listTables(schema);
    logger.info(`Connected to ${source}. Found ${tableNames.length} tables.`);

    const tables: InspectedTable[] = [];
    for (const table of tableNames) {
      tables.push({ table, columns: await inspector.listColumns(schema, table) });
    }

    return { snapshot: createSnapshot(source, tables), ok: true, tableCount: tableNames.length };
  } catch (error) {
    return failedSnapshot(source, error);
  }
}

export function failedSnapshot(source: string, error: unknown): SnapshotResult {
  const failure = error instanceof ConnectionFailureError ? error : new ConnectionFailureError(source, error);
  logger.error({ source, error: failure.cause }, failure.message);
  return { snapshot: emptySnapshot(source), ok: false, tableCount: 0, error: failure.message };
}

/** table -> column -> descriptor, in discovery order. */
export function buildLookup(snapshot: SchemaSnapshot): SnapshotLookup {
  const lookup: SnapshotLookup = new Map();
  for (const col of snapshot.columns) {
    let columns = lookup.get(col.table);
    if (!columns) {
      columns = new Map();
      lookup.set(col.table, columns);
    }
    columns.set(col.column, col);
  }
  return lookup;
}
