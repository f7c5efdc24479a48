import type { ConnectionConfig, DatabaseTarget, DbType } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { IDbConnection, IDDLGenerator, IDefinitionProvider, ISchemaInspector } from './interfaces.js';
import { OracleConnection } from './oracle/OracleConnection.js';
import { OracleDDLGenerator } from './oracle/OracleDDLGenerator.js';
import { OracleInspector } from './oracle/OracleInspector.js';
import { PostgresConnection } from './postgres/PostgresConnection.js';
import { PostgresDDLGenerator } from './postgres/PostgresDDLGenerator.js';
import { PostgresInspector } from './postgres/PostgresInspector.js';

export type EngineInspector = ISchemaInspector & IDefinitionProvider;

/** Builds the engine-specific pieces for a database target. */
export interface EngineProvider {
  createConnection(type: DbType, config: ConnectionConfig): IDbConnection;
  createInspector(type: DbType, connection: IDbConnection): EngineInspector;
  createGenerator(type: DbType): IDDLGenerator;
}

export class EngineFactory {
  static createConnection(type: DbType, config: ConnectionConfig): IDbConnection {
    switch (type) {
      case 'postgres':
        return new PostgresConnection(config);
      case 'oracle':
        return new OracleConnection(config);
    }
  }

  static createInspector(type: DbType, connection: IDbConnection): EngineInspector {
    switch (type) {
      case 'postgres':
        return new PostgresInspector(connection);
      case 'oracle':
        return new OracleInspector(connection);
    }
  }

  static createGenerator(type: DbType): IDDLGenerator {
    switch (type) {
      case 'postgres':
        return new PostgresDDLGenerator();
      case 'oracle':
        return new OracleDDLGenerator();
    }
  }
}

export function defaultSchema(target: DatabaseTarget): string {
  return target.connection.schema ?? (target.type === 'postgres' ? 'public' : '');
}

/**
 * Opens a connection for the duration of `work` only. A failure to close is
 * logged, never raised over the outcome of `work`.
 */
export async function withInspector<T>(
  engines: EngineProvider,
  target: DatabaseTarget,
  work: (inspector: EngineInspector) => Promise<T>
): Promise<T> {
  const connection = engines.createConnection(target.type, target.connection);
  try {
    return await work(engines.createInspector(target.type, connection));
  } finally {
    await connection.close().catch((error: unknown) => {
      logger.warn({ host: target.connection.host, error }, 'Failed to close connection');
    });
  }
}

/** Definition lookups that each hold a connection only while they run. */
export class ScopedDefinitionProvider implements IDefinitionProvider {
  constructor(
    private engines: EngineProvider,
    private target: DatabaseTarget
  ) {}

  getTableDefinition(schema: string, tableName: string): Promise<string> {
    return withInspector(this.engines, this.target, inspector => inspector.getTableDefinition(schema, tableName));
  }

  getColumnDefinition(schema: string, tableName: string, columnName: string) {
    return withInspector(this.engines, this.target, inspector =>
      inspector.getColumnDefinition(schema, tableName, columnName)
    );
  }
}
