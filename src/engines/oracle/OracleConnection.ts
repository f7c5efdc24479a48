import oracledb from 'oracledb';
import type { Connection } from 'oracledb';
import type { ConnectionConfig } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { IDbConnection, QueryParam, QueryRow } from '../interfaces.js';

/**
 * One standalone session, opened by the first query and released by `close`.
 * Lives for a single snapshot read or definition lookup (see `withInspector`).
 */
export class OracleConnection implements IDbConnection {
  private session: Promise<Connection> | null = null;

  constructor(private config: ConnectionConfig) {}

  get connectString(): string {
    return `${this.config.host}:${this.config.port}/${this.config.database}`;
  }

  private open(): Promise<Connection> {
    // Concurrent first queries share one session.
    this.session ??= oracledb
      .getConnection({ user: this.config.user, password: this.config.password, connectString: this.connectString })
      .then(
        conn => {
          logger.debug(`Opened Oracle session: ${this.connectString}`);
          return conn;
        },
        (error: unknown) => {
          this.session = null;
          logger.error({ connectString: this.connectString, error }, 'Oracle connection failed');
          throw error;
        }
      );
    return this.session;
  }

  async query<T extends QueryRow = QueryRow>(text: string, params: QueryParam[] = []): Promise<T[]> {
    const conn = await this.open();
    const start = Date.now();
    try {
      const result = await conn.execute<T>(text, params, { outFormat: oracledb.OUT_FORMAT_OBJECT });
      logger.debug({ query: text, duration: Date.now() - start, rows: result.rows?.length }, 'Executed Oracle query');
      return result.rows ?? [];
    } catch (error) {
      logger.error({ query: text, error }, 'Oracle query execution failed');
      throw error;
    }
  }

  async close() {
    if (!this.session) return;
    const pending = this.session;
    this.session = null;
    await (await pending).close();
    logger.debug(`Closed Oracle session: ${this.connectString}`);
  }
}
