import pg from 'pg';
import { ConnectionConfig } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { DbRow, IDbConnection, QueryParam } from '../interfaces.js';

export class PostgresConnection implements IDbConnection {
  private pool: pg.Pool;

  constructor(config: ConnectionConfig) {
    this.pool = new pg.Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: 2,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    this.pool.on('error', (err) => {
      logger.error(err, 'Unexpected error on idle client');
    });
  }

  async query(text: string, params: QueryParam[] = []): Promise<DbRow[]> {
    const start = Date.now();
    try {
      const res = await this.pool.query<DbRow>(text, params);
      const duration = Date.now() - start;
      logger.debug({ query: text, duration, rows: res.rowCount }, 'Executed query');
      return res.rows;
    } catch (error) {
      logger.error({ query: text, error }, 'Query execution failed');
      throw error;
    }
  }

  async close() {
    await this.pool.end();
    logger.info('Database connection pool closed');
  }
}
