import oracledb from 'oracledb';
import { ConnectionConfig } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { DbRow, IDbConnection, QueryParam } from '../interfaces.js';

export function buildConnectString(config: ConnectionConfig): string {
  if (config.sid && !config.database) {
    return `(DESCRIPTION=(ADDRESS=(PROTOCOL=TCP)(HOST=${config.host})(PORT=${config.port}))(CONNECT_DATA=(SID=${config.sid})))`;
  }
  return `${config.host}:${config.port}/${config.database ?? ''}`;
}

export class OracleConnection implements IDbConnection {
  private connection: oracledb.Connection | null = null;
  private config: ConnectionConfig;

  constructor(config: ConnectionConfig) {
    this.config = config;
  }

  private async connect(): Promise<oracledb.Connection> {
    if (this.connection) return this.connection;

    // NUMBER as string keeps full precision; CLOB as string avoids Lob streams
    oracledb.fetchAsString = [oracledb.NUMBER, oracledb.CLOB];

    const connectString = buildConnectString(this.config);

    try {
      this.connection = await oracledb.getConnection({
        user: this.config.user,
        password: this.config.password,
        connectString: connectString,
      });
      logger.info(`Connected to Oracle: ${connectString}`);
      return this.connection;
    } catch (error) {
      logger.error({ connectString, error }, 'Oracle connection failed');
      throw error;
    }
  }

  async query(text: string, params: QueryParam[] = []): Promise<DbRow[]> {
    const conn = await this.connect();
    const start = Date.now();
    try {
      const result = await conn.execute<DbRow>(text, params, {
        outFormat: oracledb.OUT_FORMAT_OBJECT,
      });

      const duration = Date.now() - start;
      logger.debug({ query: text, duration, rows: result.rows?.length }, 'Executed Oracle query');

      return result.rows ?? [];
    } catch (error) {
      logger.error({ query: text, error }, 'Oracle query execution failed');
      throw error;
    }
  }

  async close() {
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
      logger.info('Oracle connection closed');
    }
  }
}
