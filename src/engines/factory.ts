import { ConnectionConfig, DbType } from '../types/index.js';
import { IDbConnection, ITableSource } from './interfaces.js';
import { OracleConnection } from './oracle/OracleConnection.js';
import { OracleSource } from './oracle/OracleSource.js';
import { PostgresConnection } from './postgres/PostgresConnection.js';
import { PostgresSource } from './postgres/PostgresSource.js';

export class EngineFactory {
  static createConnection(type: DbType, config: ConnectionConfig): IDbConnection {
    switch (type) {
      case 'postgres':
        return new PostgresConnection(config);
      case 'oracle':
        return new OracleConnection(config);
      default:
        throw new Error(`Unsupported database type: ${String(type)}`);
    }
  }

  static createSource(config: ConnectionConfig): ITableSource {
    const connection = EngineFactory.createConnection(config.type, config);
    switch (config.type) {
      case 'postgres':
        return new PostgresSource(connection, config);
      case 'oracle':
        return new OracleSource(connection, config);
      default:
        throw new Error(`Unsupported database type: ${String(config.type)}`);
    }
  }
}
