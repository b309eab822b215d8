import { describe, it, expect } from 'vitest';
import { buildConnectString } from './OracleConnection.js';

describe('buildConnectString', () => {
  it('should use Easy Connect for service names', () => {
    expect(buildConnectString({ type: 'oracle', host: 'legacy-db', port: 1521, database: 'ORCL', user: 'etl' })).toBe(
      'legacy-db:1521/ORCL'
    );
  });

  it('should use a connect descriptor for a SID', () => {
    expect(buildConnectString({ type: 'oracle', host: 'legacy-db', port: 1522, sid: 'XE', user: 'etl' })).toBe(
      '(DESCRIPTION=(ADDRESS=(PROTOCOL=TCP)(HOST=legacy-db)(PORT=1522))(CONNECT_DATA=(SID=XE)))'
    );
  });
});
