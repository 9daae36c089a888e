import { loadAuditConfig } from '../../../config/audit.config';

describe('loadAuditConfig', () => {
  it('applies defaults', () => {
    const config = loadAuditConfig({});

    expect(config.env).toBe('development');
    expect(config.port).toBe(3000);
    expect(config.directory).toEqual({
      baseUrl: 'http://localhost:8080',
      apiEndpoint: '/REST/2.0',
      token: '',
      timeoutMs: 10_000,
      maxAttempts: 3,
      baseDelayMs: 1000,
    });
    expect(config.roster).toEqual({ maxRows: 1000, uploadMaxBytes: 5 * 1024 * 1024 });
    expect(config.notes.maxLength).toBe(2000);
    expect(config.retention.defaultDays).toBe(365);
    expect(config.db).toMatchObject({ poolMin: 1, poolMax: 10, ssl: false, logSql: false });
  });

  it('reads overrides from the environment', () => {
    const config = loadAuditConfig({
      NODE_ENV: 'production',
      PORT: '8081',
      RT_URL: 'https://rt.example.test//',
      RT_TOKEN: 'test-secret',
      DIRECTORY_MAX_ATTEMPTS: '5',
      ROSTER_MAX_ROWS: '250',
      DB_SSL: 'yes',
      DATABASE_URL: 'postgres://audit:test-secret@db:5432/audit',
    });

    expect(config.env).toBe('production');
    expect(config.port).toBe(8081);
    expect(config.directory).toMatchObject({
      baseUrl: 'https://rt.example.test',
      token: 'test-secret',
      maxAttempts: 5,
    });
    expect(config.roster.maxRows).toBe(250);
    expect(config.db.ssl).toBe(true);
    expect(config.db.connectionString).toBe('postgres://audit:test-secret@db:5432/audit');
  });

  it('falls back to defaults for malformed numbers', () => {
    const config = loadAuditConfig({ DIRECTORY_MAX_ATTEMPTS: 'three', NOTE_MAX_LENGTH: '0', PORT: '' });

    expect(config.directory.maxAttempts).toBe(3);
    expect(config.notes.maxLength).toBe(2000);
    expect(config.port).toBe(3000);
  });

  it('keeps the default for unrecognised booleans', () => {
    expect(loadAuditConfig({ DB_LOG_SQL: 'maybe' }).db.logSql).toBe(false);
    expect(loadAuditConfig({ DB_LOG_SQL: 'ON' }).db.logSql).toBe(true);
  });
});
