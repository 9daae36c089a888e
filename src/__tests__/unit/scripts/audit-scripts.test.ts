import fs from 'fs';
import type { DbPort, DbTransactionPort } from '../../../services/ports/db.port';
import { SCHEMA_FILE, applyAuditSchema } from '../../../scripts/migrations/001-create-audit-schema';
import { parseDaysArgument } from '../../../scripts/purge-audit-sessions';

describe('audit schema migration', () => {
  function mockDb() {
    const tx: jest.Mocked<DbTransactionPort> = {
      query: jest.fn().mockResolvedValue([]),
      queryOne: jest.fn(),
      insert: jest.fn(),
      insertMany: jest.fn(),
      update: jest.fn(),
    };
    const db: jest.Mocked<DbPort> = {
      ...tx,
      connect: jest.fn(),
      disconnect: jest.fn(),
      withTransaction: jest.fn(),
      generateId: jest.fn(),
    };
    db.withTransaction.mockImplementation(async (handler) => handler(tx));
    return { db, tx };
  }

  it('ships the schema file beside the sources', () => {
    const sql = fs.readFileSync(SCHEMA_FILE, 'utf-8');
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS audit.audit_sessions');
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS audit.audit_notes');
  });

  it('applies the schema inside one transaction', async () => {
    const { db, tx } = mockDb();

    await applyAuditSchema(db, 'CREATE SCHEMA IF NOT EXISTS audit;');

    expect(db.withTransaction).toHaveBeenCalledTimes(1);
    expect(tx.query).toHaveBeenCalledWith('CREATE SCHEMA IF NOT EXISTS audit;', [], { operation: 'migrateAuditSchema' });
  });
});

describe('parseDaysArgument', () => {
  it('uses the configured default without an argument', () => {
    expect(parseDaysArgument([])).toBeUndefined();
  });

  it('reads a whole number of days', () => {
    expect(parseDaysArgument(['90'])).toBe(90);
  });

  it.each(['0', '-1', '2.5', 'soon'])('rejects %p', (raw) => {
    expect(() => parseDaysArgument([raw])).toThrow(`Invalid retention window: ${raw}`);
  });
});
