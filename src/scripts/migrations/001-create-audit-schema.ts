/**
 * Creates the `audit` schema and its tables. Idempotent.
 *
 * Usage:
 *   npm run build && npm run migrate
 */

import dotenv from 'dotenv';

// Load environment variables FIRST
dotenv.config();

import fs from 'fs';
import path from 'path';
import { createPostgresDbAdapter } from '../../adapters/db/postgres.adapter';
import type { DbPort } from '../../services/ports/db.port';
import { logger } from '../../utils/logger';

// Same relative depth from src/ and dist/
export const SCHEMA_FILE = path.resolve(__dirname, '../../../migrations/001_audit_schema.sql');

export async function applyAuditSchema(db: DbPort, sql: string = fs.readFileSync(SCHEMA_FILE, 'utf-8')): Promise<void> {
  await db.withTransaction(async (tx) => {
    await tx.query(sql, [], { operation: 'migrateAuditSchema' });
  });
}

async function main() {
  const db = createPostgresDbAdapter();
  try {
    await db.connect();
    await applyAuditSchema(db);
    logger.info('audit-schema-migrated', { file: path.basename(SCHEMA_FILE) });
  } finally {
    await db.disconnect();
  }
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('audit-schema-migration-failed', error);
    process.exit(1);
  });
}
