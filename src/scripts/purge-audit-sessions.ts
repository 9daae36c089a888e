/**
 * Deletes audit sessions older than the retention window.
 *
 * Usage:
 *   npm run purge:sessions            # RETENTION_DEFAULT_DAYS
 *   npm run purge:sessions -- 90      # explicit window in days
 */

import dotenv from 'dotenv';

dotenv.config();

import { getCompositionRoot } from '../app/composition-root';
import { logger } from '../utils/logger';

export function parseDaysArgument(argv: string[]): number | undefined {
  const raw = argv[0];
  if (raw === undefined) return undefined;
  const days = Number(raw);
  if (!Number.isInteger(days) || days < 1) {
    throw new Error(`Invalid retention window: ${raw}`);
  }
  return days;
}

async function main() {
  const composition = getCompositionRoot();
  const db = composition.getDbPort();
  try {
    const days = parseDaysArgument(process.argv.slice(2));
    const result = await composition.getServices().retention.purgeSessionsOlderThan(days);
    logger.info('purge-complete', { deletedSessions: result.deletedSessions, cutoff: result.cutoff.toISOString() });
  } finally {
    await db.disconnect();
  }
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('purge-failed', error);
    process.exit(1);
  });
}
