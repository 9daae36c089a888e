import type { AuditRepositoryPort } from './ports/audit.repository.port';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export function computeRetentionCutoff(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export interface PurgeResult {
  cutoff: Date;
  days: number;
  deletedSessions: number;
}

/**
 * Explicit cleanup of old audit sessions. Never scheduled; callers are the
 * maintenance route and the purge script.
 */
export class RetentionService {
  constructor(private readonly repository: AuditRepositoryPort, private readonly defaultDays: number) {}

  async purgeSessionsOlderThan(days: number = this.defaultDays, now: Date = new Date()): Promise<PurgeResult> {
    if (!Number.isInteger(days) || days < 1) {
      throw new ValidationError('Retention days must be a positive integer', { days });
    }
    const cutoff = computeRetentionCutoff(now, days);
    const deletedSessions = await this.repository.deleteSessionsCreatedBefore(cutoff);
    logger.info('audit-sessions-purged', { days, cutoff: cutoff.toISOString(), deletedSessions });
    return { cutoff, days, deletedSessions };
  }
}
