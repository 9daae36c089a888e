import type { AuditRepositoryPort } from './ports/audit.repository.port';
import type { AuditPerson } from '../types/audit.types';
import { InvalidStateError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

export class ReauditService {
  constructor(private readonly repository: AuditRepositoryPort) {}

  /**
   * Returns an audited person to the active queue. Device records and notes
   * from earlier submissions are kept.
   */
  async restoreForReaudit(personId: string, requestedBy: string): Promise<AuditPerson> {
    const result = await this.repository.reopenAudit(personId);
    if (!result.reopened) {
      if (!result.current) {
        throw new NotFoundError('Person not found', { personId });
      }
      throw new InvalidStateError('Person is not currently audited', { personId });
    }
    logger.info('audit-person-reopened', {
      personId,
      sessionId: result.person.sessionId,
      requestedBy,
    });
    return result.person;
  }
}
