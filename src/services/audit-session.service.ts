import type { AuditRepositoryPort } from './ports/audit.repository.port';
import type {
  AuditPerson,
  AuditSession,
  PersonPage,
  PersonRecord,
  SessionStatistics,
} from '../types/audit.types';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface PageRequest {
  search?: string;
  limit: number;
  offset: number;
}

export function computeStatistics(session: AuditSession, total: number, audited: number): SessionStatistics {
  const pending = total - audited;
  return {
    sessionId: session.id,
    status: total > 0 && pending === 0 ? 'completed' : session.status,
    total,
    audited,
    pending,
    completionRate: total === 0 ? 0 : Math.round((audited / total) * 10000) / 100,
  };
}

/**
 * Session lifecycle and the per-person queues within a session.
 */
export class AuditSessionService {
  constructor(private readonly repository: AuditRepositoryPort) {}

  async createSession(creator: string): Promise<AuditSession> {
    const session = await this.repository.createSession(creator);
    logger.info('audit-session-created', { sessionId: session.id, creator, personCount: 0 });
    return session;
  }

  async seedPersons(sessionId: string, persons: PersonRecord[]): Promise<number> {
    const inserted = await this.repository.insertPersons(sessionId, persons);
    if (inserted === null) {
      throw new NotFoundError('Audit session not found', { sessionId });
    }
    logger.info('audit-session-seeded', { sessionId, count: inserted });
    return inserted;
  }

  async getSession(sessionId: string): Promise<AuditSession> {
    const session = await this.repository.getSession(sessionId);
    if (!session) {
      throw new NotFoundError('Audit session not found', { sessionId });
    }
    return session;
  }

  async listActivePersons(sessionId: string, filters: PageRequest & { audited?: boolean }): Promise<PersonPage> {
    await this.getSession(sessionId);
    return this.repository.listPersons(sessionId, { ...filters, audited: filters.audited ?? false });
  }

  async listCompletedPersons(sessionId: string, filters: PageRequest): Promise<PersonPage> {
    await this.getSession(sessionId);
    return this.repository.listPersons(sessionId, { ...filters, audited: true });
  }

  async getPerson(personId: string): Promise<AuditPerson> {
    const person = await this.repository.getPerson(personId);
    if (!person) {
      throw new NotFoundError('Person not found', { personId });
    }
    return person;
  }

  /** Also promotes the stored status to completed once nothing is pending. */
  async getStatistics(sessionId: string): Promise<SessionStatistics> {
    const session = await this.getSession(sessionId);
    const { total, audited } = await this.repository.countPersons(sessionId);
    const stats = computeStatistics(session, total, audited);
    if (stats.status === 'completed' && session.status !== 'completed') {
      await this.repository.updateSessionStatus(sessionId, 'completed');
      logger.info('audit-session-completed', { sessionId, total });
    }
    return stats;
  }
}
