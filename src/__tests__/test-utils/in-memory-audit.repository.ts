/**
 * In-process AuditRepositoryPort used by service and route tests.
 *
 * Mirrors the SQL repository's contract: the audited gate is checked and
 * flipped without yielding, so concurrent completions serialize the same way
 * the conditional UPDATE does.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  AuditRepositoryPort,
  CompletionWrite,
  CompletionWriteResult,
  NoteRow,
  ReopenResult,
} from '../../services/ports/audit.repository.port';
import type {
  AuditNote,
  AuditPerson,
  AuditSession,
  AuditSessionStatus,
  DeviceRecord,
  NotesFilters,
  PersonListFilters,
  PersonPage,
  PersonRecord,
} from '../../types/audit.types';
import { identityKey } from '../../services/roster-import.service';
import { ConflictError } from '../../utils/errors';

export class InMemoryAuditRepository implements AuditRepositoryPort {
  readonly sessions = new Map<string, AuditSession>();
  readonly persons = new Map<string, AuditPerson>();
  readonly deviceRecords: DeviceRecord[] = [];
  readonly notes: AuditNote[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async createSessionWithPersons(creator: string, persons: PersonRecord[]): Promise<AuditSession> {
    const session = await this.createSession(creator);
    this.addPersons(session.id, persons);
    return { ...this.requireSession(session.id) };
  }

  async createSession(creator: string): Promise<AuditSession> {
    const session: AuditSession = {
      id: uuidv4(),
      creatorIdentity: creator,
      createdAt: this.clock(),
      status: 'active',
      personCount: 0,
    };
    this.sessions.set(session.id, session);
    return { ...session };
  }

  async insertPersons(sessionId: string, persons: PersonRecord[]): Promise<number | null> {
    if (!this.sessions.has(sessionId)) return null;
    this.addPersons(sessionId, persons);
    return persons.length;
  }

  async getSession(sessionId: string): Promise<AuditSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async updateSessionStatus(sessionId: string, status: AuditSessionStatus): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (session) session.status = status;
  }

  async listPersons(sessionId: string, filters: PersonListFilters): Promise<PersonPage> {
    const audited = filters.audited ?? false;
    const term = filters.search?.trim().toLowerCase();
    const matching = [...this.persons.values()]
      .filter((p) => p.sessionId === sessionId && p.audited === audited)
      .filter(
        (p) => !term || [p.name, p.grade, p.advisor].some((value) => value.toLowerCase().includes(term))
      )
      .sort((a, b) => {
        if (audited) {
          const byTime = (b.auditTimestamp?.getTime() ?? 0) - (a.auditTimestamp?.getTime() ?? 0);
          if (byTime !== 0) return byTime;
        }
        return a.name.localeCompare(b.name) || a.grade.localeCompare(b.grade);
      });
    return {
      items: matching.slice(filters.offset, filters.offset + filters.limit).map((p) => ({ ...p })),
      total: matching.length,
    };
  }

  async getPerson(personId: string): Promise<AuditPerson | null> {
    const person = this.persons.get(personId);
    return person ? { ...person } : null;
  }

  async countPersons(sessionId: string) {
    const inSession = [...this.persons.values()].filter((p) => p.sessionId === sessionId);
    return { total: inSession.length, audited: inSession.filter((p) => p.audited).length };
  }

  async completeAudit(write: CompletionWrite): Promise<CompletionWriteResult> {
    const person = this.persons.get(write.personId);
    if (!person || person.audited) {
      return { claimed: false, current: person ? { ...person } : null };
    }
    person.audited = true;
    person.auditTimestamp = write.auditedAt;
    person.auditorIdentity = write.auditor;

    const records: DeviceRecord[] = write.devices.map((device) => ({
      ...device,
      id: uuidv4(),
      personId: write.personId,
      verified: true,
      recordedAt: write.auditedAt,
    }));
    this.deviceRecords.push(...records);

    let note: AuditNote | null = null;
    if (write.note) {
      note = {
        id: uuidv4(),
        personId: write.personId,
        body: write.note,
        createdAt: write.auditedAt,
        authorIdentity: write.auditor,
      };
      this.notes.push(note);
    }
    return { claimed: true, deviceRecords: records.map((r) => ({ ...r })), note };
  }

  async reopenAudit(personId: string): Promise<ReopenResult> {
    const person = this.persons.get(personId);
    if (!person || !person.audited) {
      return { reopened: false, current: person ? { ...person } : null };
    }
    person.audited = false;
    person.auditTimestamp = null;
    person.auditorIdentity = null;
    return { reopened: true, person: { ...person } };
  }

  async listDeviceRecords(personIds: string[]): Promise<DeviceRecord[]> {
    const wanted = new Set(personIds);
    return this.deviceRecords
      .filter((r) => wanted.has(r.personId))
      .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime())
      .map((r) => ({ ...r }));
  }

  async listNotes(filters: NotesFilters): Promise<NoteRow[]> {
    const rows = this.notes
      .map((note) => ({ note, person: this.persons.get(note.personId) }))
      .filter((row): row is { note: AuditNote; person: AuditPerson } => row.person !== undefined)
      .filter(({ note, person }) => {
        if (filters.sessionId && person.sessionId !== filters.sessionId) return false;
        if (filters.dateFrom && note.createdAt < filters.dateFrom) return false;
        if (filters.dateTo && note.createdAt > filters.dateTo) return false;
        return true;
      })
      .sort((a, b) => b.note.createdAt.getTime() - a.note.createdAt.getTime());
    const offset = filters.offset ?? 0;
    const paged = filters.limit === undefined ? rows.slice(offset) : rows.slice(offset, offset + filters.limit);
    return paged.map(({ note, person }) => ({ note: { ...note }, person: { ...person } }));
  }

  async deleteSessionsCreatedBefore(cutoff: Date): Promise<number> {
    let deleted = 0;
    for (const session of [...this.sessions.values()]) {
      if (session.createdAt >= cutoff) continue;
      this.sessions.delete(session.id);
      deleted += 1;
      for (const person of [...this.persons.values()]) {
        if (person.sessionId !== session.id) continue;
        this.persons.delete(person.id);
        this.removeChildren(person.id);
      }
    }
    return deleted;
  }

  /** Test helper: persons of a session keyed by name. */
  personByName(sessionId: string, name: string): AuditPerson {
    const person = [...this.persons.values()].find((p) => p.sessionId === sessionId && p.name === name);
    if (!person) throw new Error(`No person named ${name} in session ${sessionId}`);
    return { ...person };
  }

  private requireSession(sessionId: string): AuditSession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new Error(`Unknown session ${sessionId}`);
    return session;
  }

  private addPersons(sessionId: string, persons: PersonRecord[]): void {
    const session = this.requireSession(sessionId);
    const existing = new Set(
      [...this.persons.values()].filter((p) => p.sessionId === sessionId).map((p) => identityKey(p))
    );
    for (const record of persons) {
      const key = identityKey(record);
      if (existing.has(key)) {
        throw new ConflictError('Roster contains a person already present in this session', { sessionId });
      }
      existing.add(key);
    }
    for (const record of persons) {
      const person: AuditPerson = {
        ...record,
        id: uuidv4(),
        sessionId,
        audited: false,
        auditTimestamp: null,
        auditorIdentity: null,
      };
      this.persons.set(person.id, person);
    }
    session.personCount += persons.length;
  }

  private removeChildren(personId: string): void {
    for (let i = this.deviceRecords.length - 1; i >= 0; i--) {
      if (this.deviceRecords[i].personId === personId) this.deviceRecords.splice(i, 1);
    }
    for (let i = this.notes.length - 1; i >= 0; i--) {
      if (this.notes[i].personId === personId) this.notes.splice(i, 1);
    }
  }
}
