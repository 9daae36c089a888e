import type {
  AuditNote,
  AuditPerson,
  AuditSession,
  AuditSessionStatus,
  DeviceDescriptor,
  DeviceRecord,
  NotesFilters,
  PersonListFilters,
  PersonPage,
  PersonRecord,
} from '../../types/audit.types';

export interface PersonAuditCounts {
  total: number;
  audited: number;
}

export interface CompletionWrite {
  personId: string;
  auditor: string;
  auditedAt: Date;
  devices: DeviceDescriptor[];
  note: string | null;
}

/**
 * Result of the conditional completion write. `claimed: false` means another
 * writer flipped the gate first; `current` is the person as that writer left it.
 */
export type CompletionWriteResult =
  | { claimed: true; deviceRecords: DeviceRecord[]; note: AuditNote | null }
  | { claimed: false; current: AuditPerson | null };

export type ReopenResult = { reopened: true; person: AuditPerson } | { reopened: false; current: AuditPerson | null };

export interface NoteRow {
  note: AuditNote;
  person: AuditPerson;
}

export interface AuditRepositoryPort {
  /** Creates the session and its persons in one transaction. */
  createSessionWithPersons(creator: string, persons: PersonRecord[]): Promise<AuditSession>;
  createSession(creator: string): Promise<AuditSession>;
  /** All-or-nothing; returns the number of persons inserted, or null when the session does not exist. */
  insertPersons(sessionId: string, persons: PersonRecord[]): Promise<number | null>;
  getSession(sessionId: string): Promise<AuditSession | null>;
  updateSessionStatus(sessionId: string, status: AuditSessionStatus): Promise<void>;

  listPersons(sessionId: string, filters: PersonListFilters): Promise<PersonPage>;
  getPerson(personId: string): Promise<AuditPerson | null>;
  countPersons(sessionId: string): Promise<PersonAuditCounts>;

  /**
   * Flips `audited` false → true and appends the device/note generation, all
   * in one transaction. The gate is re-checked inside the write.
   */
  completeAudit(write: CompletionWrite): Promise<CompletionWriteResult>;
  /** Flips `audited` true → false; history rows are left untouched. */
  reopenAudit(personId: string): Promise<ReopenResult>;

  listDeviceRecords(personIds: string[]): Promise<DeviceRecord[]>;
  listNotes(filters: NotesFilters): Promise<NoteRow[]>;

  /** Deletes sessions created before the cutoff; cascades to children. */
  deleteSessionsCreatedBefore(cutoff: Date): Promise<number>;
}
