export type AuditSessionStatus = 'active' | 'completed';

export interface AuditSession {
  id: string;
  creatorIdentity: string;
  createdAt: Date;
  status: AuditSessionStatus;
  personCount: number;
}

/** A validated roster row, before it has been seeded into a session. */
export interface PersonRecord {
  name: string;
  grade: string;
  advisor: string;
  /** Directory login; when empty the display name is used for lookups. */
  username: string;
}

export interface AuditPerson extends PersonRecord {
  id: string;
  sessionId: string;
  audited: boolean;
  auditTimestamp: Date | null;
  auditorIdentity: string | null;
}

export interface DeviceDescriptor {
  assetId: string;
  assetTag: string;
  serialNumber: string;
  deviceType: string;
}

export interface DeviceRecord extends DeviceDescriptor {
  id: string;
  personId: string;
  verified: boolean;
  /** All records written by one submission share this timestamp. */
  recordedAt: Date;
}

export interface AuditNote {
  id: string;
  personId: string;
  body: string;
  createdAt: Date;
  authorIdentity: string;
}

export interface SessionStatistics {
  sessionId: string;
  status: AuditSessionStatus;
  total: number;
  audited: number;
  pending: number;
  /** Percentage in the range 0..100. */
  completionRate: number;
}

export interface PersonListFilters {
  search?: string;
  audited?: boolean;
  limit: number;
  offset: number;
}

export interface PersonPage {
  items: AuditPerson[];
  total: number;
}

export interface NotesFilters {
  sessionId?: string;
  dateFrom?: Date;
  dateTo?: Date;
  limit?: number;
  offset?: number;
}

export interface NoteLedgerEntry {
  noteId: string;
  person: Pick<AuditPerson, 'id' | 'sessionId' | 'name' | 'grade' | 'advisor'>;
  noteText: string;
  author: string;
  createdAt: Date;
  deviceRecords: DeviceRecord[];
  totalDevices: number;
  verifiedDevices: number;
  missingDevices: number;
}

/** What a caller holds between beginVerification and submitVerification. */
export interface VerificationPass {
  personId: string;
  externalId: string | null;
  devices: DeviceDescriptor[];
  fetchedAt: Date;
}

export type VerificationOutcome = 'verified' | 'no-devices';

export interface VerificationResult {
  personId: string;
  outcome: VerificationOutcome;
  auditedAt: Date;
  auditor: string;
  deviceRecordCount: number;
  noteRecorded: boolean;
}
