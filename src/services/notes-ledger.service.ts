import { Parser } from 'json2csv';
import type { AuditRepositoryPort } from './ports/audit.repository.port';
import type { DeviceRecord, NoteLedgerEntry, NotesFilters } from '../types/audit.types';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export const NOTES_EXPORT_FIELDS = [
  { label: 'Person', value: 'person' },
  { label: 'Grade', value: 'grade' },
  { label: 'Advisor', value: 'advisor' },
  { label: 'Note', value: 'note' },
  { label: 'Devices', value: 'devices' },
  { label: 'Missing Devices', value: 'missingDevices' },
  { label: 'Date', value: 'date' },
  { label: 'Auditor', value: 'auditor' },
];

interface NotesExportRow {
  person: string;
  grade: string;
  advisor: string;
  note: string;
  devices: number;
  missingDevices: number;
  date: string;
  auditor: string;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses a date filter. A date-only upper bound is widened to the last
 * millisecond of that (UTC) day so the bound stays inclusive.
 */
export function parseDateBound(value: string, bound: 'from' | 'to'): Date {
  const trimmed = value.trim();
  const isDateOnly = DATE_ONLY.test(trimmed);
  const parsed = new Date(isDateOnly ? `${trimmed}T00:00:00.000Z` : trimmed);
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError(`Invalid date: ${value}`, { field: bound === 'from' ? 'dateFrom' : 'dateTo' });
  }
  if (isDateOnly && bound === 'to') {
    return new Date(parsed.getTime() + 24 * 60 * 60 * 1000 - 1);
  }
  return parsed;
}

function groupRecordsByGeneration(records: DeviceRecord[]): Map<string, DeviceRecord[]> {
  const byGeneration = new Map<string, DeviceRecord[]>();
  for (const record of records) {
    const key = `${record.personId}|${record.recordedAt.getTime()}`;
    const bucket = byGeneration.get(key);
    if (bucket) bucket.push(record);
    else byGeneration.set(key, [record]);
  }
  return byGeneration;
}

export class NotesLedgerService {
  constructor(private readonly repository: AuditRepositoryPort) {}

  /** Notes newest first, each with the device records written alongside it. */
  async listNotes(filters: NotesFilters = {}): Promise<NoteLedgerEntry[]> {
    if (filters.dateFrom && filters.dateTo && filters.dateFrom > filters.dateTo) {
      throw new ValidationError('dateFrom must not be after dateTo');
    }
    const rows = await this.repository.listNotes(filters);
    const personIds = [...new Set(rows.map((row) => row.person.id))];
    const generations = groupRecordsByGeneration(await this.repository.listDeviceRecords(personIds));

    return rows.map(({ note, person }) => {
      const deviceRecords = generations.get(`${person.id}|${note.createdAt.getTime()}`) ?? [];
      const verifiedDevices = deviceRecords.filter((r) => r.verified).length;
      return {
        noteId: note.id,
        person: {
          id: person.id,
          sessionId: person.sessionId,
          name: person.name,
          grade: person.grade,
          advisor: person.advisor,
        },
        noteText: note.body,
        author: note.authorIdentity,
        createdAt: note.createdAt,
        deviceRecords,
        totalDevices: deviceRecords.length,
        verifiedDevices,
        missingDevices: deviceRecords.length - verifiedDevices,
      };
    });
  }

  async exportNotes(filters: NotesFilters = {}): Promise<Buffer> {
    const entries = await this.listNotes({
      sessionId: filters.sessionId,
      dateFrom: filters.dateFrom,
      dateTo: filters.dateTo,
    });
    const rows: NotesExportRow[] = entries.map((entry) => ({
      person: entry.person.name,
      grade: entry.person.grade,
      advisor: entry.person.advisor,
      note: entry.noteText,
      devices: entry.totalDevices,
      missingDevices: entry.missingDevices,
      date: entry.createdAt.toISOString(),
      auditor: entry.author,
    }));
    const parser = new Parser<NotesExportRow>({ fields: NOTES_EXPORT_FIELDS });
    const csv = parser.parse(rows);
    logger.info('audit-notes-exported', { rowCount: rows.length, sessionId: filters.sessionId });
    return Buffer.from(csv, 'utf-8');
  }
}
