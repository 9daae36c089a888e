import type { DbPort, DbTransactionPort } from '../../services/ports/db.port';
import type { AuditRepositoryPort, NoteRow } from '../../services/ports/audit.repository.port';
import type {
  AuditNote,
  AuditPerson,
  AuditSession,
  AuditSessionStatus,
  DeviceRecord,
  PersonRecord,
} from '../../types/audit.types';
import { PG_UNIQUE_VIOLATION, PostgresAdapterError } from '../db/postgres.adapter';
import { ConflictError } from '../../utils/errors';

const SESSIONS_TABLE = 'audit.audit_sessions';
const PERSONS_TABLE = 'audit.audit_persons';
const DEVICE_RECORDS_TABLE = 'audit.audit_device_records';
const NOTES_TABLE = 'audit.audit_notes';

const PERSON_COLUMNS = 'id, session_id, name, grade, advisor, username, audited, audit_timestamp, auditor_identity';
const DEVICE_RECORD_COLUMNS = 'id, person_id, asset_id, asset_tag, serial_number, device_type, verified, recorded_at';

type SessionRow = {
  id: string;
  creator_identity: string;
  created_at: Date;
  status: AuditSessionStatus;
  person_count: number;
};

type PersonRow = {
  id: string;
  session_id: string;
  name: string;
  grade: string;
  advisor: string;
  username: string;
  audited: boolean;
  audit_timestamp: Date | null;
  auditor_identity: string | null;
};

type DeviceRecordRow = {
  id: string;
  person_id: string;
  asset_id: string;
  asset_tag: string;
  serial_number: string;
  device_type: string;
  verified: boolean;
  recorded_at: Date;
};

type NoteJoinRow = PersonRow & {
  note_id: string;
  note_body: string;
  note_created_at: Date;
  note_author: string;
  person_id: string;
};

function mapSession(row: SessionRow): AuditSession {
  return {
    id: row.id,
    creatorIdentity: row.creator_identity,
    createdAt: row.created_at,
    status: row.status,
    personCount: row.person_count,
  };
}

function mapPerson(row: PersonRow): AuditPerson {
  return {
    id: row.id,
    sessionId: row.session_id,
    name: row.name,
    grade: row.grade,
    advisor: row.advisor,
    username: row.username,
    audited: row.audited,
    auditTimestamp: row.audit_timestamp,
    auditorIdentity: row.auditor_identity,
  };
}

function mapDeviceRecord(row: DeviceRecordRow): DeviceRecord {
  return {
    id: row.id,
    personId: row.person_id,
    assetId: row.asset_id,
    assetTag: row.asset_tag,
    serialNumber: row.serial_number,
    deviceType: row.device_type,
    verified: row.verified,
    recordedAt: row.recorded_at,
  };
}

/** Escapes LIKE wildcards so user search text matches literally. */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof PostgresAdapterError && error.code === PG_UNIQUE_VIOLATION;
}

export function createDbAuditRepository(db: DbPort): AuditRepositoryPort {
  async function insertPersonRows(tx: DbTransactionPort, sessionId: string, persons: PersonRecord[]): Promise<void> {
    if (persons.length === 0) return;
    const rows = persons.map((p) => ({
      id: db.generateId(),
      session_id: sessionId,
      name: p.name,
      grade: p.grade,
      advisor: p.advisor,
      username: p.username,
      audited: false,
    }));
    try {
      await tx.insertMany(PERSONS_TABLE, rows, { operation: 'insertAuditPersons' });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Roster contains a person already present in this session', { sessionId });
      }
      throw error;
    }
  }

  async function readPerson(tx: DbTransactionPort, personId: string): Promise<AuditPerson | null> {
    const row = await tx.queryOne<PersonRow>(`SELECT ${PERSON_COLUMNS} FROM ${PERSONS_TABLE} WHERE id = ?`, [personId], {
      operation: 'getAuditPerson',
    });
    return row ? mapPerson(row) : null;
  }

  return {
    async createSessionWithPersons(creator, persons) {
      return db.withTransaction(async (tx) => {
        const row: SessionRow = {
          id: db.generateId(),
          creator_identity: creator,
          created_at: new Date(),
          status: 'active',
          person_count: persons.length,
        };
        await tx.insert(SESSIONS_TABLE, row, { operation: 'insertAuditSession' });
        await insertPersonRows(tx, row.id, persons);
        return mapSession(row);
      });
    },

    async createSession(creator) {
      const row: SessionRow = {
        id: db.generateId(),
        creator_identity: creator,
        created_at: new Date(),
        status: 'active',
        person_count: 0,
      };
      await db.insert(SESSIONS_TABLE, row, { operation: 'insertAuditSession' });
      return mapSession(row);
    },

    async insertPersons(sessionId, persons) {
      return db.withTransaction(async (tx) => {
        const session = await tx.queryOne(`SELECT id FROM ${SESSIONS_TABLE} WHERE id = ? FOR UPDATE`, [sessionId], {
          operation: 'lockAuditSession',
        });
        if (!session) return null;
        await insertPersonRows(tx, sessionId, persons);
        await tx.query(`UPDATE ${SESSIONS_TABLE} SET person_count = person_count + ? WHERE id = ?`, [persons.length, sessionId], {
          operation: 'incrementPersonCount',
        });
        return persons.length;
      });
    },

    async getSession(sessionId) {
      const row = await db.queryOne<SessionRow>(
        `SELECT id, creator_identity, created_at, status, person_count FROM ${SESSIONS_TABLE} WHERE id = ?`,
        [sessionId],
        { operation: 'getAuditSession' }
      );
      return row ? mapSession(row) : null;
    },

    async updateSessionStatus(sessionId, status) {
      await db.update(SESSIONS_TABLE, sessionId, { status }, 'id', { operation: 'updateAuditSessionStatus' });
    },

    async listPersons(sessionId, filters) {
      const where: string[] = ['session_id = ?', 'audited = ?'];
      const params: unknown[] = [sessionId, filters.audited ?? false];
      const search = filters.search?.trim();
      if (search) {
        const pattern = `%${escapeLikePattern(search)}%`;
        where.push('(name ILIKE ? OR grade ILIKE ? OR advisor ILIKE ?)');
        params.push(pattern, pattern, pattern);
      }
      const orderBy = filters.audited ? 'audit_timestamp DESC, name ASC' : 'name ASC, grade ASC';
      const rows = await db.query<PersonRow>(
        `SELECT ${PERSON_COLUMNS}
         FROM ${PERSONS_TABLE}
         WHERE ${where.join(' AND ')}
         ORDER BY ${orderBy}
         LIMIT ? OFFSET ?`,
        [...params, filters.limit, filters.offset],
        { operation: 'listAuditPersons' }
      );
      const count = await db.queryOne<{ total: number }>(
        `SELECT COUNT(*)::int AS total FROM ${PERSONS_TABLE} WHERE ${where.join(' AND ')}`,
        params,
        { operation: 'countAuditPersons' }
      );
      return { items: rows.map(mapPerson), total: count?.total ?? 0 };
    },

    async getPerson(personId) {
      return readPerson(db, personId);
    },

    async countPersons(sessionId) {
      const row = await db.queryOne<{ total: number; audited: number }>(
        `SELECT COUNT(*)::int AS total,
                COUNT(*) FILTER (WHERE audited)::int AS audited
         FROM ${PERSONS_TABLE}
         WHERE session_id = ?`,
        [sessionId],
        { operation: 'countAuditProgress' }
      );
      return { total: row?.total ?? 0, audited: row?.audited ?? 0 };
    },

    async completeAudit(write) {
      return db.withTransaction(async (tx) => {
        // The boolean gate is the serialization point between auditors
        const claimed = await tx.queryOne<{ id: string }>(
          `UPDATE ${PERSONS_TABLE}
           SET audited = TRUE, audit_timestamp = ?, auditor_identity = ?
           WHERE id = ? AND audited = FALSE
           RETURNING id`,
          [write.auditedAt, write.auditor, write.personId],
          { operation: 'claimAuditPerson' }
        );
        if (!claimed) {
          return { claimed: false as const, current: await readPerson(tx, write.personId) };
        }

        const deviceRows: DeviceRecordRow[] = write.devices.map((device) => ({
          id: db.generateId(),
          person_id: write.personId,
          asset_id: device.assetId,
          asset_tag: device.assetTag,
          serial_number: device.serialNumber,
          device_type: device.deviceType,
          verified: true,
          recorded_at: write.auditedAt,
        }));
        await tx.insertMany(DEVICE_RECORDS_TABLE, deviceRows, { operation: 'insertDeviceRecords' });

        let note: AuditNote | null = null;
        if (write.note) {
          note = {
            id: db.generateId(),
            personId: write.personId,
            body: write.note,
            createdAt: write.auditedAt,
            authorIdentity: write.auditor,
          };
          await tx.insert(
            NOTES_TABLE,
            {
              id: note.id,
              person_id: note.personId,
              body: note.body,
              created_at: note.createdAt,
              author_identity: note.authorIdentity,
            },
            { operation: 'insertAuditNote' }
          );
        }

        return { claimed: true as const, deviceRecords: deviceRows.map(mapDeviceRecord), note };
      });
    },

    async reopenAudit(personId) {
      return db.withTransaction(async (tx) => {
        const row = await tx.queryOne<PersonRow>(
          `UPDATE ${PERSONS_TABLE}
           SET audited = FALSE, audit_timestamp = NULL, auditor_identity = NULL
           WHERE id = ? AND audited = TRUE
           RETURNING ${PERSON_COLUMNS}`,
          [personId],
          { operation: 'reopenAuditPerson' }
        );
        if (!row) {
          return { reopened: false as const, current: await readPerson(tx, personId) };
        }
        return { reopened: true as const, person: mapPerson(row) };
      });
    },

    async listDeviceRecords(personIds) {
      if (personIds.length === 0) return [];
      const rows = await db.query<DeviceRecordRow>(
        `SELECT ${DEVICE_RECORD_COLUMNS}
         FROM ${DEVICE_RECORDS_TABLE}
         WHERE person_id = ANY(?::uuid[])
         ORDER BY recorded_at DESC, asset_tag ASC`,
        [personIds],
        { operation: 'listDeviceRecords' }
      );
      return rows.map(mapDeviceRecord);
    },

    async listNotes(filters) {
      const where: string[] = ['1=1'];
      const params: unknown[] = [];
      if (filters.sessionId) {
        where.push('p.session_id = ?');
        params.push(filters.sessionId);
      }
      if (filters.dateFrom) {
        where.push('n.created_at >= ?');
        params.push(filters.dateFrom);
      }
      if (filters.dateTo) {
        where.push('n.created_at <= ?');
        params.push(filters.dateTo);
      }
      let paging = '';
      if (filters.limit !== undefined) {
        paging = 'LIMIT ? OFFSET ?';
        params.push(filters.limit, filters.offset ?? 0);
      }
      const rows = await db.query<NoteJoinRow>(
        `SELECT n.id AS note_id,
                n.person_id,
                n.body AS note_body,
                n.created_at AS note_created_at,
                n.author_identity AS note_author,
                p.id, p.session_id, p.name, p.grade, p.advisor, p.username,
                p.audited, p.audit_timestamp, p.auditor_identity
         FROM ${NOTES_TABLE} n
         JOIN ${PERSONS_TABLE} p ON p.id = n.person_id
         WHERE ${where.join(' AND ')}
         ORDER BY n.created_at DESC
         ${paging}`,
        params,
        { operation: 'listAuditNotes' }
      );
      return rows.map(
        (row): NoteRow => ({
          note: {
            id: row.note_id,
            personId: row.person_id,
            body: row.note_body,
            createdAt: row.note_created_at,
            authorIdentity: row.note_author,
          },
          person: mapPerson(row),
        })
      );
    },

    async deleteSessionsCreatedBefore(cutoff) {
      const rows = await db.query<{ id: string }>(`DELETE FROM ${SESSIONS_TABLE} WHERE created_at < ? RETURNING id`, [cutoff], {
        operation: 'purgeAuditSessions',
      });
      return rows.length;
    },
  };
}
