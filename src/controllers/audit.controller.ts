import type { NextFunction, Request, Response } from 'express';
import type { AuditServices } from '../app/composition-root';
import type { Paginated } from '../types/api.types';
import type { NotesFilters } from '../types/audit.types';
import { ok } from '../utils/api-response';
import { ValidationError } from '../utils/errors';
import { requireActorOf } from '../middleware/actor.middleware';
import { parseDateBound } from '../services/notes-ledger.service';
import {
  importOptionsSchema,
  notesExportQuerySchema,
  notesQuerySchema,
  personListQuerySchema,
  personParamsSchema,
  purgeSchema,
  sessionParamsSchema,
  submitVerificationSchema,
} from '../utils/validation.schemas';

type Handler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not forward rejected promises to the error handler
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function requireUpload(req: Request): Buffer {
  if (!req.file) {
    throw new ValidationError('A roster file is required in the "file" field');
  }
  if (!req.file.originalname.toLowerCase().endsWith('.csv')) {
    throw new ValidationError('Roster file must be a .csv file', { filename: req.file.originalname });
  }
  return req.file.buffer;
}

export function toPage<T>(items: T[], total: number, page: number, limit: number): Paginated<T> {
  const totalPages = Math.ceil(total / limit);
  return { items, total, page, limit, totalPages, hasNext: page < totalPages, hasPrev: page > 1 };
}

function notesFiltersFrom(query: { sessionId?: string; dateFrom?: string; dateTo?: string }): NotesFilters {
  return {
    sessionId: query.sessionId,
    dateFrom: query.dateFrom ? parseDateBound(query.dateFrom, 'from') : undefined,
    dateTo: query.dateTo ? parseDateBound(query.dateTo, 'to') : undefined,
  };
}

export function createAuditController(services: AuditServices) {
  return {
    /** POST /import/preview */
    previewImport: route(async (req, res) => {
      const bytes = requireUpload(req);
      const { encoding } = importOptionsSchema.parse(req.body ?? {});
      return ok(res, services.rosterImport.validateAndPreview(bytes, { encoding }));
    }),

    /** POST /import */
    finalizeImport: route(async (req, res) => {
      const bytes = requireUpload(req);
      const { encoding, confirmDuplicates } = importOptionsSchema.parse(req.body ?? {});
      const result = await services.rosterImport.finalizeImport(bytes, {
        creator: requireActorOf(res),
        confirmDuplicates,
        encoding,
      });
      return ok(res, result, 201);
    }),

    getSession: route(async (req, res) => {
      const { sessionId } = sessionParamsSchema.parse(req.params);
      const session = await services.sessions.getSession(sessionId);
      const statistics = await services.sessions.getStatistics(sessionId);
      return ok(res, { session: { ...session, status: statistics.status }, statistics });
    }),

    listActivePersons: route(async (req, res) => {
      const { sessionId } = sessionParamsSchema.parse(req.params);
      const { search, audited, page, limit } = personListQuerySchema.parse(req.query);
      const result = await services.sessions.listActivePersons(sessionId, {
        search,
        audited,
        limit,
        offset: (page - 1) * limit,
      });
      return ok(res, toPage(result.items, result.total, page, limit));
    }),

    listCompletedPersons: route(async (req, res) => {
      const { sessionId } = sessionParamsSchema.parse(req.params);
      const { search, page, limit } = personListQuerySchema.parse(req.query);
      const result = await services.sessions.listCompletedPersons(sessionId, { search, limit, offset: (page - 1) * limit });
      return ok(res, toPage(result.items, result.total, page, limit));
    }),

    getPerson: route(async (req, res) => {
      const { personId } = personParamsSchema.parse(req.params);
      return ok(res, await services.sessions.getPerson(personId));
    }),

    beginVerification: route(async (req, res) => {
      const { personId } = personParamsSchema.parse(req.params);
      return ok(res, await services.verification.beginVerification(personId));
    }),

    submitVerification: route(async (req, res) => {
      const { personId } = personParamsSchema.parse(req.params);
      const body = submitVerificationSchema.parse(req.body);
      const result = await services.verification.submitVerification(personId, {
        ...body,
        auditor: requireActorOf(res),
      });
      return ok(res, result);
    }),

    restoreForReaudit: route(async (req, res) => {
      const { personId } = personParamsSchema.parse(req.params);
      return ok(res, await services.reaudit.restoreForReaudit(personId, requireActorOf(res)));
    }),

    listNotes: route(async (req, res) => {
      const query = notesQuerySchema.parse(req.query);
      const filters = notesFiltersFrom(query);
      const all = await services.notes.listNotes(filters);
      const offset = (query.page - 1) * query.limit;
      return ok(res, toPage(all.slice(offset, offset + query.limit), all.length, query.page, query.limit));
    }),

    exportNotes: route(async (req, res) => {
      const filters = notesFiltersFrom(notesExportQuerySchema.parse(req.query));
      const csv = await services.notes.exportNotes(filters);
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', 'attachment; filename="audit_notes.csv"');
      return res.status(200).send(csv);
    }),

    purgeSessions: route(async (req, res) => {
      const { days } = purgeSchema.parse(req.body ?? {});
      const result = await services.retention.purgeSessionsOlderThan(days);
      return ok(res, { ...result, requestedBy: requireActorOf(res) });
    }),
  };
}

export type AuditController = ReturnType<typeof createAuditController>;
