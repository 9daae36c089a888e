import { Router } from 'express';
import multer from 'multer';
import type { AuditServices } from '../app/composition-root';
import { createAuditController } from '../controllers/audit.controller';
import { requireActor } from '../middleware/actor.middleware';
import { validate, validateParams, validateQuery } from '../middleware/validation.middleware';
import {
  notesExportQuerySchema,
  notesQuerySchema,
  personListQuerySchema,
  personParamsSchema,
  purgeSchema,
  sessionParamsSchema,
  submitVerificationSchema,
} from '../utils/validation.schemas';

export interface AuditRouterOptions {
  uploadMaxBytes: number;
}

export function createAuditRouter(services: AuditServices, options: AuditRouterOptions): Router {
  const router = Router();
  const controller = createAuditController(services);
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.uploadMaxBytes, files: 1 },
  });

  // Every audit action is attributed to the acting user
  router.use(requireActor);

  // Roster import
  router.post('/import/preview', upload.single('file'), controller.previewImport);
  router.post('/import', upload.single('file'), controller.finalizeImport);

  // Sessions and queues
  router.get('/sessions/:sessionId', validateParams(sessionParamsSchema), controller.getSession);
  router.get(
    '/sessions/:sessionId/persons',
    validateParams(sessionParamsSchema),
    validateQuery(personListQuerySchema),
    controller.listActivePersons
  );
  router.get(
    '/sessions/:sessionId/completed',
    validateParams(sessionParamsSchema),
    validateQuery(personListQuerySchema),
    controller.listCompletedPersons
  );

  // Persons and verification
  router.get('/persons/:personId', validateParams(personParamsSchema), controller.getPerson);
  router.post('/persons/:personId/verification', validateParams(personParamsSchema), controller.beginVerification);
  router.post(
    '/persons/:personId/verification/submit',
    validateParams(personParamsSchema),
    validate(submitVerificationSchema),
    controller.submitVerification
  );
  router.post('/persons/:personId/reaudit', validateParams(personParamsSchema), controller.restoreForReaudit);

  // Notes ledger
  router.get('/notes', validateQuery(notesQuerySchema), controller.listNotes);
  router.get('/notes/export', validateQuery(notesExportQuerySchema), controller.exportNotes);

  // Maintenance
  router.post('/maintenance/purge', validate(purgeSchema), controller.purgeSessions);

  return router;
}
