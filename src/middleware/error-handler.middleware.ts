import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { fail, failFromZod, ErrorCodes } from '../utils/api-response';
import { isAppError } from '../utils/errors';
import { logger } from '../utils/logger';

export function notFoundHandler(req: Request, res: Response) {
  return fail(res, ErrorCodes.NOT_FOUND, 'The requested resource was not found', 404, {
    route: req.originalUrl.split('?')[0],
  });
}

// Express recognises error handlers by arity, so `next` must stay in the signature
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const route = req.originalUrl.split('?')[0];

  if (isAppError(err)) {
    const log = err.statusCode >= 500 ? logger.warn : logger.debug;
    log('request-failed', { route, method: req.method, code: err.code, status: err.statusCode });
    return fail(res, err.code, err.message, err.statusCode, err.details);
  }

  if (err instanceof ZodError) {
    return failFromZod(res, err);
  }

  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return fail(res, ErrorCodes.PAYLOAD_TOO_LARGE, 'Uploaded file is too large', 413, { field: err.field });
    }
    return fail(res, ErrorCodes.VALIDATION_ERROR, err.message, 400, { code: err.code, field: err.field });
  }

  if (err instanceof SyntaxError && 'body' in err) {
    return fail(res, ErrorCodes.VALIDATION_ERROR, 'Malformed JSON body', 400);
  }

  logger.error('request-unhandled-error', {
    route,
    method: req.method,
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  return fail(res, ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', 500);
}
