import type { NextFunction, Request, Response } from 'express';
import { ZodError, type ZodTypeAny } from 'zod';
import { fail, failFromZod, ErrorCodes } from '../utils/api-response';
import { logger } from '../utils/logger';

type Source = 'body' | 'params' | 'query';

function validateSource(schema: ZodTypeAny, source: Source) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed: unknown = await schema.parseAsync(req[source]);
      // Only the body is replaced with its parsed form; params and query keep
      // Express' own types and are re-parsed by the controller.
      if (source === 'body') req.body = parsed;
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        logger.debug('request-validation-failed', { source, issues: error.issues.length });
        return failFromZod(res, error, source);
      }

      logger.error('request-validation-error', error);
      return fail(res, ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', 500);
    }
  };
}

export function validate(schema: ZodTypeAny) {
  return validateSource(schema, 'body');
}

export function validateQuery(schema: ZodTypeAny) {
  return validateSource(schema, 'query');
}

export function validateParams(schema: ZodTypeAny) {
  return validateSource(schema, 'params');
}
