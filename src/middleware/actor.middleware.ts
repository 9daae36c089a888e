import type { NextFunction, Request, Response } from 'express';
import { fail, ErrorCodes } from '../utils/api-response';
import { logger } from '../utils/logger';

/**
 * The surrounding application authenticates users and forwards the acting
 * auditor/reviewer identity in this header. Authentication itself happens
 * upstream; this middleware only requires that an identity is present.
 */
export const ACTOR_HEADER = 'x-actor-identity';

const MAX_ACTOR_LENGTH = 255;

export function requireActor(req: Request, res: Response, next: NextFunction) {
  const raw = req.headers[ACTOR_HEADER];
  const value = (Array.isArray(raw) ? raw[0] : raw)?.trim();

  if (!value) {
    logger.debug('actor-missing', { route: req.originalUrl.split('?')[0] });
    return fail(res, ErrorCodes.UNAUTHORIZED, 'Acting user identity is required', 401, { header: ACTOR_HEADER });
  }

  res.locals.actor = value.slice(0, MAX_ACTOR_LENGTH);
  next();
}

export function actorOf(res: Response): string | undefined {
  const actor: unknown = res.locals.actor;
  return typeof actor === 'string' ? actor : undefined;
}

export function requireActorOf(res: Response): string {
  const actor = actorOf(res);
  if (!actor) {
    // requireActor must run before any handler that calls this
    throw new Error('Actor identity missing from response locals');
  }
  return actor;
}
