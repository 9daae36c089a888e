import type { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger';
import { getTraceId } from './trace-id.middleware';
import { actorOf } from './actor.middleware';

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = process.hrtime.bigint();
  const traceId = getTraceId(res);

  logger.info('http:start', {
    requestId: traceId,
    method: req.method,
    route: req.originalUrl.split('?')[0],
  });

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    logger.info('http:finish', {
      requestId: traceId,
      method: req.method,
      route: req.originalUrl.split('?')[0],
      statusCode: res.statusCode,
      durationMs: Math.round(durationMs),
      actor: actorOf(res),
    });
  });

  next();
}
