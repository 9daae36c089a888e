import type { NextFunction, Request, Response } from 'express';
import { getCounter, getHistogram } from '../utils/metrics';

const httpRequestCounter = getCounter('device_audit_http_requests_total', 'Total number of HTTP requests', [
  'method',
  'route',
  'status',
]);

const httpRequestDuration = getHistogram(
  'device_audit_http_request_duration_seconds',
  'Duration of HTTP requests in seconds',
  ['method', 'route', 'status'],
  [0.05, 0.1, 0.2, 0.4, 0.8, 1.6, 3.2, 6.4, 12.8]
);

function routeLabel(req: Request): string {
  // Prefer the matched route pattern so ids do not explode label cardinality
  const matched: unknown = req.route?.path;
  if (typeof matched === 'string') return `${req.baseUrl}${matched}`;
  const url = req.originalUrl || req.url || '';
  return url.split('?')[0] || '/unknown';
}

export function httpMetricsMiddleware(req: Request, res: Response, next: NextFunction) {
  const method = req.method;
  const endTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const status = String(res.statusCode);
    const route = routeLabel(req);
    httpRequestCounter.inc({ method, route, status });
    endTimer({ method, route, status });
  });

  next();
}
