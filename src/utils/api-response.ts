import type { Response } from 'express';
import { ZodError } from 'zod';
import type { ApiResponse, ErrorCode } from '../types/api.types';
import { ErrorCodes } from '../types/api.types';

function traceIdOf(res: Response): string | undefined {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === 'string' ? traceId : undefined;
}

// Build a standard ApiResponse without sending
export function buildOk<T>(data: T, requestId?: string): ApiResponse<T> {
  return {
    success: true,
    data,
    timestamp: new Date().toISOString(),
    ...(requestId ? { requestId } : {}),
  };
}

export function buildError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ApiResponse<never> {
  return {
    success: false,
    error: { code, message, ...(details ? { details } : {}) },
    timestamp: new Date().toISOString(),
    ...(requestId ? { requestId } : {}),
  };
}

// Express helpers
export function ok<T>(res: Response, data: T, status = 200): Response {
  return res.status(status).json(buildOk(data, traceIdOf(res)));
}

export function fail(
  res: Response,
  code: ErrorCode,
  message: string,
  status = 400,
  details?: Record<string, unknown>
): Response {
  return res.status(status).json(buildError(code, message, details, traceIdOf(res)));
}

export function mapZodIssues(error: ZodError): Record<string, unknown> {
  return {
    issues: error.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
      code: i.code,
    })),
  };
}

export function failFromZod(
  res: Response,
  error: ZodError,
  source: 'body' | 'params' | 'query' = 'body'
) {
  const details = { source, ...mapZodIssues(error) };
  return fail(res, ErrorCodes.VALIDATION_ERROR, 'Invalid request data', 400, details);
}

export { ErrorCodes };
