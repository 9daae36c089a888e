import { ErrorCodes, type ErrorCode } from '../types/api.types';

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  public statusCode: number;
  public code: ErrorCode;
  public details?: ErrorDetails;
  public isOperational: boolean;

  constructor(message: string, statusCode: number, code: ErrorCode, details?: ErrorDetails) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 400, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

// Import-time

export class SchemaError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 422, ErrorCodes.SCHEMA_ERROR, details);
    this.name = 'SchemaError';
  }
}

export class EncodingError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 415, ErrorCodes.ENCODING_ERROR, details);
    this.name = 'EncodingError';
  }
}

export class CapacityError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 413, ErrorCodes.CAPACITY_EXCEEDED, details);
    this.name = 'CapacityError';
  }
}

// Directory-query-time

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', details?: ErrorDetails) {
    super(message, 404, ErrorCodes.NOT_FOUND, details);
    this.name = 'NotFoundError';
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Upstream service unavailable', details?: ErrorDetails) {
    super(message, 503, ErrorCodes.SERVICE_UNAVAILABLE, details);
    this.name = 'ServiceUnavailableError';
  }
}

// Verification/recovery-time

export class IncompleteVerificationError extends AppError {
  constructor(message: string = 'All devices must be verified', details?: ErrorDetails) {
    super(message, 422, ErrorCodes.INCOMPLETE_VERIFICATION, details);
    this.name = 'IncompleteVerificationError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Resource conflict', details?: ErrorDetails, code: ErrorCode = ErrorCodes.CONFLICT) {
    super(message, 409, code, details);
    this.name = 'ConflictError';
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 409, ErrorCodes.INVALID_STATE, details);
    this.name = 'InvalidStateError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
