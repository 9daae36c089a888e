export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  SCHEMA_ERROR: 'SCHEMA_ERROR',
  ENCODING_ERROR: 'ENCODING_ERROR',
  CAPACITY_EXCEEDED: 'CAPACITY_EXCEEDED',
  NOT_FOUND: 'NOT_FOUND',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INCOMPLETE_VERIFICATION: 'INCOMPLETE_VERIFICATION',
  CONFLICT: 'CONFLICT',
  DUPLICATES_UNCONFIRMED: 'DUPLICATES_UNCONFIRMED',
  INVALID_STATE: 'INVALID_STATE',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  UNAUTHORIZED: 'UNAUTHORIZED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ApiError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type ApiResponse<T> =
  | { success: true; data: T; timestamp: string; requestId?: string }
  | { success: false; error: ApiError; timestamp: string; requestId?: string };

export interface Paginated<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}
