// Standardized error handling utilities
// Shared by the HTTP routes, the workflow engine and the tool gateway client

export enum ErrorCode {
  INTERNAL_ERROR = 'internal_error',
  COLLABORATOR_FAILED = 'collaborator_failed',
  TIMEOUT = 'timeout',
  GATEWAY_UNAVAILABLE = 'gateway_unavailable',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }

  static timeout(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.TIMEOUT, message, 504, details);
  }

  static gatewayUnavailable(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.GATEWAY_UNAVAILABLE, message, 503, details);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}
