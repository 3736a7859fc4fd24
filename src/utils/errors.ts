// Standardized error handling utilities
// Errors that cross the service boundary carry a code and an HTTP status

export enum ErrorCode {
  BAD_REQUEST = 'bad_request',
  VALIDATION_ERROR = 'validation_error',
  MODEL_UNAVAILABLE = 'model_unavailable',
  CONFIGURATION_ERROR = 'configuration_error',
  INTERNAL_ERROR = 'internal_error',
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

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  // The model collaborator failed or timed out; the session cannot continue
  static modelUnavailable(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.MODEL_UNAVAILABLE, message, 502, details);
  }

  static configuration(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.CONFIGURATION_ERROR, message, 500, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
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

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
