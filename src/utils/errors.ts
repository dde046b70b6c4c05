// Standardized error types shared by the tool hosts and orchestrators

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  VALIDATION_ERROR = 'validation_error',
  CONFIGURATION_ERROR = 'configuration_error',
  AUTHORIZATION_ERROR = 'authorization_error',
  EXTERNAL_CALL_ERROR = 'external_call_error',
  MODEL_OUTPUT_ERROR = 'model_output_error',
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

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static configuration(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.CONFIGURATION_ERROR, message, 500, details);
  }

  static authorization(message: string = 'Authorization required', details?: unknown): AppError {
    return new AppError(ErrorCode.AUTHORIZATION_ERROR, message, 401, details);
  }

  static externalCall(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.EXTERNAL_CALL_ERROR, message, 502, details);
  }

  static modelOutput(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.MODEL_OUTPUT_ERROR, message, 422, details);
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
