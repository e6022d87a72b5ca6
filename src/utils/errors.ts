// Standardized error handling utilities
// HTTP-facing AppError plus the tool and model failure taxonomy used by the orchestrator

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  SERVICE_UNAVAILABLE = 'service_unavailable',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found'): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404);
  }

  static validationError(message: string): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400);
  }

  static serviceUnavailable(message: string = 'Service unavailable'): AppError {
    return new AppError(ErrorCode.SERVICE_UNAVAILABLE, message, 503);
  }

  static internal(message: string = 'Internal server error'): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError): ErrorResponse {
  return {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };
}

// --- Tool failures ---

export class DuplicateToolError extends Error {
  constructor(public toolName: string) {
    super(`Tool "${toolName}" is already registered`);
    this.name = 'DuplicateToolError';
  }
}

export class UnknownToolError extends Error {
  constructor(public toolName: string) {
    super(`Tool "${toolName}" not found`);
    this.name = 'UnknownToolError';
  }
}

export class InvalidToolArgumentsError extends Error {
  constructor(public toolName: string, public issues: string[]) {
    super(`Invalid arguments for "${toolName}": ${issues.join('; ')}`);
    this.name = 'InvalidToolArgumentsError';
  }
}

/**
 * Raised by tool handlers for expected failures (service disabled, nothing to
 * compare). Anything else a handler throws is treated the same way by the executor.
 */
export class ToolExecutionError extends Error {
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ToolExecutionError';
  }
}

// --- Model service failures ---

export type ModelServiceErrorCode = 'service_unavailable' | 'rate_limited';

export class ModelServiceError extends Error {
  constructor(
    public code: ModelServiceErrorCode,
    message: string,
    public provider: string,
    public status?: number
  ) {
    super(message);
    this.name = 'ModelServiceError';
  }

  static unavailable(provider: string, message: string, status?: number): ModelServiceError {
    return new ModelServiceError('service_unavailable', message, provider, status);
  }

  static rateLimited(provider: string, message: string): ModelServiceError {
    return new ModelServiceError('rate_limited', message, provider, 429);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
