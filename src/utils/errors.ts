// Standardized HTTP error handling utilities
// Engine faults are mapped onto HTTP statuses by their failure kind

import { FailureKind } from '../services/tools/types.js';

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  VALIDATION_ERROR = 'validation_error',
  UNPROCESSABLE = 'unprocessable_request',
  SERVICE_UNAVAILABLE = 'service_unavailable',
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

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static unprocessable(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.UNPROCESSABLE, message, 422, details);
  }

  static serviceUnavailable(message: string = 'Service unavailable', details?: unknown): AppError {
    return new AppError(ErrorCode.SERVICE_UNAVAILABLE, message, 503, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }

  /**
   * HTTP error for an engine fault of the given kind. The message is generic;
   * the kind travels in `details`.
   */
  static fromFailureKind(kind: FailureKind): AppError {
    const details = { kind };
    switch (kind) {
      case FailureKind.PARAMETER_INVALID:
      case FailureKind.DEPENDENCY_UNSATISFIABLE:
        return AppError.unprocessable('The assistant could not work with the information in this request', details);
      case FailureKind.ENTITY_NOT_FOUND:
        return AppError.notFound('The assistant could not find what this request refers to', details);
      case FailureKind.TRANSIENT:
        return AppError.serviceUnavailable('The assistant is temporarily unavailable; try again shortly', details);
      default:
        return AppError.internal('The assistant could not process this request', details);
    }
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
