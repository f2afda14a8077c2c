// Standardized error handling utilities for HTTP responses

import { ZodError } from 'zod';

export enum ErrorCode {
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
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

  static badRequest(message: string = 'Bad request'): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static internal(message: string = 'Internal server error'): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500);
  }

  static fromZod(error: ZodError): AppError {
    const message = error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return AppError.validationError(message, error.issues);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  /** zod issues for validation errors */
  details?: unknown;
}

export function formatErrorResponse(error: AppError): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (error.details !== undefined) {
    response.details = error.details;
  }

  return response;
}

export function toAppError(error: AppError | ZodError): AppError {
  return error instanceof ZodError ? AppError.fromZod(error) : error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
