/**
 * Centralized error type definitions for the curriculum pipeline
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Client errors
  NOT_FOUND = 'NOT_FOUND',
  FILE_MISSING = 'FILE_MISSING',

  // Pipeline errors
  NAVIGATION_ERROR = 'NAVIGATION_ERROR',
  CONVERSION_ERROR = 'CONVERSION_ERROR',

  // Server errors
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, additionalContext?: Record<string, unknown>) {
    super(
      identifier ? `${resource} with identifier '${identifier}' not found` : `${resource} not found`,
      ErrorCode.NOT_FOUND,
      404,
      true,
      { resource, identifier, ...additionalContext }
    );
  }
}

/**
 * A derived or source artifact that has not been produced (yet)
 */
export class FileMissingError extends NotFoundError {
  public override readonly code: string = ErrorCode.FILE_MISSING;

  constructor(kind: string, filePath?: string | null) {
    super('Artifact', kind, { filePath: filePath ?? null });
    this.message = filePath
      ? `Artifact '${kind}' has not been produced yet (${filePath})`
      : `Artifact '${kind}' has not been produced yet`;
  }
}

/**
 * The catalogue page could not be opened or the document could not be downloaded
 */
export class NavigationError extends AppError {
  constructor(url: string, message: string, context?: Record<string, unknown>) {
    super(`Navigation to ${url} failed: ${message}`, ErrorCode.NAVIGATION_ERROR, 502, true, { url, ...context });
  }
}

/**
 * The source PDF could not be opened or holds no extractable text
 */
export class ConversionError extends AppError {
  constructor(pdfPath: string, message: string, context?: Record<string, unknown>) {
    super(`Conversion of ${pdfPath} failed: ${message}`, ErrorCode.CONVERSION_ERROR, 422, true, { pdfPath, ...context });
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      502,
      true,
      { service, ...context }
    );
  }
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
  stack?: string; // Only in development
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}
