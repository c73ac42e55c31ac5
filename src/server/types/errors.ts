/**
 * Centralized error type definitions for the KMZ survey export pipeline
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Input archive
  ARCHIVE_READ_ERROR = 'ARCHIVE_READ_ERROR',
  INVALID_ARCHIVE = 'INVALID_ARCHIVE',
  MISSING_DOCUMENT = 'MISSING_DOCUMENT',

  // Document content
  MALFORMED_DOCUMENT = 'MALFORMED_DOCUMENT',
  DESCRIPTION_PARSE_FAILURE = 'DESCRIPTION_PARSE_FAILURE',

  // Caller input
  SELECTION_ERROR = 'SELECTION_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // Output
  OUTPUT_WRITE_ERROR = 'OUTPUT_WRITE_ERROR',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ArchiveReadError extends AppError {
  constructor(archivePath: string, cause: unknown) {
    super(
      `Could not read archive '${archivePath}': ${getErrorMessage(cause)}`,
      ErrorCode.ARCHIVE_READ_ERROR,
      true,
      { archivePath }
    );
  }
}

export class InvalidArchiveError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_ARCHIVE, true, context);
  }
}

/**
 * No entry with the expected document extension exists in the archive
 */
export class MissingDocumentError extends AppError {
  constructor(extension: string, context?: Record<string, unknown>) {
    super(`No ${extension} file found in archive`, ErrorCode.MISSING_DOCUMENT, true, {
      extension,
      ...context,
    });
  }
}

export class MalformedDocumentError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.MALFORMED_DOCUMENT, true, context);
  }
}

/**
 * Raised inside the description parser only. It is logged and turned into an
 * empty result there; callers never see it.
 */
export class DescriptionParseFailure extends AppError {
  constructor(operation: 'heading' | 'table', cause: unknown) {
    super(
      `Description ${operation} extraction failed: ${getErrorMessage(cause)}`,
      ErrorCode.DESCRIPTION_PARSE_FAILURE,
      true,
      { operation }
    );
  }
}

export class SelectionError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.SELECTION_ERROR, true, context);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, true, context);
  }
}

export class OutputWriteError extends AppError {
  constructor(outputPath: string, cause: unknown) {
    super(
      `Could not write output file '${outputPath}': ${getErrorMessage(cause)}`,
      ErrorCode.OUTPUT_WRITE_ERROR,
      true,
      { outputPath }
    );
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert any error to AppError; unknown errors become non-operational
 * INTERNAL_ERROR instances
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_ERROR, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_ERROR, false);
}
