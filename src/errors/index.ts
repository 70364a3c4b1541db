/**
 * Standardized Error Classes
 *
 * Bad input data is never thrown: it becomes a finding in the validation
 * report. These classes cover caller mistakes and unrecoverable conditions,
 * shared by the HTTP error handler and the CLI.
 */

/**
 * Error codes for programmatic handling
 */
export enum ErrorCode {
  // Client errors (4xx)
  BAD_REQUEST = 'BAD_REQUEST',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',

  // Server errors (5xx)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  FILE_ACCESS_ERROR = 'FILE_ACCESS_ERROR',
  REPORT_PERSISTENCE_ERROR = 'REPORT_PERSISTENCE_ERROR',
}

/**
 * Base application error class
 * All custom errors should extend this class
 */
export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    public isOperational = true,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 400 Bad Request - Invalid request syntax or parameters
 */
export class BadRequestError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, ErrorCode.BAD_REQUEST, true, details);
    this.name = 'BadRequestError';
  }
}

/**
 * 400 Validation Error - Caller supplied invalid options or arguments
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, ErrorCode.VALIDATION_ERROR, true, details);
    this.name = 'ValidationError';
  }
}

/**
 * 500 File Access Error - Input exists but cannot be read
 */
export class FileAccessError extends AppError {
  constructor(filePath: string, cause: string) {
    super(500, `Cannot read ${filePath}: ${cause}`, ErrorCode.FILE_ACCESS_ERROR, false, { filePath });
    this.name = 'FileAccessError';
  }
}

/**
 * 500 Report Persistence Error - Report or documentation could not be written
 */
export class ReportPersistenceError extends AppError {
  constructor(outputPath: string, cause: string) {
    super(
      500,
      `Failed to save report to ${outputPath}: ${cause}`,
      ErrorCode.REPORT_PERSISTENCE_ERROR,
      false,
      { outputPath }
    );
    this.name = 'ReportPersistenceError';
  }
}

/**
 * Extracts a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
