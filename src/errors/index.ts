/**
 * Error Handling System
 *
 * Provides a standardized error handling system with dual-message format:
 * - userMessage: Friendly message for end users (no technical details)
 * - developerMessage: Technical details for debugging
 *
 * All errors across the codebase use this system for consistent error reporting.
 * Per-file problems (parse failures, oversized or unreadable files) are
 * recoverable: the analyzer records them and keeps going.
 */

import { getLogger } from '../utils/logger.js';
import { sanitizePath } from '../utils/paths.js';

/**
 * Error codes for all analysis errors
 */
export enum ErrorCode {
  /** Source file could not be parsed */
  PARSE_FAILED = 'PARSE_FAILED',
  /** Source file exceeds the configured size limit */
  FILE_TOO_LARGE = 'FILE_TOO_LARGE',
  /** Requested file does not exist */
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  /** Insufficient permissions to access path */
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  /** Analysis root does not exist or is not a directory */
  PATH_NOT_FOUND = 'PATH_NOT_FOUND',
  /** File enumeration failed */
  SCAN_FAILED = 'SCAN_FAILED',
  /** Tree-sitter runtime could not be initialized */
  PARSER_UNAVAILABLE = 'PARSER_UNAVAILABLE',
  /** Invalid option value */
  INVALID_OPTION = 'INVALID_OPTION',
}

/**
 * Codes that only affect a single file and never abort a run
 */
const RECOVERABLE_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.PARSE_FAILED,
  ErrorCode.FILE_TOO_LARGE,
  ErrorCode.FILE_NOT_FOUND,
]);

export interface CohesionErrorOptions {
  code: ErrorCode;
  userMessage: string;
  developerMessage: string;
  cause?: Error;
}

/**
 * Custom error class with dual messages
 *
 * Extends Error to provide:
 * - Separate user-friendly and developer messages
 * - Proper stack trace capture
 * - JSON serialization for reports
 * - Integration with logging system
 */
export class CohesionError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** User-friendly message (safe to display to end users) */
  readonly userMessage: string;

  /** Technical message with debugging details */
  readonly developerMessage: string;

  /** Original error that caused this error */
  readonly cause?: Error;

  constructor(options: CohesionErrorOptions) {
    super(options.developerMessage);

    this.code = options.code;
    this.userMessage = options.userMessage;
    this.developerMessage = options.developerMessage;
    this.cause = options.cause;

    // Set the prototype explicitly for proper instanceof checks
    Object.setPrototypeOf(this, CohesionError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CohesionError);
    }

    this.name = `CohesionError[${this.code}]`;

    this.logError();
  }

  /**
   * Whether the error is confined to one file
   */
  get recoverable(): boolean {
    return RECOVERABLE_CODES.has(this.code);
  }

  private logError(): void {
    const logger = getLogger();
    const meta: Record<string, unknown> = {
      code: this.code,
      userMessage: this.userMessage,
    };

    if (this.cause) {
      meta.cause = {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      };
    }

    if (this.recoverable) {
      logger.warn('CohesionError', this.developerMessage, meta);
    } else {
      logger.error('CohesionError', this.developerMessage, meta);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      userMessage: this.userMessage,
      developerMessage: this.developerMessage,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }

  toString(): string {
    return `${this.name}: ${this.developerMessage}`;
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create a PARSE_FAILED error
 *
 * @param filePath - The file that could not be parsed
 * @param reason - Parser-level detail
 */
export function parseFailed(filePath: string, reason: string, cause?: Error): CohesionError {
  return new CohesionError({
    code: ErrorCode.PARSE_FAILED,
    userMessage: 'A source file could not be parsed and was skipped.',
    developerMessage: `Failed to parse ${sanitizePath(filePath)}: ${reason}`,
    cause,
  });
}

/**
 * Create a FILE_TOO_LARGE error
 */
export function fileTooLarge(filePath: string, size: number, maxSize: number): CohesionError {
  return new CohesionError({
    code: ErrorCode.FILE_TOO_LARGE,
    userMessage: 'A source file exceeds the size limit and was skipped.',
    developerMessage: `File too large: ${sanitizePath(filePath)} (${size} bytes, limit ${maxSize} bytes)`,
  });
}

/**
 * Create a FILE_NOT_FOUND error
 *
 * @param filePath - The path to the missing file
 */
export function fileNotFound(filePath: string, cause?: Error): CohesionError {
  return new CohesionError({
    code: ErrorCode.FILE_NOT_FOUND,
    userMessage: 'The requested file could not be found.',
    developerMessage: `File not found: ${sanitizePath(filePath)}`,
    cause,
  });
}

/**
 * Create a PERMISSION_DENIED error
 *
 * @param filePath - The path that could not be accessed
 */
export function permissionDenied(filePath: string, cause?: Error): CohesionError {
  return new CohesionError({
    code: ErrorCode.PERMISSION_DENIED,
    userMessage:
      'Access denied. Please check that you have permission to access this location.',
    developerMessage: `Permission denied accessing path: ${sanitizePath(filePath)}`,
    cause,
  });
}

/**
 * Create a PATH_NOT_FOUND error for the analysis root
 */
export function pathNotFound(projectPath: string): CohesionError {
  return new CohesionError({
    code: ErrorCode.PATH_NOT_FOUND,
    userMessage: 'The directory to analyze does not exist.',
    developerMessage: `Analysis root is missing or not a directory: ${sanitizePath(projectPath)}`,
  });
}

/**
 * Create a SCAN_FAILED error
 */
export function scanFailed(projectPath: string, cause: Error): CohesionError {
  return new CohesionError({
    code: ErrorCode.SCAN_FAILED,
    userMessage: 'Could not list the files of the project.',
    developerMessage: `Failed to scan ${sanitizePath(projectPath)}: ${cause.message}`,
    cause,
  });
}

/**
 * Create a PARSER_UNAVAILABLE error
 */
export function parserUnavailable(cause: Error): CohesionError {
  return new CohesionError({
    code: ErrorCode.PARSER_UNAVAILABLE,
    userMessage:
      'The source parser could not be loaded. Reinstall the package and try again.',
    developerMessage: `Tree-sitter initialization failed: ${cause.message}`,
    cause,
  });
}

/**
 * Create an INVALID_OPTION error
 *
 * @param option - Option name as typed by the user
 * @param detail - What is wrong with the value
 */
export function invalidOption(option: string, detail: string): CohesionError {
  return new CohesionError({
    code: ErrorCode.INVALID_OPTION,
    userMessage: `Invalid value for ${option}: ${detail}`,
    developerMessage: `Invalid option ${option}: ${detail}`,
  });
}

// ============================================================================
// Type Guards and Utilities
// ============================================================================

/**
 * Type guard to check if an error is a CohesionError
 */
export function isCohesionError(error: unknown): error is CohesionError {
  return error instanceof CohesionError;
}

/**
 * Read the errno code (`ENOENT`, `EACCES`, ...) of a Node.js system error
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
