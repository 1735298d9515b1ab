/**
 * Error types and codes for foldsmith.
 * Every error raised inside a generation flow extends FoldError so the flow
 * boundary can turn it into a tagged outcome.
 */

/**
 * Base error class for all foldsmith errors.
 */
export class FoldError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FoldError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration errors (loading, parsing, validation of .fold/config.yaml).
 */
export class ConfigError extends FoldError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Target selection errors.
 */
export class TargetError extends FoldError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TargetError';
  }
}

/**
 * Template lookup and substitution errors.
 */
export class TemplateError extends FoldError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TemplateError';
  }
}

/**
 * Malformed domain, verb or class names.
 */
export class NamingError extends FoldError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'NamingError';
  }
}

/**
 * An artifact is already present and was left untouched. Non-fatal.
 */
export class ConflictError extends FoldError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConflictError';
  }
}

/**
 * System errors (filesystem failures, unreadable documents).
 */
export class SystemError extends FoldError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Generation errors
  UNKNOWN_TARGET: 'E001',
  TEMPLATE_NOT_FOUND: 'E002',
  INVALID_NAME: 'E003',
  UNKNOWN_PLACEHOLDER: 'E004',

  // Non-fatal conflicts
  ALREADY_EXISTS: 'W001',

  // System errors
  IO_FAILURE: 'S001',
  PARSE_ERROR: 'S002',
  INVALID_REGISTRY: 'S003',
  CONFIG_LOAD_ERROR: 'S004',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Node.js filesystem errors carry a string `code` such as ENOENT or EACCES.
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Normalize anything thrown inside a flow into a FoldError.
 */
export function toFoldError(error: unknown): FoldError {
  if (error instanceof FoldError) {
    return error;
  }
  if (isNodeError(error)) {
    return new SystemError(ErrorCodes.IO_FAILURE, error.message, {
      errno: error.code,
      path: error.path,
      syscall: error.syscall,
    });
  }
  return new SystemError(
    ErrorCodes.IO_FAILURE,
    error instanceof Error ? error.message : String(error)
  );
}
