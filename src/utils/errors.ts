/**
 * Error types and codes for pattern-scout.
 * All errors raised by the package extend PatternScoutError.
 */

/**
 * Base error class for all pattern-scout errors.
 */
export class PatternScoutError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PatternScoutError';
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
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends PatternScoutError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Knowledge base errors: an invalid catalog, or a detector asking for a
 * pattern or threshold the catalog does not define.
 */
export class KnowledgeBaseError extends PatternScoutError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'KnowledgeBaseError';
  }
}

/**
 * System errors (parse failures, unwritable output).
 */
export class SystemError extends PatternScoutError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_SCHEMA: 'INVALID_SCHEMA',
  UNKNOWN_PATTERN: 'UNKNOWN_PATTERN',
  KNOWLEDGE_BASE_LOAD_ERROR: 'KNOWLEDGE_BASE_LOAD_ERROR',
  WRITE_ERROR: 'WRITE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
