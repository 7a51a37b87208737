/**
 * Error types and codes for archwarden.
 * All errors raised by the core extend ArchWardenError.
 */

/**
 * Base error class for all archwarden errors.
 */
export class ArchWardenError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ArchWardenError';
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
 * Configuration-related errors (missing file, unparseable YAML, bad shape).
 * Error codes: C001-C003
 */
export class ConfigError extends ArchWardenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * A single invariant that cannot be evaluated. The rule is skipped;
 * other rules keep running.
 * Error codes: R001-R002
 */
export class RuleError extends ArchWardenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RuleError';
  }
}

/**
 * System errors (unexpected I/O, malformed payloads).
 * Error codes: S001-S003
 */
export class SystemError extends ArchWardenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration errors
  CONFIG_NOT_FOUND: 'C001',
  CONFIG_PARSE_ERROR: 'C002',
  CONFIG_INVALID: 'C003',

  // Rule errors
  INVALID_PATTERN: 'R001',
  MISSING_FIELD: 'R002',

  // System errors
  PARSE_ERROR: 'S001',
  FILE_READ_ERROR: 'S002',
  INVALID_PAYLOAD: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
