/**
 * Error types and codes for case-census.
 * Every error the tool raises on purpose extends CensusError.
 */

/**
 * Base error class for all case-census errors.
 */
export class CensusError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CensusError';
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

// Error code constants
export const ErrorCodes = {
  // Contract violations (C001-C002)
  NO_STYLE_MATCH: 'C001',
  NO_EXPECTED_STYLE: 'C002',

  // Operational noise, absorbed by the scan driver
  LIBRARY_LOAD: 'C003',

  // Configuration
  CONFIG_LOAD: 'CFG001',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  FILE_READ: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * An identifier matched no entry of the style catalog.
 * Means the catalog is incomplete.
 */
export class NoStyleMatchError extends CensusError {
  constructor(public readonly identifier: string) {
    super(ErrorCodes.NO_STYLE_MATCH, `Identifier '${identifier}' matches no case style`, {
      identifier,
    });
    this.name = 'NoStyleMatchError';
  }
}

/**
 * A value was not recognised by any role predicate.
 */
export class NoExpectedStyleError extends CensusError {
  constructor(
    public readonly typeName: string,
    public readonly library: string
  ) {
    super(
      ErrorCodes.NO_EXPECTED_STYLE,
      `Object of type ${typeName} found in lib '${library}' is not handled by any role predicate`,
      { typeName, library }
    );
    this.name = 'NoExpectedStyleError';
  }
}

/**
 * A library could not be loaded.
 */
export class LibraryLoadError extends CensusError {
  constructor(
    public readonly library: string,
    reason: string
  ) {
    super(ErrorCodes.LIBRARY_LOAD, `Cannot load library '${library}': ${reason}`, {
      library,
      reason,
    });
    this.name = 'LibraryLoadError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends CensusError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable files, parse errors).
 */
export class SystemError extends CensusError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * True for the two errors that signal a gap in the catalog or the role table.
 */
export function isContractViolation(
  error: unknown
): error is NoStyleMatchError | NoExpectedStyleError {
  return error instanceof NoStyleMatchError || error instanceof NoExpectedStyleError;
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
