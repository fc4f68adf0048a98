/**
 * Error types and codes for gopack.
 * Every failure a build can report extends GopackError.
 */

/**
 * Base error class for all gopack errors.
 */
export class GopackError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GopackError';
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
export class ConfigError extends GopackError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (I/O failures, unreadable YAML).
 */
export class SystemError extends GopackError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Build errors: the application cannot be assembled or ordered.
 */
export class BuildError extends GopackError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'BuildError';
  }
}

export const ErrorCodes = {
  // Build errors
  MALFORMED_INPUT: 'MALFORMED_INPUT',
  FRONTEND_SYNTAX: 'FRONTEND_SYNTAX',
  INVALID_IMPORT_PATH: 'INVALID_IMPORT_PATH',
  UNTAGGED_LITERAL: 'UNTAGGED_LITERAL',
  RESERVED_IDENTIFIER: 'RESERVED_IDENTIFIER',
  SHADOWS_STANDARD_PACKAGE: 'SHADOWS_STANDARD_PACKAGE',
  PACKAGE_FULLY_EXCLUDED: 'PACKAGE_FULLY_EXCLUDED',
  CYCLIC_DEPENDENCY: 'CYCLIC_DEPENDENCY',
  MIXED_PACKAGE_NAMES: 'MIXED_PACKAGE_NAMES',
  PACKAGE_NOT_FOUND: 'PACKAGE_NOT_FOUND',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  INVALID_EXCLUDE_PATTERN: 'INVALID_EXCLUDE_PATTERN',

  // System errors
  IO_ERROR: 'IO_ERROR',
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * A position in a source file (1-based line and column).
 */
export interface SourcePosition {
  file: string;
  line: number;
  column: number;
}

export function formatPosition(pos: SourcePosition): string {
  return `${pos.file}:${pos.line}:${pos.column}`;
}

/**
 * Raised by a language frontend when a file does not parse.
 * The message is surfaced to the caller unchanged.
 */
export class FrontendSyntaxError extends BuildError {
  constructor(
    message: string,
    public readonly position?: SourcePosition
  ) {
    super(ErrorCodes.FRONTEND_SYNTAX, message, position ? { ...position } : undefined);
    this.name = 'FrontendSyntaxError';
  }
}

/**
 * One untagged composite literal.
 */
export interface LiteralViolation {
  position: SourcePosition;
  message: string;
}

/**
 * All untagged composite literals found in one file.
 */
export class UntaggedLiteralError extends BuildError {
  constructor(public readonly violations: LiteralViolation[]) {
    super(
      ErrorCodes.UNTAGGED_LITERAL,
      violations.map((v) => `${formatPosition(v.position)}: ${v.message}`).join('\n'),
      { count: violations.length }
    );
    this.name = 'UntaggedLiteralError';
  }
}

/**
 * The package graph is not acyclic. `cycle` repeats its first entry at the end.
 */
export class CyclicDependencyError extends BuildError {
  constructor(public readonly cycle: string[]) {
    super(
      ErrorCodes.CYCLIC_DEPENDENCY,
      `cyclic dependency graph: ${cycle.join(' -> ')}`,
      { cycle }
    );
    this.name = 'CyclicDependencyError';
  }
}

/**
 * The workspace has no package under the requested import path.
 */
export class PackageNotFoundError extends GopackError {
  constructor(
    public readonly importPath: string,
    reason: string
  ) {
    super(ErrorCodes.PACKAGE_NOT_FOUND, `cannot find package "${importPath}": ${reason}`, { importPath });
    this.name = 'PackageNotFoundError';
  }
}

/**
 * Wrap an unknown thrown value from an I/O call as a SystemError.
 */
export function toIoError(error: unknown, filePath: string): GopackError {
  if (error instanceof GopackError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new SystemError(ErrorCodes.IO_ERROR, `${filePath}: ${reason}`, { filePath });
}
