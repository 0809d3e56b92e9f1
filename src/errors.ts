import type { ValidationDiagnostic } from './schema/validationResult';

export type FmuErrorCode =
  | 'FILE_NOT_FOUND'
  | 'ARCHIVE_FORMAT'
  | 'ARCHIVE_WRITE'
  | 'MALFORMED_XML'
  | 'PARSE'
  | 'NOT_FOUND'
  | 'INVALID_VALUE'
  | 'SCHEMA_VALIDATION'
  | 'VALIDATOR'
  | 'CONFIG';

/**
 * Base class of every error raised by this package.
 * Callers can branch on `code` without importing the concrete classes.
 */
export abstract class FmuError extends Error {
  abstract readonly code: FmuErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FileNotFoundError extends FmuError {
  readonly code = 'FILE_NOT_FOUND' as const;

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`FMU file not found: ${path}`, options);
  }
}

export class ArchiveFormatError extends FmuError {
  readonly code = 'ARCHIVE_FORMAT' as const;

  constructor(readonly path: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid FMU archive ${path}: ${reason}`, options);
  }
}

/** The archive could not be packed or written to `path`; the target is left as it was. */
export class ArchiveWriteError extends FmuError {
  readonly code = 'ARCHIVE_WRITE' as const;

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Cannot write FMU archive ${path}: ${causeMessage(options?.cause)}`, options);
  }
}

export class MalformedXmlError extends FmuError {
  readonly code = 'MALFORMED_XML' as const;

  constructor(readonly problems: string[], options?: { cause?: unknown }) {
    super(`modelDescription.xml is not well-formed: ${problems.join('; ')}`, options);
  }
}

export class ParseError extends FmuError {
  readonly code = 'PARSE' as const;
}

export class DuplicateVariableError extends ParseError {
  constructor(readonly variableName: string) {
    super(`Duplicate ScalarVariable name: ${variableName}`);
  }
}

export class NotFoundError extends FmuError {
  readonly code = 'NOT_FOUND' as const;

  constructor(readonly variableName: string) {
    super(`ScalarVariable not found: ${variableName}`);
  }
}

export class InvalidValueError extends FmuError {
  readonly code = 'INVALID_VALUE' as const;

  constructor(
    readonly variableName: string,
    readonly expectedType: string,
    readonly actual: unknown,
  ) {
    super(`Invalid value for ${variableName}: expected ${expectedType}, got ${describeValue(actual)}`);
  }
}

export class SchemaValidationError extends FmuError {
  readonly code = 'SCHEMA_VALIDATION' as const;

  constructor(readonly diagnostics: ValidationDiagnostic[]) {
    const first = diagnostics[0];
    const detail = first ? ` (first: ${first.line ?? '?'}: ${first.message})` : '';
    super(`modelDescription.xml failed schema validation with ${diagnostics.length} diagnostic(s)${detail}`);
  }
}

/** The schema validator itself failed (schema unreadable, engine error), not the document. */
export class ValidatorError extends FmuError {
  readonly code = 'VALIDATOR' as const;

  constructor(readonly schemaPath: string, options?: { cause?: unknown }) {
    super(`Schema validation could not run with ${schemaPath}: ${causeMessage(options?.cause)}`, options);
  }
}

export class ConfigError extends FmuError {
  readonly code = 'CONFIG' as const;
}

export function isFmuError(e: unknown): e is FmuError {
  return e instanceof FmuError;
}

function describeValue(v: unknown): string {
  if (typeof v === 'string') return `"${v}"`;
  if (typeof v === 'number' || typeof v === 'boolean' || v === null || v === undefined) return String(v);
  return typeof v;
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
