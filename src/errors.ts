/**
 * Assembly errors
 *
 * Every failure raised by the assembler is a contract violation local to one
 * page, line or region. The context names the offender (pageIndex, lineIndex,
 * regionId, ...) so the caller can decide whether to fail fast or fall back.
 */

export type AssemblyErrorCode =
  | 'INVALID_GEOMETRY'
  | 'EMPTY_LINE_GEOMETRY'
  | 'BLOCK_CONFLICT'
  | 'INVALID_INPUT';

/**
 * Base error class for all assembly errors
 */
export class AssemblyError extends Error {
  public readonly code: AssemblyErrorCode;
  public readonly context: Record<string, unknown>;

  constructor(message: string, code: AssemblyErrorCode, context: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Inverted or non-finite box coordinates */
export class InvalidGeometryError extends AssemblyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_GEOMETRY', context);
  }
}

/** A text line without word geometries has no box */
export class EmptyLineGeometryError extends AssemblyError {
  constructor(context?: Record<string, unknown>) {
    super('Text line has no word geometries', 'EMPTY_LINE_GEOMETRY', context);
  }
}

/** Text-line merging and non-text injection met on the same block */
export class BlockConflictError extends AssemblyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'BLOCK_CONFLICT', context);
  }
}

/** Malformed raw input, adapter payload or option */
export class InvalidInputError extends AssemblyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_INPUT', context);
  }
}

export function isAssemblyError(err: unknown): err is AssemblyError {
  return err instanceof AssemblyError;
}
