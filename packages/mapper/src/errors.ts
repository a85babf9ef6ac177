/**
 * Errors raised while mapping between directive trees and records
 */

export type MapperErrorCode =
  | 'MISSING_FIELD'
  | 'CONVERSION_FAILED'
  | 'UNKNOWN_FIELD'
  | 'ARGUMENT_GAP'
  | 'SERIALIZE_FAILED';

/**
 * Base class for mapping failures. `path` is the dotted directive path of the
 * offending field, e.g. `Config.database.port`.
 */
export abstract class MapperError extends Error {
  abstract readonly code: MapperErrorCode;
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.path = path;
  }
}

/**
 * A required field has no directive or argument in the source
 */
export class MissingFieldError extends MapperError {
  readonly code = 'MISSING_FIELD';
  readonly field: string;

  constructor(field: string, path: string) {
    super(`Missing required field '${path}'`, path);
    this.field = field;
  }
}

/**
 * A value could not be converted to or from text. The converter's failure is
 * kept as `cause`.
 */
export class ConversionError extends MapperError {
  readonly code = 'CONVERSION_FAILED';
  readonly field: string;

  constructor(field: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid value for '${path}': ${reason}`, path, { cause });
    this.field = field;
  }
}

/**
 * A child directive matches no field (strict mode only)
 */
export class UnknownFieldError extends MapperError {
  readonly code = 'UNKNOWN_FIELD';
  readonly field: string;

  constructor(field: string, path: string) {
    super(`Unknown field '${path}'`, path);
    this.field = field;
  }
}

/**
 * A positional field would be written after an absent lower position, so it
 * could not be read back at its own index
 */
export class ArgumentGapError extends MapperError {
  readonly code = 'ARGUMENT_GAP';
  readonly field: string;
  /** The absent position */
  readonly index: number;

  constructor(field: string, path: string, index: number) {
    super(`Cannot write '${path}' while argument ${index} is absent`, path);
    this.field = field;
    this.index = index;
  }
}

/**
 * A mapped tree could not be rendered as text. The serializer's failure is
 * kept as `cause`.
 */
export class SerializationError extends MapperError {
  readonly code = 'SERIALIZE_FAILED';

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot serialize '${path}': ${reason}`, path, { cause });
  }
}
