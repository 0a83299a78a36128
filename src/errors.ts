/**
 * binrec — error classes
 *
 * Every failure the engine can report about data (as opposed to misuse of
 * the API) is a BinrecError. The `kind` discriminant lets callers switch on
 * the failure without instanceof chains:
 *
 *   schema            schema text is malformed or unresolvable
 *   schema-mismatch   a value disagrees with its schema, or two schemas
 *                     cannot be resolved against each other
 *   missing-field     a record was finalized without a value or default
 *   unsupported-codec the codec name is not registered
 *   corrupt-file      the byte stream can no longer be trusted
 *   unexpected-eof    input ended in the middle of a structure
 *
 * API misuse (append after close, bad option values) throws plain
 * Error / RangeError / TypeError instead.
 */

export type BinrecErrorKind =
  | 'schema'
  | 'schema-mismatch'
  | 'missing-field'
  | 'unsupported-codec'
  | 'corrupt-file'
  | 'unexpected-eof';

export abstract class BinrecError extends Error {
  abstract readonly kind: BinrecErrorKind;
}

export class SchemaError extends BinrecError {
  readonly kind = 'schema';

  constructor(message: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

export class SchemaMismatchError extends BinrecError {
  readonly kind = 'schema-mismatch';

  /** JSON-path-like location of the offending value, e.g. `$.address.city`. */
  readonly path: string;

  constructor(message: string, path = '$') {
    super(path === '$' ? message : `${path}: ${message}`);
    this.name = 'SchemaMismatchError';
    this.path = path;
  }
}

export class MissingFieldError extends BinrecError {
  readonly kind = 'missing-field';

  constructor(readonly record: string, readonly field: string) {
    super(
      `Record '${record}' has no value for field '${field}' and the schema ` +
      `declares no default for it.`,
    );
    this.name = 'MissingFieldError';
  }
}

export class UnsupportedCodecError extends BinrecError {
  readonly kind = 'unsupported-codec';

  constructor(readonly codec: string, registered: readonly string[]) {
    super(
      `Codec '${codec}' is not registered. ` +
      `Registered codecs: ${registered.map(n => `'${n}'`).join(', ')}.`,
    );
    this.name = 'UnsupportedCodecError';
  }
}

export class CorruptFileError extends BinrecError {
  readonly kind = 'corrupt-file';

  constructor(message: string) {
    super(message);
    this.name = 'CorruptFileError';
  }
}

export class UnexpectedEofError extends BinrecError {
  readonly kind = 'unexpected-eof';

  constructor(message: string) {
    super(message);
    this.name = 'UnexpectedEofError';
  }
}
