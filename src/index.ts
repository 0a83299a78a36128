// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  PrimitiveKind,
  PrimitiveSchema,
  NamedAttributes,
  FixedSchema,
  EnumSchema,
  FieldOrder,
  FieldSchema,
  RecordSchema,
  ArraySchema,
  MapSchema,
  UnionSchema,
  RefSchema,
  NamedSchema,
  SchemaNode,
  Schema,
  ValueType,
  ValueOf,
} from './types';

export { PRIMITIVE_KINDS, isNamed, simpleName } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  CONTAINER_MAGIC,
  SYNC_MARKER_SIZE,
  META_SCHEMA,
  META_CODEC,
  RESERVED_META_KEYS,
  DEFAULT_CODEC,
  DEFAULT_BLOCK_SIZE,
  DEFAULT_BLOCK_RECORDS,
  MAX_EMPTY_ITEMS,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  BinrecError,
  SchemaError,
  SchemaMismatchError,
  MissingFieldError,
  UnsupportedCodecError,
  CorruptFileError,
  UnexpectedEofError,
} from './errors';
export type { BinrecErrorKind } from './errors';

// ─── Logging ──────────────────────────────────────────────────────────────────
export { createLogger, getDefaultLogger, defaultLogLevel } from './logger';
export type { Logger, LoggerOptions, LogLevel, LogFormat, Context } from './logger';

// ─── Byte I/O ─────────────────────────────────────────────────────────────────
export {
  ByteWriter,
  ByteReader,
  BufferSink,
  BufferSource,
  SourceCursor,
  zigzagEncode,
  zigzagDecode,
  varintLength,
} from './io';
export type { ByteSink, ByteSource } from './io';

// ─── Schema ───────────────────────────────────────────────────────────────────
export {
  parseSchema,
  parseSchemaJson,
  subSchema,
  resolveNamed,
  schemaToJson,
  schemaToText,
  canonicalForm,
  schemaFingerprint,
} from './schema';

// ─── Values ───────────────────────────────────────────────────────────────────
export { Value, toValue, fromValue, defaultToValue } from './value';
export type { PlainData } from './value';
export { RecordBuilder } from './record';

// ─── Binary codec ─────────────────────────────────────────────────────────────
export { encode, encodeInto, assertValid, validate } from './encode';
export { decode, decodeFrom } from './decode';
export { resolveSchemas, decodeWithPlan, decodeResolved } from './resolve';
export type { ReadPlan, Resolution } from './resolve';

// ─── Compression ──────────────────────────────────────────────────────────────
export {
  registerCodec,
  getCodec,
  hasCodec,
  codecNames,
  crc32,
  nullCodec,
  deflateCodec,
  snappyCodec,
} from './codec';
export type { Codec } from './codec';

// ─── Container ────────────────────────────────────────────────────────────────
export type { MetadataInput, ContainerHeader } from './header';
export { ContainerWriter, writeContainer } from './writer';
export type { WriterOptions } from './writer';
export { ContainerReader, readContainer } from './reader';
export type { ReaderOptions, ReaderState } from './reader';
