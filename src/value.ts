/**
 * binrec — value construction and conversion
 *
 * Value is the engine's own representation; plain JavaScript data is what
 * applications hold. This module moves between the two:
 *
 *   Value.*           constructors for each variant
 *   toValue()         plain data → Value, guided by a schema
 *   fromValue()       Value → plain data
 *   defaultToValue()  JSON default literal → Value (used by the schema parser)
 */

import { MissingFieldError, SchemaMismatchError } from './errors';
import { INT_MAX, INT_MIN, LONG_MAX, LONG_MIN, loneSurrogateIndex } from './io';
import {
  assertNever,
  deref,
  type NamedSchema,
  type Schema,
  type SchemaNode,
  type ValueOf,
} from './types';
import type { Value as ValueT } from './types';

// ─── Constructors ─────────────────────────────────────────────────────────────

type Entries = ReadonlyArray<readonly [string, ValueT]>;
type Dict    = Readonly<Record<string, ValueT>>;

function isReadonlyMap(x: ReadonlyMap<string, ValueT> | Dict): x is ReadonlyMap<string, ValueT> {
  return x instanceof Map;
}

function isEntryList(x: Entries | Dict): x is Entries {
  return Array.isArray(x);
}

/**
 * Value constructors.
 *
 *   Value.record({ name: Value.string('x'), age: Value.int(3) })
 *   Value.union(1, Value.long(10n))
 */
export const Value = {
  null:    (): ValueOf<'null'> => ({ type: 'null' }),
  boolean: (value: boolean): ValueOf<'boolean'> => ({ type: 'boolean', value }),
  int:     (value: number): ValueOf<'int'> => ({ type: 'int', value }),
  long:    (value: bigint | number): ValueOf<'long'> => ({ type: 'long', value: BigInt(value) }),
  /** Rounded to single precision, which is all the wire format keeps. */
  float:   (value: number): ValueOf<'float'> => ({ type: 'float', value: Math.fround(value) }),
  double:  (value: number): ValueOf<'double'> => ({ type: 'double', value }),
  bytes:   (value: Uint8Array): ValueOf<'bytes'> => ({ type: 'bytes', value }),
  string:  (value: string): ValueOf<'string'> => ({ type: 'string', value }),
  fixed:   (value: Uint8Array): ValueOf<'fixed'> => ({ type: 'fixed', value }),
  enum:    (index: number, symbol: string): ValueOf<'enum'> => ({ type: 'enum', index, symbol }),
  array:   (items: readonly ValueT[]): ValueOf<'array'> => ({ type: 'array', items }),
  map:     (entries: ReadonlyMap<string, ValueT> | Dict): ValueOf<'map'> => ({
    type:    'map',
    entries: isReadonlyMap(entries) ? entries : new Map(Object.entries(entries)),
  }),
  union:   (index: number, value: ValueT): ValueOf<'union'> => ({ type: 'union', index, value }),
  record:  (fields: Entries | Dict): ValueOf<'record'> => ({
    type:   'record',
    fields: isEntryList(fields) ? fields : Object.entries(fields),
  }),
} as const;

export type Value = ValueT;

// ─── Plain-data helpers ───────────────────────────────────────────────────────

export function isPlainObject(x: unknown): x is Record<string, unknown> {
  return (
    typeof x === 'object' && x !== null &&
    !Array.isArray(x) && !(x instanceof Uint8Array) && !(x instanceof Map)
  );
}

function describe(x: unknown): string {
  if (x === null) return 'null';
  if (Array.isArray(x)) return 'array';
  if (x instanceof Uint8Array) return 'Uint8Array';
  if (x instanceof Map) return 'Map';
  return typeof x;
}

function child(path: string, key: string | number): string {
  return typeof key === 'number' ? `${path}[${key}]` : `${path}.${key}`;
}

// ─── toValue ──────────────────────────────────────────────────────────────────

/**
 * Convert plain data to a Value of `schema`.
 *
 * - `long` accepts bigint or a safe-integer number.
 * - `enum` accepts the symbol string.
 * - `map` accepts a Map or a plain object.
 * - `record` accepts a plain object; absent keys take the field default,
 *   unknown keys are rejected.
 * - `union` picks the first branch the data converts to.
 *
 * @throws SchemaMismatchError when the data does not fit the schema.
 * @throws MissingFieldError   when a record key is absent and has no default.
 */
export function toValue(schema: Schema, data: unknown): ValueT {
  return toValueNode(schema.names, schema.root, data, '$');
}

export function toValueNode(
  names: ReadonlyMap<string, NamedSchema>,
  node:  SchemaNode,
  data:  unknown,
  path:  string,
): ValueT {
  const n = deref(names, node);
  const mismatch = (expected: string): SchemaMismatchError =>
    new SchemaMismatchError(`expected ${expected}, got ${describe(data)}`, path);

  switch (n.kind) {
    case 'null':
      if (data === null || data === undefined) return Value.null();
      throw mismatch('null');
    case 'boolean':
      if (typeof data === 'boolean') return Value.boolean(data);
      throw mismatch('boolean');
    case 'int':
      if (typeof data === 'number' && Number.isInteger(data) && data >= INT_MIN && data <= INT_MAX) {
        return Value.int(data);
      }
      if (typeof data === 'bigint' && data >= BigInt(INT_MIN) && data <= BigInt(INT_MAX)) {
        return Value.int(Number(data));
      }
      throw mismatch('32-bit integer');
    case 'long':
      if (typeof data === 'bigint' && data >= LONG_MIN && data <= LONG_MAX) return Value.long(data);
      if (typeof data === 'number' && Number.isSafeInteger(data)) return Value.long(data);
      throw mismatch('64-bit integer');
    case 'float':
      if (typeof data === 'number') return Value.float(data);
      throw mismatch('number');
    case 'double':
      if (typeof data === 'number') return Value.double(data);
      throw mismatch('number');
    case 'bytes':
      if (data instanceof Uint8Array) return Value.bytes(data);
      throw mismatch('Uint8Array');
    case 'string':
      if (typeof data === 'string') return Value.string(data);
      throw mismatch('string');
    case 'fixed':
      if (data instanceof Uint8Array && data.length === n.size) return Value.fixed(data);
      throw mismatch(`Uint8Array of length ${n.size}`);
    case 'enum': {
      const index = typeof data === 'string' ? n.symbols.indexOf(data) : -1;
      if (typeof data === 'string' && index >= 0) return Value.enum(index, data);
      throw mismatch(`one of ${n.symbols.join(', ')}`);
    }
    case 'array':
      if (!Array.isArray(data)) throw mismatch('array');
      return Value.array(data.map((item: unknown, i) => toValueNode(names, n.items, item, child(path, i))));
    case 'map': {
      let source: Iterable<[unknown, unknown]>;
      if (data instanceof Map) source = data;
      else if (isPlainObject(data)) source = Object.entries(data);
      else throw mismatch('Map or object');
      const entries = new Map<string, ValueT>();
      for (const [key, v] of source) {
        if (typeof key !== 'string') {
          throw new SchemaMismatchError(`map key must be a string, got ${describe(key)}`, path);
        }
        entries.set(key, toValueNode(names, n.values, v, child(path, key)));
      }
      return Value.map(entries);
    }
    case 'union': {
      for (let i = 0; i < n.branches.length; i++) {
        try {
          return Value.union(i, toValueNode(names, n.branches[i]!, data, path));
        } catch (err) {
          if (!(err instanceof SchemaMismatchError || err instanceof MissingFieldError)) throw err;
        }
      }
      throw mismatch(`a value matching one of ${n.branches.length} union branches`);
    }
    case 'record': {
      if (!isPlainObject(data)) throw mismatch(`record ${n.name}`);
      const known = new Set(n.fields.map(f => f.name));
      for (const key of Object.keys(data)) {
        if (!known.has(key)) {
          throw new SchemaMismatchError(`record ${n.name} has no field '${key}'`, path);
        }
      }
      const fields: Array<[string, ValueT]> = [];
      for (const f of n.fields) {
        const raw = data[f.name];
        if (raw !== undefined) {
          fields.push([f.name, toValueNode(names, f.type, raw, child(path, f.name))]);
        } else if (f.default !== undefined) {
          fields.push([f.name, f.default]);
        } else {
          throw new MissingFieldError(n.name, f.name);
        }
      }
      return Value.record(fields);
    }
    default:
      return assertNever(n, 'schema kind');
  }
}

// ─── fromValue ────────────────────────────────────────────────────────────────

/** Plain-data form of a Value. */
export type PlainData =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | PlainData[]
  | { [key: string]: PlainData };

/**
 * Convert a Value to plain data: records and maps become objects, enums
 * their symbol, unions are unwrapped, longs stay bigint.
 */
export function fromValue(value: ValueT): PlainData {
  switch (value.type) {
    case 'null':
      return null;
    case 'boolean':
    case 'int':
    case 'long':
    case 'float':
    case 'double':
    case 'bytes':
    case 'string':
    case 'fixed':
      return value.value;
    case 'enum':
      return value.symbol;
    case 'array':
      return value.items.map(fromValue);
    case 'map': {
      const out: { [key: string]: PlainData } = {};
      for (const [k, v] of value.entries) out[k] = fromValue(v);
      return out;
    }
    case 'union':
      return fromValue(value.value);
    case 'record': {
      const out: { [key: string]: PlainData } = {};
      for (const [k, v] of value.fields) out[k] = fromValue(v);
      return out;
    }
    default:
      return assertNever(value, 'value type');
  }
}

// ─── defaultToValue ───────────────────────────────────────────────────────────

/**
 * Interpret a JSON default literal for `node`.
 *
 * JSON has no bytes, so bytes and fixed defaults are strings whose code
 * points (0–255) are the byte values. A union default is always for the
 * union's first branch.
 *
 * @throws SchemaMismatchError when the literal does not fit the schema.
 */
export function defaultToValue(
  names: ReadonlyMap<string, NamedSchema>,
  node:  SchemaNode,
  json:  unknown,
  path = '$',
): ValueT {
  const n = deref(names, node);
  const mismatch = (expected: string): SchemaMismatchError =>
    new SchemaMismatchError(`default must be ${expected}, got ${JSON.stringify(json) ?? 'undefined'}`, path);

  switch (n.kind) {
    case 'null':
      if (json === null) return Value.null();
      throw mismatch('null');
    case 'boolean':
      if (typeof json === 'boolean') return Value.boolean(json);
      throw mismatch('a boolean');
    case 'int':
      if (typeof json === 'number' && Number.isInteger(json) && json >= INT_MIN && json <= INT_MAX) {
        return Value.int(json);
      }
      throw mismatch('a 32-bit integer');
    case 'long':
      // JSON numbers past 2^53 are already rounded by the time they get here.
      if (typeof json === 'number' && Number.isSafeInteger(json)) return Value.long(BigInt(json));
      throw mismatch('an integer within ±(2^53 - 1)');
    case 'float':
      if (typeof json === 'number') return Value.float(json);
      throw mismatch('a number');
    case 'double':
      if (typeof json === 'number') return Value.double(json);
      throw mismatch('a number');
    case 'string':
      if (typeof json === 'string' && loneSurrogateIndex(json) < 0) return Value.string(json);
      throw mismatch('a well-formed string');
    case 'bytes':
      if (typeof json === 'string') return Value.bytes(latin1Bytes(json, path));
      throw mismatch('a string of byte code points');
    case 'fixed': {
      if (typeof json !== 'string') throw mismatch('a string of byte code points');
      const bytes = latin1Bytes(json, path);
      if (bytes.length !== n.size) throw mismatch(`${n.size} bytes`);
      return Value.fixed(bytes);
    }
    case 'enum': {
      const index = typeof json === 'string' ? n.symbols.indexOf(json) : -1;
      if (typeof json === 'string' && index >= 0) return Value.enum(index, json);
      throw mismatch(`one of ${n.symbols.join(', ')}`);
    }
    case 'array':
      if (!Array.isArray(json)) throw mismatch('an array');
      return Value.array(json.map((item: unknown, i) => defaultToValue(names, n.items, item, child(path, i))));
    case 'map': {
      if (!isPlainObject(json)) throw mismatch('an object');
      const entries = new Map<string, ValueT>();
      for (const [k, v] of Object.entries(json)) {
        entries.set(k, defaultToValue(names, n.values, v, child(path, k)));
      }
      return Value.map(entries);
    }
    case 'union': {
      const first = n.branches[0];
      if (first === undefined) throw mismatch('impossible: the union is empty');
      return Value.union(0, defaultToValue(names, first, json, path));
    }
    case 'record': {
      if (!isPlainObject(json)) throw mismatch('an object');
      const fields: Array<[string, ValueT]> = [];
      for (const f of n.fields) {
        if (Object.prototype.hasOwnProperty.call(json, f.name)) {
          fields.push([f.name, defaultToValue(names, f.type, json[f.name], child(path, f.name))]);
        } else if (f.default !== undefined) {
          fields.push([f.name, f.default]);
        } else if (f.defaultJson !== undefined) {
          // The nested field's own default may not have been resolved yet.
          fields.push([f.name, defaultToValue(names, f.type, f.defaultJson, child(path, f.name))]);
        } else {
          throw new SchemaMismatchError(`default has no value for field '${f.name}'`, path);
        }
      }
      return Value.record(fields);
    }
    default:
      return assertNever(n, 'schema kind');
  }
}

function latin1Bytes(s: string, path: string): Uint8Array {
  const out = new Uint8Array(s.length);
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    if (c > 0xff) {
      throw new SchemaMismatchError(`byte default has code point ${c} above 255 at index ${i}`, path);
    }
    out[i] = c;
  }
  return out;
}

/** Inverse of latin1Bytes: the JSON form of a bytes/fixed default. */
export function bytesToLatin1(bytes: Uint8Array): string {
  let s = '';
  for (const b of bytes) s += String.fromCharCode(b);
  return s;
}
