/**
 * binrec — binary encoding and value validation
 *
 * One walker serves both: with a ByteWriter it validates and writes, with
 * `null` it only validates. Keeping them in one function means a value the
 * validator accepts is exactly a value the encoder can write.
 *
 * A failed encodeInto() rolls the writer back to its length on entry, so a
 * caller appending into a shared buffer never sees a half-written value.
 */

import { SchemaMismatchError } from './errors';
import { ByteWriter, INT_MAX, INT_MIN, LONG_MAX, LONG_MIN, loneSurrogateIndex } from './io';
import {
  assertNever,
  deref,
  type NamedSchema,
  type Schema,
  type SchemaNode,
  type Value,
} from './types';

type Names = ReadonlyMap<string, NamedSchema>;

function mismatch(path: string, expected: string, value: Value): SchemaMismatchError {
  return new SchemaMismatchError(`expected ${expected}, got ${value.type} value`, path);
}

function assertWellFormed(s: string, what: string, path: string): void {
  const at = loneSurrogateIndex(s);
  if (at >= 0) {
    throw new SchemaMismatchError(
      `${what} has an unpaired surrogate U+${s.charCodeAt(at).toString(16).toUpperCase()} at index ${at}`,
      path,
    );
  }
}

function encodeNode(names: Names, node: SchemaNode, value: Value, out: ByteWriter | null, path: string): void {
  const n = deref(names, node);

  switch (n.kind) {
    case 'null':
      if (value.type !== 'null') throw mismatch(path, 'null', value);
      return;

    case 'boolean':
      if (value.type !== 'boolean') throw mismatch(path, 'boolean', value);
      out?.writeBoolean(value.value);
      return;

    case 'int':
      if (value.type !== 'int') throw mismatch(path, 'int', value);
      if (!Number.isInteger(value.value) || value.value < INT_MIN || value.value > INT_MAX) {
        throw new SchemaMismatchError(`int ${value.value} is not a 32-bit integer`, path);
      }
      out?.writeInt(value.value);
      return;

    case 'long':
      if (value.type !== 'long') throw mismatch(path, 'long', value);
      if (value.value < LONG_MIN || value.value > LONG_MAX) {
        throw new SchemaMismatchError(`long ${value.value} is not a 64-bit integer`, path);
      }
      out?.writeLong(value.value);
      return;

    case 'float':
      if (value.type !== 'float') throw mismatch(path, 'float', value);
      out?.writeFloat(value.value);
      return;

    case 'double':
      if (value.type !== 'double') throw mismatch(path, 'double', value);
      out?.writeDouble(value.value);
      return;

    case 'bytes':
      if (value.type !== 'bytes') throw mismatch(path, 'bytes', value);
      out?.writeBytes(value.value);
      return;

    case 'string':
      if (value.type !== 'string') throw mismatch(path, 'string', value);
      assertWellFormed(value.value, 'string', path);
      out?.writeString(value.value);
      return;

    case 'fixed':
      if (value.type !== 'fixed') throw mismatch(path, `fixed ${n.name}`, value);
      if (value.value.length !== n.size) {
        throw new SchemaMismatchError(
          `fixed ${n.name} holds ${n.size} bytes, got ${value.value.length}`, path,
        );
      }
      out?.writeFixed(value.value);
      return;

    case 'enum':
      if (value.type !== 'enum') throw mismatch(path, `enum ${n.name}`, value);
      if (n.symbols[value.index] !== value.symbol) {
        throw new SchemaMismatchError(
          `enum ${n.name} has no symbol '${value.symbol}' at index ${value.index}`, path,
        );
      }
      out?.writeInt(value.index);
      return;

    case 'array':
      if (value.type !== 'array') throw mismatch(path, 'array', value);
      // One block holding every item, then the zero terminator.
      if (value.items.length > 0) {
        out?.writeCount(value.items.length);
        value.items.forEach((item, i) => encodeNode(names, n.items, item, out, `${path}[${i}]`));
      }
      out?.writeInt(0);
      return;

    case 'map':
      if (value.type !== 'map') throw mismatch(path, 'map', value);
      if (value.entries.size > 0) {
        out?.writeCount(value.entries.size);
        for (const [key, v] of value.entries) {
          assertWellFormed(key, 'map key', path);
          out?.writeString(key);
          encodeNode(names, n.values, v, out, `${path}.${key}`);
        }
      }
      out?.writeInt(0);
      return;

    case 'union': {
      if (value.type !== 'union') throw mismatch(path, 'union', value);
      const branch = n.branches[value.index];
      if (branch === undefined) {
        throw new SchemaMismatchError(
          `union branch ${value.index} out of range: the union has ${n.branches.length} branches`, path,
        );
      }
      out?.writeInt(value.index);
      encodeNode(names, branch, value.value, out, path);
      return;
    }

    case 'record': {
      if (value.type !== 'record') throw mismatch(path, `record ${n.name}`, value);
      const byName = new Map<string, Value>();
      for (const [name, v] of value.fields) {
        if (byName.has(name)) {
          throw new SchemaMismatchError(`record ${n.name} value repeats field '${name}'`, path);
        }
        byName.set(name, v);
      }
      for (const name of byName.keys()) {
        if (!n.fields.some(f => f.name === name)) {
          throw new SchemaMismatchError(`record ${n.name} has no field '${name}'`, path);
        }
      }
      // Declared order, not value order: field names never reach the wire.
      for (const f of n.fields) {
        const v = byName.get(f.name);
        if (v === undefined) {
          throw new SchemaMismatchError(`record ${n.name} value has no field '${f.name}'`, path);
        }
        encodeNode(names, f.type, v, out, `${path}.${f.name}`);
      }
      return;
    }

    default:
      return assertNever(n, 'schema kind');
  }
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Append the encoding of `value` to `out`.
 *
 * @throws SchemaMismatchError if the value does not match the schema; `out`
 *         is left exactly as it was.
 */
export function encodeInto(schema: Schema, value: Value, out: ByteWriter): void {
  const start = out.length;
  try {
    encodeNode(schema.names, schema.root, value, out, '$');
  } catch (err) {
    out.truncate(start);
    throw err;
  }
}

/** Encode a single value to a fresh byte array. */
export function encode(schema: Schema, value: Value): Uint8Array {
  const out = new ByteWriter();
  encodeInto(schema, value, out);
  return out.toBytes();
}

/** @throws SchemaMismatchError naming the path of the first offending element. */
export function assertValid(schema: Schema, value: Value): void {
  encodeNode(schema.names, schema.root, value, null, '$');
}

export function validate(schema: Schema, value: Value): boolean {
  try {
    assertValid(schema, value);
    return true;
  } catch (err) {
    if (err instanceof SchemaMismatchError) return false;
    throw err;
  }
}

/** Validate against one node of a schema (a record field, say). */
export function assertValidNode(names: Names, node: SchemaNode, value: Value, path = '$'): void {
  encodeNode(names, node, value, null, path);
}
