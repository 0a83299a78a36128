/**
 * binrec — binary decoding
 *
 * Mirrors encode.ts. Every read goes through ByteReader, so truncated input
 * surfaces as UnexpectedEofError at the exact point the bytes ran out.
 *
 * Array and map blocks: a positive count is followed by that many items; a
 * negative count -n is followed by a byte-size varint (skipped here) and n
 * items; a zero count ends the collection.
 */

import { CorruptFileError, UnexpectedEofError } from './errors';
import { ByteReader } from './io';
import {
  assertNever,
  deref,
  type NamedSchema,
  type Schema,
  type SchemaNode,
  type Value,
} from './types';

type Names = ReadonlyMap<string, NamedSchema>;

/**
 * Read one collection block header. Returns the item count of the block,
 * 0 at the terminator.
 *
 * `itemBytes` is the fewest bytes one item can take. A block claiming more
 * items than the remaining bytes can hold fails before any item is read; a
 * block of zero-width items is charged against the reader's empty-item
 * allowance instead. Without `itemBytes` the count is only range-checked.
 *
 * @throws UnexpectedEofError if the items cannot fit in the remaining bytes.
 * @throws CorruptFileError   if the count is out of range.
 */
export function readBlockCount(reader: ByteReader, itemBytes?: number): number {
  const raw = reader.readLong();
  if (raw < 0n) reader.readLength('collection block size');
  const count = raw < 0n ? -raw : raw;
  if (count > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new CorruptFileError(`Collection block count ${raw} is out of range.`);
  }
  const n = Number(count);
  if (n === 0 || itemBytes === undefined) return n;

  if (itemBytes === 0) {
    reader.claimEmptyItems(n);
  } else if (n > Math.floor(reader.remaining / itemBytes)) {
    throw new UnexpectedEofError(
      `Collection block claims ${n} item(s) of at least ${itemBytes} byte(s); ` +
      `only ${reader.remaining} byte(s) remain.`,
    );
  }
  return n;
}

const minSizes = new WeakMap<SchemaNode, number>();

/**
 * Fewest bytes any value of `node` encodes to. A record met again while its
 * own size is being computed counts as 0, which keeps the result a lower bound.
 */
export function minEncodedSize(names: Names, node: SchemaNode, visiting: Set<string> = new Set()): number {
  const cached = minSizes.get(node);
  if (cached !== undefined) return cached;

  const n = deref(names, node);
  let size: number;
  switch (n.kind) {
    case 'null':
      size = 0;
      break;
    case 'boolean':
    case 'int':
    case 'long':
    case 'bytes':
    case 'string':
    case 'enum':
    case 'array':
    case 'map':
    case 'union':
      size = 1;
      break;
    case 'float':
      size = 4;
      break;
    case 'double':
      size = 8;
      break;
    case 'fixed':
      size = n.size;
      break;
    case 'record':
      if (visiting.has(n.name)) return 0;
      visiting.add(n.name);
      size = n.fields.reduce((sum, f) => sum + minEncodedSize(names, f.type, visiting), 0);
      visiting.delete(n.name);
      break;
    default:
      return assertNever(n, 'schema kind');
  }
  minSizes.set(node, size);
  return size;
}

export function decodeNode(names: Names, node: SchemaNode, reader: ByteReader): Value {
  const n = deref(names, node);

  switch (n.kind) {
    case 'null':
      return { type: 'null' };
    case 'boolean':
      return { type: 'boolean', value: reader.readBoolean() };
    case 'int':
      return { type: 'int', value: reader.readInt() };
    case 'long':
      return { type: 'long', value: reader.readLong() };
    case 'float':
      return { type: 'float', value: reader.readFloat() };
    case 'double':
      return { type: 'double', value: reader.readDouble() };
    case 'bytes':
      return { type: 'bytes', value: reader.readBytes() };
    case 'string':
      return { type: 'string', value: reader.readString() };
    case 'fixed':
      return { type: 'fixed', value: reader.readFixed(n.size) };

    case 'enum': {
      const index = reader.readInt();
      const symbol = n.symbols[index];
      if (symbol === undefined) {
        throw new CorruptFileError(
          `Enum ${n.name} index ${index} is out of range (${n.symbols.length} symbols).`,
        );
      }
      return { type: 'enum', index, symbol };
    }

    case 'array': {
      const items: Value[] = [];
      const itemBytes = minEncodedSize(names, n.items);
      for (let count = readBlockCount(reader, itemBytes); count > 0; count = readBlockCount(reader, itemBytes)) {
        for (let i = 0; i < count; i++) items.push(decodeNode(names, n.items, reader));
      }
      return { type: 'array', items };
    }

    case 'map': {
      const entries = new Map<string, Value>();
      // a key is at least its length byte
      const entryBytes = 1 + minEncodedSize(names, n.values);
      for (let count = readBlockCount(reader, entryBytes); count > 0; count = readBlockCount(reader, entryBytes)) {
        for (let i = 0; i < count; i++) {
          const key = reader.readString();
          entries.set(key, decodeNode(names, n.values, reader));
        }
      }
      return { type: 'map', entries };
    }

    case 'union': {
      const index = reader.readInt();
      const branch = n.branches[index];
      if (branch === undefined) {
        throw new CorruptFileError(
          `Union branch index ${index} is out of range (${n.branches.length} branches).`,
        );
      }
      return { type: 'union', index, value: decodeNode(names, branch, reader) };
    }

    case 'record':
      return {
        type:   'record',
        fields: n.fields.map(f => [f.name, decodeNode(names, f.type, reader)] as const),
      };

    default:
      return assertNever(n, 'schema kind');
  }
}

// ─── Public API ───────────────────────────────────────────────────────────────

/** Decode one value from the reader's current position. */
export function decodeFrom(schema: Schema, reader: ByteReader): Value {
  return decodeNode(schema.names, schema.root, reader);
}

/**
 * Decode a single value that must occupy all of `bytes`.
 *
 * @throws UnexpectedEofError if the bytes end early.
 * @throws CorruptFileError   if bytes remain after the value.
 */
export function decode(schema: Schema, bytes: Uint8Array): Value {
  const reader = new ByteReader(bytes);
  const value = decodeFrom(schema, reader);
  if (!reader.atEnd()) {
    throw new CorruptFileError(`${reader.remaining} trailing byte(s) after the decoded value.`);
  }
  return value;
}
