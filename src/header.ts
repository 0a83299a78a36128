/**
 * binrec — container header encoding and validation
 *
 * The header is written once, when a ContainerWriter opens, and read once,
 * when a ContainerReader opens:
 *
 *   magic         4 bytes, CONTAINER_MAGIC
 *   metadata      map of string → bytes, in the same block framing the codec
 *                 uses for map values; "schema" and "codec" are reserved
 *   sync marker   SYNC_MARKER_SIZE bytes
 *
 * encodeHeader()      — builds the header bytes for a writer.
 * readHeader()        — validates magic and required keys from a source.
 * normalizeMetadata() — checks and converts user metadata options.
 */

import {
  CONTAINER_MAGIC,
  DEFAULT_CODEC,
  META_CODEC,
  META_SCHEMA,
  RESERVED_META_KEYS,
  SYNC_MARKER_SIZE,
} from './constants';
import { readBlockCount } from './decode';
import { CorruptFileError } from './errors';
import { ByteWriter, decodeUtf8, encodeUtf8, type SourceCursor } from './io';

/** User metadata as accepted by the writer. Strings are stored as UTF-8. */
export type MetadataInput =
  | Readonly<Record<string, string | Uint8Array>>
  | ReadonlyMap<string, string | Uint8Array>;

export interface ContainerHeader {
  readonly schemaText: string;
  readonly codec:      string;
  /** User entries only; the reserved keys are surfaced as schemaText / codec. */
  readonly metadata:   ReadonlyMap<string, Uint8Array>;
  readonly syncMarker: Uint8Array;
}

// ─── Metadata ─────────────────────────────────────────────────────────────────

function isMetadataMap(x: MetadataInput): x is ReadonlyMap<string, string | Uint8Array> {
  return x instanceof Map;
}

/**
 * @throws TypeError if a key is empty or reserved.
 */
export function normalizeMetadata(input: MetadataInput | undefined): Map<string, Uint8Array> {
  const out = new Map<string, Uint8Array>();
  if (input === undefined) return out;
  const entries = isMetadataMap(input) ? [...input.entries()] : Object.entries(input);
  for (const [key, value] of entries) {
    if (key === '') throw new TypeError('Metadata keys must not be empty.');
    if (RESERVED_META_KEYS.has(key)) {
      throw new TypeError(`Metadata key '${key}' is reserved by the container format.`);
    }
    out.set(key, typeof value === 'string' ? encodeUtf8(value) : value.slice());
  }
  return out;
}

// ─── Write ────────────────────────────────────────────────────────────────────

export function encodeHeader(header: ContainerHeader): Uint8Array {
  if (header.syncMarker.length !== SYNC_MARKER_SIZE) {
    throw new RangeError(
      `Sync marker must be ${SYNC_MARKER_SIZE} bytes; got ${header.syncMarker.length}.`,
    );
  }
  const entries: Array<[string, Uint8Array]> = [
    [META_SCHEMA, encodeUtf8(header.schemaText)],
    [META_CODEC, encodeUtf8(header.codec)],
    ...header.metadata,
  ];

  const out = new ByteWriter(64 + header.schemaText.length);
  out.writeFixed(CONTAINER_MAGIC);
  out.writeCount(entries.length);
  for (const [key, value] of entries) {
    out.writeString(key);
    out.writeBytes(value);
  }
  out.writeInt(0);
  out.writeFixed(header.syncMarker);
  return out.toBytes();
}

// ─── Read ─────────────────────────────────────────────────────────────────────

/**
 * Read and validate a header from the start of a source.
 *
 * @throws CorruptFileError   on bad magic or a missing schema entry.
 * @throws UnexpectedEofError if the source ends inside the header.
 */
export function readHeader(cursor: SourceCursor): ContainerHeader {
  const magic = cursor.take(CONTAINER_MAGIC.length, 'magic bytes');
  if (!magic.every((b, i) => b === CONTAINER_MAGIC[i])) {
    const hex = [...magic].map(b => b.toString(16).padStart(2, '0')).join(' ');
    throw new CorruptFileError(`Not a container file: magic bytes are ${hex}.`);
  }

  const entries = cursor.parse(reader => {
    const map = new Map<string, Uint8Array>();
    for (let count = readBlockCount(reader); count > 0; count = readBlockCount(reader)) {
      for (let i = 0; i < count; i++) {
        const key = reader.readString();
        map.set(key, reader.readBytes());
      }
    }
    return map;
  });

  const schemaBytes = entries.get(META_SCHEMA);
  if (schemaBytes === undefined) {
    throw new CorruptFileError(`Container header has no '${META_SCHEMA}' entry.`);
  }
  const codecBytes = entries.get(META_CODEC);

  const metadata = new Map<string, Uint8Array>();
  for (const [key, value] of entries) {
    if (!RESERVED_META_KEYS.has(key)) metadata.set(key, value);
  }

  return {
    schemaText: decodeUtf8(schemaBytes),
    codec:      codecBytes === undefined ? DEFAULT_CODEC : decodeUtf8(codecBytes),
    metadata,
    syncMarker: cursor.take(SYNC_MARKER_SIZE, 'sync marker'),
  };
}
