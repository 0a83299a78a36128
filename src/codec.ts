/**
 * binrec — block compression codecs
 *
 * A container names its codec in the header; every block payload is passed
 * through that codec's compress() on write and decompress() on read. Codecs
 * are looked up by name in a process-wide registry so applications can add
 * their own before opening a writer or reader.
 *
 *   null     identity
 *   deflate  raw deflate (RFC 1951, no zlib header or trailer)
 *   snappy   snappy block format + 4-byte big-endian CRC-32 of the
 *            uncompressed bytes
 */

import { deflateRawSync, inflateRawSync } from 'node:zlib';
import { compress as snappyCompress, uncompress as snappyUncompress } from 'snappyjs';

import { CorruptFileError, UnsupportedCodecError } from './errors';

export interface Codec {
  readonly name: string;
  compress(data: Uint8Array): Uint8Array;
  /** May throw anything on malformed input; the reader reports it as corruption. */
  decompress(data: Uint8Array): Uint8Array;
}

// ─── CRC-32 ───────────────────────────────────────────────────────────────────

const CRC_TABLE = new Uint32Array(256);
for (let i = 0; i < 256; i++) {
  let c = i;
  for (let j = 0; j < 8; j++) c = (c & 1) ? (0xedb88320 ^ (c >>> 1)) : (c >>> 1);
  CRC_TABLE[i] = c;
}

/** CRC-32 (IEEE 802.3, reflected, as used by zlib and gzip). */
export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (let i = 0; i < data.length; i++) crc = CRC_TABLE[(crc ^ data[i]!) & 0xff]! ^ (crc >>> 8);
  return (crc ^ 0xffffffff) >>> 0;
}

// ─── Built-ins ────────────────────────────────────────────────────────────────

export const nullCodec: Codec = {
  name:       'null',
  compress:   data => data,
  decompress: data => data,
};

export const deflateCodec: Codec = {
  name:       'deflate',
  compress:   data => deflateRawSync(data),
  decompress: data => inflateRawSync(data),
};

const CHECKSUM_SIZE = 4;

export const snappyCodec: Codec = {
  name: 'snappy',

  compress(data) {
    const body = snappyCompress(data);
    const out = new Uint8Array(body.length + CHECKSUM_SIZE);
    out.set(body, 0);
    new DataView(out.buffer).setUint32(body.length, crc32(data), /* littleEndian */ false);
    return out;
  },

  decompress(data) {
    if (data.length < CHECKSUM_SIZE) {
      throw new CorruptFileError(`Snappy payload of ${data.length} byte(s) is too short to hold its checksum.`);
    }
    const split = data.length - CHECKSUM_SIZE;
    const out = snappyUncompress(data.subarray(0, split));
    const expected = new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(split, false);
    const actual = crc32(out);
    if (actual !== expected) {
      throw new CorruptFileError(
        `Snappy checksum mismatch: stored 0x${expected.toString(16).padStart(8, '0')}, ` +
        `computed 0x${actual.toString(16).padStart(8, '0')}.`,
      );
    }
    return out;
  },
};

// ─── Registry ─────────────────────────────────────────────────────────────────

const registry = new Map<string, Codec>(
  [nullCodec, deflateCodec, snappyCodec].map(c => [c.name, c]),
);

/**
 * Register a codec under `codec.name`, replacing any codec of that name
 * except the built-in `null`.
 */
export function registerCodec(codec: Codec): void {
  if (codec.name === '') throw new TypeError('Codec name must not be empty.');
  if (codec.name === nullCodec.name && codec !== nullCodec) {
    throw new TypeError(`The '${nullCodec.name}' codec cannot be replaced.`);
  }
  registry.set(codec.name, codec);
}

/** @throws UnsupportedCodecError if nothing is registered under `name`. */
export function getCodec(name: string): Codec {
  const codec = registry.get(name);
  if (codec === undefined) throw new UnsupportedCodecError(name, codecNames());
  return codec;
}

export function hasCodec(name: string): boolean {
  return registry.has(name);
}

export function codecNames(): string[] {
  return [...registry.keys()];
}
