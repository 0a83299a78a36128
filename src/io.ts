/**
 * binrec — byte I/O primitives
 *
 * ByteWriter / ByteReader are the in-memory cursors the codec works on.
 * ByteSink / ByteSource are the collaborator contracts the container writer
 * and reader stream through; neither is ever assumed to be seekable.
 *
 * Integer wire format (int and long alike):
 *
 *   zig-zag   n → (n << 1) ^ (n >> 63)      sign folded into bit 0
 *   varint    7 payload bits per byte, least significant group first,
 *             bit 7 set on every byte except the last
 *
 * `int` values travel as JS numbers (i32). `long` values travel as bigint
 * (i64); a JS number cannot hold every i64 exactly.
 */

import { MAX_EMPTY_ITEMS, SOURCE_READ_CHUNK } from './constants';
import { CorruptFileError, UnexpectedEofError } from './errors';

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export const INT_MIN  = -0x80000000;
export const INT_MAX  =  0x7fffffff;
export const LONG_MIN = -(1n << 63n);
export const LONG_MAX =  (1n << 63n) - 1n;

/** Longest legal varint for each width: ceil(32 / 7) and ceil(64 / 7). */
const MAX_INT_VARINT_BYTES  = 5;
const MAX_LONG_VARINT_BYTES = 10;

// ─── Zig-zag ──────────────────────────────────────────────────────────────────

/** Fold a signed i64 into an unsigned u64 so small magnitudes stay small. */
export function zigzagEncode(n: bigint): bigint {
  return BigInt.asUintN(64, (n << 1n) ^ (n >> 63n));
}

/** Inverse of zigzagEncode. */
export function zigzagDecode(z: bigint): bigint {
  return BigInt.asIntN(64, (z >> 1n) ^ -(z & 1n));
}

/** Number of bytes the zig-zag varint encoding of `n` occupies. */
export function varintLength(n: bigint | number): number {
  let z = zigzagEncode(BigInt(n));
  let len = 1;
  while (z >= 0x80n) {
    z >>= 7n;
    len++;
  }
  return len;
}

// ─── ByteWriter ───────────────────────────────────────────────────────────────

/**
 * Growable output buffer. Capacity doubles on demand; toBytes() returns a
 * copy so the writer can keep being reused after reset().
 */
export class ByteWriter {
  private buf:  Uint8Array;
  private view: DataView;
  private pos = 0;

  constructor(initialCapacity = 256) {
    this.buf  = new Uint8Array(Math.max(16, initialCapacity));
    this.view = new DataView(this.buf.buffer);
  }

  /** Bytes written so far. */
  get length(): number {
    return this.pos;
  }

  private ensure(extra: number): void {
    const needed = this.pos + extra;
    if (needed <= this.buf.length) return;
    let cap = this.buf.length * 2;
    while (cap < needed) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.pos));
    this.buf  = next;
    this.view = new DataView(next.buffer);
  }

  writeByte(b: number): void {
    this.ensure(1);
    this.buf[this.pos++] = b;
  }

  /** Raw bytes, no length prefix. */
  writeFixed(bytes: Uint8Array): void {
    this.ensure(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  writeBoolean(v: boolean): void {
    this.writeByte(v ? 1 : 0);
  }

  /** Zig-zag varint of an i32. The caller guarantees the range. */
  writeInt(n: number): void {
    let z = ((n << 1) ^ (n >> 31)) >>> 0;
    this.ensure(MAX_INT_VARINT_BYTES);
    while (z >= 0x80) {
      this.buf[this.pos++] = (z & 0x7f) | 0x80;
      z >>>= 7;
    }
    this.buf[this.pos++] = z;
  }

  /** Zig-zag varint of an i64. The caller guarantees the range. */
  writeLong(n: bigint): void {
    let z = zigzagEncode(n);
    this.ensure(MAX_LONG_VARINT_BYTES);
    while (z >= 0x80n) {
      this.buf[this.pos++] = Number(z & 0x7fn) | 0x80;
      z >>= 7n;
    }
    this.buf[this.pos++] = Number(z);
  }

  /** Lengths and counts: non-negative integers that fit in a JS number. */
  writeCount(n: number): void {
    if (n >= INT_MIN && n <= INT_MAX) this.writeInt(n);
    else this.writeLong(BigInt(n));
  }

  writeFloat(v: number): void {
    this.ensure(4);
    this.view.setFloat32(this.pos, v, /* littleEndian */ true);
    this.pos += 4;
  }

  writeDouble(v: number): void {
    this.ensure(8);
    this.view.setFloat64(this.pos, v, /* littleEndian */ true);
    this.pos += 8;
  }

  /** Length-prefixed bytes. */
  writeBytes(bytes: Uint8Array): void {
    this.writeCount(bytes.length);
    this.writeFixed(bytes);
  }

  /** Length-prefixed UTF-8. The prefix counts bytes, not UTF-16 code units. */
  writeString(s: string): void {
    this.writeBytes(utf8Encoder.encode(s));
  }

  /** Drop everything written after `length` bytes. Used to roll back a failed encode. */
  truncate(length: number): void {
    if (length < 0 || length > this.pos) {
      throw new RangeError(`truncate(${length}): writer holds ${this.pos} bytes.`);
    }
    this.pos = length;
  }

  reset(): void {
    this.pos = 0;
  }

  toBytes(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }
}

// ─── ByteReader ───────────────────────────────────────────────────────────────

/**
 * Bounds-checked cursor over a byte array. Every read that would run past
 * the end throws UnexpectedEofError; nothing is ever read out of bounds.
 */
export class ByteReader {
  private pos = 0;
  private emptyItems = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.bytes.length;
  }

  /**
   * Account for `n` decoded items that occupy no bytes.
   *
   * @throws CorruptFileError once more than MAX_EMPTY_ITEMS are claimed.
   */
  claimEmptyItems(n: number): void {
    this.emptyItems += n;
    if (this.emptyItems > MAX_EMPTY_ITEMS) {
      throw new CorruptFileError(
        `Input claims more than ${MAX_EMPTY_ITEMS} zero-width collection items (offset ${this.pos}).`,
      );
    }
  }

  private require(n: number, what: string): void {
    if (this.pos + n > this.bytes.length) {
      throw new UnexpectedEofError(
        `Unexpected end of input reading ${what}: need ${n} byte(s) at offset ${this.pos}, ` +
        `${this.remaining} remain.`,
      );
    }
  }

  readByte(): number {
    this.require(1, 'byte');
    return this.bytes[this.pos++]!;
  }

  readBoolean(): boolean {
    const b = this.readByte();
    if (b > 1) {
      throw new CorruptFileError(`Invalid boolean byte 0x${b.toString(16)} at offset ${this.pos - 1}.`);
    }
    return b === 1;
  }

  readInt(): number {
    let z = 0;
    let shift = 0;
    for (let i = 0; i < MAX_INT_VARINT_BYTES; i++) {
      this.require(1, 'int');
      const b = this.bytes[this.pos++]!;
      // shift reaches 28 on the fifth byte; plain multiplication keeps the
      // intermediate exact where << would overflow to negative.
      z += (b & 0x7f) * 2 ** shift;
      if ((b & 0x80) === 0) {
        if (z > 0xffffffff) {
          throw new CorruptFileError(`Varint at offset ${this.pos - i - 1} overflows an int.`);
        }
        const u = z >>> 0;
        return (u >>> 1) ^ -(u & 1);
      }
      shift += 7;
    }
    throw new CorruptFileError(`Varint at offset ${this.pos - MAX_INT_VARINT_BYTES} is longer than an int allows.`);
  }

  readLong(): bigint {
    let z = 0n;
    let shift = 0n;
    for (let i = 0; i < MAX_LONG_VARINT_BYTES; i++) {
      this.require(1, 'long');
      const b = this.bytes[this.pos++]!;
      z |= BigInt(b & 0x7f) << shift;
      if ((b & 0x80) === 0) {
        if (z > 0xffffffffffffffffn) {
          throw new CorruptFileError(`Varint at offset ${this.pos - i - 1} overflows a long.`);
        }
        return zigzagDecode(z);
      }
      shift += 7n;
    }
    throw new CorruptFileError(`Varint at offset ${this.pos - MAX_LONG_VARINT_BYTES} is longer than a long allows.`);
  }

  /** A long that must be a non-negative length or count. */
  readLength(what: string): number {
    const n = this.readLong();
    if (n < 0n || n > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new CorruptFileError(`Invalid ${what} ${n} at offset ${this.pos}.`);
    }
    return Number(n);
  }

  readFloat(): number {
    this.require(4, 'float');
    const v = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return v;
  }

  readDouble(): number {
    this.require(8, 'double');
    const v = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return v;
  }

  /** `n` raw bytes, copied out so the result outlives the reader's buffer. */
  readFixed(n: number): Uint8Array {
    this.require(n, `${n} raw bytes`);
    const out = this.bytes.slice(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  readBytes(): Uint8Array {
    return this.readFixed(this.readLength('bytes length'));
  }

  readString(): string {
    const start = this.pos;
    const len = this.readLength('string length');
    this.require(len, 'string');
    try {
      return utf8Decoder.decode(this.bytes.subarray(this.pos, this.pos + len));
    } catch {
      throw new CorruptFileError(`Invalid UTF-8 in string at offset ${start}.`);
    } finally {
      this.pos += len;
    }
  }
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Index of the first unpaired surrogate in `s`, or -1. UTF-8 cannot carry
 * one; encodeUtf8 would write U+FFFD in its place.
 */
export function loneSurrogateIndex(s: string): number {
  return LONE_SURROGATE.exec(s)?.index ?? -1;
}

export function encodeUtf8(s: string): Uint8Array {
  return utf8Encoder.encode(s);
}

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    throw new CorruptFileError('Invalid UTF-8 byte sequence.');
  }
}

// ─── Sink / Source ────────────────────────────────────────────────────────────

/** Ordered byte output. Each call appends; nothing is ever rewritten. */
export interface ByteSink {
  write(chunk: Uint8Array): void;
}

/**
 * Ordered byte input. read() returns between 1 and `maxBytes` bytes, or an
 * empty array once the input is exhausted.
 */
export interface ByteSource {
  read(maxBytes: number): Uint8Array;
}

/** Collects written chunks in memory. */
export class BufferSink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private total = 0;

  write(chunk: Uint8Array): void {
    // Copy: callers are free to reuse their buffers after write() returns.
    this.chunks.push(chunk.slice());
    this.total += chunk.length;
  }

  get length(): number {
    return this.total;
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.total);
    let off = 0;
    for (const c of this.chunks) {
      out.set(c, off);
      off += c.length;
    }
    return out;
  }
}

/**
 * Serves a byte array. `chunkSize` caps every read, which lets tests model
 * a stream that hands out data in small pieces.
 */
export class BufferSource implements ByteSource {
  private pos = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly chunkSize: number = Number.POSITIVE_INFINITY,
  ) {
    if (!(chunkSize >= 1)) {
      throw new RangeError(`BufferSource chunkSize must be >= 1; got ${chunkSize}.`);
    }
  }

  read(maxBytes: number): Uint8Array {
    const n = Math.min(maxBytes, this.chunkSize, this.bytes.length - this.pos);
    if (n <= 0) return new Uint8Array(0);
    const out = this.bytes.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }
}

// ─── SourceCursor ─────────────────────────────────────────────────────────────

/**
 * Buffered, forward-only view of a ByteSource. Varint-framed structures are
 * parsed with parse(): the callback runs against whatever is buffered, and
 * if it runs out of bytes more are pulled from the source and it runs again.
 */
export class SourceCursor {
  private buf = new Uint8Array(0);
  private pos = 0;
  private ended = false;
  private base = 0;

  constructor(private readonly source: ByteSource) {}

  /** Bytes consumed from the source so far. */
  get offset(): number {
    return this.base + this.pos;
  }

  private fill(): boolean {
    if (this.ended) return false;
    const chunk = this.source.read(SOURCE_READ_CHUNK);
    if (chunk.length === 0) {
      this.ended = true;
      return false;
    }
    const rest = this.buf.length - this.pos;
    const next = new Uint8Array(rest + chunk.length);
    next.set(this.buf.subarray(this.pos), 0);
    next.set(chunk, rest);
    this.base += this.pos;
    this.buf = next;
    this.pos = 0;
    return true;
  }

  /** True once every byte of the source has been consumed. */
  atEnd(): boolean {
    while (this.pos >= this.buf.length) {
      if (!this.fill()) return true;
    }
    return false;
  }

  parse<T>(fn: (reader: ByteReader) => T): T {
    for (;;) {
      const reader = new ByteReader(this.buf.subarray(this.pos));
      try {
        const value = fn(reader);
        this.pos += reader.position;
        return value;
      } catch (err) {
        if (err instanceof UnexpectedEofError && this.fill()) continue;
        throw err;
      }
    }
  }

  /** Exactly `n` bytes, copied. */
  take(n: number, what: string): Uint8Array {
    while (this.buf.length - this.pos < n) {
      if (!this.fill()) {
        throw new UnexpectedEofError(
          `Unexpected end of input reading ${what}: need ${n} byte(s) at offset ${this.offset}, ` +
          `${this.buf.length - this.pos} remain.`,
        );
      }
    }
    const out = this.buf.slice(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }
}
