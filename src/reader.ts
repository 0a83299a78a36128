/**
 * binrec — ContainerReader (Consumer)
 *
 * Reads a container file from a ByteSource and yields its records one at a
 * time. The reader never seeks and never buffers more than one block.
 *
 * ── States ───────────────────────────────────────────────────────────────────
 *
 *   awaiting-block-header ──(frame read, count > 0)──▶ decoding-block
 *          ▲      │                                          │
 *          │      └──(end of input)──▶ exhausted             │
 *          └────────────(last record of the block)───────────┘
 *
 *   any state ──(error)──▶ failed; every later next() rethrows that error
 *
 * ── Block checks ─────────────────────────────────────────────────────────────
 *
 *   sync marker differs from the header's     CorruptFileError
 *   codec cannot decompress the payload       CorruptFileError
 *   records end before the payload does       CorruptFileError
 *   a record runs past the payload            UnexpectedEofError
 *   input ends inside a frame                 UnexpectedEofError
 */

import { getCodec, type Codec } from './codec';
import { decodeFrom } from './decode';
import { BinrecError, CorruptFileError } from './errors';
import { readHeader, type ContainerHeader } from './header';
import { BufferSource, ByteReader, SourceCursor, type ByteSource } from './io';
import { getDefaultLogger, type Logger } from './logger';
import { decodeWithPlan, resolveSchemas, type Resolution } from './resolve';
import { parseSchema } from './schema';
import type { Schema, Value } from './types';

export type ReaderState = 'awaiting-block-header' | 'decoding-block' | 'exhausted' | 'failed';

export interface ReaderOptions {
  /** Decode every record into this schema instead of the writer's. */
  readerSchema?: Schema;
  logger?:       Logger;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((x, i) => x === b[i]);
}

export class ContainerReader implements Iterable<Value>, Iterator<Value> {
  readonly writerSchema: Schema;
  readonly readerSchema: Schema;
  readonly codecName:    string;
  /** User metadata from the header. */
  readonly metadata:     ReadonlyMap<string, Uint8Array>;
  readonly syncMarker:   Uint8Array;

  private readonly cursor:     SourceCursor;
  private readonly codec:      Codec;
  private readonly resolution: Resolution | undefined;
  private readonly log:        Logger;

  private current:   ReaderState = 'awaiting-block-header';
  private failure:   unknown;
  private block:     ByteReader | undefined;
  private pending    = 0;
  private blocksRead = 0;

  private constructor(
    cursor: SourceCursor,
    writerSchema: Schema,
    codec: Codec,
    metadata: ReadonlyMap<string, Uint8Array>,
    syncMarker: Uint8Array,
    options: ReaderOptions,
    log: Logger,
  ) {
    this.cursor       = cursor;
    this.writerSchema = writerSchema;
    this.codec        = codec;
    this.codecName    = codec.name;
    this.metadata     = metadata;
    this.syncMarker   = syncMarker;
    this.log          = log;

    const reader = options.readerSchema;
    if (reader === undefined || reader === writerSchema) {
      this.readerSchema = writerSchema;
      this.resolution   = undefined;
    } else {
      this.readerSchema = reader;
      this.resolution   = resolveSchemas(writerSchema, reader);
    }
  }

  /**
   * Read the header and prepare to iterate.
   *
   * @throws CorruptFileError      on bad magic or a header without a schema.
   * @throws UnsupportedCodecError if the header names an unregistered codec.
   * @throws SchemaError           if the embedded schema does not parse.
   * @throws SchemaMismatchError   if `options.readerSchema` cannot read the
   *                               writer schema.
   */
  static open(source: ByteSource, options: ReaderOptions = {}): ContainerReader {
    const log = options.logger ?? getDefaultLogger().child('reader');
    const cursor = new SourceCursor(source);
    let header: ContainerHeader;
    try {
      header = readHeader(cursor);
    } catch (err) {
      if (err instanceof CorruptFileError) log.warn('Invalid container header', { error: err.message });
      throw err;
    }
    const codec = getCodec(header.codec);
    const writerSchema = parseSchema(header.schemaText);
    log.debug('Header read', { codec: codec.name, bytes: cursor.offset, metadataKeys: [...header.metadata.keys()] });
    return new ContainerReader(cursor, writerSchema, codec, header.metadata, header.syncMarker, options, log);
  }

  get state(): ReaderState {
    return this.current;
  }

  /** Block frames read so far, empty ones included. */
  get blockCount(): number {
    return this.blocksRead;
  }

  // ─── Iteration ─────────────────────────────────────────────────────────────

  next(): IteratorResult<Value> {
    switch (this.current) {
      case 'failed':
        throw this.failure;
      case 'exhausted':
        return { done: true, value: undefined };
      case 'awaiting-block-header':
      case 'decoding-block':
        break;
    }

    try {
      while (this.current === 'awaiting-block-header') {
        if (!this.readBlock()) {
          this.current = 'exhausted';
          this.log.debug('End of container', { blocks: this.blocksRead });
          return { done: true, value: undefined };
        }
      }
      return { done: false, value: this.readRecord() };
    } catch (err) {
      this.current = 'failed';
      this.failure = err;
      throw err;
    }
  }

  [Symbol.iterator](): this {
    return this;
  }

  /** Every remaining record. */
  readAll(): Value[] {
    const out: Value[] = [];
    for (let r = this.next(); r.done !== true; r = this.next()) out.push(r.value);
    return out;
  }

  // ─── Blocks ────────────────────────────────────────────────────────────────

  /**
   * Read one block frame. Returns false at a clean end of input; leaves the
   * state at awaiting-block-header for an empty block.
   */
  private readBlock(): boolean {
    if (this.cursor.atEnd()) return false;

    const start   = this.cursor.offset;
    const count   = this.cursor.parse(r => r.readLength('block record count'));
    const length  = this.cursor.parse(r => r.readLength('block byte length'));
    const payload = this.cursor.take(length, 'block payload');
    const marker  = this.cursor.take(this.syncMarker.length, 'sync marker');
    this.blocksRead++;

    if (!sameBytes(marker, this.syncMarker)) {
      throw this.corrupt(`Sync marker mismatch after block ${this.blocksRead} (offset ${start}).`);
    }

    let raw: Uint8Array;
    try {
      raw = this.codec.decompress(payload);
    } catch (err) {
      if (err instanceof CorruptFileError) throw this.corrupt(err.message);
      if (err instanceof BinrecError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw this.corrupt(`Codec '${this.codecName}' failed on block ${this.blocksRead}: ${reason}`);
    }

    this.log.debug('Block read', { block: this.blocksRead, records: count, bytes: length });
    if (count === 0) return true;

    this.block   = new ByteReader(raw);
    this.pending = count;
    this.current = 'decoding-block';
    return true;
  }

  private readRecord(): Value {
    const block = this.block;
    if (block === undefined) throw new Error('ContainerReader has no open block.');

    const value = this.resolution !== undefined
      ? decodeWithPlan(this.resolution, block)
      : decodeFrom(this.writerSchema, block);

    this.pending--;
    if (this.pending === 0) {
      if (!block.atEnd()) {
        throw this.corrupt(
          `Block ${this.blocksRead} has ${block.remaining} byte(s) left after its last record.`,
        );
      }
      this.block   = undefined;
      this.current = 'awaiting-block-header';
    }
    return value;
  }

  private corrupt(message: string): CorruptFileError {
    this.log.warn(message, { block: this.blocksRead, offset: this.cursor.offset });
    return new CorruptFileError(message);
  }
}

/** Read every record of an in-memory container file. */
export function readContainer(bytes: Uint8Array, options: ReaderOptions = {}): Value[] {
  return ContainerReader.open(new BufferSource(bytes), options).readAll();
}
