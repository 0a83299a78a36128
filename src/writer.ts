/**
 * binrec — ContainerWriter (Producer)
 *
 * Frames encoded records into a container file on a ByteSink.
 *
 * ── Lifecycle ────────────────────────────────────────────────────────────────
 *
 *   open     — resolve the codec, write the header (magic, metadata, sync)
 *   append   — validate, encode into the open block, flush on threshold
 *   flush    — compress the block and write one frame
 *   close    — flush what is left; further appends throw
 *
 * ── Block frame ──────────────────────────────────────────────────────────────
 *
 *   record_count   varint
 *   byte_length    varint, length of the compressed payload
 *   payload        codec.compress(encoded records)
 *   sync marker    the 16 bytes from the header
 *
 * A block is flushed as soon as its raw size reaches `blockSize` or its
 * record count reaches `blockRecords`, whichever comes first.
 *
 * ── Batches ──────────────────────────────────────────────────────────────────
 *
 * appendBatch() validates every value before encoding any of them. A batch
 * with one bad value is rejected whole and the open block is untouched.
 */

import { randomBytes } from 'node:crypto';

import { getCodec, type Codec } from './codec';
import {
  DEFAULT_BLOCK_RECORDS,
  DEFAULT_BLOCK_SIZE,
  DEFAULT_CODEC,
  SYNC_MARKER_SIZE,
} from './constants';
import { assertValid, encodeInto } from './encode';
import { SchemaMismatchError } from './errors';
import { encodeHeader, normalizeMetadata, type MetadataInput } from './header';
import { BufferSink, ByteWriter, type ByteSink } from './io';
import { getDefaultLogger, type Logger } from './logger';
import { schemaToText } from './schema';
import type { Schema, Value } from './types';
import { toValue } from './value';

export interface WriterOptions {
  /** Registered codec name. Default 'null'. */
  codec?:        string;
  /** Raw (uncompressed) bytes per block before it is flushed. Default 16000. */
  blockSize?:    number;
  /** Records per block before it is flushed. Default unlimited. */
  blockRecords?: number;
  /** User header entries. The keys 'schema' and 'codec' are reserved. */
  metadata?:     MetadataInput;
  /** Fixed sync marker for reproducible output. Default: 16 random bytes. */
  syncMarker?:   Uint8Array;
  logger?:       Logger;
}

function checkThreshold(name: string, value: number): number {
  if (!(value >= 1) || (Number.isFinite(value) && !Number.isInteger(value))) {
    throw new RangeError(`${name} must be a positive integer; got ${value}.`);
  }
  return value;
}

export class ContainerWriter {
  readonly schema:     Schema;
  readonly syncMarker: Uint8Array;
  readonly codecName:  string;

  private readonly sink:         ByteSink;
  private readonly codec:        Codec;
  private readonly blockSize:    number;
  private readonly blockRecords: number;
  private readonly log:          Logger;

  private readonly block = new ByteWriter(1024);
  private buffered = 0;
  private blocks   = 0;
  private records  = 0;
  private written  = 0;
  private closed   = false;

  private constructor(schema: Schema, sink: ByteSink, codec: Codec, options: WriterOptions) {
    this.schema       = schema;
    this.sink         = sink;
    this.codec        = codec;
    this.codecName    = codec.name;
    this.blockSize    = checkThreshold('blockSize', options.blockSize ?? DEFAULT_BLOCK_SIZE);
    this.blockRecords = checkThreshold('blockRecords', options.blockRecords ?? DEFAULT_BLOCK_RECORDS);
    this.log          = options.logger ?? getDefaultLogger().child('writer');

    const marker = options.syncMarker;
    if (marker !== undefined && marker.length !== SYNC_MARKER_SIZE) {
      throw new RangeError(`syncMarker must be ${SYNC_MARKER_SIZE} bytes; got ${marker.length}.`);
    }
    this.syncMarker = marker !== undefined ? marker.slice() : new Uint8Array(randomBytes(SYNC_MARKER_SIZE));
  }

  /**
   * Open a writer and write the header to `sink`.
   *
   * @throws UnsupportedCodecError if `options.codec` is not registered;
   *         nothing is written.
   * @throws RangeError / TypeError on invalid options; nothing is written.
   */
  static open(schema: Schema, sink: ByteSink, options: WriterOptions = {}): ContainerWriter {
    const codec = getCodec(options.codec ?? DEFAULT_CODEC);
    const metadata = normalizeMetadata(options.metadata);
    const writer = new ContainerWriter(schema, sink, codec, options);
    writer.emit(encodeHeader({
      schemaText: schemaToText(schema),
      codec:      codec.name,
      metadata,
      syncMarker: writer.syncMarker,
    }));
    writer.log.debug('Header written', { codec: codec.name, bytes: writer.written, metadataKeys: [...metadata.keys()] });
    return writer;
  }

  // ─── Counters ──────────────────────────────────────────────────────────────

  /** Records in the open block, not yet written to the sink. */
  get bufferedRecords(): number {
    return this.buffered;
  }

  /** Block frames written so far. */
  get blockCount(): number {
    return this.blocks;
  }

  /** Records accepted so far, buffered or written. */
  get recordCount(): number {
    return this.records;
  }

  /** Bytes handed to the sink so far, header included. */
  get bytesWritten(): number {
    return this.written;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ─── Appending ─────────────────────────────────────────────────────────────

  /**
   * @throws SchemaMismatchError if the value does not match the schema; the
   *         open block is unchanged.
   */
  append(value: Value): void {
    this.appendBatch([value]);
  }

  /**
   * Append several values, all or none.
   *
   * @throws SchemaMismatchError naming the index of the first bad value.
   */
  appendBatch(values: readonly Value[]): void {
    this.assertOpen();
    values.forEach((value, i) => {
      try {
        assertValid(this.schema, value);
      } catch (err) {
        if (err instanceof SchemaMismatchError && values.length > 1) {
          throw new SchemaMismatchError(`batch item ${i}: ${err.message}`);
        }
        throw err;
      }
    });
    for (const value of values) {
      encodeInto(this.schema, value, this.block);
      this.buffered++;
      this.records++;
      if (this.block.length >= this.blockSize || this.buffered >= this.blockRecords) this.flush();
    }
  }

  /** Convert plain data with toValue() and append it. */
  appendData(data: unknown): void {
    this.assertOpen();
    this.append(toValue(this.schema, data));
  }

  // ─── Flushing ──────────────────────────────────────────────────────────────

  /** Write the open block, if it holds any records. */
  flush(): void {
    if (this.buffered === 0) return;
    const raw = this.block.toBytes();
    const payload = this.codec.compress(raw);

    const frame = new ByteWriter(payload.length + 32);
    frame.writeCount(this.buffered);
    frame.writeCount(payload.length);
    frame.writeFixed(payload);
    frame.writeFixed(this.syncMarker);
    this.emit(frame.toBytes());

    this.blocks++;
    this.log.debug('Block flushed', {
      block:           this.blocks,
      records:         this.buffered,
      rawBytes:        raw.length,
      compressedBytes: payload.length,
    });
    this.block.reset();
    this.buffered = 0;
  }

  /** Flush the open block and seal the writer. Calling close() twice is a no-op. */
  close(): void {
    if (this.closed) return;
    this.flush();
    this.closed = true;
    this.log.debug('Writer closed', { blocks: this.blocks, records: this.records, bytes: this.written });
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('ContainerWriter is closed; no more records can be appended.');
  }

  private emit(bytes: Uint8Array): void {
    this.sink.write(bytes);
    this.written += bytes.length;
  }
}

/** Write `values` to a complete in-memory container file. */
export function writeContainer(schema: Schema, values: readonly Value[], options: WriterOptions = {}): Uint8Array {
  const sink = new BufferSink();
  const writer = ContainerWriter.open(schema, sink, options);
  writer.appendBatch(values);
  writer.close();
  return sink.toBytes();
}
