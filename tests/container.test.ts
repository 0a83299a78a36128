/**
 * binrec — container files
 *
 * ContainerWriter → bytes → ContainerReader, including every way the reader
 * can refuse a file: bad magic, missing header entries, sync mismatches,
 * codec failures, truncation and malformed block payloads.
 */

import { describe, it, expect } from 'vitest';
import {
  BinrecError,
  BufferSink,
  BufferSource,
  ByteWriter,
  CONTAINER_MAGIC,
  ContainerReader,
  ContainerWriter,
  CorruptFileError,
  SchemaMismatchError,
  UnexpectedEofError,
  UnsupportedCodecError,
  Value,
  encode,
  parseSchema,
  readContainer,
  registerCodec,
  schemaFingerprint,
  writeContainer,
  type Logger,
  type WriterOptions,
} from '../src/index';
import { encodeHeader } from '../src/header';
import { encodeUtf8 } from '../src/io';

const TEST_TEXT = '{"type":"record","name":"Test","fields":[{"name":"field","type":"string"}]}';
const TEST = parseSchema(TEST_TEXT);

const MARKER = new Uint8Array(16).fill(0xaa);

function row(s: string): Value {
  return Value.record({ field: Value.string(s) });
}

function rows(n: number): Value[] {
  return Array.from({ length: n }, (_, i) => row(`row ${i}`));
}

function writeFile(values: readonly Value[], options: WriterOptions = {}) {
  const sink = new BufferSink();
  const writer = ContainerWriter.open(TEST, sink, { syncMarker: MARKER, ...options });
  const headerLength = writer.bytesWritten;
  writer.appendBatch(values);
  writer.close();
  return { bytes: sink.toBytes(), headerLength, writer };
}

function flipped(bytes: Uint8Array, index: number): Uint8Array {
  const out = bytes.slice();
  out[index] = (out[index] ?? 0) ^ 0xff;
  return out;
}

function countMarkers(bytes: Uint8Array): number {
  let n = 0;
  for (let i = 0; i + MARKER.length <= bytes.length; i++) {
    if (MARKER.every((b, j) => bytes[i + j] === b)) n++;
  }
  return n;
}

function open(bytes: Uint8Array, chunkSize?: number): ContainerReader {
  return ContainerReader.open(new BufferSource(bytes, chunkSize));
}

function recordingLogger(lines: Array<[string, string]>): Logger {
  return {
    error:   message => { lines.push(['error', message]); },
    warn:    message => { lines.push(['warn', message]); },
    info:    message => { lines.push(['info', message]); },
    verbose: message => { lines.push(['verbose', message]); },
    debug:   message => { lines.push(['debug', message]); },
    child:   () => recordingLogger(lines),
  };
}

// ─── Round trip ──────────────────────────────────────────────────────────────

describe('container round-trip', () => {

  it('reads back a single record without an external schema', () => {
    const bytes = writeContainer(TEST, [row('foo')]);
    const reader = open(bytes);
    expect(reader.readAll()).toEqual([Value.record([['field', Value.string('foo')]])]);
    expect(schemaFingerprint(reader.writerSchema)).toBe(schemaFingerprint(TEST));
    expect(reader.codecName).toBe('null');
    expect(reader.metadata.size).toBe(0);
  });

  it('starts with the magic bytes and embeds the schema text', () => {
    const bytes = writeContainer(TEST, []);
    expect([...bytes.subarray(0, 4)]).toEqual([0x4f, 0x62, 0x6a, 0x01]);
    expect(new TextDecoder().decode(bytes)).toContain(TEST_TEXT);
  });

  it('lays out a one-record file exactly', () => {
    const { bytes, headerLength } = writeFile([row('foo')]);
    // count 1, length 4, "foo", sync marker
    expect([...bytes.subarray(headerLength)]).toEqual([0x02, 0x08, 0x06, 0x66, 0x6f, 0x6f, ...MARKER]);
    expect([...bytes.subarray(headerLength - 16, headerLength)]).toEqual([...MARKER]);
  });

  it('is reproducible with a fixed sync marker', () => {
    const a = writeContainer(TEST, rows(5), { syncMarker: MARKER });
    const b = writeContainer(TEST, rows(5), { syncMarker: MARKER });
    expect(a).toEqual(b);
  });

  it('draws a fresh random sync marker per file', () => {
    const a = ContainerWriter.open(TEST, new BufferSink());
    const b = ContainerWriter.open(TEST, new BufferSink());
    expect(a.syncMarker.length).toBe(16);
    expect(a.syncMarker).not.toEqual(b.syncMarker);
  });

  it('splits records into blocks at the record threshold', () => {
    const { bytes, writer } = writeFile(rows(25), { blockRecords: 10 });
    expect(writer.blockCount).toBe(3);
    expect(writer.recordCount).toBe(25);
    expect(writer.bytesWritten).toBe(bytes.length);
    // header + one per block
    expect(countMarkers(bytes)).toBe(4);

    const reader = open(bytes);
    expect(reader.readAll()).toEqual(rows(25));
    expect(reader.blockCount).toBe(3);
  });

  it('splits records into blocks at the byte threshold', () => {
    const { bytes, writer } = writeFile(rows(4), { blockSize: 1 });
    expect(writer.blockCount).toBe(4);
    expect(readContainer(bytes)).toEqual(rows(4));
  });

  it('streams through a source that returns a few bytes at a time', () => {
    const { bytes } = writeFile(rows(30), { blockRecords: 7 });
    expect([...open(bytes, 3)]).toEqual(rows(30));
  });

  it('writes deflate and snappy files that read back identically', () => {
    const values = Array.from({ length: 200 }, (_, i) => row(`repeated record body ${i % 10}`));
    const plain = writeContainer(TEST, values);
    for (const codec of ['deflate', 'snappy']) {
      const bytes = writeContainer(TEST, values, { codec });
      const reader = open(bytes);
      expect(reader.codecName).toBe(codec);
      expect(reader.readAll()).toEqual(values);
      expect(bytes.length).toBeLessThan(plain.length);
    }
  });

  it('carries user metadata', () => {
    const bytes = writeContainer(TEST, [], { metadata: { 'app.origin': 'test-suite', raw: Uint8Array.of(1, 2) } });
    const reader = open(bytes);
    expect([...reader.metadata.keys()]).toEqual(['app.origin', 'raw']);
    expect(new TextDecoder().decode(reader.metadata.get('app.origin'))).toBe('test-suite');
    expect([...(reader.metadata.get('raw') ?? [])]).toEqual([1, 2]);
  });

  it('decodes into an explicit reader schema', () => {
    const writer = parseSchema('{"type":"record","name":"M","fields":[{"name":"n","type":"int"}]}');
    const reader = parseSchema('{"type":"record","name":"M","fields":[{"name":"n","type":"long"},{"name":"tag","type":"string","default":"none"}]}');
    const bytes = writeContainer(writer, [1, 2].map(n => Value.record({ n: Value.int(n) })));

    const r = ContainerReader.open(new BufferSource(bytes), { readerSchema: reader });
    expect(r.readerSchema).toBe(reader);
    expect(r.readAll()).toEqual([1n, 2n].map(n => Value.record([['n', Value.long(n)], ['tag', Value.string('none')]])));

    const incompatible = parseSchema('{"type":"record","name":"M","fields":[{"name":"n","type":"string"}]}');
    expect(() => ContainerReader.open(new BufferSource(bytes), { readerSchema: incompatible }))
      .toThrow(SchemaMismatchError);
  });
});

// ─── Writer ──────────────────────────────────────────────────────────────────

describe('ContainerWriter', () => {

  it('rejects an unknown codec before writing anything', () => {
    const sink = new BufferSink();
    expect(() => ContainerWriter.open(TEST, sink, { codec: 'zstd' })).toThrow(UnsupportedCodecError);
    expect(sink.length).toBe(0);
  });

  it('rejects reserved metadata keys and bad options before writing anything', () => {
    const sink = new BufferSink();
    expect(() => ContainerWriter.open(TEST, sink, { metadata: { codec: 'x' } })).toThrow(TypeError);
    expect(() => ContainerWriter.open(TEST, sink, { syncMarker: Uint8Array.of(1, 2) })).toThrow(RangeError);
    expect(() => ContainerWriter.open(TEST, sink, { blockSize: 0 })).toThrow(RangeError);
    expect(() => ContainerWriter.open(TEST, sink, { blockRecords: 2.5 })).toThrow(RangeError);
    expect(sink.length).toBe(0);
  });

  it('a rejected batch leaves the open block unchanged', () => {
    const sink = new BufferSink();
    const writer = ContainerWriter.open(TEST, sink, { syncMarker: MARKER });
    const headerLength = writer.bytesWritten;
    writer.append(row('kept'));

    expect(() => writer.appendBatch([row('lost'), Value.record({ field: Value.int(1) })]))
      .toThrow(SchemaMismatchError);
    expect(writer.bufferedRecords).toBe(1);
    expect(writer.recordCount).toBe(1);
    expect(writer.bytesWritten).toBe(headerLength);

    writer.close();
    expect(readContainer(sink.toBytes())).toEqual([row('kept')]);
  });

  it('refuses a string UTF-8 cannot carry', () => {
    const writer = ContainerWriter.open(TEST, new BufferSink());
    expect(() => writer.append(row('a\uD800b'))).toThrow(SchemaMismatchError);
    expect(writer.bufferedRecords).toBe(0);
  });

  it('appendData converts plain data first', () => {
    const sink = new BufferSink();
    const writer = ContainerWriter.open(TEST, sink);
    writer.appendData({ field: 'plain' });
    expect(() => writer.appendData({ field: 3 })).toThrow(SchemaMismatchError);
    writer.close();
    expect(readContainer(sink.toBytes())).toEqual([Value.record([['field', Value.string('plain')]])]);
  });

  it('flush with an empty block writes nothing; close seals the writer', () => {
    const sink = new BufferSink();
    const writer = ContainerWriter.open(TEST, sink);
    const before = sink.length;
    writer.flush();
    expect(sink.length).toBe(before);

    writer.close();
    writer.close();
    expect(writer.isClosed).toBe(true);
    try {
      writer.append(row('late'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(Error);
      expect(err).not.toBeInstanceOf(BinrecError);
    }
  });

  it('logs each flushed block at debug', () => {
    const lines: Array<[string, string]> = [];
    writeFile(rows(3), { blockRecords: 1, logger: recordingLogger(lines) });
    expect(lines.filter(([, m]) => m === 'Block flushed')).toHaveLength(3);
    expect(lines.every(([level]) => level === 'debug')).toBe(true);
  });
});

// ─── Reader failures ─────────────────────────────────────────────────────────

describe('ContainerReader — header failures', () => {

  it('rejects bad magic', () => {
    const { bytes } = writeFile([row('a')]);
    expect(() => open(flipped(bytes, 0))).toThrow(CorruptFileError);
  });

  it('reports a truncated header as UnexpectedEof', () => {
    const { bytes } = writeFile([row('a')]);
    expect(() => open(bytes.subarray(0, 10))).toThrow(UnexpectedEofError);
    expect(() => open(new Uint8Array(0))).toThrow(UnexpectedEofError);
  });

  it('rejects an unregistered codec', () => {
    const header = encodeHeader({ schemaText: TEST_TEXT, codec: 'lzma', metadata: new Map(), syncMarker: MARKER });
    expect(() => open(header)).toThrow(UnsupportedCodecError);
  });

  function handHeader(entries: Array<[string, string]>): ByteWriter {
    const w = new ByteWriter();
    w.writeFixed(CONTAINER_MAGIC);
    w.writeInt(entries.length);
    for (const [k, v] of entries) {
      w.writeString(k);
      w.writeBytes(encodeUtf8(v));
    }
    w.writeInt(0);
    w.writeFixed(MARKER);
    return w;
  }

  it('treats a missing codec entry as null', () => {
    const w = handHeader([['schema', TEST_TEXT]]);
    const payload = encode(TEST, row('x'));
    w.writeInt(1);
    w.writeInt(payload.length);
    w.writeFixed(payload);
    w.writeFixed(MARKER);
    const reader = open(w.toBytes());
    expect(reader.codecName).toBe('null');
    expect(reader.readAll()).toEqual([Value.record([['field', Value.string('x')]])]);
  });

  it('rejects a header without a schema', () => {
    expect(() => open(handHeader([['codec', 'null']]).toBytes())).toThrow(CorruptFileError);
  });
});

describe('ContainerReader — block failures', () => {

  it('detects a flipped byte in any block sync marker', () => {
    const { bytes } = writeFile([row('a')]);
    for (let i = 1; i <= 16; i++) {
      const reader = open(flipped(bytes, bytes.length - i));
      expect(() => reader.next()).toThrow(CorruptFileError);
    }
  });

  it('detects a flipped byte in the header sync marker', () => {
    const { bytes, headerLength } = writeFile([row('a')]);
    for (let i = headerLength - 16; i < headerLength; i++) {
      expect(() => open(flipped(bytes, i)).readAll()).toThrow(CorruptFileError);
    }
  });

  it('rethrows the same error once failed', () => {
    const { bytes } = writeFile([row('a')]);
    const reader = open(flipped(bytes, bytes.length - 1));
    let first: unknown;
    try {
      reader.next();
    } catch (err) {
      first = err;
    }
    expect(first).toBeInstanceOf(CorruptFileError);
    expect(reader.state).toBe('failed');
    expect(() => reader.next()).toThrow(CorruptFileError);
    try {
      reader.next();
    } catch (err) {
      expect(err).toBe(first);
    }
  });

  it('logs a warning before reporting corruption', () => {
    const { bytes } = writeFile([row('a')]);
    const lines: Array<[string, string]> = [];
    const reader = ContainerReader.open(new BufferSource(flipped(bytes, bytes.length - 1)), { logger: recordingLogger(lines) });
    expect(() => reader.readAll()).toThrow(CorruptFileError);
    expect(lines.filter(([level]) => level === 'warn')).toHaveLength(1);
  });

  it('reports truncation anywhere inside the last block as UnexpectedEof', () => {
    const { bytes, headerLength } = writeFile([row('foo')]);
    const blockLength = bytes.length - headerLength;
    for (let cut = 1; cut < blockLength; cut++) {
      expect(() => open(bytes.subarray(0, bytes.length - cut)).readAll()).toThrow(UnexpectedEofError);
    }
  });

  it('ends cleanly when input stops at a block boundary', () => {
    const { bytes, headerLength } = writeFile([row('a')]);
    const reader = open(bytes.subarray(0, headerLength));
    expect(reader.next()).toEqual({ done: true, value: undefined });
    expect(reader.state).toBe('exhausted');
    expect(reader.next().done).toBe(true);
  });

  it('reports a snappy checksum mismatch as CorruptFile', () => {
    const { bytes } = writeFile([row('compressed')], { codec: 'snappy' });
    // The checksum is the last 4 bytes of the payload, just before the marker.
    expect(() => open(flipped(bytes, bytes.length - 17)).readAll()).toThrow(CorruptFileError);
  });

  it('reports any codec failure as CorruptFile', () => {
    registerCodec({
      name:       'test-broken',
      compress:   data => data,
      decompress: () => { throw new Error('boom'); },
    });
    const { bytes } = writeFile([row('a')], { codec: 'test-broken' });
    expect(() => open(bytes).readAll()).toThrow(/boom/);
    expect(() => open(bytes).readAll()).toThrow(CorruptFileError);
  });

  function withFrame(count: number, payload: Uint8Array): Uint8Array {
    const sink = new BufferSink();
    ContainerWriter.open(TEST, sink, { syncMarker: MARKER });
    const frame = new ByteWriter();
    frame.writeInt(count);
    frame.writeInt(payload.length);
    frame.writeFixed(payload);
    frame.writeFixed(MARKER);
    sink.write(frame.toBytes());
    return sink.toBytes();
  }

  it('rejects a block with bytes left after its last record', () => {
    const payload = Uint8Array.from([...encode(TEST, row('a')), 0x00]);
    expect(() => open(withFrame(1, payload)).next()).toThrow(CorruptFileError);
  });

  it('reports a record running past the block payload as UnexpectedEof', () => {
    const reader = open(withFrame(2, encode(TEST, row('a'))));
    expect(reader.next()).toEqual({ done: false, value: Value.record([['field', Value.string('a')]]) });
    expect(reader.state).toBe('decoding-block');
    expect(() => reader.next()).toThrow(UnexpectedEofError);
  });

  it('skips empty blocks', () => {
    const sink = new BufferSink();
    const writer = ContainerWriter.open(TEST, sink, { syncMarker: MARKER });
    const empty = new ByteWriter();
    empty.writeInt(0);
    empty.writeInt(0);
    empty.writeFixed(MARKER);
    sink.write(empty.toBytes());
    writer.append(row('after'));
    writer.close();

    const reader = open(sink.toBytes());
    expect(reader.readAll()).toEqual([row('after')]);
    expect(reader.blockCount).toBe(2);
  });
});
