/**
 * binrec — schema parsing, rendering and fingerprinting
 */

import { describe, it, expect } from 'vitest';
import {
  Value,
  SchemaError,
  canonicalForm,
  parseSchema,
  parseSchemaJson,
  resolveNamed,
  schemaFingerprint,
  schemaToText,
  type RecordSchema,
} from '../src/index';

const TEST_SCHEMA = '{"type":"record","name":"Test","fields":[{"name":"field","type":"string"}]}';

const LINKED_LIST = JSON.stringify({
  type:      'record',
  name:      'Node',
  namespace: 'com.example',
  fields: [
    { name: 'value', type: 'long' },
    { name: 'next',  type: ['null', 'Node'] },
  ],
});

function rootRecord(text: string): RecordSchema {
  const root = resolveNamed(parseSchema(text));
  if (root.kind !== 'record') throw new Error(`expected a record, got ${root.kind}`);
  return root;
}

// ─── Accepted forms ──────────────────────────────────────────────────────────

describe('parseSchema — accepted forms', () => {

  it('parses a primitive name and a primitive type object', () => {
    expect(parseSchema('"int"').root).toEqual({ kind: 'int' });
    expect(parseSchema('{"type":"bytes"}').root).toEqual({ kind: 'bytes' });
  });

  it('parses arrays, maps and unions', () => {
    expect(parseSchema('{"type":"array","items":"long"}').root)
      .toEqual({ kind: 'array', items: { kind: 'long' } });
    expect(parseSchema('{"type":"map","values":"string"}').root)
      .toEqual({ kind: 'map', values: { kind: 'string' } });
    expect(parseSchema('["null","string"]').root)
      .toEqual({ kind: 'union', branches: [{ kind: 'null' }, { kind: 'string' }] });
  });

  it('registers a record under its full name and references it from inside', () => {
    const schema = parseSchema(LINKED_LIST);
    expect([...schema.names.keys()]).toEqual(['com.example.Node']);
    const node = rootRecord(LINKED_LIST);
    expect(node.name).toBe('com.example.Node');
    expect(node.namespace).toBe('com.example');
    expect(node.fields[1]?.type).toEqual({
      kind:     'union',
      branches: [{ kind: 'null' }, { kind: 'ref', name: 'com.example.Node' }],
    });
  });

  it('nested definitions inherit the enclosing namespace', () => {
    const schema = parseSchemaJson({
      type: 'record', name: 'Outer', namespace: 'a.b',
      fields: [
        { name: 'inner', type: { type: 'enum', name: 'Color', symbols: ['RED', 'BLUE'] } },
        { name: 'other', type: { type: 'fixed', name: 'x.y.Hash', size: 4 } },
      ],
    });
    expect([...schema.names.keys()].sort()).toEqual(['a.b.Color', 'a.b.Outer', 'x.y.Hash']);
  });

  it('resolves a reference that appears before its definition', () => {
    const schema = parseSchemaJson({
      type: 'record', name: 'A',
      fields: [
        { name: 'first',  type: 'B' },
        { name: 'second', type: { type: 'record', name: 'B', fields: [{ name: 'n', type: 'int' }] } },
      ],
    });
    const root = resolveNamed(schema);
    expect(root.kind === 'record' && root.fields[0]?.type).toEqual({ kind: 'ref', name: 'B' });
  });

  it('parses field attributes and checks defaults', () => {
    const rec = rootRecord(JSON.stringify({
      type: 'record', name: 'R',
      fields: [
        { name: 'n',    type: 'long', default: 5, doc: 'a count', order: 'descending', aliases: ['count'] },
        { name: 'raw',  type: 'bytes', default: '\u00ff\u0001' },
        { name: 'opt',  type: ['null', 'int'], default: null },
        { name: 'tags', type: { type: 'array', items: 'string' }, default: ['a'] },
      ],
    }));
    const [n, raw, opt, tags] = rec.fields;
    expect(n?.default).toEqual(Value.long(5n));
    expect(n?.doc).toBe('a count');
    expect(n?.order).toBe('descending');
    expect(n?.aliases).toEqual(['count']);
    expect(raw?.default).toEqual(Value.bytes(Uint8Array.of(0xff, 0x01)));
    expect(opt?.default).toEqual(Value.union(0, Value.null()));
    expect(tags?.default).toEqual(Value.array([Value.string('a')]));
  });

  it('accepts an enum default symbol', () => {
    const root = resolveNamed(parseSchema('{"type":"enum","name":"E","symbols":["A","B"],"default":"B"}'));
    expect(root.kind === 'enum' && root.default).toBe('B');
  });
});

// ─── Rejected schemas ────────────────────────────────────────────────────────

describe('parseSchema — errors', () => {

  const rejects: Array<[string, unknown]> = [
    ['an unknown type name',          'foo'],
    ['an unresolved reference',       { type: 'record', name: 'R', fields: [{ name: 'a', type: 'Missing' }] }],
    ['a duplicate field name',        { type: 'record', name: 'R', fields: [{ name: 'a', type: 'int' }, { name: 'a', type: 'long' }] }],
    ['a duplicate enum symbol',       { type: 'enum', name: 'E', symbols: ['A', 'A'] }],
    ['a duplicate definition',        ['null', { type: 'fixed', name: 'F', size: 1 }, { type: 'record', name: 'R', fields: [{ name: 'f', type: { type: 'fixed', name: 'F', size: 2 } }] }]],
    ['an invalid name',               { type: 'fixed', name: '1bad', size: 1 }],
    ['a primitive name for a type',   { type: 'fixed', name: 'int', size: 1 }],
    ['a negative fixed size',         { type: 'fixed', name: 'F', size: -1 }],
    ['an empty union',                []],
    ['a union inside a union',        ['null', ['int']]],
    ['two ints in a union',           ['int', 'int']],
    ['an ambiguous union',            [{ type: 'fixed', name: 'a.X', size: 1 }, { type: 'fixed', name: 'b.X', size: 1 }]],
    ['a default of the wrong type',   { type: 'record', name: 'R', fields: [{ name: 'a', type: 'int', default: 'x' }] }],
    ['a union default for branch 1',  { type: 'record', name: 'R', fields: [{ name: 'a', type: ['null', 'int'], default: 1 }] }],
    ['a long default beyond 2^53',    { type: 'record', name: 'R', fields: [{ name: 'x', type: 'long', default: 1e30 }] }],
    ['a string default with a lone surrogate', { type: 'record', name: 'R', fields: [{ name: 's', type: 'string', default: 'a\uD800' }] }],
    ['an enum default not a symbol',  { type: 'enum', name: 'E', symbols: ['A'], default: 'Z' }],
    ['an array without items',        { type: 'array' }],
    ['a record without fields',       { type: 'record', name: 'R' }],
    ['a bad field order',             { type: 'record', name: 'R', fields: [{ name: 'a', type: 'int', order: 'up' }] }],
  ];

  for (const [what, json] of rejects) {
    it(`rejects ${what}`, () => {
      expect(() => parseSchemaJson(json)).toThrow(SchemaError);
    });
  }

  it('rejects text that is not JSON', () => {
    expect(() => parseSchema('{"type":')).toThrow(SchemaError);
  });

  it('reports the field of a bad default', () => {
    expect(() => parseSchemaJson({ type: 'record', name: 'R', fields: [{ name: 'a', type: 'int', default: 'x' }] }))
      .toThrow(/R\.a/);
  });
});

// ─── Rendering ───────────────────────────────────────────────────────────────

describe('schemaToText', () => {

  it('renders a simple record as compact JSON', () => {
    expect(schemaToText(parseSchema(TEST_SCHEMA))).toBe(TEST_SCHEMA);
  });

  it('writes a named type once and refers to it by full name afterwards', () => {
    expect(schemaToText(parseSchema(LINKED_LIST))).toBe(
      '{"type":"record","name":"com.example.Node","fields":[' +
      '{"name":"value","type":"long"},' +
      '{"name":"next","type":["null","com.example.Node"]}]}',
    );
  });

  it('marks a null-namespace type nested in a namespaced record', () => {
    const schema = parseSchemaJson({
      type: 'record', name: 'Outer', namespace: 'com.example',
      fields: [{
        name: 'inner',
        type: { type: 'record', name: 'Inner', namespace: '', fields: [{ name: 'x', type: 'int' }] },
      }],
    });
    const text = schemaToText(schema);
    expect(text).toBe(
      '{"type":"record","name":"com.example.Outer","fields":[{"name":"inner","type":' +
      '{"type":"record","name":"Inner","namespace":"","fields":[{"name":"x","type":"int"}]}}]}',
    );
    const again = parseSchema(text);
    expect(again.names.has('Inner')).toBe(true);
    expect(again.names.has('com.example.Inner')).toBe(false);
    expect(schemaFingerprint(again)).toBe(schemaFingerprint(schema));
  });

  it('writes the largest exact long default back unchanged', () => {
    const text = '{"type":"record","name":"R","fields":[{"name":"x","type":"long","default":9007199254740991}]}';
    expect(schemaToText(parseSchema(text))).toBe(text);
    const rec = resolveNamed(parseSchema(text));
    expect(rec.kind === 'record' && rec.fields[0]?.default).toEqual(Value.long(9007199254740991n));
  });

  it('round-trips docs, aliases, orders and defaults', () => {
    const text = JSON.stringify({
      type: 'record', name: 'R', doc: 'a record', aliases: ['Old'],
      fields: [
        { name: 'a', type: 'int', doc: 'field a', default: 3, order: 'ignore', aliases: ['x'] },
        { name: 'e', type: { type: 'enum', name: 'E', symbols: ['P', 'Q'], default: 'Q' }, default: 'P' },
      ],
    });
    const again = parseSchema(schemaToText(parseSchema(text)));
    expect(schemaToText(again)).toBe(schemaToText(parseSchema(text)));
    const rec = resolveNamed(again);
    expect(rec.kind === 'record' && rec.aliases).toEqual(['Old']);
    expect(rec.kind === 'record' && rec.fields[0]?.default).toEqual(Value.int(3));
  });
});

// ─── Canonical form / fingerprint ────────────────────────────────────────────

describe('canonicalForm / schemaFingerprint', () => {

  it('keeps only decoding attributes in a fixed order', () => {
    const text = '{"doc":"x","fields":[{"type":"string","name":"field","default":"d"}],"name":"Test","type":"record"}';
    expect(canonicalForm(parseSchema(text)))
      .toBe('{"name":"Test","type":"record","fields":[{"name":"field","type":"string"}]}');
  });

  it('ignores docs and whitespace in the fingerprint', () => {
    const a = parseSchema(TEST_SCHEMA);
    const b = parseSchema('{ "type": "record", "name": "Test", "doc": "d",\n "fields": [ { "name": "field", "type": "string" } ] }');
    expect(schemaFingerprint(a)).toBe(schemaFingerprint(b));
  });

  it('changes the fingerprint when a field type changes', () => {
    const a = parseSchema(TEST_SCHEMA);
    const b = parseSchema(TEST_SCHEMA.replace('"string"', '"bytes"'));
    expect(schemaFingerprint(a)).not.toBe(schemaFingerprint(b));
  });

  it('is an unsigned 32-bit integer', () => {
    const fp = schemaFingerprint(parseSchema(LINKED_LIST));
    expect(Number.isInteger(fp)).toBe(true);
    expect(fp).toBeGreaterThanOrEqual(0);
    expect(fp).toBeLessThanOrEqual(0xffffffff);
  });
});
