/**
 * binrec — RecordBuilder
 */

import { describe, it, expect } from 'vitest';
import {
  MissingFieldError,
  RecordBuilder,
  SchemaMismatchError,
  Value,
  parseSchema,
  parseSchemaJson,
  validate,
} from '../src/index';

const USER = parseSchemaJson({
  type: 'record', name: 'User',
  fields: [
    { name: 'name',  type: 'string' },
    { name: 'age',   type: 'int', default: 0 },
    { name: 'email', type: ['null', 'string'], default: null },
  ],
});

describe('RecordBuilder', () => {

  it('fills unset fields from their defaults, in declared order', () => {
    const record = RecordBuilder.create(USER).put('name', Value.string('ada')).finalize();
    expect(record).toEqual(Value.record([
      ['name', Value.string('ada')],
      ['age', Value.int(0)],
      ['email', Value.union(0, Value.null())],
    ]));
    expect(validate(USER, record)).toBe(true);
  });

  it('explicit values override defaults, whatever order they are put in', () => {
    const record = RecordBuilder.create(USER)
      .put('email', Value.union(1, Value.string('a@example.com')))
      .put('age', Value.int(36))
      .put('name', Value.string('ada'))
      .finalize();
    expect(record.type === 'record' && record.fields.map(([k]) => k)).toEqual(['name', 'age', 'email']);
    expect(record.type === 'record' && record.fields[1]).toEqual(['age', Value.int(36)]);
  });

  it('converts plain data with the field schema', () => {
    const record = RecordBuilder.create(USER).put('name', 'lin').put('age', 42).put('email', 'l@example.com').finalize();
    expect(record).toEqual(Value.record([
      ['name', Value.string('lin')],
      ['age', Value.int(42)],
      ['email', Value.union(1, Value.string('l@example.com'))],
    ]));
  });

  it('a later put replaces an earlier one', () => {
    const b = RecordBuilder.create(USER).put('name', 'first').put('name', 'second');
    expect(b.has('name')).toBe(true);
    expect(b.finalize()).toEqual(Value.record([
      ['name', Value.string('second')],
      ['age', Value.int(0)],
      ['email', Value.union(0, Value.null())],
    ]));
  });

  it('finalize fails with MissingFieldError for a field with no value and no default', () => {
    const b = RecordBuilder.create(USER).put('age', 3);
    expect(() => b.finalize()).toThrow(MissingFieldError);
    try {
      b.finalize();
    } catch (err) {
      expect(err instanceof MissingFieldError && err.field).toBe('name');
      expect(err instanceof MissingFieldError && err.record).toBe('User');
    }
  });

  it('put rejects unknown fields and mistyped values, leaving the builder unchanged', () => {
    const b = RecordBuilder.create(USER);
    expect(() => b.put('nickname', 'x')).toThrow(SchemaMismatchError);
    expect(() => b.put('age', Value.string('old'))).toThrow(SchemaMismatchError);
    expect(() => b.put('age', 'old')).toThrow(SchemaMismatchError);
    expect(b.has('age')).toBe(false);
  });

  it('put reports nested plain data without a required field as a type mismatch', () => {
    const outer = parseSchemaJson({
      type: 'record', name: 'Outer',
      fields: [{ name: 'inner', type: { type: 'record', name: 'Inner', fields: [{ name: 'x', type: 'int' }] } }],
    });
    const b = RecordBuilder.create(outer);
    expect(() => b.put('inner', {})).toThrow(SchemaMismatchError);
    expect(b.has('inner')).toBe(false);
  });

  it('create rejects a schema whose root is not a record', () => {
    expect(() => RecordBuilder.create(parseSchema('"string"'))).toThrow(SchemaMismatchError);
  });

  it('builds records of a recursive schema', () => {
    const list = parseSchemaJson({
      type: 'record', name: 'Node',
      fields: [{ name: 'value', type: 'int' }, { name: 'next', type: ['null', 'Node'], default: null }],
    });
    const tail = RecordBuilder.create(list).put('value', 2).finalize();
    const head = RecordBuilder.create(list).put('value', 1).put('next', Value.union(1, tail)).finalize();
    expect(validate(list, head)).toBe(true);
  });
});
