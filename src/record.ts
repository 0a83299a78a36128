/**
 * binrec — record builder
 *
 * Accumulates field values for one record schema and produces a record
 * Value in declared field order. Each put() is validated on the spot, so a
 * bad value is reported at the call that supplied it rather than at encode.
 */

import { assertValidNode } from './encode';
import { MissingFieldError, SchemaMismatchError } from './errors';
import { deref, type FieldSchema, type NamedSchema, type RecordSchema, type Schema, type Value } from './types';
import { toValueNode } from './value';

function isValue(x: unknown): x is Value {
  if (typeof x !== 'object' || x === null || !('type' in x)) return false;
  const t: unknown = x.type;
  return typeof t === 'string' && VALUE_TYPES.has(t);
}

const VALUE_TYPES: ReadonlySet<string> = new Set([
  'null', 'boolean', 'int', 'long', 'float', 'double', 'bytes', 'string',
  'fixed', 'enum', 'array', 'map', 'union', 'record',
]);

export class RecordBuilder {
  private readonly values = new Map<string, Value>();
  private readonly byName: ReadonlyMap<string, FieldSchema>;

  private constructor(
    private readonly names:  ReadonlyMap<string, NamedSchema>,
    readonly record:          RecordSchema,
  ) {
    this.byName = new Map(record.fields.map(f => [f.name, f]));
  }

  /**
   * @throws SchemaMismatchError if the schema's root is not a record.
   */
  static create(schema: Schema): RecordBuilder {
    const root = deref(schema.names, schema.root);
    if (root.kind !== 'record') {
      throw new SchemaMismatchError(`RecordBuilder needs a record schema, got ${root.kind}`);
    }
    return new RecordBuilder(schema.names, root);
  }

  /**
   * Set a field. `value` is either a Value, validated against the field
   * schema, or plain data converted with toValue(). A later put() of the
   * same field replaces the earlier one.
   *
   * @throws SchemaMismatchError for an unknown field or a value that does
   *         not fit the field schema; the builder is unchanged.
   */
  put(field: string, value: unknown): this {
    const f = this.byName.get(field);
    if (f === undefined) {
      throw new SchemaMismatchError(`record ${this.record.name} has no field '${field}'`);
    }
    const path = `$.${field}`;
    if (isValue(value)) {
      assertValidNode(this.names, f.type, value, path);
      this.values.set(field, value);
    } else {
      this.values.set(field, this.convert(f, value, path));
    }
    return this;
  }

  /** Nested plain data missing a field does not fit the field schema. */
  private convert(f: FieldSchema, value: unknown, path: string): Value {
    try {
      return toValueNode(this.names, f.type, value, path);
    } catch (err) {
      if (err instanceof MissingFieldError) throw new SchemaMismatchError(err.message, path);
      throw err;
    }
  }

  has(field: string): boolean {
    return this.values.has(field);
  }

  /**
   * The finished record. Fields not put take their schema default.
   *
   * @throws MissingFieldError naming the first field with neither.
   */
  finalize(): Value {
    const fields = this.record.fields.map((f): readonly [string, Value] => {
      const v = this.values.get(f.name) ?? f.default;
      if (v === undefined) throw new MissingFieldError(this.record.name, f.name);
      return [f.name, v];
    });
    return { type: 'record', fields };
  }
}
