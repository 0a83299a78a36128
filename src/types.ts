/**
 * binrec — type definitions
 *
 * Two closed tagged unions carry the whole design:
 *
 *   SchemaNode  discriminated on `kind`  — what the bytes mean
 *   Value       discriminated on `type`  — a datum decoded from / encodable to bytes
 *
 * Every switch over either union ends in an `assertNever`, so adding a kind
 * is a compile error everywhere it has to be handled.
 */

import { SchemaError } from './errors';

// ─── Schema ───────────────────────────────────────────────────────────────────

export type PrimitiveKind =
  | 'null'
  | 'boolean'
  | 'int'
  | 'long'
  | 'float'
  | 'double'
  | 'bytes'
  | 'string';

export const PRIMITIVE_KINDS: ReadonlySet<string> = new Set<PrimitiveKind>([
  'null', 'boolean', 'int', 'long', 'float', 'double', 'bytes', 'string',
]);

// Distributes into one object type per kind so that `switch (node.kind)`
// narrows each primitive case on its own.
type PrimitiveSchemaOf<K> = K extends PrimitiveKind ? { readonly kind: K } : never;

export type PrimitiveSchema = PrimitiveSchemaOf<PrimitiveKind>;

/** Common attributes of record, enum and fixed. */
export interface NamedAttributes {
  /** Fully-qualified name: `namespace.name`, or just `name` without a namespace. */
  readonly name:       string;
  readonly namespace?: string;
  /** Fully-qualified alias names. */
  readonly aliases:    readonly string[];
  readonly doc?:       string;
}

export interface FixedSchema extends NamedAttributes {
  readonly kind: 'fixed';
  readonly size: number;
}

export interface EnumSchema extends NamedAttributes {
  readonly kind:     'enum';
  readonly symbols:  readonly string[];
  /** Symbol substituted when a reader meets a writer symbol it does not know. */
  readonly default?: string;
}

export type FieldOrder = 'ascending' | 'descending' | 'ignore';

/**
 * One field of a record.
 *
 * `default` is the parsed Value of the JSON default literal, type-checked
 * against `type` at parse time. `defaultJson` keeps the literal as written
 * so the schema can be rendered back to text unchanged.
 */
export interface FieldSchema {
  readonly name:         string;
  readonly type:         SchemaNode;
  readonly aliases:      readonly string[];
  readonly order:        FieldOrder;
  readonly doc?:         string;
  readonly default?:     Value;
  readonly defaultJson?: unknown;
}

export interface RecordSchema extends NamedAttributes {
  readonly kind:   'record';
  readonly fields: readonly FieldSchema[];
}

export interface ArraySchema {
  readonly kind:  'array';
  readonly items: SchemaNode;
}

export interface MapSchema {
  readonly kind:   'map';
  readonly values: SchemaNode;
}

export interface UnionSchema {
  readonly kind:     'union';
  readonly branches: readonly SchemaNode[];
}

/**
 * A use of a named type after its definition (or before it: references are
 * resolved by name, so definition order does not matter). `name` is the
 * full name and the key into Schema.names.
 */
export interface RefSchema {
  readonly kind: 'ref';
  readonly name: string;
}

export type NamedSchema = RecordSchema | EnumSchema | FixedSchema;

export type SchemaNode =
  | PrimitiveSchema
  | FixedSchema
  | EnumSchema
  | ArraySchema
  | MapSchema
  | UnionSchema
  | RecordSchema
  | RefSchema;

/**
 * A parsed schema document.
 *
 * Each named type is defined exactly once, in `names`; `ref` nodes anywhere
 * in the graph point back into it by full name. Recursive and mutually
 * recursive records are therefore plain data with no object cycles.
 */
export interface Schema {
  readonly root:  SchemaNode;
  readonly names: ReadonlyMap<string, NamedSchema>;
}

// ─── Value ────────────────────────────────────────────────────────────────────

export type Value =
  | { readonly type: 'null' }
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'int';     readonly value: number }
  | { readonly type: 'long';    readonly value: bigint }
  | { readonly type: 'float';   readonly value: number }
  | { readonly type: 'double';  readonly value: number }
  | { readonly type: 'bytes';   readonly value: Uint8Array }
  | { readonly type: 'string';  readonly value: string }
  | { readonly type: 'fixed';   readonly value: Uint8Array }
  | { readonly type: 'enum';    readonly index: number; readonly symbol: string }
  | { readonly type: 'array';   readonly items: readonly Value[] }
  | { readonly type: 'map';     readonly entries: ReadonlyMap<string, Value> }
  | { readonly type: 'union';   readonly index: number; readonly value: Value }
  | { readonly type: 'record';  readonly fields: ReadonlyArray<readonly [string, Value]> };

export type ValueType = Value['type'];

/** Narrow a Value to one variant. */
export type ValueOf<T extends ValueType> = Extract<Value, { type: T }>;

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function assertNever(x: never, what: string): never {
  throw new TypeError(`Unhandled ${what}: ${JSON.stringify(x)}`);
}

export function isNamed(node: SchemaNode): node is NamedSchema {
  return node.kind === 'record' || node.kind === 'enum' || node.kind === 'fixed';
}

/** Simple (unqualified) part of a full name. */
export function simpleName(fullname: string): string {
  const dot = fullname.lastIndexOf('.');
  return dot < 0 ? fullname : fullname.slice(dot + 1);
}

/** Follow a `ref` node to its definition. Non-ref nodes are returned as-is. */
export function deref(
  names: ReadonlyMap<string, NamedSchema>,
  node:  SchemaNode,
): Exclude<SchemaNode, RefSchema> {
  if (node.kind !== 'ref') return node;
  const def = names.get(node.name);
  if (def === undefined) {
    throw new SchemaError(`Reference to undefined named type '${node.name}'.`);
  }
  return def;
}
