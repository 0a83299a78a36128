/**
 * binrec — schema parsing, rendering, canonical form and fingerprinting
 *
 * Schema text is JSON:
 *
 *   "int"                                   primitive
 *   "com.example.Point"                     reference to a named type
 *   ["null", "string"]                      union
 *   { "type": "record", "name": "Point",
 *     "fields": [{ "name": "x", "type": "int", "default": 0 }] }
 *   { "type": "enum",  "name": "Suit", "symbols": ["HEARTS", "SPADES"] }
 *   { "type": "fixed", "name": "Md5",  "size": 16 }
 *   { "type": "array", "items": "long" }
 *   { "type": "map",   "values": "bytes" }
 *
 * Parsing is two-pass. Pass one walks the whole document and collects every
 * named definition under its full name. Pass two builds the graph; a name
 * used anywhere resolves against the pass-one table, so forward references
 * and mutually recursive records need nothing special. Field defaults are
 * checked last, once every named type exists.
 *
 * The fingerprint is the FNV-1a 32-bit hash of the Parsing Canonical Form.
 * Two schemas that decode bytes identically share a fingerprint regardless
 * of docs, aliases, defaults or whitespace.
 */

import { SchemaError, SchemaMismatchError } from './errors';
import { encodeUtf8 } from './io';
import {
  PRIMITIVE_KINDS,
  assertNever,
  deref,
  isNamed,
  simpleName,
  type EnumSchema,
  type FieldOrder,
  type FieldSchema,
  type FixedSchema,
  type NamedSchema,
  type PrimitiveKind,
  type RecordSchema,
  type Schema,
  type SchemaNode,
  type UnionSchema,
  type Value,
} from './types';
import { bytesToLatin1, defaultToValue, isPlainObject } from './value';

// ─── Names ────────────────────────────────────────────────────────────────────

const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

const FIELD_ORDERS: ReadonlySet<string> = new Set<FieldOrder>(['ascending', 'descending', 'ignore']);

function isPrimitiveKind(s: string): s is PrimitiveKind {
  return PRIMITIVE_KINDS.has(s);
}

function isFieldOrder(x: unknown): x is FieldOrder {
  return typeof x === 'string' && FIELD_ORDERS.has(x);
}

function isStringArray(x: unknown): x is readonly string[] {
  return Array.isArray(x) && x.every(a => typeof a === 'string');
}

function validateFullname(fullname: string, what: string): void {
  for (const part of fullname.split('.')) {
    if (!NAME_RE.test(part)) {
      throw new SchemaError(`Invalid ${what} '${fullname}': each dot-separated part must match ${NAME_RE.source}.`);
    }
  }
}

/**
 * Full name of `name` declared inside `namespace`. A name containing a dot
 * is already full; an empty namespace is the null namespace.
 */
function qualify(name: string, namespace: string | undefined): string {
  if (name.includes('.') || namespace === undefined || namespace === '') return name;
  return `${namespace}.${name}`;
}

function namespaceOf(fullname: string): string | undefined {
  const dot = fullname.lastIndexOf('.');
  return dot < 0 ? undefined : fullname.slice(0, dot);
}

/** Full name and effective namespace of a named definition object. */
function definitionName(json: Record<string, unknown>, enclosing: string | undefined): string {
  const name = json['name'];
  if (typeof name !== 'string' || name === '') {
    throw new SchemaError(`Named type '${String(json['type'])}' requires a non-empty string 'name'.`);
  }
  const ns = json['namespace'];
  if (ns !== undefined && ns !== null && typeof ns !== 'string') {
    throw new SchemaError(`'namespace' of '${name}' must be a string.`);
  }
  const fullname = qualify(name, typeof ns === 'string' ? ns : enclosing);
  validateFullname(fullname, 'name');
  if (isPrimitiveKind(simpleName(fullname))) {
    throw new SchemaError(`Named type '${fullname}' may not use the primitive name '${simpleName(fullname)}'.`);
  }
  return fullname;
}

function isDefinitionType(t: unknown): t is 'record' | 'error' | 'enum' | 'fixed' {
  return t === 'record' || t === 'error' || t === 'enum' || t === 'fixed';
}

// ─── Pass one: collect definitions ────────────────────────────────────────────

function collect(json: unknown, enclosing: string | undefined, defined: Set<string>): void {
  if (Array.isArray(json)) {
    for (const branch of json) collect(branch, enclosing, defined);
    return;
  }
  if (!isPlainObject(json)) return;

  const type = json['type'];
  if (isDefinitionType(type)) {
    const fullname = definitionName(json, enclosing);
    if (defined.has(fullname)) {
      throw new SchemaError(`Named type '${fullname}' is defined more than once.`);
    }
    defined.add(fullname);
    const fields = json['fields'];
    if ((type === 'record' || type === 'error') && Array.isArray(fields)) {
      for (const f of fields) {
        if (isPlainObject(f)) collect(f['type'], namespaceOf(fullname), defined);
      }
    }
    return;
  }
  if (type === 'array') collect(json['items'], enclosing, defined);
  else if (type === 'map') collect(json['values'], enclosing, defined);
  else collect(type, enclosing, defined);
}

// ─── Pass two: build the graph ────────────────────────────────────────────────

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

interface PendingDefault {
  readonly field:  Mutable<FieldSchema>;
  readonly record: string;
}

class SchemaBuilder {
  readonly names   = new Map<string, NamedSchema>();
  readonly pending: PendingDefault[] = [];

  constructor(private readonly defined: ReadonlySet<string>) {}

  build(json: unknown, ns: string | undefined): SchemaNode {
    if (typeof json === 'string') return this.reference(json, ns);
    if (Array.isArray(json)) return this.union(json, ns);
    if (!isPlainObject(json)) {
      throw new SchemaError(`Expected a type name, union array or type object; got ${JSON.stringify(json)}.`);
    }

    const type = json['type'];
    if (typeof type === 'string') {
      if (isPrimitiveKind(type)) return { kind: type };
      switch (type) {
        case 'record':
        case 'error':
          return this.record(json, ns);
        case 'enum':
          return this.enumeration(json, ns);
        case 'fixed':
          return this.fixed(json, ns);
        case 'array':
          if (!('items' in json)) throw new SchemaError(`Array type requires 'items'.`);
          return { kind: 'array', items: this.build(json['items'], ns) };
        case 'map':
          if (!('values' in json)) throw new SchemaError(`Map type requires 'values'.`);
          return { kind: 'map', values: this.build(json['values'], ns) };
        default:
          return this.reference(type, ns);
      }
    }
    if (Array.isArray(type) || isPlainObject(type)) return this.build(type, ns);
    throw new SchemaError(`Type object is missing a valid 'type' attribute: ${JSON.stringify(json)}.`);
  }

  private reference(name: string, ns: string | undefined): SchemaNode {
    if (isPrimitiveKind(name)) return { kind: name };
    const candidates = [qualify(name, ns), name];
    const fullname = candidates.find(c => this.defined.has(c));
    if (fullname === undefined) {
      throw new SchemaError(`Unknown type '${name}': not a primitive and no named type of that name is defined.`);
    }
    return { kind: 'ref', name: fullname };
  }

  private union(json: readonly unknown[], ns: string | undefined): UnionSchema {
    if (json.length === 0) throw new SchemaError('A union must have at least one branch.');
    const branches = json.map(b => this.build(b, ns));
    const seenKinds  = new Set<string>();
    const seenSimple = new Map<string, string>();

    for (const b of branches) {
      if (b.kind === 'union') throw new SchemaError('A union may not directly contain another union.');
      if (b.kind === 'ref' || isNamed(b)) {
        const short = simpleName(b.name);
        const prior = seenSimple.get(short);
        if (prior === b.name) {
          throw new SchemaError(`Union contains '${b.name}' more than once.`);
        }
        if (prior !== undefined) {
          throw new SchemaError(
            `Union branches '${prior}' and '${b.name}' share the simple name '${short}'; ` +
            `the branch a reader picks would be ambiguous.`,
          );
        }
        seenSimple.set(short, b.name);
      } else {
        if (seenKinds.has(b.kind)) throw new SchemaError(`Union contains more than one '${b.kind}' branch.`);
        seenKinds.add(b.kind);
      }
    }
    return { kind: 'union', branches };
  }

  private common(json: Record<string, unknown>, ns: string | undefined) {
    const name = definitionName(json, ns);
    const namespace = namespaceOf(name);
    const doc = json['doc'];
    return {
      name,
      ...(namespace !== undefined ? { namespace } : {}),
      aliases: this.aliases(json['aliases'], namespace, name),
      ...(typeof doc === 'string' ? { doc } : {}),
    };
  }

  private aliases(raw: unknown, ns: string | undefined, owner: string): string[] {
    if (raw === undefined) return [];
    if (!isStringArray(raw)) {
      throw new SchemaError(`'aliases' of '${owner}' must be an array of strings.`);
    }
    return raw.map(a => {
      const full = qualify(a, ns);
      validateFullname(full, 'alias');
      return full;
    });
  }

  private register<T extends NamedSchema>(node: T): T {
    this.names.set(node.name, node);
    return node;
  }

  private record(json: Record<string, unknown>, ns: string | undefined): RecordSchema {
    const common = this.common(json, ns);
    const rawFields = json['fields'];
    if (!Array.isArray(rawFields)) {
      throw new SchemaError(`Record '${common.name}' requires a 'fields' array.`);
    }

    // Register before building fields so the node is in place for anything
    // that walks `names` later; fields that refer back to this record
    // are `ref` nodes and never need the object itself.
    const fields: FieldSchema[] = [];
    const node = this.register<RecordSchema>({ kind: 'record', ...common, fields });
    const fieldNs = namespaceOf(common.name);
    const seen = new Set<string>();

    for (const raw of rawFields) {
      if (!isPlainObject(raw)) {
        throw new SchemaError(`Fields of record '${common.name}' must be objects.`);
      }
      const name = raw['name'];
      if (typeof name !== 'string' || !NAME_RE.test(name)) {
        throw new SchemaError(`Record '${common.name}' has a field with invalid name ${JSON.stringify(name)}.`);
      }
      if (seen.has(name)) {
        throw new SchemaError(`Record '${common.name}' declares field '${name}' more than once.`);
      }
      seen.add(name);
      if (!('type' in raw)) {
        throw new SchemaError(`Field '${common.name}.${name}' has no 'type'.`);
      }

      const order = raw['order'] ?? 'ascending';
      if (!isFieldOrder(order)) {
        throw new SchemaError(`Field '${common.name}.${name}' has invalid order ${JSON.stringify(order)}.`);
      }
      const aliases = raw['aliases'] ?? [];
      if (!isStringArray(aliases)) {
        throw new SchemaError(`'aliases' of field '${common.name}.${name}' must be an array of strings.`);
      }
      const doc = raw['doc'];

      const field: Mutable<FieldSchema> = {
        name,
        type:    this.build(raw['type'], fieldNs),
        aliases: [...aliases],
        order,
        ...(typeof doc === 'string' ? { doc } : {}),
      };
      if ('default' in raw) {
        field.defaultJson = raw['default'];
        this.pending.push({ field, record: common.name });
      }
      fields.push(field);
    }
    return node;
  }

  private enumeration(json: Record<string, unknown>, ns: string | undefined): EnumSchema {
    const common = this.common(json, ns);
    const symbols = json['symbols'];
    if (!isStringArray(symbols)) {
      throw new SchemaError(`Enum '${common.name}' requires a 'symbols' array of strings.`);
    }
    const seen = new Set<string>();
    for (const s of symbols) {
      if (!NAME_RE.test(s)) throw new SchemaError(`Enum '${common.name}' has invalid symbol '${s}'.`);
      if (seen.has(s)) throw new SchemaError(`Enum '${common.name}' declares symbol '${s}' more than once.`);
      seen.add(s);
    }
    const def = json['default'];
    if (def !== undefined && (typeof def !== 'string' || !seen.has(def))) {
      throw new SchemaError(`Enum '${common.name}' default ${JSON.stringify(def)} is not one of its symbols.`);
    }
    return this.register<EnumSchema>({
      kind: 'enum',
      ...common,
      symbols: [...symbols],
      ...(typeof def === 'string' ? { default: def } : {}),
    });
  }

  private fixed(json: Record<string, unknown>, ns: string | undefined): FixedSchema {
    const common = this.common(json, ns);
    const size = json['size'];
    if (typeof size !== 'number' || !Number.isSafeInteger(size) || size < 0) {
      throw new SchemaError(`Fixed '${common.name}' requires a non-negative integer 'size'.`);
    }
    return this.register<FixedSchema>({ kind: 'fixed', ...common, size });
  }

  /** Type-check every field default now that all named types exist. */
  resolveDefaults(): void {
    for (const { field, record } of this.pending) {
      try {
        field.default = defaultToValue(this.names, field.type, field.defaultJson);
      } catch (err) {
        if (err instanceof SchemaMismatchError) {
          throw new SchemaError(`Invalid default for field '${record}.${field.name}': ${err.message}`);
        }
        throw err;
      }
    }
  }
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

/**
 * Parse a schema from its JSON text.
 *
 * @throws SchemaError on malformed JSON or any structural problem; nothing
 *         is returned for a schema that is partially valid.
 */
export function parseSchema(text: string): Schema {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new SchemaError(`Schema text is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSchemaJson(json);
}

/** Parse a schema from an already-decoded JSON value. */
export function parseSchemaJson(json: unknown): Schema {
  const defined = new Set<string>();
  collect(json, undefined, defined);

  const builder = new SchemaBuilder(defined);
  const root = builder.build(json, undefined);
  builder.resolveDefaults();
  return { root, names: builder.names };
}

/**
 * View a node of an existing schema as a schema of its own, sharing the
 * named-type table. Used to hand a field's schema to the record builder.
 */
export function subSchema(schema: Schema, node: SchemaNode): Schema {
  return { root: node, names: schema.names };
}

/** The definition behind `node` if it is a reference; `node` otherwise. */
export function resolveNamed(schema: Schema, node: SchemaNode = schema.root): Exclude<SchemaNode, { kind: 'ref' }> {
  return deref(schema.names, node);
}

// ─── Rendering ────────────────────────────────────────────────────────────────

/**
 * JSON form of a schema such that parseSchemaJson(schemaToJson(s)) is
 * equivalent to `s`. Named types are written in full where first met and
 * by full name after that.
 */
export function schemaToJson(schema: Schema): unknown {
  const written = new Set<string>();

  // `enclosing` is the namespace a nested definition would inherit on reparse.
  const render = (node: SchemaNode, enclosing: string | undefined): unknown => {
    switch (node.kind) {
      case 'null':
      case 'boolean':
      case 'int':
      case 'long':
      case 'float':
      case 'double':
      case 'bytes':
      case 'string':
        return node.kind;
      case 'ref':
        if (written.has(node.name)) return node.name;
        return render(deref(schema.names, node), enclosing);
      case 'array':
        return { type: 'array', items: render(node.items, enclosing) };
      case 'map':
        return { type: 'map', values: render(node.values, enclosing) };
      case 'union':
        return node.branches.map(b => render(b, enclosing));
      case 'record':
      case 'enum':
      case 'fixed': {
        if (written.has(node.name)) return node.name;
        written.add(node.name);
        const out: Record<string, unknown> = { type: node.kind, name: node.name };
        const ns = namespaceOf(node.name);
        // A full name carries its own namespace; only the null namespace needs saying.
        if (ns === undefined && enclosing !== undefined) out['namespace'] = '';
        if (node.doc !== undefined) out['doc'] = node.doc;
        if (node.aliases.length > 0) out['aliases'] = [...node.aliases];
        if (node.kind === 'fixed') {
          out['size'] = node.size;
        } else if (node.kind === 'enum') {
          out['symbols'] = [...node.symbols];
          if (node.default !== undefined) out['default'] = node.default;
        } else {
          out['fields'] = node.fields.map(f => {
            const field: Record<string, unknown> = { name: f.name, type: render(f.type, ns) };
            if (f.doc !== undefined) field['doc'] = f.doc;
            if (f.default !== undefined) field['default'] = defaultToJson(f.default);
            if (f.order !== 'ascending') field['order'] = f.order;
            if (f.aliases.length > 0) field['aliases'] = [...f.aliases];
            return field;
          });
        }
        return out;
      }
      default:
        return assertNever(node, 'schema kind');
    }
  };

  return render(schema.root, undefined);
}

/** Schema as compact JSON text; this is what a container header embeds. */
export function schemaToText(schema: Schema): string {
  return JSON.stringify(schemaToJson(schema));
}

/** JSON literal of a default Value, the inverse of defaultToValue. */
function defaultToJson(value: Value): unknown {
  switch (value.type) {
    case 'null':
      return null;
    case 'boolean':
    case 'int':
    case 'float':
    case 'double':
    case 'string':
      return value.value;
    case 'long':
      // Exact: defaultToValue only admits safe integers.
      return Number(value.value);
    case 'bytes':
    case 'fixed':
      return bytesToLatin1(value.value);
    case 'enum':
      return value.symbol;
    case 'array':
      return value.items.map(defaultToJson);
    case 'map':
      return Object.fromEntries([...value.entries].map(([k, v]) => [k, defaultToJson(v)]));
    case 'union':
      return defaultToJson(value.value);
    case 'record':
      return Object.fromEntries(value.fields.map(([k, v]) => [k, defaultToJson(v)]));
    default:
      return assertNever(value, 'value type');
  }
}

// ─── Canonical Form ───────────────────────────────────────────────────────────

/**
 * Parsing Canonical Form: full names, only the attributes that change how
 * bytes decode, attributes in the fixed order name, type, fields, symbols,
 * items, values, size, and no whitespace.
 */
export function canonicalForm(schema: Schema): string {
  const written = new Set<string>();

  const render = (node: SchemaNode): string => {
    switch (node.kind) {
      case 'null':
      case 'boolean':
      case 'int':
      case 'long':
      case 'float':
      case 'double':
      case 'bytes':
      case 'string':
        return JSON.stringify(node.kind);
      case 'ref':
        if (written.has(node.name)) return JSON.stringify(node.name);
        return render(deref(schema.names, node));
      case 'array':
        return `{"type":"array","items":${render(node.items)}}`;
      case 'map':
        return `{"type":"map","values":${render(node.values)}}`;
      case 'union':
        return `[${node.branches.map(render).join(',')}]`;
      case 'record': {
        if (written.has(node.name)) return JSON.stringify(node.name);
        written.add(node.name);
        const fields = node.fields
          .map(f => `{"name":${JSON.stringify(f.name)},"type":${render(f.type)}}`)
          .join(',');
        return `{"name":${JSON.stringify(node.name)},"type":"record","fields":[${fields}]}`;
      }
      case 'enum': {
        if (written.has(node.name)) return JSON.stringify(node.name);
        written.add(node.name);
        return `{"name":${JSON.stringify(node.name)},"type":"enum","symbols":${JSON.stringify(node.symbols)}}`;
      }
      case 'fixed': {
        if (written.has(node.name)) return JSON.stringify(node.name);
        written.add(node.name);
        return `{"name":${JSON.stringify(node.name)},"type":"fixed","size":${node.size}}`;
      }
      default:
        return assertNever(node, 'schema kind');
    }
  };

  return render(schema.root);
}

// ─── FNV-1a 32-bit ────────────────────────────────────────────────────────────

/** FNV-1a over the canonical-form bytes; Math.imul keeps the product in 32 bits. */
function fnv1a32(bytes: Uint8Array): number {
  let hash = 0x811c9dc5; // FNV offset basis
  for (const byte of bytes) {
    hash ^= byte;
    hash  = Math.imul(hash, 0x01000193); // FNV prime
  }
  return hash >>> 0; // coerce to u32
}

/** FNV-1a 32-bit hash of the schema's canonical form. */
export function schemaFingerprint(schema: Schema): number {
  return fnv1a32(encodeUtf8(canonicalForm(schema)));
}
