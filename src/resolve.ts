/**
 * binrec — writer/reader schema resolution
 *
 * Bytes are always laid out by the writer schema. When the caller wants
 * them in the shape of a different reader schema, resolveSchemas() walks
 * both schemas side by side once and produces a ReadPlan; decoding then
 * follows the plan without looking at either schema's rules again.
 *
 *   records  matched by name (or reader alias); fields matched by name (or
 *            reader field alias). Writer-only fields are read and dropped;
 *            reader-only fields take the reader default, and a reader-only
 *            field without one makes the pair unresolvable.
 *   numbers  int → long | float | double, long → float | double,
 *            float → double. Nothing narrows.
 *   text     string ↔ bytes.
 *   enums    writer symbols mapped to reader symbols by name; an unknown
 *            symbol falls back to the reader enum default, else fails when
 *            it is actually decoded.
 *   unions   each writer branch maps to the first reader branch of the same
 *            kind and name, else the first it can be promoted into. A writer
 *            branch with no match fails only when a value of it is decoded.
 *
 * Plans for named records are cached by (writer name, reader name) before
 * their fields are resolved, so recursive schemas produce finite plans.
 */

import { CorruptFileError, SchemaMismatchError } from './errors';
import { decodeNode, decode as decodePlain, minEncodedSize, readBlockCount } from './decode';
import { ByteReader, decodeUtf8 } from './io';
import {
  assertNever,
  deref,
  isNamed,
  simpleName,
  type EnumSchema,
  type NamedSchema,
  type RefSchema,
  type Schema,
  type SchemaNode,
  type Value,
} from './types';

type Names = ReadonlyMap<string, NamedSchema>;
type Concrete = Exclude<SchemaNode, RefSchema>;

type Promotion =
  | 'int->long'
  | 'int->float'
  | 'int->double'
  | 'long->float'
  | 'long->double'
  | 'float->double'
  | 'string->bytes'
  | 'bytes->string';

const PROMOTIONS: ReadonlySet<string> = new Set<Promotion>([
  'int->long', 'int->float', 'int->double',
  'long->float', 'long->double',
  'float->double',
  'string->bytes', 'bytes->string',
]);

function isPromotion(s: string): s is Promotion {
  return PROMOTIONS.has(s);
}

// ─── Plans ────────────────────────────────────────────────────────────────────

type FieldStep =
  | { readonly op: 'read'; readonly plan: ReadPlan; readonly target: number }
  | { readonly op: 'skip'; readonly node: SchemaNode };

interface RecordPlan {
  readonly op:      'record';
  readonly name:    string;
  /** Reader field names, in reader order. */
  readonly fields:  readonly string[];
  readonly steps:   FieldStep[];
  readonly defaults: Array<{ readonly target: number; readonly value: Value }>;
}

type BranchPlan =
  | { readonly ok: true;  readonly plan: ReadPlan }
  | { readonly ok: false; readonly reason: string };

export type ReadPlan =
  /** Writer and reader agree; decode the writer node as-is. */
  | { readonly op: 'direct'; readonly node: SchemaNode }
  | { readonly op: 'promote'; readonly promotion: Promotion }
  | {
      readonly op:      'enum';
      readonly writer:  EnumSchema;
      readonly reader:  EnumSchema;
      /** Reader index for each writer index; -1 where the symbol is unknown. */
      readonly mapping: readonly number[];
    }
  /** `itemBytes` / `entryBytes`: fewest writer bytes per item, to bound block counts. */
  | { readonly op: 'array'; readonly items: ReadPlan; readonly itemBytes: number }
  | { readonly op: 'map'; readonly values: ReadPlan; readonly entryBytes: number }
  | { readonly op: 'writer-union'; readonly branches: readonly BranchPlan[] }
  | { readonly op: 'reader-union'; readonly index: number; readonly plan: ReadPlan }
  | RecordPlan;

/** Outcome of resolving a writer schema against a reader schema. */
export interface Resolution {
  readonly writer: Schema;
  readonly reader: Schema;
  readonly plan:   ReadPlan;
}

// ─── Resolver ─────────────────────────────────────────────────────────────────

function namesMatch(w: NamedSchema, r: NamedSchema): boolean {
  const short = simpleName(w.name);
  if (w.name === r.name || short === simpleName(r.name)) return true;
  return r.aliases.some(a => a === w.name || simpleName(a) === short);
}

/** Same kind and, for named types, a matching name. No promotion. */
function sameKind(w: Concrete, r: Concrete): boolean {
  if (w.kind !== r.kind) return false;
  if (isNamed(w) && isNamed(r)) return namesMatch(w, r);
  return true;
}

class Resolver {
  private readonly records = new Map<string, RecordPlan>();

  constructor(
    private readonly writerNames: Names,
    private readonly readerNames: Names,
  ) {}

  resolve(wNode: SchemaNode, rNode: SchemaNode, path: string): ReadPlan {
    const w = deref(this.writerNames, wNode);
    const r = deref(this.readerNames, rNode);

    if (w.kind === 'union') {
      const branches = w.branches.map((wb, i): BranchPlan => {
        try {
          return { ok: true, plan: this.resolve(wb, r, path) };
        } catch (err) {
          if (!(err instanceof SchemaMismatchError)) throw err;
          return { ok: false, reason: `writer union branch ${i}: ${err.message}` };
        }
      });
      return { op: 'writer-union', branches };
    }

    if (r.kind === 'union') return this.intoReaderUnion(w, r.branches, path);

    switch (w.kind) {
      case 'null':
      case 'boolean':
      case 'int':
      case 'long':
      case 'float':
      case 'double':
      case 'bytes':
      case 'string': {
        if (w.kind === r.kind) return { op: 'direct', node: w };
        const promotion = `${w.kind}->${r.kind}`;
        if (isPromotion(promotion)) return { op: 'promote', promotion };
        throw new SchemaMismatchError(`writer ${w.kind} cannot be read as ${r.kind}`, path);
      }

      case 'fixed':
        if (r.kind !== 'fixed' || !namesMatch(w, r)) {
          throw new SchemaMismatchError(`writer fixed ${w.name} cannot be read as ${describeNode(r)}`, path);
        }
        if (w.size !== r.size) {
          throw new SchemaMismatchError(`fixed ${w.name} is ${w.size} bytes in the writer, ${r.size} in the reader`, path);
        }
        return { op: 'direct', node: w };

      case 'enum': {
        if (r.kind !== 'enum' || !namesMatch(w, r)) {
          throw new SchemaMismatchError(`writer enum ${w.name} cannot be read as ${describeNode(r)}`, path);
        }
        const fallback = r.default !== undefined ? r.symbols.indexOf(r.default) : -1;
        const mapping = w.symbols.map(s => {
          const i = r.symbols.indexOf(s);
          return i >= 0 ? i : fallback;
        });
        return { op: 'enum', writer: w, reader: r, mapping };
      }

      case 'array':
        if (r.kind !== 'array') {
          throw new SchemaMismatchError(`writer array cannot be read as ${describeNode(r)}`, path);
        }
        return {
          op:        'array',
          items:     this.resolve(w.items, r.items, `${path}[]`),
          itemBytes: minEncodedSize(this.writerNames, w.items),
        };

      case 'map':
        if (r.kind !== 'map') {
          throw new SchemaMismatchError(`writer map cannot be read as ${describeNode(r)}`, path);
        }
        return {
          op:         'map',
          values:     this.resolve(w.values, r.values, `${path}{}`),
          entryBytes: 1 + minEncodedSize(this.writerNames, w.values),
        };

      case 'record':
        if (r.kind !== 'record' || !namesMatch(w, r)) {
          throw new SchemaMismatchError(`writer record ${w.name} cannot be read as ${describeNode(r)}`, path);
        }
        return this.record(w, r, path);

      default:
        return assertNever(w, 'schema kind');
    }
  }

  private intoReaderUnion(w: Concrete, branches: readonly SchemaNode[], path: string): ReadPlan {
    const attempt = (index: number, exactOnly: boolean): ReadPlan | undefined => {
      const branch = branches[index];
      if (branch === undefined) return undefined;
      const r = deref(this.readerNames, branch);
      if (exactOnly && !sameKind(w, r)) return undefined;
      try {
        return { op: 'reader-union', index, plan: this.resolve(w, r, path) };
      } catch (err) {
        if (err instanceof SchemaMismatchError) return undefined;
        throw err;
      }
    };

    for (let i = 0; i < branches.length; i++) {
      const plan = attempt(i, true);
      if (plan !== undefined) return plan;
    }
    for (let i = 0; i < branches.length; i++) {
      const plan = attempt(i, false);
      if (plan !== undefined) return plan;
    }
    throw new SchemaMismatchError(`writer ${describeNode(w)} matches no branch of the reader union`, path);
  }

  private record(
    w: Extract<Concrete, { kind: 'record' }>,
    r: Extract<Concrete, { kind: 'record' }>,
    path: string,
  ): RecordPlan {
    const key = `${w.name}\u0000${r.name}`;
    const cached = this.records.get(key);
    if (cached !== undefined) return cached;

    const plan: RecordPlan = {
      op:       'record',
      name:     r.name,
      fields:   r.fields.map(f => f.name),
      steps:    [],
      defaults: [],
    };
    this.records.set(key, plan);

    try {
      const matched = new Set<number>();
      for (const wf of w.fields) {
        const target = r.fields.findIndex(rf => rf.name === wf.name || rf.aliases.includes(wf.name));
        const rf = r.fields[target];
        if (rf === undefined) {
          plan.steps.push({ op: 'skip', node: wf.type });
          continue;
        }
        matched.add(target);
        plan.steps.push({ op: 'read', plan: this.resolve(wf.type, rf.type, `${path}.${rf.name}`), target });
      }
      r.fields.forEach((rf, target) => {
        if (matched.has(target)) return;
        if (rf.default === undefined) {
          throw new SchemaMismatchError(
            `reader field '${rf.name}' of ${r.name} is absent from the writer schema and has no default`, path,
          );
        }
        plan.defaults.push({ target, value: rf.default });
      });
    } catch (err) {
      this.records.delete(key);
      throw err;
    }
    return plan;
  }
}

function describeNode(node: Concrete): string {
  return isNamed(node) ? `${node.kind} ${node.name}` : node.kind;
}

// ─── Decoding through a plan ──────────────────────────────────────────────────

function promote(promotion: Promotion, reader: ByteReader): Value {
  switch (promotion) {
    case 'int->long':     return { type: 'long',   value: BigInt(reader.readInt()) };
    case 'int->float':    return { type: 'float',  value: Math.fround(reader.readInt()) };
    case 'int->double':   return { type: 'double', value: reader.readInt() };
    case 'long->float':   return { type: 'float',  value: Math.fround(Number(reader.readLong())) };
    case 'long->double':  return { type: 'double', value: Number(reader.readLong()) };
    case 'float->double': return { type: 'double', value: reader.readFloat() };
    case 'string->bytes': return { type: 'bytes',  value: reader.readBytes() };
    case 'bytes->string': return { type: 'string', value: decodeUtf8(reader.readBytes()) };
    default:              return assertNever(promotion, 'promotion');
  }
}

function readWithPlan(plan: ReadPlan, writerNames: Names, reader: ByteReader): Value {
  switch (plan.op) {
    case 'direct':
      return decodeNode(writerNames, plan.node, reader);

    case 'promote':
      return promote(plan.promotion, reader);

    case 'enum': {
      const index = reader.readInt();
      const target = plan.mapping[index];
      if (target === undefined) {
        throw new CorruptFileError(
          `Enum ${plan.writer.name} index ${index} is out of range (${plan.writer.symbols.length} symbols).`,
        );
      }
      const symbol = plan.reader.symbols[target];
      if (symbol === undefined) {
        throw new SchemaMismatchError(
          `writer symbol '${plan.writer.symbols[index] ?? index}' does not exist in reader enum ` +
          `${plan.reader.name} and the reader enum has no default`,
        );
      }
      return { type: 'enum', index: target, symbol };
    }

    case 'array': {
      const items: Value[] = [];
      for (let count = readBlockCount(reader, plan.itemBytes); count > 0; count = readBlockCount(reader, plan.itemBytes)) {
        for (let i = 0; i < count; i++) items.push(readWithPlan(plan.items, writerNames, reader));
      }
      return { type: 'array', items };
    }

    case 'map': {
      const entries = new Map<string, Value>();
      for (let count = readBlockCount(reader, plan.entryBytes); count > 0; count = readBlockCount(reader, plan.entryBytes)) {
        for (let i = 0; i < count; i++) {
          const key = reader.readString();
          entries.set(key, readWithPlan(plan.values, writerNames, reader));
        }
      }
      return { type: 'map', entries };
    }

    case 'writer-union': {
      const index = reader.readInt();
      const branch = plan.branches[index];
      if (branch === undefined) {
        throw new CorruptFileError(
          `Union branch index ${index} is out of range (${plan.branches.length} branches).`,
        );
      }
      if (!branch.ok) throw new SchemaMismatchError(branch.reason);
      return readWithPlan(branch.plan, writerNames, reader);
    }

    case 'reader-union':
      return { type: 'union', index: plan.index, value: readWithPlan(plan.plan, writerNames, reader) };

    case 'record': {
      const slots = new Array<Value | undefined>(plan.fields.length).fill(undefined);
      for (const step of plan.steps) {
        if (step.op === 'skip') decodeNode(writerNames, step.node, reader);
        else slots[step.target] = readWithPlan(step.plan, writerNames, reader);
      }
      for (const { target, value } of plan.defaults) slots[target] = value;
      const fields = plan.fields.map((name, i): readonly [string, Value] => {
        const v = slots[i];
        if (v === undefined) throw new SchemaMismatchError(`record ${plan.name} field '${name}' was not filled`);
        return [name, v];
      });
      return { type: 'record', fields };
    }

    default:
      return assertNever(plan, 'read plan');
  }
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Resolve `writer` against `reader`.
 *
 * @throws SchemaMismatchError when no value of the writer schema could ever
 *         be read as the reader schema.
 */
export function resolveSchemas(writer: Schema, reader: Schema): Resolution {
  const plan = new Resolver(writer.names, reader.names).resolve(writer.root, reader.root, '$');
  return { writer, reader, plan };
}

/** Decode one value at the reader's position through a resolution. */
export function decodeWithPlan(resolution: Resolution, reader: ByteReader): Value {
  return readWithPlan(resolution.plan, resolution.writer.names, reader);
}

/**
 * Decode bytes written with `writer` into the shape of `reader`. When the
 * two are the same object this is exactly decode().
 */
export function decodeResolved(writer: Schema, reader: Schema, bytes: Uint8Array): Value {
  if (writer === reader) return decodePlain(writer, bytes);
  const byteReader = new ByteReader(bytes);
  const value = decodeWithPlan(resolveSchemas(writer, reader), byteReader);
  if (!byteReader.atEnd()) {
    throw new CorruptFileError(`${byteReader.remaining} trailing byte(s) after the decoded value.`);
  }
  return value;
}
