/**
 * Value constructors, structural equality and the total ordering used by
 * `sortKeys`.
 */

import type {
  BoolValue,
  FloatValue,
  IntValue,
  MapEntry,
  MapValue,
  NullValue,
  SeqValue,
  StrValue,
  Value,
  ValueKind,
} from '@yamlet/types';
import { YamlSemanticError } from '../errors/YamletError.js';

const NULL: NullValue = Object.freeze({ kind: 'null' });
const TRUE: BoolValue = Object.freeze({ kind: 'bool', value: true });
const FALSE: BoolValue = Object.freeze({ kind: 'bool', value: false });

export function nullValue(): NullValue {
  return NULL;
}

export function bool(value: boolean): BoolValue {
  return value ? TRUE : FALSE;
}

/**
 * Accepts a bigint or a safe integer number.
 */
export function int(value: bigint | number): IntValue {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new RangeError(`int() expects a safe integer, got ${value}`);
  }
  return { kind: 'int', value: BigInt(value) };
}

export function float(value: number): FloatValue {
  return { kind: 'float', value };
}

export function str(value: string): StrValue {
  return { kind: 'str', value };
}

export function sequence(items: readonly Value[]): SeqValue {
  return { kind: 'seq', items: [...items] };
}

/**
 * Build a mapping from entries (or [key, value] tuples).
 * Throws YamlSemanticError (ERR_DUPLICATE_KEY) when two keys are equal.
 */
export function mapping(entries: Iterable<MapEntry | readonly [Value, Value]>): MapValue {
  const result: MapEntry[] = [];
  const seen = new Set<string>();
  for (const entry of entries) {
    const normalized: MapEntry = isEntryTuple(entry) ? { key: entry[0], value: entry[1] } : entry;
    const keyPrint = fingerprint(normalized.key);
    if (seen.has(keyPrint)) {
      throw new YamlSemanticError(`duplicate mapping key ${describeKey(normalized.key)}`, 'ERR_DUPLICATE_KEY');
    }
    seen.add(keyPrint);
    result.push(normalized);
  }
  return { kind: 'map', entries: result };
}

function isEntryTuple(entry: MapEntry | readonly [Value, Value]): entry is readonly [Value, Value] {
  return Array.isArray(entry);
}

/**
 * Short human-readable rendering of a key for messages.
 */
export function describeKey(key: Value): string {
  switch (key.kind) {
    case 'str':
      return `'${key.value}'`;
    case 'null':
      return 'null';
    case 'seq':
      return '[...]';
    case 'map':
      return '{...}';
    default:
      return formatScalar(key);
  }
}

function formatScalar(value: BoolValue | IntValue | FloatValue): string {
  if (value.kind === 'float') {
    return formatFloat(value.value);
  }
  return String(value.value);
}

/**
 * YAML text of a float: `.inf`, `-.inf`, `.nan`, and a `.0` suffix on
 * integral values so they do not re-resolve as Int.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return '.nan';
  if (value === Infinity) return '.inf';
  if (value === -Infinity) return '-.inf';
  if (Object.is(value, -0)) return '-0.0';
  const text = String(value);
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

/**
 * Canonical text of a value. Two values have the same fingerprint exactly
 * when valuesEqual() holds: NaN matches NaN, 0 matches -0, and mapping
 * entries are order-independent.
 */
export function fingerprint(value: Value): string {
  switch (value.kind) {
    case 'null':
      return 'n';
    case 'bool':
      return value.value ? 'b1' : 'b0';
    case 'int':
      return `i${value.value}`;
    case 'float':
      return `f${formatFloat(Object.is(value.value, -0) ? 0 : value.value)}`;
    case 'str':
      return `s${JSON.stringify(value.value)}`;
    case 'seq':
      return `[${value.items.map(fingerprint).join(',')}]`;
    case 'map': {
      const entries = value.entries.map(e => `${fingerprint(e.key)}:${fingerprint(e.value)}`);
      entries.sort();
      return `{${entries.join(',')}}`;
    }
  }
}

/**
 * Structural equality (see fingerprint() for the exact rules).
 */
export function valuesEqual(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (a.kind === 'null' && b.kind === 'null') return true;
  if (a.kind === 'bool' && b.kind === 'bool') return a.value === b.value;
  if (a.kind === 'int' && b.kind === 'int') return a.value === b.value;
  if (a.kind === 'str' && b.kind === 'str') return a.value === b.value;
  if (a.kind === 'float' && b.kind === 'float') {
    return a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value));
  }
  if (a.kind === 'seq' && b.kind === 'seq') {
    return a.items.length === b.items.length && a.items.every((item, i) => valuesEqual(item, b.items[i]));
  }
  if (a.kind === 'map' && b.kind === 'map') {
    return a.entries.length === b.entries.length && fingerprint(a) === fingerprint(b);
  }
  return false;
}

const KIND_RANK: Record<ValueKind, number> = {
  null: 0,
  bool: 1,
  int: 2,
  float: 3,
  str: 4,
  seq: 5,
  map: 6,
};

/**
 * Total order over values:
 * Null < Bool < Int < Float < Str < Seq < Map, then within a kind
 * false < true, numeric order (NaN after every other float), UTF-16 code unit
 * order for strings, element-wise order for sequences and size-then-entries
 * order for mappings.
 */
export function compareValues(a: Value, b: Value): number {
  const rank = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (rank !== 0) return Math.sign(rank);

  if (a.kind === 'bool' && b.kind === 'bool') {
    return Number(a.value) - Number(b.value);
  }
  if ((a.kind === 'int' && b.kind === 'int') || (a.kind === 'str' && b.kind === 'str')) {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  if (a.kind === 'float' && b.kind === 'float') {
    return compareFloats(a.value, b.value);
  }
  if (a.kind === 'seq' && b.kind === 'seq') {
    const shared = Math.min(a.items.length, b.items.length);
    for (let i = 0; i < shared; i++) {
      const cmp = compareValues(a.items[i], b.items[i]);
      if (cmp !== 0) return cmp;
    }
    return Math.sign(a.items.length - b.items.length);
  }
  if (a.kind === 'map' && b.kind === 'map') {
    if (a.entries.length !== b.entries.length) {
      return Math.sign(a.entries.length - b.entries.length);
    }
    const left = sortEntries(a.entries);
    const right = sortEntries(b.entries);
    for (let i = 0; i < left.length; i++) {
      const cmp = compareValues(left[i].key, right[i].key) || compareValues(left[i].value, right[i].value);
      if (cmp !== 0) return cmp;
    }
  }
  return 0;
}

function compareFloats(a: number, b: number): number {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) {
    return aNaN === bNaN ? 0 : aNaN ? 1 : -1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Entries ordered by key (stable).
 */
export function sortEntries(entries: readonly MapEntry[]): MapEntry[] {
  return [...entries].sort((x, y) => compareValues(x.key, y.key));
}

/**
 * Runtime guard used by the emitter for input that did not come from the
 * composer.
 */
export function isValue(input: unknown): input is Value {
  if (typeof input !== 'object' || input === null || !('kind' in input)) {
    return false;
  }
  const value = 'value' in input ? input.value : undefined;
  switch (input.kind) {
    case 'null':
      return true;
    case 'bool':
      return typeof value === 'boolean';
    case 'int':
      return typeof value === 'bigint';
    case 'float':
      return typeof value === 'number';
    case 'str':
      return typeof value === 'string';
    case 'seq':
      return 'items' in input && Array.isArray(input.items);
    case 'map':
      return 'entries' in input && Array.isArray(input.entries);
    default:
      return false;
  }
}
