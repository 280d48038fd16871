/**
 * Value graph - the in-memory result of composing a YAML document.
 *
 * Values are plain, immutable objects discriminated by `kind`. They survive
 * structured cloning, so worker threads hand them back to the main thread
 * without any re-encoding (bigint, NaN and ±Infinity included).
 *
 * Aliases are resolved by sharing: an alias node refers to the very same
 * Value instance as its anchor. Nothing mutates a Value after construction.
 */

/**
 * Tag of a Value variant
 */
export type ValueKind = 'null' | 'bool' | 'int' | 'float' | 'str' | 'seq' | 'map';

export interface NullValue {
  readonly kind: 'null';
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

/**
 * Integer of arbitrary size. Core Schema does not bound integers, so the
 * engine never narrows them to `number`.
 */
export interface IntValue {
  readonly kind: 'int';
  readonly value: bigint;
}

/**
 * IEEE-754 double, including `.inf`, `-.inf` and `.nan`.
 */
export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface StrValue {
  readonly kind: 'str';
  readonly value: string;
}

export interface SeqValue {
  readonly kind: 'seq';
  readonly items: readonly Value[];
}

/**
 * One key/value pair of a mapping. Keys may be any Value, including
 * collections (YAML complex keys).
 */
export interface MapEntry {
  readonly key: Value;
  readonly value: Value;
}

/**
 * Ordered mapping. Insertion order follows the source; no two keys are
 * structurally equal.
 */
export interface MapValue {
  readonly kind: 'map';
  readonly entries: readonly MapEntry[];
}

export type ScalarValue = NullValue | BoolValue | IntValue | FloatValue | StrValue;

export type Value = ScalarValue | SeqValue | MapValue;
