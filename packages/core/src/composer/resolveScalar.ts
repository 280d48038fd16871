/**
 * Core Schema scalar resolution
 *
 * Untagged plain scalars resolve, in order, to Null, Bool, Int, Float and
 * finally Str. Only the lowercase spellings of `null`, `true` and `false`
 * are recognized; `True`, `yes` and `on` stay strings.
 */

import type { Value } from '@yamlet/types';
import { CORE_TAG_PREFIX } from '../scanner/events.js';
import type { ScalarStyle } from '../scanner/events.js';
import { bool, float, int, nullValue, str } from '../values/Value.js';

const NULL_PATTERN = /^(?:~|null|)$/;
const BOOL_PATTERN = /^(?:true|false)$/;
const INT_PATTERNS = [/^[-+]?[0-9]+$/, /^0o[0-7]+$/, /^0x[0-9a-fA-F]+$/];
const FLOAT_PATTERN = /^[-+]?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?)(?:[eE][-+]?[0-9]+)?$/;
const INF_PATTERN = /^([-+]?)\.(?:inf|Inf|INF)$/;
const NAN_PATTERN = /^\.(?:nan|NaN|NAN)$/;

function resolveInt(text: string): Value | null {
  return INT_PATTERNS.some(pattern => pattern.test(text)) ? int(BigInt(text)) : null;
}

function resolveFloat(text: string): Value | null {
  if (FLOAT_PATTERN.test(text)) {
    return float(Number(text));
  }
  const inf = INF_PATTERN.exec(text);
  if (inf) {
    return float(inf[1] === '-' ? -Infinity : Infinity);
  }
  return NAN_PATTERN.test(text) ? float(NaN) : null;
}

/**
 * Resolve an untagged plain scalar.
 */
export function resolvePlain(text: string): Value {
  if (NULL_PATTERN.test(text)) return nullValue();
  if (BOOL_PATTERN.test(text)) return bool(text === 'true');
  return resolveInt(text) ?? resolveFloat(text) ?? str(text);
}

/**
 * Resolve a scalar with its style and (resolved) tag.
 * Returns null when the text does not satisfy an explicit Core tag.
 */
export function resolveScalar(text: string, style: ScalarStyle, tag: string | null): Value | null {
  if (tag === '!') {
    return str(text);
  }

  if (tag !== null && tag.startsWith(CORE_TAG_PREFIX)) {
    switch (tag.slice(CORE_TAG_PREFIX.length)) {
      case 'str':
        return str(text);
      case 'null':
        return NULL_PATTERN.test(text) ? nullValue() : null;
      case 'bool':
        return BOOL_PATTERN.test(text) ? bool(text === 'true') : null;
      case 'int':
        return resolveInt(text);
      case 'float':
        return resolveFloat(text);
      case 'seq':
      case 'map':
        return null;
    }
    // Other core tags (!!binary, !!timestamp, ...) are not part of the schema
  }

  return style === 'plain' ? resolvePlain(text) : str(text);
}

/**
 * `!!int` instead of `tag:yaml.org,2002:int` for messages.
 */
export function displayTag(tag: string): string {
  return tag.startsWith(CORE_TAG_PREFIX) ? `!!${tag.slice(CORE_TAG_PREFIX.length)}` : tag;
}

/**
 * Check a collection tag against the collection kind. Only `!!seq` and
 * `!!map` (or a core scalar tag) can mismatch.
 */
export function collectionTagMatches(tag: string | null, kind: 'seq' | 'map'): boolean {
  if (tag === null || !tag.startsWith(CORE_TAG_PREFIX)) return true;
  const name = tag.slice(CORE_TAG_PREFIX.length);
  if (['str', 'null', 'bool', 'int', 'float', 'seq', 'map'].includes(name)) {
    return name === kind;
  }
  return true;
}
