/**
 * Differential tests against the `yaml` package
 *
 * Both parsers run with the YAML 1.2 Core Schema; samples avoid the
 * capitalized null/bool spellings, which `yaml` accepts and yamlet keeps
 * as strings.
 *
 * Tests:
 * - parseAll agrees with yaml's parseAllDocuments
 * - yaml reads serialize() output back to the same data
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parse as parseYaml, parseAllDocuments } from 'yaml';
import { parseAll, serialize } from '@yamlet/core';
import type { Value } from '@yamlet/core';

// =============================================================================
// Test Helpers
// =============================================================================

const YAML_OPTIONS = { schema: 'core', intAsBigInt: true, uniqueKeys: true } as const;

type Plain = null | boolean | bigint | number | string | Plain[] | { [key: string]: Plain };

/**
 * Value graph → the plain data `yaml` produces. Samples only use string keys.
 */
function toPlain(value: Value): Plain {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'int':
    case 'float':
    case 'str':
      return value.value;
    case 'seq':
      return value.items.map(toPlain);
    case 'map': {
      const result: { [key: string]: Plain } = {};
      for (const { key, value: item } of value.entries) {
        if (key.kind !== 'str') {
          throw new Error(`sample uses a ${key.kind} key`);
        }
        result[key.value] = toPlain(item);
      }
      return result;
    }
  }
}

function reference(source: string): unknown[] {
  return parseAllDocuments(source, YAML_OPTIONS).map(document => {
    assert.deepStrictEqual(document.errors, [], source);
    return document.toJS();
  });
}

const SAMPLES: Array<[string, string]> = [
  ['block collections', 'name: demo\nitems:\n  - one\n  - two\nnested:\n  deeper:\n    key: value\n'],
  ['flow collections', 'list: [a, b, {c: d}]\nmap: {x: [1, 2], y: {}}\nempty: []\n'],
  ['compact nesting', '- a: 1\n  b: [x]\n- - nested\n  - seq\n- key: value\n'],
  ['indentless sequence', 'list:\n- 1\n- 2\nnext: 3\n'],
  [
    'block scalars',
    'lit: |\n  line1\n  line2\n\nfold: >\n  one\n  two\n\n  three\nstrip: |-\n  s\nkeep: |+\n  k\n\nlast: end\n',
  ],
  ['whitespace-only literal lines', 'lit: |\n  x\n     \n  y\n'],
  ['more indented folded lines', 'fold: >\n  para one\n    indented\n  back\n'],
  ['quoted scalars', 'sq: \'it\'\'s\'\ndq: "tab\\there \\u263A \\x41"\nmulti: "a\n  b"\nsqmulti: \'x\n\n  y\'\n'],
  ['plain multi-line', 'k: one\n  two\n\n  three\n'],
  ['integers', 'ints: [0, -17, +3, 0o14, 0xFF, 014, 123456789012345678901234567890]\n'],
  ['floats', 'floats: [1.5, .5, -2., 1e3, 6.02e+23, .inf, -.Inf, .nan]\n'],
  ['nulls and booleans', 'a: ~\nb: null\nc:\nd: true\ne: false\n'],
  ['strings that look like other types', 'a: yes\nb: "123"\nc: 1_000\nd: 0b101\ne: 12:30\n'],
  ['anchors and aliases', 'base: &b {x: 1}\nuse: *b\nlist: [&i 7, *i]\n'],
  ['tags', 'a: !!str 12\nb: !!float 3\nc: !!str\n'],
  ['comments', '# head\na: 1 # trailing\n# between\nb: [1, # inside\n  2]\n'],
  ['explicit keys', '? a\n: 1\n? b\n'],
  ['unicode', 'caf\u00e9: "caf\\xE9"\nemoji: \u{1F600}\n'],
  ['multiple documents', '%YAML 1.2\n---\na: 1\n...\n---\n- b\n--- c\n---\n'],
];

// =============================================================================
// TESTS
// =============================================================================

describe('differential: yaml package', () => {
  describe('parsing', () => {
    for (const [name, source] of SAMPLES) {
      it(`should agree on ${name}`, () => {
        assert.deepStrictEqual([...parseAll(source)].map(toPlain), reference(source));
      });
    }
  });

  describe('serialization', () => {
    for (const [name, source] of SAMPLES) {
      it(`should emit ${name} so that yaml reads the same data`, () => {
        for (const value of parseAll(source)) {
          for (const options of [{}, { defaultFlowStyle: true }, { allowUnicode: true, width: 20 }]) {
            const text = serialize(value, options);
            assert.deepStrictEqual(parseYaml(text, YAML_OPTIONS), toPlain(value), text);
          }
        }
      });
    }
  });
});
