/**
 * Core Schema scalar resolution tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { resolvePlain, resolveScalar, CORE_TAG_PREFIX } from '@yamlet/core';

describe('resolvePlain', () => {
  it('should resolve the null spellings', () => {
    for (const text of ['', '~', 'null']) {
      assert.deepStrictEqual(resolvePlain(text), { kind: 'null' }, text);
    }
  });

  it('should keep capitalized null and bool spellings as strings', () => {
    for (const text of ['Null', 'NULL', 'True', 'TRUE', 'False', 'yes', 'no', 'on', 'off']) {
      assert.deepStrictEqual(resolvePlain(text), { kind: 'str', value: text }, text);
    }
  });

  it('should resolve lowercase booleans', () => {
    assert.deepStrictEqual(resolvePlain('true'), { kind: 'bool', value: true });
    assert.deepStrictEqual(resolvePlain('false'), { kind: 'bool', value: false });
  });

  it('should resolve decimal, octal and hex integers', () => {
    assert.deepStrictEqual(resolvePlain('42'), { kind: 'int', value: 42n });
    assert.deepStrictEqual(resolvePlain('-17'), { kind: 'int', value: -17n });
    assert.deepStrictEqual(resolvePlain('0o14'), { kind: 'int', value: 12n });
    assert.deepStrictEqual(resolvePlain('0xFF'), { kind: 'int', value: 255n });
    assert.deepStrictEqual(resolvePlain('123456789012345678901234567890'), {
      kind: 'int',
      value: 123456789012345678901234567890n,
    });
  });

  it('should not treat a leading zero as YAML 1.1 octal', () => {
    assert.deepStrictEqual(resolvePlain('014'), { kind: 'int', value: 14n });
  });

  it('should keep malformed numbers as strings', () => {
    for (const text of ['0o19', '0xZZ', '1_000', '1.2.3', '0b101', '-0x10']) {
      assert.deepStrictEqual(resolvePlain(text), { kind: 'str', value: text }, text);
    }
  });

  it('should resolve floats', () => {
    assert.deepStrictEqual(resolvePlain('1.23e+3'), { kind: 'float', value: 1230 });
    assert.deepStrictEqual(resolvePlain('.5'), { kind: 'float', value: 0.5 });
    assert.deepStrictEqual(resolvePlain('-2.'), { kind: 'float', value: -2 });
    assert.deepStrictEqual(resolvePlain('1e3'), { kind: 'float', value: 1000 });
  });

  it('should resolve infinities and NaN', () => {
    assert.deepStrictEqual(resolvePlain('.inf'), { kind: 'float', value: Infinity });
    assert.deepStrictEqual(resolvePlain('-.Inf'), { kind: 'float', value: -Infinity });
    assert.deepStrictEqual(resolvePlain('+.INF'), { kind: 'float', value: Infinity });
    const nan = resolvePlain('.NaN');
    assert.ok(nan.kind === 'float' && Number.isNaN(nan.value));
    assert.deepStrictEqual(resolvePlain('.iNf'), { kind: 'str', value: '.iNf' });
    assert.deepStrictEqual(resolvePlain('.nAn'), { kind: 'str', value: '.nAn' });
  });
});

describe('resolveScalar', () => {
  it('should never resolve quoted scalars', () => {
    assert.deepStrictEqual(resolveScalar('1', 'double-quoted', null), { kind: 'str', value: '1' });
    assert.deepStrictEqual(resolveScalar('null', 'single-quoted', null), { kind: 'str', value: 'null' });
    assert.deepStrictEqual(resolveScalar('true', 'literal', null), { kind: 'str', value: 'true' });
  });

  it('should make the non-specific tag a string', () => {
    assert.deepStrictEqual(resolveScalar('12', 'plain', '!'), { kind: 'str', value: '12' });
  });

  it('should apply explicit core tags', () => {
    assert.deepStrictEqual(resolveScalar('12', 'plain', `${CORE_TAG_PREFIX}str`), { kind: 'str', value: '12' });
    assert.deepStrictEqual(resolveScalar('12', 'double-quoted', `${CORE_TAG_PREFIX}int`), { kind: 'int', value: 12n });
    assert.deepStrictEqual(resolveScalar('3', 'plain', `${CORE_TAG_PREFIX}float`), { kind: 'float', value: 3 });
    assert.deepStrictEqual(resolveScalar('', 'plain', `${CORE_TAG_PREFIX}null`), { kind: 'null' });
  });

  it('should return null when the text does not satisfy the tag', () => {
    assert.strictEqual(resolveScalar('abc', 'plain', `${CORE_TAG_PREFIX}int`), null);
    assert.strictEqual(resolveScalar('yes', 'plain', `${CORE_TAG_PREFIX}bool`), null);
    assert.strictEqual(resolveScalar('x', 'plain', `${CORE_TAG_PREFIX}seq`), null);
  });

  it('should resolve plain scalars with unknown tags by content', () => {
    assert.deepStrictEqual(resolveScalar('7', 'plain', 'tag:example.com,2024:thing'), { kind: 'int', value: 7n });
    assert.deepStrictEqual(resolveScalar('7', 'single-quoted', 'tag:example.com,2024:thing'), {
      kind: 'str',
      value: '7',
    });
  });
});
