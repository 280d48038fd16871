/**
 * DocumentSplitter tests
 *
 * Tests:
 * - Boundaries at column-0 `---` and `...`
 * - Directives and comments stay with the following document
 * - Markers inside quoted scalars and flow collections are not boundaries
 * - Quotes and brackets inside plain scalars are text
 * - Every range re-scans to the documents of the full stream
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { Composer, Scanner, parseAll, parseDocuments, splitDocuments } from '@yamlet/core';

describe('splitDocuments', () => {
  it('should split at document start markers', () => {
    assert.deepStrictEqual(splitDocuments('a: 1\n---\nb: 2\n'), [
      { index: 0, start: 0, end: 5, line: 1 },
      { index: 1, start: 5, end: 14, line: 2 },
    ]);
  });

  it('should keep markers with inline content in their own range', () => {
    assert.deepStrictEqual(splitDocuments('--- a\n--- b\n'), [
      { index: 0, start: 0, end: 6, line: 1 },
      { index: 1, start: 6, end: 12, line: 2 },
    ]);
  });

  it('should keep leading comments and directives with their document', () => {
    assert.deepStrictEqual(splitDocuments('# c\n%YAML 1.2\n---\na\n'), [{ index: 0, start: 0, end: 20, line: 1 }]);
  });

  it('should end a range at a document end marker and drop trailing comments', () => {
    assert.deepStrictEqual(splitDocuments('a\n...\n# trailing\n'), [{ index: 0, start: 0, end: 6, line: 1 }]);
  });

  it('should keep a trailing range that holds a directive', () => {
    assert.deepStrictEqual(splitDocuments('a\n...\n%YAML 1.2\n'), [
      { index: 0, start: 0, end: 6, line: 1 },
      { index: 1, start: 6, end: 16, line: 3 },
    ]);
  });

  it('should find no documents in empty or comment-only input', () => {
    assert.deepStrictEqual(splitDocuments(''), []);
    assert.deepStrictEqual(splitDocuments('# only a comment\n\n'), []);
  });

  it('should ignore markers inside quoted scalars and flow collections', () => {
    assert.strictEqual(splitDocuments('k: "a\n---\nb"\n').length, 1);
    assert.strictEqual(splitDocuments("k: 'a\n---\nb'\n").length, 1);
    assert.strictEqual(splitDocuments('k: [a,\n---\n]\n').length, 1);
  });

  it('should treat a quote inside a plain scalar as text', () => {
    const source = "title: Guns 'n Roses\n---\nb: 1\n---\nc: 2\n";
    assert.deepStrictEqual(splitDocuments(source), [
      { index: 0, start: 0, end: 21, line: 1 },
      { index: 1, start: 21, end: 30, line: 2 },
      { index: 2, start: 30, end: 39, line: 4 },
    ]);
    assert.strictEqual(splitDocuments(source).length, [...parseAll(source)].length);
  });

  it('should treat a bracket inside a plain scalar as text', () => {
    const source = 'note: see [ref\n---\nb: 1\n';
    assert.deepStrictEqual(splitDocuments(source), [
      { index: 0, start: 0, end: 15, line: 1 },
      { index: 1, start: 15, end: 24, line: 2 },
    ]);
    assert.strictEqual(splitDocuments(source).length, [...parseAll(source)].length);
  });

  it('should treat a quote that continues a plain scalar as text', () => {
    for (const source of ["a: foo\n  'bar\n---\nb\n", "- x\n  \"y\n---\nb\n", "top\n'level\n---\nb\n"]) {
      assert.strictEqual(splitDocuments(source).length, 2, source);
      assert.strictEqual([...parseAll(source)].length, 2, source);
    }
  });

  it('should still open quotes and flow collections after node indicators', () => {
    assert.strictEqual(splitDocuments('- &a !t "x\n---\ny"\n').length, 1);
    assert.strictEqual(splitDocuments('? [a,\n---\n]\n').length, 1);
    assert.strictEqual(splitDocuments('k: [a, "b,\n---\n"]\n').length, 1);
    assert.strictEqual(splitDocuments('k: [a \'b]\n---\nc\n').length, 2);
  });

  it('should ignore quotes inside block scalar bodies', () => {
    assert.deepStrictEqual(splitDocuments("k: |\n  it's\n---\nx\n"), [
      { index: 0, start: 0, end: 12, line: 1 },
      { index: 1, start: 12, end: 18, line: 3 },
    ]);
  });

  it('should ignore markers that are not at column 0', () => {
    assert.strictEqual(splitDocuments('k: |\n  ---\n').length, 1);
    assert.strictEqual(splitDocuments('a: ---x\n----\n').length, 1);
  });

  it('should count CRLF lines', () => {
    assert.deepStrictEqual(splitDocuments('a\r\n---\r\nb\r\n'), [
      { index: 0, start: 0, end: 3, line: 1 },
      { index: 1, start: 3, end: 11, line: 2 },
    ]);
  });

  it('should produce ranges that parse like the full stream', () => {
    const source = [
      '%YAML 1.2',
      '---',
      'a: &x 1',
      'b: *x',
      '...',
      '# between',
      '--- !!str',
      'text',
      '---',
      'k: >',
      '  folded "quoted"',
      '  [not flow',
      '---',
      '- [1, {b: 2}]',
      '',
    ].join('\n');

    const whole = [...parseDocuments(source)];
    const pieces = splitDocuments(source).flatMap(range => [
      ...new Composer().compose(
        new Scanner(source.slice(range.start, range.end), {
          origin: { offset: range.start, line: range.line },
        }).events()
      ),
    ]);

    assert.strictEqual(pieces.length, 4);
    assert.deepStrictEqual(
      pieces.map(d => [d.root, d.span]),
      whole.map(d => [d.root, d.span])
    );
  });
});
