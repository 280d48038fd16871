/**
 * splitAndParse tests
 *
 * Tests:
 * - Parallel results match sequential parsing, in input order
 * - 0 and 1 document streams never start workers
 * - Pre-flight limits and configuration validation
 * - Errors carry the absolute position and the document index
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  ConfigError,
  DocumentWorkerPool,
  ValidationError,
  YamlSemanticError,
  YamlSyntaxError,
  parseAll,
  resolveParallelConfig,
  splitAndParse,
} from '@yamlet/core';
import type { ParallelConfig } from '@yamlet/core';

// =============================================================================
// Test Helpers
// =============================================================================

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  assert.fail('expected the promise to reject');
}

// =============================================================================
// TESTS
// =============================================================================

describe('splitAndParse', () => {
  describe('results', () => {
    it('should match sequential parsing across workers', async () => {
      const source = Array.from({ length: 10 }, (_, i) => `---\nid: ${i}\nref: &r [${i}, x]\ncopy: *r\n`).join('');

      const values = await splitAndParse(source, { threadCount: 3 });

      assert.strictEqual(values.length, 10);
      assert.deepStrictEqual(values, [...parseAll(source)]);
    });

    it('should keep document order and empty documents', async () => {
      const values = await splitAndParse('a: 1\n---\n- x\n---\n---\n"s"\n', { threadCount: 2 });

      assert.deepStrictEqual(values, [
        { kind: 'map', entries: [{ key: { kind: 'str', value: 'a' }, value: { kind: 'int', value: 1n } }] },
        { kind: 'seq', items: [{ kind: 'str', value: 'x' }] },
        { kind: 'null' },
        { kind: 'str', value: 's' },
      ]);
    });

    it('should return nothing for a stream without documents', async () => {
      assert.deepStrictEqual(await splitAndParse('# nothing\n', { threadCount: 4 }), []);
      assert.deepStrictEqual(await splitAndParse(''), []);
    });

    it('should parse a single document inline', async () => {
      assert.deepStrictEqual(await splitAndParse('--- 5\n', { threadCount: 4 }), [{ kind: 'int', value: 5n }]);
    });
  });

  describe('errors', () => {
    it('should tag the error of a single document with index 0', async () => {
      const err = await rejection(splitAndParse('a: 1\na: 2\n'));

      assert.ok(err instanceof YamlSemanticError);
      assert.strictEqual(err.code, 'ERR_DUPLICATE_KEY');
      assert.strictEqual(err.reason, "document 0: duplicate key 'a' (first defined at line 1)");
      assert.strictEqual(err.context.documentIndex, 0);
    });

    it('should report the lowest-index failure with absolute positions', async () => {
      const source = 'a\n---\nx: *nope\n---\nok: 1\n---\nb: [\n';
      const err = await rejection(splitAndParse(source, { threadCount: 2 }));

      assert.ok(err instanceof YamlSemanticError);
      assert.strictEqual(err.code, 'ERR_UNDEFINED_ALIAS');
      assert.strictEqual(err.reason, "document 1: undefined alias 'nope'");
      assert.strictEqual(err.context.documentIndex, 1);
      assert.strictEqual(err.span?.start.line, 3);
      assert.strictEqual(err.span?.start.offset, 9);
    });

    it('should index the failing document past a quote inside a plain scalar', async () => {
      const source = "title: Guns 'n Roses\n---\nb: 1\n---\nc: [1\n";
      const err = await rejection(splitAndParse(source, { threadCount: 2 }));

      assert.ok(err instanceof YamlSyntaxError);
      assert.strictEqual(err.context.documentIndex, 2);
      assert.ok(err.reason.startsWith('document 2: '));
      assert.deepStrictEqual([err.location.line, err.location.column], [5, 4]);
    });

    it('should rebuild syntax errors from workers', async () => {
      const err = await rejection(splitAndParse('a\n---\n"open\n', { threadCount: 2 }));

      assert.ok(err instanceof YamlSyntaxError);
      assert.strictEqual(err.context.documentIndex, 1);
      assert.ok(err.reason.startsWith('document 1: '));
      assert.strictEqual(err.location.line, 3);
    });
  });

  describe('limits', () => {
    it('should reject input larger than maxInputSize in UTF-8 bytes', async () => {
      const err = await rejection(splitAndParse('é\n', { maxInputSize: 2 }));

      assert.ok(err instanceof ValidationError);
      assert.strictEqual(err.code, 'ERR_INPUT_TOO_LARGE');
      assert.strictEqual(err.message, 'input is 3 bytes, larger than maxInputSize (2)');
      assert.deepStrictEqual([err.limit, err.actual], [2, 3]);
    });

    it('should reject streams with more than maxDocumentCount documents', async () => {
      const err = await rejection(splitAndParse('a\n---\nb\n', { maxDocumentCount: 1 }));

      assert.ok(err instanceof ValidationError);
      assert.strictEqual(err.code, 'ERR_TOO_MANY_DOCUMENTS');
      assert.strictEqual(err.message, 'input has 2 documents, more than maxDocumentCount (1)');
    });

    it('should count documents whose plain scalars hold quotes', async () => {
      const source = "title: Guns 'n Roses\n---\nb: 1\n---\nc: 2\n";
      const err = await rejection(splitAndParse(source, { maxDocumentCount: 2 }));

      assert.ok(err instanceof ValidationError);
      assert.strictEqual(err.message, 'input has 3 documents, more than maxDocumentCount (2)');
    });

    it('should validate the configuration before reading the input', async () => {
      const cases: Array<[ParallelConfig, string]> = [
        [{ threadCount: 0 }, 'parallel.threadCount must be an integer between 1 and 128'],
        [{ threadCount: 129 }, 'parallel.threadCount must be an integer between 1 and 128'],
        [{ maxInputSize: 2 ** 31 }, 'parallel.maxInputSize must be an integer between 1 and 1073741824 (1 GiB)'],
        [{ maxDocumentCount: 1.5 }, 'parallel.maxDocumentCount must be an integer between 1 and 10000000'],
      ];

      for (const [config, message] of cases) {
        const err = await rejection(splitAndParse('a\n', config));
        assert.ok(err instanceof ConfigError, message);
        assert.strictEqual(err.message, message);
      }
    });

    it('should fill in defaults', () => {
      const resolved = resolveParallelConfig();

      assert.strictEqual(resolved.maxInputSize, 104857600);
      assert.strictEqual(resolved.maxDocumentCount, 100000);
      assert.ok(resolved.threadCount >= 1 && resolved.threadCount <= 128);
    });
  });

  describe('DocumentWorkerPool', () => {
    it('should report idle stats before any work', () => {
      assert.deepStrictEqual(new DocumentWorkerPool(0).getStats(), {
        workerCount: 1,
        activeWorkers: 0,
        queuedTasks: 0,
        pendingTasks: 0,
      });
    });

    it('should settle every range and terminate cleanly', async () => {
      const pool = new DocumentWorkerPool(2);
      try {
        const results = await pool.parseRanges([
          { index: 0, source: 'a: 1\n', origin: { offset: 0, line: 1 } },
          { index: 1, source: '- *x\n', origin: { offset: 5, line: 2 } },
          { index: 2, source: 'b\n', origin: { offset: 10, line: 3 } },
        ]);

        assert.deepStrictEqual(
          results.map(r => [r.index, r.error === null ? 'ok' : r.error.code]),
          [
            [0, 'ok'],
            [1, 'ERR_UNDEFINED_ALIAS'],
            [2, 'ok'],
          ]
        );
        assert.deepStrictEqual(results[2].values, [{ kind: 'str', value: 'b' }]);
      } finally {
        await pool.terminate();
      }
      assert.strictEqual(pool.getStats().activeWorkers, 0);
    });

    it('should emit lifecycle events in dispatch order', async () => {
      const pool = new DocumentWorkerPool(1);
      const seen: string[] = [];
      pool.on('pool:ready', ({ workerCount }: { workerCount: number }) => seen.push(`ready ${workerCount}`));
      pool.on('task:started', ({ taskId }: { taskId: number }) => seen.push(`started ${taskId}`));
      pool.on('task:completed', ({ taskId }: { taskId: number }) => seen.push(`completed ${taskId}`));
      pool.on('task:failed', ({ taskId }: { taskId: number }) => seen.push(`failed ${taskId}`));
      pool.on('pool:terminated', () => seen.push('terminated'));

      try {
        await pool.parseRanges([
          { index: 0, source: 'a\n', origin: { offset: 0, line: 1 } },
          { index: 1, source: '*x\n', origin: { offset: 2, line: 2 } },
        ]);
      } finally {
        await pool.terminate();
      }

      assert.deepStrictEqual(seen, [
        'ready 1',
        'started 0',
        'completed 0',
        'started 1',
        'failed 1',
        'terminated',
      ]);
    });
  });
});
