/**
 * YamletError hierarchy tests
 *
 * Tests:
 * - Concrete errors set code, severity, message and context
 * - toJSON() output, including the positional fields
 * - errorFromJSON() rebuilds the same class and adds the document prefix
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  YamletError,
  YamlSyntaxError,
  YamlSemanticError,
  ValidationError,
  ConfigError,
  EmitError,
  WorkerError,
  errorFromJSON,
} from '@yamlet/core';
import type { Span } from '@yamlet/core';

// =============================================================================
// Fixtures
// =============================================================================

const span: Span = {
  start: { line: 3, column: 1, offset: 20 },
  end: { line: 3, column: 4, offset: 23 },
};

const firstSpan: Span = {
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 4, offset: 3 },
};

// =============================================================================
// TESTS
// =============================================================================

describe('YamletError', () => {
  describe('YamlSyntaxError', () => {
    it('should append the position to the message', () => {
      const error = new YamlSyntaxError('bad token', { line: 2, column: 3, offset: 7 });

      assert.ok(error instanceof YamletError);
      assert.ok(error instanceof Error);
      assert.strictEqual(error.name, 'YamlSyntaxError');
      assert.strictEqual(error.code, 'ERR_SYNTAX');
      assert.strictEqual(error.severity, 'error');
      assert.strictEqual(error.message, 'bad token (line 2, column 3)');
      assert.strictEqual(error.reason, 'bad token');
      assert.deepStrictEqual(error.context, { line: 2, column: 3, offset: 7 });
    });

    it('should serialize the reason and location', () => {
      const error = new YamlSyntaxError('bad token', { line: 2, column: 3, offset: 7 }, 'ERR_TAB_INDENT');
      assert.deepStrictEqual(error.toJSON(), {
        name: 'YamlSyntaxError',
        code: 'ERR_TAB_INDENT',
        severity: 'error',
        message: 'bad token',
        context: { line: 2, column: 3, offset: 7 },
        suggestion: undefined,
        location: { line: 2, column: 3, offset: 7 },
      });
    });
  });

  describe('YamlSemanticError', () => {
    it('should carry its span and related spans', () => {
      const error = new YamlSemanticError("duplicate key 'a'", 'ERR_DUPLICATE_KEY', span, [
        { span: firstSpan, label: 'first defined here' },
      ]);

      assert.strictEqual(error.message, "duplicate key 'a' (line 3, column 1)");
      assert.deepStrictEqual(error.context, { line: 3, column: 1, offset: 20 });
      assert.deepStrictEqual(error.related, [{ span: firstSpan, label: 'first defined here' }]);
    });

    it('should leave the message alone without a span', () => {
      const error = new YamlSemanticError('duplicate mapping key 1', 'ERR_DUPLICATE_KEY');
      assert.strictEqual(error.message, 'duplicate mapping key 1');
      assert.strictEqual(error.span, undefined);
      assert.deepStrictEqual(error.context, {});
    });
  });

  describe('ValidationError', () => {
    it('should be fatal and report limit and actual value', () => {
      const error = new ValidationError('too big', 'ERR_INPUT_TOO_LARGE', 10, 20, 'Raise the limit');

      assert.strictEqual(error.severity, 'fatal');
      assert.strictEqual(error.limit, 10);
      assert.strictEqual(error.actual, 20);
      assert.strictEqual(error.suggestion, 'Raise the limit');
      assert.deepStrictEqual(error.context, { limit: 10, actual: 20 });
    });
  });

  describe('ConfigError', () => {
    it('should default to ERR_CONFIG_INVALID', () => {
      const error = new ConfigError('Config error: nope');
      assert.strictEqual(error.code, 'ERR_CONFIG_INVALID');
      assert.strictEqual(error.severity, 'fatal');
    });
  });

  describe('errorFromJSON', () => {
    it('should rebuild a syntax error with the document prefix', () => {
      const original = new YamlSyntaxError('bad token', { line: 2, column: 3, offset: 7 });
      const rebuilt = errorFromJSON(original.toJSON(), { documentIndex: 4 });

      assert.ok(rebuilt instanceof YamlSyntaxError);
      assert.strictEqual(rebuilt.message, 'document 4: bad token (line 2, column 3)');
      assert.strictEqual(rebuilt.reason, 'document 4: bad token');
      assert.deepStrictEqual(rebuilt.location, { line: 2, column: 3, offset: 7 });
      assert.strictEqual(rebuilt.context.documentIndex, 4);
    });

    it('should rebuild a semantic error with its spans', () => {
      const original = new YamlSemanticError("undefined alias 'x'", 'ERR_UNDEFINED_ALIAS', span, [
        { span: firstSpan, label: 'anchor defined here' },
      ]);
      const rebuilt = errorFromJSON(original.toJSON());

      assert.ok(rebuilt instanceof YamlSemanticError);
      assert.strictEqual(rebuilt.code, 'ERR_UNDEFINED_ALIAS');
      assert.strictEqual(rebuilt.message, original.message);
      assert.deepStrictEqual(rebuilt.span, span);
      assert.deepStrictEqual(rebuilt.related, original.related);
    });

    it('should survive structured cloning', () => {
      const original = new ValidationError('too many', 'ERR_TOO_MANY_DOCUMENTS', 5, 6);
      const rebuilt = errorFromJSON(structuredClone(original.toJSON()));

      assert.ok(rebuilt instanceof ValidationError);
      assert.deepStrictEqual([rebuilt.limit, rebuilt.actual], [5, 6]);
    });

    it('should rebuild config and emit errors', () => {
      const config = errorFromJSON(new ConfigError('bad', 'ERR_CONFIG_INVALID', {}, 'fix it').toJSON());
      assert.ok(config instanceof ConfigError);
      assert.strictEqual(config.suggestion, 'fix it');

      const emit = errorFromJSON(new EmitError('too large', 'ERR_OUTPUT_TOO_LARGE').toJSON());
      assert.ok(emit instanceof EmitError);
    });

    it('should turn unknown errors into WorkerError', () => {
      const rebuilt = errorFromJSON({
        name: 'TypeError',
        code: 'ERR_WORKER_CRASHED',
        severity: 'error',
        message: 'boom',
        context: {},
      });

      assert.ok(rebuilt instanceof WorkerError);
      assert.strictEqual(rebuilt.message, 'boom');
      assert.strictEqual(rebuilt.code, 'ERR_WORKER_CRASHED');
    });
  });
});
