/**
 * Linter tests
 *
 * Tests:
 * - Rule selection through enabledRules (ids, globs, exclusions)
 * - Severity overrides and configuration errors
 * - maxDiagnostics truncation
 * - Malformed input never throws
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { ConfigError, Linter, lint, resolveLintConfig } from '@yamlet/core';
import type { LintConfig, LogContext, Logger, Source } from '@yamlet/core';

// =============================================================================
// Test Helpers
// =============================================================================

class RecordingLogger implements Logger {
  readonly warnings: Array<[string, LogContext | undefined]> = [];

  error(): void {}
  warn(message: string, context?: LogContext): void {
    this.warnings.push([message, context]);
  }
  info(): void {}
  debug(): void {}
  trace(): void {}
}

function codes(source: Source, config: LintConfig = {}): string[] {
  return lint(source, config).map(d => d.code);
}

// =============================================================================
// TESTS: configuration
// =============================================================================

describe('Linter', () => {
  describe('resolveLintConfig', () => {
    it('should enable every rule with its default severity', () => {
      const resolved = resolveLintConfig();

      assert.strictEqual(resolved.severities.size, 11);
      assert.strictEqual(resolved.severities.get('duplicate-key'), 'error');
      assert.strictEqual(resolved.severities.get('line-length'), 'warning');
      assert.strictEqual(resolved.maxLineLength, 120);
      assert.strictEqual(resolved.maxDiagnostics, null);
      assert.strictEqual(resolved.indentSize, null);
    });

    it('should apply globs and exclusions', () => {
      const resolved = resolveLintConfig({ enabledRules: ['*-key', 'new-line-*', '!duplicate-*'] });
      assert.deepStrictEqual([...resolved.severities.keys()], ['new-line-at-end-of-file']);
    });

    it('should apply severity overrides', () => {
      const resolved = resolveLintConfig({ ruleSeverityOverrides: { 'line-length': 'error', 'syntax-error': 'info' } });
      assert.strictEqual(resolved.severities.get('line-length'), 'error');
      assert.strictEqual(resolved.severities.get('syntax-error'), 'info');
    });

    it('should warn about patterns that match no rule', () => {
      const logger = new RecordingLogger();
      resolveLintConfig({ enabledRules: ['*', 'no-tabs'] }, logger);

      assert.deepStrictEqual(logger.warnings, [['Lint rule pattern matches no rule', { pattern: 'no-tabs' }]]);
    });

    it('should reject overrides for unknown rules', () => {
      assert.throws(
        () => resolveLintConfig({ ruleSeverityOverrides: { 'no-tabs': 'error' } }),
        (err: unknown) =>
          err instanceof ConfigError &&
          err.code === 'ERR_CONFIG_INVALID' &&
          err.message === 'Unknown lint rule "no-tabs" in ruleSeverityOverrides' &&
          err.suggestion?.startsWith('Known rules: syntax-error, duplicate-key') === true
      );
    });

    it('should reject invalid severities', () => {
      const overrides: Record<string, 'error'> = JSON.parse('{"line-length":"fatal"}');
      assert.throws(
        () => resolveLintConfig({ ruleSeverityOverrides: overrides }),
        (err: unknown) => err instanceof ConfigError && err.message === 'Invalid severity "fatal" for lint rule "line-length"'
      );
    });

    it('should reject invalid limits', () => {
      assert.throws(() => resolveLintConfig({ maxLineLength: 0 }), {
        name: 'ConfigError',
        message: 'lint.maxLineLength must be a positive integer',
      });
      assert.throws(() => resolveLintConfig({ indentSize: 1.5 }), {
        name: 'ConfigError',
        message: 'lint.indentSize must be a positive integer',
      });
      assert.throws(() => resolveLintConfig({ maxDiagnostics: -1 }), {
        name: 'ConfigError',
        message: 'lint.maxDiagnostics must be a non-negative integer',
      });
      assert.strictEqual(resolveLintConfig({ maxDiagnostics: 0 }).maxDiagnostics, 0);
    });
  });

  // ===========================================================================
  // TESTS: lint()
  // ===========================================================================

  describe('lint', () => {
    it('should report nothing for clean input', () => {
      assert.deepStrictEqual(lint('a: 1\nlist:\n  - x\n  - y\n'), []);
      assert.deepStrictEqual(lint(''), []);
    });

    it('should only run enabled rules', () => {
      assert.deepStrictEqual(codes('a: 1  \nb: 2', { enabledRules: ['new-line-*'] }), ['new-line-at-end-of-file']);
      assert.deepStrictEqual(codes('a: 1  \nb: 2', { enabledRules: ['*', '!new-line-at-end-of-file'] }), [
        'trailing-whitespace',
      ]);
    });

    it('should use the overridden severity', () => {
      const [diagnostic] = lint('key: 0123456789\n', {
        maxLineLength: 10,
        ruleSeverityOverrides: { 'line-length': 'error' },
      });

      assert.strictEqual(diagnostic.severity, 'error');
      assert.strictEqual(diagnostic.message, 'line too long (15 > 10 characters)');
    });

    it('should keep the first maxDiagnostics entries in canonical order', () => {
      const source = 'a: 1  \nb: 2  \nc: 3  \n';

      assert.deepStrictEqual(
        lint(source, { maxDiagnostics: 2 }).map(d => d.span.start.line),
        [1, 2]
      );
      assert.deepStrictEqual(lint(source, { maxDiagnostics: 0 }), []);
    });

    it('should order diagnostics on the same offset by severity', () => {
      const diagnostics = lint('a:\n\tb: 1\n', { enabledRules: ['syntax-error', 'tab-indentation'] });

      assert.deepStrictEqual(
        diagnostics.map(d => [d.code, d.severity, d.span.start.offset]),
        [
          ['syntax-error', 'error', 3],
          ['tab-indentation', 'warning', 3],
        ]
      );
    });

    it('should not throw on malformed input', () => {
      const [diagnostic] = lint('[1, 2\n');

      assert.strictEqual(diagnostic.code, 'syntax-error');
      assert.strictEqual(diagnostic.message, 'unterminated flow sequence');
      assert.deepStrictEqual(diagnostic.span, {
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 1, offset: 0 },
      });
    });

    it('should accept bytes', () => {
      assert.deepStrictEqual(codes(new TextEncoder().encode('a: 1')), ['new-line-at-end-of-file']);
    });

    it('should reuse one configuration across inputs', () => {
      const linter = new Linter({ enabledRules: ['trailing-whitespace'] });

      assert.strictEqual(linter.lint('a: 1 \n').length, 1);
      assert.strictEqual(linter.lint('a: 1\n').length, 0);
    });
  });
});
