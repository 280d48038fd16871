/**
 * Logger Tests
 *
 * Tests:
 * - Level threshold (silent, errors, warnings, info, debug)
 * - Console method per level, trace routed to debug
 * - Context formatting (bigint, circular references)
 * - FileLogger writes timestamped lines
 * - createLogger() factory
 */

import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';

import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { ConsoleLogger, FileLogger, MultiLogger, createLogger, formatMessage, silentLogger } from '@yamlet/core';

// =============================================================================
// Test Helpers
// =============================================================================

function captureConsole() {
  return {
    error: mock.method(console, 'error', () => {}),
    warn: mock.method(console, 'warn', () => {}),
    info: mock.method(console, 'info', () => {}),
    debug: mock.method(console, 'debug', () => {}),
  };
}

function firstArgs(fn: ReturnType<typeof captureConsole>['warn']): unknown[] {
  return fn.mock.calls.map(call => call.arguments[0]);
}

// =============================================================================
// TESTS: ConsoleLogger
// =============================================================================

describe('ConsoleLogger', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('should prefix the level label and append the context', () => {
    const output = captureConsole();
    new ConsoleLogger('info').warn('careful', { documents: 3 });

    assert.deepStrictEqual(firstArgs(output.warn), ['[WARN] careful {"documents":3}']);
  });

  it('should drop messages below the threshold', () => {
    const output = captureConsole();
    const logger = new ConsoleLogger('warnings');
    logger.error('e');
    logger.warn('w');
    logger.info('i');
    logger.debug('d');

    assert.deepStrictEqual(firstArgs(output.error), ['[ERROR] e']);
    assert.deepStrictEqual(firstArgs(output.warn), ['[WARN] w']);
    assert.strictEqual(output.info.mock.callCount(), 0);
    assert.strictEqual(output.debug.mock.callCount(), 0);
  });

  it('should route trace to console.debug at debug level', () => {
    const output = captureConsole();
    new ConsoleLogger('debug').trace('step');

    assert.deepStrictEqual(firstArgs(output.debug), ['[TRACE] step']);
  });

  it('should log nothing when silent', () => {
    const output = captureConsole();
    new ConsoleLogger('silent').error('hidden');
    silentLogger.error('hidden');

    assert.strictEqual(output.error.mock.callCount(), 0);
  });
});

// =============================================================================
// TESTS: formatMessage
// =============================================================================

describe('formatMessage', () => {
  it('should return the message alone without context', () => {
    assert.strictEqual(formatMessage('plain'), 'plain');
    assert.strictEqual(formatMessage('plain', {}), 'plain');
  });

  it('should serialize bigint values', () => {
    assert.strictEqual(formatMessage('value', { int: 10n }), 'value {"int":"10n"}');
  });

  it('should mark circular references', () => {
    const context: Record<string, unknown> = { name: 'loop' };
    context.self = context;
    assert.strictEqual(formatMessage('cycle', context), 'cycle {"name":"loop","self":"[Circular]"}');
  });
});

// =============================================================================
// TESTS: FileLogger and createLogger
// =============================================================================

describe('FileLogger', () => {
  it('should write timestamped lines at or above its level', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'yamlet-logger-'));
    try {
      const logFile = join(dir, 'nested', 'yamlet.log');
      const logger = new FileLogger('info', logFile);
      logger.info('hello', { a: 1 });
      logger.debug('hidden');
      await logger.close();

      const lines = readFileSync(logFile, 'utf-8').split('\n');
      assert.strictEqual(lines.length, 2);
      assert.match(lines[0], /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[INFO\] hello \{"a":1\}$/);
      assert.strictEqual(lines[1], '');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('createLogger', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('should create a console logger', () => {
    assert.ok(createLogger('info') instanceof ConsoleLogger);
  });

  it('should add a debug-level file logger when logFile is given', async () => {
    const output = captureConsole();
    const dir = mkdtempSync(join(tmpdir(), 'yamlet-logger-'));
    try {
      const logFile = join(dir, 'yamlet.log');
      const logger = createLogger('errors', { logFile });
      assert.ok(logger instanceof MultiLogger);

      logger.debug('only in file');
      await logger.close();

      assert.strictEqual(output.debug.mock.callCount(), 0);
      assert.match(readFileSync(logFile, 'utf-8'), /\[DEBUG\] only in file\n$/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
