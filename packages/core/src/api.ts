/**
 * Public entry points
 *
 * Thin wrappers that wire the Scanner, Composer, Emitter and Linter
 * together. Every function is synchronous except `splitAndParse`.
 */

import type { Diagnostic, DiagnosticFormat, Document, EmitOptions, LintConfig, Value } from '@yamlet/types';
import { Composer } from './composer/Composer.js';
import { formatDiagnostics as renderDiagnostics } from './diagnostics/DiagnosticReporter.js';
import { Emitter } from './emitter/Emitter.js';
import { YamlSyntaxError } from './errors/YamletError.js';
import { Linter } from './lint/Linter.js';
import { silentLogger } from './logging/Logger.js';
import type { Logger } from './logging/Logger.js';
import { Scanner } from './scanner/Scanner.js';
import { nullValue } from './values/Value.js';

export type Source = string | Uint8Array;

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode byte input as UTF-8. Strings pass through unchanged.
 *
 * @throws YamlSyntaxError ERR_INVALID_ENCODING for malformed UTF-8
 */
export function decodeSource(source: Source): string {
  if (typeof source === 'string') {
    return source;
  }
  try {
    return utf8.decode(source);
  } catch {
    throw new YamlSyntaxError('input is not valid UTF-8', { line: 1, column: 1, offset: 0 }, 'ERR_INVALID_ENCODING');
  }
}

/**
 * Every document of the stream, with spans. Lazy: documents are scanned and
 * composed as the generator is advanced.
 */
export function* parseDocuments(source: Source): Generator<Document<Value>, void, undefined> {
  const text = decodeSource(source);
  yield* new Composer().compose(new Scanner(text).events());
}

/**
 * The root of every document; empty documents are Null.
 */
export function* parseAll(source: Source): Generator<Value, void, undefined> {
  for (const document of parseDocuments(source)) {
    yield document.root ?? nullValue();
  }
}

/**
 * The root of a single-document stream. An empty stream is Null.
 *
 * @throws YamlSyntaxError ERR_MULTIPLE_DOCUMENTS when a second document starts
 */
export function parse(source: Source): Value {
  let result: Value = nullValue();
  for (const document of parseDocuments(source)) {
    if (document.index > 0) {
      throw new YamlSyntaxError(
        'expected a single document but found more',
        document.span.start,
        'ERR_MULTIPLE_DOCUMENTS'
      );
    }
    result = document.root ?? nullValue();
  }
  return result;
}

export function serialize(value: Value, options: EmitOptions = {}): string {
  return new Emitter(options).emit(value);
}

export function serializeAll(values: Iterable<Value>, options: EmitOptions = {}): string {
  return new Emitter(options).emitAll(values);
}

/**
 * Lint YAML source. Never throws on malformed YAML; invalid configuration
 * raises ConfigError.
 */
export function lint(source: Source, config: LintConfig = {}, logger: Logger = silentLogger): Diagnostic[] {
  return new Linter(config, logger).lint(decodeSource(source));
}

export function formatDiagnostics(
  diagnostics: readonly Diagnostic[],
  source: Source,
  format: DiagnosticFormat = 'text',
  useColors = false
): string {
  return renderDiagnostics(diagnostics, decodeSource(source), format, useColors);
}
