/**
 * Emitter - serializes Values to YAML text
 *
 * Block style by default; `defaultFlowStyle` writes every collection in flow
 * style. Scalars are written so that composing the output yields an equal
 * Value:
 * - floats: `.inf`, `-.inf`, `.nan`; integral values get a `.0` suffix
 * - strings: plain when nothing could re-resolve or break them, then single
 *   quotes, then literal blocks (multi-line, block context), then double
 *   quotes with escapes
 */

import type { EmitOptions, MapEntry, MapValue, SeqValue, Value } from '@yamlet/types';
import { EmitError } from '../errors/YamletError.js';
import { resolvePlain } from '../composer/resolveScalar.js';
import { isIndicator } from '../scanner/chars.js';
import { formatFloat, isValue, sortEntries } from '../values/Value.js';

/** Largest output `serializeAll` produces, in UTF-8 bytes */
export const MAX_OUTPUT_SIZE = 100 * 1024 * 1024;

export const DEFAULT_EMIT_OPTIONS: Readonly<Required<EmitOptions>> = {
  sortKeys: false,
  allowUnicode: false,
  defaultFlowStyle: false,
  indent: 2,
  width: 80,
  explicitStart: false,
};

/**
 * Fill defaults and clamp `indent` to 1..9 and `width` to 20..1000.
 */
export function normalizeEmitOptions(options: EmitOptions = {}): Required<EmitOptions> {
  const defaults = DEFAULT_EMIT_OPTIONS;
  return {
    sortKeys: options.sortKeys ?? defaults.sortKeys,
    allowUnicode: options.allowUnicode ?? defaults.allowUnicode,
    defaultFlowStyle: options.defaultFlowStyle ?? defaults.defaultFlowStyle,
    explicitStart: options.explicitStart ?? defaults.explicitStart,
    indent: clamp(options.indent ?? defaults.indent, 1, 9),
    width: clamp(options.width ?? defaults.width, 20, 1000),
  };
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, Math.trunc(value)));
}

/** Where a scalar is written; decides which characters force quoting */
type ScalarContext = 'block' | 'key' | 'flow';

const SHORT_ESCAPES: Record<string, string> = {
  '\0': '\\0',
  '\x07': '\\a',
  '\b': '\\b',
  '\t': '\\t',
  '\n': '\\n',
  '\v': '\\v',
  '\f': '\\f',
  '\r': '\\r',
  '\x1b': '\\e',
  '"': '\\"',
  '\\': '\\\\',
  '\x85': '\\N',
  '\xa0': '\\_',
  '\u2028': '\\L',
  '\u2029': '\\P',
};

export class Emitter {
  private readonly options: Required<EmitOptions>;

  constructor(options: EmitOptions = {}) {
    this.options = normalizeEmitOptions(options);
  }

  /**
   * One document, ending with a line break.
   */
  emit(value: Value): string {
    return this.document(value, this.options.explicitStart);
  }

  /**
   * Every value as its own `---` document.
   */
  emitAll(values: Iterable<Value>): string {
    let output = '';
    let size = 0;
    for (const value of values) {
      const text = this.document(value, true);
      size += Buffer.byteLength(text, 'utf8');
      if (size > MAX_OUTPUT_SIZE) {
        throw new EmitError(`output exceeds ${MAX_OUTPUT_SIZE} bytes`, 'ERR_OUTPUT_TOO_LARGE', {
          limit: MAX_OUTPUT_SIZE,
        });
      }
      output += text;
    }
    return output;
  }

  private document(value: Value, explicitStart: boolean): string {
    this.check(value);
    let body: string;
    let isBlock = false;
    if (this.isBlockCollection(value)) {
      body = this.blockCollection(value, 0);
      isBlock = true;
    } else if (value.kind === 'str' && this.useLiteral(value.value)) {
      body = this.literal(value.value, this.options.indent);
    } else {
      body = this.inline(value, 'block');
    }

    if (!explicitStart) return `${body}\n`;
    return isBlock ? `---\n${body}\n` : `--- ${body}\n`;
  }

  private check(value: unknown): asserts value is Value {
    if (!isValue(value)) {
      const type = value === null ? 'null' : typeof value;
      throw new EmitError(`cannot serialize ${type} as a YAML value`, 'ERR_UNSUPPORTED_VALUE');
    }
  }

  // === Block collections ===

  private isBlockCollection(value: Value): value is SeqValue | MapValue {
    if (this.options.defaultFlowStyle) return false;
    return (value.kind === 'seq' && value.items.length > 0) || (value.kind === 'map' && value.entries.length > 0);
  }

  /** Block collection at column `col`; the first line carries no indentation */
  private blockCollection(value: SeqValue | MapValue, col: number): string {
    return value.kind === 'seq' ? this.blockSequence(value, col) : this.blockMapping(value, col);
  }

  private blockSequence(seq: SeqValue, col: number): string {
    const step = Math.max(2, this.options.indent);
    const indicator = '-'.padEnd(step, ' ');
    const pad = ' '.repeat(col);

    return seq.items
      .map((item, i) => {
        this.check(item);
        const prefix = (i === 0 ? '' : pad) + indicator;
        return prefix + this.nodeAfterIndicator(item, col + step, col + step);
      })
      .join('\n');
  }

  private blockMapping(map: MapValue, col: number): string {
    const pad = ' '.repeat(col);
    return this.entries(map)
      .map((entry, i) => (i === 0 ? '' : pad) + this.mappingEntry(entry, col))
      .join('\n');
  }

  private mappingEntry(entry: MapEntry, col: number): string {
    this.check(entry.key);
    this.check(entry.value);
    const child = col + this.options.indent;

    if (this.isBlockCollection(entry.key)) {
      const key = this.blockCollection(entry.key, col + 2);
      return `? ${key}\n${' '.repeat(col)}:${this.valueAfterColon(entry.value, child, col + 1)}`;
    }

    const key = this.inline(entry.key, 'key');
    return `${key}:${this.valueAfterColon(entry.value, child, col + key.length + 1)}`;
  }

  /**
   * Text following a mapping `:`; starts with a space or a line break.
   */
  private valueAfterColon(value: Value, child: number, startCol: number): string {
    if (this.isBlockCollection(value)) {
      return `\n${' '.repeat(child)}${this.blockCollection(value, child)}`;
    }
    return ` ${this.nodeAfterIndicator(value, child, startCol + 1)}`;
  }

  /**
   * Node written right after `- ` or `: `. Nested block collections start
   * on the same line (compact form) and continue at `child`.
   */
  private nodeAfterIndicator(value: Value, child: number, startCol: number): string {
    if (this.isBlockCollection(value)) {
      return this.blockCollection(value, child);
    }
    if (value.kind === 'str') {
      if (this.useLiteral(value.value)) {
        return this.literal(value.value, child);
      }
      return this.string(value.value, 'block', { startCol, continuationCol: child });
    }
    return this.inline(value, 'block');
  }

  private entries(map: MapValue): readonly MapEntry[] {
    return this.options.sortKeys ? sortEntries(map.entries) : map.entries;
  }

  // === Inline nodes ===

  /** Single-line rendering: scalars and flow collections */
  private inline(value: Value, context: ScalarContext): string {
    this.check(value);
    switch (value.kind) {
      case 'null':
        return 'null';
      case 'bool':
        return value.value ? 'true' : 'false';
      case 'int':
        return value.value.toString();
      case 'float':
        return formatFloat(value.value);
      case 'str':
        return this.string(value.value, context);
      case 'seq':
        return `[${value.items.map(item => this.inline(item, 'flow')).join(', ')}]`;
      case 'map': {
        const entries = this.entries(value).map(
          entry => `${this.inline(entry.key, 'flow')}: ${this.inline(entry.value, 'flow')}`
        );
        return `{${entries.join(', ')}}`;
      }
    }
  }

  // === Strings ===

  private string(text: string, context: ScalarContext, fold?: { startCol: number; continuationCol: number }): string {
    if (this.isPlainSafe(text, context)) {
      return fold ? this.foldPlain(text, fold.startCol, fold.continuationCol) : text;
    }
    if (isPrintable(text, this.options.allowUnicode)) {
      return `'${text.replace(/'/g, "''")}'`;
    }
    return this.doubleQuoted(text);
  }

  private isPlainSafe(text: string, context: ScalarContext): boolean {
    if (text.length === 0 || !isPrintable(text, this.options.allowUnicode)) return false;
    if (resolvePlain(text).kind !== 'str') return false;
    if (isIndicator(text[0]) || text[0] === ' ' || text.endsWith(' ')) return false;
    if (text.startsWith('...')) return false;
    if (text.includes(': ') || text.includes(' #') || text.endsWith(':')) return false;
    if (context === 'flow' && /[,[\]{}:#]/.test(text)) return false;
    return true;
  }

  /**
   * Break a long plain scalar at single spaces so lines stay within `width`.
   */
  private foldPlain(text: string, startCol: number, continuationCol: number): string {
    const width = this.options.width;
    if (startCol + text.length <= width) return text;

    const lines: string[] = [];
    let lineStart = 0;
    let candidate = -1;
    let available = Math.max(width - startCol, 1);

    for (let i = 1; i < text.length - 1; i++) {
      if (text[i] !== ' ' || text[i - 1] === ' ' || text[i + 1] === ' ') continue;
      if (i - lineStart > available && candidate > lineStart) {
        lines.push(text.slice(lineStart, candidate));
        lineStart = candidate + 1;
        available = Math.max(width - continuationCol, 1);
      }
      candidate = i;
    }
    if (text.length - lineStart > available && candidate > lineStart) {
      lines.push(text.slice(lineStart, candidate));
      lineStart = candidate + 1;
    }
    lines.push(text.slice(lineStart));

    return lines.join(`\n${' '.repeat(continuationCol)}`);
  }

  /**
   * A literal block keeps every character of `text` only when each line is
   * printable, the first line does not start with whitespace and no line is
   * whitespace-only.
   */
  private useLiteral(text: string): boolean {
    if (this.options.defaultFlowStyle || !text.includes('\n')) return false;
    if (text[0] === ' ' || text[0] === '\t' || text[0] === '\n') return false;
    return text.split('\n').every(line => (line === '' || /\S/.test(line)) && isPrintable(line, this.options.allowUnicode));
  }

  private literal(text: string, contentCol: number): string {
    const body = text.replace(/\n+$/, '');
    const trailing = text.length - body.length;
    const header = trailing === 0 ? '|-' : trailing === 1 ? '|' : '|+';
    const pad = ' '.repeat(contentCol);

    const lines = body.split('\n').map(line => (line === '' ? '' : pad + line));
    for (let i = 1; i < trailing; i++) {
      lines.push('');
    }
    return `${header}\n${lines.join('\n')}`;
  }

  private doubleQuoted(text: string): string {
    let out = '"';
    for (const ch of text) {
      const short = SHORT_ESCAPES[ch];
      if (short !== undefined) {
        out += short;
        continue;
      }
      const code = ch.codePointAt(0) ?? 0;
      if (code >= 0x20 && code <= 0x7e) {
        out += ch;
      } else if (this.options.allowUnicode && isPrintableCodePoint(code)) {
        out += ch;
      } else {
        out += escapeCodePoint(code);
      }
    }
    return `${out}"`;
  }
}

function isPrintableCodePoint(code: number): boolean {
  if (code >= 0x20 && code <= 0x7e) return true;
  if (code < 0xa0) return false;
  if (code >= 0xd800 && code <= 0xdfff) return false;
  return code !== 0xfeff && code !== 0x2028 && code !== 0x2029 && code !== 0xfffe && code !== 0xffff;
}

/**
 * Printable on one line: no line breaks or control characters, and ASCII
 * only unless `allowUnicode`.
 */
function isPrintable(text: string, allowUnicode: boolean): boolean {
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (code >= 0x20 && code <= 0x7e) continue;
    if (!allowUnicode || !isPrintableCodePoint(code)) return false;
  }
  return true;
}

function escapeCodePoint(code: number): string {
  const hex = code.toString(16).toUpperCase();
  if (code <= 0xff) return `\\x${hex.padStart(2, '0')}`;
  if (code <= 0xffff) return `\\u${hex.padStart(4, '0')}`;
  return `\\U${hex.padStart(8, '0')}`;
}
