/**
 * Scanner - turns YAML text into a lazy stream of events
 *
 * Recursive descent over the source string. Block structure is driven by
 * line indentation; flow collections are read eagerly into small event
 * buffers so that single-pair mappings inside flow sequences (`[a: 1]`) can
 * be recognized after their key has been read.
 *
 * Modes:
 * - strict: the first error is thrown as YamlSyntaxError
 * - tolerant: errors go to `onError`, the scanner skips to the next
 *   column-0 `---`/`...` marker and closes the broken document with an
 *   `aborted` document-end event
 *
 * Offsets are UTF-16 code units. `origin` shifts every reported location so
 * a scan of a sub-range reports positions in the enclosing source.
 */

import type { Location, Span } from '@yamlet/types';
import { YamlSyntaxError } from '../errors/YamletError.js';
import {
  isBlankOrEnd,
  isBreak,
  isDocumentMarker,
  isDocumentStart,
  isFlowIndicator,
  isHexDigit,
  isIndicator,
  isWhite,
  lineEnd,
  lineStarts,
  skipBreak,
} from './chars.js';
import { CORE_TAG_PREFIX } from './events.js';
import type { ScalarEvent, ScalarStyle, ScanEvent } from './events.js';

export type ScanMode = 'strict' | 'tolerant';

export interface ScannerOptions {
  /** Default: 'strict' */
  mode?: ScanMode;
  /** Receives every error in tolerant mode */
  onError?: (error: YamlSyntaxError) => void;
  /** Position of `source` inside a larger text */
  origin?: { offset: number; line: number };
}

type EventGenerator = Generator<ScanEvent, void, undefined>;

/**
 * Where a node sits; decides which characters end a plain scalar.
 * - block: value in block context
 * - block-key: implicit key of a block mapping (single line)
 * - flow: anything inside `[...]` or `{...}`
 */
type NodeContext = 'block' | 'block-key' | 'flow';

interface NodeProperties {
  anchor: { name: string; start: number; end: number } | null;
  tag: string | null;
}

const NO_PROPERTIES: NodeProperties = { anchor: null, tag: null };

interface DirectiveState {
  version: string | null;
  seen: boolean;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  '0': '\0',
  a: '\x07',
  b: '\b',
  t: '\t',
  '\t': '\t',
  n: '\n',
  v: '\v',
  f: '\f',
  r: '\r',
  e: '\x1b',
  ' ': ' ',
  '"': '"',
  '/': '/',
  '\\': '\\',
  N: '\x85',
  _: '\xa0',
  L: '\u2028',
  P: '\u2029',
};

const HEX_ESCAPE_LENGTHS: Record<string, number> = { x: 2, u: 4, U: 8 };

const DEFAULT_TAG_HANDLES: ReadonlyMap<string, string> = new Map([
  ['!', '!'],
  ['!!', CORE_TAG_PREFIX],
]);

export class Scanner {
  private readonly src: string;
  private readonly mode: ScanMode;
  private readonly onError?: (error: YamlSyntaxError) => void;
  private readonly originOffset: number;
  private readonly originLine: number;
  private readonly starts: number[];

  private pos = 0;
  /** End offset of the most recent node */
  private lastEnd = 0;
  private errorPos = 0;
  private started = false;
  private docOpen = false;
  /** Line start of the current document's first line (-1 before it starts) */
  private docBegin = -1;
  private tagHandles = new Map<string, string>();

  constructor(source: string, options: ScannerOptions = {}) {
    this.src = source;
    this.mode = options.mode ?? 'strict';
    this.onError = options.onError;
    this.originOffset = options.origin?.offset ?? 0;
    this.originLine = options.origin?.line ?? 1;
    this.starts = lineStarts(source);
  }

  /**
   * The event stream. Can be iterated only once.
   */
  *events(): EventGenerator {
    if (this.started) {
      throw new Error('Scanner.events() can only be iterated once');
    }
    this.started = true;

    if (this.src.charCodeAt(0) === 0xfeff) {
      this.pos = 1;
    }
    yield { type: 'stream-start', span: this.span(this.pos, this.pos) };

    for (;;) {
      try {
        const more = yield* this.document();
        if (!more) break;
      } catch (error) {
        if (!(error instanceof YamlSyntaxError) || this.mode === 'strict') {
          throw error;
        }
        this.onError?.(error);
        const abortedAt = this.errorPos;
        if (!this.docOpen) {
          yield { type: 'document-start', span: this.span(abortedAt, abortedAt), explicit: false, version: null };
        }
        this.resync();
        this.docOpen = false;
        yield {
          type: 'document-end',
          span: this.span(abortedAt, Math.max(abortedAt, this.pos)),
          explicit: false,
          aborted: true,
        };
      }
    }

    yield { type: 'stream-end', span: this.span(this.src.length, this.src.length) };
  }

  // === Positions ===

  private lineIndex(pos: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= pos) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo;
  }

  private locate(pos: number): Location {
    const index = this.lineIndex(pos);
    return {
      line: this.originLine + index,
      column: pos - this.starts[index] + 1,
      offset: this.originOffset + pos,
    };
  }

  private span(start: number, end: number): Span {
    return { start: this.locate(start), end: this.locate(end) };
  }

  private lineStartOf(pos: number): number {
    return this.starts[this.lineIndex(pos)];
  }

  private column(pos: number): number {
    return pos - this.lineStartOf(pos);
  }

  private fail(message: string, code: string = 'ERR_SYNTAX', pos: number = this.pos): never {
    this.errorPos = pos;
    throw new YamlSyntaxError(message, this.locate(pos), code);
  }

  // === Whitespace ===

  private skipInline(): void {
    while (isWhite(this.src[this.pos])) this.pos++;
  }

  /**
   * Skips whitespace and a trailing comment. True when the line ends here.
   */
  private atLineEnd(): boolean {
    this.skipInline();
    if (this.src[this.pos] === '#') {
      this.pos = lineEnd(this.src, this.pos);
    }
    return this.pos >= this.src.length || isBreak(this.src[this.pos]);
  }

  /**
   * Moves past blank and comment lines to the next content character.
   * Returns its column, or -1 at end of input.
   */
  private skipToContent(): number {
    for (;;) {
      if (!this.atLineEnd()) break;
      if (this.pos >= this.src.length) return -1;
      this.pos = skipBreak(this.src, this.pos);
    }

    const start = this.lineStartOf(this.pos);
    const indentation = this.src.slice(start, this.pos);
    if (/^[ \t]*$/.test(indentation)) {
      const tab = indentation.indexOf('\t');
      if (tab >= 0) {
        this.fail('tab characters must not be used in indentation', 'ERR_TAB_INDENT', start + tab);
      }
    }
    return this.pos - start;
  }

  /**
   * Whitespace, line breaks and comments inside a flow collection.
   * Continuation lines must be indented at least `minIndent` columns.
   */
  private skipFlowSpace(minIndent: number): void {
    for (;;) {
      const ch = this.src[this.pos];
      if (isWhite(ch)) {
        this.pos++;
      } else if (ch === '#') {
        this.pos = lineEnd(this.src, this.pos);
      } else if (isBreak(ch)) {
        this.pos = skipBreak(this.src, this.pos);
        if (isDocumentMarker(this.src, this.pos)) {
          this.fail('document markers are not allowed inside flow collections');
        }
        let p = this.pos;
        while (isWhite(this.src[p])) p++;
        const content = this.src[p];
        if (content !== undefined && !isBreak(content) && content !== '#' && p - this.pos < minIndent) {
          this.fail('flow collection line is not indented enough', 'ERR_FLOW_INDENT', p);
        }
        this.pos = p;
      } else {
        return;
      }
    }
  }

  /**
   * Skip the rest of a broken document: up to the next `---` (left in place)
   * or past the next `...`.
   */
  private resync(): void {
    let p = this.lineStartOf(this.errorPos);
    if (p <= this.docBegin) {
      p = skipBreak(this.src, lineEnd(this.src, this.docBegin));
    }
    while (p < this.src.length) {
      if (isDocumentMarker(this.src, p)) {
        this.pos = this.src[p] === '.' ? skipBreak(this.src, lineEnd(this.src, p)) : p;
        return;
      }
      const next = skipBreak(this.src, lineEnd(this.src, p));
      if (next === p) break;
      p = next;
    }
    this.pos = this.src.length;
  }

  // === Documents ===

  /**
   * Scans one document. Returns false when the stream has no more documents.
   */
  private *document(): Generator<ScanEvent, boolean, undefined> {
    this.docBegin = -1;
    this.tagHandles = new Map(DEFAULT_TAG_HANDLES);
    const directives: DirectiveState = { version: null, seen: false };

    for (;;) {
      const col = this.skipToContent();
      if (col < 0) {
        if (directives.seen) {
          this.fail('directives must be followed by a document start marker (---)');
        }
        return false;
      }
      if (col !== 0 || this.src[this.pos] !== '%') break;
      this.directive(directives);
    }

    if (isDocumentMarker(this.src, this.pos) && this.src[this.pos] === '.') {
      if (directives.seen) {
        this.fail('directives must be followed by a document start marker (---)');
      }
      this.pos += 3;
      if (!this.atLineEnd()) {
        this.fail('unexpected content after document end marker');
      }
      return true;
    }

    const explicit = isDocumentStart(this.src, this.pos);
    if (directives.seen && !explicit) {
      this.fail('directives must be followed by a document start marker (---)');
    }

    const start = this.pos;
    this.docBegin = this.lineStartOf(start);
    if (explicit) this.pos += 3;
    this.lastEnd = this.pos;
    this.docOpen = true;
    yield {
      type: 'document-start',
      span: this.span(start, this.pos),
      explicit,
      version: directives.version,
    };

    yield* this.blockNode(-1, true, false);

    let explicitEnd = false;
    let endStart = this.lastEnd;
    let endPos = this.lastEnd;
    if (this.skipToContent() >= 0) {
      if (!isDocumentMarker(this.src, this.pos)) {
        this.fail('unexpected content after the document root');
      }
      if (this.src[this.pos] === '.') {
        explicitEnd = true;
        endStart = this.pos;
        this.pos += 3;
        endPos = this.pos;
        if (!this.atLineEnd()) {
          this.fail('unexpected content after document end marker');
        }
      }
    }

    this.docOpen = false;
    yield { type: 'document-end', span: this.span(endStart, endPos), explicit: explicitEnd, aborted: false };
    return true;
  }

  private directive(state: DirectiveState): void {
    const start = this.pos;
    const end = lineEnd(this.src, start);
    const text = this.src.slice(start + 1, end).replace(/\s+#.*$/, '').trim();
    const [name, ...args] = text.split(/[ \t]+/);
    state.seen = true;

    if (name === 'YAML') {
      if (state.version !== null) {
        this.fail('duplicate %YAML directive', 'ERR_SYNTAX', start);
      }
      const version = args[0] ?? '';
      const match = /^(\d+)\.(\d+)$/.exec(version);
      if (!match || args.length !== 1) {
        this.fail('invalid %YAML directive', 'ERR_SYNTAX', start);
      }
      if (match[1] !== '1') {
        this.fail(`unsupported YAML version ${version}`, 'ERR_SYNTAX', start);
      }
      state.version = version;
    } else if (name === 'TAG') {
      const [handle, prefix] = args;
      if (args.length !== 2 || !/^!(?:[\w-]*!)?$/.test(handle)) {
        this.fail('invalid %TAG directive', 'ERR_SYNTAX', start);
      }
      if (this.tagHandles.has(handle) && this.tagHandles.get(handle) !== DEFAULT_TAG_HANDLES.get(handle)) {
        this.fail(`duplicate %TAG directive for handle ${handle}`, 'ERR_SYNTAX', start);
      }
      this.tagHandles.set(handle, prefix);
    }
    // Reserved directives are ignored

    this.pos = end;
  }

  // === Block nodes ===

  /**
   * A block node after an indicator (`---`, `-`, `?`, `:`) or at the start
   * of an implicit document. `parentIndent` is the indentation of the
   * enclosing block collection (-1 at the root).
   *
   * `compact` allows a nested collection to start on the same line
   * (`- a: 1`, `- - x`); `indentless` allows a sequence at `parentIndent`.
   */
  private *blockNode(parentIndent: number, compact: boolean, indentless: boolean): EventGenerator {
    const emptyAt = this.pos;
    let props = NO_PROPERTIES;

    this.skipInline();
    if (!this.atLineEnd()) {
      const col = this.column(this.pos);
      if (compact && this.startsSequenceEntry(this.pos)) {
        yield* this.blockSequence(col, NO_PROPERTIES);
        return;
      }
      if (compact && this.startsMappingEntry(this.pos)) {
        yield* this.blockMapping(col, NO_PROPERTIES);
        return;
      }

      props = this.properties();
      if (!this.atLineEnd()) {
        yield* this.sameLineNode(parentIndent, props);
        return;
      }
    }

    yield* this.nextLineNode(parentIndent, indentless, props, emptyAt);
  }

  private *sameLineNode(parentIndent: number, props: NodeProperties): EventGenerator {
    const ch = this.src[this.pos];
    if (ch === '|' || ch === '>') {
      yield* this.blockScalar(parentIndent, props);
      return;
    }
    if (this.startsSequenceEntry(this.pos)) {
      this.fail('block sequence entries are not allowed in this context');
    }
    if (this.startsMappingEntry(this.pos)) {
      this.fail('mapping values are not allowed in this context');
    }

    const buffer: ScanEvent[] = [];
    this.flowNode(buffer, parentIndent + 1, props, 'block');
    yield* buffer;
    if (!this.atLineEnd()) {
      this.fail('unexpected content after the node');
    }
  }

  private *nextLineNode(
    parentIndent: number,
    indentless: boolean,
    props: NodeProperties,
    emptyAt: number
  ): EventGenerator {
    const col = this.skipToContent();
    const present =
      col >= 0 &&
      !isDocumentMarker(this.src, this.pos) &&
      (col > parentIndent || (indentless && col === parentIndent && this.startsSequenceEntry(this.pos)));

    if (!present) {
      yield* this.emitAnchor(props);
      yield this.emptyScalar(emptyAt, props.tag);
      return;
    }

    if (this.startsSequenceEntry(this.pos)) {
      yield* this.blockSequence(col, props);
    } else if (this.startsMappingEntry(this.pos)) {
      yield* this.blockMapping(col, props);
    } else if (this.src[this.pos] === '|' || this.src[this.pos] === '>') {
      yield* this.blockScalar(parentIndent, props);
    } else {
      const more = this.properties();
      const merged = this.mergeProperties(props, more);
      if (!this.atLineEnd() && (this.src[this.pos] === '|' || this.src[this.pos] === '>')) {
        yield* this.blockScalar(parentIndent, merged);
        return;
      }
      const buffer: ScanEvent[] = [];
      this.flowNode(buffer, parentIndent + 1, merged, 'block');
      yield* buffer;
      if (!this.atLineEnd()) {
        this.fail('unexpected content after the node');
      }
    }
  }

  private *blockSequence(indent: number, props: NodeProperties): EventGenerator {
    yield* this.emitAnchor(props);
    yield { type: 'sequence-start', span: this.span(this.pos, this.pos), style: 'block', tag: props.tag };

    for (;;) {
      this.pos += 1;
      yield* this.blockNode(indent, true, false);

      const col = this.skipToContent();
      if (col < 0 || isDocumentMarker(this.src, this.pos) || col < indent) break;
      if (col > indent) {
        this.fail('bad indentation of a sequence entry');
      }
      // Same column but no `-`: the parent mapping continues
      if (!this.startsSequenceEntry(this.pos)) break;
    }

    yield { type: 'sequence-end', span: this.span(this.lastEnd, this.lastEnd) };
  }

  private *blockMapping(indent: number, props: NodeProperties): EventGenerator {
    yield* this.emitAnchor(props);
    yield { type: 'mapping-start', span: this.span(this.pos, this.pos), style: 'block', tag: props.tag };

    for (;;) {
      if (this.src[this.pos] === '?' && isBlankOrEnd(this.src[this.pos + 1])) {
        this.pos += 1;
        yield* this.blockNode(indent, true, false);

        const col = this.skipToContent();
        if (
          col === indent &&
          !isDocumentMarker(this.src, this.pos) &&
          this.src[this.pos] === ':' &&
          isBlankOrEnd(this.src[this.pos + 1])
        ) {
          this.pos += 1;
          yield* this.blockNode(indent, true, true);
        } else {
          yield this.emptyScalar(this.lastEnd, null);
        }
      } else {
        if (this.src[this.pos] === ':') {
          yield this.emptyScalar(this.pos, null);
        } else {
          const buffer: ScanEvent[] = [];
          this.flowNode(buffer, indent + 1, NO_PROPERTIES, 'block-key');
          yield* buffer;
          this.skipInline();
        }
        if (this.src[this.pos] !== ':') {
          this.fail("could not find expected ':'");
        }
        this.pos += 1;
        yield* this.blockNode(indent, false, true);
      }

      const col = this.skipToContent();
      if (col < 0 || isDocumentMarker(this.src, this.pos) || col < indent) break;
      if (col > indent) {
        this.fail('bad indentation of a mapping entry');
      }
      if (!this.startsMappingEntry(this.pos)) {
        this.fail("could not find expected ':'");
      }
    }

    yield { type: 'mapping-end', span: this.span(this.lastEnd, this.lastEnd) };
  }

  private startsSequenceEntry(pos: number): boolean {
    return this.src[pos] === '-' && isBlankOrEnd(this.src[pos + 1]);
  }

  private startsMappingEntry(pos: number): boolean {
    if (this.src[pos] === '?' && isBlankOrEnd(this.src[pos + 1])) return true;
    return this.findImplicitKeyColon(pos) >= 0;
  }

  /**
   * Offset of the `: ` that makes the line starting at `from` an implicit
   * key, or -1. Quoted scalars and flow collections on the line are skipped.
   */
  private findImplicitKeyColon(from: number): number {
    const first = this.src[from];
    if (first === '|' || first === '>' || first === '#') return -1;

    let depth = 0;
    let tokenStart = true;
    let p = from;
    while (p < this.src.length && !isBreak(this.src[p])) {
      const ch = this.src[p];
      if (tokenStart && (ch === '"' || ch === "'")) {
        p = this.skipQuotedOnLine(p);
        if (p < 0) return -1;
        tokenStart = false;
        continue;
      }
      if (ch === '#' && p > from && isWhite(this.src[p - 1])) return -1;

      if ((ch === '[' || ch === '{') && (tokenStart || depth > 0)) {
        depth++;
      } else if ((ch === ']' || ch === '}') && depth > 0) {
        depth--;
      } else if (ch === ':' && depth === 0 && isBlankOrEnd(this.src[p + 1])) {
        return p;
      }
      tokenStart = isWhite(ch) || (depth > 0 && (ch === ',' || ch === '[' || ch === '{'));
      p++;
    }
    return -1;
  }

  /** Offset after the quote closing the one at `start`, or -1 if it is not closed on this line */
  private skipQuotedOnLine(start: number): number {
    const quote = this.src[start];
    let p = start + 1;
    while (p < this.src.length && !isBreak(this.src[p])) {
      const ch = this.src[p];
      if (quote === '"' && ch === '\\') {
        p += 2;
        continue;
      }
      if (ch === quote) {
        if (quote === "'" && this.src[p + 1] === "'") {
          p += 2;
          continue;
        }
        return p + 1;
      }
      p++;
    }
    return -1;
  }

  // === Block scalars ===

  private *blockScalar(parentIndent: number, props: NodeProperties): EventGenerator {
    yield* this.emitAnchor(props);

    const start = this.pos;
    const style: ScalarStyle = this.src[this.pos] === '|' ? 'literal' : 'folded';
    this.pos++;

    let chomping: 'clip' | 'strip' | 'keep' = 'clip';
    let explicitIndent = 0;
    for (let i = 0; i < 2; i++) {
      const ch = this.src[this.pos];
      if ((ch === '+' || ch === '-') && chomping === 'clip') {
        chomping = ch === '+' ? 'keep' : 'strip';
      } else if (ch !== undefined && ch >= '1' && ch <= '9' && explicitIndent === 0) {
        explicitIndent = Number(ch);
      } else if (ch === '0') {
        this.fail('block scalar indentation indicator must be between 1 and 9');
      } else {
        break;
      }
      this.pos++;
    }
    const headerEnd = this.pos;
    if (!isBlankOrEnd(this.src[this.pos]) || !this.atLineEnd()) {
      this.fail('invalid block scalar header');
    }
    this.pos = skipBreak(this.src, this.pos);

    let indent = explicitIndent > 0 ? Math.max(parentIndent + explicitIndent, 0) : -1;
    const lines: string[] = [];
    let finalBreak = false;
    let contentEnd = headerEnd;

    while (this.pos < this.src.length) {
      if (isDocumentMarker(this.src, this.pos)) break;

      let p = this.pos;
      while (this.src[p] === ' ') p++;
      const spaces = p - this.pos;

      if (p >= this.src.length || isBreak(this.src[p])) {
        // Spaces past the content indentation are text
        if (indent >= 0 && spaces > indent) {
          lines.push(this.src.slice(this.pos + indent, p));
          contentEnd = p;
          finalBreak = p < this.src.length;
        } else if (p < this.src.length) {
          lines.push('');
        }
        if (p >= this.src.length) {
          this.pos = p;
          break;
        }
        this.pos = skipBreak(this.src, p);
        continue;
      }

      if (indent < 0) {
        if (spaces <= parentIndent) break;
        indent = spaces;
      }
      if (spaces < indent) break;

      const end = lineEnd(this.src, this.pos);
      lines.push(this.src.slice(this.pos + indent, end));
      contentEnd = end;
      if (end >= this.src.length) {
        finalBreak = false;
        this.pos = end;
        break;
      }
      finalBreak = true;
      this.pos = skipBreak(this.src, end);
    }

    let trailing = 0;
    while (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
      trailing++;
    }

    let value: string;
    if (lines.length === 0) {
      value = chomping === 'keep' ? '\n'.repeat(trailing) : '';
    } else {
      const body = style === 'literal' ? lines.join('\n') : foldLines(lines);
      if (chomping === 'strip') {
        value = body;
      } else if (chomping === 'keep') {
        value = body + (finalBreak ? '\n' : '') + '\n'.repeat(trailing);
      } else {
        value = body + (finalBreak ? '\n' : '');
      }
    }

    this.lastEnd = contentEnd;
    yield { type: 'scalar', span: this.span(start, contentEnd), value, style, tag: props.tag };
  }

  // === Flow nodes and scalars ===

  /**
   * Reads a node that is not a block collection or block scalar into
   * `out`: alias, flow collection, quoted or plain scalar.
   */
  private flowNode(out: ScanEvent[], minIndent: number, outer: NodeProperties, context: NodeContext): void {
    const props = this.mergeProperties(outer, this.properties());
    if (context === 'flow' && (props.anchor || props.tag !== null)) {
      this.skipFlowSpace(minIndent);
    }

    const ch = this.src[this.pos];
    const next = this.src[this.pos + 1];

    if (ch === '*') {
      if (props.anchor || props.tag !== null) {
        this.fail('an alias node must not have properties');
      }
      out.push(this.alias());
      return;
    }

    if (props.anchor) {
      out.push({ type: 'anchor', name: props.anchor.name, span: this.span(props.anchor.start, props.anchor.end) });
    }

    if (ch === '[') {
      this.flowSequence(out, minIndent, props.tag);
    } else if (ch === '{') {
      this.flowMapping(out, minIndent, props.tag);
    } else if (ch === '"') {
      out.push(this.doubleQuoted(props.tag));
    } else if (ch === "'") {
      out.push(this.singleQuoted(props.tag));
    } else if (this.canStartPlain(ch, next, context)) {
      out.push(this.plainScalar(minIndent, context, props.tag));
    } else if (props.anchor || props.tag !== null) {
      out.push(this.emptyScalar(this.pos, props.tag));
    } else if (ch === undefined) {
      this.fail('unexpected end of input');
    } else {
      this.fail(`unexpected character '${ch}'`);
    }
  }

  private canStartPlain(ch: string | undefined, next: string | undefined, context: NodeContext): boolean {
    if (isBlankOrEnd(ch)) return false;
    if (ch === '-' || ch === '?' || ch === ':') {
      return !isBlankOrEnd(next) && !(context === 'flow' && isFlowIndicator(next));
    }
    return !isIndicator(ch);
  }

  private flowSequence(out: ScanEvent[], minIndent: number, tag: string | null): void {
    const start = this.pos;
    this.pos++;
    out.push({ type: 'sequence-start', span: this.span(start, this.pos), style: 'flow', tag });

    for (;;) {
      this.skipFlowSpace(minIndent);
      const ch = this.src[this.pos];
      if (ch === undefined) {
        this.fail('unterminated flow sequence', 'ERR_UNTERMINATED', start);
      }
      if (ch === ']') break;
      if (ch === ',') {
        this.fail("unexpected ',' in flow sequence");
      }

      this.flowSequenceEntry(out, minIndent);

      this.skipFlowSpace(minIndent);
      const after = this.src[this.pos];
      if (after === ',') {
        this.pos++;
        continue;
      }
      if (after === ']') break;
      if (after === undefined) {
        this.fail('unterminated flow sequence', 'ERR_UNTERMINATED', start);
      }
      this.fail("expected ',' or ']' in flow sequence");
    }

    this.pos++;
    this.lastEnd = this.pos;
    out.push({ type: 'sequence-end', span: this.span(this.pos - 1, this.pos) });
  }

  private flowSequenceEntry(out: ScanEvent[], minIndent: number): void {
    const entryStart = this.pos;

    if (this.src[this.pos] === '?' && isBlankOrEnd(this.src[this.pos + 1])) {
      this.pos++;
      out.push({ type: 'mapping-start', span: this.span(entryStart, entryStart), style: 'flow', tag: null });
      this.flowPair(out, minIndent);
      out.push({ type: 'mapping-end', span: this.span(this.lastEnd, this.lastEnd) });
      return;
    }

    const entry: ScanEvent[] = [];
    if (this.isEmptyFlowKey()) {
      entry.push(this.emptyScalar(this.pos, null));
    } else {
      this.flowNode(entry, minIndent, NO_PROPERTIES, 'flow');
    }
    this.skipFlowSpace(minIndent);

    if (this.atPairColon(entry)) {
      this.pos++;
      out.push({ type: 'mapping-start', span: this.span(entryStart, entryStart), style: 'flow', tag: null });
      out.push(...entry);
      this.flowPairValue(out, minIndent);
      out.push({ type: 'mapping-end', span: this.span(this.lastEnd, this.lastEnd) });
    } else {
      out.push(...entry);
    }
  }

  private flowMapping(out: ScanEvent[], minIndent: number, tag: string | null): void {
    const start = this.pos;
    this.pos++;
    out.push({ type: 'mapping-start', span: this.span(start, this.pos), style: 'flow', tag });

    for (;;) {
      this.skipFlowSpace(minIndent);
      const ch = this.src[this.pos];
      if (ch === undefined) {
        this.fail('unterminated flow mapping', 'ERR_UNTERMINATED', start);
      }
      if (ch === '}') break;
      if (ch === ',') {
        this.fail("unexpected ',' in flow mapping");
      }

      if (ch === '?' && isBlankOrEnd(this.src[this.pos + 1])) {
        this.pos++;
      }
      this.flowPair(out, minIndent);

      this.skipFlowSpace(minIndent);
      const after = this.src[this.pos];
      if (after === ',') {
        this.pos++;
        continue;
      }
      if (after === '}') break;
      if (after === undefined) {
        this.fail('unterminated flow mapping', 'ERR_UNTERMINATED', start);
      }
      this.fail("expected ',' or '}' in flow mapping");
    }

    this.pos++;
    this.lastEnd = this.pos;
    out.push({ type: 'mapping-end', span: this.span(this.pos - 1, this.pos) });
  }

  /** Key, optional `:` and value of one flow mapping entry */
  private flowPair(out: ScanEvent[], minIndent: number): void {
    this.skipFlowSpace(minIndent);
    const key: ScanEvent[] = [];
    const ch = this.src[this.pos];
    if (this.isEmptyFlowKey() || ch === ',' || ch === '}' || ch === ']') {
      key.push(this.emptyScalar(this.pos, null));
    } else {
      this.flowNode(key, minIndent, NO_PROPERTIES, 'flow');
    }
    out.push(...key);

    this.skipFlowSpace(minIndent);
    if (this.atPairColon(key)) {
      this.pos++;
      this.flowPairValue(out, minIndent);
    } else {
      out.push(this.emptyScalar(this.pos, null));
    }
  }

  private flowPairValue(out: ScanEvent[], minIndent: number): void {
    this.skipFlowSpace(minIndent);
    const ch = this.src[this.pos];
    if (ch === undefined || ch === ',' || ch === ']' || ch === '}') {
      out.push(this.emptyScalar(this.pos, null));
    } else {
      this.flowNode(out, minIndent, NO_PROPERTIES, 'flow');
    }
  }

  private isEmptyFlowKey(): boolean {
    const next = this.src[this.pos + 1];
    return this.src[this.pos] === ':' && (isBlankOrEnd(next) || isFlowIndicator(next));
  }

  /**
   * True at the `:` separating a flow key from its value. After a quoted
   * scalar or flow collection (JSON-like key) the colon needs no space.
   */
  private atPairColon(key: readonly ScanEvent[]): boolean {
    if (this.src[this.pos] !== ':') return false;
    const next = this.src[this.pos + 1];
    if (isBlankOrEnd(next) || isFlowIndicator(next)) return true;

    const last = key[key.length - 1];
    if (last === undefined) return false;
    return (
      last.type === 'sequence-end' ||
      last.type === 'mapping-end' ||
      (last.type === 'scalar' && (last.style === 'single-quoted' || last.style === 'double-quoted'))
    );
  }

  private plainScalar(minIndent: number, context: NodeContext, tag: string | null): ScalarEvent {
    const start = this.pos;
    const inFlow = context === 'flow';
    let value = '';
    let end = start;
    let breaks = 0;

    for (;;) {
      const chunkStart = this.pos;
      let p = this.pos;
      while (p < this.src.length) {
        const ch = this.src[p];
        if (isBreak(ch)) break;
        if (ch === ':') {
          const next = this.src[p + 1];
          if (isBlankOrEnd(next) || (inFlow && isFlowIndicator(next))) break;
        }
        if (ch === '#' && p > chunkStart && isWhite(this.src[p - 1])) break;
        if (inFlow && isFlowIndicator(ch)) break;
        p++;
      }

      const chunk = this.src.slice(chunkStart, p).replace(/[ \t]+$/, '');
      if (chunk.length > 0) {
        if (breaks > 0) {
          value += breaks <= 1 ? ' ' : '\n'.repeat(breaks - 1);
        }
        value += chunk;
        end = chunkStart + chunk.length;
      }
      this.pos = end;

      if (!isBreak(this.src[p]) || context === 'block-key') break;

      const resume = this.plainContinuation(p, minIndent);
      if (resume === null) break;
      this.pos = resume.pos;
      breaks = resume.breaks;
    }

    this.lastEnd = end;
    return { type: 'scalar', span: this.span(start, end), value, style: 'plain', tag };
  }

  /**
   * Where a multi-line plain scalar continues after the break at `from`,
   * and how many line breaks were crossed; null if it ends there.
   */
  private plainContinuation(from: number, minIndent: number): { pos: number; breaks: number } | null {
    let q = from;
    let breaks = 0;
    while (q < this.src.length && isBreak(this.src[q])) {
      q = skipBreak(this.src, q);
      breaks++;
      if (isDocumentMarker(this.src, q)) return null;

      let r = q;
      while (isWhite(this.src[r])) r++;
      const ch = this.src[r];
      if (ch === undefined) return null;
      if (isBreak(ch)) {
        q = r;
        continue;
      }
      if (ch === '#' || r - q < minIndent) return null;
      return { pos: r, breaks };
    }
    return null;
  }

  private singleQuoted(tag: string | null): ScalarEvent {
    const start = this.pos;
    this.pos++;
    let value = '';

    for (;;) {
      const ch = this.src[this.pos];
      if (ch === undefined) {
        this.fail('unterminated single-quoted scalar', 'ERR_UNTERMINATED', start);
      }
      if (ch === "'") {
        if (this.src[this.pos + 1] === "'") {
          value += "'";
          this.pos += 2;
          continue;
        }
        this.pos++;
        break;
      }
      if (isBreak(ch)) {
        value = value.replace(/[ \t]+$/, '') + this.foldQuotedBreak(start);
        continue;
      }
      value += ch;
      this.pos++;
    }

    this.lastEnd = this.pos;
    return { type: 'scalar', span: this.span(start, this.pos), value, style: 'single-quoted', tag };
  }

  private doubleQuoted(tag: string | null): ScalarEvent {
    const start = this.pos;
    this.pos++;
    let value = '';
    // Escaped characters before this index are never trimmed
    let kept = 0;

    for (;;) {
      const ch = this.src[this.pos];
      if (ch === undefined) {
        this.fail('unterminated double-quoted scalar', 'ERR_UNTERMINATED', start);
      }
      if (ch === '"') {
        this.pos++;
        break;
      }
      if (ch === '\\') {
        const escapeStart = this.pos;
        const code = this.src[this.pos + 1];
        if (isBreak(code)) {
          // Escaped line break: join without a space
          this.pos = skipBreak(this.src, this.pos + 1);
          this.skipInline();
          while (isBreak(this.src[this.pos])) {
            value += '\n';
            this.pos = skipBreak(this.src, this.pos);
            this.skipInline();
          }
          kept = value.length;
          continue;
        }
        if (code !== undefined && code in SIMPLE_ESCAPES) {
          value += SIMPLE_ESCAPES[code];
          this.pos += 2;
        } else if (code !== undefined && code in HEX_ESCAPE_LENGTHS) {
          const length = HEX_ESCAPE_LENGTHS[code];
          const hex = this.src.slice(this.pos + 2, this.pos + 2 + length);
          const codePoint = parseInt(hex, 16);
          if (hex.length !== length || ![...hex].every(isHexDigit) || codePoint > 0x10ffff) {
            this.fail(`invalid escape sequence '\\${code}${hex}'`, 'ERR_INVALID_ESCAPE', escapeStart);
          }
          value += String.fromCodePoint(codePoint);
          this.pos += 2 + length;
        } else {
          this.fail(`invalid escape sequence '\\${code ?? ''}'`, 'ERR_INVALID_ESCAPE', escapeStart);
        }
        kept = value.length;
        continue;
      }
      if (isBreak(ch)) {
        value = value.slice(0, kept) + value.slice(kept).replace(/[ \t]+$/, '') + this.foldQuotedBreak(start);
        kept = value.length;
        continue;
      }
      value += ch;
      this.pos++;
    }

    this.lastEnd = this.pos;
    return { type: 'scalar', span: this.span(start, this.pos), value, style: 'double-quoted', tag };
  }

  /**
   * Line folding inside a quoted scalar: one break becomes a space, each
   * further (blank) line a newline. Leaves `pos` on the next content.
   */
  private foldQuotedBreak(quoteStart: number): string {
    let breaks = 0;
    while (isBreak(this.src[this.pos])) {
      this.pos = skipBreak(this.src, this.pos);
      breaks++;
      if (isDocumentMarker(this.src, this.pos)) {
        this.fail('document markers are not allowed inside quoted scalars');
      }
      this.skipInline();
    }
    if (this.pos >= this.src.length) {
      this.fail('unterminated quoted scalar', 'ERR_UNTERMINATED', quoteStart);
    }
    return breaks === 1 ? ' ' : '\n'.repeat(breaks - 1);
  }

  private alias(): ScanEvent {
    const start = this.pos;
    this.pos++;
    const name = this.readName();
    if (name.length === 0) {
      this.fail('alias name must not be empty', 'ERR_SYNTAX', start);
    }
    this.lastEnd = this.pos;
    return { type: 'alias', name, span: this.span(start, this.pos) };
  }

  private emptyScalar(at: number, tag: string | null): ScalarEvent {
    this.lastEnd = Math.max(this.lastEnd, at);
    return { type: 'scalar', span: this.span(at, at), value: '', style: 'plain', tag };
  }

  // === Properties ===

  /**
   * Anchor and tag in either order, each followed by inline whitespace.
   */
  private properties(): NodeProperties {
    let anchor: NodeProperties['anchor'] = null;
    let tag: string | null = null;

    for (;;) {
      const ch = this.src[this.pos];
      if (ch === '&') {
        const start = this.pos;
        if (anchor) {
          this.fail('a node can have only one anchor');
        }
        this.pos++;
        const name = this.readName();
        if (name.length === 0) {
          this.fail('anchor name must not be empty', 'ERR_SYNTAX', start);
        }
        anchor = { name, start, end: this.pos };
      } else if (ch === '!') {
        if (tag !== null) {
          this.fail('a node can have only one tag');
        }
        tag = this.readTag();
      } else {
        break;
      }
      this.skipInline();
    }

    return anchor || tag !== null ? { anchor, tag } : NO_PROPERTIES;
  }

  private mergeProperties(outer: NodeProperties, inner: NodeProperties): NodeProperties {
    if (outer === NO_PROPERTIES) return inner;
    if (inner === NO_PROPERTIES) return outer;
    if (outer.anchor && inner.anchor) {
      this.fail('a node can have only one anchor', 'ERR_SYNTAX', inner.anchor.start);
    }
    if (outer.tag !== null && inner.tag !== null) {
      this.fail('a node can have only one tag');
    }
    return { anchor: outer.anchor ?? inner.anchor, tag: outer.tag ?? inner.tag };
  }

  private *emitAnchor(props: NodeProperties): EventGenerator {
    if (props.anchor) {
      yield { type: 'anchor', name: props.anchor.name, span: this.span(props.anchor.start, props.anchor.end) };
    }
  }

  private readName(): string {
    const start = this.pos;
    while (!isBlankOrEnd(this.src[this.pos]) && !isFlowIndicator(this.src[this.pos])) {
      this.pos++;
    }
    return this.src.slice(start, this.pos);
  }

  private readTag(): string {
    const start = this.pos;
    this.pos++;

    if (this.src[this.pos] === '<') {
      const close = this.src.indexOf('>', this.pos);
      const end = lineEnd(this.src, this.pos);
      if (close < 0 || close > end || close === this.pos + 1) {
        this.fail('invalid verbatim tag', 'ERR_SYNTAX', start);
      }
      this.pos = close + 1;
      return this.src.slice(start + 2, close);
    }

    while (!isBlankOrEnd(this.src[this.pos]) && !isFlowIndicator(this.src[this.pos])) {
      this.pos++;
    }
    const text = this.src.slice(start, this.pos);
    if (text === '!') return '!';

    const match = /^(![\w-]*!|!)(.*)$/s.exec(text);
    const handle = match ? match[1] : '!';
    const suffix = match ? match[2] : text.slice(1);
    const prefix = this.tagHandles.get(handle);
    if (prefix === undefined) {
      this.fail(`undefined tag handle '${handle}'`, 'ERR_SYNTAX', start);
    }
    if (suffix.length === 0) {
      this.fail('tag suffix must not be empty', 'ERR_SYNTAX', start);
    }

    try {
      return prefix + decodeURIComponent(suffix);
    } catch {
      this.fail(`invalid percent-encoding in tag '${text}'`, 'ERR_SYNTAX', start);
    }
  }
}

/**
 * Folded block scalar line joining. Lines starting with whitespace ("more
 * indented") keep their line breaks; blank lines become newlines.
 */
function foldLines(lines: readonly string[]): string {
  let result = '';
  let emptyLines = 0;
  let atMoreIndented = false;
  let didReadContent = false;

  for (const line of lines) {
    if (line === '') {
      emptyLines++;
      continue;
    }
    if (isWhite(line[0])) {
      atMoreIndented = true;
      result += '\n'.repeat(didReadContent ? 1 + emptyLines : emptyLines);
    } else if (atMoreIndented) {
      atMoreIndented = false;
      result += '\n'.repeat(emptyLines + 1);
    } else if (emptyLines === 0) {
      if (didReadContent) result += ' ';
    } else {
      result += '\n'.repeat(emptyLines);
    }
    result += line;
    didReadContent = true;
    emptyLines = 0;
  }
  return result;
}
