/**
 * DocumentSplitter - finds top-level document boundaries in a stream
 *
 * One sequential pass over the lines of the source. A column-0 `---` starts
 * a new range; a column-0 `...` ends one. Markers are ignored while a flow
 * collection or a quoted scalar is still open. Quotes and brackets inside
 * plain scalars are text. Block scalar bodies are
 * skipped so their quotes and brackets do not count, but a column-0 marker
 * still ends them, as it does for the Scanner.
 *
 * Each range can be scanned on its own with `origin` set to its position,
 * and yields the same documents the full stream would.
 */

import { isBreak, isDocumentMarker, isFlowIndicator, isWhite, lineEnd, skipBreak } from '../scanner/chars.js';

export interface DocumentRange {
  /** Position in the stream (0-based) */
  index: number;
  /** Offset of the first character */
  start: number;
  /** Offset just past the last character */
  end: number;
  /** 1-based line of `start` */
  line: number;
}

interface Segment {
  start: number;
  line: number;
  /** Starts with `---` */
  explicit: boolean;
  /** Holds at least one content line */
  content: boolean;
  /** Holds a `%` directive line */
  directive: boolean;
}

interface BlockScalarState {
  /** Lines must be indented more than this to belong to the body */
  parentIndent: number;
  /** Detected from the first non-empty body line */
  indent: number | null;
}

/**
 * Character-level context carried from line to line
 */
class LineState {
  flowDepth = 0;
  quote: "'" | '"' | null = null;
  blockScalar: BlockScalarState | null = null;
  /** Inside a flow collection, the next token starts a node */
  flowNodeStart = false;
  /**
   * Column of the node that owns an open block plain scalar. Content lines
   * indented more than this continue the scalar.
   */
  plainOwner: number | null = null;

  /** A marker here would not be a document boundary */
  get nested(): boolean {
    return this.flowDepth > 0 || this.quote !== null;
  }

  reset(): void {
    this.flowDepth = 0;
    this.quote = null;
    this.blockScalar = null;
    this.flowNodeStart = false;
    this.plainOwner = null;
  }

  /**
   * True when the line at [from, to) belongs to the current block scalar body.
   * Ends the block scalar otherwise.
   */
  inBlockScalarBody(source: string, from: number, to: number): boolean {
    const scalar = this.blockScalar;
    if (scalar === null) return false;

    let p = from;
    while (p < to && source[p] === ' ') p++;
    if (p === to) return true;

    const indent = p - from;
    if (scalar.indent === null && indent > scalar.parentIndent) {
      scalar.indent = indent;
    }
    if (scalar.indent !== null && indent >= scalar.indent) return true;

    this.blockScalar = null;
    return false;
  }

  /**
   * Track quotes, flow brackets, comments, plain scalars and block scalar
   * headers on the characters [from, to) of the line starting at
   * `lineStart`. `indent` is the indentation of the enclosing block context
   * (-1 at the document root).
   *
   * Quotes, brackets and block scalar indicators only count where a node
   * can start; inside a plain scalar they are text.
   */
  scan(source: string, lineStart: number, from: number, to: number, indent: number): void {
    let tokenStart = true;
    let nodeStart = this.quote === null && this.flowDepth === 0;
    let ownerColumn = indent - 1;
    let nodeColumn = indent;
    let plainOwner: number | null = null;
    let touched = false;

    if (nodeStart && this.plainOwner !== null && indent > this.plainOwner && isContentLine(source, from, to)) {
      plainOwner = this.plainOwner;
      nodeStart = false;
    }

    for (let p = from; p < to; p++) {
      const ch = source[p];

      if (this.quote === "'") {
        if (ch === "'") {
          if (source[p + 1] === "'") p++;
          else this.quote = null;
        }
        tokenStart = false;
        continue;
      }
      if (this.quote === '"') {
        if (ch === '\\') p++;
        else if (ch === '"') this.quote = null;
        tokenStart = false;
        continue;
      }

      if (isWhite(ch)) {
        tokenStart = true;
        continue;
      }
      touched = true;
      if (ch === '#' && tokenStart) {
        plainOwner = null;
        break;
      }

      const separated = p + 1 >= to || isWhite(source[p + 1]);

      if (this.flowDepth > 0) {
        if (ch === '[' || ch === '{') {
          this.flowDepth++;
          this.flowNodeStart = true;
        } else if (ch === ']' || ch === '}') {
          this.flowDepth--;
          this.flowNodeStart = false;
        } else if (ch === ',') {
          this.flowNodeStart = true;
        } else if ((ch === "'" || ch === '"') && this.flowNodeStart) {
          this.quote = ch;
          this.flowNodeStart = false;
        } else if ((ch === ':' || ch === '?') && (separated || isFlowIndicator(source[p + 1]))) {
          this.flowNodeStart = true;
        } else {
          this.flowNodeStart = false;
        }
        tokenStart = false;
        continue;
      }

      const column = p - lineStart;
      if (nodeStart) {
        if ((ch === '-' || ch === '?' || ch === ':') && separated) {
          ownerColumn = column;
          tokenStart = false;
          continue;
        }
        if (ch === '&' || ch === '!') {
          while (p + 1 < to && !isWhite(source[p + 1])) p++;
          tokenStart = false;
          continue;
        }

        nodeStart = false;
        nodeColumn = column;
        if (ch === '[' || ch === '{') {
          this.flowDepth = 1;
          this.flowNodeStart = true;
        } else if (ch === "'" || ch === '"') {
          this.quote = ch;
        } else if ((ch === '|' || ch === '>') && /^[-+1-9]*(?:[ \t]|$)/.test(source.slice(p + 1, to))) {
          // As the first token on its line the scalar may sit at the line's own indentation
          const firstOnLine = source.slice(from, p).trim() === '';
          this.blockScalar = { parentIndent: firstOnLine ? indent - 1 : indent, indent: null };
          this.plainOwner = null;
          return;
        } else if (ch !== '*') {
          plainOwner = ownerColumn;
        }
      } else if (ch === ':' && separated) {
        nodeStart = true;
        ownerColumn = nodeColumn;
        plainOwner = null;
      }
      tokenStart = false;
    }

    if (touched) {
      this.plainOwner = this.flowDepth === 0 && this.quote === null ? plainOwner : null;
    }
  }
}

function isContentLine(source: string, from: number, to: number): boolean {
  let p = from;
  while (p < to && isWhite(source[p])) p++;
  return p < to && source[p] !== '#';
}

/**
 * Split `source` into independently parseable document ranges.
 *
 * Ranges with no `---` and no content (comments, blank lines, directives)
 * are merged into the following range, so directives stay with their
 * document. A trailing range of that kind is dropped unless it holds a
 * directive.
 */
export function splitDocuments(source: string): DocumentRange[] {
  const segments: Segment[] = [];
  const state = new LineState();
  let current: Segment = { start: 0, line: 1, explicit: false, content: false, directive: false };

  let pos = 0;
  let line = 1;
  while (pos < source.length) {
    const end = lineEnd(source, pos);
    const next = skipBreak(source, end);

    if (isDocumentMarker(source, pos) && !state.nested) {
      state.reset();
      if (source[pos] === '-') {
        segments.push(current);
        current = { start: pos, line, explicit: true, content: false, directive: false };
        state.scan(source, pos, pos + 3, end, -1);
        if (isContentLine(source, pos + 3, end)) current.content = true;
      } else {
        segments.push(current);
        current = { start: next, line: line + 1, explicit: false, content: false, directive: false };
      }
    } else if (!state.inBlockScalarBody(source, pos, end)) {
      if (!state.nested && source[pos] === '%') {
        current.directive = true;
      } else {
        if (isContentLine(source, pos, end)) current.content = true;
        let indent = 0;
        while (source[pos + indent] === ' ') indent++;
        state.scan(source, pos, pos, end, indent);
      }
    }

    if (next === pos) break;
    pos = next;
    if (isBreak(source[end])) line++;
  }
  segments.push(current);

  const ranges: DocumentRange[] = [];
  let pending: Segment | null = null;
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    const end = i + 1 < segments.length ? segments[i + 1].start : source.length;
    const start: Segment = pending ?? segment;

    if (!segment.explicit && !segment.content) {
      if (pending === null) pending = segment;
      else pending.directive = pending.directive || segment.directive;
      if (i + 1 < segments.length) continue;
      if (!pending.directive) break;
    }

    pending = null;
    ranges.push({ index: ranges.length, start: start.start, end, line: start.line });
  }

  return ranges;
}
