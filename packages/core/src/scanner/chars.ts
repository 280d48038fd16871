/**
 * Character classes shared by the Scanner and the document splitter.
 */

export function isWhite(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t';
}

export function isBreak(ch: string | undefined): boolean {
  return ch === '\n' || ch === '\r';
}

/** Whitespace, line break or end of input */
export function isBlankOrEnd(ch: string | undefined): boolean {
  return ch === undefined || isWhite(ch) || isBreak(ch);
}

export function isFlowIndicator(ch: string | undefined): boolean {
  return ch === ',' || ch === '[' || ch === ']' || ch === '{' || ch === '}';
}

const INDICATORS = new Set(['-', '?', ':', ',', '[', ']', '{', '}', '#', '&', '*', '!', '|', '>', "'", '"', '%', '@', '`']);

/** Characters that cannot start a plain scalar (with exceptions for `-?:`) */
export function isIndicator(ch: string | undefined): boolean {
  return ch !== undefined && INDICATORS.has(ch);
}

export function isDecimalDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

export function isHexDigit(ch: string | undefined): boolean {
  return ch !== undefined && /^[0-9a-fA-F]$/.test(ch);
}

/**
 * True when `pos` starts a `---` or `...` marker at column 0.
 */
export function isDocumentMarker(source: string, pos: number): boolean {
  if (pos !== 0 && source[pos - 1] !== '\n' && source[pos - 1] !== '\r') {
    return false;
  }
  const marker = source.slice(pos, pos + 3);
  return (marker === '---' || marker === '...') && isBlankOrEnd(source[pos + 3]);
}

export function isDocumentStart(source: string, pos: number): boolean {
  return isDocumentMarker(source, pos) && source[pos] === '-';
}

/** Offset of the line break ending the line that contains `pos` */
export function lineEnd(source: string, pos: number): number {
  let i = pos;
  while (i < source.length && !isBreak(source[i])) i++;
  return i;
}

/** Offset just past the line break at `pos` (handles `\r\n`) */
export function skipBreak(source: string, pos: number): number {
  if (source[pos] === '\r' && source[pos + 1] === '\n') return pos + 2;
  return isBreak(source[pos]) ? pos + 1 : pos;
}

/** Offsets where each line starts */
export function lineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source[i] === '\n') {
      starts.push(i + 1);
    } else if (source[i] === '\r' && source[i + 1] !== '\n') {
      starts.push(i + 1);
    }
  }
  return starts;
}
