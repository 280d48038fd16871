/**
 * Source positions shared by the scanner, composer, linter and errors.
 *
 * `line` and `column` are 1-based. `offset` is a 0-based index into the
 * decoded source string (UTF-16 code units).
 */

export interface Location {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/**
 * Half-open range [start, end)
 */
export interface Span {
  readonly start: Location;
  readonly end: Location;
}

/**
 * One parsed unit of a stream.
 */
export interface Document<V> {
  /** Position of the document in its stream (0-based) */
  readonly index: number;
  /** Root node, or null for an empty document */
  readonly root: V | null;
  /** Range of source text the document was composed from */
  readonly span: Span;
  /** Document opened with `---` */
  readonly explicitStart: boolean;
  /** Document closed with `...` */
  readonly explicitEnd: boolean;
}
