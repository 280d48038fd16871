/**
 * Lint diagnostics - the output contract of the lint engine.
 */

import type { Span } from './source.js';

export type Severity = 'error' | 'warning' | 'info' | 'hint';

/**
 * Secondary location attached to a diagnostic (e.g. the first definition of a
 * duplicated key).
 */
export interface RelatedSpan {
  readonly span: Span;
  readonly label: string;
}

/**
 * Proposed edit. When `replacement` is present, replacing the text covered by
 * `span` with it resolves the diagnostic.
 */
export interface Suggestion {
  readonly message: string;
  readonly span: Span;
  readonly replacement?: string;
}

export interface Diagnostic {
  /** Stable rule identifier, e.g. `duplicate-key` */
  readonly code: string;
  readonly severity: Severity;
  readonly message: string;
  readonly span: Span;
  readonly related: readonly RelatedSpan[];
  readonly suggestions: readonly Suggestion[];
}

export type DiagnosticFormat = 'text' | 'json';
