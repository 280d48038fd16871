/**
 * Configuration shapes accepted by the public entry points.
 *
 * Every field is optional; unset fields fall back to the engine defaults
 * (see `DEFAULT_LINT_CONFIG`, `DEFAULT_PARALLEL_CONFIG`, `DEFAULT_EMIT_OPTIONS`
 * in @yamlet/core).
 */

import type { Severity } from './diagnostics.js';

export interface LintConfig {
  /**
   * Rule ids or glob patterns. An entry starting with `!` excludes matching
   * rules. Unset means every built-in rule.
   *
   * @example ['*', '!line-length']
   */
  enabledRules?: readonly string[];
  /** Per-rule severity, replacing the rule default */
  ruleSeverityOverrides?: Readonly<Record<string, Severity>>;
  /** Keep at most this many diagnostics (after sorting) */
  maxDiagnostics?: number;
  /** Limit used by `line-length` (default 120) */
  maxLineLength?: number;
  /** Expected indentation step for `indentation`; auto-detected when unset */
  indentSize?: number;
}

export interface ParallelConfig {
  /** Worker threads to use (default: available parallelism) */
  threadCount?: number;
  /** Maximum input size in UTF-8 bytes (default 100 MiB) */
  maxInputSize?: number;
  /** Maximum number of documents in one stream (default 100 000) */
  maxDocumentCount?: number;
}

export interface EmitOptions {
  /** Emit mapping entries in `compareValues` order */
  sortKeys?: boolean;
  /** Emit non-ASCII characters as-is instead of escaping them */
  allowUnicode?: boolean;
  /** Emit every collection in flow style (`[...]`, `{...}`) */
  defaultFlowStyle?: boolean;
  /** Indentation step, clamped to 1..9 (default 2) */
  indent?: number;
  /** Preferred line width, clamped to 20..1000 (default 80) */
  width?: number;
  /** Start the document with `---` */
  explicitStart?: boolean;
}
