/**
 * DiagnosticCollector - Collects diagnostics produced by lint rules
 *
 * Rules report through `add()`; the collector drops diagnostics of disabled
 * rules, applies the effective severity and freezes every entry. `getAll()`
 * returns them in the canonical lint order.
 *
 * Usage:
 *   const collector = new DiagnosticCollector(severities);
 *   collector.add({ code: 'line-length', message, span });
 *   collector.addFromError('syntax-error', error);
 *   return collector.getAll(config.maxDiagnostics);
 */

import type { Diagnostic, RelatedSpan, Severity, Span, Suggestion } from '@yamlet/types';
import { YamlSemanticError, YamlSyntaxError } from '../errors/YamletError.js';

/**
 * Diagnostic input. Severity comes from the collector.
 */
export interface DiagnosticInput {
  code: string;
  message: string;
  span: Span;
  related?: RelatedSpan[];
  suggestions?: Suggestion[];
}

const SEVERITY_RANK: Record<Severity, number> = {
  error: 0,
  warning: 1,
  info: 2,
  hint: 3,
};

/**
 * Canonical ordering: primary span start, severity, rule id, message.
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    a.span.start.offset - b.span.start.offset ||
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    compareStrings(a.code, b.code) ||
    compareStrings(a.message, b.message)
  );
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function freezeSpan(span: Span): Span {
  return Object.freeze({ start: Object.freeze({ ...span.start }), end: Object.freeze({ ...span.end }) });
}

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  /**
   * @param severities effective severity of every enabled rule; diagnostics
   *   for rules missing from the map are discarded
   */
  constructor(private readonly severities: ReadonlyMap<string, Severity>) {}

  isEnabled(code: string): boolean {
    return this.severities.has(code);
  }

  /**
   * Add a diagnostic. Ignored when its rule is disabled.
   */
  add(input: DiagnosticInput): void {
    const severity = this.severities.get(input.code);
    if (severity === undefined) {
      return;
    }

    this.diagnostics.push(
      Object.freeze({
        code: input.code,
        severity,
        message: input.message,
        span: freezeSpan(input.span),
        related: Object.freeze(
          (input.related ?? []).map(r => Object.freeze({ span: freezeSpan(r.span), label: r.label }))
        ),
        suggestions: Object.freeze(
          (input.suggestions ?? []).map(s =>
            Object.freeze(
              s.replacement === undefined
                ? { message: s.message, span: freezeSpan(s.span) }
                : { message: s.message, span: freezeSpan(s.span), replacement: s.replacement }
            )
          )
        ),
      })
    );
  }

  /**
   * Convert a scanner or composer error into a diagnostic for rule `code`.
   * Syntax errors get a zero-width span at the reported location.
   */
  addFromError(code: string, error: YamlSyntaxError | YamlSemanticError, suggestion?: Suggestion): void {
    if (error instanceof YamlSyntaxError) {
      this.add({
        code,
        message: error.reason,
        span: { start: error.location, end: error.location },
        suggestions: suggestion ? [suggestion] : [],
      });
      return;
    }

    if (error.span === undefined) {
      return;
    }
    this.add({
      code,
      message: error.reason,
      span: error.span,
      related: error.related,
      suggestions: suggestion ? [suggestion] : [],
    });
  }

  /**
   * All diagnostics in canonical order, optionally truncated to `limit`.
   */
  getAll(limit?: number): Diagnostic[] {
    const sorted = [...this.diagnostics].sort(compareDiagnostics);
    return limit === undefined ? sorted : sorted.slice(0, Math.max(0, limit));
  }

  getByCode(code: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error');
  }

  hasWarnings(): boolean {
    return this.diagnostics.some(d => d.severity === 'warning');
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Diagnostics as JSON lines (one object per line), in canonical order.
   */
  toDiagnosticsLog(): string {
    return this.getAll()
      .map(d => JSON.stringify(d))
      .join('\n');
  }

  clear(): void {
    this.diagnostics = [];
  }
}
