/**
 * DiagnosticReporter - Formats lint diagnostics for output
 *
 * Supports two output formats:
 * - text: source excerpt with a line-number gutter and carets under the
 *   offending span, plus notes for related spans and help for suggestions
 * - json: machine-readable `{ diagnostics, summary }` for CI integration
 *
 * Usage:
 *   const reporter = new DiagnosticReporter(diagnostics, source);
 *   console.log(reporter.report({ format: 'text', useColors: true }));
 *   console.log(reporter.summary());
 */

import type { Diagnostic, DiagnosticFormat, Severity } from '@yamlet/types';
import { lineEnd, lineStarts } from '../scanner/chars.js';
import { RULE_TO_CATEGORY } from './categories.js';

export interface ReportOptions {
  format: DiagnosticFormat;
  /** Wrap text output in ANSI color codes */
  useColors?: boolean;
}

export interface SummaryStats {
  total: number;
  errors: number;
  warnings: number;
  info: number;
  hints: number;
}

export interface CategoryCount {
  code: string;
  count: number;
  /** Category display name */
  category: string;
}

// ANSI colors
const COLORS = {
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  blue: '\x1b[34m',
  bold: '\x1b[1m',
  reset: '\x1b[0m',
};

const SEVERITY_COLORS: Record<Severity, string> = {
  error: COLORS.red,
  warning: COLORS.yellow,
  info: COLORS.cyan,
  hint: COLORS.green,
};

export class DiagnosticReporter {
  private starts: number[] | null = null;

  constructor(
    private readonly diagnostics: readonly Diagnostic[],
    private readonly source: string
  ) {}

  report(options: ReportOptions): string {
    if (options.format === 'json') {
      return this.jsonReport();
    }
    return this.textReport(options.useColors ?? false);
  }

  summary(): string {
    const stats = this.getStats();

    if (stats.total === 0) {
      return 'No issues found.';
    }

    const parts: string[] = [];
    if (stats.errors > 0) {
      parts.push(`Errors: ${stats.errors}`);
    }
    if (stats.warnings > 0) {
      parts.push(`Warnings: ${stats.warnings}`);
    }
    if (stats.info > 0) {
      parts.push(`Info: ${stats.info}`);
    }
    if (stats.hints > 0) {
      parts.push(`Hints: ${stats.hints}`);
    }
    return parts.join(', ');
  }

  getStats(): SummaryStats {
    const count = (severity: Severity) => this.diagnostics.filter(d => d.severity === severity).length;
    return {
      total: this.diagnostics.length,
      errors: count('error'),
      warnings: count('warning'),
      info: count('info'),
      hints: count('hint'),
    };
  }

  /**
   * Counts per rule, most frequent first (ties by rule id).
   */
  getCountsByCode(): CategoryCount[] {
    const counts = new Map<string, number>();
    for (const diag of this.diagnostics) {
      counts.set(diag.code, (counts.get(diag.code) ?? 0) + 1);
    }

    return [...counts.entries()]
      .map(([code, count]) => ({ code, count, category: RULE_TO_CATEGORY[code]?.name ?? 'Other' }))
      .sort((a, b) => b.count - a.count || (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
  }

  private jsonReport(): string {
    return JSON.stringify({ diagnostics: this.diagnostics, summary: this.getStats() }, null, 2);
  }

  private textReport(useColors: boolean): string {
    if (this.diagnostics.length === 0) {
      return 'No issues found.';
    }
    return this.diagnostics.map(diag => this.formatOne(diag, useColors)).join('\n\n');
  }

  private formatOne(diag: Diagnostic, useColors: boolean): string {
    const paint = (text: string, color: string) => (useColors ? `${color}${text}${COLORS.reset}` : text);
    const color = SEVERITY_COLORS[diag.severity];
    const { start, end } = diag.span;

    // Last line actually covered: a span ending at column 1 stops on the previous line
    const lastLine = end.line > start.line && end.column === 1 ? end.line - 1 : end.line;
    const width = String(lastLine).length;
    const gutter = paint(`${' '.repeat(width)} |`, COLORS.blue);

    const lines: string[] = [];
    lines.push(`${paint(diag.severity, color)}${paint(`[${diag.code}]`, COLORS.bold)}: ${diag.message}`);
    lines.push(`${' '.repeat(width)}${paint('-->', COLORS.blue)} ${start.line}:${start.column}`);
    lines.push(gutter);

    for (let line = start.line; line <= lastLine; line++) {
      const text = this.lineText(line);
      const from = line === start.line ? start.column : 1;
      const to = line === end.line ? end.column : text.length + 1;
      const carets = '^'.repeat(Math.max(1, to - from));
      // Keep tabs so the carets line up with the source
      const pad = text.slice(0, from - 1).replace(/[^\t]/g, ' ') + ' '.repeat(Math.max(0, from - 1 - text.length));

      lines.push(`${paint(`${String(line).padStart(width)} |`, COLORS.blue)} ${text}`);
      lines.push(`${gutter} ${pad}${paint(carets, color)}`);
    }

    for (const related of diag.related) {
      lines.push(
        `${' '.repeat(width)} ${paint('=', COLORS.blue)} note: ${related.label} at ${related.span.start.line}:${related.span.start.column}`
      );
    }
    for (const suggestion of diag.suggestions) {
      const replacement =
        suggestion.replacement === undefined ? '' : ` (replace with ${JSON.stringify(suggestion.replacement)})`;
      lines.push(`${' '.repeat(width)} ${paint('=', COLORS.blue)} help: ${suggestion.message}${replacement}`);
    }

    return lines.join('\n');
  }

  private lineText(line: number): string {
    if (this.starts === null) {
      this.starts = lineStarts(this.source);
    }
    const start = this.starts[line - 1];
    return start === undefined ? '' : this.source.slice(start, lineEnd(this.source, start));
  }
}

/**
 * Render diagnostics against the source they were produced from.
 */
export function formatDiagnostics(
  diagnostics: readonly Diagnostic[],
  source: string,
  format: DiagnosticFormat = 'text',
  useColors = false
): string {
  return new DiagnosticReporter(diagnostics, source).report({ format, useColors });
}
