/**
 * Base LintRule class
 *
 * RULE CONTRACT:
 *
 * 1. Metadata - the rule ids the rule reports under
 * 2. Check - inspects the LintContext and reports through `context.collector`
 *
 * Rules never throw on malformed input: structural problems have already
 * been recorded by the tolerant scanner and composer.
 */

import type { Location, Severity } from '@yamlet/types';
import type { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import type { YamlSemanticError, YamlSyntaxError } from '../errors/YamletError.js';
import type { ScanEvent } from '../scanner/events.js';

/**
 * One physical line of the linted source
 */
export interface SourceLine {
  /** 1-based line number */
  number: number;
  /** Offset of the first character */
  start: number;
  /** Offset of the line break (or end of input) */
  end: number;
  text: string;
}

/**
 * Lint configuration after defaults and validation
 */
export interface ResolvedLintConfig {
  /** Effective severity of every enabled rule */
  severities: ReadonlyMap<string, Severity>;
  maxDiagnostics: number | null;
  maxLineLength: number;
  /** null = detect from the first indentation step */
  indentSize: number | null;
}

export interface LintContext {
  source: string;
  lines: readonly SourceLine[];
  /** Every event of the tolerant scan, in order */
  events: readonly ScanEvent[];
  syntaxErrors: readonly YamlSyntaxError[];
  semanticErrors: readonly YamlSemanticError[];
  config: ResolvedLintConfig;
  collector: DiagnosticCollector;
}

export interface LintRuleMetadata {
  name: string;
  /** Rule ids this rule can report */
  ids: readonly string[];
}

export abstract class LintRule {
  abstract get metadata(): LintRuleMetadata;

  abstract check(context: LintContext): void;

  /**
   * Location of `offset` on `line`
   */
  protected locate(line: SourceLine, offset: number): Location {
    return { line: line.number, column: offset - line.start + 1, offset };
  }
}
