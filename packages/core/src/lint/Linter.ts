/**
 * Linter - runs the built-in lint rules over YAML source
 *
 * Pipeline:
 * 1. Resolve the configuration (enabled rules, severities, limits)
 * 2. Scan in tolerant mode, recording every event and syntax error
 * 3. Compose the recorded events in tolerant mode for semantic errors
 * 4. Run every rule that has at least one enabled id
 * 5. Return the collected diagnostics in canonical order
 *
 * `enabledRules` entries are rule ids or minimatch globs; an entry starting
 * with `!` excludes. A rule is enabled when some including entry matches it
 * and no excluding entry does.
 */

import { minimatch } from 'minimatch';
import type { Diagnostic, LintConfig, Severity } from '@yamlet/types';
import { Composer } from '../composer/Composer.js';
import { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import { RULE_IDS, RULE_TO_CATEGORY } from '../diagnostics/categories.js';
import { ConfigError } from '../errors/YamletError.js';
import type { YamlSemanticError, YamlSyntaxError } from '../errors/YamletError.js';
import { silentLogger } from '../logging/Logger.js';
import type { Logger } from '../logging/Logger.js';
import { Scanner } from '../scanner/Scanner.js';
import { lineEnd, lineStarts } from '../scanner/chars.js';
import type { ScanEvent } from '../scanner/events.js';
import type { LintContext, LintRule, ResolvedLintConfig, SourceLine } from './LintRule.js';
import { EmptyValuesRule, IndentationRule } from './rules/EventRules.js';
import { LineLengthRule, NewLineAtEndOfFileRule, TabIndentationRule, TrailingWhitespaceRule } from './rules/LineRules.js';
import { ParseErrorRule } from './rules/ParseErrorRule.js';

export const DEFAULT_LINT_CONFIG = {
  enabledRules: ['*'],
  ruleSeverityOverrides: {},
  maxLineLength: 120,
} as const;

const SEVERITIES: readonly Severity[] = ['error', 'warning', 'info', 'hint'];

function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some(severity => severity === value);
}

function positiveInteger(value: unknown, name: string, allowZero = false): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < (allowZero ? 0 : 1)) {
    throw new ConfigError(`lint.${name} must be a ${allowZero ? 'non-negative' : 'positive'} integer`, 'ERR_CONFIG_INVALID', {
      [name]: value,
    });
  }
  return value;
}

/**
 * Validate `config` and fill in defaults.
 *
 * @throws ConfigError on unknown override ids, bad severities or bad limits
 */
export function resolveLintConfig(config: LintConfig = {}, logger: Logger = silentLogger): ResolvedLintConfig {
  const patterns: readonly string[] = config.enabledRules ?? DEFAULT_LINT_CONFIG.enabledRules;
  const includes = patterns.filter(p => !p.startsWith('!'));
  const excludes = patterns.filter(p => p.startsWith('!')).map(p => p.slice(1));

  for (const pattern of [...includes, ...excludes]) {
    if (!RULE_IDS.some(id => minimatch(id, pattern))) {
      logger.warn('Lint rule pattern matches no rule', { pattern });
    }
  }

  const overrides = config.ruleSeverityOverrides ?? {};
  for (const [id, severity] of Object.entries(overrides)) {
    if (!Object.hasOwn(RULE_TO_CATEGORY, id)) {
      throw new ConfigError(
        `Unknown lint rule "${id}" in ruleSeverityOverrides`,
        'ERR_CONFIG_INVALID',
        { rule: id },
        `Known rules: ${RULE_IDS.join(', ')}`
      );
    }
    if (!isSeverity(severity)) {
      throw new ConfigError(`Invalid severity "${String(severity)}" for lint rule "${id}"`, 'ERR_CONFIG_INVALID', {
        rule: id,
        severity,
      });
    }
  }

  const severities = new Map<string, Severity>();
  for (const id of RULE_IDS) {
    const included = includes.some(pattern => minimatch(id, pattern));
    const excluded = excludes.some(pattern => minimatch(id, pattern));
    if (included && !excluded) {
      severities.set(id, Object.hasOwn(overrides, id) ? overrides[id] : RULE_TO_CATEGORY[id].defaultSeverity);
    }
  }

  return {
    severities,
    maxDiagnostics:
      config.maxDiagnostics === undefined ? null : positiveInteger(config.maxDiagnostics, 'maxDiagnostics', true),
    maxLineLength:
      config.maxLineLength === undefined
        ? DEFAULT_LINT_CONFIG.maxLineLength
        : positiveInteger(config.maxLineLength, 'maxLineLength'),
    indentSize: config.indentSize === undefined ? null : positiveInteger(config.indentSize, 'indentSize'),
  };
}

function splitLines(source: string): SourceLine[] {
  return lineStarts(source).map((start, index) => {
    const end = lineEnd(source, start);
    return { number: index + 1, start, end, text: source.slice(start, end) };
  });
}

export class Linter {
  private readonly config: ResolvedLintConfig;
  private readonly rules: LintRule[] = [
    new ParseErrorRule(),
    new IndentationRule(),
    new EmptyValuesRule(),
    new TrailingWhitespaceRule(),
    new TabIndentationRule(),
    new LineLengthRule(),
    new NewLineAtEndOfFileRule(),
  ];

  constructor(
    config: LintConfig = {},
    private readonly logger: Logger = silentLogger
  ) {
    this.config = resolveLintConfig(config, logger);
  }

  lint(source: string): Diagnostic[] {
    const syntaxErrors: YamlSyntaxError[] = [];
    const semanticErrors: YamlSemanticError[] = [];

    const events: ScanEvent[] = [
      ...new Scanner(source, { mode: 'tolerant', onError: error => syntaxErrors.push(error) }).events(),
    ];
    const composer = new Composer({ mode: 'tolerant', onError: error => semanticErrors.push(error) });
    const documents = [...composer.compose(events)].length;

    const collector = new DiagnosticCollector(this.config.severities);
    const context: LintContext = {
      source,
      lines: splitLines(source),
      events,
      syntaxErrors,
      semanticErrors,
      config: this.config,
      collector,
    };

    for (const rule of this.rules) {
      const { name, ids } = rule.metadata;
      if (!ids.some(id => collector.isEnabled(id))) continue;
      this.logger.trace('Running lint rule', { rule: name });
      rule.check(context);
    }

    this.logger.debug('Lint finished', {
      documents,
      diagnostics: collector.count(),
      syntaxErrors: syntaxErrors.length,
      semanticErrors: semanticErrors.length,
    });
    return collector.getAll(this.config.maxDiagnostics ?? undefined);
  }
}
