/**
 * Lint rule categories - Single source of truth for rule metadata
 *
 * Rules are declared once, grouped by category, and both lookup directions
 * are derived from that table:
 * - LINT_CATEGORIES: category → rules (ids, default severity, description)
 * - RULE_TO_CATEGORY: rule id → category metadata (used by the Linter and
 *   the reporter summary)
 *
 * Adding a new lint rule requires updating only this file and the Linter.
 */

import type { Severity } from '@yamlet/types';

/**
 * Static description of one lint rule
 */
export interface LintRuleInfo {
  readonly id: string;
  readonly defaultSeverity: Severity;
  readonly description: string;
}

/**
 * Category definition with human-readable metadata and its rules
 */
export interface LintCategory {
  /** Human-readable name for display */
  readonly name: string;
  readonly description: string;
  readonly rules: readonly LintRuleInfo[];
}

export type LintCategoryKey = 'structure' | 'style';

export const LINT_CATEGORIES: Record<LintCategoryKey, LintCategory> = {
  structure: {
    name: 'Structure',
    description: 'Problems that make a document unparseable or change its meaning',
    rules: [
      { id: 'syntax-error', defaultSeverity: 'error', description: 'Malformed YAML syntax' },
      { id: 'duplicate-key', defaultSeverity: 'error', description: 'Mapping key defined more than once' },
      { id: 'undefined-alias', defaultSeverity: 'error', description: 'Alias to an unknown, later or enclosing anchor' },
      { id: 'duplicate-anchor', defaultSeverity: 'error', description: 'Anchor name defined twice in one document' },
      { id: 'invalid-tag-value', defaultSeverity: 'error', description: 'Scalar does not satisfy its explicit tag' },
    ],
  },
  style: {
    name: 'Style',
    description: 'Formatting issues that do not change the parsed value',
    rules: [
      { id: 'indentation', defaultSeverity: 'warning', description: 'Inconsistent block indentation step' },
      { id: 'trailing-whitespace', defaultSeverity: 'warning', description: 'Spaces or tabs at the end of a line' },
      { id: 'tab-indentation', defaultSeverity: 'warning', description: 'Tab characters in leading whitespace' },
      { id: 'line-length', defaultSeverity: 'warning', description: 'Line longer than the configured limit' },
      { id: 'empty-values', defaultSeverity: 'warning', description: 'Block mapping value left implicitly empty' },
      { id: 'new-line-at-end-of-file', defaultSeverity: 'warning', description: 'Missing newline at the end of the input' },
    ],
  },
};

/**
 * Metadata for rule-to-category lookup
 */
export interface RuleCategoryInfo {
  category: LintCategoryKey;
  /** Category display name */
  name: string;
  defaultSeverity: Severity;
  description: string;
}

/**
 * Derived mapping: rule id → category metadata
 */
export const RULE_TO_CATEGORY: Readonly<Record<string, RuleCategoryInfo>> = (() => {
  const result: Record<string, RuleCategoryInfo> = {};

  for (const key of ['structure', 'style'] as const) {
    const category = LINT_CATEGORIES[key];
    for (const rule of category.rules) {
      result[rule.id] = {
        category: key,
        name: category.name,
        defaultSeverity: rule.defaultSeverity,
        description: rule.description,
      };
    }
  }

  return result;
})();

/** Every built-in rule id, in declaration order */
export const RULE_IDS: readonly string[] = Object.keys(RULE_TO_CATEGORY);

/**
 * Get category for a rule id
 */
export function getCategoryForRule(id: string): RuleCategoryInfo | undefined {
  return Object.hasOwn(RULE_TO_CATEGORY, id) ? RULE_TO_CATEGORY[id] : undefined;
}

/**
 * Get all rule ids for a category
 */
export function getRulesForCategory(category: LintCategoryKey): readonly string[] {
  return LINT_CATEGORIES[category].rules.map(rule => rule.id);
}
