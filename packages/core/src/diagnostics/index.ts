/**
 * Diagnostics - Lint diagnostic collection and reporting
 *
 * - DiagnosticCollector: collects, filters and orders rule output
 * - DiagnosticReporter / formatDiagnostics: renders diagnostics (text/json)
 * - categories: single source of truth for rule metadata
 */

export { DiagnosticCollector, compareDiagnostics } from './DiagnosticCollector.js';
export type { DiagnosticInput } from './DiagnosticCollector.js';

export { DiagnosticReporter, formatDiagnostics } from './DiagnosticReporter.js';
export type { ReportOptions, SummaryStats, CategoryCount } from './DiagnosticReporter.js';

// Rule metadata (single source of truth)
export {
  LINT_CATEGORIES,
  RULE_TO_CATEGORY,
  RULE_IDS,
  getCategoryForRule,
  getRulesForCategory,
} from './categories.js';
export type { LintCategory, LintCategoryKey, LintRuleInfo, RuleCategoryInfo } from './categories.js';
