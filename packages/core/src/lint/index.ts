export { Linter, resolveLintConfig, DEFAULT_LINT_CONFIG } from './Linter.js';
export { LintRule } from './LintRule.js';
export type { LintContext, LintRuleMetadata, ResolvedLintConfig, SourceLine } from './LintRule.js';
