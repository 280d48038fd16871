/**
 * ParseErrorRule - surfaces scanner and composer errors as diagnostics
 *
 * The tolerant scanner reports at most one syntax error per document (it
 * skips to the next document marker afterwards); the composer reports every
 * semantic problem it meets.
 */

import type { Suggestion } from '@yamlet/types';
import { LintRule } from '../LintRule.js';
import type { LintContext, LintRuleMetadata } from '../LintRule.js';

/**
 * Composer error code -> rule id
 */
const SEMANTIC_RULES: Record<string, string> = {
  ERR_DUPLICATE_KEY: 'duplicate-key',
  ERR_UNDEFINED_ALIAS: 'undefined-alias',
  ERR_RECURSIVE_ALIAS: 'undefined-alias',
  ERR_DUPLICATE_ANCHOR: 'duplicate-anchor',
  ERR_TAG_MISMATCH: 'invalid-tag-value',
};

export class ParseErrorRule extends LintRule {
  get metadata(): LintRuleMetadata {
    return {
      name: 'ParseErrorRule',
      ids: ['syntax-error', 'duplicate-key', 'undefined-alias', 'duplicate-anchor', 'invalid-tag-value'],
    };
  }

  check(context: LintContext): void {
    const { collector } = context;

    for (const error of context.syntaxErrors) {
      collector.addFromError('syntax-error', error);
    }

    for (const error of context.semanticErrors) {
      const id = Object.hasOwn(SEMANTIC_RULES, error.code) ? SEMANTIC_RULES[error.code] : 'syntax-error';
      let suggestion: Suggestion | undefined;
      if (id === 'duplicate-key' && error.span) {
        suggestion = { message: 'remove this duplicate key or rename it', span: error.span };
      }
      collector.addFromError(id, error, suggestion);
    }
  }
}
