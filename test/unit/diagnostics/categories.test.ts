/**
 * Lint rule category table tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { LINT_CATEGORIES, RULE_IDS, RULE_TO_CATEGORY, getCategoryForRule, getRulesForCategory } from '@yamlet/core';

describe('lint categories', () => {
  it('should list every rule id once, in declaration order', () => {
    assert.deepStrictEqual(RULE_IDS, [
      'syntax-error',
      'duplicate-key',
      'undefined-alias',
      'duplicate-anchor',
      'invalid-tag-value',
      'indentation',
      'trailing-whitespace',
      'tab-indentation',
      'line-length',
      'empty-values',
      'new-line-at-end-of-file',
    ]);
  });

  it('should derive the reverse mapping from the category table', () => {
    for (const [key, category] of Object.entries(LINT_CATEGORIES)) {
      for (const rule of category.rules) {
        assert.strictEqual(RULE_TO_CATEGORY[rule.id].category, key);
        assert.strictEqual(RULE_TO_CATEGORY[rule.id].defaultSeverity, rule.defaultSeverity);
      }
    }
  });

  it('should make structural rules errors and style rules warnings', () => {
    assert.ok(LINT_CATEGORIES.structure.rules.every(rule => rule.defaultSeverity === 'error'));
    assert.ok(LINT_CATEGORIES.style.rules.every(rule => rule.defaultSeverity === 'warning'));
  });

  it('should look up a rule category', () => {
    assert.deepStrictEqual(getCategoryForRule('line-length'), {
      category: 'style',
      name: 'Style',
      defaultSeverity: 'warning',
      description: 'Line longer than the configured limit',
    });
    assert.strictEqual(getCategoryForRule('no-such-rule'), undefined);
    assert.strictEqual(getCategoryForRule('toString'), undefined);
  });

  it('should list the rules of a category', () => {
    assert.deepStrictEqual(getRulesForCategory('structure'), [
      'syntax-error',
      'duplicate-key',
      'undefined-alias',
      'duplicate-anchor',
      'invalid-tag-value',
    ]);
  });
});
