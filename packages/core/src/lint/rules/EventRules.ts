/**
 * Event-based style rules
 *
 * Both rules replay the recorded scanner events with a stack of open
 * collections. The stack is reset at every document boundary, since an
 * aborted document ends without closing its collections.
 */

import type { Span } from '@yamlet/types';
import type { CollectionStyle, ScanEvent } from '../../scanner/events.js';
import { LintRule } from '../LintRule.js';
import type { LintContext, LintRuleMetadata } from '../LintRule.js';

interface OpenCollection {
  kind: 'map' | 'seq';
  style: CollectionStyle;
  /** 0-based column of the collection start */
  column: number;
  /** Nodes completed inside this collection so far */
  children: number;
  /** Last completed key (mappings only) */
  key: ScanEvent | null;
}

/**
 * Walks `events`, calling `visit` for every event with the collection it
 * belongs to (null at document level). Collection start events are visited
 * before they are pushed.
 */
function walk(
  events: readonly ScanEvent[],
  visit: (event: ScanEvent, parent: OpenCollection | null, stack: readonly OpenCollection[]) => void
): void {
  let stack: OpenCollection[] = [];

  const complete = (node: ScanEvent) => {
    const parent = stack[stack.length - 1];
    if (parent === undefined) return;
    if (parent.kind === 'map' && parent.children % 2 === 0) {
      parent.key = node;
    }
    parent.children++;
  };

  for (const event of events) {
    const parent = stack[stack.length - 1] ?? null;
    visit(event, parent, stack);

    switch (event.type) {
      case 'document-start':
      case 'document-end':
        stack = [];
        break;
      case 'mapping-start':
      case 'sequence-start':
        stack.push({
          kind: event.type === 'mapping-start' ? 'map' : 'seq',
          style: event.style,
          column: event.span.start.column - 1,
          children: 0,
          key: null,
        });
        break;
      case 'mapping-end':
      case 'sequence-end':
        stack.pop();
        complete(event);
        break;
      case 'scalar':
      case 'alias':
        complete(event);
        break;
    }
  }
}

/**
 * indentation: every block collection that starts a line must be indented
 * one step deeper than its parent collection. The step is `indentSize`, or
 * the first step seen. A sequence may sit at its parent mapping's column.
 */
export class IndentationRule extends LintRule {
  get metadata(): LintRuleMetadata {
    return { name: 'IndentationRule', ids: ['indentation'] };
  }

  check(context: LintContext): void {
    const { source, lines } = context;
    let step = context.config.indentSize;

    walk(context.events, (event, parent) => {
      if (event.type !== 'mapping-start' && event.type !== 'sequence-start') return;
      if (event.style !== 'block' || parent === null || parent.style !== 'block') return;

      const start = event.span.start;
      const line = lines[start.line - 1];
      if (line === undefined || !/^ *$/.test(source.slice(line.start, start.offset))) return;

      const column = start.column - 1;
      const delta = column - parent.column;
      if (delta === 0 && event.type === 'sequence-start' && parent.kind === 'map') return;

      if (step === null) {
        if (delta > 0) step = delta;
        return;
      }
      if (delta === step) return;

      const expected = parent.column + step;
      const span: Span = { start: this.locate(line, line.start), end: start };
      context.collector.add({
        code: 'indentation',
        message: `wrong indentation: expected ${expected} but found ${column}`,
        span,
        suggestions: [{ message: `indent with ${expected} spaces`, span, replacement: ' '.repeat(expected) }],
      });
    });
  }
}

/**
 * empty-values: `key:` with nothing after it in a block mapping
 */
export class EmptyValuesRule extends LintRule {
  get metadata(): LintRuleMetadata {
    return { name: 'EmptyValuesRule', ids: ['empty-values'] };
  }

  check(context: LintContext): void {
    const { source } = context;
    let previous: ScanEvent | null = null;

    walk(context.events, (event, parent) => {
      const before = previous;
      previous = event;

      if (event.type !== 'scalar' || event.value !== '' || event.style !== 'plain' || event.tag !== null) return;
      if (parent === null || parent.kind !== 'map' || parent.style !== 'block' || parent.children % 2 === 0) return;
      // Anchored empty values and explicit `? key` entries without `:` are left alone
      if (before?.type === 'anchor' || source[event.span.start.offset - 1] !== ':') return;

      const key = parent.key;
      const name = key?.type === 'scalar' ? `'${key.value}'` : 'complex key';
      const span = event.span;
      context.collector.add({
        code: 'empty-values',
        message: key?.type === 'scalar' ? `empty value for key ${name}` : `empty value for ${name}`,
        span,
        suggestions: [{ message: "add explicit 'null'", span, replacement: ' null' }],
      });
    });
  }
}
