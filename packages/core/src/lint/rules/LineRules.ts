/**
 * Line-based style rules
 *
 * These only look at raw text, so they run the same way on documents the
 * scanner could not parse.
 */

import { LintRule } from '../LintRule.js';
import type { LintContext, LintRuleMetadata } from '../LintRule.js';

/**
 * trailing-whitespace: spaces or tabs before a line break or end of input
 */
export class TrailingWhitespaceRule extends LintRule {
  get metadata(): LintRuleMetadata {
    return { name: 'TrailingWhitespaceRule', ids: ['trailing-whitespace'] };
  }

  check(context: LintContext): void {
    for (const line of context.lines) {
      const match = /[ \t]+$/.exec(line.text);
      if (!match) continue;

      const span = {
        start: this.locate(line, line.start + match.index),
        end: this.locate(line, line.end),
      };
      context.collector.add({
        code: 'trailing-whitespace',
        message: 'trailing whitespace',
        span,
        suggestions: [{ message: 'remove trailing whitespace', span, replacement: '' }],
      });
    }
  }
}

/**
 * tab-indentation: tab characters in the leading whitespace of a content line.
 * Lines inside a multi-line scalar are content and are skipped.
 */
export class TabIndentationRule extends LintRule {
  get metadata(): LintRuleMetadata {
    return { name: 'TabIndentationRule', ids: ['tab-indentation'] };
  }

  check(context: LintContext): void {
    const tabWidth = context.config.indentSize ?? 2;
    const bodies = context.events.flatMap(event =>
      event.type === 'scalar' && event.span.end.line > event.span.start.line ? [event.span] : []
    );
    let next = 0;

    for (const line of context.lines) {
      while (next < bodies.length && bodies[next].end.offset <= line.start) next++;
      if (next < bodies.length && bodies[next].start.offset < line.start) continue;

      const leading = /^[ \t]*/.exec(line.text)?.[0] ?? '';
      if (!leading.includes('\t') || leading.length === line.text.length) continue;

      const span = {
        start: this.locate(line, line.start),
        end: this.locate(line, line.start + leading.length),
      };
      context.collector.add({
        code: 'tab-indentation',
        message: 'tab character used for indentation',
        span,
        suggestions: [
          {
            message: 'indent with spaces',
            span,
            replacement: leading.replace(/\t/g, ' '.repeat(tabWidth)),
          },
        ],
      });
    }
  }
}

/**
 * line-length: lines longer than `maxLineLength` UTF-16 code units
 */
export class LineLengthRule extends LintRule {
  get metadata(): LintRuleMetadata {
    return { name: 'LineLengthRule', ids: ['line-length'] };
  }

  check(context: LintContext): void {
    const max = context.config.maxLineLength;

    for (const line of context.lines) {
      if (line.text.length <= max) continue;
      context.collector.add({
        code: 'line-length',
        message: `line too long (${line.text.length} > ${max} characters)`,
        span: {
          start: this.locate(line, line.start + max),
          end: this.locate(line, line.end),
        },
      });
    }
  }
}

/**
 * new-line-at-end-of-file: non-empty input whose last character is not a break
 */
export class NewLineAtEndOfFileRule extends LintRule {
  get metadata(): LintRuleMetadata {
    return { name: 'NewLineAtEndOfFileRule', ids: ['new-line-at-end-of-file'] };
  }

  check(context: LintContext): void {
    const { source, lines } = context;
    const last = lines[lines.length - 1];
    if (source.length === 0 || last === undefined || last.text.length === 0) {
      return;
    }

    const end = this.locate(last, last.end);
    const span = { start: end, end };
    context.collector.add({
      code: 'new-line-at-end-of-file',
      message: 'no new line character at the end of file',
      span,
      suggestions: [{ message: 'add a final newline', span, replacement: '\n' }],
    });
  }
}
