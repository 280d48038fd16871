/**
 * Composer - builds Values from scanner events
 *
 * One Document per document-start/document-end pair. Collections are built
 * on an explicit stack; anchors live in a per-document table and aliases
 * resolve to the same Value instance the anchor produced.
 *
 * Errors (YamlSemanticError):
 * - ERR_DUPLICATE_KEY: span of the second key, related span of the first
 * - ERR_UNDEFINED_ALIAS: unknown or forward alias
 * - ERR_RECURSIVE_ALIAS: alias to a collection still being built
 * - ERR_DUPLICATE_ANCHOR: anchor name defined twice in one document
 * - ERR_TAG_MISMATCH: node does not satisfy its explicit Core tag
 *
 * In tolerant mode errors go to `onError` and composition continues: the
 * first value of a duplicated key wins, bad aliases become Null and a
 * mismatched scalar keeps its text as Str. Aborted documents (scanner
 * errors) are dropped.
 */

import type { Document, MapEntry, Span, Value } from '@yamlet/types';
import { YamlSemanticError } from '../errors/YamletError.js';
import type { RelatedErrorSpan } from '../errors/YamletError.js';
import type { ScanEvent } from '../scanner/events.js';
import { describeKey, fingerprint, nullValue, str } from '../values/Value.js';
import { collectionTagMatches, displayTag, resolveScalar } from './resolveScalar.js';

export type ComposeMode = 'strict' | 'tolerant';

export interface ComposerOptions {
  /** Default: 'strict' */
  mode?: ComposeMode;
  /** Receives every error in tolerant mode */
  onError?: (error: YamlSemanticError) => void;
}

interface SequenceFrame {
  kind: 'seq';
  start: Span;
  anchor: string | null;
  items: Value[];
}

interface MappingFrame {
  kind: 'map';
  start: Span;
  anchor: string | null;
  entries: MapEntry[];
  /** Key fingerprint -> span of its first occurrence */
  keys: Map<string, Span>;
  pendingKey: Value | null;
  /** The pending key duplicates an earlier one; drop its value */
  skipValue: boolean;
}

type Frame = SequenceFrame | MappingFrame;

interface AnchorEntry {
  /** null while the anchored collection is still being built */
  value: Value | null;
  span: Span;
}

export class Composer {
  private readonly mode: ComposeMode;
  private readonly onError?: (error: YamlSemanticError) => void;

  private stack: Frame[] = [];
  private anchors = new Map<string, AnchorEntry>();
  private pendingAnchor: { name: string; span: Span } | null = null;
  private root: Value | null = null;

  constructor(options: ComposerOptions = {}) {
    this.mode = options.mode ?? 'strict';
    this.onError = options.onError;
  }

  /**
   * Consume `events` lazily, yielding each document as soon as it ends.
   */
  *compose(events: Iterable<ScanEvent>): Generator<Document<Value>, void, undefined> {
    let index = 0;
    let start: { span: Span; explicit: boolean } | null = null;

    for (const event of events) {
      switch (event.type) {
        case 'stream-start':
        case 'stream-end':
          break;

        case 'document-start':
          this.reset();
          start = { span: event.span, explicit: event.explicit };
          break;

        case 'document-end': {
          const opened = start;
          start = null;
          if (event.aborted || opened === null) {
            this.reset();
            break;
          }
          yield {
            index: index++,
            root: this.root,
            span: { start: opened.span.start, end: event.span.end },
            explicitStart: opened.explicit,
            explicitEnd: event.explicit,
          };
          this.reset();
          break;
        }

        case 'anchor':
          this.pendingAnchor = { name: event.name, span: event.span };
          break;

        case 'alias':
          this.attach(this.resolveAlias(event.name, event.span), event.span);
          break;

        case 'scalar': {
          let value = resolveScalar(event.value, event.style, event.tag);
          if (value === null) {
            this.report(
              new YamlSemanticError(
                `value '${event.value}' does not match tag ${displayTag(event.tag ?? '')}`,
                'ERR_TAG_MISMATCH',
                event.span
              )
            );
            value = str(event.value);
          }
          this.defineAnchor(value);
          this.attach(value, event.span);
          break;
        }

        case 'sequence-start':
        case 'mapping-start': {
          const kind = event.type === 'sequence-start' ? 'seq' : 'map';
          if (!collectionTagMatches(event.tag, kind)) {
            this.report(
              new YamlSemanticError(
                `${kind === 'seq' ? 'sequence' : 'mapping'} does not match tag ${displayTag(event.tag ?? '')}`,
                'ERR_TAG_MISMATCH',
                event.span
              )
            );
          }
          const anchor = this.defineAnchor(null);
          this.stack.push(
            kind === 'seq'
              ? { kind, start: event.span, anchor, items: [] }
              : { kind, start: event.span, anchor, entries: [], keys: new Map(), pendingKey: null, skipValue: false }
          );
          break;
        }

        case 'sequence-end':
        case 'mapping-end': {
          const frame = this.stack.pop();
          if (frame === undefined) {
            throw new Error(`Unbalanced ${event.type} event`);
          }
          const value: Value =
            frame.kind === 'seq' ? { kind: 'seq', items: frame.items } : { kind: 'map', entries: frame.entries };
          if (frame.anchor !== null) {
            const entry = this.anchors.get(frame.anchor);
            if (entry) entry.value = value;
          }
          this.attach(value, { start: frame.start.start, end: event.span.end });
          break;
        }
      }
    }
  }

  private reset(): void {
    this.stack = [];
    this.anchors = new Map();
    this.pendingAnchor = null;
    this.root = null;
  }

  private report(error: YamlSemanticError): void {
    if (this.mode === 'strict') {
      throw error;
    }
    this.onError?.(error);
  }

  /**
   * Register the pending anchor (if any) for the node being created.
   * Collections register with a null value until they are complete.
   */
  private defineAnchor(value: Value | null): string | null {
    const pending = this.pendingAnchor;
    if (pending === null) return null;
    this.pendingAnchor = null;

    const previous = this.anchors.get(pending.name);
    if (previous) {
      this.report(
        new YamlSemanticError(`anchor '${pending.name}' is already defined`, 'ERR_DUPLICATE_ANCHOR', pending.span, [
          { span: previous.span, label: 'first defined here' },
        ])
      );
    }
    this.anchors.set(pending.name, { value, span: pending.span });
    return pending.name;
  }

  private resolveAlias(name: string, span: Span): Value {
    const entry = this.anchors.get(name);
    if (entry === undefined) {
      this.report(new YamlSemanticError(`undefined alias '${name}'`, 'ERR_UNDEFINED_ALIAS', span));
      return nullValue();
    }
    if (entry.value === null) {
      this.report(
        new YamlSemanticError(`alias '${name}' refers to a node that contains it`, 'ERR_RECURSIVE_ALIAS', span, [
          { span: entry.span, label: 'anchor defined here' },
        ])
      );
      return nullValue();
    }
    return entry.value;
  }

  /**
   * Place a finished node into its parent (or make it the document root).
   */
  private attach(value: Value, span: Span): void {
    const parent = this.stack[this.stack.length - 1];
    if (parent === undefined) {
      this.root = value;
      return;
    }

    if (parent.kind === 'seq') {
      parent.items.push(value);
      return;
    }

    if (parent.pendingKey === null) {
      const print = fingerprint(value);
      const first = parent.keys.get(print);
      parent.pendingKey = value;
      parent.skipValue = first !== undefined;
      if (first !== undefined) {
        const related: RelatedErrorSpan[] = [{ span: first, label: 'first defined here' }];
        this.report(
          new YamlSemanticError(
            `duplicate key ${describeKey(value)} (first defined at line ${first.start.line})`,
            'ERR_DUPLICATE_KEY',
            span,
            related
          )
        );
      } else {
        parent.keys.set(print, span);
      }
      return;
    }

    if (!parent.skipValue) {
      parent.entries.push({ key: parent.pendingKey, value });
    }
    parent.pendingKey = null;
    parent.skipValue = false;
  }
}
