/**
 * Scanner events
 *
 * Anchors are reported as a separate `anchor` event immediately before the
 * node they name. Tags are resolved to their full form (`!!int` becomes
 * `tag:yaml.org,2002:int`); the non-specific tag stays `!`.
 */

import type { Span } from '@yamlet/types';

export type ScalarStyle = 'plain' | 'single-quoted' | 'double-quoted' | 'literal' | 'folded';

export type CollectionStyle = 'block' | 'flow';

export interface StreamStartEvent {
  type: 'stream-start';
  span: Span;
}

export interface StreamEndEvent {
  type: 'stream-end';
  span: Span;
}

export interface DocumentStartEvent {
  type: 'document-start';
  span: Span;
  /** Started by `---` */
  explicit: boolean;
  /** Version from a `%YAML` directive */
  version: string | null;
}

export interface DocumentEndEvent {
  type: 'document-end';
  span: Span;
  /** Ended by `...` */
  explicit: boolean;
  /** Scanning of this document stopped at an error (tolerant mode only) */
  aborted: boolean;
}

export interface MappingStartEvent {
  type: 'mapping-start';
  span: Span;
  style: CollectionStyle;
  tag: string | null;
}

export interface MappingEndEvent {
  type: 'mapping-end';
  span: Span;
}

export interface SequenceStartEvent {
  type: 'sequence-start';
  span: Span;
  style: CollectionStyle;
  tag: string | null;
}

export interface SequenceEndEvent {
  type: 'sequence-end';
  span: Span;
}

export interface ScalarEvent {
  type: 'scalar';
  span: Span;
  value: string;
  style: ScalarStyle;
  tag: string | null;
}

export interface AliasEvent {
  type: 'alias';
  span: Span;
  name: string;
}

export interface AnchorEvent {
  type: 'anchor';
  span: Span;
  name: string;
}

export type ScanEvent =
  | StreamStartEvent
  | StreamEndEvent
  | DocumentStartEvent
  | DocumentEndEvent
  | MappingStartEvent
  | MappingEndEvent
  | SequenceStartEvent
  | SequenceEndEvent
  | ScalarEvent
  | AliasEvent
  | AnchorEvent;

export type ScanEventType = ScanEvent['type'];

/** Prefix of the `!!` tag handle */
export const CORE_TAG_PREFIX = 'tag:yaml.org,2002:';
