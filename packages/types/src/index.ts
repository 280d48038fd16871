/**
 * @yamlet/types - Type definitions shared by the yamlet packages
 */

// Value graph
export type {
  ValueKind,
  NullValue,
  BoolValue,
  IntValue,
  FloatValue,
  StrValue,
  SeqValue,
  MapEntry,
  MapValue,
  ScalarValue,
  Value,
} from './values.js';

// Source positions
export type { Location, Span, Document } from './source.js';

// Diagnostics
export type { Severity, RelatedSpan, Suggestion, Diagnostic, DiagnosticFormat } from './diagnostics.js';

// Configuration
export type { LintConfig, ParallelConfig, EmitOptions } from './config.js';
