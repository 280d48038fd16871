/**
 * YamletError - Error hierarchy for yamlet
 *
 * All errors extend the native Error class so callers can keep catching
 * `Error`. Each concrete class fixes its severity and carries a stable code.
 *
 * Error types:
 * - YamlSyntaxError: malformed grammar, raised by the scanner (error)
 * - YamlSemanticError: duplicate keys, bad aliases/anchors, tag mismatch (error)
 * - ValidationError: input exceeds a configured size/count cap (fatal)
 * - ConfigError: invalid configuration values or file (fatal)
 * - EmitError: value cannot be serialized (error)
 * - WorkerError: a parse worker died without reporting a result (error)
 */

import type { Location, Span } from '@yamlet/types';

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  line?: number;
  column?: number;
  offset?: number;
  /** Index of the document in a multi-document stream */
  documentIndex?: number;
  [key: string]: unknown;
}

/**
 * JSON representation of YamletError.
 * Also the wire format used to move errors out of worker threads.
 */
export interface YamletErrorJSON {
  name: string;
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
  location?: Location;
  span?: Span;
  related?: RelatedErrorSpan[];
}

/**
 * Secondary span of a semantic error (e.g. where a key was first defined)
 */
export interface RelatedErrorSpan {
  span: Span;
  label: string;
}

/**
 * Abstract base class for all yamlet errors.
 */
export abstract class YamletError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): YamletErrorJSON {
    return {
      name: this.name,
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Malformed YAML grammar. Always carries the location where scanning stopped.
 *
 * Codes: ERR_SYNTAX, ERR_TAB_INDENT, ERR_FLOW_INDENT, ERR_UNTERMINATED,
 * ERR_INVALID_ESCAPE, ERR_MULTIPLE_DOCUMENTS, ERR_INVALID_ENCODING
 */
export class YamlSyntaxError extends YamletError {
  readonly code: string;
  readonly severity = 'error' as const;
  readonly location: Location;
  /** Message without the trailing position, for diagnostics */
  readonly reason: string;

  constructor(reason: string, location: Location, code: string = 'ERR_SYNTAX', context: ErrorContext = {}) {
    super(
      `${reason} (line ${location.line}, column ${location.column})`,
      { ...context, line: location.line, column: location.column, offset: location.offset }
    );
    this.code = code;
    this.location = location;
    this.reason = reason;
  }

  override toJSON(): YamletErrorJSON {
    return { ...super.toJSON(), message: this.reason, location: this.location };
  }
}

/**
 * Composition failure: the grammar is fine but the document is not a valid
 * value graph.
 *
 * Codes: ERR_DUPLICATE_KEY, ERR_UNDEFINED_ALIAS, ERR_RECURSIVE_ALIAS,
 * ERR_DUPLICATE_ANCHOR, ERR_TAG_MISMATCH
 */
export class YamlSemanticError extends YamletError {
  readonly code: string;
  readonly severity = 'error' as const;
  readonly span?: Span;
  readonly related: RelatedErrorSpan[];
  readonly reason: string;

  constructor(
    reason: string,
    code: string,
    span?: Span,
    related: RelatedErrorSpan[] = [],
    context: ErrorContext = {}
  ) {
    super(
      span ? `${reason} (line ${span.start.line}, column ${span.start.column})` : reason,
      span
        ? { ...context, line: span.start.line, column: span.start.column, offset: span.start.offset }
        : context
    );
    this.code = code;
    this.span = span;
    this.related = related;
    this.reason = reason;
  }

  override toJSON(): YamletErrorJSON {
    return { ...super.toJSON(), message: this.reason, span: this.span, related: this.related };
  }
}

/**
 * Pre-flight limit violation. Reports the limit and the observed value
 * instead of a location; raised before any parsing work starts.
 *
 * Codes: ERR_INPUT_TOO_LARGE, ERR_TOO_MANY_DOCUMENTS
 */
export class ValidationError extends YamletError {
  readonly code: string;
  readonly severity = 'fatal' as const;
  readonly limit: number;
  readonly actual: number;

  constructor(message: string, code: string, limit: number, actual: number, suggestion?: string) {
    super(message, { limit, actual }, suggestion);
    this.code = code;
    this.limit = limit;
    this.actual = actual;
  }
}

/**
 * Configuration error - invalid option values or config file structure
 *
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends YamletError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string = 'ERR_CONFIG_INVALID', context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Serialization error
 *
 * Codes: ERR_UNSUPPORTED_VALUE, ERR_OUTPUT_TOO_LARGE
 */
export class EmitError extends YamletError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}) {
    super(message, context);
    this.code = code;
  }
}

/**
 * A worker thread exited or crashed while it still owned a task.
 *
 * Codes: ERR_WORKER_CRASHED
 */
export class WorkerError extends YamletError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string = 'ERR_WORKER_CRASHED', context: ErrorContext = {}) {
    super(message, context);
    this.code = code;
  }
}

/**
 * Rebuild an error from its JSON form (the inverse of toJSON()).
 * Used on the main thread for errors posted by parse workers.
 * `extraContext` is merged into the rebuilt context.
 */
export function errorFromJSON(json: YamletErrorJSON, extraContext: ErrorContext = {}): YamletError {
  const context = { ...json.context, ...extraContext };
  const prefix = extraContext.documentIndex !== undefined ? `document ${extraContext.documentIndex}: ` : '';

  switch (json.name) {
    case 'YamlSyntaxError':
      if (json.location) {
        return new YamlSyntaxError(prefix + json.message, json.location, json.code, context);
      }
      break;
    case 'YamlSemanticError':
      return new YamlSemanticError(prefix + json.message, json.code, json.span, json.related ?? [], context);
    case 'ValidationError':
      return new ValidationError(
        prefix + json.message,
        json.code,
        Number(json.context.limit),
        Number(json.context.actual)
      );
    case 'ConfigError':
      return new ConfigError(prefix + json.message, json.code, context, json.suggestion);
    case 'EmitError':
      return new EmitError(prefix + json.message, json.code, context);
  }
  return new WorkerError(prefix + json.message, json.code, context);
}
