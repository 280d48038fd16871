/**
 * @yamlet/core - YAML 1.2.2 Core Schema engine
 */

// Entry points
export {
  parse,
  parseAll,
  parseDocuments,
  serialize,
  serializeAll,
  lint,
  formatDiagnostics,
  decodeSource,
} from './api.js';
export type { Source } from './api.js';
export { splitAndParse } from './parallel/index.js';

// Error types
export {
  YamletError,
  YamlSyntaxError,
  YamlSemanticError,
  ValidationError,
  ConfigError,
  EmitError,
  WorkerError,
  errorFromJSON,
} from './errors/YamletError.js';
export type { ErrorContext, ErrorSeverity, RelatedErrorSpan, YamletErrorJSON } from './errors/YamletError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  formatMessage,
  silentLogger,
} from './logging/Logger.js';
export type { Logger, LogLevel, LogContext } from './logging/Logger.js';

// Values
export {
  nullValue,
  bool,
  int,
  float,
  str,
  sequence,
  mapping,
  valuesEqual,
  compareValues,
  fingerprint,
  isValue,
  formatFloat,
} from './values/Value.js';

// Scanner
export { Scanner } from './scanner/Scanner.js';
export type { ScannerOptions, ScanMode } from './scanner/Scanner.js';
export { CORE_TAG_PREFIX } from './scanner/events.js';
export type { ScanEvent, ScanEventType, ScalarStyle, CollectionStyle } from './scanner/events.js';

// Composer
export { Composer } from './composer/Composer.js';
export type { ComposerOptions, ComposeMode } from './composer/Composer.js';
export { resolvePlain, resolveScalar } from './composer/resolveScalar.js';

// Emitter
export { Emitter, DEFAULT_EMIT_OPTIONS, MAX_OUTPUT_SIZE, normalizeEmitOptions } from './emitter/Emitter.js';

// Lint
export { Linter, LintRule, resolveLintConfig, DEFAULT_LINT_CONFIG } from './lint/index.js';
export type { LintContext, LintRuleMetadata, ResolvedLintConfig, SourceLine } from './lint/index.js';

// Diagnostics
export {
  DiagnosticCollector,
  DiagnosticReporter,
  compareDiagnostics,
  LINT_CATEGORIES,
  RULE_TO_CATEGORY,
  RULE_IDS,
  getCategoryForRule,
  getRulesForCategory,
} from './diagnostics/index.js';
export type {
  DiagnosticInput,
  ReportOptions,
  SummaryStats,
  CategoryCount,
  LintCategory,
  LintCategoryKey,
  LintRuleInfo,
  RuleCategoryInfo,
} from './diagnostics/index.js';

// Parallel
export {
  splitDocuments,
  DocumentWorkerPool,
  resolveParallelConfig,
  DEFAULT_PARALLEL_CONFIG,
  MAX_THREAD_COUNT,
  MAX_INPUT_SIZE_LIMIT,
  MAX_DOCUMENT_COUNT_LIMIT,
} from './parallel/index.js';
export type { DocumentRange, DocumentWorkerPoolStats, RangeOrigin, RangeResult } from './parallel/index.js';

// Config
export { loadConfig, DEFAULT_CONFIG, validateVersion, validateLint, validateParallel, validateEmit } from './config/index.js';
export type { YamletConfig } from './config/index.js';

// Version
export { YAMLET_VERSION, getSchemaVersion } from './version.js';

// Re-export types for convenience
export type * from '@yamlet/types';
