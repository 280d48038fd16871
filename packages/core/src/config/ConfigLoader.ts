import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import type { EmitOptions, LintConfig, ParallelConfig, Severity, Value } from '@yamlet/types';
import { Composer } from '../composer/Composer.js';
import { ConfigError } from '../errors/YamletError.js';
import { resolveLintConfig } from '../lint/Linter.js';
import { silentLogger } from '../logging/Logger.js';
import type { Logger } from '../logging/Logger.js';
import { resolveParallelConfig } from '../parallel/splitAndParse.js';
import { Scanner } from '../scanner/Scanner.js';
import { YAMLET_VERSION, getSchemaVersion } from '../version.js';

/**
 * yamlet configuration schema.
 *
 * YAML Location: .yamlet/config.yaml
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.1"
 *
 * lint:
 *   enabledRules: ['*', '!line-length']
 *   ruleSeverityOverrides:
 *     trailing-whitespace: error
 *   indentSize: 2
 *
 * parallel:
 *   threadCount: 4
 *   maxInputSize: 52428800
 *
 * emit:
 *   sortKeys: true
 *   width: 100
 * ```
 */
export interface YamletConfig {
  /**
   * Config schema version (major.minor). Must match the running yamlet
   * version. If omitted, no version check is performed.
   *
   * @example "0.1"
   */
  version?: string;
  lint: LintConfig;
  parallel: ParallelConfig;
  emit: EmitOptions;
}

export const DEFAULT_CONFIG: YamletConfig = {
  version: getSchemaVersion(YAMLET_VERSION),
  lint: {},
  parallel: {},
  emit: {},
};

type Plain = null | boolean | number | bigint | string | Plain[] | { [key: string]: Plain };

/**
 * Value graph → plain data. Only string keys survive; config files have no
 * use for others.
 */
function toPlain(value: Value): Plain {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'float':
    case 'str':
      return value.value;
    case 'int':
      return Number.isSafeInteger(Number(value.value)) ? Number(value.value) : value.value;
    case 'seq':
      return value.items.map(toPlain);
    case 'map': {
      const result: { [key: string]: Plain } = {};
      for (const entry of value.entries) {
        if (entry.key.kind === 'str') {
          result[entry.key.value] = toPlain(entry.value);
        }
      }
      return result;
    }
  }
}

function isRecord(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Load yamlet config from project directory.
 *
 * Returns DEFAULT_CONFIG when `.yamlet/config.yaml` does not exist, or
 * (with a warning) when it cannot be read or parsed. Structurally invalid
 * sections throw ConfigError.
 *
 * @param projectPath - Absolute path to project root
 * @param logger - Logger for warnings
 */
export function loadConfig(projectPath: string, logger: Logger = silentLogger): YamletConfig {
  const configPath = join(projectPath, '.yamlet', 'config.yaml');

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  let parsed: Plain;
  try {
    const content = readFileSync(configPath, 'utf-8');
    let root: Value | null = null;
    for (const document of new Composer().compose(new Scanner(content).events())) {
      if (document.index > 0) {
        throw new Error('config.yaml must contain a single document');
      }
      root = document.root;
    }
    parsed = root === null ? {} : toPlain(root);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse config.yaml: ${error.message}`);
    logger.warn('Using default configuration');
    return DEFAULT_CONFIG;
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config error: config.yaml must be a mapping, got ${describe(parsed)}`, 'ERR_CONFIG_INVALID', {
      path: configPath,
    });
  }

  // Config errors MUST throw
  validateVersion(parsed.version);
  const lint = validateLint(parsed.lint, logger);
  const parallel = validateParallel(parsed.parallel);
  const emit = validateEmit(parsed.emit);

  return {
    version: typeof parsed.version === 'string' ? parsed.version : DEFAULT_CONFIG.version,
    lint,
    parallel,
    emit,
  };
}

/**
 * Validate config version compatibility with the running yamlet version.
 * Compares major.minor (pre-release tags are stripped).
 *
 * @param configVersion - Version string from config file (may be undefined)
 * @param currentVersion - Override for testing (defaults to YAMLET_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${describe(configVersion)}`);
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty');
  }

  const current = currentVersion ?? YAMLET_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with yamlet ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_INVALID',
      { configVersion, currentVersion: current },
      `Set version: "${currentSchema}" in .yamlet/config.yaml`
    );
  }
}

function stringArray(value: unknown, name: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`Config error: ${name} must be an array, got ${describe(value)}`);
  }
  return value.map((item: unknown, i) => {
    if (typeof item !== 'string' || !item.trim()) {
      throw new ConfigError(`Config error: ${name}[${i}] must be a non-empty string`);
    }
    return item;
  });
}

function optionalNumber(section: { [key: string]: unknown }, key: string, prefix: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new ConfigError(`Config error: ${prefix}.${key} must be a number, got ${describe(value)}`);
  }
  return value;
}

function section(value: unknown, name: string): { [key: string]: unknown } | null {
  if (value === undefined || value === null) return null;
  if (!isRecord(value)) {
    throw new ConfigError(`Config error: ${name} must be a mapping, got ${describe(value)}`);
  }
  return value;
}

/**
 * Validate the `lint` section. Rule ids and severities are checked the same
 * way `lint()` checks them.
 */
export function validateLint(value: unknown, logger: Logger = silentLogger): LintConfig {
  const lint = section(value, 'lint');
  if (lint === null) return {};

  const config: LintConfig = {};
  const enabledRules = lint.enabledRules;
  if (enabledRules !== undefined && enabledRules !== null) {
    config.enabledRules = stringArray(enabledRules, 'lint.enabledRules');
    if (config.enabledRules.length === 0) {
      logger.warn('Warning: lint.enabledRules is an empty array - no rules will run');
    }
  }

  const overrides = section(lint.ruleSeverityOverrides, 'lint.ruleSeverityOverrides');
  if (overrides !== null) {
    const result: Record<string, string> = {};
    for (const [rule, severity] of Object.entries(overrides)) {
      if (typeof severity !== 'string') {
        throw new ConfigError(`Config error: lint.ruleSeverityOverrides.${rule} must be a string`);
      }
      result[rule] = severity;
    }
    config.ruleSeverityOverrides = resolveSeverities(result);
  }

  for (const key of ['maxDiagnostics', 'maxLineLength', 'indentSize'] as const) {
    const number = optionalNumber(lint, key, 'lint');
    if (number !== undefined) config[key] = number;
  }

  resolveLintConfig(config, logger);
  return config;
}

function resolveSeverities(overrides: Record<string, string>): LintConfig['ruleSeverityOverrides'] {
  const result: Record<string, Severity> = {};
  for (const [rule, severity] of Object.entries(overrides)) {
    switch (severity) {
      case 'error':
      case 'warning':
      case 'info':
      case 'hint':
        result[rule] = severity;
        break;
      default:
        throw new ConfigError(
          `Config error: lint.ruleSeverityOverrides.${rule} must be one of error, warning, info, hint; got "${severity}"`
        );
    }
  }
  return result;
}

export function validateParallel(value: unknown): ParallelConfig {
  const parallel = section(value, 'parallel');
  if (parallel === null) return {};

  const config: ParallelConfig = {};
  for (const key of ['threadCount', 'maxInputSize', 'maxDocumentCount'] as const) {
    const number = optionalNumber(parallel, key, 'parallel');
    if (number !== undefined) config[key] = number;
  }
  resolveParallelConfig(config);
  return config;
}

export function validateEmit(value: unknown): EmitOptions {
  const emit = section(value, 'emit');
  if (emit === null) return {};

  const config: EmitOptions = {};
  for (const key of ['sortKeys', 'allowUnicode', 'defaultFlowStyle', 'explicitStart'] as const) {
    const flag = emit[key];
    if (flag === undefined || flag === null) continue;
    if (typeof flag !== 'boolean') {
      throw new ConfigError(`Config error: emit.${key} must be a boolean, got ${describe(flag)}`);
    }
    config[key] = flag;
  }
  for (const key of ['indent', 'width'] as const) {
    const number = optionalNumber(emit, key, 'emit');
    if (number !== undefined) config[key] = number;
  }
  return config;
}
