/**
 * splitAndParse - parallel parsing of multi-document streams
 *
 * 1. Validate the configuration and the pre-flight limits (no worker is
 *    started when either fails)
 * 2. Split the stream into document ranges (sequential, one pass)
 * 3. 0 documents: []; 1 document: parsed inline
 * 4. Otherwise parse every range on a DocumentWorkerPool, wait for all of
 *    them, and fail with the lowest-index error if any range failed
 */

import { availableParallelism } from 'os';
import type { ParallelConfig, Value } from '@yamlet/types';
import { Composer } from '../composer/Composer.js';
import { ConfigError, ValidationError, YamletError, errorFromJSON } from '../errors/YamletError.js';
import { silentLogger } from '../logging/Logger.js';
import type { Logger } from '../logging/Logger.js';
import { Scanner } from '../scanner/Scanner.js';
import { nullValue } from '../values/Value.js';
import { splitDocuments } from './DocumentSplitter.js';
import { DocumentWorkerPool } from './DocumentWorkerPool.js';

export const MAX_THREAD_COUNT = 128;
export const MAX_INPUT_SIZE_LIMIT = 1024 * 1024 * 1024;
export const MAX_DOCUMENT_COUNT_LIMIT = 10_000_000;

export const DEFAULT_PARALLEL_CONFIG = {
  maxInputSize: 100 * 1024 * 1024,
  maxDocumentCount: 100_000,
} as const;

function checkRange(value: unknown, name: string, max: number, maxLabel: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > max) {
    throw new ConfigError(`parallel.${name} must be an integer between 1 and ${maxLabel}`, 'ERR_CONFIG_INVALID', {
      [name]: value,
    });
  }
  return value;
}

/**
 * Validate `config` and fill in defaults.
 *
 * @throws ConfigError when a value is not an integer or is out of range
 */
export function resolveParallelConfig(config: ParallelConfig = {}): Required<ParallelConfig> {
  return {
    threadCount:
      config.threadCount === undefined
        ? Math.min(availableParallelism(), MAX_THREAD_COUNT)
        : checkRange(config.threadCount, 'threadCount', MAX_THREAD_COUNT, String(MAX_THREAD_COUNT)),
    maxInputSize:
      config.maxInputSize === undefined
        ? DEFAULT_PARALLEL_CONFIG.maxInputSize
        : checkRange(config.maxInputSize, 'maxInputSize', MAX_INPUT_SIZE_LIMIT, '1073741824 (1 GiB)'),
    maxDocumentCount:
      config.maxDocumentCount === undefined
        ? DEFAULT_PARALLEL_CONFIG.maxDocumentCount
        : checkRange(config.maxDocumentCount, 'maxDocumentCount', MAX_DOCUMENT_COUNT_LIMIT, '10000000'),
  };
}

function parseInline(source: string, origin: { offset: number; line: number }): Value[] {
  const values: Value[] = [];
  for (const document of new Composer().compose(new Scanner(source, { origin }).events())) {
    values.push(document.root ?? nullValue());
  }
  return values;
}

export async function splitAndParse(
  source: string,
  config: ParallelConfig = {},
  logger: Logger = silentLogger
): Promise<Value[]> {
  const resolved = resolveParallelConfig(config);

  const size = Buffer.byteLength(source, 'utf8');
  if (size > resolved.maxInputSize) {
    throw new ValidationError(
      `input is ${size} bytes, larger than maxInputSize (${resolved.maxInputSize})`,
      'ERR_INPUT_TOO_LARGE',
      resolved.maxInputSize,
      size,
      'Raise parallel.maxInputSize or split the input'
    );
  }

  const ranges = splitDocuments(source);
  if (ranges.length > resolved.maxDocumentCount) {
    throw new ValidationError(
      `input has ${ranges.length} documents, more than maxDocumentCount (${resolved.maxDocumentCount})`,
      'ERR_TOO_MANY_DOCUMENTS',
      resolved.maxDocumentCount,
      ranges.length,
      'Raise parallel.maxDocumentCount'
    );
  }

  if (ranges.length === 0) {
    return [];
  }
  if (ranges.length === 1) {
    const [range] = ranges;
    try {
      return parseInline(source.slice(range.start, range.end), { offset: range.start, line: range.line });
    } catch (error) {
      if (error instanceof YamletError) {
        throw errorFromJSON(error.toJSON(), { documentIndex: 0 });
      }
      throw error;
    }
  }

  const workerCount = Math.min(resolved.threadCount, ranges.length);
  const pool = new DocumentWorkerPool(workerCount, logger);
  logger.debug('Parsing documents in parallel', { documents: ranges.length, workers: workerCount });

  try {
    const results = await pool.parseRanges(
      ranges.map(range => ({
        index: range.index,
        source: source.slice(range.start, range.end),
        origin: { offset: range.start, line: range.line },
      }))
    );

    const values: Value[] = [];
    for (const result of results) {
      if (result.error !== null) {
        logger.debug('Document failed to parse', { documentIndex: result.index, error: result.error.message });
        throw errorFromJSON(result.error.toJSON(), { documentIndex: result.index });
      }
      values.push(...result.values);
    }
    return values;
  } finally {
    await pool.terminate();
  }
}
