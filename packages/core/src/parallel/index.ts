export { splitDocuments } from './DocumentSplitter.js';
export type { DocumentRange } from './DocumentSplitter.js';
export { DocumentWorkerPool } from './DocumentWorkerPool.js';
export type { DocumentWorkerPoolStats, RangeOrigin, RangeResult } from './DocumentWorkerPool.js';
export {
  splitAndParse,
  resolveParallelConfig,
  DEFAULT_PARALLEL_CONFIG,
  MAX_THREAD_COUNT,
  MAX_INPUT_SIZE_LIMIT,
  MAX_DOCUMENT_COUNT_LIMIT,
} from './splitAndParse.js';
