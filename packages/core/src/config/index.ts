/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  DEFAULT_CONFIG,
  validateVersion,
  validateLint,
  validateParallel,
  validateEmit,
} from './ConfigLoader.js';
export type { YamletConfig } from './ConfigLoader.js';
