/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  DEFAULT_CONFIG,
  validateConfig,
  validateVersion,
  validateVirtualenv,
} from './ConfigLoader.js';
export type { DepweaveConfig } from './ConfigLoader.js';
