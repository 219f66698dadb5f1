/**
 * @shapecast/core
 *
 * Type descriptors, registry, policies, errors and diagnostics shared by the casters
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Type registry and descriptors
export * from './registry/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

// Logging and configuration
export { Logger } from './logging/logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logging/logger.js';
export {
  loadConfig,
  getDefaultConfig,
  getDefaultLogger,
  formatZodError,
  DEFAULT_RELABEL_MAX_DEPTH,
} from './config.js';
export type { ShapecastConfig } from './config.js';
