/**
 * @plugstead/core
 *
 * Extension lifecycle runtime: discovery, install, enable/disable with
 * dependency resolution, hook points and admin routes.
 */

// Main entry point
export { ExtensionHost, type ExtensionHostOptions } from './host.js';

// Configuration
export {
  loadConfig,
  mergeConfigs,
  expandPath,
  getSecret,
  requireSecret,
  type LoadConfigOptions,
} from './config/loader.js';

// Logging
export {
  createLogger,
  initializeLogger,
  getLogger,
  isLoggerInitialized,
  createNoopLogger,
  type Logger,
  type LogContext,
  type LogLevel,
} from './logging/logger.js';

// Storage
export {
  initPool,
  initPoolFromConfig,
  getPool,
  closePool,
  resetPool,
  isPoolInitialized,
  type PgPoolConfig,
} from './storage/pg-pool.js';
export { PgBaseStorage } from './storage/pg-base.js';
export { runMigrations } from './storage/migrations/runner.js';

// Utilities
export { Mutex } from './utils/mutex.js';
export { toErrorMessage, sendError, statusForError } from './utils/errors.js';

// Extensions
export * from './extensions/index.js';
