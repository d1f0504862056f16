/**
 * Shared Types - Main Export
 */

// Configuration
export {
  CoreConfigSchema,
  LogLevelSchema,
  LoggingConfigSchema,
  DatabaseConfigSchema,
  GatewayConfigSchema,
  ExtensionsConfigSchema,
  ConfigSchema,
  PartialConfigSchema,
  type CoreConfig,
  type LoggingConfig,
  type DatabaseConfig,
  type GatewayConfig,
  type ExtensionsConfig,
  type Config,
  type PartialConfig,
} from './config.js';

// Extensions
export {
  ExtensionIdSchema,
  ExtensionManifestSchema,
  RegistrationRecordSchema,
  ExtensionSettingsUpdateSchema,
  type ExtensionManifest,
  type ExtensionManifestInput,
  type RegistrationRecord,
  type ExtensionInfo,
  type ExtensionSettingsUpdate,
} from './extension.js';
