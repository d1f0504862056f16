/**
 * Configuration Types for Plugstead
 *
 * - Secret values are never stored in config, only references (env vars)
 * - Paths are validated to prevent traversal
 * - Limits have maximum bounds
 */

import { z } from 'zod';

// Safe path validation (no path traversal)
const SafePathSchema = z
  .string()
  .min(1)
  .max(4096)
  .refine((path) => !path.includes('..') && !path.includes('\0'), {
    message: 'Path contains forbidden characters',
  });

// Environment variable reference (for secrets)
const EnvVarRefSchema = z
  .string()
  .regex(/^[A-Z][A-Z0-9_]*$/, 'Must be a valid environment variable name');

// URL prefix under which extension admin routes are mounted
const RoutePrefixSchema = z
  .string()
  .regex(/^\/(?:[A-Za-z0-9._~-]+\/)*$/, 'Must start and end with "/"');

export const CoreConfigSchema = z.object({
  name: z.string().default('Plugstead'),
  environment: z.enum(['development', 'staging', 'production']).default('development'),
  dataDir: SafePathSchema.default('~/.plugstead/data'),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  output: z
    .array(
      z.discriminatedUnion('type', [
        z.object({
          type: z.literal('file'),
          path: SafePathSchema,
        }),
        z.object({
          type: z.literal('stdout'),
          format: z.enum(['json', 'pretty']).default('json'),
        }),
      ])
    )
    .default([{ type: 'stdout', format: 'json' }]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const DatabaseConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().default('plugstead'),
  user: z.string().default('plugstead'),
  passwordEnv: EnvVarRefSchema.default('PLUGSTEAD_DB_PASSWORD'),
  ssl: z.boolean().default(false),
  poolSize: z.number().int().positive().max(100).default(10),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

export const GatewayConfigSchema = z.object({
  enabled: z.boolean().default(true),
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(18790),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export const ExtensionsConfigSchema = z.object({
  /** Identifies the extension set a manager owns (one manager per key). */
  key: z
    .string()
    .regex(/^[a-z][a-z0-9._-]*$/)
    .default('plugstead.extensions'),
  /** Directory scanned for extension packages. */
  directory: SafePathSchema.default('./extensions'),
  /** Root that installed extensions' static assets are copied into. Required by the manager. */
  staticRoot: SafePathSchema.optional(),
  adminPrefix: RoutePrefixSchema.default('/admin/extensions/'),
});

export type ExtensionsConfig = z.infer<typeof ExtensionsConfigSchema>;

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  core: CoreConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  database: DatabaseConfigSchema.default({}),
  gateway: GatewayConfigSchema.default({}),
  extensions: ExtensionsConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// Partial config for merging (all fields optional)
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
