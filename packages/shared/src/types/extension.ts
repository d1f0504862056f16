/**
 * Extension package and registration types.
 */

import { z } from 'zod';

export const ExtensionIdSchema = z
  .string()
  .min(1)
  .max(200)
  .regex(/^[a-z][a-z0-9]*(?:[._-][a-z0-9]+)*$/, 'Must be a lowercase dotted or dashed identifier');

// Relative path inside an extension package
const PackagePathSchema = z
  .string()
  .min(1)
  .max(1024)
  .refine((path) => !path.startsWith('/') && !path.split(/[\\/]/).includes('..'), {
    message: 'Must be a relative path inside the package',
  });

/** Contents of an extension package's `extension.json`. */
export const ExtensionManifestSchema = z.object({
  id: ExtensionIdSchema,
  name: z
    .string()
    .min(1)
    .max(128)
    .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Must be usable as a directory name'),
  version: z.string().min(1).max(64),
  summary: z.string().max(500).optional(),
  description: z.string().max(10000).optional(),
  author: z.string().max(200).optional(),
  authorEmail: z.string().email().optional(),
  license: z.string().max(100).optional(),
  url: z.string().url().optional(),
  metadata: z.record(z.string()).default({}),
  main: PackagePathSchema.default('index.js'),
  requirements: z.array(ExtensionIdSchema).default([]),
  resources: z.array(z.string().min(1).max(200)).default([]),
  isConfigurable: z.boolean().default(false),
  htdocs: PackagePathSchema.default('htdocs'),
  migrations: PackagePathSchema.default('migrations'),
});

export type ExtensionManifest = z.infer<typeof ExtensionManifestSchema>;
export type ExtensionManifestInput = z.input<typeof ExtensionManifestSchema>;

/**
 * Persisted registration row. `settings` is the serialized settings blob;
 * only `ExtensionSettings` interprets it.
 */
export const RegistrationRecordSchema = z.object({
  id: ExtensionIdSchema,
  name: z.string(),
  enabled: z.boolean(),
  installed: z.boolean(),
  settings: z.string(),
});

export type RegistrationRecord = z.infer<typeof RegistrationRecordSchema>;

/** JSON view of an extension returned by the admin API. */
export interface ExtensionInfo {
  id: string;
  name: string;
  version: string;
  summary: string | null;
  description: string | null;
  author: string | null;
  authorEmail: string | null;
  license: string | null;
  url: string | null;
  metadata: Record<string, string>;
  requirements: string[];
  resources: string[];
  isConfigurable: boolean;
  enabled: boolean;
  installed: boolean;
}

export const ExtensionSettingsUpdateSchema = z.record(z.unknown());
export type ExtensionSettingsUpdate = z.infer<typeof ExtensionSettingsUpdateSchema>;
