import { describe, it, expect } from 'vitest';
import { ExtensionManifestSchema, RegistrationRecordSchema } from './extension.js';

describe('ExtensionManifestSchema', () => {
  it('applies defaults to a minimal manifest', () => {
    const manifest = ExtensionManifestSchema.parse({
      id: 'acme.reports',
      name: 'acme-reports',
      version: '1.2.0',
    });
    expect(manifest.main).toBe('index.js');
    expect(manifest.requirements).toEqual([]);
    expect(manifest.resources).toEqual([]);
    expect(manifest.isConfigurable).toBe(false);
    expect(manifest.htdocs).toBe('htdocs');
    expect(manifest.migrations).toBe('migrations');
    expect(manifest.metadata).toEqual({});
  });

  it('rejects an uppercase id', () => {
    const result = ExtensionManifestSchema.safeParse({ id: 'Acme.Reports', name: 'x', version: '1' });
    expect(result.success).toBe(false);
  });

  it('rejects an entry module outside the package', () => {
    const result = ExtensionManifestSchema.safeParse({
      id: 'acme.reports',
      name: 'acme-reports',
      version: '1.0.0',
      main: '../escape.js',
    });
    expect(result.success).toBe(false);
  });

  it('rejects a name that cannot be a directory', () => {
    const result = ExtensionManifestSchema.safeParse({ id: 'acme.x', name: 'a/b', version: '1.0.0' });
    expect(result.success).toBe(false);
  });

  it('keeps declared requirements', () => {
    const manifest = ExtensionManifestSchema.parse({
      id: 'acme.charts',
      name: 'acme-charts',
      version: '0.1.0',
      requirements: ['acme.reports'],
    });
    expect(manifest.requirements).toEqual(['acme.reports']);
  });
});

describe('RegistrationRecordSchema', () => {
  it('requires the settings blob to be a string', () => {
    const result = RegistrationRecordSchema.safeParse({
      id: 'acme.reports',
      name: 'acme-reports',
      enabled: false,
      installed: false,
      settings: {},
    });
    expect(result.success).toBe(false);
  });
});
