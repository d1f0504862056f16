import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilesystemDiscoverySource, StaticDiscoverySource, definePackage } from './discovery.js';
import { PlainExtension, makeManifest } from './test-utils.js';

describe('FilesystemDiscoverySource', () => {
  let dir: string;
  const importModule = vi.fn(async (_url: string): Promise<unknown> => ({ default: PlainExtension }));

  function writePackage(folder: string, manifest: unknown, main = 'index.js') {
    mkdirSync(join(dir, folder), { recursive: true });
    writeFileSync(
      join(dir, folder, 'extension.json'),
      typeof manifest === 'string' ? manifest : JSON.stringify(manifest)
    );
    mkdirSync(dirname(join(dir, folder, main)), { recursive: true });
    writeFileSync(join(dir, folder, main), 'export default class {}');
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'plugstead-discovery-'));
    importModule.mockClear();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns no packages when the directory does not exist', async () => {
    const source = new FilesystemDiscoverySource(join(dir, 'missing'), { importModule });
    await expect(source.scan()).resolves.toEqual([]);
  });

  it('finds valid packages in name order', async () => {
    writePackage('zeta', makeManifest('acme.zeta'));
    writePackage('alpha', makeManifest('acme.alpha', { requirements: ['acme.zeta'] }));
    writeFileSync(join(dir, 'notes.txt'), 'not a package');

    const packages = await new FilesystemDiscoverySource(dir, { importModule }).scan();

    expect(packages.map((pkg) => pkg.manifest.id)).toEqual(['acme.alpha', 'acme.zeta']);
    expect(packages[0]?.rootDir).toBe(join(dir, 'alpha'));
    expect(packages[0]?.manifest.requirements).toEqual(['acme.zeta']);
    expect(packages[0]?.manifest.main).toBe('index.js');
  });

  it('skips folders without a manifest, or with an unreadable or invalid one', async () => {
    mkdirSync(join(dir, 'empty'));
    writePackage('broken', '{ not json');
    writePackage('invalid', { id: 'Not Valid', name: 'x', version: '1.0.0' });
    writePackage('good', makeManifest('acme.good'));

    const packages = await new FilesystemDiscoverySource(dir, { importModule }).scan();
    expect(packages.map((pkg) => pkg.manifest.id)).toEqual(['acme.good']);
  });

  it('loads the main module through a versioned file URL', async () => {
    writePackage('reports', makeManifest('acme.reports', { main: 'lib/main.js' }), 'lib/main.js');

    const [pkg] = await new FilesystemDiscoverySource(dir, { importModule }).scan();
    expect(pkg).toBeDefined();
    if (!pkg) return;

    await expect(pkg.load()).resolves.toBe(PlainExtension);
    expect(importModule.mock.calls[0]?.[0]).toMatch(/^file:\/\/.*\/reports\/lib\/main\.js\?v=\d+\.0$/);
  });

  it('caches loaded classes until refresh()', async () => {
    writePackage('reports', makeManifest('acme.reports'));
    const source = new FilesystemDiscoverySource(dir, { importModule });

    const [pkg] = await source.scan();
    await pkg?.load();
    await pkg?.load();
    expect(importModule).toHaveBeenCalledTimes(1);

    source.refresh();
    await pkg?.load();
    expect(importModule).toHaveBeenCalledTimes(2);
    expect(importModule.mock.calls[1]?.[0]).toMatch(/\?v=\d+\.1$/);
  });

  it('rejects a module without an Extension subclass as default export', async () => {
    writePackage('reports', makeManifest('acme.reports'));
    const source = new FilesystemDiscoverySource(dir, {
      importModule: async () => ({ default: class NotAnExtension {} }),
    });

    const [pkg] = await source.scan();
    await expect(pkg?.load()).rejects.toThrow('does not default-export an Extension subclass');
  });
});

describe('StaticDiscoverySource', () => {
  it('scans whatever was added and not removed', async () => {
    const source = new StaticDiscoverySource([definePackage(makeManifest('acme.one'), PlainExtension)]);
    source.add(definePackage(makeManifest('acme.two'), PlainExtension));

    expect((await source.scan()).map((pkg) => pkg.manifest.id)).toEqual(['acme.one', 'acme.two']);

    expect(source.remove('acme.one')).toBe(true);
    expect(source.remove('acme.one')).toBe(false);
    expect((await source.scan()).map((pkg) => pkg.manifest.id)).toEqual(['acme.two']);
  });

  it('definePackage validates the manifest and loads the given class', async () => {
    const pkg = definePackage(makeManifest('acme.one'), PlainExtension);
    expect(pkg.manifest.isConfigurable).toBe(false);
    await expect(pkg.load()).resolves.toBe(PlainExtension);
    expect(() => definePackage(makeManifest('Bad Id'), PlainExtension)).toThrow();
  });
});
