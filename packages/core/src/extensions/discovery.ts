/**
 * Discovery sources: enumerate the extension packages available to a
 * manager.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  ExtensionManifestSchema,
  type ExtensionManifest,
  type ExtensionManifestInput,
} from '@plugstead/shared';
import { createNoopLogger, type Logger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { isNotFoundError } from '../utils/fs.js';
import { isExtensionClass } from './extension.js';
import type { DiscoverySource, ExtensionClass, ExtensionPackage } from './types.js';

export const MANIFEST_FILE = 'extension.json';

export interface FilesystemDiscoveryOptions {
  logger?: Logger;
  /** Module loader; defaults to dynamic `import()`. */
  importModule?: (url: string) => Promise<unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Treats every subdirectory of `directory` holding a valid `extension.json`
 * as a package. The manifest's `main` module must default-export an
 * Extension subclass.
 */
export class FilesystemDiscoverySource implements DiscoverySource {
  private readonly logger: Logger;
  private readonly importModule: (url: string) => Promise<unknown>;
  // keyed by module path and mtime
  private readonly classCache = new Map<string, ExtensionClass>();
  private generation = 0;

  constructor(
    private readonly directory: string,
    options: FilesystemDiscoveryOptions = {}
  ) {
    this.logger = (options.logger ?? createNoopLogger()).child({ component: 'ExtensionDiscovery' });
    this.importModule = options.importModule ?? ((url) => import(url));
  }

  /** Clears loaded classes; the next load imports the module afresh. */
  refresh(): void {
    this.classCache.clear();
    this.generation++;
  }

  async scan(): Promise<ExtensionPackage[]> {
    let names: string[];
    try {
      const entries = await readdir(this.directory, { withFileTypes: true });
      names = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (err) {
      if (isNotFoundError(err)) {
        this.logger.debug('Extensions directory does not exist', { directory: this.directory });
        return [];
      }
      throw err;
    }

    const packages: ExtensionPackage[] = [];
    for (const name of names.sort()) {
      const rootDir = join(this.directory, name);
      const manifest = await this.readManifest(rootDir);
      if (!manifest) continue;
      packages.push({ manifest, rootDir, load: () => this.loadClass(rootDir, manifest) });
    }
    return packages;
  }

  private async readManifest(rootDir: string): Promise<ExtensionManifest | null> {
    const path = join(rootDir, MANIFEST_FILE);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn('Skipping package with unreadable manifest', { path, error: toErrorMessage(err) });
      return null;
    }

    const result = ExtensionManifestSchema.safeParse(json);
    if (!result.success) {
      this.logger.warn('Skipping package with invalid manifest', {
        path,
        issues: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
      return null;
    }
    return result.data;
  }

  private async loadClass(rootDir: string, manifest: ExtensionManifest): Promise<ExtensionClass> {
    const modulePath = join(rootDir, manifest.main);
    const { mtimeMs } = await stat(modulePath);
    const cacheKey = `${modulePath}:${mtimeMs}`;

    const cached = this.classCache.get(cacheKey);
    if (cached) return cached;

    // ESM caches modules by URL, so a new query string forces a reload
    const url = pathToFileURL(modulePath);
    url.searchParams.set('v', `${Math.trunc(mtimeMs)}.${this.generation}`);

    const mod = await this.importModule(url.href);
    const candidate = isRecord(mod) ? mod.default : undefined;
    if (!isExtensionClass(candidate)) {
      throw new Error(`${modulePath} does not default-export an Extension subclass`);
    }

    this.classCache.set(cacheKey, candidate);
    return candidate;
  }
}

/** In-process packages, for embedding hosts and tests. */
export class StaticDiscoverySource implements DiscoverySource {
  private readonly packages = new Map<string, ExtensionPackage>();

  constructor(packages: ExtensionPackage[] = []) {
    for (const pkg of packages) this.add(pkg);
  }

  add(pkg: ExtensionPackage): void {
    this.packages.set(pkg.manifest.id, pkg);
  }

  remove(id: string): boolean {
    return this.packages.delete(id);
  }

  async scan(): Promise<ExtensionPackage[]> {
    return [...this.packages.values()];
  }
}

/** Builds a package around an already-loaded class. */
export function definePackage(
  manifest: ExtensionManifestInput,
  extensionClass: ExtensionClass,
  rootDir?: string
): ExtensionPackage {
  return {
    manifest: ExtensionManifestSchema.parse(manifest),
    rootDir,
    load: async () => extensionClass,
  };
}
