/**
 * Shared fixtures for the extension tests.
 */

import type { ExtensionManifestInput, ExtensionsConfig } from '@plugstead/shared';
import type { ExtensionDescriptor } from './descriptor.js';
import { StaticDiscoverySource } from './discovery.js';
import { Extension } from './extension.js';
import { ActiveComponentDirectory } from './components.js';
import { ExtensionManager } from './manager.js';
import { ExtensionRouteTable } from './routing.js';
import { InMemoryRegistrationStore } from './storage.js';
import type { AssetInstaller, ExtensionPackage, SchemaMigrator } from './types.js';

export class PlainExtension extends Extension {}

export function makeExtensionsConfig(overrides: Partial<ExtensionsConfig> = {}): ExtensionsConfig {
  return {
    key: 'test.extensions',
    directory: './extensions',
    staticRoot: '/srv/static/ext',
    adminPrefix: '/admin/extensions/',
    ...overrides,
  };
}

export function makeManifest(id: string, overrides: Partial<ExtensionManifestInput> = {}): ExtensionManifestInput {
  return { id, name: id, version: '1.0.0', ...overrides };
}

/** Records every call; throws for ids listed in `failInstall`. */
export class RecordingAssetInstaller implements AssetInstaller {
  readonly calls: string[] = [];
  readonly failInstall = new Set<string>();

  async install(descriptor: ExtensionDescriptor): Promise<void> {
    this.calls.push(`install:${descriptor.id}`);
    if (this.failInstall.has(descriptor.id)) {
      throw new Error(`copy failed for ${descriptor.id}`);
    }
  }

  async uninstall(descriptor: ExtensionDescriptor): Promise<void> {
    this.calls.push(`uninstall:${descriptor.id}`);
  }
}

export class RecordingMigrator implements SchemaMigrator {
  readonly applied: string[] = [];
  readonly fail = new Set<string>();

  async applyPendingChanges(descriptor: ExtensionDescriptor): Promise<void> {
    if (this.fail.has(descriptor.id)) {
      throw new Error(`migration failed for ${descriptor.id}`);
    }
    this.applied.push(descriptor.id);
  }
}

export interface TestManagerOptions {
  packages?: ExtensionPackage[];
  store?: InMemoryRegistrationStore;
  config?: Partial<ExtensionsConfig>;
}

export function createTestManager(options: TestManagerOptions = {}) {
  const store = options.store ?? new InMemoryRegistrationStore();
  const discovery = new StaticDiscoverySource(options.packages ?? []);
  const assets = new RecordingAssetInstaller();
  const migrator = new RecordingMigrator();
  const routes = new ExtensionRouteTable();
  const components = new ActiveComponentDirectory();
  const manager = new ExtensionManager('test.extensions', makeExtensionsConfig(options.config), {
    store,
    discovery,
    assets,
    migrator,
    routes,
    components,
  });
  return { manager, store, discovery, assets, migrator, routes, components };
}
