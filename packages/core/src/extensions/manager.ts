/**
 * ExtensionManager: discovers extension packages and moves them between
 * registered, installed and enabled states.
 *
 * Every public transition runs under the manager's mutex. Dependency
 * recursion inside a transition calls the unlocked variants directly.
 */

import { EventEmitter } from 'eventemitter3';
import type { ExtensionsConfig } from '@plugstead/shared';
import { createNoopLogger, type Logger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import { Mutex } from '../utils/mutex.js';
import { FsAssetInstaller } from './assets.js';
import { templateHookIndex } from './builtin-hooks.js';
import { ActiveComponentDirectory } from './components.js';
import { ExtensionDescriptor } from './descriptor.js';
import { registerExtensionManager } from './directory.js';
import {
  ConfigurationError,
  DependencyCycleError,
  EnablingExtensionError,
  InstallExtensionError,
  UnknownExtensionError,
} from './errors.js';
import type { Extension } from './extension.js';
import type { ExtensionHook } from './hooks.js';
import { ExtensionRouteTable } from './routing.js';
import type {
  AssetInstaller,
  ComponentDirectory,
  DiscoverySource,
  ExtensionClass,
  ExtensionManagerEvents,
  MountedRouteSet,
  RegistrationStore,
  RouteBridge,
  SchemaMigrator,
  TemplateCache,
} from './types.js';

export interface ExtensionManagerDeps {
  store: RegistrationStore;
  discovery: DiscoverySource;
  logger?: Logger;
  /** Omit when extensions ship no database schema. */
  migrator?: SchemaMigrator;
  assets?: AssetInstaller;
  routes?: RouteBridge;
  components?: ComponentDirectory;
  templateCache?: TemplateCache;
}

interface LiveExtension {
  instance: Extension;
  hooks: Set<ExtensionHook>;
  routes: MountedRouteSet | null;
}

export class ExtensionManager {
  readonly events = new EventEmitter<ExtensionManagerEvents>();
  readonly store: RegistrationStore;
  readonly routes: RouteBridge;
  readonly components: ComponentDirectory;

  private readonly logger: Logger;
  private readonly staticRoot: string;
  private readonly assets: AssetInstaller;
  private readonly templateCache: TemplateCache;
  private readonly mutex = new Mutex();
  private readonly descriptors = new Map<string, ExtensionDescriptor>();
  // Insertion order is initialization order
  private readonly live = new Map<string, LiveExtension>();

  constructor(
    readonly key: string,
    private readonly config: ExtensionsConfig,
    private readonly deps: ExtensionManagerDeps
  ) {
    if (!config.staticRoot) {
      throw new ConfigurationError(
        'extensions.staticRoot',
        'extensions.staticRoot must be set to the directory extension assets are installed into'
      );
    }
    this.staticRoot = config.staticRoot;
    this.logger = (deps.logger ?? createNoopLogger()).child({ component: 'ExtensionManager', manager: key });
    this.store = deps.store;
    this.assets = deps.assets ?? new FsAssetInstaller();
    this.routes = deps.routes ?? new ExtensionRouteTable();
    this.components = deps.components ?? new ActiveComponentDirectory();
    this.templateCache = deps.templateCache ?? templateHookIndex;

    registerExtensionManager(this);
  }

  // ── Transitions ──────────────────────────────────────────────

  /**
   * Scans the discovery source and reconciles the known descriptors with
   * it. Packages that disappeared are disabled and forgotten; records
   * flagged enabled are brought up.
   */
  async discover(): Promise<ExtensionDescriptor[]> {
    return this.mutex.runExclusive(() => this.discoverLocked());
  }

  /** Enables `id` and its requirements. Returns the live instance. */
  async enable(id: string): Promise<Extension> {
    return this.mutex.runExclusive(() => this.enableLocked(id, []));
  }

  /** Disables `id` after its enabled dependents. A no-op when not enabled. */
  async disable(id: string): Promise<void> {
    return this.mutex.runExclusive(() => this.disableLocked(id, new Set()));
  }

  /**
   * Uninitializes every live extension in reverse initialization order.
   * Persisted enabled flags are left alone so the next start restores them.
   */
  async shutdown(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      for (const id of [...this.live.keys()].reverse()) {
        this.uninitialize(id);
      }
    });
  }

  // ── Queries ──────────────────────────────────────────────────

  getEnabledExtension(id: string): Extension | undefined {
    return this.live.get(id)?.instance;
  }

  getEnabledExtensions(): Extension[] {
    return [...this.live.values()].map((entry) => entry.instance);
  }

  /** Every discovered descriptor, enabled or not. */
  getInstalledExtensions(): ExtensionDescriptor[] {
    return [...this.descriptors.values()];
  }

  getInstalledExtension(id: string): ExtensionDescriptor {
    const descriptor = this.descriptors.get(id);
    if (!descriptor) {
      throw new UnknownExtensionError(id);
    }
    return descriptor;
  }

  /** Ids of known extensions that list `id` as a requirement. */
  getDependents(id: string): string[] {
    if (!this.descriptors.has(id)) {
      throw new UnknownExtensionError(id);
    }
    return this.dependentsOf(id);
  }

  getAdminPrefix(): string {
    return this.config.adminPrefix;
  }

  getConfig(): ExtensionsConfig {
    return this.config;
  }

  // ── Internals ────────────────────────────────────────────────

  private async discoverLocked(): Promise<ExtensionDescriptor[]> {
    this.deps.discovery.refresh?.();
    const packages = await this.deps.discovery.scan();
    const records = new Map((await this.store.findAll()).map((record) => [record.id, record]));
    const seen = new Set<string>();

    for (const pkg of packages) {
      const { id, version, name } = pkg.manifest;
      if (seen.has(id)) {
        this.logger.warn('Duplicate extension id, keeping the first package', { extensionId: id });
        continue;
      }

      const existing = this.descriptors.get(id);
      if (existing && existing.version === version) {
        seen.add(id);
        continue;
      }

      let extensionClass: ExtensionClass;
      try {
        extensionClass = await pkg.load();
      } catch (err) {
        this.logger.error('Failed to load extension package', { extensionId: id, error: toErrorMessage(err) });
        continue;
      }

      const record =
        existing?.registration ??
        records.get(id) ??
        (await this.store.findById(id)) ??
        (await this.store.create(id, name));

      if (existing) {
        this.logger.info('Extension version changed', {
          extensionId: id,
          from: existing.version,
          to: version,
        });
        // Dependents come back in the auto-enable pass below
        this.uninitializeWithDependents(id, new Set());
        record.installed = false;
        await this.store.save(record);
      }

      this.descriptors.set(id, new ExtensionDescriptor(pkg, extensionClass, record, this.staticRoot));
      seen.add(id);
    }

    for (const id of [...this.descriptors.keys()]) {
      if (seen.has(id)) continue;
      this.logger.info('Extension package no longer available', { extensionId: id });
      await this.disableLocked(id, new Set());
      this.descriptors.delete(id);
    }

    for (const descriptor of this.descriptors.values()) {
      const missing = descriptor.resolveRequirements((requirementId) => this.descriptors.get(requirementId));
      if (missing.length > 0) {
        this.logger.warn('Extension has unresolved requirements', { extensionId: descriptor.id, missing });
      }
    }

    for (const descriptor of this.descriptors.values()) {
      if (!descriptor.enabled || this.live.has(descriptor.id)) continue;
      try {
        await this.enableLocked(descriptor.id, []);
      } catch (err) {
        this.logger.error('Failed to enable extension', { extensionId: descriptor.id, error: toErrorMessage(err) });
        await this.markDisabled(descriptor);
      }
    }

    this.logger.debug('Discovery complete', {
      extensionCount: this.descriptors.size,
      enabledCount: this.live.size,
    });
    return this.getInstalledExtensions();
  }

  private async enableLocked(id: string, chain: readonly string[]): Promise<Extension> {
    const current = this.live.get(id);
    if (current) return current.instance;

    const descriptor = this.descriptors.get(id);
    if (!descriptor) {
      throw new UnknownExtensionError(id);
    }
    if (chain.includes(id)) {
      throw new DependencyCycleError([...chain, id]);
    }

    const nextChain = [...chain, id];
    for (const requirementId of descriptor.requirementIds) {
      await this.enableLocked(requirementId, nextChain);
    }

    await this.install(descriptor);

    descriptor.registration.enabled = true;
    await this.store.save(descriptor.registration);

    return this.initialize(descriptor);
  }

  private async disableLocked(id: string, visiting: Set<string>): Promise<void> {
    if (!this.live.has(id)) return;

    const descriptor = this.descriptors.get(id);
    if (!descriptor) {
      throw new UnknownExtensionError(id);
    }

    visiting.add(id);
    for (const dependentId of this.dependentsOf(id)) {
      if (visiting.has(dependentId)) continue;
      await this.disableLocked(dependentId, visiting);
    }

    this.uninitialize(id);
    await this.removeAssets(descriptor);

    descriptor.registration.enabled = false;
    await this.store.save(descriptor.registration);
  }

  /**
   * Places static assets on every enable; runs schema migrations only the
   * first time.
   */
  private async install(descriptor: ExtensionDescriptor): Promise<void> {
    const { registration } = descriptor;
    const wasInstalled = registration.installed;

    try {
      await this.assets.install(descriptor);
      if (!wasInstalled) {
        await this.deps.migrator?.applyPendingChanges(descriptor);
        registration.installed = true;
        await this.store.save(registration);
      }
    } catch (err) {
      registration.installed = wasInstalled;
      const installError = new InstallExtensionError(descriptor.id, toErrorMessage(err), { cause: err });

      await this.removeAssets(descriptor);
      await this.markDisabled(descriptor);

      throw new EnablingExtensionError(descriptor.id, installError.message, { cause: installError });
    }
  }

  private async initialize(descriptor: ExtensionDescriptor): Promise<Extension> {
    const { id } = descriptor;
    const hooks = new Set<ExtensionHook>();
    let instance: Extension;
    let routes: MountedRouteSet | null = null;

    try {
      instance = new descriptor.extensionClass({
        descriptor,
        registration: descriptor.registration,
        store: this.store,
        manager: this,
        logger: this.logger.child({ component: 'Extension', extensionId: id }),
        hooks,
      });

      if (instance.isConfigurable && instance.adminRoutes.length > 0) {
        routes = this.routes.addRoutes(this.adminRoutePrefix(id), instance.adminRoutes);
      }

      this.live.set(id, { instance, hooks, routes });
      this.components.add(descriptor.componentName);
    } catch (err) {
      for (const hook of [...hooks]) {
        hook.shutdown();
      }
      if (routes) {
        this.routes.removeRoutes(routes);
      }
      this.live.delete(id);
      this.components.remove(descriptor.componentName);
      await this.removeAssets(descriptor);
      await this.markDisabled(descriptor);
      throw new EnablingExtensionError(id, toErrorMessage(err), { cause: err });
    }

    this.templateCache.reset();
    this.logger.info('Extension initialized', { extensionId: id, version: descriptor.version });
    this.events.emit('extension:initialized', instance);
    return instance;
  }

  private uninitialize(id: string): void {
    const entry = this.live.get(id);
    if (!entry) return;

    const { instance } = entry;
    try {
      instance.shutdown();
    } catch (err) {
      this.logger.error('Extension shutdown failed', { extensionId: id, error: toErrorMessage(err) });
    }

    // Hooks a subclass left behind
    for (const hook of [...entry.hooks]) {
      hook.shutdown();
    }
    if (entry.routes) {
      this.routes.removeRoutes(entry.routes);
    }
    this.components.remove(instance.descriptor.componentName);
    this.templateCache.reset();
    this.live.delete(id);

    this.logger.info('Extension uninitialized', { extensionId: id });
    this.events.emit('extension:uninitialized', instance);
  }

  /** Uninitializes live dependents first. Persisted flags are untouched. */
  private uninitializeWithDependents(id: string, visiting: Set<string>): void {
    if (!this.live.has(id)) return;
    visiting.add(id);
    for (const dependentId of this.dependentsOf(id)) {
      if (visiting.has(dependentId)) continue;
      this.uninitializeWithDependents(dependentId, visiting);
    }
    this.uninitialize(id);
  }

  private async removeAssets(descriptor: ExtensionDescriptor): Promise<void> {
    try {
      await this.assets.uninstall(descriptor);
    } catch (err) {
      this.logger.warn('Failed to remove extension assets', {
        extensionId: descriptor.id,
        error: toErrorMessage(err),
      });
    }
  }

  private async markDisabled(descriptor: ExtensionDescriptor): Promise<void> {
    if (!descriptor.registration.enabled) return;
    descriptor.registration.enabled = false;
    try {
      await this.store.save(descriptor.registration);
    } catch (err) {
      this.logger.error('Failed to persist disabled state', {
        extensionId: descriptor.id,
        error: toErrorMessage(err),
      });
    }
  }

  private dependentsOf(id: string): string[] {
    return [...this.descriptors.values()]
      .filter((descriptor) => descriptor.requirementIds.includes(id))
      .map((descriptor) => descriptor.id);
  }

  private adminRoutePrefix(id: string): string {
    return `${this.config.adminPrefix}${id}/config/`;
  }
}
