/**
 * ExtensionHost: boots the extension runtime.
 *
 * Startup order: configuration, logger, persistence, core migrations,
 * extension manager, discovery, admin HTTP routes. `stop()` tears the same
 * pieces down in reverse.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { Config } from '@plugstead/shared';
import { loadConfig, type LoadConfigOptions } from './config/loader.js';
import { initializeLogger, type Logger } from './logging/logger.js';
import { closePool, initPoolFromConfig } from './storage/pg-pool.js';
import { runMigrations } from './storage/migrations/runner.js';
import { FilesystemDiscoverySource } from './extensions/discovery.js';
import { ExtensionManager } from './extensions/manager.js';
import { ExtensionStorage } from './extensions/storage.js';
import { PgSchemaMigrator } from './extensions/migrator.js';
import { ExtensionRouteTable } from './extensions/routing.js';
import { ActiveComponentDirectory } from './extensions/components.js';
import { registerExtensionRoutes } from './extensions/extension-routes.js';
import { resetExtensionManagers } from './extensions/directory.js';
import { hookPoints } from './extensions/hooks.js';
import type { AssetInstaller, DiscoverySource, RegistrationStore } from './extensions/types.js';
import { toErrorMessage } from './utils/errors.js';

export interface ExtensionHostOptions {
  /** Configuration options */
  config?: LoadConfigOptions;
  /** Registration store to use instead of PostgreSQL */
  store?: RegistrationStore;
  /** Discovery source to use instead of the extensions directory */
  discovery?: DiscoverySource;
  assets?: AssetInstaller;
  /** Listen on the configured gateway address after startup */
  enableGateway?: boolean;
  /** Manager key; defaults to `extensions.key` */
  key?: string;
}

interface RunningHost {
  config: Config;
  logger: Logger;
  manager: ExtensionManager;
  routeTable: ExtensionRouteTable;
  components: ActiveComponentDirectory;
  app: FastifyInstance;
  usesPool: boolean;
}

export class ExtensionHost {
  private running: RunningHost | null = null;
  private stopPromise: Promise<void> | null = null;

  constructor(private readonly options: ExtensionHostOptions = {}) {}

  /** Must be called before any other operation. */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('ExtensionHost is already started');
    }
    this.stopPromise = null;

    const config = loadConfig(this.options.config);
    const logger = initializeLogger(config.logging);
    logger.info('Plugstead starting', { environment: config.core.environment });

    let store = this.options.store;
    const usesPool = !store;
    if (!store) {
      initPoolFromConfig(config.database, (err) =>
        logger.error('Idle PostgreSQL client error', { error: err.message })
      );
      const applied = await runMigrations();
      logger.debug('Core migrations applied', { applied });
      store = new ExtensionStorage();
    }

    const routeTable = new ExtensionRouteTable();
    const components = new ActiveComponentDirectory();
    const discovery =
      this.options.discovery ?? new FilesystemDiscoverySource(config.extensions.directory, { logger });

    const manager = new ExtensionManager(this.options.key ?? config.extensions.key, config.extensions, {
      store,
      discovery,
      logger,
      migrator: usesPool ? new PgSchemaMigrator() : undefined,
      assets: this.options.assets,
      routes: routeTable,
      components,
    });

    const app = Fastify({ logger: false });
    registerExtensionRoutes(app, { extensionManager: manager, routeTable });

    this.running = { config, logger, manager, routeTable, components, app, usesPool };

    try {
      await manager.discover();
      await app.ready();
      if (this.options.enableGateway ?? config.gateway.enabled) {
        await app.listen({ host: config.gateway.host, port: config.gateway.port });
        logger.info('Gateway listening', { host: config.gateway.host, port: config.gateway.port });
      }
    } catch (err) {
      logger.error('Startup failed', { error: toErrorMessage(err) });
      await this.stop();
      throw err;
    }

    logger.info('Plugstead started', { extensions: manager.getEnabledExtensions().length });
  }

  getManager(): ExtensionManager {
    return this.ensureRunning().manager;
  }

  getApp(): FastifyInstance {
    return this.ensureRunning().app;
  }

  getRouteTable(): ExtensionRouteTable {
    return this.ensureRunning().routeTable;
  }

  getComponents(): ActiveComponentDirectory {
    return this.ensureRunning().components;
  }

  getConfig(): Config {
    return this.ensureRunning().config;
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  /** Safe to call more than once. */
  async stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.performStop();
    }
    return this.stopPromise;
  }

  private async performStop(): Promise<void> {
    const running = this.running;
    if (!running) return;
    this.running = null;

    const { logger } = running;
    logger.info('Plugstead shutting down');

    try {
      await running.app.close();
      await running.manager.shutdown();
      hookPoints.clear();
      resetExtensionManagers();
      if (running.usesPool) {
        await closePool();
      }
      logger.info('Plugstead shutdown complete');
    } catch (err) {
      logger.error('Error during shutdown', { error: toErrorMessage(err) });
      throw err;
    }
  }

  private ensureRunning(): RunningHost {
    if (!this.running) {
      throw new Error('ExtensionHost is not started. Call start() first.');
    }
    return this.running;
  }
}
