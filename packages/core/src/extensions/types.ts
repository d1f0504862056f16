/**
 * Collaborator contracts for the extension lifecycle.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ExtensionManifest, RegistrationRecord } from '@plugstead/shared';
import type { Logger } from '../logging/logger.js';
import type { ExtensionDescriptor } from './descriptor.js';
import type { Extension } from './extension.js';
import type { ExtensionHook } from './hooks.js';
import type { ExtensionManager } from './manager.js';

// ── Persistence ────────────────────────────────────────────────

export interface RegistrationStore {
  findAll(): Promise<RegistrationRecord[]>;
  findById(id: string): Promise<RegistrationRecord | null>;
  create(id: string, name: string): Promise<RegistrationRecord>;
  save(record: RegistrationRecord): Promise<void>;
}

/** Invoked once per install, before the record is marked installed. */
export interface SchemaMigrator {
  applyPendingChanges(descriptor: ExtensionDescriptor): Promise<void>;
}

export interface AssetInstaller {
  install(descriptor: ExtensionDescriptor): Promise<void>;
  uninstall(descriptor: ExtensionDescriptor): Promise<void>;
}

// ── Routing / app registration ─────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type RouteParams = Record<string, string | undefined>;

export type ExtensionRouteHandler = (
  request: FastifyRequest,
  reply: FastifyReply,
  params: RouteParams
) => unknown;

export interface ExtensionRoute {
  method: HttpMethod;
  /** Relative to the prefix the routes are mounted under. */
  path: string;
  handler: ExtensionRouteHandler;
}

export interface MountedRoute {
  method: HttpMethod;
  path: string;
}

/** Handle returned by `addRoutes`; removing it removes exactly these routes. */
export interface MountedRouteSet {
  readonly prefix: string;
  readonly routes: readonly MountedRoute[];
}

export interface RouteBridge {
  addRoutes(prefix: string, routes: readonly ExtensionRoute[]): MountedRouteSet;
  removeRoutes(set: MountedRouteSet): void;
}

/** Add and remove are idempotent. */
export interface ComponentDirectory {
  add(name: string): void;
  remove(name: string): void;
}

export interface TemplateCache {
  reset(): void;
}

// ── Discovery ──────────────────────────────────────────────────

export interface ExtensionPackage {
  manifest: ExtensionManifest;
  /** Package directory, for packages that live on disk. */
  rootDir?: string;
  load(): Promise<ExtensionClass>;
}

export interface DiscoverySource {
  scan(): Promise<ExtensionPackage[]>;
  /** Drops cached package state so the next scan reloads it. */
  refresh?(): void;
}

// ── Instances ──────────────────────────────────────────────────

export interface ExtensionContext {
  descriptor: ExtensionDescriptor;
  registration: RegistrationRecord;
  store: RegistrationStore;
  manager: ExtensionManager;
  logger: Logger;
  /** Owned by the manager so hooks can be drained even if construction fails. */
  hooks: Set<ExtensionHook>;
}

export type ExtensionClass = new (context: ExtensionContext) => Extension;

export interface ExtensionManagerEvents {
  'extension:initialized': [extension: Extension];
  'extension:uninitialized': [extension: Extension];
}
