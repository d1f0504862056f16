/**
 * Extension lifecycle module.
 */

export { Extension, isExtensionClass } from './extension.js';
export { ExtensionManager, type ExtensionManagerDeps } from './manager.js';
export { ExtensionDescriptor } from './descriptor.js';
export { ExtensionSettings } from './settings.js';
export {
  ExtensionHook,
  HookPoint,
  HookPointDirectory,
  hookPoints,
  defineHookPoint,
} from './hooks.js';
export {
  NavigationHook,
  TemplateHook,
  TemplateHookIndex,
  navigationHooks,
  templateHooks,
  templateHookIndex,
  navigationEntries,
  type NavigationEntry,
  type TemplateContext,
} from './builtin-hooks.js';
export { ExtensionStorage, InMemoryRegistrationStore } from './storage.js';
export { PgSchemaMigrator } from './migrator.js';
export { FsAssetInstaller } from './assets.js';
export {
  FilesystemDiscoverySource,
  StaticDiscoverySource,
  definePackage,
  MANIFEST_FILE,
  type FilesystemDiscoveryOptions,
} from './discovery.js';
export { ExtensionRouteTable, joinRoutePath, type RouteMatch } from './routing.js';
export { ActiveComponentDirectory } from './components.js';
export { registerExtensionManager, getExtensionManagers, resetExtensionManagers } from './directory.js';
export { registerExtensionRoutes } from './extension-routes.js';
export * from './errors.js';
export type {
  AssetInstaller,
  ComponentDirectory,
  DiscoverySource,
  ExtensionClass,
  ExtensionContext,
  ExtensionManagerEvents,
  ExtensionPackage,
  ExtensionRoute,
  ExtensionRouteHandler,
  HttpMethod,
  MountedRoute,
  MountedRouteSet,
  RegistrationStore,
  RouteBridge,
  RouteParams,
  SchemaMigrator,
  TemplateCache,
} from './types.js';
