import type { RegistrationRecord } from '@plugstead/shared';
import type { Logger } from '../logging/logger.js';
import type { ExtensionDescriptor } from './descriptor.js';
import type { ExtensionHook } from './hooks.js';
import type { ExtensionManager } from './manager.js';
import { ExtensionSettings } from './settings.js';
import type { ExtensionClass, ExtensionContext, ExtensionRoute } from './types.js';

/**
 * Base class for extensions. A package's entry module default-exports a
 * subclass; the manager constructs it on enable and calls `shutdown()` on
 * disable.
 *
 * @example
 * ```ts
 * export default class Reports extends Extension {
 *   constructor(context: ExtensionContext) {
 *     super(context);
 *     new NavigationHook(this, { label: 'Reports', url: '/reports/' });
 *   }
 * }
 * ```
 */
export abstract class Extension {
  readonly id: string;
  readonly descriptor: ExtensionDescriptor;
  readonly registration: RegistrationRecord;
  readonly manager: ExtensionManager;
  readonly settings: ExtensionSettings;
  readonly hooks: Set<ExtensionHook>;
  protected readonly logger: Logger;

  constructor(context: ExtensionContext) {
    this.id = context.descriptor.id;
    this.descriptor = context.descriptor;
    this.registration = context.registration;
    this.manager = context.manager;
    this.hooks = context.hooks;
    this.logger = context.logger;
    this.settings = new ExtensionSettings(context.registration, context.store, this.defaultSettings, context.logger);
  }

  /** Values returned by `settings.get()` for keys never set. */
  get defaultSettings(): Record<string, unknown> {
    return {};
  }

  get isConfigurable(): boolean {
    return this.descriptor.isConfigurable;
  }

  /** Mounted under `<adminPrefix><id>/config/` when the extension is configurable. */
  get adminRoutes(): readonly ExtensionRoute[] {
    return [];
  }

  /** Subclasses overriding this must call `super.shutdown()`. */
  shutdown(): void {
    for (const hook of [...this.hooks]) {
      hook.shutdown();
    }
  }
}

export function isExtensionClass(value: unknown): value is ExtensionClass {
  return typeof value === 'function' && value.prototype instanceof Extension;
}
