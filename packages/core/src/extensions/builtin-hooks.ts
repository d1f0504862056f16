/**
 * Hook kinds shipped with the runtime.
 */

import type { Extension } from './extension.js';
import { ExtensionHook, defineHookPoint, type HookPoint } from './hooks.js';
import type { TemplateCache } from './types.js';

export interface NavigationEntry {
  label: string;
  url: string;
  /** Lower sorts first. Defaults to 0. */
  order?: number;
}

export type TemplateContext = Record<string, unknown>;

export const navigationHooks: HookPoint<NavigationHook> = defineHookPoint<NavigationHook>('navigation');
export const templateHooks: HookPoint<TemplateHook> = defineHookPoint<TemplateHook>('template');

/** Adds an entry to the host's navigation. */
export class NavigationHook extends ExtensionHook {
  readonly entry: Readonly<NavigationEntry>;

  constructor(extension: Extension, entry: NavigationEntry) {
    super(extension, navigationHooks);
    this.entry = { ...entry };
  }
}

/** Navigation entries from every active hook, ordered. */
export function navigationEntries(point: HookPoint<NavigationHook> = navigationHooks): NavigationEntry[] {
  return point
    .list()
    .map((hook) => hook.entry)
    .sort((a, b) => (a.order ?? 0) - (b.order ?? 0));
}

/**
 * Contributes templates to a named template hook point. Override
 * `appliesTo` to render only for some requests.
 */
export class TemplateHook extends ExtensionHook {
  readonly pointName: string;
  readonly templateNames: readonly string[];

  constructor(extension: Extension, pointName: string, templateNames: readonly string[]) {
    super(extension, templateHooks);
    this.pointName = pointName;
    this.templateNames = [...templateNames];
  }

  appliesTo(_context: TemplateContext): boolean {
    return true;
  }
}

/**
 * Lookup cache for template hooks by point name. The lifecycle manager
 * resets it whenever an extension is initialized or uninitialized.
 */
export class TemplateHookIndex implements TemplateCache {
  private cache: Map<string, TemplateHook[]> | null = null;

  constructor(private readonly point: HookPoint<TemplateHook> = templateHooks) {}

  byName(name: string): readonly TemplateHook[] {
    if (!this.cache) {
      this.cache = new Map();
      for (const hook of this.point.list()) {
        const hooks = this.cache.get(hook.pointName) ?? [];
        hooks.push(hook);
        this.cache.set(hook.pointName, hooks);
      }
    }
    return this.cache.get(name) ?? [];
  }

  applicable(name: string, context: TemplateContext): TemplateHook[] {
    return this.byName(name).filter((hook) => hook.appliesTo(context));
  }

  reset(): void {
    this.cache = null;
  }
}

export const templateHookIndex = new TemplateHookIndex();
