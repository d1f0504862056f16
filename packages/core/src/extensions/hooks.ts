/**
 * Hook points: typed collections that extensions contribute hooks to.
 *
 * A hook registers itself with its point and its owning extension when it
 * is constructed, and leaves both on `shutdown()`.
 */

import { DuplicateHookPointError } from './errors.js';
import type { Extension } from './extension.js';

export abstract class ExtensionHook {
  private active = true;

  constructor(
    readonly extension: Extension,
    readonly hookPoint: HookPoint<ExtensionHook>
  ) {
    hookPoint.add(this);
    extension.hooks.add(this);
  }

  get isActive(): boolean {
    return this.active;
  }

  shutdown(): void {
    if (!this.active) return;
    this.active = false;
    this.hookPoint.remove(this);
    this.extension.hooks.delete(this);
  }
}

export class HookPoint<T extends ExtensionHook = ExtensionHook> {
  private readonly hooks: T[] = [];

  constructor(readonly name: string) {}

  add(hook: T): void {
    this.hooks.push(hook);
  }

  remove(hook: T): boolean {
    const index = this.hooks.indexOf(hook);
    if (index === -1) return false;
    this.hooks.splice(index, 1);
    return true;
  }

  /** Hooks in registration order. */
  list(): T[] {
    return [...this.hooks];
  }

  get size(): number {
    return this.hooks.length;
  }

  /** Shuts down every hook in the point. */
  clear(): void {
    for (const hook of this.list()) {
      hook.shutdown();
    }
    this.hooks.length = 0;
  }
}

export class HookPointDirectory {
  private readonly points = new Map<string, HookPoint>();

  define<T extends ExtensionHook>(name: string): HookPoint<T> {
    if (this.points.has(name)) {
      throw new DuplicateHookPointError(name);
    }
    const point = new HookPoint<T>(name);
    this.points.set(name, point);
    return point;
  }

  get(name: string): HookPoint | undefined {
    return this.points.get(name);
  }

  list(): HookPoint[] {
    return [...this.points.values()];
  }

  /** Drains every point. Definitions stay in place. */
  clear(): void {
    for (const point of this.points.values()) {
      point.clear();
    }
  }
}

/** Process-wide hook points. */
export const hookPoints = new HookPointDirectory();

export function defineHookPoint<T extends ExtensionHook>(name: string): HookPoint<T> {
  return hookPoints.define<T>(name);
}
