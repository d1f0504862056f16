/**
 * Process-wide directory of live extension managers.
 *
 * Managers register themselves on construction. Entries are never removed
 * individually; `resetExtensionManagers()` clears the directory at host
 * teardown.
 */

import type { ExtensionManager } from './manager.js';

const managers: ExtensionManager[] = [];

export function registerExtensionManager(manager: ExtensionManager): void {
  if (!managers.includes(manager)) {
    managers.push(manager);
  }
}

export function getExtensionManagers(): ExtensionManager[] {
  return [...managers];
}

export function resetExtensionManagers(): void {
  managers.length = 0;
}
