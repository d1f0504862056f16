import { describe, it, expect, beforeEach } from 'vitest';
import { getExtensionManagers, registerExtensionManager, resetExtensionManagers } from './directory.js';
import { createTestManager } from './test-utils.js';

describe('extension manager directory', () => {
  beforeEach(() => {
    resetExtensionManagers();
  });

  it('managers register themselves on construction', () => {
    const { manager: first } = createTestManager();
    const { manager: second } = createTestManager();
    expect(getExtensionManagers()).toEqual([first, second]);
  });

  it('registration is idempotent', () => {
    const { manager } = createTestManager();
    registerExtensionManager(manager);
    expect(getExtensionManagers()).toHaveLength(1);
  });

  it('reset clears the directory', () => {
    createTestManager();
    resetExtensionManagers();
    expect(getExtensionManagers()).toEqual([]);
  });

  it('hands out a copy', () => {
    createTestManager();
    getExtensionManagers().pop();
    expect(getExtensionManagers()).toHaveLength(1);
  });
});
