import { describe, it, expect, afterEach } from 'vitest';
import { ExtensionHost, type ExtensionHostOptions } from './host.js';
import { definePackage, StaticDiscoverySource } from './extensions/discovery.js';
import { getExtensionManagers } from './extensions/directory.js';
import { ConfigurationError } from './extensions/errors.js';
import { InMemoryRegistrationStore } from './extensions/storage.js';
import { PlainExtension, RecordingAssetInstaller, makeManifest } from './extensions/test-utils.js';

let host: ExtensionHost | undefined;

function createHost(overrides: Partial<ExtensionHostOptions> = {}) {
  const store = new InMemoryRegistrationStore([
    { id: 'acme.a', name: 'acme.a', enabled: true, installed: true, settings: '{}' },
  ]);
  const discovery = new StaticDiscoverySource([
    definePackage(makeManifest('acme.a'), PlainExtension),
    definePackage(makeManifest('acme.b'), PlainExtension),
  ]);
  host = new ExtensionHost({
    store,
    discovery,
    assets: new RecordingAssetInstaller(),
    enableGateway: false,
    config: {
      skipEnv: true,
      overrides: {
        logging: { level: 'error', output: [] },
        extensions: { staticRoot: '/srv/static/ext' },
      },
    },
    ...overrides,
  });
  return { host, store };
}

afterEach(async () => {
  await host?.stop();
  host = undefined;
});

describe('ExtensionHost', () => {
  it('throws from getters before start', () => {
    const { host } = createHost();
    expect(host.isRunning()).toBe(false);
    expect(() => host.getManager()).toThrow('ExtensionHost is not started. Call start() first.');
  });

  it('discovers and restores enabled extensions on start', async () => {
    const { host } = createHost();

    await host.start();

    const manager = host.getManager();
    expect(host.isRunning()).toBe(true);
    expect(manager.key).toBe('plugstead.extensions');
    expect(manager.getInstalledExtensions().map((d) => d.id)).toEqual(['acme.a', 'acme.b']);
    expect(manager.getEnabledExtensions().map((e) => e.id)).toEqual(['acme.a']);
    expect(host.getComponents().list()).toEqual(['acme.a']);
    expect(host.getConfig().extensions.staticRoot).toBe('/srv/static/ext');
  });

  it('uses the key option for the manager', async () => {
    const { host } = createHost({ key: 'acme.site' });
    await host.start();
    expect(host.getManager().key).toBe('acme.site');
  });

  it('serves the extension API', async () => {
    const { host } = createHost();
    await host.start();

    const res = await host.getApp().inject({ method: 'POST', url: '/api/v1/extensions/acme.b/enable' });

    expect(res.statusCode).toBe(200);
    expect(res.json().extension).toMatchObject({ id: 'acme.b', enabled: true });
  });

  it('refuses to start twice', async () => {
    const { host } = createHost();
    await host.start();
    await expect(host.start()).rejects.toThrow('ExtensionHost is already started');
  });

  it('fails to start without a static root', async () => {
    const { host } = createHost({ config: { skipEnv: true, overrides: { logging: { level: 'error', output: [] } } } });

    await expect(host.start()).rejects.toThrow(ConfigurationError);
    expect(host.isRunning()).toBe(false);
  });

  it('stops extensions but keeps their persisted state', async () => {
    const { host, store } = createHost();
    await host.start();
    const manager = host.getManager();

    await host.stop();
    await host.stop();

    expect(host.isRunning()).toBe(false);
    expect(manager.getEnabledExtensions()).toEqual([]);
    expect(store.peek('acme.a')?.enabled).toBe(true);
    expect(getExtensionManagers()).toEqual([]);
  });
});
