import { cp, mkdir, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isNotFoundError } from '../utils/fs.js';
import type { ExtensionDescriptor } from './descriptor.js';
import type { AssetInstaller } from './types.js';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (isNotFoundError(err)) return false;
    throw err;
  }
}

/**
 * Copies a package's static assets to `<staticRoot>/<name>`, replacing
 * whatever was there.
 */
export class FsAssetInstaller implements AssetInstaller {
  async install(descriptor: ExtensionDescriptor): Promise<void> {
    await rm(descriptor.htdocsPath, { recursive: true, force: true });

    const source = descriptor.htdocsSource;
    if (!source || !(await isDirectory(source))) return;

    await mkdir(dirname(descriptor.htdocsPath), { recursive: true });
    await cp(source, descriptor.htdocsPath, { recursive: true, verbatimSymlinks: true });
  }

  async uninstall(descriptor: ExtensionDescriptor): Promise<void> {
    await rm(descriptor.htdocsPath, { recursive: true, force: true });
  }
}
