import { join } from 'node:path';
import type { ExtensionInfo, RegistrationRecord } from '@plugstead/shared';
import type { ExtensionClass, ExtensionPackage } from './types.js';

/**
 * Metadata for one discovered extension package version.
 *
 * Enabled/installed state is read through from the registration record,
 * which the manager mutates and saves on every transition.
 */
export class ExtensionDescriptor {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly summary: string | null;
  readonly description: string | null;
  readonly author: string | null;
  readonly authorEmail: string | null;
  readonly license: string | null;
  readonly url: string | null;
  readonly metadata: Readonly<Record<string, string>>;
  readonly requirementIds: readonly string[];
  readonly resources: readonly string[];
  readonly isConfigurable: boolean;
  /** Where the package's static assets are placed under the static root. */
  readonly htdocsPath: string;
  readonly htdocsSource: string | null;
  readonly migrationsPath: string | null;
  /** Name used in the active-component list. */
  readonly componentName: string;

  /** Filled in by `resolveRequirements()` after a discovery pass. */
  requirements: ExtensionDescriptor[] = [];

  constructor(
    readonly pkg: ExtensionPackage,
    readonly extensionClass: ExtensionClass,
    readonly registration: RegistrationRecord,
    staticRoot: string
  ) {
    const { manifest, rootDir } = pkg;
    this.id = manifest.id;
    this.name = manifest.name;
    this.version = manifest.version;
    this.summary = manifest.summary ?? null;
    this.description = manifest.description ?? null;
    this.author = manifest.author ?? null;
    this.authorEmail = manifest.authorEmail ?? null;
    this.license = manifest.license ?? null;
    this.url = manifest.url ?? null;
    this.metadata = { ...manifest.metadata };
    this.requirementIds = [...manifest.requirements];
    this.resources = [...manifest.resources];
    this.isConfigurable = manifest.isConfigurable;
    this.htdocsPath = join(staticRoot, manifest.name);
    this.htdocsSource = rootDir ? join(rootDir, manifest.htdocs) : null;
    this.migrationsPath = rootDir ? join(rootDir, manifest.migrations) : null;
    this.componentName = manifest.id;
  }

  get enabled(): boolean {
    return this.registration.enabled;
  }

  get installed(): boolean {
    return this.registration.installed;
  }

  /** Returns the requirement ids `lookup` could not resolve. */
  resolveRequirements(lookup: (id: string) => ExtensionDescriptor | undefined): string[] {
    const resolved: ExtensionDescriptor[] = [];
    const missing: string[] = [];

    for (const id of this.requirementIds) {
      const descriptor = lookup(id);
      if (descriptor) {
        resolved.push(descriptor);
      } else {
        missing.push(id);
      }
    }

    this.requirements = resolved;
    return missing;
  }

  toInfo(): ExtensionInfo {
    return {
      id: this.id,
      name: this.name,
      version: this.version,
      summary: this.summary,
      description: this.description,
      author: this.author,
      authorEmail: this.authorEmail,
      license: this.license,
      url: this.url,
      metadata: { ...this.metadata },
      requirements: [...this.requirementIds],
      resources: [...this.resources],
      isConfigurable: this.isConfigurable,
      enabled: this.enabled,
      installed: this.installed,
    };
  }
}
