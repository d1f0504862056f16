import type { RegistrationRecord } from '@plugstead/shared';
import { createNoopLogger, type Logger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import type { RegistrationStore } from './types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Key/value settings for one extension, stored as JSON in its registration
 * record. Writes stay in memory until `save()`.
 *
 * `save()` replaces the whole blob, so two concurrent saves on the same
 * record keep only the last one.
 */
export class ExtensionSettings {
  private readonly values = new Map<string, unknown>();

  constructor(
    private readonly registration: RegistrationRecord,
    private readonly store: Pick<RegistrationStore, 'save'>,
    private readonly defaults: Readonly<Record<string, unknown>> = {},
    private readonly logger: Logger = createNoopLogger()
  ) {
    this.load();
  }

  /** Replaces the in-memory values with the record's blob. */
  load(): void {
    this.values.clear();

    let parsed: unknown;
    try {
      parsed = JSON.parse(this.registration.settings);
    } catch (err) {
      this.logger.warn('Ignoring unreadable extension settings', {
        extensionId: this.registration.id,
        error: toErrorMessage(err),
      });
      return;
    }

    if (!isPlainObject(parsed)) {
      this.logger.warn('Ignoring extension settings that are not an object', {
        extensionId: this.registration.id,
      });
      return;
    }

    for (const [key, value] of Object.entries(parsed)) {
      this.values.set(key, value);
    }
  }

  /** Falls back to the extension's defaults, then `fallback`. */
  get(key: string, fallback?: unknown): unknown {
    if (this.values.has(key)) return this.values.get(key);
    if (Object.hasOwn(this.defaults, key)) return this.defaults[key];
    return fallback;
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  entries(): [string, unknown][] {
    return [...this.values.entries()];
  }

  get size(): number {
    return this.values.size;
  }

  update(values: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(values)) {
      this.values.set(key, value);
    }
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }

  async save(): Promise<void> {
    this.registration.settings = JSON.stringify(this.toJSON());
    await this.store.save(this.registration);
  }
}
