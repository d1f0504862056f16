/**
 * Extension lifecycle error hierarchy.
 *
 * Every error carries a stable `code` so route handlers and hosts can map
 * failures without matching on messages.
 */

export class ExtensionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ExtensionError';
  }
}

/** The id was never discovered, or its package has disappeared. */
export class UnknownExtensionError extends ExtensionError {
  constructor(public readonly extensionId: string) {
    super(`Unknown extension: ${extensionId}`, 'UNKNOWN_EXTENSION', { extensionId });
    this.name = 'UnknownExtensionError';
  }
}

/** Asset placement or schema migration failed. */
export class InstallExtensionError extends ExtensionError {
  constructor(
    public readonly extensionId: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`Failed to install extension ${extensionId}: ${message}`, 'INSTALL_FAILED', { extensionId }, options);
    this.name = 'InstallExtensionError';
  }
}

/** Raised by enable(); `cause` holds the underlying failure. */
export class EnablingExtensionError extends ExtensionError {
  constructor(
    public readonly extensionId: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`Failed to enable extension ${extensionId}: ${message}`, 'ENABLE_FAILED', { extensionId }, options);
    this.name = 'EnablingExtensionError';
  }
}

/** Reserved: shutdown steps currently have no failure path. */
export class DisablingExtensionError extends ExtensionError {
  constructor(
    public readonly extensionId: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`Failed to disable extension ${extensionId}: ${message}`, 'DISABLE_FAILED', { extensionId }, options);
    this.name = 'DisablingExtensionError';
  }
}

export class DependencyCycleError extends ExtensionError {
  constructor(public readonly chain: readonly string[]) {
    super(`Dependency cycle: ${chain.join(' -> ')}`, 'DEPENDENCY_CYCLE', { chain: [...chain] });
    this.name = 'DependencyCycleError';
  }
}

export class MigrationError extends ExtensionError {
  constructor(
    public readonly extensionId: string,
    public readonly migrationId: string,
    options?: ErrorOptions
  ) {
    super(
      `Migration ${migrationId} failed for extension ${extensionId}`,
      'MIGRATION_FAILED',
      { extensionId, migrationId },
      options
    );
    this.name = 'MigrationError';
  }
}

/** A required host setting is missing. Not recoverable. */
export class ConfigurationError extends ExtensionError {
  constructor(public readonly setting: string, message: string) {
    super(message, 'CONFIGURATION_ERROR', { setting });
    this.name = 'ConfigurationError';
  }
}

export class DuplicateHookPointError extends ExtensionError {
  constructor(public readonly hookPoint: string) {
    super(`Hook point already defined: ${hookPoint}`, 'DUPLICATE_HOOK_POINT', { hookPoint });
    this.name = 'DuplicateHookPointError';
  }
}

export class RouteConflictError extends ExtensionError {
  constructor(
    public readonly method: string,
    public readonly path: string
  ) {
    super(`Route already mounted: ${method} ${path}`, 'ROUTE_CONFLICT', { method, path });
    this.name = 'RouteConflictError';
  }
}
