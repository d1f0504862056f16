import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PgBaseStorage } from '../storage/pg-base.js';
import { isNotFoundError } from '../utils/fs.js';
import type { ExtensionDescriptor } from './descriptor.js';
import { MigrationError } from './errors.js';
import type { SchemaMigrator } from './types.js';

/**
 * Applies an extension package's `*.sql` files in file-name order inside a
 * single transaction. Applied files are recorded per extension in
 * `extensions.migrations` and skipped on later installs.
 */
export class PgSchemaMigrator extends PgBaseStorage implements SchemaMigrator {
  async applyPendingChanges(descriptor: ExtensionDescriptor): Promise<void> {
    const dir = descriptor.migrationsPath;
    if (!dir) return;

    const files = await listSqlFiles(dir);
    if (files.length === 0) return;

    await this.withTransaction(async (client) => {
      const { rows } = await client.query<{ id: string }>(
        'SELECT id FROM extensions.migrations WHERE extension_id = $1',
        [descriptor.id]
      );
      const applied = new Set(rows.map((row) => row.id));

      for (const file of files) {
        const migrationId = file.slice(0, -'.sql'.length);
        if (applied.has(migrationId)) continue;

        const sql = await readFile(join(dir, file), 'utf-8');
        try {
          await client.query(sql);
        } catch (err) {
          throw new MigrationError(descriptor.id, migrationId, { cause: err });
        }
        await client.query(
          'INSERT INTO extensions.migrations (extension_id, id, applied_at) VALUES ($1, $2, $3)',
          [descriptor.id, migrationId, Date.now()]
        );
      }
    });
  }
}

async function listSqlFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir);
    return entries.filter((name) => name.endsWith('.sql')).sort();
  } catch (err) {
    if (isNotFoundError(err)) return [];
    throw err;
  }
}
