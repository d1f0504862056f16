/**
 * Core schema migrations, read from the .sql files beside this module.
 *
 * Keep this list in order; the runner applies entries top to bottom.
 * The build copies *.sql next to the compiled manifest.js.
 */

import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const migrationsDir = dirname(fileURLToPath(import.meta.url));

function readSql(filename: string): string {
  return readFileSync(join(migrationsDir, filename), 'utf-8');
}

export interface MigrationEntry {
  id: string;
  sql: string;
}

export const MIGRATION_MANIFEST: MigrationEntry[] = [
  { id: '001_extension_registry', sql: readSql('001_extension_registry.sql') },
];
