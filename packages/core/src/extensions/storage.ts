/**
 * Registration stores.
 *
 * ExtensionStorage persists records in PostgreSQL; InMemoryRegistrationStore
 * keeps them in process for embedded hosts and tests.
 */

import type { RegistrationRecord } from '@plugstead/shared';
import { PgBaseStorage } from '../storage/pg-base.js';
import type { RegistrationStore } from './types.js';

// ─── Row types ──────────────────────────────────────────────────────

interface RegistrationRow {
  id: string;
  name: string;
  enabled: boolean;
  installed: boolean;
  settings: string | null;
}

const COLUMNS = 'id, name, enabled, installed, settings';

function recordFromRow(row: RegistrationRow): RegistrationRecord {
  return {
    id: row.id,
    name: row.name,
    enabled: row.enabled,
    installed: row.installed,
    settings: row.settings ?? '{}',
  };
}

// ─── PostgreSQL ─────────────────────────────────────────────────────

export class ExtensionStorage extends PgBaseStorage implements RegistrationStore {
  async findAll(): Promise<RegistrationRecord[]> {
    const rows = await this.queryMany<RegistrationRow>(
      `SELECT ${COLUMNS} FROM extensions.registrations ORDER BY id`
    );
    return rows.map(recordFromRow);
  }

  async findById(id: string): Promise<RegistrationRecord | null> {
    const row = await this.queryOne<RegistrationRow>(
      `SELECT ${COLUMNS} FROM extensions.registrations WHERE id = $1`,
      [id]
    );
    return row ? recordFromRow(row) : null;
  }

  /** Creates the record, or returns the existing one for `id`. */
  async create(id: string, name: string): Promise<RegistrationRecord> {
    const now = Date.now();
    const row = await this.queryOne<RegistrationRow>(
      `INSERT INTO extensions.registrations (id, name, enabled, installed, settings, created_at, updated_at)
       VALUES ($1, $2, false, false, '{}', $3, $3)
       ON CONFLICT (id) DO UPDATE SET name = EXCLUDED.name
       RETURNING ${COLUMNS}`,
      [id, name, now]
    );
    if (!row) {
      throw new Error(`Failed to create registration for ${id}`);
    }
    return recordFromRow(row);
  }

  async save(record: RegistrationRecord): Promise<void> {
    const now = Date.now();
    await this.execute(
      `INSERT INTO extensions.registrations (id, name, enabled, installed, settings, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $6)
       ON CONFLICT (id) DO UPDATE SET
         name = EXCLUDED.name,
         enabled = EXCLUDED.enabled,
         installed = EXCLUDED.installed,
         settings = EXCLUDED.settings,
         updated_at = EXCLUDED.updated_at`,
      [record.id, record.name, record.enabled, record.installed, record.settings, now]
    );
  }
}

// ─── In-process ─────────────────────────────────────────────────────

/**
 * Hands out copies, so changes to a returned record only land on `save()`.
 */
export class InMemoryRegistrationStore implements RegistrationStore {
  private readonly records = new Map<string, RegistrationRecord>();

  constructor(initial: RegistrationRecord[] = []) {
    for (const record of initial) {
      this.records.set(record.id, { ...record });
    }
  }

  async findAll(): Promise<RegistrationRecord[]> {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  async findById(id: string): Promise<RegistrationRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async create(id: string, name: string): Promise<RegistrationRecord> {
    const existing = this.records.get(id);
    if (existing) return { ...existing };

    const record: RegistrationRecord = { id, name, enabled: false, installed: false, settings: '{}' };
    this.records.set(id, { ...record });
    return record;
  }

  async save(record: RegistrationRecord): Promise<void> {
    this.records.set(record.id, { ...record });
  }

  /** Stored copy, for inspection. */
  peek(id: string): RegistrationRecord | undefined {
    const record = this.records.get(id);
    return record ? { ...record } : undefined;
  }
}
