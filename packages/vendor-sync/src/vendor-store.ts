/**
 * Local record store for software vendors and groups (Postgres).
 * Rows are matched on their natural key (`name`); the synthetic `id` is
 * never exposed to Airtable.
 */
import type { Pool } from 'pg';
import type { SyncStatus } from '@bizops/shared';
import { VENDOR_COLUMNS, type NewVendor } from './map-from-airtable';

export type VendorRow = NewVendor & {
  id: number;
  /** Id of the matching record in the Airtable vendors table; '' until first linked. */
  airtable_record_id: string;
};

export type GroupRow = {
  id: number;
  name: string;
  members: string[];
  airtable_record_id: string;
};

export interface VendorStore {
  getByName(name: string): Promise<VendorRow | null>;
  /** Insert by name, or update every non-key column in place. Never touches airtable_record_id. */
  upsert(vendor: NewVendor): Promise<VendorRow>;
  update(row: VendorRow): Promise<void>;
}

export interface GroupStore {
  getByName(name: string): Promise<GroupRow | null>;
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS software_vendors (
  id SERIAL PRIMARY KEY,
  name VARCHAR NOT NULL UNIQUE,
  status VARCHAR NOT NULL DEFAULT '',
  description VARCHAR NOT NULL DEFAULT '',
  website VARCHAR NOT NULL DEFAULT '',
  has_okta_integration BOOLEAN NOT NULL DEFAULT false,
  used_purely_for_api BOOLEAN NOT NULL DEFAULT false,
  pay_as_you_go BOOLEAN NOT NULL DEFAULT false,
  pay_as_you_go_pricing_description VARCHAR NOT NULL DEFAULT '',
  software_licenses BOOLEAN NOT NULL DEFAULT false,
  cost_per_user_per_month DOUBLE PRECISION NOT NULL DEFAULT 0,
  users INTEGER NOT NULL DEFAULT 0,
  flat_cost_per_month DOUBLE PRECISION NOT NULL DEFAULT 0,
  total_cost_per_month DOUBLE PRECISION NOT NULL DEFAULT 0,
  groups TEXT[] NOT NULL DEFAULT '{}',
  airtable_record_id VARCHAR NOT NULL DEFAULT '',
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS groups (
  id SERIAL PRIMARY KEY,
  name VARCHAR NOT NULL UNIQUE,
  members TEXT[] NOT NULL DEFAULT '{}',
  airtable_record_id VARCHAR NOT NULL DEFAULT ''
);

CREATE TABLE IF NOT EXISTS sync_logs (
  id SERIAL PRIMARY KEY,
  step VARCHAR NOT NULL,
  records_count INTEGER NOT NULL,
  status VARCHAR NOT NULL,
  message TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const VENDOR_SELECT = `id, ${VENDOR_COLUMNS.join(', ')}, airtable_record_id`;

export class PgVendorStore implements VendorStore {
  constructor(private readonly pool: Pool) {}

  /** Idempotent schema bootstrap, safe on every run. */
  async init(): Promise<void> {
    await this.pool.query(SCHEMA_SQL);
  }

  async getByName(name: string): Promise<VendorRow | null> {
    const { rows } = await this.pool.query<VendorRow>(
      `SELECT ${VENDOR_SELECT} FROM software_vendors WHERE name = $1`,
      [name]
    );
    return rows[0] ?? null;
  }

  async upsert(vendor: NewVendor): Promise<VendorRow> {
    const placeholders = VENDOR_COLUMNS.map((_, i) => `$${i + 1}`).join(',');
    const updates = VENDOR_COLUMNS.filter((c) => c !== 'name')
      .map((c) => `${c} = EXCLUDED.${c}`)
      .join(',\n        ');
    const { rows } = await this.pool.query<VendorRow>(
      `INSERT INTO software_vendors (${VENDOR_COLUMNS.join(', ')})
      VALUES (${placeholders})
      ON CONFLICT (name) DO UPDATE SET
        ${updates},
        updated_at = NOW()
      RETURNING ${VENDOR_SELECT}`,
      VENDOR_COLUMNS.map((c) => vendor[c])
    );
    return rows[0];
  }

  async update(row: VendorRow): Promise<void> {
    const columns = [...VENDOR_COLUMNS, 'airtable_record_id'] as const;
    const sets = columns.map((c, i) => `${c} = $${i + 2}`).join(', ');
    await this.pool.query(
      `UPDATE software_vendors SET ${sets}, updated_at = NOW() WHERE id = $1`,
      [row.id, ...columns.map((c) => row[c])]
    );
  }

  async getGroupByName(name: string): Promise<GroupRow | null> {
    const { rows } = await this.pool.query<GroupRow>(
      'SELECT id, name, members, airtable_record_id FROM groups WHERE name = $1',
      [name]
    );
    return rows[0] ?? null;
  }

  groups(): GroupStore {
    return { getByName: (name) => this.getGroupByName(name) };
  }
}

export async function recordSyncLog(
  pool: Pool,
  step: string,
  recordsCount: number,
  status: SyncStatus,
  message: string
): Promise<void> {
  await pool.query(
    `INSERT INTO sync_logs (step, records_count, status, message) VALUES ($1, $2, $3, $4)`,
    [step, recordsCount, status, message]
  );
}
