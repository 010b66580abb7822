/**
 * Shared types for the sync jobs
 */

/** A record as listed from an Airtable table: record id plus its raw field map. */
export interface AirtableRecord {
  id: string;
  fields: Record<string, unknown>;
}

/** Outcome written to sync_logs for each job run */
export type SyncStatus = 'ok' | 'error';
