/**
 * Mirrors locally computed vendor fields back to Airtable after the local
 * update. Only seat counts are computed locally; everything else is owned by
 * Airtable and is not written back.
 */
import { createLogger } from '@bizops/shared';
import type { AirtableClient } from './airtable-client';
import type { VendorRow } from './vendor-store';

const log = createLogger('vendor-sink', 'at');

export interface RemoteSyncSink {
  pushVendor(row: VendorRow): Promise<void>;
}

export class AirtableVendorSink implements RemoteSyncSink {
  constructor(
    private readonly client: Pick<AirtableClient, 'updateRecord'>,
    private readonly table: string
  ) {}

  async pushVendor(row: VendorRow): Promise<void> {
    if (!row.airtable_record_id) {
      log.warn({ vendor: row.name }, 'Vendor has no Airtable record, not writing back');
      return;
    }
    await this.client.updateRecord(this.table, row.airtable_record_id, { users: row.users });
  }
}
