/**
 * Software vendor sync: Airtable → live seat counts → software_vendors.
 *
 * Records are processed one at a time in list order. Any failure (decode,
 * enrichment call, store write, write-back) rejects the whole run; records
 * handled before the failure stay written, later ones are never touched.
 */
import { createLogger, type AirtableRecord } from '@bizops/shared';
import { resolveUserCount, strategyForVendor, type EnrichmentSources } from './enrichment';
import { mapFieldsToVendor } from './map-from-airtable';
import type { RemoteSyncSink } from './remote-sink';
import type { VendorStore } from './vendor-store';

const log = createLogger('vendor-reconcile', 'at');

export interface VendorRecordSource {
  /** Full snapshot of the Airtable vendors table */
  listVendorRecords(): Promise<AirtableRecord[]>;
}

export interface ReconcileDeps {
  remote: VendorRecordSource;
  sources: EnrichmentSources;
  store: VendorStore;
  /** When set, each row with a refreshed seat count is mirrored back to Airtable */
  sink?: RemoteSyncSink;
}

export interface ReconcileSummary {
  processed: number;
  enriched: number;
}

export async function refreshSoftwareVendors(deps: ReconcileDeps): Promise<ReconcileSummary> {
  const records = await deps.remote.listVendorRecords();
  log.info({ records: records.length }, 'Reconciling software vendors');

  let enriched = 0;
  for (const record of records) {
    const vendor = mapFieldsToVendor(record.fields);

    const strategy = strategyForVendor(vendor.name);
    if (strategy) {
      vendor.users = await resolveUserCount(strategy, deps.sources);
      enriched++;
      log.debug({ vendor: vendor.name, source: strategy.kind, users: vendor.users }, 'Enriched seat count');
    }

    const row = await deps.store.upsert(vendor);
    if (!row.airtable_record_id) {
      row.airtable_record_id = record.id;
    }
    await deps.store.update(row);

    // Only locally computed seat counts go back; other rows mirror Airtable already
    if (deps.sink && strategy) {
      await deps.sink.pushVendor(row);
    }
  }

  log.info({ processed: records.length, enriched }, 'Software vendors reconciled');
  return { processed: records.length, enriched };
}
