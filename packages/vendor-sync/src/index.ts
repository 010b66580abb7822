export { AirtableClient, type AirtableFields } from './airtable-client';
export {
  USER_COUNT_SOURCES,
  resolveUserCount,
  strategyForVendor,
  type EnrichmentSources,
  type EnrichmentStrategy,
} from './enrichment';
export { mapFieldsToGroup, mapFieldsToVendor, VENDOR_COLUMNS, type NewGroup, type NewVendor } from './map-from-airtable';
export {
  refreshSoftwareVendors,
  type ReconcileDeps,
  type ReconcileSummary,
  type VendorRecordSource,
} from './reconcile';
export { AirtableVendorSink, type RemoteSyncSink } from './remote-sink';
export { countGroupMembers, createEnrichmentSources, type SourceDeps } from './sources';
export {
  PgVendorStore,
  recordSyncLog,
  type GroupRow,
  type GroupStore,
  type VendorRow,
  type VendorStore,
} from './vendor-store';
