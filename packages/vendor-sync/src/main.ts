/**
 * Software vendor sync job.
 * Lists vendors from Airtable, refreshes seat counts from GitHub, Okta, Google
 * Workspace, Slack and the all@ group, and upserts them into software_vendors.
 * Load .env first so LOG_LEVEL/LOG_FILE are set before the logger is created.
 */
import path from 'path';
import { existsSync } from 'fs';
import { config as loadEnv } from 'dotenv';

// Load .env from repo root or cwd so it works regardless of run directory
const envPaths = [path.resolve(__dirname, '../../../.env'), path.resolve(process.cwd(), '.env')];
const envPath = envPaths.find((p) => existsSync(p));
if (envPath) loadEnv({ path: envPath });

import cron from 'node-cron';
import { Pool } from 'pg';
import {
  acquireRunLock,
  createLogger,
  loadSyncConfig,
  postToChannel,
  releaseRunLock,
  type SyncConfig,
} from '@bizops/shared';
import { AirtableClient } from './airtable-client';
import { refreshSoftwareVendors } from './reconcile';
import { AirtableVendorSink } from './remote-sink';
import { createEnrichmentSources } from './sources';
import { PgVendorStore, recordSyncLog } from './vendor-store';

const log = createLogger('vendor-sync', 'at');

const STEP = 'software-vendors';
const STATUS_DIR = path.resolve(__dirname, '../../../status');
const RUNNING_FILE = process.env.VENDOR_SYNC_RUNNING_FILE || path.join(STATUS_DIR, 'vendor-sync.running');
const RUNNING_STALE_MS =
  (parseInt(process.env.VENDOR_SYNC_RUNNING_STALE_HOURS || '1', 10) || 1) * 60 * 60 * 1000;

const SYNC_CRON = process.env.VENDOR_SYNC_CRON || '0 */6 * * *';
// When set (e.g. for system cron), run once and exit
const RUN_ONCE = process.env.RUN_ONCE === '1' || process.env.RUN_ONCE === 'true';

type RunOutcome = 'ok' | 'failed' | 'skipped';

async function run(config: SyncConfig): Promise<RunOutcome> {
  if (!acquireRunLock({ file: RUNNING_FILE, staleMs: RUNNING_STALE_MS })) return 'skipped';

  const pool = new Pool({ connectionString: config.databaseUrl });
  try {
    const store = new PgVendorStore(pool);
    await store.init();

    const finance = new AirtableClient(config.airtable.apiKey, config.airtable.financeBaseId);
    const directory = new AirtableClient(config.airtable.apiKey, config.airtable.directoryBaseId);
    const sources = await createEnrichmentSources(config, {
      groups: store.groups(),
      directory,
      groupsTable: config.airtable.groupsTable,
    });

    try {
      const summary = await refreshSoftwareVendors({
        remote: {
          listVendorRecords: () => finance.listRecords(config.airtable.vendorsTable, config.airtable.view),
        },
        sources,
        store,
        sink: config.writeBack ? new AirtableVendorSink(finance, config.airtable.vendorsTable) : undefined,
      });

      const message = `Reconciled ${summary.processed} vendors (${summary.enriched} seat counts refreshed)`;
      await recordSyncLog(pool, STEP, summary.processed, 'ok', message);
      log.info(summary, 'Sync complete');
      if (config.slack.notifyUrl) {
        await postToChannel(config.slack.notifyUrl, { text: `:white_check_mark: ${message}` });
      }
      return 'ok';
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.error({ err }, 'Sync failed');
      await recordSyncLog(pool, STEP, 0, 'error', msg);
      if (config.slack.notifyUrl) {
        await postToChannel(config.slack.notifyUrl, { text: `:x: Software vendor sync failed: ${msg}` });
      }
      return 'failed';
    }
  } catch (err) {
    log.error({ err }, 'Sync setup failed');
    return 'failed';
  } finally {
    await pool.end();
    releaseRunLock(RUNNING_FILE);
  }
}

function main(): void {
  const config = loadSyncConfig();
  const isProd = process.env.NODE_ENV === 'production';

  if (isProd && !RUN_ONCE) {
    log.info({ schedule: SYNC_CRON }, 'Starting (cron + initial run)');
    cron.schedule(SYNC_CRON, () => {
      run(config).catch((err) => log.error({ err }, 'Scheduled run error'));
    });
    run(config).catch((err) => log.error({ err }, 'Initial run error'));
    return;
  }

  log.info('Starting (single run)');
  run(config)
    .then((outcome) => {
      if (outcome === 'failed') process.exitCode = 1;
    })
    .catch((err) => {
      log.error({ err }, 'Fatal error');
      process.exitCode = 1;
    });
}

try {
  main();
} catch (err) {
  // Missing configuration: nothing has started yet
  log.fatal({ err }, 'Startup failed');
  process.exitCode = 1;
}
