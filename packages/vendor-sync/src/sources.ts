/**
 * Build the live enrichment sources for one run from config.
 * The GSuite token is acquired here, once, and reused for every directory call
 * in the run.
 */
import {
  createGithubClient,
  createLogger,
  getOrgFilledSeats,
  type Octokit,
  type SyncConfig,
} from '@bizops/shared';
import type { AirtableClient } from './airtable-client';
import type { EnrichmentSources } from './enrichment';
import { getGsuiteToken, listDirectoryUsers } from './gsuite-client';
import { mapFieldsToGroup } from './map-from-airtable';
import { listOktaUsers } from './okta-client';
import { countBillableActive, getBillableInfo } from './slack-client';
import type { GroupStore } from './vendor-store';

const log = createLogger('enrichment-sources');

export interface SourceDeps {
  groups: GroupStore;
  /** Airtable client for the base holding the groups table */
  directory: Pick<AirtableClient, 'getRecord'>;
  groupsTable: string;
}

/** Member count of a group's Airtable record, found through its local row's linkage. */
export async function countGroupMembers(deps: SourceDeps, group: string): Promise<number> {
  const row = await deps.groups.getByName(group);
  if (!row) {
    throw new Error(`Group ${group} not found in database`);
  }
  if (!row.airtable_record_id) {
    throw new Error(`Group ${group} has no Airtable record`);
  }
  const record = await deps.directory.getRecord(deps.groupsTable, row.airtable_record_id);
  const members = mapFieldsToGroup(record.fields).members.length;
  log.debug({ group, members }, 'Counted group members');
  return members;
}

export async function createEnrichmentSources(
  config: SyncConfig,
  deps: SourceDeps,
  github: Octokit = createGithubClient(config.github)
): Promise<EnrichmentSources> {
  const gsuiteToken = await getGsuiteToken(config.gsuite);

  return {
    githubFilledSeats: () => getOrgFilledSeats(github, config.github.org),
    oktaUserCount: async () => (await listOktaUsers(config.okta)).length,
    gsuiteUserCount: async () => (await listDirectoryUsers(gsuiteToken, config.gsuite.customerId)).length,
    slackBillableUserCount: async () => countBillableActive(await getBillableInfo(config.slack)),
    groupMemberCount: (group) => countGroupMembers(deps, group),
  };
}
