/**
 * Which live source supplies the seat count for a vendor, keyed by vendor name.
 * Vendors not listed keep the `users` value decoded from Airtable.
 */

export type EnrichmentStrategy =
  | { kind: 'github-seats' }
  | { kind: 'okta-users' }
  | { kind: 'gsuite-users' }
  | { kind: 'slack-billable-users' }
  | { kind: 'group-members'; group: string };

/** Live counts the strategies read from. Each call hits the network. */
export interface EnrichmentSources {
  githubFilledSeats(): Promise<number>;
  oktaUserCount(): Promise<number>;
  gsuiteUserCount(): Promise<number>;
  slackBillableUserCount(): Promise<number>;
  groupMemberCount(group: string): Promise<number>;
}

// Airtable, Brex, Gusto and Expensify seats follow the all@ mailing list.
const ALL_GROUP: EnrichmentStrategy = { kind: 'group-members', group: 'all' };

export const USER_COUNT_SOURCES: ReadonlyMap<string, EnrichmentStrategy> = new Map<string, EnrichmentStrategy>([
  ['GitHub', { kind: 'github-seats' }],
  ['Okta', { kind: 'okta-users' }],
  ['Google Workspace', { kind: 'gsuite-users' }],
  ['Slack', { kind: 'slack-billable-users' }],
  ['Airtable', ALL_GROUP],
  ['Brex', ALL_GROUP],
  ['Gusto', ALL_GROUP],
  ['Expensify', ALL_GROUP],
]);

export function strategyForVendor(name: string): EnrichmentStrategy | null {
  return USER_COUNT_SOURCES.get(name) ?? null;
}

export function resolveUserCount(strategy: EnrichmentStrategy, sources: EnrichmentSources): Promise<number> {
  switch (strategy.kind) {
    case 'github-seats':
      return sources.githubFilledSeats();
    case 'okta-users':
      return sources.oktaUserCount();
    case 'gsuite-users':
      return sources.gsuiteUserCount();
    case 'slack-billable-users':
      return sources.slackBillableUserCount();
    case 'group-members':
      return sources.groupMemberCount(strategy.group);
  }
}
