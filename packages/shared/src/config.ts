/**
 * Process configuration, read once from the environment at startup and passed
 * down to every job. Load .env (dotenv) before calling these.
 */

export type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value || !value.trim()) throw new Error(`Missing required environment variable: ${name}`);
  return value.trim();
}

function optionalEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value && value.trim() ? value.trim() : undefined;
}

function flag(env: Env, name: string): boolean {
  const v = env[name];
  return v === '1' || v === 'true';
}

export interface AirtableConfig {
  apiKey: string;
  financeBaseId: string;
  directoryBaseId: string;
  vendorsTable: string;
  groupsTable: string;
  view: string;
}

export interface GsuiteConfig {
  credentialFile: string;
  /** Admin user the service account impersonates */
  subject: string;
  customerId: string;
  domain: string;
}

export interface OktaConfig {
  domain: string;
  apiToken: string;
}

export interface SlackConfig {
  token: string;
  /** Incoming webhook for run summaries; no summary is posted when unset. */
  notifyUrl?: string;
}

export interface GithubConfig {
  token: string;
  org: string;
}

export interface SyncConfig {
  databaseUrl: string;
  airtable: AirtableConfig;
  gsuite: GsuiteConfig;
  okta: OktaConfig;
  slack: SlackConfig;
  github: GithubConfig;
  /** Push locally computed seat counts back to Airtable after each update */
  writeBack: boolean;
}

export function loadGithubConfig(env: Env = process.env): GithubConfig {
  return {
    token: requireEnv(env, 'GITHUB_TOKEN'),
    org: requireEnv(env, 'GITHUB_ORG'),
  };
}

export function loadSyncConfig(env: Env = process.env): SyncConfig {
  return {
    databaseUrl: requireEnv(env, 'DATABASE_URL'),
    airtable: {
      apiKey: requireEnv(env, 'AIRTABLE_API_KEY'),
      financeBaseId: requireEnv(env, 'AIRTABLE_BASE_ID_FINANCE'),
      directoryBaseId: requireEnv(env, 'AIRTABLE_BASE_ID_DIRECTORY'),
      vendorsTable: optionalEnv(env, 'AIRTABLE_SOFTWARE_VENDORS_TABLE') ?? 'Software Vendors',
      groupsTable: optionalEnv(env, 'AIRTABLE_GROUPS_TABLE') ?? 'Mailing Lists',
      view: optionalEnv(env, 'AIRTABLE_VIEW') ?? 'Grid view',
    },
    gsuite: {
      credentialFile: requireEnv(env, 'GADMIN_CREDENTIAL_FILE'),
      subject: requireEnv(env, 'GADMIN_SUBJECT'),
      customerId: requireEnv(env, 'GADMIN_ACCOUNT_ID'),
      domain: requireEnv(env, 'GSUITE_DOMAIN'),
    },
    okta: {
      domain: requireEnv(env, 'OKTA_DOMAIN'),
      apiToken: requireEnv(env, 'OKTA_API_TOKEN'),
    },
    slack: {
      token: requireEnv(env, 'SLACK_TOKEN'),
      notifyUrl: optionalEnv(env, 'SLACK_FINANCE_CHANNEL_POST_URL'),
    },
    github: loadGithubConfig(env),
    writeBack: flag(env, 'AIRTABLE_WRITE_BACK'),
  };
}
