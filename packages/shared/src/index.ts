export { createLogger } from './logger';
export {
  loadSyncConfig,
  loadGithubConfig,
  type Env,
  type SyncConfig,
  type AirtableConfig,
  type GsuiteConfig,
  type OktaConfig,
  type SlackConfig,
  type GithubConfig,
} from './config';
export { acquireRunLock, releaseRunLock, type RunLockOptions } from './run-lock';
export { postToChannel } from './slack';
export { createGithubClient, getOrgFilledSeats, getRepoFileContent, type Octokit } from './github';
export type { AirtableRecord, SyncStatus } from './types';
