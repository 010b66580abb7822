/**
 * GitHub REST client used by both the vendor sync (org seat count) and the
 * configs CLI (RFD index in the rfd repo).
 */
import { Octokit } from '@octokit/rest';
import type { GithubConfig } from './config';

export function createGithubClient(config: Pick<GithubConfig, 'token'>): Octokit {
  return new Octokit({
    auth: config.token,
    userAgent: 'bizops-sync',
  });
}

/** Filled seats on the org's current plan (visible to org owners only). */
export async function getOrgFilledSeats(github: Octokit, org: string): Promise<number> {
  const { data } = await github.rest.orgs.get({ org });
  const seats = data.plan?.filled_seats;
  if (seats == null) {
    throw new Error(`GitHub org ${org} returned no plan; the token needs org owner access`);
  }
  return seats;
}

/** Fetch a file from a repo's default branch and decode it as UTF-8. */
export async function getRepoFileContent(
  github: Octokit,
  owner: string,
  repo: string,
  filePath: string
): Promise<string> {
  const { data } = await github.rest.repos.getContent({ owner, repo, path: filePath });
  if (Array.isArray(data) || data.type !== 'file') {
    throw new Error(`GitHub ${owner}/${repo}/${filePath} is not a file`);
  }
  if (!('content' in data) || typeof data.content !== 'string') {
    throw new Error(`GitHub ${owner}/${repo}/${filePath} returned no content`);
  }
  return Buffer.from(data.content, 'base64').toString('utf8');
}

export type { Octokit };
