/**
 * Okta Users API: GET /api/v1/users, paginated with `Link: <...>; rel="next"`.
 */
import { z } from 'zod';
import { createLogger, type OktaConfig } from '@bizops/shared';

const log = createLogger('okta-client', 'okta');

const PAGE_LIMIT = 200;

const oktaUserSchema = z.object({
  id: z.string(),
  status: z.string().optional(),
});

export type OktaUser = z.infer<typeof oktaUserSchema>;

/** Pull the rel="next" URL out of a Link header, if any. */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null;
  for (const part of header.split(',')) {
    const m = part.match(/<([^>]+)>\s*;\s*rel="next"/);
    if (m) return m[1];
  }
  return null;
}

export async function listOktaUsers(config: OktaConfig): Promise<OktaUser[]> {
  const users: OktaUser[] = [];
  let url: string | null = `https://${config.domain}/api/v1/users?limit=${PAGE_LIMIT}`;

  while (url) {
    const res = await fetch(url, {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        Authorization: `SSWS ${config.apiToken}`,
      },
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Okta list users failed: ${res.status} ${text}`);
    }

    const page = z.array(oktaUserSchema).parse(await res.json());
    users.push(...page);
    log.debug({ pageUsers: page.length, totalSoFar: users.length }, 'Fetched Okta users page');

    url = parseNextLink(res.headers.get('link'));
  }

  log.info({ totalUsers: users.length }, 'Okta users fetched');
  return users;
}
