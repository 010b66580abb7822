/**
 * Google Workspace Admin Directory API.
 * A service-account token impersonating the admin subject is acquired once per
 * run and passed to every directory call.
 */
import { JWT } from 'google-auth-library';
import { z } from 'zod';
import { createLogger, type GsuiteConfig } from '@bizops/shared';

const log = createLogger('gsuite-client', 'gs');

const DIRECTORY_USERS_URL = 'https://admin.googleapis.com/admin/directory/v1/users';
const MAX_RESULTS = 500;

export const GSUITE_SCOPES = [
  'https://www.googleapis.com/auth/admin.directory.group',
  'https://www.googleapis.com/auth/admin.directory.resource.calendar',
  'https://www.googleapis.com/auth/admin.directory.user',
  'https://www.googleapis.com/auth/apps.groups.settings',
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
];

export async function getGsuiteToken(
  config: Pick<GsuiteConfig, 'credentialFile' | 'subject'>
): Promise<string> {
  const auth = new JWT({
    keyFile: config.credentialFile,
    subject: config.subject,
    scopes: GSUITE_SCOPES,
  });
  const credentials = await auth.authorize();
  const token = credentials.access_token;
  if (!token) {
    throw new Error('GSuite service account returned an empty token');
  }
  log.info({ subject: config.subject }, 'GSuite token acquired');
  return token;
}

const directoryUserSchema = z.object({
  id: z.string(),
  primaryEmail: z.string().optional(),
  suspended: z.boolean().optional(),
});

const usersPageSchema = z.object({
  users: z.array(directoryUserSchema).optional(),
  nextPageToken: z.string().optional(),
});

export type DirectoryUser = z.infer<typeof directoryUserSchema>;

export async function listDirectoryUsers(token: string, customerId: string): Promise<DirectoryUser[]> {
  const users: DirectoryUser[] = [];
  let pageToken: string | undefined;

  do {
    const search = new URLSearchParams({ customer: customerId, maxResults: String(MAX_RESULTS) });
    if (pageToken) search.set('pageToken', pageToken);

    const res = await fetch(`${DIRECTORY_USERS_URL}?${search.toString()}`, {
      method: 'GET',
      headers: { Authorization: `Bearer ${token}` },
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`GSuite list users failed: ${res.status} ${text}`);
    }

    const page = usersPageSchema.parse(await res.json());
    users.push(...(page.users ?? []));
    pageToken = page.nextPageToken;
    log.debug({ pageUsers: page.users?.length ?? 0, totalSoFar: users.length }, 'Fetched directory users page');
  } while (pageToken);

  log.info({ totalUsers: users.length }, 'Directory users fetched');
  return users;
}
