import { describe, expect, it, vi } from 'vitest';
import { listDirectoryUsers } from '../src/gsuite-client';
import { listOktaUsers, parseNextLink } from '../src/okta-client';
import { countBillableActive, getBillableInfo } from '../src/slack-client';

function json(body: unknown, init: { status?: number; headers?: Record<string, string> } = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { 'Content-Type': 'application/json', ...init.headers },
  });
}

function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn<typeof fetch>();
  for (const r of responses) fetchMock.mockResolvedValueOnce(r);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function urlOf(call: Parameters<typeof fetch>): string {
  return String(call[0]);
}

describe('parseNextLink', () => {
  it('finds rel="next" among several links', () => {
    expect(
      parseNextLink(
        '<https://acme.okta.com/api/v1/users?limit=200>; rel="self", <https://acme.okta.com/api/v1/users?after=00u2&limit=200>; rel="next"'
      )
    ).toBe('https://acme.okta.com/api/v1/users?after=00u2&limit=200');
  });

  it('returns null without a next link', () => {
    expect(parseNextLink('<https://acme.okta.com/api/v1/users>; rel="self"')).toBeNull();
    expect(parseNextLink(null)).toBeNull();
  });
});

describe('listOktaUsers', () => {
  const config = { domain: 'acme.okta.com', apiToken: 'test-okta-token' };

  it('follows pagination and sends the SSWS token', async () => {
    const fetchMock = stubFetch(
      json([{ id: 'u1' }, { id: 'u2', status: 'ACTIVE' }], {
        headers: { Link: '<https://acme.okta.com/api/v1/users?after=u2>; rel="next"' },
      }),
      json([{ id: 'u3' }])
    );

    const users = await listOktaUsers(config);

    expect(users.map((u) => u.id)).toEqual(['u1', 'u2', 'u3']);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(urlOf(fetchMock.mock.calls[0])).toBe('https://acme.okta.com/api/v1/users?limit=200');
    expect(urlOf(fetchMock.mock.calls[1])).toBe('https://acme.okta.com/api/v1/users?after=u2');
    expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ Authorization: 'SSWS test-okta-token' });
  });

  it('throws on a non-success status', async () => {
    stubFetch(new Response('{"errorCode":"E0000011"}', { status: 401 }));
    await expect(listOktaUsers(config)).rejects.toThrow('Okta list users failed: 401 {"errorCode":"E0000011"}');
  });
});

describe('listDirectoryUsers', () => {
  it('pages through nextPageToken', async () => {
    const fetchMock = stubFetch(
      json({ users: [{ id: '1', primaryEmail: 'a@example.com' }], nextPageToken: 'p2' }),
      json({ users: [{ id: '2' }, { id: '3' }] })
    );

    const users = await listDirectoryUsers('test-token', 'C0123');

    expect(users).toHaveLength(3);
    expect(urlOf(fetchMock.mock.calls[0])).toBe(
      'https://admin.googleapis.com/admin/directory/v1/users?customer=C0123&maxResults=500'
    );
    expect(urlOf(fetchMock.mock.calls[1])).toBe(
      'https://admin.googleapis.com/admin/directory/v1/users?customer=C0123&maxResults=500&pageToken=p2'
    );
  });

  it('treats a page without users as empty', async () => {
    stubFetch(json({}));
    await expect(listDirectoryUsers('test-token', 'C0123')).resolves.toEqual([]);
  });
});

describe('getBillableInfo', () => {
  it('merges cursor pages and counts active users', async () => {
    const fetchMock = stubFetch(
      json({
        ok: true,
        billable_info: { U1: { billing_active: true }, U2: { billing_active: false } },
        response_metadata: { next_cursor: 'c2' },
      }),
      json({ ok: true, billable_info: { U3: { billing_active: true } }, response_metadata: { next_cursor: '' } })
    );

    const info = await getBillableInfo({ token: 'test-slack-token' });

    expect(countBillableActive(info)).toBe(2);
    expect(Object.keys(info)).toEqual(['U1', 'U2', 'U3']);
    expect(urlOf(fetchMock.mock.calls[1])).toBe('https://slack.com/api/team.billableInfo?cursor=c2');
  });

  it('throws when Slack answers ok: false', async () => {
    stubFetch(json({ ok: false, error: 'not_allowed_token_type' }));
    await expect(getBillableInfo({ token: 'test-slack-token' })).rejects.toThrow(
      'Slack billable info failed: not_allowed_token_type'
    );
  });
});
