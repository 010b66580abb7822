/**
 * Slack Web API: team.billableInfo, paginated by cursor.
 */
import { z } from 'zod';
import { createLogger, type SlackConfig } from '@bizops/shared';

const log = createLogger('slack-client', 'slack');

const BILLABLE_INFO_URL = 'https://slack.com/api/team.billableInfo';

const billableInfoSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
  billable_info: z.record(z.object({ billing_active: z.boolean() })).optional(),
  response_metadata: z.object({ next_cursor: z.string().optional() }).optional(),
});

export type BillableInfo = Record<string, { billing_active: boolean }>;

export async function getBillableInfo(config: Pick<SlackConfig, 'token'>): Promise<BillableInfo> {
  const all: BillableInfo = {};
  let cursor: string | undefined;

  do {
    const search = new URLSearchParams();
    if (cursor) search.set('cursor', cursor);
    const qs = search.toString();

    const res = await fetch(qs ? `${BILLABLE_INFO_URL}?${qs}` : BILLABLE_INFO_URL, {
      method: 'GET',
      headers: { Authorization: `Bearer ${config.token}` },
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Slack billable info failed: ${res.status} ${text}`);
    }

    const body = billableInfoSchema.parse(await res.json());
    // Slack reports API errors with a 200 and ok: false
    if (!body.ok) {
      throw new Error(`Slack billable info failed: ${body.error ?? 'unknown error'}`);
    }
    Object.assign(all, body.billable_info ?? {});
    cursor = body.response_metadata?.next_cursor || undefined;
  } while (cursor);

  log.info({ users: Object.keys(all).length }, 'Slack billable info fetched');
  return all;
}

export function countBillableActive(info: BillableInfo): number {
  return Object.values(info).filter((u) => u.billing_active).length;
}
