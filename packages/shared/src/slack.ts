/**
 * Slack incoming-webhook notifier. Delivery is best effort: failures are
 * logged and never abort the job that posted.
 */
import { createLogger } from './logger';

const log = createLogger('slack-notifier', 'slack');

/** Strip the secret path from a webhook URL before it reaches the logs. */
function redact(url: string): string {
  try {
    const u = new URL(url);
    return `${u.protocol}//${u.host}/…`;
  } catch {
    return '<invalid url>';
  }
}

/** Post a JSON payload (e.g. `{ text }` or Block Kit `{ blocks }`) to a channel webhook. */
export async function postToChannel(url: string, payload: unknown): Promise<void> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
  } catch (err) {
    log.error({ err, url: redact(url) }, 'Posting to Slack webhook failed');
    return;
  }

  if (res.status === 200) return;

  const text = await res.text().catch(() => '');
  log.warn({ url: redact(url), status: res.status, body: text }, 'Posting to Slack webhook failed');
}
