/**
 * `.running` marker file so a scheduled run and a manual run of the same job
 * never overlap. A marker older than `staleMs` is treated as left behind by a
 * crashed run and removed.
 */
import path from 'path';
import { existsSync, readFileSync, writeFileSync, unlinkSync, mkdirSync } from 'fs';
import { createLogger } from './logger';

const log = createLogger('run-lock');

export interface RunLockOptions {
  file: string;
  staleMs: number;
  /** Injected for tests */
  now?: () => number;
}

function startedAt(file: string): number | null {
  try {
    const data: unknown = JSON.parse(readFileSync(file, 'utf8'));
    if (data && typeof data === 'object' && 'started_at' in data && typeof data.started_at === 'string') {
      const t = new Date(data.started_at).getTime();
      return Number.isFinite(t) ? t : null;
    }
    return null;
  } catch {
    return null;
  }
}

/** Returns true if the lock was taken, false if another run is in progress. */
export function acquireRunLock({ file, staleMs, now = Date.now }: RunLockOptions): boolean {
  if (existsSync(file)) {
    const started = startedAt(file);
    if (started != null && now() - started < staleMs) {
      log.info({ path: file }, 'Run already in progress, skipping');
      return false;
    }
    try {
      unlinkSync(file);
    } catch (err) {
      log.warn({ path: file, err }, 'Could not remove stale .running file');
      return false;
    }
    log.info({ path: file, stale: started != null }, 'Removed stale or invalid .running file');
  }

  mkdirSync(path.dirname(file), { recursive: true });
  writeFileSync(
    file,
    JSON.stringify({ started_at: new Date(now()).toISOString(), status: 'running' }, null, 2),
    'utf8'
  );
  return true;
}

export function releaseRunLock(file: string): void {
  try {
    unlinkSync(file);
  } catch (err) {
    log.warn({ path: file, err }, 'Could not remove .running file');
  }
}
