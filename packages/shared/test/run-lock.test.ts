import path from 'path';
import os from 'os';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { acquireRunLock, releaseRunLock } from '../src/run-lock';

const HOUR = 60 * 60 * 1000;

describe('run lock', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'run-lock-'));
    file = path.join(dir, 'status', 'job.running');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the marker and its directory', () => {
    const now = Date.parse('2024-05-01T10:00:00.000Z');
    expect(acquireRunLock({ file, staleMs: HOUR, now: () => now })).toBe(true);
    expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual({
      started_at: '2024-05-01T10:00:00.000Z',
      status: 'running',
    });
  });

  it('refuses while a fresh marker exists', () => {
    const start = Date.parse('2024-05-01T10:00:00.000Z');
    expect(acquireRunLock({ file, staleMs: HOUR, now: () => start })).toBe(true);
    expect(acquireRunLock({ file, staleMs: HOUR, now: () => start + HOUR - 1 })).toBe(false);
  });

  it('replaces a stale marker', () => {
    const start = Date.parse('2024-05-01T10:00:00.000Z');
    acquireRunLock({ file, staleMs: HOUR, now: () => start });
    expect(acquireRunLock({ file, staleMs: HOUR, now: () => start + HOUR })).toBe(true);
    expect(JSON.parse(readFileSync(file, 'utf8')).started_at).toBe('2024-05-01T11:00:00.000Z');
  });

  it('replaces an unreadable marker', () => {
    acquireRunLock({ file, staleMs: HOUR });
    writeFileSync(file, 'not json', 'utf8');
    expect(acquireRunLock({ file, staleMs: HOUR })).toBe(true);
  });

  it('release removes the marker and tolerates a missing one', () => {
    acquireRunLock({ file, staleMs: HOUR });
    releaseRunLock(file);
    expect(existsSync(file)).toBe(false);
    expect(() => releaseRunLock(file)).not.toThrow();
  });
});
