import path from 'path';
import pino from 'pino';

const DEFAULT_LOG_FILE = 'bizops-sync.log';

let root: pino.Logger | undefined;

/** Console output (pretty outside production) plus an appended log file. */
function transportTargets(isProd: boolean, logFile: string): pino.TransportTargetOptions[] {
  const stdout: pino.TransportTargetOptions = isProd
    ? { target: 'pino/file', options: { destination: 1 } }
    : { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard', destination: 1 } };
  return [stdout, { target: 'pino/file', options: { destination: logFile, append: true, mkdir: true } }];
}

// Built on first use: the vendor-sync and configs entry points load .env before
// any module asks for a logger, so LOG_LEVEL and LOG_FILE are read here.
function rootLogger(): pino.Logger {
  if (root) return root;
  if (process.env.VITEST) {
    // no transport workers under the test runner
    root = pino({ level: 'silent' });
    return root;
  }
  const isProd = process.env.NODE_ENV === 'production';
  const level = process.env.LOG_LEVEL || (isProd ? 'info' : 'debug');
  const logFile = process.env.LOG_FILE || path.join(process.cwd(), DEFAULT_LOG_FILE);
  root = pino({ level }, pino.transport({ targets: transportTargets(isProd, logFile) }));
  return root;
}

/**
 * Child logger bound to a service name and an optional short tag naming the
 * upstream it talks to ('at' Airtable, 'gh' GitHub, 'cfg' config files).
 */
export function createLogger(name: string, tag?: string): pino.Logger {
  return rootLogger().child(tag ? { service: name, tag } : { service: name });
}
