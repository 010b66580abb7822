/**
 * Reading configuration files and writing generated output.
 */
import path from 'path';
import { mkdir, readFile, writeFile as fsWriteFile } from 'fs/promises';
import * as TOML from '@iarna/toml';
import { createLogger } from '@bizops/shared';
import { configSchema, type Config } from './config-schema';

const log = createLogger('config-files', 'cfg');

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/** `[[name]]` array of tables. */
function isTableArray(value: unknown): value is Table[] {
  return Array.isArray(value) && value.length > 0 && value.every(isTable);
}

/**
 * Merge `source` into `target`. Tables merge key by key, arrays of tables
 * append in file order; any other value may only be defined by one file. `origins` maps dotted key paths to the file
 * that first defined them.
 */
function mergeTables(target: Table, source: Table, file: string, origins: Map<string, string>, prefix = ''): void {
  for (const [key, value] of Object.entries(source)) {
    const keyPath = prefix ? `${prefix}.${key}` : key;
    const existing = target[key];
    if (existing === undefined) {
      target[key] = value;
      origins.set(keyPath, file);
      continue;
    }
    if (isTable(existing) && isTable(value)) {
      mergeTables(existing, value, file, origins, keyPath);
      continue;
    }
    if (isTableArray(existing) && isTableArray(value)) {
      existing.push(...value);
      continue;
    }
    throw new Error(`${keyPath} is defined in both ${originOf(origins, keyPath)} and ${file}`);
  }
}

/** The file that defined `keyPath`, or the table containing it. */
function originOf(origins: Map<string, string>, keyPath: string): string {
  const parts = keyPath.split('.');
  for (let i = parts.length; i > 0; i--) {
    const found = origins.get(parts.slice(0, i).join('.'));
    if (found) return found;
  }
  return 'an earlier file';
}

/** Read each file, decode it as TOML, and merge the documents in argument order. */
export async function readConfigDocument(files: string[]): Promise<Table> {
  if (files.length === 0) {
    throw new Error('no configuration files specified');
  }

  const merged: Table = {};
  const origins = new Map<string, string>();
  for (const file of files) {
    log.info({ file }, 'Decoding config file');
    const body = await readFile(file, 'utf8');
    let doc: Table;
    try {
      doc = TOML.parse(body);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`Decoding ${file} failed: ${msg}`, { cause: err });
    }
    mergeTables(merged, doc, file, origins);
  }
  return merged;
}

export async function loadConfig(files: string[]): Promise<Config> {
  return configSchema.parse(await readConfigDocument(files));
}

/** Write a file, creating any missing parent directories. Overwrites in place. */
export async function writeFile(file: string, contents: string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await fsWriteFile(file, contents, 'utf8');
  log.info({ file }, 'Wrote file');
}
