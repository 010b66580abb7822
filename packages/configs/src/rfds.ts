/**
 * RFD index: `.helpers/rfd.csv` in the org's rfd repo, one row per RFD.
 * Columns: number, title, link, state, discussion (first row is the header).
 */
import * as Papa from 'papaparse';
import * as TOML from '@iarna/toml';
import { createLogger, getRepoFileContent, type Octokit } from '@bizops/shared';
import { renderGenerated } from './template';

const log = createLogger('rfds', 'gh');

const RFD_REPO = 'rfd';
const RFD_CSV_PATH = '.helpers/rfd.csv';
const RFD_COLUMNS = 5;

export interface Rfd {
  number: string;
  title: string;
  link: string;
  state: string;
  discussion: string;
}

/** Parse the RFD CSV into a map ordered by RFD number. */
export function parseRfdCsv(csv: string): Map<number, Rfd> {
  const parsed = Papa.parse<string[]>(csv, { delimiter: ',', header: false, skipEmptyLines: true });
  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new Error(`RFD csv parse failed on row ${first.row ?? '?'}: ${first.message}`);
  }

  const entries: Array<[number, Rfd]> = [];
  // Row 0 is the header
  parsed.data.slice(1).forEach((row, i) => {
    const line = i + 2;
    if (row.length < RFD_COLUMNS) {
      throw new Error(`RFD csv line ${line} has ${row.length} columns, expected ${RFD_COLUMNS}`);
    }
    const [number, title, link, state, discussion] = row;
    const key = /^\d+$/.test(number) ? Number(number) : NaN;
    if (!Number.isSafeInteger(key)) {
      throw new Error(`RFD csv line ${line} has a non-numeric RFD number "${number}"`);
    }
    entries.push([key, { number, title, link, state, discussion }]);
  });

  entries.sort(([a], [b]) => a - b);
  return new Map(entries);
}

export async function loadRfdsFromRepo(github: Octokit, org: string): Promise<Map<number, Rfd>> {
  const csv = await getRepoFileContent(github, org, RFD_REPO, RFD_CSV_PATH);
  const rfds = parseRfdCsv(csv);
  log.info({ org, count: rfds.size }, 'Loaded RFD index');
  return rfds;
}

/** TOML listing of the RFDs in number order, with the generated-file header. */
export function renderRfdIndex(rfds: Map<number, Rfd>): string {
  const doc = { rfds: [...rfds.values()].map((r) => ({ ...r })) };
  return renderGenerated(TOML.stringify(doc));
}
