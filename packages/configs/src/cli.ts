/**
 * bizops-configs: generate files from the configs repo and the RFD index.
 *
 *   npm run configs -- links -f configs/links.toml configs/extra.toml -o out/shorturls.conf
 *   npm run configs -- rfds -o out/rfds.toml
 */
import path from 'path';
import { existsSync } from 'fs';
import { config as loadEnv } from 'dotenv';

const envPath = path.resolve(process.cwd(), '.env');
if (existsSync(envPath)) loadEnv({ path: envPath });

import { Command } from 'commander';
import { createGithubClient, createLogger, loadGithubConfig } from '@bizops/shared';
import { loadConfig, writeFile } from './files';
import { generateLinkRedirects } from './links';
import { loadRfdsFromRepo, renderRfdIndex } from './rfds';

const log = createLogger('configs-cli', 'cfg');

const program = new Command();
program.name('bizops-configs').description('Generate files from configuration and the RFD index');

program
  .command('links')
  .description('Generate short-link redirects from the links table')
  .requiredOption('-f, --file <paths...>', 'TOML configuration files, merged in order')
  .requiredOption('-o, --out <path>', 'output file')
  .action(async (opts: { file: string[]; out: string }) => {
    const config = await loadConfig(opts.file);
    await writeFile(opts.out, generateLinkRedirects(config));
    log.info({ links: Object.keys(config.links).length, out: opts.out }, 'Generated link redirects');
  });

program
  .command('rfds')
  .description('Write the RFD index from the rfd repo as TOML')
  .requiredOption('-o, --out <path>', 'output file')
  .action(async (opts: { out: string }) => {
    const github = loadGithubConfig();
    const rfds = await loadRfdsFromRepo(createGithubClient(github), github.org);
    await writeFile(opts.out, renderRfdIndex(rfds));
  });

program.parseAsync().catch((err) => {
  log.error({ err }, 'Command failed');
  process.exitCode = 1;
});
