/**
 * Short-link redirects (go/<name>) generated from the `links` config table,
 * as an nginx server include.
 */
import type { Config } from './config-schema';
import { renderGenerated } from './template';

/**
 * nginx refuses a config with two `location = /x` blocks for the same path,
 * so every name and alias must be unique across all links.
 */
export function generateLinkRedirects(config: Config): string {
  const owners = new Map<string, string>();
  const lines: string[] = [];
  for (const name of Object.keys(config.links).sort()) {
    const { link, aliases } = config.links[name];
    for (const path of [name, ...[...aliases].sort()]) {
      const owner = owners.get(path);
      if (owner !== undefined) {
        throw new Error(`short link /${path} is claimed by both ${owner} and ${name}`);
      }
      owners.set(path, name);
      lines.push(`location = /${path} { return 302 ${link}; }`);
    }
  }
  return renderGenerated(lines.length ? `${lines.join('\n')}\n` : '');
}
