/**
 * settarr dump
 * Print the instance's current quality settings as a config document.
 */

import { Command } from 'commander';
import { stringify } from 'yaml';

import { SonarrClient } from '../sonarr/client.js';
import { fetchRemoteSettings, settingsToDocument } from '../sync.js';
import { printError } from './shared.js';

interface DumpOptions {
  url?: string;
  apiKey?: string;
  timeout: string;
}

export function dumpCommand(): Command {
  return new Command('dump')
    .description('Print the quality settings of a Sonarr instance as YAML')
    .option('--url <url>', 'Sonarr URL (default: $SONARR_URL)')
    .option('--api-key <key>', 'Sonarr API key (default: $SONARR_API_KEY)')
    .option('--timeout <ms>', 'Request timeout in milliseconds', '30000')
    .action(async (opts: DumpOptions) => {
      try {
        const timeoutMs = parseInt(opts.timeout, 10);
        if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
          throw new Error(`--timeout must be a positive number of milliseconds, got '${opts.timeout}'`);
        }
        const client = new SonarrClient({ url: opts.url, apiKey: opts.apiKey, timeoutMs });
        const remote = await fetchRemoteSettings(client);
        process.stdout.write(stringify({ sonarr: { settings: settingsToDocument(remote) } }));
      } catch (err) {
        printError(err);
        process.exit(1);
      }
    });
}
