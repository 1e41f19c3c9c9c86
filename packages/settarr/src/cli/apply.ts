/**
 * settarr apply
 * Reconcile the instance's quality definitions and profiles with the config file.
 */

import { Command } from 'commander';
import { bold, dim, green } from 'colorette';

import { Logger, RunLogger } from '../logger.js';
import { SonarrClient } from '../sonarr/client.js';
import { applySettings } from '../sync.js';
import type { SyncResult } from '../types.js';
import { loadSettings, printError } from './shared.js';

interface ApplyOptions {
  config?: string;
  verbose?: boolean;
}

export function applyCommand(baseDir: string): Command {
  return new Command('apply')
    .description('Apply quality definitions and quality profiles to Sonarr')
    .option('-c, --config <path>', 'Config file (default: discovered)')
    .option('-v, --verbose', 'Log every compared attribute')
    .action(async (opts: ApplyOptions) => {
      let run: RunLogger | undefined;
      let instance = '';
      let result: SyncResult | undefined;
      let failure: unknown;

      try {
        const { config, settings } = loadSettings(baseDir, opts.config);
        const logger = new Logger(opts.verbose ? 'debug' : config.log.level);
        const client = new SonarrClient(config.sonarr);
        instance = config.sonarr.url ?? process.env.SONARR_URL ?? '';
        run = new RunLogger(config.log.dir);

        logger.info(`Applying ${config.configPath} to ${instance}`);
        result = await applySettings({ sonarr: client, customFormats: client, logger, run }, settings);
      } catch (err) {
        failure = err;
      }

      // Changes made before a failure are still logged
      if (run) {
        const logPath = run.writeLog();
        run.writeStatus({
          runAt: new Date().toISOString(),
          instance,
          changed: result?.changed ?? run.changes.length > 0,
          changes: run.changes.length,
          logPath,
          ...(failure ? { error: failure instanceof Error ? failure.message : String(failure) } : {}),
        });
        console.log(dim(`Run log: ${logPath}`));
      }

      if (failure !== undefined || !result) {
        printError(failure);
        process.exit(1);
      }

      console.log(
        result.changed
          ? green(bold(`Applied ${run?.changes.length ?? 0} change(s)`))
          : green('Sonarr is up to date')
      );
    });
}
