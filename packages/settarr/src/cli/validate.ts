/**
 * settarr validate
 * Check the configuration without contacting the instance.
 */

import { Command } from 'commander';
import { green } from 'colorette';

import { loadSettings, printError } from './shared.js';

interface ValidateOptions {
  config?: string;
}

export function validateCommand(baseDir: string): Command {
  return new Command('validate')
    .description('Validate the configuration file without contacting Sonarr')
    .option('-c, --config <path>', 'Config file (default: discovered)')
    .action((opts: ValidateOptions) => {
      try {
        const { config, settings } = loadSettings(baseDir, opts.config);
        const definitions = settings.quality.definitions.size;
        const profiles = settings.qualityProfiles.definitions.size;
        console.log(
          green(`${config.configPath}: OK (${definitions} quality definitions, ${profiles} quality profiles)`)
        );
      } catch (err) {
        printError(err);
        process.exit(1);
      }
    });
}
