#!/usr/bin/env node
/**
 * settarr - declarative Sonarr quality settings
 *
 * Keeps an instance's quality definitions and quality profiles in line with a YAML file.
 */

import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { applyCommand } from './cli/apply.js';
import { dumpCommand } from './cli/dump.js';
import { validateCommand } from './cli/validate.js';

const baseDir = fileURLToPath(new URL('..', import.meta.url));

const program = new Command();

program
  .name('settarr')
  .description('Declarative Sonarr quality definitions and quality profiles')
  .version('0.1.0');

program.addCommand(applyCommand(baseDir));
program.addCommand(validateCommand(baseDir));
program.addCommand(dumpCommand());

await program.parseAsync(process.argv);
