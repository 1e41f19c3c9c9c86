/**
 * Helpers shared by the CLI commands.
 */

import { bold, red } from 'colorette';

import { loadConfig } from '../config.js';
import { ConfigValidationError } from '../errors.js';
import { usesTrashMetadata } from '../quality/qualitySettings.js';
import { parseSonarrSettings, renderSettings } from '../sync.js';
import type { SonarrSettings } from '../sync.js';
import { TrashMetadata } from '../trash/metadata.js';
import type { SettarrConfig } from '../types.js';

export interface LoadedSettings {
  config: SettarrConfig;
  settings: SonarrSettings;
}

/** Load the config file, validate `sonarr.settings` and fill in TRaSH-Guides presets. */
export function loadSettings(baseDir: string, configPath?: string): LoadedSettings {
  const config = loadConfig(baseDir, configPath);
  const parsed = parseSonarrSettings(config.sonarr.settings);
  const source =
    usesTrashMetadata(parsed.quality) && config.trash.dir ? new TrashMetadata(config.trash.dir) : undefined;
  return { config, settings: renderSettings(parsed, source) };
}

export function printError(err: unknown) {
  if (err instanceof ConfigValidationError) {
    console.error(red(bold(`Invalid configuration (${err.errors.length} error${err.errors.length === 1 ? '' : 's'}):`)));
    for (const fieldError of err.errors) {
      console.error(`  ${fieldError.path}: ${fieldError.message}`);
    }
    return;
  }
  console.error(red(`Error: ${err instanceof Error ? err.message : String(err)}`));
}
