/**
 * Reconciliation of a whole `sonarr.settings` tree against one instance.
 */

import { z } from 'zod';

import { ConfigValidationError } from './errors.js';
import {
  deleteQualityProfiles,
  parseQualityProfilesSettings,
  qualityProfilesFromRemote,
  qualityProfilesToDocument,
  updateQualityProfiles,
} from './profiles/qualityProfiles.js';
import type { QualityProfilesSettings } from './profiles/qualityProfiles.js';
import {
  parseQualitySettings,
  qualitySettingsFromRemote,
  qualitySettingsToDocument,
  renderQualitySettings,
  updateQualitySettings,
} from './quality/qualitySettings.js';
import type { QualitySettings } from './quality/qualitySettings.js';
import type { SonarrApi } from './sonarr/types.js';
import type { QualitySizeSource } from './trash/metadata.js';
import type { SyncContext, SyncResult } from './types.js';
import { parseFields } from './validation.js';

export const SETTINGS_TREE = 'sonarr.settings';

const QUALITY_TREE = `${SETTINGS_TREE}.quality`;
const QUALITY_PROFILES_TREE = `${SETTINGS_TREE}.profiles.quality_profiles`;

export interface SonarrSettings {
  quality: QualitySettings;
  qualityProfiles: QualityProfilesSettings;
}

const settingsFields = {
  quality: z.unknown(),
  profiles: z.unknown(),
};

const profilesFields = {
  quality_profiles: z.unknown(),
};

/**
 * Parse the settings subtree, collecting every field error before failing.
 */
export function parseSonarrSettings(raw: unknown): SonarrSettings {
  const top = parseFields(settingsFields, raw, SETTINGS_TREE);
  const profiles = parseFields(profilesFields, top.values.profiles, `${SETTINGS_TREE}.profiles`);
  const errors = [...top.errors, ...profiles.errors];

  const quality = parseQualitySettings(top.values.quality, QUALITY_TREE);
  if (!quality.ok) errors.push(...quality.errors);

  const qualityProfiles = parseQualityProfilesSettings(profiles.values.quality_profiles, QUALITY_PROFILES_TREE);
  if (!qualityProfiles.ok) errors.push(...qualityProfiles.errors);

  if (errors.length > 0 || !quality.ok || !qualityProfiles.ok) throw new ConfigValidationError(errors);
  return { quality: quality.value, qualityProfiles: qualityProfiles.value };
}

export function renderSettings(settings: SonarrSettings, source?: QualitySizeSource): SonarrSettings {
  return { ...settings, quality: renderQualitySettings(settings.quality, QUALITY_TREE, source) };
}

export async function fetchRemoteSettings(api: SonarrApi): Promise<SonarrSettings> {
  return {
    quality: await qualitySettingsFromRemote(api),
    qualityProfiles: await qualityProfilesFromRemote(api),
  };
}

/**
 * Bring the instance in line with `local`. Definitions go first so that profile
 * quality names resolve against their final titles; deletions go last so a
 * renamed profile is created before its old name disappears.
 */
export async function applySettings(ctx: SyncContext, local: SonarrSettings): Promise<SyncResult> {
  const remote = await fetchRemoteSettings(ctx.sonarr);

  const qualityDefinitions = await updateQualitySettings(ctx, QUALITY_TREE, local.quality, remote.quality);
  const qualityProfiles = await updateQualityProfiles(
    ctx,
    QUALITY_PROFILES_TREE,
    local.qualityProfiles,
    remote.qualityProfiles
  );
  const deletedQualityProfiles = await deleteQualityProfiles(
    ctx,
    QUALITY_PROFILES_TREE,
    local.qualityProfiles,
    remote.qualityProfiles
  );

  return {
    changed: qualityDefinitions || qualityProfiles || deletedQualityProfiles,
    qualityDefinitions,
    qualityProfiles,
    deletedQualityProfiles,
  };
}

export function settingsToDocument(settings: SonarrSettings): Record<string, unknown> {
  return {
    quality: qualitySettingsToDocument(settings.quality),
    profiles: { quality_profiles: qualityProfilesToDocument(settings.qualityProfiles) },
  };
}
