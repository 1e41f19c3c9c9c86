/**
 * Quality profile set: matches local profiles to remote ones by name and
 * creates, updates or deletes them.
 */

import { z } from 'zod';

import { RemoteLookupError } from '../errors.js';
import { diffAttrs, logCreatedAttrs } from '../remoteAttrs.js';
import type { CustomFormatApi, SonarrApi, SonarrCustomFormat, SonarrQuality } from '../sonarr/types.js';
import type { SyncContext } from '../types.js';
import { isRecord, keyPath, parseFields } from '../validation.js';
import type { Validated } from '../validation.js';
import { QUALITY_PROFILE_ATTRS, assignGroupIds, decodeQualityProfile, encodeQualityProfile } from './codec.js';
import type { ProfileEncodeContext } from './codec.js';
import { parseQualityProfile, qualityProfileToDocument } from './schema.js';
import type { QualityProfile } from './schema.js';

export interface QualityProfilesSettings {
  /**
   * Delete remote profiles that are not defined locally.
   * This includes the profiles Sonarr ships with.
   */
  deleteUnmanaged: boolean;
  definitions: Map<string, QualityProfile>;
}

const qualityProfilesFields = {
  delete_unmanaged: z.boolean().default(false),
  definitions: z.unknown(),
};

export function parseQualityProfilesSettings(raw: unknown, tree: string): Validated<QualityProfilesSettings> {
  const { values, errors } = parseFields(qualityProfilesFields, raw, tree);
  const definitions = new Map<string, QualityProfile>();
  const definitionsTree = `${tree}.definitions`;

  if (isRecord(values.definitions)) {
    for (const [name, rawProfile] of Object.entries(values.definitions)) {
      if (!name.trim()) {
        errors.push({ path: definitionsTree, message: 'quality profile names must not be empty' });
        continue;
      }
      const parsed = parseQualityProfile(rawProfile, keyPath(definitionsTree, name));
      if (parsed.ok) definitions.set(name, parsed.value);
      else errors.push(...parsed.errors);
    }
  } else if (values.definitions !== undefined && values.definitions !== null) {
    errors.push({ path: definitionsTree, message: 'expected a mapping of profile name to quality profile' });
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, value: { deleteUnmanaged: values.delete_unmanaged ?? false, definitions } };
}

export async function qualityProfilesFromRemote(api: SonarrApi): Promise<QualityProfilesSettings> {
  const definitions = new Map<string, QualityProfile>();
  for (const json of await api.getQualityProfiles()) {
    definitions.set(json.name, decodeQualityProfile(json));
  }
  return { deleteUnmanaged: false, definitions };
}

/** Remote qualities keyed by definition title, heaviest first. */
export async function fetchQualityCatalog(api: SonarrApi): Promise<Map<string, SonarrQuality>> {
  const definitions = await api.getQualityDefinitions();
  return new Map(
    [...definitions].sort((a, b) => b.weight - a.weight).map((definition) => [definition.title, definition.quality])
  );
}

export async function fetchCustomFormatCatalog(api: CustomFormatApi): Promise<Map<string, SonarrCustomFormat>> {
  const customFormats = await api.listCustomFormats();
  return new Map(customFormats.map((cf) => [cf.name, cf]));
}

async function fetchProfileIds(api: SonarrApi): Promise<Map<string, number>> {
  const profiles = await api.getQualityProfiles();
  return new Map(profiles.map((profile) => [profile.name, profile.id]));
}

export async function updateQualityProfiles(
  ctx: SyncContext,
  tree: string,
  local: QualityProfilesSettings,
  remote: QualityProfilesSettings
): Promise<boolean> {
  const profileIds = await fetchProfileIds(ctx.sonarr);
  const qualityDefinitions = await fetchQualityCatalog(ctx.sonarr);
  const customFormats = await fetchCustomFormatCatalog(ctx.customFormats);

  let changed = false;
  for (const [name, profile] of local.definitions) {
    const profileTree = keyPath(`${tree}.definitions`, name);
    const encodeCtx: ProfileEncodeContext = {
      qualityDefinitions,
      customFormats,
      groupIds: assignGroupIds(profile.qualities),
    };

    const current = remote.definitions.get(name);
    if (!current) {
      await createQualityProfile(ctx, profileTree, name, profile, encodeCtx);
      changed = true;
      continue;
    }

    const id = profileIds.get(name);
    if (id === undefined) throw new RemoteLookupError('quality profile', name);
    if (await updateQualityProfile(ctx, profileTree, id, name, profile, current, encodeCtx)) {
      changed = true;
    }
  }
  return changed;
}

async function createQualityProfile(
  ctx: SyncContext,
  tree: string,
  name: string,
  profile: QualityProfile,
  encodeCtx: ProfileEncodeContext
): Promise<void> {
  const attrs = encodeQualityProfile(profile, encodeCtx);
  logCreatedAttrs(tree, profile, QUALITY_PROFILE_ATTRS, ctx.logger);
  await ctx.sonarr.createQualityProfile({ name, ...attrs });
  ctx.run.record({ tree, action: 'create', to: qualityProfileToDocument(profile) });
}

/**
 * Sonarr replaces the whole profile on update, so every attribute is sent;
 * the diff only decides whether to send anything at all.
 */
async function updateQualityProfile(
  ctx: SyncContext,
  tree: string,
  id: number,
  name: string,
  profile: QualityProfile,
  current: QualityProfile,
  encodeCtx: ProfileEncodeContext
): Promise<boolean> {
  const changes = diffAttrs(tree, profile, current, QUALITY_PROFILE_ATTRS, ctx.logger);
  if (changes.length === 0) return false;

  await ctx.sonarr.updateQualityProfile({ id, name, ...encodeQualityProfile(profile, encodeCtx) });
  for (const change of changes) {
    ctx.run.record({ tree: `${tree}.${change.key}`, action: 'update', from: change.from, to: change.to });
  }
  return true;
}

export async function deleteQualityProfiles(
  ctx: SyncContext,
  tree: string,
  local: QualityProfilesSettings,
  remote: QualityProfilesSettings
): Promise<boolean> {
  const profileIds = await fetchProfileIds(ctx.sonarr);

  let changed = false;
  for (const name of remote.definitions.keys()) {
    if (local.definitions.has(name)) continue;
    const profileTree = keyPath(`${tree}.definitions`, name);
    if (!local.deleteUnmanaged) {
      ctx.logger.debug(`${profileTree}: (...) (unmanaged)`);
      continue;
    }
    const id = profileIds.get(name);
    if (id === undefined) throw new RemoteLookupError('quality profile', name);
    ctx.logger.info(`${profileTree}: (...) -> (deleted)`);
    await ctx.sonarr.deleteQualityProfile(id);
    ctx.run.record({ tree: profileTree, action: 'delete' });
    changed = true;
  }
  return changed;
}

export function qualityProfilesToDocument(settings: QualityProfilesSettings): Record<string, unknown> {
  const definitions: Record<string, unknown> = {};
  for (const [name, profile] of settings.definitions) {
    definitions[name] = qualityProfileToDocument(profile);
  }
  return { delete_unmanaged: settings.deleteUnmanaged, definitions };
}
