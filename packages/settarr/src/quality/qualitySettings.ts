/**
 * Quality settings: the instance's quality definitions, optionally seeded from a
 * TRaSH-Guides quality size preset.
 *
 * Sonarr always has exactly one definition per quality, so definitions are only
 * ever updated in place. Qualities not mentioned locally are left alone.
 */

import { z } from 'zod';

import { ConfigValidationError, RemoteLookupError, TrashIdNotFoundError } from '../errors.js';
import type { FieldError } from '../errors.js';
import { diffAttrs, pickChanged } from '../remoteAttrs.js';
import type { SonarrApi, SonarrQualityDefinition } from '../sonarr/types.js';
import type { QualitySizeSource } from '../trash/metadata.js';
import type { SyncContext } from '../types.js';
import { isRecord, keyPath, nonEmptyString, parseFields } from '../validation.js';
import type { Validated } from '../validation.js';
import {
  QUALITY_DEFINITION_ATTRS,
  decodeQualityDefinition,
  encodeQualityDefinition,
  parseQualityDefinition,
} from './definition.js';
import type { QualityDefinition } from './definition.js';

export interface QualitySettings {
  trashId?: string;
  definitions: Map<string, QualityDefinition>;
}

const qualitySettingsFields = {
  trash_id: z
    .string()
    .trim()
    .regex(/^[0-9a-f]+$/i, 'must be a hexadecimal TRaSH-Guides ID')
    .transform((id) => id.toLowerCase())
    .nullish(),
  definitions: z.unknown(),
};

export function parseQualitySettings(raw: unknown, tree: string): Validated<QualitySettings> {
  const { values, errors } = parseFields(qualitySettingsFields, raw, tree);
  const definitions = new Map<string, QualityDefinition>();
  const definitionsTree = `${tree}.definitions`;

  if (isRecord(values.definitions)) {
    for (const [name, rawDefinition] of Object.entries(values.definitions)) {
      const nameCheck = nonEmptyString.safeParse(name);
      if (!nameCheck.success) {
        errors.push({ path: definitionsTree, message: 'quality names must not be empty' });
        continue;
      }
      const parsed = parseQualityDefinition(rawDefinition, keyPath(definitionsTree, name));
      if (!parsed.ok) {
        errors.push(...parsed.errors);
        continue;
      }
      // A title equal to the quality name is the same as no title
      const { title, ...bounds } = parsed.value;
      definitions.set(name, title === name ? bounds : parsed.value);
    }
  } else if (values.definitions !== undefined && values.definitions !== null) {
    errors.push({ path: definitionsTree, message: 'expected a mapping of quality name to definition' });
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, value: { trashId: values.trash_id ?? undefined, definitions } };
}

export function usesTrashMetadata(settings: QualitySettings): boolean {
  return Boolean(settings.trashId);
}

/**
 * Fill in every quality the TRaSH-Guides preset covers that is not defined locally.
 * Local definitions always win.
 */
export function renderQualitySettings(
  settings: QualitySettings,
  tree: string,
  source?: QualitySizeSource
): QualitySettings {
  if (!settings.trashId) return settings;
  if (!source) {
    throw new Error(`${tree}.trash_id is set, but no TRaSH-Guides metadata directory is configured (trash.dir)`);
  }

  const preset = source.findQualitySize(settings.trashId);
  if (!preset) {
    throw new TrashIdNotFoundError(
      settings.trashId,
      `Unable to find Sonarr quality definition file with trash ID '${settings.trashId}'`
    );
  }

  const definitions = new Map(settings.definitions);
  const errors: FieldError[] = [];
  for (const entry of preset.qualities) {
    if (definitions.has(entry.quality)) continue;
    const parsed = parseQualityDefinition(
      { min: entry.min, preferred: entry.preferred, max: entry.max },
      keyPath(`${tree}.definitions`, entry.quality)
    );
    if (parsed.ok) definitions.set(entry.quality, parsed.value);
    else errors.push(...parsed.errors);
  }
  if (errors.length > 0) throw new ConfigValidationError(errors);

  return { ...settings, definitions };
}

export async function qualitySettingsFromRemote(api: SonarrApi): Promise<QualitySettings> {
  const definitions = new Map<string, QualityDefinition>();
  for (const json of await api.getQualityDefinitions()) {
    definitions.set(json.quality.name, decodeQualityDefinition(json));
  }
  return { definitions };
}

export async function updateQualitySettings(
  ctx: SyncContext,
  tree: string,
  local: QualitySettings,
  remote: QualitySettings
): Promise<boolean> {
  const remoteJson = new Map<string, SonarrQualityDefinition>();
  for (const json of await ctx.sonarr.getQualityDefinitions()) {
    remoteJson.set(json.quality.name, json);
  }

  let changed = false;
  for (const [name, definition] of local.definitions) {
    const definitionTree = keyPath(`${tree}.definitions`, name);
    const current = remote.definitions.get(name);
    const json = remoteJson.get(name);
    if (!current || !json) throw new RemoteLookupError('quality', name);

    const changes = diffAttrs(definitionTree, definition, current, QUALITY_DEFINITION_ATTRS, ctx.logger);
    if (changes.length === 0) continue;

    const encoded = encodeQualityDefinition(name, definition);
    await ctx.sonarr.updateQualityDefinition({ ...json, ...pickChanged(encoded, changes) });
    for (const change of changes) {
      ctx.run.record({ tree: `${definitionTree}.${change.key}`, action: 'update', from: change.from, to: change.to });
    }
    changed = true;
  }
  return changed;
}

export function qualitySettingsToDocument(settings: QualitySettings): Record<string, unknown> {
  const definitions: Record<string, unknown> = {};
  for (const [name, definition] of settings.definitions) {
    definitions[name] = {
      ...(definition.title ? { title: definition.title } : {}),
      min: definition.min,
      preferred: definition.preferred ?? null,
      max: definition.max ?? null,
    };
  }
  return {
    ...(settings.trashId ? { trash_id: settings.trashId } : {}),
    definitions,
  };
}
