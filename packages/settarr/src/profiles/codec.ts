/**
 * Translation between local quality profiles and Sonarr's profile resource.
 *
 * Sonarr lists profile items lowest priority first and expects every known
 * quality to appear exactly once, enabled or not. Locally only enabled
 * qualities are listed, highest priority first.
 */

import { isDeepStrictEqual } from 'node:util';

import { InconsistentRemoteStateError, RemoteLookupError } from '../errors.js';
import type { AttrField } from '../remoteAttrs.js';
import type {
  SonarrCustomFormat,
  SonarrFormatItem,
  SonarrQuality,
  SonarrQualityItem,
  SonarrQualityProfile,
  SonarrQualityProfileAttrs,
} from '../sonarr/types.js';
import type { CustomFormatScore, QualityEntry, QualityGroup, QualityProfile } from './schema.js';

/**
 * Groups defined locally have no id until Sonarr stores them, so each create or
 * update numbers them from here in order of appearance. These ids are only ever
 * sent, never read back or compared.
 */
export const QUALITY_GROUP_ID_BASE = 1000;

export interface ProfileEncodeContext {
  /** Remote qualities keyed by definition title, heaviest first. */
  qualityDefinitions: ReadonlyMap<string, SonarrQuality>;
  customFormats: ReadonlyMap<string, SonarrCustomFormat>;
  groupIds: ReadonlyMap<string, number>;
}

export function assignGroupIds(qualities: readonly QualityEntry[]): Map<string, number> {
  const ids = new Map<string, number>();
  for (const entry of qualities) {
    if (entry.kind === 'group') ids.set(entry.name, QUALITY_GROUP_ID_BASE + ids.size + 1);
  }
  return ids;
}

function lookupQuality(qualityDefinitions: ReadonlyMap<string, SonarrQuality>, name: string): SonarrQuality {
  const quality = qualityDefinitions.get(name);
  if (!quality) throw new RemoteLookupError('quality', name);
  return quality;
}

function lookupGroupId(groupIds: ReadonlyMap<string, number>, name: string): number {
  const id = groupIds.get(name);
  if (id === undefined) throw new Error(`No group id assigned to quality group '${name}'`);
  return id;
}

// ──────────────────────────────────────────────────────────────────
// Qualities
// ──────────────────────────────────────────────────────────────────

export function encodeQualityName(
  qualityDefinitions: ReadonlyMap<string, SonarrQuality>,
  name: string,
  allowed: boolean
): SonarrQualityItem {
  return { quality: lookupQuality(qualityDefinitions, name), items: [], allowed };
}

export function encodeQualityGroup(
  group: QualityGroup,
  groupId: number,
  qualityDefinitions: ReadonlyMap<string, SonarrQuality>
): SonarrQualityItem {
  return {
    id: groupId,
    name: group.name,
    allowed: true,
    items: [...group.members].map((member) => encodeQualityName(qualityDefinitions, member, true)),
  };
}

function qualityOf(item: SonarrQualityItem): SonarrQuality {
  if (!item.quality) throw new InconsistentRemoteStateError("quality item without 'quality'", item);
  return item.quality;
}

export function decodeQualities(items: readonly SonarrQualityItem[]): QualityEntry[] {
  return [...items]
    .reverse()
    .filter((item) => item.allowed)
    .map((item): QualityEntry => {
      if (item.items.length === 0) return { kind: 'quality', name: qualityOf(item).name };
      if (!item.name) throw new InconsistentRemoteStateError("quality group without 'name'", item);
      return {
        kind: 'group',
        name: item.name,
        members: new Set(item.items.map((member) => qualityOf(member).name)),
      };
    });
}

export function encodeQualities(qualities: readonly QualityEntry[], ctx: ProfileEncodeContext): SonarrQualityItem[] {
  const items: SonarrQualityItem[] = [];
  const enabled = new Set<string>();

  for (const entry of qualities) {
    if (entry.kind === 'group') {
      items.push(encodeQualityGroup(entry, lookupGroupId(ctx.groupIds, entry.name), ctx.qualityDefinitions));
      for (const member of entry.members) enabled.add(member);
    } else {
      items.push(encodeQualityName(ctx.qualityDefinitions, entry.name, true));
      enabled.add(entry.name);
    }
  }

  for (const name of ctx.qualityDefinitions.keys()) {
    if (!enabled.has(name)) items.push(encodeQualityName(ctx.qualityDefinitions, name, false));
  }

  return items.reverse();
}

// ──────────────────────────────────────────────────────────────────
// Cutoff
// ──────────────────────────────────────────────────────────────────

export function decodeUpgradeUntil(items: readonly SonarrQualityItem[], cutoff: number): string {
  for (const item of items) {
    // Groups carry their own id; single qualities are identified by the nested quality
    const quality = item.id !== undefined ? item : item.quality;
    if (quality && quality.id === cutoff && quality.name) return quality.name;
  }
  throw new InconsistentRemoteStateError(`'cutoff' quality ID ${cutoff} not found in 'items'`, items);
}

export function encodeUpgradeUntil(profile: QualityProfile, ctx: ProfileEncodeContext): number {
  if (!profile.upgradeUntil) {
    const first = profile.qualities[0];
    if (!first) throw new Error('Quality profile has no qualities to take a cutoff from');
    return first.kind === 'group'
      ? lookupGroupId(ctx.groupIds, first.name)
      : lookupQuality(ctx.qualityDefinitions, first.name).id;
  }
  return ctx.groupIds.get(profile.upgradeUntil) ?? lookupQuality(ctx.qualityDefinitions, profile.upgradeUntil).id;
}

// ──────────────────────────────────────────────────────────────────
// Custom formats
// ──────────────────────────────────────────────────────────────────

function compareScores(a: { name: string; score: number }, b: { name: string; score: number }): number {
  if (a.score !== b.score) return b.score - a.score;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export function decodeCustomFormats(formatItems: readonly SonarrFormatItem[]): CustomFormatScore[] {
  return formatItems
    .filter((item) => item.score !== 0)
    .map((item) => ({ name: item.name, score: item.score }))
    .sort(compareScores);
}

/**
 * The form decoding produces, so local and remote lists compare regardless of
 * the order scores were written in.
 */
export function normalizeCustomFormats(scores: readonly CustomFormatScore[]): CustomFormatScore[] {
  return scores
    .map((cf) => ({ name: cf.name, score: cf.score ?? 0 }))
    .filter((cf) => cf.score !== 0)
    .sort(compareScores);
}

export function encodeCustomFormats(
  scores: readonly CustomFormatScore[],
  customFormats: ReadonlyMap<string, SonarrCustomFormat>
): SonarrFormatItem[] {
  const covered = new Set<string>();
  const formatItems: SonarrFormatItem[] = [];

  for (const cf of scores) {
    const format = customFormats.get(cf.name);
    if (!format) throw new RemoteLookupError('custom format', cf.name);
    formatItems.push({ format: format.id, name: cf.name, score: cf.score ?? 0 });
    covered.add(cf.name);
  }

  // Sonarr keeps one entry per custom format; anything not scored locally goes to 0
  for (const [name, format] of customFormats) {
    if (covered.has(name)) continue;
    formatItems.push({ format: format.id, name, score: 0 });
    covered.add(name);
  }

  return formatItems;
}

// ──────────────────────────────────────────────────────────────────
// Whole profile
// ──────────────────────────────────────────────────────────────────

export function decodeQualityProfile(json: SonarrQualityProfile): QualityProfile {
  const upgradeUntil = decodeUpgradeUntil(json.items, json.cutoff);
  return {
    upgradesAllowed: json.upgradeAllowed,
    qualities: decodeQualities(json.items),
    minimumCustomFormatScore: json.minFormatScore ?? 0,
    upgradeUntilCustomFormatScore: json.cutoffFormatScore ?? 0,
    minimumCustomFormatScoreIncrement: json.minUpgradeFormatScore ?? 1,
    customFormats: decodeCustomFormats(json.formatItems ?? []),
    upgradeUntil: json.upgradeAllowed ? upgradeUntil : undefined,
  };
}

export function encodeQualityProfile(profile: QualityProfile, ctx: ProfileEncodeContext): SonarrQualityProfileAttrs {
  return {
    minFormatScore: profile.minimumCustomFormatScore,
    cutoffFormatScore: profile.upgradeUntilCustomFormatScore,
    minUpgradeFormatScore: profile.minimumCustomFormatScoreIncrement,
    formatItems: encodeCustomFormats(profile.customFormats, ctx.customFormats),
    upgradeAllowed: profile.upgradesAllowed,
    cutoff: encodeUpgradeUntil(profile, ctx),
    items: encodeQualities(profile.qualities, ctx),
  };
}

export const QUALITY_PROFILE_ATTRS: ReadonlyArray<AttrField<QualityProfile, SonarrQualityProfileAttrs>> = [
  { attr: 'minimumCustomFormatScore', key: 'minimum_custom_format_score', remote: 'minFormatScore' },
  { attr: 'upgradeUntilCustomFormatScore', key: 'upgrade_until_custom_format_score', remote: 'cutoffFormatScore' },
  {
    attr: 'minimumCustomFormatScoreIncrement',
    key: 'minimum_custom_format_score_increment',
    remote: 'minUpgradeFormatScore',
  },
  {
    attr: 'customFormats',
    key: 'custom_formats',
    remote: 'formatItems',
    equals: (local, remote) =>
      isDeepStrictEqual(normalizeCustomFormats(local.customFormats), normalizeCustomFormats(remote.customFormats)),
  },
  { attr: 'upgradesAllowed', key: 'upgrades_allowed', remote: 'upgradeAllowed' },
  { attr: 'upgradeUntil', key: 'upgrade_until', remote: 'cutoff' },
  { attr: 'qualities', key: 'qualities', remote: 'items' },
];
