/**
 * Quality profile model and validation.
 *
 * Qualities are listed highest priority first. A quality group gives several
 * qualities the same priority; every quality may appear only once per profile,
 * whether on its own or inside a group.
 */

import { z } from 'zod';

import type { FieldError } from '../errors.js';
import { nonEmptyString, parseFields } from '../validation.js';
import type { Validated } from '../validation.js';

export type QualityEntry =
  | { kind: 'quality'; name: string }
  | { kind: 'group'; name: string; members: Set<string> };

export type QualityGroup = Extract<QualityEntry, { kind: 'group' }>;

export interface CustomFormatScore {
  name: string;
  score?: number;        // unset scores are sent as 0
}

export interface QualityProfile {
  upgradesAllowed: boolean;
  qualities: QualityEntry[];
  minimumCustomFormatScore: number;
  upgradeUntilCustomFormatScore: number;
  minimumCustomFormatScoreIncrement: number;
  customFormats: CustomFormatScore[];
  upgradeUntil?: string;
}

const qualityGroupSchema = z
  .object({
    name: nonEmptyString,
    members: z.array(nonEmptyString).min(1, 'a quality group needs at least one member'),
  })
  .strict()
  .transform((group): QualityEntry => ({ kind: 'group', name: group.name, members: new Set(group.members) }));

const qualityEntrySchema = z.union([
  nonEmptyString.transform((name): QualityEntry => ({ kind: 'quality', name })),
  qualityGroupSchema,
]);

const customFormatScoreSchema = z
  .object({
    name: nonEmptyString,
    score: z.number().int().nullish(),
  })
  .strict()
  .transform((cf): CustomFormatScore => ({ name: cf.name, score: cf.score ?? undefined }));

const qualityProfileFields = {
  upgrades_allowed: z.boolean().default(false),
  qualities: z.array(qualityEntrySchema).min(1, 'at least one quality must be enabled'),
  minimum_custom_format_score: z.number().int().default(0),
  upgrade_until_custom_format_score: z.number().int().default(0),
  minimum_custom_format_score_increment: z.number().int().min(1).default(1),
  custom_formats: z.array(customFormatScoreSchema).default([]),
  upgrade_until: nonEmptyString.nullish(),
};

/**
 * Validate one profile. Checks run in a fixed order; a check whose input field
 * already failed is skipped rather than reported twice.
 */
export function parseQualityProfile(raw: unknown, tree: string): Validated<QualityProfile> {
  const { values, failed, errors } = parseFields(qualityProfileFields, raw, tree);
  const fieldError = (field: string, message: string): FieldError => ({ path: `${tree}.${field}`, message });

  if (values.qualities) {
    const message = checkQualityNames(values.qualities);
    if (message) {
      errors.push(fieldError('qualities', message));
      failed.add('qualities');
    }
  }

  let upgradeUntil = values.upgrade_until ?? undefined;
  if (values.qualities && !failed.has('qualities') && values.upgrades_allowed !== undefined) {
    const result = resolveUpgradeUntil(values.upgrades_allowed, values.qualities, upgradeUntil);
    if (result.ok) upgradeUntil = result.value;
    else errors.push(fieldError('upgrade_until', result.message));
  }

  const minimum = values.minimum_custom_format_score;
  const upgradeUntilScore = values.upgrade_until_custom_format_score;
  if (minimum !== undefined && upgradeUntilScore !== undefined && upgradeUntilScore < minimum) {
    errors.push(
      fieldError(
        'upgrade_until_custom_format_score',
        `value (${upgradeUntilScore}) must be greater than or equal to 'minimum_custom_format_score' (${minimum})`
      )
    );
  }

  let customFormats = values.custom_formats;
  if (customFormats) {
    const result = dedupeCustomFormats(customFormats);
    if (result.ok) customFormats = result.value;
    else errors.push(fieldError('custom_formats', result.message));
  }

  if (
    errors.length > 0 ||
    values.upgrades_allowed === undefined ||
    values.qualities === undefined ||
    minimum === undefined ||
    upgradeUntilScore === undefined ||
    values.minimum_custom_format_score_increment === undefined ||
    customFormats === undefined
  ) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    value: {
      upgradesAllowed: values.upgrades_allowed,
      qualities: values.qualities,
      minimumCustomFormatScore: minimum,
      upgradeUntilCustomFormatScore: upgradeUntilScore,
      minimumCustomFormatScoreIncrement: values.minimum_custom_format_score_increment,
      customFormats,
      upgradeUntil,
    },
  };
}

type Check<T> = { ok: true; value: T } | { ok: false; message: string };

function describeEntry(entry: QualityEntry): string {
  return entry.kind === 'group' ? `as part of quality group '${entry.name}'` : 'as a non-grouped quality value';
}

/**
 * Returns a description of the first clash between quality names or group names, if any.
 */
export function checkQualityNames(qualities: readonly QualityEntry[]): string | undefined {
  const owners = new Map<string, QualityEntry>();
  const entryNames = new Map<string, QualityEntry>();

  for (const entry of qualities) {
    const clash = entryNames.get(entry.name);
    if (clash && (entry.kind === 'group' || clash.kind === 'group')) {
      return entry.kind === 'group' && clash.kind === 'group'
        ? `quality group name '${entry.name}' is used by more than one group`
        : `quality group name '${entry.name}' is also used as a non-grouped quality value`;
    }
    entryNames.set(entry.name, entry);

    const names = entry.kind === 'group' ? [...entry.members] : [entry.name];
    for (const name of names) {
      const other = owners.get(name);
      if (other) {
        const detail =
          entry.kind === 'quality' && other.kind === 'quality'
            ? 'both are non-grouped quality values'
            : `one ${describeEntry(entry)}, another ${describeEntry(other)}`;
        return `duplicate entries of quality value '${name}' exist (${detail})`;
      }
      owners.set(name, entry);
    }
  }
  return undefined;
}

/**
 * With upgrades disabled the cutoff is dropped, so whatever the instance has is ignored.
 */
export function resolveUpgradeUntil(
  upgradesAllowed: boolean,
  qualities: readonly QualityEntry[],
  upgradeUntil: string | undefined
): Check<string | undefined> {
  if (!upgradesAllowed) return { ok: true, value: undefined };
  if (!upgradeUntil) return { ok: false, message: "required if 'upgrades_allowed' is true" };
  if (!qualities.some((entry) => entry.name === upgradeUntil)) {
    return { ok: false, message: "must be set to a value enabled in 'qualities'" };
  }
  return { ok: true, value: upgradeUntil };
}

export function dedupeCustomFormats(scores: readonly CustomFormatScore[]): Check<CustomFormatScore[]> {
  const seen = new Map<string, number | undefined>();
  const out: CustomFormatScore[] = [];
  for (const cf of scores) {
    if (seen.has(cf.name)) {
      const first = seen.get(cf.name);
      if (first === cf.score) continue;
      return {
        ok: false,
        message: `more than one score defined for custom format '${cf.name}' (scores: ${formatScore(first)}, ${formatScore(cf.score)})`,
      };
    }
    seen.set(cf.name, cf.score);
    out.push(cf);
  }
  return { ok: true, value: out };
}

function formatScore(score: number | undefined): string {
  return score === undefined ? 'default' : String(score);
}

export function qualityProfileToDocument(profile: QualityProfile): Record<string, unknown> {
  return {
    upgrades_allowed: profile.upgradesAllowed,
    ...(profile.upgradeUntil ? { upgrade_until: profile.upgradeUntil } : {}),
    qualities: profile.qualities.map((entry) =>
      entry.kind === 'group' ? { name: entry.name, members: [...entry.members] } : entry.name
    ),
    minimum_custom_format_score: profile.minimumCustomFormatScore,
    upgrade_until_custom_format_score: profile.upgradeUntilCustomFormatScore,
    minimum_custom_format_score_increment: profile.minimumCustomFormatScoreIncrement,
    custom_formats: profile.customFormats.map((cf) =>
      cf.score === undefined ? { name: cf.name } : { name: cf.name, score: cf.score }
    ),
  };
}
